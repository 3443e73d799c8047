export const NAME = 'netfuse';
export const VERSION = '0.1.0';
