import { z } from 'zod';

/**
 * Shape of raw observations. Only types and presence are checked here;
 * address syntax is the normalizer's job.
 */

const timestamp = z.union([z.number(), z.string()]);
const name = z.string().trim().min(1);
const optionalText = z.string().trim().min(1).nullish();

export const RawArpSchema = z.object({
  kind: z.literal('arp'),
  observedAt: timestamp,
  localInterface: name,
  localIp: optionalText,
  localLinkAddress: optionalText,
  neighborIp: name,
  neighborLinkAddress: name,
});

export const RawRouteSchema = z.object({
  kind: z.literal('route'),
  observedAt: timestamp,
  destination: name,
  gateway: z.string().trim().nullish(),
  outgoingInterface: name,
  localIp: optionalText,
  metric: z.number().int().min(0),
});

export const RawAliasSchema = z.object({
  kind: z.literal('alias'),
  observedAt: timestamp,
  aliasHostId: optionalText,
  linkAddress: optionalText,
  localInterface: optionalText,
});

export const RawObservationSchema = z.discriminatedUnion('kind', [
  RawArpSchema,
  RawRouteSchema,
  RawAliasSchema,
]);

export type RawArp = z.infer<typeof RawArpSchema>;
export type RawRoute = z.infer<typeof RawRouteSchema>;
export type RawAlias = z.infer<typeof RawAliasSchema>;
export type ParsedRawObservation = z.infer<typeof RawObservationSchema>;
