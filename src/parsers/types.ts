import type { RawObservation } from '../model/records.js';

export type DumpType = 'arp' | 'route';
export type DumpOs = 'linux' | 'windows' | 'openbsd';

export const DUMP_TYPES: readonly DumpType[] = ['arp', 'route'];
export const DUMP_OSES: readonly DumpOs[] = ['linux', 'windows', 'openbsd'];

export interface ParseOptions {
  type?: DumpType;
  os?: DumpOs;
  /** IP of the host the dump was taken on. */
  ip?: string;
  observedAt: number;
}

export interface ParsedDump {
  type: DumpType;
  os: DumpOs;
  /** Centre host IP, from the dump itself or the caller. */
  sourceIp: string | null;
  records: RawObservation[];
  /** Lines that looked like data but were skipped. */
  skipped: number;
}

/** Parser for one dump format; `ip` is the caller-supplied centre IP. */
export type DumpParser = (text: string, ip: string | null, observedAt: number) => ParsedDump;

export function isDumpType(value: string): value is DumpType {
  return value === 'arp' || value === 'route';
}

export function isDumpOs(value: string): value is DumpOs {
  return value === 'linux' || value === 'windows' || value === 'openbsd';
}
