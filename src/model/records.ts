/**
 * Observation records: the closed set of facts the engine accepts.
 *
 * Records are produced by the normalizer only and are frozen; every
 * address field already holds its canonical text form.
 */

export type ObservationKind = 'arp' | 'route' | 'alias';

interface ObservationBase {
  /** Content hash of the record, `obs-` + 16 hex. */
  readonly id: string;
  readonly sourceHostId: string;
  readonly observedAt: number;
}

/** One row of a host's ARP table. */
export interface ArpEntry extends ObservationBase {
  readonly kind: 'arp';
  readonly localInterface: string;
  readonly localIp: string | null;
  readonly localLinkAddress: string | null;
  readonly neighborIp: string;
  readonly neighborLinkAddress: string;
}

/** One row of a host's routing table. `gateway` is null for on-link routes. */
export interface RouteEntry extends ObservationBase {
  readonly kind: 'route';
  readonly destination: string;
  readonly gateway: string | null;
  readonly outgoingInterface: string;
  /** The vantage host's own IP on `outgoingInterface`, when the dump shows it. */
  readonly localIp: string | null;
  readonly metric: number;
}

/**
 * Operator aliasing or host self-report. Exactly one of `aliasHostId`
 * and `linkAddress` is set.
 */
export interface AliasEntry extends ObservationBase {
  readonly kind: 'alias';
  readonly aliasHostId: string | null;
  readonly linkAddress: string | null;
  readonly localInterface: string | null;
}

export type ObservationRecord = ArpEntry | RouteEntry | AliasEntry;

/**
 * Loosely typed record as it leaves a dump parser or an API caller.
 * Field values are validated by the normalizer.
 */
export interface RawObservation {
  kind: string;
  observedAt?: number | string;
  [field: string]: unknown;
}

export type NormalizationReason =
  | 'unknown-kind'
  | 'missing-field'
  | 'invalid-field'
  | 'invalid-address'
  | 'invalid-link-address'
  | 'cidr-host-bits'
  | 'non-unicast'
  | 'invalid-timestamp';

export interface NormalizationError {
  /** Position of the raw record in the submitted batch. */
  index: number;
  kind: string | null;
  reason: NormalizationReason;
  field: string | null;
  message: string;
}

export type NormalizationResult =
  | { ok: true; record: ObservationRecord }
  | { ok: false; error: NormalizationError };
