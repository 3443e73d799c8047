import type { ZodIssue } from 'zod';
import { RawObservationSchema } from './schemas.js';
import type { ParsedRawObservation, RawAlias, RawArp, RawRoute } from './schemas.js';
import {
  canonicalLinkAddress,
  isGroupLinkAddress,
  isUnicast,
  isUnspecified,
  parseCidr,
  parseIp,
} from '../model/address.js';
import { stableId } from '../model/ids.js';
import type {
  AliasEntry,
  ArpEntry,
  NormalizationError,
  NormalizationReason,
  NormalizationResult,
  ObservationRecord,
  RouteEntry,
} from '../model/records.js';

/**
 * Record Normalizer: turns loosely typed parser output into frozen
 * ObservationRecords with canonical addresses. No identity logic here:
 * records still carry raw identifiers.
 */

class RecordRejected extends Error {
  constructor(
    public readonly reason: NormalizationReason,
    public readonly field: string | null,
    message: string,
  ) {
    super(message);
    this.name = 'RecordRejected';
  }
}

export interface NormalizedBatch {
  records: ObservationRecord[];
  errors: NormalizationError[];
}

export function normalize(raw: unknown, sourceHostId: string, index: number = 0): NormalizationResult {
  const kind = rawKind(raw);
  const source = sourceHostId.trim();
  if (!source) {
    return { ok: false, error: { index, kind, reason: 'missing-field', field: 'sourceHostId', message: 'Source host id is empty' } };
  }

  const parsed = RawObservationSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: fromIssue(index, kind, parsed.error.issues[0], raw) };
  }

  try {
    const record = build(parsed.data, source);
    return { ok: true, record: Object.freeze(record) };
  } catch (err) {
    if (err instanceof RecordRejected) {
      return { ok: false, error: { index, kind, reason: err.reason, field: err.field, message: err.message } };
    }
    throw err;
  }
}

export function normalizeBatch(raws: readonly unknown[], sourceHostId: string): NormalizedBatch {
  const records: ObservationRecord[] = [];
  const errors: NormalizationError[] = [];
  raws.forEach((raw, index) => {
    const result = normalize(raw, sourceHostId, index);
    if (result.ok) records.push(result.record);
    else errors.push(result.error);
  });
  return { records, errors };
}

// ── Builders ────────────────────────────────────────────────────────

function build(data: ParsedRawObservation, sourceHostId: string): ObservationRecord {
  switch (data.kind) {
    case 'arp':
      return buildArp(data, sourceHostId);
    case 'route':
      return buildRoute(data, sourceHostId);
    case 'alias':
      return buildAlias(data, sourceHostId);
  }
}

function buildArp(raw: RawArp, sourceHostId: string): ArpEntry {
  const observedAt = toEpochMs(raw.observedAt);
  const neighborIp = unicastIp(raw.neighborIp, 'neighborIp');
  const neighborLinkAddress = unicastLinkAddress(raw.neighborLinkAddress, 'neighborLinkAddress');
  const localIp = raw.localIp ? unicastIp(raw.localIp, 'localIp') : null;
  const localLinkAddress = raw.localLinkAddress ? unicastLinkAddress(raw.localLinkAddress, 'localLinkAddress') : null;
  const localInterface = raw.localInterface;

  return {
    id: stableId('obs', 'arp', sourceHostId, String(observedAt), localInterface, localIp ?? '', localLinkAddress ?? '', neighborIp, neighborLinkAddress),
    kind: 'arp',
    sourceHostId,
    observedAt,
    localInterface,
    localIp,
    localLinkAddress,
    neighborIp,
    neighborLinkAddress,
  };
}

function buildRoute(raw: RawRoute, sourceHostId: string): RouteEntry {
  const observedAt = toEpochMs(raw.observedAt);
  const cidr = parseCidr(raw.destination);
  if (!cidr.ok) {
    throw new RecordRejected(cidr.reason, 'destination', `Invalid destination network: ${raw.destination}`);
  }
  const destination = cidr.cidr.text;

  let gateway: string | null = null;
  if (raw.gateway) {
    const ip = parseIp(raw.gateway);
    if (!ip) throw new RecordRejected('invalid-address', 'gateway', `Invalid gateway address: ${raw.gateway}`);
    if (!isUnspecified(ip)) {
      if (!isUnicast(ip)) throw new RecordRejected('non-unicast', 'gateway', `Gateway is not a unicast address: ${ip.text}`);
      gateway = ip.text;
    }
  }

  const localIp = raw.localIp ? unicastIp(raw.localIp, 'localIp') : null;

  return {
    id: stableId('obs', 'route', sourceHostId, String(observedAt), destination, gateway ?? '', raw.outgoingInterface, String(raw.metric), localIp ?? ''),
    kind: 'route',
    sourceHostId,
    observedAt,
    destination,
    gateway,
    outgoingInterface: raw.outgoingInterface,
    localIp,
    metric: raw.metric,
  };
}

function buildAlias(raw: RawAlias, sourceHostId: string): AliasEntry {
  const observedAt = toEpochMs(raw.observedAt);
  const aliasHostId = raw.aliasHostId ?? null;
  const rawLink = raw.linkAddress ?? null;

  if ((aliasHostId === null) === (rawLink === null)) {
    throw new RecordRejected('invalid-field', 'aliasHostId', 'Alias needs exactly one of aliasHostId or linkAddress');
  }
  if (aliasHostId === sourceHostId) {
    throw new RecordRejected('invalid-field', 'aliasHostId', 'A host cannot be aliased to itself');
  }
  if (aliasHostId !== null && raw.localInterface) {
    throw new RecordRejected('invalid-field', 'localInterface', 'localInterface only applies to link address aliases');
  }

  const linkAddress = rawLink === null ? null : unicastLinkAddress(rawLink, 'linkAddress');
  const localInterface = raw.localInterface ?? null;

  return {
    id: stableId('obs', 'alias', sourceHostId, String(observedAt), aliasHostId ?? '', linkAddress ?? '', localInterface ?? ''),
    kind: 'alias',
    sourceHostId,
    observedAt,
    aliasHostId,
    linkAddress,
    localInterface,
  };
}

// ── Field helpers ───────────────────────────────────────────────────

function toEpochMs(value: number | string): number {
  const text = typeof value === 'string' ? value.trim() : '';
  const ms = typeof value === 'number' ? value : /^\d+$/.test(text) ? Number(text) : Date.parse(text);
  if (!Number.isFinite(ms) || ms < 0) {
    throw new RecordRejected('invalid-timestamp', 'observedAt', `Invalid timestamp: ${String(value)}`);
  }
  return Math.floor(ms);
}

function unicastIp(value: string, field: string): string {
  const ip = parseIp(value);
  if (!ip) throw new RecordRejected('invalid-address', field, `Invalid IP address: ${value}`);
  if (!isUnicast(ip)) throw new RecordRejected('non-unicast', field, `Not a unicast address: ${ip.text}`);
  return ip.text;
}

function unicastLinkAddress(value: string, field: string): string {
  const hex = canonicalLinkAddress(value);
  if (!hex) throw new RecordRejected('invalid-link-address', field, `Invalid link address: ${value}`);
  if (isGroupLinkAddress(hex)) throw new RecordRejected('non-unicast', field, `Group link address: ${value}`);
  return hex;
}

function rawKind(raw: unknown): string | null {
  if (typeof raw === 'object' && raw !== null && 'kind' in raw && typeof raw.kind === 'string') {
    return raw.kind;
  }
  return null;
}

function isMissing(raw: unknown, field: string | null): boolean {
  if (field === null || typeof raw !== 'object' || raw === null) return false;
  return !(field in raw) || Reflect.get(raw, field) === undefined;
}

function fromIssue(index: number, kind: string | null, issue: ZodIssue, raw: unknown): NormalizationError {
  const field = issue.path.length > 0 ? String(issue.path[0]) : null;

  if (issue.code === 'invalid_union_discriminator') {
    return { index, kind, reason: 'unknown-kind', field: 'kind', message: `Unknown observation kind: ${kind ?? '(none)'}` };
  }
  if (isMissing(raw, field)) {
    return { index, kind, reason: 'missing-field', field, message: `Missing field: ${field ?? '(record)'}` };
  }
  if (field === 'observedAt') {
    return { index, kind, reason: 'invalid-timestamp', field, message: issue.message };
  }
  return { index, kind, reason: 'invalid-field', field, message: `${field ?? 'record'}: ${issue.message}` };
}
