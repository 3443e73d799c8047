import { canonicalLinkAddress, isGroupLinkAddress, isUnicast, parseIp } from '../model/address.js';
import type { RawObservation } from '../model/records.js';

export function lines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Broadcast and multicast rows are table furniture, not neighbors. Rows
 * that fail to parse are kept so the normalizer can report them.
 */
export function isGroupRow(ip: string, linkAddress: string): boolean {
  const hex = canonicalLinkAddress(linkAddress);
  if (hex !== null && isGroupLinkAddress(hex)) return true;
  const parsed = parseIp(ip);
  return parsed !== null && !isUnicast(parsed);
}

/** Loopback, multicast and limited-broadcast destinations say nothing about topology. */
export function isLocalOnlyDestination(address: string): boolean {
  const parsed = parseIp(address);
  if (!parsed || parsed.family !== 4) return false;
  const first = parsed.bytes[0];
  return first === 127 || first >= 224;
}

/** Put the centre IP on every record when they all name the same local interface. */
export function withCentreIp(records: RawObservation[], interfaceField: string, ip: string): RawObservation[] {
  const interfaces = new Set(records.map(record => record[interfaceField]));
  if (interfaces.size !== 1) return records;
  return records.map(record => ({ ...record, localIp: ip }));
}
