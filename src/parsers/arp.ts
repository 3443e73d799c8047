import { DumpParseError } from '../core/errors.js';
import type { RawObservation } from '../model/records.js';
import { isGroupRow, lines, withCentreIp } from './common.js';
import type { ParsedDump } from './types.js';

const LINUX_ROW = /^(\S+)\s+\S+\s+([0-9a-f]{1,2}(?::[0-9a-f]{1,2}){5})\s+\S+\s+(?:\S+\s+)?(\S+)\s*$/i;
const WINDOWS_SECTION = /^Interface:\s+(\S+)\s+---/;
const WINDOWS_ROW = /^\s+(\S+)\s+([0-9a-f]{2}(?:-[0-9a-f]{2}){5})\s+\S+/i;
const OPENBSD_ROW = /^(\S+)\s+([0-9a-f]{1,2}(?::[0-9a-f]{1,2}){5})\s+(\S+)\s+(\S+)(?:\s+(\S+))?\s*$/i;

// ── Linux ───────────────────────────────────────────────────────────

/**
 * `arp -n` table. The dump does not say which host it came from, so the
 * centre IP has to be supplied. It is put on the records only when every
 * row goes out of the same interface; otherwise nothing says which
 * interface holds it.
 */
export function parseLinuxArp(text: string, ip: string | null, observedAt: number): ParsedDump {
  if (ip === null) {
    throw new DumpParseError('Linux ARP dumps do not contain the IP of the centre host; supply it with --ip');
  }

  const records: RawObservation[] = [];
  let skipped = 0;

  for (const line of lines(text)) {
    if (line.includes('(incomplete)')) {
      skipped++;
      continue;
    }
    const match = LINUX_ROW.exec(line);
    if (!match) continue;

    const [, neighborIp, neighborLinkAddress, localInterface] = match;
    if (isGroupRow(neighborIp, neighborLinkAddress)) {
      skipped++;
      continue;
    }
    records.push({ kind: 'arp', observedAt, localInterface, neighborIp, neighborLinkAddress });
  }

  return { type: 'arp', os: 'linux', sourceIp: ip, records: withCentreIp(records, 'localInterface', ip), skipped };
}

// ── Windows ─────────────────────────────────────────────────────────

/**
 * `arp -a` output, one section per local interface. The interface is
 * identified by its own IP.
 */
export function parseWindowsArp(text: string, ip: string | null, observedAt: number): ParsedDump {
  const records: RawObservation[] = [];
  const localIps: string[] = [];
  let current: string | null = null;
  let skipped = 0;

  lines(text).forEach((line, index) => {
    const section = WINDOWS_SECTION.exec(line);
    if (section) {
      current = section[1];
      localIps.push(current);
      return;
    }

    const match = WINDOWS_ROW.exec(line);
    if (!match) return;
    if (current === null) {
      throw new DumpParseError('ARP entry outside of an Interface section', index + 1);
    }

    const [, neighborIp, neighborLinkAddress] = match;
    if (isGroupRow(neighborIp, neighborLinkAddress)) {
      skipped++;
      return;
    }
    records.push({ kind: 'arp', observedAt, localInterface: current, localIp: current, neighborIp, neighborLinkAddress });
  });

  if (ip !== null && localIps.length > 0 && !localIps.includes(ip)) {
    throw new DumpParseError(`The ARP dump belongs to ${localIps.join(', ')} but ${ip} was supplied`);
  }

  return { type: 'arp', os: 'windows', sourceIp: ip ?? localIps[0] ?? null, records, skipped };
}

// ── OpenBSD ─────────────────────────────────────────────────────────

/**
 * `arp -an` output. Rows flagged `l` are the host's own addresses and
 * describe the local side of every other row on the same interface.
 */
export function parseOpenbsdArp(text: string, ip: string | null, observedAt: number): ParsedDump {
  const locals = new Map<string, { ip: string; linkAddress: string }>();
  const neighbors: Array<{ ip: string; linkAddress: string; netif: string }> = [];
  let skipped = 0;

  for (const line of lines(text)) {
    if (line.includes('(incomplete)')) {
      skipped++;
      continue;
    }
    const match = OPENBSD_ROW.exec(line);
    if (!match) continue;

    const [, host, linkAddress, netif, , flags] = match;
    if ((flags ?? '').includes('l')) {
      if (!locals.has(netif)) locals.set(netif, { ip: host, linkAddress });
      continue;
    }
    if (isGroupRow(host, linkAddress)) {
      skipped++;
      continue;
    }
    neighbors.push({ ip: host, linkAddress, netif });
  }

  const records: RawObservation[] = neighbors.map(neighbor => {
    const local = locals.get(neighbor.netif);
    return {
      kind: 'arp',
      observedAt,
      localInterface: neighbor.netif,
      localIp: local?.ip ?? null,
      localLinkAddress: local?.linkAddress ?? null,
      neighborIp: neighbor.ip,
      neighborLinkAddress: neighbor.linkAddress,
    };
  });

  const firstLocal = locals.values().next();
  const sourceIp = ip ?? (firstLocal.done ? null : firstLocal.value.ip);
  return { type: 'arp', os: 'openbsd', sourceIp, records, skipped };
}
