import { DumpParseError } from '../core/errors.js';
import { parseIp, prefixFromNetmask } from '../model/address.js';
import type { RawObservation } from '../model/records.js';
import { isLocalOnlyDestination, lines, withCentreIp } from './common.js';
import type { ParsedDump } from './types.js';

const IPV4 = String.raw`\d{1,3}(?:\.\d{1,3}){3}`;
const LINUX_ROW = new RegExp(String.raw`^(${IPV4})\s+(${IPV4})\s+(${IPV4})\s+([A-Z!]+)\s+(\d+)\s+\S+\s+\S+\s+(\S+)\s*$`);
const WINDOWS_ROW = new RegExp(String.raw`^\s*(${IPV4})\s+(${IPV4})\s+(${IPV4}|On-link)\s+(${IPV4})\s+(\d+)\s*$`);

function toCidr(destination: string, netmask: string, line: number): string {
  const prefix = prefixFromNetmask(netmask);
  if (prefix === null) throw new DumpParseError(`Invalid netmask ${netmask}`, line);
  return `${destination}/${prefix}`;
}

// ── Linux ───────────────────────────────────────────────────────────

/**
 * `route -n`. Routes without the G flag are on-link; reject routes are
 * skipped. A supplied centre IP is put on the records when they all leave
 * through one interface.
 */
export function parseLinuxRoute(text: string, ip: string | null, observedAt: number): ParsedDump {
  const records: RawObservation[] = [];
  let skipped = 0;

  lines(text).forEach((line, index) => {
    const match = LINUX_ROW.exec(line);
    if (!match) return;

    const [, destination, gateway, genmask, flags, metric, iface] = match;
    if (flags.includes('!') || !flags.includes('U') || isLocalOnlyDestination(destination)) {
      skipped++;
      return;
    }

    records.push({
      kind: 'route',
      observedAt,
      destination: toCidr(destination, genmask, index + 1),
      gateway: flags.includes('G') ? gateway : null,
      outgoingInterface: iface,
      metric: Number(metric),
    });
  });

  return { type: 'route', os: 'linux', sourceIp: ip, records: ip === null ? records : withCentreIp(records, 'outgoingInterface', ip), skipped };
}

// ── Windows ─────────────────────────────────────────────────────────

/**
 * `route print`, IPv4 `Active Routes:` block. The interface column holds
 * the local IP, which doubles as the interface identifier.
 */
export function parseWindowsRoute(text: string, ip: string | null, observedAt: number): ParsedDump {
  const records: RawObservation[] = [];
  const localIps: string[] = [];
  let inActive = false;
  let skipped = 0;

  lines(text).forEach((line, index) => {
    if (/^\s*(IPv4 )?Active Routes:/.test(line)) {
      inActive = true;
      return;
    }
    if (/^={20,}/.test(line) || /^\s*Persistent Routes:/.test(line) || /^IPv6 Route Table/.test(line)) {
      inActive = false;
      return;
    }
    if (!inActive) return;

    const match = WINDOWS_ROW.exec(line);
    if (!match) return;

    const [, destination, netmask, gateway, iface, metric] = match;
    if (isLocalOnlyDestination(destination) || isLocalOnlyDestination(iface) || destination === iface) {
      skipped++;
      return;
    }

    if (!localIps.includes(iface)) localIps.push(iface);
    records.push({
      kind: 'route',
      observedAt,
      destination: toCidr(destination, netmask, index + 1),
      gateway: gateway === 'On-link' ? null : gateway,
      outgoingInterface: iface,
      localIp: iface,
      metric: Number(metric),
    });
  });

  const sourceIp = ip ?? localIps.find(address => parseIp(address) !== null) ?? null;
  return { type: 'route', os: 'windows', sourceIp, records, skipped };
}
