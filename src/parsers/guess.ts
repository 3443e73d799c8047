import type { DumpOs, DumpType } from './types.js';

/**
 * Header lines that identify a dump. Every line is tried against every
 * signature in order; the first hit wins.
 */
const SIGNATURES: ReadonlyArray<{ type: DumpType; os: DumpOs; pattern: RegExp }> = [
  { type: 'arp', os: 'windows', pattern: /^Interface:\s+\S+\s+---/ },
  { type: 'arp', os: 'linux', pattern: /^Address\s+HWtype\s+HWaddress\s+Flags\s+Mask\s+Iface\s*$/ },
  { type: 'arp', os: 'openbsd', pattern: /^Host\s+Ethernet\s+Address\s+Netif\s+Expire\s+Flags\s*$/ },
  { type: 'route', os: 'linux', pattern: /^Kernel IP routing table\s*$/ },
  { type: 'route', os: 'linux', pattern: /^Destination\s+Gateway\s+Genmask\s+Flags\s+Metric\s+Ref\s+Use\s+Iface\s*$/ },
  { type: 'route', os: 'windows', pattern: /^={20,}\s*$/ },
];

export function guessDumpType(text: string): { type: DumpType; os: DumpOs } | null {
  for (const line of text.split(/\r?\n/)) {
    for (const signature of SIGNATURES) {
      if (signature.pattern.test(line)) {
        return { type: signature.type, os: signature.os };
      }
    }
  }
  return null;
}
