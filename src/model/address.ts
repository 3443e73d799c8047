/**
 * Address canonicalization.
 *
 * IP literals parse into their binary form and print back as one canonical
 * text (dotted quad, RFC 5952 for IPv6) that the rest of the engine uses as
 * a key. Link addresses collapse to 12 lowercase hex digits.
 */

export type IpFamily = 4 | 6;

export interface IpAddress {
  readonly family: IpFamily;
  readonly bytes: Uint8Array;
  readonly text: string;
}

export interface Cidr {
  readonly address: IpAddress;
  readonly prefixLength: number;
  readonly text: string;
}

export type CidrParseResult =
  | { ok: true; cidr: Cidr }
  | { ok: false; reason: 'invalid-address' | 'cidr-host-bits' };

const IPV4_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;
const IPV6_GROUP = /^[0-9a-f]{1,4}$/i;

// ── IP literals ─────────────────────────────────────────────────────

function parseIpv4Bytes(input: string): Uint8Array | null {
  const match = IPV4_PATTERN.exec(input);
  if (!match) return null;

  const bytes = new Uint8Array(4);
  for (let i = 0; i < 4; i++) {
    const part = match[i + 1];
    // Leading zeros read as octal on some stacks; refuse the ambiguity.
    if (part.length > 1 && part.startsWith('0')) return null;
    const value = Number(part);
    if (value > 255) return null;
    bytes[i] = value;
  }
  return bytes;
}

function parseIpv6Words(parts: string[], allowEmbeddedIpv4: boolean): number[] | null {
  const words: number[] = [];
  for (let i = 0; i < parts.length; i++) {
    const part = parts[i];
    if (allowEmbeddedIpv4 && i === parts.length - 1 && part.includes('.')) {
      const v4 = parseIpv4Bytes(part);
      if (!v4) return null;
      words.push((v4[0] << 8) | v4[1], (v4[2] << 8) | v4[3]);
      continue;
    }
    if (!IPV6_GROUP.test(part)) return null;
    words.push(parseInt(part, 16));
  }
  return words;
}

function parseIpv6Bytes(input: string): Uint8Array | null {
  if (input.includes('%')) return null;

  const gap = input.indexOf('::');
  if (gap !== -1 && input.indexOf('::', gap + 1) !== -1) return null;

  let words: number[];
  if (gap === -1) {
    const all = parseIpv6Words(input.split(':'), true);
    if (!all || all.length !== 8) return null;
    words = all;
  } else {
    const headText = input.slice(0, gap);
    const tailText = input.slice(gap + 2);
    const head = parseIpv6Words(headText === '' ? [] : headText.split(':'), false);
    const tail = parseIpv6Words(tailText === '' ? [] : tailText.split(':'), true);
    if (!head || !tail || head.length + tail.length > 7) return null;
    words = [...head, ...new Array<number>(8 - head.length - tail.length).fill(0), ...tail];
  }

  const bytes = new Uint8Array(16);
  words.forEach((word, i) => {
    bytes[i * 2] = word >> 8;
    bytes[i * 2 + 1] = word & 0xff;
  });
  return bytes;
}

function isIpv4Mapped(bytes: Uint8Array): boolean {
  for (let i = 0; i < 10; i++) {
    if (bytes[i] !== 0) return false;
  }
  return bytes[10] === 0xff && bytes[11] === 0xff;
}

function formatIpv6(bytes: Uint8Array): string {
  const words: number[] = [];
  for (let i = 0; i < 16; i += 2) {
    words.push((bytes[i] << 8) | bytes[i + 1]);
  }

  let bestStart = -1;
  let bestLength = 0;
  for (let i = 0; i < 8; ) {
    if (words[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < 8 && words[j] === 0) j++;
    if (j - i > bestLength) {
      bestStart = i;
      bestLength = j - i;
    }
    i = j;
  }

  const hex = (word: number): string => word.toString(16);
  if (bestLength < 2) return words.map(hex).join(':');

  const head = words.slice(0, bestStart).map(hex).join(':');
  const tail = words.slice(bestStart + bestLength).map(hex).join(':');
  return `${head}::${tail}`;
}

function makeIpv4(bytes: Uint8Array): IpAddress {
  return { family: 4, bytes, text: Array.from(bytes).join('.') };
}

/**
 * Parse an IPv4 or IPv6 literal. IPv4-mapped IPv6 addresses fold to IPv4;
 * zone ids are refused. Returns null for anything malformed.
 */
export function parseIp(input: string): IpAddress | null {
  const text = input.trim();
  if (text === '') return null;

  if (!text.includes(':')) {
    const v4 = parseIpv4Bytes(text);
    return v4 ? makeIpv4(v4) : null;
  }

  const v6 = parseIpv6Bytes(text);
  if (!v6) return null;
  if (isIpv4Mapped(v6)) return makeIpv4(v6.slice(12));
  return { family: 6, bytes: v6, text: formatIpv6(v6) };
}

export function isUnspecified(ip: IpAddress): boolean {
  return ip.bytes.every(b => b === 0);
}

/**
 * True for addresses a single neighbor can hold: not unspecified, loopback,
 * multicast, limited broadcast or (IPv4) class E.
 */
export function isUnicast(ip: IpAddress): boolean {
  if (isUnspecified(ip)) return false;

  if (ip.family === 4) {
    const first = ip.bytes[0];
    return first !== 127 && first < 224;
  }

  if (ip.bytes[0] === 0xff) return false;
  const loopback = ip.bytes.every((b, i) => (i === 15 ? b === 1 : b === 0));
  return !loopback;
}

// ── CIDR ────────────────────────────────────────────────────────────

function hasHostBits(bytes: Uint8Array, prefixLength: number): boolean {
  for (let bit = prefixLength; bit < bytes.length * 8; bit++) {
    if (bytes[bit >> 3] & (0x80 >> (bit & 7))) return true;
  }
  return false;
}

/**
 * Parse `address/prefix`. A bare address is a host route. Host bits set
 * beyond the prefix are an error, not silently masked.
 */
export function parseCidr(input: string): CidrParseResult {
  const parts = input.trim().split('/');
  if (parts.length > 2) return { ok: false, reason: 'invalid-address' };

  const address = parseIp(parts[0]);
  if (!address) return { ok: false, reason: 'invalid-address' };

  const maxPrefix = address.family === 4 ? 32 : 128;
  let prefixLength = maxPrefix;
  if (parts.length === 2) {
    if (!/^\d{1,3}$/.test(parts[1])) return { ok: false, reason: 'invalid-address' };
    prefixLength = Number(parts[1]);
    // A mapped IPv6 prefix folds with its address.
    if (address.family === 4 && parts[0].includes(':')) prefixLength -= 96;
    if (prefixLength < 0 || prefixLength > maxPrefix) return { ok: false, reason: 'invalid-address' };
  }

  if (hasHostBits(address.bytes, prefixLength)) return { ok: false, reason: 'cidr-host-bits' };

  return {
    ok: true,
    cidr: { address, prefixLength, text: `${address.text}/${prefixLength}` },
  };
}

/** Convert a dotted netmask (`255.255.255.0`) to a prefix length. */
export function prefixFromNetmask(mask: string): number | null {
  const bytes = parseIpv4Bytes(mask.trim());
  if (!bytes) return null;

  let prefix = 0;
  while (prefix < 32 && bytes[prefix >> 3] & (0x80 >> (prefix & 7))) prefix++;
  return hasHostBits(bytes, prefix) ? null : prefix;
}

// ── Link addresses ──────────────────────────────────────────────────

const SEPARATED_LINK = /^([0-9a-f]{1,2})([:-])([0-9a-f]{1,2})\2([0-9a-f]{1,2})\2([0-9a-f]{1,2})\2([0-9a-f]{1,2})\2([0-9a-f]{1,2})$/;
const DOTTED_LINK = /^[0-9a-f]{4}\.[0-9a-f]{4}\.[0-9a-f]{4}$/;
const BARE_LINK = /^[0-9a-f]{12}$/;

/**
 * Canonicalize a 48-bit link address to 12 lowercase hex digits. Accepts
 * colon or hyphen separated octets (one or two digits each), Cisco dotted
 * form and bare hex. The all-zero address marks an incomplete ARP entry and
 * is refused.
 */
export function canonicalLinkAddress(input: string): string | null {
  const text = input.trim().toLowerCase();

  let hex: string | null = null;
  const separated = SEPARATED_LINK.exec(text);
  if (separated) {
    hex = [1, 3, 4, 5, 6, 7].map(i => separated[i].padStart(2, '0')).join('');
  } else if (DOTTED_LINK.test(text)) {
    hex = text.replace(/\./g, '');
  } else if (BARE_LINK.test(text)) {
    hex = text;
  }

  if (hex === null || /^0{12}$/.test(hex)) return null;
  return hex;
}

/** Multicast and broadcast link addresses have the group bit set. */
export function isGroupLinkAddress(hex: string): boolean {
  return (parseInt(hex.slice(0, 2), 16) & 1) === 1;
}

export function formatLinkAddress(hex: string): string {
  return hex.match(/../g)?.join(':') ?? hex;
}
