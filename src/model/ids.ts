import { createHash } from 'node:crypto';

/**
 * Entity ids are content hashes of raw identifiers: the same evidence
 * always names the same entity, whichever batch or process sees it first.
 */
export function stableId(prefix: string, ...parts: string[]): string {
  const digest = createHash('sha256').update(parts.join('\u0000')).digest('hex');
  return `${prefix}-${digest.slice(0, 16)}`;
}

export function linkInterfaceKey(linkAddress: string): string {
  return `mac:${linkAddress}`;
}

export function localInterfaceKey(sourceHostId: string, name: string): string {
  return `local:${sourceHostId}:${name}`;
}

export function sourceHostSeed(sourceHostId: string): string {
  return `src:${sourceHostId}`;
}

export function linkHostSeed(linkAddress: string): string {
  return `mac:${linkAddress}`;
}

export function interfaceIdFor(key: string): string {
  return stableId('if', key);
}

export function hostIdFor(seed: string): string {
  return stableId('host', seed);
}

export function adjacencyLinkId(a: string, b: string): string {
  const [low, high] = a < b ? [a, b] : [b, a];
  return stableId('link', 'adjacency', low, high);
}

export function routeLinkId(fromInterfaceId: string, destination: string, gateway: string | null): string {
  return stableId('link', 'route', fromInterfaceId, destination, gateway ?? 'on-link');
}

export function placeholderIdFor(gatewayIp: string): string {
  return `unresolved:${gatewayIp}`;
}
