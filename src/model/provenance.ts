import type { ProvenancedValue } from './graph.js';

/** Sorted union of two id lists. */
export function unionSorted(a: readonly string[], b: readonly string[]): string[] {
  return [...new Set([...a, ...b])].sort();
}

export function addSorted(list: readonly string[], value: string): string[] {
  return list.includes(value) ? [...list] : [...list, value].sort();
}

/**
 * Record one sighting of `value` by `observationId` at `observedAt`. Returns
 * a new list; the input is left untouched.
 */
export function noteValue(
  list: readonly ProvenancedValue[],
  value: string,
  observationId: string,
  observedAt: number,
): ProvenancedValue[] {
  return mergeValues(list, [
    { value, firstSeen: observedAt, lastSeen: observedAt, observationIds: [observationId] },
  ]);
}

/** Union two provenance-tagged value lists, keyed by value. */
export function mergeValues(
  a: readonly ProvenancedValue[],
  b: readonly ProvenancedValue[],
): ProvenancedValue[] {
  const byValue = new Map<string, ProvenancedValue>();
  for (const entry of [...a, ...b]) {
    const existing = byValue.get(entry.value);
    if (!existing) {
      byValue.set(entry.value, { ...entry, observationIds: [...entry.observationIds].sort() });
      continue;
    }
    byValue.set(entry.value, {
      value: entry.value,
      firstSeen: Math.min(existing.firstSeen, entry.firstSeen),
      lastSeen: Math.max(existing.lastSeen, entry.lastSeen),
      observationIds: unionSorted(existing.observationIds, entry.observationIds),
    });
  }
  return [...byValue.values()].sort((x, y) => (x.value < y.value ? -1 : x.value > y.value ? 1 : 0));
}

export function findValue(list: readonly ProvenancedValue[], value: string): ProvenancedValue | undefined {
  return list.find(entry => entry.value === value);
}
