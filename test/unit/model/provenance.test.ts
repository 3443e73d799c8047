import { describe, it, expect } from 'vitest';
import { addSorted, mergeValues, noteValue, unionSorted } from '../../../src/model/provenance.js';
import { adjacencyLinkId, hostIdFor, routeLinkId, stableId } from '../../../src/model/ids.js';

describe('provenance lists', () => {
  it('should keep id lists sorted and unique', () => {
    expect(unionSorted(['b', 'a'], ['c', 'a'])).toEqual(['a', 'b', 'c']);
    expect(addSorted(['a', 'c'], 'b')).toEqual(['a', 'b', 'c']);
    expect(addSorted(['a'], 'a')).toEqual(['a']);
  });

  it('should widen the seen window when a value is noted again', () => {
    let names = noteValue([], 'eth0', 'obs-2', 200);
    names = noteValue(names, 'eth0', 'obs-1', 100);
    names = noteValue(names, 'br0', 'obs-3', 300);

    expect(names).toEqual([
      { value: 'br0', firstSeen: 300, lastSeen: 300, observationIds: ['obs-3'] },
      { value: 'eth0', firstSeen: 100, lastSeen: 200, observationIds: ['obs-1', 'obs-2'] },
    ]);
  });

  it('should merge the same lists to the same result in either order', () => {
    const a = noteValue([], 'x', 'obs-a', 5);
    const b = noteValue(noteValue([], 'x', 'obs-b', 9), 'y', 'obs-c', 1);
    expect(mergeValues(a, b)).toEqual(mergeValues(b, a));
  });
});

describe('stable ids', () => {
  it('should derive prefixed 16-hex ids deterministically', () => {
    expect(stableId('obs', 'a', 'b')).toMatch(/^obs-[0-9a-f]{16}$/);
    expect(stableId('obs', 'a', 'b')).toBe(stableId('obs', 'a', 'b'));
    expect(stableId('obs', 'ab', '')).not.toBe(stableId('obs', 'a', 'b'));
    expect(hostIdFor('src:r1')).toMatch(/^host-/);
  });

  it('should name an adjacency the same from either end', () => {
    expect(adjacencyLinkId('if-1', 'if-2')).toBe(adjacencyLinkId('if-2', 'if-1'));
  });

  it('should tell on-link routes from gatewayed ones', () => {
    expect(routeLinkId('if-1', '10.0.0.0/8', null)).not.toBe(routeLinkId('if-1', '10.0.0.0/8', '10.0.0.1'));
  });
});
