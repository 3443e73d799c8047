import { describe, it, expect } from 'vitest';
import { DisjointSet, compareStrings } from '../../../src/identity/disjoint-set.js';

describe('DisjointSet', () => {
  it('should start with singleton sets', () => {
    const set = new DisjointSet<string>(compareStrings);
    expect(set.add('a')).toBe(0);
    expect(set.add('a')).toBe(0);
    expect(set.add('b')).toBe(1);
    expect(set.find('a')).toBe('a');
    expect(set.groups().size).toBe(0);
  });

  it('should label each set by its smallest member whatever the union order', () => {
    const forward = new DisjointSet<string>(compareStrings);
    forward.union('d', 'c');
    forward.union('c', 'b');
    forward.union('x', 'y');

    const backward = new DisjointSet<string>(compareStrings);
    backward.union('y', 'x');
    backward.union('b', 'd');
    backward.union('d', 'c');

    for (const set of [forward, backward]) {
      expect(set.find('d')).toBe('b');
      expect(set.find('y')).toBe('x');
      const groups = [...set.groups().entries()].sort((p, q) => compareStrings(p[0], q[0]));
      expect(groups).toEqual([
        ['b', ['b', 'c', 'd']],
        ['x', ['x', 'y']],
      ]);
    }
  });

  it('should keep unrelated members apart', () => {
    const set = new DisjointSet<number>((a, b) => a - b);
    set.union(3, 1);
    set.union(1, 2);
    expect(set.find(2)).toBe(set.find(3));
    expect(set.find(4)).toBe(4);
    expect(set.find(3)).toBe(1);
  });

  it('should return the canonical label from union', () => {
    const set = new DisjointSet<string>(compareStrings);
    expect(set.union('host-b', 'host-a')).toBe('host-a');
    expect(set.union('host-c', 'host-b')).toBe('host-a');
  });
});
