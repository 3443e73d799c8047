/**
 * Arena-backed disjoint-set with path compression and union by rank.
 *
 * Elements are stored once and addressed by index; the caller works in
 * terms of its own keys. Each set also tracks its smallest member under
 * `compare`, which is what callers use as the canonical label, so the label
 * does not depend on the order unions happened in.
 */
export class DisjointSet<T> {
  private parent: number[] = [];
  private rank: number[] = [];
  private least: number[] = [];
  private items: T[] = [];
  private index = new Map<T, number>();

  constructor(private readonly compare: (a: T, b: T) => number) {}

  add(item: T): number {
    const existing = this.index.get(item);
    if (existing !== undefined) return existing;

    const slot = this.items.length;
    this.items.push(item);
    this.parent.push(slot);
    this.rank.push(0);
    this.least.push(slot);
    this.index.set(item, slot);
    return slot;
  }

  /** Canonical (smallest) member of the set containing `item`. */
  find(item: T): T {
    const root = this.findSlot(this.add(item));
    return this.items[this.least[root]];
  }

  union(a: T, b: T): T {
    let rootA = this.findSlot(this.add(a));
    let rootB = this.findSlot(this.add(b));
    if (rootA !== rootB) {
      if (this.rank[rootA] < this.rank[rootB]) [rootA, rootB] = [rootB, rootA];
      this.parent[rootB] = rootA;
      if (this.rank[rootA] === this.rank[rootB]) this.rank[rootA]++;
      if (this.compare(this.items[this.least[rootB]], this.items[this.least[rootA]]) < 0) {
        this.least[rootA] = this.least[rootB];
      }
    }
    return this.items[this.least[rootA]];
  }

  /** Sets with more than one member, keyed by canonical member. */
  groups(): Map<T, T[]> {
    const all = new Map<T, T[]>();
    for (const item of this.items) {
      const label = this.find(item);
      const members = all.get(label);
      if (members) members.push(item);
      else all.set(label, [item]);
    }

    const merged = new Map<T, T[]>();
    for (const [label, members] of all) {
      if (members.length > 1) merged.set(label, members.sort(this.compare));
    }
    return merged;
  }

  private findSlot(slot: number): number {
    let root = slot;
    while (this.parent[root] !== root) root = this.parent[root];

    let current = slot;
    while (this.parent[current] !== root) {
      const next = this.parent[current];
      this.parent[current] = root;
      current = next;
    }
    return root;
  }
}

export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
