/**
 * Revision-keyed memo table. An entry is valid only for the graph revision it
 * was computed at; stale entries are replaced on the next read.
 */

type Entry<V> = {
  readonly revision: number;
  readonly value: V;
};

export class ResolutionCache<V> {
  private readonly entries = new Map<string, Entry<V>>();

  getOrCompute(key: string, revision: number, compute: () => V): V {
    const entry = this.entries.get(key);
    if (entry && entry.revision === revision) {
      return entry.value;
    }
    const value = compute();
    this.entries.set(key, { revision, value });
    return value;
  }

  get size(): number {
    return this.entries.size;
  }
}
