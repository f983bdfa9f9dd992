/**
 * Per-instance memo of enumeration results.
 *
 * Entries are only stored while the owning tree is locked and are dropped on
 * unlock, so a non-empty cache implies the owner is locked.
 */

class MemoTable<T> {
  private readonly entries = new Map<string, T>();

  lookup(key: string, enabled: boolean, compute: () => T): T {
    if (!enabled) return compute();
    const hit = this.entries.get(key);
    if (hit !== undefined) return hit;
    const value = compute();
    this.entries.set(key, value);
    return value;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}

export class EnumerationCache<TKeys, TValues, TItems, TTree> {
  readonly keys = new MemoTable<TKeys>();
  readonly values = new MemoTable<TValues>();
  readonly items = new MemoTable<TItems>();
  readonly sortedKeys = new MemoTable<readonly string[]>();
  readonly trees = new MemoTable<TTree>();

  private tables(): MemoTable<unknown>[] {
    return [this.keys, this.values, this.items, this.sortedKeys, this.trees];
  }

  clear(): void {
    for (const table of this.tables()) table.clear();
  }

  get size(): number {
    return this.tables().reduce((acc, table) => acc + table.size, 0);
  }

  /** Cache keys currently held, e.g. "keys:nested=1:leaves=0". */
  entryKeys(): string[] {
    return this.tables().flatMap((table) => table.keys());
  }
}

export function enumerationKey(op: string, includeNested: boolean, leavesOnly: boolean): string {
  return `${op}:nested=${includeNested ? 1 : 0}:leaves=${leavesOnly ? 1 : 0}`;
}
