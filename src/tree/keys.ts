import { TypeMismatchError } from "../core/errors";

/** A key atom, or a (possibly nested) sequence of atoms. */
export type NestedKey = string | readonly NestedKey[];

export type KeyPath = readonly string[];

export type KeysOptions = {
  includeNested?: boolean;
  leavesOnly?: boolean;
};

/**
 * Flatten a nested key into its atoms. Atoms must be non-empty strings.
 */
export function unravelKey(key: NestedKey): string[] {
  const out: string[] = [];
  const walk = (k: NestedKey): void => {
    if (typeof k === "string") {
      if (k.length === 0) throw new TypeMismatchError("key atoms must be non-empty strings");
      out.push(k);
      return;
    }
    if (!Array.isArray(k)) {
      throw new TypeMismatchError(`keys are always strings, got ${typeof k}`);
    }
    for (const inner of k) walk(inner);
  };
  walk(key);
  if (out.length === 0) throw new TypeMismatchError("empty key");
  return out;
}

export function formatKey(path: KeyPath): string {
  return path.length === 1 ? `"${path[0]}"` : `(${path.map((p) => `"${p}"`).join(", ")})`;
}

/** Key reported to callers: an atom for length-1 paths, the path otherwise. */
export type ReportedKey = string | readonly string[];

function report(path: KeyPath): ReportedKey {
  return path.length === 1 ? path[0] : path;
}

function pathId(path: KeyPath): string {
  return JSON.stringify(path);
}

/**
 * Snapshot of a tree's keys for one set of options.
 */
export class KeysView implements Iterable<ReportedKey> {
  readonly includeNested: boolean;
  readonly leavesOnly: boolean;
  private readonly paths: readonly KeyPath[];
  private readonly index: ReadonlySet<string>;

  constructor(paths: readonly KeyPath[], options: KeysOptions = {}) {
    this.paths = paths;
    this.includeNested = options.includeNested ?? false;
    this.leavesOnly = options.leavesOnly ?? false;
    this.index = new Set(paths.map(pathId));
  }

  get size(): number {
    return this.paths.length;
  }

  *[Symbol.iterator](): Iterator<ReportedKey> {
    for (const path of this.paths) yield report(path);
  }

  toArray(): ReportedKey[] {
    return this.paths.map(report);
  }

  /** Full paths, atoms included as length-1 arrays. */
  toPaths(): KeyPath[] {
    return this.paths.slice();
  }

  has(key: unknown): boolean {
    if (typeof key === "string") return this.index.has(pathId([key]));
    if (Array.isArray(key)) {
      if (!this.includeNested) {
        throw new TypeMismatchError(
          "tuple membership is only supported with includeNested",
        );
      }
      const atoms: string[] = [];
      for (const atom of key) {
        if (typeof atom !== "string") {
          throw new TypeMismatchError("keys are always strings");
        }
        atoms.push(atom);
      }
      return this.index.has(pathId(atoms));
    }
    throw new TypeMismatchError("keys are always strings");
  }
}
