import {
  InvalidIndexError,
  KeyCollisionError,
  KeyMissingError,
  LOCK_ERROR,
  LockedMutationError,
  ShapeMismatchError,
  TypeMismatchError,
  UnsupportedOnProxyError,
} from "../core/errors";
import {
  formatShape,
  inferViewShape,
  isPrefix,
  normalizeDim,
  shapesEqual,
  sizeOf,
} from "../core/shape";
import { type CreateOptions, type NestedInput, tensor, zeros, zerosLike } from "../tensor/creation";
import { type DeviceId, parseDevice } from "../tensor/device";
import { isTypedArray, type TypedArray } from "../tensor/dtype";
import {
  expandEllipsis,
  type IndexExpr,
  type IndexItem,
  indexedShape,
  slice,
} from "../tensor/indexing";
import { type CastOptions, Tensor } from "../tensor/tensor";
import { EnumerationCache, enumerationKey } from "./cache";
import { IndexedTree, makeView, SubTree, TensorTree } from "./internal";
import { alignToShape, type DimNames, validateInsert, writeInto } from "./invariants";
import {
  formatKey,
  type KeyPath,
  type KeysOptions,
  KeysView,
  type NestedKey,
  type ReportedKey,
  unravelKey,
} from "./keys";
import { getNextTreeId, type LockGraphMember, lockGraph, type LockState } from "./lock-graph";
import {
  indexNames,
  indexTransform,
  permuteTransform,
  type ViewTransform,
  viewTransform,
} from "./transforms";

export type TreeValue = Tensor | TensorTreeBase;

export interface TreeObject {
  readonly [key: string]: TreeInput;
}

/** Anything `set` accepts: leaves, trees, raw numbers/arrays, or nested objects. */
export type TreeInput =
  | TreeValue
  | NestedInput
  | TypedArray
  | TreeObject
  | ReadonlyMap<string, TreeInput>;

export type NestedKeyInputPair = readonly [NestedKey, TreeInput];

export type TreeSource = TreeObject | ReadonlyMap<string, TreeInput> | readonly NestedKeyInputPair[];

export type TreeOptions = {
  batchSize?: readonly number[];
  device?: DeviceId | null;
  names?: readonly (string | null)[];
};

export type SetOptions = { inplace?: boolean };

export type TreeCastOptions = CastOptions & { batchSize?: readonly number[] };

export type MemmapOptions = { prefix?: string; copyExisting?: boolean };

export type PlainObject = { [key: string]: Tensor | PlainObject };

type Items = readonly (readonly [ReportedKey, TreeValue])[];

export const UNLOCK_ERROR =
  "Cannot unlock a tensortree that is part of a locked graph. Unlock the root tensortree first.";

function isNestedArray(value: TreeInput): value is readonly NestedInput[] {
  return Array.isArray(value);
}

export function isReadonlyMap(value: unknown): value is ReadonlyMap<string, TreeInput> {
  return value instanceof Map;
}

/**
 * Shared surface of every tree variant.
 *
 * Subclasses provide storage through a handful of atom-level hooks
 * (`getAtom`, `_setAtom`, `_delAtom`, `_writeLeaf`); everything that walks
 * key paths, enumerates, reshapes the batch or compares lives here.
 */
export abstract class TensorTreeBase implements LockGraphMember, Iterable<TensorTreeBase> {
  readonly id = getNextTreeId();
  private disposed = false;
  protected readonly cache = new EnumerationCache<
    KeysView,
    readonly TreeValue[],
    Items,
    TensorTreeBase
  >();

  abstract get batchSize(): number[];
  abstract set batchSize(size: readonly number[]);
  abstract get device(): DeviceId | null;
  abstract get names(): DimNames;
  abstract set names(names: readonly (string | null)[]);

  abstract readonly lockState: LockState | null;
  abstract lockChildren(): readonly LockGraphMember[];
  abstract get isLocked(): boolean;
  /** Ids of the live ancestors holding this tree locked. */
  abstract get lockOwners(): ReadonlySet<number>;
  abstract lock_(): this;
  abstract unlock_(): this;

  /** Top-level keys in insertion order. */
  abstract atoms(): string[];
  abstract getAtom(key: string): TreeValue | undefined;
  /** @internal */
  abstract _isLeafAtom(key: string): boolean;
  /** @internal Insert or replace one top-level entry. */
  abstract _setAtom(key: string, value: TreeValue, inplace: boolean): void;
  /** @internal */
  abstract _delAtom(key: string): void;

  abstract memmap_(options?: MemmapOptions): this;
  abstract isMemmap(): boolean;
  /** True for the proxy variants, whose batch size is derived. */
  abstract get isLazy(): boolean;

  get isDisposed(): boolean {
    return this.disposed;
  }

  get ndim(): number {
    return this.batchSize.length;
  }

  get shape(): number[] {
    return this.batchSize;
  }

  numel(): number {
    return sizeOf(this.batchSize);
  }

  // ---------------------------------------------------------------------------
  // Leaf writes
  // ---------------------------------------------------------------------------

  /**
   * @internal Copy `value` into the leaf at `key`, or into `leaf[index]`.
   * Proxies override this to route the write to their source storage.
   */
  _writeLeaf(key: string, value: Tensor | number, index: IndexExpr | null): void {
    const leaf = this.getAtom(key);
    if (!(leaf instanceof Tensor)) {
      throw new TypeMismatchError(`entry "${key}" is a tensortree, not a leaf`);
    }
    writeInto(leaf, value, index);
  }

  /** @internal Swap the whole entry map; only plain trees support this. */
  _replaceEntries(_entries: ReadonlyMap<string, TreeValue>, op: string): void {
    throw new UnsupportedOnProxyError(
      `in-place ${op} is only supported on TensorTree, not on ${this.constructor.name}`,
    );
  }

  // ---------------------------------------------------------------------------
  // Locking
  // ---------------------------------------------------------------------------

  /** @internal Throws while locked; drops memoized enumerations otherwise. */
  assertMutable(): void {
    if (this.isLocked) throw new LockedMutationError(LOCK_ERROR);
    this.cache.clear();
  }

  clearCache(): void {
    this.cache.clear();
  }

  /** Entries are memoized only while this instance holds a lock of its own. */
  protected cacheEnabled(): boolean {
    const state = this.lockState;
    const enabled =
      state !== null && !this.disposed && (state.explicit || state.hasLiveOwners());
    if (!enabled && this.cache.size > 0) this.cache.clear();
    return enabled;
  }

  get cacheSize(): number {
    this.cacheEnabled();
    return this.cache.size;
  }

  /** Memo keys currently held, e.g. "keys:nested=1:leaves=0". */
  cacheEntries(): string[] {
    this.cacheEnabled();
    return this.cache.entryKeys();
  }

  withLock<T>(fn: (tree: this) => T): T {
    const wasLocked = this.isLocked;
    if (!wasLocked) this.lock_();
    try {
      return fn(this);
    } finally {
      if (!wasLocked) this.unlock_();
    }
  }

  withUnlocked<T>(fn: (tree: this) => T): T {
    const wasLocked = this.isLocked;
    if (wasLocked) this.unlock_();
    try {
      return fn(this);
    } finally {
      if (wasLocked) this.lock_();
    }
  }

  /** Release this tree's lock contributions now rather than at collection. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    lockGraph.dispose(this);
    this.cache.clear();
  }

  // ---------------------------------------------------------------------------
  // Key paths
  // ---------------------------------------------------------------------------

  /**
   * @internal Convert raw input into a leaf or a tree. Nested objects get
   * `batchSize`, or infer their own when it is null.
   */
  convertInput(value: TreeInput, batchSize: readonly number[] | null = this.batchSize): TreeValue {
    if (value instanceof Tensor || value instanceof TensorTreeBase) return value;
    const options: CreateOptions = this.device === null ? {} : { device: this.device };
    if (typeof value === "number" || typeof value === "boolean" || isNestedArray(value)) {
      return tensor(value, options);
    }
    if (isTypedArray(value)) return tensor(value, options);
    return new TensorTree(value, {
      batchSize: batchSize === null ? undefined : batchSize,
      device: this.device,
    });
  }

  private lookup(path: KeyPath): TreeValue | undefined {
    let node: TensorTreeBase = this;
    for (const atom of path.slice(0, -1)) {
      const next = node.getAtom(atom);
      if (next === undefined || next instanceof Tensor) return undefined;
      node = next;
    }
    return node.getAtom(path[path.length - 1]);
  }

  private missing(path: KeyPath): KeyMissingError {
    const keys = this.sortedKeys.map((k) => `"${k}"`).join(", ");
    return new KeyMissingError(`key ${formatKey(path)} not found in tensortree with keys [${keys}]`);
  }

  /**
   * The tree holding the last atom of `path`. With `create`, missing
   * intermediate trees are added with the parent's batch size and device.
   */
  private parentOf(path: KeyPath, create: boolean): TensorTreeBase {
    let node: TensorTreeBase = this;
    path.slice(0, -1).forEach((atom, depth) => {
      let next = node.getAtom(atom);
      if (next === undefined && create) {
        node._setAtom(atom, new TensorTree({}, { batchSize: node.batchSize, device: node.device }), false);
        next = node.getAtom(atom);
      }
      if (next === undefined) throw this.missing(path);
      if (next instanceof Tensor) {
        throw new KeyCollisionError(
          `cannot reach ${formatKey(path)}: ${formatKey(path.slice(0, depth + 1))} is a leaf`,
        );
      }
      node = next;
    });
    return node;
  }

  /** The first intermediate tree `parentOf(path, true)` would add, if any. */
  private firstMissing(path: KeyPath): { node: TensorTreeBase; atom: string } | null {
    let node: TensorTreeBase = this;
    for (const atom of path.slice(0, -1)) {
      const next = node.getAtom(atom);
      if (next === undefined) return { node, atom };
      if (next instanceof Tensor) return null;
      node = next;
    }
    return null;
  }

  get(key: NestedKey): TreeValue;
  get<D>(key: NestedKey, defaultValue: D): TreeValue | D;
  get<D>(key: NestedKey, ...fallback: D[]): TreeValue | D {
    const path = unravelKey(key);
    const value = this.lookup(path);
    if (value !== undefined) return value;
    if (fallback.length > 0) return fallback[0];
    throw this.missing(path);
  }

  getLeaf(key: NestedKey): Tensor {
    const value = this.get(key);
    if (!(value instanceof Tensor)) {
      throw new TypeMismatchError(`entry ${formatKey(unravelKey(key))} is a tensortree, not a leaf`);
    }
    return value;
  }

  getTree(key: NestedKey): TensorTreeBase {
    const value = this.get(key);
    if (value instanceof Tensor) {
      throw new TypeMismatchError(`entry ${formatKey(unravelKey(key))} is a leaf, not a tensortree`);
    }
    return value;
  }

  has(key: NestedKey): boolean {
    return this.lookup(unravelKey(key)) !== undefined;
  }

  set(key: NestedKey, value: TreeInput, options: SetOptions = {}): this {
    const path = unravelKey(key);
    const created = this.firstMissing(path);
    const parent = this.parentOf(path, true);
    try {
      parent._setAtom(path[path.length - 1], parent.convertInput(value), options.inplace ?? false);
    } catch (err) {
      // intermediates added for this call go away with it
      if (created !== null) created.node._delAtom(created.atom);
      throw err;
    }
    return this;
  }

  /** Copy into an existing entry. Permitted while locked. */
  set_(key: NestedKey, value: TreeInput): this {
    const path = unravelKey(key);
    const parent = this.parentOf(path, false);
    const atom = path[path.length - 1];
    const existing = parent.getAtom(atom);
    if (existing === undefined) throw parent.missing([atom]);
    if (typeof value === "number") {
      if (existing instanceof Tensor) {
        parent._writeLeaf(atom, value, null);
      } else {
        existing.fill_(value);
      }
      return this;
    }
    const converted = parent.convertInput(value);
    if (existing instanceof Tensor) {
      if (!(converted instanceof Tensor)) {
        throw new TypeMismatchError(`cannot copy a tensortree into the leaf at ${formatKey(path)}`);
      }
      parent._writeLeaf(atom, converted, null);
    } else {
      if (converted instanceof Tensor) {
        throw new TypeMismatchError(`cannot copy a leaf into the tensortree at ${formatKey(path)}`);
      }
      existing.update_(converted);
    }
    return this;
  }

  /** Copy `value` into `leaf[index]`. */
  setAt_(key: NestedKey, value: Tensor | NestedInput, index: IndexExpr): this {
    const path = unravelKey(key);
    const parent = this.parentOf(path, false);
    const atom = path[path.length - 1];
    if (parent.getAtom(atom) === undefined) throw parent.missing([atom]);
    const converted = value instanceof Tensor || typeof value === "number" ? value : tensor(value);
    parent._writeLeaf(atom, converted, index);
    return this;
  }

  del(key: NestedKey): this {
    const path = unravelKey(key);
    const parent = this.parentOf(path, false);
    const atom = path[path.length - 1];
    if (parent.getAtom(atom) === undefined) throw parent.missing([atom]);
    parent._delAtom(atom);
    return this;
  }

  pop(key: NestedKey): TreeValue;
  pop<D>(key: NestedKey, defaultValue: D): TreeValue | D;
  pop<D>(key: NestedKey, ...fallback: D[]): TreeValue | D {
    const path = unravelKey(key);
    const value = this.lookup(path);
    if (value === undefined) {
      if (fallback.length > 0) return fallback[0];
      throw this.missing(path);
    }
    this.del(path);
    return value;
  }

  setDefault(key: NestedKey, value: TreeInput): TreeValue {
    if (!this.has(key)) this.set(key, value);
    return this.get(key);
  }

  renameKey(oldKey: NestedKey, newKey: NestedKey, options: { safe?: boolean } = {}): this {
    const value = this.get(oldKey);
    if ((options.safe ?? true) && this.has(newKey)) {
      throw new KeyCollisionError(
        `key ${formatKey(unravelKey(newKey))} already present in tensortree`,
      );
    }
    this.assertMutable();
    this.del(oldKey);
    this.set(newKey, value);
    return this;
  }

  // ---------------------------------------------------------------------------
  // Enumeration
  // ---------------------------------------------------------------------------

  private collectPaths(nested: boolean, leavesOnly: boolean, prefix: KeyPath): KeyPath[] {
    const out: KeyPath[] = [];
    for (const atom of this.atoms()) {
      const path = [...prefix, atom];
      if (this._isLeafAtom(atom)) {
        out.push(path);
        continue;
      }
      if (!leavesOnly) out.push(path);
      if (nested) {
        const child = this.getAtom(atom);
        if (child instanceof TensorTreeBase) out.push(...child.collectPaths(true, leavesOnly, path));
      }
    }
    return out;
  }

  keys(options: KeysOptions = {}): KeysView {
    const nested = options.includeNested ?? false;
    const leavesOnly = options.leavesOnly ?? false;
    return this.cache.keys.lookup(
      enumerationKey("keys", nested, leavesOnly),
      this.cacheEnabled(),
      () => new KeysView(this.collectPaths(nested, leavesOnly, []), options),
    );
  }

  items(options: KeysOptions = {}): Items {
    return this.cache.items.lookup(
      enumerationKey("items", options.includeNested ?? false, options.leavesOnly ?? false),
      this.cacheEnabled(),
      () => this.keys(options).toPaths().map((path) => [path.length === 1 ? path[0] : path, this.get(path)] as const),
    );
  }

  values(options: KeysOptions = {}): readonly TreeValue[] {
    return this.cache.values.lookup(
      enumerationKey("values", options.includeNested ?? false, options.leavesOnly ?? false),
      this.cacheEnabled(),
      () => this.items(options).map(([, value]) => value),
    );
  }

  get sortedKeys(): readonly string[] {
    return this.cache.sortedKeys.lookup("sortedKeys", this.cacheEnabled(), () =>
      this.atoms().slice().sort(),
    );
  }

  /** A fresh, empty plain tree with this tree's batch size, device and names. */
  protected emptyLike(): TensorTree {
    return new TensorTree({}, { batchSize: this.batchSize, device: this.device, names: this.names });
  }

  private flattenedEntries(separator: string): Map<string, TreeValue> {
    const out = new Map<string, TreeValue>();
    const walk = (tree: TensorTreeBase, prefix: string): void => {
      for (const atom of tree.atoms()) {
        const name = prefix.length > 0 ? `${prefix}${separator}${atom}` : atom;
        const value = tree.getAtom(atom);
        if (value === undefined) continue;
        if (value instanceof TensorTreeBase && value.atoms().length > 0) {
          walk(value, name);
          continue;
        }
        if (out.has(name)) {
          throw new KeyCollisionError(
            `Flattening keys in tensortree collides with existing key '${name}'`,
          );
        }
        out.set(name, value);
      }
    };
    walk(this, "");
    return out;
  }

  flattenKeys(separator = ".", options: { inplace?: boolean } = {}): TensorTreeBase {
    if (options.inplace) {
      const entries = this.flattenedEntries(separator);
      this.assertMutable();
      this._replaceEntries(entries, "flattenKeys");
      return this;
    }
    return this.cache.trees.lookup(`flatten:${separator}`, this.cacheEnabled(), () => {
      const out = this.emptyLike();
      for (const [name, value] of this.flattenedEntries(separator)) out._setAtom(name, value, false);
      if (this.isLocked) out.lock_();
      return out;
    });
  }

  private unflattenedTree(separator: string): TensorTree {
    const out = this.emptyLike();
    const insert = (target: TensorTreeBase, path: KeyPath, value: TreeValue): void => {
      const collision = (): KeyCollisionError =>
        new KeyCollisionError(
          `Unflattening key(s) in tensortree will override existing unflattened key ${formatKey(path)}`,
        );
      let node = target;
      for (const atom of path.slice(0, -1)) {
        let next = node.getAtom(atom);
        if (next === undefined) {
          node._setAtom(atom, new TensorTree({}, { batchSize: node.batchSize, device: node.device }), false);
          next = node.getAtom(atom);
        }
        if (!(next instanceof TensorTreeBase)) throw collision();
        node = next;
      }
      const last = path[path.length - 1];
      const existing = node.getAtom(last);
      if (existing === undefined) {
        node._setAtom(last, value, false);
      } else if (existing instanceof TensorTreeBase && value instanceof TensorTreeBase) {
        for (const atom of value.atoms()) {
          const inner = value.getAtom(atom);
          if (inner !== undefined) insert(existing, [atom], inner);
        }
      } else {
        throw collision();
      }
    };
    for (const atom of this.atoms()) {
      let value = this.getAtom(atom);
      if (value === undefined) continue;
      if (value instanceof TensorTreeBase) value = value.unflattenedTree(separator);
      insert(out, unravelKey(atom.split(separator)), value);
    }
    return out;
  }

  unflattenKeys(separator = ".", options: { inplace?: boolean } = {}): TensorTreeBase {
    if (options.inplace) {
      const out = this.unflattenedTree(separator);
      this.assertMutable();
      this._replaceEntries(new Map(out.atoms().map((atom) => [atom, out.get(atom)])), "unflattenKeys");
      return this;
    }
    return this.cache.trees.lookup(`unflatten:${separator}`, this.cacheEnabled(), () => {
      const out = this.unflattenedTree(separator);
      if (this.isLocked) out.lock_();
      return out;
    });
  }

  private groupPaths(keys: readonly NestedKey[]): Map<string, KeyPath[]> {
    const groups = new Map<string, KeyPath[]>();
    for (const key of keys) {
      const [head, ...rest] = unravelKey(key);
      const group = groups.get(head) ?? [];
      group.push(rest);
      groups.set(head, group);
    }
    return groups;
  }

  private selectPaths(keys: readonly NestedKey[], strict: boolean): TensorTree {
    const out = this.emptyLike();
    for (const [atom, rests] of this.groupPaths(keys)) {
      const value = this.getAtom(atom);
      if (value === undefined || (value instanceof Tensor && rests.every((r) => r.length > 0))) {
        if (strict) throw this.missing([atom, ...(rests.find((r) => r.length > 0) ?? [])]);
        continue;
      }
      if (value instanceof Tensor || rests.some((r) => r.length === 0)) {
        out._setAtom(atom, value, false);
      } else {
        out._setAtom(atom, value.selectPaths(rests, strict), false);
      }
    }
    return out;
  }

  select(keys: readonly NestedKey[], options: { strict?: boolean; inplace?: boolean } = {}): TensorTreeBase {
    const out = this.selectPaths(keys, options.strict ?? true);
    if (!options.inplace) return out;
    this.assertMutable();
    this._replaceEntries(new Map(out.atoms().map((atom) => [atom, out.get(atom)])), "select");
    return this;
  }

  private excludePaths(keys: readonly NestedKey[]): TensorTree {
    const out = this.emptyLike();
    const groups = this.groupPaths(keys);
    for (const atom of this.atoms()) {
      const value = this.getAtom(atom);
      if (value === undefined) continue;
      const rests = groups.get(atom);
      if (rests === undefined || value instanceof Tensor) {
        if (rests === undefined || rests.every((r) => r.length > 0)) out._setAtom(atom, value, false);
        continue;
      }
      if (rests.some((r) => r.length === 0)) continue;
      out._setAtom(atom, value.excludePaths(rests), false);
    }
    return out;
  }

  exclude(keys: readonly NestedKey[], options: { inplace?: boolean } = {}): TensorTreeBase {
    const out = this.excludePaths(keys);
    if (!options.inplace) return out;
    this.assertMutable();
    this._replaceEntries(new Map(out.atoms().map((atom) => [atom, out.get(atom)])), "exclude");
    return this;
  }

  // ---------------------------------------------------------------------------
  // In-place numeric writes
  // ---------------------------------------------------------------------------

  /** Fill one entry, or every leaf of a nested entry. */
  fill_(key: NestedKey, value: number): this;
  fill_(value: number): this;
  fill_(...args: [NestedKey, number] | [number]): this {
    if (args.length === 1) {
      for (const atom of this.atoms()) {
        const entry = this.getAtom(atom);
        if (entry instanceof Tensor) this._writeLeaf(atom, args[0], null);
        else entry?.fill_(args[0]);
      }
      return this;
    }
    const [key, value] = args;
    const path = unravelKey(key);
    const parent = this.parentOf(path, false);
    const atom = path[path.length - 1];
    const entry = parent.getAtom(atom);
    if (entry === undefined) throw parent.missing([atom]);
    if (entry instanceof Tensor) parent._writeLeaf(atom, value, null);
    else entry.fill_(value);
    return this;
  }

  zero_(): this {
    return this.fill_(0);
  }

  maskedFill_(mask: Tensor, value: number): this {
    if (mask.dtype !== "bool") {
      throw new TypeMismatchError(`maskedFill_ expects a bool mask, got ${mask.dtype}`);
    }
    if (!isPrefix(mask.shape, this.batchSize)) {
      throw new ShapeMismatchError(
        `mask of shape ${formatShape(mask.shape)} does not match the batch size ${formatShape(this.batchSize)}`,
      );
    }
    for (const atom of this.atoms()) {
      const entry = this.getAtom(atom);
      if (entry instanceof Tensor) {
        const filled = entry.clone().maskedFill_(alignToShape(mask, entry.shape), value);
        this._writeLeaf(atom, filled, null);
      } else {
        entry?.maskedFill_(mask, value);
      }
    }
    return this;
  }

  maskedFill(mask: Tensor, value: number): TensorTreeBase {
    return this.clone().maskedFill_(mask, value);
  }

  private checkUpdate(source: TensorTreeBase, inplace: boolean): void {
    if (!inplace) this.assertMutable();
    for (const atom of source.atoms()) {
      const value = source.getAtom(atom);
      const existing = this.getAtom(atom);
      if (value === undefined) continue;
      if (existing instanceof TensorTreeBase && value instanceof TensorTreeBase) {
        existing.checkUpdate(value, inplace);
        continue;
      }
      if (!inplace) {
        validateInsert(this.batchSize, atom, value);
        continue;
      }
      if (existing === undefined) throw this.missing([atom]);
      if (!(existing instanceof Tensor) || !(value instanceof Tensor)) {
        throw new TypeMismatchError(`cannot copy between a leaf and a tensortree at key "${atom}"`);
      }
      const aligned = alignToShape(value, existing.shape);
      if (!isBroadcastable(aligned.shape, existing.shape)) {
        throw new ShapeMismatchError(
          `cannot copy shape ${formatShape(value.shape)} into key "${atom}" of shape ${formatShape(existing.shape)}`,
        );
      }
    }
  }

  private toSourceTree(
    other: TensorTreeBase | TreeObject,
    batchSize: readonly number[] = this.batchSize,
  ): TensorTreeBase {
    if (other instanceof TensorTreeBase) return other;
    const converted = this.convertInput(other, batchSize);
    if (converted instanceof Tensor) throw new TypeMismatchError("update expects a tensortree");
    return converted;
  }

  /** Insert or replace every entry of `other`. Validates everything first. */
  update(other: TensorTreeBase | TreeObject, options: { inplace?: boolean } = {}): this {
    if (options.inplace) return this.update_(other);
    const source = this.toSourceTree(other);
    this.checkUpdate(source, false);
    for (const atom of source.atoms()) {
      const value = source.getAtom(atom);
      const existing = this.getAtom(atom);
      if (value === undefined) continue;
      if (existing instanceof TensorTreeBase && value instanceof TensorTreeBase) {
        existing.update(value);
      } else {
        this._setAtom(atom, value, false);
      }
    }
    return this;
  }

  /** Copy every entry of `other` into the existing storage. */
  update_(other: TensorTreeBase | TreeObject): this {
    const source = this.toSourceTree(other);
    this.checkUpdate(source, true);
    for (const atom of source.atoms()) {
      const value = source.getAtom(atom);
      const existing = this.getAtom(atom);
      if (value instanceof Tensor) {
        this._writeLeaf(atom, value, null);
      } else if (value !== undefined && existing instanceof TensorTreeBase) {
        existing.update_(value);
      }
    }
    return this;
  }

  /**
   * Write a tree (or plain object of leaves) into `this[index]`. Keys absent
   * here are allocated as zeros first.
   */
  setIndex(index: IndexExpr, value: TensorTreeBase | TreeObject): this {
    const items = expandEllipsis(index, this.batchSize.length);
    const source = this.toSourceTree(value, indexedShape(this.batchSize, items));
    for (const atom of source.atoms()) {
      const entry = source.getAtom(atom);
      if (entry === undefined) continue;
      if (entry instanceof TensorTreeBase) {
        if (this.getAtom(atom) === undefined) {
          this._setAtom(atom, new TensorTree({}, { batchSize: this.batchSize, device: this.device }), false);
        }
        const nested = this.getAtom(atom);
        if (nested instanceof TensorTreeBase) nested.setIndex(items, entry);
        continue;
      }
      if (this.getAtom(atom) === undefined) {
        const trailing = entry.shape.slice(source.batchSize.length);
        this._setAtom(
          atom,
          zeros([...this.batchSize, ...trailing], { dtype: entry.dtype, device: this.device ?? entry.device }),
          false,
        );
      }
      this._writeLeaf(atom, entry, items);
    }
    return this;
  }

  // ---------------------------------------------------------------------------
  // Conversion
  // ---------------------------------------------------------------------------

  /** Materialize into a fresh, unlocked plain tree. */
  toTensorTree(): TensorTree {
    const entries = new Map<string, TreeValue>();
    for (const atom of this.atoms()) {
      const value = this.getAtom(atom);
      if (value instanceof Tensor) entries.set(atom, value.clone());
      else if (value !== undefined) entries.set(atom, value.toTensorTree());
    }
    return new TensorTree(entries, { batchSize: this.batchSize, device: this.device, names: this.names });
  }

  clone(): TensorTreeBase {
    return this.toTensorTree();
  }

  contiguous(): TensorTree {
    return this.toTensorTree();
  }

  toObject(): PlainObject {
    const out: PlainObject = {};
    for (const atom of this.atoms()) {
      const value = this.getAtom(atom);
      if (value instanceof Tensor) out[atom] = value;
      else if (value !== undefined) out[atom] = value.toObject();
    }
    return out;
  }

  to(options: TreeCastOptions): TensorTreeBase {
    if (options.batchSize !== undefined && this.isLazy) {
      throw new TypeMismatchError(
        "Cannot pass batchSize to a lazy tensortree; call toTensorTree() first",
      );
    }
    const device = options.device === undefined ? undefined : parseDevice(options.device);
    const sameDevice = device === undefined || device === this.device;
    if (options.dtype === undefined && options.batchSize === undefined && sameDevice) return this;
    const entries = new Map<string, TreeValue>();
    for (const atom of this.atoms()) {
      const value = this.getAtom(atom);
      if (value instanceof Tensor) entries.set(atom, value.to({ device, dtype: options.dtype }));
      else if (value !== undefined) entries.set(atom, value.to({ device, dtype: options.dtype }));
    }
    const out = new TensorTree(entries, {
      batchSize: this.batchSize,
      device: device ?? this.device,
      names: this.names,
    });
    if (options.batchSize !== undefined) out.batchSize = options.batchSize;
    return out;
  }

  apply(
    fn: (leaf: Tensor, key: KeyPath) => Tensor,
    options: { batchSize?: readonly number[] } = {},
  ): TensorTree {
    return this.applyAt(fn, options.batchSize, []);
  }

  private applyAt(
    fn: (leaf: Tensor, key: KeyPath) => Tensor,
    batchSize: readonly number[] | undefined,
    prefix: KeyPath,
  ): TensorTree {
    const entries = new Map<string, TreeValue>();
    let keepsDevice = true;
    for (const atom of this.atoms()) {
      const value = this.getAtom(atom);
      if (value === undefined) continue;
      const mapped =
        value instanceof Tensor
          ? fn(value, [...prefix, atom])
          : value.applyAt(fn, batchSize, [...prefix, atom]);
      if (mapped.device !== this.device) keepsDevice = false;
      entries.set(atom, mapped);
    }
    return new TensorTree(entries, {
      batchSize: batchSize ?? this.batchSize,
      device: keepsDevice ? this.device : null,
      names: batchSize === undefined ? this.names : undefined,
    });
  }

  equals(other: unknown): boolean {
    return this.compare(other, (a, b) => a.equal(b));
  }

  allClose(other: unknown, options: { rtol?: number; atol?: number } = {}): boolean {
    return this.compare(other, (a, b) => a.allClose(b, options));
  }

  private compare(other: unknown, leafEqual: (a: Tensor, b: Tensor) => boolean): boolean {
    if (!(other instanceof TensorTreeBase)) return false;
    if (!shapesEqual(this.batchSize, other.batchSize)) return false;
    const mine = this.sortedKeys;
    const theirs = other.sortedKeys;
    if (mine.length !== theirs.length || mine.some((k, i) => k !== theirs[i])) return false;
    return mine.every((atom) => {
      const a = this.getAtom(atom);
      const b = other.getAtom(atom);
      if (a instanceof Tensor && b instanceof Tensor) return leafEqual(a, b);
      if (a instanceof TensorTreeBase && b instanceof TensorTreeBase) return a.compare(b, leafEqual);
      return false;
    });
  }

  memmapLike(prefix?: string): TensorTree {
    const out = this.apply((leaf) => zerosLike(leaf));
    return out.memmap_(prefix === undefined ? {} : { prefix });
  }

  // ---------------------------------------------------------------------------
  // Batch dimensions
  // ---------------------------------------------------------------------------

  /**
   * New plain tree whose leaves and nested batch sizes have their leading
   * dims rewritten by `reshapeLeading`.
   */
  private mapBatch(
    reshapeLeading: (shape: readonly number[]) => number[],
    op: "reshape" | "expand",
  ): TensorTree {
    const entries = new Map<string, TreeValue>();
    for (const atom of this.atoms()) {
      const value = this.getAtom(atom);
      if (value instanceof Tensor) {
        const target = reshapeLeading(value.shape);
        entries.set(atom, op === "reshape" ? value.reshape(target) : value.expand(target));
      } else if (value !== undefined) {
        entries.set(atom, value.mapBatch(reshapeLeading, op));
      }
    }
    return new TensorTree(entries, { batchSize: reshapeLeading(this.batchSize), device: this.device });
  }

  private batchSlices(dim: number, item: IndexItem): IndexItem[] {
    return [...Array.from({ length: dim }, () => slice()), item];
  }

  unbind(dim = 0): TensorTreeBase[] {
    const d = normalizeDim(dim, this.batchSize.length);
    const out: TensorTreeBase[] = [];
    for (let i = 0; i < this.batchSize[d]; i++) out.push(this.at(this.batchSlices(d, i)));
    return out;
  }

  split(sizes: number | readonly number[], dim = 0): TensorTreeBase[] {
    const d = normalizeDim(dim, this.batchSize.length);
    const total = this.batchSize[d];
    const lengths: number[] = [];
    if (typeof sizes === "number") {
      if (!Number.isInteger(sizes) || sizes <= 0) {
        throw new InvalidIndexError(`split size must be a positive integer, got ${sizes}`);
      }
      for (let start = 0; start < total; start += sizes) lengths.push(Math.min(sizes, total - start));
    } else {
      if (sizes.reduce((a, b) => a + b, 0) !== total) {
        throw new ShapeMismatchError(
          `split sizes [${sizes.join(", ")}] do not sum to the size ${total} of dim ${d}`,
        );
      }
      lengths.push(...sizes);
    }
    let start = 0;
    return lengths.map((length) => {
      const part = this.at(this.batchSlices(d, slice(start, start + length)));
      start += length;
      return part;
    });
  }

  chunk(chunks: number, dim = 0): TensorTreeBase[] {
    const d = normalizeDim(dim, this.batchSize.length);
    return this.split(Math.max(1, Math.ceil(this.batchSize[d] / chunks)), d);
  }

  expand(...shape: number[]): TensorTree {
    const batch = this.batchSize;
    const pad = shape.length - batch.length;
    if (pad < 0) {
      throw new ShapeMismatchError(
        `cannot expand a tensortree of batch size ${formatShape(batch)} to ${formatShape(shape)}`,
      );
    }
    const resolved = shape.map((size, i) => (size === -1 && i >= pad ? batch[i - pad] : size));
    return this.mapBatch((s) => [...resolved, ...s.slice(batch.length)], "expand");
  }

  flatten(startDim = 0, endDim = -1): TensorTreeBase {
    const n = this.batchSize.length;
    const start = normalizeDim(startDim, n);
    const end = normalizeDim(endDim, n);
    if (end < start) {
      throw new InvalidIndexError(`flatten() has invalid args: startDim ${start} > endDim ${end}`);
    }
    if (start === end) return this;
    return this.mapBatch(
      (s) => [...s.slice(0, start), sizeOf(s.slice(start, end + 1)), ...s.slice(end + 1)],
      "reshape",
    );
  }

  unflatten(dim: number, sizes: readonly number[]): TensorTree {
    const d = normalizeDim(dim, this.batchSize.length);
    const resolved = inferViewShape(sizes, this.batchSize[d]);
    return this.mapBatch((s) => [...s.slice(0, d), ...resolved, ...s.slice(d + 1)], "reshape");
  }

  reshape(shape: readonly number[]): TensorTreeBase;
  reshape(...shape: number[]): TensorTreeBase;
  reshape(...args: (number | readonly number[])[]): TensorTreeBase {
    const batch = this.batchSize;
    const resolved = inferViewShape(flattenArgs(args), sizeOf(batch));
    if (shapesEqual(resolved, batch)) return this;
    return this.mapBatch((s) => [...resolved, ...s.slice(batch.length)], "reshape");
  }

  // ---------------------------------------------------------------------------
  // Lazy views
  // ---------------------------------------------------------------------------

  /** @internal Wrap this tree in a view proxy. */
  applyTransform(transform: ViewTransform): TensorTreeBase {
    return makeView(this, transform);
  }

  permute(dims: readonly number[]): TensorTreeBase;
  permute(...dims: number[]): TensorTreeBase;
  permute(...args: (number | readonly number[])[]): TensorTreeBase {
    return this.applyTransform(permuteTransform(this.batchSize, flattenArgs(args)));
  }

  transpose(dim0: number, dim1: number): TensorTreeBase {
    const n = this.batchSize.length;
    const d0 = normalizeDim(dim0, n);
    const d1 = normalizeDim(dim1, n);
    if (d0 === d1) return this;
    return this.applyTransform({ kind: "transpose", dim0: d0, dim1: d1 });
  }

  squeeze(dim?: number): TensorTreeBase {
    const batch = this.batchSize;
    if (dim === undefined) {
      let out: TensorTreeBase = this;
      for (let d = batch.length - 1; d >= 0; d--) {
        if (batch[d] === 1) out = out.squeeze(d);
      }
      return out;
    }
    const d = normalizeDim(dim, batch.length);
    if (batch[d] !== 1) return this;
    return this.applyTransform({ kind: "squeeze", dim: d });
  }

  unsqueeze(dim: number): TensorTreeBase {
    return this.applyTransform({ kind: "unsqueeze", dim: normalizeDim(dim, this.batchSize.length, 1) });
  }

  view(shape: readonly number[]): TensorTreeBase;
  view(...shape: number[]): TensorTreeBase;
  view(...args: (number | readonly number[])[]): TensorTreeBase {
    const transform = viewTransform(this.batchSize, flattenArgs(args));
    if (transform.kind === "view" && shapesEqual(transform.shape, this.batchSize)) return this;
    return this.applyTransform(transform);
  }

  /**
   * Index the batch dims. Returns a plain tree whose leaves are views for
   * basic indices and copies for advanced ones.
   */
  at(index: IndexExpr): TensorTreeBase {
    const items = expandEllipsis(index, this.batchSize.length);
    const out = new TensorTree(
      {},
      {
        batchSize: indexedShape(this.batchSize, items),
        device: this.device,
        names: indexNames(this.names, items, this.batchSize),
      },
    );
    for (const atom of this.atoms()) {
      const value = this.getAtom(atom);
      if (value instanceof Tensor) out._setAtom(atom, value.index(items), false);
      else if (value !== undefined) out._setAtom(atom, value.at(items), false);
    }
    return out;
  }

  /** Lazy index proxy; reads and writes go through `this`. */
  indexView(index: IndexExpr): TensorTreeBase {
    return new IndexedTree(this, indexTransform(this.batchSize, index));
  }

  getSubView(index: IndexExpr): SubTree {
    return new SubTree(this, [index]);
  }

  // ---------------------------------------------------------------------------
  // Names
  // ---------------------------------------------------------------------------

  refineNames(...names: (string | null)[]): this {
    const current = this.names;
    const n = current.length;
    let requested = names;
    const ellipsis = names.indexOf("...");
    if (ellipsis >= 0) {
      if (names.indexOf("...", ellipsis + 1) >= 0) {
        throw new InvalidIndexError("refineNames takes at most one '...'");
      }
      const fill = n - (names.length - 1);
      if (fill < 0) throw new InvalidIndexError(`too many names for ${n} batch dimensions`);
      requested = [
        ...names.slice(0, ellipsis),
        ...current.slice(ellipsis, ellipsis + fill),
        ...names.slice(ellipsis + 1),
      ];
    }
    if (requested.length !== n) {
      throw new InvalidIndexError(
        `the number of names (${requested.length}) must match the batch dimensions (${n})`,
      );
    }
    this.names = current.map((name, i) => {
      const next = requested[i];
      if (next === null) return name;
      if (name !== null && name !== next) {
        throw new InvalidIndexError(`cannot refine dim ${i} from name "${name}" to "${next}"`);
      }
      return next;
    });
    return this;
  }

  /** Shallow plain copy carrying new dimension names. */
  rename(...names: (string | null)[]): TensorTree {
    const entries = new Map<string, TreeValue>();
    for (const atom of this.atoms()) {
      const value = this.getAtom(atom);
      if (value !== undefined) entries.set(atom, value);
    }
    const out = new TensorTree(entries, { batchSize: this.batchSize, device: this.device });
    out.names = names;
    return out;
  }

  rename_(...names: (string | null)[]): this {
    this.names = names;
    return this;
  }

  // ---------------------------------------------------------------------------
  // Iteration
  // ---------------------------------------------------------------------------

  *[Symbol.iterator](): Iterator<TensorTreeBase> {
    if (this.batchSize.length === 0) {
      throw new TypeMismatchError("iteration over a 0-d tensortree");
    }
    for (let i = 0; i < this.batchSize[0]; i++) yield this.at(i);
  }

  toString(): string {
    const keys = this.sortedKeys.map((k) => `"${k}"`).join(", ");
    return `${this.constructor.name}(keys=[${keys}], batchSize=${formatShape(this.batchSize)}, device=${this.device})`;
  }
}

function flattenArgs(args: readonly (number | readonly number[])[]): number[] {
  return args.flatMap((arg) => (typeof arg === "number" ? [arg] : [...arg]));
}

function isBroadcastable(shape: readonly number[], target: readonly number[]): boolean {
  const pad = target.length - shape.length;
  if (pad < 0) return false;
  return shape.every((dim, i) => dim === 1 || dim === target[i + pad]);
}
