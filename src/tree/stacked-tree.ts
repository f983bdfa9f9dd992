import {
  BatchSizeImmutableError,
  BatchSizeMismatchError,
  DeviceMismatchError,
  HeterogeneousKeyError,
  IndexOutOfRangeError,
  LAZY_BATCH_SIZE_ERROR,
  LOCK_ERROR,
  LockedMutationError,
  NonUniqueShapeError,
  TypeMismatchError,
  UnsupportedOnProxyError,
} from "../core/errors";
import { formatShape, normalizeDim, shapesEqual } from "../core/shape";
import type { DeviceId } from "../tensor/device";
import { expandEllipsis, type IndexExpr, type IndexItem, resolveSlice, Slice } from "../tensor/indexing";
import { stack } from "../tensor/ops";
import { Tensor } from "../tensor/tensor";
import { memmapStacked } from "../persist/memmap";
import {
  type MemmapOptions,
  TensorTreeBase,
  type TreeValue,
  UNLOCK_ERROR,
} from "./internal";
import { alignToShape, type DimNames, validateInsert, validateNames, writeInto } from "./invariants";
import { lockGraph, LockState } from "./lock-graph";

/** Siblings must agree on batch size and device. */
function checkSiblings(trees: readonly TensorTreeBase[]): void {
  if (trees.length === 0) {
    throw new BatchSizeMismatchError("cannot stack an empty list of tensortrees");
  }
  const [first, ...rest] = trees;
  for (const tree of rest) {
    if (!shapesEqual(tree.batchSize, first.batchSize)) {
      throw new BatchSizeMismatchError(
        `Batch sizes in tensortrees differ: ${formatShape(first.batchSize)} and ${formatShape(tree.batchSize)}`,
      );
    }
    if (tree.device !== first.device) {
      throw new DeviceMismatchError(`Devices differ: ${first.device} and ${tree.device}`);
    }
  }
}

function unbindLeaf(value: Tensor, dim: number): Tensor[] {
  return Array.from({ length: value.shape[dim] }, (_, i) => value.select(dim, i));
}

/**
 * Lazy stack of sibling trees along `stackDim`.
 *
 * Keys are the intersection of the siblings' keys; leaves are stacked on
 * read (a copy) and unbound into the siblings on write.
 */
export class LazyStackedTree extends TensorTreeBase {
  private readonly trees: TensorTreeBase[];
  readonly stackDim: number;
  readonly lockState: LockState = new LockState(this);
  /** Intersection of sibling keys, re-derived on structural change or discovery. */
  private validKeys: string[] | null = null;

  constructor(trees: readonly TensorTreeBase[], stackDim = 0) {
    super();
    checkSiblings(trees);
    this.trees = trees.slice();
    this.stackDim = normalizeDim(stackDim, trees[0].batchSize.length, 1);
    lockGraph.track(this);
  }

  /** The sibling trees, in stack order. */
  get tensortrees(): readonly TensorTreeBase[] {
    return this.trees.slice();
  }

  get isLazy(): boolean {
    return true;
  }

  get batchSize(): number[] {
    const out = this.trees[0].batchSize;
    out.splice(this.stackDim, 0, this.trees.length);
    return out;
  }

  set batchSize(_size: readonly number[]) {
    throw new BatchSizeImmutableError(LAZY_BATCH_SIZE_ERROR);
  }

  get device(): DeviceId | null {
    return this.trees[0].device;
  }

  get names(): DimNames {
    const out = this.trees[0].names;
    out.splice(this.stackDim, 0, null);
    return out;
  }

  set names(names: readonly (string | null)[]) {
    const valid = validateNames(names, this.batchSize.length);
    if (valid[this.stackDim] !== null) {
      throw new UnsupportedOnProxyError("the stack dimension of a LazyStackedTree cannot be named");
    }
    valid.splice(this.stackDim, 1);
    for (const tree of this.trees) tree.names = valid;
  }

  // ---------------------------------------------------------------------------
  // Locking
  // ---------------------------------------------------------------------------

  get isLocked(): boolean {
    return (
      this.lockState.explicit ||
      this.lockState.hasLiveOwners() ||
      this.trees.every((tree) => tree.isLocked)
    );
  }

  get lockOwners(): ReadonlySet<number> {
    const owners = new Set(this.lockState.liveOwners());
    for (const tree of this.trees) {
      for (const id of tree.lockOwners) owners.add(id);
    }
    owners.delete(this.id);
    return owners;
  }

  lockChildren(): readonly TensorTreeBase[] {
    return this.trees;
  }

  lock_(): this {
    lockGraph.lock(this);
    return this;
  }

  unlock_(): this {
    if (this.lockOwners.size > 0) throw new LockedMutationError(UNLOCK_ERROR);
    lockGraph.unlock(this);
    return this;
  }

  // ---------------------------------------------------------------------------
  // Keys
  // ---------------------------------------------------------------------------

  private deriveValidKeys(): string[] {
    const others = this.trees.slice(1).map((tree) => new Set(tree.atoms()));
    this.validKeys = this.trees[0].atoms().filter((key) => others.every((set) => set.has(key)));
    return this.validKeys;
  }

  atoms(): string[] {
    return (this.validKeys ?? this.deriveValidKeys()).slice();
  }

  _isLeafAtom(key: string): boolean {
    return this.trees[0]._isLeafAtom(key);
  }

  /**
   * Siblings' values for `key`. A key outside the valid set triggers a
   * re-derivation, so keys added to every sibling become visible here.
   */
  private siblingValues(key: string): TreeValue[] | undefined {
    const valid = this.validKeys ?? this.deriveValidKeys();
    if (!valid.includes(key) && !this.deriveValidKeys().includes(key)) {
      const holders = this.trees.filter((tree) => tree.getAtom(key) !== undefined).length;
      if (holders === 0) return undefined;
      throw new HeterogeneousKeyError(
        `key "${key}" is present in ${holders} of the ${this.trees.length} stacked tensortrees`,
      );
    }
    const values: TreeValue[] = [];
    for (const tree of this.trees) {
      const value = tree.getAtom(key);
      if (value === undefined) {
        throw new HeterogeneousKeyError(`key "${key}" is missing from a stacked tensortree`);
      }
      values.push(value);
    }
    return values;
  }

  getAtom(key: string): TreeValue | undefined {
    const values = this.siblingValues(key);
    if (values === undefined) return undefined;
    const leaves = values.filter((v): v is Tensor => v instanceof Tensor);
    if (leaves.length === values.length) {
      if (leaves.some((leaf) => !shapesEqual(leaf.shape, leaves[0].shape))) {
        throw new NonUniqueShapeError(
          `Found more than one unique shape in the tensors to be stacked at key "${key}"`,
        );
      }
      return stack(leaves, this.stackDim);
    }
    const trees = values.filter((v): v is TensorTreeBase => v instanceof TensorTreeBase);
    if (trees.length !== values.length) {
      throw new TypeMismatchError(`key "${key}" holds leaves in some siblings and trees in others`);
    }
    return new LazyStackedTree(trees, this.stackDim);
  }

  /** Per-sibling leaves for `key`, without stacking. */
  getNestedTensor(key: string): Tensor[] {
    if (this.stackDim !== 0) {
      throw new UnsupportedOnProxyError(
        "getNestedTensor can only be called when the stack dim is 0",
      );
    }
    return this.trees.map((tree) => tree.getLeaf(key));
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  _setAtom(key: string, value: TreeValue, inplace: boolean): void {
    const existing = inplace ? this.getAtom(key) : undefined;
    if (existing !== undefined) {
      if (existing instanceof Tensor && value instanceof Tensor) {
        this._writeLeaf(key, value, null);
      } else if (existing instanceof TensorTreeBase && value instanceof TensorTreeBase) {
        existing.update_(value);
      } else {
        throw new TypeMismatchError(`cannot write in place between a leaf and a tensortree at key "${key}"`);
      }
      return;
    }
    this.assertMutable();
    if (this.trees.some((tree) => tree.isLocked)) throw new LockedMutationError(LOCK_ERROR);
    validateInsert(this.batchSize, key, value);
    const parts = value instanceof Tensor ? unbindLeaf(value, this.stackDim) : value.unbind(this.stackDim);
    this.trees.forEach((tree, i) => tree._setAtom(key, parts[i], false));
    const valid = this.validKeys ?? this.deriveValidKeys();
    if (!valid.includes(key)) valid.push(key);
  }

  _delAtom(key: string): void {
    this.assertMutable();
    for (const tree of this.trees) tree._delAtom(key);
    this.validKeys = null;
  }

  _writeLeaf(key: string, value: Tensor | number, index: IndexExpr | null): void {
    if (index !== null) {
      const current = this.getAtom(key);
      if (!(current instanceof Tensor)) {
        throw new TypeMismatchError(`entry "${key}" is a tensortree, not a leaf`);
      }
      writeInto(current, value, index);
      this._writeLeaf(key, current, null);
      return;
    }
    if (typeof value === "number") {
      for (const tree of this.trees) tree._writeLeaf(key, value, null);
      return;
    }
    const first = this.trees[0].getAtom(key);
    if (!(first instanceof Tensor)) {
      throw new TypeMismatchError(`entry "${key}" is a tensortree, not a leaf`);
    }
    const fullShape = first.shape.slice();
    fullShape.splice(this.stackDim, 0, this.trees.length);
    const parts = unbindLeaf(alignToShape(value, fullShape).expand(fullShape), this.stackDim);
    this.trees.forEach((tree, i) => tree._writeLeaf(key, parts[i], null));
  }

  insert(index: number, tree: TensorTreeBase | Tensor): this {
    if (!(tree instanceof TensorTreeBase)) {
      throw new TypeMismatchError("Expected new value to be a TensorTreeBase instance");
    }
    if (this.isLocked) throw new LockedMutationError(LOCK_ERROR);
    checkSiblings([this.trees[0], tree]);
    this.trees.splice(index, 0, tree);
    this.validKeys = null;
    this.cache.clear();
    return this;
  }

  append(tree: TensorTreeBase | Tensor): this {
    return this.insert(this.trees.length, tree);
  }

  containsTree(tree: TensorTreeBase): boolean {
    return this.trees.includes(tree);
  }

  // ---------------------------------------------------------------------------
  // Indexing
  // ---------------------------------------------------------------------------

  at(index: IndexExpr): TensorTreeBase {
    const items = expandEllipsis(index, this.batchSize.length);
    const positional = items.every((item) => typeof item === "number" || item instanceof Slice);
    if (!positional) return super.at(items);
    const dropped = items
      .slice(0, this.stackDim)
      .filter((item) => typeof item === "number").length;
    if (items.length <= this.stackDim) {
      return this.restack(this.trees, items, this.stackDim - dropped);
    }
    const sibling = items[this.stackDim];
    const others = items.filter((_, i) => i !== this.stackDim);
    if (typeof sibling === "number") {
      const n = this.trees.length;
      const i = sibling < 0 ? sibling + n : sibling;
      if (i < 0 || i >= n) {
        throw new IndexOutOfRangeError(
          `index ${sibling} is out of bounds for dimension ${this.stackDim} with size ${n}`,
        );
      }
      const tree = this.trees[i];
      return others.every(isFullSlice) ? tree : tree.at(others);
    }
    if (!(sibling instanceof Slice)) return super.at(items);
    const { start, length, step } = resolveSlice(sibling, this.trees.length);
    const picked = Array.from({ length }, (_, k) => this.trees[start + k * step]);
    if (picked.length === 0) return super.at(items);
    return this.restack(picked, others, this.stackDim - dropped);
  }

  private restack(trees: readonly TensorTreeBase[], others: IndexItem[], dim: number): TensorTreeBase {
    const parts = others.every(isFullSlice) ? trees.slice() : trees.map((tree) => tree.at(others));
    return new LazyStackedTree(parts, dim);
  }

  unbind(dim = 0): TensorTreeBase[] {
    const d = normalizeDim(dim, this.batchSize.length);
    return d === this.stackDim ? this.trees.slice() : super.unbind(d);
  }

  clone(): LazyStackedTree {
    return new LazyStackedTree(
      this.trees.map((tree) => tree.clone()),
      this.stackDim,
    );
  }

  memmap_(options: MemmapOptions = {}): this {
    memmapStacked(this, options);
    return this;
  }

  isMemmap(): boolean {
    return this.trees.every((tree) => tree.isMemmap());
  }
}

function isFullSlice(item: IndexItem): boolean {
  return item instanceof Slice && item.start === null && item.stop === null && (item.step ?? 1) === 1;
}
