import {
  BatchSizeImmutableError,
  LAZY_BATCH_SIZE_ERROR,
  LockedMutationError,
  TypeMismatchError,
  UnsupportedOnProxyError,
} from "../core/errors";
import { zeros } from "../tensor/creation";
import type { DeviceId } from "../tensor/device";
import { expandEllipsis, type IndexExpr, type IndexItem, indexedShape } from "../tensor/indexing";
import { Tensor } from "../tensor/tensor";
import { type MemmapOptions, TensorTree, TensorTreeBase, type TreeValue, writeIndexed } from "./internal";
import { type DimNames, validateInsert } from "./invariants";
import type { LockGraphMember } from "./lock-graph";
import { indexNames } from "./transforms";

/**
 * `parent[i0][i1]...` with reads and writes going to the parent's storage.
 * Chained sub-views keep the top-most parent and extend the index chain.
 */
export class SubTree extends TensorTreeBase {
  private readonly parent: TensorTreeBase;
  private readonly indices: IndexItem[][];
  readonly lockState = null;

  constructor(parent: TensorTreeBase, indices: readonly IndexExpr[]) {
    super();
    this.parent = parent;
    let batch = parent.batchSize;
    this.indices = indices.map((index) => {
      const items = expandEllipsis(index, batch.length);
      batch = indexedShape(batch, items);
      return items;
    });
  }

  getParent(): TensorTreeBase {
    return this.parent;
  }

  getSubView(index: IndexExpr): SubTree {
    return new SubTree(this.parent, [...this.indices, index]);
  }

  get isLazy(): boolean {
    return true;
  }

  get batchSize(): number[] {
    return this.indices.reduce<number[]>((batch, items) => indexedShape(batch, items), this.parent.batchSize);
  }

  set batchSize(_size: readonly number[]) {
    throw new BatchSizeImmutableError(LAZY_BATCH_SIZE_ERROR);
  }

  get device(): DeviceId | null {
    return this.parent.device;
  }

  get names(): DimNames {
    let batch = this.parent.batchSize;
    let names = this.parent.names;
    for (const items of this.indices) {
      names = indexNames(names, items, batch);
      batch = indexedShape(batch, items);
    }
    return names;
  }

  set names(_names: readonly (string | null)[]) {
    throw new UnsupportedOnProxyError("names cannot be set on a SubTree; set them on the parent tree");
  }

  get isLocked(): boolean {
    return this.parent.isLocked;
  }

  get lockOwners(): ReadonlySet<number> {
    return this.parent.lockOwners;
  }

  lockChildren(): readonly LockGraphMember[] {
    return [];
  }

  lock_(): this {
    throw new LockedMutationError("Cannot lock a SubTree; lock the parent tree instead");
  }

  unlock_(): this {
    throw new LockedMutationError("Cannot unlock a SubTree; unlock the parent tree instead");
  }

  atoms(): string[] {
    return this.parent.atoms();
  }

  _isLeafAtom(key: string): boolean {
    return this.parent._isLeafAtom(key);
  }

  getAtom(key: string): TreeValue | undefined {
    const value = this.parent.getAtom(key);
    if (value === undefined) return undefined;
    if (value instanceof Tensor) {
      return this.indices.reduce((leaf, items) => leaf.index(items), value);
    }
    return new SubTree(value, this.indices);
  }

  _setAtom(key: string, value: TreeValue, inplace: boolean): void {
    const existing = this.getAtom(key);
    if (existing !== undefined) {
      if (!inplace) {
        throw new UnsupportedOnProxyError(
          `Calling SubTree.set("${key}", value, { inplace: false }) is prohibited for existing tensors. ` +
            "Consider calling set_ instead.",
        );
      }
      if (existing instanceof Tensor && value instanceof Tensor) {
        this._writeLeaf(key, value, null);
      } else if (existing instanceof TensorTreeBase && value instanceof TensorTreeBase) {
        existing.update_(value);
      } else {
        throw new TypeMismatchError(`cannot write in place between a leaf and a tensortree at key "${key}"`);
      }
      return;
    }
    validateInsert(this.batchSize, key, value);
    const parent = this.parent;
    if (value instanceof Tensor) {
      const trailing = value.shape.slice(this.batchSize.length);
      parent._setAtom(
        key,
        zeros([...parent.batchSize, ...trailing], {
          dtype: value.dtype,
          device: parent.device ?? value.device,
        }),
        false,
      );
      this._writeLeaf(key, value, null);
      return;
    }
    parent._setAtom(key, new TensorTree({}, { batchSize: parent.batchSize, device: parent.device }), false);
    try {
      const nested = this.getAtom(key);
      if (nested instanceof TensorTreeBase) nested.update(value);
    } catch (err) {
      parent._delAtom(key);
      throw err;
    }
  }

  _delAtom(key: string): void {
    this.parent._delAtom(key);
  }

  _writeLeaf(key: string, value: Tensor | number, index: IndexExpr | null): void {
    const chain: IndexExpr[] = index === null ? this.indices : [...this.indices, index];
    writeIndexed(this.parent, key, chain, value);
  }

  memmap_(_options: MemmapOptions = {}): this {
    throw new UnsupportedOnProxyError("Converting a sub-tree values to memmap cannot be done");
  }

  isMemmap(): boolean {
    return this.parent.isMemmap();
  }
}
