import {
  BatchSizeImmutableError,
  LAZY_BATCH_SIZE_ERROR,
  TypeMismatchError,
  UnsupportedOnProxyError,
} from "../core/errors";
import type { DeviceId } from "../tensor/device";
import { type IndexExpr, isBasicIndex } from "../tensor/indexing";
import { zeros } from "../tensor/creation";
import { Tensor } from "../tensor/tensor";
import {
  type MemmapOptions,
  TensorTree,
  TensorTreeBase,
  type TreeValue,
} from "./internal";
import { type DimNames, validateInsert, validateNames, writeInto } from "./invariants";
import type { KeysOptions, KeysView } from "./keys";
import type { LockGraphMember } from "./lock-graph";
import {
  forwardLeaf,
  forwardNames,
  forwardShape,
  inverseLeaf,
  inverseOf,
  transformsEqual,
  type ViewTransform,
} from "./transforms";

/**
 * Write `value` into `source[key][i0][i1]...`. Basic steps alias the
 * source storage; an advanced step works on a copy that is put back.
 */
export function writeIndexed(
  source: TensorTreeBase,
  key: string,
  indices: readonly IndexExpr[],
  value: Tensor | number,
): void {
  const [first, ...rest] = indices;
  if (rest.length === 0) {
    source._writeLeaf(key, value, first);
    return;
  }
  const leaf = source.getAtom(key);
  if (!(leaf instanceof Tensor)) {
    throw new TypeMismatchError(`entry "${key}" is a tensortree, not a leaf`);
  }
  const selected = leaf.index(first);
  writeChain(selected, rest, value);
  source._writeLeaf(key, selected, first);
}

function writeChain(target: Tensor, indices: readonly IndexExpr[], value: Tensor | number): void {
  const [first, ...rest] = indices;
  if (rest.length === 0) {
    writeInto(target, value, first);
    return;
  }
  const inner = target.index(first);
  writeChain(inner, rest, value);
  if (!isBasicIndex(first)) target.indexPut_(first, inner);
}

/**
 * A tree seen through one batch transform of `source`.
 *
 * Nothing is stored here: reads map source leaves forward, writes map
 * values back, and locking, memmap and device questions go to the source.
 */
export abstract class LazyViewTree extends TensorTreeBase {
  readonly source: TensorTreeBase;
  readonly transform: ViewTransform;
  readonly lockState = null;

  constructor(source: TensorTreeBase, transform: ViewTransform) {
    super();
    this.source = source;
    this.transform = transform;
  }

  get isLazy(): boolean {
    return true;
  }

  get batchSize(): number[] {
    return forwardShape(this.transform, this.source.batchSize);
  }

  set batchSize(_size: readonly number[]) {
    throw new BatchSizeImmutableError(LAZY_BATCH_SIZE_ERROR);
  }

  get device(): DeviceId | null {
    return this.source.device;
  }

  get names(): DimNames {
    return forwardNames(this.transform, this.source.names, this.source.batchSize);
  }

  set names(names: readonly (string | null)[]) {
    const valid = validateNames(names, this.batchSize.length);
    const t = this.transform;
    if (t.kind === "index" || t.kind === "view") {
      throw new UnsupportedOnProxyError(
        `names cannot be set through a ${t.kind} view; set them on the source tree`,
      );
    }
    const current = this.source.names;
    if (t.kind === "squeeze") {
      valid.splice(t.dim, 0, current[t.dim]);
      this.source.names = valid;
      return;
    }
    const inverse = inverseOf(t);
    if (inverse !== null) this.source.names = forwardNames(inverse, valid, this.batchSize);
  }

  get isLocked(): boolean {
    return this.source.isLocked;
  }

  get lockOwners(): ReadonlySet<number> {
    return this.source.lockOwners;
  }

  lockChildren(): readonly LockGraphMember[] {
    return [this.source];
  }

  lock_(): this {
    this.source.lock_();
    return this;
  }

  unlock_(): this {
    this.source.unlock_();
    return this;
  }

  atoms(): string[] {
    return this.source.atoms();
  }

  keys(options: KeysOptions = {}): KeysView {
    return this.source.keys(options);
  }

  _isLeafAtom(key: string): boolean {
    return this.source._isLeafAtom(key);
  }

  getAtom(key: string): TreeValue | undefined {
    const value = this.source.getAtom(key);
    if (value === undefined) return undefined;
    return value instanceof Tensor ? forwardLeaf(this.transform, value) : value.applyTransform(this.transform);
  }

  _setAtom(key: string, value: TreeValue, inplace: boolean): void {
    const existing = this.getAtom(key);
    if (existing !== undefined && inplace) {
      this.writeExisting(key, existing, value);
      return;
    }
    validateInsert(this.batchSize, key, value);
    this.source._setAtom(key, this.toSource(value), false);
  }

  protected writeExisting(key: string, existing: TreeValue, value: TreeValue): void {
    if (existing instanceof Tensor && value instanceof Tensor) {
      this._writeLeaf(key, value, null);
    } else if (existing instanceof TensorTreeBase && value instanceof TensorTreeBase) {
      existing.update_(value);
    } else {
      throw new TypeMismatchError(`cannot write in place between a leaf and a tensortree at key "${key}"`);
    }
  }

  /** Map a value given in view coordinates back to source coordinates. */
  private toSource(value: TreeValue): TreeValue {
    if (value instanceof Tensor) return inverseLeaf(this.transform, value);
    const inverse = inverseOf(this.transform);
    if (inverse === null) {
      throw new UnsupportedOnProxyError(`cannot insert a tensortree through a ${this.transform.kind} view`);
    }
    return value.applyTransform(inverse);
  }

  _delAtom(key: string): void {
    this.source._delAtom(key);
  }

  applyTransform(next: ViewTransform): TensorTreeBase {
    const inverse = inverseOf(this.transform);
    if (inverse !== null && transformsEqual(inverse, next)) return this.source;
    return super.applyTransform(next);
  }

  memmap_(options: MemmapOptions = {}): this {
    this.source.memmap_(options);
    return this;
  }

  isMemmap(): boolean {
    return this.source.isMemmap();
  }
}

export class PermutedTree extends LazyViewTree {}

export class SqueezedTree extends LazyViewTree {}

export class UnsqueezedTree extends LazyViewTree {}

export class ViewedTree extends LazyViewTree {}

export class TransposedTree extends LazyViewTree {}

/**
 * Lazy `source[index]`. Writes land in the source storage at the index,
 * including through advanced indices.
 */
export class IndexedTree extends LazyViewTree {
  private get indexExpr(): IndexExpr {
    const t = this.transform;
    if (t.kind !== "index") throw new TypeMismatchError("IndexedTree needs an index transform");
    return t.index;
  }

  /** Indices from the source down to this view. */
  get indexChain(): IndexExpr[] {
    return [this.indexExpr];
  }

  _writeLeaf(key: string, value: Tensor | number, index: IndexExpr | null): void {
    const chain = index === null ? this.indexChain : [...this.indexChain, index];
    writeIndexed(this.source, key, chain, value);
  }

  _setAtom(key: string, value: TreeValue, _inplace: boolean): void {
    const existing = this.getAtom(key);
    if (existing !== undefined) {
      this.writeExisting(key, existing, value);
      return;
    }
    validateInsert(this.batchSize, key, value);
    const source = this.source;
    const batch = this.batchSize;
    if (value instanceof Tensor) {
      const trailing = value.shape.slice(batch.length);
      source._setAtom(
        key,
        zeros([...source.batchSize, ...trailing], {
          dtype: value.dtype,
          device: source.device ?? value.device,
        }),
        false,
      );
      this._writeLeaf(key, value, null);
      return;
    }
    source._setAtom(key, new TensorTree({}, { batchSize: source.batchSize, device: source.device }), false);
    try {
      const nested = this.getAtom(key);
      if (nested instanceof TensorTreeBase) nested.update(value);
    } catch (err) {
      source._delAtom(key);
      throw err;
    }
  }
}

const VIEW_CLASSES = {
  index: IndexedTree,
  permute: PermutedTree,
  squeeze: SqueezedTree,
  unsqueeze: UnsqueezedTree,
  view: ViewedTree,
  transpose: TransposedTree,
} satisfies Record<ViewTransform["kind"], new (source: TensorTreeBase, t: ViewTransform) => LazyViewTree>;

export function makeView(source: TensorTreeBase, transform: ViewTransform): LazyViewTree {
  return new VIEW_CLASSES[transform.kind](source, transform);
}
