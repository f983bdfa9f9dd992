import { LockedMutationError, TypeMismatchError } from "../core/errors";
import { formatShape, shapesEqual } from "../core/shape";
import { type DeviceId, parseDevice } from "../tensor/device";
import { Tensor } from "../tensor/tensor";
import { loadMemmap, memmapTree } from "../persist/memmap";
import {
  isReadonlyMap,
  type MemmapOptions,
  type NestedKeyInputPair,
  TensorTreeBase,
  type TreeOptions,
  type TreeSource,
  type TreeValue,
  UNLOCK_ERROR,
} from "./internal";
import {
  checkBatchSize,
  type DimNames,
  inferBatchSize,
  reconcileDevice,
  validateInsert,
  validateNames,
  writeInto,
} from "./invariants";
import { type KeyPath, unravelKey } from "./keys";
import { lockGraph, LockState } from "./lock-graph";

function isPairList(source: TreeSource): source is readonly NestedKeyInputPair[] {
  return Array.isArray(source);
}

/**
 * Ordered map of leaves and nested trees sharing a leading batch shape.
 */
export class TensorTree extends TensorTreeBase {
  private readonly entries = new Map<string, TreeValue>();
  private _batchSize: number[];
  private _device: DeviceId | null;
  private _names: DimNames;
  /** @internal Directory this tree was memmapped to, if any. */
  memmapPrefix: string | null = null;
  readonly lockState: LockState = new LockState(this);

  constructor(source: TreeSource = {}, options: TreeOptions = {}) {
    super();
    this._device =
      options.device === undefined || options.device === null ? null : parseDevice(options.device);

    const pairs: [KeyPath, TreeValue][] = [];
    const given = options.batchSize;
    const rawPairs = isPairList(source)
      ? source
      : isReadonlyMap(source)
        ? [...source.entries()]
        : Object.entries(source);
    for (const [key, value] of rawPairs) {
      pairs.push([unravelKey(key), this.convertInput(value, given ?? null)]);
    }

    this._batchSize = given === undefined ? inferBatchSize(pairs.map(([, v]) => v)) : given.slice();
    this._names =
      options.names === undefined
        ? this._batchSize.map(() => null)
        : validateNames(options.names, this._batchSize.length);
    for (const [path, value] of pairs) this.set(path, value);
    lockGraph.track(this);
  }

  static loadMemmap(prefix: string): TensorTreeBase {
    return loadMemmap(prefix);
  }

  get isLazy(): boolean {
    return false;
  }

  get batchSize(): number[] {
    return this._batchSize.slice();
  }

  set batchSize(size: readonly number[]) {
    this.assertMutable();
    checkBatchSize(this.entries, size);
    const keep = Math.min(size.length, this._batchSize.length);
    if (size.length !== this._batchSize.length) {
      this._names = [...this._names.slice(0, keep), ...size.slice(keep).map(() => null)];
    }
    this._batchSize = size.slice();
  }

  get device(): DeviceId | null {
    return this._device;
  }

  get names(): DimNames {
    return this._names.slice();
  }

  set names(names: readonly (string | null)[]) {
    this.assertMutable();
    this._applyNames(validateNames(names, this._batchSize.length));
  }

  /** @internal Names for the leading dims, pushed down into nested trees. */
  _applyNames(names: DimNames): void {
    this._names = names.slice();
    for (const value of this.entries.values()) {
      if (value instanceof TensorTree) {
        value._applyNames([...names, ...value._names.slice(names.length)]);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Locking
  // ---------------------------------------------------------------------------

  get isLocked(): boolean {
    return this.lockState.explicit || this.lockState.hasLiveOwners();
  }

  get lockOwners(): ReadonlySet<number> {
    return new Set(this.lockState.liveOwners());
  }

  lockChildren(): TensorTreeBase[] {
    const out: TensorTreeBase[] = [];
    for (const value of this.entries.values()) {
      if (value instanceof TensorTreeBase) out.push(value);
    }
    return out;
  }

  lock_(): this {
    lockGraph.lock(this);
    return this;
  }

  unlock_(): this {
    if (this.lockState.hasLiveOwners()) throw new LockedMutationError(UNLOCK_ERROR);
    lockGraph.unlock(this);
    return this;
  }

  // ---------------------------------------------------------------------------
  // Entries
  // ---------------------------------------------------------------------------

  atoms(): string[] {
    return [...this.entries.keys()];
  }

  getAtom(key: string): TreeValue | undefined {
    return this.entries.get(key);
  }

  _isLeafAtom(key: string): boolean {
    return this.entries.get(key) instanceof Tensor;
  }

  _setAtom(key: string, value: TreeValue, inplace: boolean): void {
    const existing = this.entries.get(key);
    if (existing !== undefined && inplace) {
      if (existing instanceof Tensor && value instanceof Tensor) {
        writeInto(existing, value, null);
        return;
      }
      if (existing instanceof TensorTreeBase && value instanceof TensorTreeBase) {
        existing.update_(value);
        return;
      }
      throw new TypeMismatchError(
        `cannot write in place between a leaf and a tensortree at key "${key}"`,
      );
    }
    this.assertMutable();
    validateInsert(this._batchSize, key, value);
    this.entries.set(key, reconcileDevice(this._device, value));
  }

  _delAtom(key: string): void {
    this.assertMutable();
    this.entries.delete(key);
  }

  _replaceEntries(entries: ReadonlyMap<string, TreeValue>): void {
    this.entries.clear();
    for (const [key, value] of entries) this.entries.set(key, value);
  }

  // ---------------------------------------------------------------------------
  // Copies and memmap
  // ---------------------------------------------------------------------------

  clone(): TensorTree {
    return this.toTensorTree();
  }

  isMemmap(): boolean {
    if (this.entries.size === 0) return this.memmapPrefix !== null;
    for (const value of this.entries.values()) {
      if (value instanceof Tensor ? !value.isFileBacked : !value.isMemmap()) return false;
    }
    return true;
  }

  memmap_(options: MemmapOptions = {}): this {
    memmapTree(this, options);
    return this;
  }

  /** @internal Rebind an entry to new backing without a lock check. */
  _rebind(key: string, value: TreeValue): void {
    const existing = this.entries.get(key);
    if (existing instanceof Tensor && value instanceof Tensor) {
      if (!shapesEqual(existing.shape, value.shape)) {
        throw new TypeMismatchError(
          `cannot rebind key "${key}" to a leaf of shape ${formatShape(value.shape)}`,
        );
      }
    } else if (existing === undefined || existing instanceof Tensor || value instanceof Tensor) {
      throw new TypeMismatchError(`cannot rebind key "${key}" to a different kind of entry`);
    }
    this.entries.set(key, value);
  }
}
