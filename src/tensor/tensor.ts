import {
  IndexOutOfRangeError,
  InvalidIndexError,
  ShapeMismatchError,
  TypeMismatchError,
} from "../core/errors";
import {
  checkContiguous,
  computeContiguousStrides,
  formatShape,
  inferReshapeStrides,
  inferViewShape,
  normalizeDim,
  shapesEqual,
  sizeOf,
} from "../core/shape";
import { DEFAULT_DEVICE, type DeviceId, parseDevice } from "./device";
import { allocate, castValue, type DType } from "./dtype";
import { type IndexExpr, type IndexSource, planIndex } from "./indexing";
import { MemoryStorage, type Storage } from "./storage";

export type NestedArray = number | NestedArray[];

export type CastOptions = {
  device?: DeviceId;
  dtype?: DType;
};

/**
 * Visit every element of a strided layout in row-major order.
 */
export function forEachOffset(
  shape: readonly number[],
  strides: readonly number[],
  offset: number,
  fn: (storageOffset: number, linear: number) => void,
): void {
  const total = sizeOf(shape);
  if (total === 0) return;
  const rank = shape.length;
  const counter = new Array<number>(rank).fill(0);
  let off = offset;
  for (let linear = 0; linear < total; linear++) {
    fn(off, linear);
    for (let axis = rank - 1; axis >= 0; axis--) {
      counter[axis]++;
      off += strides[axis];
      if (counter[axis] < shape[axis]) break;
      off -= strides[axis] * shape[axis];
      counter[axis] = 0;
    }
  }
}

/**
 * Strides that read `shape`/`strides` broadcast to `target`.
 */
function broadcastStrides(
  shape: readonly number[],
  strides: readonly number[],
  target: readonly number[],
): number[] {
  if (shape.length > target.length) {
    throw new ShapeMismatchError(
      `cannot broadcast shape ${formatShape(shape)} to ${formatShape(target)}`,
    );
  }
  const pad = target.length - shape.length;
  return target.map((dim, axis) => {
    const inAxis = axis - pad;
    if (inAxis < 0) return 0;
    if (shape[inAxis] === dim) return strides[inAxis];
    if (shape[inAxis] === 1) return 0;
    throw new ShapeMismatchError(
      `cannot broadcast shape ${formatShape(shape)} to ${formatShape(target)}`,
    );
  });
}

/**
 * Strided CPU array. Views share `storage`; in-place writes call
 * `storage.commit` so file-backed storages flush before returning.
 */
export class Tensor implements IndexSource {
  readonly storage: Storage;
  readonly shape: number[];
  readonly strides: number[];
  readonly offset: number;
  readonly device: DeviceId;

  constructor(
    storage: Storage,
    shape: readonly number[],
    strides?: readonly number[],
    offset = 0,
    device: DeviceId = DEFAULT_DEVICE,
  ) {
    this.storage = storage;
    this.shape = shape.slice();
    this.strides = (strides ?? computeContiguousStrides(shape)).slice();
    this.offset = offset;
    this.device = device;
    if (strides === undefined && offset + sizeOf(shape) > storage.length) {
      throw new ShapeMismatchError(
        `storage of ${storage.length} elements is too small for shape ${formatShape(shape)}`,
      );
    }
  }

  get dtype(): DType {
    return this.storage.dtype;
  }

  get size(): number {
    return sizeOf(this.shape);
  }

  get ndim(): number {
    return this.shape.length;
  }

  get isFileBacked(): boolean {
    return this.storage.filename !== null;
  }

  sameStorage(other: Tensor): boolean {
    return this.storage.id === other.storage.id;
  }

  private withLayout(shape: readonly number[], strides: readonly number[], offset: number): Tensor {
    return new Tensor(this.storage, shape, strides, offset, this.device);
  }

  isContiguous(): boolean {
    return checkContiguous(this.shape, this.strides);
  }

  /** Zero-copy reshape; throws when strides cannot express `shape`. */
  view(shape: readonly number[]): Tensor {
    const resolved = inferViewShape(shape, this.size);
    if (this.isContiguous()) {
      return this.withLayout(resolved, computeContiguousStrides(resolved), this.offset);
    }
    const strides = inferReshapeStrides(this.shape, this.strides, resolved);
    if (strides === null) {
      throw new InvalidIndexError(
        "view size is not compatible with input tensor's size and stride " +
          "(at least one dimension spans across two contiguous subspaces). Use reshape instead.",
      );
    }
    return this.withLayout(resolved, strides, this.offset);
  }

  reshape(shape: readonly number[]): Tensor {
    const resolved = inferViewShape(shape, this.size);
    if (this.isContiguous() || inferReshapeStrides(this.shape, this.strides, resolved) !== null) {
      return this.view(resolved);
    }
    return this.clone().view(resolved);
  }

  contiguous(): Tensor {
    return this.isContiguous() ? this : this.clone();
  }

  clone(): Tensor {
    return this.castCopy(this.dtype, this.device);
  }

  private castCopy(dtype: DType, device: DeviceId): Tensor {
    const out = allocate(dtype, this.size);
    const src = this.storage.data;
    const convert = dtype !== this.dtype;
    forEachOffset(this.shape, this.strides, this.offset, (off, linear) => {
      out[linear] = convert ? castValue(src[off], dtype) : src[off];
    });
    return new Tensor(new MemoryStorage(dtype, out), this.shape, undefined, 0, device);
  }

  /** Returns `this` when nothing changes, otherwise a converted copy. */
  to(options: CastOptions): Tensor {
    const device = options.device === undefined ? this.device : parseDevice(options.device);
    const dtype = options.dtype ?? this.dtype;
    if (device === this.device && dtype === this.dtype) return this;
    return this.castCopy(dtype, device);
  }

  permute(dims: readonly number[]): Tensor {
    const rank = this.ndim;
    if (dims.length !== rank) {
      throw new InvalidIndexError(
        `permute: number of dims (${dims.length}) does not match tensor rank ${rank}`,
      );
    }
    const normalized = dims.map((d) => normalizeDim(d, rank));
    if (new Set(normalized).size !== rank) {
      throw new InvalidIndexError(`permute: repeated dim in [${dims}]`);
    }
    return this.withLayout(
      normalized.map((d) => this.shape[d]),
      normalized.map((d) => this.strides[d]),
      this.offset,
    );
  }

  transpose(dim0: number, dim1: number): Tensor {
    const d0 = normalizeDim(dim0, this.ndim);
    const d1 = normalizeDim(dim1, this.ndim);
    if (d0 === d1) return this;
    const shape = this.shape.slice();
    const strides = this.strides.slice();
    [shape[d0], shape[d1]] = [shape[d1], shape[d0]];
    [strides[d0], strides[d1]] = [strides[d1], strides[d0]];
    return this.withLayout(shape, strides, this.offset);
  }

  /** Drop size-1 dims; with `dim`, only that one (a no-op if its size is not 1). */
  squeeze(dim?: number): Tensor {
    if (dim === undefined) {
      const keep = this.shape.map((_, i) => i).filter((i) => this.shape[i] !== 1);
      return this.withLayout(
        keep.map((i) => this.shape[i]),
        keep.map((i) => this.strides[i]),
        this.offset,
      );
    }
    const d = normalizeDim(dim, this.ndim);
    if (this.shape[d] !== 1) return this;
    const shape = this.shape.slice();
    const strides = this.strides.slice();
    shape.splice(d, 1);
    strides.splice(d, 1);
    return this.withLayout(shape, strides, this.offset);
  }

  unsqueeze(dim: number): Tensor {
    const d = normalizeDim(dim, this.ndim, 1);
    const shape = this.shape.slice();
    const strides = this.strides.slice();
    const stride = d < this.ndim ? this.strides[d] * this.shape[d] : 1;
    shape.splice(d, 0, 1);
    strides.splice(d, 0, stride);
    return this.withLayout(shape, strides, this.offset);
  }

  /** Broadcast view; -1 keeps the existing size of that dim. */
  expand(shape: readonly number[]): Tensor {
    const pad = shape.length - this.ndim;
    if (pad < 0) {
      throw new ShapeMismatchError(
        `expand: the number of sizes provided (${shape.length}) must be greater or equal ` +
          `to the number of dimensions in the tensor (${this.ndim})`,
      );
    }
    const target = shape.map((dim, axis) => {
      if (dim !== -1) return dim;
      if (axis < pad) {
        throw new ShapeMismatchError("expand: -1 is not allowed in a leading, non-existing dimension");
      }
      return this.shape[axis - pad];
    });
    return this.withLayout(target, broadcastStrides(this.shape, this.strides, target), this.offset);
  }

  narrow(dim: number, start: number, length: number): Tensor {
    const d = normalizeDim(dim, this.ndim);
    const size = this.shape[d];
    const begin = start < 0 ? start + size : start;
    if (begin < 0 || length < 0 || begin + length > size) {
      throw new IndexOutOfRangeError(
        `narrow: range [${begin}, ${begin + length}) out of bounds for dim ${d} of size ${size}`,
      );
    }
    const shape = this.shape.slice();
    shape[d] = length;
    return this.withLayout(shape, this.strides, this.offset + begin * this.strides[d]);
  }

  select(dim: number, index: number): Tensor {
    const d = normalizeDim(dim, this.ndim);
    const size = this.shape[d];
    const i = index < 0 ? index + size : index;
    if (i < 0 || i >= size) {
      throw new IndexOutOfRangeError(
        `index ${index} is out of bounds for dimension ${d} with size ${size}`,
      );
    }
    const shape = this.shape.slice();
    const strides = this.strides.slice();
    shape.splice(d, 1);
    strides.splice(d, 1);
    return this.withLayout(shape, strides, this.offset + i * this.strides[d]);
  }

  /** Basic indices return a view; advanced indices gather into a copy. */
  index(index: IndexExpr): Tensor {
    const plan = planIndex(this.layout(), index);
    if (plan.kind === "basic") {
      const { shape, strides, offset } = plan.layout;
      return this.withLayout(shape, strides, offset);
    }
    const out = allocate(this.dtype, plan.offsets.length);
    const src = this.storage.data;
    plan.offsets.forEach((off, linear) => {
      out[linear] = src[off];
    });
    return new Tensor(new MemoryStorage(this.dtype, out), plan.shape, undefined, 0, this.device);
  }

  /** Write `value` (broadcast) into `this[index]`. */
  indexPut_(index: IndexExpr, value: Tensor | number): this {
    const plan = planIndex(this.layout(), index);
    if (plan.kind === "basic") {
      const { shape, strides, offset } = plan.layout;
      this.withLayout(shape, strides, offset).copy_(value);
      return this;
    }
    const values = valuesFor(value, plan.shape);
    this.writeOffsets(plan.offsets, (linear) => values(linear));
    return this;
  }

  layout(): { shape: number[]; strides: number[]; offset: number } {
    return { shape: this.shape.slice(), strides: this.strides.slice(), offset: this.offset };
  }

  copy_(src: Tensor | number): this {
    const values = valuesFor(src, this.shape);
    const offsets: number[] = [];
    forEachOffset(this.shape, this.strides, this.offset, (off) => offsets.push(off));
    this.writeOffsets(offsets, values);
    return this;
  }

  fill_(value: number): this {
    return this.copy_(value);
  }

  zero_(): this {
    return this.copy_(0);
  }

  maskedFill_(mask: Tensor, value: number): this {
    if (mask.dtype !== "bool") {
      throw new TypeMismatchError(`maskedFill_ expects a bool mask, got ${mask.dtype}`);
    }
    const maskStrides = broadcastStrides(mask.shape, mask.strides, this.shape);
    const flags: number[] = [];
    const maskData = mask.storage.data;
    forEachOffset(this.shape, maskStrides, mask.offset, (off) => flags.push(maskData[off]));
    const offsets: number[] = [];
    forEachOffset(this.shape, this.strides, this.offset, (off, linear) => {
      if (flags[linear]) offsets.push(off);
    });
    this.writeOffsets(offsets, () => value);
    return this;
  }

  private writeOffsets(offsets: readonly number[], valueAt: (linear: number) => number): void {
    if (offsets.length === 0) return;
    const data = this.storage.data;
    let lo = Number.POSITIVE_INFINITY;
    let hi = Number.NEGATIVE_INFINITY;
    offsets.forEach((off, linear) => {
      data[off] = castValue(valueAt(linear), this.dtype);
      if (off < lo) lo = off;
      if (off > hi) hi = off;
    });
    this.storage.commit(lo, hi + 1);
  }

  toArray(): number[] {
    const out = new Array<number>(this.size);
    const data = this.storage.data;
    forEachOffset(this.shape, this.strides, this.offset, (off, linear) => {
      out[linear] = data[off];
    });
    return out;
  }

  toNested(): NestedArray {
    const flat = this.toArray();
    if (this.ndim === 0) return flat[0];
    const build = (axis: number, start: number): NestedArray[] => {
      const span = sizeOf(this.shape.slice(axis + 1));
      const out: NestedArray[] = [];
      for (let i = 0; i < this.shape[axis]; i++) {
        out.push(axis === this.ndim - 1 ? flat[start + i] : build(axis + 1, start + i * span));
      }
      return out;
    };
    return build(0, 0);
  }

  item(): number {
    if (this.size !== 1) {
      throw new ShapeMismatchError(
        `a tensor with ${this.size} elements cannot be converted to a scalar`,
      );
    }
    return this.storage.data[this.offset];
  }

  equal(other: Tensor): boolean {
    if (!shapesEqual(this.shape, other.shape)) return false;
    const a = this.toArray();
    const b = other.toArray();
    return a.every((value, i) => value === b[i] || (Number.isNaN(value) && Number.isNaN(b[i])));
  }

  allClose(other: Tensor, options: { rtol?: number; atol?: number } = {}): boolean {
    const rtol = options.rtol ?? 1e-5;
    const atol = options.atol ?? 1e-8;
    if (!shapesEqual(this.shape, other.shape)) return false;
    const a = this.toArray();
    const b = other.toArray();
    return a.every((value, i) => Math.abs(value - b[i]) <= atol + rtol * Math.abs(b[i]));
  }

  toString(): string {
    return `Tensor(shape=${formatShape(this.shape)}, dtype=${this.dtype}, device=${this.device})`;
  }
}

/**
 * Row-major reader over `src` broadcast to `shape`. Values are gathered
 * before any write, so a source overlapping the destination reads the old
 * values.
 */
function valuesFor(src: Tensor | number, shape: readonly number[]): (linear: number) => number {
  if (typeof src === "number") return () => src;
  const strides = broadcastStrides(src.shape, src.strides, shape);
  const values: number[] = [];
  const data = src.storage.data;
  forEachOffset(shape, strides, src.offset, (off) => values.push(data[off]));
  return (linear) => values[linear];
}
