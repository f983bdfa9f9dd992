/**
 * Index expressions over strided layouts.
 *
 * An index is planned against a layout (shape/strides/offset). Basic items
 * (integers, slices, new axes, ellipsis) fold into a new strided layout and
 * never copy. Integer lists, index tensors and boolean masks are "advanced":
 * they broadcast together and resolve to an explicit list of storage offsets.
 */

import { IndexOutOfRangeError, InvalidIndexError, TypeMismatchError } from "../core/errors";
import { broadcastShapes, computeContiguousStrides, sizeOf } from "../core/shape";
import type { DType } from "./dtype";

export class Slice {
  readonly start: number | null;
  readonly stop: number | null;
  readonly step: number | null;

  constructor(start: number | null = null, stop: number | null = null, step: number | null = null) {
    this.start = start;
    this.stop = stop;
    this.step = step;
  }

  toString(): string {
    return `slice(${this.start}, ${this.stop}, ${this.step})`;
  }
}

export function slice(
  start: number | null = null,
  stop: number | null = null,
  step: number | null = null,
): Slice {
  return new Slice(start, stop, step);
}

export const ELLIPSIS = "...";
export type Ellipsis = typeof ELLIPSIS;

/** Anything array-like that can act as an index tensor. */
export interface IndexSource {
  readonly shape: readonly number[];
  readonly dtype: DType;
  toArray(): number[];
}

export type IndexItem =
  | number
  | Slice
  | null
  | Ellipsis
  | readonly number[]
  | readonly boolean[]
  | IndexSource;

/**
 * A single item, or an array of items (one per dimension). An array at the
 * top level is always read as a tuple of items; wrap a list index in
 * another array (`[[1, 2]]`) or pass a tensor.
 */
export type IndexExpr = IndexItem | readonly IndexItem[];

export type Layout = {
  shape: number[];
  strides: number[];
  offset: number;
};

type AdvancedArray = { values: number[]; shape: number[] };

type NormalizedItem =
  | { kind: "int"; value: number }
  | { kind: "slice"; slice: Slice }
  | { kind: "newaxis" }
  | { kind: "ellipsis" }
  | { kind: "array"; array: AdvancedArray }
  | { kind: "mask"; mask: AdvancedArray };

export type IndexPlan =
  | { kind: "basic"; layout: Layout }
  | { kind: "advanced"; shape: number[]; offsets: number[] };

function isItemArray(value: IndexExpr): value is readonly IndexItem[] {
  return Array.isArray(value);
}

function isIndexSource(value: IndexItem): value is IndexSource {
  return (
    typeof value === "object" &&
    value !== null &&
    !(value instanceof Slice) &&
    !Array.isArray(value)
  );
}

function isListItem(value: IndexItem): value is readonly number[] | readonly boolean[] {
  return Array.isArray(value);
}

function toIndexItems(index: IndexExpr): IndexItem[] {
  return isItemArray(index) ? index.slice() : [index];
}

function normalizeItem(item: IndexItem): NormalizedItem {
  if (item === null) return { kind: "newaxis" };
  if (item === ELLIPSIS) return { kind: "ellipsis" };
  if (typeof item === "number") {
    if (!Number.isInteger(item)) {
      throw new TypeMismatchError(`index values must be integers, got ${item}`);
    }
    return { kind: "int", value: item };
  }
  if (item instanceof Slice) return { kind: "slice", slice: item };
  if (isListItem(item)) {
    const values: number[] = [];
    let bools = 0;
    for (const entry of item) {
      if (typeof entry === "boolean") {
        bools++;
        values.push(entry ? 1 : 0);
      } else if (typeof entry === "number" && Number.isInteger(entry)) {
        values.push(entry);
      } else {
        throw new TypeMismatchError(`invalid entry in list index: ${String(entry)}`);
      }
    }
    if (bools > 0 && bools !== values.length) {
      throw new TypeMismatchError("list index mixes booleans and integers");
    }
    const array = { values, shape: [values.length] };
    return bools > 0 ? { kind: "mask", mask: array } : { kind: "array", array };
  }
  if (isIndexSource(item)) {
    const array = { values: item.toArray(), shape: item.shape.slice() };
    if (item.dtype === "bool") return { kind: "mask", mask: array };
    if (item.dtype.startsWith("f")) {
      throw new TypeMismatchError(
        "tensors used as indices must be integer or bool tensors",
      );
    }
    return { kind: "array", array };
  }
  throw new TypeMismatchError(`unsupported index item: ${String(item)}`);
}

function consumedDims(item: NormalizedItem): number {
  switch (item.kind) {
    case "int":
    case "slice":
    case "array":
      return 1;
    case "mask":
      return item.mask.shape.length;
    default:
      return 0;
  }
}

/**
 * Replace a single ellipsis with full slices so the index covers `ndim`
 * dimensions. More than one ellipsis is an error.
 */
export function expandEllipsis(index: IndexExpr, ndim: number): IndexItem[] {
  const items = toIndexItems(index);
  const ellipsisCount = items.filter((item) => item === ELLIPSIS).length;
  if (ellipsisCount > 1) {
    throw new InvalidIndexError("an index can only have a single ellipsis ('...')");
  }
  if (ellipsisCount === 0) return items;
  let consumed = 0;
  for (const item of items) {
    if (item !== ELLIPSIS) consumed += consumedDims(normalizeItem(item));
  }
  const fill = Math.max(0, ndim - consumed);
  const out: IndexItem[] = [];
  for (const item of items) {
    if (item === ELLIPSIS) {
      for (let i = 0; i < fill; i++) out.push(new Slice());
    } else {
      out.push(item);
    }
  }
  return out;
}

export function resolveSlice(s: Slice, size: number): { start: number; length: number; step: number } {
  const step = s.step ?? 1;
  if (!Number.isInteger(step) || step <= 0) {
    throw new InvalidIndexError(`slice step must be a positive integer, got ${step}`);
  }
  const clamp = (value: number | null, fallback: number): number => {
    if (value === null) return fallback;
    const v = value < 0 ? value + size : value;
    return Math.min(Math.max(v, 0), size);
  };
  const start = clamp(s.start, 0);
  const stop = clamp(s.stop, size);
  const length = stop > start ? Math.ceil((stop - start) / step) : 0;
  return { start, length, step };
}

function checkBound(value: number, size: number, dim: number): number {
  const v = value < 0 ? value + size : value;
  if (v < 0 || v >= size) {
    throw new IndexOutOfRangeError(
      `index ${value} is out of bounds for dimension ${dim} with size ${size}`,
    );
  }
  return v;
}

/**
 * Plan `index` against `layout`. With `shapeOnly`, advanced offsets are not
 * computed (the returned `offsets` array is empty).
 */
export function planIndex(layout: Layout, index: IndexExpr, shapeOnly = false): IndexPlan {
  const ndim = layout.shape.length;
  const items = expandEllipsis(index, ndim).map(normalizeItem);
  const consumed = items.reduce((acc, item) => acc + consumedDims(item), 0);
  if (consumed > ndim) {
    throw new IndexOutOfRangeError(`too many indices for tensor of dimension ${ndim}`);
  }

  const shape: number[] = [];
  const strides: number[] = [];
  let offset = layout.offset;
  const advanced: { position: number; array: AdvancedArray }[] = [];
  let d = 0;

  for (const item of items) {
    switch (item.kind) {
      case "int": {
        const v = checkBound(item.value, layout.shape[d], d);
        offset += v * layout.strides[d];
        d++;
        break;
      }
      case "slice": {
        const { start, length, step } = resolveSlice(item.slice, layout.shape[d]);
        if (length > 0) offset += start * layout.strides[d];
        shape.push(length);
        strides.push(layout.strides[d] * step);
        d++;
        break;
      }
      case "newaxis":
        shape.push(1);
        strides.push(0);
        break;
      case "ellipsis":
        break;
      case "array": {
        const size = layout.shape[d];
        const values = item.array.values.map((v) => checkBound(v, size, d));
        advanced.push({ position: shape.length, array: { values, shape: item.array.shape } });
        shape.push(size);
        strides.push(layout.strides[d]);
        d++;
        break;
      }
      case "mask": {
        const k = item.mask.shape.length;
        for (let j = 0; j < k; j++) {
          if (item.mask.shape[j] !== layout.shape[d + j]) {
            throw new IndexOutOfRangeError(
              `The shape of the mask [${item.mask.shape}] at index ${j} does not match ` +
                `the shape of the indexed tensor [${layout.shape}] at index ${d + j}`,
            );
          }
        }
        const maskStrides = computeContiguousStrides(item.mask.shape);
        const coords: number[][] = Array.from({ length: k }, () => []);
        item.mask.values.forEach((flag, linear) => {
          if (!flag) return;
          let rem = linear;
          for (let j = 0; j < k; j++) {
            const c = Math.floor(rem / maskStrides[j]);
            rem -= c * maskStrides[j];
            coords[j].push(c);
          }
        });
        for (let j = 0; j < k; j++) {
          advanced.push({
            position: shape.length,
            array: { values: coords[j], shape: [coords[j].length] },
          });
          shape.push(layout.shape[d + j]);
          strides.push(layout.strides[d + j]);
        }
        d += k;
        break;
      }
    }
  }
  for (; d < ndim; d++) {
    shape.push(layout.shape[d]);
    strides.push(layout.strides[d]);
  }

  if (advanced.length === 0) {
    return { kind: "basic", layout: { shape, strides, offset } };
  }
  return planAdvanced({ shape, strides, offset }, advanced, shapeOnly);
}

function planAdvanced(
  base: Layout,
  advanced: { position: number; array: AdvancedArray }[],
  shapeOnly: boolean,
): IndexPlan {
  let broadcast: number[] = [];
  for (const { array } of advanced) {
    broadcast = broadcastShapes(broadcast, array.shape);
  }
  const positions = advanced.map((a) => a.position);
  const adjacent = positions.every((p, i) => i === 0 || p === positions[i - 1] + 1);
  const rest: number[] = [];
  for (let i = 0; i < base.shape.length; i++) {
    if (!positions.includes(i)) rest.push(i);
  }
  const insertAt = adjacent ? rest.filter((i) => i < positions[0]).length : 0;
  const outShape = [
    ...rest.slice(0, insertAt).map((i) => base.shape[i]),
    ...broadcast,
    ...rest.slice(insertAt).map((i) => base.shape[i]),
  ];
  if (shapeOnly) return { kind: "advanced", shape: outShape, offsets: [] };

  // Element strides of each advanced array, expanded to the broadcast shape.
  const arrayStrides = advanced.map(({ array }) => {
    const own = computeContiguousStrides(array.shape);
    const pad = broadcast.length - array.shape.length;
    return broadcast.map((_dim, axis) => {
      const inAxis = axis - pad;
      if (inAxis < 0 || array.shape[inAxis] === 1) return 0;
      return own[inAxis];
    });
  });

  const total = sizeOf(outShape);
  const offsets = new Array<number>(total);
  const outStrides = computeContiguousStrides(outShape);
  const bEnd = insertAt + broadcast.length;
  const cursor = new Array<number>(advanced.length);
  for (let linear = 0; linear < total; linear++) {
    let rem = linear;
    let off = base.offset;
    cursor.fill(0);
    for (let axis = 0; axis < outShape.length; axis++) {
      const coord = Math.floor(rem / outStrides[axis]);
      rem -= coord * outStrides[axis];
      if (axis >= insertAt && axis < bEnd) {
        for (let a = 0; a < advanced.length; a++) {
          cursor[a] += coord * arrayStrides[a][axis - insertAt];
        }
      } else {
        const restAxis = axis < insertAt ? axis : axis - broadcast.length;
        off += coord * base.strides[rest[restAxis]];
      }
    }
    for (let a = 0; a < advanced.length; a++) {
      off += advanced[a].array.values[cursor[a]] * base.strides[positions[a]];
    }
    offsets[linear] = off;
  }
  return { kind: "advanced", shape: outShape, offsets };
}

/**
 * Result shape of `shape[index]`, without touching data.
 */
export function indexedShape(shape: readonly number[], index: IndexExpr): number[] {
  const plan = planIndex(
    { shape: shape.slice(), strides: computeContiguousStrides(shape), offset: 0 },
    index,
    true,
  );
  return plan.kind === "basic" ? plan.layout.shape : plan.shape;
}

/** True when the index only holds basic items, so indexing yields a view. */
export function isBasicIndex(index: IndexExpr): boolean {
  return toIndexItems(index).every(
    (item) =>
      item === null ||
      item === ELLIPSIS ||
      typeof item === "number" ||
      item instanceof Slice,
  );
}
