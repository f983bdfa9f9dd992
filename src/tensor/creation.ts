import { ShapeMismatchError, TypeMismatchError } from "../core/errors";
import { uniformAt } from "../core/rng";
import { inferViewShape, sizeOf } from "../core/shape";
import { DEFAULT_DEVICE, type DeviceId, parseDevice } from "./device";
import { allocate, castValue, type DType, type TypedArray } from "./dtype";
import { MemoryStorage } from "./storage";
import { Tensor } from "./tensor";

export type NestedInput = number | boolean | readonly NestedInput[];

export type CreateOptions = {
  dtype?: DType;
  device?: DeviceId;
};

function makeTensor(
  shape: readonly number[],
  dtype: DType,
  device: DeviceId | undefined,
  fill: (data: TypedArray) => void,
): Tensor {
  const data = allocate(dtype, sizeOf(shape));
  fill(data);
  return new Tensor(
    new MemoryStorage(dtype, data),
    shape,
    undefined,
    0,
    device === undefined ? DEFAULT_DEVICE : parseDevice(device),
  );
}

function inferNestedShape(value: NestedInput): number[] {
  const shape: number[] = [];
  let cursor: NestedInput = value;
  while (isNestedList(cursor)) {
    shape.push(cursor.length);
    if (cursor.length === 0) break;
    cursor = cursor[0];
  }
  return shape;
}

function isNestedList(value: NestedInput): value is readonly NestedInput[] {
  return Array.isArray(value);
}

function flattenNested(
  value: NestedInput,
  shape: readonly number[],
  depth: number,
  out: (number | boolean)[],
): void {
  if (depth === shape.length) {
    if (isNestedList(value)) {
      throw new ShapeMismatchError("ragged nested array: expected a scalar at full depth");
    }
    out.push(value);
    return;
  }
  if (!isNestedList(value) || value.length !== shape[depth]) {
    throw new ShapeMismatchError(
      `ragged nested array: expected length ${shape[depth]} at depth ${depth}`,
    );
  }
  for (const entry of value) flattenNested(entry, shape, depth + 1, out);
}

/**
 * Build a tensor from a nested array, or from a flat array with `shape`.
 * Without `dtype`: booleans give "bool", integers "i32", anything else "f32".
 */
export function tensor(
  values: NestedInput | TypedArray,
  options: CreateOptions & { shape?: readonly number[] } = {},
): Tensor {
  let flat: (number | boolean)[];
  let shape: number[];
  if (ArrayBuffer.isView(values)) {
    flat = Array.from(values);
    shape = [flat.length];
  } else {
    shape = inferNestedShape(values);
    flat = [];
    flattenNested(values, shape, 0, flat);
  }
  if (options.shape !== undefined) {
    shape = inferViewShape(options.shape, flat.length);
  }
  const dtype = options.dtype ?? inferDType(flat);
  return makeTensor(shape, dtype, options.device, (data) => {
    flat.forEach((value, i) => {
      data[i] = castValue(typeof value === "boolean" ? Number(value) : value, dtype);
    });
  });
}

function inferDType(values: readonly (number | boolean)[]): DType {
  if (values.length > 0 && values.every((v) => typeof v === "boolean")) return "bool";
  if (values.some((v) => typeof v === "boolean")) {
    throw new TypeMismatchError("cannot mix booleans and numbers in one tensor");
  }
  if (values.length > 0 && values.every((v) => Number.isInteger(v))) return "i32";
  return "f32";
}

export function full(shape: readonly number[], value: number, options: CreateOptions = {}): Tensor {
  const dtype = options.dtype ?? "f32";
  return makeTensor(shape, dtype, options.device, (data) => data.fill(castValue(value, dtype)));
}

export function zeros(shape: readonly number[], options: CreateOptions = {}): Tensor {
  return full(shape, 0, options);
}

export function ones(shape: readonly number[], options: CreateOptions = {}): Tensor {
  return full(shape, 1, options);
}

export function zerosLike(t: Tensor, options: CreateOptions = {}): Tensor {
  return zeros(t.shape, { dtype: options.dtype ?? t.dtype, device: options.device ?? t.device });
}

export function arange(
  end: number,
  options: CreateOptions & { start?: number; step?: number } = {},
): Tensor {
  const start = options.start ?? 0;
  const step = options.step ?? 1;
  const count = Math.max(0, Math.ceil((end - start) / step));
  const dtype = options.dtype ?? (Number.isInteger(start) && Number.isInteger(step) ? "i32" : "f32");
  return makeTensor([count], dtype, options.device, (data) => {
    for (let i = 0; i < count; i++) data[i] = start + i * step;
  });
}

let defaultSeed = 0x2545f491;

/**
 * Uniform [0, 1) values. Deterministic for a given seed; without one, each
 * call advances a process-wide seed.
 */
export function rand(
  shape: readonly number[],
  options: CreateOptions & { seed?: number } = {},
): Tensor {
  const seed = options.seed ?? defaultSeed++;
  const dtype = options.dtype ?? "f32";
  return makeTensor(shape, dtype, options.device, (data) => {
    for (let i = 0; i < data.length; i++) data[i] = uniformAt(seed, i);
  });
}
