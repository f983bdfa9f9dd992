import { TypeMismatchError } from "../core/errors";

export type DType = "f16" | "f32" | "f64" | "i32" | "u32" | "u8" | "bool";

export type TypedArray =
  | Float32Array
  | Float64Array
  | Int32Array
  | Uint32Array
  | Uint8Array;

export const DTYPES: readonly DType[] = ["f16", "f32", "f64", "i32", "u32", "u8", "bool"];

export function isDType(value: unknown): value is DType {
  return typeof value === "string" && (DTYPES as readonly string[]).includes(value);
}

/**
 * Allocate the backing array for a dtype. f16 is held at f32 precision
 * (there is no Float16Array on Node 20).
 */
export function allocate(dtype: DType, length: number): TypedArray {
  switch (dtype) {
    case "f16":
    case "f32":
      return new Float32Array(length);
    case "f64":
      return new Float64Array(length);
    case "i32":
      return new Int32Array(length);
    case "u32":
      return new Uint32Array(length);
    case "u8":
    case "bool":
      return new Uint8Array(length);
  }
}

/** Bytes per element of the backing array. */
function itemSize(dtype: DType): number {
  switch (dtype) {
    case "f64":
      return 8;
    case "u8":
    case "bool":
      return 1;
    default:
      return 4;
  }
}

/** View raw little-endian bytes as the backing array of `dtype`. */
export function fromBytes(dtype: DType, bytes: Uint8Array): TypedArray {
  const size = itemSize(dtype);
  if (bytes.byteLength % size !== 0) {
    throw new TypeMismatchError(
      `byte length ${bytes.byteLength} is not a multiple of ${size} for dtype ${dtype}`,
    );
  }
  // Copy into a fresh, aligned buffer.
  const aligned = new Uint8Array(bytes.byteLength);
  aligned.set(bytes);
  const length = bytes.byteLength / size;
  switch (dtype) {
    case "f16":
    case "f32":
      return new Float32Array(aligned.buffer, 0, length);
    case "f64":
      return new Float64Array(aligned.buffer, 0, length);
    case "i32":
      return new Int32Array(aligned.buffer, 0, length);
    case "u32":
      return new Uint32Array(aligned.buffer, 0, length);
    case "u8":
    case "bool":
      return aligned;
  }
}

export function toBytes(data: TypedArray): Uint8Array {
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Convert a JS number to the value stored for `dtype`.
 */
export function castValue(value: number, dtype: DType): number {
  switch (dtype) {
    case "bool":
      return value !== 0 && !Number.isNaN(value) ? 1 : 0;
    case "i32":
    case "u32":
    case "u8":
      return Number.isFinite(value) ? Math.trunc(value) : 0;
    default:
      return value;
  }
}

/**
 * Promotion used when stacking/concatenating mixed dtypes.
 */
export function promoteTypes(a: DType, b: DType): DType {
  if (a === b) return a;
  const rank: Record<DType, number> = {
    bool: 0,
    u8: 1,
    i32: 2,
    u32: 3,
    f16: 4,
    f32: 5,
    f64: 6,
  };
  return rank[a] >= rank[b] ? a : b;
}

export function isTypedArray(value: unknown): value is TypedArray {
  return (
    value instanceof Float32Array ||
    value instanceof Float64Array ||
    value instanceof Int32Array ||
    value instanceof Uint32Array ||
    value instanceof Uint8Array
  );
}
