import {
  InvalidIndexError,
  ShapeMismatchError,
  TypeMismatchError,
} from "../core/errors";
import { formatShape, isPrefix } from "../core/shape";
import type { DeviceId } from "../tensor/device";
import { type IndexExpr, indexedShape } from "../tensor/indexing";
import { Tensor } from "../tensor/tensor";
import type { TreeValue } from "./internal";

export type DimNames = (string | null)[];

/** Leading shape of an entry: a leaf's shape or a nested tree's batch size. */
function entryShape(value: TreeValue): number[] {
  return value instanceof Tensor ? value.shape : value.batchSize;
}

export function validateInsert(batchSize: readonly number[], key: string, value: TreeValue): void {
  const shape = entryShape(value);
  if (!isPrefix(batchSize, shape)) {
    const n = batchSize.length;
    throw new ShapeMismatchError(
      `batch dimension mismatch for key "${key}": got value.shape[:${n}]=` +
        `${formatShape(shape.slice(0, n))} and batch size ${formatShape(batchSize)}`,
    );
  }
}

/**
 * Every entry must keep `newSize` as a prefix of its leading shape.
 */
export function checkBatchSize(
  entries: Iterable<readonly [string, TreeValue]>,
  newSize: readonly number[],
): void {
  for (const [key, value] of entries) {
    const shape = entryShape(value);
    if (!isPrefix(newSize, shape)) {
      throw new ShapeMismatchError(
        `the batch size ${formatShape(newSize)} is incompatible with key "${key}" ` +
          `of shape ${formatShape(shape)}`,
      );
    }
  }
}

/** Cast a value to the tree's device; with no tree device, leave it alone. */
export function reconcileDevice(device: DeviceId | null, value: TreeValue): TreeValue {
  if (device === null) return value;
  if (value instanceof Tensor) return value.device === device ? value : value.to({ device });
  return value.device === device ? value : value.to({ device });
}

/**
 * Shortest common leading prefix of the entries' shapes; [] for no entries.
 */
export function inferBatchSize(values: readonly TreeValue[]): number[] {
  if (values.length === 0) return [];
  let prefix = entryShape(values[0]).slice();
  for (const value of values.slice(1)) {
    const shape = entryShape(value);
    let n = 0;
    while (n < prefix.length && n < shape.length && prefix[n] === shape[n]) n++;
    prefix = prefix.slice(0, n);
  }
  return prefix;
}

export function validateNames(names: readonly unknown[], ndim: number): DimNames {
  if (names.length !== ndim) {
    throw new InvalidIndexError(
      `the number of names (${names.length}) must match the batch dimensions (${ndim})`,
    );
  }
  const out: DimNames = [];
  const seen = new Set<string>();
  for (const name of names) {
    if (name === null) {
      out.push(null);
      continue;
    }
    if (typeof name !== "string") {
      throw new TypeMismatchError(`dimension names must be strings or null, got ${typeof name}`);
    }
    if (seen.has(name)) {
      throw new InvalidIndexError(`Some dimension names are non-unique: ${name}`);
    }
    seen.add(name);
    out.push(name);
  }
  return out;
}

function broadcastsTo(shape: readonly number[], target: readonly number[]): boolean {
  const pad = target.length - shape.length;
  if (pad < 0) return false;
  return shape.every((dim, i) => dim === 1 || dim === target[i + pad]);
}

/**
 * A value whose shape is a strict prefix of `target` and that does not
 * broadcast from the right gets trailing unit dims, so `[4, 5]` writes
 * into `[4, 5, 1]`.
 */
export function alignToShape(value: Tensor, target: readonly number[]): Tensor {
  if (value.ndim >= target.length) return value;
  if (broadcastsTo(value.shape, target) || !isPrefix(value.shape, target)) return value;
  let out = value;
  while (out.ndim < target.length) out = out.unsqueeze(out.ndim);
  return out;
}

/** Copy `value` into `target`, or into `target[index]`. */
export function writeInto(target: Tensor, value: Tensor | number, index: IndexExpr | null): void {
  if (index === null) {
    target.copy_(typeof value === "number" ? value : alignToShape(value, target.shape));
    return;
  }
  const aligned =
    typeof value === "number" ? value : alignToShape(value, indexedShape(target.shape, index));
  target.indexPut_(index, aligned);
}
