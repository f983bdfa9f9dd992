/**
 * Pure shape utility functions, shared by the tensor, tree and persist layers.
 */

import { IndexOutOfRangeError, InvalidIndexError } from "./errors";

export type Shape = number[];

export function sizeOf(shape: readonly number[]): number {
  return shape.reduce((acc, dim) => acc * dim, 1);
}

export function broadcastShapes(a: readonly number[], b: readonly number[]): number[] {
  const outRank = Math.max(a.length, b.length);
  const out = new Array<number>(outRank);
  for (let i = 0; i < outRank; i += 1) {
    const aDim = a[a.length - 1 - i] ?? 1;
    const bDim = b[b.length - 1 - i] ?? 1;
    if (aDim !== bDim && aDim !== 1 && bDim !== 1) {
      throw new InvalidIndexError(`Cannot broadcast shapes [${a}] and [${b}]`);
    }
    out[outRank - 1 - i] = Math.max(aDim, bDim);
  }
  return out;
}

export function shapesEqual(a: readonly number[], b: readonly number[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * True when `prefix` is a leading prefix of `shape` (equal shapes count).
 */
export function isPrefix(prefix: readonly number[], shape: readonly number[]): boolean {
  if (prefix.length > shape.length) return false;
  for (let i = 0; i < prefix.length; i += 1) {
    if (prefix[i] !== shape[i]) return false;
  }
  return true;
}

export function formatShape(shape: readonly number[]): string {
  return `[${shape.join(", ")}]`;
}

/**
 * Normalize a possibly-negative dim against a rank. `extra` widens the
 * accepted range, e.g. 1 for unsqueeze/stack which may insert at `rank`.
 */
export function normalizeDim(dim: number, rank: number, extra = 0): number {
  const bound = rank + extra;
  if (!Number.isInteger(dim)) {
    throw new InvalidIndexError(`dim must be an integer, got ${dim}`);
  }
  if (dim < -bound || dim >= bound) {
    throw new IndexOutOfRangeError(
      `Dimension out of range (expected to be in range of [${-bound}, ${bound - 1}], but got ${dim})`,
    );
  }
  return dim < 0 ? dim + bound : dim;
}

/**
 * Resolve a single -1 entry against the total element count.
 */
export function inferViewShape(shape: readonly number[], numel: number): number[] {
  let inferred = -1;
  let known = 1;
  for (let i = 0; i < shape.length; i += 1) {
    const dim = shape[i];
    if (dim === -1) {
      if (inferred !== -1) {
        throw new InvalidIndexError("only one dimension can be inferred");
      }
      inferred = i;
    } else if (!Number.isInteger(dim) || dim < 0) {
      throw new InvalidIndexError(`invalid shape dimension ${dim}`);
    } else {
      known *= dim;
    }
  }
  const out = shape.slice();
  if (inferred !== -1) {
    if (known === 0 || numel % known !== 0) {
      throw new InvalidIndexError(
        `shape ${formatShape(shape)} is invalid for input of size ${numel}`,
      );
    }
    out[inferred] = numel / known;
  } else if (known !== numel) {
    throw new InvalidIndexError(
      `shape ${formatShape(shape)} is invalid for input of size ${numel}`,
    );
  }
  return out;
}

export function computeContiguousStrides(shape: readonly number[]): number[] {
  if (shape.length === 0) return [];
  const strides = new Array<number>(shape.length);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i--) {
    strides[i] = stride;
    stride *= shape[i];
  }
  return strides;
}

/**
 * Check if strides represent a contiguous layout for the given shape.
 * Size-1 dimensions don't affect contiguity since stride doesn't matter.
 */
export function checkContiguous(shape: readonly number[], strides: readonly number[]): boolean {
  if (shape.length !== strides.length) return false;
  const expected = computeContiguousStrides(shape);
  for (let i = 0; i < shape.length; i++) {
    if (shape[i] <= 1) continue;
    if (strides[i] !== expected[i]) return false;
  }
  return true;
}

/**
 * Infer strides for a new shape given old shape/strides, without copying data.
 * Returns null if the reshape requires a contiguous copy.
 */
export function inferReshapeStrides(
  oldShape: readonly number[],
  oldStrides: readonly number[],
  newShape: readonly number[],
): number[] | null {
  if (newShape.length === 0) return [];
  if (oldShape.length === 0) return computeContiguousStrides(newShape);
  if (sizeOf(newShape) === 0) return computeContiguousStrides(newShape);

  const newStrides = new Array<number>(newShape.length).fill(1);
  let oldIdx = 0;
  let newIdx = 0;
  const oldN = oldShape.length;
  const newN = newShape.length;

  while (newIdx < newN) {
    if (newShape[newIdx] === 1) {
      newIdx++;
      continue;
    }
    while (oldIdx < oldN && oldShape[oldIdx] === 1) oldIdx++;
    if (oldIdx >= oldN) return null;

    const newGroupStart = newIdx;
    let oldProduct = oldShape[oldIdx];
    let newProduct = newShape[newIdx];
    while (oldProduct !== newProduct) {
      if (oldProduct < newProduct) {
        let next = oldIdx + 1;
        while (next < oldN && oldShape[next] === 1) next++;
        if (next >= oldN) return null;
        if (oldStrides[oldIdx] !== oldStrides[next] * oldShape[next]) {
          return null;
        }
        oldIdx = next;
        oldProduct *= oldShape[oldIdx];
      } else {
        newIdx++;
        if (newIdx >= newN) return null;
        newProduct *= newShape[newIdx];
      }
    }

    let stride = oldStrides[oldIdx];
    for (let i = newIdx; i >= newGroupStart; i--) {
      newStrides[i] = stride;
      stride *= newShape[i];
    }
    oldIdx++;
    newIdx++;
  }
  while (oldIdx < oldN) {
    if (oldShape[oldIdx] !== 1) return null;
    oldIdx++;
  }
  return newStrides;
}
