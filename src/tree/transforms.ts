/**
 * Batch-dimension transforms behind the lazy view proxies.
 *
 * Every transform acts on the leading (batch) dims of a leaf and leaves the
 * trailing dims alone. `forwardLeaf` maps a source leaf to view coordinates,
 * `inverseLeaf` maps a value given in view coordinates back to the source.
 */

import { InvalidIndexError, UnsupportedOnProxyError } from "../core/errors";
import { inferViewShape, normalizeDim, shapesEqual, sizeOf } from "../core/shape";
import {
  ELLIPSIS,
  expandEllipsis,
  type IndexExpr,
  type IndexItem,
  indexedShape,
  isBasicIndex,
  Slice,
} from "../tensor/indexing";
import type { Tensor } from "../tensor/tensor";
import type { DimNames } from "./invariants";

export type ViewTransform =
  | { kind: "index"; index: readonly IndexItem[] }
  | { kind: "permute"; dims: readonly number[] }
  | { kind: "squeeze"; dim: number }
  | { kind: "unsqueeze"; dim: number }
  | { kind: "view"; shape: readonly number[]; sourceShape: readonly number[] }
  | { kind: "transpose"; dim0: number; dim1: number };

export type ViewKind = ViewTransform["kind"];

export function indexTransform(batchSize: readonly number[], index: IndexExpr): ViewTransform {
  const items = expandEllipsis(index, batchSize.length);
  // Validates the index against the batch dims.
  indexedShape(batchSize, items);
  return { kind: "index", index: items };
}

export function permuteTransform(batchSize: readonly number[], dims: readonly number[]): ViewTransform {
  const n = batchSize.length;
  if (dims.length !== n) {
    throw new InvalidIndexError(
      `number of dims don't match in permute: got ${dims.length}, expected ${n}`,
    );
  }
  const normalized = dims.map((d) => normalizeDim(d, n));
  if (new Set(normalized).size !== n) {
    throw new InvalidIndexError(`repeated dim in permute: [${dims.join(", ")}]`);
  }
  return { kind: "permute", dims: normalized };
}

export function forwardShape(t: ViewTransform, batchSize: readonly number[]): number[] {
  switch (t.kind) {
    case "index":
      return indexedShape(batchSize, t.index);
    case "permute":
      return [...t.dims.map((d) => batchSize[d]), ...batchSize.slice(t.dims.length)];
    case "squeeze": {
      const out = batchSize.slice();
      out.splice(t.dim, 1);
      return out;
    }
    case "unsqueeze": {
      const out = batchSize.slice();
      out.splice(t.dim, 0, 1);
      return out;
    }
    case "view":
      return [...t.shape, ...batchSize.slice(t.sourceShape.length)];
    case "transpose": {
      const out = batchSize.slice();
      [out[t.dim0], out[t.dim1]] = [out[t.dim1], out[t.dim0]];
      return out;
    }
  }
}

/** Leaf in source coordinates -> leaf in view coordinates. */
export function forwardLeaf(t: ViewTransform, leaf: Tensor): Tensor {
  switch (t.kind) {
    case "index":
      return leaf.index(t.index);
    case "permute": {
      const rest = leaf.shape.slice(t.dims.length).map((_, i) => t.dims.length + i);
      return leaf.permute([...t.dims, ...rest]);
    }
    case "squeeze":
      return leaf.squeeze(t.dim);
    case "unsqueeze":
      return leaf.unsqueeze(t.dim);
    case "view":
      return leaf.view([...t.shape, ...leaf.shape.slice(t.sourceShape.length)]);
    case "transpose":
      return leaf.transpose(t.dim0, t.dim1);
  }
}

/** Value in view coordinates -> value in source coordinates. */
export function inverseLeaf(t: ViewTransform, value: Tensor): Tensor {
  switch (t.kind) {
    case "index":
      throw new UnsupportedOnProxyError(
        "index views are written through indexPut_, not through an inverse transform",
      );
    case "permute": {
      const inverse = invertPermutation(t.dims);
      const rest = value.shape.slice(t.dims.length).map((_, i) => t.dims.length + i);
      return value.permute([...inverse, ...rest]);
    }
    case "squeeze":
      return value.unsqueeze(t.dim);
    case "unsqueeze":
      return value.squeeze(t.dim);
    case "view":
      return value.reshape([...t.sourceShape, ...value.shape.slice(t.shape.length)]);
    case "transpose":
      return value.transpose(t.dim0, t.dim1);
  }
}

function invertPermutation(dims: readonly number[]): number[] {
  const out = new Array<number>(dims.length);
  dims.forEach((d, i) => {
    out[d] = i;
  });
  return out;
}

/**
 * The exact algebraic inverse of `t`, or null when there is none.
 */
export function inverseOf(t: ViewTransform): ViewTransform | null {
  switch (t.kind) {
    case "index":
      return null;
    case "permute":
      return { kind: "permute", dims: invertPermutation(t.dims) };
    case "squeeze":
      return { kind: "unsqueeze", dim: t.dim };
    case "unsqueeze":
      return { kind: "squeeze", dim: t.dim };
    case "view":
      return { kind: "view", shape: t.sourceShape, sourceShape: t.shape };
    case "transpose":
      return t;
  }
}

export function transformsEqual(a: ViewTransform, b: ViewTransform): boolean {
  switch (a.kind) {
    case "index":
      return false;
    case "permute":
      return b.kind === "permute" && shapesEqual(a.dims, b.dims);
    case "squeeze":
      return b.kind === "squeeze" && a.dim === b.dim;
    case "unsqueeze":
      return b.kind === "unsqueeze" && a.dim === b.dim;
    case "view":
      return (
        b.kind === "view" && shapesEqual(a.shape, b.shape) && shapesEqual(a.sourceShape, b.sourceShape)
      );
    case "transpose":
      return (
        b.kind === "transpose" &&
        ((a.dim0 === b.dim0 && a.dim1 === b.dim1) || (a.dim0 === b.dim1 && a.dim1 === b.dim0))
      );
  }
}

/** `batchSize` is the shape the names belong to; only index transforms need it. */
export function forwardNames(t: ViewTransform, names: DimNames, batchSize: readonly number[]): DimNames {
  switch (t.kind) {
    case "index":
      return indexNames(names, t.index, batchSize);
    case "permute":
      return [...t.dims.map((d) => names[d]), ...names.slice(t.dims.length)];
    case "squeeze": {
      const out = names.slice();
      out.splice(t.dim, 1);
      return out;
    }
    case "unsqueeze": {
      const out = names.slice();
      out.splice(t.dim, 0, null);
      return out;
    }
    case "view":
      return shapesEqual(t.shape, t.sourceShape)
        ? names.slice()
        : [...t.shape.map(() => null), ...names.slice(t.sourceShape.length)];
    case "transpose": {
      const out = names.slice();
      [out[t.dim0], out[t.dim1]] = [out[t.dim1], out[t.dim0]];
      return out;
    }
  }
}

/**
 * Names after indexing: integers drop a dim, slices keep it, new axes are
 * unnamed. Advanced indices leave every dim unnamed.
 */
export function indexNames(names: DimNames, index: IndexExpr, batchSize: readonly number[]): DimNames {
  const items = expandEllipsis(index, names.length);
  if (!isBasicIndex(items)) {
    return new Array<string | null>(indexedShape(batchSize, items).length).fill(null);
  }
  const out: DimNames = [];
  let d = 0;
  for (const item of items) {
    if (item === null) {
      out.push(null);
    } else if (item === ELLIPSIS) {
      continue;
    } else if (item instanceof Slice) {
      out.push(names[d]);
      d++;
    } else {
      d++;
    }
  }
  for (; d < names.length; d++) out.push(names[d]);
  return out;
}

/** Resolve a -1 in a requested view shape against the batch numel. */
export function viewTransform(batchSize: readonly number[], shape: readonly number[]): ViewTransform {
  const resolved = inferViewShape(shape, sizeOf(batchSize));
  return { kind: "view", shape: resolved, sourceShape: batchSize.slice() };
}
