import {
  BatchSizeMismatchError,
  DeviceMismatchError,
  KeyMissingError,
  ShapeMismatchError,
} from "../core/errors";
import { formatShape, normalizeDim, shapesEqual } from "../core/shape";
import { cat, padLeading } from "../tensor/ops";
import { Tensor } from "../tensor/tensor";
import { LazyStackedTree, TensorTree, type TensorTreeBase, type TreeValue } from "./internal";
import type { KeyPath } from "./keys";

/** Lazy stack along a new batch dim; leaves stay in the siblings. */
export function stackTrees(trees: readonly TensorTreeBase[], dim = 0): LazyStackedTree {
  return new LazyStackedTree(trees, dim);
}

/** Stack into a fresh plain tree. */
export function denseStackTrees(trees: readonly TensorTreeBase[], dim = 0): TensorTree {
  return stackTrees(trees, dim).toTensorTree();
}

function describePath(path: KeyPath): string {
  return path.map((atom) => `"${atom}"`).join(" / ");
}

function catAt(trees: readonly TensorTreeBase[], dim: number, prefix: KeyPath): TensorTree {
  const [first] = trees;
  const batchSize = first.batchSize;
  batchSize[dim] = trees.reduce((acc, tree) => acc + tree.batchSize[dim], 0);
  const entries = new Map<string, TreeValue>();
  for (const atom of first.atoms()) {
    const path = [...prefix, atom];
    const values = trees.map((tree) => {
      const value = tree.getAtom(atom);
      if (value === undefined) {
        throw new KeyMissingError(`key ${describePath(path)} is missing from a tensortree passed to catTrees`);
      }
      return value;
    });
    const leaves = values.filter((v): v is Tensor => v instanceof Tensor);
    if (leaves.length === values.length) {
      if (leaves.some((leaf) => leaf.device !== leaves[0].device)) {
        throw new DeviceMismatchError(`tensors on different devices at key ${describePath(path)}`);
      }
      entries.set(atom, cat(leaves, dim));
      continue;
    }
    const nested = values.filter((v): v is TensorTreeBase => !(v instanceof Tensor));
    if (nested.length !== values.length) {
      throw new ShapeMismatchError(`key ${describePath(path)} mixes leaves and tensortrees`);
    }
    entries.set(atom, catAt(nested, dim, path));
  }
  return new TensorTree(entries, { batchSize, device: first.device });
}

/** Concatenate along an existing batch dim into a fresh plain tree. */
export function catTrees(trees: readonly TensorTreeBase[], dim = 0): TensorTree {
  if (trees.length === 0) {
    throw new BatchSizeMismatchError("catTrees expects a non-empty list of tensortrees");
  }
  const reference = trees[0].batchSize;
  const d = normalizeDim(dim, reference.length);
  for (const tree of trees) {
    const a = reference.filter((_, i) => i !== d);
    const b = tree.batchSize.filter((_, i) => i !== d);
    if (tree.batchSize.length !== reference.length || !shapesEqual(a, b)) {
      throw new BatchSizeMismatchError(
        `Batch sizes in tensortrees differ outside dim ${d}: ${formatShape(reference)} and ${formatShape(tree.batchSize)}`,
      );
    }
  }
  return catAt(trees, d, []);
}

/**
 * Pad the leading batch dims; `pads` is [left0, right0, left1, right1, ...].
 */
export function pad(tree: TensorTreeBase, pads: readonly number[], value = 0): TensorTree {
  if (pads.length % 2 !== 0 || pads.length / 2 > tree.batchSize.length) {
    throw new ShapeMismatchError(
      `pad expects an even number of pads covering at most the batch dims ${formatShape(tree.batchSize)}, got ${pads.length}`,
    );
  }
  const padShape = (shape: readonly number[]): number[] =>
    shape.map((size, i) => (i < pads.length / 2 ? size + pads[2 * i] + pads[2 * i + 1] : size));
  const entries = new Map<string, TreeValue>();
  for (const atom of tree.atoms()) {
    const entry = tree.getAtom(atom);
    if (entry instanceof Tensor) entries.set(atom, padLeading(entry, pads, value));
    else if (entry !== undefined) entries.set(atom, pad(entry, pads, value));
  }
  return new TensorTree(entries, { batchSize: padShape(tree.batchSize), device: tree.device });
}
