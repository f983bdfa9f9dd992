import { describe, expect, it } from "vitest";
import {
  arange,
  BatchSizeImmutableError,
  IndexedTree,
  IndexOutOfRangeError,
  InvalidIndexError,
  NonUniqueShapeError,
  ones,
  PermutedTree,
  ShapeMismatchError,
  stackTrees,
  tensor,
  TensorTree,
  TransposedTree,
  ViewedTree,
  zeros,
} from "../src";

function makeTree(): TensorTree {
  return new TensorTree(
    { a: arange(24).view([2, 3, 4]), n: { b: arange(6).view([2, 3]) } },
    { batchSize: [2, 3] },
  );
}

describe("lazy view proxies", () => {
  it("maps leaves forward without copying", () => {
    const tree = makeTree();
    const p = tree.permute(1, 0);
    expect(p).toBeInstanceOf(PermutedTree);
    expect(p.batchSize).toEqual([3, 2]);
    const a = p.getLeaf("a");
    expect(a.shape).toEqual([3, 2, 4]);
    expect(a.sameStorage(tree.getLeaf("a"))).toBe(true);
    expect(p.getTree("n")).toBeInstanceOf(PermutedTree);
    expect(p.getLeaf(["n", "b"]).toNested()).toEqual([
      [0, 3],
      [1, 4],
      [2, 5],
    ]);
  });

  it("returns the source when a transform is undone", () => {
    const tree = makeTree();
    expect(tree.permute(1, 0).permute(1, 0)).toBe(tree);
    expect(tree.transpose(0, 1).transpose(1, 0)).toBe(tree);
    expect(tree.transpose(0, 1).transpose(0, 1)).toBe(tree);
    expect(tree.unsqueeze(0).squeeze(0)).toBe(tree);
    expect(tree.unsqueeze(0).squeeze()).toBe(tree);
    expect(tree.view(-1).view(2, 3)).toBe(tree);
  });

  it("returns this for no-op transforms", () => {
    const tree = makeTree();
    expect(tree.view(2, 3)).toBe(tree);
    expect(tree.squeeze(0)).toBe(tree);
    expect(tree.transpose(1, 1)).toBe(tree);
  });

  it("builds a new proxy for any other transform", () => {
    const tree = makeTree();
    const v = tree.view(3, 2);
    expect(v).toBeInstanceOf(ViewedTree);
    expect(v).not.toBe(tree);
    expect(v.getLeaf("a").shape).toEqual([3, 2, 4]);
    expect(tree.transpose(0, 1)).toBeInstanceOf(TransposedTree);
    expect(tree.view(-1).batchSize).toEqual([6]);
  });

  it("writes through to the source", () => {
    const tree = makeTree();
    const p = tree.permute(1, 0);
    p.fill_("a", 5);
    expect(tree.getLeaf("a").toArray()).toEqual(new Array<number>(24).fill(5));
    p.set_(["n", "b"], tensor([
      [1, 2],
      [3, 4],
      [5, 6],
    ]));
    expect(tree.getLeaf(["n", "b"]).toNested()).toEqual([
      [1, 3, 5],
      [2, 4, 6],
    ]);
  });

  it("inserts new keys in source coordinates", () => {
    const tree = makeTree();
    const p = tree.permute(1, 0);
    p.set("c", zeros([3, 2, 7]));
    expect(tree.getLeaf("c").shape).toEqual([2, 3, 7]);
    expect(() => p.set("d", zeros([2, 3]))).toThrow(ShapeMismatchError);
  });

  it("keeps the extra batch dims of nested trees", () => {
    const inner = new TensorTree({ b: zeros([4, 5, 6]) }, { batchSize: [4, 5, 6], names: [null, null, "k"] });
    const tree = new TensorTree({ n: inner }, { batchSize: [4, 5] });
    tree.names = ["r", "c"];
    const nested = tree.permute(1, 0).getTree("n");
    expect(nested.batchSize).toEqual([5, 4, 6]);
    expect(nested.names).toEqual(["c", "r", "k"]);
    expect(nested.getLeaf("b").shape).toEqual([5, 4, 6]);
    expect(nested.toTensorTree().batchSize).toEqual([5, 4, 6]);
  });

  it("has an immutable batch size", () => {
    const p = makeTree().permute(1, 0);
    expect(() => {
      p.batchSize = [6];
    }).toThrow(BatchSizeImmutableError);
  });

  it("maps names both ways", () => {
    const tree = makeTree();
    tree.names = ["x", "y"];
    const p = tree.permute(1, 0);
    expect(p.names).toEqual(["y", "x"]);
    p.names = ["q", "r"];
    expect(tree.names).toEqual(["r", "q"]);
  });

  it("rejects bad permutations", () => {
    const tree = makeTree();
    expect(() => tree.permute(0, 0)).toThrow(InvalidIndexError);
    expect(() => tree.permute(0)).toThrow("number of dims don't match in permute: got 1, expected 2");
    expect(() => tree.permute(0, 5)).toThrow(IndexOutOfRangeError);
  });

  it("indexes a proxy into a plain tree of views", () => {
    const tree = makeTree();
    const row = tree.permute(1, 0).at(0);
    expect(row).toBeInstanceOf(TensorTree);
    expect(row.batchSize).toEqual([2]);
    expect(row.getLeaf(["n", "b"]).toArray()).toEqual([0, 3]);
  });
});

describe("IndexedTree", () => {
  it("reads and writes at a basic index", () => {
    const tree = makeTree();
    const iv = tree.indexView(1);
    expect(iv).toBeInstanceOf(IndexedTree);
    expect(iv.batchSize).toEqual([3]);
    expect(iv.getLeaf(["n", "b"]).toArray()).toEqual([3, 4, 5]);
    iv.set_(["n", "b"], tensor([7, 8, 9]));
    expect(tree.getLeaf(["n", "b"]).toNested()).toEqual([
      [0, 1, 2],
      [7, 8, 9],
    ]);
  });

  it("writes through advanced indices", () => {
    const tree = makeTree();
    const iv = tree.indexView([
      [0, 1],
      [2, 0],
    ]);
    expect(iv.batchSize).toEqual([2]);
    iv.fill_("a", 9);
    const a = tree.getLeaf("a");
    expect(a.index([0, 2]).toArray()).toEqual([9, 9, 9, 9]);
    expect(a.index([1, 0]).toArray()).toEqual([9, 9, 9, 9]);
    expect(a.index([0, 0]).toArray()).toEqual([0, 1, 2, 3]);
  });

  it("allocates new keys in the source", () => {
    const tree = makeTree();
    tree.indexView(1).set("z", ones([3]));
    expect(tree.getLeaf("z").toNested()).toEqual([
      [0, 0, 0],
      [1, 1, 1],
    ]);
  });

  it("leaves the source untouched when a nested insert fails", () => {
    const t0 = new TensorTree({ y: zeros([3]) }, { batchSize: [] });
    const t1 = new TensorTree({ y: zeros([4]) }, { batchSize: [] });
    const ragged = stackTrees([t0, t1]);
    const tree = new TensorTree({}, { batchSize: [3, 2] });
    expect(() => tree.indexView(0).set("n", ragged)).toThrow(NonUniqueShapeError);
    expect(tree.has("n")).toBe(false);
  });
});
