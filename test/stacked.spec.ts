import { describe, expect, it } from "vitest";
import {
  BatchSizeImmutableError,
  BatchSizeMismatchError,
  DeviceMismatchError,
  HeterogeneousKeyError,
  KeyMissingError,
  LazyStackedTree,
  LockedMutationError,
  NonUniqueShapeError,
  slice,
  stackTrees,
  tensor,
  TensorTree,
  TypeMismatchError,
  UnsupportedOnProxyError,
  zeros,
} from "../src";

function pair(): [TensorTree, TensorTree] {
  const t0 = new TensorTree(
    { a: tensor([[1, 2], [3, 4]]), n: { b: tensor([1, 2]) } },
    { batchSize: [2] },
  );
  const t1 = new TensorTree(
    { a: tensor([[5, 6], [7, 8]]), n: { b: tensor([3, 4]) } },
    { batchSize: [2] },
  );
  return [t0, t1];
}

describe("LazyStackedTree", () => {
  it("stacks leaves on read", () => {
    const [t0, t1] = pair();
    const s = stackTrees([t0, t1]);
    expect(s.batchSize).toEqual([2, 2]);
    expect(s.getLeaf("a").toNested()).toEqual([
      [
        [1, 2],
        [3, 4],
      ],
      [
        [5, 6],
        [7, 8],
      ],
    ]);
    expect(s.getTree("n")).toBeInstanceOf(LazyStackedTree);
    expect(s.getLeaf(["n", "b"]).toNested()).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it("stacks along an inner dim", () => {
    const [t0, t1] = pair();
    const s = stackTrees([t0, t1], 1);
    expect(s.batchSize).toEqual([2, 2]);
    expect(s.getLeaf(["n", "b"]).toNested()).toEqual([
      [1, 3],
      [2, 4],
    ]);
  });

  it("validates siblings", () => {
    const [t0] = pair();
    expect(() => stackTrees([])).toThrow("cannot stack an empty list of tensortrees");
    const longer = new TensorTree({ a: zeros([3]) }, { batchSize: [3] });
    expect(() => stackTrees([t0, longer])).toThrow(BatchSizeMismatchError);
    expect(() => stackTrees([t0, longer])).toThrow("Batch sizes in tensortrees differ: [2] and [3]");
    const cpu = new TensorTree({ a: zeros([2]) }, { batchSize: [2], device: "cpu" });
    const mock = new TensorTree({ a: zeros([2]) }, { batchSize: [2], device: "mock:0" });
    expect(() => stackTrees([cpu, mock])).toThrow(DeviceMismatchError);
    expect(() => stackTrees([cpu, mock])).toThrow("Devices differ: cpu and mock:0");
  });

  it("discovers keys added to every sibling on read", () => {
    const [t0, t1] = pair();
    const s = stackTrees([t0, t1]);
    expect(s.keys().toArray()).toEqual(["a", "n"]);

    t0.set("x", zeros([2]));
    expect(() => s.get("x")).toThrow(HeterogeneousKeyError);
    expect(() => s.get("zzz")).toThrow(KeyMissingError);

    t1.set("x", zeros([2]));
    expect(s.atoms()).toEqual(["a", "n"]);
    expect(s.has("x")).toBe(true);
    expect(s.atoms()).toEqual(["a", "n", "x"]);
  });

  it("rejects leaves of different shapes", () => {
    const [t0, t1] = pair();
    t0.set("y", zeros([2, 3]));
    t1.set("y", zeros([2, 4]));
    expect(() => stackTrees([t0, t1]).get("y")).toThrow(NonUniqueShapeError);
  });

  it("returns the per-sibling leaves", () => {
    const [t0, t1] = pair();
    const leaves = stackTrees([t0, t1]).getNestedTensor("a");
    expect(leaves[0]).toBe(t0.get("a"));
    expect(leaves[1]).toBe(t1.get("a"));
    expect(() => stackTrees([t0, t1], 1).getNestedTensor("a")).toThrow(UnsupportedOnProxyError);
  });

  it("unbinds writes into the siblings", () => {
    const [t0, t1] = pair();
    const s = stackTrees([t0, t1]);
    s.set("z", tensor([[1, 2], [3, 4]]));
    expect(t0.getLeaf("z").toArray()).toEqual([1, 2]);
    expect(t1.getLeaf("z").toArray()).toEqual([3, 4]);
    expect(s.atoms()).toContain("z");

    s.fill_("a", 7);
    expect(t1.getLeaf("a").toArray()).toEqual([7, 7, 7, 7]);
    s.set_(["n", "b"], zeros([2, 2]));
    expect(t0.getLeaf(["n", "b"]).toArray()).toEqual([0, 0]);
  });

  it("inserts trees with a matching batch size", () => {
    const c0 = new TensorTree({ a: zeros([4]) }, { batchSize: [4] });
    const c1 = new TensorTree({ a: zeros([4]) }, { batchSize: [4] });
    const c2 = new TensorTree({ a: zeros([4]) }, { batchSize: [4] });
    const s = stackTrees([c0, c1], 1);
    expect(s.batchSize).toEqual([4, 2]);
    s.insert(0, c2);
    expect(s.batchSize[1]).toBe(3);
    expect(s.tensortrees[0]).toBe(c2);

    const c3 = new TensorTree({ a: zeros([5]) }, { batchSize: [5] });
    expect(() => s.insert(0, c3)).toThrow(BatchSizeMismatchError);
    expect(() => s.append(zeros([4]))).toThrow("Expected new value to be a TensorTreeBase instance");
    s.lock_();
    expect(() => s.append(c3)).toThrow(LockedMutationError);
  });

  it("rejects inserted trees on another device", () => {
    const c0 = new TensorTree({ a: zeros([2]) }, { batchSize: [2], device: "cpu" });
    const c1 = new TensorTree({ a: zeros([2]) }, { batchSize: [2], device: "cpu" });
    const s = stackTrees([c0, c1]);
    const mock = new TensorTree({ a: zeros([2]) }, { batchSize: [2], device: "mock:0" });
    expect(() => s.insert(1, mock)).toThrow(DeviceMismatchError);
    expect(() => s.append(mock)).toThrow("Devices differ: cpu and mock:0");
    expect(s.tensortrees.length).toBe(2);
    expect(s.tensortrees[1]).toBe(c1);
    expect(s.batchSize).toEqual([2, 2]);
  });

  it("returns siblings for indexing along the stack dim", () => {
    const [t0, t1] = pair();
    const s = stackTrees([t0, t1]);
    expect(s.unbind(0)[0]).toBe(t0);
    expect(s.at(1)).toBe(t1);
    expect(s.containsTree(t0)).toBe(true);

    const first = s.at(slice(0, 1));
    expect(first).toBeInstanceOf(LazyStackedTree);
    expect(first.batchSize).toEqual([1, 2]);

    const column = s.at([slice(), 0]);
    expect(column.batchSize).toEqual([2]);
    expect(column.getLeaf("a").toNested()).toEqual([
      [1, 2],
      [5, 6],
    ]);
  });

  it("names the non-stack dims through the siblings", () => {
    const [t0, t1] = pair();
    const s = stackTrees([t0, t1]);
    s.names = [null, "x"];
    expect(t0.names).toEqual(["x"]);
    expect(t1.names).toEqual(["x"]);
    expect(s.names).toEqual([null, "x"]);
    expect(() => {
      s.names = ["s", null];
    }).toThrow(UnsupportedOnProxyError);
    expect(() => {
      s.batchSize = [4];
    }).toThrow(BatchSizeImmutableError);
  });

  it("materializes into a plain tree", () => {
    const [t0, t1] = pair();
    const dense = stackTrees([t0, t1]).toTensorTree();
    expect(dense).toBeInstanceOf(TensorTree);
    expect(dense.getLeaf(["n", "b"]).toNested()).toEqual([
      [1, 2],
      [3, 4],
    ]);
    expect(() => dense.getLeaf("missing")).toThrow(KeyMissingError);
    expect(() => dense.getLeaf("n")).toThrow(TypeMismatchError);
  });
});
