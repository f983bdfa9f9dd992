import { describe, expect, it } from "vitest";
import {
  arange,
  LockedMutationError,
  NonUniqueShapeError,
  ones,
  stackTrees,
  SubTree,
  tensor,
  TensorTree,
  UnsupportedOnProxyError,
  zeros,
} from "../src";

function container(): TensorTree {
  return new TensorTree(
    { key1: arange(60).view([4, 5, 3]), n: { b: zeros([4, 5]) } },
    { batchSize: [4, 5] },
  );
}

describe("SubTree", () => {
  it("writes in place into the parent", () => {
    const parent = new TensorTree({ key1: zeros([4, 3]) }, { batchSize: [4] });
    const sub = parent.getSubView(2);
    sub.set_("key1", tensor([1, 2, 3]));
    expect(parent.getLeaf("key1").index(2).toArray()).toEqual([1, 2, 3]);
    expect(parent.getLeaf("key1").index(1).toArray()).toEqual([0, 0, 0]);
    expect(() => sub.set("key1", tensor([4, 5, 6]))).toThrow(UnsupportedOnProxyError);
    sub.set("key1", tensor([4, 5, 6]), { inplace: true });
    expect(parent.getLeaf("key1").index(2).toArray()).toEqual([4, 5, 6]);
  });

  it("chains onto the top-most parent", () => {
    const parent = container();
    const sub = parent.getSubView(2);
    expect(sub).toBeInstanceOf(SubTree);
    expect(sub.batchSize).toEqual([5]);
    const inner = sub.getSubView(1);
    expect(inner.getParent()).toBe(parent);
    expect(inner.batchSize).toEqual([]);
    expect(inner.getLeaf("key1").toArray()).toEqual([33, 34, 35]);
    expect(inner.getTree("n")).toBeInstanceOf(SubTree);
  });

  it("writes nested leaves through the chain", () => {
    const parent = container();
    parent.getSubView(1).getSubView(3).fill_(["n", "b"], 2);
    const b = parent.getLeaf(["n", "b"]);
    expect(b.index([1, 3]).item()).toBe(2);
    expect(b.index([1, 2]).item()).toBe(0);
  });

  it("allocates new keys in the parent", () => {
    const parent = container();
    parent.getSubView(2).set("fresh", ones([5, 2]));
    const fresh = parent.getLeaf("fresh");
    expect(fresh.shape).toEqual([4, 5, 2]);
    expect(fresh.index(2).toArray()).toEqual(new Array<number>(10).fill(1));
    expect(fresh.index(0).toArray()).toEqual(new Array<number>(10).fill(0));
  });

  it("adds nothing to the parent when a nested insert fails", () => {
    const t0 = new TensorTree({ y: zeros([3]) }, { batchSize: [] });
    const t1 = new TensorTree({ y: zeros([4]) }, { batchSize: [] });
    const parent = new TensorTree({}, { batchSize: [3, 2] });
    expect(() => parent.getSubView(0).set("n", stackTrees([t0, t1]))).toThrow(NonUniqueShapeError);
    expect(parent.has("n")).toBe(false);
    expect(parent.keys().toArray()).toEqual([]);
  });

  it("deletes from the parent", () => {
    const parent = container();
    parent.getSubView(0).del("key1");
    expect(parent.has("key1")).toBe(false);
  });

  it("defers locking to the parent", () => {
    const parent = container();
    const sub = parent.getSubView(0);
    expect(() => sub.lock_()).toThrow("Cannot lock a SubTree; lock the parent tree instead");
    expect(() => sub.unlock_()).toThrow(LockedMutationError);
    parent.lock_();
    expect(sub.isLocked).toBe(true);
    expect(() => sub.set("other", zeros([5]))).toThrow(LockedMutationError);
    sub.fill_("key1", 1);
    expect(parent.getLeaf("key1").index(0).toArray()).toEqual(new Array<number>(15).fill(1));
  });

  it("cannot be memmapped", () => {
    expect(() => container().getSubView(0).memmap_()).toThrow(
      "Converting a sub-tree values to memmap cannot be done",
    );
  });

  it("carries the parent's names", () => {
    const parent = container();
    parent.names = ["row", "col"];
    expect(parent.getSubView(0).names).toEqual(["col"]);
  });
});
