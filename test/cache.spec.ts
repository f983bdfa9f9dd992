import { describe, expect, it } from "vitest";
import { TensorTree, zeros } from "../src";

function makeTree(): TensorTree {
  return new TensorTree({ a: zeros([2]), n: { "b.c": zeros([2]) } }, { batchSize: [2] });
}

describe("enumeration cache", () => {
  it("stays empty while unlocked", () => {
    const tree = makeTree();
    expect(tree.keys()).not.toBe(tree.keys());
    expect(tree.flattenKeys()).not.toBe(tree.flattenKeys());
    expect(tree.cacheSize).toBe(0);
  });

  it("returns identical results while locked", () => {
    const tree = makeTree().lock_();
    expect(tree.keys()).toBe(tree.keys());
    expect(tree.keys({ includeNested: true })).toBe(tree.keys({ includeNested: true }));
    expect(tree.values()).toBe(tree.values());
    expect(tree.items()).toBe(tree.items());
    expect(tree.sortedKeys).toBe(tree.sortedKeys);

    const flat = tree.flattenKeys();
    expect(tree.flattenKeys()).toBe(flat);
    expect(flat.isLocked).toBe(true);
    expect(tree.unflattenKeys()).toBe(tree.unflattenKeys());
  });

  it("keys entries by operation and options", () => {
    const tree = makeTree().lock_();
    tree.keys();
    void tree.sortedKeys;
    expect(tree.cacheEntries()).toEqual(["keys:nested=0:leaves=0", "sortedKeys"]);
    tree.flattenKeys("/");
    expect(tree.cacheEntries()).toContain("flatten:/");
  });

  it("empties on unlock, including nested trees", () => {
    const tree = makeTree().lock_();
    const nested = tree.getTree("n");
    expect(nested.keys()).toBe(nested.keys());
    tree.keys();
    expect(tree.cacheSize).toBeGreaterThan(0);
    expect(nested.cacheSize).toBeGreaterThan(0);

    tree.unlock_();
    expect(tree.cacheSize).toBe(0);
    expect(nested.cacheSize).toBe(0);
    expect(tree.keys()).not.toBe(tree.keys());
  });

  it("empties on dispose", () => {
    const tree = makeTree().lock_();
    tree.keys();
    tree.dispose();
    expect(tree.isDisposed).toBe(true);
    expect(tree.cacheSize).toBe(0);
  });
});
