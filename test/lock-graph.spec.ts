import { afterEach, describe, expect, it, vi } from "vitest";
import {
  LockedMutationError,
  ones,
  resetDebugFlags,
  stackTrees,
  TensorTree,
  zeros,
} from "../src";

const LOCK_MESSAGE = "Cannot modify locked tensortree. For in-place modification, consider using set_()";

function chain() {
  const parent = new TensorTree({ a: { b: { c: { leaf: zeros([2]) } } } }, { batchSize: [2] });
  return {
    parent,
    a: parent.getTree("a"),
    b: parent.getTree(["a", "b"]),
    c: parent.getTree(["a", "b", "c"]),
  };
}

describe("lock propagation", () => {
  it("counts one owner per locked ancestor", () => {
    const { parent, a, b, c } = chain();
    parent.lock_();
    expect([a.lockOwners.size, b.lockOwners.size, c.lockOwners.size]).toEqual([1, 2, 3]);
    expect(c.isLocked).toBe(true);
    parent.unlock_();
    expect([a.lockOwners.size, b.lockOwners.size, c.lockOwners.size]).toEqual([0, 0, 0]);
    expect(c.isLocked).toBe(false);
  });

  it("refuses to unlock a descendant of a locked tree", () => {
    const { parent, a } = chain();
    parent.lock_();
    expect(() => a.unlock_()).toThrow(
      "Cannot unlock a tensortree that is part of a locked graph. Unlock the root tensortree first.",
    );
    expect(a.isLocked).toBe(true);
  });

  it("keeps a child's own lock when the parent unlocks", () => {
    const { parent, a, b, c } = chain();
    a.lock_();
    parent.lock_();
    parent.unlock_();
    expect(a.isLocked).toBe(true);
    expect([a.lockOwners.size, b.lockOwners.size, c.lockOwners.size]).toEqual([0, 1, 2]);
    a.unlock_();
    expect([b.lockOwners.size, c.lockOwners.size]).toEqual([0, 0]);
    expect(c.isLocked).toBe(false);
  });

  it("drops a disposed root's ids without raising", () => {
    const { parent, a, b, c } = chain();
    parent.lock_();
    expect(() => parent.dispose()).not.toThrow();
    expect([a.lockOwners.size, b.lockOwners.size, c.lockOwners.size]).toEqual([0, 1, 2]);
    expect(a.isLocked).toBe(false);
    expect(b.isLocked).toBe(true);
  });

  it("locks the source through a view", () => {
    const tree = new TensorTree({ a: zeros([2, 3]) }, { batchSize: [2, 3] });
    const view = tree.transpose(0, 1);
    view.lock_();
    expect(tree.isLocked).toBe(true);
    expect(view.isLocked).toBe(true);
    view.unlock_();
    expect(tree.isLocked).toBe(false);
  });

  it("locks stacked siblings", () => {
    const t0 = new TensorTree({ a: zeros([2]) });
    const t1 = new TensorTree({ a: zeros([2]) });
    const stacked = stackTrees([t0, t1]);
    stacked.lock_();
    expect(t0.isLocked && t1.isLocked).toBe(true);
    expect(stacked.lockOwners.size).toBe(0);
    stacked.unlock_();
    expect(t0.isLocked).toBe(false);

    t0.lock_();
    expect(stacked.isLocked).toBe(false);
    t1.lock_();
    expect(stacked.isLocked).toBe(true);
  });
});

describe("locked mutations", () => {
  it("rejects structural changes and allows in-place writes", () => {
    const { parent, a } = chain();
    parent.lock_();
    expect(() => parent.set("x", zeros([2]))).toThrow(LOCK_MESSAGE);
    expect(() => parent.set(["a", "b", "c", "leaf"], zeros([2]))).toThrow(LockedMutationError);
    expect(() => a.set("x", zeros([2]))).toThrow(LockedMutationError);
    expect(() => parent.del("a")).toThrow(LockedMutationError);
    expect(() => parent.renameKey("a", "z")).toThrow(LockedMutationError);
    expect(() => parent.flattenKeys(".", { inplace: true })).toThrow(LockedMutationError);
    expect(() => {
      parent.batchSize = [];
    }).toThrow(LockedMutationError);
    expect(() => {
      parent.names = ["n"];
    }).toThrow(LockedMutationError);

    parent.set_(["a", "b", "c", "leaf"], ones([2]));
    parent.fill_(["a", "b", "c", "leaf"], 3);
    expect(parent.getLeaf(["a", "b", "c", "leaf"]).toArray()).toEqual([3, 3]);
  });

  it("scopes locks with withLock and withUnlocked", () => {
    const tree = new TensorTree({ a: zeros([2]) });
    expect(tree.withLock((t) => t.isLocked)).toBe(true);
    expect(tree.isLocked).toBe(false);

    tree.lock_();
    expect(tree.withUnlocked((t) => t.isLocked)).toBe(false);
    expect(tree.isLocked).toBe(true);
    expect(() =>
      tree.withUnlocked(() => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(tree.isLocked).toBe(true);
  });
});

describe("lock tracing", () => {
  afterEach(() => {
    delete process.env.TENSORTREE_DEBUG_LOCKS;
    resetDebugFlags();
    vi.restoreAllMocks();
  });

  it("logs lock events when enabled", () => {
    process.env.TENSORTREE_DEBUG_LOCKS = "1";
    resetDebugFlags();
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const tree = new TensorTree({ a: zeros([2]) });
    tree.lock_();
    expect(log).toHaveBeenCalledWith(`[lock-graph] lock #${tree.id}`);
  });
});
