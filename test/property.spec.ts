import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { type KeyPath, stackTrees, TensorTree, type TensorTreeBase, zeros } from "../src";

const atomArb = fc.constantFrom("a", "b", "c", "d");
const pathArb = fc.array(atomArb, { minLength: 1, maxLength: 3 });

function isPrefix(p: KeyPath, q: KeyPath): boolean {
  return p.length <= q.length && p.every((atom, i) => atom === q[i]);
}

/** Paths where none is a prefix of another, so each can hold a leaf. */
function leafPaths(paths: KeyPath[]): KeyPath[] {
  const kept: KeyPath[] = [];
  for (const p of paths) {
    if (kept.every((q) => !isPrefix(p, q) && !isPrefix(q, p))) kept.push(p);
  }
  return kept;
}

function buildTree(paths: KeyPath[]): TensorTree {
  const tree = new TensorTree({}, { batchSize: [2] });
  for (const p of paths) tree.set(p, zeros([2]));
  return tree;
}

function sortedLeafKeys(tree: TensorTreeBase): string[] {
  return tree
    .keys({ includeNested: true, leavesOnly: true })
    .toPaths()
    .map((p) => p.join("/"))
    .sort();
}

describe("key flattening properties", () => {
  it("unflattenKeys inverts flattenKeys", () => {
    fc.assert(
      fc.property(fc.array(pathArb, { minLength: 1, maxLength: 8 }), (raw) => {
        const tree = buildTree(leafPaths(raw));
        const back = tree.flattenKeys().unflattenKeys();
        expect(sortedLeafKeys(back)).toEqual(sortedLeafKeys(tree));
      }),
    );
  });

  it("flattenKeys is idempotent", () => {
    fc.assert(
      fc.property(fc.array(pathArb, { minLength: 1, maxLength: 8 }), (raw) => {
        const flat = buildTree(leafPaths(raw)).flattenKeys();
        expect(flat.flattenKeys().keys().toArray()).toEqual(flat.keys().toArray());
      }),
    );
  });
});

describe("batch shape properties", () => {
  const batchArb = fc.array(fc.integer({ min: 1, max: 3 }), { minLength: 0, maxLength: 2 });

  it("stacking inserts the count at the stack dim", () => {
    fc.assert(
      fc.property(
        batchArb,
        fc.integer({ min: 1, max: 4 }),
        fc.nat(),
        (batch, count, rawDim) => {
          const dim = rawDim % (batch.length + 1);
          const trees = Array.from(
            { length: count },
            () => new TensorTree({ x: zeros([...batch, 2]) }, { batchSize: batch }),
          );
          const expected = batch.slice();
          expected.splice(dim, 0, count);
          const stacked = stackTrees(trees, dim);
          expect(stacked.batchSize).toEqual(expected);
          expect(stacked.getLeaf("x").shape).toEqual([...expected, 2]);
        },
      ),
    );
  });

  it("a permutation followed by its inverse returns the source", () => {
    const caseArb = fc
      .array(fc.integer({ min: 1, max: 3 }), { minLength: 2, maxLength: 3 })
      .chain((batch) =>
        fc
          .shuffledSubarray(
            batch.map((_, i) => i),
            { minLength: batch.length, maxLength: batch.length },
          )
          .map((perm) => ({ batch, perm })),
      );
    fc.assert(
      fc.property(caseArb, ({ batch, perm }) => {
        const tree = new TensorTree({ x: zeros([...batch, 2]) }, { batchSize: batch });
        const inverse = new Array<number>(perm.length);
        perm.forEach((p, i) => {
          inverse[p] = i;
        });
        const permuted = tree.permute(perm);
        expect(permuted.getLeaf("x").shape).toEqual([...perm.map((p) => batch[p]), 2]);
        expect(permuted.permute(inverse)).toBe(tree);
      }),
    );
  });
});
