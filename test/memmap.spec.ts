import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  FileStorage,
  LazyStackedTree,
  loadMemmap,
  ShapeMismatchError,
  stackTrees,
  type Storage,
  tensor,
  TensorTree,
  TypeMismatchError,
  UnsupportedOnProxyError,
  zeros,
} from "../src";

let root: string;

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), "tensortree-test-"));
});

afterEach(() => {
  delete process.env.TENSORTREE_MEMMAP_DIR;
  fs.rmSync(root, { recursive: true, force: true });
});

function makeTree(): TensorTree {
  return new TensorTree(
    { a: tensor([[1, 2], [3, 4]]), n: { b: tensor([1.5, 2.5]) } },
    { batchSize: [2], names: ["row"] },
  );
}

function fileStorage(storage: Storage): FileStorage {
  if (!(storage instanceof FileStorage)) throw new Error("expected a file-backed storage");
  return storage;
}

function isLoaded(storage: Storage): boolean {
  return fileStorage(storage).isLoaded;
}

describe("memmap_", () => {
  it("writes one file per leaf and locks the tree", () => {
    const dir = path.join(root, "tree");
    const tree = makeTree().memmap_({ prefix: dir });
    expect(tree.isMemmap()).toBe(true);
    expect(tree.isLocked).toBe(true);
    expect(fs.existsSync(path.join(dir, "meta.json"))).toBe(true);
    expect(fs.statSync(path.join(dir, "a.bin")).size).toBe(16);
    expect(fs.existsSync(path.join(dir, "n", "b.bin"))).toBe(true);
    expect(tree.getLeaf("a").storage.filename).toBe(path.join(dir, "a.bin"));
  });

  it("round-trips through loadMemmap with lazy leaves", () => {
    const dir = path.join(root, "tree");
    const tree = makeTree().memmap_({ prefix: dir });
    const loaded = loadMemmap(dir);
    expect(loaded).toBeInstanceOf(TensorTree);
    expect(loaded.isLocked).toBe(true);
    expect(loaded.names).toEqual(["row"]);

    const a = loaded.getLeaf("a");
    expect(isLoaded(a.storage)).toBe(false);
    expect(a.toNested()).toEqual([
      [1, 2],
      [3, 4],
    ]);
    expect(isLoaded(a.storage)).toBe(true);
    expect(loaded.getLeaf(["n", "b"]).toArray()).toEqual([1.5, 2.5]);
    expect(loaded.getLeaf(["n", "b"]).dtype).toBe("f32");
    expect(loaded.equals(tree)).toBe(true);
  });

  it("persists in-place writes", () => {
    const dir = path.join(root, "tree");
    const tree = makeTree().memmap_({ prefix: dir });
    tree.fill_("a", 9);
    tree.setAt_(["n", "b"], 7, 1);
    const loaded = TensorTree.loadMemmap(dir);
    expect(loaded.getLeaf("a").toArray()).toEqual([9, 9, 9, 9]);
    expect(loaded.getLeaf(["n", "b"]).toArray()).toEqual([1.5, 7]);
  });

  it("is a no-op for the same prefix", () => {
    const dir = path.join(root, "tree");
    const tree = makeTree().memmap_({ prefix: dir });
    const a = tree.get("a");
    tree.memmap_({ prefix: dir });
    tree.memmap_();
    expect(tree.get("a")).toBe(a);
  });

  it("copies to a new prefix only when asked", () => {
    const first = path.join(root, "first");
    const second = path.join(root, "second");
    const tree = makeTree().memmap_({ prefix: first });
    expect(() => tree.memmap_({ prefix: second })).toThrow(UnsupportedOnProxyError);
    tree.memmap_({ prefix: second, copyExisting: true });
    expect(tree.getLeaf("a").storage.filename).toBe(path.join(second, "a.bin"));
    expect(loadMemmap(second).equals(makeTree())).toBe(true);
  });

  it("creates an anonymous directory without a prefix", () => {
    process.env.TENSORTREE_MEMMAP_DIR = root;
    const tree = makeTree().memmap_();
    const file = tree.getLeaf("a").storage.filename;
    expect(file).not.toBeNull();
    expect(path.dirname(file ?? "").startsWith(path.join(root, "tensortree-"))).toBe(true);
  });

  it("memmapLike allocates zeros on disk", () => {
    const dir = path.join(root, "like");
    const like = makeTree().memmapLike(dir);
    expect(like.isMemmap()).toBe(true);
    expect(like.isLocked).toBe(true);
    expect(like.getLeaf("a").toArray()).toEqual([0, 0, 0, 0]);
    expect(like.getLeaf("a").dtype).toBe("i32");
    expect(loadMemmap(dir).getLeaf(["n", "b"]).toArray()).toEqual([0, 0]);
  });

  it("memmaps the source of a view", () => {
    const tree = makeTree();
    tree.unsqueeze(0).memmap_({ prefix: path.join(root, "view") });
    expect(tree.isMemmap()).toBe(true);
  });

  it("materializes nested views", () => {
    const inner = new TensorTree({ x: zeros([3, 2]) }, { batchSize: [3, 2] });
    const outer = new TensorTree({ v: inner.transpose(0, 1) }, { batchSize: [2, 3] });
    outer.memmap_({ prefix: path.join(root, "outer") });
    expect(outer.get("v")).toBeInstanceOf(TensorTree);
    expect(outer.getLeaf(["v", "x"]).shape).toEqual([2, 3]);
    expect(inner.isMemmap()).toBe(false);
  });

  it("round-trips stacked trees", () => {
    const dir = path.join(root, "stacked");
    const t0 = new TensorTree({ a: tensor([1, 2]) }, { batchSize: [2] });
    const t1 = new TensorTree({ a: tensor([3, 4]) }, { batchSize: [2] });
    const stacked = stackTrees([t0, t1]).memmap_({ prefix: dir });
    expect(t0.isMemmap() && t1.isMemmap()).toBe(true);
    expect(stacked.isLocked).toBe(true);
    expect(fs.existsSync(path.join(dir, "1", "a.bin"))).toBe(true);

    const loaded = loadMemmap(dir);
    expect(loaded).toBeInstanceOf(LazyStackedTree);
    expect(loaded.getLeaf("a").toNested()).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it("rejects invalid metadata", () => {
    const dir = path.join(root, "bad");
    const file = path.join(dir, "meta.json");
    fs.mkdirSync(dir);
    fs.writeFileSync(file, JSON.stringify({ format: "other" }));
    expect(() => loadMemmap(dir)).toThrow(TypeMismatchError);
    expect(() => loadMemmap(dir)).toThrow(
      `invalid memmap metadata in ${file}: format: unknown memmap format; version: unsupported memmap version`,
    );
    fs.writeFileSync(file, "{");
    expect(() => loadMemmap(dir)).toThrow(TypeMismatchError);
  });

  it("rejects leaf files outside the tree directory", () => {
    const dir = path.join(root, "tree");
    makeTree().memmap_({ prefix: dir });
    const file = path.join(dir, "meta.json");
    fs.writeFileSync(file, fs.readFileSync(file, "utf8").replace('"file": "a.bin"', '"file": "../a.bin"'));
    expect(() => loadMemmap(dir)).toThrow(
      `invalid memmap metadata in ${file}: leaves.a.file: leaf file must be a .bin name in the same directory`,
    );
  });

  it("requires the stack fields on stacked metadata", () => {
    const dir = path.join(root, "stacked");
    stackTrees([makeTree(), makeTree()]).memmap_({ prefix: dir });
    const file = path.join(dir, "meta.json");
    fs.writeFileSync(file, fs.readFileSync(file, "utf8").replace('"count": 2', '"count": 0'));
    expect(() => loadMemmap(dir)).toThrow(TypeMismatchError);
    expect(() => loadMemmap(dir)).toThrow(`invalid memmap metadata in ${file}: count:`);
  });

  it("keeps keys that look like relative paths inside the prefix", () => {
    const dir = path.join(root, "inner");
    const tree = new TensorTree(
      { ".": { b: tensor([1, 2]) }, "..": { c: tensor([3, 4]) }, x: tensor([5, 6]) },
      { batchSize: [2] },
    );
    tree.memmap_({ prefix: dir });
    expect(fs.readdirSync(root)).toEqual(["inner"]);
    expect(fs.readdirSync(dir).sort()).toEqual(["%2E", "%2E%2E", "meta.json", "x.bin"]);

    const loaded = loadMemmap(dir);
    expect(loaded.keys().toArray()).toEqual([".", "..", "x"]);
    expect(loaded.getLeaf([".", "b"]).toArray()).toEqual([1, 2]);
    expect(loaded.getLeaf(["..", "c"]).toArray()).toEqual([3, 4]);
  });

  it("reports a leaf file of the wrong length", () => {
    const dir = path.join(root, "tree");
    makeTree().memmap_({ prefix: dir });
    const bin = path.join(dir, "a.bin");
    fs.truncateSync(bin, 8);
    const a = loadMemmap(dir).getLeaf("a");
    expect(() => a.toArray()).toThrow(ShapeMismatchError);
    expect(() => a.toArray()).toThrow(`memmap file ${bin} holds 2 elements, expected 4`);
  });

  it("rereads a leaf file after reload", () => {
    const dir = path.join(root, "tree");
    const writer = makeTree().memmap_({ prefix: dir });
    const reader = loadMemmap(dir);
    const a = reader.getLeaf("a");
    expect(a.toArray()).toEqual([1, 2, 3, 4]);

    writer.fill_("a", 9);
    expect(a.toArray()).toEqual([1, 2, 3, 4]);
    fileStorage(a.storage).reload();
    expect(isLoaded(a.storage)).toBe(false);
    expect(a.toArray()).toEqual([9, 9, 9, 9]);
  });
});
