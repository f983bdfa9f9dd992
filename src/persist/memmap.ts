/**
 * File-backed leaves.
 *
 * A memmapped tree is a directory: one raw `.bin` file per leaf, one
 * subdirectory per nested tree and a `meta.json` describing both. Stacked
 * trees keep one subdirectory per sibling, named by position.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { debugMemmap, memmapBaseDir } from "../core/debug";
import { UnsupportedOnProxyError } from "../core/errors";
import { sizeOf } from "../core/shape";
import { FileStorage } from "../tensor/storage";
import { Tensor } from "../tensor/tensor";
import {
  LazyStackedTree,
  type MemmapOptions,
  TensorTree,
  type TensorTreeBase,
  type TreeValue,
} from "../tree/internal";
import { type LeafMeta, META_FILE, MEMMAP_FORMAT, MEMMAP_VERSION, parseMeta, type TreeMeta } from "./meta";

const stackedPrefixes = new WeakMap<LazyStackedTree, string>();

/** A key as a single path segment; dots are escaped so "." and ".." stay inside `dir`. */
function escapeAtom(atom: string): string {
  return encodeURIComponent(atom).replace(/\./g, "%2E");
}

function leafFile(atom: string): string {
  return `${escapeAtom(atom)}.bin`;
}

function nestedDir(dir: string, atom: string): string {
  return path.join(dir, escapeAtom(atom));
}

function anonymousDir(): string {
  const base = memmapBaseDir() ?? os.tmpdir();
  fs.mkdirSync(base, { recursive: true });
  return fs.mkdtempSync(path.join(base, "tensortree-"));
}

function writeMeta(dir: string, meta: TreeMeta): void {
  fs.writeFileSync(path.join(dir, META_FILE), JSON.stringify(meta, null, 2));
}

function writeAny(tree: TensorTreeBase, dir: string): void {
  if (tree instanceof TensorTree) writeTree(tree, dir);
  else if (tree instanceof LazyStackedTree) writeStacked(tree, dir);
  else tree.memmap_({ prefix: dir, copyExisting: true });
}

function writeTree(tree: TensorTree, dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
  const leaves: Record<string, LeafMeta> = {};
  const nested: string[] = [];
  const keys = tree.atoms();
  for (const atom of keys) {
    const value = tree.getAtom(atom);
    if (value === undefined) continue;
    if (value instanceof Tensor) {
      const file = leafFile(atom);
      const storage = FileStorage.create(path.join(dir, file), value.dtype, value.clone().storage.data);
      tree._rebind(atom, new Tensor(storage, value.shape, undefined, 0, value.device));
      leaves[atom] = { shape: value.shape.slice(), dtype: value.dtype, file, device: value.device };
      continue;
    }
    let child: TensorTreeBase = value;
    if (!(child instanceof TensorTree) && !(child instanceof LazyStackedTree)) {
      child = value.toTensorTree();
      tree._rebind(atom, child);
    }
    writeAny(child, nestedDir(dir, atom));
    nested.push(atom);
  }
  writeMeta(dir, {
    format: MEMMAP_FORMAT,
    version: MEMMAP_VERSION,
    kind: "plain",
    batchSize: tree.batchSize,
    device: tree.device,
    names: tree.names,
    keys,
    leaves,
    nested,
  });
  tree.memmapPrefix = dir;
  debugMemmap(`memmapped tree with ${keys.length} keys to ${dir}`);
}

function writeStacked(tree: LazyStackedTree, dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
  const siblings = tree.tensortrees;
  siblings.forEach((sibling, i) => writeAny(sibling, path.join(dir, String(i))));
  writeMeta(dir, {
    format: MEMMAP_FORMAT,
    version: MEMMAP_VERSION,
    kind: "stacked",
    batchSize: tree.batchSize,
    device: tree.device,
    names: tree.names,
    keys: [],
    leaves: {},
    nested: [],
    stackDim: tree.stackDim,
    count: siblings.length,
  });
  stackedPrefixes.set(tree, dir);
  debugMemmap(`memmapped ${siblings.length} stacked trees to ${dir}`);
}

/**
 * Resolve where a tree already memmapped at `current` should go. Returns
 * null when there is nothing to do.
 */
function targetDir(current: string | null, options: MemmapOptions): string | null {
  const requested = options.prefix === undefined ? null : path.resolve(options.prefix);
  if (current === null) return requested ?? anonymousDir();
  if (requested === null || requested === current) return null;
  if (!options.copyExisting) {
    throw new UnsupportedOnProxyError(
      `tensortree already contains memmapped tensors at ${current}; pass copyExisting to copy them to ${requested}`,
    );
  }
  return requested;
}

export function memmapTree(tree: TensorTree, options: MemmapOptions): void {
  const dir = targetDir(tree.memmapPrefix, options);
  if (dir === null) return;
  writeTree(tree, dir);
  if (!tree.isLocked) tree.lock_();
}

export function memmapStacked(tree: LazyStackedTree, options: MemmapOptions): void {
  const dir = targetDir(stackedPrefixes.get(tree) ?? null, options);
  if (dir === null) return;
  writeStacked(tree, dir);
  if (!tree.isLocked) tree.lock_();
}

function readMeta(dir: string): TreeMeta {
  const file = path.join(dir, META_FILE);
  return parseMeta(fs.readFileSync(file, "utf8"), file);
}

function loadAny(dir: string): TensorTreeBase {
  const meta = readMeta(dir);
  if (meta.kind === "stacked") {
    const siblings = Array.from({ length: meta.count }, (_, i) => loadAny(path.join(dir, String(i))));
    const out = new LazyStackedTree(siblings, meta.stackDim);
    stackedPrefixes.set(out, dir);
    return out;
  }
  const entries = new Map<string, TreeValue>();
  for (const key of meta.keys) {
    const leaf = meta.leaves[key];
    if (leaf !== undefined) {
      const storage = new FileStorage(path.join(dir, leaf.file), leaf.dtype, sizeOf(leaf.shape));
      entries.set(key, new Tensor(storage, leaf.shape, undefined, 0, leaf.device));
    } else if (meta.nested.includes(key)) {
      entries.set(key, loadAny(nestedDir(dir, key)));
    }
  }
  const out = new TensorTree(entries, { batchSize: meta.batchSize, device: meta.device, names: meta.names });
  out.memmapPrefix = dir;
  return out;
}

/**
 * Open a memmapped tree. Each leaf reads its file on first access and keeps
 * the contents; call `reload()` on a leaf's `FileStorage` to read it again
 * after another writer changed it. The result is locked.
 */
export function loadMemmap(prefix: string): TensorTreeBase {
  const dir = path.resolve(prefix);
  const out = loadAny(dir);
  out.lock_();
  debugMemmap(`loaded ${dir}`);
  return out;
}
