import * as fs from "node:fs";

import { debugMemmap } from "../core/debug";
import { ShapeMismatchError } from "../core/errors";
import { allocate, type DType, fromBytes, toBytes, type TypedArray } from "./dtype";

let nextStorageId = 1;

function getNextStorageId(): number {
  return nextStorageId++;
}

/**
 * Shared backing buffer. Every view of a tensor points at the same Storage,
 * so identity of `storage.id` is identity of the underlying bytes.
 */
export interface Storage {
  readonly id: number;
  readonly dtype: DType;
  readonly length: number;
  /** Backing array; file-backed storages read their file on first access. */
  readonly data: TypedArray;
  /** Called after an in-place write touched elements [start, end). */
  commit(start?: number, end?: number): void;
  /** Path of the backing file, when there is one. */
  readonly filename: string | null;
}

export class MemoryStorage implements Storage {
  readonly id = getNextStorageId();
  readonly dtype: DType;
  readonly data: TypedArray;
  readonly filename = null;

  constructor(dtype: DType, data: TypedArray) {
    this.dtype = dtype;
    this.data = data;
  }

  static zeros(dtype: DType, length: number): MemoryStorage {
    return new MemoryStorage(dtype, allocate(dtype, length));
  }

  get length(): number {
    return this.data.length;
  }

  commit(): void {}
}

/**
 * Storage backed by a file of raw little-endian elements.
 *
 * The file is read synchronously the first time `data` is touched and the
 * contents are cached from then on; `reload` drops the cache so the next
 * access reads the file again. Writes are flushed synchronously in
 * `commit`, so other readers of the same file observe them once the call
 * returns.
 */
export class FileStorage implements Storage {
  readonly id = getNextStorageId();
  readonly dtype: DType;
  readonly length: number;
  readonly filename: string;
  private loaded: TypedArray | null = null;

  constructor(filename: string, dtype: DType, length: number) {
    this.filename = filename;
    this.dtype = dtype;
    this.length = length;
  }

  /** Write `data` to `filename` and return a storage opened on it. */
  static create(filename: string, dtype: DType, data: TypedArray): FileStorage {
    fs.writeFileSync(filename, toBytes(data));
    debugMemmap(`wrote ${data.byteLength} bytes to ${filename}`);
    return new FileStorage(filename, dtype, data.length);
  }

  get isLoaded(): boolean {
    return this.loaded !== null;
  }

  get data(): TypedArray {
    if (this.loaded === null) {
      const bytes = fs.readFileSync(this.filename);
      const data = fromBytes(this.dtype, bytes);
      if (data.length !== this.length) {
        throw new ShapeMismatchError(
          `memmap file ${this.filename} holds ${data.length} elements, expected ${this.length}`,
        );
      }
      debugMemmap(`loaded ${bytes.byteLength} bytes from ${this.filename}`);
      this.loaded = data;
    }
    return this.loaded;
  }

  /** Forget the cached contents. Unflushed writes are lost. */
  reload(): void {
    this.loaded = null;
  }

  commit(start = 0, end = this.length): void {
    const data = this.data;
    const lo = Math.max(0, start);
    const hi = Math.min(this.length, end);
    if (hi <= lo) return;
    const bytes = toBytes(data);
    const itemBytes = data.BYTES_PER_ELEMENT;
    const fd = fs.openSync(this.filename, "r+");
    try {
      fs.writeSync(fd, bytes, lo * itemBytes, (hi - lo) * itemBytes, lo * itemBytes);
    } finally {
      fs.closeSync(fd);
    }
  }
}
