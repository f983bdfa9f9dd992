import { DeviceMismatchError, ShapeMismatchError } from "../core/errors";
import { formatShape, normalizeDim, shapesEqual, sizeOf } from "../core/shape";
import { allocate, castValue, type DType, promoteTypes } from "./dtype";
import { MemoryStorage } from "./storage";
import { forEachOffset, Tensor } from "./tensor";

function commonDType(tensors: readonly Tensor[]): DType {
  return tensors.reduce<DType>((acc, t) => promoteTypes(acc, t.dtype), tensors[0].dtype);
}

function checkDevices(tensors: readonly Tensor[], op: string): void {
  const device = tensors[0].device;
  for (const t of tensors) {
    if (t.device !== device) {
      throw new DeviceMismatchError(`${op}: expected all tensors on ${device}, got ${t.device}`);
    }
  }
}

/**
 * Concatenate along an existing dim into fresh storage.
 */
export function cat(tensors: readonly Tensor[], dim = 0): Tensor {
  if (tensors.length === 0) {
    throw new ShapeMismatchError("cat expects a non-empty list of tensors");
  }
  checkDevices(tensors, "cat");
  const first = tensors[0];
  const d = normalizeDim(dim, first.ndim);
  for (const t of tensors) {
    const a = first.shape.filter((_, i) => i !== d);
    const b = t.shape.filter((_, i) => i !== d);
    if (t.ndim !== first.ndim || !shapesEqual(a, b)) {
      throw new ShapeMismatchError(
        `cat: sizes of tensors must match except in dimension ${d}, ` +
          `got ${formatShape(first.shape)} and ${formatShape(t.shape)}`,
      );
    }
  }
  const dtype = commonDType(tensors);
  const outShape = first.shape.slice();
  outShape[d] = tensors.reduce((acc, t) => acc + t.shape[d], 0);
  const out = allocate(dtype, sizeOf(outShape));

  // Row-major: each outer block holds the per-tensor slabs back to back.
  const inner = sizeOf(outShape.slice(d + 1));
  let slabStart = 0;
  for (const t of tensors) {
    const slab = t.shape[d] * inner;
    const src = t.storage.data;
    const convert = t.dtype !== dtype;
    forEachOffset(t.shape, t.strides, t.offset, (off, linear) => {
      const block = Math.floor(linear / slab);
      const within = linear - block * slab;
      const value = src[off];
      out[block * outShape[d] * inner + slabStart + within] = convert
        ? castValue(value, dtype)
        : value;
    });
    slabStart += slab;
  }
  return new Tensor(new MemoryStorage(dtype, out), outShape, undefined, 0, first.device);
}

/**
 * Stack along a new dim; all shapes must be equal.
 */
export function stack(tensors: readonly Tensor[], dim = 0): Tensor {
  if (tensors.length === 0) {
    throw new ShapeMismatchError("stack expects a non-empty list of tensors");
  }
  const shape = tensors[0].shape;
  for (const t of tensors) {
    if (!shapesEqual(t.shape, shape)) {
      throw new ShapeMismatchError(
        `stack expects each tensor to be equal size, but got ${formatShape(shape)} ` +
          `and ${formatShape(t.shape)}`,
      );
    }
  }
  const d = normalizeDim(dim, shape.length, 1);
  return cat(
    tensors.map((t) => t.unsqueeze(d)),
    d,
  );
}

/**
 * Pad the leading dims: `pads` is [left0, right0, left1, right1, ...].
 */
export function padLeading(t: Tensor, pads: readonly number[], value = 0): Tensor {
  if (pads.length % 2 !== 0 || pads.length / 2 > t.ndim) {
    throw new ShapeMismatchError(
      `pad: expected an even number of pads covering at most ${t.ndim} dims, got ${pads.length}`,
    );
  }
  const outShape = t.shape.slice();
  const starts = new Array<number>(t.ndim).fill(0);
  for (let i = 0; i < pads.length / 2; i++) {
    const left = pads[2 * i];
    const right = pads[2 * i + 1];
    if (left < 0 || right < 0) {
      throw new ShapeMismatchError("pad: negative padding is not supported");
    }
    outShape[i] = t.shape[i] + left + right;
    starts[i] = left;
  }
  const out = new Tensor(
    new MemoryStorage(t.dtype, allocate(t.dtype, sizeOf(outShape))),
    outShape,
    undefined,
    0,
    t.device,
  );
  out.fill_(value);
  let region = out;
  for (let i = 0; i < t.ndim; i++) region = region.narrow(i, starts[i], t.shape[i]);
  region.copy_(t);
  return out;
}
