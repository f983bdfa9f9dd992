/**
 * Error classes raised by tensor trees.
 *
 * `category` mirrors the familiar runtime/key/type/value/index split so
 * callers can branch on the kind of failure without matching every class.
 */

export type ErrorCategory =
  | "runtime"
  | "key"
  | "type"
  | "value"
  | "index"
  | "not-implemented";

export class TensorTreeError extends Error {
  name = "TensorTreeError";
  readonly category: ErrorCategory = "runtime";
}

export class ShapeMismatchError extends TensorTreeError {
  name = "ShapeMismatchError";
}

export class BatchSizeImmutableError extends TensorTreeError {
  name = "BatchSizeImmutableError";
}

export class KeyCollisionError extends TensorTreeError {
  name = "KeyCollisionError";
  override readonly category: ErrorCategory = "key";
}

export class KeyMissingError extends TensorTreeError {
  name = "KeyMissingError";
  override readonly category: ErrorCategory = "key";
}

export class HeterogeneousKeyError extends TensorTreeError {
  name = "HeterogeneousKeyError";
}

export class NonUniqueShapeError extends TensorTreeError {
  name = "NonUniqueShapeError";
}

export class LockedMutationError extends TensorTreeError {
  name = "LockedMutationError";
}

export class UnsupportedOnProxyError extends TensorTreeError {
  name = "UnsupportedOnProxyError";
  override readonly category: ErrorCategory;

  constructor(message: string, category: "runtime" | "not-implemented" = "runtime") {
    super(message);
    this.category = category;
  }
}

export class TypeMismatchError extends TensorTreeError {
  name = "TypeMismatchError";
  override readonly category: ErrorCategory = "type";
}

export class DeviceMismatchError extends TensorTreeError {
  name = "DeviceMismatchError";
  override readonly category: ErrorCategory = "value";
}

export class BatchSizeMismatchError extends TensorTreeError {
  name = "BatchSizeMismatchError";
  override readonly category: ErrorCategory = "value";
}

export class IndexOutOfRangeError extends TensorTreeError {
  name = "IndexOutOfRangeError";
  override readonly category: ErrorCategory = "index";
}

export class InvalidIndexError extends TensorTreeError {
  name = "InvalidIndexError";
}

export const LOCK_ERROR =
  "Cannot modify locked tensortree. For in-place modification, consider using set_()";

export const LAZY_BATCH_SIZE_ERROR =
  "modifying the batch size of a lazy representation of a tensortree is not permitted. " +
  "Consider instantiating the tensortree first by calling `tree.toTensorTree()` before resetting the batch size.";
