// Tree classes must load through the internal barrel first.
export {
  type MemmapOptions,
  type NestedKeyInputPair,
  type PlainObject,
  type SetOptions,
  type TreeCastOptions,
  type TreeInput,
  type TreeObject,
  type TreeOptions,
  type TreeSource,
  type TreeValue,
  IndexedTree,
  LazyStackedTree,
  LazyViewTree,
  PermutedTree,
  SqueezedTree,
  SubTree,
  TensorTree,
  TensorTreeBase,
  TransposedTree,
  UnsqueezedTree,
  ViewedTree,
} from "./tree/internal";
export { catTrees, denseStackTrees, pad, stackTrees } from "./tree/functional";
export { type KeysOptions, KeysView, type NestedKey, type KeyPath, formatKey, unravelKey } from "./tree/keys";
export type { DimNames } from "./tree/invariants";
export type { ViewKind, ViewTransform } from "./tree/transforms";
export { loadMemmap } from "./persist/memmap";

export {
  type ErrorCategory,
  BatchSizeImmutableError,
  BatchSizeMismatchError,
  DeviceMismatchError,
  HeterogeneousKeyError,
  IndexOutOfRangeError,
  InvalidIndexError,
  KeyCollisionError,
  KeyMissingError,
  LockedMutationError,
  NonUniqueShapeError,
  ShapeMismatchError,
  TensorTreeError,
  TypeMismatchError,
  UnsupportedOnProxyError,
} from "./core/errors";
export { resetDebugFlags } from "./core/debug";
export { type Shape, broadcastShapes, shapesEqual } from "./core/shape";

export { type CastOptions, type NestedArray, Tensor } from "./tensor/tensor";
export { type CreateOptions, type NestedInput, arange, full, ones, rand, tensor, zeros, zerosLike } from "./tensor/creation";
export { cat, padLeading, stack } from "./tensor/ops";
export { type DType, DTYPES } from "./tensor/dtype";
export { type DeviceId, DEFAULT_DEVICE, parseDevice } from "./tensor/device";
export { FileStorage, MemoryStorage, type Storage } from "./tensor/storage";
export {
  type IndexExpr,
  type IndexItem,
  type IndexSource,
  ELLIPSIS,
  Slice,
  slice,
} from "./tensor/indexing";
