function mix32(value: number): number {
  let v = value >>> 0;
  v ^= v >>> 16;
  v = Math.imul(v, 0x7feb352d);
  v ^= v >>> 15;
  v = Math.imul(v, 0x846ca68b);
  v ^= v >>> 16;
  return v >>> 0;
}

/**
 * Deterministic uniform value in [0, 1) for element `position` of a draw.
 */
export function uniformAt(seed: number, position: number): number {
  const state = (seed >>> 0) ^ Math.imul(position >>> 0, 0x9e3779b9);
  return mix32(mix32(state) ^ 0x85ebca6b) / 2 ** 32;
}
