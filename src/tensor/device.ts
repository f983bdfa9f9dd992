import { TypeMismatchError } from "../core/errors";

/**
 * Device label of a leaf: `kind` or `kind:index` ("cpu", "cpu:1", "mock:0").
 * Every storage lives in host memory; moving between devices copies.
 */
export type DeviceId = string;

const DEVICE_PATTERN = /^[a-z][a-z0-9_]*(:\d+)?$/;

export const DEFAULT_DEVICE: DeviceId = "cpu";

export function parseDevice(device: string): DeviceId {
  if (!DEVICE_PATTERN.test(device)) {
    throw new TypeMismatchError(`invalid device string: "${device}"`);
  }
  return device;
}
