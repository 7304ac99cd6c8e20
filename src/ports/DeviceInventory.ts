import type { DeviceListing } from "../core/device/device.types";

/**
 * Raised when the device-management tool cannot be invoked at all
 * (missing binary, not executable). No policy can run without it.
 */
export class InventoryUnavailableError extends Error {
  readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "InventoryUnavailableError";
    this.cause = cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface DeviceInventory {
  pruneUnavailable(): Promise<void>;
  listDevices(): Promise<DeviceListing>;
  deleteDevice(identifier: string): Promise<void>;
}
