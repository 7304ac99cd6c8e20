import type { DeviceListing, DeviceRecord } from "../../../src/core/device/device.types";
import type { DeviceFileSystem } from "../../../src/ports/DeviceFileSystem";
import type { DeviceInventory } from "../../../src/ports/DeviceInventory";
import type { LeaseStore } from "../../../src/ports/LeaseStore";

export const NOW = new Date("2026-03-01T12:00:00.000Z");

export const secondsFromNow = (seconds: number): Date => new Date(NOW.getTime() + seconds * 1000);

export const device = (identifier: string, runtime = "com.apple.CoreSimulator.SimRuntime.iOS-17-0"): DeviceRecord => ({
  identifier,
  dataPath: `/sims/${identifier}/data`,
  logPath: `/logs/${identifier}`,
  runtime
});

export const groupByRuntime = (devices: DeviceRecord[]): DeviceListing => {
  const listing: DeviceListing = {};
  for (const d of devices) {
    listing[d.runtime] = [...(listing[d.runtime] ?? []), d];
  }
  return listing;
};

export const createInMemoryLeaseStore = (markers: Record<string, Date> = {}) => {
  const leases = new Map<string, Date>(Object.entries(markers));
  const removed: string[] = [];
  const failRemoveFor = new Set<string>();
  const unreadable = new Set<string>();

  const store: LeaseStore = {
    find: async (identifier) => {
      if (unreadable.has(identifier)) throw new Error("EACCES: permission denied");
      const expiresAt = leases.get(identifier);
      return expiresAt ? { identifier, expiresAt } : null;
    },
    remove: async (identifier) => {
      if (failRemoveFor.has(identifier)) throw new Error("EPERM: operation not permitted");
      leases.delete(identifier);
      removed.push(identifier);
    }
  };

  return { store, leases, removed, failRemoveFor, unreadable };
};

export const createFakeInventory = (devices: DeviceRecord[]) => {
  let current = devices.slice();
  const calls: string[] = [];
  const failDeleteFor = new Set<string>();
  let pruneError: unknown;
  let listError: unknown;
  let beforeList: (() => void) | undefined;

  const inventory: DeviceInventory = {
    pruneUnavailable: async () => {
      calls.push("prune");
      if (pruneError !== undefined) throw pruneError;
    },
    listDevices: async () => {
      calls.push("list");
      beforeList?.();
      if (listError !== undefined) throw listError;
      return groupByRuntime(current);
    },
    deleteDevice: async (identifier) => {
      calls.push(`delete:${identifier}`);
      if (failDeleteFor.has(identifier)) throw new Error("Unable to delete: device busy");
      current = current.filter((d) => d.identifier !== identifier);
    }
  };

  return {
    inventory,
    calls,
    failDeleteFor,
    remaining: () => current.map((d) => d.identifier),
    deleted: () => calls.filter((c) => c.startsWith("delete:")).map((c) => c.slice("delete:".length)),
    setPruneError: (err: unknown) => {
      pruneError = err;
    },
    setListError: (err: unknown) => {
      listError = err;
    },
    onList: (hook: () => void) => {
      beforeList = hook;
    }
  };
};

export const createInMemoryFiles = (mtimes: Record<string, Date>, trees: string[] = []) => {
  const modified = new Map<string, Date>(Object.entries(mtimes));
  const existingTrees = new Set(trees);
  const removedTrees: string[] = [];
  const failRemoveFor = new Set<string>();

  const files: DeviceFileSystem = {
    modifiedAt: async (targetPath) => {
      const mtime = modified.get(targetPath);
      if (!mtime) throw new Error(`ENOENT: no such file or directory, stat '${targetPath}'`);
      return mtime;
    },
    removeTree: async (targetPath) => {
      if (failRemoveFor.has(targetPath)) throw new Error(`EBUSY: resource busy, rm '${targetPath}'`);
      existingTrees.delete(targetPath);
      removedTrees.push(targetPath);
    }
  };

  return { files, existingTrees, removedTrees, failRemoveFor };
};
