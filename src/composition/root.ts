import type { ReclaimRunSummary } from "../application/reclaim-devices/reclaim.error-handler";
import { reclaimDevices } from "../application/reclaim-devices/reclaimDevices.usecase";
import { FileLeaseStore } from "../infrastructure/fs/FileLeaseStore";
import { NodeDeviceFileSystem } from "../infrastructure/fs/NodeDeviceFileSystem";
import { SimctlDeviceInventory } from "../infrastructure/simctl/SimctlDeviceInventory";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export const runReclaim = async (env: NodeJS.ProcessEnv = process.env): Promise<ReclaimRunSummary> => {
  const paths = loadEnv(env);
  const runtime = loadRuntimeConfigFromEnv(env);
  const signal = AbortSignal.timeout(runtime.deadlineMs);

  const inventory = new SimctlDeviceInventory({
    xcrunPath: paths.XCRUN_PATH,
    deviceSetPath: paths.SIMCTL_DEVICE_SET,
    timeoutMs: runtime.simctlTimeoutMs,
    signal
  });
  const leases = new FileLeaseStore(paths.RECLAIM_LEASE_DIR);
  const files = new NodeDeviceFileSystem();

  return reclaimDevices({
    inventory,
    leases,
    files,
    config: runtime.reclaimerConfig,
    now: new Date(),
    signal
  });
};
