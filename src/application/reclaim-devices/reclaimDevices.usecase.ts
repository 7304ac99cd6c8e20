import type { DeviceRecord } from "../../core/device/device.types";
import { flattenDeviceListing } from "../../core/device/parseDeviceList";
import { decideReclaim } from "../../core/reclaim/reclaimPolicy";
import type { DeviceFileSystem } from "../../ports/DeviceFileSystem";
import type { DeviceInventory } from "../../ports/DeviceInventory";
import type { LeaseStore } from "../../ports/LeaseStore";
import { createLimiter, TaskNotStartedError } from "../../shared/concurrency/limiter";
import { evaluateLease } from "./evaluateLease";
import type { ReclaimerConfigInput } from "./reclaimer.config";
import { resolveReclaimerConfig } from "./reclaimer.config";
import {
  createReclaimRunSummaryTracker,
  deadlineExceeded,
  type DeviceFailureCode,
  type ReclaimRunSummary,
  type ReclaimWarning,
  toErrorMessage,
  wrapInventoryFailure
} from "./reclaim.error-handler";

export type ReclaimDeps = {
  inventory: DeviceInventory;
  leases: LeaseStore;
  files: DeviceFileSystem;
  config: ReclaimerConfigInput;
  now: Date;
  signal?: AbortSignal;
};

/**
 * Deletes simulators whose lease expired, or that never took a lease and have
 * been idle past the staleness threshold. Per-device failures are collected
 * into the summary; only inventory-wide failures and the deadline abort the run.
 */
export const reclaimDevices = async (deps: ReclaimDeps): Promise<ReclaimRunSummary> => {
  const { inventory, leases, files, now, signal } = deps;
  const config = resolveReclaimerConfig(deps.config);
  const tracker = createReclaimRunSummaryTracker({ dryRun: config.dryRun });

  console.log(JSON.stringify({
    event: "reclaim.started",
    now: now.toISOString(),
    staleAfterMs: config.staleAfterMs,
    concurrency: config.concurrency,
    dryRun: config.dryRun
  }));

  const warn = (warning: ReclaimWarning) => {
    const warningCount = tracker.addWarning(warning);
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ event: "reclaim.warning", ...warning, warningCount }));
  };

  const fail = (device: DeviceRecord, code: DeviceFailureCode, reason: unknown) => {
    const failure = {
      identifier: device.identifier,
      runtime: device.runtime,
      code,
      message: toErrorMessage(reason)
    };
    const failureCount = tracker.addFailure(failure);
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ event: "reclaim.device_failed", ...failure, failureCount }));
  };

  if (!config.dryRun) {
    try {
      await inventory.pruneUnavailable();
    } catch (error) {
      if (signal?.aborted) throw deadlineExceeded(0, signal.reason);
      const fatal = wrapInventoryFailure(error, "prune");
      if (fatal.code !== "prune_failed" || !config.continueOnPruneFailure) throw fatal;
      warn({ code: "prune_failed", message: fatal.message });
    }
  }

  let devices: DeviceRecord[];
  try {
    devices = flattenDeviceListing(await inventory.listDevices());
  } catch (error) {
    if (signal?.aborted) throw deadlineExceeded(0, signal.reason);
    throw wrapInventoryFailure(error, "list");
  }

  const processDevice = async (device: DeviceRecord): Promise<void> => {
    tracker.addExamined();

    const lease = await evaluateLease(leases, device.identifier, now, { dryRun: config.dryRun });
    if (lease.warning) warn(lease.warning);

    let dataModifiedAt: Date | undefined;
    if (lease.state === "absent") {
      try {
        dataModifiedAt = await files.modifiedAt(device.dataPath);
      } catch (error) {
        fail(device, "data_path_unreadable", error);
        return;
      }
    }

    const decision = decideReclaim({
      leaseState: lease.state,
      dataModifiedAt,
      now,
      staleAfterMs: config.staleAfterMs
    });
    if (decision.action === "retain") {
      tracker.addRetained(decision.reason);
      return;
    }

    const deviceLog = {
      identifier: device.identifier,
      runtime: device.runtime,
      name: device.name,
      reason: decision.reason
    };

    if (config.dryRun) {
      tracker.addReclaimed(decision.reason);
      console.log(JSON.stringify({ event: "reclaim.device_would_delete", ...deviceLog }));
      return;
    }

    try {
      await inventory.deleteDevice(device.identifier);
    } catch (error) {
      fail(device, "device_delete_failed", error);
      return;
    }
    tracker.addReclaimed(decision.reason);
    console.log(JSON.stringify({ event: "reclaim.device_deleted", ...deviceLog }));

    if (device.logPath) {
      try {
        await files.removeTree(device.logPath);
      } catch (error) {
        fail(device, "log_remove_failed", error);
      }
    }
  };

  const limit = createLimiter(config.concurrency, { signal });
  const results = await Promise.allSettled(devices.map((device) => limit(() => processDevice(device))));

  let notStarted = 0;
  for (const result of results) {
    if (result.status === "fulfilled") continue;
    if (result.reason instanceof TaskNotStartedError) {
      notStarted += 1;
      continue;
    }
    throw result.reason;
  }

  const summary = tracker.summary();
  // In-flight commands killed by the deadline surface as device failures; the
  // run still ends fatally once they settle.
  if (notStarted > 0 || signal?.aborted) {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ event: "reclaim.aborted", notStarted, ...summary }));
    throw deadlineExceeded(notStarted, signal?.reason, summary);
  }

  console.log(JSON.stringify({ event: "reclaim.completed", ...summary }));
  return summary;
};
