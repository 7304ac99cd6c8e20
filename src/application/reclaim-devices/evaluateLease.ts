import { leaseStateAt, type LeaseState } from "../../core/lease/Lease";
import type { LeaseStore } from "../../ports/LeaseStore";
import { toErrorMessage, type ReclaimWarning } from "./reclaim.error-handler";

export type LeaseEvaluation = {
  state: LeaseState;
  warning?: ReclaimWarning;
};

/**
 * Resolves the lease state of one device at `now`.
 *
 * An expired marker is removed as part of evaluation (kept on dry runs).
 * A marker that exists but cannot be read counts as absent and comes back
 * with a warning.
 */
export const evaluateLease = async (
  store: LeaseStore,
  identifier: string,
  now: Date,
  opts: { dryRun?: boolean } = {}
): Promise<LeaseEvaluation> => {
  let state: LeaseState;
  try {
    state = leaseStateAt(await store.find(identifier), now);
  } catch (err) {
    return {
      state: "absent",
      warning: {
        code: "marker_unreadable",
        message: `Lease marker for ${identifier} is unreadable: ${toErrorMessage(err)}`,
        identifier
      }
    };
  }

  if (state !== "expired" || opts.dryRun) return { state };

  try {
    await store.remove(identifier);
    return { state };
  } catch (err) {
    return {
      state,
      warning: {
        code: "marker_remove_failed",
        message: `Expired lease marker for ${identifier} could not be removed: ${toErrorMessage(err)}`,
        identifier
      }
    };
  }
};
