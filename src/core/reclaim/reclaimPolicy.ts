import type { LeaseState } from "../lease/Lease";

export const DEFAULT_STALE_AFTER_MS = 3600 * 1000;

export type ReclaimReason = "lease_expired" | "stale_without_lease";
export type RetainReason = "lease_active" | "too_recent";

export type ReclaimDecision =
  | { action: "reclaim"; reason: ReclaimReason }
  | { action: "retain"; reason: RetainReason };

/**
 * Decides the fate of one device.
 * `dataModifiedAt` is only consulted when no lease marker exists.
 */
export const decideReclaim = (input: {
  leaseState: LeaseState;
  dataModifiedAt?: Date;
  now: Date;
  staleAfterMs: number;
}): ReclaimDecision => {
  switch (input.leaseState) {
    case "active":
      return { action: "retain", reason: "lease_active" };
    case "expired":
      return { action: "reclaim", reason: "lease_expired" };
    case "absent": {
      if (input.dataModifiedAt == null) {
        return { action: "retain", reason: "too_recent" };
      }
      const ageMs = input.now.getTime() - input.dataModifiedAt.getTime();
      return ageMs >= input.staleAfterMs
        ? { action: "reclaim", reason: "stale_without_lease" }
        : { action: "retain", reason: "too_recent" };
    }
  }
};
