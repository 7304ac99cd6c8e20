import type { Lease } from "../core/lease/Lease";

export interface LeaseStore {
  /** Resolves null when no marker exists; rejects when a marker exists but cannot be read. */
  find(identifier: string): Promise<Lease | null>;
  /** Removing a marker that is already gone succeeds. */
  remove(identifier: string): Promise<void>;
}
