/**
 * A lease is held by a CI job on one simulator until `expiresAt`.
 * On disk it is a marker file named after the device whose mtime is the expiry.
 */
export type Lease = {
  identifier: string;
  expiresAt: Date;
};

export type LeaseState = "active" | "expired" | "absent";

export const leaseStateAt = (lease: Lease | null, now: Date): LeaseState => {
  if (lease == null) return "absent";
  return lease.expiresAt.getTime() > now.getTime() ? "active" : "expired";
};
