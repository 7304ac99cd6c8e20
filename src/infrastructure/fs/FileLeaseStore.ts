import fs from "fs/promises";
import path from "path";
import type { Lease } from "../../core/lease/Lease";
import type { LeaseStore } from "../../ports/LeaseStore";

export class InvalidLeaseIdentifierError extends Error {
  constructor(identifier: string) {
    super(`Invalid lease identifier: ${JSON.stringify(identifier)}`);
    this.name = "InvalidLeaseIdentifierError";
  }
}

export const isMissingPathError = (err: unknown): boolean =>
  typeof err === "object" && err != null && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");

/**
 * Lease markers are plain files in `leaseDir`, one per device, named by the
 * device identifier. Job runners `touch` a marker with a future mtime to hold a
 * device; the mtime is the lease expiry.
 */
export class FileLeaseStore implements LeaseStore {
  constructor(private readonly leaseDir: string) {}

  markerPath(identifier: string): string {
    if (
      identifier.trim() === "" ||
      identifier === "." ||
      identifier === ".." ||
      identifier.includes("/") ||
      identifier.includes("\\") ||
      identifier.includes("\0")
    ) {
      throw new InvalidLeaseIdentifierError(identifier);
    }
    return path.join(this.leaseDir, identifier);
  }

  async find(identifier: string): Promise<Lease | null> {
    const markerPath = this.markerPath(identifier);
    try {
      const stats = await fs.stat(markerPath);
      return { identifier, expiresAt: stats.mtime };
    } catch (err) {
      if (isMissingPathError(err)) return null;
      throw err;
    }
  }

  async remove(identifier: string): Promise<void> {
    await fs.rm(this.markerPath(identifier), { force: true });
  }
}
