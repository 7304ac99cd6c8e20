import os from "os";
import path from "path";

export type Env = {
  RECLAIM_LEASE_DIR: string;
  XCRUN_PATH: string;
  SIMCTL_DEVICE_SET?: string;
};

const validateAbsolutePath = (name: string, value: string): string => {
  if (!path.isAbsolute(value)) {
    throw new Error(`${name} must be an absolute path. Received: ${value}`);
  }
  return path.normalize(value);
};

const optionalTrimmed = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const home = optionalTrimmed(env.HOME) ?? os.homedir();
  const RECLAIM_LEASE_DIR = validateAbsolutePath(
    "RECLAIM_LEASE_DIR",
    optionalTrimmed(env.RECLAIM_LEASE_DIR) ?? path.join(home, ".simulator-leases")
  );
  const XCRUN_PATH = optionalTrimmed(env.XCRUN_PATH) ?? "xcrun";
  const deviceSet = optionalTrimmed(env.SIMCTL_DEVICE_SET);

  const loaded: Env = { RECLAIM_LEASE_DIR, XCRUN_PATH };
  if (deviceSet) loaded.SIMCTL_DEVICE_SET = validateAbsolutePath("SIMCTL_DEVICE_SET", deviceSet);
  return loaded;
};
