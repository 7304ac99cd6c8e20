import {
  defaultReclaimerConfig,
  type ReclaimerConfig,
  reclaimerCaps,
  validateReclaimerConfig
} from "../../application/reclaim-devices/reclaimer.config";

export const runtimeCaps = {
  simctlTimeoutMs: { min: 1000, max: 600000 },
  deadlineMs: { min: 1000, max: 86400000 },
  staleAfterSeconds: {
    min: reclaimerCaps.staleAfterMs.min / 1000,
    max: reclaimerCaps.staleAfterMs.max / 1000
  }
} as const;

export type RuntimeConfig = {
  reclaimerConfig: ReclaimerConfig;
  simctlTimeoutMs: number;
  deadlineMs: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalBoolean = (env: NodeJS.ProcessEnv, name: string): boolean | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const normalized = raw.trim().toLowerCase();
  if (normalized === "1" || normalized === "true") return true;
  if (normalized === "0" || normalized === "false") return false;
  throw new Error(`${name}=${raw} must be one of 1, true, 0, false`);
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const staleAfterSeconds = parseOptionalIntInRange(env, "RECLAIM_STALE_AFTER_SECONDS", runtimeCaps.staleAfterSeconds);

  const reclaimerConfig = validateReclaimerConfig({
    ...defaultReclaimerConfig,
    staleAfterMs: staleAfterSeconds != null ? staleAfterSeconds * 1000 : defaultReclaimerConfig.staleAfterMs,
    concurrency: parseOptionalIntInRange(env, "RECLAIM_CONCURRENCY", reclaimerCaps.concurrency) ?? defaultReclaimerConfig.concurrency,
    dryRun: parseOptionalBoolean(env, "RECLAIM_DRY_RUN") ?? defaultReclaimerConfig.dryRun,
    continueOnPruneFailure:
      parseOptionalBoolean(env, "RECLAIM_CONTINUE_ON_PRUNE_FAILURE") ?? defaultReclaimerConfig.continueOnPruneFailure
  });

  const simctlTimeoutMs = parseOptionalIntInRange(env, "SIMCTL_TIMEOUT_MS", runtimeCaps.simctlTimeoutMs) ?? 60000;
  const deadlineMs = parseOptionalIntInRange(env, "RECLAIM_DEADLINE_MS", runtimeCaps.deadlineMs) ?? 900000;

  return { reclaimerConfig, simctlTimeoutMs, deadlineMs };
};
