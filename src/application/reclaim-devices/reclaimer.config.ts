import { DEFAULT_STALE_AFTER_MS } from "../../core/reclaim/reclaimPolicy";

export type ReclaimerConfig = {
  staleAfterMs: number;
  concurrency: number;
  dryRun: boolean;
  continueOnPruneFailure: boolean;
};

export type ReclaimerConfigInput = Partial<ReclaimerConfig>;

export const defaultReclaimerConfig: ReclaimerConfig = {
  staleAfterMs: DEFAULT_STALE_AFTER_MS,
  concurrency: 1,
  dryRun: false,
  continueOnPruneFailure: false
};

export const reclaimerCaps = {
  staleAfterMs: { min: 60 * 1000, max: 7 * 24 * 3600 * 1000 },
  concurrency: { min: 1, max: 16 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateReclaimerConfig = (config: ReclaimerConfig): ReclaimerConfig => {
  assertIntegerInRange("staleAfterMs", config.staleAfterMs, reclaimerCaps.staleAfterMs.min, reclaimerCaps.staleAfterMs.max);
  assertIntegerInRange("concurrency", config.concurrency, reclaimerCaps.concurrency.min, reclaimerCaps.concurrency.max);
  return config;
};

export const resolveReclaimerConfig = (input: ReclaimerConfigInput = {}): ReclaimerConfig =>
  validateReclaimerConfig({
    ...defaultReclaimerConfig,
    ...input
  });
