import type { ReclaimReason, RetainReason } from "../../core/reclaim/reclaimPolicy";
import { InventoryUnavailableError } from "../../ports/DeviceInventory";

export type ReclaimFatalCode =
  | "collaborator_unavailable"
  | "enumeration_failed"
  | "prune_failed"
  | "deadline_exceeded";
export type DeviceFailureCode = "device_delete_failed" | "log_remove_failed" | "data_path_unreadable";
export type ReclaimWarningCode = "marker_remove_failed" | "marker_unreadable" | "prune_failed";

export type ReclaimStage = "prune" | "list" | "device";

export type ReclaimErrorContext = {
  stage: ReclaimStage;
  identifier?: string;
  runtime?: string;
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

const unwrapCause = (reason: unknown): unknown =>
  reason instanceof Error ? reason.cause ?? reason : reason;

export class ReclaimFatalError extends Error {
  readonly code: ReclaimFatalCode;
  readonly context: ReclaimErrorContext;
  readonly cause?: unknown;
  /** Counts for the devices handled before the run stopped. */
  readonly summary?: ReclaimRunSummary;

  constructor(args: {
    code: ReclaimFatalCode;
    message: string;
    context: ReclaimErrorContext;
    cause?: unknown;
    summary?: ReclaimRunSummary;
  }) {
    super(args.message);
    this.name = "ReclaimFatalError";
    this.code = args.code;
    this.context = args.context;
    this.cause = args.cause;
    this.summary = args.summary;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Maps a prune/list failure to a fatal error. A tool that cannot be launched
 * is reported as `collaborator_unavailable` whatever the stage.
 */
export const wrapInventoryFailure = (reason: unknown, stage: "prune" | "list"): ReclaimFatalError => {
  if (reason instanceof InventoryUnavailableError) {
    return new ReclaimFatalError({
      code: "collaborator_unavailable",
      message: `Device tool unavailable during ${stage}: ${toErrorMessage(reason)}`,
      context: { stage },
      cause: unwrapCause(reason)
    });
  }

  const code: ReclaimFatalCode = stage === "prune" ? "prune_failed" : "enumeration_failed";
  const action = stage === "prune" ? "Pruning unavailable devices" : "Listing devices";
  return new ReclaimFatalError({
    code,
    message: `${action} failed: ${toErrorMessage(reason)}`,
    context: { stage },
    cause: unwrapCause(reason)
  });
};

export const deadlineExceeded = (pending: number, reason?: unknown, summary?: ReclaimRunSummary): ReclaimFatalError =>
  new ReclaimFatalError({
    code: "deadline_exceeded",
    message: `Run deadline exceeded with ${pending} device(s) not processed`,
    context: { stage: "device" },
    cause: reason,
    summary
  });

export type DeviceFailure = {
  identifier: string;
  runtime: string;
  code: DeviceFailureCode;
  message: string;
};

export type ReclaimWarning = {
  code: ReclaimWarningCode;
  message: string;
  identifier?: string;
};

export type ReclaimRunSummary = {
  examined: number;
  reclaimed: number;
  retained: number;
  failed: number;
  dryRun: boolean;
  reclaimedByReason: Partial<Record<ReclaimReason, number>>;
  retainedByReason: Partial<Record<RetainReason, number>>;
  failures: DeviceFailure[];
  warnings: ReclaimWarning[];
};

export const createReclaimRunSummaryTracker = (opts: { dryRun: boolean }) => {
  let examined = 0;
  const reclaimedByReason: Partial<Record<ReclaimReason, number>> = {};
  const retainedByReason: Partial<Record<RetainReason, number>> = {};
  const failures: DeviceFailure[] = [];
  const warnings: ReclaimWarning[] = [];

  const sum = (counts: Partial<Record<string, number>>) =>
    Object.values(counts).reduce<number>((acc, n) => acc + (n ?? 0), 0);

  return {
    addExamined: () => {
      examined += 1;
    },
    addReclaimed: (reason: ReclaimReason) => {
      reclaimedByReason[reason] = (reclaimedByReason[reason] ?? 0) + 1;
    },
    addRetained: (reason: RetainReason) => {
      retainedByReason[reason] = (retainedByReason[reason] ?? 0) + 1;
    },
    addFailure: (failure: DeviceFailure) => {
      failures.push(failure);
      return failures.length;
    },
    addWarning: (warning: ReclaimWarning) => {
      warnings.push(warning);
      return warnings.length;
    },
    summary: (): ReclaimRunSummary => ({
      examined,
      reclaimed: sum(reclaimedByReason),
      retained: sum(retainedByReason),
      failed: new Set(failures.map((f) => f.identifier)).size,
      dryRun: opts.dryRun,
      reclaimedByReason: { ...reclaimedByReason },
      retainedByReason: { ...retainedByReason },
      failures: failures.slice(),
      warnings: warnings.slice()
    })
  };
};

export type ReclaimRunSummaryTracker = ReturnType<typeof createReclaimRunSummaryTracker>;
