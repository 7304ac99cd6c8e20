#!/usr/bin/env node
import {
  ReclaimFatalError,
  type ReclaimFatalCode,
  type ReclaimRunSummary,
  type ReclaimStage,
  toErrorMessage
} from "../application/reclaim-devices/reclaim.error-handler";
import { runReclaim } from "../composition/root";

type ProcessedCounts = Pick<ReclaimRunSummary, "examined" | "reclaimed" | "retained" | "failed">;

type ReclaimFailedEvent = {
  event: "reclaim.failed";
  code: ReclaimFatalCode | "unexpected";
  message: string;
  stage?: ReclaimStage;
  processed?: ProcessedCounts;
  stack?: string;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean =>
  /^(1|true)$/i.test(env.DEBUG ?? "");

/**
 * One stderr line for a run that stopped early. The cause chain is never
 * printed, since it may hold raw simctl output.
 */
export const describeFatalError = (err: unknown, includeStack: boolean): ReclaimFailedEvent => {
  const event: ReclaimFailedEvent = err instanceof ReclaimFatalError
    ? { event: "reclaim.failed", code: err.code, message: err.message, stage: err.context.stage }
    : { event: "reclaim.failed", code: "unexpected", message: toErrorMessage(err) };

  if (err instanceof ReclaimFatalError && err.summary) {
    const { examined, reclaimed, retained, failed } = err.summary;
    event.processed = { examined, reclaimed, retained, failed };
  }
  if (includeStack && err instanceof Error && err.stack) {
    event.stack = err.stack;
  }
  return event;
};

/** Exit 1 on fatal errors only; per-device failures end in `reclaim.completed`. */
export const executeReclaimCli = async (env: NodeJS.ProcessEnv = process.env): Promise<void> => {
  try {
    await runReclaim(env);
  } catch (err) {
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(describeFatalError(err, isDebugMode(env))));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeReclaimCli();
}
