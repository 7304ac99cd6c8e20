export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryOptions = {
  retries: number;          // attempts after the first one (2 means up to 3 runs)
  minDelayMs: number;
  maxDelayMs: number;
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  signal?: AbortSignal;     // stops further attempts; the last error is rethrown
};

const sleep = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export const computeBackoffMs = (
  attempt: number,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "randomFn" | "jitterRatio">,
  customDelayMs?: number
): number => {
  const { minDelayMs, maxDelayMs, randomFn = Math.random, jitterRatio = 0.2 } = opts;
  const base = customDelayMs != null
    ? Math.min(maxDelayMs, customDelayMs)
    : Math.min(maxDelayMs, minDelayMs * Math.pow(2, attempt));
  const ratio = Math.min(1, Math.max(0, jitterRatio));
  const random = Math.min(1, Math.max(0, randomFn()));
  return base + Math.floor(base * ratio * random);
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, shouldRetry, onRetry, onGiveUp, signal } = opts;
  const maxAttempts = retries + 1;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized = typeof decision === "boolean" ? { retry: decision, delayMs: undefined } : decision;
      if (attempt >= retries || !normalized.retry || signal?.aborted) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const customDelayMs =
        typeof normalized.delayMs === "number" && Number.isFinite(normalized.delayMs) && normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;
      const delayMs = computeBackoffMs(attempt, opts, customDelayMs);
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs, error: err });
      await sleep(delayMs, signal);
      if (signal?.aborted) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }
    }
  }
};
