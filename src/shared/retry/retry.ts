import { sleep } from "../time/sleep";

export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryAttemptInfo = {
  attempt: number;
  maxAttempts: number;
  error: unknown;
};

export type RetryOptions = {
  retries: number;          // retries after the first try: 3 means up to 4 calls
  minDelayMs: number;
  maxDelayMs: number;
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: RetryAttemptInfo & { delayMs: number }) => void;
  onGiveUp?: (ctx: RetryAttemptInfo) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  signal?: AbortSignal;
  sleepFn?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

const normalizeDecision = (decision: RetryDecision): { retry: boolean; delayMs?: number } =>
  typeof decision === "boolean" ? { retry: decision } : decision;

export const computeBackoffMs = (
  attempt: number,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "randomFn" | "jitterRatio">,
  customDelayMs?: number
): number => {
  const { minDelayMs, maxDelayMs, randomFn = Math.random, jitterRatio = 0.2 } = opts;
  const base =
    customDelayMs != null && Number.isFinite(customDelayMs) && customDelayMs >= 0
      ? Math.min(maxDelayMs, customDelayMs)
      : Math.min(maxDelayMs, minDelayMs * Math.pow(2, attempt));
  const ratio = Math.min(1, Math.max(0, jitterRatio));
  const r = Math.min(1, Math.max(0, randomFn()));
  return base + Math.floor(base * ratio * r);
};

/**
 * Runs `fn` until it resolves, `shouldRetry` declines, the retry budget runs out or `signal`
 * aborts. The last error is rethrown in every failure case.
 */
export const retry = async <T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, shouldRetry, onRetry, onGiveUp, signal, sleepFn = sleep } = opts;
  const maxAttempts = retries + 1;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn(attempt + 1);
    } catch (err) {
      const decision = normalizeDecision(shouldRetry(err));
      if (attempt >= retries || !decision.retry || signal?.aborted) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const delayMs = computeBackoffMs(attempt, opts, decision.delayMs);
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs, error: err });
      await sleepFn(delayMs, signal);
    }
  }
};
