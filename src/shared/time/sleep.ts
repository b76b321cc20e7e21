/**
 * Resolves after `ms`, or early (without throwing) when `signal` aborts.
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
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

export type DelayRange = {
  minMs: number;
  maxMs: number;
};

export const pickDelayMs = (range: DelayRange, randomFn: () => number = Math.random): number => {
  const min = Math.max(0, Math.min(range.minMs, range.maxMs));
  const max = Math.max(0, range.maxMs, range.minMs);
  const r = Math.min(1, Math.max(0, randomFn()));
  return Math.floor(min + (max - min) * r);
};
