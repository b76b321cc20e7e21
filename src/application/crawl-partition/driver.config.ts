import type { DelayRange } from "../../shared/time/sleep";

export type DriverConfig = {
  maxRetries: number;
  retryMinDelayMs: number;
  retryMaxDelayMs: number;
  pageDelay: DelayRange;
  maxPagesPerPartition: number;
};

export type DriverConfigInput = Partial<Omit<DriverConfig, "pageDelay">> & {
  pageDelay?: Partial<DelayRange>;
};

export const defaultDriverConfig: DriverConfig = {
  maxRetries: 3,
  retryMinDelayMs: 500,
  retryMaxDelayMs: 10000,
  pageDelay: { minMs: 200, maxMs: 1000 },
  maxPagesPerPartition: 10000
};

export const driverCaps = {
  maxRetries: { min: 0, max: 10 },
  retryMinDelayMs: { min: 1, max: 60000 },
  retryMaxDelayMs: { min: 1, max: 300000 },
  pageDelayMs: { min: 0, max: 60000 },
  maxPagesPerPartition: { min: 1, max: 100000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateDriverConfig = (config: DriverConfig): DriverConfig => {
  assertIntegerInRange("maxRetries", config.maxRetries, driverCaps.maxRetries.min, driverCaps.maxRetries.max);
  assertIntegerInRange("retryMinDelayMs", config.retryMinDelayMs, driverCaps.retryMinDelayMs.min, driverCaps.retryMinDelayMs.max);
  assertIntegerInRange("retryMaxDelayMs", config.retryMaxDelayMs, driverCaps.retryMaxDelayMs.min, driverCaps.retryMaxDelayMs.max);
  assertIntegerInRange("pageDelay.minMs", config.pageDelay.minMs, driverCaps.pageDelayMs.min, driverCaps.pageDelayMs.max);
  assertIntegerInRange("pageDelay.maxMs", config.pageDelay.maxMs, driverCaps.pageDelayMs.min, driverCaps.pageDelayMs.max);
  assertIntegerInRange(
    "maxPagesPerPartition",
    config.maxPagesPerPartition,
    driverCaps.maxPagesPerPartition.min,
    driverCaps.maxPagesPerPartition.max
  );

  if (config.retryMinDelayMs > config.retryMaxDelayMs) {
    throw new Error(`retryMinDelayMs=${config.retryMinDelayMs} must not exceed retryMaxDelayMs=${config.retryMaxDelayMs}`);
  }
  if (config.pageDelay.minMs > config.pageDelay.maxMs) {
    throw new Error(`pageDelay.minMs=${config.pageDelay.minMs} must not exceed pageDelay.maxMs=${config.pageDelay.maxMs}`);
  }
  return config;
};

export const resolveDriverConfig = (input: DriverConfigInput = {}, base: DriverConfig = defaultDriverConfig): DriverConfig =>
  validateDriverConfig({
    maxRetries: input.maxRetries ?? base.maxRetries,
    retryMinDelayMs: input.retryMinDelayMs ?? base.retryMinDelayMs,
    retryMaxDelayMs: input.retryMaxDelayMs ?? base.retryMaxDelayMs,
    pageDelay: {
      minMs: input.pageDelay?.minMs ?? base.pageDelay.minMs,
      maxMs: input.pageDelay?.maxMs ?? base.pageDelay.maxMs
    },
    maxPagesPerPartition: input.maxPagesPerPartition ?? base.maxPagesPerPartition
  });
