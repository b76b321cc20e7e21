import {
  driverCaps,
  type DriverConfigInput,
  resolveDriverConfig
} from "../../application/crawl-partition/driver.config";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 60000 }
} as const;

export type RuntimeConfig = {
  // only the values set in the environment; per-source defaults fill the rest
  driverOverrides: DriverConfigInput;
  timeoutMs: number;
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

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const driverOverrides: DriverConfigInput = {
    maxRetries: parseOptionalIntInRange(env, "CRAWL_MAX_RETRIES", driverCaps.maxRetries),
    retryMinDelayMs: parseOptionalIntInRange(env, "CRAWL_RETRY_MIN_DELAY_MS", driverCaps.retryMinDelayMs),
    retryMaxDelayMs: parseOptionalIntInRange(env, "CRAWL_RETRY_MAX_DELAY_MS", driverCaps.retryMaxDelayMs),
    pageDelay: {
      minMs: parseOptionalIntInRange(env, "CRAWL_PAGE_DELAY_MIN_MS", driverCaps.pageDelayMs),
      maxMs: parseOptionalIntInRange(env, "CRAWL_PAGE_DELAY_MAX_MS", driverCaps.pageDelayMs)
    },
    maxPagesPerPartition: parseOptionalIntInRange(env, "CRAWL_MAX_PAGES_PER_PARTITION", driverCaps.maxPagesPerPartition)
  };
  resolveDriverConfig(driverOverrides);

  const timeoutMs = parseOptionalIntInRange(env, "HTTP_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? 8000;

  return { driverOverrides, timeoutMs };
};
