import path from "path";
import { crawlSource } from "../application/crawl-source/crawlSource.usecase";
import { type DriverConfigInput, resolveDriverConfig } from "../application/crawl-partition/driver.config";
import {
  type ExecutionMode,
  type RunSummary,
  runSources,
  type SourceWorker
} from "../application/run-sources/runSources.usecase";
import { JsonFileCheckpointStore } from "../infrastructure/filesystem/JsonFileCheckpointStore";
import { JsonlRecordSink } from "../infrastructure/filesystem/JsonlRecordSink";
import { RetailHttpClient } from "../infrastructure/http/RetailHttpClient";
import { MongoRecordSink } from "../infrastructure/mongo/MongoRecordSink";
import { AlbertHeijnConnector, defaultAlbertHeijnConfig } from "../infrastructure/retailers/albertheijn/AlbertHeijnConnector";
import { AldiConnector } from "../infrastructure/retailers/aldi/AldiConnector";
import { defaultJumboConfig, JumboConnector } from "../infrastructure/retailers/jumbo/JumboConnector";
import { PlusConnector } from "../infrastructure/retailers/plus/PlusConnector";
import type { CatalogConnector } from "../ports/CatalogConnector";
import type { CheckpointStore } from "../ports/CheckpointStore";
import type { RecordSink } from "../ports/RecordSink";
import { type Env, loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv, type RuntimeConfig } from "../shared/config/runtime.config";

export const sourceNames = ["jumbo", "ah", "aldi", "plus"] as const;

export type SourceName = (typeof sourceNames)[number];

export const isSourceName = (value: string): value is SourceName =>
  sourceNames.some((name) => name === value);

// Per-source page pacing, overridden by CRAWL_PAGE_DELAY_* when set.
const sourcePacing: Record<SourceName, DriverConfigInput> = {
  jumbo: { pageDelay: { minMs: 1000, maxMs: 3000 } },
  ah: { pageDelay: { minMs: 500, maxMs: 500 } },
  aldi: { pageDelay: { minMs: 200, maxMs: 500 } },
  plus: { pageDelay: { minMs: 200, maxMs: 1000 } }
};

const createConnector = (name: SourceName, env: Env, timeoutMs: number): CatalogConnector => {
  switch (name) {
    case "jumbo":
      return new JumboConnector(
        new RetailHttpClient(env.JUMBO_BASE_URL, { source: name, timeoutMs, headers: { "x-jumbo-store": "national" } }),
        defaultJumboConfig
      );
    case "ah":
      return new AlbertHeijnConnector(
        new RetailHttpClient(env.AH_BASE_URL, { source: name, timeoutMs, headers: { "user-agent": "catalog-crawler/0.1" } }),
        { ...defaultAlbertHeijnConfig, authUrl: env.AH_AUTH_URL }
      );
    case "aldi":
      return new AldiConnector(new RetailHttpClient(env.ALDI_BASE_URL, { source: name, timeoutMs }));
    case "plus":
      return new PlusConnector(
        new RetailHttpClient(env.PLUS_BASE_URL, {
          source: name,
          timeoutMs,
          headers: { origin: env.PLUS_BASE_URL, referer: env.PLUS_BASE_URL }
        })
      );
  }
};

const sourceDir = (env: Env, name: SourceName) => path.join(env.CRAWL_DATA_DIR, name);

const createSink = (name: SourceName, env: Env): RecordSink =>
  env.CRAWL_SINK === "mongo"
    ? new MongoRecordSink(env.MONGO_URI, `${name}_records`)
    : new JsonlRecordSink(path.join(sourceDir(env, name), "records.jsonl"), name);

const createCheckpointStore = (name: SourceName, env: Env): CheckpointStore =>
  new JsonFileCheckpointStore(path.join(sourceDir(env, name), "checkpoint.json"), name);

const resetSource = async (sink: RecordSink, checkpoints: CheckpointStore): Promise<void> => {
  try {
    await checkpoints.reset();
    await sink.reset();
  } catch (error) {
    await sink.close();
    throw error;
  }
};

export const createSourceWorker = (
  name: SourceName,
  env: Env,
  runtime: RuntimeConfig,
  opts: { fresh: boolean }
): SourceWorker => ({
  source: name,
  run: async (signal) => {
    const config = resolveDriverConfig(runtime.driverOverrides, resolveDriverConfig(sourcePacing[name]));
    const connector = createConnector(name, env, runtime.timeoutMs);
    const sink = createSink(name, env);
    const checkpoints = createCheckpointStore(name, env);

    if (opts.fresh) {
      await resetSource(sink, checkpoints);
    }

    return crawlSource({ connector, sink, checkpoints, config, signal });
  }
});

export type RunCrawlOptions = {
  sources: SourceName[];
  mode: ExecutionMode;
  fresh: boolean;
  signal?: AbortSignal;
};

export const runCrawl = async (opts: RunCrawlOptions): Promise<RunSummary> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const selected = opts.sources.length > 0 ? opts.sources : [...sourceNames];

  return runSources({
    workers: selected.map((name) => createSourceWorker(name, env, runtime, { fresh: opts.fresh })),
    mode: opts.mode,
    signal: opts.signal
  });
};
