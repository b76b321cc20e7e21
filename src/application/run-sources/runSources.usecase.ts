import { CrawlError, UnsupportedExecutionModeError, toErrorMessage } from "../../core/crawl/crawl.errors";
import { emptyPartitionCounts, type SourceRunReport } from "../crawl-source/sourceRun.summary";

export const executionModes = ["parallel", "sequential"] as const;

export type ExecutionMode = (typeof executionModes)[number];

export const isExecutionMode = (value: string): value is ExecutionMode =>
  executionModes.some((mode) => mode === value);

/**
 * One source's end-to-end job. `run` builds everything the source needs itself, so a failure
 * while wiring a source stays inside that source's error boundary.
 */
export type SourceWorker = {
  source: string;
  run: (signal?: AbortSignal) => Promise<SourceRunReport>;
};

export type RunSummary = Record<string, SourceRunReport>;

export type RunSourcesDeps = {
  workers: SourceWorker[];
  mode: ExecutionMode;
  signal?: AbortSignal;
};

export const runSources = async (deps: RunSourcesDeps): Promise<RunSummary> => {
  const { workers, mode, signal } = deps;
  if (mode !== "parallel") {
    throw new UnsupportedExecutionModeError(mode);
  }

  const names = new Set<string>();
  for (const worker of workers) {
    if (names.has(worker.source)) {
      throw new Error(`Source "${worker.source}" is configured more than once`);
    }
    names.add(worker.source);
  }

  const startedAt = Date.now();
  // no concurrency cap: every worker starts at once
  const settled = await Promise.allSettled(workers.map((worker) => worker.run(signal)));

  const summary: RunSummary = {};
  settled.forEach((result, index) => {
    const { source } = workers[index];
    if (result.status === "fulfilled") {
      summary[source] = result.value;
      return;
    }

    const error = result.reason;
    const report: SourceRunReport = {
      totalRecords: 0,
      status: "failed",
      partitions: emptyPartitionCounts(),
      error: { code: error instanceof CrawlError ? error.code : "unexpected", message: toErrorMessage(error) }
    };
    // eslint-disable-next-line no-console
    console.error(JSON.stringify({ event: "crawl.source_failed", source, ...report }));
    summary[source] = report;
  });

  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ event: "crawl.run_completed", elapsedMs: Date.now() - startedAt, summary }));
  return summary;
};
