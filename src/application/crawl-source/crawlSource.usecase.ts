import { CrawlState } from "../../core/crawl/CrawlState";
import { CorruptStateError, CrawlError, TransientFetchError, toErrorMessage } from "../../core/crawl/crawl.errors";
import type { CatalogConnector } from "../../ports/CatalogConnector";
import type { CheckpointStore } from "../../ports/CheckpointStore";
import type { RecordSink } from "../../ports/RecordSink";
import { retry } from "../../shared/retry/retry";
import { sleep } from "../../shared/time/sleep";
import { drivePartition } from "../crawl-partition/drivePartition.usecase";
import { type DriverConfigInput, resolveDriverConfig } from "../crawl-partition/driver.config";
import { createSourceRunTracker, type SourceRunReport } from "./sourceRun.summary";

export type CrawlSourceDeps = {
  connector: CatalogConnector;
  sink: RecordSink;
  checkpoints: CheckpointStore;
  config?: DriverConfigInput;
  signal?: AbortSignal;
  randomFn?: () => number;
  sleepFn?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

/**
 * Loads (or recovers) the source's checkpoint, reconciles it with the sink, then drives every
 * partition in order. Never throws: whatever stops the worker ends up in the returned report.
 */
export const crawlSource = async (deps: CrawlSourceDeps): Promise<SourceRunReport> => {
  const { connector, sink, checkpoints, signal } = deps;
  const source = connector.source;
  const config = resolveDriverConfig(deps.config);
  const sleepFn = deps.sleepFn ?? sleep;
  const tracker = createSourceRunTracker();
  const startedAt = Date.now();

  const withRetry = <T>(operation: string, fn: () => Promise<T>): Promise<T> =>
    retry(fn, {
      retries: config.maxRetries,
      minDelayMs: config.retryMinDelayMs,
      maxDelayMs: config.retryMaxDelayMs,
      randomFn: deps.randomFn,
      signal,
      sleepFn,
      shouldRetry: (err) => {
        if (!connector.isTransient(err)) return false;
        return { retry: true, delayMs: err instanceof TransientFetchError ? err.retryDelayMs : undefined };
      },
      onRetry: ({ attempt, maxAttempts, delayMs }) => {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({ event: "crawl.retry", source, operation, attempt, maxAttempts, delayMs }));
      }
    });

  const interrupted = (): SourceRunReport => {
    const report = tracker.report("failed", { code: "interrupted", message: "run was interrupted" });
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ event: "crawl.source_failed", source, ...report }));
    return report;
  };

  try {
    let state = await loadState(source, checkpoints);

    const { committedKeys, discarded } = await sink.open();
    if (discarded) {
      // the checkpoint describes records that are gone; crawl everything again
      state = new CrawlState(source);
      await checkpoints.reset();
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "crawl.state_discarded", source }));
    }
    const reconciled = state.addAll(committedKeys);
    if (reconciled > 0) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "crawl.state_reconciled", source, keysAdded: reconciled }));
    }

    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ event: "crawl.source_started", source, seenKeys: state.seenCount }));

    await withRetry("authenticate", () => connector.authenticate());
    const partitions = await withRetry("listPartitions", () => connector.listPartitions());
    tracker.setPartitionTotal(partitions.length);

    for (const partition of partitions) {
      if (signal?.aborted) break;
      const outcome = await drivePartition({
        connector,
        state,
        sink,
        checkpoints,
        partition,
        config,
        signal,
        randomFn: deps.randomFn,
        sleepFn
      });
      tracker.addOutcome(outcome);
    }

    if (signal?.aborted) return interrupted();

    const report = tracker.report("success");
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({
      event: "crawl.source_completed",
      source,
      ...report,
      ...tracker.totals(),
      elapsedMs: Date.now() - startedAt
    }));
    return report;
  } catch (error) {
    if (signal?.aborted) return interrupted();
    const code = error instanceof CrawlError ? error.code : "unexpected";
    const report = tracker.report("failed", { code, message: toErrorMessage(error) });
    // eslint-disable-next-line no-console
    console.error(JSON.stringify({ event: "crawl.source_failed", source, ...report }));
    return report;
  } finally {
    await closeQuietly(sink, source);
  }
};

const loadState = async (source: string, checkpoints: CheckpointStore): Promise<CrawlState> => {
  const state = new CrawlState(source);
  try {
    const snapshot = await checkpoints.load();
    if (snapshot) state.restore(snapshot);
    return state;
  } catch (error) {
    const corrupt =
      error instanceof CorruptStateError
        ? error
        : new CorruptStateError(`Checkpoint could not be restored: ${toErrorMessage(error)}`, { source }, error);
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({
      event: "crawl.checkpoint_corrupt",
      source,
      reason: corrupt.message,
      path: corrupt.context.path ?? null
    }));
    return new CrawlState(source);
  }
};

const closeQuietly = async (sink: RecordSink, source: string): Promise<void> => {
  try {
    await sink.close();
  } catch (error) {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ event: "crawl.sink_close_failed", source, reason: toErrorMessage(error) }));
  }
};
