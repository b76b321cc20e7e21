import type { CatalogRecord, Partition, RecordEnvelope, RecordKey } from "../../core/catalog/catalog.types";
import type { CrawlState } from "../../core/crawl/CrawlState";
import { type Cursor, describeCursor, sameCursor } from "../../core/crawl/cursor";
import { TransientFetchError } from "../../core/crawl/crawl.errors";
import type { CatalogConnector, CatalogPage } from "../../ports/CatalogConnector";
import type { CheckpointStore } from "../../ports/CheckpointStore";
import type { RecordSink } from "../../ports/RecordSink";
import { retry } from "../../shared/retry/retry";
import { pickDelayMs, sleep } from "../../shared/time/sleep";
import { type DriverConfigInput, resolveDriverConfig } from "./driver.config";
import {
  classifyFetchFailure,
  classifyKeyFailure,
  type PartitionErrorContext,
  wrapCheckpointFailure,
  wrapSinkFailure
} from "./crawl.error-handler";

export type PartitionOutcomeStatus = "complete" | "failed" | "skipped" | "in_progress" | "interrupted";

export type PartitionOutcome = {
  partitionId: string;
  status: PartitionOutcomeStatus;
  pagesFetched: number;
  accepted: number;
  duplicates: number;
  skippedInvalid: number;
  truncated: boolean;
};

export type DrivePartitionDeps = {
  connector: CatalogConnector;
  state: CrawlState;
  sink: RecordSink;
  checkpoints: CheckpointStore;
  partition: Partition;
  config?: DriverConfigInput;
  signal?: AbortSignal;
  randomFn?: () => number;
  sleepFn?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

// Consecutive non-empty pages without a cursor move before the partition is treated as exhausted.
const STALL_LIMIT = 2;

const defaultMetadata = (partition: Partition): Record<string, string> => ({ partition: partition.label });

/**
 * Pages through one partition until the connector reports exhaustion, persisting after every
 * page in append-then-checkpoint order. A crash between the two steps re-fetches that page on the
 * next run; the sink's committed keys keep the re-fetch from duplicating records.
 */
export const drivePartition = async (deps: DrivePartitionDeps): Promise<PartitionOutcome> => {
  const { connector, state, sink, checkpoints, partition, signal } = deps;
  const config = resolveDriverConfig(deps.config);
  const randomFn = deps.randomFn ?? Math.random;
  const sleepFn = deps.sleepFn ?? sleep;
  const source = connector.source;

  const outcome: PartitionOutcome = {
    partitionId: partition.id,
    status: "in_progress",
    pagesFetched: 0,
    accepted: 0,
    duplicates: 0,
    skippedInvalid: 0,
    truncated: false
  };
  const finish = (status: PartitionOutcomeStatus): PartitionOutcome => ({ ...outcome, status });

  if (state.isComplete(partition.id)) {
    return finish("skipped");
  }

  let progress = state.progressOf(partition.id);
  if (progress.status === "failed") {
    progress = state.updatePartition(partition.id, { status: "in_progress", lastError: undefined });
  }
  let cursor: Cursor | null = progress.cursor;
  let stalledPages = 0;

  const contextFor = (page: number): PartitionErrorContext => ({
    source,
    partition: partition.id,
    cursor: describeCursor(cursor),
    page
  });

  const persist = async (page: number) => {
    try {
      await checkpoints.save(state.snapshot());
    } catch (error) {
      throw wrapCheckpointFailure(error, contextFor(page));
    }
  };

  while (true) {
    if (signal?.aborted) return finish("interrupted");

    if (outcome.pagesFetched >= config.maxPagesPerPartition) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "crawl.partition_budget_reached",
        source,
        partition: partition.id,
        pagesFetched: outcome.pagesFetched,
        cursor: describeCursor(cursor)
      }));
      return finish("in_progress");
    }

    if (outcome.pagesFetched > 0) {
      await sleepFn(pickDelayMs(config.pageDelay, randomFn), signal);
      if (signal?.aborted) return finish("interrupted");
    }

    const pageNumber = progress.pagesFetched + 1;
    const requestCursor = cursor;
    let page: CatalogPage;
    try {
      page = await retry(() => connector.fetchPage(partition, requestCursor, { signal }), {
        retries: config.maxRetries,
        minDelayMs: config.retryMinDelayMs,
        maxDelayMs: config.retryMaxDelayMs,
        randomFn,
        signal,
        sleepFn,
        shouldRetry: (err) => {
          if (!connector.isTransient(err)) return false;
          return { retry: true, delayMs: err instanceof TransientFetchError ? err.retryDelayMs : undefined };
        },
        onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({
            event: "crawl.retry",
            source,
            partition: partition.id,
            cursor: describeCursor(requestCursor),
            attempt,
            maxAttempts,
            delayMs,
            status: error instanceof TransientFetchError ? error.status ?? null : null
          }));
        },
        onGiveUp: ({ attempt, maxAttempts }) => {
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({
            event: "crawl.give_up",
            source,
            partition: partition.id,
            cursor: describeCursor(requestCursor),
            attempt,
            maxAttempts
          }));
        }
      });
    } catch (error) {
      if (signal?.aborted) return finish("interrupted");

      const decision = classifyFetchFailure(error, contextFor(pageNumber), (err) => connector.isTransient(err));
      if (decision.action === "abort_source") throw decision.error;

      // eslint-disable-next-line no-console
      console.warn(JSON.stringify(decision.log));
      progress = state.updatePartition(partition.id, { status: "failed", lastError: decision.reason });
      await persist(pageNumber);
      return finish("failed");
    }

    outcome.pagesFetched += 1;

    const fresh: RecordEnvelope[] = [];
    const freshKeys = new Set<RecordKey>();
    for (const [index, record] of page.records.entries()) {
      const key = deriveKey(connector, record, { source, partition: partition.id, page: pageNumber, index });
      if (key == null) {
        outcome.skippedInvalid += 1;
        continue;
      }
      if (state.contains(key) || freshKeys.has(key)) {
        outcome.duplicates += 1;
        continue;
      }
      freshKeys.add(key);
      fresh.push({
        key,
        record,
        sourceMetadata: connector.metadataOf?.(partition, record) ?? defaultMetadata(partition)
      });
    }

    if (fresh.length > 0) {
      try {
        await sink.append(fresh);
      } catch (error) {
        throw wrapSinkFailure(error, contextFor(pageNumber));
      }
    }
    state.addAll(freshKeys);
    outcome.accepted += fresh.length;

    const exhausted = page.exhausted || page.records.length === 0;
    const advanced = page.nextCursor != null && !sameCursor(page.nextCursor, requestCursor);
    stalledPages = exhausted || advanced ? 0 : stalledPages + 1;
    const stalled = stalledPages >= STALL_LIMIT;
    if (page.nextCursor != null) cursor = page.nextCursor;
    if (page.truncated === true) outcome.truncated = true;

    progress = state.updatePartition(partition.id, {
      status: exhausted || stalled ? "complete" : "in_progress",
      cursor,
      pagesFetched: progress.pagesFetched + 1,
      recordsAccepted: progress.recordsAccepted + fresh.length,
      truncated: progress.truncated || page.truncated === true,
      lastError: undefined
    });
    await persist(pageNumber);

    // eslint-disable-next-line no-console
    console.log(JSON.stringify({
      event: "crawl.page_committed",
      source,
      partition: partition.id,
      page: pageNumber,
      received: page.records.length,
      accepted: fresh.length,
      cursor: describeCursor(cursor)
    }));

    if (exhausted) {
      if (page.truncated === true) {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "crawl.partition_truncated",
          source,
          partition: partition.id,
          pagesFetched: progress.pagesFetched,
          recordsAccepted: progress.recordsAccepted
        }));
      }
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({
        event: "crawl.partition_completed",
        source,
        partition: partition.id,
        pagesFetched: progress.pagesFetched,
        recordsAccepted: progress.recordsAccepted
      }));
      return finish("complete");
    }

    if (stalled) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "crawl.partition_stalled",
        source,
        partition: partition.id,
        cursor: describeCursor(cursor),
        pagesFetched: progress.pagesFetched
      }));
      return finish("complete");
    }
  }
};

const deriveKey = (
  connector: CatalogConnector,
  record: CatalogRecord,
  context: { source: string; partition: string; page: number; index: number }
): RecordKey | undefined => {
  try {
    return connector.keyOf(record);
  } catch (error) {
    const decision = classifyKeyFailure(error, context);
    if (decision.action === "fail") throw decision.error;
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify(decision.log));
    return undefined;
  }
};
