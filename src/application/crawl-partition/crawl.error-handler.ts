import {
  CrawlError,
  type CrawlErrorCode,
  FatalAuthError,
  InvalidRecordError,
  SourceAbortedError,
  toErrorMessage
} from "../../core/crawl/crawl.errors";

export type PartitionErrorContext = {
  source: string;
  partition: string;
  cursor: string;
  page: number;
};

type PartitionFailedLog = {
  event: "crawl.partition_failed";
  source: string;
  partition: string;
  cursor: string;
  page: number;
  code: CrawlErrorCode | "unexpected";
  reason: string;
  transient: boolean;
};

export type FetchFailureDecision =
  | {
      action: "fail_partition";
      reason: string;
      log: PartitionFailedLog;
    }
  | {
      action: "abort_source";
      error: CrawlError;
    };

/**
 * Decides what a fetch error that survived the retry loop means for the run. Only credential
 * failures take the whole source down; everything else costs one partition.
 */
export const classifyFetchFailure = (
  reason: unknown,
  context: PartitionErrorContext,
  isTransient: (error: unknown) => boolean
): FetchFailureDecision => {
  if (reason instanceof FatalAuthError) {
    return { action: "abort_source", error: reason };
  }

  const transient = isTransient(reason);
  const message = transient
    ? `retries exhausted: ${toErrorMessage(reason)}`
    : toErrorMessage(reason);

  return {
    action: "fail_partition",
    reason: message,
    log: {
      event: "crawl.partition_failed",
      source: context.source,
      partition: context.partition,
      cursor: context.cursor,
      page: context.page,
      code: reason instanceof CrawlError ? reason.code : "unexpected",
      reason: message,
      transient
    }
  };
};

type RecordSkippedLog = {
  event: "crawl.record_skipped";
  source: string;
  partition: string;
  page: number;
  index: number;
  reason: string;
};

export type KeyFailureDecision =
  | { action: "skip"; log: RecordSkippedLog }
  | { action: "fail"; error: SourceAbortedError };

export const classifyKeyFailure = (
  reason: unknown,
  context: Omit<PartitionErrorContext, "cursor"> & { index: number }
): KeyFailureDecision => {
  if (reason instanceof InvalidRecordError) {
    return {
      action: "skip",
      log: {
        event: "crawl.record_skipped",
        source: context.source,
        partition: context.partition,
        page: context.page,
        index: context.index,
        reason: reason.message
      }
    };
  }

  return {
    action: "fail",
    error: new SourceAbortedError(
      `Key derivation failed at partition=${context.partition}, page=${context.page}, index=${context.index}: ${toErrorMessage(reason)}`,
      { source: context.source, partition: context.partition },
      reason
    )
  };
};

export const wrapSinkFailure = (reason: unknown, context: PartitionErrorContext): SourceAbortedError =>
  new SourceAbortedError(
    `Record sink write failed at partition=${context.partition}, page=${context.page}: ${toErrorMessage(reason)}`,
    { source: context.source, partition: context.partition, cursor: context.cursor },
    reason
  );

export const wrapCheckpointFailure = (reason: unknown, context: PartitionErrorContext): SourceAbortedError =>
  new SourceAbortedError(
    `Checkpoint write failed at partition=${context.partition}, page=${context.page}: ${toErrorMessage(reason)}`,
    { source: context.source, partition: context.partition, cursor: context.cursor },
    reason
  );
