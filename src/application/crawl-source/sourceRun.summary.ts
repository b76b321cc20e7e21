import type { PartitionOutcome } from "../crawl-partition/drivePartition.usecase";

export type SourceStatus = "success" | "failed";

export type PartitionCounts = {
  total: number;
  completed: number;
  failed: number;
  skipped: number;
  pending: number;
  truncated: number;
};

export type SourceRunReport = {
  totalRecords: number;
  status: SourceStatus;
  partitions: PartitionCounts;
  error?: { code: string; message: string };
};

export const emptyPartitionCounts = (): PartitionCounts => ({
  total: 0,
  completed: 0,
  failed: 0,
  skipped: 0,
  pending: 0,
  truncated: 0
});

export const createSourceRunTracker = () => {
  let totalRecords = 0;
  let duplicates = 0;
  let skippedInvalid = 0;
  const partitions = emptyPartitionCounts();

  return {
    setPartitionTotal: (total: number) => {
      partitions.total = total;
    },
    addOutcome: (outcome: PartitionOutcome) => {
      totalRecords += outcome.accepted;
      duplicates += outcome.duplicates;
      skippedInvalid += outcome.skippedInvalid;
      if (outcome.truncated) partitions.truncated += 1;
      switch (outcome.status) {
        case "complete":
          partitions.completed += 1;
          break;
        case "failed":
          partitions.failed += 1;
          break;
        case "skipped":
          partitions.skipped += 1;
          break;
        case "in_progress":
        case "interrupted":
          partitions.pending += 1;
          break;
      }
    },
    totals: () => ({ totalRecords, duplicates, skippedInvalid }),
    report: (status: SourceStatus, error?: { code: string; message: string }): SourceRunReport => {
      const report: SourceRunReport = { totalRecords, status, partitions: { ...partitions } };
      if (error) report.error = error;
      return report;
    }
  };
};
