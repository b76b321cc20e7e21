import type { RecordKey } from "../catalog/catalog.types";
import { type Cursor, parseCursor } from "./cursor";

export type PartitionStatus = "in_progress" | "complete" | "failed";

export type PartitionProgress = {
  status: PartitionStatus;
  cursor: Cursor | null;
  pagesFetched: number;
  recordsAccepted: number;
  truncated: boolean;
  lastError?: string;
};

export type CheckpointSnapshot = {
  version: 1;
  source: string;
  seenKeys: RecordKey[];
  partitions: Record<string, PartitionProgress>;
  updatedAt: string;
};

const emptyProgress = (): PartitionProgress => ({
  status: "in_progress",
  cursor: null,
  pagesFetched: 0,
  recordsAccepted: 0,
  truncated: false
});

/**
 * Dedup set plus per-partition cursor/completion state for one source.
 * The seen set only grows; nothing in here removes a key.
 */
export class CrawlState {
  private readonly seen = new Set<RecordKey>();
  private readonly partitions = new Map<string, PartitionProgress>();

  constructor(readonly source: string) {}

  contains(key: RecordKey): boolean {
    return this.seen.has(key);
  }

  addAll(keys: Iterable<RecordKey>): number {
    const before = this.seen.size;
    for (const key of keys) this.seen.add(key);
    return this.seen.size - before;
  }

  get seenCount(): number {
    return this.seen.size;
  }

  progressOf(partitionId: string): PartitionProgress {
    const existing = this.partitions.get(partitionId);
    return existing ? { ...existing } : emptyProgress();
  }

  updatePartition(partitionId: string, patch: Partial<PartitionProgress>): PartitionProgress {
    const next = { ...this.progressOf(partitionId), ...patch };
    this.partitions.set(partitionId, next);
    return next;
  }

  isComplete(partitionId: string): boolean {
    return this.partitions.get(partitionId)?.status === "complete";
  }

  snapshot(now: Date = new Date()): CheckpointSnapshot {
    const partitions: Record<string, PartitionProgress> = {};
    for (const [id, progress] of this.partitions) {
      partitions[id] = { ...progress };
    }

    return {
      version: 1,
      source: this.source,
      seenKeys: Array.from(this.seen),
      partitions,
      updatedAt: now.toISOString()
    };
  }

  restore(snapshot: CheckpointSnapshot): void {
    if (snapshot.source !== this.source) {
      throw new Error(`Checkpoint belongs to source "${snapshot.source}", not "${this.source}"`);
    }

    this.seen.clear();
    this.partitions.clear();
    for (const key of snapshot.seenKeys) this.seen.add(key);
    for (const [id, progress] of Object.entries(snapshot.partitions)) {
      this.partitions.set(id, { ...progress });
    }
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isCount = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value >= 0;

const partitionStatuses: readonly PartitionStatus[] = ["in_progress", "complete", "failed"];

const isPartitionStatus = (value: unknown): value is PartitionStatus =>
  typeof value === "string" && partitionStatuses.some((status) => status === value);

const parsePartitionProgress = (value: unknown): PartitionProgress | undefined => {
  if (!isRecord(value)) return undefined;
  if (!isPartitionStatus(value.status)) return undefined;
  if (!isCount(value.pagesFetched) || !isCount(value.recordsAccepted)) return undefined;
  if (typeof value.truncated !== "boolean") return undefined;

  const cursor = parseCursor(value.cursor);
  if (cursor === undefined) return undefined;

  const progress: PartitionProgress = {
    status: value.status,
    cursor,
    pagesFetched: value.pagesFetched,
    recordsAccepted: value.recordsAccepted,
    truncated: value.truncated
  };
  if (typeof value.lastError === "string") {
    progress.lastError = value.lastError;
  }
  return progress;
};

/**
 * Validates a decoded checkpoint document. Returns a reason string on failure so the caller can
 * report what was wrong with the file.
 */
export const parseCheckpointSnapshot = (
  value: unknown
): { ok: true; snapshot: CheckpointSnapshot } | { ok: false; reason: string } => {
  if (!isRecord(value)) return { ok: false, reason: "checkpoint is not an object" };
  if (value.version !== 1) return { ok: false, reason: `unsupported checkpoint version: ${String(value.version)}` };
  if (typeof value.source !== "string") return { ok: false, reason: "checkpoint source is missing" };
  if (!Array.isArray(value.seenKeys)) return { ok: false, reason: "seenKeys is not an array" };

  const seenKeys: RecordKey[] = [];
  for (const key of value.seenKeys) {
    if (typeof key !== "string") return { ok: false, reason: "seenKeys contains a non-string key" };
    seenKeys.push(key);
  }

  if (!isRecord(value.partitions)) return { ok: false, reason: "partitions is not an object" };
  const partitions: Record<string, PartitionProgress> = {};
  for (const [id, raw] of Object.entries(value.partitions)) {
    const progress = parsePartitionProgress(raw);
    if (!progress) return { ok: false, reason: `partition "${id}" has an invalid progress entry` };
    partitions[id] = progress;
  }

  const updatedAt = typeof value.updatedAt === "string" ? value.updatedAt : new Date(0).toISOString();

  return {
    ok: true,
    snapshot: { version: 1, source: value.source, seenKeys, partitions, updatedAt }
  };
};
