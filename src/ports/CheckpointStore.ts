import type { CheckpointSnapshot } from "../core/crawl/CrawlState";

export interface CheckpointStore {
  /** Resolves null when no checkpoint exists; rejects with CorruptStateError when one is unreadable. */
  load(): Promise<CheckpointSnapshot | null>;
  save(snapshot: CheckpointSnapshot): Promise<void>;
  reset(): Promise<void>;
}
