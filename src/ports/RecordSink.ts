import type { RecordEnvelope, RecordKey } from "../core/catalog/catalog.types";

export type SinkOpenResult = {
  committedKeys: RecordKey[];
  // set when unreadable stored records were thrown away; no earlier checkpoint matches the store
  discarded: boolean;
};

/**
 * Append-only record store owned by exactly one source.
 */
export interface RecordSink {
  /** Prepares the store and reports the keys it already holds. */
  open(): Promise<SinkOpenResult>;
  append(envelopes: RecordEnvelope[]): Promise<{ appended: number }>;
  reset(): Promise<void>;
  close(): Promise<void>;
}
