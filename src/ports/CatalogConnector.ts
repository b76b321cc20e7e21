import type { CatalogRecord, Partition, RecordKey } from "../core/catalog/catalog.types";
import type { Cursor } from "../core/crawl/cursor";

export type Credential = {
  token: string;
  expiresAt?: Date;
};

export type FetchPageContext = {
  signal?: AbortSignal;
};

export type CatalogPage = {
  records: CatalogRecord[];
  nextCursor: Cursor | null;
  exhausted: boolean;
  // set when the source stopped serving pages before the catalog ran out (a hard page cap)
  truncated?: boolean;
};

/**
 * Capability each retailer adapter provides to the crawl engine. Implementations own every detail
 * of the wire format; the engine only sees partitions, cursors and opaque records.
 */
export interface CatalogConnector {
  readonly source: string;

  /** Idempotent; the first credential is reused for the lifetime of the connector. */
  authenticate(): Promise<Credential | null>;

  listPartitions(): Promise<Partition[]>;

  /** `cursor` is null for the first page of a partition. */
  fetchPage(partition: Partition, cursor: Cursor | null, ctx?: FetchPageContext): Promise<CatalogPage>;

  keyOf(record: CatalogRecord): RecordKey;

  isTransient(error: unknown): boolean;

  metadataOf?(partition: Partition, record: CatalogRecord): Record<string, string>;
}
