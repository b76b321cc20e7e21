import {
  type CatalogRecord,
  type Partition,
  type ProductRef,
  type RecordKey,
  resolveProductId
} from "../../../core/catalog/catalog.types";
import type { Cursor } from "../../../core/crawl/cursor";
import { MalformedResponseError } from "../../../core/crawl/crawl.errors";
import type { CatalogConnector, CatalogPage, Credential, FetchPageContext } from "../../../ports/CatalogConnector";
import { isTransientFetchError, type RetailHttpClient } from "../../http/RetailHttpClient";
import { identifierOf, isRecord, offsetOf, optionalNumber, readRecords, requireKey } from "../responseShape";

export type JumboConnectorConfig = {
  pageSize: number;
  // The search API stops serving results past a fixed number of pages; reaching it marks the
  // partition as possibly truncated.
  maxPagesPerCategory?: number;
};

export const defaultJumboConfig: JumboConnectorConfig = {
  pageSize: 30
};

const SOURCE = "jumbo";

export class JumboConnector implements CatalogConnector {
  readonly source = SOURCE;

  constructor(
    private readonly http: RetailHttpClient,
    private readonly config: JumboConnectorConfig = defaultJumboConfig
  ) {}

  async authenticate(): Promise<Credential | null> {
    return null;
  }

  async listPartitions(): Promise<Partition[]> {
    const body = await this.http.requestJson({ path: "categories" });
    return readRecords(body, ["categories", "data"], SOURCE).flatMap((category) => {
      const rawId = identifierOf(category.id);
      if (rawId == null) return [];
      const id = rawId.replace(/^category:/, "");
      const label = typeof category.title === "string" ? category.title : id;
      return [{ id, label, path: [label] }];
    });
  }

  async fetchPage(partition: Partition, cursor: Cursor | null, ctx: FetchPageContext = {}): Promise<CatalogPage> {
    const offset = offsetOf(cursor, SOURCE);
    const { pageSize, maxPagesPerCategory } = this.config;

    const body = await this.http.requestJson({
      path: "search",
      query: { offset, limit: pageSize, filters: `category:${partition.id}` },
      signal: ctx.signal
    });
    const records = readRecords(body, ["products", "data"], SOURCE);
    const total = isRecord(body) && isRecord(body.products) ? optionalNumber(body.products.total) : undefined;

    const nextOffset = offset + records.length;
    const catalogDone = records.length === 0 || (total != null && nextOffset >= total);
    const pagesServed = Math.floor(offset / pageSize) + 1;
    const capped = !catalogDone && maxPagesPerCategory != null && pagesServed >= maxPagesPerCategory;

    return {
      records,
      nextCursor: { kind: "offset", offset: nextOffset, limit: pageSize },
      exhausted: catalogDone || capped,
      truncated: capped
    };
  }

  /** Full product document for a search hit or a bare product id. */
  async fetchProductDetails(ref: ProductRef, ctx: FetchPageContext = {}): Promise<CatalogRecord> {
    const id = resolveProductId(ref, (record) => this.keyOf(record));
    const body = await this.http.requestJson({ path: `products/${encodeURIComponent(id)}`, signal: ctx.signal });
    if (!isRecord(body) || !isRecord(body.product) || !isRecord(body.product.data)) {
      throw new MalformedResponseError(`${SOURCE} product ${id} response has no product.data`, { source: SOURCE });
    }
    return body.product.data;
  }

  keyOf(record: CatalogRecord): RecordKey {
    return requireKey(record, "id", SOURCE);
  }

  isTransient(error: unknown): boolean {
    return isTransientFetchError(error);
  }

  metadataOf(partition: Partition): Record<string, string> {
    return { mainCategory: partition.label };
  }
}
