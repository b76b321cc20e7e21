import type { CatalogRecord, Partition, RecordKey } from "../../../core/catalog/catalog.types";
import type { Cursor } from "../../../core/crawl/cursor";
import type { CatalogConnector, CatalogPage, Credential, FetchPageContext } from "../../../ports/CatalogConnector";
import { isTransientFetchError, type RetailHttpClient } from "../../http/RetailHttpClient";
import { identifierOf, readRecords, requireKey } from "../responseShape";

const SOURCE = "aldi";

/**
 * Aldi serves each product collection as one document of article groups, so every partition is a
 * single page.
 */
export class AldiConnector implements CatalogConnector {
  readonly source = SOURCE;

  constructor(private readonly http: RetailHttpClient) {}

  async authenticate(): Promise<Credential | null> {
    return null;
  }

  async listPartitions(): Promise<Partition[]> {
    const body = await this.http.requestJson({ path: "products.json" });
    return readRecords(body, ["productCollections"], SOURCE).flatMap((collection) => {
      const id = identifierOf(collection.id);
      if (id == null) return [];
      const label = typeof collection.title === "string" ? collection.title : id;
      return [{ id, label, path: [label] }];
    });
  }

  async fetchPage(partition: Partition, _cursor: Cursor | null, ctx: FetchPageContext = {}): Promise<CatalogPage> {
    const body = await this.http.requestJson({
      path: `products/${encodeURIComponent(partition.id)}.json`,
      signal: ctx.signal
    });
    const records = readRecords(body, ["articleGroups"], SOURCE).flatMap((group) =>
      readRecords(group, ["articles"], SOURCE)
    );
    return { records, nextCursor: null, exhausted: true };
  }

  keyOf(record: CatalogRecord): RecordKey {
    return requireKey(record, "articleId", SOURCE);
  }

  isTransient(error: unknown): boolean {
    return isTransientFetchError(error);
  }

  metadataOf(partition: Partition): Record<string, string> {
    return { collection: partition.id };
  }
}
