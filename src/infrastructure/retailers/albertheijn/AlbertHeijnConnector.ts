import type { CatalogRecord, Partition, RecordKey } from "../../../core/catalog/catalog.types";
import { buildPartitionTree } from "../../../core/catalog/partitionTree";
import type { Cursor } from "../../../core/crawl/cursor";
import { FatalAuthError } from "../../../core/crawl/crawl.errors";
import type { CatalogConnector, CatalogPage, Credential, FetchPageContext } from "../../../ports/CatalogConnector";
import { isTransientFetchError, type RetailHttpClient } from "../../http/RetailHttpClient";
import { identifierOf, isRecord, optionalNumber, pageOf, readRecords, requireKey } from "../responseShape";

export type AlbertHeijnConnectorConfig = {
  authUrl: string;
  clientId: string;
  pageSize: number;
  // 0 drives the top-level shelves, 1 their sub-categories, and so on
  categoryDepth: number;
};

export const defaultAlbertHeijnConfig: AlbertHeijnConnectorConfig = {
  authUrl: "https://api.ah.nl/mobile-auth/v1/auth/token/anonymous",
  clientId: "appie",
  pageSize: 750,
  categoryDepth: 1
};

const SOURCE = "ah";

const toPartitions = (items: CatalogRecord[], parentPath: string[]): Partition[] =>
  items.flatMap((item) => {
    const id = identifierOf(item.id);
    if (id == null) return [];
    const label = typeof item.name === "string" ? item.name : id;
    return [{ id, label, path: [...parentPath, label] }];
  });

export class AlbertHeijnConnector implements CatalogConnector {
  readonly source = SOURCE;
  private credential?: Promise<Credential>;

  constructor(
    private readonly http: RetailHttpClient,
    private readonly config: AlbertHeijnConnectorConfig = defaultAlbertHeijnConfig
  ) {}

  authenticate(): Promise<Credential> {
    if (!this.credential) {
      this.credential = this.requestAnonymousToken();
      // a failed exchange must not stay cached, so the next call tries again
      void this.credential.catch(() => {
        this.credential = undefined;
      });
    }
    return this.credential;
  }

  private async requestAnonymousToken(): Promise<Credential> {
    const body = await this.http.requestJson({
      method: "POST",
      path: this.config.authUrl,
      body: { clientId: this.config.clientId }
    });
    const token = isRecord(body) ? body.access_token : undefined;
    if (typeof token !== "string" || token === "") {
      throw new FatalAuthError(`${SOURCE} token response has no access_token`, { source: SOURCE });
    }

    const expiresIn = isRecord(body) ? optionalNumber(body.expires_in) : undefined;
    return expiresIn != null ? { token, expiresAt: new Date(Date.now() + expiresIn * 1000) } : { token };
  }

  private async authHeaders(): Promise<Record<string, string>> {
    const { token } = await this.authenticate();
    return { authorization: `Bearer ${token}`, "x-application": "AHWEBSHOP" };
  }

  async listPartitions(): Promise<Partition[]> {
    const headers = await this.authHeaders();
    const roots = await this.http.requestJson({ path: "v1/product-shelves/categories", headers });

    const tree = await buildPartitionTree(
      toPartitions(readRecords(roots, [], SOURCE), []),
      async (parent) => {
        const body = await this.http.requestJson({
          path: `v1/product-shelves/categories/${encodeURIComponent(parent.id)}/sub-categories`,
          headers
        });
        return toPartitions(readRecords(body, ["children"], SOURCE), parent.path);
      },
      { maxDepth: this.config.categoryDepth }
    );
    return tree.leaves;
  }

  async fetchPage(partition: Partition, cursor: Cursor | null, ctx: FetchPageContext = {}): Promise<CatalogPage> {
    const page = pageOf(cursor, 0, SOURCE);
    const { pageSize } = this.config;

    const body = await this.http.requestJson({
      path: "product/search/v2",
      query: { query: partition.label, page, size: pageSize },
      headers: await this.authHeaders(),
      signal: ctx.signal
    });
    const records = readRecords(body, ["products"], SOURCE);
    const totalPages = isRecord(body) && isRecord(body.page) ? optionalNumber(body.page.totalPages) : undefined;

    return {
      records,
      nextCursor: { kind: "page", page: page + 1, pageSize },
      exhausted: records.length === 0 || (totalPages != null && page + 1 >= totalPages)
    };
  }

  keyOf(record: CatalogRecord): RecordKey {
    return requireKey(record, "webshopId", SOURCE);
  }

  isTransient(error: unknown): boolean {
    return isTransientFetchError(error);
  }

  metadataOf(partition: Partition): Record<string, string> {
    return { category: partition.label, categoryPath: partition.path.join(" / ") };
  }
}
