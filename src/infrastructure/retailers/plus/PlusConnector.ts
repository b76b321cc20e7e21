import type { CatalogRecord, Partition, RecordKey } from "../../../core/catalog/catalog.types";
import type { Cursor } from "../../../core/crawl/cursor";
import { FatalAuthError, InvalidRecordError, MalformedResponseError } from "../../../core/crawl/crawl.errors";
import type { CatalogConnector, CatalogPage, Credential, FetchPageContext } from "../../../ports/CatalogConnector";
import { isTransientFetchError, type RetailHttpClient } from "../../http/RetailHttpClient";
import { identifierOf, isRecord, optionalNumber, pageOf, readPath, readRecords } from "../responseShape";

export type PlusConnectorConfig = {
  categoriesApiVersion: string;
  productsApiVersion: string;
  excludedCategorySlugs: string[];
};

export const defaultPlusConfig: PlusConnectorConfig = {
  categoriesApiVersion: "SpgKBmBbzIq67HF3dBCsXg",
  productsApiVersion: "bYh0SIb+kuEKWPesnQKP1A",
  excludedCategorySlugs: ["0_promotions"]
};

const SOURCE = "plus";
const VIEW_NAME = "MainFlow.ProductListPage";
const VERSION_PATH = "moduleservices/moduleversioninfo";
const CATEGORIES_PATH = "screenservices/ECP_Product_CW/Categories/CategoryList_TF/DataActionGetMenuCategories";
const PRODUCTS_PATH = "screenservices/ECP_Composition_CW/ProductLists/PLP_Content/DataActionGetProductListAndCategoryInfo";

/**
 * Plus runs on a low-code screen-services backend: every call carries the current module version
 * token, and the category list arrives as a JSON string inside the JSON response.
 */
export class PlusConnector implements CatalogConnector {
  readonly source = SOURCE;
  private credential?: Promise<Credential>;

  constructor(
    private readonly http: RetailHttpClient,
    private readonly config: PlusConnectorConfig = defaultPlusConfig
  ) {}

  authenticate(): Promise<Credential> {
    if (!this.credential) {
      this.credential = this.fetchVersionToken();
      void this.credential.catch(() => {
        this.credential = undefined;
      });
    }
    return this.credential;
  }

  private async fetchVersionToken(): Promise<Credential> {
    const body = await this.http.requestJson({ path: VERSION_PATH });
    const token = isRecord(body) ? body.versionToken : undefined;
    if (typeof token !== "string" || token === "") {
      throw new FatalAuthError(`${SOURCE} module version response has no versionToken`, { source: SOURCE });
    }
    return { token };
  }

  async listPartitions(): Promise<Partition[]> {
    const { token } = await this.authenticate();
    const body = await this.http.requestJson({
      method: "POST",
      path: CATEGORIES_PATH,
      body: {
        versionInfo: { moduleVersion: token, apiVersion: this.config.categoriesApiVersion },
        viewName: VIEW_NAME,
        screenData: { variables: {} }
      }
    });

    const encoded = readPath(body, ["data", "CategoriesJson"], SOURCE);
    if (typeof encoded !== "string") {
      throw new MalformedResponseError(`${SOURCE} data.CategoriesJson is not a string`, { source: SOURCE });
    }
    let categories: unknown;
    try {
      categories = JSON.parse(encoded);
    } catch (err) {
      throw new MalformedResponseError(`${SOURCE} data.CategoriesJson is not valid JSON`, { source: SOURCE }, err);
    }

    return readRecords(categories, [], SOURCE).flatMap((entry) => {
      const category = entry.Category_str;
      if (!isRecord(category) || "ParentName" in category) return [];
      const slug = identifierOf(category.Slug);
      if (slug == null || this.config.excludedCategorySlugs.includes(slug)) return [];
      const label = typeof category.Name === "string" ? category.Name : slug;
      return [{ id: slug, label, path: [label] }];
    });
  }

  async fetchPage(partition: Partition, cursor: Cursor | null, ctx: FetchPageContext = {}): Promise<CatalogPage> {
    const page = pageOf(cursor, 1, SOURCE);
    const { token } = await this.authenticate();

    const body = await this.http.requestJson({
      method: "POST",
      path: PRODUCTS_PATH,
      body: {
        versionInfo: { moduleVersion: token, apiVersion: this.config.productsApiVersion },
        viewName: VIEW_NAME,
        screenData: { variables: { PageNumber: page, CategorySlug: partition.id } }
      },
      signal: ctx.signal
    });
    const records = readRecords(body, ["data", "ProductList", "List"], SOURCE);
    const totalPages = optionalNumber(readPath(body, ["data", "TotalPages"], SOURCE)) ?? page;

    return {
      records,
      nextCursor: { kind: "page", page: page + 1, pageSize: records.length },
      exhausted: records.length === 0 || page >= totalPages
    };
  }

  keyOf(record: CatalogRecord): RecordKey {
    const summary = isRecord(record.PLP_Str) ? record.PLP_Str : record;
    const sku = identifierOf(summary.SKU);
    if (sku == null) {
      throw new InvalidRecordError(`${SOURCE} record has no usable "SKU"`, { source: SOURCE });
    }
    return sku;
  }

  isTransient(error: unknown): boolean {
    return isTransientFetchError(error);
  }

  metadataOf(partition: Partition): Record<string, string> {
    return { categorySlug: partition.id, category: partition.label };
  }
}
