import { productRefById, productRefOf } from "../../src/core/catalog/catalog.types";
import { InvalidRecordError } from "../../src/core/crawl/crawl.errors";
import { RetailHttpClient } from "../../src/infrastructure/http/RetailHttpClient";
import { JumboConnector } from "../../src/infrastructure/retailers/jumbo/JumboConnector";
import { startJsonServer } from "../support/httpServer";

const fruit = { id: "SG1", label: "Fruit", path: ["Fruit"] };

describe("JumboConnector", () => {
  it("lists top-level categories as partitions", async () => {
    const server = await startJsonServer({
      "GET /v17/categories": () => ({
        body: {
          categories: {
            data: [{ id: "category:SG1", title: "Fruit" }, { id: 42, title: "Bread" }, { title: "No id" }]
          }
        }
      })
    });
    const connector = new JumboConnector(new RetailHttpClient(`${server.baseUrl}/v17`, { source: "jumbo" }));

    await expect(connector.listPartitions()).resolves.toEqual([
      { id: "SG1", label: "Fruit", path: ["Fruit"] },
      { id: "42", label: "Bread", path: ["Bread"] }
    ]);
    await expect(connector.authenticate()).resolves.toBeNull();
    await server.close();
  });

  it("pages a category by offset and stops at the reported total", async () => {
    const server = await startJsonServer({
      "GET /v17/search": () => ({
        body: { products: { data: [{ id: "p1" }, { id: "p2" }], total: 32 } }
      })
    });
    const connector = new JumboConnector(new RetailHttpClient(`${server.baseUrl}/v17`, { source: "jumbo" }));

    const page = await connector.fetchPage(fruit, { kind: "offset", offset: 30, limit: 30 });

    expect(page).toEqual({
      records: [{ id: "p1" }, { id: "p2" }],
      nextCursor: { kind: "offset", offset: 32, limit: 30 },
      exhausted: true,
      truncated: false
    });
    const query = server.requests[0]?.url.searchParams;
    expect(query?.get("offset")).toBe("30");
    expect(query?.get("limit")).toBe("30");
    expect(query?.get("filters")).toBe("category:SG1");
    await server.close();
  });

  it("starts at offset 0 and keeps going while more products remain", async () => {
    const server = await startJsonServer({
      "GET /v17/search": () => ({ body: { products: { data: [{ id: "p1" }], total: 5 } } })
    });
    const connector = new JumboConnector(new RetailHttpClient(`${server.baseUrl}/v17`, { source: "jumbo" }), { pageSize: 1 });

    const page = await connector.fetchPage(fruit, null);

    expect(page.exhausted).toBe(false);
    expect(page.nextCursor).toEqual({ kind: "offset", offset: 1, limit: 1 });
    expect(server.requests[0]?.url.searchParams.get("offset")).toBe("0");
    await server.close();
  });

  it("marks a category truncated when the page cap is reached first", async () => {
    const server = await startJsonServer({
      "GET /v17/search": () => ({ body: { products: { data: [{ id: "p3" }, { id: "p4" }], total: 10 } } })
    });
    const connector = new JumboConnector(new RetailHttpClient(`${server.baseUrl}/v17`, { source: "jumbo" }), {
      pageSize: 2,
      maxPagesPerCategory: 2
    });

    const page = await connector.fetchPage(fruit, { kind: "offset", offset: 2, limit: 2 });

    expect(page.exhausted).toBe(true);
    expect(page.truncated).toBe(true);
    await server.close();
  });

  it("fetches product details from an id or a search hit", async () => {
    const server = await startJsonServer({
      "GET /v17/products/p1": () => ({ body: { product: { data: { id: "p1", title: "Apples" } } } })
    });
    const connector = new JumboConnector(new RetailHttpClient(`${server.baseUrl}/v17`, { source: "jumbo" }));

    await expect(connector.fetchProductDetails(productRefById("p1"))).resolves.toEqual({ id: "p1", title: "Apples" });
    await expect(connector.fetchProductDetails(productRefOf({ id: "p1", title: "short" }))).resolves.toEqual({
      id: "p1",
      title: "Apples"
    });
    await server.close();
  });

  it("derives keys from the product id", () => {
    const connector = new JumboConnector(new RetailHttpClient("http://127.0.0.1:1", { source: "jumbo" }));

    expect(connector.keyOf({ id: "  p9 " })).toBe("p9");
    expect(() => connector.keyOf({ title: "no id" })).toThrow(InvalidRecordError);
    expect(connector.metadataOf(fruit)).toEqual({ mainCategory: "Fruit" });
  });

  it("refuses a cursor of another kind", async () => {
    const connector = new JumboConnector(new RetailHttpClient("http://127.0.0.1:1", { source: "jumbo" }));

    await expect(connector.fetchPage(fruit, { kind: "page", page: 2, pageSize: 30 })).rejects.toThrow(
      "jumbo paginates by offset, got a page cursor"
    );
  });
});
