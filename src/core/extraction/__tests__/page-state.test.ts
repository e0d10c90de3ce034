import { describe, expect, it } from "vitest";
import { readFixture } from "../../__tests__/helpers";
import { parseHtmlDocument, type HtmlDocument } from "../html";
import { pagePropsStrategy, pageStateStrategy, toPagination } from "../page-state";

const URL = "https://shop.test/search?search-bar=milk";

function nextDataDoc(pageProps: unknown): HtmlDocument {
  const json = JSON.stringify({ props: { pageProps } });
  return parseHtmlDocument(`<html><body><script id="__NEXT_DATA__" type="application/json">${json}</script></body></html>`, URL);
}

const tile = (n: number) => ({ productId: `P${n}`, title: `Product ${n}` });

describe("pageStateStrategy", () => {
  it("reads tiles from the main content collection of a keyed layout", () => {
    const result = pageStateStrategy.extract(parseHtmlDocument(readFixture("page-state-search.html"), URL));

    expect(result?.strategy).toBe("page-state/search-layout");
    expect(result?.kind).toBe("embedded-json");
    expect(result?.products.map((p) => p.productId ?? p.code)).toEqual(["20658152_EA", "21001_EA"]);
    expect(result?.pagination).toEqual({ hasMore: true, currentPage: 1, totalPages: 3 });
  });

  it("reads tiles from every section of a listed layout", () => {
    const doc = nextDataDoc({
      initialSearchData: {
        layout: {
          sections: [
            { components: [{ data: { productTiles: [tile(1)] } }, { data: null }] },
            { components: [{ data: { productTiles: [tile(2), "not a tile"] } }] },
          ],
        },
        pagination: { pageNumber: 2, totalPages: 2 },
      },
    });

    const result = pageStateStrategy.extract(doc);

    expect(result?.products).toEqual([tile(1), tile(2)]);
    expect(result?.pagination).toEqual({ hasMore: null, currentPage: 2, totalPages: 2 });
  });

  it("falls back to the legacy flat product list", () => {
    const products = Array.from({ length: 10 }, (_, i) => tile(i + 1));
    const result = pageStateStrategy.extract(nextDataDoc({ initialSearchData: { products } }));

    expect(result?.strategy).toBe("page-state/search-legacy");
    expect(result?.products).toHaveLength(10);
    expect(result?.pagination).toBeNull();
  });

  it("reads category pages", () => {
    const doc = nextDataDoc({
      initialCategoryData: {
        layout: { sections: { mainContentCollection: { components: [{ data: { productTiles: [tile(7)] } }] } } },
      },
    });
    expect(pageStateStrategy.extract(doc)?.strategy).toBe("page-state/category-layout");
  });

  it("yields nothing without page state", () => {
    expect(pageStateStrategy.extract(parseHtmlDocument("<html><body>plain</body></html>", URL))).toBeNull();
    expect(pageStateStrategy.extract(nextDataDoc({ initialSearchData: { products: [] } }))).toBeNull();
    const broken = parseHtmlDocument('<script id="__NEXT_DATA__">{"props": </script>', URL);
    expect(pageStateStrategy.extract(broken)).toBeNull();
  });
});

describe("pagePropsStrategy", () => {
  it("finds a product list under a known key in nested containers", () => {
    const doc = nextDataDoc({
      initialData: {
        productList: [{ id: "A" }, { id: "B" }],
        pagination: { currentPage: "3", totalPages: "5" },
      },
    });

    const result = pagePropsStrategy.extract(doc);

    expect(result?.strategy).toBe("page-props/productList");
    expect(result?.products).toEqual([{ id: "A" }, { id: "B" }]);
    expect(result?.pagination).toEqual({ hasMore: null, currentPage: 3, totalPages: 5 });
  });

  it("prefers the top-level props", () => {
    const doc = nextDataDoc({ items: [{ id: "top" }], data: { products: [{ id: "nested" }] } });
    expect(pagePropsStrategy.extract(doc)?.strategy).toBe("page-props/items");
  });
});

describe("toPagination", () => {
  it("is null when no field is readable", () => {
    expect(toPagination({ cursor: "abc" })).toBeNull();
    expect(toPagination("page 2")).toBeNull();
  });

  it("accepts string booleans", () => {
    expect(toPagination({ hasMore: "false" })).toEqual({ hasMore: false, currentPage: null, totalPages: null });
  });
});
