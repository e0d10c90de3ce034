import { describe, expect, it } from "vitest";
import { ConfigError } from "../../errors";
import type { ClientRequestOptions } from "../../network/tls-client";
import type { HttpMethod, TransportResponse } from "../../network/transport";
import type { SearchApiConfig, StoreLocation } from "../../types/config";
import { errorHandling, fakePacer, silentLogger } from "../../__tests__/helpers";
import { HttpFetcher, type HttpClient } from "../http-fetcher";
import { resolveSearchApiKey, SearchApiFetcher } from "../search-api-fetcher";

const api: SearchApiConfig = {
  url: "https://search.test",
  appId: "test-app",
  apiKeyEnv: "TEST_SEARCH_KEY",
  indexName: "products_en",
  hitsPerPage: 24,
  storeFilterAttribute: "storeId",
  agent: "test-agent (1.0)",
};

const store: StoreLocation = { id: "0315", name: "Shawnessy", city: "Calgary", province: "AB" };

class JsonClient implements HttpClient {
  readonly calls: Array<{ method: HttpMethod; url: string; options?: ClientRequestOptions }> = [];
  closed = false;

  constructor(private readonly body: string) {}

  async request(method: HttpMethod, url: string, options?: ClientRequestOptions): Promise<TransportResponse> {
    this.calls.push({ method, url, options });
    return { status: 200, url, headers: {}, body: this.body };
  }

  rotateFingerprint(): string {
    return "chrome_117";
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

function setup(config: SearchApiConfig = api, env: NodeJS.ProcessEnv = { TEST_SEARCH_KEY: "test-secret" }) {
  const client = new JsonClient('{"results":[{"hits":[],"nbPages":0}]}');
  const http = new HttpFetcher({
    client,
    pacer: fakePacer().pacer,
    errorHandling: errorHandling(),
    logger: silentLogger(),
  });
  const fetcher = new SearchApiFetcher(config, http, {
    apiKey: resolveSearchApiKey(config, env),
    referer: "https://shop.test",
    logger: silentLogger(),
  });
  return { fetcher, client };
}

describe("SearchApiFetcher.buildRequest", () => {
  it("sends a 0-based page with the store filter", () => {
    const { fetcher } = setup();

    const request = fetcher.buildRequest("milk", 2, store);
    const params = new URLSearchParams(request.body.requests[0].params);

    expect(request.body.requests[0].indexName).toBe("products_en");
    expect(params.get("query")).toBe("milk");
    expect(params.get("page")).toBe("1");
    expect(params.get("hitsPerPage")).toBe("24");
    expect(params.get("filters")).toBe("storeId:0315");
  });

  it("targets the multi-query endpoint with the agent parameter", () => {
    const { fetcher } = setup();

    const url = new URL(fetcher.buildRequest("milk", 1, null).url);

    expect(url.origin).toBe("https://search.test");
    expect(url.pathname).toBe("/1/indexes/*/queries");
    expect(url.searchParams.get("x-algolia-agent")).toBe("test-agent (1.0)");
  });

  it("carries credentials and the storefront origin in headers", () => {
    const { fetcher } = setup();

    expect(fetcher.buildRequest("milk", 1, null).headers).toEqual({
      Accept: "application/json",
      Origin: "https://shop.test",
      Referer: "https://shop.test/",
      "x-algolia-api-key": "test-secret",
      "x-algolia-application-id": "test-app",
    });
  });

  it("omits the filter without a store or a filter attribute", () => {
    const { fetcher } = setup({ ...api, storeFilterAttribute: null, agent: null });

    const request = fetcher.buildRequest("milk", 1, store);

    expect(new URLSearchParams(request.body.requests[0].params).has("filters")).toBe(false);
    expect(new URL(request.url).search).toBe("");
  });
});

describe("SearchApiFetcher", () => {
  it("requires the API key from the environment", () => {
    for (const env of [{}, { TEST_SEARCH_KEY: "   " }]) {
      const error = (() => {
        try {
          setup(api, env);
        } catch (e) {
          return e;
        }
        return null;
      })();
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) expect(error.field).toBe("search_api.api_key_env");
    }
  });

  it("posts the query and returns the parsed reply", async () => {
    const { fetcher, client } = setup();

    const reply = await fetcher.search("milk", 1, null);

    expect(reply).toEqual({ results: [{ hits: [], nbPages: 0 }] });
    expect(client.calls).toHaveLength(1);
    expect(client.calls[0].method).toBe("POST");
    expect(client.calls[0].options?.json).toEqual({
      requests: [{ indexName: "products_en", params: "query=milk&hitsPerPage=24&page=0" }],
    });
  });

  it("closes the underlying HTTP client", async () => {
    const { fetcher, client } = setup();
    await fetcher.close();
    expect(client.closed).toBe(true);
  });
});
