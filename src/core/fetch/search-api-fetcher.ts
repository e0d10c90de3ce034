/**
 * Direct queries against a hosted search index
 */

import { SEARCH_API_CONSTANTS } from "../constants";
import { ConfigError } from "../errors";
import type { SearchApiConfig, StoreLocation } from "../types/config";
import type { Logger } from "../utils/logger";
import type { HttpFetcher } from "./http-fetcher";

export interface SearchApiRequest {
  url: string;
  headers: Record<string, string>;
  body: { requests: Array<{ indexName: string; params: string }> };
}

export interface SearchApiFetcherOptions {
  apiKey: string;
  referer: string;
  logger: Logger;
}

/** The key from the variable the profile names; a ConfigError when unset */
export function resolveSearchApiKey(api: SearchApiConfig, env: NodeJS.ProcessEnv = process.env): string {
  const key = env[api.apiKeyEnv]?.trim();
  if (!key) {
    throw new ConfigError(`Search API key missing: set ${api.apiKeyEnv}`, "search_api.api_key_env");
  }
  return key;
}

export class SearchApiFetcher {
  private readonly apiKey: string;
  private readonly logger: Logger;

  constructor(
    private readonly api: SearchApiConfig,
    private readonly http: HttpFetcher,
    private readonly options: SearchApiFetcherOptions,
  ) {
    this.apiKey = options.apiKey;
    this.logger = options.logger.child({ component: "search-api" });
  }

  /** `page` is 1-based here and 0-based on the wire */
  buildRequest(query: string, page: number, store: StoreLocation | null): SearchApiRequest {
    const params = new URLSearchParams({
      query,
      hitsPerPage: String(this.api.hitsPerPage),
      page: String(page - 1),
    });
    if (store && this.api.storeFilterAttribute) {
      params.set("filters", `${this.api.storeFilterAttribute}:${store.id}`);
    }

    const url = new URL(`${this.api.url.replace(/\/+$/, "")}${SEARCH_API_CONSTANTS.QUERIES_PATH}`);
    if (this.api.agent) url.searchParams.set(SEARCH_API_CONSTANTS.AGENT_HEADER, this.api.agent);
    const origin = new URL(this.options.referer).origin;

    return {
      url: url.toString(),
      headers: {
        Accept: "application/json",
        Origin: origin,
        Referer: `${origin}/`,
        [SEARCH_API_CONSTANTS.API_KEY_HEADER]: this.apiKey,
        [SEARCH_API_CONSTANTS.APP_ID_HEADER]: this.api.appId,
      },
      body: { requests: [{ indexName: this.api.indexName, params: params.toString() }] },
    };
  }

  async search(query: string, page: number, store: StoreLocation | null): Promise<unknown> {
    const request = this.buildRequest(query, page, store);
    this.logger.debug({ query, page, store: store?.id ?? null }, "Querying search index");
    return this.http.postJson(request.url, request.body, request.headers);
  }

  close(): Promise<void> {
    return this.http.close();
  }
}
