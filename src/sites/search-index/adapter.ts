/**
 * Storefronts backed by a hosted search index. The index is queried
 * directly; a query (per store) that comes back empty on its first page or
 * fails switches to the browser for the rest of its pages.
 */

import type { BrowserFetcher } from "../../core/fetch/browser-fetcher";
import type { SearchApiFetcher } from "../../core/fetch/search-api-fetcher";
import { ConfigError, InterruptedError } from "../../core/errors";
import { createDomStrategy } from "../../core/extraction/dom";
import { parseHtmlDocument, type HtmlDocument } from "../../core/extraction/html";
import { linkedDataStrategy } from "../../core/extraction/linked-data";
import { pagePropsStrategy } from "../../core/extraction/page-state";
import { searchHitsStrategy } from "../../core/extraction/search-hits";
import {
  normalizeDomTile,
  normalizeLinkedDataProduct,
  normalizePagePropsProduct,
  normalizeSearchHit,
} from "../../core/normalization";
import type { SiteConfig } from "../../core/types/config";
import type { PageRequest, PageResult, SiteAdapter } from "../../core/types/site";
import type { Logger } from "../../core/utils/logger";
import { errorMeta } from "../../core/utils/logger";
import { recordContext, runPipeline, step, type PipelineStep } from "../pipeline";
import { storefrontUrl } from "../urls";

export interface SearchIndexAdapterDeps {
  config: SiteConfig;
  searchApi: SearchApiFetcher;
  browser: BrowserFetcher;
  logger: Logger;
  now?: () => Date;
}

/** Queries that have switched to the browser path are tracked per store */
export const fallbackKey = (request: PageRequest): string => `${request.target}@${request.store?.id ?? "*"}`;

export function createSearchIndexAdapter(deps: SearchIndexAdapterDeps): SiteAdapter {
  const { config, searchApi, browser } = deps;
  const logger = deps.logger.child({ component: "search-index" });
  const now = deps.now ?? (() => new Date());
  const viaBrowser = new Set<string>();

  const api = [step(searchHitsStrategy, normalizeSearchHit)];
  const dom = createDomStrategy({
    tileSelectors: config.browser.productSelectors ?? undefined,
    nextPageSelectors: config.browser.nextPageSelectors,
  });
  const rendered: Array<PipelineStep<HtmlDocument>> = [
    step(pagePropsStrategy, normalizePagePropsProduct),
    step(linkedDataStrategy, normalizeLinkedDataProduct),
    step(dom, normalizeDomTile),
  ];

  async function fetchViaBrowser(request: PageRequest): Promise<PageResult> {
    const url = storefrontUrl(config, request);
    const fetched = await browser.fetchPage(url, { query: request.mode === "search" ? request.target : null });
    const doc = parseHtmlDocument(fetched.html, fetched.url);
    const result = runPipeline(rendered, doc, {
      logger,
      url: fetched.url,
      record: recordContext(config, request, fetched.url, now()),
    });
    logger.info(
      { url: fetched.url, page: request.page, count: result.rawCount, strategy: result.strategy },
      "Browser page extracted",
    );
    return result;
  }

  async function fetchViaApi(request: PageRequest): Promise<PageResult | null> {
    try {
      const response = await searchApi.search(request.target, request.page, request.store);
      const url = storefrontUrl(config, request);
      const result = runPipeline(api, response, { logger, url, record: recordContext(config, request, url, now()) });
      // An empty later page is simply the end of the results
      if (result.rawCount > 0 || request.page > 1) {
        logger.info({ query: request.target, page: request.page, count: result.rawCount }, "Search index page");
        return result;
      }
      logger.warn(
        { query: request.target, store: request.store?.id ?? null },
        "Search index returned no hits, switching to browser",
      );
    } catch (error) {
      if (error instanceof InterruptedError || error instanceof ConfigError) throw error;
      logger.warn(errorMeta(error, { query: request.target, page: request.page }), "Search index failed, switching to browser");
    }
    return null;
  }

  return {
    key: config.siteSlug,
    displayName: config.storeName,
    platform: "search-index",

    async fetchPage(request: PageRequest): Promise<PageResult> {
      if (request.mode !== "search") return fetchViaBrowser(request);
      const key = fallbackKey(request);
      if (!viaBrowser.has(key)) {
        const result = await fetchViaApi(request);
        if (result) return result;
        viaBrowser.add(key);
      }
      return fetchViaBrowser(request);
    },

    async close() {
      await browser.close();
      await searchApi.close();
    },
  };
}
