/**
 * Server-rendered storefronts that ship their listing state as
 * `__NEXT_DATA__`. Fetched over plain HTTP with a fingerprinted client.
 */

import type { HttpFetcher } from "../../core/fetch/http-fetcher";
import { createDomStrategy } from "../../core/extraction/dom";
import { parseHtmlDocument, type HtmlDocument } from "../../core/extraction/html";
import { linkedDataStrategy } from "../../core/extraction/linked-data";
import { pageStateStrategy } from "../../core/extraction/page-state";
import { normalizeDomTile, normalizeLinkedDataProduct, normalizePageStateTile } from "../../core/normalization";
import type { SiteConfig } from "../../core/types/config";
import type { PageRequest, PageResult, SiteAdapter } from "../../core/types/site";
import type { Logger } from "../../core/utils/logger";
import { recordContext, runPipeline, step, type PipelineStep } from "../pipeline";
import { storefrontUrl } from "../urls";

export interface PageStateAdapterDeps {
  config: SiteConfig;
  http: HttpFetcher;
  logger: Logger;
  now?: () => Date;
}

export function createPageStateAdapter(deps: PageStateAdapterDeps): SiteAdapter {
  const { config, http } = deps;
  const logger = deps.logger.child({ component: "page-state" });
  const now = deps.now ?? (() => new Date());

  const dom = createDomStrategy({
    tileSelectors: config.browser.productSelectors ?? undefined,
    nextPageSelectors: config.browser.nextPageSelectors,
  });
  const listing: Array<PipelineStep<HtmlDocument>> = [
    step(pageStateStrategy, normalizePageStateTile),
    step(linkedDataStrategy, normalizeLinkedDataProduct),
    step(dom, normalizeDomTile),
  ];
  // A product page describes itself in linked data first
  const product: Array<PipelineStep<HtmlDocument>> = [
    step(linkedDataStrategy, normalizeLinkedDataProduct),
    step(pageStateStrategy, normalizePageStateTile),
  ];

  return {
    key: config.siteSlug,
    displayName: config.storeName,
    platform: "page-state",

    async fetchPage(request: PageRequest): Promise<PageResult> {
      const url = storefrontUrl(config, request);
      const fetched = await http.fetchHtml(url);
      const doc = parseHtmlDocument(fetched.html, fetched.url);
      const result = runPipeline(request.mode === "product" ? product : listing, doc, {
        logger,
        url: fetched.url,
        record: recordContext(config, request, fetched.url, now()),
      });
      logger.info(
        { url: fetched.url, page: request.page, count: result.rawCount, strategy: result.strategy },
        "Page extracted",
      );
      return result;
    },

    close: () => http.close(),
  };
}
