// Platform registry: a site profile names its platform, the platform builds the adapter

import type { BrowserFetcher } from "../core/fetch/browser-fetcher";
import type { HttpFetcher } from "../core/fetch/http-fetcher";
import type { SearchApiFetcher } from "../core/fetch/search-api-fetcher";
import { ConfigError } from "../core/errors";
import type { PlatformKind, SiteConfig } from "../core/types/config";
import type { SiteAdapter } from "../core/types/site";
import type { Logger } from "../core/utils/logger";
import { createPageStateAdapter } from "./page-state/adapter";
import { createSearchIndexAdapter } from "./search-index/adapter";

export interface AdapterDeps {
  config: SiteConfig;
  logger: Logger;
  http: HttpFetcher;
  /** Search-index sites only */
  browser: BrowserFetcher | null;
  searchApi: SearchApiFetcher | null;
  now?: () => Date;
}

type AdapterFactory = (deps: AdapterDeps) => SiteAdapter;

const factories: Record<PlatformKind, AdapterFactory> = {
  "page-state": ({ config, logger, http, now }) => createPageStateAdapter({ config, logger, http, now }),
  "search-index": ({ config, logger, browser, searchApi, now }) => {
    if (!searchApi || !browser) {
      throw new ConfigError(`Site "${config.siteSlug}" uses the search-index platform without search_api`, "search_api");
    }
    return createSearchIndexAdapter({ config, logger, browser, searchApi, now });
  },
};

export function createAdapter(deps: AdapterDeps): SiteAdapter {
  return factories[deps.config.platform](deps);
}
