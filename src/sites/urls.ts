import type { SiteConfig } from "../core/types/config";
import type { PageRequest } from "../core/types/site";
import { ConfigError } from "../core/errors";
import { resolveLocation, withQuery } from "../core/utils/url";

/**
 * Storefront URL for a request:
 * search → {base}{pattern}?{search_param}=term&{page_param}=N,
 * category → {base}{path}?{page_param}=N, product → the product URL itself
 */
export function storefrontUrl(config: SiteConfig, request: PageRequest): string {
  if (request.mode === "search") {
    return withQuery(`${config.baseUrl}${config.searchUrlPattern}`, {
      [config.searchParam]: request.target,
      [config.pageParam]: request.page,
    });
  }
  const url = resolveLocation(config.baseUrl, request.target);
  if (!url) throw new ConfigError(`Cannot build a URL from "${request.target}"`);
  return request.mode === "category" ? withQuery(url, { [config.pageParam]: request.page }) : url;
}
