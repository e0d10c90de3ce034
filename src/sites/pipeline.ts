/**
 * Extraction → normalization, shared by every platform
 */

import { runExtractionChain } from "../core/extraction/chain";
import { toRecords, type Normalizer } from "../core/normalization";
import type { RecordContext } from "../core/product/record";
import type { SiteConfig } from "../core/types/config";
import type { ExtractionStrategy } from "../core/types/extraction";
import type { PageRequest, PageResult } from "../core/types/site";
import type { Logger } from "../core/utils/logger";

/** A strategy paired with the normalizer for the shape it yields */
export interface PipelineStep<P> extends ExtractionStrategy<P> {
  normalize: Normalizer;
}

export function step<P>(strategy: ExtractionStrategy<P>, normalize: Normalizer): PipelineStep<P> {
  return { name: strategy.name, kind: strategy.kind, extract: (payload) => strategy.extract(payload), normalize };
}

export function recordContext(config: SiteConfig, request: PageRequest, pageUrl: string, now: Date): RecordContext {
  return {
    store: config.storeName,
    siteSlug: config.siteSlug,
    storeId: request.store?.id ?? null,
    currency: config.currency,
    queryCategory: request.mode === "product" ? null : request.target,
    pageUrl,
    baseUrl: config.baseUrl,
    scrapedAt: now,
  };
}

export function emptyPage(url: string): PageResult {
  return { url, records: [], rawCount: 0, pagination: null, source: null, strategy: null };
}

export function runPipeline<P>(
  steps: ReadonlyArray<PipelineStep<P>>,
  payload: P,
  ctx: { logger: Logger; url: string; record: RecordContext },
): PageResult {
  const match = runExtractionChain(steps, payload, { logger: ctx.logger, url: ctx.url });
  if (!match) return emptyPage(ctx.url);
  const { products, pagination, kind, strategy } = match.result;
  return {
    url: ctx.url,
    records: toRecords(products, match.strategy.normalize, ctx.record),
    rawCount: products.length,
    pagination,
    source: kind,
    strategy,
  };
}
