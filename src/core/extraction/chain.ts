/**
 * Ordered fallback over extraction strategies
 */

import type { ExtractionResult, ExtractionStrategy } from "../types/extraction";
import type { Logger } from "../utils/logger";
import { errorMeta } from "../utils/logger";

export interface ChainContext {
  logger: Logger;
  url: string;
}

export interface ChainMatch<S> {
  strategy: S;
  result: ExtractionResult;
}

/**
 * First strategy that yields a non-empty product list wins. A strategy that
 * throws counts as empty; only a chain where every step comes up empty is
 * reported at warning level.
 */
export function runExtractionChain<P, S extends ExtractionStrategy<P>>(
  strategies: readonly S[],
  payload: P,
  ctx: ChainContext,
): ChainMatch<S> | null {
  for (const strategy of strategies) {
    let result: ExtractionResult | null;
    try {
      result = strategy.extract(payload);
    } catch (error) {
      ctx.logger.debug(errorMeta(error, { strategy: strategy.name, url: ctx.url }), "Extraction strategy failed");
      continue;
    }
    if (result && result.products.length > 0) {
      ctx.logger.debug(
        { strategy: result.strategy, count: result.products.length, url: ctx.url },
        "Extracted products",
      );
      return { strategy, result };
    }
  }
  ctx.logger.warn(
    { url: ctx.url, tried: strategies.map((s) => s.name) },
    "No products found by any extraction strategy",
  );
  return null;
}
