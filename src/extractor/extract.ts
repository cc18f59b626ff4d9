import logger from "../libs/logger";
import { describeError } from "../errors";
import type { StructuredValue } from "../utils/json";
import { EXTRACTION_STRATEGIES, type ExtractionStrategy, type StrategyName } from "./strategies";

/** Replies longer than this only go through the cheap strategies. */
export const HEAVY_STRATEGY_CHAR_LIMIT = 50_000;

export type ExtractionResult =
  | { found: true; value: StructuredValue; strategy: StrategyName }
  | { found: false };

export const NO_RESULT: ExtractionResult = Object.freeze({ found: false });

/**
 * Recovers an object or array from free-form generation output. Pure: the same
 * text always yields the same result, and a strategy that throws only skips itself.
 */
export function extractStructured(
  text: unknown,
  strategies: readonly ExtractionStrategy[] = EXTRACTION_STRATEGIES
): ExtractionResult {
  if (typeof text !== "string" || !text.trim()) {
    return NO_RESULT;
  }

  const oversized = text.length > HEAVY_STRATEGY_CHAR_LIMIT;

  for (const strategy of strategies) {
    if (oversized && strategy.heavy) continue;
    try {
      const value = strategy.apply(text);
      if (value !== undefined) {
        return { found: true, value, strategy: strategy.name };
      }
    } catch (error) {
      logger.debug({ strategy: strategy.name, err: describeError(error) }, "Extraction strategy threw");
    }
  }

  return NO_RESULT;
}
