/**
 * Candlestick pattern recognition over the trailing bars of a series.
 *
 * @module math/pattern
 */

import type { IPriceBar } from "../interfaces/Candle.interface";
import type {
  IPatternResult,
  PatternBias,
  PatternName,
} from "../interfaces/Pattern.interface";

/** Minimum bars for pattern detection */
const PATTERN_BARS = 3;

/**
 * Hammer: long lower shadow (over twice the body), short upper shadow
 * (under half the body), non-empty body.
 */
export function isHammer(bar: IPriceBar): boolean {
  const body = Math.abs(bar.close - bar.open);
  const upperShadow = bar.high - Math.max(bar.open, bar.close);
  const lowerShadow = Math.min(bar.open, bar.close) - bar.low;
  return lowerShadow > body * 2 && upperShadow < body * 0.5 && body > 0;
}

/**
 * Doji: body under 10% of the high-low range. A zero range is not a doji.
 */
export function isDoji(bar: IPriceBar): boolean {
  const range = bar.high - bar.low;
  if (range <= 0) {
    return false;
  }
  return Math.abs(bar.close - bar.open) < range * 0.1;
}

/**
 * Bearish bar followed by a bullish bar whose body covers the prior body.
 */
export function isBullishEngulfing(prior: IPriceBar, current: IPriceBar): boolean {
  const priorBearish = prior.close < prior.open;
  const currentBullish = current.close > current.open;
  const engulfing = current.open < prior.close && current.close > prior.open;
  return priorBearish && currentBullish && engulfing;
}

/**
 * Bullish bar followed by a bearish bar whose body covers the prior body.
 */
export function isBearishEngulfing(prior: IPriceBar, current: IPriceBar): boolean {
  const priorBullish = prior.close > prior.open;
  const currentBearish = current.close < current.open;
  const engulfing = current.open > prior.close && current.close < prior.open;
  return priorBullish && currentBearish && engulfing;
}

/**
 * Classifies the last bars into patterns and a single directional bias.
 *
 * Bearish engulfing is only tested when bullish engulfing did not match, and
 * the bias prefers bullish evidence over bearish.
 *
 * @example
 * ```typescript
 * const { patterns, bias } = detectPatterns(bars);
 * if (bias === "bullish") console.log(patterns.join(", "));
 * ```
 */
export function detectPatterns(bars: IPriceBar[]): IPatternResult {
  if (bars.length < PATTERN_BARS) {
    return { patterns: [], bias: "neutral", insufficientData: true };
  }

  const [, prior, current] = bars.slice(-PATTERN_BARS);
  const patterns: PatternName[] = [];

  if (isHammer(current)) {
    patterns.push("hammer");
  }
  if (isDoji(current)) {
    patterns.push("doji");
  }
  if (isBullishEngulfing(prior, current)) {
    patterns.push("bullish_engulfing");
  } else if (isBearishEngulfing(prior, current)) {
    patterns.push("bearish_engulfing");
  }

  let bias: PatternBias = "neutral";
  if (patterns.includes("hammer") || patterns.includes("bullish_engulfing")) {
    bias = "bullish";
  } else if (patterns.includes("bearish_engulfing")) {
    bias = "bearish";
  }

  return { patterns, bias, insufficientData: false };
}
