/** Candlestick patterns recognised on the trailing bars */
export type PatternName =
  | "hammer"
  | "doji"
  | "bullish_engulfing"
  | "bearish_engulfing";

/** Directional reading of the detected patterns */
export type PatternBias = "bullish" | "bearish" | "neutral";

export interface IPatternResult {
  patterns: PatternName[];
  bias: PatternBias;
  /** True when fewer than three bars were supplied */
  insufficientData: boolean;
}
