/**
 * Suggested price levels for the composite signal. Prices are rounded to
 * CC_PRICE_PRECISION decimals, the ratio to CC_RATIO_PRECISION.
 */
export interface IEntryExit {
  entryPrice: number;
  stopLoss: number;
  takeProfit: number;
  /** |takeProfit - entry| / |entry - stopLoss|, 0 when undefined */
  riskRewardRatio: number;
}
