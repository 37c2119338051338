/**
 * Single OHLCV bar. open/high/low/close must be positive for the bar
 * to take part in analysis.
 */
export interface IPriceBar {
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  /** Optional bar time (unix ms or ISO string), carried through untouched */
  timestamp?: number | string;
}

/**
 * Ordered price history, oldest bar first.
 */
export type PriceSeries = IPriceBar[];
