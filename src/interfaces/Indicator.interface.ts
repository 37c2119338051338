/**
 * MACD output. All three series are aligned to their own trailing bar:
 * `histogram.length === signal.length`, and `macd` is longer than
 * `signal` by `signalPeriod - 1` entries.
 */
export interface IMacdResult {
  macd: number[];
  signal: number[];
  histogram: number[];
}

/**
 * Bollinger Bands output, every series has length `n - period + 1`.
 */
export interface IBollingerResult {
  upper: number[];
  middle: number[];
  lower: number[];
}

/** Volume of the last bar against its trailing average */
export interface IVolumeAnalysis {
  averageVolume: number;
  currentVolume: number;
  volumeRatio: number;
  isAbnormal: boolean;
}

/** Local extrema of lows (support) and highs (resistance), oldest first */
export interface ISupportResistance {
  support: number[];
  resistance: number[];
}

/**
 * Trailing-bar readings of every indicator that had enough data.
 * An indicator without enough bars is left out instead of being zero-filled.
 */
export interface IIndicatorSnapshot {
  /** RSI of the last bar, 0..100 */
  rsi?: number;
  macd?: {
    macd: number;
    signal: number;
    histogram: number;
  };
  bollingerBands?: {
    upper: number;
    middle: number;
    lower: number;
    /** (price - lower) / (upper - lower), 0.5 for a zero-width band */
    position: number;
  };
  movingAverages?: {
    smaShort: number;
    smaLong: number;
    priceVsSmaShort: number;
    priceVsSmaLong: number;
  };
  volume?: IVolumeAnalysis;
  supportResistance?: ISupportResistance;
  /** Population stdev of trailing simple returns, 0 when history is short */
  volatility: number;
}
