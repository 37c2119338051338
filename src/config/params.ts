export const GLOBAL_CONFIG = {
  /** RSI lookback period */
  CC_RSI_PERIOD: 14,
  /** MACD fast EMA period */
  CC_MACD_FAST: 12,
  /** MACD slow EMA period, also the minimum history for MACD */
  CC_MACD_SLOW: 26,
  /** MACD signal line EMA period */
  CC_MACD_SIGNAL: 9,
  /** Short simple moving average for the MA alignment rule */
  CC_SMA_SHORT: 5,
  /** Long simple moving average for the MA alignment rule */
  CC_SMA_LONG: 20,
  /** Short EMA used by the oracle feature vector */
  CC_EMA_SHORT: 12,
  /** Long EMA used by the oracle feature vector */
  CC_EMA_LONG: 26,
  /** Bollinger Bands period */
  CC_BB_PERIOD: 20,
  /** Bollinger Bands width in standard deviations */
  CC_BB_STD: 2,
  /** Number of trailing volumes averaged for the volume ratio */
  CC_VOLUME_PERIOD: 10,
  /** Number of trailing returns for volatility */
  CC_VOLATILITY_PERIOD: 20,
  /** Half-width of the window for local extrema detection */
  CC_SUPPORT_RESISTANCE_WINDOW: 5,

  /**
   * StopLoss distance from the current price (fraction)
   * Default: 5%
   */
  CC_STOP_LOSS_PERCENT: 0.05,
  /**
   * TakeProfit distance from the current price (fraction)
   * Default: 15%
   */
  CC_TAKE_PROFIT_PERCENT: 0.15,
  /**
   * Entry offset from the current price (fraction)
   * Buy entries sit below the price, sell entries above.
   */
  CC_ENTRY_OFFSET_PERCENT: 0.005,
  /**
   * Volatility above which the asset is rated "high volatility".
   * Half of it marks "medium volatility".
   */
  CC_VOLATILITY_THRESHOLD: 0.3,
  /** Volume ratio above which the last bar is flagged abnormal */
  CC_VOLUME_THRESHOLD: 1.5,
  /** Volume ratio an abnormal bar needs to produce a buy signal */
  CC_VOLUME_SPIKE_RATIO: 2,

  /** RSI below this value is oversold (buy) */
  CC_RSI_OVERSOLD: 30,
  /** RSI above this value is overbought (sell) */
  CC_RSI_OVERBOUGHT: 70,
  /** RSI below this value counts as a risk factor */
  CC_RSI_EXTREME_LOW: 20,
  /** RSI above this value counts as a risk factor */
  CC_RSI_EXTREME_HIGH: 80,

  /** Score at or above which the signal is strong_buy */
  CC_STRONG_BUY_SCORE: 4,
  /** Score at or above which the signal is buy */
  CC_BUY_SCORE: 2,
  /** Score at or below which the signal is sell */
  CC_SELL_SCORE: -2,
  /** Score at or below which the signal is strong_sell */
  CC_STRONG_SELL_SCORE: -4,

  /** Oracle probability above which the oracle adds +2 */
  CC_ML_BULLISH_PROBABILITY: 0.6,
  /** Oracle probability above which the oracle adds +1 (otherwise -1) */
  CC_ML_NEUTRAL_PROBABILITY: 0.4,

  /** Decimal places of entry, stop loss and take profit prices */
  CC_PRICE_PRECISION: 4,
  /** Decimal places of the risk/reward ratio */
  CC_RATIO_PRECISION: 2,
  /** Number of reasons kept in the rationale text */
  CC_RATIONALE_REASON_LIMIT: 3,
  /** Minimum closes required to build the oracle feature vector */
  CC_FEATURE_MIN_BARS: 30,
};

/**
 * Frozen copy of the defaults, used by getDefaultConfig().
 */
export const DEFAULT_CONFIG = Object.freeze({ ...GLOBAL_CONFIG });

/**
 * Type for global configuration object.
 */
export type GlobalConfig = typeof GLOBAL_CONFIG;

/**
 * Name of the advisor used when the caller names none. It runs on
 * GLOBAL_CONFIG without an oracle and cannot be registered.
 */
export const DEFAULT_ADVISOR_NAME = "__default__";
