/**
 * Feature vector for the probability oracle.
 *
 * Describes the last bar of a price series with the fixed, ordered set of
 * FEATURE_NAMES. Only the trailing value of every indicator is used, so
 * series with different lookback offsets line up on the same bar.
 *
 * @module math/feature
 */

import type { IPriceBar } from "../interfaces/Candle.interface";
import {
  FEATURE_NAMES,
  type FeatureName,
  type IFeatureVector,
} from "../interfaces/Oracle.interface";
import type { GlobalConfig } from "../config/params";
import {
  bollingerBands,
  bollingerPosition,
  ema,
  macd,
  rsi,
  sma,
  volatility,
} from "./indicator.math";
import { detectPatterns } from "./pattern.math";

/** Trailing volumes averaged for the volume ratio feature */
const FEATURE_VOLUME_PERIOD = 10;

/** Return window of the volatility feature */
const FEATURE_VOLATILITY_PERIOD = 10;

const last = (values: number[]) =>
  values.length ? values[values.length - 1] : null;

const ratio = (price: number, average: number) =>
  average !== 0 ? price / average : 1;

/**
 * Volume of the last bar over the mean of the preceding volumes.
 * Falls back to 1 when history is short or the mean is zero.
 */
const getVolumeRatio = (volumes: number[]) => {
  if (volumes.length < FEATURE_VOLUME_PERIOD + 1) {
    return 1;
  }
  const current = volumes[volumes.length - 1];
  const previous = volumes.slice(-FEATURE_VOLUME_PERIOD - 1, -1);
  const average =
    previous.reduce((acc, value) => acc + value, 0) / previous.length;
  return average !== 0 ? current / average : 1;
};

/**
 * Builds the oracle feature vector for the last bar.
 *
 * Returns null when the series is shorter than CC_FEATURE_MIN_BARS or any
 * required indicator has no value yet. A missing MACD signal line (it needs
 * `slow + signal - 1` bars) contributes zeros instead.
 *
 * @param bars - Price series, oldest first
 * @param config - Resolved advisor configuration
 */
export function buildFeatureVector(
  bars: IPriceBar[],
  config: GlobalConfig
): IFeatureVector | null {
  const closes = bars.map(({ close }) => close);
  const volumes = bars.map(({ volume }) => volume);

  if (closes.length < Math.max(config.CC_FEATURE_MIN_BARS, 2)) {
    return null;
  }

  const price = closes[closes.length - 1];
  const prev = closes[closes.length - 2];

  const rsiValue = last(rsi(closes, config.CC_RSI_PERIOD));
  const macdResult = macd(
    closes,
    config.CC_MACD_FAST,
    config.CC_MACD_SLOW,
    config.CC_MACD_SIGNAL
  );
  const macdValue = last(macdResult.macd);
  const bands = bollingerBands(closes, config.CC_BB_PERIOD, config.CC_BB_STD);
  const upper = last(bands.upper);
  const lower = last(bands.lower);
  const smaShort = last(sma(closes, config.CC_SMA_SHORT));
  const smaLong = last(sma(closes, config.CC_SMA_LONG));
  const emaShort = last(ema(closes, config.CC_EMA_SHORT));
  const emaLong = last(ema(closes, config.CC_EMA_LONG));

  if (
    rsiValue === null ||
    macdValue === null ||
    upper === null ||
    lower === null ||
    smaShort === null ||
    smaLong === null ||
    emaShort === null ||
    emaLong === null
  ) {
    return null;
  }

  const { bias } = detectPatterns(bars);

  const named: Record<FeatureName, number> = {
    priceChange: prev !== 0 ? (price - prev) / prev : 0,
    rsi: rsiValue / 100,
    macd: macdValue,
    macdSignal: last(macdResult.signal) ?? 0,
    macdHistogram: last(macdResult.histogram) ?? 0,
    bollingerPosition: bollingerPosition(price, upper, lower),
    sma5Ratio: ratio(price, smaShort),
    sma20Ratio: ratio(price, smaLong),
    ema12Ratio: ratio(price, emaShort),
    ema26Ratio: ratio(price, emaLong),
    volumeRatio: getVolumeRatio(volumes),
    volatility: volatility(closes, FEATURE_VOLATILITY_PERIOD),
    patternSignal: bias === "bullish" ? 1 : bias === "bearish" ? -1 : 0,
  };

  return {
    names: FEATURE_NAMES,
    values: FEATURE_NAMES.map((name) => named[name]),
    named,
  };
}
