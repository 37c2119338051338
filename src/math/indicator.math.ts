/**
 * Technical indicator library.
 *
 * Pure functions over an ordered price sequence (oldest first). Every function
 * returns an empty series (or a neutral value) when it is given fewer bars than
 * it needs, and never throws. Output series are aligned to the trailing bar:
 * the last element of every series describes the last input price.
 *
 * @module math/indicator
 */

import type {
  IBollingerResult,
  IMacdResult,
  ISupportResistance,
  IVolumeAnalysis,
} from "../interfaces/Indicator.interface";

const isPeriod = (period: number) => Number.isInteger(period) && period >= 1;

const mean = (values: number[]) =>
  values.reduce((acc, value) => acc + value, 0) / values.length;

/**
 * Population standard deviation (divides by n, not n - 1).
 */
const populationStdev = (values: number[]) => {
  const avg = mean(values);
  const variance =
    values.reduce((acc, value) => acc + (value - avg) ** 2, 0) / values.length;
  return Math.sqrt(variance);
};

/**
 * Simple moving average.
 *
 * Output length is `prices.length - period + 1`.
 *
 * @example
 * ```typescript
 * sma([1, 2, 3, 4], 2); // [1.5, 2.5, 3.5]
 * ```
 */
export function sma(prices: number[], period: number): number[] {
  if (!isPeriod(period) || prices.length < period) {
    return [];
  }
  const result: number[] = [];
  for (let i = period - 1; i < prices.length; i++) {
    let sum = 0;
    for (let j = i - period + 1; j <= i; j++) {
      sum += prices[j];
    }
    result.push(sum / period);
  }
  return result;
}

/**
 * Exponential moving average seeded with the SMA of the first `period` prices.
 *
 * Multiplier is `2 / (period + 1)`. Output length is `prices.length - period + 1`.
 */
export function ema(prices: number[], period: number): number[] {
  if (!isPeriod(period) || prices.length < period) {
    return [];
  }
  const multiplier = 2 / (period + 1);
  let prev = mean(prices.slice(0, period));
  const result: number[] = [prev];
  for (let i = period; i < prices.length; i++) {
    prev = prices[i] * multiplier + prev * (1 - multiplier);
    result.push(prev);
  }
  return result;
}

/**
 * Relative Strength Index with Wilder smoothing.
 *
 * Seed averages are the simple means of the first `period` deltas, later
 * averages use `(prev * (period - 1) + current) / period`. A zero average
 * loss yields 100. Output length is `prices.length - period`.
 */
export function rsi(prices: number[], period = 14): number[] {
  if (!isPeriod(period) || prices.length < period + 1) {
    return [];
  }

  const gains: number[] = [];
  const losses: number[] = [];
  for (let i = 1; i < prices.length; i++) {
    const change = prices[i] - prices[i - 1];
    gains.push(change > 0 ? change : 0);
    losses.push(change < 0 ? -change : 0);
  }

  const toRsi = (avgGain: number, avgLoss: number) =>
    avgLoss === 0 ? 100 : 100 - 100 / (1 + avgGain / avgLoss);

  let avgGain = mean(gains.slice(0, period));
  let avgLoss = mean(losses.slice(0, period));
  const result: number[] = [toRsi(avgGain, avgLoss)];

  for (let i = period; i < gains.length; i++) {
    avgGain = (avgGain * (period - 1) + gains[i]) / period;
    avgLoss = (avgLoss * (period - 1) + losses[i]) / period;
    result.push(toRsi(avgGain, avgLoss));
  }

  return result;
}

/**
 * Moving Average Convergence Divergence.
 *
 * - macd: fast EMA minus slow EMA, the fast EMA is dropped from the front by
 *   `slow - fast` entries so both describe the same bars
 * - signal: EMA of the macd line
 * - histogram: macd minus signal, the macd line is dropped from the front by
 *   the length difference so `histogram.length === signal.length`
 *
 * Returns three empty series when `prices.length < slow`.
 */
export function macd(
  prices: number[],
  fast = 12,
  slow = 26,
  signal = 9
): IMacdResult {
  if (
    !isPeriod(fast) ||
    !isPeriod(slow) ||
    !isPeriod(signal) ||
    fast >= slow ||
    prices.length < slow
  ) {
    return { macd: [], signal: [], histogram: [] };
  }

  const fastEma = ema(prices, fast);
  const slowEma = ema(prices, slow);
  const offset = slow - fast;

  const macdLine = slowEma.map((value, i) => fastEma[i + offset] - value);
  const signalLine = ema(macdLine, signal);

  const start = macdLine.length - signalLine.length;
  const histogram = signalLine.map((value, i) => macdLine[start + i] - value);

  return {
    macd: macdLine,
    signal: signalLine,
    histogram,
  };
}

/**
 * Bollinger Bands: SMA middle band plus/minus `k` population standard
 * deviations of the same window. Every band has length `n - period + 1`.
 */
export function bollingerBands(
  prices: number[],
  period = 20,
  k = 2
): IBollingerResult {
  const middle = sma(prices, period);
  if (!middle.length) {
    return { upper: [], middle: [], lower: [] };
  }

  const upper: number[] = [];
  const lower: number[] = [];

  middle.forEach((value, i) => {
    const halfWidth = k * populationStdev(prices.slice(i, i + period));
    upper.push(value + halfWidth);
    lower.push(value - halfWidth);
  });

  return { upper, middle, lower };
}

/**
 * Normalized position of the price inside the band,
 * 0.5 when the band has zero width.
 */
export function bollingerPosition(
  price: number,
  upper: number,
  lower: number
): number {
  if (upper === lower) {
    return 0.5;
  }
  return (price - lower) / (upper - lower);
}

/**
 * Compares the last volume with the average of the trailing `period` volumes.
 *
 * With fewer than `period` volumes the ratio is 1 and the average 0.
 * A zero average also yields a ratio of 1.
 */
export function volumeAnalysis(
  volumes: number[],
  period = 20,
  threshold = 1.5
): IVolumeAnalysis {
  const currentVolume = volumes.length ? volumes[volumes.length - 1] : 0;

  if (!isPeriod(period) || volumes.length < period) {
    return {
      averageVolume: 0,
      currentVolume,
      volumeRatio: 1,
      isAbnormal: false,
    };
  }

  const averageVolume = mean(volumes.slice(-period));
  const volumeRatio = averageVolume > 0 ? currentVolume / averageVolume : 1;

  return {
    averageVolume,
    currentVolume,
    volumeRatio,
    isAbnormal: volumeRatio > threshold,
  };
}

/**
 * Support and resistance candidates.
 *
 * A low at index i is support iff it is strictly below every other low in
 * `[i - window, i + window]`; resistance mirrors this on highs. Ties are not
 * extrema. Needs at least `2 * window + 1` bars.
 */
export function supportResistance(
  closes: number[],
  highs: number[],
  lows: number[],
  window = 5
): ISupportResistance {
  const size = Math.min(closes.length, highs.length, lows.length);
  if (!isPeriod(window) || size < window * 2 + 1) {
    return { support: [], resistance: [] };
  }

  const isExtremum = (
    values: number[],
    i: number,
    beats: (other: number, current: number) => boolean
  ) => {
    for (let j = i - window; j <= i + window; j++) {
      if (j !== i && !beats(values[j], values[i])) {
        return false;
      }
    }
    return true;
  };

  const support: number[] = [];
  const resistance: number[] = [];

  for (let i = window; i < size - window; i++) {
    if (isExtremum(lows, i, (other, current) => other > current)) {
      support.push(lows[i]);
    }
    if (isExtremum(highs, i, (other, current) => other < current)) {
      resistance.push(highs[i]);
    }
  }

  return { support, resistance };
}

/**
 * Population standard deviation of the trailing `period` simple returns.
 *
 * Returns whose previous price is zero are skipped. Yields 0 when fewer than
 * `period + 1` prices (or `period` usable returns) are available.
 */
export function volatility(prices: number[], period = 20): number {
  if (!isPeriod(period) || prices.length < period + 1) {
    return 0;
  }

  const returns: number[] = [];
  for (let i = 1; i < prices.length; i++) {
    if (prices[i - 1] !== 0) {
      returns.push((prices[i] - prices[i - 1]) / prices[i - 1]);
    }
  }

  if (returns.length < period) {
    return 0;
  }

  return populationStdev(returns.slice(-period));
}
