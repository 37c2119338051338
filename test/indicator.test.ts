import { describe, expect, it } from "vitest";
import {
  bollingerBands,
  bollingerPosition,
  ema,
  macd,
  rsi,
  sma,
  supportResistance,
  volatility,
  volumeAnalysis,
} from "../src/math/indicator.math";

const WAVE = Array.from({ length: 40 }, (_, i) => 100 + Math.sin(i / 3) * 5 + i * 0.2);

describe("sma", () => {
  it("averages trailing windows", () => {
    expect(sma([1, 2, 3, 4], 2)).toEqual([1.5, 2.5, 3.5]);
  });

  it("keeps the length invariant", () => {
    for (const period of [1, 5, 20, 40]) {
      expect(sma(WAVE, period)).toHaveLength(Math.max(0, WAVE.length - period + 1));
    }
  });

  it("returns an empty series on short input or a bad period", () => {
    expect(sma([1, 2], 3)).toEqual([]);
    expect(sma([1, 2, 3], 0)).toEqual([]);
  });
});

describe("ema", () => {
  it("seeds with the sma of the first period", () => {
    expect(ema([1, 2, 3, 4, 5], 3)).toEqual([2, 3, 4]);
  });

  it("keeps the length invariant", () => {
    expect(ema(WAVE, 12)).toHaveLength(WAVE.length - 12 + 1);
    expect(ema(WAVE, 41)).toEqual([]);
  });
});

describe("rsi", () => {
  it("applies Wilder smoothing", () => {
    expect(rsi([1, 2, 1, 2], 2)).toEqual([50, 75]);
  });

  it("is 100 when there are no losses", () => {
    const rising = Array.from({ length: 15 }, (_, i) => 10 + i);
    expect(rsi(rising, 14)).toEqual([100]);
  });

  it("stays within 0..100 and has length n - period", () => {
    const values = rsi(WAVE, 14);
    expect(values).toHaveLength(WAVE.length - 14);
    for (const value of values) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(100);
    }
  });

  it("needs period + 1 prices", () => {
    expect(rsi(WAVE.slice(0, 14), 14)).toEqual([]);
  });
});

describe("macd", () => {
  it("returns empty series below the slow period", () => {
    expect(macd(WAVE.slice(0, 25))).toEqual({ macd: [], signal: [], histogram: [] });
  });

  it("aligns histogram with the signal line", () => {
    const result = macd(WAVE, 12, 26, 9);
    expect(result.macd).toHaveLength(WAVE.length - 26 + 1);
    expect(result.signal).toHaveLength(result.macd.length - 9 + 1);
    expect(result.histogram).toHaveLength(result.signal.length);
    const start = result.macd.length - result.signal.length;
    result.histogram.forEach((value, i) => {
      expect(value).toBe(result.macd[start + i] - result.signal[i]);
    });
  });

  it("subtracts the slow ema from the aligned fast ema", () => {
    const result = macd(WAVE, 12, 26, 9);
    const fast = ema(WAVE, 12);
    const slow = ema(WAVE, 26);
    expect(result.macd[0]).toBe(fast[14] - slow[0]);
  });
});

describe("bollingerBands", () => {
  it("uses the population standard deviation", () => {
    const { upper, middle, lower } = bollingerBands([1, 2, 3, 4, 5], 5, 2);
    expect(middle).toEqual([3]);
    expect(upper[0]).toBeCloseTo(3 + 2 * Math.SQRT2, 12);
    expect(lower[0]).toBeCloseTo(3 - 2 * Math.SQRT2, 12);
  });

  it("is symmetric around the middle band", () => {
    const { upper, middle, lower } = bollingerBands(WAVE, 20, 2);
    middle.forEach((value, i) => {
      expect(upper[i] - value).toBeCloseTo(value - lower[i], 10);
    });
  });

  it("collapses on a constant series", () => {
    const { upper, lower } = bollingerBands(Array(20).fill(7), 20, 2);
    expect(upper).toEqual([7]);
    expect(lower).toEqual([7]);
  });
});

describe("bollingerPosition", () => {
  it("normalizes the price inside the band", () => {
    expect(bollingerPosition(105, 110, 100)).toBe(0.5);
    expect(bollingerPosition(109, 110, 100)).toBeCloseTo(0.9, 12);
  });

  it("falls back to 0.5 on a zero-width band", () => {
    expect(bollingerPosition(100, 100, 100)).toBe(0.5);
  });
});

describe("volumeAnalysis", () => {
  it("compares the last volume with the trailing average", () => {
    const result = volumeAnalysis([10, 10, 10, 40], 4, 1.5);
    expect(result.averageVolume).toBe(17.5);
    expect(result.currentVolume).toBe(40);
    expect(result.volumeRatio).toBeCloseTo(40 / 17.5, 12);
    expect(result.isAbnormal).toBe(true);
  });

  it("is neutral on short input", () => {
    expect(volumeAnalysis([5, 6], 4)).toEqual({
      averageVolume: 0,
      currentVolume: 6,
      volumeRatio: 1,
      isAbnormal: false,
    });
    expect(volumeAnalysis([], 4).currentVolume).toBe(0);
  });

  it("uses ratio 1 for a zero average", () => {
    expect(volumeAnalysis([0, 0, 0], 3).volumeRatio).toBe(1);
  });
});

describe("supportResistance", () => {
  it("keeps strict extrema only", () => {
    const values = [5, 3, 5, 4, 4, 6];
    expect(supportResistance(values, values, values, 1)).toEqual({
      support: [3],
      resistance: [5],
    });
  });

  it("needs 2 * window + 1 bars", () => {
    expect(supportResistance([1, 2], [1, 2], [1, 2], 1)).toEqual({
      support: [],
      resistance: [],
    });
  });
});

describe("volatility", () => {
  it("is the population stdev of simple returns", () => {
    expect(volatility([100, 110, 99], 2)).toBeCloseTo(0.1, 12);
  });

  it("is 0 on a flat or short series", () => {
    expect(volatility([100, 100, 100], 2)).toBe(0);
    expect(volatility([100, 110], 2)).toBe(0);
  });

  it("skips returns from a zero price", () => {
    expect(volatility([0, 1, 1.1, 1.21], 3)).toBe(0);
    expect(volatility([0, 1, 1.1, 1.21], 2)).toBeCloseTo(0, 12);
  });
});
