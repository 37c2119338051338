import type { IPriceBar } from "../src/interfaces/Candle.interface";
import type { IEngineParams } from "../src/interfaces/Advisor.interface";
import type { ILogger } from "../src/interfaces/Logger.interface";
import { DEFAULT_CONFIG, GlobalConfig } from "../src/config/params";

export const noopLogger: ILogger = {
  log: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};

export const createEngineParams = (
  overrides: Partial<GlobalConfig> = {}
): IEngineParams => ({
  config: { ...DEFAULT_CONFIG, ...overrides },
  logger: noopLogger,
});

/**
 * `count` bars rising linearly from `from` to `to`, each bar opening at the
 * previous close, flat volume.
 */
export const createRisingBars = (
  count: number,
  from: number,
  to: number,
  volume = 1000
): IPriceBar[] => {
  const bars: IPriceBar[] = [];
  let prev = from;
  for (let i = 0; i !== count; i++) {
    const close = from + ((to - from) * i) / (count - 1);
    bars.push({ open: prev, high: close, low: prev, close, volume });
    prev = close;
  }
  return bars;
};

export const createFlatBars = (count: number, price: number, volume = 1000) =>
  Array.from({ length: count }, (): IPriceBar => ({
    open: price,
    high: price,
    low: price,
    close: price,
    volume,
  }));
