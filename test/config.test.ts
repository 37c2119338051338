import { afterEach, describe, expect, it, vi } from "vitest";
import {
  getConfig,
  getDefaultConfig,
  getRecommendation,
  lib,
  listAdvisors,
  setConfig,
  setLogger,
} from "../src/index";
import { DEFAULT_CONFIG } from "../src/config/params";
import type { IAssetInput } from "../src/interfaces/Asset.interface";
import { noopLogger } from "./fixtures";

const fund: IAssetInput = {
  source: "fund",
  quote: { fundcode: "000002", name: "Config Fund", nav: 100 },
};

afterEach(() => {
  setConfig({ ...getDefaultConfig() });
  setLogger(noopLogger);
});

describe("setConfig", () => {
  it("rolls back an invalid change", () => {
    expect(() => setConfig({ CC_SMA_SHORT: 50 })).toThrow(/CC_SMA_SHORT/);
    expect(getConfig().CC_SMA_SHORT).toBe(5);
  });

  it("applies to cached engines", async () => {
    const before = await getRecommendation(fund);
    expect(before.entryExit.stopLoss).toBe(95);
    setConfig({ CC_STOP_LOSS_PERCENT: 0.02 });
    const after = await getRecommendation(fund);
    expect(after.entryExit.stopLoss).toBe(98);
  });

  it("returns copies from getConfig", () => {
    const config = getConfig();
    config.CC_RSI_PERIOD = 99;
    expect(getConfig().CC_RSI_PERIOD).toBe(14);
  });
});

describe("getDefaultConfig", () => {
  it("is frozen and unaffected by setConfig", () => {
    setConfig({ CC_TAKE_PROFIT_PERCENT: 0.2 });
    const defaults = getDefaultConfig();
    expect(Object.isFrozen(defaults)).toBe(true);
    expect(defaults.CC_TAKE_PROFIT_PERCENT).toBe(0.15);
  });
});

describe("configValidationService", () => {
  it("reports every broken rule", () => {
    expect(() =>
      lib.configValidationService.validate({
        ...DEFAULT_CONFIG,
        CC_MACD_FAST: 30,
        CC_PRICE_PRECISION: 1.5,
      })
    ).toThrow(
      "config validation failed:\n" +
        "  1. CC_MACD_FAST (30) must be less than CC_MACD_SLOW (26)\n" +
        "  2. CC_PRICE_PRECISION must be an integer within 0..15, got 1.5"
    );
  });

  it("rejects fractions outside 0..1", () => {
    expect(() =>
      lib.configValidationService.validate({
        ...DEFAULT_CONFIG,
        CC_TAKE_PROFIT_PERCENT: 1.2,
      })
    ).toThrow(/CC_TAKE_PROFIT_PERCENT must be between 0 and 1 exclusive/);
  });

  it("accepts the defaults", () => {
    expect(() => lib.configValidationService.validate({ ...DEFAULT_CONFIG })).not.toThrow();
  });
});

describe("setLogger", () => {
  it("keeps analysing when the logger throws", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const fail = () => {
      throw new Error("logger offline");
    };
    setLogger({ log: fail, debug: fail, info: fail, warn: fail });
    const recommendation = await getRecommendation(fund);
    expect(recommendation.currentPrice).toBe(100);
    expect(recommendation.rationale).toBe("no clear signal");
    expect(warn).toHaveBeenCalledWith(
      "loggerService logger thrown",
      expect.objectContaining({ message: "logger offline" })
    );
    warn.mockRestore();
  });

  it("forwards service logs", async () => {
    const log = vi.fn();
    setLogger({ ...noopLogger, log });
    await listAdvisors();
    expect(log).toHaveBeenCalledWith("list.listAdvisors");
  });
});
