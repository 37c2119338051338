import { describe, expect, it, vi } from "vitest";
import {
  addAdvisor,
  ClientAdvisor,
  DEFAULT_ADVISOR_NAME,
  getRecommendation,
  getRecommendations,
  listAdvisors,
  listenError,
  listenRecommendation,
  LogisticOracle,
} from "../src/index";
import { DEFAULT_CONFIG, type GlobalConfig } from "../src/config/params";
import type { IAssetInput } from "../src/interfaces/Asset.interface";
import type { ILogger } from "../src/interfaces/Logger.interface";
import type { IProbabilityEstimate } from "../src/interfaces/Oracle.interface";
import { createFlatBars, createRisingBars } from "./fixtures";

const rising: IAssetInput = {
  source: "crypto",
  quote: { symbol: "test", name: "Test Coin", current_price: 130 },
  history: createRisingBars(30, 100, 130),
};

const flat: IAssetInput = {
  source: "equity",
  quote: { code: "600000", name: "Flat Co", close: 100 },
  history: createFlatBars(30, 100),
};

const fund: IAssetInput = {
  source: "fund",
  quote: { fundcode: "000001", name: "Test Fund", nav: 100 },
};

describe("getRecommendation", () => {
  it("finds the bullish alignment of a steady rise", async () => {
    const recommendation = await getRecommendation(rising);
    expect(recommendation.asset).toEqual({
      symbol: "TEST",
      name: "Test Coin",
      assetClass: "crypto",
    });
    expect(recommendation.currentPrice).toBe(130);
    expect(recommendation.indicators.rsi).toBe(100);
    expect(recommendation.indicators.macd).toBeUndefined();
    expect(recommendation.signals).toEqual([
      { direction: "sell", reason: "RSI overbought", strength: "medium" },
      { direction: "buy", reason: "moving averages in bullish alignment", strength: "medium" },
    ]);
    expect(recommendation.signal).toEqual({
      type: "hold",
      strength: 0,
      confidence: "low",
      buyCount: 1,
      sellCount: 1,
      mlContribution: 0,
      totalScore: 0,
    });
    expect(recommendation.riskAssessment.factors).toEqual([
      "RSI extreme",
      "price deviates from mean",
    ]);
    expect(recommendation.entryExit).toEqual({
      entryPrice: 130,
      stopLoss: 123.5,
      takeProfit: 149.5,
      riskRewardRatio: 3,
    });
    expect(recommendation.prediction).toBeNull();
    expect(recommendation.rationale).toBe(
      "RSI overbought; moving averages in bullish alignment"
    );
  });

  it("turns a steady rise into a buy with a bullish oracle", async () => {
    addAdvisor({
      advisorName: "bullish-model",
      oracle: new LogisticOracle({ intercept: 2, coefficients: {} }),
    });
    const recommendation = await getRecommendation(rising, "bullish-model");
    expect(recommendation.signal.type).toBe("buy");
    expect(recommendation.signal.mlContribution).toBe(2);
    expect(recommendation.signal.totalScore).toBe(2);
    expect(recommendation.prediction?.confidence).toBe("high");
    expect(recommendation.entryExit).toEqual({
      entryPrice: 129.35,
      stopLoss: 123.5,
      takeProfit: 149.5,
      riskRewardRatio: 3.44,
    });
    expect(recommendation.rationale).toBe(
      "RSI overbought; moving averages in bullish alignment; model predicts rise with probability 88.1%"
    );
  });

  it("keeps a constant series at the band middle", async () => {
    const recommendation = await getRecommendation(flat);
    expect(recommendation.indicators.bollingerBands?.position).toBe(0.5);
    expect(recommendation.riskAssessment.factors).not.toContain("price deviates from mean");
    expect(recommendation.riskAssessment.factors).toEqual(["RSI extreme"]);
  });

  it("returns a neutral record for malformed input", async () => {
    const recommendation = await getRecommendation({ price: "unknown" });
    expect(recommendation.currentPrice).toBe(0);
    expect(recommendation.signal.type).toBe("hold");
    expect(recommendation.rationale).toBe("insufficient data");
    expect(recommendation.asset.assetClass).toBe("unknown");
    expect(recommendation.entryExit).toEqual({
      entryPrice: 0,
      stopLoss: 0,
      takeProfit: 0,
      riskRewardRatio: 0,
    });
    expect(Object.isFrozen(recommendation)).toBe(true);
    expect(Object.isFrozen(recommendation.signal)).toBe(true);
    expect(Object.isFrozen(recommendation.entryExit)).toBe(true);
    expect(Object.isFrozen(recommendation.patterns.patterns)).toBe(true);
  });

  it("keeps the record read-only for listeners", async () => {
    const rejected: unknown[] = [];
    const unsubscribe = listenRecommendation(({ recommendation }) => {
      try {
        recommendation.signal.type = "strong_sell";
      } catch (error) {
        rejected.push(error);
      }
      try {
        recommendation.signals.length = 0;
      } catch (error) {
        rejected.push(error);
      }
      try {
        recommendation.riskAssessment.factors.push("tampered");
      } catch (error) {
        rejected.push(error);
      }
    });
    const recommendation = await getRecommendation(rising);
    await vi.waitFor(() => expect(rejected).toHaveLength(3));
    unsubscribe();
    expect(rejected.every((error) => error instanceof TypeError)).toBe(true);
    expect(recommendation.signal.type).toBe("hold");
    expect(recommendation.signals).toHaveLength(2);
    expect(recommendation.riskAssessment.factors).toEqual([
      "RSI extreme",
      "price deviates from mean",
    ]);
    expect(Object.isFrozen(recommendation.signals[0])).toBe(true);
    expect(Object.isFrozen(recommendation.indicators.bollingerBands)).toBe(true);
  });

  it("falls back to a neutral record when its own logger throws", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const fail = () => {
      throw new Error("logger offline");
    };
    const logger: ILogger = { log: fail, debug: fail, info: fail, warn: fail };
    const onError = vi.fn(async () => undefined);
    const advisor = new ClientAdvisor({
      advisorName: "standalone",
      config: { ...DEFAULT_CONFIG },
      logger,
      onRecommendation: async () => undefined,
      onError,
    });
    const recommendation = await advisor.getRecommendation(fund);
    expect(recommendation.rationale).toBe("insufficient data");
    expect(recommendation.asset.symbol).toBe("000001");
    expect(onError).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalled();
    warn.mockRestore();
  });

  it("analyses a lone quote without inventing history", async () => {
    const recommendation = await getRecommendation(fund);
    expect(recommendation.currentPrice).toBe(100);
    expect(recommendation.indicators).toEqual({ volatility: 0 });
    expect(recommendation.patterns.insufficientData).toBe(true);
    expect(recommendation.signal.type).toBe("hold");
    expect(recommendation.rationale).toBe("no clear signal");
    expect(Number.isNaN(Date.parse(recommendation.timestamp))).toBe(false);
  });

  it("rejects an unknown advisor", async () => {
    await expect(getRecommendation(fund, "missing-advisor")).rejects.toThrow(
      /advisor missing-advisor not found/
    );
  });
});

describe("oracle failures", () => {
  it("isolates a throwing oracle", async () => {
    const onOracleError = vi.fn();
    const errors: Error[] = [];
    const unsubscribe = listenError((error) => {
      errors.push(error);
    });
    addAdvisor({
      advisorName: "broken-model",
      oracle: {
        predict: () => {
          throw new Error("model offline");
        },
      },
      callbacks: { onOracleError },
    });
    const recommendation = await getRecommendation(rising, "broken-model");
    expect(recommendation.prediction).toBeNull();
    expect(recommendation.signal.mlContribution).toBe(0);
    expect(recommendation.signal.type).toBe("hold");
    expect(onOracleError).toHaveBeenCalledTimes(1);
    expect(onOracleError.mock.calls[0][0]).toBe("TEST");
    await vi.waitFor(() => expect(errors).toHaveLength(1));
    expect(errors[0].message).toBe("model offline");
    unsubscribe();
  });

  it("treats an out-of-range probability as an error", async () => {
    const onOracleError = vi.fn();
    addAdvisor({
      advisorName: "invalid-model",
      oracle: {
        predict: async (): Promise<IProbabilityEstimate> => ({
          probability: 1.5,
          prediction: 1,
          confidence: "high",
          weights: {},
        }),
      },
      callbacks: { onOracleError },
    });
    const recommendation = await getRecommendation(rising, "invalid-model");
    expect(recommendation.prediction).toBeNull();
    expect(recommendation.signal.mlContribution).toBe(0);
    expect(onOracleError).toHaveBeenCalledTimes(1);
  });

  it("treats a null estimate as no opinion", async () => {
    const onOracleError = vi.fn();
    addAdvisor({
      advisorName: "silent-model",
      oracle: { predict: () => null },
      callbacks: { onOracleError },
    });
    const recommendation = await getRecommendation(rising, "silent-model");
    expect(recommendation.prediction).toBeNull();
    expect(onOracleError).not.toHaveBeenCalled();
  });

  it("skips the oracle on short histories", async () => {
    const predict = vi.fn(() => null);
    addAdvisor({ advisorName: "short-model", oracle: { predict } });
    await getRecommendation(fund, "short-model");
    expect(predict).not.toHaveBeenCalled();
  });
});

describe("getRecommendations", () => {
  it("analyses each asset independently and keeps order", async () => {
    const recommendations = await getRecommendations([rising, { broken: true }, fund]);
    expect(recommendations.map(({ asset }) => asset.symbol)).toEqual([
      "TEST",
      "",
      "000001",
    ]);
    expect(recommendations[1].rationale).toBe("insufficient data");
    expect(recommendations[2].currentPrice).toBe(100);
  });
});

describe("advisors", () => {
  it("applies config overrides per advisor", async () => {
    addAdvisor({
      advisorName: "wide-stops",
      config: { CC_STOP_LOSS_PERCENT: 0.1 },
    });
    const recommendation = await getRecommendation(fund, "wide-stops");
    expect(recommendation.entryExit.stopLoss).toBe(90);
    const defaults = await getRecommendation(fund);
    expect(defaults.entryExit.stopLoss).toBe(95);
  });

  it("rejects duplicates and invalid overrides", () => {
    expect(() =>
      addAdvisor({
        advisorName: DEFAULT_ADVISOR_NAME,
        oracle: new LogisticOracle({ intercept: 2, coefficients: {} }),
      })
    ).toThrow(/__default__ is a reserved advisor name/);
    addAdvisor({ advisorName: "unique" });
    expect(() => addAdvisor({ advisorName: "unique" })).toThrow(
      /advisor unique already exist/
    );
    expect(() =>
      addAdvisor({ advisorName: "bad-periods", config: { CC_SMA_SHORT: 30 } })
    ).toThrow(/CC_SMA_SHORT/);
    const config: Partial<GlobalConfig> = { CC_RSI_PERIOD: 10 };
    Reflect.set(config, "CC_UNKNOWN", 1);
    expect(() => addAdvisor({ advisorName: "bad-key", config })).toThrow(
      /unknown config key CC_UNKNOWN/
    );
  });

  it("lists registered advisors", async () => {
    addAdvisor({ advisorName: "listed", note: "shows up in the list" });
    const names = (await listAdvisors()).map(({ advisorName }) => advisorName);
    expect(names).toContain("listed");
    expect(names).not.toContain(DEFAULT_ADVISOR_NAME);
    expect(names).not.toContain("bad-periods");
  });

  it("fires callbacks and emits recommendations", async () => {
    const onRecommendation = vi.fn();
    addAdvisor({ advisorName: "observed", callbacks: { onRecommendation } });
    const events: string[] = [];
    const unsubscribe = listenRecommendation(({ advisorName, symbol }) => {
      events.push(`${advisorName}:${symbol}`);
    });
    const recommendation = await getRecommendation(fund, "observed");
    expect(onRecommendation).toHaveBeenCalledWith("000001", recommendation);
    await vi.waitFor(() => expect(events).toEqual(["observed:000001"]));
    unsubscribe();
  });

  it("survives a throwing callback", async () => {
    addAdvisor({
      advisorName: "noisy",
      callbacks: {
        onRecommendation: () => {
          throw new Error("callback failure");
        },
      },
    });
    const recommendation = await getRecommendation(fund, "noisy");
    expect(recommendation.currentPrice).toBe(100);
  });
});
