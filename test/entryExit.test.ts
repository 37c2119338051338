import { describe, expect, it } from "vitest";
import ClientEntryExit from "../src/client/ClientEntryExit";
import { createEngineParams } from "./fixtures";

const client = new ClientEntryExit(createEngineParams());

describe("ClientEntryExit", () => {
  it("places long levels for buy signals", () => {
    expect(client.calculate(100, "buy")).toEqual({
      entryPrice: 99.5,
      stopLoss: 95,
      takeProfit: 115,
      riskRewardRatio: 3.44,
    });
    expect(client.calculate(100, "strong_buy")).toEqual(client.calculate(100, "buy"));
  });

  it("mirrors levels for sell signals", () => {
    expect(client.calculate(100, "sell")).toEqual({
      entryPrice: 100.5,
      stopLoss: 105,
      takeProfit: 85,
      riskRewardRatio: 3.44,
    });
  });

  it("enters at the current price on hold", () => {
    expect(client.calculate(100, "hold")).toEqual({
      entryPrice: 100,
      stopLoss: 95,
      takeProfit: 115,
      riskRewardRatio: 3,
    });
  });

  it("returns zeros for a non-positive price", () => {
    const zeros = { entryPrice: 0, stopLoss: 0, takeProfit: 0, riskRewardRatio: 0 };
    expect(client.calculate(0, "buy")).toEqual(zeros);
    expect(client.calculate(-5, "sell")).toEqual(zeros);
  });

  it("rounds to the configured precision", () => {
    const coarse = new ClientEntryExit(createEngineParams({ CC_PRICE_PRECISION: 2 }));
    expect(coarse.calculate(123.456, "hold")).toEqual({
      entryPrice: 123.46,
      stopLoss: 117.28,
      takeProfit: 141.97,
      riskRewardRatio: 3,
    });
  });

  it("reports a zero ratio when stop and entry coincide", () => {
    const noOffset = new ClientEntryExit(
      createEngineParams({ CC_ENTRY_OFFSET_PERCENT: 0.05 })
    );
    expect(noOffset.calculate(100, "buy")).toEqual({
      entryPrice: 95,
      stopLoss: 95,
      takeProfit: 115,
      riskRewardRatio: 0,
    });
  });
});
