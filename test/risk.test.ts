import { describe, expect, it } from "vitest";
import ClientRisk from "../src/client/ClientRisk";
import { createEngineParams } from "./fixtures";

const client = new ClientRisk(createEngineParams());

const band = (position: number) => ({ upper: 110, middle: 100, lower: 90, position });
const volume = (volumeRatio: number) => ({
  averageVolume: 100,
  currentVolume: 100 * volumeRatio,
  volumeRatio,
  isAbnormal: false,
});

describe("ClientRisk", () => {
  it("is low with nothing to report", () => {
    expect(client.assess({ volatility: 0 })).toEqual({
      level: "low",
      score: 0,
      factors: [],
      volatility: 0,
    });
  });

  it("scores volatility against the threshold", () => {
    expect(client.assess({ volatility: 0.35 })).toEqual({
      level: "medium",
      score: 2,
      factors: ["high volatility"],
      volatility: 0.35,
    });
    expect(client.assess({ volatility: 0.2 }).factors).toEqual(["medium volatility"]);
    expect(client.assess({ volatility: 0.15 }).factors).toEqual([]);
  });

  it("collects every factor in evaluation order", () => {
    expect(
      client.assess({
        volatility: 0.4,
        rsi: 85,
        bollingerBands: band(0.95),
        volume: volume(0.4),
      })
    ).toEqual({
      level: "high",
      score: 5,
      factors: [
        "high volatility",
        "RSI extreme",
        "price deviates from mean",
        "volume contraction",
      ],
      volatility: 0.4,
    });
  });

  it("uses strict bounds", () => {
    const result = client.assess({
      volatility: 0,
      rsi: 80,
      bollingerBands: band(0.9),
      volume: volume(0.5),
    });
    expect(result.factors).toEqual([]);
    expect(result.level).toBe("low");
  });

  it("flags the low side as well", () => {
    const result = client.assess({
      volatility: 0,
      rsi: 15,
      bollingerBands: band(0.05),
    });
    expect(result.factors).toEqual(["RSI extreme", "price deviates from mean"]);
    expect(result.level).toBe("medium");
  });
});
