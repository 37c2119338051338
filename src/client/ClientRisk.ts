import { IEngineParams } from "../interfaces/Advisor.interface";
import { IIndicatorSnapshot } from "../interfaces/Indicator.interface";
import { IRiskAssessment, RiskLevel } from "../interfaces/Risk.interface";

/** Score thresholds of the risk levels */
const HIGH_RISK_SCORE = 4;
const MEDIUM_RISK_SCORE = 2;

/** Bollinger position bounds outside of which the price is far from the mean */
const BAND_POSITION_HIGH = 0.9;
const BAND_POSITION_LOW = 0.1;

/** Volume ratio under which trading is considered to dry up */
const VOLUME_CONTRACTION_RATIO = 0.5;

const GET_LEVEL_FN = (score: number): RiskLevel => {
  if (score >= HIGH_RISK_SCORE) {
    return "high";
  }
  if (score >= MEDIUM_RISK_SCORE) {
    return "medium";
  }
  return "low";
};

/**
 * ClientRisk scores the indicator snapshot into a risk level.
 *
 * Conditions are evaluated in a fixed order and each one adds to the score:
 * - volatility over the threshold: +2, over half of it: +1
 * - RSI beyond the extreme bounds: +1
 * - price near a Bollinger band edge: +1
 * - volume contraction: +1
 *
 * Indicators missing from the snapshot add nothing.
 */
export class ClientRisk {
  constructor(readonly params: IEngineParams) {}

  public assess = (snapshot: IIndicatorSnapshot): IRiskAssessment => {
    const { config } = this.params;

    this.params.logger.debug("ClientRisk assess", {
      volatility: snapshot.volatility,
    });

    const factors: string[] = [];
    let score = 0;

    if (snapshot.volatility > config.CC_VOLATILITY_THRESHOLD) {
      factors.push("high volatility");
      score += 2;
    } else if (snapshot.volatility > config.CC_VOLATILITY_THRESHOLD * 0.5) {
      factors.push("medium volatility");
      score += 1;
    }

    if (
      snapshot.rsi !== undefined &&
      (snapshot.rsi > config.CC_RSI_EXTREME_HIGH ||
        snapshot.rsi < config.CC_RSI_EXTREME_LOW)
    ) {
      factors.push("RSI extreme");
      score += 1;
    }

    if (snapshot.bollingerBands) {
      const { position } = snapshot.bollingerBands;
      if (position > BAND_POSITION_HIGH || position < BAND_POSITION_LOW) {
        factors.push("price deviates from mean");
        score += 1;
      }
    }

    if (
      snapshot.volume &&
      snapshot.volume.volumeRatio < VOLUME_CONTRACTION_RATIO
    ) {
      factors.push("volume contraction");
      score += 1;
    }

    return {
      level: GET_LEVEL_FN(score),
      score,
      factors,
      volatility: snapshot.volatility,
    };
  };
}

export default ClientRisk;
