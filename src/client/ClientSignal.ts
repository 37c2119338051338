import { IEngineParams } from "../interfaces/Advisor.interface";
import { IIndicatorSnapshot } from "../interfaces/Indicator.interface";
import { IProbabilityEstimate } from "../interfaces/Oracle.interface";
import {
  ICompositeSignal,
  IElementarySignal,
  SignalConfidence,
  SignalType,
} from "../interfaces/Signal.interface";

/** |score| and signal count needed for high confidence */
const HIGH_CONFIDENCE_SCORE = 4;
const HIGH_CONFIDENCE_SIGNALS = 3;

/** |score| and signal count needed for medium confidence */
const MEDIUM_CONFIDENCE_SCORE = 2;
const MEDIUM_CONFIDENCE_SIGNALS = 2;

/**
 * Elementary signal weight: strong counts twice.
 */
const GET_WEIGHT_FN = ({ strength }: IElementarySignal) =>
  strength === "strong" ? 2 : 1;

const GET_CONFIDENCE_FN = (
  score: number,
  signalCount: number
): SignalConfidence => {
  const magnitude = Math.abs(score);
  if (
    magnitude >= HIGH_CONFIDENCE_SCORE &&
    signalCount >= HIGH_CONFIDENCE_SIGNALS
  ) {
    return "high";
  }
  if (
    magnitude >= MEDIUM_CONFIDENCE_SCORE &&
    signalCount >= MEDIUM_CONFIDENCE_SIGNALS
  ) {
    return "medium";
  }
  return "low";
};

/**
 * Turns indicator readings into elementary signals and folds them, together
 * with the oracle weight, into one composite signal.
 *
 * Rule order is fixed: RSI, MACD, Bollinger Bands, moving averages, volume.
 * Each rule yields at most one signal.
 *
 * @example
 * ```typescript
 * const client = new ClientSignal({ config: GLOBAL_CONFIG, logger });
 * const signals = client.getSignals(snapshot, price);
 * const composite = client.getComposite(signals, client.getMlWeight(estimate));
 * ```
 */
export class ClientSignal {
  constructor(readonly params: IEngineParams) {}

  /**
   * Evaluates the rule table against the snapshot.
   *
   * @param snapshot - Trailing indicator readings
   * @param price - Close of the last bar
   */
  public getSignals = (
    snapshot: IIndicatorSnapshot,
    price: number
  ): IElementarySignal[] => {
    const { config } = this.params;

    this.params.logger.debug("ClientSignal getSignals", { price });

    const signals: IElementarySignal[] = [];

    if (snapshot.rsi !== undefined) {
      if (snapshot.rsi < config.CC_RSI_OVERSOLD) {
        signals.push({ direction: "buy", reason: "RSI oversold", strength: "medium" });
      } else if (snapshot.rsi > config.CC_RSI_OVERBOUGHT) {
        signals.push({ direction: "sell", reason: "RSI overbought", strength: "medium" });
      }
    }

    if (snapshot.macd) {
      const { macd, signal, histogram } = snapshot.macd;
      if (macd > signal && histogram > 0) {
        signals.push({ direction: "buy", reason: "MACD bullish crossover", strength: "strong" });
      } else if (macd < signal && histogram < 0) {
        signals.push({ direction: "sell", reason: "MACD bearish crossover", strength: "strong" });
      }
    }

    if (snapshot.bollingerBands) {
      const { upper, lower } = snapshot.bollingerBands;
      if (price <= lower) {
        signals.push({ direction: "buy", reason: "price touched lower Bollinger band", strength: "medium" });
      } else if (price >= upper) {
        signals.push({ direction: "sell", reason: "price touched upper Bollinger band", strength: "medium" });
      }
    }

    if (snapshot.movingAverages) {
      const { smaShort, smaLong } = snapshot.movingAverages;
      if (smaShort > smaLong && price > smaShort) {
        signals.push({ direction: "buy", reason: "moving averages in bullish alignment", strength: "medium" });
      } else if (smaShort < smaLong && price < smaShort) {
        signals.push({ direction: "sell", reason: "moving averages in bearish alignment", strength: "medium" });
      }
    }

    if (snapshot.volume) {
      const { isAbnormal, volumeRatio } = snapshot.volume;
      if (isAbnormal && volumeRatio > config.CC_VOLUME_SPIKE_RATIO) {
        signals.push({ direction: "buy", reason: "abnormal volume surge", strength: "medium" });
      }
    }

    return signals;
  };

  /**
   * Maps the oracle probability to a score weight.
   * Boundary values fall to the lower branch, no estimate weighs 0.
   */
  public getMlWeight = (estimate: IProbabilityEstimate | null): number => {
    const { config } = this.params;
    if (!estimate) {
      return 0;
    }
    if (estimate.probability > config.CC_ML_BULLISH_PROBABILITY) {
      return 2;
    }
    if (estimate.probability > config.CC_ML_NEUTRAL_PROBABILITY) {
      return 1;
    }
    return -1;
  };

  /**
   * Classifies a score into the configured bands.
   */
  public getSignalType = (score: number): SignalType => {
    const { config } = this.params;
    if (score >= config.CC_STRONG_BUY_SCORE) {
      return "strong_buy";
    }
    if (score >= config.CC_BUY_SCORE) {
      return "buy";
    }
    if (score <= config.CC_STRONG_SELL_SCORE) {
      return "strong_sell";
    }
    if (score <= config.CC_SELL_SCORE) {
      return "sell";
    }
    return "hold";
  };

  /**
   * Aggregates elementary signals and the oracle weight.
   *
   * @param signals - Output of getSignals
   * @param mlWeight - Output of getMlWeight
   */
  public getComposite = (
    signals: IElementarySignal[],
    mlWeight: number
  ): ICompositeSignal => {
    this.params.logger.debug("ClientSignal getComposite", {
      signals: signals.length,
      mlWeight,
    });

    const buySignals = signals.filter(({ direction }) => direction === "buy");
    const sellSignals = signals.filter(({ direction }) => direction === "sell");

    const buyStrength = buySignals.reduce((acc, s) => acc + GET_WEIGHT_FN(s), 0);
    const sellStrength = sellSignals.reduce((acc, s) => acc + GET_WEIGHT_FN(s), 0);

    const totalScore = buyStrength - sellStrength + mlWeight;

    return {
      type: this.getSignalType(totalScore),
      strength: Math.abs(totalScore),
      confidence: GET_CONFIDENCE_FN(totalScore, signals.length),
      buyCount: buySignals.length,
      sellCount: sellSignals.length,
      mlContribution: mlWeight,
      totalScore,
    };
  };
}

export default ClientSignal;
