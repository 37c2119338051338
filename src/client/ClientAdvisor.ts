import { errorData, getErrorMessage, trycatch } from "functools-kit";
import { IAdvisorParams } from "../interfaces/Advisor.interface";
import { AssetLike } from "../interfaces/Asset.interface";
import { IPriceBar } from "../interfaces/Candle.interface";
import { IProbabilityEstimate } from "../interfaces/Oracle.interface";
import {
  IAssetIdentity,
  IRecommendation,
} from "../interfaces/Recommendation.interface";
import { ICompositeSignal, IElementarySignal } from "../interfaces/Signal.interface";
import { GlobalConfig } from "../config/params";
import { buildFeatureVector } from "../math/feature.math";
import { detectPatterns } from "../math/pattern.math";
import { toAssetIdentity, toPriceSeries } from "../helpers/toPriceSeries";
import { EstimateSchema } from "../schema/Estimate.schema";
import { deepFreeze } from "../utils/deepFreeze";
import ClientIndicator from "./ClientIndicator";
import ClientSignal from "./ClientSignal";
import ClientRisk from "./ClientRisk";
import ClientEntryExit from "./ClientEntryExit";

const NO_SIGNAL_RATIONALE = "no clear signal";
const INSUFFICIENT_DATA_RATIONALE = "insufficient data";

const FORMAT_PERCENT_FN = (value: number) => `${(value * 100).toFixed(1)}%`;

/**
 * Record returned when there is nothing to analyse or the analysis failed.
 */
const CREATE_NEUTRAL_FN = (asset: IAssetIdentity): IRecommendation => {
  const recommendation: IRecommendation = {
    asset,
    currentPrice: 0,
    signal: {
      type: "hold",
      strength: 0,
      confidence: "low",
      buyCount: 0,
      sellCount: 0,
      mlContribution: 0,
      totalScore: 0,
    },
    indicators: { volatility: 0 },
    signals: [],
    patterns: { patterns: [], bias: "neutral", insufficientData: true },
    prediction: null,
    riskAssessment: { level: "low", score: 0, factors: [], volatility: 0 },
    entryExit: {
      entryPrice: 0,
      stopLoss: 0,
      takeProfit: 0,
      riskRewardRatio: 0,
    },
    rationale: INSUFFICIENT_DATA_RATIONALE,
    timestamp: new Date().toISOString(),
  };
  return deepFreeze(recommendation);
};

/**
 * Human-readable summary: elementary reasons in rule order, then the model
 * reason, then the composite reason, cut to CC_RATIONALE_REASON_LIMIT.
 */
const CREATE_RATIONALE_FN = (
  signals: IElementarySignal[],
  prediction: IProbabilityEstimate | null,
  composite: ICompositeSignal,
  config: GlobalConfig
) => {
  const reasons = signals.map(({ reason }) => reason);

  if (prediction && prediction.probability !== 0.5) {
    const { probability } = prediction;
    if (probability > config.CC_ML_BULLISH_PROBABILITY) {
      reasons.push(
        `model predicts rise with probability ${FORMAT_PERCENT_FN(probability)}`
      );
    } else if (probability < config.CC_ML_NEUTRAL_PROBABILITY) {
      reasons.push(
        `model predicts fall with probability ${FORMAT_PERCENT_FN(1 - probability)}`
      );
    }
  }

  if (composite.type === "buy" || composite.type === "strong_buy") {
    reasons.push("multiple indicators point to a buy opportunity");
  } else if (composite.type === "sell" || composite.type === "strong_sell") {
    reasons.push("multiple indicators point to a sell signal");
  }

  if (!reasons.length) {
    return NO_SIGNAL_RATIONALE;
  }
  return reasons.slice(0, config.CC_RATIONALE_REASON_LIMIT).join("; ");
};

/**
 * Asks the oracle for an estimate of the last bar.
 *
 * Skipped without an oracle or when the series is too short for a feature
 * vector. A thrown error, a rejection or an estimate that fails validation
 * is reported and treated as no estimate. Null means the oracle has no
 * opinion.
 */
const GET_PREDICTION_FN = async (
  self: ClientAdvisor,
  symbol: string,
  bars: IPriceBar[]
): Promise<IProbabilityEstimate | null> => {
  const { oracle } = self.params;
  if (!oracle) {
    return null;
  }
  const features = buildFeatureVector(bars, self.params.config);
  if (!features) {
    self.params.logger.debug("ClientAdvisor prediction skipped", {
      symbol,
      bars: bars.length,
    });
    return null;
  }
  try {
    const estimate = await oracle.predict(features);
    if (estimate === null) {
      return null;
    }
    const result = EstimateSchema.safeParse(estimate);
    if (!result.success) {
      throw new Error(`oracle estimate is invalid: ${result.error.message}`);
    }
    return { ...estimate, weights: { ...estimate.weights } };
  } catch (error) {
    const message = "ClientAdvisor oracle failed";
    const payload = {
      symbol,
      error: errorData(error),
      message: getErrorMessage(error),
    };
    self.logWarning(message, payload);
    await self.callOracleErrorCallback(
      symbol,
      error instanceof Error ? error : new Error(getErrorMessage(error))
    );
    await self.params.onError(error);
    return null;
  }
};

/**
 * Runs the full pipeline for one asset. May throw, the caller guards it.
 */
const ANALYZE_FN = async (
  self: ClientAdvisor,
  asset: AssetLike,
  identity: IAssetIdentity
): Promise<IRecommendation> => {
  const bars = toPriceSeries(asset);
  if (!bars.length) {
    self.params.logger.debug("ClientAdvisor no usable bars", {
      symbol: identity.symbol,
    });
    return CREATE_NEUTRAL_FN(identity);
  }

  const currentPrice = bars[bars.length - 1].close;

  const indicators = self.indicator.getSnapshot(bars);
  const patterns = detectPatterns(bars);
  const signals = self.signal.getSignals(indicators, currentPrice);
  const prediction = await GET_PREDICTION_FN(self, identity.symbol, bars);
  const signal = self.signal.getComposite(
    signals,
    self.signal.getMlWeight(prediction)
  );
  const riskAssessment = self.risk.assess(indicators);
  const entryExit = self.entryExit.calculate(currentPrice, signal.type);

  const recommendation: IRecommendation = {
    asset: identity,
    currentPrice,
    signal,
    indicators,
    signals,
    patterns,
    prediction,
    riskAssessment,
    entryExit,
    rationale: CREATE_RATIONALE_FN(
      signals,
      prediction,
      signal,
      self.params.config
    ),
    timestamp: new Date().toISOString(),
  };

  return deepFreeze(recommendation);
};

/**
 * ClientAdvisor builds recommendation records for one advisor configuration.
 *
 * Owns the engine clients, all constructed with the same resolved config,
 * and never rejects: malformed input and unexpected failures both end in a
 * neutral `hold` record.
 *
 * @example
 * ```typescript
 * const advisor = new ClientAdvisor({
 *   advisorName: "swing",
 *   config: { ...GLOBAL_CONFIG, CC_RSI_PERIOD: 10 },
 *   logger,
 *   onRecommendation: async () => {},
 *   onError: async () => {},
 * });
 * const recommendation = await advisor.getRecommendation(asset);
 * ```
 */
export class ClientAdvisor {
  readonly indicator: ClientIndicator;
  readonly signal: ClientSignal;
  readonly risk: ClientRisk;
  readonly entryExit: ClientEntryExit;

  constructor(readonly params: IAdvisorParams) {
    const engineParams = { config: params.config, logger: params.logger };
    this.indicator = new ClientIndicator(engineParams);
    this.signal = new ClientSignal(engineParams);
    this.risk = new ClientRisk(engineParams);
    this.entryExit = new ClientEntryExit(engineParams);
  }

  /**
   * Forwards a warning to the logger. A failing logger is reported on the
   * console instead of failing the analysis.
   */
  logWarning = trycatch(
    (topic: string, payload: Record<string, unknown>) => {
      this.params.logger.warn(topic, payload);
    },
    {
      fallback: (error) => {
        console.warn("ClientAdvisor logger thrown", {
          topic: "logWarning",
          error: errorData(error),
          message: getErrorMessage(error),
        });
      },
    }
  );

  /**
   * Invokes the user onRecommendation callback, errors are logged only.
   */
  callRecommendationCallback = trycatch(
    async (symbol: string, recommendation: IRecommendation) => {
      if (this.params.callbacks?.onRecommendation) {
        await this.params.callbacks.onRecommendation(symbol, recommendation);
      }
    },
    {
      fallback: (error) => {
        this.logWarning("ClientAdvisor onRecommendation callback thrown", {
          error: errorData(error),
          message: getErrorMessage(error),
        });
      },
    }
  );

  /**
   * Invokes the user onOracleError callback, errors are logged only.
   */
  callOracleErrorCallback = trycatch(
    async (symbol: string, oracleError: Error) => {
      if (this.params.callbacks?.onOracleError) {
        await this.params.callbacks.onOracleError(symbol, oracleError);
      }
    },
    {
      fallback: (error) => {
        this.logWarning("ClientAdvisor onOracleError callback thrown", {
          error: errorData(error),
          message: getErrorMessage(error),
        });
      },
    }
  );

  /**
   * Analyses one asset.
   *
   * @param asset - Tagged asset record, anything else is analysed as unknown
   * @returns Frozen recommendation, never rejects
   */
  public getRecommendation = async (
    asset: AssetLike
  ): Promise<IRecommendation> => {
    const identity = toAssetIdentity(asset);

    let recommendation: IRecommendation;
    try {
      this.params.logger.debug("ClientAdvisor getRecommendation", {
        advisorName: this.params.advisorName,
        symbol: identity.symbol,
        assetClass: identity.assetClass,
      });
      recommendation = await ANALYZE_FN(this, asset, identity);
    } catch (error) {
      const message = "ClientAdvisor analysis failed";
      const payload = {
        symbol: identity.symbol,
        error: errorData(error),
        message: getErrorMessage(error),
      };
      this.logWarning(message, payload);
      await this.params.onError(error);
      recommendation = CREATE_NEUTRAL_FN(identity);
    }

    await this.callRecommendationCallback(identity.symbol, recommendation);
    await this.params.onRecommendation(this.params.advisorName, recommendation);

    return recommendation;
  };
}

export default ClientAdvisor;
