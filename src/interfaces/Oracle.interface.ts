import type { SignalConfidence } from "./Signal.interface";

/**
 * Names of the oracle input features in their fixed order.
 */
export const FEATURE_NAMES = [
  "priceChange",
  "rsi",
  "macd",
  "macdSignal",
  "macdHistogram",
  "bollingerPosition",
  "sma5Ratio",
  "sma20Ratio",
  "ema12Ratio",
  "ema26Ratio",
  "volumeRatio",
  "volatility",
  "patternSignal",
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

/**
 * Named feature vector describing the last bar of a price series.
 * `values` follows the order of FEATURE_NAMES.
 */
export interface IFeatureVector {
  names: readonly FeatureName[];
  values: number[];
  /** Same values keyed by name */
  named: Record<FeatureName, number>;
}

/**
 * Output of a probability oracle for the "price rises" outcome.
 */
export interface IProbabilityEstimate {
  /** Probability of the rise outcome, 0..1 */
  probability: number;
  prediction: 0 | 1;
  confidence: SignalConfidence;
  /** Per-feature weight of the underlying model */
  weights: Partial<Record<FeatureName, number>>;
}

/**
 * External probability estimator. Returning null means "no opinion" and is
 * treated the same as having no oracle at all.
 *
 * @example
 * ```typescript
 * const oracle: IProbabilityOracle = {
 *   predict: async (features) => myModel.score(features.values),
 * };
 * ```
 */
export interface IProbabilityOracle {
  predict(
    features: IFeatureVector
  ): IProbabilityEstimate | null | Promise<IProbabilityEstimate | null>;
}

/**
 * Pre-fitted logistic regression over the feature vector.
 * Features without a coefficient do not contribute.
 */
export interface ILogisticModel {
  intercept: number;
  coefficients: Partial<Record<FeatureName, number>>;
  /** Per-feature mean used for standardization, 0 when absent */
  means?: Partial<Record<FeatureName, number>>;
  /** Per-feature scale used for standardization, 1 when absent or 0 */
  scales?: Partial<Record<FeatureName, number>>;
}
