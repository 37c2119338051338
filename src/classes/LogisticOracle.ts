import {
  IFeatureVector,
  ILogisticModel,
  IProbabilityEstimate,
  IProbabilityOracle,
} from "../interfaces/Oracle.interface";
import lib from "../lib";

const LOGISTIC_ORACLE_METHOD_NAME_PREDICT = "LogisticOracle.predict";

/** Probabilities outside of [0.3, 0.7] are reported with high confidence */
const HIGH_CONFIDENCE_UPPER = 0.7;
const HIGH_CONFIDENCE_LOWER = 0.3;

const SIGMOID_FN = (z: number) => 1 / (1 + Math.exp(-z));

/**
 * Probability oracle evaluating a pre-fitted logistic regression.
 *
 * Each feature is standardized as `(x - mean) / scale` before it is
 * multiplied by its coefficient. Fitting the model happens elsewhere.
 *
 * @example
 * ```typescript
 * import { addAdvisor, LogisticOracle } from "quant-advisor";
 *
 * addAdvisor({
 *   advisorName: "momentum-model",
 *   oracle: new LogisticOracle({
 *     intercept: -0.1,
 *     coefficients: { rsi: 1.2, macdHistogram: 0.8, volumeRatio: 0.3 },
 *     means: { rsi: 0.5 },
 *     scales: { rsi: 0.15 },
 *   }),
 * });
 * ```
 */
export class LogisticOracle implements IProbabilityOracle {
  constructor(readonly model: ILogisticModel) {}

  public predict(features: IFeatureVector): IProbabilityEstimate {
    lib.loggerService.info(LOGISTIC_ORACLE_METHOD_NAME_PREDICT, {
      features: features.named,
    });

    const { intercept, coefficients, means = {}, scales = {} } = this.model;

    let z = intercept;
    for (const name of features.names) {
      const coefficient = coefficients[name];
      if (coefficient === undefined) {
        continue;
      }
      const scale = scales[name] || 1;
      const value = (features.named[name] - (means[name] ?? 0)) / scale;
      z += coefficient * value;
    }

    const probability = SIGMOID_FN(z);

    return {
      probability,
      prediction: probability >= 0.5 ? 1 : 0,
      confidence:
        probability > HIGH_CONFIDENCE_UPPER || probability < HIGH_CONFIDENCE_LOWER
          ? "high"
          : "medium",
      weights: { ...coefficients },
    };
  }
}

export default LogisticOracle;
