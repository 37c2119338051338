import { inject } from "../../../lib/core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../../lib/core/types";
import { GLOBAL_CONFIG, GlobalConfig } from "../../../config/params";

/**
 * Keys that hold indicator lookback periods or counts.
 */
const PERIOD_KEYS = [
  "CC_RSI_PERIOD",
  "CC_MACD_FAST",
  "CC_MACD_SLOW",
  "CC_MACD_SIGNAL",
  "CC_SMA_SHORT",
  "CC_SMA_LONG",
  "CC_EMA_SHORT",
  "CC_EMA_LONG",
  "CC_BB_PERIOD",
  "CC_VOLUME_PERIOD",
  "CC_VOLATILITY_PERIOD",
  "CC_SUPPORT_RESISTANCE_WINDOW",
  "CC_FEATURE_MIN_BARS",
  "CC_RATIONALE_REASON_LIMIT",
] as const satisfies ReadonlyArray<keyof GlobalConfig>;

/**
 * Keys that hold a fraction of the current price.
 */
const FRACTION_KEYS = [
  "CC_STOP_LOSS_PERCENT",
  "CC_TAKE_PROFIT_PERCENT",
] as const satisfies ReadonlyArray<keyof GlobalConfig>;

/** Largest rounding precision accepted by Number.prototype.toFixed in practice */
const MAX_PRECISION = 15;

/**
 * Service for validating advisor configuration.
 *
 * Checks the global configuration after setConfig() and the merged
 * configuration of every advisor before its engine is built:
 * - **Periods**: positive integers, short periods below long ones
 * - **Fractions**: StopLoss/TakeProfit between 0 and 1
 * - **Thresholds**: RSI bounds inside 0..100, ordered score bands and
 *   oracle probability bands
 * - **Precision**: integer decimal places
 *
 * @throws {Error} If any validation fails, throws with detailed breakdown of all errors
 *
 * @example
 * ```typescript
 * const validator = new ConfigValidationService();
 * validator.validate(); // Throws if GLOBAL_CONFIG is invalid
 * validator.validate({ ...GLOBAL_CONFIG, CC_SMA_SHORT: 30 }); // Throws
 * ```
 */
export class ConfigValidationService {
  /**
   * @private
   * @readonly
   * Injected logger service instance
   */
  private readonly loggerService = inject<LoggerService>(TYPES.loggerService);

  /**
   * Validates a configuration for consistency.
   *
   * @param config - Configuration to check, GLOBAL_CONFIG by default
   * @throws Error if configuration is invalid
   */
  public validate = (config: GlobalConfig = GLOBAL_CONFIG) => {
    this.loggerService.log("configValidationService validate");

    const errors: string[] = [];

    for (const key of PERIOD_KEYS) {
      if (!Number.isInteger(config[key]) || config[key] < 1) {
        errors.push(`${key} must be a positive integer, got ${config[key]}`);
      }
    }

    if (config.CC_MACD_FAST >= config.CC_MACD_SLOW) {
      errors.push(
        `CC_MACD_FAST (${config.CC_MACD_FAST}) must be less than CC_MACD_SLOW (${config.CC_MACD_SLOW})`
      );
    }

    if (config.CC_SMA_SHORT >= config.CC_SMA_LONG) {
      errors.push(
        `CC_SMA_SHORT (${config.CC_SMA_SHORT}) must be less than CC_SMA_LONG (${config.CC_SMA_LONG})`
      );
    }

    if (config.CC_EMA_SHORT >= config.CC_EMA_LONG) {
      errors.push(
        `CC_EMA_SHORT (${config.CC_EMA_SHORT}) must be less than CC_EMA_LONG (${config.CC_EMA_LONG})`
      );
    }

    if (!Number.isFinite(config.CC_BB_STD) || config.CC_BB_STD <= 0) {
      errors.push(`CC_BB_STD must be a positive number, got ${config.CC_BB_STD}`);
    }

    for (const key of FRACTION_KEYS) {
      if (!Number.isFinite(config[key]) || config[key] <= 0 || config[key] >= 1) {
        errors.push(`${key} must be between 0 and 1 exclusive, got ${config[key]}`);
      }
    }

    if (
      !Number.isFinite(config.CC_ENTRY_OFFSET_PERCENT) ||
      config.CC_ENTRY_OFFSET_PERCENT < 0 ||
      config.CC_ENTRY_OFFSET_PERCENT >= config.CC_STOP_LOSS_PERCENT
    ) {
      errors.push(
        `CC_ENTRY_OFFSET_PERCENT must be non-negative and below CC_STOP_LOSS_PERCENT, got ${config.CC_ENTRY_OFFSET_PERCENT}`
      );
    }

    if (!Number.isFinite(config.CC_VOLATILITY_THRESHOLD) || config.CC_VOLATILITY_THRESHOLD <= 0) {
      errors.push(
        `CC_VOLATILITY_THRESHOLD must be a positive number, got ${config.CC_VOLATILITY_THRESHOLD}`
      );
    }

    if (!Number.isFinite(config.CC_VOLUME_THRESHOLD) || config.CC_VOLUME_THRESHOLD <= 0) {
      errors.push(
        `CC_VOLUME_THRESHOLD must be a positive number, got ${config.CC_VOLUME_THRESHOLD}`
      );
    }

    if (!Number.isFinite(config.CC_VOLUME_SPIKE_RATIO) || config.CC_VOLUME_SPIKE_RATIO <= 0) {
      errors.push(
        `CC_VOLUME_SPIKE_RATIO must be a positive number, got ${config.CC_VOLUME_SPIKE_RATIO}`
      );
    }

    // RSI bounds
    const rsiBounds = [
      config.CC_RSI_EXTREME_LOW,
      config.CC_RSI_OVERSOLD,
      config.CC_RSI_OVERBOUGHT,
      config.CC_RSI_EXTREME_HIGH,
    ];
    if (rsiBounds.some((value) => !Number.isFinite(value) || value < 0 || value > 100)) {
      errors.push(
        `RSI thresholds must lie within 0..100, got ${rsiBounds.join(", ")}`
      );
    } else if (config.CC_RSI_OVERSOLD >= config.CC_RSI_OVERBOUGHT) {
      errors.push(
        `CC_RSI_OVERSOLD (${config.CC_RSI_OVERSOLD}) must be less than CC_RSI_OVERBOUGHT (${config.CC_RSI_OVERBOUGHT})`
      );
    } else if (config.CC_RSI_EXTREME_LOW >= config.CC_RSI_EXTREME_HIGH) {
      errors.push(
        `CC_RSI_EXTREME_LOW (${config.CC_RSI_EXTREME_LOW}) must be less than CC_RSI_EXTREME_HIGH (${config.CC_RSI_EXTREME_HIGH})`
      );
    }

    // Score bands
    if (
      !(config.CC_STRONG_BUY_SCORE >= config.CC_BUY_SCORE) ||
      !(config.CC_BUY_SCORE > 0) ||
      !(config.CC_SELL_SCORE < 0) ||
      !(config.CC_STRONG_SELL_SCORE <= config.CC_SELL_SCORE)
    ) {
      errors.push(
        `score bands must satisfy CC_STRONG_BUY_SCORE >= CC_BUY_SCORE > 0 > CC_SELL_SCORE >= CC_STRONG_SELL_SCORE, ` +
        `got ${config.CC_STRONG_BUY_SCORE}, ${config.CC_BUY_SCORE}, ${config.CC_SELL_SCORE}, ${config.CC_STRONG_SELL_SCORE}`
      );
    }

    // Oracle probability bands
    if (
      !(config.CC_ML_NEUTRAL_PROBABILITY >= 0) ||
      !(config.CC_ML_NEUTRAL_PROBABILITY < config.CC_ML_BULLISH_PROBABILITY) ||
      !(config.CC_ML_BULLISH_PROBABILITY <= 1)
    ) {
      errors.push(
        `probability bands must satisfy 0 <= CC_ML_NEUTRAL_PROBABILITY < CC_ML_BULLISH_PROBABILITY <= 1, ` +
        `got ${config.CC_ML_NEUTRAL_PROBABILITY}, ${config.CC_ML_BULLISH_PROBABILITY}`
      );
    }

    for (const key of ["CC_PRICE_PRECISION", "CC_RATIO_PRECISION"] as const) {
      if (!Number.isInteger(config[key]) || config[key] < 0 || config[key] > MAX_PRECISION) {
        errors.push(`${key} must be an integer within 0..${MAX_PRECISION}, got ${config[key]}`);
      }
    }

    // Throw aggregated errors if any
    if (errors.length > 0) {
      const errorMessage = `config validation failed:\n${errors.map((e, i) => `  ${i + 1}. ${e}`).join('\n')}`;
      this.loggerService.warn(errorMessage);
      throw new Error(errorMessage);
    }

    this.loggerService.log("configValidationService validation passed");
  };
}

export default ConfigValidationService;
