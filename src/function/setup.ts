import { getErrorMessage } from "functools-kit";
import { DEFAULT_CONFIG, GLOBAL_CONFIG, GlobalConfig } from "../config/params";
import { ILogger } from "../interfaces/Logger.interface";
import lib from "../lib";

/**
 * Sets custom logger implementation for the library.
 *
 * All log messages from internal services and engine clients will be
 * forwarded to the provided logger.
 *
 * @param logger - Custom logger implementing ILogger interface
 *
 * @example
 * ```typescript
 * setLogger({
 *   log: (topic, ...args) => console.log(topic, args),
 *   debug: (topic, ...args) => console.debug(topic, args),
 *   info: (topic, ...args) => console.info(topic, args),
 *   warn: (topic, ...args) => console.warn(topic, args),
 * });
 * ```
 */
export function setLogger(logger: ILogger) {
  lib.loggerService.setLogger(logger);
}

/**
 * Sets global configuration parameters for the library.
 *
 * The change is validated and rolled back if invalid. Cached advisor engines
 * are dropped so the next recommendation uses the new values.
 *
 * @param config - Partial configuration object to override default settings
 * @throws Error if the resulting configuration is invalid
 *
 * @example
 * ```typescript
 * setConfig({
 *   CC_RSI_PERIOD: 10,
 *   CC_STOP_LOSS_PERCENT: 0.03,
 * });
 * ```
 */
export function setConfig(config: Partial<GlobalConfig>) {
  const prevConfig = Object.assign({}, GLOBAL_CONFIG);
  try {
    Object.assign(GLOBAL_CONFIG, config);
    lib.configValidationService.validate();
  } catch (error) {
    lib.loggerService.warn(
      `setConfig failed: ${getErrorMessage(error)}`,
      config
    );
    Object.assign(GLOBAL_CONFIG, prevConfig);
    throw error;
  }
  lib.advisorConnectionService.clear();
}

/**
 * Retrieves a copy of the current global configuration.
 *
 * @returns {GlobalConfig} A copy of the current global configuration object
 *
 * @example
 * ```typescript
 * const currentConfig = getConfig();
 * console.log(currentConfig.CC_RSI_PERIOD);
 * ```
 */
export function getConfig(): GlobalConfig {
  return Object.assign({}, GLOBAL_CONFIG);
}

/**
 * Retrieves the default configuration object for the library.
 *
 * @returns {Readonly<GlobalConfig>} The frozen default configuration object
 *
 * @example
 * ```typescript
 * const defaultConfig = getDefaultConfig();
 * console.log(defaultConfig.CC_STOP_LOSS_PERCENT); // 0.05
 * ```
 */
export function getDefaultConfig(): Readonly<GlobalConfig> {
  return DEFAULT_CONFIG;
}
