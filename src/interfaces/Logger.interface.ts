/**
 * Logger interface for diagnostic output.
 *
 * By default the library uses a no-op logger (all methods do nothing).
 * Use setLogger() to provide a custom implementation for debugging and monitoring.
 *
 * @example
 * ```typescript
 * import { setLogger } from "quant-advisor";
 *
 * setLogger({
 *   log: console.log,
 *   debug: console.debug,
 *   info: console.info,
 *   warn: console.warn,
 * });
 * ```
 */
export interface ILogger {
  /**
   * Log general information.
   * @param topic - Log category or topic
   * @param args - Additional arguments to log
   */
  log(topic: string, ...args: unknown[]): void;

  /**
   * Log debug information.
   * @param topic - Log category or topic
   * @param args - Additional arguments to log
   */
  debug(topic: string, ...args: unknown[]): void;

  /**
   * Log informational messages.
   * @param topic - Log category or topic
   * @param args - Additional arguments to log
   */
  info(topic: string, ...args: unknown[]): void;

  /**
   * Log warning messages.
   * @param topic - Log category or topic
   * @param args - Additional arguments to log
   */
  warn(topic: string, ...args: unknown[]): void;
}
