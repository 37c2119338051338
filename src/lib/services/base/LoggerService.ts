import { errorData, getErrorMessage, trycatch } from "functools-kit";
import { ILogger } from "../../../interfaces/Logger.interface";

/**
 * No-op logger implementation used as default.
 * Silently discards all log messages.
 */
const NOOP_LOGGER: ILogger = {
  log() {
    void 0;
  },
  debug() {
    void 0;
  },
  info() {
    void 0;
  },
  warn() {
    void 0;
  },
};

/**
 * Calls one level of the user logger. A throwing logger must not break the
 * caller, so the failure goes to the console.
 */
const CALL_LOGGER_FN = trycatch(
  (logger: ILogger, level: keyof ILogger, topic: string, args: unknown[]) => {
    logger[level](topic, ...args);
  },
  {
    fallback: (error) => {
      console.warn("loggerService logger thrown", {
        error: errorData(error),
        message: getErrorMessage(error),
      });
    },
  }
);

/**
 * Logger service used by every service and engine client.
 *
 * Delegates to the logger passed to setLogger(), NOOP_LOGGER until then.
 */
export class LoggerService implements ILogger {
  private _commonLogger: ILogger = NOOP_LOGGER;

  /**
   * Logs general-purpose message.
   *
   * @param topic - Log topic/category
   * @param args - Additional log arguments
   */
  public log = (topic: string, ...args: unknown[]) => {
    CALL_LOGGER_FN(this._commonLogger, "log", topic, args);
  };

  /**
   * Logs debug-level message, used by the engine clients.
   */
  public debug = (topic: string, ...args: unknown[]) => {
    CALL_LOGGER_FN(this._commonLogger, "debug", topic, args);
  };

  /**
   * Logs info-level message.
   */
  public info = (topic: string, ...args: unknown[]) => {
    CALL_LOGGER_FN(this._commonLogger, "info", topic, args);
  };

  /**
   * Logs warning-level message: oracle failures and isolated analysis errors.
   */
  public warn = (topic: string, ...args: unknown[]) => {
    CALL_LOGGER_FN(this._commonLogger, "warn", topic, args);
  };

  /**
   * Sets custom logger implementation.
   *
   * @param logger - Custom logger implementing ILogger interface
   */
  public setLogger = (logger: ILogger) => {
    this._commonLogger = logger;
  };
}

export default LoggerService;
