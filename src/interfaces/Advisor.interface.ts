import type { ILogger } from "./Logger.interface";
import type { IProbabilityOracle } from "./Oracle.interface";
import type { IRecommendation } from "./Recommendation.interface";
import type { GlobalConfig } from "../config/params";

/** Unique advisor identifier */
export type AdvisorName = string;

/**
 * Optional callbacks for advisor events.
 */
export interface IAdvisorCallbacks {
  /** Called after a recommendation has been built */
  onRecommendation: (symbol: string, recommendation: IRecommendation) => void;
  /** Called when the oracle throws or returns an invalid estimate */
  onOracleError: (symbol: string, error: Error) => void;
}

/**
 * Advisor schema registered via addAdvisor().
 *
 * An advisor is a named engine configuration: indicator periods, thresholds
 * and an optional probability oracle.
 */
export interface IAdvisorSchema {
  /** Unique advisor identifier */
  advisorName: AdvisorName;
  /** Optional developer note for documentation */
  note?: string;
  /** Overrides on top of the global configuration */
  config?: Partial<GlobalConfig>;
  /** Probability oracle, omit for indicator-only scoring */
  oracle?: IProbabilityOracle;
  /** Optional lifecycle callbacks */
  callbacks?: Partial<IAdvisorCallbacks>;
}

/**
 * Parameters the ClientAdvisor is constructed with.
 */
export interface IAdvisorParams extends Omit<IAdvisorSchema, "config"> {
  /** Fully resolved configuration */
  config: GlobalConfig;
  logger: ILogger;
  /** Commit hook fired after each recommendation */
  onRecommendation: (
    advisorName: AdvisorName,
    recommendation: IRecommendation
  ) => Promise<void>;
  /** Commit hook fired for every isolated failure */
  onError: (error: unknown) => Promise<void>;
}

/**
 * Params shared by the stateless engine clients.
 */
export interface IEngineParams {
  config: GlobalConfig;
  logger: ILogger;
}
