import { inject } from "../../core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../core/types";
import { AdvisorName, IAdvisorSchema } from "../../../interfaces/Advisor.interface";
import { memoize } from "functools-kit";

/**
 * Service for managing and validating advisor registrations.
 *
 * Maintains a registry of all configured advisors and validates their
 * existence before operations.
 *
 * @throws {Error} If duplicate advisor name is added
 * @throws {Error} If unknown advisor is referenced
 *
 * @example
 * ```typescript
 * const advisorValidation = new AdvisorValidationService();
 * advisorValidation.addAdvisor("swing", swingSchema);
 * advisorValidation.validate("swing", "getRecommendation"); // OK
 * advisorValidation.validate("unknown", "getRecommendation"); // Throws error
 * ```
 */
export class AdvisorValidationService {
  /**
   * @private
   * @readonly
   * Injected logger service instance
   */
  private readonly loggerService = inject<LoggerService>(TYPES.loggerService);

  /**
   * @private
   * Map storing advisor schemas by advisor name
   */
  private _advisorMap = new Map<AdvisorName, IAdvisorSchema>();

  /**
   * Adds an advisor schema to the validation service
   * @public
   * @throws {Error} If advisorName already exists
   */
  public addAdvisor = (advisorName: AdvisorName, advisorSchema: IAdvisorSchema): void => {
    this.loggerService.log("advisorValidationService addAdvisor", {
      advisorName,
    });
    if (this._advisorMap.has(advisorName)) {
      throw new Error(`advisor ${advisorName} already exist`);
    }
    this._advisorMap.set(advisorName, advisorSchema);
  };

  /**
   * Validates the existence of an advisor
   * @public
   * @throws {Error} If advisorName is not found
   * Memoized function to cache validation results
   */
  public validate = memoize(
    ([advisorName, source]) => `${advisorName}:${source}`,
    (advisorName: AdvisorName, source: string): boolean => {
      this.loggerService.log("advisorValidationService validate", {
        advisorName,
        source,
      });
      if (!this._advisorMap.has(advisorName)) {
        throw new Error(
          `advisor ${advisorName} not found source=${source}`
        );
      }
      return true;
    }
  );

  /**
   * Returns a list of all registered advisor schemas
   * @public
   */
  public list = async (): Promise<IAdvisorSchema[]> => {
    this.loggerService.log("advisorValidationService list");
    return Array.from(this._advisorMap.values());
  };
}

export default AdvisorValidationService;
