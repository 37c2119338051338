import { inject } from "../../core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../core/types";
import { errorData, getErrorMessage, memoize, trycatch } from "functools-kit";
import ClientAdvisor from "../../../client/ClientAdvisor";
import AdvisorSchemaService from "../schema/AdvisorSchemaService";
import ConfigValidationService from "../validation/ConfigValidationService";
import { AdvisorName, IAdvisorSchema } from "../../../interfaces/Advisor.interface";
import { AssetLike } from "../../../interfaces/Asset.interface";
import { IRecommendation } from "../../../interfaces/Recommendation.interface";
import {
  DEFAULT_ADVISOR_NAME,
  GLOBAL_CONFIG,
  GlobalConfig,
} from "../../../config/params";
import { errorEmitter, recommendationEmitter } from "../../../config/emitters";

/**
 * Connection service routing recommendation requests to the correct
 * ClientAdvisor instance.
 *
 * Key features:
 * - Memoized ClientAdvisor instances by advisorName
 * - Resolves the advisor config as GLOBAL_CONFIG merged with its overrides
 * - Forwards recommendations and isolated errors to the emitters
 *
 * The memo is cleared by setConfig() so engines pick up the new defaults.
 *
 * @example
 * ```typescript
 * // Used internally by the library
 * const recommendation = await advisorConnectionService.getRecommendation(
 *   { source: "fund", quote: { fundcode: "000001", name: "Growth Fund", nav: 1.23 } },
 *   "swing"
 * );
 * ```
 */
export class AdvisorConnectionService {
  private readonly loggerService = inject<LoggerService>(TYPES.loggerService);
  private readonly advisorSchemaService = inject<AdvisorSchemaService>(
    TYPES.advisorSchemaService
  );
  private readonly configValidationService = inject<ConfigValidationService>(
    TYPES.configValidationService
  );

  /**
   * Emits a built recommendation, listener failures are logged only.
   */
  private commitRecommendation = trycatch(
    async (advisorName: AdvisorName, recommendation: IRecommendation) =>
      await recommendationEmitter.next({
        advisorName,
        symbol: recommendation.asset.symbol,
        recommendation,
      }),
    {
      fallback: (error) => {
        const message = "advisorConnectionService commitRecommendation thrown";
        const payload = {
          error: errorData(error),
          message: getErrorMessage(error),
        };
        this.loggerService.warn(message, payload);
        console.warn(message, payload);
      },
    }
  );

  /**
   * Emits an isolated analysis or oracle error.
   */
  private commitError = trycatch(
    async (error: unknown) =>
      await errorEmitter.next(
        error instanceof Error ? error : new Error(getErrorMessage(error))
      ),
    {
      fallback: (error) => {
        const message = "advisorConnectionService commitError thrown";
        const payload = {
          error: errorData(error),
          message: getErrorMessage(error),
        };
        this.loggerService.warn(message, payload);
        console.warn(message, payload);
      },
    }
  );

  /**
   * Resolves the schema of an advisor, the default advisor has no
   * registered schema.
   */
  private getSchema = (advisorName: AdvisorName): IAdvisorSchema => {
    if (advisorName === DEFAULT_ADVISOR_NAME) {
      return { advisorName };
    }
    return this.advisorSchemaService.get(advisorName);
  };

  /**
   * Retrieves memoized ClientAdvisor instance for given advisor name.
   *
   * Creates ClientAdvisor on first call, returns cached instance on
   * subsequent calls.
   *
   * @param advisorName - Name of registered advisor or DEFAULT_ADVISOR_NAME
   * @returns Configured ClientAdvisor instance
   * @throws Error if the merged configuration is invalid
   */
  public getAdvisor = memoize(
    ([advisorName]) => `${advisorName}`,
    (advisorName: AdvisorName) => {
      const { config: overrides, ...schema } = this.getSchema(advisorName);
      const config: GlobalConfig = { ...GLOBAL_CONFIG, ...overrides };
      this.configValidationService.validate(config);
      return new ClientAdvisor({
        ...schema,
        config,
        logger: this.loggerService,
        onRecommendation: async (name, recommendation) => {
          await this.commitRecommendation(name, recommendation);
        },
        onError: async (error) => {
          await this.commitError(error);
        },
      });
    }
  );

  /**
   * Builds the recommendation for one asset.
   *
   * @param asset - Asset record
   * @param advisorName - Advisor to route to
   * @returns Frozen recommendation, rejects only on configuration errors
   */
  public getRecommendation = async (
    asset: AssetLike,
    advisorName: AdvisorName
  ): Promise<IRecommendation> => {
    this.loggerService.log("advisorConnectionService getRecommendation", {
      advisorName,
    });
    const advisor = this.getAdvisor(advisorName);
    return await advisor.getRecommendation(asset);
  };

  /**
   * Drops cached ClientAdvisor instances.
   *
   * @param advisorName - Advisor to drop, every advisor when omitted
   */
  public clear = (advisorName?: AdvisorName) => {
    this.loggerService.log("advisorConnectionService clear", {
      advisorName,
    });
    if (advisorName === undefined) {
      this.getAdvisor.clear();
      return;
    }
    this.getAdvisor.clear(advisorName);
  };
}

export default AdvisorConnectionService;
