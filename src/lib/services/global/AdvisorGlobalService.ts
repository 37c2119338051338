import { inject } from "../../core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../core/types";
import AdvisorConnectionService from "../connection/AdvisorConnectionService";
import AdvisorValidationService from "../validation/AdvisorValidationService";
import { AdvisorName } from "../../../interfaces/Advisor.interface";
import { DEFAULT_ADVISOR_NAME } from "../../../config/params";
import { AssetLike } from "../../../interfaces/Asset.interface";
import { IRecommendation } from "../../../interfaces/Recommendation.interface";

const METHOD_NAME_GET_RECOMMENDATION = "advisorGlobalService getRecommendation";
const METHOD_NAME_GET_RECOMMENDATIONS = "advisorGlobalService getRecommendations";

/**
 * Global service for recommendation operations.
 *
 * Validates the advisor name, then wraps AdvisorConnectionService.
 * Used by the public API.
 */
export class AdvisorGlobalService {
  private readonly loggerService = inject<LoggerService>(TYPES.loggerService);
  private readonly advisorConnectionService = inject<AdvisorConnectionService>(
    TYPES.advisorConnectionService
  );
  private readonly advisorValidationService = inject<AdvisorValidationService>(
    TYPES.advisorValidationService
  );

  private validate = (advisorName: AdvisorName, source: string) => {
    if (advisorName !== DEFAULT_ADVISOR_NAME) {
      this.advisorValidationService.validate(advisorName, source);
    }
  };

  /**
   * Builds the recommendation for one asset.
   *
   * @param asset - Asset record
   * @param advisorName - Registered advisor, the default advisor when omitted
   * @throws Error if the advisor is not registered
   */
  public getRecommendation = async (
    asset: AssetLike,
    advisorName: AdvisorName = DEFAULT_ADVISOR_NAME
  ): Promise<IRecommendation> => {
    this.loggerService.log(METHOD_NAME_GET_RECOMMENDATION, {
      advisorName,
    });
    this.validate(advisorName, METHOD_NAME_GET_RECOMMENDATION);
    return await this.advisorConnectionService.getRecommendation(
      asset,
      advisorName
    );
  };

  /**
   * Builds recommendations for a batch of assets.
   *
   * Assets are analysed independently and in parallel, the output keeps the
   * input order. A failure for one asset ends in a neutral record for that
   * asset only.
   *
   * @param assets - Asset records
   * @param advisorName - Registered advisor, the default advisor when omitted
   * @throws Error if the advisor is not registered
   */
  public getRecommendations = async (
    assets: AssetLike[],
    advisorName: AdvisorName = DEFAULT_ADVISOR_NAME
  ): Promise<IRecommendation[]> => {
    this.loggerService.log(METHOD_NAME_GET_RECOMMENDATIONS, {
      advisorName,
      count: assets.length,
    });
    this.validate(advisorName, METHOD_NAME_GET_RECOMMENDATIONS);
    return await Promise.all(
      assets.map(
        async (asset) =>
          await this.advisorConnectionService.getRecommendation(
            asset,
            advisorName
          )
      )
    );
  };
}

export default AdvisorGlobalService;
