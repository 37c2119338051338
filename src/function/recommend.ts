import lib from "../lib/index";
import { AdvisorName } from "../interfaces/Advisor.interface";
import { AssetLike } from "../interfaces/Asset.interface";
import { IRecommendation } from "../interfaces/Recommendation.interface";

const GET_RECOMMENDATION_METHOD_NAME = "recommend.getRecommendation";
const GET_RECOMMENDATIONS_METHOD_NAME = "recommend.getRecommendations";

/**
 * Builds a buy/sell/hold recommendation for one asset.
 *
 * Never rejects because of the asset itself: malformed records, short
 * histories and failing oracles all end in a complete (possibly neutral)
 * record. Only an unknown advisor name rejects.
 *
 * @param asset - Tagged asset record with an optional price history
 * @param advisorName - Registered advisor, built-in defaults when omitted
 * @returns Frozen recommendation record
 *
 * @example
 * ```typescript
 * import { getRecommendation } from "quant-advisor";
 *
 * const recommendation = await getRecommendation({
 *   source: "crypto",
 *   quote: { symbol: "btc", name: "Bitcoin", current_price: 100 },
 *   history: bars,
 * });
 * console.log(recommendation.signal.type, recommendation.rationale);
 * ```
 */
export async function getRecommendation(
  asset: AssetLike,
  advisorName?: AdvisorName
): Promise<IRecommendation> {
  lib.loggerService.info(GET_RECOMMENDATION_METHOD_NAME, {
    advisorName,
  });
  return await lib.advisorGlobalService.getRecommendation(asset, advisorName);
}

/**
 * Builds recommendations for many assets at once.
 *
 * Each asset is analysed independently, the result keeps the input order.
 *
 * @param assets - Tagged asset records
 * @param advisorName - Registered advisor, built-in defaults when omitted
 *
 * @example
 * ```typescript
 * const recommendations = await getRecommendations([btc, fund], "swing");
 * for (const { asset, signal } of recommendations) {
 *   console.log(asset.symbol, signal.type);
 * }
 * ```
 */
export async function getRecommendations(
  assets: AssetLike[],
  advisorName?: AdvisorName
): Promise<IRecommendation[]> {
  lib.loggerService.info(GET_RECOMMENDATIONS_METHOD_NAME, {
    advisorName,
    count: assets.length,
  });
  return await lib.advisorGlobalService.getRecommendations(assets, advisorName);
}
