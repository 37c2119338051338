import type { AdvisorName } from "../interfaces/Advisor.interface";
import type { IRecommendation } from "../interfaces/Recommendation.interface";

/**
 * Contract for recommendation events.
 *
 * Emitted by recommendationEmitter once per analysed asset.
 *
 * @example
 * ```typescript
 * import { listenRecommendation } from "quant-advisor";
 *
 * listenRecommendation((event) => {
 *   console.log(event.symbol, event.recommendation.signal.type);
 * });
 * ```
 */
export interface RecommendationContract {
  /** Advisor that produced the recommendation */
  advisorName: AdvisorName;
  /** Asset symbol, empty string for unrecognised input */
  symbol: string;
  /** The recommendation itself */
  recommendation: IRecommendation;
}

export default RecommendationContract;
