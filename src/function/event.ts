import lib from "../lib";
import { errorEmitter, recommendationEmitter } from "../config/emitters";
import { RecommendationContract } from "../contract/Recommendation.contract";
import { queued } from "functools-kit";

const LISTEN_RECOMMENDATION_METHOD_NAME = "event.listenRecommendation";
const LISTEN_RECOMMENDATION_ONCE_METHOD_NAME = "event.listenRecommendationOnce";
const LISTEN_ERROR_METHOD_NAME = "event.listenError";

/**
 * Subscribes to every built recommendation with queued async processing.
 *
 * Events are processed sequentially in order received, even if callback is async.
 *
 * @param fn - Callback function to handle recommendation events
 * @returns Unsubscribe function to stop listening
 *
 * @example
 * ```typescript
 * import { listenRecommendation } from "quant-advisor";
 *
 * const unsubscribe = listenRecommendation(({ symbol, recommendation }) => {
 *   console.log(symbol, recommendation.signal.type);
 * });
 *
 * // Later: stop listening
 * unsubscribe();
 * ```
 */
export function listenRecommendation(
  fn: (event: RecommendationContract) => void
) {
  lib.loggerService.log(LISTEN_RECOMMENDATION_METHOD_NAME);
  return recommendationEmitter.subscribe(queued(async (event) => fn(event)));
}

/**
 * Subscribes to filtered recommendation events with one-time execution.
 *
 * @param filterFn - Predicate to filter which events trigger the callback
 * @param fn - Callback function to handle the filtered event (called only once)
 * @returns Unsubscribe function to cancel the listener before it fires
 *
 * @example
 * ```typescript
 * listenRecommendationOnce(
 *   ({ recommendation }) => recommendation.signal.type === "strong_buy",
 *   ({ symbol }) => console.log("strong buy on", symbol)
 * );
 * ```
 */
export function listenRecommendationOnce(
  filterFn: (event: RecommendationContract) => boolean,
  fn: (event: RecommendationContract) => void
) {
  lib.loggerService.log(LISTEN_RECOMMENDATION_ONCE_METHOD_NAME);
  return recommendationEmitter.filter(filterFn).once(fn);
}

/**
 * Subscribes to isolated failures: oracle errors and analyses that fell back
 * to a neutral record.
 *
 * @param fn - Callback function to handle error events
 * @returns Unsubscribe function to stop listening
 *
 * @example
 * ```typescript
 * listenError((error) => console.error("advisor error:", error.message));
 * ```
 */
export function listenError(fn: (error: Error) => void) {
  lib.loggerService.log(LISTEN_ERROR_METHOD_NAME);
  return errorEmitter.subscribe(queued(async (error) => fn(error)));
}
