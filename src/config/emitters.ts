import { Subject } from "functools-kit";
import type { RecommendationContract } from "../contract/Recommendation.contract";

/**
 * Recommendation emitter.
 * Emits every recommendation built by any advisor, including neutral ones.
 */
export const recommendationEmitter = new Subject<RecommendationContract>();

/**
 * Error emitter for isolated analysis failures.
 * Emits oracle failures and exceptions caught while analysing an asset.
 */
export const errorEmitter = new Subject<Error>();
