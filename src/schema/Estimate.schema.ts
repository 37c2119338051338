import { z } from "zod";
import { FEATURE_NAMES } from "../interfaces/Oracle.interface";

/**
 * Shape an oracle estimate must have before it can influence a score.
 */
export const EstimateSchema = z.object({
  probability: z.number().min(0).max(1),
  prediction: z.union([z.literal(0), z.literal(1)]),
  confidence: z.enum(["low", "medium", "high"]),
  weights: z.record(z.enum(FEATURE_NAMES), z.number()),
});

export type TEstimateSchema = z.infer<typeof EstimateSchema>;

export default EstimateSchema;
