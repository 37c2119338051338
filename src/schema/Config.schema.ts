import { z } from "zod";
import { DEFAULT_CONFIG } from "../config/params";

/**
 * Per-advisor configuration overrides: known CC_ keys with finite numbers.
 * Value ranges are checked later by ConfigValidationService on the merged config.
 */
export const AdvisorConfigSchema = z.record(
  z
    .string()
    .refine((key) => key in DEFAULT_CONFIG, (key) => ({
      message: `unknown config key ${key}`,
    })),
  z.number().finite()
);

export type TAdvisorConfigSchema = z.infer<typeof AdvisorConfigSchema>;

export default AdvisorConfigSchema;
