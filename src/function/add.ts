import lib from "../lib/index";
import { IAdvisorSchema } from "../interfaces/Advisor.interface";
import { GLOBAL_CONFIG } from "../config/params";

const ADD_ADVISOR_METHOD_NAME = "add.addAdvisor";

/**
 * Registers an advisor: a named engine configuration with an optional
 * probability oracle.
 *
 * The merged configuration (global config plus overrides) is validated
 * immediately, so a bad override fails here rather than during analysis.
 *
 * @param advisorSchema - Advisor configuration object
 * @param advisorSchema.advisorName - Unique advisor identifier
 * @param advisorSchema.config - Optional overrides of the global configuration
 * @param advisorSchema.oracle - Optional probability oracle
 * @param advisorSchema.callbacks - Optional lifecycle callbacks (onRecommendation, onOracleError)
 * @throws Error if the name is taken, the schema is malformed or the merged config is invalid
 *
 * @example
 * ```typescript
 * import { addAdvisor, LogisticOracle } from "quant-advisor";
 *
 * addAdvisor({
 *   advisorName: "swing",
 *   note: "Wider stops, faster RSI",
 *   config: {
 *     CC_RSI_PERIOD: 10,
 *     CC_STOP_LOSS_PERCENT: 0.08,
 *   },
 *   oracle: new LogisticOracle({ intercept: 0, coefficients: { rsi: -1.5 } }),
 *   callbacks: {
 *     onRecommendation: (symbol, recommendation) => {
 *       console.log(symbol, recommendation.signal.type);
 *     },
 *   },
 * });
 * ```
 */
export function addAdvisor(advisorSchema: IAdvisorSchema) {
  lib.loggerService.info(ADD_ADVISOR_METHOD_NAME, {
    advisorSchema,
  });
  lib.advisorSchemaService.validateShallow(advisorSchema);
  lib.configValidationService.validate({
    ...GLOBAL_CONFIG,
    ...advisorSchema.config,
  });
  lib.advisorValidationService.addAdvisor(
    advisorSchema.advisorName,
    advisorSchema
  );
  lib.advisorSchemaService.register(
    advisorSchema.advisorName,
    advisorSchema
  );
}
