import lib from "../lib/index";
import { IAdvisorSchema } from "../interfaces/Advisor.interface";

const LIST_ADVISORS_METHOD_NAME = "list.listAdvisors";

/**
 * Returns a list of all registered advisor schemas.
 *
 * Retrieves all advisors that have been registered via addAdvisor().
 * Useful for debugging, documentation, or building dynamic UIs.
 *
 * @returns Array of advisor schemas in registration order
 *
 * @example
 * ```typescript
 * import { listAdvisors, addAdvisor } from "quant-advisor";
 *
 * addAdvisor({ advisorName: "swing", config: { CC_RSI_PERIOD: 10 } });
 *
 * const advisors = await listAdvisors();
 * console.log(advisors.map(({ advisorName }) => advisorName)); // ["swing"]
 * ```
 */
export async function listAdvisors(): Promise<IAdvisorSchema[]> {
  lib.loggerService.log(LIST_ADVISORS_METHOD_NAME);
  return await lib.advisorValidationService.list();
}
