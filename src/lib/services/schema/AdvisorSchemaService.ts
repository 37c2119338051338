import { AdvisorName, IAdvisorSchema } from "../../../interfaces/Advisor.interface";
import { inject } from "../../../lib/core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../../lib/core/types";
import { ToolRegistry } from "functools-kit";
import { AdvisorConfigSchema } from "../../../schema/Config.schema";
import { DEFAULT_ADVISOR_NAME } from "../../../config/params";

/**
 * Service for managing advisor schema registry.
 *
 * Uses ToolRegistry from functools-kit for type-safe schema storage.
 * Advisors are registered via addAdvisor() and retrieved by name.
 */
export class AdvisorSchemaService {
  readonly loggerService = inject<LoggerService>(TYPES.loggerService);

  private _registry = new ToolRegistry<Record<AdvisorName, IAdvisorSchema>>("advisorSchema");

  /**
   * Registers a new advisor schema.
   *
   * @param key - Unique advisor name
   * @param value - Advisor schema
   * @throws Error if advisor name already exists or the schema is malformed
   */
  public register = (key: AdvisorName, value: IAdvisorSchema) => {
    this.loggerService.log(`advisorSchemaService register`, { key });
    this.validateShallow(value);
    this._registry = this._registry.register(key, value);
  };

  /**
   * Validates advisor schema structure before registration.
   *
   * @param advisorSchema - Advisor schema to validate
   * @throws Error if advisorName is missing or reserved, the oracle has no predict
   * method or the config overrides name unknown keys
   */
  public validateShallow = (advisorSchema: IAdvisorSchema) => {
    this.loggerService.log(`advisorSchemaService validateShallow`, {
      advisorSchema,
    });

    if (typeof advisorSchema.advisorName !== "string" || !advisorSchema.advisorName) {
      throw new Error(
        `advisor schema validation failed: missing advisorName`
      );
    }

    if (advisorSchema.advisorName === DEFAULT_ADVISOR_NAME) {
      throw new Error(
        `advisor schema validation failed: ${DEFAULT_ADVISOR_NAME} is a reserved advisor name`
      );
    }

    if (advisorSchema.oracle && typeof advisorSchema.oracle.predict !== "function") {
      throw new Error(
        `advisor schema validation failed: oracle of ${advisorSchema.advisorName} has no predict method`
      );
    }

    if (advisorSchema.config) {
      const result = AdvisorConfigSchema.safeParse(advisorSchema.config);
      if (!result.success) {
        throw new Error(
          `advisor schema validation failed: invalid config of ${advisorSchema.advisorName}: ${result.error.issues
            .map(({ message }) => message)
            .join(", ")}`
        );
      }
    }
  };

  /**
   * Retrieves an advisor schema by name.
   *
   * @param key - Advisor name
   * @returns Advisor schema
   * @throws Error if advisor name doesn't exist
   */
  public get = (key: AdvisorName): IAdvisorSchema => {
    this.loggerService.log(`advisorSchemaService get`, { key });
    return this._registry.get(key);
  };
}

export default AdvisorSchemaService;
