import "./core/provide";
import { inject, init } from "./core/di";
import TYPES from "./core/types";
import LoggerService from "./services/base/LoggerService";
import AdvisorConnectionService from "./services/connection/AdvisorConnectionService";
import AdvisorSchemaService from "./services/schema/AdvisorSchemaService";
import AdvisorGlobalService from "./services/global/AdvisorGlobalService";
import AdvisorValidationService from "./services/validation/AdvisorValidationService";
import ConfigValidationService from "./services/validation/ConfigValidationService";

const baseServices = {
  loggerService: inject<LoggerService>(TYPES.loggerService),
};

const connectionServices = {
  advisorConnectionService: inject<AdvisorConnectionService>(
    TYPES.advisorConnectionService
  ),
};

const schemaServices = {
  advisorSchemaService: inject<AdvisorSchemaService>(
    TYPES.advisorSchemaService
  ),
};

const globalServices = {
  advisorGlobalService: inject<AdvisorGlobalService>(
    TYPES.advisorGlobalService
  ),
};

const validationServices = {
  advisorValidationService: inject<AdvisorValidationService>(
    TYPES.advisorValidationService
  ),
  configValidationService: inject<ConfigValidationService>(
    TYPES.configValidationService
  ),
};

export const lib = {
  ...baseServices,
  ...connectionServices,
  ...schemaServices,
  ...globalServices,
  ...validationServices,
};

init();

export default lib;
