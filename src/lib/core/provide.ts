import LoggerService from "../services/base/LoggerService";
import AdvisorConnectionService from "../services/connection/AdvisorConnectionService";
import AdvisorSchemaService from "../services/schema/AdvisorSchemaService";
import AdvisorGlobalService from "../services/global/AdvisorGlobalService";
import AdvisorValidationService from "../services/validation/AdvisorValidationService";
import ConfigValidationService from "../services/validation/ConfigValidationService";
import { provide } from "./di";
import TYPES from "./types";

{
    provide(TYPES.loggerService, () => new LoggerService());
}

{
    provide(TYPES.advisorConnectionService, () => new AdvisorConnectionService());
}

{
    provide(TYPES.advisorSchemaService, () => new AdvisorSchemaService());
}

{
    provide(TYPES.advisorGlobalService, () => new AdvisorGlobalService());
}

{
    provide(TYPES.advisorValidationService, () => new AdvisorValidationService());
    provide(TYPES.configValidationService, () => new ConfigValidationService());
}
