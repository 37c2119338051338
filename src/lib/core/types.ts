const baseServices = {
    loggerService: Symbol('loggerService'),
};

const connectionServices = {
    advisorConnectionService: Symbol('advisorConnectionService'),
};

const schemaServices = {
    advisorSchemaService: Symbol('advisorSchemaService'),
};

const globalServices = {
    advisorGlobalService: Symbol('advisorGlobalService'),
};

const validationServices = {
    advisorValidationService: Symbol('advisorValidationService'),
    configValidationService: Symbol('configValidationService'),
};

export const TYPES = {
    ...baseServices,
    ...connectionServices,
    ...schemaServices,
    ...globalServices,
    ...validationServices,
}

export default TYPES;
