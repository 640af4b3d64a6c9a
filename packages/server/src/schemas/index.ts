export * as CommonSchemas from './common.js'
export * as EntitySchemas from './entities.js'
export * as ValidateSchemas from './validate.js'
