export * as StatusRouter from './status/index.js'
export * as DevicesRouter from './devices/index.js'
export * as EntitiesRouter from './entities/index.js'
export * as ValidateRouter from './validate/index.js'
