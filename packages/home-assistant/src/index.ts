export * from './config.js'
export * from './client.js'
export * from './entities.js'
