export * from './server.js'
export { openapiDoc } from './swagger/index.js'
