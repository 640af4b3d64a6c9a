export * from './validate.js'
export * from './errors.js'
