export * from './rect.js'
export * from './coordinates.js'
