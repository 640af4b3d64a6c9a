export * from './types.js'
export * from './resolutions.js'
export * from './registry.js'
export * from './in_memory.js'
export * from './discovery.js'
export * from './discovery_registry.js'
