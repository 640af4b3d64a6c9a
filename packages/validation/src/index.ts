export * from './types.js'
export * from './orchestrator.js'
export { checkCoordinates } from './stages/coordinates.js'
export { detectOverlaps } from './stages/overlaps.js'
export { checkObjectIds } from './stages/object_ids.js'
export {
  EntityReferenceValidator,
  collectReferences,
  type EntityReferenceValidatorOptions,
} from './stages/entities.js'
export { DeviceValidator, type DeviceCheck, type DeviceValidatorOptions } from './stages/device.js'
