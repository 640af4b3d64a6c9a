export { withTimeout, TimeoutError } from './timeout.js'
export { runWithConcurrency } from './concurrency.js'

export const VALIDATION_CONSTANTS = {
  DEVICE_LOOKUP_TIMEOUT_MS: 10_000,
  ENTITY_CHECK_TIMEOUT_MS: 5_000,
  NAME_LOOKUP_TIMEOUT_MS: 5_000,
  ENTITY_CHECK_CONCURRENCY: 8,
}

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err)
