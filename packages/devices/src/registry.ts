import type { DeviceRecordType, StateRecordType } from './types.js'

/**
 * Point-in-time source of devices. Callers re-fetch per use; implementations
 * make no caching promise.
 */
export interface DeviceRegistry {
  listDevices(): Promise<DeviceRecordType[]>
}

/** Flat snapshot of every state the external system reports. */
export interface StateSource {
  listStates(): Promise<StateRecordType[]>
}

/**
 * Authoritative device name for the device owning an entity, when the external
 * system keeps one. Resolves `undefined` when it has no name on record.
 */
export interface DeviceNameResolver {
  resolveDeviceName(entityRef: string): Promise<string | undefined>
}
