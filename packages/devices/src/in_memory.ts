import { z } from 'zod'
import { DeviceRecord, type DeviceRecordType } from './types.js'
import type { DeviceRegistry } from './registry.js'

const DeviceRecords = z.array(DeviceRecord)

/** Static, manifest-style registry. */
export class InMemoryDeviceRegistry implements DeviceRegistry {
  private devices: DeviceRecordType[]

  constructor(devices: DeviceRecordType[] = []) {
    this.devices = DeviceRecords.parse(devices)
  }

  replace(devices: DeviceRecordType[]): void {
    this.devices = DeviceRecords.parse(devices)
  }

  async listDevices(): Promise<DeviceRecordType[]> {
    return structuredClone(this.devices)
  }
}
