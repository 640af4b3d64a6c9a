import { makeLogger } from '@plate-designer/logger'
import { DeviceDiscoveryEngine } from './discovery.js'
import type { DeviceRegistry, StateSource } from './registry.js'
import type { DeviceRecordType } from './types.js'

/** Registry backed by live discovery over the external system's state snapshot. */
export class DiscoveryDeviceRegistry implements DeviceRegistry {
  private readonly logger = makeLogger('DiscoveryDeviceRegistry')

  constructor(
    private readonly source: StateSource,
    private readonly engine: DeviceDiscoveryEngine = new DeviceDiscoveryEngine(),
  ) {}

  async listDevices(): Promise<DeviceRecordType[]> {
    const states = await this.source.listStates()
    const devices = await this.engine.discover(states)
    this.logger.debug(`discovered ${devices.length} device(s)`, {
      devices: devices.map((d) => d.deviceId),
    })
    return devices
  }
}
