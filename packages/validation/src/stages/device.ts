import type { DeviceRecordType, DeviceRegistry } from '@plate-designer/devices'
import { makeLogger, type Logger } from '@plate-designer/logger'
import { errorMessage, withTimeout, VALIDATION_CONSTANTS } from '@plate-designer/utils'
import type { ValidationErrorType } from '../types.js'

export type DeviceCheck =
  | { ok: true; device: DeviceRecordType }
  | { ok: false; error: ValidationErrorType }

export interface DeviceValidatorOptions {
  timeoutMs?: number
}

export class DeviceValidator {
  private readonly logger: Logger = makeLogger('DeviceValidator')
  private readonly timeoutMs: number

  constructor(
    private readonly registry: DeviceRegistry,
    options: DeviceValidatorOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? VALIDATION_CONSTANTS.DEVICE_LOOKUP_TIMEOUT_MS
  }

  /** Resolves the target, failing when it is unknown, offline or cannot be looked up. */
  async validate(deviceId: string): Promise<DeviceCheck> {
    let devices: DeviceRecordType[]
    try {
      devices = await this.lookup()
    } catch (err) {
      const reason = errorMessage(err)
      this.logger.error(`Error validating device ${deviceId}: ${reason}`)
      return {
        ok: false,
        error: { kind: 'device', message: `Failed to look up device '${deviceId}': ${reason}` },
      }
    }

    const device = devices.find((d) => d.deviceId === deviceId)
    if (!device) {
      return { ok: false, error: { kind: 'device', message: `Device '${deviceId}' not found` } }
    }

    if (!device.online) {
      const name = device.displayName || deviceId
      return { ok: false, error: { kind: 'device', message: `Device '${name}' is offline` } }
    }

    return { ok: true, device }
  }

  /** Lookup without verdicts, for callers that only want metadata such as resolution. */
  async find(deviceId: string): Promise<DeviceRecordType | undefined> {
    try {
      return (await this.lookup()).find((d) => d.deviceId === deviceId)
    } catch (err) {
      this.logger.warn(`device metadata unavailable for ${deviceId}`, { error: errorMessage(err) })
      return undefined
    }
  }

  private lookup(): Promise<DeviceRecordType[]> {
    return withTimeout(this.registry.listDevices(), this.timeoutMs, 'device lookup')
  }
}
