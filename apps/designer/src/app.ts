import {
  DeviceDiscoveryEngine,
  DiscoveryDeviceRegistry,
  type DeviceRecordType,
} from '@plate-designer/devices'
import {
  HomeAssistantClient,
  getHomeAssistantConfig,
  type HomeAssistantClientOptions,
  type HomeAssistantConfigType,
} from '@plate-designer/home-assistant'
import { makeLogger } from '@plate-designer/logger'
import { Server } from '@plate-designer/server'
import { ValidationOrchestrator } from '@plate-designer/validation'

const logger = makeLogger('designer')

export interface Services {
  client: HomeAssistantClient
  registry: DiscoveryDeviceRegistry
  orchestrator: ValidationOrchestrator
}

/** Wires the Home Assistant client into discovery and validation. */
export function createServices(
  config: HomeAssistantConfigType,
  clientOptions: HomeAssistantClientOptions = {},
): Services {
  const client = new HomeAssistantClient(config, clientOptions)
  const engine = new DeviceDiscoveryEngine({
    nameResolver: client,
    nameLookupTimeoutMs: config.entityTimeoutMs,
  })
  const registry = new DiscoveryDeviceRegistry(client, engine)
  const orchestrator = new ValidationOrchestrator(registry, client, {
    deviceLookupTimeoutMs: config.timeoutMs,
    entityCheckTimeoutMs: config.entityTimeoutMs,
  })
  return { client, registry, orchestrator }
}

export function formatDevices(devices: readonly DeviceRecordType[]): string {
  if (devices.length === 0) return 'No devices found'

  return devices
    .map((d) => {
      const resolution = d.resolution ? `${d.resolution.width}x${d.resolution.height}` : 'unknown'
      const online = d.online ? 'online' : 'offline'
      return `${d.deviceId}\t${d.displayName}\t${d.model}\t${online}\t${resolution}\t${d.entityRefs.length} entities`
    })
    .join('\n')
}

export class App {
  public static async startServer(domainWithPort: string, origins: string[]): Promise<Server> {
    const { client, registry, orchestrator } = createServices(getHomeAssistantConfig())
    const server = new Server(
      { orchestrator, registry, checker: client, catalog: client },
      domainWithPort,
      origins,
    )
    await server.start()
    return server
  }

  public static async listDevices(): Promise<DeviceRecordType[]> {
    const { registry } = createServices(getHomeAssistantConfig())
    const devices = await registry.listDevices()
    logger.debug(`listed ${devices.length} device(s)`)
    return devices
  }
}
