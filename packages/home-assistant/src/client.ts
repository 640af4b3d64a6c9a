import axios, { isAxiosError, type AxiosAdapter, type AxiosInstance } from 'axios'
import { z } from 'zod'
import {
  StateRecord,
  type DeviceNameResolver,
  type StateRecordType,
  type StateSource,
} from '@plate-designer/devices'
import { makeLogger, type Logger } from '@plate-designer/logger'
import { errorMessage } from '@plate-designer/utils'
import type { EntityCheckOutcome, EntityExistenceChecker } from '@plate-designer/validation'
import type { HomeAssistantConfigType } from './config.js'
import {
  filterEntities,
  type EnhancedEntity,
  type EntityCatalog,
  type EntityFilter,
} from './entities.js'

const StateSnapshot = z.array(StateRecord)
const ENTITY_REF = /^[a-z0-9_]+\.[a-z0-9_]+$/

export class HomeAssistantError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message)
    this.name = 'HomeAssistantError'
  }
}

function describeFailure(err: unknown): { message: string; status?: number } {
  if (isAxiosError(err)) {
    if (err.response) return { message: `HTTP ${err.response.status}`, status: err.response.status }
    return { message: err.code ? `${err.code}: ${err.message}` : err.message }
  }
  return { message: errorMessage(err) }
}

export interface HomeAssistantClientOptions {
  /** Replaces the HTTP transport; used to run the client against an in-process stand-in. */
  adapter?: AxiosAdapter
}

/**
 * REST client for Home Assistant. Serves as the state source for discovery,
 * the authoritative device-name lookup and the entity existence checker.
 */
export class HomeAssistantClient
  implements StateSource, DeviceNameResolver, EntityExistenceChecker, EntityCatalog
{
  private readonly logger: Logger = makeLogger('HomeAssistantClient')
  private readonly http: AxiosInstance

  constructor(
    private readonly config: HomeAssistantConfigType,
    options: HomeAssistantClientOptions = {},
  ) {
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        Authorization: `Bearer ${config.token}`,
        'Content-Type': 'application/json',
      },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    })
  }

  async listStates(): Promise<StateRecordType[]> {
    let data: unknown
    try {
      data = (await this.http.get<unknown>('/api/states')).data
    } catch (err) {
      const { message, status } = describeFailure(err)
      this.logger.error(`Failed to fetch states from Home Assistant: ${message}`)
      throw new HomeAssistantError(`Failed to fetch states: ${message}`, status)
    }

    const parsed = StateSnapshot.safeParse(data)
    if (!parsed.success) {
      throw new HomeAssistantError('Unexpected payload from /api/states')
    }
    return parsed.data
  }

  /** Current state of one entity, or `undefined` when Home Assistant does not know it. */
  async getState(entityRef: string): Promise<StateRecordType | undefined> {
    let status: number
    let data: unknown
    try {
      const res = await this.http.get<unknown>(this.statePath(entityRef), {
        validateStatus: (s) => s === 200 || s === 404,
      })
      status = res.status
      data = res.data
    } catch (err) {
      const failure = describeFailure(err)
      throw new HomeAssistantError(`Failed to fetch state of ${entityRef}: ${failure.message}`, failure.status)
    }

    if (status === 404) return undefined
    const parsed = StateRecord.safeParse(data)
    if (!parsed.success) {
      throw new HomeAssistantError(`Unexpected payload for ${entityRef}`)
    }
    return parsed.data
  }

  async exists(entityRef: string): Promise<EntityCheckOutcome> {
    try {
      const res = await this.http.get<unknown>(this.statePath(entityRef), {
        timeout: this.config.entityTimeoutMs,
        validateStatus: () => true,
      })

      if (res.status === 200) return { status: 'exists' }
      if (res.status === 404) return { status: 'missing' }
      return { status: 'unavailable', error: `HTTP ${res.status}` }
    } catch (err) {
      const { message } = describeFailure(err)
      this.logger.warn(`Could not verify entity ${entityRef}: ${message}`)
      return { status: 'unavailable', error: message }
    }
  }

  /** Device-registry name of the device owning `entityRef`, rendered through a template. */
  async resolveDeviceName(entityRef: string): Promise<string | undefined> {
    if (!ENTITY_REF.test(entityRef)) return undefined

    const device = `device_id('${entityRef}')`
    const template = `{{ device_attr(${device}, 'name_by_user') or device_attr(${device}, 'name') or '' }}`

    try {
      const res = await this.http.post<string>(
        '/api/template',
        { template },
        { responseType: 'text', timeout: this.config.entityTimeoutMs },
      )
      const rendered = String(res.data).trim()
      return rendered && rendered !== 'None' ? rendered : undefined
    } catch (err) {
      const failure = describeFailure(err)
      throw new HomeAssistantError(`Template lookup failed: ${failure.message}`, failure.status)
    }
  }

  async listEntities(filter: EntityFilter = {}): Promise<EnhancedEntity[]> {
    return filterEntities(await this.listStates(), filter)
  }

  private statePath(entityRef: string): string {
    return `/api/states/${encodeURIComponent(entityRef)}`
  }
}
