import { describe, it, expect, vi } from 'vitest'
import {
  AxiosError,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios'
import type { Logger } from '@plate-designer/logger'
import { HomeAssistantClient, HomeAssistantError } from './client.js'
import type { HomeAssistantConfigType } from './config.js'

const { logged } = vi.hoisted(() => ({
  logged: [] as Array<{ service: string; level: string; msg: string }>,
}))

vi.mock('@plate-designer/logger', () => {
  const make = (service: string): Logger => {
    const at = (level: string) => (msg: string) => {
      logged.push({ service, level, msg })
    }
    return {
      child: () => make(service),
      fatal: at('fatal'),
      error: at('error'),
      warn: at('warn'),
      info: at('info'),
      debug: at('debug'),
      trace: at('trace'),
    }
  }
  return { makeLogger: (service: string) => make(service) }
})

interface FakeReply {
  status: number
  data?: unknown
}
type Route = (config: InternalAxiosRequestConfig) => FakeReply

// In-process stand-in for Home Assistant: answers each request through `route`.
function fakeHomeAssistant(route: Route) {
  const calls: InternalAxiosRequestConfig[] = []
  const adapter: AxiosAdapter = async (config) => {
    calls.push(config)
    const { status, data } = route(config)
    const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config }
    if (!config.validateStatus || config.validateStatus(status)) return response
    throw new AxiosError(
      `Request failed with status code ${status}`,
      AxiosError.ERR_BAD_RESPONSE,
      config,
      undefined,
      response,
    )
  }
  return { adapter, calls }
}

const config: HomeAssistantConfigType = {
  baseUrl: 'http://ha.test:8123',
  token: 'test-secret',
  timeoutMs: 10_000,
  entityTimeoutMs: 5_000,
}

describe('HomeAssistantClient.listStates', () => {
  it('fetches the snapshot with the bearer token', async () => {
    const { adapter, calls } = fakeHomeAssistant(() => ({
      status: 200,
      data: [
        { entity_id: 'light.plate_office_backlight', state: 'on', attributes: { friendly_name: 'Office' } },
        { entity_id: 'sensor.plate_office_status', state: 'online' },
      ],
    }))
    const client = new HomeAssistantClient(config, { adapter })

    const states = await client.listStates()

    expect(states).toEqual([
      { entity_id: 'light.plate_office_backlight', state: 'on', attributes: { friendly_name: 'Office' } },
      { entity_id: 'sensor.plate_office_status', state: 'online', attributes: {} },
    ])
    expect(calls).toHaveLength(1)
    expect(calls[0]?.url).toBe('/api/states')
    expect(calls[0]?.baseURL).toBe('http://ha.test:8123')
    expect(calls[0]?.headers.Authorization).toBe('Bearer test-secret')
  })

  it('wraps HTTP failures in HomeAssistantError', async () => {
    const { adapter } = fakeHomeAssistant(() => ({ status: 401, data: { message: 'unauthorized' } }))
    const client = new HomeAssistantClient(config, { adapter })

    const failure = await client.listStates().catch((err: unknown) => err)
    expect(failure).toBeInstanceOf(HomeAssistantError)
    expect(failure).toMatchObject({ message: 'Failed to fetch states: HTTP 401', status: 401 })
  })

  it('rejects a payload that is not a list of states', async () => {
    const { adapter } = fakeHomeAssistant(() => ({ status: 200, data: { entity_id: 'light.one' } }))
    const client = new HomeAssistantClient(config, { adapter })

    await expect(client.listStates()).rejects.toThrow('Unexpected payload from /api/states')
  })
})

describe('HomeAssistantClient.exists', () => {
  const statuses: Record<string, number> = {
    '/api/states/light.kitchen': 200,
    '/api/states/light.ghost': 404,
    '/api/states/light.flaky': 503,
  }
  const { adapter, calls } = fakeHomeAssistant((req) => ({ status: statuses[req.url ?? ''] ?? 500 }))
  const client = new HomeAssistantClient(config, { adapter })

  it('maps 200 to exists', async () => {
    expect(await client.exists('light.kitchen')).toEqual({ status: 'exists' })
  })

  it('maps 404 to missing', async () => {
    expect(await client.exists('light.ghost')).toEqual({ status: 'missing' })
  })

  it('maps any other status to unavailable', async () => {
    expect(await client.exists('light.flaky')).toEqual({ status: 'unavailable', error: 'HTTP 503' })
  })

  it('uses the entity timeout', () => {
    expect(calls.every((c) => c.timeout === 5_000)).toBe(true)
  })

  it('reports transport errors as unavailable', async () => {
    const down: AxiosAdapter = async (req) => {
      throw new AxiosError('timeout of 5000ms exceeded', AxiosError.ECONNABORTED, req)
    }
    const offline = new HomeAssistantClient(config, { adapter: down })

    expect(await offline.exists('light.kitchen')).toEqual({
      status: 'unavailable',
      error: 'ECONNABORTED: timeout of 5000ms exceeded',
    })
    expect(logged.filter((l) => l.msg.includes('Could not verify entity light.kitchen'))).toEqual([
      {
        service: 'HomeAssistantClient',
        level: 'warn',
        msg: 'Could not verify entity light.kitchen: ECONNABORTED: timeout of 5000ms exceeded',
      },
    ])
  })

  it('encodes the entity reference into the path', async () => {
    await client.exists('light.a b')
    expect(calls[calls.length - 1]?.url).toBe('/api/states/light.a%20b')
  })
})

describe('HomeAssistantClient.getState', () => {
  it('returns the record, or undefined for an unknown entity', async () => {
    const { adapter } = fakeHomeAssistant((req) =>
      req.url === '/api/states/light.kitchen'
        ? {
            status: 200,
            data: {
              entity_id: 'light.kitchen',
              state: 'on',
              attributes: {},
              last_changed: '2026-01-05T07:30:00+00:00',
              last_updated: '2026-01-05T07:31:00+00:00',
            },
          }
        : { status: 404 },
    )
    const client = new HomeAssistantClient(config, { adapter })

    expect(await client.getState('light.kitchen')).toEqual({
      entity_id: 'light.kitchen',
      state: 'on',
      attributes: {},
      last_changed: '2026-01-05T07:30:00+00:00',
      last_updated: '2026-01-05T07:31:00+00:00',
    })
    expect(await client.getState('light.ghost')).toBeUndefined()
  })

  it('wraps other failures in HomeAssistantError', async () => {
    const { adapter } = fakeHomeAssistant(() => ({ status: 500 }))
    const client = new HomeAssistantClient(config, { adapter })

    await expect(client.getState('light.kitchen')).rejects.toThrow(
      'Failed to fetch state of light.kitchen: HTTP 500',
    )
  })
})

describe('HomeAssistantClient.resolveDeviceName', () => {
  it('renders the device-registry name through a template', async () => {
    const { adapter, calls } = fakeHomeAssistant(() => ({ status: 200, data: 'Office Plate\n' }))
    const client = new HomeAssistantClient(config, { adapter })

    expect(await client.resolveDeviceName('light.plate_office_backlight')).toBe('Office Plate')
    expect(calls[0]?.method).toBe('post')
    expect(calls[0]?.url).toBe('/api/template')
    expect(JSON.parse(String(calls[0]?.data))).toEqual({
      template:
        "{{ device_attr(device_id('light.plate_office_backlight'), 'name_by_user') or device_attr(device_id('light.plate_office_backlight'), 'name') or '' }}",
    })
  })

  it.each(['', '  ', 'None'])('treats %j as unknown', async (rendered) => {
    const { adapter } = fakeHomeAssistant(() => ({ status: 200, data: rendered }))
    const client = new HomeAssistantClient(config, { adapter })

    expect(await client.resolveDeviceName('light.plate_office')).toBeUndefined()
  })

  it('skips malformed references without a request', async () => {
    const { adapter, calls } = fakeHomeAssistant(() => ({ status: 200, data: 'x' }))
    const client = new HomeAssistantClient(config, { adapter })

    expect(await client.resolveDeviceName("light.x') }}")).toBeUndefined()
    expect(calls).toHaveLength(0)
  })

  it('propagates template failures', async () => {
    const { adapter } = fakeHomeAssistant(() => ({ status: 500 }))
    const client = new HomeAssistantClient(config, { adapter })

    await expect(client.resolveDeviceName('light.plate_office')).rejects.toThrow(
      'Template lookup failed: HTTP 500',
    )
  })
})

describe('HomeAssistantClient.listEntities', () => {
  it('filters and enhances the snapshot', async () => {
    const { adapter } = fakeHomeAssistant(() => ({
      status: 200,
      data: [
        { entity_id: 'light.kitchen', state: 'on', attributes: { friendly_name: 'Kitchen' } },
        { entity_id: 'switch.kettle', state: 'off', attributes: {} },
      ],
    }))
    const client = new HomeAssistantClient(config, { adapter })

    expect(await client.listEntities({ domain: 'switch' })).toEqual([
      {
        entityId: 'switch.kettle',
        state: 'off',
        friendlyName: 'switch.kettle',
        domain: 'switch',
        icon: 'mdi:light-switch',
        attributes: {},
      },
    ])
  })
})
