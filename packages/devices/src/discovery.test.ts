import { describe, it, expect, vi } from 'vitest'
import {
  DeviceDiscoveryEngine,
  clusterKeyFor,
  clusterStates,
  deriveDisplayName,
  isCandidate,
  longestCommonPrefix,
  parseResolutionHint,
  stripRoleWords,
} from './discovery.js'
import type { StateRecordType } from './types.js'

const state = (
  entity_id: string,
  attributes: Record<string, unknown> = {},
  value = 'on',
): StateRecordType => ({ entity_id, state: value, attributes })

const kevinPlate = (): StateRecordType[] => [
  state('sensor.plate01_backlight', { friendly_name: 'Kevin Plate Backlight' }),
  state('sensor.plate01_status', { friendly_name: 'Kevin Plate Status' }, 'on'),
]

describe('isCandidate', () => {
  it('accepts the plate naming convention in a relevant domain', () => {
    expect(isCandidate(state('light.plate01_backlight'))).toBe(true)
    expect(isCandidate(state('binary_sensor.hasp_hall_idle'))).toBe(true)
  })

  it('accepts any relevant record that carries the marker', () => {
    expect(isCandidate(state('light.hallway', { integration: 'openHASP' }))).toBe(true)
    expect(isCandidate(state('switch.openhasp_kitchen_antiburn'))).toBe(true)
  })

  it('rejects irrelevant domains and unrelated entities', () => {
    expect(isCandidate(state('automation.plate01_reload'))).toBe(false)
    expect(isCandidate(state('light.kitchen_ceiling'))).toBe(false)
    expect(isCandidate(state('no_domain'))).toBe(false)
  })

  it('rejects the integration bookkeeping entities', () => {
    expect(isCandidate(state('switch.openhasp_pre_release'))).toBe(false)
    expect(isCandidate(state('sensor.plate_prerelease'))).toBe(false)
  })
})

describe('clusterKeyFor', () => {
  it('strips a role suffix', () => {
    expect(clusterKeyFor('plate01_backlight')).toBe('plate01')
  })

  it('strips a trailing numeric suffix after the role suffix', () => {
    expect(clusterKeyFor('plate_kitchen_2_status')).toBe('plate_kitchen')
    expect(clusterKeyFor('plate_kitchen_12')).toBe('plate_kitchen')
  })

  it('leaves ids without known suffixes alone', () => {
    expect(clusterKeyFor('plate01')).toBe('plate01')
    expect(clusterKeyFor('plate01_p1b2')).toBe('plate01_p1b2')
  })
})

describe('longestCommonPrefix', () => {
  it('does not depend on input order', () => {
    const a = longestCommonPrefix(['Hall Plate Status', 'Hall Panel', 'Hall Plate Backlight'])
    const b = longestCommonPrefix(['Hall Plate Backlight', 'Hall Plate Status', 'Hall Panel'])
    expect(a).toBe('Hall P')
    expect(b).toBe('Hall P')
  })

  it('is case-sensitive', () => {
    expect(longestCommonPrefix(['kitchen', 'Kitchen'])).toBe('')
  })

  it('returns an empty string for no input', () => {
    expect(longestCommonPrefix([])).toBe('')
  })
})

describe('deriveDisplayName', () => {
  it('strips the role word from the common prefix', () => {
    expect(deriveDisplayName(['Kevin Plate Status', 'Kevin Plate Backlight'])).toBe('Kevin Plate')
  })

  it('strips the role word of a single name directly', () => {
    expect(deriveDisplayName(['Kevin Plate Backlight'])).toBe('Kevin Plate')
  })

  it('strips role words at the end of a common prefix', () => {
    expect(deriveDisplayName(['Desk Status Idle', 'Desk Status Uptime'])).toBe('Desk')
  })

  it('never strips a name down to nothing', () => {
    expect(stripRoleWords('Status')).toBe('Status')
  })

  it('only strips whole words', () => {
    expect(stripRoleWords('Shipage')).toBe('Shipage')
  })
})

describe('parseResolutionHint', () => {
  it('reads width and height attributes', () => {
    expect(parseResolutionHint({ width: 480, height: '320' })).toEqual({ width: 480, height: 320 })
  })

  it('reads a resolution attribute', () => {
    expect(parseResolutionHint({ resolution: '800x480' })).toEqual({ width: 800, height: 480 })
  })

  it('ignores malformed hints', () => {
    expect(parseResolutionHint({ width: 0, height: 320 })).toBeUndefined()
    expect(parseResolutionHint({ resolution: 'wide' })).toBeUndefined()
  })
})

describe('clusterStates', () => {
  it('drops clusters with a single entity', () => {
    const clusters = clusterStates([
      ...kevinPlate(),
      state('light.plate02_backlight', { friendly_name: 'Lonely Plate Backlight' }),
    ])
    expect(clusters.map((c) => c.key)).toEqual(['plate01'])
  })

  it('groups entities of different domains under one key', () => {
    const [cluster] = clusterStates([
      state('light.plate03_backlight'),
      state('binary_sensor.plate03_idle', {}, 'off'),
    ])
    expect(cluster && [...cluster.entityRefs]).toEqual([
      'light.plate03_backlight',
      'binary_sensor.plate03_idle',
    ])
  })

  it('keeps the most recently seen model', () => {
    const [cluster] = clusterStates([
      state('sensor.plate04_status', { model: 'Lanbon L8' }),
      state('light.plate04_backlight', { model: '' }),
      state('light.plate04_moodlight', { model: 'WT32-SC01' }),
    ])
    expect(cluster?.model).toBe('WT32-SC01')
  })

  it('marks a cluster offline unless a status entity reports a positive state', () => {
    const [cluster] = clusterStates([
      state('sensor.plate05_status', {}, 'unavailable'),
      state('light.plate05_backlight', {}, 'on'),
    ])
    expect(cluster?.online).toBe(false)
  })

  it('reads resolution hints only from the primary record', () => {
    const [cluster] = clusterStates([
      state('light.plate06_backlight', { width: 320, height: 240 }),
      state('sensor.plate06_status', { resolution: '480x320' }),
    ])
    expect(cluster?.resolution).toEqual({ width: 480, height: 320 })
  })
})

describe('DeviceDiscoveryEngine', () => {
  it('reconstructs a device from its entities', async () => {
    const devices = await new DeviceDiscoveryEngine().discover(kevinPlate())

    expect(devices).toEqual([
      {
        deviceId: 'plate01',
        displayName: 'Kevin Plate',
        model: 'Unknown',
        online: true,
        entityRefs: ['sensor.plate01_backlight', 'sensor.plate01_status'],
      },
    ])
  })

  it('is deterministic regardless of snapshot order', async () => {
    const engine = new DeviceDiscoveryEngine()
    const snapshot = [
      ...kevinPlate(),
      state('light.plate_hall_backlight', { friendly_name: 'Hall Backlight' }),
      state('sensor.plate_hall_status', { friendly_name: 'Hall Status' }, 'off'),
    ]

    const forward = await engine.discover(snapshot)
    const reversed = await engine.discover([...snapshot].reverse())

    expect(reversed).toEqual(forward)
    expect(forward.map((d) => [d.deviceId, d.displayName])).toEqual([
      ['plate01', 'Kevin Plate'],
      ['plate_hall', 'Hall'],
    ])
  })

  it('derives resolution and model key from the model string', async () => {
    const [device] = await new DeviceDiscoveryEngine().discover([
      state('sensor.plate07_status', { model: 'Lanbon-L8' }),
      state('light.plate07_backlight'),
    ])

    expect(device).toMatchObject({
      model: 'Lanbon-L8',
      modelKey: 'lanbon_l8',
      resolution: { width: 480, height: 320 },
    })
  })

  it('prefers resolution hints over the model table', async () => {
    const [device] = await new DeviceDiscoveryEngine().discover([
      state('sensor.plate08_status', { model: 'Lanbon L8', width: 320, height: 480 }),
      state('light.plate08_backlight'),
    ])

    expect(device?.resolution).toEqual({ width: 320, height: 480 })
  })

  it('falls back to the cluster key when no names are known', async () => {
    const [device] = await new DeviceDiscoveryEngine().discover([
      state('sensor.plate09_status'),
      state('light.plate09_backlight'),
    ])
    expect(device?.displayName).toBe('plate09')
  })

  it('prefers the registered device name, looked up by the first entity', async () => {
    const resolveDeviceName = vi.fn(async (_entityRef: string): Promise<string | undefined> => 'Office Plate')
    const [device] = await new DeviceDiscoveryEngine({
      nameResolver: { resolveDeviceName },
    }).discover(kevinPlate())

    expect(device?.displayName).toBe('Office Plate')
    expect(resolveDeviceName).toHaveBeenCalledTimes(1)
    expect(resolveDeviceName).toHaveBeenCalledWith('sensor.plate01_backlight')
  })

  it('derives the name when the registered lookup fails or times out', async () => {
    const failing = new DeviceDiscoveryEngine({
      nameResolver: { resolveDeviceName: async () => Promise.reject(new Error('offline')) },
    })
    const hanging = new DeviceDiscoveryEngine({
      nameResolver: { resolveDeviceName: () => new Promise<string | undefined>(() => undefined) },
      nameLookupTimeoutMs: 5,
    })

    expect((await failing.discover(kevinPlate()))[0]?.displayName).toBe('Kevin Plate')
    expect((await hanging.discover(kevinPlate()))[0]?.displayName).toBe('Kevin Plate')
  })
})
