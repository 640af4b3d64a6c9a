import { makeLogger, type Logger } from '@plate-designer/logger'
import { errorMessage, withTimeout, VALIDATION_CONSTANTS } from '@plate-designer/utils'
import type { DeviceNameResolver } from './registry.js'
import { getDeviceResolution, modelKeyForModel } from './resolutions.js'
import type { DeviceRecordType, ResolutionType, StateRecordType } from './types.js'

export const RELEVANT_DOMAINS: ReadonlySet<string> = new Set([
  'light',
  'switch',
  'sensor',
  'binary_sensor',
  'number',
  'button',
  'select',
  'text',
])

// First match wins, so a longer suffix must precede any shorter one it ends with.
export const ROLE_SUFFIXES = [
  '_backlight',
  '_moodlight',
  '_antiburn',
  '_status',
  '_idle',
  '_page',
  '_restart',
  '_uptime',
  '_rssi',
  '_ip',
] as const
export type RoleSuffix = (typeof ROLE_SUFFIXES)[number]

export const ROLE_WORDS = [
  'Backlight',
  'Moodlight',
  'Antiburn',
  'Status',
  'Idle',
  'Page',
  'Restart',
  'Uptime',
  'RSSI',
  'IP',
] as const

const MARKER = 'openhasp'
const NAMING_CONVENTION = /^(?:plate|hasp)/
const BOOKKEEPING = /pre_?release/
const NUMERIC_SUFFIX = /_\d+$/
const ONLINE_TOKENS: ReadonlySet<string> = new Set(['on', 'online', 'connected', 'available'])
const UNKNOWN_MODEL = 'Unknown'

export interface EntityRefParts {
  domain: string
  objectId: string
}

export function splitEntityRef(entityRef: string): EntityRefParts | undefined {
  const dot = entityRef.indexOf('.')
  if (dot <= 0 || dot === entityRef.length - 1) return undefined
  return { domain: entityRef.slice(0, dot), objectId: entityRef.slice(dot + 1) }
}

function carriesMarker(record: StateRecordType): boolean {
  if (record.entity_id.toLowerCase().includes(MARKER)) return true
  return JSON.stringify(record.attributes).toLowerCase().includes(MARKER)
}

/** Whether a state record plausibly belongs to a display plate. */
export function isCandidate(record: StateRecordType): boolean {
  const parts = splitEntityRef(record.entity_id)
  if (!parts || !RELEVANT_DOMAINS.has(parts.domain)) return false

  const objectId = parts.objectId.toLowerCase()
  if (!carriesMarker(record) && !NAMING_CONVENTION.test(objectId)) return false

  return !BOOKKEEPING.test(objectId)
}

export function stripRoleSuffix(objectId: string): { base: string; suffix?: RoleSuffix } {
  const suffix = ROLE_SUFFIXES.find((s) => objectId.endsWith(s))
  return suffix ? { base: objectId.slice(0, -suffix.length), suffix } : { base: objectId }
}

export function clusterKeyFor(objectId: string): string {
  return stripRoleSuffix(objectId).base.replace(NUMERIC_SUFFIX, '')
}

/**
 * Longest common prefix of a set of strings. Sorting first means only the
 * lexicographic extremes need comparing.
 */
export function longestCommonPrefix(values: readonly string[]): string {
  if (values.length === 0) return ''
  const sorted = [...values].sort()
  const first = sorted[0] ?? ''
  const last = sorted[sorted.length - 1] ?? ''

  let i = 0
  while (i < first.length && i < last.length && first[i] === last[i]) i++
  return first.slice(0, i)
}

export function stripRoleWords(name: string): string {
  let current = name.trim()
  for (;;) {
    const lowered = current.toLowerCase()
    const word = ROLE_WORDS.find((w) => {
      const tail = w.toLowerCase()
      return lowered === tail || lowered.endsWith(` ${tail}`)
    })
    if (!word) return current

    const next = current.slice(0, current.length - word.length).trim()
    if (!next) return current
    current = next
  }
}

export function deriveDisplayName(friendlyNames: readonly string[]): string {
  if (friendlyNames.length === 0) return ''
  if (friendlyNames.length === 1) return stripRoleWords(friendlyNames[0] ?? '')
  return stripRoleWords(longestCommonPrefix(friendlyNames))
}

function toDimension(value: unknown): number | undefined {
  const n = typeof value === 'string' ? Number(value.trim()) : value
  return typeof n === 'number' && Number.isInteger(n) && n > 0 ? n : undefined
}

/** Reads `width`/`height` attributes, or a `resolution` attribute such as `480x320`. */
export function parseResolutionHint(attributes: Record<string, unknown>): ResolutionType | undefined {
  const width = toDimension(attributes.width)
  const height = toDimension(attributes.height)
  if (width !== undefined && height !== undefined) return { width, height }

  const raw = attributes.resolution
  if (typeof raw !== 'string') return undefined
  const match = /^\s*(\d+)\s*[x×]\s*(\d+)\s*$/i.exec(raw)
  if (!match) return undefined
  const w = toDimension(match[1])
  const h = toDimension(match[2])
  return w !== undefined && h !== undefined ? { width: w, height: h } : undefined
}

export interface DeviceCluster {
  key: string
  entityRefs: Set<string>
  friendlyNames: Set<string>
  model?: string
  online: boolean
  resolution?: ResolutionType
}

/**
 * Groups candidate records by cluster key. Clusters with fewer than two
 * entities are dropped as noise; this also hides genuine single-entity devices.
 */
export function clusterStates(states: readonly StateRecordType[]): DeviceCluster[] {
  const clusters = new Map<string, DeviceCluster>()

  for (const record of states) {
    if (!isCandidate(record)) continue
    const parts = splitEntityRef(record.entity_id)
    if (!parts) continue

    const { suffix } = stripRoleSuffix(parts.objectId)
    const key = clusterKeyFor(parts.objectId)
    if (!key) continue

    let cluster = clusters.get(key)
    if (!cluster) {
      cluster = { key, entityRefs: new Set(), friendlyNames: new Set(), online: false }
      clusters.set(key, cluster)
    }

    cluster.entityRefs.add(record.entity_id)

    const friendlyName = record.attributes.friendly_name
    if (typeof friendlyName === 'string' && friendlyName.trim()) {
      cluster.friendlyNames.add(friendlyName)
    }

    const model = record.attributes.model
    if (typeof model === 'string' && model.trim()) {
      cluster.model = model.trim()
    }

    if (record.entity_id.includes('status') && ONLINE_TOKENS.has(record.state.toLowerCase())) {
      cluster.online = true
    }

    const isPrimary = suffix === '_status' || parts.objectId === key
    if (isPrimary && !cluster.resolution) {
      cluster.resolution = parseResolutionHint(record.attributes)
    }
  }

  return [...clusters.values()].filter((c) => c.entityRefs.size > 1)
}

export interface DiscoveryOptions {
  nameResolver?: DeviceNameResolver
  nameLookupTimeoutMs?: number
}

export class DeviceDiscoveryEngine {
  private readonly logger: Logger = makeLogger('DeviceDiscoveryEngine')
  private readonly nameLookupTimeoutMs: number

  constructor(private readonly options: DiscoveryOptions = {}) {
    this.nameLookupTimeoutMs =
      options.nameLookupTimeoutMs ?? VALIDATION_CONSTANTS.NAME_LOOKUP_TIMEOUT_MS
  }

  async discover(states: readonly StateRecordType[]): Promise<DeviceRecordType[]> {
    const clusters = clusterStates(states)
    this.logger.debug('clustered state snapshot', {
      states: states.length,
      clusters: clusters.length,
    })

    const devices = await Promise.all(clusters.map((cluster) => this.toDeviceRecord(cluster)))
    return devices.sort((a, b) => (a.deviceId < b.deviceId ? -1 : a.deviceId > b.deviceId ? 1 : 0))
  }

  private async toDeviceRecord(cluster: DeviceCluster): Promise<DeviceRecordType> {
    const entityRefs = [...cluster.entityRefs].sort()
    const modelKey = cluster.model ? modelKeyForModel(cluster.model) : undefined

    let resolution = cluster.resolution
    if (!resolution && modelKey) {
      const entry = getDeviceResolution(modelKey)
      if (entry) resolution = { width: entry.width, height: entry.height }
    }

    const registered = await this.lookupRegisteredName(entityRefs[0])
    const displayName = registered ?? (deriveDisplayName([...cluster.friendlyNames]) || cluster.key)

    return {
      deviceId: cluster.key,
      displayName,
      model: cluster.model ?? UNKNOWN_MODEL,
      modelKey,
      online: cluster.online,
      resolution,
      entityRefs,
    }
  }

  private async lookupRegisteredName(entityRef: string | undefined): Promise<string | undefined> {
    const resolver = this.options.nameResolver
    if (!resolver || !entityRef) return undefined

    try {
      const name = await withTimeout(
        resolver.resolveDeviceName(entityRef),
        this.nameLookupTimeoutMs,
        `device name lookup for ${entityRef}`,
      )
      const trimmed = name?.trim()
      return trimmed ? trimmed : undefined
    } catch (err) {
      this.logger.debug('device name lookup unavailable, deriving from friendly names', {
        entityRef,
        error: errorMessage(err),
      })
      return undefined
    }
  }
}
