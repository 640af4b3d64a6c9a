import type { StateRecordType } from '@plate-designer/devices'

const DEFAULT_ICONS: Readonly<Record<string, string>> = {
  light: 'mdi:lightbulb',
  switch: 'mdi:light-switch',
  sensor: 'mdi:gauge',
  binary_sensor: 'mdi:checkbox-marked-circle',
  cover: 'mdi:window-shutter',
  climate: 'mdi:thermostat',
  fan: 'mdi:fan',
  lock: 'mdi:lock',
  media_player: 'mdi:speaker',
}
const FALLBACK_ICON = 'mdi:home-assistant'

export interface EnhancedEntity {
  entityId: string
  state: string
  friendlyName: string
  domain: string
  icon: string
  attributes: Record<string, unknown>
}

export interface EntityFilter {
  domain?: string
  search?: string
}

/** Browsable view of the entities a layout can bind to. */
export interface EntityCatalog {
  listEntities(filter?: EntityFilter): Promise<EnhancedEntity[]>
  /** Resolves `undefined` for an entity Home Assistant does not know. */
  getState(entityRef: string): Promise<StateRecordType | undefined>
}

export function defaultIcon(domain: string): string {
  return DEFAULT_ICONS[domain] ?? FALLBACK_ICON
}

export function enhanceEntity(record: StateRecordType): EnhancedEntity {
  const dot = record.entity_id.indexOf('.')
  const domain = dot > 0 ? record.entity_id.slice(0, dot) : ''
  const { friendly_name: friendlyName, icon } = record.attributes

  return {
    entityId: record.entity_id,
    state: record.state,
    friendlyName: typeof friendlyName === 'string' && friendlyName ? friendlyName : record.entity_id,
    domain,
    icon: typeof icon === 'string' && icon ? icon : defaultIcon(domain),
    attributes: record.attributes,
  }
}

/** Domain prefix match, then case-insensitive search over id and friendly name. */
export function filterEntities(
  records: readonly StateRecordType[],
  filter: EntityFilter = {},
): EnhancedEntity[] {
  const needle = filter.search?.trim().toLowerCase()

  return records
    .filter((r) => !filter.domain || r.entity_id.startsWith(`${filter.domain}.`))
    .map(enhanceEntity)
    .filter(
      (e) =>
        !needle ||
        e.entityId.toLowerCase().includes(needle) ||
        e.friendlyName.toLowerCase().includes(needle),
    )
}
