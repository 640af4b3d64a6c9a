import { z } from 'zod'
import { makeLogger } from '@plate-designer/logger'
const logger = makeLogger('homeAssistantConfig')

export const HomeAssistantConfig = z.object({
  baseUrl: z.url(),
  token: z.string().min(1),
  timeoutMs: z.number().int().positive().default(10_000),
  entityTimeoutMs: z.number().int().positive().default(5_000),
})
export type HomeAssistantConfigType = z.infer<typeof HomeAssistantConfig>

const optionalInt = (raw: string | undefined, name: string): number | undefined => {
  if (raw === undefined || raw.trim() === '') return undefined
  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`)
  }
  return value
}

export function getHomeAssistantConfig(
  env: Record<string, string | undefined> = process.env,
): HomeAssistantConfigType {
  const baseUrl = (env.HA_URL ?? 'http://homeassistant.local:8123').replace(/\/+$/, '')
  logger.trace(`baseUrl: ${baseUrl}`)
  const token = env.HA_TOKEN

  if (!token) {
    throw new Error('HA_TOKEN is not set')
  }

  return HomeAssistantConfig.parse({
    baseUrl,
    token,
    timeoutMs: optionalInt(env.HA_TIMEOUT_MS, 'HA_TIMEOUT_MS'),
    entityTimeoutMs: optionalInt(env.HA_ENTITY_TIMEOUT_MS, 'HA_ENTITY_TIMEOUT_MS'),
  })
}
