import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
extendZodWithOpenApi(z)

export const ResolutionEntry = z
  .object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    model: z.string(),
    description: z.string().optional(),
  })
  .openapi('ResolutionEntry')
export type ResolutionEntryType = z.infer<typeof ResolutionEntry>

const entry = (
  width: number,
  height: number,
  model: string,
  description: string,
): Readonly<ResolutionEntryType> => Object.freeze({ width, height, model, description })

export const DEVICE_RESOLUTIONS: Readonly<Record<string, Readonly<ResolutionEntryType>>> =
  Object.freeze({
    lanbon_l8: entry(480, 320, 'Lanbon L8', 'Lanbon L8 3-gang switch'),
    lanbon_l8_hd: entry(800, 480, 'Lanbon L8 HD', 'Lanbon L8 HD high-resolution'),
    wt32_sc01: entry(320, 480, 'WT32-SC01', 'WT32-SC01 3.5" display'),
    wt32_sc01_plus: entry(480, 320, 'WT32-SC01 Plus', 'WT32-SC01 Plus 3.5" display'),
    esp32_2432s028r: entry(
      240,
      320,
      'ESP32-2432S028R',
      'ESP32-2432S028R 2.8" display (Cheap Yellow Display)',
    ),
    esp32_3248s035c: entry(480, 320, 'ESP32-3248S035C', 'ESP32-3248S035C 3.5" display'),
    esp32_4827s043: entry(480, 272, 'ESP32-4827S043', 'ESP32-4827S043 4.3" display'),
    esp32_8048s070: entry(800, 480, 'ESP32-8048S070', 'ESP32-8048S070 7" display'),
    freetouchdeck: entry(480, 320, 'FreeTouchDeck', 'FreeTouchDeck ESP32 touchscreen'),
    m5stack_core2: entry(320, 240, 'M5Stack Core2', 'M5Stack Core2 2" display'),
    lilygo_t_display: entry(135, 240, 'LILYGO T-Display', 'LILYGO T-Display 1.14" TFT'),
    small_portrait: entry(240, 320, 'Small Portrait', 'Generic small portrait (240x320)'),
    medium_portrait: entry(320, 480, 'Medium Portrait', 'Generic medium portrait (320x480)'),
    large_portrait: entry(480, 800, 'Large Portrait', 'Generic large portrait (480x800)'),
    small_landscape: entry(320, 240, 'Small Landscape', 'Generic small landscape (320x240)'),
    medium_landscape: entry(480, 320, 'Medium Landscape', 'Generic medium landscape (480x320)'),
    large_landscape: entry(800, 480, 'Large Landscape', 'Generic large landscape (800x480)'),
  })

export function getDeviceResolution(modelKey: string): Readonly<ResolutionEntryType> | undefined {
  const key = modelKey.toLowerCase()
  return Object.prototype.hasOwnProperty.call(DEVICE_RESOLUTIONS, key)
    ? DEVICE_RESOLUTIONS[key]
    : undefined
}

export function listDeviceResolutions(): Readonly<Record<string, Readonly<ResolutionEntryType>>> {
  return DEVICE_RESOLUTIONS
}

// Ordered most specific first; matched against the normalised model string.
const MODEL_PATTERNS: ReadonlyArray<readonly [pattern: string, modelKey: string]> = [
  ['lanbonl8hd', 'lanbon_l8_hd'],
  ['lanbonl8', 'lanbon_l8'],
  ['wt32sc01plus', 'wt32_sc01_plus'],
  ['wt32sc01', 'wt32_sc01'],
  ['2432s028', 'esp32_2432s028r'],
  ['3248s035', 'esp32_3248s035c'],
  ['4827s043', 'esp32_4827s043'],
  ['8048s070', 'esp32_8048s070'],
  ['freetouchdeck', 'freetouchdeck'],
  ['m5stackcore2', 'm5stack_core2'],
  ['tdisplay', 'lilygo_t_display'],
]

export function normalizeModel(model: string): string {
  return model.toLowerCase().replace(/[-_\s]/g, '')
}

/** Maps a free-form model string onto a resolution table key; first match wins. */
export function modelKeyForModel(model: string): string | undefined {
  const normalized = normalizeModel(model)
  if (!normalized) return undefined
  return MODEL_PATTERNS.find(([pattern]) => normalized.includes(pattern))?.[1]
}
