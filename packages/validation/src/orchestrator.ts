import type { DeviceRecordType, DeviceRegistry } from '@plate-designer/devices'
import { isWidget, parseLayout, type Layout } from '@plate-designer/layout'
import { makeLogger, type Logger } from '@plate-designer/logger'
import { checkCoordinates } from './stages/coordinates.js'
import { DeviceValidator } from './stages/device.js'
import { EntityReferenceValidator } from './stages/entities.js'
import { checkObjectIds } from './stages/object_ids.js'
import { detectOverlaps } from './stages/overlaps.js'
import {
  ValidationOptions,
  type EntityExistenceChecker,
  type StageOutput,
  type ValidationOptionsInput,
  type ValidationResultType,
} from './types.js'

export interface OrchestratorOptions {
  deviceLookupTimeoutMs?: number
  entityCheckTimeoutMs?: number
  entityCheckConcurrency?: number
}

async function runStage(
  enabled: boolean,
  stage: () => StageOutput | Promise<StageOutput>,
): Promise<StageOutput> {
  return enabled ? stage() : { errors: [], warnings: [] }
}

/**
 * Runs the validation pipeline for one layout against one target device.
 *
 * The device check gates everything else: when it fails, the result carries
 * that single error and no other stage is started. The remaining stages are
 * independent and run concurrently, but their output is merged in a fixed
 * order (entity, coordinate, object id, overlap) so results are reproducible.
 */
export class ValidationOrchestrator {
  private readonly deviceValidator: DeviceValidator
  private readonly entityValidator: EntityReferenceValidator

  constructor(
    registry: DeviceRegistry,
    checker: EntityExistenceChecker,
    options: OrchestratorOptions = {},
  ) {
    this.deviceValidator = new DeviceValidator(registry, {
      timeoutMs: options.deviceLookupTimeoutMs,
    })
    this.entityValidator = new EntityReferenceValidator(checker, {
      timeoutMs: options.entityCheckTimeoutMs,
      concurrency: options.entityCheckConcurrency,
    })
  }

  async validate(
    layout: Layout,
    deviceId: string,
    options: ValidationOptionsInput = {},
  ): Promise<ValidationResultType> {
    const opts = ValidationOptions.parse(options)
    const logger: Logger = makeLogger('ValidationOrchestrator', { deviceId })
    logger.debug('validation started', { objects: layout.length, options: opts })

    let device: DeviceRecordType | undefined
    if (opts.checkDevice) {
      const check = await this.deviceValidator.validate(deviceId)
      if (!check.ok) {
        logger.info('validation aborted by device check', { reason: check.error.message })
        return { passed: false, errors: [check.error], warnings: [] }
      }
      device = check.device
    } else if (opts.checkBounds) {
      device = await this.deviceValidator.find(deviceId)
    }

    const widgets = layout.filter(isWidget)
    const resolution = device?.resolution
    if (opts.checkBounds && !resolution) {
      logger.debug('bounds check skipped, no resolution known for device')
    }

    const stages: StageOutput[] = await Promise.all([
      runStage(opts.checkEntities, () => this.entityValidator.validate(widgets)),
      runStage(opts.checkBounds && resolution !== undefined, () => ({
        errors: resolution ? checkCoordinates(widgets, resolution) : [],
        warnings: [],
      })),
      runStage(opts.checkObjectIds, () => ({ errors: checkObjectIds(layout), warnings: [] })),
      runStage(opts.checkOverlaps, () => ({ errors: [], warnings: detectOverlaps(widgets) })),
    ])

    const errors = stages.flatMap((s) => s.errors)
    const warnings = opts.suppressWarnings ? [] : stages.flatMap((s) => s.warnings)
    const passed = errors.length === 0

    logger.info('validation finished', {
      passed,
      errors: errors.length,
      warnings: warnings.length,
    })
    return { passed, errors, warnings }
  }

  /** Ingests raw records first; throws `LayoutParseError` when they do not describe a layout. */
  async validateRaw(
    records: unknown,
    deviceId: string,
    options: ValidationOptionsInput = {},
  ): Promise<ValidationResultType> {
    return this.validate(parseLayout(records), deviceId, options)
  }
}
