import { type DecoderConfigOverrides, resolveDecoderConfig } from './config'
import { type FailureReason, Outcome } from './errors'
import { ConsoleLogger, type Logger } from './logger'
import { type Decompressor, Lz4BlockDecompressor } from './lz4'
import type { DecodedMesh } from './mesh'
import { MeshSanitizer, type SanitizeStats } from './sanitizer'
import { type DecodePlan, FormatSniffer, type PlanStep, type StrategyName } from './sniffer'
import { CompressedModelStrategy } from './strategies/compressed-model'
import { FmtMeshStrategy } from './strategies/fmt-mesh'
import { HeuristicStrategy } from './strategies/heuristic'
import type { DecodeStrategy } from './strategies/strategy'
import type { FlagTable, RawAsset } from './types'

export interface DecodeOptions {
  /**
   * Per-model flags, usually parsed from the definitions file
   */
  flagTable?: FlagTable

  /**
   * Overrides spread over DEFAULT_DECODER_CONFIG
   */
  config?: DecoderConfigOverrides

  /**
   * @default Lz4BlockDecompressor
   */
  decompressor?: Decompressor

  /**
   * @default ConsoleLogger at warn level
   */
  logger?: Logger
}

/**
 * A failed strategy attempt, in the order it ran
 */
export interface StrategyAttempt {
  strategy: StrategyName
  forced: boolean
  reason: FailureReason
}

export interface DecodeSuccess {
  ok: true
  modelName: string
  plan: DecodePlan
  strategy: StrategyName
  forced: boolean

  /**
   * Candidate that produced the mesh, e.g. "lz4@0x5a/old-layout/indices@0x80:u16"
   */
  source: string

  /**
   * Sanitized mesh
   */
  mesh: DecodedMesh
  stats: SanitizeStats

  /**
   * Strategies that failed before the winner
   */
  attempts: StrategyAttempt[]
}

export interface DecodeFailure {
  ok: false
  modelName: string

  /**
   * Absent when the input was rejected before sniffing
   */
  plan?: DecodePlan

  /**
   * Input too short to try any strategy
   */
  fatal: boolean
  message: string
  attempts: StrategyAttempt[]
}

export type DecodeReport = DecodeSuccess | DecodeFailure

const STRATEGIES: Record<StrategyName, DecodeStrategy> = {
  fmt_mesh: new FmtMeshStrategy(),
  compressed: new CompressedModelStrategy(),
  heuristic: new HeuristicStrategy()
}

export function describeStep(step: Pick<PlanStep, 'strategy' | 'forced'>): string {
  return step.forced ? `${step.strategy} (forced)` : step.strategy
}

/**
 * Decode one asset: sniff, run the planned strategies in order, and
 * sanitize the first structurally valid mesh.
 *
 * Never throws for malformed input; programming errors propagate.
 */
export function decodeAsset(asset: RawAsset, options: DecodeOptions = {}): DecodeReport {
  const config = resolveDecoderConfig(options.config)
  const logger = options.logger ?? new ConsoleLogger('warn')
  const decompressor = options.decompressor ?? new Lz4BlockDecompressor()
  const modelName = FormatSniffer.modelName(asset.filename)

  if (asset.bytes.length < config.minAssetSize) {
    const message = `file is ${asset.bytes.length} bytes, shorter than the ${config.minAssetSize}-byte minimum`
    logger.error(`${modelName}: ${message}`)
    return { ok: false, modelName, fatal: true, message, attempts: [] }
  }

  const plan = FormatSniffer.sniff(asset, options.flagTable, config)
  logger.debug(`${modelName}: flags from ${plan.flagSource}, plan ${plan.steps.map(describeStep).join(' -> ')}`)

  const attempts: StrategyAttempt[] = []
  const winner = Outcome.firstSuccess(
    plan.steps,
    step => {
      const outcome = STRATEGIES[step.strategy].decode({
        asset,
        plan,
        config,
        decompressor,
        logger,
        forced: step.forced
      })
      if (!outcome.ok) return outcome
      const invalid = MeshSanitizer.validate(outcome.value)
      return invalid ? Outcome.failure(invalid.kind, invalid.message) : outcome
    },
    (step, reason) => {
      attempts.push({ strategy: step.strategy, forced: step.forced, reason })
      logger.debug(`${modelName}: ${describeStep(step)} failed with ${reason.kind}: ${reason.message}`)
    }
  )

  if (!winner) {
    const message = `all ${plan.steps.length} strategies failed`
    logger.warn(`${modelName}: ${message}`)
    return { ok: false, modelName, plan, fatal: false, message, attempts }
  }

  const { candidate: step, outcome } = winner
  const { mesh, stats } = MeshSanitizer.sanitize(outcome.value)
  logger.info(
    `${modelName}: ${describeStep(step)} via ${outcome.source}, ` +
    `${stats.vertexCount} vertices, ${stats.validTriangles}/${stats.totalTriangles} faces`
  )

  return {
    ok: true,
    modelName,
    plan,
    strategy: step.strategy,
    forced: step.forced,
    source: outcome.source,
    mesh,
    stats,
    attempts
  }
}
