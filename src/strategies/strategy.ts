import type { DecoderConfig } from '../config'
import type { ParseOutcome } from '../errors'
import type { Logger } from '../logger'
import type { Decompressor } from '../lz4'
import type { DecodedMesh } from '../mesh'
import type { DecodePlan, StrategyName } from '../sniffer'
import type { RawAsset } from '../types'

/**
 * Everything a strategy may read while decoding one asset
 */
export interface DecodeContext {
  asset: RawAsset
  plan: DecodePlan
  config: DecoderConfig
  decompressor: Decompressor
  logger: Logger

  /**
   * Set on the last-resort retry of a strategy the plan did not call for
   */
  forced: boolean
}

/**
 * One way of recovering a mesh from a byte buffer.
 *
 * Implementations are stateless and never throw a format error:
 * every failure is returned as a ParseOutcome.
 */
export interface DecodeStrategy {
  readonly name: StrategyName
  decode(context: DecodeContext): ParseOutcome<DecodedMesh>
}
