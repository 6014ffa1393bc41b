import { DEFAULT_DECODER_CONFIG, type DecoderConfig } from './config'
import { FormatConstants } from './constants'
import type { FlagTable, MeshFlags, RawAsset } from './types'

export type StrategyName = 'fmt_mesh' | 'compressed' | 'heuristic'

export interface PlanStep {
  strategy: StrategyName

  /**
   * Last-resort retry that runs without a compression signal
   */
  forced: boolean
}

/**
 * Where the compression signal came from
 */
export type FlagSource = 'table' | 'keyword' | 'none'

export interface DecodePlan {
  modelName: string

  /**
   * The file starts with the fmt_mesh signature
   */
  signature: boolean

  /**
   * compressPositions or compressUvs is set, from the table or a keyword
   */
  compressed: boolean

  /**
   * Positions are stored as 8-bit ZipPos records
   */
  zipPositions: boolean

  flagSource: FlagSource

  /**
   * Strategies to attempt, in order
   */
  steps: PlanStep[]
}

/**
 * Classifies an asset into an ordered list of admissible strategies
 */
export class FormatSniffer {

  /**
   * Base name without directory or extension
   */
  static modelName(filename: string): string {
    const base = filename.split(/[\\/]/).pop() ?? filename
    const dot = base.lastIndexOf('.')
    return dot > 0 ? base.slice(0, dot) : base
  }

  static hasSignature(bytes: Uint8Array): boolean {
    return bytes.length >= FormatConstants.SIGNATURE.length &&
      FormatConstants.SIGNATURE.every((byte, i) => bytes[i] === byte)
  }

  static sniff(asset: RawAsset, flagTable?: FlagTable, config: DecoderConfig = DEFAULT_DECODER_CONFIG): DecodePlan {
    const modelName = FormatSniffer.modelName(asset.filename)
    const signature = FormatSniffer.hasSignature(asset.bytes)
    const flags: MeshFlags | undefined = asset.flags ?? flagTable?.[modelName]

    let flagSource: FlagSource = 'none'
    if (flags?.compressPositions === true || flags?.compressUvs === true) {
      flagSource = 'table'
    } else if (config.compressionKeywords.some(keyword => modelName.includes(keyword))) {
      // advisory only
      flagSource = 'keyword'
    }
    const compressed = flagSource !== 'none'

    const steps: PlanStep[] = []
    if (signature) {
      steps.push({ strategy: 'fmt_mesh', forced: false })
    }
    if (compressed) {
      steps.push({ strategy: 'compressed', forced: false })
    }
    steps.push({ strategy: 'heuristic', forced: false })
    if (!compressed) {
      steps.push({ strategy: 'compressed', forced: true })
    }

    return {
      modelName,
      signature,
      compressed,
      zipPositions: modelName.includes(config.zipPositionsKeyword),
      flagSource,
      steps
    }
  }
}
