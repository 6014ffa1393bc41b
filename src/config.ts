/**
 * Decoder configuration.
 *
 * Candidate offsets are data, not code: new candidates are added here
 * without touching the strategies that consume them.
 */

import type { IndexWidth } from './index-locator'

export type SizeWidth = 2 | 4

/**
 * Where a compressed-model container might keep its sizes and payload
 */
export interface CompressedCandidate {
  compressedSizeOffset: number
  uncompressedSizeOffset: number
  dataOffset: number
  /**
   * 4: signed 32-bit sizes, 2: unsigned 16-bit sizes
   */
  width: SizeWidth
}

/**
 * A compressed container probed by the heuristic strategy (32-bit sizes)
 */
export interface HeuristicContainer {
  compressedSizeOffset: number
  uncompressedSizeOffset: number
  dataOffset: number
}

/**
 * padded: 16-byte vertex records (f32 x3 + pad) and 16-byte half-float UV records.
 * packed: f32 x3 vertices and f32 x2 UVs.
 */
export type HeuristicLayout = 'padded' | 'packed'

export interface HeuristicCandidate {
  sharedCountOffset: number
  totalCountOffset: number
  layout: HeuristicLayout
}

export interface IndexSearchConfig {
  /**
   * Distance between probed offsets
   */
  step: number

  /**
   * Probed offsets per search before giving up
   */
  maxSteps: number

  /**
   * Index widths tried at each offset; 16-bit wins when both validate
   */
  widths: IndexWidth[]
}

export interface DecoderConfig {
  /**
   * Inputs shorter than this are rejected before any strategy runs
   */
  minAssetSize: number

  /**
   * Upper bound on any declared element count
   */
  maxElementCount: number

  maxCompressedSize: number
  maxUncompressedSize: number

  /**
   * Bounds for shared (vertex) and total (index) counts in classic layouts
   */
  maxSharedVertices: number
  maxTotalVertices: number

  /**
   * Model name tokens that mark a model as compressed
   */
  compressionKeywords: string[]

  /**
   * Model name token selecting 8-bit quantized positions
   */
  zipPositionsKeyword: string

  compressedCandidates: CompressedCandidate[]
  heuristicContainers: HeuristicContainer[]
  heuristicCandidates: HeuristicCandidate[]
  indexSearch: IndexSearchConfig
}

export type DecoderConfigOverrides = Partial<Omit<DecoderConfig, 'indexSearch'>> & {
  indexSearch?: Partial<IndexSearchConfig>
}

const COUNT_PAIRS: Array<[number, number]> = [
  [0x74, 0x78],
  [0x70, 0x74],
  [0x78, 0x7c],
  [0x80, 0x84]
]

export const DEFAULT_DECODER_CONFIG: DecoderConfig = {
  minAssetSize: 16,
  maxElementCount: 1_000_000,
  maxCompressedSize: 10 * 1024 * 1024,
  maxUncompressedSize: 50 * 1024 * 1024,
  maxSharedVertices: 100_000,
  maxTotalVertices: 300_000,
  compressionKeywords: ['StripAnim', 'CompOcc', 'ZipPos', 'ZipUvs', 'StripNorm', 'StripUv13', 'CopyFrameDelay'],
  zipPositionsKeyword: 'ZipPos',
  compressedCandidates: [
    { compressedSizeOffset: 0x52, uncompressedSizeOffset: 0x56, dataOffset: 0x5a, width: 4 },
    { compressedSizeOffset: 0x4e, uncompressedSizeOffset: 0x51, dataOffset: 0x56, width: 2 },
    { compressedSizeOffset: 0x4e, uncompressedSizeOffset: 0x52, dataOffset: 0x56, width: 2 },
    { compressedSizeOffset: 0x4e, uncompressedSizeOffset: 0x50, dataOffset: 0x56, width: 2 },
    { compressedSizeOffset: 0x4c, uncompressedSizeOffset: 0x50, dataOffset: 0x56, width: 2 }
  ],
  heuristicContainers: [
    { compressedSizeOffset: 0x4e, uncompressedSizeOffset: 0x52, dataOffset: 0x56 },
    { compressedSizeOffset: 0x4a, uncompressedSizeOffset: 0x4e, dataOffset: 0x52 },
    { compressedSizeOffset: 0x52, uncompressedSizeOffset: 0x56, dataOffset: 0x5a }
  ],
  heuristicCandidates: [
    ...COUNT_PAIRS.map(([shared, total]): HeuristicCandidate => ({
      sharedCountOffset: shared, totalCountOffset: total, layout: 'padded'
    })),
    ...COUNT_PAIRS.map(([shared, total]): HeuristicCandidate => ({
      sharedCountOffset: shared, totalCountOffset: total, layout: 'packed'
    }))
  ],
  indexSearch: {
    step: 4,
    maxSteps: 10_000,
    widths: [4, 2]
  }
}

/**
 * Spread caller overrides over the defaults
 */
export function resolveDecoderConfig(overrides: DecoderConfigOverrides = {}): DecoderConfig {
  return {
    ...DEFAULT_DECODER_CONFIG,
    ...overrides,
    indexSearch: {
      ...DEFAULT_DECODER_CONFIG.indexSearch,
      ...overrides.indexSearch
    }
  }
}
