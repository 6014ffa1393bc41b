/**
 * Types shared across the decoder
 */

export type Vec2 = [number, number]
export type Vec3 = [number, number, number]

/**
 * One record of the external flag table
 */
export interface MeshFlags {
  compressPositions?: boolean
  compressUvs?: boolean
  [key: string]: boolean | number | string | undefined
}

/**
 * Per-model flags keyed by model name
 */
export type FlagTable = Record<string, MeshFlags>

/**
 * An input file as read from disk
 */
export interface RawAsset {
  /**
   * File contents
   */
  readonly bytes: Uint8Array

  /**
   * Source filename; the model name is its base name without extension
   */
  readonly filename: string

  /**
   * Flags for this model, taking precedence over a flag table lookup
   */
  readonly flags?: MeshFlags
}

/**
 * A candidate location of a compressed payload
 */
export interface CompressionHeader {
  compressedSize: number
  uncompressedSize: number
  dataOffset: number
}

/**
 * Affine dequantization parameters: value = min + raw / max * range
 */
export interface QuantizationParams {
  min: Vec3
  range: Vec3
}

/**
 * Two-dimensional form of QuantizationParams, for UVs
 */
export interface QuantizationParams2D {
  min: Vec2
  range: Vec2
}
