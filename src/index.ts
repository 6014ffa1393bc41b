/**
 * Mesh Salvage Library
 *
 * Recovers vertex positions, UVs and triangle indices from undocumented
 * `.mesh` game assets by trying several known layouts in turn.
 */

// Export types
export type { FlagTable, MeshFlags, RawAsset, CompressionHeader, QuantizationParams, QuantizationParams2D, Vec2, Vec3 } from './types'
export type { DecodedMesh } from './mesh'
export type { FailureKind, FailureReason, Failure, Success, ParseOutcome } from './errors'
export type { DecodePlan, PlanStep, StrategyName, FlagSource } from './sniffer'
export type { DecodeOptions, DecodeReport, DecodeSuccess, DecodeFailure, StrategyAttempt } from './chain'
export type { DecodeContext, DecodeStrategy } from './strategies/strategy'
export type { IndexRegion, IndexSearchOptions, IndexWidth } from './index-locator'
export type { SanitizeStats, SanitizedMesh } from './sanitizer'
export type { Decompressor } from './lz4'
export type { Logger, LogLevel } from './logger'
export type { DecoderConfig, DecoderConfigOverrides, CompressedCandidate, HeuristicCandidate, HeuristicContainer, HeuristicLayout } from './config'
export type { BatchEntry, BatchOptions, BatchReport, BatchStatus } from './batch'
export type { ConvertOptions } from './converter'
export type { Selection } from './selection'

// Decoding
export { decodeAsset, describeStep } from './chain'
export { FormatSniffer } from './sniffer'
export { FmtMeshStrategy } from './strategies/fmt-mesh'
export { CompressedModelStrategy } from './strategies/compressed-model'
export { HeuristicStrategy } from './strategies/heuristic'
export { IndexLocator } from './index-locator'
export { MeshSanitizer } from './sanitizer'
export { Lz4BlockDecompressor, decompressLz4Block } from './lz4'
export { Quantization } from './quantization'
export { ByteHeap } from './byte-heap'
export { MeshFormatError, Outcome } from './errors'
export { ConsoleLogger, silentLogger } from './logger'
export { DEFAULT_DECODER_CONFIG, resolveDecoderConfig } from './config'
export { FormatConstants } from './constants'

// Utility classes
export { MeshUtils } from './mesh'
export { ObjWriter } from './obj-writer'
export { MeshDefs } from './mesh-defs'
export { convertToBufferGeometry, normalizeVertices } from './converter'
export { convertFiles, BatchReportUtils } from './batch'
export { parseSelection } from './selection'
export { ZipUtils } from './utils/zipUtils'
