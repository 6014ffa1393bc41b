import type { ByteHeap } from '../byte-heap'
import type { CompressedCandidate, DecoderConfig } from '../config'
import type { CompressionHeader } from '../types'

/**
 * Read a candidate's size fields and keep it only when they are plausible.
 *
 * @param requireGrowth Also demand uncompressed > compressed
 * @returns The validated header, or undefined when the candidate does not apply
 */
export function probeContainer(
  file: ByteHeap,
  candidate: CompressedCandidate,
  config: DecoderConfig,
  requireGrowth: boolean
): CompressionHeader | undefined {
  const read = (offset: number): number | undefined => {
    if (!file.contains(offset, candidate.width)) return undefined
    return candidate.width === 4 ? file.i32(offset) : file.u16(offset)
  }

  const compressedSize = read(candidate.compressedSizeOffset)
  const uncompressedSize = read(candidate.uncompressedSizeOffset)
  if (compressedSize === undefined || uncompressedSize === undefined) return undefined

  if (compressedSize <= 0 || compressedSize >= config.maxCompressedSize) return undefined
  if (uncompressedSize <= 0 || uncompressedSize >= config.maxUncompressedSize) return undefined
  if (requireGrowth && uncompressedSize <= compressedSize) return undefined
  if (!file.contains(candidate.dataOffset, compressedSize)) return undefined

  return { compressedSize, uncompressedSize, dataOffset: candidate.dataOffset }
}
