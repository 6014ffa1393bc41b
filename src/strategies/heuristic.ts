import { ByteHeap } from '../byte-heap'
import type { DecoderConfig, HeuristicCandidate, HeuristicLayout } from '../config'
import { FormatConstants } from '../constants'
import { Outcome, type ParseOutcome } from '../errors'
import { IndexLocator } from '../index-locator'
import type { DecodedMesh } from '../mesh'
import { Quantization } from '../quantization'
import { probeContainer } from './container'
import type { DecodeContext, DecodeStrategy } from './strategy'

const H = FormatConstants.HEURISTIC

/**
 * A buffer the heuristic probes, either the raw file or a decompressed body
 */
interface BodySource {
  label: string
  heap: ByteHeap
}

interface LayoutStrides {
  vertexStride: number
  uvStride: number
}

const LAYOUTS: Record<HeuristicLayout, LayoutStrides> = {
  padded: { vertexStride: H.PADDED_VERTEX_STRIDE, uvStride: H.PADDED_UV_STRIDE },
  packed: { vertexStride: H.PACKED_VERTEX_STRIDE, uvStride: H.PACKED_UV_STRIDE }
}

/**
 * Brute-force search over known count offsets and record layouts,
 * on the raw file and on every body the known containers decompress to.
 */
export class HeuristicStrategy implements DecodeStrategy {
  readonly name = 'heuristic'

  decode(context: DecodeContext): ParseOutcome<DecodedMesh> {
    const { config, logger } = context
    let bodies = 0

    for (const source of HeuristicStrategy.bodies(context)) {
      bodies++
      const winner = Outcome.firstSuccess(
        config.heuristicCandidates,
        candidate => Outcome.guard(() => HeuristicStrategy.tryCandidate(source.heap, candidate, config)),
        (candidate, reason) => logger.debug(
          `heuristic: ${source.label} ${candidate.layout}@${FormatConstants.hex(candidate.sharedCountOffset)}: ${reason.message}`
        )
      )
      if (winner) {
        return Outcome.success(winner.outcome.value, `${source.label}/${winner.outcome.source}`)
      }
    }

    return Outcome.failure(
      'OffsetCandidateExhausted',
      `no count candidate matched in ${bodies} bodies (${config.heuristicCandidates.length} candidates each)`
    )
  }

  /**
   * The raw file, then each container body that decompresses cleanly
   */
  static * bodies(context: DecodeContext): Generator<BodySource> {
    const { config, decompressor, logger } = context
    const file = new ByteHeap(context.asset.bytes)
    yield { label: 'raw', heap: file }

    for (const container of config.heuristicContainers) {
      const header = probeContainer(file, { ...container, width: 4 }, config, false)
      if (!header) continue
      const inflated = decompressor.decompress(
        file.slice(header.dataOffset, header.compressedSize),
        header.compressedSize,
        header.uncompressedSize
      )
      if (!inflated.ok) {
        logger.debug(`heuristic: container @${FormatConstants.hex(header.dataOffset)}: ${inflated.reason.message}`)
        continue
      }
      yield { label: `lz4@${FormatConstants.hex(header.dataOffset)}`, heap: new ByteHeap(inflated.value) }
    }
  }

  static tryCandidate(heap: ByteHeap, candidate: HeuristicCandidate, config: DecoderConfig): ParseOutcome<DecodedMesh> {
    const { sharedCountOffset, totalCountOffset, layout } = candidate
    if (!heap.contains(sharedCountOffset, 4) || !heap.contains(totalCountOffset, 4)) {
      return Outcome.failure('OffsetCandidateExhausted', 'count fields lie outside the body')
    }
    const sharedCount = heap.i32(sharedCountOffset)
    const totalCount = heap.i32(totalCountOffset)
    if (sharedCount <= 0 || sharedCount >= config.maxSharedVertices ||
      totalCount <= 0 || totalCount >= config.maxTotalVertices || totalCount % 3 !== 0) {
      return Outcome.failure('OffsetCandidateExhausted', `implausible counts shared=${sharedCount} total=${totalCount}`)
    }

    const { vertexStride, uvStride } = LAYOUTS[layout]
    if (sharedCount * vertexStride + totalCount * uvStride > heap.length - H.VERTEX_START) {
      return Outcome.failure('OffsetCandidateExhausted', `shared=${sharedCount} total=${totalCount} do not fit`)
    }

    const vertices = new Float64Array(sharedCount * 3)
    for (let i = 0; i < sharedCount; i++) {
      const at = H.VERTEX_START + i * vertexStride
      vertices[i * 3] = heap.f32(at)
      vertices[i * 3 + 1] = heap.f32(at + 4)
      vertices[i * 3 + 2] = heap.f32(at + 8)
    }

    const uvStart = H.VERTEX_START + sharedCount * vertexStride
    const uvs = new Float64Array(sharedCount * 2)
    for (let i = 0; i < sharedCount; i++) {
      const at = uvStart + i * uvStride
      if (layout === 'padded') {
        uvs[i * 2] = Quantization.halfToFloat(heap.u16(at + H.PADDED_UV_OFFSET))
        uvs[i * 2 + 1] = Quantization.halfToFloat(heap.u16(at + H.PADDED_UV_OFFSET + 2))
      } else {
        uvs[i * 2] = heap.f32(at)
        uvs[i * 2 + 1] = heap.f32(at + 4)
      }
    }

    const located = IndexLocator.locate(heap, {
      start: uvStart + sharedCount * uvStride,
      vertexCount: sharedCount,
      indexCount: totalCount,
      ...config.indexSearch
    })
    if (!located.ok) return located

    return Outcome.success(
      { vertices, uvs, indices: located.value.indices },
      `${layout}@${FormatConstants.hex(sharedCountOffset)}/${located.source}`
    )
  }
}
