import { ByteHeap } from '../byte-heap'
import type { DecoderConfig } from '../config'
import { FormatConstants } from '../constants'
import { type Failure, MeshFormatError, Outcome, type ParseOutcome } from '../errors'
import { IndexLocator } from '../index-locator'
import type { Logger } from '../logger'
import type { DecodedMesh } from '../mesh'
import { Quantization } from '../quantization'
import type { QuantizationParams, Vec3 } from '../types'
import { probeContainer } from './container'
import type { DecodeContext, DecodeStrategy } from './strategy'

const B = FormatConstants.COMPRESSED_BODY

/**
 * Counts and dequantization parameters of a classic body
 */
interface ClassicLayout {
  name: 'new-layout' | 'old-layout'
  sharedCount: number
  totalCount: number
  params: QuantizationParams
  vertexStart: number
}

/**
 * LZ4 container at one of several candidate header locations, holding a
 * body with 16-bit quantized positions (or 8-bit ZipPos positions).
 */
export class CompressedModelStrategy implements DecodeStrategy {
  readonly name = 'compressed'

  decode(context: DecodeContext): ParseOutcome<DecodedMesh> {
    const { config, decompressor, logger } = context
    const file = new ByteHeap(context.asset.bytes)

    let validated = 0
    const codecFailures: Failure[] = []
    const bodyFailures: Failure[] = []

    const winner = Outcome.firstSuccess(config.compressedCandidates, candidate => {
      const header = probeContainer(file, candidate, config, true)
      if (!header) {
        return Outcome.failure('DecompressionFailure', 'size fields out of range')
      }
      validated++

      const inflated = decompressor.decompress(
        file.slice(header.dataOffset, header.compressedSize),
        header.compressedSize,
        header.uncompressedSize
      )
      if (!inflated.ok) {
        codecFailures.push(inflated)
        return inflated
      }

      const decoded = CompressedModelStrategy.decodeBody(new ByteHeap(inflated.value), context)
      if (!decoded.ok) {
        bodyFailures.push(decoded)
        return decoded
      }
      return Outcome.success(decoded.value, `lz4@${FormatConstants.hex(header.dataOffset)}/${decoded.source}`)
    }, (candidate, reason) => {
      logger.debug(
        `compressed: sizes @${FormatConstants.hex(candidate.compressedSizeOffset)}/` +
        `${FormatConstants.hex(candidate.uncompressedSizeOffset)} rejected: ${reason.message}`
      )
    })

    if (winner) return winner.outcome
    const lastBodyFailure = bodyFailures.at(-1)
    if (lastBodyFailure) return lastBodyFailure
    if (validated === 0) {
      return Outcome.failure('DecompressionFailure', 'no container candidate has plausible sizes')
    }
    const lastCodecFailure = codecFailures.at(-1)
    const detail = lastCodecFailure ? `: ${lastCodecFailure.reason.message}` : ''
    return Outcome.failure('DecompressionFailure', `all ${validated} container candidates failed to decompress${detail}`)
  }

  /**
   * Decode a decompressed body with the schema the context selects.
   * The forced retry falls back to ZipPos when the classic schema fails.
   */
  static decodeBody(body: ByteHeap, context: DecodeContext): ParseOutcome<DecodedMesh> {
    if (context.plan.zipPositions) {
      return Outcome.guard(() => CompressedModelStrategy.decodeZipPositions(body, context.config))
    }
    const classic = Outcome.guard(() => CompressedModelStrategy.decodeClassic(body, context.config, context.logger))
    if (classic.ok || !context.forced) return classic

    const retry = Outcome.guard(() => CompressedModelStrategy.decodeZipPositions(body, context.config))
    if (retry.ok) {
      context.logger.debug('compressed: classic schema failed, recovered with packed positions')
      return retry
    }
    return classic
  }

  /**
   * Shared and total counts of the old layout, also used by ZipPos bodies
   */
  private static readCounts(body: ByteHeap, config: DecoderConfig): { sharedCount: number; totalCount: number } {
    const sharedCount = body.i32(B.SHARED_COUNT)
    const totalCount = body.i32(B.TOTAL_COUNT)
    if (sharedCount <= 0 || sharedCount > config.maxSharedVertices ||
      totalCount <= 0 || totalCount > config.maxTotalVertices || totalCount % 3 !== 0) {
      throw new MeshFormatError('UnsupportedHeader', `implausible counts shared=${sharedCount} total=${totalCount}`)
    }
    return { sharedCount, totalCount }
  }

  static decodeZipPositions(body: ByteHeap, config: DecoderConfig): ParseOutcome<DecodedMesh> {
    const { sharedCount, totalCount } = CompressedModelStrategy.readCounts(body, config)

    const positionStart = body.length - sharedCount * B.ZIP_VERTEX_STRIDE
    if (positionStart < B.OLD_VERTICES) {
      throw new MeshFormatError('UnsupportedHeader', `${sharedCount} packed positions overlap the body header`)
    }
    const vertices = new Float64Array(sharedCount * 3)
    for (let i = 0; i < sharedCount; i++) {
      const at = positionStart + i * B.ZIP_VERTEX_STRIDE
      vertices[i * 3] = Quantization.snorm8(body.u8(at + 1))
      vertices[i * 3 + 1] = Quantization.snorm8(body.u8(at + 2))
      vertices[i * 3 + 2] = Quantization.snorm8(body.u8(at + 3))
    }

    const uvStart = positionStart - sharedCount * B.UV_STRIDE
    const hasUvs = uvStart >= B.OLD_VERTICES
    const uvs = new Float64Array(sharedCount * 2)
    if (hasUvs) {
      for (let i = 0; i < sharedCount; i++) {
        const at = uvStart + i * B.UV_STRIDE
        uvs[i * 2] = Quantization.unorm16(body.u16(at))
        uvs[i * 2 + 1] = Quantization.unorm16(body.u16(at + 2))
      }
    }

    const located = IndexLocator.locate(body, {
      start: B.OLD_VERTICES,
      end: hasUvs ? uvStart : positionStart,
      vertexCount: sharedCount,
      indexCount: totalCount,
      ...config.indexSearch
    })
    if (!located.ok) return located

    return Outcome.success({ vertices, uvs, indices: located.value.indices }, `zip-pos/${located.source}`)
  }

  /**
   * Pick the new layout when its marker is present and its vertex block fits,
   * the old layout otherwise
   */
  static readLayout(body: ByteHeap, config: DecoderConfig, logger: Logger): ClassicLayout {
    if (body.length >= B.NEW_MARKER_END) {
      const sharedCount = body.i32(B.NEW_SHARED_COUNT)
      const totalCount = body.i32(B.NEW_TOTAL_COUNT)
      const marked = sharedCount > 0 && sharedCount < config.maxSharedVertices &&
        totalCount > 0 && totalCount < config.maxTotalVertices && totalCount % 3 === 0
      if (marked && body.contains(B.NEW_VERTICES, sharedCount * B.VERTEX_STRIDE)) {
        return {
          name: 'new-layout',
          sharedCount,
          totalCount,
          params: {
            min: CompressedModelStrategy.readVec3(body, B.NEW_MIN),
            range: CompressedModelStrategy.readVec3(body, B.NEW_RANGE)
          },
          vertexStart: B.NEW_VERTICES
        }
      }
      if (marked) {
        logger.debug(`compressed: new-layout vertex block of ${sharedCount} does not fit, trying old layout`)
      }
    }

    const { sharedCount, totalCount } = CompressedModelStrategy.readCounts(body, config)
    const rangeY = body.f32(B.OLD_RANGE_Y)
    return {
      name: 'old-layout',
      sharedCount,
      totalCount,
      params: {
        min: CompressedModelStrategy.readVec3(body, B.OLD_MIN),
        // 0x74 holds the shared count, z reuses the y range
        range: [body.f32(B.OLD_RANGE_X), rangeY, rangeY]
      },
      vertexStart: B.OLD_VERTICES
    }
  }

  static decodeClassic(body: ByteHeap, config: DecoderConfig, logger: Logger): ParseOutcome<DecodedMesh> {
    const layout = CompressedModelStrategy.readLayout(body, config, logger)
    const { sharedCount, totalCount, params, vertexStart } = layout

    body.require(vertexStart, sharedCount * B.VERTEX_STRIDE, 'vertex block')
    const vertices = new Float64Array(sharedCount * 3)
    for (let i = 0; i < sharedCount; i++) {
      const at = vertexStart + i * B.VERTEX_STRIDE
      const [x, y, z] = Quantization.dequantize16Vec3([body.u16(at), body.u16(at + 2), body.u16(at + 4)], params)
      vertices[i * 3] = x
      vertices[i * 3 + 1] = y
      vertices[i * 3 + 2] = z
    }
    CompressedModelStrategy.checkMagnitude(vertices, logger)

    const uvStart = vertexStart + sharedCount * B.VERTEX_STRIDE
    const uvs = new Float64Array(sharedCount * 2)
    for (let i = 0; i < sharedCount; i++) {
      const at = uvStart + i * B.UV_STRIDE
      // entries past the body end stay zero
      if (!body.contains(at, B.UV_STRIDE)) break
      uvs[i * 2] = Quantization.unorm16(body.u16(at))
      uvs[i * 2 + 1] = Quantization.unorm16(body.u16(at + 2))
    }

    const located = IndexLocator.locate(body, {
      start: uvStart + sharedCount * B.UV_STRIDE,
      vertexCount: sharedCount,
      indexCount: totalCount,
      ...config.indexSearch
    })
    if (!located.ok) return located

    return Outcome.success({ vertices, uvs, indices: located.value.indices }, `${layout.name}/${located.source}`)
  }

  private static readVec3(body: ByteHeap, offset: number): Vec3 {
    return [body.f32(offset), body.f32(offset + 4), body.f32(offset + 8)]
  }

  /**
   * Warn when dequantized positions look like misread parameters
   */
  private static checkMagnitude(vertices: Float64Array, logger: Logger): void {
    const sample = Math.min(100, vertices.length / 3)
    if (sample === 0) return
    let sum = 0
    for (let i = 0; i < sample; i++) {
      sum += Math.abs(vertices[i * 3])
    }
    const average = sum / sample
    if (average > 10_000) {
      logger.warn(`compressed: average |x| of ${average.toFixed(1)} over the first ${sample} vertices, quantization parameters may be wrong`)
    }
  }
}
