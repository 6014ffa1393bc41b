import { ByteHeap } from '../byte-heap'
import { FormatConstants } from '../constants'
import { MeshFormatError, Outcome, type ParseOutcome } from '../errors'
import { IndexLocator } from '../index-locator'
import type { DecodedMesh } from '../mesh'
import { Quantization } from '../quantization'
import { FormatSniffer } from '../sniffer'
import type { DecodeContext, DecodeStrategy } from './strategy'

const F = FormatConstants.FMT_MESH

/**
 * Signature-prefixed container holding one LZ4-compressed body and an
 * optional bone block after the payload.
 */
export class FmtMeshStrategy implements DecodeStrategy {
  readonly name = 'fmt_mesh'

  decode(context: DecodeContext): ParseOutcome<DecodedMesh> {
    return Outcome.guard(() => this.decodeFile(context))
  }

  private decodeFile(context: DecodeContext): ParseOutcome<DecodedMesh> {
    const { config, decompressor, logger } = context
    const file = new ByteHeap(context.asset.bytes)

    if (!FormatSniffer.hasSignature(file.bytes)) {
      return Outcome.failure('UnsupportedHeader', 'missing fmt_mesh signature')
    }

    const subMeshes = file.count(F.SUB_MESH_COUNT, 'sub-mesh count', config.maxElementCount)
    const hasBones = file.u16(F.BONE_FLAG) === 1
    const compressedSize = file.u32(F.COMPRESSED_SIZE)
    const uncompressedSize = file.u32(F.UNCOMPRESSED_SIZE)
    if (uncompressedSize > config.maxUncompressedSize) {
      throw new MeshFormatError('UnsupportedHeader', `uncompressed size ${uncompressedSize} exceeds the limit of ${config.maxUncompressedSize}`)
    }
    const payload = file.slice(F.PAYLOAD, compressedSize)
    if (hasBones) {
      FmtMeshStrategy.skipBoneBlock(file, F.PAYLOAD + compressedSize, config.maxElementCount)
    }
    logger.debug(`fmt_mesh: ${subMeshes} sub-meshes, bones=${hasBones}, ${compressedSize} -> ${uncompressedSize} bytes`)

    const inflated = decompressor.decompress(payload, compressedSize, uncompressedSize)
    if (!inflated.ok) return inflated

    const body = new ByteHeap(inflated.value)
    const decoded = context.plan.zipPositions
      ? FmtMeshStrategy.decodeZipPositions(body, hasBones, context)
      : FmtMeshStrategy.decodeClassic(body, hasBones, context)
    if (!decoded.ok) return decoded
    return Outcome.success(decoded.value, `lz4@${FormatConstants.hex(F.PAYLOAD)}/${decoded.source}`)
  }

  /**
   * Bounds-check the bone block and its records
   *
   * @returns Offset just past the last bone record
   */
  static skipBoneBlock(file: ByteHeap, offset: number, maxBones: number): number {
    file.require(offset, F.BONE_BLOCK_SIZE, 'bone block')
    const boneCount = file.count(offset + F.BONE_COUNT, 'bone count', maxBones)
    const recordsStart = offset + F.BONE_BLOCK_SIZE
    file.require(recordsStart, boneCount * F.BONE_RECORD_SIZE, 'bone records')
    return recordsStart + boneCount * F.BONE_RECORD_SIZE
  }

  private static readCounts(body: ByteHeap, max: number): { vertexCount: number; indexCount: number; uvCount: number } {
    return {
      vertexCount: body.count(F.VERTEX_COUNT, 'vertex count', max),
      indexCount: body.count(F.INDEX_COUNT, 'index count', max),
      uvCount: body.count(F.UV_COUNT, 'UV count', max)
    }
  }

  static decodeClassic(body: ByteHeap, hasBones: boolean, context: DecodeContext): ParseOutcome<DecodedMesh> {
    const { vertexCount, indexCount, uvCount } = FmtMeshStrategy.readCounts(body, context.config.maxElementCount)

    let offset = F.DATA
    body.require(offset, vertexCount * F.VERTEX_STRIDE, 'vertex block')
    const vertices = new Float64Array(vertexCount * 3)
    for (let i = 0; i < vertexCount; i++) {
      const at = offset + i * F.VERTEX_STRIDE
      vertices[i * 3] = body.f32(at)
      vertices[i * 3 + 1] = body.f32(at + 4)
      vertices[i * 3 + 2] = body.f32(at + 8)
    }
    offset += vertexCount * F.VERTEX_STRIDE + vertexCount * F.VERTEX_GAP_STRIDE

    // zero means one record per vertex
    const uvRecords = uvCount || vertexCount
    body.require(offset, uvRecords * F.UV_STRIDE, 'UV block')
    const uvs = new Float64Array(uvRecords * 2)
    for (let i = 0; i < uvRecords; i++) {
      const at = offset + i * F.UV_STRIDE
      uvs[i * 2] = Quantization.halfToFloat(body.u16(at))
      uvs[i * 2 + 1] = Quantization.halfToFloat(body.u16(at + 2))
    }
    offset += uvRecords * F.UV_STRIDE

    if (hasBones) offset += vertexCount * F.WEIGHT_STRIDE

    const located = IndexLocator.locate(body, {
      start: offset,
      vertexCount,
      indexCount,
      ...context.config.indexSearch
    })
    if (!located.ok) return located

    return Outcome.success({ vertices, uvs, indices: located.value.indices }, `classic/${located.source}`)
  }

  static decodeZipPositions(body: ByteHeap, hasBones: boolean, context: DecodeContext): ParseOutcome<DecodedMesh> {
    const { vertexCount, indexCount } = FmtMeshStrategy.readCounts(body, context.config.maxElementCount)

    let offset = F.DATA
    if (hasBones) offset += vertexCount * F.WEIGHT_STRIDE

    const tailStart = body.length - vertexCount * F.ZIP_VERTEX_STRIDE
    if (tailStart < offset) {
      throw new MeshFormatError(
        'UnsupportedHeader',
        `${vertexCount} packed positions do not fit after ${FormatConstants.hex(offset)} in a ${body.length}-byte body`
      )
    }

    const vertices = new Float64Array(vertexCount * 3)
    for (let i = 0; i < vertexCount; i++) {
      const at = tailStart + i * F.ZIP_VERTEX_STRIDE
      vertices[i * 3] = Quantization.snorm8(body.u8(at + 1))
      vertices[i * 3 + 1] = Quantization.snorm8(body.u8(at + 2))
      vertices[i * 3 + 2] = Quantization.snorm8(body.u8(at + 3))
    }

    const located = IndexLocator.locate(body, {
      start: offset,
      end: tailStart,
      vertexCount,
      indexCount,
      ...context.config.indexSearch
    })
    if (!located.ok) return located

    return Outcome.success(
      { vertices, uvs: new Float64Array(vertexCount * 2), indices: located.value.indices },
      `zip-pos/${located.source}`
    )
  }
}
