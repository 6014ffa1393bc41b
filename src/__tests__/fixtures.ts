/**
 * In-process builders for `.mesh` test assets
 */

import { DEFAULT_DECODER_CONFIG } from '../config'
import { Outcome, type ParseOutcome } from '../errors'
import type { Logger, LogLevel } from '../logger'
import type { Decompressor } from '../lz4'
import type { DecodePlan } from '../sniffer'
import type { DecodeContext } from '../strategies/strategy'
import type { Vec2, Vec3 } from '../types'

/**
 * Growable little-endian byte buffer written at absolute offsets
 */
export class BufferBuilder {
  private data: Uint8Array
  private size: number

  constructor(size = 0) {
    this.data = new Uint8Array(Math.max(size, 64))
    this.size = size
  }

  private view(offset: number, width: number): DataView {
    const end = offset + width
    if (end > this.data.length) {
      const grown = new Uint8Array(Math.max(end, this.data.length * 2))
      grown.set(this.data)
      this.data = grown
    }
    this.size = Math.max(this.size, end)
    return new DataView(this.data.buffer, offset, width)
  }

  u8(offset: number, value: number): this {
    this.view(offset, 1).setUint8(0, value)
    return this
  }

  u16(offset: number, value: number): this {
    this.view(offset, 2).setUint16(0, value, true)
    return this
  }

  u32(offset: number, value: number): this {
    this.view(offset, 4).setUint32(0, value, true)
    return this
  }

  i32(offset: number, value: number): this {
    this.view(offset, 4).setInt32(0, value, true)
    return this
  }

  f32(offset: number, value: number): this {
    this.view(offset, 4).setFloat32(0, value, true)
    return this
  }

  u16s(offset: number, values: number[]): this {
    values.forEach((value, i) => this.u16(offset + i * 2, value))
    return this
  }

  bytes(offset: number, values: ArrayLike<number>): this {
    this.view(offset, values.length)
    this.data.set(Array.from(values), offset)
    return this
  }

  build(): Uint8Array {
    return this.data.slice(0, this.size)
  }
}

function pushLength(out: number[], extra: number): void {
  let rest = extra
  while (rest >= 255) {
    out.push(255)
    rest -= 255
  }
  out.push(rest)
}

/**
 * LZ4 block made of a single literal run
 */
export function lz4Literals(data: Uint8Array): Uint8Array {
  const out: number[] = [Math.min(data.length, 15) << 4]
  if (data.length >= 15) pushLength(out, data.length - 15)
  return new Uint8Array([...out, ...data])
}

/**
 * LZ4 block encoder that only emits offset-1 matches for runs of a repeated byte
 */
export function lz4Compress(data: Uint8Array): Uint8Array {
  const out: number[] = []
  let literalStart = 0

  const emit = (literalEnd: number, matchLength: number): void => {
    const literalLength = literalEnd - literalStart
    const matchCode = matchLength - 4
    out.push((Math.min(literalLength, 15) << 4) | (matchLength > 0 ? Math.min(matchCode, 15) : 0))
    if (literalLength >= 15) pushLength(out, literalLength - 15)
    for (let k = literalStart; k < literalEnd; k++) out.push(data[k])
    if (matchLength > 0) {
      out.push(1, 0)
      if (matchCode >= 15) pushLength(out, matchCode - 15)
    }
  }

  let i = 1
  while (i < data.length) {
    let run = 0
    while (i + run < data.length && data[i + run] === data[i - 1]) run++
    if (run >= 4) {
      emit(i, run)
      i += run
      literalStart = i
    } else {
      i++
    }
  }
  emit(data.length, 0)
  return new Uint8Array(out)
}

/**
 * Decompressor stand-in answering every call with `respond`
 */
export class FakeDecompressor implements Decompressor {
  readonly calls: Array<{ compressedLength: number; expectedLength: number }> = []

  constructor(private readonly respond: (input: Uint8Array, expectedLength: number) => ParseOutcome<Uint8Array>) { }

  decompress(input: Uint8Array, compressedLength: number, expectedLength: number): ParseOutcome<Uint8Array> {
    this.calls.push({ compressedLength, expectedLength })
    return this.respond(input, expectedLength)
  }

  /**
   * Always returns `body`
   */
  static returning(body: Uint8Array): FakeDecompressor {
    return new FakeDecompressor(() => Outcome.success(body, 'fake'))
  }

  static failing(message = 'fake codec failure'): FakeDecompressor {
    return new FakeDecompressor(() => Outcome.failure('DecompressionFailure', message))
  }
}

/**
 * Logger keeping every message for assertions
 */
export class RecordingLogger implements Logger {
  readonly messages: Array<{ level: Exclude<LogLevel, 'silent'>; message: string }> = []

  debug(message: string): void {
    this.messages.push({ level: 'debug', message })
  }

  info(message: string): void {
    this.messages.push({ level: 'info', message })
  }

  warn(message: string): void {
    this.messages.push({ level: 'warn', message })
  }

  error(message: string): void {
    this.messages.push({ level: 'error', message })
  }

  at(level: Exclude<LogLevel, 'silent'>): string[] {
    return this.messages.filter(entry => entry.level === level).map(entry => entry.message)
  }
}

export const HALF = {
  ZERO: 0x0000,
  QUARTER: 0x3400,
  HALF: 0x3800,
  ONE: 0x3c00
} as const

/**
 * A right triangle: (0,0,0), (1,0,0), (0,1,0)
 */
export const TRIANGLE: Vec3[] = [[0, 0, 0], [1, 0, 0], [0, 1, 0]]

export interface FmtMeshBodySpec {
  vertices: Vec3[]

  /**
   * Raw half-float pairs, one per UV record
   */
  uvs: Vec2[]

  /**
   * Stored as u16
   */
  indices: number[]

  /**
   * Written to the UV count field, defaults to uvs.length
   */
  uvCount?: number
  bones?: boolean
}

/**
 * Decompressed fmt_mesh body using the classic layout
 */
export function fmtMeshBody(spec: FmtMeshBodySpec): Uint8Array {
  const vc = spec.vertices.length
  const b = new BufferBuilder(179)
    .u32(116, vc)
    .u32(120, spec.indices.length)
    .u32(128, spec.uvCount ?? spec.uvs.length)

  let offset = 179
  spec.vertices.forEach(([x, y, z], i) => {
    b.f32(offset + i * 16, x).f32(offset + i * 16 + 4, y).f32(offset + i * 16 + 8, z).f32(offset + i * 16 + 12, 1)
  })
  offset += vc * 16
  b.bytes(offset, new Uint8Array(vc * 4).fill(0xee))
  offset += vc * 4
  spec.uvs.forEach(([u, v], i) => {
    b.u16(offset + i * 16, u).u16(offset + i * 16 + 2, v).bytes(offset + i * 16 + 4, new Uint8Array(12))
  })
  offset += spec.uvs.length * 16
  if (spec.bones) {
    b.bytes(offset, new Uint8Array(vc * 8).fill(0xff))
    offset += vc * 8
  }
  return b.u16s(offset, spec.indices).build()
}

/**
 * Decompressed fmt_mesh body using the ZipPos layout
 *
 * @param positions Raw (x, y, z) bytes per vertex
 */
export function fmtMeshZipBody(positions: Vec3[], indices: number[], bones = false): Uint8Array {
  const vc = positions.length
  let offset = 179
  const b = new BufferBuilder(offset).u32(116, vc).u32(120, indices.length)
  if (bones) {
    b.bytes(offset, new Uint8Array(vc * 8).fill(0xff))
    offset += vc * 8
  }
  b.u16s(offset, indices)
  offset += indices.length * 2
  positions.forEach(([x, y, z], i) => b.bytes(offset + i * 4, [0x7f, x, y, z]))
  return b.build()
}

/**
 * Signature-prefixed container around an fmt_mesh body
 *
 * @param boneCount Bone records to append after the payload; sets the bone flag
 */
export function fmtMeshFile(body: Uint8Array, boneCount?: number): Uint8Array {
  const block = lz4Compress(body)
  const b = new BufferBuilder(0x5a)
    .bytes(0, [0x1f, 0x00, 0x00, 0x00])
    .u32(0x48, 1)
    .u16(0x4c, boneCount === undefined ? 0 : 1)
    .u32(0x52, block.length)
    .u32(0x56, body.length)
    .bytes(0x5a, block)
  if (boneCount !== undefined) {
    const boneBlock = 0x5a + block.length
    b.u32(boneBlock + 68, boneCount)
      .bytes(boneBlock + 85, new Uint8Array(boneCount * 132))
  }
  return b.build()
}

export interface QuantizedBodySpec {
  min: Vec3

  /**
   * The old layout stores no z range and reuses y
   */
  range: Vec3

  /**
   * u16 triples
   */
  raw: Vec3[]

  /**
   * u16 pairs
   */
  uvs: Vec2[]

  /**
   * Stored as u16
   */
  indices: number[]
}

function quantizedTail(b: BufferBuilder, start: number, spec: QuantizedBodySpec): Uint8Array {
  let offset = start
  spec.raw.forEach(([x, y, z], i) => b.u16s(offset + i * 6, [x, y, z]))
  offset += spec.raw.length * 6
  spec.uvs.forEach(([u, v], i) => b.u16s(offset + i * 4, [u, v]))
  offset += spec.raw.length * 4
  return b.u16s(offset, spec.indices).build()
}

/**
 * Compressed-model body with counts at 0x74/0x78 and vertices at 0x7c
 */
export function oldLayoutBody(spec: QuantizedBodySpec): Uint8Array {
  const b = new BufferBuilder(0x7c)
    .f32(0x60, spec.min[0]).f32(0x64, spec.min[1]).f32(0x68, spec.min[2])
    .f32(0x6c, spec.range[0]).f32(0x70, spec.range[1])
    .i32(0x74, spec.raw.length)
    .i32(0x78, spec.indices.length)
  return quantizedTail(b, 0x7c, spec)
}

/**
 * Compressed-model body with counts at 0x34/0x38 and vertices at 0x60
 */
export function newLayoutBody(spec: QuantizedBodySpec): Uint8Array {
  const b = new BufferBuilder(0x60)
    .i32(0x34, spec.raw.length)
    .i32(0x38, spec.indices.length)
    .f32(0x40, spec.min[0]).f32(0x44, spec.min[1]).f32(0x48, spec.min[2])
    .f32(0x4c, spec.range[0]).f32(0x50, spec.range[1]).f32(0x54, spec.range[2])
  return quantizedTail(b, 0x60, spec)
}

/**
 * Compressed-model ZipPos body: indices from 0x7c, then u16 UV pairs,
 * then 4-byte position records at the end
 */
export function zipPosBody(positions: Vec3[], uvs: Vec2[], indices: number[]): Uint8Array {
  const shared = positions.length
  const b = new BufferBuilder(0x7c).i32(0x74, shared).i32(0x78, indices.length).u16s(0x7c, indices)
  let offset = 0x7c + indices.length * 2
  uvs.forEach(([u, v], i) => b.u16s(offset + i * 4, [u, v]))
  offset += shared * 4
  positions.forEach(([x, y, z], i) => b.bytes(offset + i * 4, [0, x, y, z]))
  return b.build()
}

/**
 * Unsigned container with 32-bit sizes at 0x52/0x56 and the payload at 0x5a
 */
export function compressedFile(body: Uint8Array, block: Uint8Array = lz4Compress(body)): Uint8Array {
  return new BufferBuilder(0x5a)
    .i32(0x52, block.length)
    .i32(0x56, body.length)
    .bytes(0x5a, block)
    .build()
}

/**
 * Uncompressed padded layout: counts at the given offsets, 16-byte vertex and
 * UV records from 0xb3, u16 indices after the UVs
 *
 * @param uvs Raw half-float pairs
 */
export function paddedRawFile(
  vertices: Vec3[],
  uvs: Vec2[],
  indices: number[],
  counts: { shared: number; total: number } = { shared: 0x74, total: 0x78 }
): BufferBuilder {
  const b = new BufferBuilder(0xb3)
    .i32(counts.shared, vertices.length)
    .i32(counts.total, indices.length)
  let offset = 0xb3
  vertices.forEach(([x, y, z], i) => b.f32(offset + i * 16, x).f32(offset + i * 16 + 4, y).f32(offset + i * 16 + 8, z).f32(offset + i * 16 + 12, 0))
  offset += vertices.length * 16
  uvs.forEach(([u, v], i) => b.bytes(offset + i * 16, new Uint8Array(16)).u16(offset + i * 16 + 4, u).u16(offset + i * 16 + 6, v))
  offset += vertices.length * 16
  return b.u16s(offset, indices)
}

/**
 * Uncompressed packed layout: f32 x3 vertices and f32 x2 UVs from 0xb3
 */
export function packedRawFile(vertices: Vec3[], uvs: Vec2[], indices: number[]): BufferBuilder {
  const b = new BufferBuilder(0xb3).i32(0x74, vertices.length).i32(0x78, indices.length)
  let offset = 0xb3
  vertices.forEach(([x, y, z], i) => b.f32(offset + i * 12, x).f32(offset + i * 12 + 4, y).f32(offset + i * 12 + 8, z))
  offset += vertices.length * 12
  uvs.forEach(([u, v], i) => b.f32(offset + i * 8, u).f32(offset + i * 8 + 4, v))
  offset += vertices.length * 8
  return b.u16s(offset, indices)
}

/**
 * Plan with no signature and no compression signal
 */
export function plainPlan(overrides: Partial<DecodePlan> = {}): DecodePlan {
  return {
    modelName: 'model',
    signature: false,
    compressed: false,
    zipPositions: false,
    flagSource: 'none',
    steps: [],
    ...overrides
  }
}

/**
 * Strategy context around raw bytes
 */
export function contextFor(bytes: Uint8Array, overrides: Partial<DecodeContext> = {}): DecodeContext {
  return {
    asset: { bytes, filename: 'model.mesh' },
    plan: plainPlan(),
    config: DEFAULT_DECODER_CONFIG,
    decompressor: FakeDecompressor.failing(),
    logger: new RecordingLogger(),
    forced: false,
    ...overrides
  }
}
