import { describe, it, expect } from 'vitest'
import { Lz4BlockDecompressor } from '../lz4'
import { HeuristicStrategy } from '../strategies/heuristic'
import {
  BufferBuilder,
  FakeDecompressor,
  HALF,
  RecordingLogger,
  TRIANGLE,
  contextFor,
  packedRawFile,
  paddedRawFile
} from './fixtures'

const strategy = new HeuristicStrategy()
const decompressor = new Lz4BlockDecompressor()
const HALF_UVS: Array<[number, number]> = [[HALF.ZERO, HALF.ZERO], [HALF.ONE, HALF.ZERO], [HALF.ZERO, HALF.ONE]]

describe('HeuristicStrategy', () => {
  it('decodes the padded layout from the raw file', () => {
    const file = paddedRawFile(TRIANGLE, HALF_UVS, [0, 1, 2]).build()
    const outcome = strategy.decode(contextFor(file, { decompressor }))

    expect(outcome.ok).toBe(true)
    if (!outcome.ok) return
    expect(outcome.source).toBe('raw/padded@0x74/indices@0x113:u16')
    expect(Array.from(outcome.value.vertices)).toEqual([0, 0, 0, 1, 0, 0, 0, 1, 0])
    expect(Array.from(outcome.value.uvs)).toEqual([0, 0, 1, 0, 0, 1])
    expect(Array.from(outcome.value.indices)).toEqual([0, 1, 2])
  })

  it('tries the packed layout after every padded candidate', () => {
    const file = packedRawFile(TRIANGLE, [[0, 0], [1, 0], [0, 1]], [0, 1, 2]).build()
    const outcome = strategy.decode(contextFor(file, { decompressor }))

    expect(outcome.ok).toBe(true)
    if (!outcome.ok) return
    expect(outcome.source).toBe('raw/packed@0x74/indices@0xef:u16')
    expect(Array.from(outcome.value.uvs)).toEqual([0, 0, 1, 0, 0, 1])
  })

  it('rejects an implausible count and moves to the next pair', () => {
    const file = paddedRawFile(TRIANGLE, HALF_UVS, [0, 1, 2], { shared: 0x78, total: 0x7c })
      .i32(0x74, 10_000_000)
      .build()
    const logger = new RecordingLogger()
    const outcome = strategy.decode(contextFor(file, { decompressor, logger }))

    expect(outcome.ok && outcome.source).toBe('raw/padded@0x78/indices@0x113:u16')
    expect(logger.at('debug')).toContain('heuristic: raw padded@0x74: implausible counts shared=10000000 total=3')
  })

  it('probes the bodies of known containers after the raw file', () => {
    const body = paddedRawFile(TRIANGLE, HALF_UVS, [0, 1, 2]).build()
    const file = new BufferBuilder(0x62).i32(0x52, 8).i32(0x56, body.length).build()
    const fake = FakeDecompressor.returning(body)
    const outcome = strategy.decode(contextFor(file, { decompressor: fake }))

    expect(fake.calls).toEqual([{ compressedLength: 8, expectedLength: body.length }])
    expect(outcome.ok && outcome.source).toBe('lz4@0x5a/padded@0x74/indices@0x113:u16')
  })

  it('skips a container whose payload does not decompress', () => {
    const file = new BufferBuilder(0x62).i32(0x52, 8).i32(0x56, 400).build()
    const logger = new RecordingLogger()
    const outcome = strategy.decode(contextFor(file, { decompressor: FakeDecompressor.failing(), logger }))

    expect(outcome).toEqual({
      ok: false,
      reason: { kind: 'OffsetCandidateExhausted', message: 'no count candidate matched in 1 bodies (8 candidates each)' }
    })
    expect(logger.at('debug')).toContain('heuristic: container @0x5a: fake codec failure')
  })

  it('moves on when the index region is not found', () => {
    const file = paddedRawFile(TRIANGLE, HALF_UVS, [0, 1, 5]).build()
    const outcome = strategy.decode(contextFor(file, { decompressor }))
    expect(!outcome.ok && outcome.reason.kind).toBe('OffsetCandidateExhausted')
  })

  it('yields the raw file first', () => {
    const file = new Uint8Array(0x60)
    const bodies = Array.from(HeuristicStrategy.bodies(contextFor(file)))
    expect(bodies.map(body => body.label)).toEqual(['raw'])
  })
})
