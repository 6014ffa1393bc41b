import { describe, it, expect } from 'vitest'
import { MeshUtils } from '../mesh'
import { ObjWriter } from '../obj-writer'
import { TRIANGLE } from './fixtures'

describe('ObjWriter', () => {
  it('writes vertices, texture coordinates and 1-based faces', () => {
    const mesh = MeshUtils.fromTuples(TRIANGLE, [[0, 0], [1, 0], [0, 1]], [[0, 1, 2]])
    expect(ObjWriter.serialize(mesh)).toBe(
      'v 0.000000 0.000000 0.000000\n' +
      'v 1.000000 0.000000 0.000000\n' +
      'v 0.000000 1.000000 0.000000\n' +
      'vt 0.000000 0.000000\n' +
      'vt 1.000000 0.000000\n' +
      'vt 0.000000 1.000000\n' +
      'f 1/1 2/2 3/3\n'
    )
  })

  it('omits texture references when the mesh has no UVs', () => {
    const mesh = MeshUtils.fromTuples(TRIANGLE, [], [[2, 1, 0]])
    expect(ObjWriter.serialize(mesh).split('\n').slice(-2)).toEqual(['f 3 2 1', ''])
  })

  it('omits texture references when there are fewer UVs than vertices', () => {
    const mesh = MeshUtils.fromTuples(TRIANGLE, [[0.5, 0.5]], [[0, 1, 2]])
    const lines = ObjWriter.serialize(mesh).trimEnd().split('\n')
    expect(lines).toContain('vt 0.500000 0.500000')
    expect(lines[lines.length - 1]).toBe('f 1 2 3')
  })

  it('prefixes header lines as comments', () => {
    const mesh = MeshUtils.fromTuples(TRIANGLE, [], [[0, 1, 2]])
    expect(ObjWriter.serialize(mesh, 'rock.mesh\nheuristic').startsWith('# rock.mesh\n# heuristic\nv ')).toBe(true)
  })

  it('formats numbers with six decimals', () => {
    expect(ObjWriter.formatNumber(0.1234567)).toBe('0.123457')
    expect(ObjWriter.formatNumber(-2.5)).toBe('-2.500000')
    expect(ObjWriter.formatNumber(Math.fround(0.1))).toBe('0.100000')
  })

  it('rounds exact decimal ties to even like printf', () => {
    // 1/128 and 3/128 are exact doubles ending in ...5 at the seventh decimal
    expect(ObjWriter.formatNumber(0.0078125)).toBe('0.007812')
    expect(ObjWriter.formatNumber(-0.0078125)).toBe('-0.007812')
    expect(ObjWriter.formatNumber(1.0078125)).toBe('1.007812')
    expect(ObjWriter.formatNumber(0.0234375)).toBe('0.023438')
    expect(ObjWriter.formatNumber(-0.0234375)).toBe('-0.023438')
  })

  it('writes large magnitudes without exponent notation', () => {
    expect(ObjWriter.formatNumber(1e21)).toBe('1000000000000000000000.000000')
    expect(ObjWriter.formatNumber(-(2 ** 70))).toBe('-1180591620717411303424.000000')
  })

  it('keeps the sign of negative zero and spells non-finite values', () => {
    expect(ObjWriter.formatNumber(-0)).toBe('-0.000000')
    expect(ObjWriter.formatNumber(NaN)).toBe('nan')
    expect(ObjWriter.formatNumber(Infinity)).toBe('inf')
    expect(ObjWriter.formatNumber(-Infinity)).toBe('-inf')
  })
})
