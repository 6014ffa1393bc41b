import { type DecodedMesh, MeshUtils } from './mesh'

/**
 * Wavefront OBJ text output
 */
export class ObjWriter {

  /**
   * Six fixed decimals as C printf `%.6f` prints them: exact ties round to
   * even, and non-finite values are spelled out
   */
  static formatNumber(value: number): string {
    if (Number.isNaN(value)) return 'nan'
    if (value === Infinity) return 'inf'
    if (value === -Infinity) return '-inf'
    // toFixed drops the sign of negative zero
    if (Object.is(value, -0)) return '-0.000000'
    // toFixed switches to exponent notation from 1e21; such doubles are integers
    if (Math.abs(value) >= 1e21) return `${BigInt(value)}.000000`

    // below 2^52 the scaled value is exact whenever it is a tie
    const scaled = Math.abs(value) * 1e6
    if (scaled < 2 ** 52 && scaled % 1 !== 0.5) return value.toFixed(6)
    return ObjWriter.roundHalfToEven(value)
  }

  /**
   * toFixed rounds exact ties away from zero; printf rounds them to even
   */
  private static roundHalfToEven(value: number): string {
    // every double from 5e-7 up has a finite expansion within 100 decimals
    const exact = Math.abs(value).toFixed(100)
    const point = exact.indexOf('.')
    const tie = /^50*$/.test(exact.slice(point + 7))
    if (!tie || Number(exact[point + 6]) % 2 !== 0) return value.toFixed(6)
    return `${value < 0 ? '-' : ''}${exact.slice(0, point + 7)}`
  }

  /**
   * Serialize a mesh as `v`, `vt` and `f` lines with 1-based indices.
   * Faces reference texture coordinates only when every vertex has one.
   */
  static serialize(mesh: DecodedMesh, header?: string): string {
    const lines: string[] = []
    if (header) {
      lines.push(...header.split('\n').map(line => `# ${line}`))
    }

    const { vertices, uvs, indices } = mesh
    for (let i = 0; i < vertices.length; i += 3) {
      lines.push(`v ${ObjWriter.formatNumber(vertices[i])} ${ObjWriter.formatNumber(vertices[i + 1])} ${ObjWriter.formatNumber(vertices[i + 2])}`)
    }
    for (let i = 0; i < uvs.length; i += 2) {
      lines.push(`vt ${ObjWriter.formatNumber(uvs[i])} ${ObjWriter.formatNumber(uvs[i + 1])}`)
    }

    const withUvs = MeshUtils.uvCount(mesh) > 0 && MeshUtils.uvCount(mesh) >= MeshUtils.vertexCount(mesh)
    const corner = (index: number): string => withUvs ? `${index + 1}/${index + 1}` : `${index + 1}`
    for (let i = 0; i + 2 < indices.length; i += 3) {
      lines.push(`f ${corner(indices[i])} ${corner(indices[i + 1])} ${corner(indices[i + 2])}`)
    }

    return lines.map(line => `${line}\n`).join('')
  }
}
