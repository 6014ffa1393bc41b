import type { FailureReason } from './errors'
import { type DecodedMesh, MeshUtils } from './mesh'

/**
 * Summary counts reported for a finalized mesh
 */
export interface SanitizeStats {
  vertexCount: number
  uvCount: number
  totalTriangles: number
  validTriangles: number
  droppedTriangles: number
}

export interface SanitizedMesh {
  mesh: DecodedMesh
  stats: SanitizeStats
}

/**
 * Post-processing applied to the winning strategy's mesh
 */
export class MeshSanitizer {

  /**
   * Two or more equal indices: zero area
   */
  static isDegenerate(a: number, b: number, c: number): boolean {
    return a === b || b === c || a === c
  }

  /**
   * Drop degenerate triangles. Never fails; an empty result is reportable.
   *
   * @returns A new mesh sharing the vertex and UV arrays, with its statistics
   */
  static sanitize(mesh: DecodedMesh): SanitizedMesh {
    const totalTriangles = MeshUtils.triangleCount(mesh)
    const kept: number[] = []
    for (let i = 0; i < totalTriangles; i++) {
      const [a, b, c] = MeshUtils.triangle(mesh, i)
      if (!MeshSanitizer.isDegenerate(a, b, c)) {
        kept.push(a, b, c)
      }
    }
    const validTriangles = kept.length / 3

    return {
      mesh: {
        vertices: mesh.vertices,
        uvs: mesh.uvs,
        indices: new Uint32Array(kept)
      },
      stats: {
        vertexCount: MeshUtils.vertexCount(mesh),
        uvCount: MeshUtils.uvCount(mesh),
        totalTriangles,
        validTriangles,
        droppedTriangles: totalTriangles - validTriangles
      }
    }
  }

  /**
   * Structural check applied before a strategy's mesh is accepted
   *
   * @returns undefined when the mesh is valid
   */
  static validate(mesh: DecodedMesh): FailureReason | undefined {
    const vertexCount = MeshUtils.vertexCount(mesh)
    if (vertexCount === 0 || !Number.isInteger(vertexCount)) {
      return { kind: 'UnsupportedHeader', message: `invalid vertex array of ${mesh.vertices.length} floats` }
    }
    if (mesh.indices.length === 0 || mesh.indices.length % 3 !== 0) {
      return { kind: 'IndexRegionNotFound', message: `index count ${mesh.indices.length} is not a positive multiple of three` }
    }
    const maxIndex = MeshUtils.maxIndex(mesh)
    if (maxIndex >= vertexCount) {
      return { kind: 'IndexRegionNotFound', message: `index ${maxIndex} out of range for ${vertexCount} vertices` }
    }
    return undefined
  }
}
