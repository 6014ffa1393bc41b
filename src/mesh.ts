/**
 * Decoded mesh model
 */

/**
 * Geometry recovered from one `.mesh` file.
 * Never mutated once a strategy has returned it.
 */
export interface DecodedMesh {
  /**
   * Vertex positions as xyz triples
   */
  readonly vertices: Float64Array

  /**
   * Texture coordinates as uv pairs
   */
  readonly uvs: Float64Array

  /**
   * Triangle list; every index is below the vertex count
   */
  readonly indices: Uint32Array
}

/**
 * Utility class for mesh operations
 */
export class MeshUtils {

  static vertexCount(mesh: DecodedMesh): number {
    return mesh.vertices.length / 3
  }

  static uvCount(mesh: DecodedMesh): number {
    return mesh.uvs.length / 2
  }

  static triangleCount(mesh: DecodedMesh): number {
    return Math.floor(mesh.indices.length / 3)
  }

  /**
   * Build a mesh from plain tuples
   */
  static fromTuples(
    vertices: Array<[number, number, number]>,
    uvs: Array<[number, number]>,
    triangles: Array<[number, number, number]>
  ): DecodedMesh {
    return {
      vertices: new Float64Array(vertices.flat()),
      uvs: new Float64Array(uvs.flat()),
      indices: new Uint32Array(triangles.flat())
    }
  }

  /**
   * Triangle `i` as an index triple
   */
  static triangle(mesh: DecodedMesh, i: number): [number, number, number] {
    const base = i * 3
    return [mesh.indices[base], mesh.indices[base + 1], mesh.indices[base + 2]]
  }

  /**
   * Largest index referenced by the mesh, or -1 when it has none
   */
  static maxIndex(mesh: DecodedMesh): number {
    let max = -1
    for (const index of mesh.indices) {
      if (index > max) max = index
    }
    return max
  }
}
