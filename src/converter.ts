import * as THREE from 'three';
import { type DecodedMesh, MeshUtils } from './mesh';

/**
 * Options for converting a decoded mesh to a preview geometry
 */
export interface ConvertOptions {
  /**
   * Scale and center the vertices into a unit cube
   * @default false
   */
  normalize?: boolean;

  /**
   * @default true
   */
  computeNormals?: boolean;
}

/**
 * Converts a decoded mesh to an indexed THREE.js BufferGeometry
 *
 * @param mesh The decoded mesh data
 * @param options Options for the conversion
 * @returns THREE.js BufferGeometry
 */
export function convertToBufferGeometry(
  mesh: DecodedMesh,
  options: ConvertOptions = {}
): THREE.BufferGeometry {
  const geometry = new THREE.BufferGeometry();

  const opts = {
    normalize: false,
    computeNormals: true,
    ...options
  };

  // three takes 32-bit positions
  const positions = opts.normalize ? normalizeVertices(mesh.vertices) : new Float32Array(mesh.vertices);
  geometry.setAttribute('position', new THREE.BufferAttribute(positions, 3));

  if (mesh.indices.length > 0) {
    geometry.setIndex(new THREE.BufferAttribute(mesh.indices, 1));
  }

  // three expects one uv per vertex
  if (MeshUtils.uvCount(mesh) === MeshUtils.vertexCount(mesh)) {
    geometry.setAttribute('uv', new THREE.BufferAttribute(new Float32Array(mesh.uvs), 2));
  }

  if (opts.computeNormals) {
    geometry.computeVertexNormals();
  }

  return geometry;
}

/**
 * Normalizes vertices to fit within a unit cube centered at the origin
 *
 * @returns A new array; the input is left untouched
 */
export function normalizeVertices(vertices: ArrayLike<number>): Float32Array {
  let minX = Infinity, minY = Infinity, minZ = Infinity;
  let maxX = -Infinity, maxY = -Infinity, maxZ = -Infinity;

  for (let i = 0; i < vertices.length; i += 3) {
    minX = Math.min(minX, vertices[i]);
    minY = Math.min(minY, vertices[i + 1]);
    minZ = Math.min(minZ, vertices[i + 2]);
    maxX = Math.max(maxX, vertices[i]);
    maxY = Math.max(maxY, vertices[i + 1]);
    maxZ = Math.max(maxZ, vertices[i + 2]);
  }

  const centerX = (minX + maxX) / 2;
  const centerY = (minY + maxY) / 2;
  const centerZ = (minZ + maxZ) / 2;

  // a single point keeps its scale
  const maxSize = Math.max(maxX - minX, maxY - minY, maxZ - minZ) || 1;

  const normalized = new Float32Array(vertices.length);
  for (let i = 0; i < vertices.length; i += 3) {
    normalized[i] = (vertices[i] - centerX) / maxSize;
    normalized[i + 1] = (vertices[i + 1] - centerY) / maxSize;
    normalized[i + 2] = (vertices[i + 2] - centerZ) / maxSize;
  }

  return normalized;
}
