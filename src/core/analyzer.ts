import { BufferAttribute, BufferGeometry, Vector3 } from 'three'
import type { BoundingBox, SceneMesh } from './types'

/**
 * Build an indexed `BufferGeometry` from a decoded mesh, with vertex normals.
 */
export function toBufferGeometry(mesh: SceneMesh): BufferGeometry {
  const positions = new Float32Array(mesh.vertices.length * 3)
  mesh.vertices.forEach((v, i) => {
    positions[i * 3] = v.x
    positions[i * 3 + 1] = v.y
    positions[i * 3 + 2] = v.z
  })

  const indices = new Uint32Array(mesh.faces.length * 3)
  mesh.faces.forEach((f, i) => {
    indices[i * 3] = f.v1
    indices[i * 3 + 1] = f.v2
    indices[i * 3 + 2] = f.v3
  })

  const geometry = new BufferGeometry()
  geometry.setAttribute('position', new BufferAttribute(positions, 3))
  geometry.setIndex(new BufferAttribute(indices, 1))
  if (mesh.faces.length > 0) geometry.computeVertexNormals()
  return geometry
}

/**
 * Volume of a mesh using the signed-tetrahedron method.
 * Faces that point outside the vertex list are skipped.
 * @returns Volume in cm³ (assumes model units are mm).
 */
export function calculateVolume(mesh: SceneMesh): number {
  const { vertices } = mesh
  const point = (i: number): Vector3 | null => {
    const v = i >= 0 && i < vertices.length ? vertices[i] : undefined
    return v ? new Vector3(v.x, v.y, v.z) : null
  }

  let volume = 0
  for (const face of mesh.faces) {
    const p1 = point(face.v1)
    const p2 = point(face.v2)
    const p3 = point(face.v3)
    if (!p1 || !p2 || !p3) continue
    volume += signedVolumeOfTriangle(p1, p2, p3)
  }

  // mm³ → cm³
  return Math.abs(volume) / 1000
}

function signedVolumeOfTriangle(p1: Vector3, p2: Vector3, p3: Vector3): number {
  return p1.dot(p2.cross(p3)) / 6.0
}

/**
 * Calculate bounding-box dimensions.
 * @returns { x, y, z } in mm.
 */
export function calculateBoundingBox(mesh: SceneMesh): BoundingBox {
  const geometry = toBufferGeometry(mesh)
  geometry.computeBoundingBox()
  const box = geometry.boundingBox
  if (!box) throw new Error('Failed to compute bounding box')
  const size = new Vector3()
  box.getSize(size)
  geometry.dispose()
  return {
    x: Number(size.x.toFixed(2)),
    y: Number(size.y.toFixed(2)),
    z: Number(size.z.toFixed(2)),
  }
}
