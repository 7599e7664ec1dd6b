import type { DecodeContext } from './context'
import { childElements, localName, readAttribute, toFloat, toInt } from './xml'
import type { ParsedTriangle, SceneMesh, Vertex } from './types'

// ---------------------------------------------------------------------------
// Mesh Parsing
// ---------------------------------------------------------------------------

function readVertex(elem: Element): Vertex {
  return {
    x: toFloat(readAttribute(elem, 'x')),
    y: toFloat(readAttribute(elem, 'y')),
    z: toFloat(readAttribute(elem, 'z')),
  }
}

function readVertices(elem: Element, mesh: SceneMesh): void {
  for (const v of childElements(elem)) {
    if (localName(v) === 'vertex') mesh.vertices.push(readVertex(v))
  }
}

function readTriangles(elem: Element, mesh: SceneMesh, ctx: DecodeContext): void {
  for (const t of childElements(elem)) {
    if (localName(t) !== 'triangle') continue

    const triangle: ParsedTriangle = {
      v1: toInt(readAttribute(t, 'v1')),
      v2: toInt(readAttribute(t, 'v2')),
      v3: toInt(readAttribute(t, 'v3')),
    }

    const pid = readAttribute(t, 'pid')
    const p1 = readAttribute(t, 'p1')
    if (pid !== undefined && p1 !== undefined) {
      triangle.materialRef = { pid: toInt(pid), index: toInt(p1) }
      const materialIndex = ctx.resolveMaterial(triangle.materialRef.pid, triangle.materialRef.index)
      // One material per mesh: the last resolvable triangle decides it.
      if (materialIndex !== null) {
        mesh.materialIndex = materialIndex
      } else {
        ctx.debug(`Unresolved triangle material pid=${pid} p1=${p1} in mesh ${mesh.name}`)
      }
    }

    mesh.faces.push(triangle)
  }
}

/**
 * Read one `<mesh>`. `materialIndex` is the owning object's resolved default
 * and is applied before any triangle is visited.
 */
export function readMesh(
  elem: Element,
  ctx: DecodeContext,
  name: string,
  materialIndex: number | null,
): SceneMesh {
  const mesh: SceneMesh = { name, vertices: [], faces: [], materialIndex }

  for (const child of childElements(elem)) {
    switch (localName(child)) {
      case 'vertices':
        readVertices(child, mesh)
        break
      case 'triangles':
        readTriangles(child, mesh, ctx)
        break
    }
  }

  return mesh
}
