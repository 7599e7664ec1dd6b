import type { DecodeContext } from './context'
import type { MaterialDef, SceneGraph, SceneMesh, SceneNode } from './types'

function flattenMaterials(ctx: DecodeContext): MaterialDef[] {
  const slots = new Array<MaterialDef | undefined>(ctx.materialCount).fill(undefined)
  for (const group of ctx.declaredGroups) {
    for (const entry of group.entries) slots[entry.globalIndex] = entry.material
  }
  // Every global index was handed out to exactly one entry.
  return slots.filter((material): material is MaterialDef => material !== undefined)
}

/**
 * Turn the accumulated decode state into one scene graph: a synthetic root
 * with a child per object, meshes appended in object order, and materials at
 * their global index.
 */
export function assembleScene(ctx: DecodeContext): SceneGraph {
  const root: SceneNode = { name: ctx.options.rootName, meshes: [], children: [] }
  const meshes: SceneMesh[] = []

  for (const object of ctx.objects) {
    const slots = object.meshes.map((handle) => {
      meshes.push(ctx.meshes[handle])
      return meshes.length - 1
    })
    root.children.push({ name: object.id, meshes: slots, children: [] })
  }

  return {
    root,
    meshes,
    materials: flattenMaterials(ctx),
    metadata: [...ctx.metadata],
  }
}
