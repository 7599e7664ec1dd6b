import type { DecodeContext, DecodedObject } from './context'
import { readBaseMaterials, readColorGroup } from './materials'
import { readMesh } from './mesh'
import { childElements, localName, readAttribute, toInt } from './xml'

// ---------------------------------------------------------------------------
// Resource classification
// ---------------------------------------------------------------------------

/** A direct child of `<resources>`, tagged by the element kinds the decoder knows. */
export type ResourceElement =
  | { kind: 'object'; elem: Element }
  | { kind: 'basematerials'; elem: Element }
  | { kind: 'colorgroup'; elem: Element }
  | { kind: 'metadata'; elem: Element }
  | { kind: 'build'; elem: Element }
  | { kind: 'unknown'; tag: string; elem: Element }

export function classifyResource(elem: Element): ResourceElement {
  const tag = localName(elem)
  switch (tag) {
    case 'object':
      return { kind: 'object', elem }
    case 'basematerials':
      return { kind: 'basematerials', elem }
    case 'colorgroup':
      return { kind: 'colorgroup', elem }
    case 'metadata':
      return { kind: 'metadata', elem }
    case 'build':
      return { kind: 'build', elem }
    default:
      return { kind: 'unknown', tag, elem }
  }
}

function isMaterialGroup(resource: ResourceElement): boolean {
  return resource.kind === 'basematerials' || resource.kind === 'colorgroup'
}

// ---------------------------------------------------------------------------
// Readers
// ---------------------------------------------------------------------------

/** Append a `<metadata name="...">` entry. Entries without a name are dropped. */
export function readMetadata(elem: Element, ctx: DecodeContext): void {
  const name = readAttribute(elem, 'name') ?? ''
  if (!name) return
  ctx.metadata.push({ name, value: elem.textContent ?? '' })
}

/**
 * Read an `<object>` and its meshes. Objects without an id produce nothing,
 * not even meshes.
 */
export function readObject(elem: Element, ctx: DecodeContext): DecodedObject | undefined {
  const id = readAttribute(elem, 'id') ?? ''
  if (!id) {
    ctx.debug('Skipping object without id')
    return undefined
  }

  let materialIndex: number | null = null
  const pid = readAttribute(elem, 'pid')
  const pindex = readAttribute(elem, 'pindex')
  if (pid !== undefined && pindex !== undefined) {
    materialIndex = ctx.resolveMaterial(toInt(pid), toInt(pindex))
    if (materialIndex !== null) {
      ctx.debug(`Set material ${materialIndex} from pid ${pid} and pindex ${pindex} on object ${id}`)
    } else {
      ctx.debug(`Unresolved object material pid=${pid} pindex=${pindex} on object ${id}`)
    }
  }

  const meshes: number[] = []
  for (const child of childElements(elem)) {
    if (localName(child) !== 'mesh') continue
    meshes.push(ctx.addMesh(readMesh(child, ctx, id, materialIndex)))
  }

  return { id, meshes }
}

// ---------------------------------------------------------------------------
// Walk
// ---------------------------------------------------------------------------

function visitResource(resource: ResourceElement, ctx: DecodeContext): void {
  switch (resource.kind) {
    case 'object': {
      const object = readObject(resource.elem, ctx)
      if (object) ctx.objects.push(object)
      break
    }
    case 'basematerials':
      readBaseMaterials(resource.elem, ctx)
      break
    case 'colorgroup':
      readColorGroup(resource.elem, ctx)
      break
    case 'metadata':
      readMetadata(resource.elem, ctx)
      break
    case 'build':
      break
    case 'unknown':
      ctx.debug(`Ignoring unsupported resource <${resource.tag}>`)
      break
    default: {
      const unreachable: never = resource
      return unreachable
    }
  }
}

/**
 * Dispatch every child of `<resources>`. With forward-reference resolution on,
 * material groups are read first so objects can reference groups declared
 * after them; otherwise everything is visited strictly in document order.
 */
export function walkResources(resources: Element, ctx: DecodeContext): void {
  const entries = childElements(resources).map(classifyResource)

  if (!ctx.options.resolveForwardReferences) {
    for (const entry of entries) visitResource(entry, ctx)
    return
  }

  for (const entry of entries) {
    if (isMaterialGroup(entry)) visitResource(entry, ctx)
  }
  for (const entry of entries) {
    if (!isMaterialGroup(entry)) visitResource(entry, ctx)
  }
}

/** Walk `<model>`: its own `<metadata>` children and the first `<resources>`. */
export function walkModel(model: Element, ctx: DecodeContext): void {
  let resourcesSeen = false
  for (const child of childElements(model)) {
    const tag = localName(child)
    if (tag === 'metadata') {
      readMetadata(child, ctx)
    } else if (tag === 'resources' && !resourcesSeen) {
      resourcesSeen = true
      walkResources(child, ctx)
    }
  }
  if (!resourcesSeen) ctx.debug('Model has no <resources> element')
}
