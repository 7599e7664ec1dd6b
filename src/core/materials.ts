import type { DecodeContext, MaterialGroupEntry } from './context'
import { childElements, localName, readAttribute, toInt } from './xml'
import type { MaterialDef, RGBA } from './types'

// ---------------------------------------------------------------------------
// Color helpers
// ---------------------------------------------------------------------------

const HEX_PAIR = /^[0-9a-fA-F]{2}$/

function hexChannel(color: string, offset: number): number {
  const pair = color.substring(offset, offset + 2)
  return HEX_PAIR.test(pair) ? parseInt(pair, 16) / 255 : 0
}

/**
 * Parse a `#RRGGBB` or `#RRGGBBAA` display colour. Alpha is 1 for the short
 * form. Returns `null` for anything else.
 */
export function parseColor(color: string | undefined): RGBA | null {
  if (!color) return null
  if (color.length !== 7 && color.length !== 9) return null
  if (!color.startsWith('#')) return null

  return {
    r: hexChannel(color, 1),
    g: hexChannel(color, 3),
    b: hexChannel(color, 5),
    a: color.length === 9 ? hexChannel(color, 7) : 1,
  }
}

// ---------------------------------------------------------------------------
// Material groups
// ---------------------------------------------------------------------------

function readMaterialDef(base: Element, groupId: number, position: number): MaterialDef {
  const name = readAttribute(base, 'name')
  const material: MaterialDef = {
    name: name !== undefined ? `id${groupId}_${name}` : `id${groupId}_basemat_${position}`,
  }
  const diffuse = parseColor(readAttribute(base, 'displaycolor'))
  if (diffuse) material.diffuseColor = diffuse
  return material
}

/**
 * Read a `<basematerials>` group into the context. Each `<base>` takes the
 * next global material index. A group without an `id` is skipped.
 */
export function readBaseMaterials(elem: Element, ctx: DecodeContext): void {
  const idAttr = readAttribute(elem, 'id')
  if (idAttr === undefined) {
    ctx.debug('Skipping basematerials without id')
    return
  }
  const id = toInt(idAttr)

  const entries: MaterialGroupEntry[] = []
  for (const base of childElements(elem)) {
    if (localName(base) !== 'base') continue
    entries.push({
      globalIndex: ctx.nextMaterialIndex(),
      material: readMaterialDef(base, id, entries.length),
    })
  }

  ctx.defineGroup({ id, kind: 'basematerials', entries })
}

/** Read a `<colorgroup>`; every `<color>` becomes a material with that diffuse colour. */
export function readColorGroup(elem: Element, ctx: DecodeContext): void {
  const idAttr = readAttribute(elem, 'id')
  if (idAttr === undefined) {
    ctx.debug('Skipping colorgroup without id')
    return
  }
  const id = toInt(idAttr)

  const entries: MaterialGroupEntry[] = []
  for (const colorElem of childElements(elem)) {
    if (localName(colorElem) !== 'color') continue
    const material: MaterialDef = { name: `id${id}_color_${entries.length}` }
    const diffuse = parseColor(readAttribute(colorElem, 'color'))
    if (diffuse) material.diffuseColor = diffuse
    entries.push({ globalIndex: ctx.nextMaterialIndex(), material })
  }

  ctx.defineGroup({ id, kind: 'colorgroup', entries })
}
