/**
 * 3MF model decoder.
 *
 * Reads the `<model>` part of a 3MF package into a {@link SceneGraph}:
 *  1. `<metadata>` on the model and inside `<resources>`
 *  2. `<basematerials>` / `<colorgroup>` groups, numbered with one global
 *     material counter in declaration order
 *  3. `<object>` meshes, with object- and triangle-level `pid` references
 *     resolved against those groups
 *  4. Assembly under a synthetic root node
 *
 * Element readers never throw. Missing `<model>`/`<resources>` yields an
 * empty graph; bad numbers read as 0; bad colours and dangling references are
 * left unset. Only unreadable XML raises {@link ThreeMFParseError}.
 *
 * @packageDocumentation
 */

import { assembleScene } from './assembler'
import { DecodeContext } from './context'
import { resolveDecodeOptions } from './options'
import type { DecodeOptions, SceneGraph } from './types'
import { walkModel } from './walker'
import { localName, parseXml } from './xml'

export { ThreeMFParseError } from './errors'

/**
 * Decode an already-parsed 3MF model document.
 *
 * @example
 * ```ts
 * const scene = decode3MFDocument(doc)
 * console.log(scene.root.children.map((node) => node.name)) // ['1', '2']
 * ```
 */
export function decode3MFDocument(doc: Document, options?: DecodeOptions): SceneGraph {
  const ctx = new DecodeContext(resolveDecodeOptions(options))

  const model = doc.documentElement
  if (model && localName(model) === 'model') {
    walkModel(model, ctx)
  } else {
    ctx.debug('Document root is not <model>, nothing to decode')
  }

  return assembleScene(ctx)
}

/**
 * Parse and decode 3MF model XML (the text of `3D/3dmodel.model`).
 *
 * @throws {ThreeMFParseError} when the text is not well-formed XML.
 */
export function decode3MFXml(xml: string, options?: DecodeOptions): SceneGraph {
  return decode3MFDocument(parseXml(xml), options)
}
