/**
 * `scene3mf` decodes 3MF packages into a plain scene graph of nodes,
 * meshes, materials and metadata.
 *
 * ## Quick Start
 *
 * ### From a package
 * ```ts
 * import { read3MF } from 'scene3mf'
 *
 * const scene = await read3MF(bytes)
 * for (const node of scene.root.children) {
 *   console.log(node.name, node.meshes.map((i) => scene.meshes[i].faces.length))
 * }
 * ```
 *
 * ### From model XML
 * ```ts
 * import { decode3MFXml } from 'scene3mf'
 *
 * const scene = decode3MFXml(xml, { debug: true })
 * ```
 *
 * @packageDocumentation
 */

export * from './core/index'
