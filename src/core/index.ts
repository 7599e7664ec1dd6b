/**
 * Core exports: the model decoder, the package reader and mesh analysis.
 *
 * @example
 * ```ts
 * import { decode3MFXml } from 'scene3mf/core'
 *
 * const scene = decode3MFXml(xml)
 * console.log(scene.meshes[0].materialIndex, scene.materials)
 * ```
 *
 * @packageDocumentation
 */

export { decode3MFDocument, decode3MFXml, ThreeMFParseError } from './parser'
export { read3MF, isThreeMFPackage, findRootModelPath } from './archive'
export type { ThreeMFInput } from './archive'
export { parseColor } from './materials'
export { calculateVolume, calculateBoundingBox, toBufferGeometry } from './analyzer'
export { DEFAULT_DECODE_OPTIONS, resolveDecodeOptions } from './options'
export type { ResolvedDecodeOptions } from './options'

// Re-export all public types
export type {
  SceneGraph,
  SceneNode,
  SceneMesh,
  MaterialDef,
  MaterialRef,
  MetadataEntry,
  ParsedTriangle,
  Vertex,
  RGBA,
  BoundingBox,
  DecodeOptions,
  ThreeMFLogger,
} from './types'
