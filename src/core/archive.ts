/**
 * 3MF package access: the ZIP container around the model XML.
 *
 * The root model part is located through the package relationships
 * (`_rels/.rels`), falling back to the conventional `3D/3dmodel.model` path
 * and then to any `.model` file under `3D/`.
 *
 * @packageDocumentation
 */

import JSZip from 'jszip'
import { ThreeMFParseError } from './errors'
import { decode3MFXml } from './parser'
import type { DecodeOptions, SceneGraph } from './types'
import { childElements, localName, parseXml, readAttribute } from './xml'

export type ThreeMFInput = ArrayBuffer | Uint8Array | Blob

const RELS_PATH = '_rels/.rels'
const MODEL_RELATIONSHIP_SUFFIX = '/3dmodel'
const DEFAULT_MODEL_PATH = '3D/3dmodel.model'
const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04]

async function toBytes(data: ThreeMFInput): Promise<Uint8Array> {
  if (data instanceof Uint8Array) return data
  if (data instanceof ArrayBuffer) return new Uint8Array(data)
  return new Uint8Array(await data.arrayBuffer())
}

async function findRelationshipTarget(zip: JSZip): Promise<string | null> {
  const rels = zip.file(RELS_PATH)
  if (!rels) return null

  const doc = parseXml(await rels.async('text'))
  for (const rel of childElements(doc.documentElement)) {
    if (localName(rel) !== 'Relationship') continue
    const type = readAttribute(rel, 'Type') ?? ''
    const target = readAttribute(rel, 'Target')
    if (type.endsWith(MODEL_RELATIONSHIP_SUFFIX) && target) {
      return target.replace(/^\/+/, '')
    }
  }
  return null
}

/** Path of the root model part inside `zip`, or `null` if there is none. */
export async function findRootModelPath(zip: JSZip): Promise<string | null> {
  const target = await findRelationshipTarget(zip)
  if (target && zip.file(target)) return target

  if (zip.file(DEFAULT_MODEL_PATH)) return DEFAULT_MODEL_PATH

  const modelFiles = Object.keys(zip.files)
    .filter((f) => f.startsWith('3D/') && f.endsWith('.model'))
    .sort()
  return modelFiles.length > 0 ? modelFiles[0] : null
}

/** True when `data` is a ZIP archive with a locatable root model part. */
export async function isThreeMFPackage(data: ThreeMFInput): Promise<boolean> {
  const bytes = await toBytes(data)
  if (bytes.length < ZIP_SIGNATURE.length) return false
  if (!ZIP_SIGNATURE.every((byte, i) => bytes[i] === byte)) return false

  try {
    const zip = await new JSZip().loadAsync(bytes)
    return (await findRootModelPath(zip)) !== null
  } catch {
    return false
  }
}

/**
 * Open a `.3MF` package and decode its root model.
 *
 * @example
 * ```ts
 * import { readFile } from 'node:fs/promises'
 * import { read3MF } from 'scene3mf'
 *
 * const scene = await read3MF(await readFile('cube.3mf'))
 * console.log(scene.meshes.length, scene.materials.map((m) => m.name))
 * ```
 *
 * @throws {ThreeMFParseError} when the archive is corrupt, has no model part,
 *         or the model XML is unreadable.
 */
export async function read3MF(data: ThreeMFInput, options?: DecodeOptions): Promise<SceneGraph> {
  try {
    const zip = await new JSZip().loadAsync(await toBytes(data))

    const modelPath = await findRootModelPath(zip)
    const modelFile = modelPath ? zip.file(modelPath) : null
    if (!modelFile) throw new ThreeMFParseError('Invalid .3MF file: no model file found')

    return decode3MFXml(await modelFile.async('text'), options)
  } catch (error) {
    if (error instanceof ThreeMFParseError) throw error
    throw new ThreeMFParseError(
      `Failed to read .3MF package: ${error instanceof Error ? error.message : 'Unknown error'}`,
    )
  }
}
