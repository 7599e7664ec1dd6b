import { LOG_PREFIX, type ResolvedDecodeOptions } from './options'
import type { MaterialDef, MetadataEntry, SceneMesh } from './types'

export interface MaterialGroupEntry {
  globalIndex: number
  material: MaterialDef
}

/** Position in `entries` is the `pindex`/`p1` value that selects it. */
export interface MaterialGroup {
  id: number
  kind: 'basematerials' | 'colorgroup'
  entries: MaterialGroupEntry[]
}

/** An `<object>` that had an id. `meshes` are handles into {@link DecodeContext.meshes}. */
export interface DecodedObject {
  id: string
  meshes: number[]
}

/**
 * Everything accumulated during one decode. A fresh context is created per
 * document and only read back by the assembler.
 */
export class DecodeContext {
  readonly meshes: SceneMesh[] = []
  readonly objects: DecodedObject[] = []
  readonly metadata: MetadataEntry[] = []
  /** Every group in declaration order, including ones shadowed by a later id. */
  readonly declaredGroups: MaterialGroup[] = []

  private readonly groups = new Map<number, MaterialGroup>()
  private materialCounter = 0

  constructor(readonly options: ResolvedDecodeOptions) {}

  get materialCount(): number {
    return this.materialCounter
  }

  nextMaterialIndex(): number {
    return this.materialCounter++
  }

  /** Register a group; a repeated id replaces the earlier group for lookups. */
  defineGroup(group: MaterialGroup): void {
    const previous = this.groups.get(group.id)
    if (previous) {
      this.debug(`Material group ${group.id} redeclared (${previous.kind} replaced by ${group.kind})`)
    }
    this.declaredGroups.push(group)
    this.groups.set(group.id, group)
  }

  /** Global material index at `index` in group `pid`, or `null` if either doesn't exist. */
  resolveMaterial(pid: number, index: number): number | null {
    const group = this.groups.get(pid)
    if (!group) return null
    if (index < 0 || index >= group.entries.length) return null
    return group.entries[index].globalIndex
  }

  addMesh(mesh: SceneMesh): number {
    this.meshes.push(mesh)
    return this.meshes.length - 1
  }

  debug(message: string): void {
    if (this.options.debug) this.options.logger.debug(`${LOG_PREFIX} ${message}`)
  }
}
