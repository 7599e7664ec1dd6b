// ---------------------------------------------------------------------------
// Public types: the library API contract
// ---------------------------------------------------------------------------

/** Colour with channels in the 0 to 1 range. */
export interface RGBA {
  r: number
  g: number
  b: number
  a: number
}

export interface Vertex {
  x: number
  y: number
  z: number
}

/** A `pid` + `p1`/`pindex` pair pointing at one entry of a material group. */
export interface MaterialRef {
  pid: number
  index: number
}

export interface ParsedTriangle {
  v1: number
  v2: number
  v3: number
  /** Present when the `<triangle>` carried both `pid` and `p1`, resolvable or not. */
  materialRef?: MaterialRef
}

/** One `<mesh>` of an object. Face indices point into `vertices`. */
export interface SceneMesh {
  /** Id of the owning object. */
  name: string
  vertices: Vertex[]
  faces: ParsedTriangle[]
  /** Slot in {@link SceneGraph.materials}, or `null` when no reference resolved. */
  materialIndex: number | null
}

export interface MaterialDef {
  name: string
  diffuseColor?: RGBA
}

export interface MetadataEntry {
  name: string
  value: string
}

export interface SceneNode {
  name: string
  /** Slots in {@link SceneGraph.meshes}. */
  meshes: number[]
  children: SceneNode[]
}

/**
 * The complete result of decoding a 3MF model part.
 *
 * `root` is synthetic; every object with an id becomes one of its children.
 */
export interface SceneGraph {
  root: SceneNode
  meshes: SceneMesh[]
  /** Indexed by global material index. */
  materials: MaterialDef[]
  /** In document order. */
  metadata: MetadataEntry[]
}

/** Bounding box dimensions in millimetres. */
export interface BoundingBox {
  x: number
  y: number
  z: number
}

// ---------------------------------------------------------------------------
// Decoder configuration
// ---------------------------------------------------------------------------

export type ThreeMFLogger = Pick<Console, 'debug'>

export interface DecodeOptions {
  /**
   * Collect every material group before reading objects, so a `pid` may name
   * a group declared further down the document. Default: `true`.
   */
  resolveForwardReferences?: boolean
  /** Name of the synthetic root node. Default: `"3MF"`. */
  rootName?: string
  /** Log reference resolution and skipped elements. Default: `false`. */
  debug?: boolean
  /** Default: `console`. */
  logger?: ThreeMFLogger
}
