import { DOMParser } from '@xmldom/xmldom'
import { ThreeMFParseError } from './errors'

// ---------------------------------------------------------------------------
// XML Helpers
// ---------------------------------------------------------------------------

const ELEMENT_NODE = 1

/**
 * Parse model or relationship XML. Anything the parser reports, warnings
 * included, or text without a document element, is a hard failure.
 */
export function parseXml(xml: string): Document {
  const errors: string[] = []
  // xmldom reports some malformed markup (e.g. a mismatched end tag) only as a warning.
  const collect = (msg: unknown) => {
    errors.push(String(msg))
  }
  const parser = new DOMParser({
    errorHandler: { warning: collect, error: collect, fatalError: collect },
  })

  let doc: Document
  try {
    doc = parser.parseFromString(xml, 'text/xml')
  } catch (error) {
    throw new ThreeMFParseError(`Invalid XML: ${error instanceof Error ? error.message : String(error)}`)
  }
  if (errors.length > 0) {
    throw new ThreeMFParseError(`Invalid XML: ${errors[0]}`)
  }
  if (!doc.documentElement) {
    throw new ThreeMFParseError('Invalid XML: no document element')
  }
  return doc
}

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE
}

/** Tag name without any namespace prefix (`m:basematerials` → `basematerials`). */
export function localName(elem: Element): string {
  return elem.localName || elem.nodeName
}

/** Direct element children in document order. */
export function childElements(parent: Element): Element[] {
  const children: Element[] = []
  for (let node = parent.firstChild; node; node = node.nextSibling) {
    if (isElement(node)) children.push(node)
  }
  return children
}

/** Attribute text, or `undefined` when the attribute is absent (not merely empty). */
export function readAttribute(elem: Element, name: string): string | undefined {
  if (!elem.hasAttribute(name)) return undefined
  return elem.getAttribute(name) ?? ''
}

/** Leading-integer parse; text with no leading integer reads as 0. */
export function toInt(text: string | undefined): number {
  const value = parseInt(text ?? '', 10)
  return Number.isNaN(value) ? 0 : value
}

/** Leading-decimal parse; text with no leading number reads as 0. */
export function toFloat(text: string | undefined): number {
  const value = parseFloat(text ?? '')
  return Number.isNaN(value) ? 0 : value
}
