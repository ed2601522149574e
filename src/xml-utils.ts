import { DOMParser, XMLSerializer } from '@xmldom/xmldom'
import { SvgParseError } from './errors.js'

export const SVG_NS = 'http://www.w3.org/2000/svg'

const ELEMENT_NODE = 1
const TEXT_NODE = 3
const CDATA_SECTION_NODE = 4

export function isElement(node: Node | null | undefined): node is Element {
  return node != null && node.nodeType === ELEMENT_NODE
}

/**
 * Text or CDATA node
 */
export function isCharacterData(node: Node | null | undefined): node is CharacterData {
  return node != null && (node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE)
}

/**
 * Match an element by local name, with or without a namespace prefix
 */
export function isNamed(node: Element, localName: string): boolean
export function isNamed(node: Node | null | undefined, localName: string): node is Element
export function isNamed(node: Node | null | undefined, localName: string): boolean {
  return isElement(node) && (node.localName || node.nodeName) === localName
}

export function isBlank(text: string | null | undefined): boolean {
  return text == null || text.trim().length === 0
}

/**
 * Snapshot of a node's children, safe to iterate while the tree changes.
 * Character data and comments have no child list.
 */
export function childNodesOf(node: Node): Node[] {
  return node.hasChildNodes() ? Array.from(node.childNodes) : []
}

export function elementChildren(node: Node, localName?: string): Element[] {
  return childNodesOf(node).filter((child): child is Element =>
    localName === undefined ? isElement(child) : isNamed(child, localName),
  )
}

/**
 * All elements with the given local name under `root` (root included), in
 * document order
 */
export function findElements(root: Node, localName: string): Element[] {
  const found: Element[] = []
  const visit = (node: Node) => {
    if (isNamed(node, localName)) {
      found.push(node)
    }
    for (const child of childNodesOf(node)) {
      if (isElement(child)) {
        visit(child)
      }
    }
  }
  visit(root)
  return found
}

export function allElements(root: Node): Element[] {
  const found: Element[] = []
  const visit = (node: Node) => {
    if (isElement(node)) {
      found.push(node)
    }
    for (const child of childNodesOf(node)) {
      if (isElement(child)) {
        visit(child)
      }
    }
  }
  visit(root)
  return found
}

/**
 * Concatenated text of all descendant text nodes (like DOM textContent)
 */
export function getTextContent(node: Node): string {
  if (isCharacterData(node)) {
    return node.data
  }
  return childNodesOf(node)
    .map(child => (isElement(child) || isCharacterData(child) ? getTextContent(child) : ''))
    .join('')
}

/**
 * Replace all children of an element with a single text node
 */
export function setTextContent(element: Element, text: string): void {
  for (const child of childNodesOf(element)) {
    element.removeChild(child)
  }
  element.appendChild(element.ownerDocument.createTextNode(text))
}

/**
 * Attribute value, or undefined when the attribute is absent
 */
export function getAttr(element: Element, name: string): string | undefined {
  return element.hasAttribute(name) ? (element.getAttribute(name) ?? '') : undefined
}

/**
 * Create an element in the same namespace (and with the same prefix) as `like`
 */
export function createElementLike(like: Element, localName: string): Element {
  const qualifiedName = like.prefix ? `${like.prefix}:${localName}` : localName
  return like.ownerDocument.createElementNS(like.namespaceURI, qualifiedName)
}

export function cloneElement(element: Element): Element {
  const clone = element.cloneNode(true)
  if (!isElement(clone)) {
    throw new TypeError(`Cloning <${element.nodeName}> did not produce an element`)
  }
  return clone
}

export function removeNode(node: Node): void {
  node.parentNode?.removeChild(node)
}

/**
 * Parse an XML string, failing on any well-formedness error
 */
export function parseXml(xml: string, source: string = 'input'): Document {
  const fail = (detail: unknown) => {
    throw new SvgParseError(source, String(detail).trim())
  }
  const parser = new DOMParser({
    errorHandler: {
      warning: () => {},
      error: fail,
      fatalError: fail,
    },
  })
  return parser.parseFromString(xml, 'image/svg+xml')
}

export function serializeXml(node: Node): string {
  return new XMLSerializer().serializeToString(node)
}

/**
 * Independent copy of a document, used as a working copy for rewrites
 */
export function cloneDocument(document: Document): Document {
  return parseXml(serializeXml(document), 'working copy')
}
