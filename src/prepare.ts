import { StructureError } from './errors.js'
import { IdAllocator } from './ids.js'
import { normalizeLangList, splitLangList } from './lang.js'
import { reorderTexts } from './switch-order.js'
import {
  childNodesOf,
  cloneDocument,
  cloneElement,
  createElementLike,
  elementChildren,
  findElements,
  getAttr,
  getTextContent,
  isBlank,
  isCharacterData,
  isElement,
  isNamed,
  removeNode,
  SVG_NS,
} from './xml-utils.js'

export type PrepareResult =
  | { ok: true, document: Document, translatable: boolean }
  | { ok: false, error: StructureError }

// A default namespace made only of entity references (xmlns="&ns_svg;")
const ENTITY_NAMESPACE_REGEX = /^(&[^;]+;)+$/

// Numbered placeholders ($1, $2, ...) belong to an external substitution step
const DOLLAR_PLACEHOLDER_REGEX = /\$\d+/

// Purely numeric ids are left to the allocator
const NUMERIC_ID_REGEX = /^\d+$/

// Selector portions of a stylesheet: what is left between {...} blocks
const DECLARATION_BLOCK_REGEX = /\{[^}]*\}/

/**
 * Whether a stylesheet is a plain run of `selector{declarations}` blocks
 * followed by a non-empty tail, i.e. /^([^{]+\{[^}]*\})*[^{]+$/
 */
export function isSimpleCss(css: string): boolean {
  let pos = 0
  while (true) {
    const open = css.indexOf('{', pos)
    if (open === -1) {
      return pos < css.length
    }
    if (open === pos) {
      return false
    }
    const close = css.indexOf('}', open + 1)
    if (close === -1) {
      return false
    }
    pos = close + 1
  }
}

function ensureNamespace(root: Element): void {
  if (root.prefix) {
    return
  }
  const namespace = getAttr(root, 'xmlns')
  if (!namespace || ENTITY_NAMESPACE_REGEX.test(namespace)) {
    root.setAttribute('xmlns', SVG_NS)
  }
}

function rejectTrefs(root: Element): void {
  const [tref] = findElements(root, 'tref')
  if (tref) {
    throw new StructureError('contains-tref', tref)
  }
}

/**
 * Translation clones and renames ids, so id selectors cannot be kept stable
 */
function checkStyles(root: Element): void {
  for (const style of findElements(root, 'style')) {
    const css = getTextContent(style)
    if (!css.includes('#')) {
      continue
    }
    if (!isSimpleCss(css)) {
      throw new StructureError('css-too-complex', style)
    }
    if (css.split(DECLARATION_BLOCK_REGEX).some(selector => selector.includes('#'))) {
      throw new StructureError('css-has-ids', style)
    }
  }
}

function checkTspansAreLeaves(root: Element): void {
  for (const tspan of findElements(root, 'tspan')) {
    if (elementChildren(tspan).length > 0) {
      const id = getAttr(tspan, 'id')
      throw new StructureError('nested-tspans-not-supported', tspan, id ? [id] : [])
    }
  }
}

/**
 * Move every non-blank text node sitting directly in a `<text>` into its own
 * `<tspan>` at the same position
 */
function wrapRawText(text: Element): void {
  for (const child of childNodesOf(text)) {
    if (isCharacterData(child) && !isBlank(child.data)) {
      const tspan = createElementLike(text, 'tspan')
      text.insertBefore(tspan, child)
      text.removeChild(child)
      tspan.appendChild(child)
    }
  }
}

function isEmptyNode(element: Element): boolean {
  return elementChildren(element).length === 0 && isBlank(getTextContent(element))
}

/**
 * Drop empty tspans first, then texts left empty by that
 */
function pruneEmptyNodes(root: Element): void {
  for (const name of ['tspan', 'text']) {
    for (const element of findElements(root, name)) {
      if (isEmptyNode(element)) {
        removeNode(element)
      }
    }
  }
}

/**
 * Clean ids of tspans and texts, then give every one without an id the next
 * free `trsvg<N>`. Tspans are numbered before texts.
 */
function assignIds(root: Element): IdAllocator {
  const nodes = [...findElements(root, 'tspan'), ...findElements(root, 'text')]

  for (const node of nodes) {
    const raw = getAttr(node, 'id')
    if (raw === undefined) {
      continue
    }
    const id = raw.trim()
    if (id.includes('|') || id.includes('/')) {
      throw new StructureError('invalid-node-id', node, [id])
    }
    if (!id || NUMERIC_ID_REGEX.test(id)) {
      node.removeAttribute('id')
    }
    else if (id !== raw) {
      node.setAttribute('id', id)
    }
  }

  const allocator = IdAllocator.fromTree(root)
  for (const node of nodes) {
    if (!node.hasAttribute('id')) {
      node.setAttribute('id', allocator.next())
    }
  }
  return allocator
}

function checkPlaceholders(text: Element): void {
  const content = getTextContent(text)
  if (DOLLAR_PLACEHOLDER_REGEX.test(content)) {
    throw new StructureError('text-contains-dollar', text, [content])
  }
}

function normalizeLanguage(text: Element): void {
  const lang = getAttr(text, 'systemLanguage')
  if (lang) {
    text.setAttribute('systemLanguage', normalizeLangList(lang))
  }
}

/**
 * Make sure the text lives directly inside a `<switch>`; returns the switch
 */
function wrapInSwitch(text: Element): Element {
  const parent = text.parentNode
  if (!isElement(parent)) {
    throw new StructureError('no-parent-for-text', text)
  }
  if (isNamed(parent, 'switch')) {
    return parent
  }
  const switchElement = createElementLike(text, 'switch')
  parent.insertBefore(switchElement, text)
  parent.removeChild(text)
  switchElement.appendChild(text)
  return switchElement
}

function hoistStyle(text: Element, switchElement: Element): void {
  const style = getAttr(text, 'style')
  if (style !== undefined) {
    switchElement.setAttribute('style', style)
    text.removeAttribute('style')
  }
}

function checkTextChildren(text: Element): void {
  for (const child of elementChildren(text)) {
    if (!isNamed(child, 'tspan')) {
      throw new StructureError('non-tspan-inside-text', child, [child.nodeName])
    }
  }
}

function checkSwitchChildren(switchElement: Element): void {
  for (const child of childNodesOf(switchElement)) {
    if (isElement(child) && !isNamed(child, 'text')) {
      throw new StructureError('switch-child-not-text', child, [child.nodeName])
    }
    if (isCharacterData(child) && !isBlank(child.data)) {
      throw new StructureError('switch-text-content-outside-text', child, [child.data.trim()])
    }
  }
}

/**
 * Replace a text tagged with several languages (`ar,fr`) by one clone per
 * language. Clones get language-suffixed ids so ids stay unique.
 */
function expandLanguageLists(switchElement: Element, allocator: IdAllocator): void {
  for (const text of elementChildren(switchElement, 'text')) {
    const value = getAttr(text, 'systemLanguage')
    if (!value || !value.includes(',')) {
      continue
    }

    const langs = splitLangList(value)
    const seen = new Set<string>()
    for (const lang of langs) {
      if (seen.has(lang)) {
        throw new StructureError('multiple-lang-in-text', text, [lang])
      }
      seen.add(lang)
    }

    const [onlyLang] = langs
    if (langs.length <= 1) {
      if (onlyLang) {
        text.setAttribute('systemLanguage', onlyLang)
      }
      else {
        text.removeAttribute('systemLanguage')
      }
      continue
    }

    for (const lang of langs) {
      const clone = cloneElement(text)
      clone.setAttribute('systemLanguage', lang)
      for (const node of [clone, ...elementChildren(clone, 'tspan')]) {
        const id = getAttr(node, 'id')
        if (id) {
          node.setAttribute('id', allocator.derive(id, lang))
        }
      }
      switchElement.insertBefore(clone, text)
    }
    switchElement.removeChild(text)
  }
}

function checkDuplicateLanguages(switchElement: Element): void {
  const seen = new Set<string>()
  for (const text of elementChildren(switchElement, 'text')) {
    const lang = getAttr(text, 'systemLanguage') ?? ''
    if (seen.has(lang)) {
      throw new StructureError('multiple-text-same-lang', switchElement, [lang || 'fallback'])
    }
    seen.add(lang)
  }
}

/**
 * Run every normalization pass over the tree in place. Throws
 * {@link StructureError} on the first violation; returns false when there is
 * nothing to translate.
 */
function makeTranslationReady(root: Element): boolean {
  if (findElements(root, 'text').length === 0) {
    return false
  }

  ensureNamespace(root)
  rejectTrefs(root)
  checkStyles(root)
  checkTspansAreLeaves(root)

  for (const text of findElements(root, 'text')) {
    wrapRawText(text)
  }
  pruneEmptyNodes(root)
  const allocator = assignIds(root)

  for (const text of findElements(root, 'text')) {
    checkPlaceholders(text)
    normalizeLanguage(text)
    const switchElement = wrapInSwitch(text)
    hoistStyle(text, switchElement)
    checkTextChildren(text)
  }

  const switches = findElements(root, 'switch')
  for (const switchElement of switches) {
    checkSwitchChildren(switchElement)
  }
  for (const switchElement of switches) {
    expandLanguageLists(switchElement, allocator)
    checkDuplicateLanguages(switchElement)
  }

  reorderTexts(root)
  return true
}

/**
 * Validate and normalize a document into canonical translatable shape.
 * Works on a copy: the input document is never modified, whatever the
 * outcome.
 */
export function prepare(document: Document): PrepareResult {
  if (!document.documentElement) {
    return { ok: false, error: new StructureError('no-doc-element', document) }
  }
  const working = cloneDocument(document)
  try {
    const translatable = makeTranslationReady(working.documentElement)
    return { ok: true, document: working, translatable }
  }
  catch (err) {
    if (err instanceof StructureError) {
      return { ok: false, error: err }
    }
    throw err
  }
}
