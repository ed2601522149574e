import { childNodesOf, findElements, getAttr, isNamed } from './xml-utils.js'

// Number of a reserved id, also found inside derived ids like trsvg12-fr
const RESERVED_NUMBER_REGEX = /trsvg(\d+)/

// Sorts texts without a reserved id after every numbered one
const UNNUMBERED = 10 ** 9

interface SortKey {
  fallback: number
  num: number
  lang: string
}

function sortKey(text: Element): SortKey {
  const lang = getAttr(text, 'systemLanguage') ?? ''
  const match = (getAttr(text, 'id') ?? '').match(RESERVED_NUMBER_REGEX)
  return {
    fallback: lang ? 0 : 1,
    num: match ? Number(match[1]) : UNNUMBERED,
    lang,
  }
}

function compareKeys(a: SortKey, b: SortKey): number {
  if (a.fallback !== b.fallback) {
    return a.fallback - b.fallback
  }
  if (a.num !== b.num) {
    return a.num - b.num
  }
  if (a.lang === b.lang) {
    return 0
  }
  return a.lang < b.lang ? -1 : 1
}

/**
 * Sort the `<text>` children of a switch: tagged variants by reserved id
 * number then tag, the fallback (no systemLanguage) last. Other children
 * (whitespace, comments) keep their positions.
 */
export function sortSwitchTexts(switchElement: Element): void {
  const children = childNodesOf(switchElement)
  const texts = children.filter(child => isNamed(child, 'text'))
  if (texts.length < 2) {
    return
  }

  const sorted = texts
    .map(text => ({ text, key: sortKey(text) }))
    .sort((a, b) => compareKeys(a.key, b.key))
    .map(entry => entry.text)

  let nextText = 0
  const ordered = children.map(child => (isNamed(child, 'text') ? sorted[nextText++] ?? child : child))

  for (const child of children) {
    switchElement.removeChild(child)
  }
  for (const child of ordered) {
    switchElement.appendChild(child)
  }
}

/**
 * Apply {@link sortSwitchTexts} to every switch in the tree
 */
export function reorderTexts(root: Node): void {
  for (const switchElement of findElements(root, 'switch')) {
    sortSwitchTexts(switchElement)
  }
}
