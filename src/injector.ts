import type { StructureError } from './errors.js'
import type { InjectionStats, LangTranslations, MappingFile } from './types.js'
import { IdAllocator } from './ids.js'
import { normalizeLang } from './lang.js'
import { lookupTranslations } from './mappings.js'
import { prepare } from './prepare.js'
import { sortSwitchTexts } from './switch-order.js'
import { normalizeText } from './text-utils.js'
import { getTitlesTranslations } from './titles.js'
import {
  cloneElement,
  elementChildren,
  findElements,
  getAttr,
  getTextContent,
  isBlank,
  isCharacterData,
  setTextContent,
} from './xml-utils.js'

export interface InjectOptions {
  /** Rewrite variants that already exist for a language (default false) */
  overwrite?: boolean
  /** Match default texts ignoring case (default true) */
  caseInsensitive?: boolean
}

export type InjectResult =
  | { ok: true, document: Document, stats: InjectionStats }
  | { ok: false, error: StructureError }

export function createStats(): InjectionStats {
  return {
    processedSwitches: 0,
    insertedTranslations: 0,
    updatedTranslations: 0,
    skippedTranslations: 0,
    newLanguages: 0,
    errors: 0,
  }
}

/**
 * Counter-wise sum, used to fold per-document stats into totals
 */
export function addStats(a: InjectionStats, b: InjectionStats): InjectionStats {
  return {
    processedSwitches: a.processedSwitches + b.processedSwitches,
    insertedTranslations: a.insertedTranslations + b.insertedTranslations,
    updatedTranslations: a.updatedTranslations + b.updatedTranslations,
    skippedTranslations: a.skippedTranslations + b.skippedTranslations,
    newLanguages: a.newLanguages + b.newLanguages,
    errors: a.errors + b.errors,
  }
}

/**
 * Context shared by every switch of one document
 */
interface InjectionContext {
  mapping: MappingFile
  overwrite: boolean
  caseInsensitive: boolean
  allocator: IdAllocator
  /** Languages seen anywhere in the document so far */
  languages: Set<string>
  stats: InjectionStats
}

/**
 * Translations for one fallback text: exact mapping first, then the title
 * templates for year-suffixed texts. Both try the lower-cased text before the
 * text as written in case-insensitive mode.
 */
function resolveTranslations(text: string, context: InjectionContext): LangTranslations | undefined {
  const direct = lookupTranslations(context.mapping.new ?? {}, text, context.caseInsensitive)
  if (direct !== undefined && Object.keys(direct).length > 0) {
    return direct
  }
  const keys = context.caseInsensitive
    ? [normalizeText(text, true), normalizeText(text)]
    : [normalizeText(text)]
  const titles = getTitlesTranslations(context.mapping.title ?? {}, keys)
  const key = keys.find(candidate => Object.hasOwn(titles, candidate))
  return key === undefined ? undefined : titles[key]
}

/**
 * Language -> translation per fallback tspan (undefined for blank tspans,
 * which are cloned as they are). A language is kept only when every
 * non-blank tspan has a non-blank translation for it.
 */
function resolveSwitch(
  spans: Element[],
  context: InjectionContext,
): Map<string, (string | undefined)[]> {
  const perSpan = spans.map((span) => {
    const text = getTextContent(span)
    return isBlank(text) ? null : (resolveTranslations(text, context) ?? {})
  })
  const translatable = perSpan.filter((t): t is LangTranslations => t !== null)

  const resolved = new Map<string, (string | undefined)[]>()
  const [first] = translatable
  if (!first) {
    return resolved
  }
  for (const rawLang of Object.keys(first)) {
    const lang = normalizeLang(rawLang)
    const complete = translatable.every(t => Object.hasOwn(t, rawLang) && !isBlank(t[rawLang]))
    if (!lang || !complete || resolved.has(lang)) {
      continue
    }
    resolved.set(lang, perSpan.map(t => (t === null ? undefined : t[rawLang])))
  }
  return resolved
}

function fillSpans(text: Element, values: (string | undefined)[]): void {
  const spans = elementChildren(text, 'tspan')
  values.forEach((value, index) => {
    const span = spans[index]
    if (span && value !== undefined) {
      setTextContent(span, value)
    }
  })
}

/**
 * Clone the fallback as a new variant for `lang`, placed just before it
 */
function insertVariant(
  switchElement: Element,
  fallback: Element,
  lang: string,
  values: (string | undefined)[],
  allocator: IdAllocator,
): Element {
  const variant = cloneElement(fallback)
  variant.setAttribute('systemLanguage', lang)
  for (const node of [variant, ...elementChildren(variant, 'tspan')]) {
    const id = getAttr(node, 'id')
    if (id) {
      node.setAttribute('id', allocator.derive(id, lang))
    }
  }
  fillSpans(variant, values)

  const spacing = fallback.previousSibling
  switchElement.insertBefore(variant, fallback)
  if (isCharacterData(spacing) && isBlank(spacing.data)) {
    switchElement.insertBefore(spacing.cloneNode(false), fallback)
  }
  return variant
}

function injectSwitch(switchElement: Element, context: InjectionContext): void {
  const texts = elementChildren(switchElement, 'text')
  const fallback = texts.find(text => !getAttr(text, 'systemLanguage'))
  if (!fallback) {
    return
  }
  const resolved = resolveSwitch(elementChildren(fallback, 'tspan'), context)
  if (resolved.size === 0) {
    return
  }

  const { stats } = context
  stats.processedSwitches++

  for (const [lang, values] of resolved) {
    const existing = texts.find(text => getAttr(text, 'systemLanguage') === lang)
    if (!existing) {
      texts.push(insertVariant(switchElement, fallback, lang, values, context.allocator))
      stats.insertedTranslations++
      if (!context.languages.has(lang)) {
        context.languages.add(lang)
        stats.newLanguages++
      }
    }
    else if (context.overwrite) {
      fillSpans(existing, values)
      stats.updatedTranslations++
    }
    else {
      stats.skippedTranslations++
    }
  }

  sortSwitchTexts(switchElement)
}

/**
 * Inject translations into every switch under `root`, in place. Expects a
 * translation-ready tree (see {@link prepare}).
 */
export function workOnSwitches(
  root: Node,
  mapping: MappingFile,
  options: InjectOptions = {},
): InjectionStats {
  const languages = new Set<string>()
  for (const text of findElements(root, 'text')) {
    const lang = getAttr(text, 'systemLanguage')
    if (lang) {
      languages.add(lang)
    }
  }

  const context: InjectionContext = {
    mapping,
    overwrite: options.overwrite ?? false,
    caseInsensitive: options.caseInsensitive ?? true,
    allocator: IdAllocator.fromTree(root),
    languages,
    stats: createStats(),
  }

  for (const switchElement of findElements(root, 'switch')) {
    injectSwitch(switchElement, context)
  }
  return context.stats
}

/**
 * Merge a mapping into a document. The document is normalized first (a
 * no-op on translation-ready input), so structural problems come back as an
 * error instead of producing broken output. The input is not modified.
 */
export function inject(
  document: Document,
  mapping: MappingFile,
  options: InjectOptions = {},
): InjectResult {
  const prepared = prepare(document)
  if (!prepared.ok) {
    return prepared
  }
  const stats = workOnSwitches(prepared.document, mapping, options)
  return { ok: true, document: prepared.document, stats }
}
