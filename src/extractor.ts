import type { MappingFile, TranslationMapping } from './types.js'
import { normalizeText } from './text-utils.js'
import { makeTitleTranslations } from './titles.js'
import { elementChildren, findElements, getAttr, getTextContent } from './xml-utils.js'

export interface ExtractOptions {
  /** Fold default-text keys to lower case (default true) */
  caseInsensitive?: boolean
}

/**
 * Fallback tspan id -> normalized text, with a lower-cased id index for the
 * case-insensitive second lookup
 */
class FallbackSpans {
  private readonly byId = new Map<string, string>()
  private readonly byLowerId = new Map<string, string>()

  constructor(fallback: Element) {
    for (const tspan of elementChildren(fallback, 'tspan')) {
      const id = getAttr(tspan, 'id')
      const text = normalizeText(getTextContent(tspan))
      if (!id || !text) {
        continue
      }
      this.byId.set(id, text)
      if (!this.byLowerId.has(id.toLowerCase())) {
        this.byLowerId.set(id.toLowerCase(), text)
      }
    }
  }

  /**
   * Resolve a translated tspan id of the form `<fallbackId>[-suffix]`
   */
  resolve(tspanId: string): string | undefined {
    const [prefix = ''] = tspanId.split('-', 1)
    const base = prefix.trim()
    if (!base) {
      return undefined
    }
    return this.byId.get(base) ?? this.byLowerId.get(base.toLowerCase())
  }
}

function collectSwitch(
  switchElement: Element,
  mapping: TranslationMapping,
  caseInsensitive: boolean,
): void {
  const texts = elementChildren(switchElement, 'text')
  const fallback = texts.find(text => !getAttr(text, 'systemLanguage'))
  if (!fallback) {
    return
  }
  const fallbackSpans = new FallbackSpans(fallback)

  for (const text of texts) {
    const lang = getAttr(text, 'systemLanguage')
    if (!lang) {
      continue
    }
    for (const tspan of elementChildren(text, 'tspan')) {
      const defaultText = fallbackSpans.resolve(getAttr(tspan, 'id') ?? '')
      const translation = normalizeText(getTextContent(tspan))
      if (defaultText === undefined || !translation) {
        continue
      }
      const key = caseInsensitive ? defaultText.toLowerCase() : defaultText
      const translations = Object.hasOwn(mapping, key) ? mapping[key] : undefined
      if (translations === undefined) {
        mapping[key] = { [lang]: translation }
      }
      else {
        translations[lang] = translation
      }
    }
  }
}

/**
 * Build a translation mapping from a translation-ready document: every
 * tagged tspan whose id points back at a fallback tspan contributes
 * `mapping[fallbackText][lang] = translatedText`. Year-suffixed entries are
 * also generalized into title templates.
 */
export function extract(document: Document, options: ExtractOptions = {}): MappingFile {
  const caseInsensitive = options.caseInsensitive ?? true
  const mapping: TranslationMapping = {}

  for (const switchElement of findElements(document, 'switch')) {
    collectSwitch(switchElement, mapping, caseInsensitive)
  }

  return {
    new: mapping,
    title: makeTitleTranslations(mapping),
  }
}
