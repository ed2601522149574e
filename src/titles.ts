import type { LangTranslations, TitleMapping, TranslationMapping } from './types.js'

// Exactly four trailing digits, not part of a longer number
const TRAILING_YEAR_REGEX = /(?<!\d)(\d{4})$/

interface YearSplit {
  prefix: string
  year: string
}

function splitYear(text: string): YearSplit | undefined {
  const match = text.match(TRAILING_YEAR_REGEX)
  if (!match || match.index === undefined || match[1] === undefined) {
    return undefined
  }
  return { prefix: text.slice(0, match.index), year: match[1] }
}

/**
 * Lift year-suffixed entries into year-agnostic templates.
 *
 * `"population 2020": { ar: "السكان 2020" }` becomes
 * `"population": { ar: "السكان" }` when every translation ends in the same
 * year as its key.
 */
export function makeTitleTranslations(mapping: TranslationMapping): TitleMapping {
  const titles: TitleMapping = {}

  for (const [key, translations] of Object.entries(mapping)) {
    const split = splitYear(key)
    const prefix = split?.prefix.trim()
    if (!split || !prefix) {
      continue
    }
    const entries = Object.entries(translations)
    if (entries.length === 0 || !entries.every(([, value]) => value.endsWith(split.year))) {
      continue
    }
    titles[prefix] = Object.fromEntries(
      entries.map(([lang, value]) => [lang, value.slice(0, -split.year.length).trim()]),
    )
  }

  return titles
}

/**
 * Re-expand title templates for texts ending in a year:
 * `"population 2031"` -> `{ ar: "السكان 2031" }`
 */
export function getTitlesTranslations(
  titles: TitleMapping,
  texts: string[],
): TranslationMapping {
  const expanded: TranslationMapping = {}

  for (const text of texts) {
    const split = splitYear(text)
    if (!split) {
      continue
    }
    const template = lookupTemplate(titles, split.prefix)
    if (!template || Object.keys(template).length === 0) {
      continue
    }
    expanded[text] = Object.fromEntries(
      Object.entries(template).map(([lang, value]) => [lang, `${value} ${split.year}`]),
    )
  }

  return expanded
}

function lookupTemplate(titles: TitleMapping, prefix: string): LangTranslations | undefined {
  if (Object.hasOwn(titles, prefix)) {
    return titles[prefix]
  }
  const trimmed = prefix.trim()
  return Object.hasOwn(titles, trimmed) ? titles[trimmed] : undefined
}
