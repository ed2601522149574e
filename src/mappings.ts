import type { Logger } from './logger.js'
import type { LangTranslations, MappingFile, TranslationMapping } from './types.js'
import { readFile } from 'node:fs/promises'
import { defaultLogger } from './logger.js'
import { normalizeText } from './text-utils.js'

export interface MergeOptions {
  /**
   * Later sources replace a language already present under the same default
   * text. Off by default: the first source to define a language wins.
   */
  override?: boolean
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Keep only `{ text: { lang: string } }` entries of an untrusted value
 */
function toTranslationMapping(value: unknown): TranslationMapping {
  const mapping: TranslationMapping = {}
  if (!isRecord(value)) {
    return mapping
  }
  for (const [text, translations] of Object.entries(value)) {
    if (!isRecord(translations)) {
      continue
    }
    const langs: LangTranslations = {}
    for (const [lang, translated] of Object.entries(translations)) {
      if (typeof translated === 'string') {
        langs[lang] = translated
      }
    }
    mapping[text] = langs
  }
  return mapping
}

/**
 * Read a parsed mapping file. Files with `new`/`title` sections are taken as
 * such; a bare `{ text: { lang: ... } }` object is read as a `new` section.
 */
export function toMappingFile(value: unknown): MappingFile {
  if (!isRecord(value)) {
    return {}
  }
  if ('new' in value || 'title' in value) {
    return {
      new: toTranslationMapping(value.new),
      title: toTranslationMapping(value.title),
    }
  }
  return { new: toTranslationMapping(value) }
}

/**
 * Merge `source` into `target` in place, per default text and language
 */
export function mergeTranslations(
  target: TranslationMapping,
  source: TranslationMapping,
  options: MergeOptions = {},
): TranslationMapping {
  for (const [text, translations] of Object.entries(source)) {
    const existing = Object.hasOwn(target, text) ? target[text] : undefined
    if (existing === undefined) {
      target[text] = { ...translations }
      continue
    }
    for (const [lang, translated] of Object.entries(translations)) {
      if (options.override || !Object.hasOwn(existing, lang)) {
        existing[lang] = translated
      }
    }
  }
  return target
}

/**
 * Merge both sections of `source` into `target` in place
 */
export function mergeMappings(
  target: MappingFile,
  source: MappingFile,
  options: MergeOptions = {},
): MappingFile {
  if (source.new) {
    target.new = mergeTranslations(target.new ?? {}, source.new, options)
  }
  if (source.title) {
    target.title = mergeTranslations(target.title ?? {}, source.title, options)
  }
  return target
}

/**
 * Load and merge mapping files in order. A missing or malformed file adds
 * nothing and does not stop the others from loading.
 */
export async function loadAllMappings(
  paths: string[],
  options: MergeOptions & { logger?: Logger } = {},
): Promise<MappingFile> {
  const logger = options.logger ?? defaultLogger
  const merged: MappingFile = {}

  for (const path of paths) {
    let content: string
    try {
      content = await readFile(path, 'utf-8')
    }
    catch (err) {
      logger.warn(`Mapping file not readable: ${path} (${String(err)})`)
      continue
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    }
    catch (err) {
      logger.warn(`Mapping file is not valid JSON: ${path} (${String(err)})`)
      continue
    }

    mergeMappings(merged, toMappingFile(parsed), options)
    logger.debug(`Loaded mapping file: ${path}`)
  }

  return merged
}

/**
 * Translations for a default text. In case-insensitive mode the lower-cased
 * key is tried first, then the text as written.
 */
export function lookupTranslations(
  mapping: TranslationMapping,
  text: string,
  caseInsensitive: boolean,
): LangTranslations | undefined {
  const candidates = caseInsensitive
    ? [normalizeText(text, true), normalizeText(text)]
    : [normalizeText(text)]
  for (const key of candidates) {
    if (Object.hasOwn(mapping, key)) {
      return mapping[key]
    }
  }
  return undefined
}
