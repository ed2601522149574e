/**
 * Normalize a language tag to a simple IETF-like form.
 * Lightweight canonicalization, not a BCP 47 parser:
 *   'en_us' -> 'en-US', 'EN' -> 'en', 'sr_latn_rs' -> 'sr-Latn-RS'
 */
export function normalizeLang(lang: string): string
export function normalizeLang(lang: string | undefined): string | undefined
export function normalizeLang(lang: string | undefined): string | undefined {
  if (!lang) {
    return lang
  }
  const trimmed = lang.trim()
  if (!trimmed) {
    return lang
  }
  const [primary = '', ...rest] = trimmed.split(/[-_\s]+/).filter(Boolean)
  const subtags = rest.map(piece =>
    piece.length === 2
      ? piece.toUpperCase()
      : piece.charAt(0).toUpperCase() + piece.slice(1).toLowerCase(),
  )
  return [primary.toLowerCase(), ...subtags].join('-')
}

/**
 * Split a comma-separated `systemLanguage` value into its tags
 */
export function splitLangList(value: string): string[] {
  return value
    .split(/,\s*/)
    .map(tag => tag.trim())
    .filter(tag => tag.length > 0)
}

/**
 * Normalize every tag of a comma-separated list: 'AR, fr_ca' -> 'ar,fr-CA'
 */
export function normalizeLangList(value: string): string {
  const tags = splitLangList(value)
  if (tags.length === 0) {
    return value
  }
  return tags.map(tag => normalizeLang(tag)).join(',')
}
