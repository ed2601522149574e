/**
 * Collapse whitespace runs (newlines and tabs included) to one space and trim
 */
export function normalizeText(text: string, caseInsensitive: boolean = false): string {
  const normalized = text.replace(/\s+/g, ' ').trim()
  return caseInsensitive ? normalized.toLowerCase() : normalized
}
