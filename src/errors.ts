export type StructureErrorCode =
  | 'no-doc-element'
  | 'contains-tref'
  | 'css-too-complex'
  | 'css-has-ids'
  | 'nested-tspans-not-supported'
  | 'invalid-node-id'
  | 'text-contains-dollar'
  | 'no-parent-for-text'
  | 'non-tspan-inside-text'
  | 'switch-child-not-text'
  | 'switch-text-content-outside-text'
  | 'multiple-lang-in-text'
  | 'multiple-text-same-lang'

/**
 * Raised when a document's structure cannot be made translation-ready.
 * The message reads `structure-error-<code>` plus any extra context.
 */
export class StructureError extends Error {
  readonly code: StructureErrorCode
  /** The offending node, for diagnostics */
  readonly node?: Node
  readonly extra: string[]

  constructor(code: StructureErrorCode, node?: Node, extra: string[] = []) {
    super(
      extra.length > 0
        ? `structure-error-${code}: ${extra.join(', ')}`
        : `structure-error-${code}`,
    )
    this.name = 'StructureError'
    this.code = code
    this.node = node
    this.extra = extra
  }
}

/**
 * Raised when a source is not well-formed XML
 */
export class SvgParseError extends Error {
  readonly source: string

  constructor(source: string, detail: string) {
    super(`Failed to parse SVG ${source}: ${detail}`)
    this.name = 'SvgParseError'
    this.source = source
  }
}

/**
 * Failure codes recorded for a document that could not be processed
 */
export type FailureCode = StructureErrorCode | 'file-not-found' | 'parse-error' | 'io-error'

/**
 * Map an error thrown while loading or processing a document to its code
 */
export function failureCode(err: unknown): FailureCode | undefined {
  if (err instanceof StructureError) {
    return err.code
  }
  if (err instanceof SvgParseError) {
    return 'parse-error'
  }
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code === 'ENOENT' ? 'file-not-found' : 'io-error'
  }
  return undefined
}
