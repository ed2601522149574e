/**
 * Translations of one default-language text, keyed by language tag
 */
export type LangTranslations = Record<string, string>

/**
 * Default text -> language -> translated text
 */
export type TranslationMapping = Record<string, LangTranslations>

/**
 * Same shape as {@link TranslationMapping}, keyed on default texts whose
 * trailing four-digit year has been stripped (values are stripped too)
 */
export type TitleMapping = Record<string, LangTranslations>

/**
 * The mapping format exchanged with mapping files
 */
export interface MappingFile {
  /** Exact default text -> translations */
  new?: TranslationMapping
  /** Year-agnostic templates, re-expanded at injection time */
  title?: TitleMapping
}

/**
 * Counters collected while injecting translations into one document
 */
export interface InjectionStats {
  /** Switches whose fallback text resolved to at least one translation */
  processedSwitches: number
  /** New localized `<text>` variants added */
  insertedTranslations: number
  /** Existing variants rewritten (overwrite mode only) */
  updatedTranslations: number
  /** Existing variants left alone because overwrite was off */
  skippedTranslations: number
  /** Languages that did not appear anywhere in the document before */
  newLanguages: number
  /** Structural errors that stopped the document from being processed */
  errors: number
}

export type FileStatus = 'saved' | 'no-changes' | 'error'

/**
 * Outcome of one document in a batch
 */
export interface FileResult {
  status: FileStatus
  stats: InjectionStats
  /** Where the document was written */
  outputPath?: string
  /** Failure code (structure error code, `file-not-found` or `parse-error`) */
  error?: string
}

/**
 * Aggregated outcome of a batch run
 */
export interface BatchResult {
  saved: number
  /** Documents not written: failures plus documents with no changes */
  notSaved: number
  nestedErrors: number
  noChanges: number
  /** Sum of every document's stats */
  totals: InjectionStats
  /** Keyed by the document path as it was passed in */
  files: Record<string, FileResult>
}
