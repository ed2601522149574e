import type { FailureCode } from './errors.js'
import type { ExtractOptions } from './extractor.js'
import type { InjectOptions } from './injector.js'
import type { Logger } from './logger.js'
import type { InjectionStats, MappingFile } from './types.js'
import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { failureCode } from './errors.js'
import { extract } from './extractor.js'
import { inject } from './injector.js'
import { defaultLogger } from './logger.js'
import { prepare } from './prepare.js'
import { getTargetPath, parseSvg, readSvg, readSvgText, serializeSvg, writeSvgText } from './svg-utils.js'

export type InjectFileResult =
  | {
    ok: true
    document: Document
    /** Serialized output */
    content: string
    stats: InjectionStats
    /** Whether the output differs from the input */
    changed: boolean
  }
  | { ok: false, code: FailureCode, error: Error }

function toFailure(err: unknown): { ok: false, code: FailureCode, error: Error } {
  const code = failureCode(err)
  if (code === undefined || !(err instanceof Error)) {
    throw err
  }
  return { ok: false, code, error: err }
}

/**
 * Extract the translations a file already carries. Returns undefined when
 * the file is missing, does not parse or cannot be normalized.
 */
export async function extractFile(
  path: string,
  options: ExtractOptions & { logger?: Logger } = {},
): Promise<MappingFile | undefined> {
  const logger = options.logger ?? defaultLogger
  let document: Document
  try {
    document = await readSvg(path)
  }
  catch (err) {
    const failure = toFailure(err)
    logger.error(`Cannot extract from ${path}: ${failure.error.message}`)
    return undefined
  }

  const prepared = prepare(document)
  if (!prepared.ok) {
    logger.error(`Cannot extract from ${path}: ${prepared.error.message}`)
    return undefined
  }
  return extract(prepared.document, options)
}

/**
 * Load one file and inject a mapping into it, without writing anything
 */
export async function injectFile(
  path: string,
  mapping: MappingFile,
  options: InjectOptions = {},
): Promise<InjectFileResult> {
  let document: Document
  try {
    document = parseSvg(await readSvgText(path), path)
  }
  catch (err) {
    return toFailure(err)
  }

  const result = inject(document, mapping, options)
  if (!result.ok) {
    return { ok: false, code: result.error.code, error: result.error }
  }
  const content = serializeSvg(result.document)
  return {
    ok: true,
    document: result.document,
    content,
    stats: result.stats,
    changed: content !== serializeSvg(document),
  }
}

export interface WorkflowOptions extends InjectOptions {
  /** Write the result here */
  outputFile?: string
  /** Or into this directory, under the target's file name */
  outputDir?: string
  /** Write the output when true (default), otherwise only return it */
  save?: boolean
  logger?: Logger
}

export type WorkflowResult = InjectFileResult & { savedTo?: string }

/**
 * Inject a ready mapping into one file and, unless `save` is false, write
 * the result when it changed
 */
export async function svgExtractAndInjects(
  mapping: MappingFile,
  target: string,
  options: WorkflowOptions = {},
): Promise<WorkflowResult> {
  const logger = options.logger ?? defaultLogger
  const result = await injectFile(target, mapping, options)
  if (!result.ok) {
    logger.error(`${target}: ${result.error.message}`)
    return result
  }
  if (options.save === false || !result.changed) {
    return result
  }

  const savedTo = await getTargetPath(target, options.outputFile, options.outputDir)
  await writeSvgText(savedTo, result.content)
  logger.debug(`Saved ${savedTo}`)
  return { ...result, savedTo }
}

/**
 * Copy translations from one file into another: extract from `source`,
 * optionally keep the mapping as JSON, then inject into `target`
 */
export async function svgExtractAndInject(
  source: string,
  target: string,
  options: WorkflowOptions & { dataOutputFile?: string } = {},
): Promise<WorkflowResult | undefined> {
  const logger = options.logger ?? defaultLogger
  const mapping = await extractFile(source, { logger })
  if (!mapping) {
    return undefined
  }

  if (options.dataOutputFile) {
    await mkdir(dirname(options.dataOutputFile), { recursive: true })
    await writeFile(options.dataOutputFile, JSON.stringify(mapping, null, 2))
    logger.debug(`Mapping saved to ${options.dataOutputFile}`)
  }

  return svgExtractAndInjects(mapping, target, options)
}
