import type { FailureCode } from './errors.js'
import type { InjectOptions } from './injector.js'
import type { Logger } from './logger.js'
import type { BatchResult, FileResult, MappingFile } from './types.js'
import { basename } from 'node:path'
import { failureCode } from './errors.js'
import { addStats, createStats } from './injector.js'
import { defaultLogger } from './logger.js'
import { getTargetPath, writeSvgText } from './svg-utils.js'
import { injectFile } from './workflows.js'

export interface BatchOptions extends InjectOptions {
  /** Single output file; only valid for a one-file batch */
  outputFile?: string
  /** Output directory; files keep their names */
  outputDir?: string
  /** Documents processed at once (default 4) */
  concurrency?: number
  /** Stops dispatching new documents once aborted */
  signal?: AbortSignal
  logger?: Logger
}

function failed(path: string, code: FailureCode, logger: Logger): FileResult {
  logger.warn(`${path}: ${code}`)
  return { status: 'error', stats: { ...createStats(), errors: 1 }, error: code }
}

async function processFile(
  path: string,
  mapping: MappingFile,
  options: BatchOptions,
  logger: Logger,
): Promise<FileResult> {
  const result = await injectFile(path, mapping, options)
  if (!result.ok) {
    return failed(path, result.code, logger)
  }
  if (!result.changed) {
    logger.debug(`${path}: no changes`)
    return { status: 'no-changes', stats: result.stats }
  }

  let outputPath: string
  try {
    outputPath = await getTargetPath(path, options.outputFile, options.outputDir)
    await writeSvgText(outputPath, result.content)
  }
  catch (err) {
    const code = failureCode(err)
    if (code === undefined) {
      throw err
    }
    return failed(path, code, logger)
  }
  logger.debug(`${path}: saved to ${outputPath}`)
  return { status: 'saved', stats: result.stats, outputPath }
}

/**
 * Inputs that would be written to the same file of `outputDir`
 */
function collidingNames(files: string[]): string[] {
  const seen = new Set<string>()
  const colliding = new Set<string>()
  for (const file of files) {
    const name = basename(file)
    if (seen.has(name)) {
      colliding.add(name)
    }
    seen.add(name)
  }
  return [...colliding]
}

/**
 * Fold one document's outcome into the batch totals
 */
function record(batch: BatchResult, path: string, result: FileResult): void {
  batch.files[path] = result
  batch.totals = addStats(batch.totals, result.stats)
  if (result.status === 'saved') {
    batch.saved++
    return
  }
  batch.notSaved++
  if (result.status === 'no-changes') {
    batch.noChanges++
  }
  else if (result.error === 'nested-tspans-not-supported') {
    batch.nestedErrors++
  }
}

/**
 * Inject one mapping into many documents. Each document is loaded,
 * normalized, injected and written back when its output changed; failures
 * are recorded per document and do not stop the batch.
 */
export async function startInjects(
  files: string[],
  mapping: MappingFile,
  options: BatchOptions = {},
): Promise<BatchResult> {
  if (options.outputFile && files.length > 1) {
    throw new Error('outputFile can only be used with a single input file')
  }
  if (options.outputDir && !options.outputFile) {
    const colliding = collidingNames(files)
    if (colliding.length > 0) {
      throw new Error(`Inputs would overwrite each other in ${options.outputDir}: ${colliding.join(', ')}`)
    }
  }
  const logger = options.logger ?? defaultLogger
  const concurrency = Math.max(1, options.concurrency ?? 4)

  const batch: BatchResult = {
    saved: 0,
    notSaved: 0,
    nestedErrors: 0,
    noChanges: 0,
    totals: createStats(),
    files: {},
  }

  const queue = [...files]
  const worker = async () => {
    while (!options.signal?.aborted) {
      const path = queue.shift()
      if (path === undefined) {
        return
      }
      record(batch, path, await processFile(path, mapping, options, logger))
    }
  }
  await Promise.all(Array.from({ length: Math.min(concurrency, files.length) }, worker))

  if (options.signal?.aborted) {
    logger.warn(`Batch aborted with ${queue.length} file(s) left`)
  }
  logger.info(
    `📊 Saved ${batch.saved}, not saved ${batch.notSaved} `
    + `(${batch.noChanges} unchanged, ${batch.nestedErrors} nested tspans)`,
  )
  return batch
}
