import type { Logger } from './logger.js'
import { access, mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import process from 'node:process'
import { defaultLogger } from './logger.js'

const FILE_PATH_BASE = 'https://commons.wikimedia.org/wiki/Special:FilePath/'

const DEFAULT_USER_AGENT = 'svg-langs/0.1 (multilingual SVG maintenance)'

const TIMEOUT_MS = 30_000

export type DownloadStatus = 'success' | 'existing' | 'failed'

export interface DownloadResult {
  status: DownloadStatus
  /** Local path, when the file is on disk */
  path?: string
}

export interface DownloadOptions {
  fetch?: typeof fetch
  userAgent?: string
  logger?: Logger
}

export interface DownloadSummary {
  done: number
  existing: number
  failed: number
  total: number
  status: 'Completed' | 'Failed'
  message: string
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  }
  catch {
    return false
  }
}

/**
 * Local file name for a page title
 */
export function fileNameFor(title: string): string {
  return title.trim().replace(/[/\\]/g, '_')
}

/**
 * Fetch one file by its page title, skipping copies already on disk
 */
export async function downloadOneFile(
  title: string,
  outDir: string,
  options: DownloadOptions = {},
): Promise<DownloadResult> {
  const logger = options.logger ?? defaultLogger
  const name = fileNameFor(title)
  if (!name) {
    return { status: 'failed' }
  }

  const path = join(outDir, name)
  if (await exists(path)) {
    logger.debug(`Skipped existing: ${title}`)
    return { status: 'existing', path }
  }

  const fetchFn = options.fetch ?? fetch
  const userAgent = options.userAgent ?? process.env.SVG_LANGS_USER_AGENT ?? DEFAULT_USER_AGENT
  let response: Response
  try {
    response = await fetchFn(`${FILE_PATH_BASE}${encodeURIComponent(title.trim())}`, {
      headers: { 'User-Agent': userAgent },
      redirect: 'follow',
      signal: AbortSignal.timeout(TIMEOUT_MS),
    })
  }
  catch (err) {
    logger.error(`Failed (network error): ${title} -> ${String(err)}`)
    return { status: 'failed' }
  }

  if (response.status !== 200) {
    logger.error(`Failed (HTTP ${response.status}): ${title}`)
    return { status: 'failed' }
  }

  await writeFile(path, new Uint8Array(await response.arrayBuffer()))
  logger.debug(`Downloaded: ${title}`)
  return { status: 'success', path }
}

/**
 * Download many titles in order. Returns the local paths of every file now
 * on disk plus a summary of what happened.
 */
export async function downloadTask(
  titles: string[],
  outDir: string,
  options: DownloadOptions = {},
): Promise<{ files: string[], summary: DownloadSummary }> {
  const logger = options.logger ?? defaultLogger
  await mkdir(outDir, { recursive: true })

  const files: string[] = []
  let done = 0
  let existing = 0
  let failed = 0

  for (const title of titles) {
    const result = await downloadOneFile(title, outDir, options)
    if (result.status === 'success') {
      done++
    }
    else if (result.status === 'existing') {
      existing++
    }
    else {
      failed++
    }
    if (result.path) {
      files.push(result.path)
    }
  }

  const message = `Total Files: ${titles.length}, Downloaded ${done}, `
    + `skip existing ${existing}, failed to download: ${failed}`
  logger.info(`📥 ${message}`)

  return {
    files,
    summary: {
      done,
      existing,
      failed,
      total: titles.length,
      status: failed > 0 ? 'Failed' : 'Completed',
      message,
    },
  }
}
