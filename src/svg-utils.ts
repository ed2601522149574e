import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { basename, dirname, extname, join } from 'node:path'
import process from 'node:process'
import { gunzipSync, gzipSync } from 'fflate'
import { SvgParseError } from './errors.js'
import { parseXml, serializeXml } from './xml-utils.js'

/**
 * Whether a path names a gzip-compressed SVG
 */
export function isCompressed(path: string): boolean {
  return extname(path).toLowerCase() === '.svgz'
}

/**
 * Decode raw file bytes, inflating `.svgz` content first
 */
function decodeSvg(path: string, bytes: Uint8Array): string {
  if (!isCompressed(path)) {
    return new TextDecoder().decode(bytes)
  }
  let data: Uint8Array
  try {
    data = gunzipSync(bytes)
  }
  catch (err) {
    throw new SvgParseError(path, `invalid gzip data (${String(err)})`)
  }
  return new TextDecoder().decode(data)
}

function encodeSvg(path: string, content: string): Uint8Array {
  const data = new TextEncoder().encode(content)
  return isCompressed(path) ? gzipSync(data) : data
}

/**
 * Read an SVG (or SVGZ) file as text
 */
export async function readSvgText(path: string): Promise<string> {
  const bytes = await readFile(path)
  return decodeSvg(path, new Uint8Array(bytes))
}

export function parseSvg(content: string, source: string = 'input'): Document {
  return parseXml(content, source)
}

export function serializeSvg(document: Document): string {
  return serializeXml(document)
}

/**
 * Read and parse an SVG file
 */
export async function readSvg(path: string): Promise<Document> {
  return parseSvg(await readSvgText(path), path)
}

/**
 * Write text to `path` as a whole: a temp file beside it is renamed into
 * place, so readers never see a partial file
 */
export async function writeSvgText(path: string, content: string): Promise<void> {
  const temp = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`)
  await writeFile(temp, encodeSvg(path, content))
  try {
    await rename(temp, path)
  }
  catch (err) {
    await rm(temp, { force: true })
    throw err
  }
}

/**
 * Serialize and write a document
 */
export async function writeSvg(path: string, document: Document): Promise<void> {
  await writeSvgText(path, serializeSvg(document))
}

/**
 * Where a processed document goes: an explicit file, else `outputDir` plus
 * the source's file name, else the source itself. Parent directories are
 * created.
 */
export async function getTargetPath(
  source: string,
  outputFile?: string,
  outputDir?: string,
): Promise<string> {
  const target = outputFile ?? (outputDir ? join(outputDir, basename(source)) : source)
  await mkdir(dirname(target), { recursive: true })
  return target
}
