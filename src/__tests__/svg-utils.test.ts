import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { gunzipSync } from 'fflate'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { SvgParseError } from '../errors.js'
import { getTargetPath, isCompressed, parseSvg, readSvg, readSvgText, writeSvg, writeSvgText } from '../svg-utils.js'

describe('svg-utils', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'svg-langs-io-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('detects compressed files by extension', () => {
    expect(isCompressed('chart.svgz')).toBe(true)
    expect(isCompressed('chart.SVGZ')).toBe(true)
    expect(isCompressed('chart.svg')).toBe(false)
  })

  it('writes and reads plain files', async () => {
    const path = join(dir, 'plain.svg')
    await writeSvg(path, parseSvg('<svg><text>Hi</text></svg>'))
    expect(await readFile(path, 'utf-8')).toBe('<svg><text>Hi</text></svg>')
    expect((await readSvg(path)).documentElement.nodeName).toBe('svg')
  })

  it('gzips .svgz files', async () => {
    const path = join(dir, 'packed.svgz')
    await writeSvgText(path, '<svg/>')
    const raw = new Uint8Array(await readFile(path))
    expect(new TextDecoder().decode(gunzipSync(raw))).toBe('<svg/>')
    expect(await readSvgText(path)).toBe('<svg/>')
  })

  it('raises a parse error for corrupt .svgz files', async () => {
    const path = join(dir, 'corrupt.svgz')
    await writeFile(path, 'plain text')
    await expect(readSvgText(path)).rejects.toThrow(SvgParseError)
  })

  it('raises a parse error for empty content', () => {
    expect(() => parseSvg('', 'empty.svg')).toThrow(SvgParseError)
  })

  it('resolves output locations and creates parent directories', async () => {
    const source = join(dir, 'in', 'chart.svg')
    expect(await getTargetPath(source)).toBe(source)
    expect(await getTargetPath(source, undefined, join(dir, 'out'))).toBe(join(dir, 'out', 'chart.svg'))
    expect(await getTargetPath(source, join(dir, 'explicit', 'x.svg'), join(dir, 'out'))).toBe(join(dir, 'explicit', 'x.svg'))
    expect((await stat(join(dir, 'out'))).isDirectory()).toBe(true)
    expect((await stat(join(dir, 'explicit'))).isDirectory()).toBe(true)
  })
})
