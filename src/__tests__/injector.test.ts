import type { MappingFile } from '../types.js'
import { describe, expect, it } from 'vitest'
import { addStats, createStats, inject } from '../injector.js'
import { prepare } from '../prepare.js'
import { parseSvg, serializeSvg } from '../svg-utils.js'

const SVG_OPEN = '<svg xmlns="http://www.w3.org/2000/svg">'

const LA_MAPPING: MappingFile = { new: { 'lang none': { la: 'lang la' } } }

function injectString(xml: string, mapping: MappingFile, overwrite = false) {
  const result = inject(parseSvg(xml), mapping, { overwrite })
  if (!result.ok) {
    throw result.error
  }
  return { output: serializeSvg(result.document), stats: result.stats }
}

describe('inject', () => {
  it('adds a variant before the fallback with derived ids', () => {
    const { output, stats } = injectString(`${SVG_OPEN}<switch><text>lang none</text></switch></svg>`, LA_MAPPING)
    expect(output).toBe(
      `${SVG_OPEN}<switch>`
      + '<text id="trsvg2-la" systemLanguage="la"><tspan id="trsvg1-la">lang la</tspan></text>'
      + '<text id="trsvg2"><tspan id="trsvg1">lang none</tspan></text>'
      + '</switch></svg>',
    )
    expect(stats).toEqual({
      processedSwitches: 1,
      insertedTranslations: 1,
      updatedTranslations: 0,
      skippedTranslations: 0,
      newLanguages: 1,
      errors: 0,
    })
  })

  const EXISTING = `${SVG_OPEN}<switch>`
    + '<text id="trsvg4" systemLanguage="la"><tspan id="trsvg3">old la</tspan></text>'
    + '<text id="trsvg2"><tspan id="trsvg1">lang none</tspan></text>'
    + '</switch></svg>'

  it('skips existing variants unless overwriting', () => {
    const { output, stats } = injectString(EXISTING, LA_MAPPING)
    expect(output).toBe(EXISTING)
    expect(stats.skippedTranslations).toBe(1)
    expect(stats.insertedTranslations).toBe(0)
    expect(stats.newLanguages).toBe(0)
  })

  it('rewrites existing variants when overwriting', () => {
    const { output, stats } = injectString(EXISTING, LA_MAPPING, true)
    expect(output).toBe(EXISTING.replace('old la', 'lang la'))
    expect(stats.updatedTranslations).toBe(1)
    expect(stats.skippedTranslations).toBe(0)
  })

  it('matches fallback text ignoring case and whitespace', () => {
    const { stats } = injectString(`${SVG_OPEN}<text>  Lang\n None </text></svg>`, LA_MAPPING)
    expect(stats.insertedTranslations).toBe(1)
  })

  it('matches case exactly when asked to', () => {
    const result = inject(parseSvg(`${SVG_OPEN}<text>Lang None</text></svg>`), LA_MAPPING, { caseInsensitive: false })
    expect(result.ok && result.stats.processedSwitches).toBe(0)
  })

  it('falls back to title templates for year-suffixed texts', () => {
    const { output } = injectString(
      `${SVG_OPEN}<switch><text id="t"><tspan id="s">Population 2031</tspan></text></switch></svg>`,
      { title: { population: { fr: 'Habitants' } } },
    )
    expect(output).toBe(
      `${SVG_OPEN}<switch>`
      + '<text id="t-fr" systemLanguage="fr"><tspan id="s-fr">Habitants 2031</tspan></text>'
      + '<text id="t"><tspan id="s">Population 2031</tspan></text>'
      + '</switch></svg>',
    )
  })

  it('matches title templates whose keys keep their case', () => {
    const { output, stats } = injectString(
      `${SVG_OPEN}<switch><text id="t"><tspan id="s">Population 2031</tspan></text></switch></svg>`,
      { title: { Population: { ar: 'السكان' } } },
    )
    expect(stats.insertedTranslations).toBe(1)
    expect(output).toContain('<tspan id="s-ar">السكان 2031</tspan>')
  })

  it('only adds languages every span can be translated into', () => {
    const { output, stats } = injectString(
      `${SVG_OPEN}<switch><text id="t"><tspan id="a">Hello</tspan><tspan id="b">World</tspan></text></switch></svg>`,
      { new: { hello: { fr: 'Bonjour', de: 'Hallo' }, world: { fr: 'Monde' } } },
    )
    expect(output).toBe(
      `${SVG_OPEN}<switch>`
      + '<text id="t-fr" systemLanguage="fr"><tspan id="a-fr">Bonjour</tspan><tspan id="b-fr">Monde</tspan></text>'
      + '<text id="t"><tspan id="a">Hello</tspan><tspan id="b">World</tspan></text>'
      + '</switch></svg>',
    )
    expect(stats.insertedTranslations).toBe(1)
  })

  it('keeps the indentation of the switch', () => {
    const input = `${SVG_OPEN}\n  <switch>\n    <text id="t"><tspan id="s">Hi</tspan></text>\n  </switch>\n</svg>`
    const { output } = injectString(input, { new: { hi: { fr: 'Salut' } } })
    expect(output).toBe(
      `${SVG_OPEN}\n  <switch>\n`
      + '    <text id="t-fr" systemLanguage="fr"><tspan id="s-fr">Salut</tspan></text>\n'
      + '    <text id="t"><tspan id="s">Hi</tspan></text>\n'
      + '  </switch>\n</svg>',
    )
  })

  it('avoids ids already used elsewhere in the document', () => {
    const { output } = injectString(`${SVG_OPEN}<rect id="trsvg1-la"/><text>lang none</text></svg>`, LA_MAPPING)
    expect(output).toBe(
      `${SVG_OPEN}<rect id="trsvg1-la"/><switch>`
      + '<text id="trsvg2-la" systemLanguage="la"><tspan id="trsvg1-la-2">lang la</tspan></text>'
      + '<text id="trsvg2"><tspan id="trsvg1">lang none</tspan></text>'
      + '</switch></svg>',
    )
  })

  it('canonicalizes mapping languages', () => {
    const { output } = injectString(
      `${SVG_OPEN}<switch><text id="t"><tspan id="s">Hi</tspan></text></switch></svg>`,
      { new: { hi: { PT_br: 'Oi' } } },
    )
    expect(output).toContain('<text id="t-pt-BR" systemLanguage="pt-BR"><tspan id="s-pt-BR">Oi</tspan></text>')
  })

  it('counts a new language once per document', () => {
    const { stats } = injectString(
      `${SVG_OPEN}<text>One</text><text>Two</text></svg>`,
      { new: { one: { fr: 'Un' }, two: { fr: 'Deux' } } },
    )
    expect(stats).toMatchObject({ processedSwitches: 2, insertedTranslations: 2, newLanguages: 1 })
  })

  it('leaves switches without translations untouched', () => {
    const input = `${SVG_OPEN}<switch><text id="t"><tspan id="s">Unknown</tspan></text></switch></svg>`
    const { output, stats } = injectString(input, LA_MAPPING)
    expect(output).toBe(input)
    expect(stats).toEqual(createStats())
  })

  it('produces output that normalizes to itself', () => {
    const inputs = [
      `${SVG_OPEN}<switch><text>lang none</text></switch></svg>`,
      `${SVG_OPEN}\n  <text style="fill:red">lang none</text>\n  <text systemLanguage="la">old<tspan>lang none</tspan></text>\n</svg>`,
    ]
    for (const input of inputs) {
      const { output } = injectString(input, LA_MAPPING, true)
      const again = prepare(parseSvg(output))
      expect(again.ok && serializeSvg(again.document)).toBe(output)
    }
  })

  it('reports structural errors instead of injecting', () => {
    const result = inject(parseSvg(`${SVG_OPEN}<text><tref href="#x"/></text></svg>`), LA_MAPPING)
    expect(result.ok).toBe(false)
    expect(!result.ok && result.error.code).toBe('contains-tref')
  })
})

describe('addStats', () => {
  it('sums every counter', () => {
    const a = { ...createStats(), insertedTranslations: 2, errors: 1 }
    const b = { ...createStats(), insertedTranslations: 3, newLanguages: 1 }
    expect(addStats(a, b)).toEqual({ ...createStats(), insertedTranslations: 5, newLanguages: 1, errors: 1 })
  })
})
