import { describe, expect, it } from 'vitest'
import { extract } from '../extractor.js'
import { parseSvg } from '../svg-utils.js'

function svg(body: string): Document {
  return parseSvg(`<svg xmlns="http://www.w3.org/2000/svg">${body}</svg>`)
}

const POPULATION = svg(
  '<switch>'
  + '<text id="trsvg2-fr" systemLanguage="fr"><tspan id="trsvg1-fr">Habitants   2020</tspan></text>'
  + '<text id="trsvg2"><tspan id="trsvg1">Population\n2020</tspan></text>'
  + '</switch>',
)

describe('extract', () => {
  it('maps fallback text to translations and lifts years into titles', () => {
    expect(extract(POPULATION)).toEqual({
      new: { 'population 2020': { fr: 'Habitants 2020' } },
      title: { population: { fr: 'Habitants' } },
    })
  })

  it('keeps the case of keys in case-sensitive mode', () => {
    expect(extract(POPULATION, { caseInsensitive: false })).toEqual({
      new: { 'Population 2020': { fr: 'Habitants 2020' } },
      title: { Population: { fr: 'Habitants' } },
    })
  })

  it('resolves span ids ignoring case when no exact match exists', () => {
    const document = svg(
      '<switch>'
      + '<text id="x-de" systemLanguage="de"><tspan id="LABEL-de">Hallo</tspan></text>'
      + '<text id="x"><tspan id="label">Hello</tspan></text>'
      + '</switch>',
    )
    expect(extract(document).new).toEqual({ hello: { de: 'Hallo' } })
  })

  it('collects every span of a multi-span text', () => {
    const document = svg(
      '<switch>'
      + '<text id="t-fr" systemLanguage="fr"><tspan id="a-fr">Bonjour</tspan><tspan id="b-fr">Monde</tspan></text>'
      + '<text id="t"><tspan id="a">Hello</tspan><tspan id="b">World</tspan></text>'
      + '</switch>',
    )
    expect(extract(document).new).toEqual({
      hello: { fr: 'Bonjour' },
      world: { fr: 'Monde' },
    })
  })

  it('skips switches without a fallback, unresolved spans and empty translations', () => {
    const document = svg(
      '<switch><text id="a" systemLanguage="fr"><tspan id="s-fr">Seul</tspan></text></switch>'
      + '<switch>'
      + '<text id="b-fr" systemLanguage="fr"><tspan id="other-fr">Autre</tspan></text>'
      + '<text id="b-de" systemLanguage="de"><tspan id="s2-de"> </tspan></text>'
      + '<text id="b"><tspan id="s2">Text</tspan></text>'
      + '</switch>',
    )
    expect(extract(document)).toEqual({ new: {}, title: {} })
  })

  it('keeps the last translation seen for a text', () => {
    const document = svg(
      '<switch>'
      + '<text id="a-fr" systemLanguage="fr"><tspan id="s1-fr">Premier</tspan></text>'
      + '<text id="a"><tspan id="s1">Title</tspan></text>'
      + '</switch>'
      + '<switch>'
      + '<text id="b-fr" systemLanguage="fr"><tspan id="s2-fr">Second</tspan></text>'
      + '<text id="b"><tspan id="s2">title</tspan></text>'
      + '</switch>',
    )
    expect(extract(document).new).toEqual({ title: { fr: 'Second' } })
  })
})
