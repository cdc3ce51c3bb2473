import { bench, describe } from 'vitest'
import { toBitmapTable } from '../src/emoji/assemble'
import { EMOJI_METRICS } from '../src/emoji/metrics'
import { glyphNameForCodepoint } from '../src/emoji/codepoints'
import { GRAPHIC_TYPE_PNG, originOffset, strikeSpec, type Strike, type StrikeGlyph } from '../src/emoji/strike'
import { nameTable, DEFAULT_NAMES } from '../src/config'
import { createFontBuilder, type FontDocument, type HorizontalMetric } from '../src/sfnt/document'
import { serializeFont } from '../src/sfnt/serialize'
import { woffEncode } from '../src/woff/encode'
import { woff2Encode } from '../src/woff2/encode'

function sizeLabel(bytes: number): string {
  return bytes >= 1024 * 1024
    ? `${(bytes / 1024 / 1024).toFixed(1)} MB`
    : `${(bytes / 1024).toFixed(1)} KB`
}

// Payload sizes grow with the strike, roughly like real PNGs
function payload(seed: number, ppem: number): Uint8Array {
  const data = new Uint8Array(ppem * ppem)
  for (let i = 0; i < data.length; i++) data[i] = (seed * 31 + i * 7) & 0xff
  return data
}

function syntheticDocument(glyphCount: number): FontDocument {
  const names = ['.notdef']
  const characterMap = new Map<number, string>()
  for (let i = 0; i < glyphCount; i++) {
    const name = glyphNameForCodepoint(0x1f600 + i)
    names.push(name)
    characterMap.set(0x1f600 + i, name)
  }

  const metrics = new Map<string, HorizontalMetric>()
  for (const name of names) {
    metrics.set(name, { advanceWidth: name === '.notdef' ? 500 : 800, leftSideBearing: 0 })
  }

  const strikes = [32, 64, 128].map((ppem): Strike => {
    const spec = strikeSpec(ppem)
    const origin = originOffset(ppem, { unitsPerEm: EMOJI_METRICS.unitsPerEm, descender: EMOJI_METRICS.descent })
    const glyphs = new Map<string, StrikeGlyph>()
    names.forEach((name, i) => {
      glyphs.set(name, {
        graphicType: GRAPHIC_TYPE_PNG,
        origin: i === 0 ? { x: 0, y: 0 } : origin,
        data: i === 0 ? new Uint8Array(0) : payload(i, ppem),
      })
    })
    return { spec, glyphs }
  })

  const now = new Date('2024-01-01T00:00:00Z')
  return createFontBuilder()
    .setupGlyphOrder(names)
    .setupCharacterMap(characterMap)
    .setupGlyf()
    .setupHorizontalMetrics(metrics)
    .setupHead({ unitsPerEm: 800, created: now, modified: now, fontRevision: 1, lowestRecPPEM: 3 })
    .setupHorizontalHeader({ ascent: 800, descent: -250, lineGap: 0 })
    .setupOS2({
      typoAscender: 750,
      typoDescender: -250,
      typoLineGap: 0,
      winAscent: 0,
      winDescent: 0,
      xHeight: 500,
      capHeight: 800,
      weightClass: 400,
      widthClass: 5,
      vendorId: 'NONE',
    })
    .setupNameTable(nameTable(DEFAULT_NAMES))
    .setupPost()
    .setupBitmaps(toBitmapTable(strikes))
}

const fixtures = [10, 100, 500].map(count => {
  const document = syntheticDocument(count)
  return { label: `${count} glyphs`, document, sfnt: serializeFont(document) }
})

describe('serializeFont', () => {
  for (const f of fixtures) {
    bench(`${f.label} (${sizeLabel(f.sfnt.byteLength)})`, () => {
      serializeFont(f.document)
    })
  }
})

describe('woffEncode', () => {
  for (const f of fixtures) {
    bench(`${f.label} (${sizeLabel(f.sfnt.byteLength)})`, async () => {
      await woffEncode(f.sfnt)
    })
  }
})

describe('woff2Encode', () => {
  for (const f of fixtures) {
    bench(`${f.label} (${sizeLabel(f.sfnt.byteLength)})`, () => {
      woff2Encode(f.sfnt, { quality: 5 })
    })
  }
})
