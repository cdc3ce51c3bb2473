import { describe, it, expect } from 'vitest'
import { assembleFont } from '../src/emoji/assemble'
import { EMOJI_METRICS } from '../src/emoji/metrics'
import { SerializationError } from '../src/errors'
import { createFontBuilder, type FontDocument } from '../src/sfnt/document'
import { getNumGlyphs, parseSfnt } from '../src/sfnt/parse'
import { serializeFont } from '../src/sfnt/serialize'
import { countHMetrics } from '../src/sfnt/tables/hmtx'
import { toLongDateTime } from '../src/sfnt/tables/head'
import { averageCharWidth, unicodeRanges } from '../src/sfnt/tables/os2'
import { computeChecksum } from '../src/shared/checksum'
import { stringToTag } from '../src/shared/known-tags'
import {
  fixedClock,
  lookupCmap4,
  namedSources,
  readCmap12,
  readCmapRecords,
  readName,
  readPostNames,
  readSbix,
  readTag,
  stubPayload,
  stubTransform,
  tableView,
} from './helpers'

async function buildDocument(names = ['a.png', 'b.png', 'c.png']): Promise<FontDocument> {
  const { document } = await assembleFont(namedSources(...names), {
    strikes: [32, 64],
    clock: fixedClock,
    transform: stubTransform,
  })
  return document
}

describe('sfnt - table directory', () => {
  it('lists every table sorted by tag', async () => {
    const font = serializeFont(await buildDocument())
    const view = new DataView(font.buffer, font.byteOffset, font.byteLength)
    const tags = Array.from({ length: view.getUint16(4) }, (_, i) => readTag(view, 12 + i * 16))

    expect(view.getUint32(0)).toBe(0x00010000)
    expect(tags).toEqual(['OS/2', 'cmap', 'glyf', 'head', 'hhea', 'hmtx', 'loca', 'maxp', 'name', 'post', 'sbix'])
  })

  it('writes binary search fields for 11 tables', async () => {
    const font = serializeFont(await buildDocument())
    const view = new DataView(font.buffer, font.byteOffset, font.byteLength)

    expect(view.getUint16(4)).toBe(11)
    expect(view.getUint16(6)).toBe(128) // searchRange
    expect(view.getUint16(8)).toBe(3) // entrySelector
    expect(view.getUint16(10)).toBe(48) // rangeShift
  })

  it('balances the whole-font checksum', async () => {
    const font = serializeFont(await buildDocument())

    expect(font.byteLength % 4).toBe(0)
    expect(computeChecksum(font)).toBe(0xb1b0afba)
  })

  it('records table checksums with checkSumAdjustment zeroed', async () => {
    const font = serializeFont(await buildDocument())
    const parsed = parseSfnt(font)

    for (const entry of parsed.tables.values()) {
      const data = new Uint8Array(font.subarray(entry.offset, entry.offset + entry.length))
      if (entry.tag === stringToTag('head')) new DataView(data.buffer).setUint32(8, 0)
      expect(computeChecksum(data)).toBe(entry.checksum)
    }
  })
})

describe('sfnt - tables', () => {
  it('counts .notdef plus one glyph per image', async () => {
    const font = serializeFont(await buildDocument())
    expect(getNumGlyphs(parseSfnt(font))).toBe(4)
  })

  it('writes the head table', async () => {
    const head = tableView(serializeFont(await buildDocument()), 'head')

    expect(head.byteLength).toBe(54)
    expect(head.getUint32(4)).toBe(0x00010000) // fontRevision 1.0
    expect(head.getUint32(12)).toBe(0x5f0f3cf5)
    expect(head.getUint16(18)).toBe(800)
    expect(head.getBigInt64(20)).toBe(3786912000n)
    expect(head.getBigInt64(28)).toBe(3786912000n)
    expect(head.getUint16(46)).toBe(3) // lowestRecPPEM
    expect(head.getInt16(50)).toBe(0) // short loca
  })

  it('compresses trailing equal advances in hmtx', async () => {
    const font = serializeFont(await buildDocument())
    const hhea = tableView(font, 'hhea')
    const hmtx = tableView(font, 'hmtx')

    expect(hhea.getInt16(4)).toBe(800)
    expect(hhea.getInt16(6)).toBe(-250)
    expect(hhea.getUint16(10)).toBe(800) // advanceWidthMax
    expect(hhea.getUint16(34)).toBe(2)
    expect(hmtx.byteLength).toBe(12)
    expect(hmtx.getUint16(0)).toBe(500)
    expect(hmtx.getUint16(4)).toBe(800)
  })

  it('writes OS/2 version 4 metrics', async () => {
    const os2 = tableView(serializeFont(await buildDocument()), 'OS/2')

    expect(os2.byteLength).toBe(96)
    expect(os2.getUint16(0)).toBe(4)
    expect(os2.getInt16(2)).toBe(725) // (500 + 3 * 800) / 4
    expect(os2.getUint16(4)).toBe(400)
    expect(os2.getUint32(46)).toBe(1 << 25) // bit 57: non-BMP
    expect(readTag(os2, 58)).toBe('NONE')
    expect(os2.getUint16(64)).toBe(0xffff)
    expect(os2.getUint16(66)).toBe(0xffff)
    expect(os2.getInt16(68)).toBe(750)
    expect(os2.getInt16(70)).toBe(-250)
    expect(os2.getUint16(74)).toBe(0)
    expect(os2.getUint16(76)).toBe(0)
    expect(os2.getInt16(86)).toBe(500)
    expect(os2.getInt16(88)).toBe(800)
  })

  it('keeps glyf and loca empty', async () => {
    const font = serializeFont(await buildDocument())
    const loca = tableView(font, 'loca')

    expect(tableView(font, 'glyf').byteLength).toBe(1)
    expect(loca.byteLength).toBe(10)
    for (let i = 0; i < 5; i++) expect(loca.getUint16(i * 2)).toBe(0)
  })

  it('names every glyph in post', async () => {
    const font = serializeFont(await buildDocument())
    expect(readPostNames(font)).toEqual(['.notdef', 'uni1F600', 'uni1F601', 'uni1F602'])
  })

  it('writes Windows name records', async () => {
    const font = serializeFont(await buildDocument())

    expect(readName(font, 1)).toBe('Custom Emoji')
    expect(readName(font, 2)).toBe('Regular')
    expect(readName(font, 4)).toBe('Custom Emoji Regular')
    expect(readName(font, 5)).toBe('Version 1.0')
    expect(readName(font, 6)).toBe('CustomEmoji-Regular')
  })
})

describe('sfnt - cmap', () => {
  it('maps supplementary codepoints through format 12', async () => {
    const font = serializeFont(await buildDocument())
    const records = readCmapRecords(font).map(r => [r.platformId, r.encodingId])

    expect(records).toEqual([
      [0, 3],
      [0, 4],
      [3, 1],
      [3, 10],
    ])
    expect([...readCmap12(font)]).toEqual([
      [0x1f600, 1],
      [0x1f601, 2],
      [0x1f602, 3],
    ])
  })

  it('uses format 4 only for private use codepoints', async () => {
    const { document } = await assembleFont(namedSources('U+E005.png', 'U+E001.png', 'U+E002.png'), {
      mode: 'legacy',
      strikes: [32],
      clock: fixedClock,
      transform: stubTransform,
    })
    const font = serializeFont(document)

    expect(readCmapRecords(font).map(r => [r.platformId, r.encodingId])).toEqual([
      [0, 3],
      [3, 1],
    ])
    expect(lookupCmap4(font, 0xe001)).toBe(1)
    expect(lookupCmap4(font, 0xe002)).toBe(2)
    expect(lookupCmap4(font, 0xe005)).toBe(3)
    expect(lookupCmap4(font, 0xe003)).toBe(0)
    expect(lookupCmap4(font, 0x41)).toBe(0)
  })
})

describe('sfnt - sbix', () => {
  it('stores one strike per size with an empty .notdef', async () => {
    const sbix = readSbix(serializeFont(await buildDocument()))

    expect(sbix.version).toBe(1)
    expect(sbix.flags).toBe(1)
    expect(sbix.strikes.map(s => [s.ppem, s.resolution])).toEqual([
      [32, 72],
      [64, 72],
    ])
    for (const strike of sbix.strikes) {
      expect(strike.glyphs).toHaveLength(4)
      expect(strike.glyphs[0]).toBeNull()
    }
  })

  it('stores payloads with the strike origin offset', async () => {
    const sbix = readSbix(serializeFont(await buildDocument()))
    const [small, large] = sbix.strikes

    expect(small.glyphs[2]).toEqual({
      originOffsetX: 0,
      originOffsetY: -10,
      graphicType: 'png ',
      data: stubPayload('b.png', 32),
    })
    expect(large.glyphs[3]?.originOffsetY).toBe(-20)
    expect(large.glyphs[3]?.data).toEqual(stubPayload('c.png', 64))
  })
})

describe('sfnt - builder', () => {
  const metric = { advanceWidth: 800, leftSideBearing: 0 }

  it('rejects a glyph order without a leading .notdef', () => {
    expect(() => createFontBuilder().setupGlyphOrder(['uni1F600'])).toThrow(SerializationError)
  })

  it('rejects duplicate glyph names', () => {
    expect(() => createFontBuilder().setupGlyphOrder(['.notdef', 'a', 'a'])).toThrow(
      'Font document rejected: duplicate glyph names'
    )
  })

  it('rejects cmap entries for unknown glyphs', () => {
    const stage = createFontBuilder().setupGlyphOrder(['.notdef', 'a'])
    expect(() => stage.setupCharacterMap(new Map([[0x41, 'b']]))).toThrow(
      'Font document rejected: cmap maps to unknown glyph "b"'
    )
  })

  it('requires metrics for every glyph', () => {
    const stage = createFontBuilder()
      .setupGlyphOrder(['.notdef', 'a'])
      .setupCharacterMap(new Map([[0x41, 'a']]))
      .setupGlyf()
    expect(() => stage.setupHorizontalMetrics(new Map([['.notdef', metric]]))).toThrow(
      'Font document rejected: no horizontal metrics for "a"'
    )
  })

  it('requires each strike to cover the glyph order', async () => {
    const document = await buildDocument(['a.png'])
    const stage = createFontBuilder()
      .setupGlyphOrder(document.glyphOrder)
      .setupCharacterMap(document.characterMap)
      .setupGlyf()
      .setupHorizontalMetrics(document.horizontalMetrics)
      .setupHead(document.head)
      .setupHorizontalHeader(document.hhea)
      .setupOS2(document.os2)
      .setupNameTable(document.name)
      .setupPost()
    const [strike] = document.sbix.strikes
    const partial = new Map(strike.glyphs)
    partial.delete('uni1F600')

    expect(() => stage.setupBitmaps({ ...document.sbix, strikes: [{ ...strike, glyphs: partial }] })).toThrow(
      'Font document rejected: strike 32 has no entry for "uni1F600"'
    )
    expect(() => stage.setupBitmaps({ ...document.sbix, strikes: [...document.sbix.strikes].reverse() })).toThrow(
      'Font document rejected: strikes must be in strictly increasing ppem order'
    )
  })

  it('wraps encoder failures in SerializationError', async () => {
    const { document } = await assembleFont(namedSources('a.png'), {
      strikes: [32],
      clock: fixedClock,
      transform: stubTransform,
      names: { familyName: 'x'.repeat(40000) },
    })

    let caught: unknown
    try {
      serializeFont(document)
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(SerializationError)
    expect(caught).toMatchObject({ message: 'Cannot serialize font: uint16 value out of range: 80000' })
    expect(caught instanceof Error && caught.cause).toBeInstanceOf(RangeError)
  })
})

describe('sfnt - helpers', () => {
  it('converts dates to seconds since 1904', () => {
    expect(toLongDateTime(new Date('1970-01-01T00:00:00Z'))).toBe(2082844800)
    expect(toLongDateTime(new Date('2024-01-01T00:00:00Z'))).toBe(3786912000)
  })

  it('counts full horizontal metrics', () => {
    const m = (advanceWidth: number) => ({ advanceWidth, leftSideBearing: 0 })
    expect(countHMetrics([m(500), m(800), m(800), m(800)])).toBe(2)
    expect(countHMetrics([m(800), m(800)])).toBe(1)
    expect(countHMetrics([m(500), m(800), m(600)])).toBe(3)
  })

  it('averages non-zero advances', () => {
    expect(averageCharWidth([{ advanceWidth: 0, leftSideBearing: 0 }, { advanceWidth: 800, leftSideBearing: 0 }])).toBe(800)
    expect(averageCharWidth([])).toBe(0)
  })

  it('sets the non-BMP unicode range bit only when needed', () => {
    expect(unicodeRanges([0xe001])).toEqual([0, 0, 0, 0])
    expect(unicodeRanges([0x1f600])).toEqual([0, 1 << 25, 0, 0])
  })

  it('keeps the design metrics consistent', () => {
    expect(EMOJI_METRICS.ascent - EMOJI_METRICS.descent).toBeGreaterThanOrEqual(EMOJI_METRICS.unitsPerEm)
  })
})
