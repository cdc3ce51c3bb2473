// sbix: standard bitmap graphics table
// https://learn.microsoft.com/en-us/typography/opentype/spec/sbix

import { WriteBuffer } from '../write-buffer'

export interface BitmapGlyph {
  /** 4-byte graphic type tag, e.g. 'png ' */
  readonly graphicType: string
  readonly originOffsetX: number
  readonly originOffsetY: number
  readonly data: Uint8Array
}

export interface BitmapStrike {
  readonly ppem: number
  /** Pixels per inch the strike was designed for */
  readonly resolution: number
  readonly glyphs: ReadonlyMap<string, BitmapGlyph>
}

export interface BitmapTable {
  readonly version: 1
  /** Bit 0 is always set; bit 1 asks to draw outlines as well */
  readonly flags: number
  /** Ascending ppem */
  readonly strikes: readonly BitmapStrike[]
}

export const SBIX_FLAGS_DEFAULT = 0x0001

const SBIX_HEADER_SIZE = 8
const STRIKE_HEADER_SIZE = 4
const GLYPH_HEADER_SIZE = 8

// Empty payloads are stored as zero-length entries (no glyph record)
function glyphRecordLength(glyph: BitmapGlyph): number {
  return glyph.data.byteLength === 0 ? 0 : GLYPH_HEADER_SIZE + glyph.data.byteLength
}

function writeStrike(out: WriteBuffer, strike: BitmapStrike, glyphOrder: readonly string[]): void {
  const glyphs = glyphOrder.map(name => {
    const glyph = strike.glyphs.get(name)
    if (!glyph) throw new Error(`strike ${strike.ppem} has no entry for "${name}"`)
    return glyph
  })

  out.writeU16(strike.ppem)
  out.writeU16(strike.resolution)

  // glyphDataOffsets[numGlyphs + 1], relative to the strike start
  let offset = STRIKE_HEADER_SIZE + (glyphs.length + 1) * 4
  for (const glyph of glyphs) {
    out.writeU32(offset)
    offset += glyphRecordLength(glyph)
  }
  out.writeU32(offset)

  for (const glyph of glyphs) {
    if (glyph.data.byteLength === 0) continue
    out.writeS16(glyph.originOffsetX)
    out.writeS16(glyph.originOffsetY)
    out.writeTag(glyph.graphicType)
    out.writeBytes(glyph.data)
  }
}

export function strikeLength(strike: BitmapStrike, glyphOrder: readonly string[]): number {
  let length = STRIKE_HEADER_SIZE + (glyphOrder.length + 1) * 4
  for (const name of glyphOrder) {
    const glyph = strike.glyphs.get(name)
    if (glyph) length += glyphRecordLength(glyph)
  }
  return length
}

export function encodeSbix(table: BitmapTable, glyphOrder: readonly string[]): Uint8Array {
  const numStrikes = table.strikes.length
  const lengths = table.strikes.map(strike => strikeLength(strike, glyphOrder))
  const total = SBIX_HEADER_SIZE + numStrikes * 4 + lengths.reduce((a, b) => a + b, 0)
  const out = new WriteBuffer(total)

  out.writeU16(table.version)
  out.writeU16(table.flags | SBIX_FLAGS_DEFAULT)
  out.writeU32(numStrikes)

  // strikeOffsets, relative to the table start
  let offset = SBIX_HEADER_SIZE + numStrikes * 4
  for (const length of lengths) {
    out.writeU32(offset)
    offset += length
  }

  for (const strike of table.strikes) {
    writeStrike(out, strike, glyphOrder)
  }

  return out.getBytes()
}
