// sfnt table directory reader

import { SFNT_CFF, SFNT_TTF, TAG_MAXP, stringToTag } from '../shared/known-tags'

export interface SfntTable {
  tag: number
  checksum: number
  offset: number
  length: number
}

export interface SfntFont {
  flavor: number
  tables: Map<number, SfntTable>
  data: Uint8Array
  view: DataView
}

export function parseSfnt(data: Uint8Array): SfntFont {
  if (data.byteLength < 12) {
    throw new Error('Buffer too small for SFNT header')
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
  const flavor = view.getUint32(0)

  if (flavor !== SFNT_TTF && flavor !== SFNT_CFF) {
    throw new Error(`Unknown SFNT signature: 0x${flavor.toString(16)}`)
  }

  const numTables = view.getUint16(4)
  const tables = new Map<number, SfntTable>()

  for (let i = 0; i < numTables; i++) {
    const recordOffset = 12 + i * 16

    if (recordOffset + 16 > data.byteLength) {
      throw new Error('Table directory truncated')
    }

    const tag = view.getUint32(recordOffset)
    const checksum = view.getUint32(recordOffset + 4)
    const offset = view.getUint32(recordOffset + 8)
    const length = view.getUint32(recordOffset + 12)

    if (offset + length > data.byteLength) {
      throw new Error(`Table at ${offset} (+${length}) runs past end of font`)
    }

    tables.set(tag, { tag, checksum, offset, length })
  }

  return { flavor, tables, data, view }
}

// Get table data as Uint8Array slice (zero-copy)
export function getTableData(font: SfntFont, tag: number | string): Uint8Array | null {
  const entry = font.tables.get(typeof tag === 'string' ? stringToTag(tag) : tag)
  if (!entry) return null
  return font.data.subarray(entry.offset, entry.offset + entry.length)
}

// Read numGlyphs from maxp table
export function getNumGlyphs(font: SfntFont): number {
  const maxp = font.tables.get(TAG_MAXP)
  if (!maxp || maxp.length < 6) {
    throw new Error('Missing or invalid maxp table')
  }
  return font.view.getUint16(maxp.offset + 4)
}
