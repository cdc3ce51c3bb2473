// WOFF 1.0 container around a serialized sfnt
// https://www.w3.org/TR/WOFF/

import { deflate } from 'node:zlib'
import { promisify } from 'node:util'
import { pad4 } from '../shared/checksum'
import { WOFF_SIGNATURE } from '../shared/known-tags'
import { parseSfnt, type SfntTable } from '../sfnt/parse'
import { sfntSize } from '../sfnt/serialize'
import { WriteBuffer } from '../sfnt/write-buffer'

export interface WoffEncodeOptions {
  /** zlib level 1-9, default 9 */
  level?: number
}

const WOFF_HEADER_SIZE = 44
const WOFF_ENTRY_SIZE = 20

const deflateAsync = promisify(deflate)

interface StoredTable {
  entry: SfntTable
  /** zlib stream, or the raw table when zlib does not shrink it */
  data: Uint8Array
}

async function storeTable(entry: SfntTable, raw: Uint8Array, level: number): Promise<StoredTable> {
  const compressed = await deflateAsync(raw, { level })
  if (compressed.byteLength >= raw.byteLength) return { entry, data: raw }
  return { entry, data: new Uint8Array(compressed.buffer, compressed.byteOffset, compressed.byteLength) }
}

export async function woffEncode(sfnt: Uint8Array, options?: WoffEncodeOptions): Promise<Uint8Array> {
  const level = options?.level ?? 9
  const font = parseSfnt(sfnt)
  const entries = [...font.tables.values()].sort((a, b) => a.tag - b.tag)
  const tables = await Promise.all(
    entries.map(entry => storeTable(entry, sfnt.subarray(entry.offset, entry.offset + entry.length), level))
  )

  const dataStart = WOFF_HEADER_SIZE + tables.length * WOFF_ENTRY_SIZE
  const length = tables.reduce((n, table) => n + pad4(table.data.byteLength), dataStart)
  const out = new WriteBuffer(length)

  out.writeU32(WOFF_SIGNATURE)
  out.writeU32(font.flavor)
  out.writeU32(length)
  out.writeU16(tables.length)
  out.writeU16(0) // reserved
  out.writeU32(sfntSize(entries.map(entry => entry.length)))
  out.writeU16(1) // majorVersion
  out.writeU16(0) // minorVersion
  // No metadata or private block: metaOffset, metaLength, metaOrigLength, privOffset, privLength
  for (let i = 0; i < 5; i++) out.writeU32(0)

  let offset = dataStart
  for (const { entry, data } of tables) {
    out.writeU32(entry.tag)
    out.writeU32(offset)
    out.writeU32(data.byteLength)
    out.writeU32(entry.length)
    out.writeU32(entry.checksum)
    offset += pad4(data.byteLength)
  }
  for (const { data } of tables) {
    out.writeBytes(data)
    out.pad4()
  }

  return out.getBytes()
}
