// Serialize a FontDocument to a TrueType (sfnt) binary

import { SerializationError } from '../errors'
import { CHECKSUM_MAGIC, computeChecksum, pad4 } from '../shared/checksum'
import {
  SFNT_TTF,
  TAG_CMAP,
  TAG_GLYF,
  TAG_HEAD,
  TAG_HHEA,
  TAG_HMTX,
  TAG_LOCA,
  TAG_MAXP,
  TAG_NAME,
  TAG_OS2,
  TAG_POST,
  TAG_SBIX,
} from '../shared/known-tags'
import type { FontDocument, HorizontalMetric } from './document'
import { encodeCmap } from './tables/cmap'
import { encodeGlyf } from './tables/glyf'
import { encodeHead, HEAD_CHECKSUM_ADJUSTMENT_OFFSET } from './tables/head'
import { encodeHhea, encodeHmtx } from './tables/hmtx'
import { encodeMaxp } from './tables/maxp'
import { encodeName } from './tables/name'
import { encodeOs2 } from './tables/os2'
import { encodePost } from './tables/post'
import { encodeSbix } from './tables/sbix'
import { WriteBuffer } from './write-buffer'

const SFNT_HEADER_SIZE = 12
const SFNT_ENTRY_SIZE = 16

export function encodeTables(doc: FontDocument): Map<number, Uint8Array> {
  const metrics = doc.glyphOrder.map((name): HorizontalMetric => {
    const metric = doc.horizontalMetrics.get(name)
    if (!metric) throw new Error(`no horizontal metrics for "${name}"`)
    return metric
  })
  const outlines = doc.glyphOrder.map(name => {
    const outline = doc.outlines.get(name)
    if (!outline) throw new Error(`no outline record for "${name}"`)
    return outline
  })
  const codepoints = [...doc.characterMap.keys()]
  const { glyf, loca } = encodeGlyf(outlines)

  return new Map([
    [TAG_OS2, encodeOs2(doc.os2, doc.head.unitsPerEm, metrics, codepoints)],
    [TAG_CMAP, encodeCmap(doc.characterMap, doc.glyphOrder)],
    [TAG_GLYF, glyf],
    [TAG_HEAD, encodeHead(doc.head)],
    [TAG_HHEA, encodeHhea(doc.hhea, metrics)],
    [TAG_HMTX, encodeHmtx(metrics)],
    [TAG_LOCA, loca],
    [TAG_MAXP, encodeMaxp(doc.glyphOrder.length)],
    [TAG_NAME, encodeName(doc.name)],
    [TAG_POST, encodePost(doc.post, doc.glyphOrder)],
    [TAG_SBIX, encodeSbix(doc.sbix, doc.glyphOrder)],
  ])
}

// Byte length of an sfnt holding tables of these lengths, each padded to 4 bytes
export function sfntSize(tableLengths: readonly number[]): number {
  const directorySize = SFNT_HEADER_SIZE + tableLengths.length * SFNT_ENTRY_SIZE
  return tableLengths.reduce((n, length) => n + pad4(length), directorySize)
}

// Lay out tables behind the table directory, sorted by tag
export function writeSfnt(tables: ReadonlyMap<number, Uint8Array>, flavor: number = SFNT_TTF): Uint8Array {
  const tags = [...tables.keys()].sort((a, b) => a - b)
  const numTables = tags.length
  const entrySelector = numTables > 0 ? Math.floor(Math.log2(numTables)) : 0
  const searchRange = (1 << entrySelector) * 16

  const out = new WriteBuffer(sfntSize(tags.map(tag => tables.get(tag)?.byteLength ?? 0)))
  out.writeU32(flavor)
  out.writeU16(numTables)
  out.writeU16(searchRange)
  out.writeU16(entrySelector)
  out.writeU16(numTables * 16 - searchRange)

  let offset = SFNT_HEADER_SIZE + numTables * SFNT_ENTRY_SIZE
  let headOffset = -1
  for (const tag of tags) {
    const data = tables.get(tag) ?? new Uint8Array(0)
    out.writeU32(tag)
    out.writeU32(computeChecksum(data))
    out.writeU32(offset)
    out.writeU32(data.byteLength)
    if (tag === TAG_HEAD) headOffset = offset
    offset += pad4(data.byteLength)
  }

  for (const tag of tags) {
    out.writeBytes(tables.get(tag) ?? new Uint8Array(0))
    out.pad4()
  }

  const font = out.getBytes()
  if (headOffset >= 0) {
    const adjustment = (CHECKSUM_MAGIC - computeChecksum(font)) >>> 0
    out.setU32(headOffset + HEAD_CHECKSUM_ADJUSTMENT_OFFSET, adjustment)
  }
  return font
}

/**
 * Serialize a finished document. Whatever the table encoders reject is
 * reported as a SerializationError carrying the original error as cause.
 */
export function serializeFont(doc: FontDocument): Uint8Array {
  try {
    return writeSfnt(encodeTables(doc))
  } catch (err) {
    if (err instanceof SerializationError) throw err
    throw new SerializationError('Cannot serialize font', err)
  }
}
