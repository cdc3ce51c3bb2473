// cmap: character to glyph index mapping
// Format 4 covers the BMP; format 12 is added when any codepoint lies beyond it.

import { WriteBuffer } from '../write-buffer'

interface Segment {
  start: number
  end: number
  startGlyph: number
}

interface EncodingRecord {
  platformId: number
  encodingId: number
  subtable: 'format4' | 'format12'
}

// Runs where both codepoint and glyph id increase by one
function segments(mapping: ReadonlyArray<[number, number]>): Segment[] {
  const result: Segment[] = []
  for (const [codepoint, glyph] of mapping) {
    const last = result[result.length - 1]
    if (last && codepoint === last.end + 1 && glyph === last.startGlyph + (codepoint - last.start)) {
      last.end = codepoint
    } else {
      result.push({ start: codepoint, end: codepoint, startGlyph: glyph })
    }
  }
  return result
}

function log2Floor(n: number): number {
  return n > 0 ? Math.floor(Math.log2(n)) : 0
}

function encodeFormat4(mapping: ReadonlyArray<[number, number]>): Uint8Array {
  const segs = segments(mapping.filter(([cp]) => cp < 0xffff))
  // Final segment required by the format
  segs.push({ start: 0xffff, end: 0xffff, startGlyph: 0 })

  const segCount = segs.length
  const entrySelector = log2Floor(segCount)
  const searchRange = 2 * (1 << entrySelector)
  const length = 16 + segCount * 8
  const out = new WriteBuffer(length)

  out.writeU16(4)
  out.writeU16(length)
  out.writeU16(0) // language
  out.writeU16(segCount * 2)
  out.writeU16(searchRange)
  out.writeU16(entrySelector)
  out.writeU16(segCount * 2 - searchRange)
  for (const seg of segs) out.writeU16(seg.end)
  out.writeU16(0) // reservedPad
  for (const seg of segs) out.writeU16(seg.start)
  // idDelta is added modulo 65536; the final segment maps 0xFFFF to glyph 0
  for (const seg of segs) {
    const delta = seg.start === 0xffff ? 1 : seg.startGlyph - seg.start
    out.writeU16(delta & 0xffff)
  }
  for (let i = 0; i < segCount; i++) out.writeU16(0) // idRangeOffset

  return out.getBytes()
}

function encodeFormat12(mapping: ReadonlyArray<[number, number]>): Uint8Array {
  const groups = segments(mapping)
  const length = 16 + groups.length * 12
  const out = new WriteBuffer(length)

  out.writeU16(12)
  out.writeU16(0) // reserved
  out.writeU32(length)
  out.writeU32(0) // language
  out.writeU32(groups.length)
  for (const group of groups) {
    out.writeU32(group.start)
    out.writeU32(group.end)
    out.writeU32(group.startGlyph)
  }

  return out.getBytes()
}

export function encodeCmap(
  characterMap: ReadonlyMap<number, string>,
  glyphOrder: readonly string[]
): Uint8Array {
  const glyphIds = new Map(glyphOrder.map((name, id): [string, number] => [name, id]))
  const mapping: Array<[number, number]> = []
  for (const [codepoint, name] of characterMap) {
    const id = glyphIds.get(name)
    if (id === undefined) throw new Error(`cmap maps U+${codepoint.toString(16)} to unknown glyph "${name}"`)
    mapping.push([codepoint, id])
  }
  mapping.sort((a, b) => a[0] - b[0])

  const format4 = encodeFormat4(mapping)
  const needsFormat12 = mapping.some(([cp]) => cp > 0xffff)
  const format12 = needsFormat12 ? encodeFormat12(mapping) : null

  // Sorted by platform, then encoding
  const records: EncodingRecord[] = [{ platformId: 0, encodingId: 3, subtable: 'format4' }]
  if (format12) records.push({ platformId: 0, encodingId: 4, subtable: 'format12' })
  records.push({ platformId: 3, encodingId: 1, subtable: 'format4' })
  if (format12) records.push({ platformId: 3, encodingId: 10, subtable: 'format12' })

  const headerSize = 4 + records.length * 8
  const format4Offset = headerSize
  const format12Offset = format4Offset + format4.byteLength
  const out = new WriteBuffer(format12Offset + (format12?.byteLength ?? 0))

  out.writeU16(0) // version
  out.writeU16(records.length)
  for (const record of records) {
    out.writeU16(record.platformId)
    out.writeU16(record.encodingId)
    out.writeU32(record.subtable === 'format4' ? format4Offset : format12Offset)
  }
  out.writeBytes(format4)
  if (format12) out.writeBytes(format12)

  return out.getBytes()
}
