// head: font header

import type { HeadTable } from '../document'
import { WriteBuffer } from '../write-buffer'

export const HEAD_TABLE_SIZE = 54
// Byte offset of checkSumAdjustment within head
export const HEAD_CHECKSUM_ADJUSTMENT_OFFSET = 8

const HEAD_MAGIC = 0x5f0f3cf5
// Baseline at y=0, left sidebearing at x=0
const HEAD_FLAGS = 0x0003
// Seconds between 1904-01-01 and 1970-01-01
const MAC_EPOCH_OFFSET = 2082844800

export function toLongDateTime(date: Date): number {
  const seconds = Math.floor(date.getTime() / 1000)
  if (!Number.isFinite(seconds)) {
    throw new Error(`Invalid timestamp: ${String(date)}`)
  }
  return seconds + MAC_EPOCH_OFFSET
}

// checkSumAdjustment is written as 0 and patched once the font is laid out
export function encodeHead(head: HeadTable): Uint8Array {
  const out = new WriteBuffer(HEAD_TABLE_SIZE)

  out.writeU16(1) // majorVersion
  out.writeU16(0) // minorVersion
  out.writeU32(Math.round(head.fontRevision * 0x10000) >>> 0)
  out.writeU32(0) // checkSumAdjustment
  out.writeU32(HEAD_MAGIC)
  out.writeU16(HEAD_FLAGS)
  out.writeU16(head.unitsPerEm)
  out.writeI64(toLongDateTime(head.created))
  out.writeI64(toLongDateTime(head.modified))
  // Bounding box over all outlines; every outline is empty
  out.writeS16(0) // xMin
  out.writeS16(0) // yMin
  out.writeS16(0) // xMax
  out.writeS16(0) // yMax
  out.writeU16(0) // macStyle
  out.writeU16(head.lowestRecPPEM)
  out.writeS16(2) // fontDirectionHint
  out.writeS16(0) // indexToLocFormat: short
  out.writeS16(0) // glyphDataFormat

  return out.getBytes()
}
