// OS/2: OS/2 and Windows metrics, version 4

import type { HorizontalMetric, Os2Table } from '../document'
import { WriteBuffer } from '../write-buffer'

export const OS2_TABLE_SIZE = 96

// fsSelection bit 6
const FS_SELECTION_REGULAR = 0x0040
// ulUnicodeRange bit 57: characters beyond the BMP
const UNICODE_RANGE_NON_PLANE_0 = 57

// Rounded mean of the non-zero advance widths
export function averageCharWidth(metrics: readonly HorizontalMetric[]): number {
  const advances = metrics.map(m => m.advanceWidth).filter(w => w > 0)
  if (advances.length === 0) return 0
  return Math.round(advances.reduce((a, b) => a + b, 0) / advances.length)
}

export function unicodeRanges(codepoints: readonly number[]): [number, number, number, number] {
  const ranges: [number, number, number, number] = [0, 0, 0, 0]
  if (codepoints.some(cp => cp > 0xffff)) {
    const word = Math.floor(UNICODE_RANGE_NON_PLANE_0 / 32)
    ranges[word] = (ranges[word] | (1 << (UNICODE_RANGE_NON_PLANE_0 % 32))) >>> 0
  }
  return ranges
}

export function encodeOs2(
  os2: Os2Table,
  unitsPerEm: number,
  metrics: readonly HorizontalMetric[],
  codepoints: readonly number[]
): Uint8Array {
  const out = new WriteBuffer(OS2_TABLE_SIZE)
  const em = (ratio: number) => Math.round(unitsPerEm * ratio)
  const first = codepoints.reduce((min, cp) => Math.min(min, cp), codepoints[0] ?? 0)
  const last = codepoints.reduce((max, cp) => Math.max(max, cp), 0)

  out.writeU16(4) // version
  out.writeS16(averageCharWidth(metrics))
  out.writeU16(os2.weightClass)
  out.writeU16(os2.widthClass)
  out.writeU16(0) // fsType: installable embedding
  out.writeS16(em(0.65)) // ySubscriptXSize
  out.writeS16(em(0.6)) // ySubscriptYSize
  out.writeS16(0) // ySubscriptXOffset
  out.writeS16(em(0.075)) // ySubscriptYOffset
  out.writeS16(em(0.65)) // ySuperscriptXSize
  out.writeS16(em(0.6)) // ySuperscriptYSize
  out.writeS16(0) // ySuperscriptXOffset
  out.writeS16(em(0.35)) // ySuperscriptYOffset
  out.writeS16(em(0.05)) // yStrikeoutSize
  out.writeS16(em(0.3)) // yStrikeoutPosition
  out.writeS16(0) // sFamilyClass
  for (let i = 0; i < 10; i++) out.writeU8(0) // panose
  for (const range of unicodeRanges(codepoints)) out.writeU32(range)
  out.writeTag(os2.vendorId)
  out.writeU16(FS_SELECTION_REGULAR)
  out.writeU16(Math.min(first, 0xffff))
  out.writeU16(Math.min(last, 0xffff))
  out.writeS16(os2.typoAscender)
  out.writeS16(os2.typoDescender)
  out.writeS16(os2.typoLineGap)
  out.writeU16(os2.winAscent)
  out.writeU16(os2.winDescent)
  out.writeU32(0) // ulCodePageRange1
  out.writeU32(0) // ulCodePageRange2
  out.writeS16(os2.xHeight)
  out.writeS16(os2.capHeight)
  out.writeU16(0) // usDefaultChar
  out.writeU16(0x20) // usBreakChar
  out.writeU16(0) // usMaxContext

  return out.getBytes()
}
