// post: PostScript table, format 2.0 with glyph names

import { NOTDEF_GLYPH, type PostTable } from '../document'
import { WriteBuffer } from '../write-buffer'

// Index of .notdef among the 258 standard Macintosh glyph names
const STANDARD_NOTDEF_INDEX = 0
const STANDARD_NAME_COUNT = 258

export function encodePost(post: PostTable, glyphOrder: readonly string[]): Uint8Array {
  const out = new WriteBuffer(34 + glyphOrder.length * 12)

  out.writeU32(0x00020000) // version 2.0
  out.writeU32(Math.round(post.italicAngle * 0x10000) >>> 0)
  out.writeS16(post.underlinePosition)
  out.writeS16(post.underlineThickness)
  out.writeU32(post.isFixedPitch ? 1 : 0)
  out.writeU32(0) // minMemType42
  out.writeU32(0) // maxMemType42
  out.writeU32(0) // minMemType1
  out.writeU32(0) // maxMemType1

  // Every name other than .notdef is stored as a Pascal string
  const custom: string[] = []
  out.writeU16(glyphOrder.length)
  for (const name of glyphOrder) {
    if (name === NOTDEF_GLYPH) {
      out.writeU16(STANDARD_NOTDEF_INDEX)
    } else {
      out.writeU16(STANDARD_NAME_COUNT + custom.length)
      custom.push(name)
    }
  }

  for (const name of custom) {
    if (!/^[\x21-\x7e]{1,63}$/.test(name)) {
      throw new Error(`Glyph name "${name}" is not a valid PostScript name`)
    }
    out.writeU8(name.length)
    for (let i = 0; i < name.length; i++) out.writeU8(name.charCodeAt(i))
  }

  return out.getBytes()
}
