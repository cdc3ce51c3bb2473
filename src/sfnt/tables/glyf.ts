// glyf + loca for a font whose outlines are all empty

import type { EmptyOutline } from '../document'
import { WriteBuffer } from '../write-buffer'

export interface GlyfTables {
  glyf: Uint8Array
  loca: Uint8Array
}

// Every glyph has zero length, so every short loca offset is 0.
// glyf keeps a single zero byte; some validators reject an empty table.
export function encodeGlyf(outlines: readonly EmptyOutline[]): GlyfTables {
  const loca = new WriteBuffer((outlines.length + 1) * 2)
  for (let i = 0; i <= outlines.length; i++) {
    loca.writeU16(0)
  }
  return { glyf: new Uint8Array(1), loca: loca.getBytes() }
}
