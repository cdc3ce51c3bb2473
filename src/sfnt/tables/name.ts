// name: naming table, format 0, Windows Unicode BMP records

import type { NameTable } from '../document'
import { WriteBuffer } from '../write-buffer'

const PLATFORM_WINDOWS = 3
const ENCODING_UNICODE_BMP = 1
const LANGUAGE_EN_US = 0x0409

// Name ids in ascending order
const NAME_IDS: ReadonlyArray<[number, keyof NameTable]> = [
  [1, 'familyName'],
  [2, 'styleName'],
  [3, 'uniqueFontIdentifier'],
  [4, 'fullName'],
  [5, 'version'],
  [6, 'psName'],
]

// UTF-16BE; JS strings are already UTF-16 code units
function utf16be(s: string): Uint8Array {
  const bytes = new Uint8Array(s.length * 2)
  for (let i = 0; i < s.length; i++) {
    const unit = s.charCodeAt(i)
    bytes[i * 2] = unit >> 8
    bytes[i * 2 + 1] = unit & 0xff
  }
  return bytes
}

export function encodeName(names: NameTable): Uint8Array {
  const records = NAME_IDS
    .map(([nameId, key]) => ({ nameId, data: utf16be(names[key]) }))
    .filter(record => record.data.byteLength > 0)

  const storageOffset = 6 + records.length * 12
  const out = new WriteBuffer(storageOffset + records.reduce((n, r) => n + r.data.byteLength, 0))

  out.writeU16(0) // format
  out.writeU16(records.length)
  out.writeU16(storageOffset)

  let offset = 0
  for (const record of records) {
    out.writeU16(PLATFORM_WINDOWS)
    out.writeU16(ENCODING_UNICODE_BMP)
    out.writeU16(LANGUAGE_EN_US)
    out.writeU16(record.nameId)
    out.writeU16(record.data.byteLength)
    out.writeU16(offset)
    offset += record.data.byteLength
  }
  for (const record of records) {
    out.writeBytes(record.data)
  }

  return out.getBytes()
}
