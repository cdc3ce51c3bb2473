// WOFF2 encoder
// https://www.w3.org/TR/WOFF2/
//
// Tables are stored untransformed (null transform for glyf/loca) in a single
// Brotli stream compressed in font mode.

import { brotliCompressSync, constants as zlibConstants } from 'node:zlib'
import { WriteBuffer, sizeBase128 } from '../sfnt/write-buffer'
import { parseSfnt } from '../sfnt/parse'
import { sfntSize } from '../sfnt/serialize'
import {
  TAG_GLYF,
  TAG_LOCA,
  TAG_HEAD,
  TAG_DSIG,
  WOFF2_SIGNATURE,
  getKnownTagIndex,
} from '../shared/known-tags'

export interface Woff2EncodeOptions {
  quality?: number // 0-11, default 11
}

const WOFF2_HEADER_SIZE = 48

// head table bit 11 flag (must be set per WOFF2 spec)
const HEAD_FLAG_BIT_11 = 1 << 11

// Transform version 3 means "not transformed" for glyf and loca
const NULL_TRANSFORM_GLYF_LOCA = 0xc0

interface TableInfo {
  tag: number
  flags: number
  data: Uint8Array
}

function compress(data: Uint8Array, quality: number): Uint8Array {
  const result = brotliCompressSync(data, {
    params: {
      [zlibConstants.BROTLI_PARAM_MODE]: zlibConstants.BROTLI_MODE_FONT,
      [zlibConstants.BROTLI_PARAM_QUALITY]: quality,
      [zlibConstants.BROTLI_PARAM_SIZE_HINT]: data.byteLength,
    },
  })
  return new Uint8Array(result.buffer, result.byteOffset, result.byteLength)
}

// Encode TTF/OTF to WOFF2 format
export function woff2Encode(
  data: ArrayBuffer | Uint8Array,
  options?: Woff2EncodeOptions
): Uint8Array {
  const input = data instanceof Uint8Array ? data : new Uint8Array(data)
  const quality = options?.quality ?? 11

  const font = parseSfnt(input)

  // Sorted by tag, excluding DSIG (must be removed per spec)
  const entries = [...font.tables.values()]
    .filter(entry => entry.tag !== TAG_DSIG)
    .sort((a, b) => a.tag - b.tag)

  const tableInfos: TableInfo[] = entries.map(entry => {
    const raw = input.subarray(entry.offset, entry.offset + entry.length)
    let flags = getKnownTagIndex(entry.tag) & 0x3f
    if (entry.tag === TAG_GLYF || entry.tag === TAG_LOCA) {
      flags |= NULL_TRANSFORM_GLYF_LOCA
    }

    if (entry.tag === TAG_HEAD) {
      const tableData = new Uint8Array(raw)
      const view = new DataView(tableData.buffer)
      view.setUint16(16, view.getUint16(16) | HEAD_FLAG_BIT_11)
      return { tag: entry.tag, flags, data: tableData }
    }
    return { tag: entry.tag, flags, data: raw }
  })

  // Concatenate all table data for compression
  const totalTableSize = tableInfos.reduce((n, info) => n + info.data.byteLength, 0)
  const tableDataStream = new Uint8Array(totalTableSize)
  let streamOffset = 0
  for (const info of tableInfos) {
    tableDataStream.set(info.data, streamOffset)
    streamOffset += info.data.byteLength
  }

  const compressed = compress(tableDataStream, quality)

  const totalSfntSize = sfntSize(tableInfos.map(info => info.data.byteLength))

  let tableDirectorySize = 0
  for (const info of tableInfos) {
    tableDirectorySize += 1 // flags byte
    if ((info.flags & 0x3f) === 63) {
      tableDirectorySize += 4 // arbitrary tag
    }
    tableDirectorySize += sizeBase128(info.data.byteLength)
  }

  // Compressed data is padded to 4 bytes when it ends the file
  const totalSize = WOFF2_HEADER_SIZE + tableDirectorySize + ((compressed.byteLength + 3) & ~3)
  const output = new WriteBuffer(totalSize)

  output.writeU32(WOFF2_SIGNATURE) // signature 'wOF2'
  output.writeU32(font.flavor) // flavor (original SFNT signature)
  output.writeU32(totalSize) // length
  output.writeU16(tableInfos.length) // numTables
  output.writeU16(0) // reserved
  output.writeU32(totalSfntSize) // totalSfntSize
  output.writeU32(compressed.byteLength) // totalCompressedSize
  output.writeU16(1) // majorVersion
  output.writeU16(0) // minorVersion
  output.writeU32(0) // metaOffset
  output.writeU32(0) // metaLength
  output.writeU32(0) // metaOrigLength
  output.writeU32(0) // privOffset
  output.writeU32(0) // privLength

  for (const info of tableInfos) {
    output.writeU8(info.flags)
    if ((info.flags & 0x3f) === 63) {
      output.writeU32(info.tag)
    }
    // Null transforms carry no transformLength
    output.writeBase128(info.data.byteLength)
  }

  output.writeBytes(compressed)
  output.pad4()

  return output.getBytes()
}
