import sharp from 'sharp'
import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { ImageTransformer } from '../src/emoji/image'
import { memorySource, type SourceImage } from '../src/emoji/sources'
import { getTableData, parseSfnt } from '../src/sfnt/parse'

export const FIXED_DATE = new Date('2024-01-01T00:00:00Z')
export const fixedClock = () => FIXED_DATE

// Solid red image; 3 channels means no alpha
export async function makePng(width: number, height: number, channels: 3 | 4 = 4): Promise<Uint8Array> {
  const buf = await sharp({
    create: { width, height, channels, background: { r: 255, g: 0, b: 0, alpha: 1 } },
  })
    .png()
    .toBuffer()
  return new Uint8Array(buf)
}

export function namedSources(...names: string[]): SourceImage[] {
  return names.map(name => memorySource(name, new Uint8Array(0)))
}

export function stubPayload(name: string, size: number): Uint8Array {
  return new TextEncoder().encode(`${name}@${size}`)
}

// Encodes "<file name>@<size>" instead of rendering
export const stubTransform: ImageTransformer = async (image, size) => ({
  size,
  placement: { width: size, height: size, left: 0, top: 0, right: 0, bottom: 0 },
  data: stubPayload(image.name, size),
})

export function tempDir(): { path: string; cleanup: () => void } {
  const path = mkdtempSync(join(tmpdir(), 'sbix-builder-'))
  return { path, cleanup: () => rmSync(path, { recursive: true, force: true }) }
}

export function tableView(font: Uint8Array, tag: string): DataView {
  const data = getTableData(parseSfnt(font), tag)
  if (!data) throw new Error(`missing ${tag}`)
  return new DataView(data.buffer, data.byteOffset, data.byteLength)
}

export function readTag(view: DataView, offset: number): string {
  return String.fromCharCode(
    view.getUint8(offset),
    view.getUint8(offset + 1),
    view.getUint8(offset + 2),
    view.getUint8(offset + 3)
  )
}

// Glyph names from a format 2.0 post table
export function readPostNames(font: Uint8Array): string[] {
  const view = tableView(font, 'post')
  const numGlyphs = view.getUint16(32)
  const indices: number[] = []
  for (let i = 0; i < numGlyphs; i++) indices.push(view.getUint16(34 + i * 2))

  const custom: string[] = []
  let pos = 34 + numGlyphs * 2
  while (pos < view.byteLength) {
    const length = view.getUint8(pos)
    let name = ''
    for (let i = 0; i < length; i++) name += String.fromCharCode(view.getUint8(pos + 1 + i))
    custom.push(name)
    pos += 1 + length
  }
  return indices.map(index => (index === 0 ? '.notdef' : custom[index - 258]))
}

interface CmapSubtable {
  platformId: number
  encodingId: number
  offset: number
}

export function readCmapRecords(font: Uint8Array): CmapSubtable[] {
  const view = tableView(font, 'cmap')
  const count = view.getUint16(2)
  const records: CmapSubtable[] = []
  for (let i = 0; i < count; i++) {
    records.push({
      platformId: view.getUint16(4 + i * 8),
      encodingId: view.getUint16(6 + i * 8),
      offset: view.getUint32(8 + i * 8),
    })
  }
  return records
}

// codepoint -> glyph id from the format 12 subtable
export function readCmap12(font: Uint8Array): Map<number, number> {
  const view = tableView(font, 'cmap')
  const record = readCmapRecords(font).find(r => r.platformId === 3 && r.encodingId === 10)
  if (!record) throw new Error('no format 12 subtable')
  const numGroups = view.getUint32(record.offset + 12)
  const result = new Map<number, number>()
  for (let g = 0; g < numGroups; g++) {
    const base = record.offset + 16 + g * 12
    const start = view.getUint32(base)
    const end = view.getUint32(base + 4)
    const glyph = view.getUint32(base + 8)
    for (let cp = start; cp <= end; cp++) result.set(cp, glyph + (cp - start))
  }
  return result
}

// Glyph id for a BMP codepoint through the format 4 subtable (idRangeOffset 0)
export function lookupCmap4(font: Uint8Array, codepoint: number): number {
  const view = tableView(font, 'cmap')
  const record = readCmapRecords(font).find(r => r.platformId === 3 && r.encodingId === 1)
  if (!record) throw new Error('no format 4 subtable')
  const base = record.offset
  const segCount = view.getUint16(base + 6) / 2
  const endCodes = base + 14
  const startCodes = endCodes + segCount * 2 + 2
  const idDeltas = startCodes + segCount * 2
  for (let i = 0; i < segCount; i++) {
    const end = view.getUint16(endCodes + i * 2)
    if (codepoint > end) continue
    const start = view.getUint16(startCodes + i * 2)
    if (codepoint < start) return 0
    return (codepoint + view.getUint16(idDeltas + i * 2)) & 0xffff
  }
  return 0
}

export interface SbixGlyphRecord {
  originOffsetX: number
  originOffsetY: number
  graphicType: string
  data: Uint8Array
}

export interface SbixStrikeRecord {
  ppem: number
  resolution: number
  /** null for zero-length entries */
  glyphs: Array<SbixGlyphRecord | null>
}

export function readSbix(font: Uint8Array): { version: number; flags: number; strikes: SbixStrikeRecord[] } {
  const view = tableView(font, 'sbix')
  const numGlyphs = tableView(font, 'maxp').getUint16(4)
  const numStrikes = view.getUint32(4)
  const strikes: SbixStrikeRecord[] = []

  for (let s = 0; s < numStrikes; s++) {
    const start = view.getUint32(8 + s * 4)
    const glyphs: Array<SbixGlyphRecord | null> = []
    for (let g = 0; g < numGlyphs; g++) {
      const from = view.getUint32(start + 4 + g * 4)
      const to = view.getUint32(start + 4 + (g + 1) * 4)
      if (from === to) {
        glyphs.push(null)
        continue
      }
      const at = start + from
      glyphs.push({
        originOffsetX: view.getInt16(at),
        originOffsetY: view.getInt16(at + 2),
        graphicType: readTag(view, at + 4),
        data: new Uint8Array(view.buffer, view.byteOffset + at + 8, to - from - 8),
      })
    }
    strikes.push({ ppem: view.getUint16(start), resolution: view.getUint16(start + 2), glyphs })
  }

  return { version: view.getUint16(0), flags: view.getUint16(2), strikes }
}

// Windows name record by name id
export function readName(font: Uint8Array, nameId: number): string | undefined {
  const view = tableView(font, 'name')
  const count = view.getUint16(2)
  const storage = view.getUint16(4)
  for (let i = 0; i < count; i++) {
    const rec = 6 + i * 12
    if (view.getUint16(rec) !== 3 || view.getUint16(rec + 6) !== nameId) continue
    const length = view.getUint16(rec + 8)
    const offset = view.getUint16(rec + 10)
    let s = ''
    for (let j = 0; j < length; j += 2) s += String.fromCharCode(view.getUint16(storage + offset + j))
    return s
  }
  return undefined
}
