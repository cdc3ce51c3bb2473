// Font document model and staged builder
//
// Tables have to be set up in dependency order: glyph order and cmap
// first, metrics before OS/2, bitmaps last. Each stage only exposes the
// next call, so an out-of-order setup does not compile, and the finished
// FontDocument is a single immutable value.

import { SerializationError } from '../errors'
import type { BitmapTable } from './tables/sbix'

export const NOTDEF_GLYPH = '.notdef'

// Largest glyph id a uint16 glyph count allows
export const MAX_GLYPHS = 0xffff

export interface EmptyOutline {
  readonly numberOfContours: 0
}

export const EMPTY_OUTLINE: EmptyOutline = { numberOfContours: 0 }

export interface HorizontalMetric {
  readonly advanceWidth: number
  readonly leftSideBearing: number
}

export interface HeadTable {
  readonly unitsPerEm: number
  readonly created: Date
  readonly modified: Date
  /** e.g. 1.0 */
  readonly fontRevision: number
  readonly lowestRecPPEM: number
}

export interface HorizontalHeaderTable {
  readonly ascent: number
  readonly descent: number
  readonly lineGap: number
}

export interface Os2Table {
  readonly typoAscender: number
  readonly typoDescender: number
  readonly typoLineGap: number
  readonly winAscent: number
  readonly winDescent: number
  readonly xHeight: number
  readonly capHeight: number
  readonly weightClass: number
  readonly widthClass: number
  readonly vendorId: string
}

export interface NameTable {
  readonly familyName: string
  readonly styleName: string
  readonly uniqueFontIdentifier: string
  readonly fullName: string
  readonly version: string
  readonly psName: string
}

export interface PostTable {
  readonly italicAngle: number
  readonly underlinePosition: number
  readonly underlineThickness: number
  readonly isFixedPitch: boolean
}

export interface FontDocument {
  readonly glyphOrder: readonly string[]
  /** codepoint -> glyph name */
  readonly characterMap: ReadonlyMap<number, string>
  readonly outlines: ReadonlyMap<string, EmptyOutline>
  readonly horizontalMetrics: ReadonlyMap<string, HorizontalMetric>
  readonly head: HeadTable
  readonly hhea: HorizontalHeaderTable
  readonly os2: Os2Table
  readonly name: NameTable
  readonly post: PostTable
  readonly sbix: BitmapTable
}

// Stages

export interface GlyphOrderStage {
  setupGlyphOrder(glyphOrder: readonly string[]): CharacterMapStage
}

export interface CharacterMapStage {
  setupCharacterMap(characterMap: ReadonlyMap<number, string>): OutlineStage
}

export interface OutlineStage {
  /** Bitmap glyphs still need an (empty) outline record each */
  setupGlyf(): HorizontalMetricsStage
}

export interface HorizontalMetricsStage {
  setupHorizontalMetrics(metrics: ReadonlyMap<string, HorizontalMetric>): HeadStage
}

export interface HeadStage {
  setupHead(head: HeadTable): HorizontalHeaderStage
}

export interface HorizontalHeaderStage {
  setupHorizontalHeader(hhea: HorizontalHeaderTable): Os2Stage
}

export interface Os2Stage {
  setupOS2(os2: Os2Table): NameStage
}

export interface NameStage {
  setupNameTable(name: NameTable): PostStage
}

export interface PostStage {
  setupPost(post?: Partial<PostTable>): BitmapStage
}

export interface BitmapStage {
  setupBitmaps(sbix: BitmapTable): FontDocument
}

const DEFAULT_POST: PostTable = {
  italicAngle: 0,
  underlinePosition: -75,
  underlineThickness: 50,
  isFixedPitch: false,
}

function reject(message: string): never {
  throw new SerializationError(`Font document rejected: ${message}`)
}

function checkInt16(value: number, field: string): void {
  if (!Number.isInteger(value) || value < -0x8000 || value > 0x7fff) {
    reject(`${field} ${value} does not fit int16`)
  }
}

export function createFontBuilder(): GlyphOrderStage {
  return {
    setupGlyphOrder(glyphOrder) {
      if (glyphOrder[0] !== NOTDEF_GLYPH) reject(`glyph order must start with ${NOTDEF_GLYPH}`)
      if (glyphOrder.length > MAX_GLYPHS) reject(`${glyphOrder.length} glyphs exceed ${MAX_GLYPHS}`)
      const known = new Set(glyphOrder)
      if (known.size !== glyphOrder.length) reject('duplicate glyph names')

      return characterMapStage([...glyphOrder], known)
    },
  }
}

function characterMapStage(glyphOrder: readonly string[], known: ReadonlySet<string>): CharacterMapStage {
  return {
    setupCharacterMap(characterMap) {
      for (const [codepoint, name] of characterMap) {
        if (!Number.isInteger(codepoint) || codepoint < 0 || codepoint > 0x10ffff) {
          reject(`codepoint ${codepoint} outside Unicode`)
        }
        if (!known.has(name)) reject(`cmap maps to unknown glyph "${name}"`)
      }
      const cmap = new Map(characterMap)

      return {
        setupGlyf() {
          const outlines = new Map(glyphOrder.map((name): [string, EmptyOutline] => [name, EMPTY_OUTLINE]))
          return metricsStage({ glyphOrder, characterMap: cmap, outlines })
        },
      }
    },
  }
}

type GlyphTables = Pick<FontDocument, 'glyphOrder' | 'characterMap' | 'outlines'>

function metricsStage(tables: GlyphTables): HorizontalMetricsStage {
  return {
    setupHorizontalMetrics(metrics) {
      const horizontalMetrics = new Map<string, HorizontalMetric>()
      for (const name of tables.glyphOrder) {
        const metric = metrics.get(name)
        if (!metric) reject(`no horizontal metrics for "${name}"`)
        if (!Number.isInteger(metric.advanceWidth) || metric.advanceWidth < 0 || metric.advanceWidth > 0xffff) {
          reject(`advance width ${metric.advanceWidth} of "${name}" does not fit uint16`)
        }
        checkInt16(metric.leftSideBearing, `left side bearing of "${name}"`)
        horizontalMetrics.set(name, { ...metric })
      }

      return headStage({ ...tables, horizontalMetrics })
    },
  }
}

type MetricTables = GlyphTables & Pick<FontDocument, 'horizontalMetrics'>

function headStage(tables: MetricTables): HeadStage {
  return {
    setupHead(head) {
      const { unitsPerEm } = head
      if (!Number.isInteger(unitsPerEm) || unitsPerEm < 16 || unitsPerEm > 16384) {
        reject(`unitsPerEm ${unitsPerEm} outside 16..16384`)
      }
      return {
        setupHorizontalHeader(hhea) {
          checkInt16(hhea.ascent, 'ascent')
          checkInt16(hhea.descent, 'descent')
          checkInt16(hhea.lineGap, 'line gap')
          return os2Stage({ ...tables, head: { ...head }, hhea: { ...hhea } })
        },
      }
    },
  }
}

type HeaderTables = MetricTables & Pick<FontDocument, 'head' | 'hhea'>

function os2Stage(tables: HeaderTables): Os2Stage {
  return {
    setupOS2(os2) {
      checkInt16(os2.typoAscender, 'typo ascender')
      checkInt16(os2.typoDescender, 'typo descender')
      checkInt16(os2.xHeight, 'x-height')
      checkInt16(os2.capHeight, 'cap height')
      if (os2.vendorId.length !== 4) reject(`vendor id "${os2.vendorId}" must be 4 characters`)

      return {
        setupNameTable(name) {
          if (!/^[\x21-\x7e]{1,63}$/.test(name.psName) || /[[\](){}<>/%]/.test(name.psName)) {
            reject(`invalid PostScript name "${name.psName}"`)
          }
          return {
            setupPost(post) {
              const postTable = { ...DEFAULT_POST, ...post }
              return bitmapStage({ ...tables, os2: { ...os2 }, name: { ...name }, post: postTable })
            },
          }
        },
      }
    },
  }
}

type OutlineFontTables = Omit<FontDocument, 'sbix'>

function bitmapStage(tables: OutlineFontTables): BitmapStage {
  return {
    setupBitmaps(sbix) {
      let previous = 0
      for (const strike of sbix.strikes) {
        if (strike.ppem <= previous) reject('strikes must be in strictly increasing ppem order')
        previous = strike.ppem
        for (const name of tables.glyphOrder) {
          if (!strike.glyphs.has(name)) reject(`strike ${strike.ppem} has no entry for "${name}"`)
        }
        if (strike.glyphs.size !== tables.glyphOrder.length) {
          reject(`strike ${strike.ppem} has glyphs outside the glyph order`)
        }
      }
      return Object.freeze({ ...tables, sbix })
    },
  }
}
