// Font assembly: images -> glyphs -> strikes -> font document

import { rename, rm, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import { resolveBuildConfig, nameTable, type BuildConfig, type BuildOptions, type OutputFormat } from '../config'
import { systemClock, type BuildObserver, type Clock } from '../progress'
import { createFontBuilder, type FontDocument, type HorizontalMetric } from '../sfnt/document'
import { serializeFont } from '../sfnt/serialize'
import { SBIX_FLAGS_DEFAULT, type BitmapGlyph, type BitmapStrike, type BitmapTable } from '../sfnt/tables/sbix'
import { woffEncode } from '../woff/encode'
import { woff2Encode } from '../woff2/encode'
import { allocate, NOTDEF, type Allocation } from './codepoints'
import type { ImageTransformer } from './image'
import { EMOJI_METRICS, type EmojiMetrics } from './metrics'
import { scanDirectory, type SourceImage } from './sources'
import { buildStrike, type Strike } from './strike'

export interface AssembleOptions extends BuildOptions {
  metrics?: EmojiMetrics
  clock?: Clock
  observer?: BuildObserver
  /** Replaces the sharp-based transform, mainly for tests */
  transform?: ImageTransformer
  /** Concurrent image transforms per strike */
  concurrency?: number
}

export interface AssembledFont {
  document: FontDocument
  allocation: Allocation
  strikes: readonly Strike[]
}

export function toBitmapTable(strikes: readonly Strike[]): BitmapTable {
  const bitmapStrikes = strikes.map((strike): BitmapStrike => ({
    ppem: strike.spec.ppem,
    resolution: strike.spec.resolution,
    glyphs: new Map(
      [...strike.glyphs].map(([name, glyph]): [string, BitmapGlyph] => [
        name,
        {
          graphicType: glyph.graphicType,
          originOffsetX: glyph.origin.x,
          originOffsetY: glyph.origin.y,
          data: glyph.data,
        },
      ])
    ),
  }))
  return { version: 1, flags: SBIX_FLAGS_DEFAULT, strikes: bitmapStrikes }
}

function horizontalMetrics(glyphOrder: readonly string[], metrics: EmojiMetrics): Map<string, HorizontalMetric> {
  return new Map(
    glyphOrder.map((name): [string, HorizontalMetric] => [
      name,
      {
        advanceWidth: name === NOTDEF ? metrics.notdefAdvanceWidth : metrics.advanceWidth,
        leftSideBearing: 0,
      },
    ])
  )
}

/**
 * Build the complete font document for a set of images. Strike sizes are
 * checked before any image is read, and any failure rejects the whole build.
 */
export async function assembleFont(
  images: readonly SourceImage[],
  options?: AssembleOptions
): Promise<AssembledFont> {
  const config = resolveBuildConfig(options)
  return assembleWithConfig(images, config, options)
}

async function assembleWithConfig(
  images: readonly SourceImage[],
  config: BuildConfig,
  options?: AssembleOptions
): Promise<AssembledFont> {
  const metrics = options?.metrics ?? EMOJI_METRICS
  const clock = options?.clock ?? systemClock
  const observer = options?.observer

  const allocation = allocate(images, config.mode, config.baseCodepoint)
  const characterMap = new Map<number, string>()
  for (const glyph of allocation.glyphs) {
    characterMap.set(glyph.identity.codepoint, glyph.identity.name)
    observer?.glyphMapped?.(glyph.identity)
  }

  const now = clock()
  const outlineFont = createFontBuilder()
    .setupGlyphOrder(allocation.glyphOrder)
    .setupCharacterMap(characterMap)
    .setupGlyf()
    .setupHorizontalMetrics(horizontalMetrics(allocation.glyphOrder, metrics))
    .setupHead({
      unitsPerEm: metrics.unitsPerEm,
      created: now,
      modified: now,
      fontRevision: 1,
      lowestRecPPEM: 3,
    })
    .setupHorizontalHeader({ ascent: metrics.ascent, descent: metrics.descent, lineGap: 0 })
    .setupOS2({
      typoAscender: metrics.typoAscender,
      typoDescender: metrics.typoDescender,
      typoLineGap: 0,
      winAscent: metrics.winAscent,
      winDescent: metrics.winDescent,
      xHeight: metrics.xHeight,
      capHeight: metrics.capHeight,
      weightClass: 400,
      widthClass: 5,
      vendorId: 'NONE',
    })
    .setupNameTable(nameTable(config.names))
    .setupPost()

  // One strike at a time, ascending ppem
  const strikeMetrics = { unitsPerEm: metrics.unitsPerEm, descender: metrics.descent }
  const strikes: Strike[] = []
  for (const spec of config.strikes) {
    strikes.push(
      await buildStrike(allocation.glyphs, spec, strikeMetrics, {
        transform: options?.transform,
        observer,
        concurrency: options?.concurrency,
      })
    )
  }

  const document = outlineFont.setupBitmaps(toBitmapTable(strikes))
  return { document, allocation, strikes }
}

export async function encodeFont(document: FontDocument, format: OutputFormat): Promise<Uint8Array> {
  const sfnt = serializeFont(document)
  switch (format) {
    case 'woff':
      return woffEncode(sfnt)
    case 'woff2':
      return woff2Encode(sfnt)
    default:
      return sfnt
  }
}

// Write beside the target, then rename; a failure leaves neither a partial font nor the temp file
async function writeAtomically(path: string, bytes: Uint8Array): Promise<void> {
  const temp = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`)
  try {
    await writeFile(temp, bytes)
    await rename(temp, path)
  } catch (err) {
    await rm(temp, { force: true })
    throw err
  }
}

export interface BuildFontFileOptions extends AssembleOptions {
  input: string
  output: string
}

export interface BuildResult {
  output: string
  format: OutputFormat
  byteLength: number
  glyphCount: number
  strikeSizes: number[]
}

/**
 * Scan a directory, assemble the font and write it. Nothing is written
 * unless every step before it succeeded.
 */
export async function buildFontFile(options: BuildFontFileOptions): Promise<BuildResult> {
  const config = resolveBuildConfig(options)
  const images = await scanDirectory(options.input)
  options.observer?.imagesFound?.(images.length, options.input)

  const { document } = await assembleWithConfig(images, config, options)
  const bytes = await encodeFont(document, config.format)
  options.observer?.fontSerialized?.(bytes.byteLength, config.format)

  await writeAtomically(options.output, bytes)

  return {
    output: options.output,
    format: config.format,
    byteLength: bytes.byteLength,
    glyphCount: document.glyphOrder.length,
    strikeSizes: config.strikes.map(s => s.ppem),
  }
}
