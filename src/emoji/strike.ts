// Per-resolution bitmap strikes

import { NOTDEF, type AllocatedGlyph } from './codepoints'
import { assertValidSize, transformImage, type ImageTransformer } from './image'
import type { BuildObserver } from '../progress'

// sbix strikes are declared at 72 ppi
export const STRIKE_RESOLUTION = 72

export const DEFAULT_STRIKE_SIZES: readonly number[] = [32, 64, 128, 256]

export const GRAPHIC_TYPE_PNG = 'png '

export interface StrikeSpec {
  ppem: number
  resolution: number
}

export interface OriginOffset {
  x: number
  y: number
}

export interface StrikeGlyph {
  graphicType: typeof GRAPHIC_TYPE_PNG
  origin: OriginOffset
  /** Empty for the undefined glyph */
  data: Uint8Array
}

export interface Strike {
  readonly spec: StrikeSpec
  /** Keyed by glyph name; covers the full glyph order */
  readonly glyphs: ReadonlyMap<string, StrikeGlyph>
}

/** The design-space figures a strike needs to place its bitmaps */
export interface StrikeMetrics {
  unitsPerEm: number
  descender: number
}

// Transforms in flight per strike; each one holds a source file and a sharp pipeline
export const DEFAULT_TRANSFORM_CONCURRENCY = 8

export interface BuildStrikeOptions {
  transform?: ImageTransformer
  observer?: BuildObserver
  /** Upper bound on concurrent transforms, default 8 */
  concurrency?: number
}

export function strikeSpec(ppem: number): StrikeSpec {
  assertValidSize(ppem)
  return { ppem, resolution: STRIKE_RESOLUTION }
}

/**
 * Origin offset for every bitmap of a strike.
 *
 * The descender is in design units; dividing by units-per-pixel
 * (unitsPerEm / ppem) brings it to this strike's pixels, so the bitmap
 * bottom sits on the descender line at every size.
 */
export function originOffset(ppem: number, metrics: StrikeMetrics): OriginOffset {
  return {
    x: 0,
    y: Math.round((metrics.descender * ppem) / metrics.unitsPerEm),
  }
}

const EMPTY = new Uint8Array(0)

// Map with at most `limit` calls pending; results keep input order.
// After the first rejection no further items are started.
async function mapBounded<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length)
  let next = 0
  let failed = false
  const worker = async (): Promise<void> => {
    while (!failed && next < items.length) {
      const index = next++
      try {
        results[index] = await fn(items[index])
      } catch (err) {
        failed = true
        throw err
      }
    }
  }
  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, worker))
  return results
}

export async function buildStrike(
  glyphs: readonly AllocatedGlyph[],
  spec: StrikeSpec,
  metrics: StrikeMetrics,
  options?: BuildStrikeOptions
): Promise<Strike> {
  assertValidSize(spec.ppem)
  const transform = options?.transform ?? transformImage
  const observer = options?.observer
  const origin = originOffset(spec.ppem, metrics)
  const concurrency = options?.concurrency ?? DEFAULT_TRANSFORM_CONCURRENCY
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`)
  }

  observer?.strikeStart?.(spec)

  // Any rejection aborts the whole strike
  const rendered = await mapBounded(glyphs, concurrency, async glyph => {
    const bitmap = await transform(glyph.image, spec.ppem)
    observer?.glyphRendered?.(glyph.identity.name, spec)
    return bitmap
  })

  const entries = new Map<string, StrikeGlyph>()
  entries.set(NOTDEF, { graphicType: GRAPHIC_TYPE_PNG, origin: { x: 0, y: 0 }, data: EMPTY })
  glyphs.forEach((glyph, i) => {
    entries.set(glyph.identity.name, {
      graphicType: GRAPHIC_TYPE_PNG,
      origin: { ...origin },
      data: rendered[i].data,
    })
  })

  const strike: Strike = { spec, glyphs: entries }
  observer?.strikeComplete?.(strike)
  return strike
}
