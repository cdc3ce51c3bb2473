// Codepoint allocation for source images
//
// Standard mode packs images into a dense run starting at a fixed base
// (U+1F600 by default). Legacy mode reads the codepoint from `U+<HEX>.<ext>`
// file names.

import { EmptyInputError, InvalidCodepointError } from '../errors'
import type { SourceImage } from './sources'

export const EMOJI_BASE_CODEPOINT = 0x1f600
export const MAX_CODEPOINT = 0x10ffff
export const NOTDEF = '.notdef'

// Surrogates and U+FFFF cannot be reached through cmap
const SURROGATE_FIRST = 0xd800
const SURROGATE_LAST = 0xdfff
const NONCHARACTER_FFFF = 0xffff

export function isMappableCodepoint(codepoint: number): boolean {
  return (
    Number.isInteger(codepoint) &&
    codepoint > 0 &&
    codepoint <= MAX_CODEPOINT &&
    codepoint !== NONCHARACTER_FFFF &&
    (codepoint < SURROGATE_FIRST || codepoint > SURROGATE_LAST)
  )
}

export interface GlyphIdentity {
  readonly name: string
  /** `null` only for the undefined glyph */
  readonly codepoint: number | null
}

export interface AllocatedGlyph {
  readonly identity: GlyphIdentity & { readonly codepoint: number }
  readonly image: SourceImage
}

export interface Allocation {
  /** `.notdef` first, then allocated glyphs in codepoint order */
  readonly glyphOrder: readonly string[]
  readonly glyphs: readonly AllocatedGlyph[]
}

export type AllocationMode = 'standard' | 'legacy'

export const NOTDEF_IDENTITY: GlyphIdentity = { name: NOTDEF, codepoint: null }

export function glyphNameForCodepoint(codepoint: number): string {
  return `uni${codepoint.toString(16).toUpperCase().padStart(4, '0')}`
}

function toAllocation(pairs: Array<{ codepoint: number; image: SourceImage }>): Allocation {
  const glyphs = pairs.map(({ codepoint, image }) => ({
    identity: { name: glyphNameForCodepoint(codepoint), codepoint },
    image,
  }))
  return {
    glyphOrder: [NOTDEF, ...glyphs.map(g => g.identity.name)],
    glyphs,
  }
}

export function allocateStandard(
  images: readonly SourceImage[],
  base: number = EMOJI_BASE_CODEPOINT
): Allocation {
  if (images.length === 0) throw new EmptyInputError()

  const last = base + images.length - 1
  if (!Number.isInteger(base) || base < 1 || last > MAX_CODEPOINT) {
    throw new InvalidCodepointError(
      images[images.length - 1].name,
      `run U+${base.toString(16).toUpperCase()}..U+${last.toString(16).toUpperCase()} leaves the Unicode range`
    )
  }

  const pairs = images.map((image, i) => ({ codepoint: base + i, image }))
  const unmappable = pairs.find(pair => !isMappableCodepoint(pair.codepoint))
  if (unmappable) {
    throw new InvalidCodepointError(
      unmappable.image.name,
      `U+${unmappable.codepoint.toString(16).toUpperCase()} is a surrogate or noncharacter`
    )
  }
  return toAllocation(pairs)
}

const LEGACY_NAME = /^U\+([0-9A-F]+)$/i

// Parse `U+1F600.png` -> 0x1F600
export function parseLegacyCodepoint(fileName: string): number {
  const dot = fileName.lastIndexOf('.')
  const stem = dot > 0 ? fileName.slice(0, dot) : fileName
  const match = LEGACY_NAME.exec(stem)
  if (!match) {
    throw new InvalidCodepointError(fileName, 'expected a name like U+E001.png')
  }

  const codepoint = parseInt(match[1], 16)
  if (codepoint > MAX_CODEPOINT) {
    throw new InvalidCodepointError(fileName, 'beyond U+10FFFF')
  }
  if (codepoint === 0) {
    throw new InvalidCodepointError(fileName, 'U+0000 cannot be mapped')
  }
  if (!isMappableCodepoint(codepoint)) {
    throw new InvalidCodepointError(fileName, 'surrogates and U+FFFF cannot be mapped')
  }
  return codepoint
}

export function allocateLegacy(images: readonly SourceImage[]): Allocation {
  if (images.length === 0) throw new EmptyInputError()

  const pairs = images
    .map(image => ({ codepoint: parseLegacyCodepoint(image.name), image }))
    .sort((a, b) => a.codepoint - b.codepoint)

  for (let i = 1; i < pairs.length; i++) {
    if (pairs[i].codepoint === pairs[i - 1].codepoint) {
      throw new InvalidCodepointError(
        pairs[i].image.name,
        `same codepoint as "${pairs[i - 1].image.name}"`
      )
    }
  }

  return toAllocation(pairs)
}

export function allocate(
  images: readonly SourceImage[],
  mode: AllocationMode,
  base: number = EMOJI_BASE_CODEPOINT
): Allocation {
  return mode === 'legacy' ? allocateLegacy(images) : allocateStandard(images, base)
}
