// Emoji font assembly
export {
  assembleFont,
  buildFontFile,
  encodeFont,
  toBitmapTable,
  type AssembleOptions,
  type AssembledFont,
  type BuildFontFileOptions,
  type BuildResult,
} from './emoji/assemble'
export {
  allocate,
  allocateLegacy,
  allocateStandard,
  glyphNameForCodepoint,
  parseLegacyCodepoint,
  EMOJI_BASE_CODEPOINT,
  NOTDEF_IDENTITY,
  type AllocatedGlyph,
  type Allocation,
  type AllocationMode,
  type GlyphIdentity,
} from './emoji/codepoints'
export {
  fitToSquare,
  transformImage,
  type ImageTransformer,
  type Placement,
  type RenderedBitmap,
} from './emoji/image'
export { EMOJI_METRICS, type EmojiMetrics } from './emoji/metrics'
export { fileSource, memorySource, scanDirectory, type SourceImage } from './emoji/sources'
export {
  buildStrike,
  originOffset,
  strikeSpec,
  DEFAULT_STRIKE_SIZES,
  type OriginOffset,
  type Strike,
  type StrikeGlyph,
  type StrikeSpec,
} from './emoji/strike'

// Configuration, progress, errors
export { resolveBuildConfig, type BuildConfig, type BuildOptions, type FontNames, type OutputFormat } from './config'
export { consoleObserver, systemClock, type BuildObserver, type Clock } from './progress'
export * from './errors'

// sfnt
export { createFontBuilder, type FontDocument } from './sfnt/document'
export { serializeFont } from './sfnt/serialize'
export { parseSfnt, getTableData, getNumGlyphs, type SfntFont } from './sfnt/parse'
export type { BitmapGlyph, BitmapStrike, BitmapTable } from './sfnt/tables/sbix'

// WOFF / WOFF2
export { woffEncode, type WoffEncodeOptions } from './woff/encode'
export { woff2Encode, type Woff2EncodeOptions } from './woff2/encode'
