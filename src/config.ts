// Build configuration: caller options merged over defaults

import { extname } from 'node:path'
import { InvalidSizeError } from './errors'
import { EMOJI_BASE_CODEPOINT, type AllocationMode } from './emoji/codepoints'
import { DEFAULT_STRIKE_SIZES, strikeSpec, type StrikeSpec } from './emoji/strike'
import type { NameTable } from './sfnt/document'

export type OutputFormat = 'ttf' | 'woff' | 'woff2'

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['ttf', 'woff', 'woff2']

export interface FontNames {
  familyName: string
  styleName: string
  version: string
}

export interface BuildOptions {
  mode?: AllocationMode
  /** First codepoint of the standard run */
  baseCodepoint?: number
  /** Strike sizes in ppem, any order */
  strikes?: readonly number[]
  /** Defaults to the output file extension, then 'ttf' */
  format?: OutputFormat
  output?: string
  names?: Partial<FontNames>
}

export interface BuildConfig {
  mode: AllocationMode
  baseCodepoint: number
  /** Ascending ppem */
  strikes: readonly StrikeSpec[]
  format: OutputFormat
  names: FontNames
}

export const DEFAULT_NAMES: Readonly<FontNames> = {
  familyName: 'Custom Emoji',
  styleName: 'Regular',
  version: 'Version 1.0',
}

// sbix ppem is a uint16
const MAX_PPEM = 0xffff

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value)
}

export function formatFromPath(path: string): OutputFormat | undefined {
  const ext = extname(path).slice(1).toLowerCase()
  if (ext === 'otf') return 'ttf'
  return isOutputFormat(ext) ? ext : undefined
}

/**
 * Validate strike sizes and return them as ascending specs. Runs before any
 * image is read, so a bad size fails the build up front.
 */
export function resolveStrikes(sizes: readonly number[]): StrikeSpec[] {
  if (sizes.length === 0) {
    throw new InvalidSizeError(0, 'at least one strike size is required')
  }
  const sorted = [...sizes].sort((a, b) => a - b)
  sorted.forEach((size, i) => {
    if (size > MAX_PPEM) throw new InvalidSizeError(size, `ppem above ${MAX_PPEM}`)
    if (i > 0 && size === sorted[i - 1]) throw new InvalidSizeError(size, 'duplicate strike size')
  })
  return sorted.map(strikeSpec)
}

// "32, 64,128" -> [32, 64, 128]
export function parseStrikeList(text: string): number[] {
  return text
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .map(part => (/^[+-]?\d+$/.test(part) ? Number(part) : NaN))
}

export function resolveBuildConfig(options?: BuildOptions): BuildConfig {
  const format = options?.format ?? (options?.output ? formatFromPath(options.output) : undefined) ?? 'ttf'
  return {
    mode: options?.mode ?? 'standard',
    baseCodepoint: options?.baseCodepoint ?? EMOJI_BASE_CODEPOINT,
    strikes: resolveStrikes(options?.strikes ?? DEFAULT_STRIKE_SIZES),
    format,
    names: { ...DEFAULT_NAMES, ...options?.names },
  }
}

// PostScript names: printable ASCII without spaces or delimiters, at most 63 chars
function postScriptName(s: string): string {
  return s.replace(/[^\x21-\x7e]|[[\](){}<>/%]/g, '')
}

export function nameTable(names: FontNames): NameTable {
  const family = postScriptName(names.familyName) || 'Untitled'
  const style = postScriptName(names.styleName) || 'Regular'
  const psName = `${family}-${style}`.slice(0, 63)
  return {
    familyName: names.familyName,
    styleName: names.styleName,
    uniqueFontIdentifier: psName,
    fullName: `${names.familyName} ${names.styleName}`,
    version: names.version,
    psName,
  }
}
