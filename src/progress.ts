// Progress reporting and time source for builds

import type { GlyphIdentity } from './emoji/codepoints'
import type { Strike, StrikeSpec } from './emoji/strike'

export type Clock = () => Date

export const systemClock: Clock = () => new Date()

/**
 * Optional callbacks for build progress. The build itself never writes to
 * the console; the CLI plugs in {@link consoleObserver}.
 */
export interface BuildObserver {
  imagesFound?(count: number, source: string): void
  glyphMapped?(identity: GlyphIdentity): void
  strikeStart?(spec: StrikeSpec): void
  glyphRendered?(name: string, spec: StrikeSpec): void
  strikeComplete?(strike: Strike): void
  fontSerialized?(byteLength: number, format: string): void
}

function hex(codepoint: number): string {
  return codepoint.toString(16).toUpperCase().padStart(4, '0')
}

export function consoleObserver(log: (line: string) => void = console.log): BuildObserver {
  return {
    imagesFound(count, source) {
      log(`Found ${count} image${count === 1 ? '' : 's'} in ${source}`)
    },
    glyphMapped(identity) {
      if (identity.codepoint !== null) {
        log(`  Mapping U+${hex(identity.codepoint)} to ${identity.name}`)
      }
    },
    strikeStart(spec) {
      log(`  Strike ${spec.ppem} ppem`)
    },
    fontSerialized(byteLength, format) {
      log(`Serialized ${format} font (${byteLength} bytes)`)
    },
  }
}
