// Table tags

// WOFF2 known table tags (section 4.1), in index order.
// A tag outside this list is written out in full (index 63).
const WOFF2_KNOWN_TAGS = [
  'cmap', 'head', 'hhea', 'hmtx', 'maxp', 'name', 'OS/2', 'post',
  'cvt ', 'fpgm', 'glyf', 'loca', 'prep', 'CFF ', 'VORG', 'EBDT',
  'EBLC', 'gasp', 'hdmx', 'kern', 'LTSH', 'PCLT', 'VDMX', 'vhea',
  'vmtx', 'BASE', 'GDEF', 'GPOS', 'GSUB', 'EBSC', 'JSTF', 'MATH',
  'CBDT', 'CBLC', 'COLR', 'CPAL', 'SVG ', 'sbix', 'acnt', 'avar',
  'bdat', 'bloc', 'bsln', 'cvar', 'fdsc', 'feat', 'fmtx', 'fvar',
  'gvar', 'hsty', 'just', 'lcar', 'mort', 'morx', 'opbd', 'prop',
  'trak', 'Zapf', 'Silf', 'Glat', 'Gloc', 'Feat', 'Sill',
] as const

// Convert string to 4-byte tag
export function stringToTag(s: string): number {
  return (
    (s.charCodeAt(0) << 24) |
    (s.charCodeAt(1) << 16) |
    (s.charCodeAt(2) << 8) |
    s.charCodeAt(3)
  ) >>> 0
}

export const TAG_OS2 = stringToTag('OS/2')
export const TAG_CMAP = stringToTag('cmap')
export const TAG_GLYF = stringToTag('glyf')
export const TAG_HEAD = stringToTag('head')
export const TAG_HHEA = stringToTag('hhea')
export const TAG_HMTX = stringToTag('hmtx')
export const TAG_LOCA = stringToTag('loca')
export const TAG_MAXP = stringToTag('maxp')
export const TAG_NAME = stringToTag('name')
export const TAG_POST = stringToTag('post')
export const TAG_SBIX = stringToTag('sbix')
export const TAG_DSIG = stringToTag('DSIG')

export const SFNT_TTF = 0x00010000
export const SFNT_CFF = 0x4f54544f // 'OTTO'

export const WOFF_SIGNATURE = 0x774f4646 // 'wOFF'
export const WOFF2_SIGNATURE = 0x774f4632 // 'wOF2'

// Known tag index (0-62) or 63 for arbitrary tag
let knownTagIndex: Map<number, number> | null = null

export function getKnownTagIndex(tag: number): number {
  if (!knownTagIndex) {
    knownTagIndex = new Map()
    for (let i = 0; i < WOFF2_KNOWN_TAGS.length; i++) {
      knownTagIndex.set(stringToTag(WOFF2_KNOWN_TAGS[i]), i)
    }
  }
  return knownTagIndex.get(tag) ?? 63
}
