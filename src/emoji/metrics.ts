// Fixed design-space metrics for bitmap emoji fonts
//
// 800 units per em with advance == em, typo ascender/descender 750/-250, and
// win ascent/descent both 0 so renderers that honour the win metrics do not
// add their own vertical padding around the bitmaps.

export interface EmojiMetrics {
  unitsPerEm: number
  advanceWidth: number
  notdefAdvanceWidth: number
  ascent: number
  descent: number
  typoAscender: number
  typoDescender: number
  winAscent: number
  winDescent: number
  xHeight: number
  capHeight: number
}

export const EMOJI_METRICS: Readonly<EmojiMetrics> = Object.freeze({
  unitsPerEm: 800,
  advanceWidth: 800,
  notdefAdvanceWidth: 500,
  ascent: 800,
  descent: -250,
  typoAscender: 750,
  typoDescender: -250,
  winAscent: 0,
  winDescent: 0,
  xHeight: 500,
  capHeight: 800,
})
