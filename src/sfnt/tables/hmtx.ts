// hhea + hmtx: horizontal header and metrics

import type { HorizontalHeaderTable, HorizontalMetric } from '../document'
import { WriteBuffer } from '../write-buffer'

/**
 * Number of full (advance, lsb) records. Trailing glyphs sharing the last
 * advance width only store their left side bearing.
 */
export function countHMetrics(metrics: readonly HorizontalMetric[]): number {
  let n = metrics.length
  while (n > 1 && metrics[n - 1].advanceWidth === metrics[n - 2].advanceWidth) {
    n--
  }
  return n
}

export function encodeHmtx(metrics: readonly HorizontalMetric[]): Uint8Array {
  const numberOfHMetrics = countHMetrics(metrics)
  const out = new WriteBuffer(numberOfHMetrics * 4 + (metrics.length - numberOfHMetrics) * 2)

  metrics.forEach((metric, i) => {
    if (i < numberOfHMetrics) out.writeU16(metric.advanceWidth)
    out.writeS16(metric.leftSideBearing)
  })

  return out.getBytes()
}

export function encodeHhea(hhea: HorizontalHeaderTable, metrics: readonly HorizontalMetric[]): Uint8Array {
  const out = new WriteBuffer(36)
  const advanceWidthMax = metrics.reduce((max, m) => Math.max(max, m.advanceWidth), 0)

  out.writeU32(0x00010000) // version
  out.writeS16(hhea.ascent)
  out.writeS16(hhea.descent)
  out.writeS16(hhea.lineGap)
  out.writeU16(advanceWidthMax)
  // Extents over outlines; all outlines are empty
  out.writeS16(0) // minLeftSideBearing
  out.writeS16(0) // minRightSideBearing
  out.writeS16(0) // xMaxExtent
  out.writeS16(1) // caretSlopeRise
  out.writeS16(0) // caretSlopeRun
  out.writeS16(0) // caretOffset
  for (let i = 0; i < 4; i++) out.writeS16(0) // reserved
  out.writeS16(0) // metricDataFormat
  out.writeU16(countHMetrics(metrics))

  return out.getBytes()
}
