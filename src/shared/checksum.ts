// sfnt table checksum computation

// head.checkSumAdjustment is chosen so the whole font sums to this
export const CHECKSUM_MAGIC = 0xb1b0afba

// Sum of big-endian uint32 words, the trailing word zero-padded
export function computeChecksum(data: Uint8Array, offset: number = 0, length: number = data.byteLength - offset): number {
  let sum = 0
  const end = offset + length
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)

  const alignedEnd = offset + (length & ~3)
  for (let i = offset; i < alignedEnd; i += 4) {
    sum = (sum + view.getUint32(i)) >>> 0
  }

  if (end > alignedEnd) {
    let last = 0
    for (let i = alignedEnd; i < end; i++) {
      last = (last << 8) | data[i]
    }
    last = (last << ((4 - (end - alignedEnd)) * 8)) >>> 0
    sum = (sum + last) >>> 0
  }

  return sum
}

// Pad to 4-byte boundary
export function pad4(n: number): number {
  return (n + 3) & ~3
}
