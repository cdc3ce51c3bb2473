// Big-endian write buffer with auto-growing capacity

export class WriteBuffer {
  private data: Uint8Array
  private view: DataView
  private pos: number = 0

  constructor(initialSize: number = 1024) {
    this.data = new Uint8Array(initialSize)
    this.view = new DataView(this.data.buffer)
  }

  private ensureCapacity(needed: number): void {
    if (this.pos + needed <= this.data.byteLength) return

    // Grow by 2x (amortized O(1) appends)
    const newSize = Math.max(this.data.byteLength * 2, this.pos + needed)
    const newData = new Uint8Array(newSize)
    newData.set(this.data)
    this.data = newData
    this.view = new DataView(newData.buffer)
  }

  writeU8(value: number): void {
    checkRange(value, 0, 0xff, 'uint8')
    this.ensureCapacity(1)
    this.data[this.pos++] = value
  }

  writeU16(value: number): void {
    checkRange(value, 0, 0xffff, 'uint16')
    this.ensureCapacity(2)
    this.view.setUint16(this.pos, value)
    this.pos += 2
  }

  writeS16(value: number): void {
    checkRange(value, -0x8000, 0x7fff, 'int16')
    this.ensureCapacity(2)
    this.view.setInt16(this.pos, value)
    this.pos += 2
  }

  writeU32(value: number): void {
    checkRange(value, 0, 0xffffffff, 'uint32')
    this.ensureCapacity(4)
    this.view.setUint32(this.pos, value)
    this.pos += 4
  }

  // LONGDATETIME: signed 64-bit seconds
  writeI64(value: number): void {
    if (!Number.isSafeInteger(value)) {
      throw new RangeError(`int64 value out of range: ${value}`)
    }
    this.ensureCapacity(8)
    this.view.setBigInt64(this.pos, BigInt(value))
    this.pos += 8
  }

  // 4-byte tag such as 'png '
  writeTag(tag: string): void {
    if (tag.length !== 4 || !/^[\x20-\x7e]{4}$/.test(tag)) {
      throw new RangeError(`Invalid tag: "${tag}"`)
    }
    for (let i = 0; i < 4; i++) {
      this.writeU8(tag.charCodeAt(i))
    }
  }

  writeBytes(src: Uint8Array): void {
    this.ensureCapacity(src.byteLength)
    this.data.set(src, this.pos)
    this.pos += src.byteLength
  }

  // Zero-fill to the next 4-byte boundary
  pad4(): void {
    while (this.pos & 3) {
      this.writeU8(0)
    }
  }

  // UIntBase128: variable-length encoding for table sizes
  writeBase128(value: number): void {
    if (value < 0x80) {
      this.writeU8(value)
    } else if (value < 0x4000) {
      this.writeU8(0x80 | (value >> 7))
      this.writeU8(value & 0x7f)
    } else if (value < 0x200000) {
      this.writeU8(0x80 | (value >> 14))
      this.writeU8(0x80 | ((value >> 7) & 0x7f))
      this.writeU8(value & 0x7f)
    } else if (value < 0x10000000) {
      this.writeU8(0x80 | (value >> 21))
      this.writeU8(0x80 | ((value >> 14) & 0x7f))
      this.writeU8(0x80 | ((value >> 7) & 0x7f))
      this.writeU8(value & 0x7f)
    } else {
      this.writeU8(0x80 | (value >>> 28))
      this.writeU8(0x80 | ((value >>> 21) & 0x7f))
      this.writeU8(0x80 | ((value >>> 14) & 0x7f))
      this.writeU8(0x80 | ((value >>> 7) & 0x7f))
      this.writeU8(value & 0x7f)
    }
  }

  getBytes(): Uint8Array {
    return this.data.subarray(0, this.pos)
  }

  get offset(): number {
    return this.pos
  }

  // Allow direct write at specific position (for backpatching)
  setU32(offset: number, value: number): void {
    this.view.setUint32(offset, value)
  }

  setU16(offset: number, value: number): void {
    this.view.setUint16(offset, value)
  }
}

function checkRange(value: number, min: number, max: number, type: string): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${type} value out of range: ${value}`)
  }
}

// Byte length of a UIntBase128 value
export function sizeBase128(value: number): number {
  if (value < 0x80) return 1
  if (value < 0x4000) return 2
  if (value < 0x200000) return 3
  if (value < 0x10000000) return 4
  return 5
}
