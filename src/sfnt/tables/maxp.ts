// maxp: maximum profile, version 1.0 for TrueType outlines

import { WriteBuffer } from '../write-buffer'

export function encodeMaxp(numGlyphs: number): Uint8Array {
  const out = new WriteBuffer(32)

  out.writeU32(0x00010000)
  out.writeU16(numGlyphs)
  out.writeU16(0) // maxPoints
  out.writeU16(0) // maxContours
  out.writeU16(0) // maxCompositePoints
  out.writeU16(0) // maxCompositeContours
  out.writeU16(2) // maxZones
  out.writeU16(0) // maxTwilightPoints
  out.writeU16(0) // maxStorage
  out.writeU16(0) // maxFunctionDefs
  out.writeU16(0) // maxInstructionDefs
  out.writeU16(0) // maxStackElements
  out.writeU16(0) // maxSizeOfInstructions
  out.writeU16(0) // maxComponentElements
  out.writeU16(0) // maxComponentDepth

  return out.getBytes()
}
