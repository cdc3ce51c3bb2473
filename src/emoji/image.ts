// Resize a source image into a square, transparent-padded PNG

import sharp from 'sharp'
import { InvalidSizeError, UnreadableImageError } from '../errors'
import type { SourceImage } from './sources'

export interface Placement {
  /** Resized image dimensions */
  width: number
  height: number
  left: number
  top: number
  right: number
  bottom: number
}

export interface RenderedBitmap {
  /** Canvas edge in pixels (the strike's ppem) */
  size: number
  placement: Placement
  /** PNG payload */
  data: Uint8Array
}

export type ImageTransformer = (image: SourceImage, targetSize: number) => Promise<RenderedBitmap>

export function assertValidSize(size: number): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw new InvalidSizeError(size)
  }
}

/**
 * Fit `width x height` into a `targetSize` square. The longer edge fills the
 * square, the shorter edge keeps the aspect ratio, and odd padding goes to
 * the right and bottom.
 */
export function fitToSquare(width: number, height: number, targetSize: number): Placement {
  assertValidSize(targetSize)

  const scale = targetSize / Math.max(width, height)
  const w = Math.min(targetSize, Math.max(1, Math.round(width * scale)))
  const h = Math.min(targetSize, Math.max(1, Math.round(height * scale)))
  const left = Math.floor((targetSize - w) / 2)
  const top = Math.floor((targetSize - h) / 2)

  return {
    width: w,
    height: h,
    left,
    top,
    right: targetSize - w - left,
    bottom: targetSize - h - top,
  }
}

const TRANSPARENT = { r: 0, g: 0, b: 0, alpha: 0 }

export async function transformImage(image: SourceImage, targetSize: number): Promise<RenderedBitmap> {
  assertValidSize(targetSize)

  let input: Uint8Array
  try {
    input = await image.load()
  } catch (err) {
    throw new UnreadableImageError(image.name, err)
  }

  try {
    const { width, height } = await sharp(input).metadata()
    if (!width || !height) {
      throw new Error('missing image dimensions')
    }

    const placement = fitToSquare(width, height, targetSize)
    const data = await sharp(input)
      .ensureAlpha()
      .resize(placement.width, placement.height, { fit: 'fill', kernel: sharp.kernel.lanczos3 })
      .extend({
        left: placement.left,
        top: placement.top,
        right: placement.right,
        bottom: placement.bottom,
        background: TRANSPARENT,
      })
      .png()
      .toBuffer()

    return { size: targetSize, placement, data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength) }
  } catch (err) {
    throw new UnreadableImageError(image.name, err)
  }
}
