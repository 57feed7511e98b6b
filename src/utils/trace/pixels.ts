import { clamp } from '../math';
import type { ColorBuffer } from './framebuffer';
import { COLOR_CHANNELS } from './framebuffer';

/** Interleaved RGB24, row-major, `width * height * 3` bytes. */
export type PixelBuffer = Uint8Array;

/** Float component to byte: scale by 255, clamp, truncate. */
export function toByte(component: number): number {
  return Math.trunc(clamp(component * 255, 0, 255));
}

/**
 * Pack a float color buffer into RGB24 bytes.
 *
 * Out-of-range components (negative, above 1) are clamped rather than wrapped.
 */
export function convertFramebufferToPixels(buffer: ColorBuffer, width: number, height: number): PixelBuffer {
  const expected = width * height * COLOR_CHANNELS;
  if (buffer.data.length !== expected) {
    throw new Error(
      `Color buffer size mismatch: got ${buffer.data.length} floats, expected ${expected} for ${width}x${height}`,
    );
  }

  const pixels = new Uint8Array(expected);
  for (let j = 0; j < height; j++) {
    for (let i = 0; i < width; i++) {
      const o = (j * width + i) * COLOR_CHANNELS;
      pixels[o] = toByte(buffer.data[o] ?? 0);
      pixels[o + 1] = toByte(buffer.data[o + 1] ?? 0);
      pixels[o + 2] = toByte(buffer.data[o + 2] ?? 0);
    }
  }

  return pixels;
}

/**
 * Widen RGB24 to the RGBA layout `ImageData` expects (opaque alpha).
 */
export function toRgbaPixels(pixels: PixelBuffer, width: number, height: number): Uint8ClampedArray {
  const count = width * height;
  const out = new Uint8ClampedArray(count * 4);

  for (let p = 0; p < count; p++) {
    out[p * 4] = pixels[p * 3] ?? 0;
    out[p * 4 + 1] = pixels[p * 3 + 1] ?? 0;
    out[p * 4 + 2] = pixels[p * 3 + 2] ?? 0;
    out[p * 4 + 3] = 255;
  }

  return out;
}
