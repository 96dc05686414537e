import type { PixelBuffer } from "../types";

// Source offsets of the three copies: drawn at (-s, 0), (0, -s) and (+s, 0)
const COPY_OFFSETS = [
  [1, 0],
  [0, 1],
  [-1, 0],
] as const;

/**
 * RGB-shift display mode: three copies of the frame, displaced left, up and right by
 * `shift` pixels, added onto black at half opacity and saturated at 255. Pixels a copy
 * does not cover get nothing from it.
 *
 * Applied to a finished frame for display; the effects pipeline never sees it.
 */
export function applyRgbShift(pixels: PixelBuffer, shift: number): PixelBuffer {
  const { width, height, data } = pixels;
  const out = new Uint8ClampedArray(data.length);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const target = (y * width + x) * 3;
      let r = 0;
      let g = 0;
      let b = 0;

      for (const [dx, dy] of COPY_OFFSETS) {
        const sx = x + dx * shift;
        const sy = y + dy * shift;
        if (sx < 0 || sx >= width || sy < 0 || sy >= height) continue;
        const source = (sy * width + sx) * 3;
        r += data[source] * 0.5;
        g += data[source + 1] * 0.5;
        b += data[source + 2] * 0.5;
      }

      out[target] = Math.min(255, Math.round(r));
      out[target + 1] = Math.min(255, Math.round(g));
      out[target + 2] = Math.min(255, Math.round(b));
    }
  }

  return { width, height, data: out };
}
