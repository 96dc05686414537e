import type { RGB } from "../types";

/** Channel multipliers shared by the four palette formulas */
export type PaletteParams = [rMult: number, gMult: number, bMult: number];

/** Speeds and offsets driving the continuous-hue color cycle */
export type PsychedelicParams = [
  hueSpeed: number,
  satSpeed: number,
  valSpeed: number,
  hueOffset: number,
  satOffset: number,
  valOffset: number,
];

export const PALETTE_COUNT = 4;

const BLACK: RGB = [0, 0, 0];

// Floored modulo: the result takes the sign of the divisor, so negative emboss
// values still land in range.
const floorMod = (value: number, divisor: number) => {
  const rest = value % divisor;
  return rest < 0 ? rest + divisor : rest;
};

const clampChannel = (value: number) => Math.max(0, Math.min(255, value));

/**
 * HSV to RGB conversion using the six-sector method.
 *
 * @param h - Hue (0-1)
 * @param s - Saturation (0-1)
 * @param v - Value (0-1)
 * @returns RGB tuple with channels truncated to 0-255
 */
export function hsvToRgb(h: number, s: number, v: number): RGB {
  const sector = Math.trunc(h * 6);
  const f = h * 6 - sector;
  const p = v * (1 - s);
  const q = v * (1 - f * s);
  const t = v * (1 - (1 - f) * s);

  let r: number, g: number, b: number;
  switch (floorMod(sector, 6)) {
    case 0:
      [r, g, b] = [v, t, p];
      break;
    case 1:
      [r, g, b] = [q, v, p];
      break;
    case 2:
      [r, g, b] = [p, v, t];
      break;
    case 3:
      [r, g, b] = [p, q, v];
      break;
    case 4:
      [r, g, b] = [t, p, v];
      break;
    default:
      [r, g, b] = [v, p, q];
  }

  return [Math.trunc(r * 255), Math.trunc(g * 255), Math.trunc(b * 255)];
}

/**
 * Palette mode: one of four closed-form formulas chosen by paletteId % 4.
 *
 * - 0: red and green ramp up with the count, blue fades out from 50
 * - 1: red fades out from 100, green ramps up, blue ramps up from 100
 * - 2: wrapping bands (each channel taken modulo its own range)
 * - 3: grayscale proportional to iter / maxIterations
 *
 * Interior points (iter === maxIterations) are black. `iter` may be fractional or
 * negative when it comes from a convolution filter.
 */
export function paletteColor(iter: number, maxIterations: number, paletteId: number, params: PaletteParams): RGB {
  if (iter === maxIterations) return BLACK;

  const [rMult, gMult, bMult] = params;
  const pid = floorMod(paletteId, PALETTE_COUNT);
  let r: number, g: number, b: number;

  if (pid === 0) {
    r = Math.trunc(Math.min(255, iter * rMult));
    g = Math.trunc(Math.min(255, iter * (gMult + floorMod(iter, 5))));
    b = Math.trunc(Math.max(0, 50 - iter * bMult));
  } else if (pid === 1) {
    r = Math.trunc(Math.max(0, 100 - iter * rMult));
    g = Math.trunc(Math.min(255, iter * gMult));
    b = Math.trunc(Math.min(255, 100 + iter * bMult));
  } else if (pid === 2) {
    r = floorMod(Math.trunc(iter * rMult + pid * 30), 256);
    g = floorMod(Math.trunc(iter * gMult + pid * 60), 256);
    b = floorMod(Math.trunc(iter * bMult), 100);
  } else {
    const gray = Math.trunc((255 * iter) / maxIterations);
    r = g = b = gray;
  }

  return [clampChannel(r), clampChannel(g), clampChannel(b)];
}

/**
 * Continuous-hue ("psychedelic") mode. Hue advances with the iteration count and the
 * animation phase; saturation and value breathe with the phase.
 */
export function psychedelicColor(
  iter: number,
  maxIterations: number,
  timePhase: number,
  params: PsychedelicParams
): RGB {
  if (iter === maxIterations) return BLACK;

  const [hueSpeed, satSpeed, valSpeed, hueOffset, satOffset, valOffset] = params;
  const hue = floorMod(iter / 25 + timePhase * hueSpeed + hueOffset, 1);
  const saturation = 0.6 + 0.4 * Math.sin(timePhase * 2 * Math.PI * satSpeed + satOffset);
  const value = 0.8 + 0.2 * Math.sin(iter / 10 + timePhase * 2 * Math.PI * valSpeed + valOffset);

  return hsvToRgb(hue, saturation, value);
}
