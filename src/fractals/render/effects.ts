// ABOUTME: Colorizes an iteration (or edge) field through the ordered effects pipeline
// ABOUTME: warp -> glitch -> color -> tunnel -> crush -> scan lines, per pixel

import type { RandomSource } from "../../lib/random";
import type { EffectState } from "../../state/effects";
import { paletteColor, psychedelicColor } from "../algorithms/coloring";
import type { FieldGrid, PixelBuffer, RGB } from "../types";

/**
 * Per-frame inputs to colorization. Built by the controller from the render session;
 * nothing here is process-wide.
 */
export interface ShadingContext {
  maxIterations: number;
  paletteId: number;
  timePhase: number;
  effects: EffectState;
}

/**
 * Warp bands: shifts non-interior counts by sin(y / freq + 4π·phase) · amp, truncated
 * toward zero and floored at 0.
 */
export function warpIteration(
  iter: number,
  y: number,
  maxIterations: number,
  timePhase: number,
  frequency: number,
  amplitude: number
): number {
  if (iter >= maxIterations) return iter;
  const offset = Math.sin(y / frequency + timePhase * Math.PI * 4) * amplitude;
  return Math.max(0, iter + Math.trunc(offset));
}

/** Brightness factor max(0, 1 - (dist / maxDist)^power), measured from the grid center. */
export function tunnelBrightness(x: number, y: number, width: number, height: number, power: number): number {
  const centerX = width / 2;
  const centerY = height / 2;
  const maxDist = Math.sqrt(centerX * centerX + centerY * centerY);
  const dist = Math.sqrt((x - centerX) ** 2 + (y - centerY) ** 2);
  return Math.max(0, 1 - (dist / maxDist) ** power);
}

/**
 * Quantizes one channel to `levels` steps of 256 / levels. The step floor is rounded
 * up to an integer so that crushing an already-crushed value is a no-op, including
 * when levels does not divide 256.
 */
export function crushChannel(value: number, levels: number): number {
  const crushFactor = 256 / levels;
  return Math.ceil(Math.floor(value / crushFactor) * crushFactor);
}

const scale = ([r, g, b]: RGB, factor: number): RGB => [
  Math.trunc(r * factor),
  Math.trunc(g * factor),
  Math.trunc(b * factor),
];

/**
 * Writes `target` from `source`. Pre-color effects change the value that gets
 * colored; post-color effects only touch the resulting RGB. `random` drives pixel
 * glitch and is only consumed when glitch is on.
 */
export function colorizeField(
  source: FieldGrid,
  target: PixelBuffer,
  shading: ShadingContext,
  random: RandomSource
): PixelBuffer {
  const { width, height, values } = source;
  if (target.width !== width || target.height !== height) {
    throw new Error(`Pixel buffer is ${target.width}x${target.height}, expected ${width}x${height}`);
  }

  const { maxIterations, paletteId, timePhase, effects } = shading;
  const { toggles, params } = effects;
  const data = target.data;

  for (let y = 0; y < height; y++) {
    const scanned = toggles.scanLines && y % params.scanSpacing === 0;

    for (let x = 0; x < width; x++) {
      let iter = values[y * width + x];

      if (toggles.warpBands) {
        iter = warpIteration(iter, y, maxIterations, timePhase, params.warpFrequency, params.warpAmplitude);
      }
      if (toggles.glitch && random.next() < params.glitchChance) {
        iter = random.int(0, maxIterations);
      }

      let rgb = toggles.psychedelic
        ? psychedelicColor(iter, maxIterations, timePhase, params.psychedelic)
        : paletteColor(iter, maxIterations, paletteId, params.palette);

      if (toggles.tunnel) {
        rgb = scale(rgb, tunnelBrightness(x, y, width, height, params.tunnelPower));
      }
      if (toggles.colorCrush) {
        rgb = [
          crushChannel(rgb[0], params.crushLevels),
          crushChannel(rgb[1], params.crushLevels),
          crushChannel(rgb[2], params.crushLevels),
        ];
      }
      if (scanned) {
        rgb = scale(rgb, params.scanDarkness);
      }

      const offset = (y * width + x) * 3;
      data[offset] = rgb[0];
      data[offset + 1] = rgb[1];
      data[offset + 2] = rgb[2];
    }
  }

  return target;
}

export function createPixelBuffer(width: number, height: number): PixelBuffer {
  return { width, height, data: new Uint8ClampedArray(width * height * 3) };
}
