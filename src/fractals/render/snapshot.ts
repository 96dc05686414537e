import type { RandomSource } from "../../lib/random";
import { createEffectState, randomPaletteParams } from "../../state/effects";
import type { FractalFamily, PixelBuffer, Viewport } from "../types";
import { RenderBuffers } from "./buffers";
import { colorizeField } from "./effects";
import type { GridComputer } from "./grid-computer";

export interface SnapshotRequest {
  /** The base viewport; animation offsets are never exported */
  viewport: Viewport;
  family: FractalFamily;
  baseMaxIterations: number;
  width: number;
  height: number;
}

export interface Snapshot {
  pixels: PixelBuffer;
  maxIterations: number;
  paletteId: number;
}

/**
 * Renders the base view at a fixed export resolution with twice the iteration budget.
 * No effects apply; the palette and its multipliers are drawn fresh from `random`.
 * Uses its own buffers, so an in-flight display frame is not disturbed.
 */
export async function renderSnapshot(
  computer: GridComputer,
  request: SnapshotRequest,
  random: RandomSource
): Promise<Snapshot> {
  const { viewport, family, width, height } = request;
  const maxIterations = request.baseMaxIterations * 2;
  const { grid, pixels } = new RenderBuffers().resizeIfNeeded(width, height);

  console.log(`Rendering snapshot ${width}x${height}, iterations=${maxIterations}`);
  await computer.compute({ viewport, family, width, height, maxIterations }, grid);

  const effects = createEffectState();
  effects.params.palette = randomPaletteParams(random);
  const paletteId = random.int(0, 3);

  colorizeField(grid, pixels, { maxIterations, paletteId, timePhase: 0, effects }, random);
  return { pixels, maxIterations, paletteId };
}

/**
 * Encodes an RGB buffer as binary PPM (P6).
 */
export function encodePpm(pixels: PixelBuffer): Buffer {
  const header = Buffer.from(`P6\n${pixels.width} ${pixels.height}\n255\n`, "ascii");
  const body = Buffer.from(pixels.data.buffer, pixels.data.byteOffset, pixels.data.byteLength);
  return Buffer.concat([header, body]);
}
