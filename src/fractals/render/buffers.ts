import { createScalarGrid } from "../algorithms/convolution";
import type { IterationGrid, PixelBuffer, ScalarGrid } from "../types";
import { createPixelBuffer } from "./effects";

/** One consistent set of same-shaped buffers. Replaced as a whole, never piecemeal. */
export interface BufferSet {
  readonly width: number;
  readonly height: number;
  readonly grid: IterationGrid;
  readonly edges: ScalarGrid;
  readonly pixels: PixelBuffer;
}

function allocate(width: number, height: number): BufferSet {
  return {
    width,
    height,
    grid: { width, height, values: new Int32Array(width * height) },
    edges: createScalarGrid(width, height),
    pixels: createPixelBuffer(width, height),
  };
}

/**
 * Owns the iteration grid, edge scratch grid and pixel buffer of a renderer. Readers
 * take `current` once and keep using that set, so a resize can never hand them a grid
 * and a pixel buffer of different shapes.
 */
export class RenderBuffers {
  private set: BufferSet | null = null;

  get current(): BufferSet | null {
    return this.set;
  }

  /**
   * Returns the buffers for a width×height render, reallocating all three together
   * when the shape changed. Same shape means the existing buffers are overwritten in
   * place by the next render.
   */
  resizeIfNeeded(width: number, height: number): BufferSet {
    if (this.set && this.set.width === width && this.set.height === height) {
      return this.set;
    }
    this.set = allocate(width, height);
    return this.set;
  }

  release(): void {
    this.set = null;
  }
}
