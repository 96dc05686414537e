// ABOUTME: Runs one frame end to end: grid computation, edge filter, colorization
// ABOUTME: Owns the frame's buffers and remembers the last coloring source for recolors

import type { RandomSource } from "../../lib/random";
import { selectColoringSource, selectEdgeFilter } from "../algorithms/convolution";
import type { FieldGrid, GridRequest, PixelBuffer } from "../types";
import { BufferSet, RenderBuffers } from "./buffers";
import { colorizeField, ShadingContext } from "./effects";
import { GridComputeOptions, GridComputer, throwIfCancelled } from "./grid-computer";

export class FrameRenderer {
  private readonly buffers = new RenderBuffers();
  private lastSource: { set: BufferSet; source: FieldGrid } | null = null;

  constructor(
    private readonly computer: GridComputer,
    private readonly random: RandomSource
  ) {}

  /**
   * Computes the grid for `request` and colors it. The returned buffer belongs to the
   * renderer and is overwritten by the next frame of the same size.
   *
   * @throws RenderCancelledError when `options.signal` aborts before coloring starts
   */
  async render(request: GridRequest, shading: ShadingContext, options?: GridComputeOptions): Promise<PixelBuffer> {
    const set = this.buffers.resizeIfNeeded(request.width, request.height);
    await this.computer.compute(request, set.grid, options);
    throwIfCancelled(options?.signal);

    const source = selectColoringSource(set.grid, selectEdgeFilter(shading.effects.toggles), set.edges);
    this.lastSource = { set, source };
    return colorizeField(source, set.pixels, shading, this.random);
  }

  /**
   * Re-colors the last computed source with new shading (palette tick, effect
   * parameter change) without recomputing the grid. Null until a frame has rendered,
   * or after the buffers were reallocated for a new size.
   */
  recolor(shading: ShadingContext): PixelBuffer | null {
    const last = this.lastSource;
    if (!last || this.buffers.current !== last.set) {
      return null;
    }
    return colorizeField(last.source, last.set.pixels, shading, this.random);
  }

  dispose(): void {
    this.computer.dispose();
    this.buffers.release();
    this.lastSource = null;
  }
}
