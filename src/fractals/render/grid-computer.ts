// ABOUTME: Common contract for anything that fills an IterationGrid from a GridRequest
// ABOUTME: Includes the in-process implementation and the cancellation error

import { computeBand } from "../workers/compute-chunk";
import type { GridRequest, IterationGrid } from "../types";
import { createRowBands } from "./chunks";

/**
 * Options for controlling a grid computation
 */
export interface GridComputeOptions {
  /** Callback invoked with progress percentage (0-100) as bands complete */
  onProgress?: (percent: number) => void;
  /** Signal to cancel the computation */
  signal?: AbortSignal;
}

export interface GridComputer {
  /**
   * Fills `target` (already sized to request.width × request.height) with iteration
   * counts. Rejects with RenderCancelledError when the signal aborts; once aborted,
   * nothing more is written into `target`.
   */
  compute(request: GridRequest, target: IterationGrid, options?: GridComputeOptions): Promise<IterationGrid>;
  dispose(): void;
}

/**
 * Thrown when a render is superseded before it finished. Callers treat it as a
 * normal outcome, not a failure.
 */
export class RenderCancelledError extends Error {
  constructor(message = "Render cancelled") {
    super(message);
    this.name = "RenderCancelledError";
  }
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RenderCancelledError();
  }
}

export function assertGridShape(request: GridRequest, target: IterationGrid): void {
  if (target.width !== request.width || target.height !== request.height) {
    throw new Error(
      `Iteration grid is ${target.width}x${target.height}, expected ${request.width}x${request.height}`
    );
  }
}

/**
 * Computes bands one after another on the calling thread. Used when no worker pool is
 * available and by tests; produces exactly the grid the pool does.
 */
export class InProcessGridComputer implements GridComputer {
  async compute(request: GridRequest, target: IterationGrid, options?: GridComputeOptions): Promise<IterationGrid> {
    assertGridShape(request, target);
    const bands = createRowBands(request.height);

    for (const [index, band] of bands.entries()) {
      throwIfCancelled(options?.signal);
      const result = computeBand({ band, grid: request, renderId: "in-process" });
      target.values.set(result.values, band.startRow * request.width);
      options?.onProgress?.(((index + 1) / bands.length) * 100);
    }

    return target;
  }

  dispose(): void {}
}
