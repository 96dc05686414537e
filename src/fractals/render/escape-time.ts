// ABOUTME: Evaluates an escape-time algorithm over a pixel grid
// ABOUTME: Row-addressable so the same code serves whole grids and worker bands

import { viewportBounds, pixelToPlane } from "../../lib/viewport";
import { selectAlgorithm } from "../algorithms";
import type { GridRequest, IterationGrid } from "../types";

/**
 * Computes iteration counts for `rowCount` rows starting at `startRow`. The result
 * holds `rowCount * width` values, row-major. Each pixel is independent, so a band
 * computed alone matches the same rows of a full-grid computation exactly.
 */
export function computeIterationRows(request: GridRequest, startRow: number, rowCount: number): Int32Array {
  const { viewport, width, height, maxIterations, family } = request;
  const algorithm = selectAlgorithm(family);
  const bounds = viewportBounds(viewport, width, height);
  const rows = new Int32Array(rowCount * width);

  for (let row = 0; row < rowCount; row++) {
    const y = startRow + row;
    for (let x = 0; x < width; x++) {
      const { re, im } = pixelToPlane(bounds, x, y, width, height);
      rows[row * width + x] = algorithm.computePoint(re, im, maxIterations).iter;
    }
  }

  return rows;
}

/**
 * Computes a whole IterationGrid on the calling thread. Writes into `target` when one
 * of the right shape is supplied, otherwise allocates.
 */
export function computeIterationGrid(request: GridRequest, target?: IterationGrid): IterationGrid {
  const { width, height } = request;
  const grid =
    target && target.width === width && target.height === height
      ? target
      : { width, height, values: new Int32Array(width * height) };

  grid.values.set(computeIterationRows(request, 0, height));
  return grid;
}
