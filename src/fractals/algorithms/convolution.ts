// ABOUTME: 3x3 convolution filters over an iteration grid (Sobel, Emboss)
// ABOUTME: Output replaces the raw grid as the coloring source for edge effects

import type { FieldGrid, IterationGrid, ScalarGrid } from "../types";

export type EdgeFilter = "sobel" | "emboss";

/**
 * Picks the convolution for the active toggles. Neon edges (Sobel) wins when both
 * are set; Emboss is ignored in that case.
 */
export function selectEdgeFilter(toggles: { neonEdges: boolean; emboss: boolean }): EdgeFilter | null {
  if (toggles.neonEdges) return "sobel";
  if (toggles.emboss) return "emboss";
  return null;
}

export function createScalarGrid(width: number, height: number): ScalarGrid {
  return { width, height, values: new Float32Array(width * height) };
}

// The outermost ring has no full 3x3 neighbourhood; it keeps the input value.
function copyBorder(input: IterationGrid, output: ScalarGrid): void {
  const { width, height, values } = input;
  for (let x = 0; x < width; x++) {
    output.values[x] = values[x];
    output.values[(height - 1) * width + x] = values[(height - 1) * width + x];
  }
  for (let y = 0; y < height; y++) {
    output.values[y * width] = values[y * width];
    output.values[y * width + width - 1] = values[y * width + width - 1];
  }
}

function assertSameShape(input: IterationGrid, output: ScalarGrid): void {
  if (input.width !== output.width || input.height !== output.height) {
    throw new Error(
      `Convolution output is ${output.width}x${output.height}, expected ${input.width}x${input.height}`
    );
  }
}

/**
 * Gradient magnitude sqrt(gx² + gy²) using the standard horizontal and vertical
 * Sobel kernels.
 */
export function applySobelFilter(input: IterationGrid, output: ScalarGrid): ScalarGrid {
  assertSameShape(input, output);
  const { width, height, values: v } = input;
  copyBorder(input, output);

  for (let y = 1; y < height - 1; y++) {
    for (let x = 1; x < width - 1; x++) {
      const up = (y - 1) * width + x;
      const mid = y * width + x;
      const down = (y + 1) * width + x;

      const gx = v[up + 1] + 2 * v[mid + 1] + v[down + 1] - (v[up - 1] + 2 * v[mid - 1] + v[down - 1]);
      const gy = v[up - 1] + 2 * v[up] + v[up + 1] - (v[down - 1] + 2 * v[down] + v[down + 1]);
      output.values[mid] = Math.sqrt(gx * gx + gy * gy);
    }
  }

  return output;
}

/**
 * Weighted sum with the asymmetric kernel
 *   [-2 -1  0]
 *   [-1  1  1]
 *   [ 0  1  2]
 */
export function applyEmbossFilter(input: IterationGrid, output: ScalarGrid): ScalarGrid {
  assertSameShape(input, output);
  const { width, height, values: v } = input;
  copyBorder(input, output);

  for (let y = 1; y < height - 1; y++) {
    for (let x = 1; x < width - 1; x++) {
      const up = (y - 1) * width + x;
      const mid = y * width + x;
      const down = (y + 1) * width + x;

      output.values[mid] =
        -2 * v[up - 1] - v[up] - v[mid - 1] + v[mid] + v[mid + 1] + v[down] + 2 * v[down + 1];
    }
  }

  return output;
}

/**
 * Returns the grid the colorizer should read: the raw iterations, or the filtered
 * field written into `scratch` when an edge filter is active.
 */
export function selectColoringSource(
  grid: IterationGrid,
  filter: EdgeFilter | null,
  scratch: ScalarGrid
): FieldGrid {
  switch (filter) {
    case "sobel":
      return applySobelFilter(grid, scratch);
    case "emboss":
      return applyEmbossFilter(grid, scratch);
    default:
      return grid;
  }
}
