// ABOUTME: Core band computation logic for worker threads
// ABOUTME: Turns a band request into the iteration counts of its rows

import { computeIterationRows } from "../render/escape-time";
import { BandComputeRequest, BandComputeResult } from "./types";

/**
 * Computes the iteration counts of one horizontal band of the grid.
 *
 * Runs inside a worker thread, and on the calling thread when no pool is used. The
 * values match the same rows of a whole-grid computation exactly, whatever the band
 * split.
 *
 * @param request - Band bounds plus the frame's grid parameters
 * @returns The band and its counts, rowCount * width values row-major
 */
export function computeBand(request: BandComputeRequest): BandComputeResult {
  const { band, grid, renderId } = request;

  try {
    return {
      band,
      values: computeIterationRows(grid, band.startRow, band.rowCount),
    };
  } catch (error) {
    console.error(`Band at row ${band.startRow} of ${renderId} failed:`, error);
    throw error;
  }
}
