// ABOUTME: Type definitions for worker-thread communication
// ABOUTME: Defines request/response interfaces for band-based grid computation

import type { GridRequest } from "../types";

/**
 * Rows of the iteration grid a worker should compute.
 */
export interface BandBounds {
  /** First grid row of the band */
  startRow: number;
  /** Number of rows in the band */
  rowCount: number;
}

/**
 * Request sent to a worker to compute one band. Everything in it is a plain number,
 * string or object, so it survives the structured clone of postMessage unchanged.
 */
export interface BandComputeRequest {
  /** Bounds of the band to compute */
  band: BandBounds;
  /** Viewport, grid size, iteration budget and family of the whole frame */
  grid: GridRequest;
  /** Identifies the render the band belongs to; named when the band fails */
  renderId: string;
}

/**
 * Result returned from a worker after computing a band.
 */
export interface BandComputeResult {
  /** Bounds of the computed band (matches request) */
  band: BandBounds;
  /** rowCount * width iteration counts, row-major; its buffer is transferred, not copied */
  values: Int32Array;
}

/**
 * Checks that a result from a worker fits the band that was requested of it.
 */
export function validateBandResult(request: BandComputeRequest, result: BandComputeResult): void {
  const expected = request.band.rowCount * request.grid.width;
  if (result.band.startRow !== request.band.startRow || result.values.length !== expected) {
    throw new Error(
      `Band result mismatch for rows ${request.band.startRow}+${request.band.rowCount}: ` +
        `got ${result.values.length} values at row ${result.band.startRow}, expected ${expected}`
    );
  }
}
