/**
 * A horizontal band of the iteration grid, the unit of work handed to one worker call.
 */
export interface RowBand {
  startRow: number;
  rowCount: number;
}

type BandOptions = {
  preferredNumber: number;
  minRows: number;
};

/**
 * Picks a band count that keeps every worker busy with a few bands each, so a slow
 * band (one crossing the set's interior) does not stall the whole render.
 *
 * @param workerCount - Size of the worker pool
 * @returns The preferred number of bands
 */
export function calculateAdaptiveBandCount(workerCount: number): number {
  return Math.max(1, Math.min(64, workerCount * 4));
}

/**
 * This function divides a grid of `height` rows into contiguous bands that together
 * cover every row exactly once, top to bottom.
 *
 * @param height of the grid to divide
 * @param options for the band size calculation
 * @returns an array of bands in row order
 */
export function createRowBands(
  height: number,
  options: BandOptions = { preferredNumber: 16, minRows: 4 }
): RowBand[] {
  const bands: RowBand[] = [];
  if (height <= 0) return bands;

  const rowsPerBand = calculateRowsPerBand(height, options);
  for (let startRow = 0; startRow < height; startRow += rowsPerBand) {
    bands.push({ startRow, rowCount: Math.min(rowsPerBand, height - startRow) });
  }

  return bands;
}

function calculateRowsPerBand(height: number, options: BandOptions): number {
  const target = Math.ceil(height / Math.max(1, options.preferredNumber));
  return Math.max(options.minRows, target, 1);
}
