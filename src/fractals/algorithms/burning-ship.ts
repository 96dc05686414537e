// ABOUTME: Burning Ship fractal algorithm implementation
// ABOUTME: Folds z into the first quadrant before squaring

import { ESCAPE_RADIUS_SQUARED, EscapeTimeAlgorithm, IterationResult } from "./base";

/**
 * Burning Ship: z → (|Re z| + i|Im z|)² + c, starting from z = 0.
 * With the imaginary axis pointing down the grid, the ship appears upright.
 */
export class BurningShipAlgorithm implements EscapeTimeAlgorithm {
  readonly name = "Burning Ship";
  readonly description = "z → (|Re z| + i|Im z|)² + c, starting from z = 0";

  computePoint(real: number, imag: number, maxIterations: number): IterationResult {
    let zr = 0;
    let zi = 0;
    let iter = 0;

    while (iter < maxIterations) {
      if (zr * zr + zi * zi > ESCAPE_RADIUS_SQUARED) break;

      const absZr = Math.abs(zr);
      const absZi = Math.abs(zi);
      const nextZr = absZr * absZr - absZi * absZi + real;
      zi = 2 * absZr * absZi + imag;
      zr = nextZr;
      iter++;
    }

    return { iter, zr, zi };
  }
}

export const burningShipAlgorithm = new BurningShipAlgorithm();
