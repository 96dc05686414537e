// ABOUTME: Mandelbrot set algorithm implementation
// ABOUTME: Computes escape-time iterations for points in the complex plane

import { ESCAPE_RADIUS_SQUARED, EscapeTimeAlgorithm, IterationResult } from "./base";

/**
 * Mandelbrot Set algorithm implementation.
 *
 * For each point c in the complex plane, we iterate:
 *   z₀ = 0
 *   z_{n+1} = z_n² + c
 *
 * The escape test runs before each update, so the recorded count is the number of
 * updates applied before |z|² first exceeded 4. Points that never escape report
 * exactly maxIterations.
 */
export class MandelbrotAlgorithm implements EscapeTimeAlgorithm {
  readonly name = "Mandelbrot Set";
  readonly description = "The classic Mandelbrot set: z → z² + c, starting from z = 0";

  computePoint(real: number, imag: number, maxIterations: number): IterationResult {
    let zr = 0;
    let zi = 0;
    let iter = 0;

    while (iter < maxIterations) {
      const zr2 = zr * zr;
      const zi2 = zi * zi;
      if (zr2 + zi2 > ESCAPE_RADIUS_SQUARED) break;

      // (zr + zi*i)² = zr² - zi² + 2*zr*zi*i
      zi = 2 * zr * zi + imag;
      zr = zr2 - zi2 + real;
      iter++;
    }

    return { iter, zr, zi };
  }
}

/**
 * Default instance of the Mandelbrot algorithm for convenient importing.
 */
export const mandelbrotAlgorithm = new MandelbrotAlgorithm();
