// ABOUTME: Julia set algorithm implementation
// ABOUTME: Iterates z² + c from the pixel's coordinate with a fixed constant c

import type { JuliaConstant } from "../types";
import { ESCAPE_RADIUS_SQUARED, EscapeTimeAlgorithm, IterationResult } from "./base";

/**
 * Julia set for a fixed constant c. Same update rule as the Mandelbrot set, but z
 * starts at the pixel's plane coordinate and c never changes.
 */
export class JuliaAlgorithm implements EscapeTimeAlgorithm {
  readonly name = "Julia Set";
  readonly description: string;

  constructor(readonly constant: JuliaConstant) {
    this.description = `z → z² + c with c = ${constant.cReal} + ${constant.cImag}i, starting from the pixel`;
  }

  computePoint(real: number, imag: number, maxIterations: number): IterationResult {
    const { cReal, cImag } = this.constant;
    let zr = real;
    let zi = imag;
    let iter = 0;

    while (iter < maxIterations) {
      const zr2 = zr * zr;
      const zi2 = zi * zi;
      if (zr2 + zi2 > ESCAPE_RADIUS_SQUARED) break;

      zi = 2 * zr * zi + cImag;
      zr = zr2 - zi2 + cReal;
      iter++;
    }

    return { iter, zr, zi };
  }
}
