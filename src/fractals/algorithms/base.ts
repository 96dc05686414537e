/**
 * Result of computing iterations for a single point in the complex plane.
 * Used by fractal algorithms to return iteration count and final z values.
 */
export interface IterationResult {
  /** Number of iterations before escape (or maxIterations if the orbit stayed bounded) */
  iter: number;
  /** Real component of final z value */
  zr: number;
  /** Imaginary component of final z value */
  zi: number;
}

/** |z|² above which an orbit counts as escaped (|z| > 2) */
export const ESCAPE_RADIUS_SQUARED = 4;

/**
 * Interface that all escape-time algorithms implement.
 * One instance is selected per render, never per pixel.
 */
export interface EscapeTimeAlgorithm {
  /** Human-readable name of the algorithm (e.g., "Mandelbrot Set") */
  readonly name: string;

  /** Optional description explaining the iterated map */
  readonly description?: string;

  /**
   * Computes the iteration count and final z values for a pixel mapped to the plane.
   *
   * @param real - Real component of the pixel's plane coordinate
   * @param imag - Imaginary component of the pixel's plane coordinate
   * @param maxIterations - Iteration budget; reaching it marks the point as interior
   */
  computePoint(real: number, imag: number, maxIterations: number): IterationResult;
}
