// --- View Types ---

/**
 * A rectangle of the complex plane described by its real-axis span and center.
 * The imaginary span is derived from the pixel grid's aspect ratio.
 */
export type Viewport = {
  reSpan: number;
  reCenter: number;
  imCenter: number;
};

export type JuliaConstant = {
  cReal: number;
  cImag: number;
};

// --- Fractal Families (discriminated union) ---

export type MandelbrotFamily = { type: "mandelbrot" };

export type JuliaFamily = { type: "julia"; c: JuliaConstant };

export type BurningShipFamily = { type: "burning-ship" };

export type FractalFamily = MandelbrotFamily | JuliaFamily | BurningShipFamily;

export type FractalKind = FractalFamily["type"];

export const FRACTAL_KINDS: readonly FractalKind[] = ["mandelbrot", "julia", "burning-ship"];

/** Display names, also used to build the default intent of each family */
export const FRACTAL_LABELS: Record<FractalKind, string> = {
  mandelbrot: "Mandelbrot",
  julia: "Julia",
  "burning-ship": "Burning Ship",
};

// --- Raw Data Types ---

/** height×width escape-time counts in [0, maxIterations], row-major */
export type IterationGrid = {
  width: number;
  height: number;
  values: Int32Array;
};

/** Convolution output over an IterationGrid, row-major */
export type ScalarGrid = {
  width: number;
  height: number;
  values: Float32Array;
};

/** Anything the colorizer can read a per-pixel value from */
export type FieldGrid = IterationGrid | ScalarGrid;

/** height×width×3 RGB bytes, row-major */
export type PixelBuffer = {
  width: number;
  height: number;
  data: Uint8ClampedArray;
};

export type RGB = [r: number, g: number, b: number];

/**
 * Everything needed to compute one IterationGrid. Plain numbers only so it can be
 * posted to a worker thread as-is.
 */
export type GridRequest = {
  viewport: Viewport;
  width: number;
  height: number;
  maxIterations: number;
  family: FractalFamily;
};
