import type { FractalFamily } from "../types";
import type { EscapeTimeAlgorithm } from "./base";
import { burningShipAlgorithm } from "./burning-ship";
import { JuliaAlgorithm } from "./julia";
import { mandelbrotAlgorithm } from "./mandelbrot";

/**
 * Picks the escape-time algorithm for a family. Called once per render.
 */
export function selectAlgorithm(family: FractalFamily): EscapeTimeAlgorithm {
  switch (family.type) {
    case "mandelbrot":
      return mandelbrotAlgorithm;
    case "julia":
      return new JuliaAlgorithm(family.c);
    case "burning-ship":
      return burningShipAlgorithm;
    default: {
      const unknown: never = family;
      throw new Error(`Unknown fractal family: ${JSON.stringify(unknown)}`);
    }
  }
}

export type { EscapeTimeAlgorithm, IterationResult } from "./base";
