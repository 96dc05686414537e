// ABOUTME: Derives a reproducible base view from free-form intent text
// ABOUTME: SHA-256 digest slices are rescaled into span, center offset, iterations and Julia constant

import { Decimal } from "decimal.js";
import { createHash } from "node:crypto";

import { FRACTAL_LABELS, FractalKind, JuliaConstant, Viewport } from "../fractals/types";

export interface IntentParameters {
  viewport: Viewport;
  maxIterations: number;
  /** Only derived for the Julia family */
  juliaConstant: JuliaConstant | null;
}

const SPAN_RANGE = { min: 0.001, max: 3.5 };
const CENTER_OFFSET_SCALE = 0.3;
const JULIA_CONSTANT_RANGE = { min: -1.5, max: 1.5 };

/** Family-specific base centers, and fixed spans where the family overrides the digest */
const FAMILY_BASE: Record<FractalKind, { reCenter: number; imCenter: number; reSpan?: number }> = {
  mandelbrot: { reCenter: -0.75, imCenter: 0 },
  julia: { reCenter: 0, imCenter: 0, reSpan: 3.0 },
  "burning-ship": { reCenter: -0.5, imCenter: -0.5, reSpan: 2.8 },
};

export const defaultIntent = (kind: FractalKind): string => `${FRACTAL_LABELS[kind]} Default`;

/**
 * Reads digest[start, end) as an unsigned hex integer and divides it by the largest
 * value that many hex digits can hold, giving a fraction in [0, 1].
 */
function hexFraction(digest: string, start: number, end: number): number {
  const value = new Decimal(`0x${digest.slice(start, end)}`);
  const max = new Decimal(16).pow(end - start).minus(1);
  return value.div(max).toNumber();
}

const lerp = (min: number, max: number, fraction: number) => min + fraction * (max - min);

/**
 * Maps intent text to a base viewport, an iteration budget in
 * [iterationBase, trunc(2.5 * iterationBase)] and, for Julia, a constant in
 * [-1.5, 1.5]². Empty text is replaced by "<Family> Default". The same text, aspect
 * ratio, family and base always give bit-identical output.
 *
 * Digest layout (hex digit offsets): span 0-4, real offset 4-8, imaginary offset 8-12,
 * iterations 16-18, Julia real 20-24, Julia imaginary 24-28.
 */
export function generateIntentParameters(
  intent: string,
  aspectRatio: number,
  kind: FractalKind,
  iterationBase = 45
): IntentParameters {
  const text = intent || defaultIntent(kind);
  const digest = createHash("sha256").update(text, "utf8").digest("hex");

  const base = FAMILY_BASE[kind];
  const reSpan = base.reSpan ?? lerp(SPAN_RANGE.min, SPAN_RANGE.max, hexFraction(digest, 0, 4));

  const imScale = aspectRatio > 0 ? reSpan / aspectRatio : reSpan;
  const reOffset = (-0.5 + hexFraction(digest, 4, 8)) * reSpan * CENTER_OFFSET_SCALE;
  const imOffset = (-0.5 + hexFraction(digest, 8, 12)) * imScale * CENTER_OFFSET_SCALE;

  const maxBudget = Math.trunc(iterationBase * 2.5);
  const maxIterations = iterationBase + Math.trunc(hexFraction(digest, 16, 18) * (maxBudget - iterationBase));

  const juliaConstant =
    kind === "julia"
      ? {
          cReal: lerp(JULIA_CONSTANT_RANGE.min, JULIA_CONSTANT_RANGE.max, hexFraction(digest, 20, 24)),
          cImag: lerp(JULIA_CONSTANT_RANGE.min, JULIA_CONSTANT_RANGE.max, hexFraction(digest, 24, 28)),
        }
      : null;

  return {
    viewport: { reSpan, reCenter: base.reCenter + reOffset, imCenter: base.imCenter + imOffset },
    maxIterations,
    juliaConstant,
  };
}
