import type { Viewport } from "../fractals/types";

export type PlaneBounds = {
  reStart: number;
  reEnd: number;
  imStart: number;
  imEnd: number;
};

export type PlanePoint = { re: number; im: number };

/**
 * Width over height, falling back to 1.0 when the height is not positive.
 */
export const aspectRatio = (width: number, height: number): number => (height > 0 ? width / height : 1.0);

/**
 * Computes the complex-plane rectangle covered by a width×height pixel grid.
 * The imaginary span is derived as reSpan / (width / height).
 */
export const viewportBounds = (viewport: Viewport, width: number, height: number): PlaneBounds => {
  const { reSpan, reCenter, imCenter } = viewport;
  const imSpan = reSpan / aspectRatio(width, height);

  return {
    reStart: reCenter - reSpan / 2,
    reEnd: reCenter + reSpan / 2,
    imStart: imCenter - imSpan / 2,
    imEnd: imCenter + imSpan / 2,
  };
};

/**
 * Maps pixel (x, y) to the plane. Every consumer (grid computation, snapshot export,
 * zoom anchoring) goes through this so results agree across resolutions.
 */
export const pixelToPlane = (bounds: PlaneBounds, x: number, y: number, width: number, height: number): PlanePoint => ({
  re: bounds.reStart + (x / width) * (bounds.reEnd - bounds.reStart),
  im: bounds.imStart + (y / height) * (bounds.imEnd - bounds.imStart),
});

export const planeToPixel = (
  bounds: PlaneBounds,
  point: PlanePoint,
  width: number,
  height: number
): { x: number; y: number } => ({
  x: ((point.re - bounds.reStart) / (bounds.reEnd - bounds.reStart)) * width,
  y: ((point.im - bounds.imStart) / (bounds.imEnd - bounds.imStart)) * height,
});

/**
 * Compute grid size for a display size and render-scale divisor. Degenerate display
 * sizes (layout transients) are floored to minDimension instead of failing.
 */
export const renderDimensions = (
  displayWidth: number,
  displayHeight: number,
  renderScale: number,
  minDimension: number
): { width: number; height: number } => ({
  width: Math.max(minDimension, Math.floor(displayWidth / renderScale) || 0),
  height: Math.max(minDimension, Math.floor(displayHeight / renderScale) || 0),
});
