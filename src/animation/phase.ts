// ABOUTME: Pure view math for the animation clock and interactive pan/zoom
// ABOUTME: Nothing here mutates state; the controller stores what these return

import { pixelToPlane, viewportBounds } from "../lib/viewport";
import type { JuliaConstant, Viewport } from "../fractals/types";

export interface AnimationMotion {
  zoomMagnitude: number;
  panMagnitudeX: number;
  panMagnitudeY: number;
}

export type ZoomDirection = "in" | "out";

const TWO_PI = 2 * Math.PI;

/** Normalised position in the animation cycle, in [0, 1). */
export function timePhase(elapsedMs: number, periodSec: number): number {
  const elapsedSec = elapsedMs / 1000;
  return (((elapsedSec % periodSec) + periodSec) % periodSec) / periodSec;
}

/** Real span after the breathing zoom at `phase`. */
export const animatedSpan = (baseSpan: number, phase: number, zoomMagnitude: number): number =>
  baseSpan * (1 - zoomMagnitude * Math.sin(phase * TWO_PI));

/**
 * The viewport shown at `phase`. The base viewport is never modified; the drift is
 * recomputed from it on every tick.
 */
export function animatedViewport(
  base: Viewport,
  phase: number,
  displayAspect: number,
  motion: AnimationMotion
): Viewport {
  const angle = phase * TWO_PI;
  const reSpan = animatedSpan(base.reSpan, phase, motion.zoomMagnitude);
  return {
    reSpan,
    reCenter: base.reCenter + motion.panMagnitudeX * reSpan * Math.cos(angle),
    imCenter: base.imCenter + motion.panMagnitudeY * (reSpan / displayAspect) * Math.sin(angle),
  };
}

/** Julia constant circling the stored one by `radius`. */
export function morphedJuliaConstant(c: JuliaConstant, radius: number, phase: number, speed: number): JuliaConstant {
  const angle = phase * TWO_PI * speed;
  return { cReal: c.cReal + radius * Math.cos(angle), cImag: c.cImag + radius * Math.sin(angle) };
}

/**
 * Moves the base center against a pixel drag. `displayedSpan` is the span currently on
 * screen (animated or not), so the drag tracks the pointer.
 */
export function panViewport(
  base: Viewport,
  dx: number,
  dy: number,
  displayWidth: number,
  displayHeight: number,
  displayedSpan: number
): Viewport {
  if (displayWidth <= 0 || displayHeight <= 0) return base;

  const imSpan = displayedSpan / (displayWidth / displayHeight);
  return {
    ...base,
    reCenter: base.reCenter - (dx / displayWidth) * displayedSpan,
    imCenter: base.imCenter - (dy / displayHeight) * imSpan,
  };
}

/**
 * Zooms the base viewport by `step` about display pixel (x, y). The plane point under
 * the anchor is the same before and after.
 */
export function zoomViewport(
  base: Viewport,
  direction: ZoomDirection,
  x: number,
  y: number,
  displayWidth: number,
  displayHeight: number,
  step: number
): Viewport {
  if (displayWidth <= 0 || displayHeight <= 0) return base;

  const factor = direction === "in" ? step : 1 / step;
  const anchor = pixelToPlane(viewportBounds(base, displayWidth, displayHeight), x, y, displayWidth, displayHeight);
  return {
    reSpan: base.reSpan / factor,
    reCenter: anchor.re + (base.reCenter - anchor.re) / factor,
    imCenter: anchor.im + (base.imCenter - anchor.im) / factor,
  };
}
