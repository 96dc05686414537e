// ABOUTME: Visual effect toggles and the parameters each effect reads per frame
// ABOUTME: Parameters are re-drawn from the session's random source on every off->on edge

import type { PaletteParams, PsychedelicParams } from "../fractals/algorithms/coloring";
import type { FractalKind } from "../fractals/types";
import type { RandomSource } from "../lib/random";

export const EFFECT_NAMES = [
  "psychedelic",
  "warpBands",
  "tunnel",
  "glitch",
  "colorCrush",
  "scanLines",
  "rgbShift",
  "neonEdges",
  "emboss",
  "juliaMorph",
  "strobe",
] as const;

export type EffectName = (typeof EFFECT_NAMES)[number];

export type EffectToggles = Record<EffectName, boolean>;

export interface EffectParams {
  psychedelic: PsychedelicParams;
  warpFrequency: number;
  warpAmplitude: number;
  tunnelPower: number;
  glitchChance: number;
  crushLevels: number;
  rgbShift: number;
  morphRadius: number;
  /** Multipliers for the four palette formulas; re-drawn when an edge filter turns on */
  palette: PaletteParams;
  scanSpacing: number;
  scanDarkness: number;
}

export interface EffectState {
  toggles: EffectToggles;
  params: EffectParams;
}

export const defaultEffectParams: EffectParams = {
  psychedelic: [2, 3, 1, 0, 0, 0],
  warpFrequency: 30,
  warpAmplitude: 10,
  tunnelPower: 2,
  glitchChance: 0.001,
  crushLevels: 4,
  rgbShift: 2,
  morphRadius: 0.005,
  palette: [15, 5, 2],
  scanSpacing: 4,
  scanDarkness: 0.7,
};

const allOff: EffectToggles = {
  psychedelic: false,
  warpBands: false,
  tunnel: false,
  glitch: false,
  colorCrush: false,
  scanLines: false,
  rgbShift: false,
  neonEdges: false,
  emboss: false,
  juliaMorph: false,
  strobe: false,
};

export function createEffectState(): EffectState {
  return {
    toggles: { ...allOff },
    params: {
      ...defaultEffectParams,
      psychedelic: [...defaultEffectParams.psychedelic],
      palette: [...defaultEffectParams.palette],
    },
  };
}

export function randomPaletteParams(random: RandomSource): PaletteParams {
  return [random.uniform(5, 20), random.uniform(2, 10), random.uniform(1, 5)];
}

/**
 * Fresh parameters for an effect that just switched on. Toggles without parameters
 * (strobe) leave `params` untouched.
 */
export function randomizeEffectParams(name: EffectName, params: EffectParams, random: RandomSource): EffectParams {
  switch (name) {
    case "psychedelic":
      return {
        ...params,
        psychedelic: [
          random.uniform(1, 4),
          random.uniform(1, 4),
          random.uniform(0.5, 2),
          random.next(),
          random.next(),
          random.next(),
        ],
      };
    case "warpBands":
      return { ...params, warpFrequency: random.uniform(15, 60), warpAmplitude: random.uniform(5, 15) };
    case "tunnel":
      return { ...params, tunnelPower: random.uniform(1.5, 3.5) };
    case "glitch":
      return { ...params, glitchChance: random.uniform(0.0005, 0.0025) };
    case "colorCrush":
      return { ...params, crushLevels: random.int(3, 8) };
    case "rgbShift":
      return { ...params, rgbShift: random.int(1, 4) };
    case "juliaMorph":
      return { ...params, morphRadius: random.uniform(0.002, 0.01) };
    case "neonEdges":
    case "emboss":
      return { ...params, palette: randomPaletteParams(random) };
    case "scanLines":
      return { ...params, scanSpacing: random.int(3, 6), scanDarkness: random.uniform(0.5, 0.8) };
    case "strobe":
      return params;
  }
}

/**
 * Applies a batch of toggle changes. Effects are visited in EFFECT_NAMES order and
 * re-randomised only on an off->on edge. Continuous-hue coloring forces strobe off,
 * and Julia morph stays off unless the family is Julia.
 */
export function applyEffectToggles(
  state: EffectState,
  changes: Partial<EffectToggles>,
  random: RandomSource,
  kind: FractalKind
): EffectState {
  let params = state.params;
  const toggles: EffectToggles = { ...state.toggles };

  for (const name of EFFECT_NAMES) {
    const next = changes[name];
    if (next === undefined) continue;
    if (next && !state.toggles[name]) {
      params = randomizeEffectParams(name, params, random);
    }
    toggles[name] = next;
  }

  return constrainEffects({ toggles, params }, kind);
}

/** Re-applies the cross-toggle rules, e.g. after the fractal family changes. */
export function constrainEffects(state: EffectState, kind: FractalKind): EffectState {
  const forceStrobeOff = state.toggles.psychedelic && state.toggles.strobe;
  const forceMorphOff = kind !== "julia" && state.toggles.juliaMorph;
  if (!forceStrobeOff && !forceMorphOff) return state;

  return {
    ...state,
    toggles: {
      ...state.toggles,
      strobe: forceStrobeOff ? false : state.toggles.strobe,
      juliaMorph: forceMorphOff ? false : state.toggles.juliaMorph,
    },
  };
}

/** Palette ticks only advance while strobe runs in palette mode. */
export const strobeAdvancesPalette = (toggles: EffectToggles): boolean => toggles.strobe && !toggles.psychedelic;
