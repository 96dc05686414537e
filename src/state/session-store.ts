// ABOUTME: Per-controller render session held in a zustand vanilla store
// ABOUTME: Replaces process-wide palette and effect counters; layers outside the engine may subscribe

import { createStore, type StoreApi } from "zustand/vanilla";

import { defaultEngineConfig, type EngineConfig } from "../config";
import type { FractalKind, JuliaConstant, Viewport } from "../fractals/types";
import { createEffectState, type EffectState } from "./effects";

export type JuliaOverrideText = {
  real: string;
  imag: string;
};

export type DisplaySize = {
  width: number;
  height: number;
};

export type SessionState = {
  intent: string;
  kind: FractalKind;
  juliaOverride: JuliaOverrideText;
  /** Persisted view; animation offsets are applied on top of it, never into it */
  baseViewport: Viewport;
  baseMaxIterations: number;
  juliaConstant: JuliaConstant;
  effects: EffectState;
  paletteId: number;
  timePhase: number;
  animationStartTime: number;
  animating: boolean;
  renderScale: number;
  iterationBase: number;
  displaySize: DisplaySize;
};

export type SessionActions = {
  setIntent: (intent: string) => void;
  setKind: (kind: FractalKind) => void;
  setJuliaOverride: (override: JuliaOverrideText) => void;
  setBase: (base: { viewport: Viewport; maxIterations: number }) => void;
  setBaseViewport: (viewport: Viewport) => void;
  setJuliaConstant: (constant: JuliaConstant) => void;
  setEffects: (effects: EffectState) => void;
  advancePalette: () => void;
  setTimePhase: (timePhase: number) => void;
  resetAnimationClock: (now: number) => void;
  setAnimating: (animating: boolean) => void;
  setPerformance: (settings: { renderScale: number; iterationBase: number }) => void;
  setDisplaySize: (size: DisplaySize) => void;
};

export type Session = SessionState & SessionActions;

export type SessionStore = StoreApi<Session>;

export const initialSessionState = (config: EngineConfig, now = 0): SessionState => ({
  intent: "",
  kind: "mandelbrot",
  juliaOverride: { real: "-0.7", imag: "0.27015" },
  baseViewport: { reSpan: 3.5, reCenter: -0.5, imCenter: 0 },
  baseMaxIterations: config.iterationBase,
  juliaConstant: { cReal: 0, cImag: 0 },
  effects: createEffectState(),
  paletteId: 0,
  timePhase: 0,
  animationStartTime: now,
  animating: false,
  renderScale: config.renderScale,
  iterationBase: config.iterationBase,
  displaySize: { width: 0, height: 0 },
});

export function createSessionStore(initial: SessionState = initialSessionState(defaultEngineConfig)): SessionStore {
  return createStore<Session>()((set) => ({
    ...initial,

    setIntent: (intent) => set({ intent }),
    setKind: (kind) => set({ kind }),
    setJuliaOverride: (juliaOverride) => set({ juliaOverride }),
    setBase: ({ viewport, maxIterations }) => set({ baseViewport: viewport, baseMaxIterations: maxIterations }),
    setBaseViewport: (baseViewport) => set({ baseViewport }),
    setJuliaConstant: (juliaConstant) => set({ juliaConstant }),
    setEffects: (effects) => set({ effects }),
    advancePalette: () => set((state) => ({ paletteId: state.paletteId + 1 })),
    setTimePhase: (timePhase) => set({ timePhase }),
    resetAnimationClock: (now) => set({ animationStartTime: now, timePhase: 0 }),
    setAnimating: (animating) => set({ animating }),
    setPerformance: ({ renderScale, iterationBase }) => set({ renderScale, iterationBase }),
    setDisplaySize: (displaySize) => set({ displaySize }),
  }));
}
