export * from "./config";
export * from "./fractals/types";
export * from "./fractals/render";
export { selectAlgorithm } from "./fractals/algorithms";
export type { EscapeTimeAlgorithm, IterationResult } from "./fractals/algorithms";
export { hsvToRgb, paletteColor, PALETTE_COUNT, psychedelicColor } from "./fractals/algorithms/coloring";
export type { PaletteParams, PsychedelicParams } from "./fractals/algorithms/coloring";
export { applyEmbossFilter, applySobelFilter, selectColoringSource, selectEdgeFilter } from "./fractals/algorithms/convolution";
export type { EdgeFilter } from "./fractals/algorithms/convolution";

export * from "./lib/viewport";
export { defaultIntent, generateIntentParameters } from "./lib/intent";
export type { IntentParameters } from "./lib/intent";
export * from "./lib/numeric-fields";
export * from "./lib/oracle";
export { createRandom, randomSeed } from "./lib/random";
export type { RandomSource } from "./lib/random";
export { PerformanceMonitor } from "./lib/performance-monitor";
export type { RenderMetrics, RenderTiming } from "./lib/performance-monitor";

export * from "./state/effects";
export { createSessionStore, initialSessionState } from "./state/session-store";
export type { DisplaySize, JuliaOverrideText, Session, SessionActions, SessionState, SessionStore } from "./state/session-store";

export * from "./animation/phase";
export { AnimationController } from "./animation/animation-controller";
export type { AnimationControllerOptions, PerformanceUpdate, RenderedFrame } from "./animation/animation-controller";
