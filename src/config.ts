// ABOUTME: Engine-wide defaults for rendering, animation and interaction
// ABOUTME: Resolves caller overrides against the defaults, clamping out-of-range values

export interface EngineConfig {
  /** Base iteration budget; intent-derived budgets fall in [base, 2.5 * base] */
  iterationBase: number;
  /** Divisor applied to the display size to get the compute grid size */
  renderScale: number;
  /** Smallest compute grid edge, used when the display is degenerate */
  minRenderDimension: number;
  animationPeriodSec: number;
  animationIntervalMs: number;
  strobeIntervalMs: number;
  animationZoomMagnitude: number;
  animationPanMagnitudeX: number;
  animationPanMagnitudeY: number;
  /** Span divisor for one zoom-in step (zoom-out uses its reciprocal) */
  zoomStep: number;
  resizeDebounceMs: number;
  exportWidth: number;
  exportHeight: number;
  /** Revolutions of the morphed Julia constant per animation period */
  juliaMorphSpeed: number;
  /** Intent text treated as "no intent" */
  intentPlaceholder: string;
}

export const ITERATION_BASE_RANGE = { min: 10, max: 1000 } as const;
export const RENDER_SCALE_RANGE = { min: 0.5, max: 10 } as const;

export const defaultEngineConfig: EngineConfig = {
  iterationBase: 45,
  renderScale: 1.5,
  minRenderDimension: 50,
  animationPeriodSec: 15,
  animationIntervalMs: 75,
  strobeIntervalMs: 100,
  animationZoomMagnitude: 0.25,
  animationPanMagnitudeX: 0.04,
  animationPanMagnitudeY: 0.04,
  zoomStep: 1.15,
  resizeDebounceMs: 500,
  exportWidth: 1920,
  exportHeight: 1080,
  juliaMorphSpeed: 0.5,
  intentPlaceholder: "Write Your Intent Here...",
};

const clamp = (value: number, min: number, max: number) => Math.max(min, Math.min(max, value));

export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const config = { ...defaultEngineConfig, ...overrides };
  return {
    ...config,
    iterationBase: Math.round(clamp(config.iterationBase, ITERATION_BASE_RANGE.min, ITERATION_BASE_RANGE.max)),
    renderScale: clamp(config.renderScale, RENDER_SCALE_RANGE.min, RENDER_SCALE_RANGE.max),
    minRenderDimension: Math.max(1, Math.floor(config.minRenderDimension)),
  };
}
