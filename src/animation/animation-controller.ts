// ABOUTME: Owns one render session: base view, effects, animation clock, timers and the frame renderer
// ABOUTME: Every trigger (intent, pan, zoom, resize, tick, strobe) ends in one frame delivered to onFrame

import { EngineConfig, resolveEngineConfig } from "../config";
import { applyRgbShift } from "../fractals/render/compositing";
import type { ShadingContext } from "../fractals/render/effects";
import { FrameRenderer } from "../fractals/render/frame-renderer";
import { GridComputer, RenderCancelledError } from "../fractals/render/grid-computer";
import { renderSnapshot, Snapshot } from "../fractals/render/snapshot";
import { FRACTAL_LABELS, FractalFamily, FractalKind, PixelBuffer, Viewport } from "../fractals/types";
import debounce, { Debounced } from "../lib/debounce";
import { generateIntentParameters } from "../lib/intent";
import {
  FieldSubmission,
  ITERATION_BASE_FIELD,
  JULIA_CONSTANT_FIELD,
  NumericField,
  parseNumericField,
  RENDER_SCALE_FIELD,
} from "../lib/numeric-fields";
import { createRandom, randomSeed, RandomSource } from "../lib/random";
import { aspectRatio, renderDimensions } from "../lib/viewport";
import { applyEffectToggles, constrainEffects, EffectToggles, strobeAdvancesPalette } from "../state/effects";
import { createSessionStore, initialSessionState, Session, SessionStore } from "../state/session-store";
import {
  AnimationMotion,
  animatedSpan,
  animatedViewport,
  morphedJuliaConstant,
  panViewport,
  timePhase,
  ZoomDirection,
  zoomViewport,
} from "./phase";

export interface RenderedFrame {
  /** Output of the effects pipeline at compute resolution */
  pixels: PixelBuffer;
  /** `pixels` after display compositing (RGB shift); the same buffer when no compositing is on */
  display: PixelBuffer;
  viewport: Viewport;
  maxIterations: number;
  paletteId: number;
  timePhase: number;
}

export interface PerformanceUpdate {
  renderScale: FieldSubmission;
  iterationBase: FieldSubmission;
  frame: RenderedFrame | null;
}

export interface AnimationControllerOptions {
  /** Fills iteration grids; an initialised ParallelRenderer or an InProcessGridComputer */
  computer: GridComputer;
  config?: Partial<EngineConfig>;
  /** Seed for effect parameters, glitch and snapshot palettes */
  seed?: number;
  now?: () => number;
  onFrame?: (frame: RenderedFrame) => void;
}

type FrameInfo = { viewport: Viewport; maxIterations: number };

export class AnimationController {
  readonly config: EngineConfig;
  readonly store: SessionStore;

  private readonly computer: GridComputer;
  private readonly renderer: FrameRenderer;
  private readonly random: RandomSource;
  private readonly now: () => number;
  private readonly onFrame?: (frame: RenderedFrame) => void;
  private readonly scaleField: NumericField;
  private readonly iterationField: NumericField;
  private readonly debouncedResize: Debounced<[]>;

  private animationTimer: ReturnType<typeof setInterval> | null = null;
  private strobeTimer: ReturnType<typeof setInterval> | null = null;
  private inFlight: AbortController | null = null;
  private lastFrame: FrameInfo | null = null;
  private disposed = false;

  constructor({ computer, config, seed, now = Date.now, onFrame }: AnimationControllerOptions) {
    this.config = resolveEngineConfig(config);
    this.computer = computer;
    this.random = createRandom(seed ?? randomSeed());
    this.renderer = new FrameRenderer(computer, this.random);
    this.now = now;
    this.onFrame = onFrame;
    this.store = createSessionStore(initialSessionState(this.config, now()));
    this.scaleField = new NumericField(RENDER_SCALE_FIELD, this.config.renderScale);
    this.iterationField = new NumericField(ITERATION_BASE_FIELD, this.config.iterationBase);
    this.debouncedResize = debounce(() => {
      console.log("Handling debounced resize, regenerating fractal structure");
      void this.regenerateFromState(false);
    }, this.config.resizeDebounceMs);
  }

  get state(): Session {
    return this.store.getState();
  }

  /** Text the performance inputs should show: their last valid values */
  get performanceText(): { renderScale: string; iterationBase: string } {
    return { renderScale: this.scaleField.text, iterationBase: this.iterationField.text };
  }

  /** Compute grid size for the current display size and render scale */
  renderSize(): { width: number; height: number } {
    const { displaySize, renderScale } = this.state;
    return renderDimensions(displaySize.width, displaySize.height, renderScale, this.config.minRenderDimension);
  }

  // --- Triggers ---

  /** Records the new display size; the regeneration runs once resizing settles. */
  setDisplaySize(width: number, height: number): void {
    this.state.setDisplaySize({ width, height });
    this.debouncedResize();
  }

  setIntent(text: string): Promise<RenderedFrame | null> {
    this.state.setIntent(text);
    return this.regenerateFromIntent();
  }

  setFamily(kind: FractalKind): Promise<RenderedFrame | null> {
    const { setKind, setEffects, effects } = this.state;
    setKind(kind);
    setEffects(constrainEffects(effects, kind));
    return this.regenerateFromIntent();
  }

  /**
   * Stores the Julia constant override text. It is read by the next regeneration from
   * intent, which runs immediately while the Julia family is selected.
   */
  setJuliaOverride(realText: string, imagText: string): Promise<RenderedFrame | null> {
    this.state.setJuliaOverride({ real: realText, imag: imagText });
    return this.state.kind === "julia" ? this.regenerateFromIntent() : Promise.resolve(null);
  }

  /**
   * Derives a new base view from the intent text and renders it. For Julia, a valid
   * override pair wins over the derived constant; otherwise the derived constant is used
   * and written back into the override text.
   */
  regenerateFromIntent(resetTime = true): Promise<RenderedFrame | null> {
    const { intent, kind, iterationBase, juliaOverride, setBase, setJuliaConstant, setJuliaOverride } = this.state;
    const text = intent === this.config.intentPlaceholder ? "" : intent;
    console.log(`Generating new base (${FRACTAL_LABELS[kind]}) from intent`);

    const { width, height } = this.renderSize();
    const params = generateIntentParameters(text, aspectRatio(width, height), kind, iterationBase);
    setBase(params);

    if (kind === "julia") {
      const cReal = parseNumericField(juliaOverride.real, JULIA_CONSTANT_FIELD);
      const cImag = parseNumericField(juliaOverride.imag, JULIA_CONSTANT_FIELD);
      if (cReal !== null && cImag !== null) {
        setJuliaConstant({ cReal, cImag });
      } else {
        const derived = params.juliaConstant ?? { cReal: 0, cImag: 0 };
        setJuliaConstant(derived);
        setJuliaOverride({ real: derived.cReal.toFixed(4), imag: derived.cImag.toFixed(4) });
      }
    }

    return this.regenerateFromState(resetTime);
  }

  /**
   * Restarts the timers for the current mode and renders one frame from the stored
   * base view.
   */
  regenerateFromState(resetTime = true): Promise<RenderedFrame | null> {
    if (this.disposed) return Promise.resolve(null);

    this.stopTimers();
    if (resetTime) {
      this.state.resetAnimationClock(this.now());
    }

    const { animating, effects, baseViewport, baseMaxIterations } = this.state;
    if (animating) {
      this.startAnimationTimer();
      return this.tick();
    }

    if (effects.toggles.strobe) {
      this.strobeTimer = setInterval(() => this.onStrobeTimer(), this.config.strobeIntervalMs);
    }
    return this.renderFrame(baseViewport, baseMaxIterations);
  }

  /** One animation step: advances the clock and renders the drifted view. */
  tick(): Promise<RenderedFrame | null> {
    const { animating, effects, baseViewport, baseMaxIterations, displaySize } = this.state;
    if (!animating || this.disposed) return Promise.resolve(null);

    if (strobeAdvancesPalette(effects.toggles)) {
      this.state.advancePalette();
    }
    const phase = this.currentPhase();
    this.state.setTimePhase(phase);

    const displayAspect = displaySize.width / Math.max(1, displaySize.height);
    return this.renderFrame(animatedViewport(baseViewport, phase, displayAspect, this.motion()), baseMaxIterations);
  }

  /**
   * Strobe step while static: recolors the last frame with the next palette without
   * recomputing the grid. Null when animating, when nothing can be recolored, or while
   * a frame is being computed into the buffers the recolor would read.
   */
  strobeTick(): RenderedFrame | null {
    const last = this.lastFrame;
    if (this.state.animating || !last || this.inFlight || this.disposed) return null;

    const pixels = this.renderer.recolor(this.shading(last.maxIterations));
    return pixels ? this.emit(pixels, last) : null;
  }

  /** Drags the base view by a display-pixel delta. */
  pan(dx: number, dy: number): Promise<RenderedFrame | null> {
    const { animating, baseViewport, displaySize, setBaseViewport } = this.state;
    if (displaySize.width <= 0 || displaySize.height <= 0) return Promise.resolve(null);

    const displayedSpan = animating
      ? animatedSpan(baseViewport.reSpan, this.currentPhase(), this.config.animationZoomMagnitude)
      : baseViewport.reSpan;
    setBaseViewport(panViewport(baseViewport, dx, dy, displaySize.width, displaySize.height, displayedSpan));
    return this.regenerateFromState(false);
  }

  /** Zooms the base view about a display pixel. */
  zoom(direction: ZoomDirection, x: number, y: number): Promise<RenderedFrame | null> {
    const { baseViewport, displaySize, setBaseViewport } = this.state;
    if (displaySize.width <= 0 || displaySize.height <= 0) return Promise.resolve(null);

    setBaseViewport(
      zoomViewport(baseViewport, direction, x, y, displaySize.width, displaySize.height, this.config.zoomStep)
    );
    return this.regenerateFromState(false);
  }

  setEffects(changes: Partial<EffectToggles>): Promise<RenderedFrame | null> {
    const { effects, kind, setEffects } = this.state;
    setEffects(applyEffectToggles(effects, changes, this.random, kind));
    return this.regenerateFromState(false);
  }

  setAnimating(on: boolean): Promise<RenderedFrame | null> {
    this.state.setAnimating(on);
    console.log(`Fractal animation ${on ? "enabled" : "disabled"}`);
    return this.regenerateFromState(false);
  }

  /**
   * Submits the render scale and iteration base fields. Invalid text leaves a field at
   * its last valid value; a new base view is derived only when a value changed.
   */
  async applyPerformanceSettings(scaleText: string, iterationText: string): Promise<PerformanceUpdate> {
    const renderScale = this.scaleField.submit(scaleText);
    const iterationBase = this.iterationField.submit(iterationText);

    if (!renderScale.changed && !iterationBase.changed) {
      console.log("No valid performance changes applied");
      return { renderScale, iterationBase, frame: null };
    }

    this.state.setPerformance({ renderScale: renderScale.value, iterationBase: iterationBase.value });
    console.log(`Render scale ${renderScale.value}, base max iterations ${iterationBase.value}`);
    const frame = await this.regenerateFromIntent(false);
    return { renderScale, iterationBase, frame };
  }

  /**
   * Renders the base view at the export resolution. Animation pauses while it runs and
   * resumes afterwards.
   */
  async exportSnapshot(): Promise<Snapshot> {
    const { animating, baseViewport, baseMaxIterations } = this.state;
    const resume = animating && this.animationTimer !== null;
    if (resume) this.stopTimers();

    try {
      return await renderSnapshot(
        this.computer,
        {
          viewport: baseViewport,
          family: this.family(false),
          baseMaxIterations,
          width: this.config.exportWidth,
          height: this.config.exportHeight,
        },
        this.random
      );
    } finally {
      if (resume && !this.disposed && this.state.animating) {
        this.startAnimationTimer();
      }
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.stopTimers();
    this.debouncedResize.cancel();
    this.inFlight?.abort();
    this.inFlight = null;
    this.renderer.dispose();
  }

  // --- Internals ---

  private async renderFrame(viewport: Viewport, maxIterations: number): Promise<RenderedFrame | null> {
    this.inFlight?.abort();
    const controller = new AbortController();
    this.inFlight = controller;

    const { width, height } = this.renderSize();
    const request = { viewport, width, height, maxIterations, family: this.family(true) };

    try {
      const pixels = await this.renderer.render(request, this.shading(maxIterations), { signal: controller.signal });
      const info = { viewport, maxIterations };
      this.lastFrame = info;
      return this.emit(pixels, info);
    } catch (error) {
      if (error instanceof RenderCancelledError) {
        console.log("Frame superseded before it finished");
      } else {
        console.error("Frame render failed:", error);
      }
      return null;
    } finally {
      if (this.inFlight === controller) {
        this.inFlight = null;
      }
    }
  }

  /** Shading for the next colorization. Static redraws step the palette while strobing. */
  private shading(maxIterations: number): ShadingContext {
    const { animating, effects, advancePalette } = this.state;
    if (!animating && strobeAdvancesPalette(effects.toggles)) {
      advancePalette();
    }
    const { paletteId, timePhase } = this.state;
    return { maxIterations, paletteId, timePhase, effects };
  }

  private emit(pixels: PixelBuffer, { viewport, maxIterations }: FrameInfo): RenderedFrame {
    const { effects, paletteId, timePhase } = this.state;
    const display = effects.toggles.rgbShift ? applyRgbShift(pixels, effects.params.rgbShift) : pixels;
    const frame = { pixels, display, viewport, maxIterations, paletteId, timePhase };
    this.onFrame?.(frame);
    return frame;
  }

  private family(morph: boolean): FractalFamily {
    const { kind, juliaConstant, effects, timePhase } = this.state;
    switch (kind) {
      case "julia":
        return {
          type: "julia",
          c:
            morph && effects.toggles.juliaMorph
              ? morphedJuliaConstant(juliaConstant, effects.params.morphRadius, timePhase, this.config.juliaMorphSpeed)
              : juliaConstant,
        };
      case "mandelbrot":
      case "burning-ship":
        return { type: kind };
    }
  }

  /** Timer ticks wait for the frame in flight instead of superseding it */
  private startAnimationTimer(): void {
    this.animationTimer = setInterval(() => {
      if (!this.inFlight) {
        void this.tick();
      }
    }, this.config.animationIntervalMs);
  }

  private onStrobeTimer(): void {
    try {
      this.strobeTick();
    } catch (error) {
      console.error("Strobe recolor failed:", error);
    }
  }

  private currentPhase(): number {
    return timePhase(this.now() - this.state.animationStartTime, this.config.animationPeriodSec);
  }

  private motion(): AnimationMotion {
    return {
      zoomMagnitude: this.config.animationZoomMagnitude,
      panMagnitudeX: this.config.animationPanMagnitudeX,
      panMagnitudeY: this.config.animationPanMagnitudeY,
    };
  }

  private stopTimers(): void {
    if (this.animationTimer) {
      clearInterval(this.animationTimer);
      this.animationTimer = null;
    }
    if (this.strobeTimer) {
      clearInterval(this.strobeTimer);
      this.strobeTimer = null;
    }
  }
}
