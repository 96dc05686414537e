import { describe, expect, it, vi } from "vitest";

import { defaultEngineConfig, resolveEngineConfig } from "../config";
import { createSessionStore, initialSessionState } from "./session-store";

describe("session store", () => {
  it("should start from the engine config", () => {
    const store = createSessionStore(initialSessionState(resolveEngineConfig({ iterationBase: 80, renderScale: 2 }), 1234));
    const state = store.getState();

    expect(state.iterationBase).toBe(80);
    expect(state.baseMaxIterations).toBe(80);
    expect(state.renderScale).toBe(2);
    expect(state.animationStartTime).toBe(1234);
    expect(state.paletteId).toBe(0);
    expect(state.effects.toggles.strobe).toBe(false);
  });

  it("should keep separate sessions independent", () => {
    const a = createSessionStore(initialSessionState(defaultEngineConfig));
    const b = createSessionStore(initialSessionState(defaultEngineConfig));

    a.getState().advancePalette();
    a.getState().advancePalette();

    expect(a.getState().paletteId).toBe(2);
    expect(b.getState().paletteId).toBe(0);
  });

  it("should store the base view and iteration budget together", () => {
    const store = createSessionStore(initialSessionState(defaultEngineConfig));
    store.getState().setBase({ viewport: { reSpan: 1, reCenter: 0.25, imCenter: -0.1 }, maxIterations: 90 });

    expect(store.getState().baseViewport).toEqual({ reSpan: 1, reCenter: 0.25, imCenter: -0.1 });
    expect(store.getState().baseMaxIterations).toBe(90);
  });

  it("should reset the phase with the animation clock", () => {
    const store = createSessionStore(initialSessionState(defaultEngineConfig));
    store.getState().setTimePhase(0.4);
    store.getState().resetAnimationClock(5000);

    expect(store.getState().timePhase).toBe(0);
    expect(store.getState().animationStartTime).toBe(5000);
  });

  it("should notify subscribers", () => {
    const store = createSessionStore(initialSessionState(defaultEngineConfig));
    const listener = vi.fn();
    const unsubscribe = store.subscribe(listener);

    store.getState().setIntent("tidal");
    unsubscribe();
    store.getState().setIntent("ignored");

    expect(listener).toHaveBeenCalledTimes(1);
    expect(store.getState().intent).toBe("ignored");
  });
});
