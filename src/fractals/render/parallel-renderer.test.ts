import * as Comlink from "comlink";
import type { Worker } from "node:worker_threads";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { GridRequest, IterationGrid } from "../types";
import { computeBand } from "../workers/compute-chunk";
import type { BandComputeRequest } from "../workers/types";
import { computeIterationGrid } from "./escape-time";
import { RenderCancelledError } from "./grid-computer";
import { ParallelRenderer } from "./parallel-renderer";

// Mock Comlink
vi.mock("comlink", () => ({
  wrap: vi.fn(),
  releaseProxy: Symbol("releaseProxy"),
}));

vi.mock("comlink/dist/umd/node-adapter.js", () => ({
  default: vi.fn((endpoint: unknown) => endpoint),
}));

type MockWorkerAPI = {
  ping: ReturnType<typeof vi.fn>;
  computeBand: ReturnType<typeof vi.fn>;
  [Comlink.releaseProxy]: ReturnType<typeof vi.fn>;
};

describe("ParallelRenderer", () => {
  let renderer: ParallelRenderer;
  let mockWorkerAPI: MockWorkerAPI;
  let terminate: ReturnType<typeof vi.fn>;
  let createWorker: ReturnType<typeof vi.fn>;

  const request: GridRequest = {
    viewport: { reSpan: 3.5, reCenter: -0.5, imCenter: 0 },
    width: 64,
    height: 48,
    maxIterations: 60,
    family: { type: "mandelbrot" },
  };

  const emptyGrid = (width = request.width, height = request.height): IterationGrid => ({
    width,
    height,
    values: new Int32Array(width * height),
  });

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});

    // The mock worker computes bands in process, exactly like the real one
    mockWorkerAPI = {
      ping: vi.fn().mockResolvedValue("pong"),
      computeBand: vi.fn((band: BandComputeRequest) => Promise.resolve(computeBand(band))),
      [Comlink.releaseProxy]: vi.fn(),
    };
    (Comlink.wrap as ReturnType<typeof vi.fn>).mockReturnValue(mockWorkerAPI);

    terminate = vi.fn(() => Promise.resolve(0));
    createWorker = vi.fn(() => ({ terminate }) as unknown as Worker);

    // Create renderer with 2 workers for testing
    renderer = new ParallelRenderer(2, createWorker);
  });

  afterEach(() => {
    renderer.terminate();
    vi.restoreAllMocks();
  });

  describe("constructor", () => {
    it("should create renderer with specified worker count", () => {
      expect(new ParallelRenderer(4, createWorker).getWorkerCount()).toBe(4);
    });

    it("should use optimal worker count when not specified", () => {
      const count = new ParallelRenderer(undefined, createWorker).getWorkerCount();
      expect(count).toBeGreaterThanOrEqual(2);
      expect(count).toBeLessThanOrEqual(16);
    });
  });

  describe("init", () => {
    it("should start and ping every worker", async () => {
      await renderer.init();
      expect(createWorker).toHaveBeenCalledTimes(2);
      expect(mockWorkerAPI.ping).toHaveBeenCalledTimes(2);
    });

    it("should be idempotent (calling init twice is safe)", async () => {
      await renderer.init();
      await renderer.init();
      expect(createWorker).toHaveBeenCalledTimes(2);
    });

    it("should throw and clean up if a worker fails to respond to ping", async () => {
      mockWorkerAPI.ping.mockResolvedValue("wrong");
      await expect(renderer.init()).rejects.toThrow("Worker 0 failed to respond to ping");
      expect(terminate).toHaveBeenCalledTimes(1);
    });
  });

  describe("compute", () => {
    it("should throw error if not initialized", async () => {
      await expect(renderer.compute(request, emptyGrid())).rejects.toThrow("not initialized");
    });

    it("should skip grids with a zero dimension", async () => {
      await renderer.init();
      const grid = emptyGrid(0, 0);
      await expect(renderer.compute({ ...request, width: 0, height: 0 }, grid)).resolves.toBe(grid);
      expect(mockWorkerAPI.computeBand).not.toHaveBeenCalled();
    });

    it("should reject a target of the wrong shape", async () => {
      await renderer.init();
      await expect(renderer.compute(request, emptyGrid(10, 10))).rejects.toThrow(
        "Iteration grid is 10x10, expected 64x48"
      );
    });

    it("should assemble the same grid as an in-process computation", async () => {
      await renderer.init();
      const grid = await renderer.compute(request, emptyGrid());
      expect(Array.from(grid.values)).toEqual(Array.from(computeIterationGrid(request).values));
    });

    it("should distribute bands to workers in round-robin fashion", async () => {
      await renderer.init();
      await renderer.compute(request, emptyGrid());

      // 2 workers -> 8 preferred bands -> 48 rows in bands of 6
      const calls = mockWorkerAPI.computeBand.mock.calls;
      expect(calls).toHaveLength(8);
      expect(calls.map(([band]) => band.band.startRow)).toEqual([0, 6, 12, 18, 24, 30, 36, 42]);
      expect(calls[0][0].grid).toEqual(request);

      expect(renderer.getPerformanceMonitor().lastRender?.bands).toBe(8);
      expect(calls.map(([band]) => band.renderId)).toEqual(Array(8).fill("render-1"));
    });

    it("should call progress callback with increasing percentages", async () => {
      await renderer.init();
      const progressValues: number[] = [];

      await renderer.compute(request, emptyGrid(), { onProgress: (pct) => progressValues.push(pct) });

      expect(progressValues).toHaveLength(8);
      for (let i = 1; i < progressValues.length; i++) {
        expect(progressValues[i]).toBeGreaterThan(progressValues[i - 1]);
      }
      expect(progressValues[progressValues.length - 1]).toBe(100);
    });

    it("should reject an already-aborted signal before any work", async () => {
      await renderer.init();
      const abortController = new AbortController();
      abortController.abort();

      await expect(renderer.compute(request, emptyGrid(), { signal: abortController.signal })).rejects.toBeInstanceOf(
        RenderCancelledError
      );
      expect(mockWorkerAPI.computeBand).not.toHaveBeenCalled();
    });

    it("should drop bands that arrive after cancellation", async () => {
      await renderer.init();
      const pending: Array<() => void> = [];
      mockWorkerAPI.computeBand.mockImplementation(
        (band: BandComputeRequest) =>
          new Promise((resolve) => {
            pending.push(() => resolve(computeBand(band)));
          })
      );

      const abortController = new AbortController();
      const grid = emptyGrid();
      const computation = renderer.compute(request, grid, { signal: abortController.signal });
      // Let the band requests reach the workers
      await Promise.resolve();

      abortController.abort();
      pending.forEach((resolve) => resolve());

      await expect(computation).rejects.toBeInstanceOf(RenderCancelledError);
      expect(grid.values.every((value) => value === 0)).toBe(true);
      expect(renderer.getPerformanceMonitor().lastRender).toBeNull();
    });

    it("should propagate worker errors", async () => {
      await renderer.init();
      mockWorkerAPI.computeBand.mockRejectedValue(new Error("Worker error"));

      await expect(renderer.compute(request, emptyGrid())).rejects.toThrow("Worker error");
      expect(console.error).toHaveBeenCalledWith("Render failed:", expect.any(Error));
    });

    it("should reject malformed band results", async () => {
      await renderer.init();
      mockWorkerAPI.computeBand.mockResolvedValue({ band: { startRow: 0, rowCount: 6 }, values: new Int32Array(3) });

      await expect(renderer.compute(request, emptyGrid())).rejects.toThrow("Band result mismatch");
    });
  });

  describe("terminate", () => {
    it("should release proxies and terminate all workers", async () => {
      await renderer.init();
      renderer.terminate();

      expect(mockWorkerAPI[Comlink.releaseProxy]).toHaveBeenCalledTimes(2);
      expect(terminate).toHaveBeenCalledTimes(2);
      await expect(renderer.compute(request, emptyGrid())).rejects.toThrow("not initialized");
    });

    it("should be safe to call terminate multiple times", async () => {
      await renderer.init();
      renderer.terminate();
      renderer.terminate();
      expect(terminate).toHaveBeenCalledTimes(2);
    });
  });
});
