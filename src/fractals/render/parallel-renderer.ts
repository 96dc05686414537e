// ABOUTME: Orchestrates parallel grid computation using worker threads
// ABOUTME: Manages the worker pool and distributes row bands over it

import * as Comlink from "comlink";
import nodeEndpoint from "comlink/dist/umd/node-adapter.js";
import { availableParallelism } from "node:os";
import path from "node:path";
import { Worker } from "node:worker_threads";

import { PerformanceMonitor, RenderTiming } from "../../lib/performance-monitor";
import type { GridRequest, IterationGrid } from "../types";
import type { FractalWorkerAPI } from "../workers/fractal.worker";
import { BandComputeRequest, BandComputeResult, validateBandResult } from "../workers/types";
import { calculateAdaptiveBandCount, createRowBands, RowBand } from "./chunks";
import {
  assertGridShape,
  GridComputeOptions,
  GridComputer,
  RenderCancelledError,
  throwIfCancelled,
} from "./grid-computer";

export type WorkerFactory = () => Worker;

/** Starts the compiled worker script that sits beside this module's output. */
export const defaultWorkerFactory: WorkerFactory = () =>
  new Worker(path.resolve(__dirname, "../workers/fractal.worker.js"));

/**
 * ParallelRenderer computes iteration grids across a pool of worker threads.
 *
 * Features:
 * - Row-band sharding; each band is independent, so the grid does not depend on the split
 * - Automatic worker pool management
 * - Cancellable computations
 * - Progress tracking
 *
 * Usage:
 * ```typescript
 * const renderer = new ParallelRenderer(4); // 4 workers
 * await renderer.init();
 * await renderer.compute(request, grid, {
 *   onProgress: (pct) => console.log(`${pct}% complete`),
 *   signal: abortController.signal
 * });
 * ```
 */
export class ParallelRenderer implements GridComputer {
  private workers: Array<{ worker: Worker; api: Comlink.Remote<FractalWorkerAPI> }> = [];
  private workerCount: number;
  private isInitialized = false;
  private performanceMonitor: PerformanceMonitor;
  private renderSequence = 0;

  /**
   * Creates a new ParallelRenderer.
   *
   * @param workerCount - Number of workers to create (defaults to 75% of CPU cores)
   * @param createWorker - Starts one worker thread; replaced in tests
   */
  constructor(workerCount?: number, private readonly createWorker: WorkerFactory = defaultWorkerFactory) {
    this.workerCount = workerCount ?? this.getOptimalWorkerCount();
    this.performanceMonitor = new PerformanceMonitor();
  }

  /**
   * Calculates the optimal number of workers based on available CPU cores.
   * Uses 75% of cores, with a minimum of 2 and maximum of 16.
   */
  private getOptimalWorkerCount(): number {
    const cpuCount = availableParallelism() || 4;
    return Math.max(2, Math.min(16, Math.floor(cpuCount * 0.75)));
  }

  /**
   * Initializes the worker pool. Must be called before compute().
   * Creates workers and wraps them with Comlink for RPC communication.
   */
  async init(): Promise<void> {
    if (this.isInitialized) {
      return;
    }

    for (let i = 0; i < this.workerCount; i++) {
      const worker = this.createWorker();
      const api = Comlink.wrap<FractalWorkerAPI>(nodeEndpoint(worker));
      this.workers.push({ worker, api });

      // Test connectivity with ping
      const response = await api.ping();
      if (response !== "pong") {
        this.terminate();
        throw new Error(`Worker ${i} failed to respond to ping`);
      }
    }

    this.isInitialized = true;
    console.log(`ParallelRenderer initialized with ${this.workerCount} workers`);
  }

  /**
   * Fills `target` with the iteration counts for `request`.
   *
   * The grid is divided into row bands that are distributed to workers round-robin.
   * Each band is copied into `target` as it arrives, unless the signal has aborted.
   *
   * @throws Error if not initialized or if a worker fails
   * @throws RenderCancelledError if the signal aborts first
   */
  async compute(request: GridRequest, target: IterationGrid, options?: GridComputeOptions): Promise<IterationGrid> {
    if (!this.isInitialized) {
      throw new Error("ParallelRenderer not initialized. Call init() first.");
    }

    if (request.width <= 0 || request.height <= 0) {
      console.warn("Skipping render: grid dimensions are zero.");
      return target;
    }

    assertGridShape(request, target);
    throwIfCancelled(options?.signal);

    const bands = createRowBands(request.height, {
      preferredNumber: calculateAdaptiveBandCount(this.workers.length),
      minRows: 4,
    });
    const totalBands = bands.length;
    let completedBands = 0;

    const renderId = `render-${++this.renderSequence}`;
    const timing = this.performanceMonitor.begin(request.width * request.height);

    try {
      const bandPromises = bands.map((band, index) =>
        this.computeBandWithWorker(band, index, request, renderId, timing, options?.signal).then((result) => {
          // A superseded render must not write into a grid the next render owns
          throwIfCancelled(options?.signal);

          target.values.set(result.values, band.startRow * request.width);

          completedBands++;
          options?.onProgress?.((completedBands / totalBands) * 100);
          return result;
        })
      );

      await Promise.all(bandPromises);

      const metrics = timing.finish();
      console.log(
        `Parallel render complete: ${totalBands} bands in ${metrics.duration.toFixed(1)}ms ` +
          `(${metrics.pixelsPerSecond.toFixed(0)} pixels/s)`
      );
      return target;
    } catch (error) {
      if (error instanceof RenderCancelledError) {
        console.log("Render cancelled");
      } else {
        console.error("Render failed:", error);
      }
      throw error;
    }
  }

  /**
   * Computes a single band using the next worker, round-robin.
   */
  private async computeBandWithWorker(
    band: RowBand,
    bandIndex: number,
    grid: GridRequest,
    renderId: string,
    timing: RenderTiming,
    signal?: AbortSignal
  ): Promise<BandComputeResult> {
    throwIfCancelled(signal);

    const bandStartTime = performance.now();
    const workerIndex = bandIndex % this.workers.length;
    const { api } = this.workers[workerIndex];

    const request: BandComputeRequest = {
      band: { startRow: band.startRow, rowCount: band.rowCount },
      grid,
      renderId,
    };

    try {
      const result = await api.computeBand(request);
      validateBandResult(request, result);
      timing.recordBand(workerIndex, performance.now() - bandStartTime);
      return result;
    } catch (error) {
      console.error(`Worker ${workerIndex} failed to compute band ${bandIndex}:`, error);
      throw error;
    }
  }

  /**
   * Terminates all workers and cleans up resources.
   * Should be called when the renderer is no longer needed.
   */
  terminate(): void {
    for (const { worker, api } of this.workers) {
      api[Comlink.releaseProxy]();
      worker.terminate().catch((error: unknown) => {
        console.error("Failed to terminate worker:", error);
      });
    }
    if (this.workers.length > 0) {
      console.log("ParallelRenderer terminated");
    }
    this.workers = [];
    this.isInitialized = false;
  }

  dispose(): void {
    this.terminate();
  }

  /**
   * Gets the number of workers in the pool.
   */
  getWorkerCount(): number {
    return this.workerCount;
  }

  /**
   * Gets the performance monitor instance.
   */
  getPerformanceMonitor(): PerformanceMonitor {
    return this.performanceMonitor;
  }
}
