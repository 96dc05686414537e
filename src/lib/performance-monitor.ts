// ABOUTME: Band timings for the worker pool, one tracker per render
// ABOUTME: Keeps only the metrics of the last finished render

export interface RenderMetrics {
  bands: number;
  duration: number; // milliseconds
  pixelsPerSecond: number;
  averageBandTime: number;
  /** Worker that returned the slowest band, or null when no band was timed */
  slowestWorker: number | null;
  slowestBandTime: number;
}

/**
 * Timings of one render in progress. A render that is cancelled is simply never
 * finished, so it leaves no metrics behind.
 */
export interface RenderTiming {
  recordBand(workerIndex: number, computeTime: number): void;
  finish(): RenderMetrics;
}

export class PerformanceMonitor {
  private last: RenderMetrics | null = null;

  constructor(private readonly now: () => number = () => performance.now()) {}

  /** Metrics of the most recent render that ran to completion */
  get lastRender(): RenderMetrics | null {
    return this.last;
  }

  begin(totalPixels: number): RenderTiming {
    const startTime = this.now();
    const times: number[] = [];
    let slowestWorker: number | null = null;
    let slowestBandTime = 0;

    return {
      recordBand: (workerIndex, computeTime) => {
        times.push(computeTime);
        if (slowestWorker === null || computeTime > slowestBandTime) {
          slowestWorker = workerIndex;
          slowestBandTime = computeTime;
        }
      },
      finish: () => {
        const duration = this.now() - startTime;
        const total = times.reduce((sum, time) => sum + time, 0);
        this.last = {
          bands: times.length,
          duration,
          pixelsPerSecond: duration > 0 ? (totalPixels / duration) * 1000 : 0,
          averageBandTime: times.length > 0 ? total / times.length : 0,
          slowestWorker,
          slowestBandTime,
        };
        return this.last;
      },
    };
  }
}
