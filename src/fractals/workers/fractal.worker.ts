// ABOUTME: Worker-thread entry for parallel grid computation using Comlink RPC
// ABOUTME: Exposes computeBand over the thread's parent port

import * as Comlink from "comlink";
import nodeEndpoint from "comlink/dist/umd/node-adapter.js";
import { parentPort } from "node:worker_threads";

import { computeBand } from "./compute-chunk";
import { BandComputeRequest } from "./types";

/**
 * Worker API exposed to the main thread via Comlink.
 * All methods can be called as if they were async functions on the main thread.
 */
const workerAPI = {
  /**
   * Computes one band. The result's buffer is transferred back rather than copied.
   */
  computeBand: (request: BandComputeRequest) => {
    const result = computeBand(request);
    return Comlink.transfer(result, [result.values.buffer]);
  },

  /**
   * Simple ping method for testing worker connectivity.
   * @returns "pong" string
   */
  ping: () => "pong" as const,
};

if (!parentPort) {
  throw new Error("fractal.worker must be started as a worker thread");
}

// Expose the API to the main thread via Comlink
Comlink.expose(workerAPI, nodeEndpoint(parentPort));

// Export the type for use on the main thread
export type FractalWorkerAPI = typeof workerAPI;
