// ABOUTME: Worker thread for parallel frame computation using Comlink RPC
// ABOUTME: Exposes computeBand for the main thread to call via Comlink

import * as Comlink from "comlink";
import nodeEndpoint from "comlink/dist/umd/node-adapter";
import { parentPort } from "node:worker_threads";

import { computeBand } from "./compute-band";
import { BandComputeRequest } from "./types";

/**
 * Worker API exposed to the main thread via Comlink.
 * All methods can be called as if they were async functions on the main thread.
 */
const workerAPI = {
  /**
   * Computes a band straight into the shared back buffer.
   */
  computeBand: (request: BandComputeRequest) => {
    return computeBand(request);
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
