import { setImmediate as yieldToEventLoop } from "node:timers/promises";

import { computeBand } from "@/fractals/workers/compute-band";
import type { BandComputeRequest, BandComputeResult } from "@/fractals/workers/types";

/**
 * Something that can compute bands of a pass. The compute worker does not care
 * whether bands run on a worker pool or on its own thread.
 */
export interface BandExecutor {
  /** Prepares the executor. Must be called before computeBand(). */
  init(): Promise<void>;
  computeBand(request: BandComputeRequest): Promise<BandComputeResult>;
  /** Releases threads and other resources. */
  terminate(): Promise<void>;
  getWorkerCount(): number;
}

/**
 * Single-threaded fallback: computes bands on the calling thread, yielding to
 * the event loop before each band so input handling and presentation keep
 * running between bands.
 */
export class InProcessExecutor implements BandExecutor {
  async init(): Promise<void> {
    console.log("Using single-threaded rendering");
  }

  async computeBand(request: BandComputeRequest): Promise<BandComputeResult> {
    await yieldToEventLoop();
    return computeBand(request);
  }

  async terminate(): Promise<void> {}

  getWorkerCount(): number {
    return 1;
  }
}
