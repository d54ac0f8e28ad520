// ABOUTME: Runs band computations on a pool of worker threads
// ABOUTME: Manages the worker pool and distributes bands round-robin over Comlink

import * as Comlink from "comlink";
import nodeEndpoint from "comlink/dist/umd/node-adapter";
import { createRequire } from "node:module";
import { availableParallelism } from "node:os";
import { join } from "node:path";
import { Worker } from "node:worker_threads";

import type { FractalWorkerAPI } from "../workers/fractal.worker";
import { BandComputeRequest, BandComputeResult } from "../workers/types";
import { BandExecutor } from "./executor";

/** Entry module of a pool thread */
export const WORKER_SCRIPT = join(__dirname, "../workers/fractal.worker.ts");

/**
 * Source evaluated by each pool thread. A new thread does not inherit the
 * TypeScript loader of the main thread, so it registers tsx before loading
 * its entry module.
 */
export function workerBootstrap(script: string): string {
  const tsxLoader = createRequire(__filename).resolve("tsx/cjs");
  return `require(${JSON.stringify(tsxLoader)});\nrequire(${JSON.stringify(script)});\n`;
}

interface PoolWorker {
  worker: Worker;
  api: Comlink.Remote<FractalWorkerAPI>;
  /** Rejects when the thread dies outside of terminate() */
  failure: Promise<never>;
}

/**
 * ParallelRenderer computes bands across a pool of worker threads.
 *
 * Bands are written straight into the shared back buffer by the workers, so a
 * call only carries the request out and a small result back.
 *
 * Usage:
 * ```typescript
 * const renderer = new ParallelRenderer(4); // 4 workers
 * await renderer.init();
 * const results = await Promise.all(requests.map((r) => renderer.computeBand(r)));
 * await renderer.terminate();
 * ```
 */
export class ParallelRenderer implements BandExecutor {
  private workers: PoolWorker[] = [];
  private workerCount: number;
  private isInitialized = false;
  private terminating = false;

  /**
   * @param workerCount - Number of workers to create (defaults to 75% of CPU cores)
   * @param workerScript - Module each worker thread runs
   */
  constructor(
    workerCount?: number,
    private readonly workerScript: string = WORKER_SCRIPT
  ) {
    this.workerCount = workerCount ?? this.getOptimalWorkerCount();
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
   * Initializes the worker pool. Must be called before computeBand().
   * Creates workers and wraps them with Comlink for RPC communication.
   */
  async init(): Promise<void> {
    if (this.isInitialized) {
      return;
    }
    this.terminating = false;

    for (let i = 0; i < this.workerCount; i++) {
      const poolWorker = this.spawn(i);
      // Tracked before the ping so terminate() also cleans up a half-built pool
      this.workers.push(poolWorker);

      // Test connectivity with ping
      const response = await Promise.race([poolWorker.api.ping(), poolWorker.failure]);
      if (response !== "pong") {
        throw new Error(`Worker ${i} failed to respond to ping`);
      }
    }

    this.isInitialized = true;
    console.log(`ParallelRenderer initialized with ${this.workerCount} workers`);
  }

  private spawn(index: number): PoolWorker {
    const worker = new Worker(workerBootstrap(this.workerScript), { eval: true });
    const api = Comlink.wrap<FractalWorkerAPI>(nodeEndpoint(worker));

    const failure = new Promise<never>((_, reject) => {
      worker.once("error", (error) => reject(error));
      worker.once("exit", (code) => {
        if (!this.terminating) {
          reject(new Error(`Worker ${index} exited with code ${code}`));
        }
      });
    });
    // A death is reported to whichever call is waiting on the worker
    failure.catch((error) => console.error(`Worker ${index} stopped:`, error));

    return { worker, api, failure };
  }

  /**
   * Computes one band on the next worker (round-robin by band index).
   *
   * @throws Error if not initialized, or the worker's error if the band fails
   */
  async computeBand(request: BandComputeRequest): Promise<BandComputeResult> {
    if (!this.isInitialized) {
      throw new Error("ParallelRenderer not initialized. Call init() first.");
    }

    const workerIndex = request.band.index % this.workers.length;
    const { api, failure } = this.workers[workerIndex];

    try {
      return await Promise.race([api.computeBand(request), failure]);
    } catch (error) {
      console.error(`Worker ${workerIndex} failed to compute band ${request.band.index}:`, error);
      throw error;
    }
  }

  /**
   * Terminates all workers and cleans up resources.
   * Should be called when the renderer is no longer needed.
   */
  async terminate(): Promise<void> {
    this.terminating = true;
    const workers = this.workers;
    this.workers = [];
    this.isInitialized = false;

    await Promise.all(
      workers.map(({ worker, api }) => {
        api[Comlink.releaseProxy]();
        return worker.terminate();
      })
    );
    console.log("ParallelRenderer terminated");
  }

  /**
   * Gets the number of workers in the pool.
   */
  getWorkerCount(): number {
    return this.workerCount;
  }
}
