// ABOUTME: Dedicated compute loop that turns posted views into finished frames
// ABOUTME: Waits on the mailbox, fills the back buffer band by band, then swaps

import { mandelbrotAlgorithm } from "@/fractals/algorithms/mandelbrot";
import type { ViewState } from "@/lib/coordinates";
import { PassMetrics, PerformanceMonitor } from "@/lib/performance-monitor";
import { derivedMaxIterations } from "@/state/view-store";

import { BandComputeRequest, BandComputeResult } from "../workers/types";
import { createBands } from "./bands";
import { CancellationToken } from "./cancellation";
import { BandExecutor } from "./executor";
import { SwapChain } from "./swap-chain";
import { ViewMailbox } from "./view-mailbox";

export type ComputeWorkerState = "idle" | "computing" | "swapping" | "quit";

/**
 * Summary of a pass that reached the front buffer.
 */
export interface PassReport {
  passId: number;
  /** The snapshot the whole frame was computed against */
  view: ViewState;
  maxIterations: number;
  metrics: PassMetrics;
}

export interface ComputeWorkerOptions {
  mailbox: ViewMailbox;
  /** Swap chain to render into. Read at the start of every pass, so it may be replaced between passes. */
  swapChain: () => SwapChain;
  executor: BandExecutor;
  /** Cancelled only at shutdown */
  token: CancellationToken;
  /** Row bands per pass */
  bandCount: number;
  algorithmName?: string;
  monitor?: PerformanceMonitor;
  onPassComplete?: (report: PassReport) => void;
}

/**
 * Runs passes until shutdown.
 *
 * Idle → Computing → Swapping → Idle, and Quit once the mailbox is closed, the
 * token is cancelled or a pass fails. While idle the loop is suspended on the
 * mailbox; it never polls.
 *
 * Usage:
 * ```typescript
 * const worker = new ComputeWorker({ mailbox, swapChain: () => chain, executor, token, bandCount: 16 });
 * const done = worker.start();
 * mailbox.send(view);
 * // ...
 * token.cancel();
 * mailbox.close();
 * await worker.join();
 * ```
 */
export class ComputeWorker {
  private state: ComputeWorkerState = "idle";
  private loop: Promise<void> | null = null;
  private readonly monitor: PerformanceMonitor;
  private readonly algorithmName: string;

  constructor(private readonly options: ComputeWorkerOptions) {
    if (!Number.isInteger(options.bandCount) || options.bandCount < 1) {
      throw new Error(`Invalid band count: ${options.bandCount}`);
    }
    this.monitor = options.monitor ?? new PerformanceMonitor();
    this.algorithmName = options.algorithmName ?? mandelbrotAlgorithm.name;
  }

  /**
   * Starts the loop. Calling start() again returns the running loop.
   * @returns Promise settled when the loop exits; rejects if a pass failed
   */
  start(): Promise<void> {
    this.loop ??= this.run();
    return this.loop;
  }

  /**
   * Waits for the loop to exit. Resolves at once if it never started.
   */
  join(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  getState(): ComputeWorkerState {
    return this.state;
  }

  private async run(): Promise<void> {
    const { mailbox, token } = this.options;

    try {
      while (!token.isCancelled) {
        this.state = "idle";
        const view = await mailbox.receive();
        if (view === null || token.isCancelled) {
          break;
        }

        this.state = "computing";
        const completed = await this.computePass(view);
        if (!completed) {
          break;
        }
      }
    } finally {
      this.state = "quit";
    }
  }

  /**
   * @returns false if the pass was abandoned because of shutdown
   */
  private async computePass(view: ViewState): Promise<boolean> {
    const { mailbox, token, bandCount, onPassComplete } = this.options;
    const chain = this.options.swapChain();

    // A view posted before a resize; the resized view follows it
    if (chain.width !== view.pixelWidth || chain.height !== view.pixelHeight) {
      console.warn(
        `Skipping ${view.pixelWidth}x${view.pixelHeight} view on a ${chain.width}x${chain.height} swap chain`
      );
      return true;
    }

    const maxIterations = derivedMaxIterations(view.width);
    const bands = createBands(view.pixelHeight, bandCount);
    const back = chain.acquireBack();
    const passId = this.monitor.startPass(bands.length, back.pixelCount);

    let results: BandComputeResult[];
    try {
      results = await Promise.all(
        bands.map((band) =>
          this.computeBand({
            passId,
            view,
            band,
            maxIterations,
            algorithmName: this.algorithmName,
            pixels: back.shared,
            cancel: token.shared,
          })
        )
      );
    } catch (error) {
      this.monitor.abandonPass(passId);
      console.error(`Pass ${passId} failed:`, error);
      throw error;
    }

    if (token.isCancelled || results.some((result) => result.cancelled)) {
      this.monitor.abandonPass(passId);
      console.log(`Pass ${passId} cancelled`);
      return false;
    }

    this.state = "swapping";
    chain.swap();
    chain.ready.set();
    // A view that arrived during the pass still owes a recompute
    if (!mailbox.hasPending()) {
      chain.dirty.clear();
    }

    const metrics = this.monitor.endPass(passId);
    console.log(
      `Pass ${passId} complete: ${bands.length} bands in ${metrics.duration.toFixed(1)}ms ` +
        `(${metrics.pixelsPerSecond.toFixed(0)} pixels/s, ${maxIterations} iterations)`
    );
    onPassComplete?.({ passId, view, maxIterations, metrics });
    return true;
  }

  private async computeBand(request: BandComputeRequest): Promise<BandComputeResult> {
    const bandStartTime = performance.now();
    const result = await this.options.executor.computeBand(request);
    // Siblings of a failed band still finish after their pass is dropped
    if (this.monitor.isActive(request.passId)) {
      this.monitor.recordBand(request.passId, result.band.index, performance.now() - bandStartTime, result.cancelled);
    }
    return result;
  }
}
