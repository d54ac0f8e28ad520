// ABOUTME: Wires the view store, mailbox, swap chain, compute worker and presenter together
// ABOUTME: Owns startup and the shutdown order of the whole pipeline

import { BandExecutor } from "@/fractals/render";
import { CancellationToken } from "@/fractals/render/cancellation";
import { ComputeWorker, PassReport } from "@/fractals/render/compute-worker";
import { SwapChain } from "@/fractals/render/swap-chain";
import { ViewMailbox } from "@/fractals/render/view-mailbox";
import type { PixelSize, Point } from "@/lib/coordinates";
import { PerformanceMonitor } from "@/lib/performance-monitor";
import { PresentationSurface, Presenter, WindowHost } from "@/presenter/presenter";
import { createViewStore, ViewStore } from "@/state/view-store";

import { BANDS_PER_WORKER } from "./config";

export interface FractalExplorerOptions {
  host: WindowHost;
  surface: PresentationSurface;
  /** Started executor; the explorer terminates it on shutdown */
  executor: BandExecutor;
  size: PixelSize;
  center?: Point;
  width?: number;
  zoomFactor?: number;
  targetFps?: number;
  /** Defaults to BANDS_PER_WORKER bands per executor worker */
  bandCount?: number;
  onPassComplete?: (report: PassReport) => void;
}

/**
 * The whole explorer: an input/presentation loop and a compute loop sharing
 * a swap chain, with views handed over through a single-slot mailbox.
 *
 * Usage:
 * ```typescript
 * const explorer = new FractalExplorer({ host, surface: host, executor, size: host.size() });
 * await explorer.run(); // until the host closes
 * ```
 */
export class FractalExplorer {
  readonly store: ViewStore;
  readonly mailbox = new ViewMailbox();
  readonly monitor = new PerformanceMonitor();
  readonly computeWorker: ComputeWorker;
  readonly presenter: Presenter;

  private swapChain: SwapChain;
  private readonly token = new CancellationToken();
  private readonly executor: BandExecutor;
  private running = false;
  private stopping: Promise<void> | null = null;

  constructor(options: FractalExplorerOptions) {
    const { host, surface, executor, size } = options;
    this.executor = executor;

    this.store = createViewStore({
      pixelWidth: size.width,
      pixelHeight: size.height,
      center: options.center,
      width: options.width,
      zoomFactor: options.zoomFactor,
    });
    this.swapChain = new SwapChain(size.width, size.height);

    this.computeWorker = new ComputeWorker({
      mailbox: this.mailbox,
      swapChain: () => this.swapChain,
      executor,
      token: this.token,
      bandCount: options.bandCount ?? BANDS_PER_WORKER * executor.getWorkerCount(),
      monitor: this.monitor,
      onPassComplete: options.onPassComplete,
    });

    this.presenter = new Presenter({
      host,
      surface,
      store: this.store,
      mailbox: this.mailbox,
      swapChain: () => this.swapChain,
      onResize: ({ width, height }) => {
        console.log(`Resized to ${width}x${height} pixels`);
        this.swapChain = new SwapChain(width, height);
      },
      monitor: this.monitor,
      targetFps: options.targetFps,
    });
  }

  getSwapChain(): SwapChain {
    return this.swapChain;
  }

  /**
   * Runs until the host closes or a pass fails, then shuts everything down.
   *
   * @throws the error of a failed pass
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new Error("FractalExplorer is already running");
    }
    this.running = true;

    const computing = this.computeWorker.start();
    this.presenter.post(this.store.getState().view);

    try {
      await Promise.race([this.presenter.run(), computing]);
    } finally {
      await this.stop();
    }
  }

  /**
   * Shuts down in order: stop presenting, cancel the pass in flight, wake the
   * idle compute loop, wait for it to exit, then release the executor.
   */
  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    this.presenter.stop();
    this.token.cancel();
    this.mailbox.close();

    try {
      await this.computeWorker.join();
    } finally {
      await this.executor.terminate();
      const stats = this.monitor.getStats();
      console.log(
        stats.totalPasses === 0
          ? "FractalExplorer stopped"
          : `FractalExplorer stopped; last ${stats.totalPasses} passes averaged ` +
              `${stats.averageDuration.toFixed(1)}ms (${stats.averagePixelsPerSecond.toFixed(0)} pixels/s)`
      );
    }
  }
}
