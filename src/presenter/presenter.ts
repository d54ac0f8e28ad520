// ABOUTME: Frame loop on the input side: polls the host, applies zooms, presents finished frames
// ABOUTME: Posts view snapshots to the compute worker and never waits on a pass

import { setTimeout as sleep } from "node:timers/promises";

import { FrameBuffer } from "@/fractals/render/frame-buffer";
import { SwapChain } from "@/fractals/render/swap-chain";
import { ViewMailbox } from "@/fractals/render/view-mailbox";
import type { PixelPosition, PixelSize, ViewState } from "@/lib/coordinates";
import { PassMetrics, PerformanceMonitor } from "@/lib/performance-monitor";
import { derivedMaxIterations, ViewStore } from "@/state/view-store";

export const DEFAULT_TARGET_FPS = 60;

/**
 * Window/event source the presenter polls once per frame.
 */
export interface WindowHost {
  /** True once the user asked to quit */
  pollClose(): boolean;
  /** Next primary-button click, in pixel coordinates */
  pollPrimaryClick(): PixelPosition | null;
  /** New pixel size if the display was resized since the last poll */
  pollResize(): PixelSize | null;
}

/**
 * What the status line shows under the image.
 */
export interface StatusLine {
  view: ViewState;
  maxIterations: number;
  lastPass: PassMetrics | null;
  /** A recompute is owed or in flight */
  pending: boolean;
}

export interface PresentationSurface {
  /** Takes a copy of a finished frame. Called with the swap lock held. */
  upload(buffer: FrameBuffer): void;
  /** Shows the most recently uploaded frame. */
  draw(status: StatusLine): void;
}

export interface PresenterOptions {
  host: WindowHost;
  surface: PresentationSurface;
  store: ViewStore;
  mailbox: ViewMailbox;
  swapChain: () => SwapChain;
  /** Called on resize, before the resized view is posted, so the swap chain can be rebuilt */
  onResize?: (size: PixelSize) => void;
  monitor?: PerformanceMonitor;
  targetFps?: number;
}

/**
 * The input and presentation loop.
 *
 * Each tick polls for shutdown, resizes and clicks, applies a click as a
 * zoom-to-cursor, uploads the front buffer if a new frame is ready and draws.
 * Nothing here waits for the compute worker: zooms that land while a pass is
 * pending or running only replace the view waiting in the mailbox.
 */
export class Presenter {
  private stopped = false;
  private readonly frameInterval: number;

  constructor(private readonly options: PresenterOptions) {
    const targetFps = options.targetFps ?? DEFAULT_TARGET_FPS;
    if (!Number.isFinite(targetFps) || targetFps <= 0) {
      throw new Error(`Invalid target frame rate: ${targetFps}`);
    }
    this.frameInterval = 1000 / targetFps;
  }

  /**
   * Runs one frame.
   * @returns false once the host asked to close
   */
  tick(): boolean {
    const { host, surface, store } = this.options;

    if (host.pollClose()) {
      this.stopped = true;
      return false;
    }

    const size = host.pollResize();
    if (size) {
      this.resize(size);
    }

    const click = host.pollPrimaryClick();
    if (click && this.isOnImage(click)) {
      this.post(store.getState().zoomAt(click));
    }

    const chain = this.options.swapChain();
    if (chain.ready.load()) {
      chain.withFront((front) => surface.upload(front));
      chain.ready.clear();
    }

    surface.draw(this.status(chain));
    return true;
  }

  /**
   * Ticks at the target frame rate until the host closes or stop() is called.
   */
  async run(): Promise<void> {
    while (!this.stopped) {
      const frameStart = performance.now();
      if (!this.tick()) {
        break;
      }
      const elapsed = performance.now() - frameStart;
      await sleep(Math.max(0, this.frameInterval - elapsed));
    }
  }

  stop(): void {
    this.stopped = true;
  }

  /**
   * Hands a view to the compute worker. The mailbox keeps only the latest
   * view, and dirty is raised only if it is not already up.
   */
  post(view: ViewState): void {
    this.options.mailbox.send(view);
    this.options.swapChain().dirty.setIfClear();
  }

  private resize({ width, height }: PixelSize): void {
    const { view } = this.options.store.getState();
    if (width === view.pixelWidth && height === view.pixelHeight) {
      return;
    }

    const next = this.options.store.getState().resize(width, height);
    this.options.onResize?.({ width, height });
    this.post(next);
  }

  private isOnImage({ x, y }: PixelPosition): boolean {
    const { view } = this.options.store.getState();
    return x >= 0 && y >= 0 && x < view.pixelWidth && y < view.pixelHeight;
  }

  private status(chain: SwapChain): StatusLine {
    const { view } = this.options.store.getState();
    return {
      view,
      maxIterations: derivedMaxIterations(view.width),
      lastPass: this.options.monitor?.getLastPassMetrics() ?? null,
      pending: chain.dirty.load(),
    };
  }
}
