// ABOUTME: Runs the worker pool on real threads, without mocks
// ABOUTME: Checks that a pool thread loads its TypeScript entry and writes into shared memory

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { escapeColorScheme } from "@/fractals/algorithms/coloring";
import { escape, mandelbrotAlgorithm } from "@/fractals/algorithms/mandelbrot";
import { createView, pixelToPlane } from "@/lib/coordinates";

import { CancellationToken } from "./cancellation";
import { BYTES_PER_PIXEL, FrameBuffer } from "./frame-buffer";
import { ParallelRenderer } from "./parallel-renderer";

const THREAD_TIMEOUT = 30_000;

describe("ParallelRenderer on worker threads", () => {
  let renderer: ParallelRenderer;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    renderer = new ParallelRenderer(2);
  });

  afterEach(async () => {
    await renderer.terminate();
    vi.restoreAllMocks();
  });

  it(
    "should start the pool and compute a band into the shared buffer",
    async () => {
      await renderer.init();
      expect(console.log).toHaveBeenCalledWith("ParallelRenderer initialized with 2 workers");

      const view = createView({ center: { x: -0.5, y: 0 }, width: 3, height: 3, pixelWidth: 8, pixelHeight: 8 });
      const target = new FrameBuffer(8, 8);
      const band = { index: 1, startRow: 4, endRow: 8 };

      const result = await renderer.computeBand({
        passId: 1,
        view,
        band,
        maxIterations: 50,
        algorithmName: mandelbrotAlgorithm.name,
        pixels: target.shared,
        cancel: new CancellationToken().shared,
      });

      expect(result).toEqual({ band, rowsCompleted: 4, cancelled: false });
      for (let y = 4; y < 8; y++) {
        for (let x = 0; x < 8; x++) {
          const { x: real, y: imag } = pixelToPlane(view, x, y);
          expect(target.getPixel(x, y)).toEqual(escapeColorScheme(escape(real, imag, 50)));
        }
      }
      // Rows outside the band are never written, so their alpha stays 0
      expect(target.pixels[(3 * 8 + 7) * BYTES_PER_PIXEL + 3]).toBe(0);
    },
    THREAD_TIMEOUT
  );
});
