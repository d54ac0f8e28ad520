// ABOUTME: Core band computation logic for worker threads
// ABOUTME: Writes the coloured escape field of a range of rows into the shared back buffer

import { escapeColorScheme } from "@/fractals/algorithms/coloring";
import { getAlgorithm } from "@/fractals/algorithms/mandelbrot";
import { bandRows } from "@/fractals/render/bands";
import { CancellationToken } from "@/fractals/render/cancellation";
import { FrameBuffer } from "@/fractals/render/frame-buffer";
import { pixelToPlane } from "@/lib/coordinates";

import { BandComputeRequest, BandComputeResult } from "./types";

/**
 * Computes one band of the back buffer.
 *
 * For each row of the band, the cancellation token is checked first; a
 * cancelled band returns immediately with the rows written so far. Within a
 * row, every pixel is mapped to the plane, run through the escape-time
 * algorithm and coloured. Only rows of this band are touched, so bands of the
 * same pass may run concurrently on different threads.
 */
export function computeBand(request: BandComputeRequest): BandComputeResult {
  const { view, band, maxIterations, algorithmName } = request;
  const algorithm = getAlgorithm(algorithmName);
  const target = FrameBuffer.fromShared(request.pixels, view.pixelWidth, view.pixelHeight);
  const token = CancellationToken.fromShared(request.cancel);

  for (let y = band.startRow; y < band.endRow; y++) {
    if (token.isCancelled) {
      return { band, rowsCompleted: y - band.startRow, cancelled: true };
    }

    for (let x = 0; x < view.pixelWidth; x++) {
      const { x: real, y: imag } = pixelToPlane(view, x, y);
      const nu = algorithm.escape(real, imag, maxIterations);
      target.setPixel(x, y, escapeColorScheme(nu));
    }
  }

  return { band, rowsCompleted: bandRows(band), cancelled: false };
}
