// ABOUTME: Type definitions for worker thread communication
// ABOUTME: Defines request/response interfaces for band-based frame computation

import type { RowBand } from "@/fractals/render/bands";
import type { ViewState } from "@/lib/coordinates";

/**
 * Request sent to a worker to compute one band of the back buffer.
 *
 * Everything here survives the structured clone algorithm: the view is a plain
 * object (cloned into an owned copy), while the two SharedArrayBuffers are
 * shared rather than copied, so the worker writes straight into the back
 * buffer and sees cancellation as soon as it is requested.
 */
export interface BandComputeRequest {
  /** Pass this band belongs to (for logging) */
  passId: number;
  /** Snapshot of the view taken when the pass started */
  view: ViewState;
  /** Rows to compute */
  band: RowBand;
  /** Iteration budget for this pass */
  maxIterations: number;
  /** Name of the algorithm to use (e.g., "Mandelbrot Set") */
  algorithmName: string;
  /** Memory of the back buffer (view.pixelWidth × view.pixelHeight RGBA pixels) */
  pixels: SharedArrayBuffer;
  /** Memory of the pass's cancellation token, checked before every row */
  cancel: SharedArrayBuffer;
}

/**
 * Result returned from a worker after computing (or abandoning) a band.
 */
export interface BandComputeResult {
  /** The band from the request */
  band: RowBand;
  /** Rows fully written before the band finished or was cancelled */
  rowsCompleted: number;
  /** Whether the band stopped early because of cancellation */
  cancelled: boolean;
}
