/** Completed passes kept for getStats() */
export const MAX_HISTORY_SIZE = 50;

/**
 * Metrics for a single band computation.
 */
export interface BandMetrics {
  bandIndex: number;
  computeTime: number; // milliseconds
  cancelled: boolean;
}

/**
 * Metrics for a complete pass.
 */
export interface PassMetrics {
  passId: number;
  startTime: number;
  endTime: number;
  duration: number; // milliseconds
  totalBands: number;
  completedBands: number;
  cancelledBands: number;
  totalPixels: number;
  pixelsPerSecond: number;
  averageBandTime: number;
}

/**
 * Active pass tracking.
 */
interface PassSession {
  passId: number;
  startTime: number;
  totalBands: number;
  completedBands: number;
  cancelledBands: number;
  bandMetrics: BandMetrics[];
  totalPixels: number;
}

/**
 * Performance monitor for tracking compute passes.
 *
 * Features:
 * - Per-band timing
 * - Throughput calculations (pixels/second)
 * - Pass statistics and history
 *
 * Usage:
 * ```typescript
 * const monitor = new PerformanceMonitor();
 * const passId = monitor.startPass(totalBands, totalPixels);
 *
 * // For each band completion:
 * monitor.recordBand(passId, bandIndex, computeTime, cancelled);
 *
 * const metrics = monitor.endPass(passId);
 * console.log(`Pass took ${metrics.duration}ms at ${metrics.pixelsPerSecond} px/s`);
 * ```
 */
export class PerformanceMonitor {
  private activePasses = new Map<number, PassSession>();
  private readonly completedPasses: PassMetrics[] = [];
  private nextPassId = 1;

  constructor(private readonly now: () => number = () => performance.now()) {}

  /**
   * Starts tracking a new pass.
   *
   * @param totalBands - Number of bands the pass is split into
   * @param totalPixels - Total number of pixels (width * height)
   * @returns Pass ID for tracking
   */
  startPass(totalBands: number, totalPixels: number): number {
    const passId = this.nextPassId++;

    this.activePasses.set(passId, {
      passId,
      startTime: this.now(),
      totalBands,
      completedBands: 0,
      cancelledBands: 0,
      bandMetrics: [],
      totalPixels,
    });

    return passId;
  }

  /**
   * Records completion of a band.
   *
   * @param computeTime - Time from dispatch to result, in milliseconds
   * @param cancelled - Whether the band stopped early
   */
  recordBand(passId: number, bandIndex: number, computeTime: number, cancelled: boolean): void {
    const session = this.activePasses.get(passId);
    if (!session) {
      console.warn(`PerformanceMonitor: Unknown pass ${passId}`);
      return;
    }

    session.completedBands++;
    if (cancelled) {
      session.cancelledBands++;
    }

    session.bandMetrics.push({
      bandIndex,
      computeTime,
      cancelled,
    });
  }

  /**
   * Ends a pass and calculates final metrics.
   *
   * @throws Error if the pass is unknown or already ended
   */
  endPass(passId: number): PassMetrics {
    const session = this.activePasses.get(passId);
    if (!session) {
      throw new Error(`PerformanceMonitor: Unknown pass ${passId}`);
    }

    const endTime = this.now();
    const duration = endTime - session.startTime;

    // Cancelled bands did not do a full band's work
    const bandTimes = session.bandMetrics.filter((m) => !m.cancelled).map((m) => m.computeTime);
    const averageBandTime = bandTimes.length > 0 ? bandTimes.reduce((a, b) => a + b, 0) / bandTimes.length : 0;

    const pixelsPerSecond = duration > 0 ? (session.totalPixels / duration) * 1000 : 0;

    const metrics: PassMetrics = {
      passId,
      startTime: session.startTime,
      endTime,
      duration,
      totalBands: session.totalBands,
      completedBands: session.completedBands,
      cancelledBands: session.cancelledBands,
      totalPixels: session.totalPixels,
      pixelsPerSecond,
      averageBandTime,
    };

    // Move to history
    this.completedPasses.push(metrics);
    if (this.completedPasses.length > MAX_HISTORY_SIZE) {
      this.completedPasses.shift();
    }

    this.activePasses.delete(passId);

    return metrics;
  }

  /**
   * Drops an active pass without recording it (cancelled or failed passes).
   */
  abandonPass(passId: number): void {
    this.activePasses.delete(passId);
  }

  /**
   * Whether a pass was started and has been neither ended nor abandoned.
   */
  isActive(passId: number): boolean {
    return this.activePasses.has(passId);
  }

  /**
   * Gets metrics for the last completed pass.
   */
  getLastPassMetrics(): PassMetrics | null {
    if (this.completedPasses.length === 0) {
      return null;
    }
    return this.completedPasses[this.completedPasses.length - 1];
  }

  /**
   * Gets summary statistics across the last MAX_HISTORY_SIZE completed passes.
   */
  getStats(): {
    totalPasses: number;
    averageDuration: number;
    averagePixelsPerSecond: number;
  } {
    if (this.completedPasses.length === 0) {
      return {
        totalPasses: 0,
        averageDuration: 0,
        averagePixelsPerSecond: 0,
      };
    }

    const totalDuration = this.completedPasses.reduce((sum, m) => sum + m.duration, 0);
    const totalPixelsPerSecond = this.completedPasses.reduce((sum, m) => sum + m.pixelsPerSecond, 0);

    return {
      totalPasses: this.completedPasses.length,
      averageDuration: totalDuration / this.completedPasses.length,
      averagePixelsPerSecond: totalPixelsPerSecond / this.completedPasses.length,
    };
  }
}
