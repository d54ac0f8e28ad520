import { BandExecutor, InProcessExecutor } from "./executor";
import { ParallelRenderer } from "./parallel-renderer";

export type { BandExecutor } from "./executor";

/**
 * Render mode types
 */
export type RenderMode = "parallel" | "single-threaded";

export interface BandExecutorOptions {
  mode: RenderMode;
  /** Pool size for parallel mode (defaults to 75% of CPU cores) */
  workerCount?: number;
}

/**
 * Creates and initializes the executor for a render mode.
 *
 * A pool that fails to start is torn down again and rendering falls back to
 * the calling thread.
 */
export async function createBandExecutor({ mode, workerCount }: BandExecutorOptions): Promise<BandExecutor> {
  if (mode === "parallel") {
    const renderer = new ParallelRenderer(workerCount);
    try {
      await renderer.init();
      return renderer;
    } catch (error) {
      console.error("Failed to initialize ParallelRenderer:", error);
      console.warn("Falling back to single-threaded rendering");
      await renderer.terminate();
    }
  }

  const executor = new InProcessExecutor();
  await executor.init();
  return executor;
}
