/**
 * Value returned by an escape-time algorithm for points that did not escape
 * within the iteration budget, i.e. points treated as inside the set at the
 * current resolution.
 */
export const ESCAPE_SENTINEL = -1;

/**
 * Abstract interface that all escape-time algorithms must implement.
 * This enables algorithm swapping and parallel execution via worker threads.
 */
export interface EscapeTimeAlgorithm {
  /** Human-readable name of the algorithm (e.g., "Mandelbrot Set") */
  readonly name: string;

  /** Optional description explaining the algorithm */
  readonly description?: string;

  /**
   * Computes the smoothed escape count for a point in the complex plane.
   *
   * Implementations must be pure: they are called concurrently from every
   * worker thread of the pool.
   *
   * @param real - Real component of c
   * @param imag - Imaginary component of c
   * @param maxIterations - Iteration budget
   * @returns The smoothed escape count, or ESCAPE_SENTINEL if the point never escaped
   */
  escape(real: number, imag: number, maxIterations: number): number;
}

/**
 * Whether an escape value gets the background colour: the sentinel, and any
 * escape count at or below it (a point escaping at once with a huge |z|²).
 */
export function isInside(nu: number): boolean {
  return nu <= ESCAPE_SENTINEL;
}
