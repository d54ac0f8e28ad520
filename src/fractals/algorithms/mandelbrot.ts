// ABOUTME: Mandelbrot set escape-time kernel
// ABOUTME: Maps a plane coordinate to a smoothed escape count

import { ESCAPE_SENTINEL, EscapeTimeAlgorithm } from "./base";

/**
 * Iterates z = z² + c from z = 0 and returns how fast the orbit diverges.
 *
 * The squared magnitude |z|² is tracked instead of |z|, and the smoothing term
 * uses it as well: nu = i + 1 - log2(log2(|z|²)). Unlike the textbook
 * normalized iteration count, which takes log2 of |z|, the colours depend on
 * this exact form.
 *
 * @param cr - Real component of c
 * @param ci - Imaginary component of c
 * @param maxIterations - Iteration budget
 * @returns Smoothed escape count, or ESCAPE_SENTINEL if |z|² never exceeded 4
 */
export function escape(cr: number, ci: number, maxIterations: number): number {
  let zr = 0;
  let zi = 0;

  for (let i = 0; i < maxIterations; i++) {
    // (zr + zi*i)² = zr² - zi² + 2*zr*zi*i
    const newZr = zr * zr - zi * zi + cr;
    zi = 2 * zr * zi + ci;
    zr = newZr;

    const zabsSquared = zr * zr + zi * zi;
    if (zabsSquared > 4) {
      return i + 1 - Math.log2(Math.log2(zabsSquared));
    }
  }

  return ESCAPE_SENTINEL;
}

/**
 * Mandelbrot Set algorithm implementation.
 *
 * The Mandelbrot set is defined as the set of complex numbers c for which
 * the function f(z) = z² + c does not diverge when iterated from z = 0.
 */
export class MandelbrotAlgorithm implements EscapeTimeAlgorithm {
  readonly name = "Mandelbrot Set";
  readonly description = "The classic Mandelbrot set: z → z² + c, starting from z = 0";

  escape(real: number, imag: number, maxIterations: number): number {
    return escape(real, imag, maxIterations);
  }
}

/**
 * Default instance of the Mandelbrot algorithm for convenient importing.
 */
export const mandelbrotAlgorithm = new MandelbrotAlgorithm();

const algorithms: ReadonlyMap<string, EscapeTimeAlgorithm> = new Map([[mandelbrotAlgorithm.name, mandelbrotAlgorithm]]);

/**
 * Looks up an algorithm by its display name. Worker requests carry the name
 * rather than the instance because class instances do not survive postMessage.
 */
export function getAlgorithm(name: string): EscapeTimeAlgorithm {
  const algorithm = algorithms.get(name);
  if (!algorithm) {
    throw new Error(`Unknown escape-time algorithm: ${name}`);
  }
  return algorithm;
}
