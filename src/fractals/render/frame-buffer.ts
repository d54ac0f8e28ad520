import type { RGB } from "@/fractals/algorithms/coloring";

/** Bytes per pixel: RGBA */
export const BYTES_PER_PIXEL = 4;

/**
 * Fixed-size grid of RGBA pixels backed by a SharedArrayBuffer, so worker
 * threads can write rows into it without the pixels ever being copied across
 * postMessage.
 */
export class FrameBuffer {
  readonly pixels: Uint8ClampedArray;
  readonly shared: SharedArrayBuffer;

  /**
   * @param shared - Existing pixel memory to attach to; allocated when omitted
   */
  constructor(
    readonly width: number,
    readonly height: number,
    shared?: SharedArrayBuffer
  ) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new Error(`Invalid frame buffer size: ${width}x${height}`);
    }
    shared ??= new SharedArrayBuffer(width * height * BYTES_PER_PIXEL);
    if (shared.byteLength !== width * height * BYTES_PER_PIXEL) {
      throw new Error(
        `Shared buffer holds ${shared.byteLength} bytes, expected ${width * height * BYTES_PER_PIXEL} for ${width}x${height}`
      );
    }
    this.shared = shared;
    this.pixels = new Uint8ClampedArray(shared);
  }

  /**
   * Attaches to a buffer created on another thread.
   */
  static fromShared(shared: SharedArrayBuffer, width: number, height: number): FrameBuffer {
    return new FrameBuffer(width, height, shared);
  }

  get pixelCount(): number {
    return this.width * this.height;
  }

  setPixel(x: number, y: number, [r, g, b]: RGB): void {
    const index = (y * this.width + x) * BYTES_PER_PIXEL;
    this.pixels[index] = r;
    this.pixels[index + 1] = g;
    this.pixels[index + 2] = b;
    this.pixels[index + 3] = 255; // Alpha: fully opaque
  }

  getPixel(x: number, y: number): RGB {
    const index = (y * this.width + x) * BYTES_PER_PIXEL;
    return [this.pixels[index], this.pixels[index + 1], this.pixels[index + 2]];
  }

  /**
   * Copies every pixel into `target`, which must be exactly as large.
   */
  copyTo(target: Uint8ClampedArray): void {
    if (target.length !== this.pixels.length) {
      throw new Error(`Cannot copy ${this.pixels.length} bytes into a ${target.length}-byte target`);
    }
    target.set(this.pixels);
  }
}
