import { describe, expect, it } from "vitest";

import { BYTES_PER_PIXEL, FrameBuffer } from "./frame-buffer";

describe("FrameBuffer", () => {
  it("should allocate four bytes per pixel in shared memory", () => {
    const buffer = new FrameBuffer(5, 3);
    expect(buffer.pixelCount).toBe(15);
    expect(buffer.pixels.length).toBe(15 * BYTES_PER_PIXEL);
    expect(buffer.shared).toBeInstanceOf(SharedArrayBuffer);
  });

  it("should write opaque pixels in row-major order", () => {
    const buffer = new FrameBuffer(3, 2);
    buffer.setPixel(2, 1, [1, 2, 3]);

    expect(buffer.getPixel(2, 1)).toEqual([1, 2, 3]);
    expect(Array.from(buffer.pixels.subarray(20, 24))).toEqual([1, 2, 3, 255]);
  });

  it("should share pixels with a buffer attached to the same memory", () => {
    const buffer = new FrameBuffer(2, 2);
    const attached = FrameBuffer.fromShared(buffer.shared, 2, 2);

    attached.setPixel(0, 1, [9, 8, 7]);

    expect(buffer.getPixel(0, 1)).toEqual([9, 8, 7]);
  });

  it("should copy into a target of the same size only", () => {
    const buffer = new FrameBuffer(2, 1);
    buffer.setPixel(1, 0, [100, 110, 120]);

    const target = new Uint8ClampedArray(8);
    buffer.copyTo(target);
    expect(Array.from(target)).toEqual([0, 0, 0, 0, 100, 110, 120, 255]);

    expect(() => buffer.copyTo(new Uint8ClampedArray(4))).toThrow("Cannot copy 8 bytes into a 4-byte target");
  });

  it("should reject mismatched sizes", () => {
    expect(() => new FrameBuffer(0, 2)).toThrow("Invalid frame buffer size: 0x2");
    expect(() => new FrameBuffer(-1, 5)).toThrow("Invalid frame buffer size: -1x5");
    expect(() => new FrameBuffer(2.5, 2)).toThrow("Invalid frame buffer size: 2.5x2");
    expect(() => FrameBuffer.fromShared(new SharedArrayBuffer(12), 2, 2)).toThrow(
      "Shared buffer holds 12 bytes, expected 16 for 2x2"
    );
  });
});
