// ABOUTME: Tests for the escape-count colour mapping
// ABOUTME: Validates HSV conversion, hue wrapping and the background colour

import { describe, expect, it } from "vitest";

import { ESCAPE_SENTINEL } from "./base";
import { mandelbrotAlgorithm } from "./mandelbrot";
import { BACKGROUND_COLOR, escapeColorScheme, escapeHue, hsvToColor } from "./coloring";

describe("hsvToColor", () => {
  it("should produce the primary colours at full saturation and value", () => {
    expect(hsvToColor(0, 1, 1)).toEqual([255, 0, 0]);
    expect(hsvToColor(120, 1, 1)).toEqual([0, 255, 0]);
    expect(hsvToColor(240, 1, 1)).toEqual([0, 0, 255]);
  });

  it("should wrap hues outside [0, 360)", () => {
    expect(hsvToColor(360, 1, 1)).toEqual(hsvToColor(0, 1, 1));
    expect(hsvToColor(480, 1, 1)).toEqual(hsvToColor(120, 1, 1));
    expect(hsvToColor(-120, 1, 1)).toEqual(hsvToColor(240, 1, 1));
    expect(hsvToColor(-1000, 1, 1)).toEqual(hsvToColor(80, 1, 1));
  });

  it("should produce grey without saturation", () => {
    expect(hsvToColor(200, 0, 0.8)).toEqual([204, 204, 204]);
  });

  it("should treat a non-finite hue as red", () => {
    expect(hsvToColor(Number.NEGATIVE_INFINITY, 1, 1)).toEqual([255, 0, 0]);
  });

  it("should keep every channel within 0-255", () => {
    for (let h = -720; h <= 720; h += 7) {
      for (const channel of hsvToColor(h, 0.8, 0.8)) {
        expect(channel).toBeGreaterThanOrEqual(0);
        expect(channel).toBeLessThanOrEqual(255);
      }
    }
  });
});

describe("escapeHue", () => {
  it("should truncate ten times the escape count", () => {
    expect(escapeHue(1.55)).toBe(15);
    expect(escapeHue(36)).toBe(360);
    expect(escapeHue(-0.58)).toBe(-6);
  });
});

describe("escapeColorScheme", () => {
  it("should return the background colour for points in the set", () => {
    expect(escapeColorScheme(ESCAPE_SENTINEL)).toEqual(BACKGROUND_COLOR);
  });

  it("should colour escaped points at saturation and value 0.8", () => {
    expect(escapeColorScheme(0)).toEqual([204, 41, 41]);
    expect(escapeColorScheme(12)).toEqual([41, 204, 41]);
  });

  it("should paint escape counts at or below -1 with the background colour", () => {
    // c = 4 escapes at once with |z|² = 16: nu = 1 - log2(log2(16)) = -1
    expect(escapeColorScheme(mandelbrotAlgorithm.escape(4, 0, 64))).toEqual(BACKGROUND_COLOR);
    // c = 5: |z|² = 25, nu ≈ -1.2153
    expect(escapeColorScheme(mandelbrotAlgorithm.escape(5, 0, 64))).toEqual(BACKGROUND_COLOR);
    expect(escapeColorScheme(-3)).toEqual(BACKGROUND_COLOR);
  });

  it("should colour escape counts just above -1", () => {
    expect(escapeColorScheme(-0.5)).toEqual(hsvToColor(-5, 0.8, 0.8));
  });
});
