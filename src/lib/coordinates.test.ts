import { describe, expect, it } from "vitest";

import { createView, defaultView, pixelToPlane, planeToPixel, resizeView, zoomAt } from "./coordinates";

const view = createView({ center: { x: -0.5, y: 0 }, width: 3, height: 2, pixelWidth: 300, pixelHeight: 200 });

describe("createView", () => {
  it("should derive the min corner and scale together", () => {
    expect(view.min.x).toBeCloseTo(-2, 12);
    expect(view.min.y).toBeCloseTo(-1, 12);
    expect(view.scale.x).toBeCloseTo(0.01, 12);
    expect(view.scale.y).toBeCloseTo(0.01, 12);
  });

  it("should produce a frozen value", () => {
    expect(Object.isFrozen(view)).toBe(true);
    expect(Object.isFrozen(view.center)).toBe(true);
    expect(Object.isFrozen(view.min)).toBe(true);
    expect(Object.isFrozen(view.scale)).toBe(true);
  });

  it("should reject degenerate extents and pixel grids", () => {
    const base = { center: { x: 0, y: 0 }, width: 1, height: 1, pixelWidth: 10, pixelHeight: 10 };
    expect(() => createView({ ...base, width: 0 })).toThrow("Invalid view width: 0");
    expect(() => createView({ ...base, height: Number.NaN })).toThrow("Invalid view height: NaN");
    expect(() => createView({ ...base, pixelWidth: 1.5 })).toThrow("Invalid view pixelWidth: 1.5");
    expect(() => createView({ ...base, pixelHeight: 0 })).toThrow("Invalid view pixelHeight: 0");
    expect(() => createView({ ...base, center: { x: Number.POSITIVE_INFINITY, y: 0 } })).toThrow(
      "Invalid view center"
    );
  });
});

describe("defaultView", () => {
  it("should start three units wide around (-0.5, 0) with square pixels", () => {
    const initial = defaultView(800, 600);
    expect(initial.center).toEqual({ x: -0.5, y: 0 });
    expect(initial.width).toBe(3);
    expect(initial.height).toBe(2.25);
    expect(initial.scale.x).toBeCloseTo(initial.scale.y, 15);
  });

  it("should honour overrides", () => {
    const custom = defaultView(100, 100, { center: { x: 0.25, y: 0.5 }, width: 1, height: 4 });
    expect(custom.center).toEqual({ x: 0.25, y: 0.5 });
    expect(custom.width).toBe(1);
    expect(custom.height).toBe(4);
  });
});

describe("pixelToPlane", () => {
  it("should map the top-left pixel within one pixel of the real minimum and the imaginary maximum", () => {
    const p = pixelToPlane(view, 0, 0);
    expect(Math.abs(p.x - view.min.x)).toBeLessThan(view.scale.x);
    expect(Math.abs(p.y - (view.min.y + view.height))).toBeLessThan(view.scale.y);
    expect(p.x).toBeCloseTo(-1.995, 12);
    expect(p.y).toBeCloseTo(0.995, 12);
  });

  it("should map the bottom-right pixel within one pixel of the real maximum and the imaginary minimum", () => {
    const p = pixelToPlane(view, 299, 199);
    expect(Math.abs(p.x - (view.min.x + view.width))).toBeLessThan(view.scale.x);
    expect(Math.abs(p.y - view.min.y)).toBeLessThan(view.scale.y);
    expect(p.x).toBeCloseTo(0.995, 12);
    expect(p.y).toBeCloseTo(-0.995, 12);
  });

  it("should decrease the imaginary part as y increases", () => {
    expect(pixelToPlane(view, 10, 20).y).toBeGreaterThan(pixelToPlane(view, 10, 21).y);
    expect(pixelToPlane(view, 10, 20).x).toBeLessThan(pixelToPlane(view, 11, 20).x);
  });
});

describe("planeToPixel", () => {
  it("should invert pixelToPlane", () => {
    for (const [x, y] of [
      [0, 0],
      [17, 123],
      [299, 199],
      [150, 100],
    ]) {
      const roundTrip = planeToPixel(view, pixelToPlane(view, x, y));
      expect(roundTrip.x).toBeCloseTo(x, 9);
      expect(roundTrip.y).toBeCloseTo(y, 9);
    }
  });
});

describe("zoomAt", () => {
  it("should recentre on the plane point under the pixel, located with the pre-zoom scale", () => {
    const target = pixelToPlane(view, 30, 150);
    const zoomed = zoomAt(view, { x: 30, y: 150 }, 0.5);

    expect(zoomed.center).toEqual(target);
    expect(zoomed.center.x).toBeCloseTo(-1.695, 12);
    expect(zoomed.center.y).toBeCloseTo(-0.505, 12);
  });

  it("should scale both extents and recompute min and scale", () => {
    const zoomed = zoomAt(view, { x: 30, y: 150 }, 0.5);

    expect(zoomed.width).toBe(1.5);
    expect(zoomed.height).toBe(1);
    expect(zoomed.scale.x).toBeCloseTo(0.005, 12);
    expect(zoomed.scale.y).toBeCloseTo(0.005, 12);
    expect(zoomed.min.x).toBeCloseTo(zoomed.center.x - 0.75, 12);
    expect(zoomed.min.y).toBeCloseTo(zoomed.center.y - 0.5, 12);
    expect(zoomed.pixelWidth).toBe(300);
    expect(zoomed.pixelHeight).toBe(200);
  });

  it("should leave the centre unchanged when zooming at the exact centre pixel", () => {
    const initial = defaultView(101, 101);
    const zoomed = zoomAt(initial, { x: 50, y: 50 }, 0.5);

    expect(zoomed.center.x).toBeCloseTo(-0.5, 12);
    expect(zoomed.center.y).toBeCloseTo(0, 12);
    expect(zoomed.width).toBe(1.5);
    expect(zoomed.height).toBe(1.5);
  });

  it("should not modify the original view", () => {
    zoomAt(view, { x: 0, y: 0 }, 0.25);
    expect(view.width).toBe(3);
    expect(view.center).toEqual({ x: -0.5, y: 0 });
  });

  it("should reject zoom factors that are not positive and finite", () => {
    expect(() => zoomAt(view, { x: 0, y: 0 }, 0)).toThrow("Invalid zoom factor: 0");
    expect(() => zoomAt(view, { x: 0, y: 0 }, -0.5)).toThrow("Invalid zoom factor: -0.5");
    expect(() => zoomAt(view, { x: 0, y: 0 }, Number.NaN)).toThrow("Invalid zoom factor: NaN");
  });
});

describe("resizeView", () => {
  it("should keep centre and real extent and follow the new aspect ratio", () => {
    const resized = resizeView(view, 150, 150);
    expect(resized.center).toEqual(view.center);
    expect(resized.width).toBe(3);
    expect(resized.height).toBe(3);
    expect(resized.pixelWidth).toBe(150);
    expect(resized.pixelHeight).toBe(150);
  });
});
