import { isInside } from "./base";

export type RGB = [r: number, g: number, b: number];

/** Colour of points that never escaped. */
export const BACKGROUND_COLOR: RGB = [0, 0, 0];

/** Saturation and value used for every escaped point. */
export const ESCAPE_SATURATION = 0.8;
export const ESCAPE_VALUE = 0.8;

/**
 * HSV to RGB conversion.
 *
 * @param h - Hue in degrees; any integer or real is accepted and wrapped into [0, 360)
 * @param s - Saturation (0-1)
 * @param v - Value (0-1)
 * @returns RGB tuple with values 0-255
 */
export function hsvToColor(h: number, s: number, v: number): RGB {
  if (!Number.isFinite(h)) h = 0;
  h = h % 360;
  if (h < 0) h += 360;

  const c = v * s;
  const x = c * (1 - Math.abs(((h / 60) % 2) - 1));
  const m = v - c;

  let r = 0,
    g = 0,
    b = 0;

  if (h < 60) {
    r = c;
    g = x;
  } else if (h < 120) {
    r = x;
    g = c;
  } else if (h < 180) {
    g = c;
    b = x;
  } else if (h < 240) {
    g = x;
    b = c;
  } else if (h < 300) {
    r = x;
    b = c;
  } else {
    r = c;
    b = x;
  }

  return [Math.round((r + m) * 255), Math.round((g + m) * 255), Math.round((b + m) * 255)];
}

/**
 * Hue for a smoothed escape count: ten degrees per escape step, truncated to
 * an integer. Counts between -1 and 0 give negative hues, which hsvToColor
 * wraps.
 */
export function escapeHue(nu: number): number {
  return Math.floor(nu * 10);
}

/**
 * Colours a smoothed escape count.
 *
 * - Points in the set, and counts at or below the sentinel: BACKGROUND_COLOR
 * - Escaped points: hue cycles with the escape count at fixed saturation/value
 */
export function escapeColorScheme(nu: number): RGB {
  if (isInside(nu)) return BACKGROUND_COLOR;
  return hsvToColor(escapeHue(nu), ESCAPE_SATURATION, ESCAPE_VALUE);
}
