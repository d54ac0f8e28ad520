// ABOUTME: Turns RGBA pixels and explorer status into ANSI terminal output
// ABOUTME: Two pixel rows per text row using the upper half block with 24-bit colours

import { BYTES_PER_PIXEL } from "@/fractals/render/frame-buffer";
import type { StatusLine } from "@/presenter/presenter";

export const HALF_BLOCK = "▀";
export const RESET = "\x1b[0m";

const foreground = (r: number, g: number, b: number) => `\x1b[38;2;${r};${g};${b}m`;
const background = (r: number, g: number, b: number) => `\x1b[48;2;${r};${g};${b}m`;

/**
 * Renders an RGBA image as text rows. The foreground colour of each cell is
 * the upper pixel and the background the lower one; an odd last pixel row
 * gets a black lower half. Colour codes are only repeated when they change.
 */
export function renderHalfBlocks(pixels: Uint8ClampedArray, width: number, height: number): string[] {
  const lines: string[] = [];

  for (let y = 0; y < height; y += 2) {
    let line = "";
    let lastFg = "";
    let lastBg = "";

    for (let x = 0; x < width; x++) {
      const top = (y * width + x) * BYTES_PER_PIXEL;
      const fg = foreground(pixels[top], pixels[top + 1], pixels[top + 2]);

      let bg = background(0, 0, 0);
      if (y + 1 < height) {
        const bottom = ((y + 1) * width + x) * BYTES_PER_PIXEL;
        bg = background(pixels[bottom], pixels[bottom + 1], pixels[bottom + 2]);
      }

      if (fg !== lastFg) {
        line += fg;
        lastFg = fg;
      }
      if (bg !== lastBg) {
        line += bg;
        lastBg = bg;
      }
      line += HALF_BLOCK;
    }

    lines.push(line + RESET);
  }

  return lines;
}

/**
 * One-line summary of the view and the last pass, cut to `columns` characters.
 */
export function formatStatus({ view, maxIterations, lastPass, pending }: StatusLine, columns: number): string {
  const { x, y } = view.center;
  const parts = [
    `center ${x.toPrecision(10)} ${y < 0 ? "-" : "+"} ${Math.abs(y).toPrecision(10)}i`,
    `width ${view.width.toExponential(3)}`,
    `iterations ${maxIterations}`,
    lastPass ? `last pass ${lastPass.duration.toFixed(1)}ms` : "no pass yet",
  ];
  if (pending) {
    parts.push("computing");
  }

  return parts.join(" | ").slice(0, Math.max(0, columns));
}
