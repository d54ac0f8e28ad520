// ABOUTME: Decodes raw-mode terminal input into explorer events
// ABOUTME: Understands SGR mouse reports, quit keys and skips every other sequence

import type { PixelPosition } from "@/lib/coordinates";

export type TerminalEvent =
  /** Left button press at a 1-based character cell */
  | { type: "click"; column: number; row: number }
  | { type: "close" }
  | { type: "other" };

const ESC = "\x1b";
const CTRL_C = "\x03";

// ESC [ < button ; column ; row (M = press, m = release)
const SGR_MOUSE = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])/;
// Any other CSI sequence: parameters, intermediates, final byte
const CSI = /^\x1b\[[0-?]*[ -/]*[@-~]/;
// SS3 sequences (F1-F4, application cursor keys)
const SS3 = /^\x1bO./;

const BUTTON_MASK = 0b11;
const MOTION_FLAG = 32;
const WHEEL_FLAG = 64;

/**
 * Splits a chunk of raw-mode input into events. A chunk may carry several
 * keys and mouse reports at once.
 */
export function parseTerminalInput(data: string): TerminalEvent[] {
  const events: TerminalEvent[] = [];
  let rest = data;

  while (rest.length > 0) {
    const mouse = SGR_MOUSE.exec(rest);
    if (mouse) {
      const button = Number(mouse[1]);
      const isLeftPress =
        mouse[4] === "M" && (button & BUTTON_MASK) === 0 && (button & (MOTION_FLAG | WHEEL_FLAG)) === 0;
      events.push(isLeftPress ? { type: "click", column: Number(mouse[2]), row: Number(mouse[3]) } : { type: "other" });
      rest = rest.slice(mouse[0].length);
      continue;
    }

    const sequence = CSI.exec(rest) ?? SS3.exec(rest);
    if (sequence) {
      events.push({ type: "other" });
      rest = rest.slice(sequence[0].length);
      continue;
    }

    if (rest[0] === ESC) {
      // A lone Escape; ESC followed by a key is an Alt chord
      if (rest.length === 1 || rest[1] === ESC) {
        events.push({ type: "close" });
        rest = rest.slice(1);
      } else {
        events.push({ type: "other" });
        rest = rest.slice(2);
      }
      continue;
    }

    const key = rest[0];
    events.push(key === CTRL_C || key === "q" || key === "Q" ? { type: "close" } : { type: "other" });
    rest = rest.slice(1);
  }

  return events;
}

/**
 * Pixel under the top half of a character cell. Each cell shows two pixel
 * rows, so cell rows map to even pixel rows.
 */
export function cellToPixel(column: number, row: number): PixelPosition {
  return { x: column - 1, y: 2 * (row - 1) };
}
