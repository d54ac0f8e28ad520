import { devNull } from "node:os";
import { parseArgs } from "node:util";

import type { RenderMode } from "@/fractals/render";
import { DEFAULT_CENTER, DEFAULT_VIEW_WIDTH, Point } from "@/lib/coordinates";
import { DEFAULT_TARGET_FPS } from "@/presenter/presenter";
import { DEFAULT_ZOOM_FACTOR } from "@/state/view-store";

export const MAX_TARGET_FPS = 240;
/** Row bands per pool worker when --bands is not given */
export const BANDS_PER_WORKER = 4;

export interface ExplorerConfig {
  zoomFactor: number;
  targetFps: number;
  /** Pool size; undefined picks one from the CPU count */
  workerCount?: number;
  /** Row bands per pass; undefined means BANDS_PER_WORKER per worker */
  bandCount?: number;
  center: Point;
  width: number;
  mode: RenderMode;
  logFile: string;
  help: boolean;
}

export const USAGE = `Usage: mzoom [options]

Explore the Mandelbrot set in the terminal. Click to zoom in on a point;
press q, Escape or Ctrl+C to quit.

Options:
  --zoom-factor <f>    extent multiplier per click, 0 < f < 1 (default ${DEFAULT_ZOOM_FACTOR})
  --fps <n>            target frame rate, 1 to ${MAX_TARGET_FPS} (default ${DEFAULT_TARGET_FPS})
  --workers <n>        worker threads (default: 75% of CPU cores, 2 to 16)
  --bands <n>          row bands per pass (default: ${BANDS_PER_WORKER} per worker)
  --center-real <x>    initial centre, real part (default ${DEFAULT_CENTER.x})
  --center-imag <y>    initial centre, imaginary part (default ${DEFAULT_CENTER.y})
  --width <w>          initial width of the view in the plane (default ${DEFAULT_VIEW_WIDTH})
  --single-threaded    compute on the main thread instead of a worker pool
  --log-file <path>    append logs to this file (default: discard)
  --help               show this message

Negative values need an equals sign: --center-real=-0.75
`;

function parseNumber(option: string, raw: string, expected: string, isValid: (value: number) => boolean): number {
  const value = raw.trim() === "" ? NaN : Number(raw);
  if (!Number.isFinite(value) || !isValid(value)) {
    throw new Error(`Invalid --${option}: ${raw} (expected ${expected})`);
  }
  return value;
}

const positiveInteger = (value: number) => Number.isInteger(value) && value >= 1;

/**
 * Builds the explorer configuration from command line arguments.
 *
 * @throws Error naming the option for invalid values, unknown options or stray arguments
 */
export function resolveConfig(argv: string[]): ExplorerConfig {
  const { values } = parseArgs({
    args: argv,
    options: {
      "zoom-factor": { type: "string" },
      fps: { type: "string" },
      workers: { type: "string" },
      bands: { type: "string" },
      "center-real": { type: "string" },
      "center-imag": { type: "string" },
      width: { type: "string" },
      "single-threaded": { type: "boolean", default: false },
      "log-file": { type: "string" },
      help: { type: "boolean", default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  const zoomFactor =
    values["zoom-factor"] === undefined
      ? DEFAULT_ZOOM_FACTOR
      : parseNumber("zoom-factor", values["zoom-factor"], "a number between 0 and 1", (f) => f > 0 && f < 1);

  const targetFps =
    values.fps === undefined
      ? DEFAULT_TARGET_FPS
      : parseNumber("fps", values.fps, `a number from 1 to ${MAX_TARGET_FPS}`, (n) => n >= 1 && n <= MAX_TARGET_FPS);

  const workerCount =
    values.workers === undefined ? undefined : parseNumber("workers", values.workers, "a positive integer", positiveInteger);

  const bandCount =
    values.bands === undefined ? undefined : parseNumber("bands", values.bands, "a positive integer", positiveInteger);

  const center = {
    x:
      values["center-real"] === undefined
        ? DEFAULT_CENTER.x
        : parseNumber("center-real", values["center-real"], "a finite number", () => true),
    y:
      values["center-imag"] === undefined
        ? DEFAULT_CENTER.y
        : parseNumber("center-imag", values["center-imag"], "a finite number", () => true),
  };

  const width =
    values.width === undefined
      ? DEFAULT_VIEW_WIDTH
      : parseNumber("width", values.width, "a positive number", (w) => w > 0);

  return {
    zoomFactor,
    targetFps,
    workerCount,
    bandCount,
    center,
    width,
    mode: values["single-threaded"] ? "single-threaded" : "parallel",
    logFile: values["log-file"] ?? devNull,
    help: values.help ?? false,
  };
}
