// ABOUTME: Terminal implementation of the presenter's window host and presentation surface
// ABOUTME: Owns raw mode, mouse reporting and the alternate screen while the explorer runs

import { FrameBuffer } from "@/fractals/render/frame-buffer";
import type { PixelPosition, PixelSize } from "@/lib/coordinates";
import type { PresentationSurface, StatusLine, WindowHost } from "@/presenter/presenter";

import { cellToPixel, parseTerminalInput } from "./input";
import { formatStatus, renderHalfBlocks, RESET } from "./render";

/** The parts of a TTY read stream the host uses (process.stdin). */
export interface TerminalInput {
  setRawMode(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: "data", listener: (data: string) => void): unknown;
  off(event: "data", listener: (data: string) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

/** The parts of a TTY write stream the host uses (process.stdout). */
export interface TerminalOutput {
  columns: number;
  rows: number;
  write(data: string): boolean;
  on(event: "resize", listener: () => void): unknown;
  off(event: "resize", listener: () => void): unknown;
}

const ENTER_ALT_SCREEN = "\x1b[?1049h";
const LEAVE_ALT_SCREEN = "\x1b[?1049l";
const HIDE_CURSOR = "\x1b[?25l";
const SHOW_CURSOR = "\x1b[?25h";
// Button press/release reporting, SGR extended coordinates
const ENABLE_MOUSE = "\x1b[?1000h\x1b[?1006h";
const DISABLE_MOUSE = "\x1b[?1006l\x1b[?1000l";
const CLEAR_SCREEN = "\x1b[2J";
const CURSOR_HOME = "\x1b[H";
const CLEAR_LINE = "\x1b[2K";

const moveTo = (row: number) => `\x1b[${row};1H`;

/**
 * Shows the explorer in a terminal: two pixels per character cell and a
 * status line in the last row. Input arrives asynchronously from the stream
 * and is queued until the presenter polls for it.
 */
export class TerminalHost implements WindowHost, PresentationSurface {
  private clicks: PixelPosition[] = [];
  private closeRequested = false;
  private pendingResize: PixelSize | null = null;
  private isOpen = false;

  private image: Uint8ClampedArray | null = null;
  private imageWidth = 0;
  private imageHeight = 0;
  private imageChanged = false;
  private lastStatus = "";

  constructor(
    private readonly input: TerminalInput,
    private readonly output: TerminalOutput
  ) {}

  /**
   * Pixel grid that fits the terminal: one pixel per column and two per
   * row, minus the status row.
   */
  size(): PixelSize {
    return {
      width: Math.max(1, this.output.columns),
      height: Math.max(1, 2 * (this.output.rows - 1)),
    };
  }

  /**
   * Switches the terminal into the explorer's mode. close() restores it.
   */
  open(): void {
    if (this.isOpen) {
      return;
    }
    this.isOpen = true;

    this.output.write(ENTER_ALT_SCREEN + HIDE_CURSOR + ENABLE_MOUSE + CLEAR_SCREEN);
    this.input.setRawMode(true);
    this.input.setEncoding("utf8");
    this.input.on("data", this.handleData);
    this.output.on("resize", this.handleResize);
    this.input.resume();
  }

  close(): void {
    if (!this.isOpen) {
      return;
    }
    this.isOpen = false;

    this.input.off("data", this.handleData);
    this.output.off("resize", this.handleResize);
    this.input.setRawMode(false);
    this.input.pause();
    this.output.write(RESET + DISABLE_MOUSE + SHOW_CURSOR + LEAVE_ALT_SCREEN);
  }

  /** Asks the presenter to stop at its next frame (signals, fatal errors). */
  requestClose(): void {
    this.closeRequested = true;
  }

  pollClose(): boolean {
    return this.closeRequested;
  }

  pollPrimaryClick(): PixelPosition | null {
    return this.clicks.shift() ?? null;
  }

  pollResize(): PixelSize | null {
    const size = this.pendingResize;
    this.pendingResize = null;
    return size;
  }

  upload(buffer: FrameBuffer): void {
    if (!this.image || this.image.length !== buffer.pixels.length) {
      this.image = new Uint8ClampedArray(buffer.pixels.length);
    }
    buffer.copyTo(this.image);
    this.imageWidth = buffer.width;
    this.imageHeight = buffer.height;
    this.imageChanged = true;
  }

  /**
   * Writes the image and status line, skipping the write when neither changed.
   */
  draw(status: StatusLine): void {
    const statusText = formatStatus(status, this.output.columns);
    if (!this.imageChanged && statusText === this.lastStatus) {
      return;
    }

    let frame = "";
    if (this.image && this.imageChanged) {
      frame += CURSOR_HOME + renderHalfBlocks(this.image, this.imageWidth, this.imageHeight).join("\r\n");
      this.imageChanged = false;
    }
    frame += moveTo(Math.max(1, this.output.rows)) + CLEAR_LINE + statusText;

    this.output.write(frame);
    this.lastStatus = statusText;
  }

  private readonly handleData = (data: string): void => {
    for (const event of parseTerminalInput(data)) {
      if (event.type === "close") {
        this.closeRequested = true;
      } else if (event.type === "click") {
        this.clicks.push(cellToPixel(event.column, event.row));
      }
    }
  };

  private readonly handleResize = (): void => {
    // The old image no longer fits; show nothing until a frame of the new size arrives
    this.image = null;
    this.imageChanged = false;
    this.lastStatus = "";
    this.output.write(CLEAR_SCREEN);
    this.pendingResize = this.size();
  };
}
