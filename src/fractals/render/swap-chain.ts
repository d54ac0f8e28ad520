// ABOUTME: Double-buffer handoff between the compute worker and the presenter
// ABOUTME: Role label, swap lock and dirty/ready flags live in shared memory

import { FrameBuffer } from "./frame-buffer";

// Int32 cells of the control block (4-byte aligned for Atomics)
const LOCK = 0;
const FRONT = 1;
const DIRTY = 2;
const READY = 3;
const CONTROL_CELLS = 4;

/** Upper bound for one Atomics.wait while the lock is contended. */
const LOCK_WAIT_MS = 5;

/**
 * Boolean stored in one Int32 cell and only ever accessed through Atomics,
 * so each read or write is untorn and ordered. Two flags in the same block
 * are still independent: nothing sequences them as a transaction.
 */
export class AtomicFlag {
  constructor(
    private readonly cells: Int32Array,
    private readonly index: number
  ) {}

  load(): boolean {
    return Atomics.load(this.cells, this.index) !== 0;
  }

  set(): void {
    Atomics.store(this.cells, this.index, 1);
  }

  clear(): void {
    Atomics.store(this.cells, this.index, 0);
  }

  /**
   * Raises the flag unless it is already up.
   * @returns true if this call raised it
   */
  setIfClear(): boolean {
    return Atomics.compareExchange(this.cells, this.index, 0, 1) === 0;
  }
}

/**
 * Two frame buffers that alternate between the front role (displayed) and the
 * back role (being written by the compute worker).
 *
 * One mutual-exclusion lock guards the role label. It is held for the swap
 * and, on the presenter's side, for the whole time the front buffer is being
 * copied out, so the buffer being read cannot turn into the back buffer half
 * way through. Critical sections are synchronous callbacks and the lock is
 * not reentrant.
 *
 * Usage:
 * ```typescript
 * const chain = new SwapChain(320, 200);
 * const back = chain.acquireBack(); // compute worker fills it
 * chain.swap();
 * chain.ready.set();
 * chain.withFront((front) => front.copyTo(display)); // presenter
 * ```
 */
export class SwapChain {
  readonly dirty: AtomicFlag;
  readonly ready: AtomicFlag;

  private readonly control: Int32Array;
  private readonly buffers: readonly [FrameBuffer, FrameBuffer];
  private lockHeld = false;

  constructor(
    readonly width: number,
    readonly height: number
  ) {
    this.buffers = [new FrameBuffer(width, height), new FrameBuffer(width, height)];
    this.control = new Int32Array(new SharedArrayBuffer(CONTROL_CELLS * Int32Array.BYTES_PER_ELEMENT));
    this.dirty = new AtomicFlag(this.control, DIRTY);
    this.ready = new AtomicFlag(this.control, READY);
  }

  /**
   * Runs `fn` while holding the swap lock.
   * @throws Error if called from inside another critical section
   */
  withLock<T>(fn: () => T): T {
    if (this.lockHeld) {
      throw new Error("SwapChain lock is not reentrant");
    }

    while (Atomics.compareExchange(this.control, LOCK, 0, 1) !== 0) {
      Atomics.wait(this.control, LOCK, 1, LOCK_WAIT_MS);
    }
    this.lockHeld = true;

    try {
      return fn();
    } finally {
      this.lockHeld = false;
      Atomics.store(this.control, LOCK, 0);
      Atomics.notify(this.control, LOCK, 1);
    }
  }

  /**
   * Exchanges the front and back roles. O(1): only the role label changes.
   */
  swap(): void {
    this.withLock(() => {
      Atomics.store(this.control, FRONT, 1 - Atomics.load(this.control, FRONT));
    });
  }

  /**
   * Runs `fn` with the current front buffer, holding the lock throughout.
   */
  withFront<T>(fn: (front: FrameBuffer) => T): T {
    return this.withLock(() => fn(this.buffers[this.frontIndex()]));
  }

  /**
   * The current back buffer. Only the compute worker writes to it, and it stays
   * the back buffer until that same worker calls swap().
   */
  acquireBack(): FrameBuffer {
    return this.withLock(() => this.buffers[1 - this.frontIndex()]);
  }

  /** Index (0 or 1) of the buffer currently in the front role. */
  frontIndex(): number {
    return Atomics.load(this.control, FRONT);
  }
}
