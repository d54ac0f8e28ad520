/**
 * Cancellation flag that crosses thread boundaries: the token lives in a
 * SharedArrayBuffer, so a worker thread attached with fromShared() observes a
 * cancel() issued on the main thread at its next check.
 */
export class CancellationToken {
  private readonly cell: Int32Array;

  constructor(readonly shared: SharedArrayBuffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT)) {
    this.cell = new Int32Array(shared, 0, 1);
  }

  static fromShared(shared: SharedArrayBuffer): CancellationToken {
    return new CancellationToken(shared);
  }

  cancel(): void {
    Atomics.store(this.cell, 0, 1);
  }

  get isCancelled(): boolean {
    return Atomics.load(this.cell, 0) !== 0;
  }
}
