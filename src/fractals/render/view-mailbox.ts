import type { ViewState } from "@/lib/coordinates";

/**
 * Single-slot channel carrying view snapshots from the input side to the
 * compute worker. Sending overwrites whatever is waiting (latest view wins);
 * receiving blocks until a view arrives or the mailbox is closed.
 *
 * Views are frozen values, so the receiver owns its snapshot and never aliases
 * state the input side keeps changing.
 */
export class ViewMailbox {
  private pending: ViewState | null = null;
  private closed = false;
  private wake: (() => void) | null = null;

  /**
   * Posts a view, replacing any view not yet received. Ignored once closed.
   */
  send(view: ViewState): void {
    if (this.closed) {
      return;
    }
    this.pending = view;
    this.notify();
  }

  /**
   * Resolves with the latest posted view, or null once the mailbox is closed.
   * Views posted in the same turn of the event loop as the wake-up coalesce:
   * only the last one is delivered.
   */
  async receive(): Promise<ViewState | null> {
    if (this.wake) {
      throw new Error("ViewMailbox supports a single receiver");
    }

    while (this.pending === null && !this.closed) {
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }

    if (this.closed) {
      return null;
    }

    const view = this.pending;
    this.pending = null;
    return view;
  }

  hasPending(): boolean {
    return this.pending !== null;
  }

  /**
   * Drops any pending view and wakes the receiver with null.
   */
  close(): void {
    this.closed = true;
    this.pending = null;
    this.notify();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
