/**
 * Running Flag
 *
 * Starts true, cleared exactly once, never reset. The receive loop polls
 * it per notification; its signal lets a suspended wait wake up early.
 */

export class RunningFlag {
  private readonly controller = new AbortController();
  private stopReason: string | null = null;

  isRunning(): boolean {
    return !this.controller.signal.aborted;
  }

  /** Aborts when the flag is cleared. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get reason(): string | null {
    return this.stopReason;
  }

  /**
   * Clear the flag. Returns false if it was already cleared.
   */
  stop(reason = "stop requested"): boolean {
    if (this.controller.signal.aborted) return false;
    this.stopReason = reason;
    this.controller.abort(reason);
    return true;
  }
}
