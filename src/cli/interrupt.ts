/**
 * Cancellation of the pending read
 *
 * The prompt is cancelled by ^C at the terminal (readline's SIGINT), by a
 * SIGINT sent to the process, or at end of input. Either way the shell
 * leaves with exit code 0.
 */

export interface SigintSource {
  on(event: "SIGINT", listener: () => void): unknown;
  off(event: "SIGINT", listener: () => void): unknown;
}

export class ReadCancellation {
  private controller = new AbortController();
  private sources: SigintSource[] = [];
  private interruptedBySignal = false;

  private onSigint = (): void => {
    this.interruptedBySignal = true;
    this.cancel();
  };

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** True once a SIGINT arrived, as opposed to end of input */
  get interrupted(): boolean {
    return this.interruptedBySignal;
  }

  /**
   * Cancel on SIGINT from `source` until dispose().
   */
  watch(source: SigintSource): void {
    source.on("SIGINT", this.onSigint);
    this.sources.push(source);
  }

  cancel(): void {
    this.controller.abort();
  }

  dispose(): void {
    for (const source of this.sources) {
      source.off("SIGINT", this.onSigint);
    }
    this.sources = [];
  }
}
