import { CancelledError } from './errors.js';

/**
 * Read side of a cancellation: checked at checkpoints, and its signal is handed
 * to the HTTP layer so an in-flight request is aborted as well.
 */
export class CancellationToken {
  static readonly none = new CancellationToken(new AbortController().signal);

  constructor(readonly signal: AbortSignal) {}

  get isCancelled(): boolean {
    return this.signal.aborted;
  }

  throwIfCancelled(): void {
    if (this.signal.aborted) {
      throw new CancelledError();
    }
  }
}

export class CancellationSource {
  private readonly controller = new AbortController();
  readonly token = new CancellationToken(this.controller.signal);

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  cancel(reason = 'Cancelled by user'): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(new CancelledError(reason));
    }
  }
}
