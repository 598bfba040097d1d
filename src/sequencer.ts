export interface SequencerHandlers<T> {
  search(query: string): Promise<T>;
  onResult(result: T, query: string): void;
  onError(error: unknown, query: string): void;
}

/**
 * Debounces queries and applies only the outcome of the latest dispatched search.
 * Stale outcomes are dropped by token comparison; in-flight requests are never aborted.
 */
export class RequestSequencer<T> {
  private timer: ReturnType<typeof setTimeout> | undefined;
  private token = 0;
  private inFlight = 0;

  constructor(
    private readonly delayMs: number,
    private readonly handlers: SequencerHandlers<T>,
  ) {}

  get isPending(): boolean {
    return this.timer !== undefined;
  }

  get isSearching(): boolean {
    return this.inFlight !== 0 && this.inFlight === this.token;
  }

  get currentToken(): number {
    return this.token;
  }

  schedule(query: string): void {
    this.cancel();
    this.timer = setTimeout(() => {
      this.timer = undefined;
      void this.dispatch(query);
    }, this.delayMs);
  }

  cancel(): void {
    if (this.timer === undefined) return;
    clearTimeout(this.timer);
    this.timer = undefined;
  }

  /** Cancels the timer and makes every in-flight search stale. */
  invalidate(): void {
    this.cancel();
    this.token++;
    this.inFlight = 0;
  }

  private async dispatch(query: string): Promise<void> {
    const token = ++this.token;
    this.inFlight = token;
    let result: T;
    try {
      result = await this.handlers.search(query);
    } catch (err) {
      if (token !== this.token) return;
      this.inFlight = 0;
      this.handlers.onError(err, query);
      return;
    }
    if (token !== this.token) return;
    this.inFlight = 0;
    this.handlers.onResult(result, query);
  }
}
