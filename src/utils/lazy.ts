/**
 * Initialize-on-first-use cell for expensive handles (credentials, SDK
 * clients).
 *
 * Concurrent first callers share one initialization promise. A failed
 * initialization is dropped so the next call tries again.
 */
export class Lazy<T> {
  private pending: Promise<T> | null = null;

  constructor(private readonly init: () => Promise<T>) {}

  get(): Promise<T> {
    if (!this.pending) {
      this.pending = this.init().catch((error: unknown) => {
        this.pending = null;
        throw error;
      });
    }
    return this.pending;
  }

  /** Whether an initialization has started (and not failed) */
  get started(): boolean {
    return this.pending !== null;
  }

  /** Forget the cached value. The next get() initializes again. */
  reset(): void {
    this.pending = null;
  }
}
