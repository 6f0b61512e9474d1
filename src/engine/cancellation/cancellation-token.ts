/**
 * Cooperative cancellation. Once requested, cancellation cannot be undone.
 */

export type CancellationListener = (reason: string) => void;

export class CancellationToken {
  private requested = false;
  private cancelReason: string | null = null;
  private listeners = new Set<CancellationListener>();

  get isCancellationRequested(): boolean {
    return this.requested;
  }

  get reason(): string | null {
    return this.cancelReason;
  }

  /**
   * Request cancellation. Returns false if it was already requested.
   */
  cancel(reason = 'cancelled'): boolean {
    if (this.requested) return false;

    this.requested = true;
    this.cancelReason = reason;

    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) {
      try {
        listener(reason);
      } catch (error) {
        console.error('[Cancellation] Listener failed:', error);
      }
    }
    return true;
  }

  /**
   * Register a listener; called immediately if cancellation was already requested.
   * Returns a disposer.
   */
  onCancellationRequested(listener: CancellationListener): () => void {
    if (this.requested) {
      listener(this.cancelReason ?? 'cancelled');
      return () => {};
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
