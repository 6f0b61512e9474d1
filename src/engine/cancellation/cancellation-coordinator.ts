/**
 * Cancellation Coordinator
 *
 * RUNNING -> CANCEL_REQUESTED -> DRAINING -> STOPPED
 *
 * A run that finishes without interruption goes RUNNING -> STOPPED directly.
 */

import { CancellationToken } from './cancellation-token.js';

export type CancellationPhase = 'RUNNING' | 'CANCEL_REQUESTED' | 'DRAINING' | 'STOPPED';

const TRANSITIONS: Record<CancellationPhase, CancellationPhase[]> = {
  RUNNING: ['CANCEL_REQUESTED', 'STOPPED'],
  CANCEL_REQUESTED: ['DRAINING', 'STOPPED'],
  DRAINING: ['STOPPED'],
  STOPPED: [],
};

/** Minimal emitter surface, satisfied by `process` */
export interface SignalSource {
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  off(event: string, listener: (...args: unknown[]) => void): unknown;
}

export class CancellationCoordinator {
  readonly token: CancellationToken;
  private currentPhase: CancellationPhase = 'RUNNING';
  private finalSaveInProgress = false;

  constructor(token: CancellationToken = new CancellationToken()) {
    this.token = token;
    this.token.onCancellationRequested(() => {
      if (this.currentPhase === 'RUNNING') {
        this.currentPhase = 'CANCEL_REQUESTED';
      }
    });
  }

  get phase(): CancellationPhase {
    return this.currentPhase;
  }

  get isFinalSaveInProgress(): boolean {
    return this.finalSaveInProgress;
  }

  requestCancel(reason = 'interrupt'): boolean {
    return this.token.cancel(reason);
  }

  /** In-flight work is finishing; no new tasks are pulled */
  beginDraining(): void {
    this.transition('DRAINING');
  }

  markStopped(): void {
    this.transition('STOPPED');
  }

  beginFinalSave(): void {
    this.finalSaveInProgress = true;
  }

  endFinalSave(): void {
    this.finalSaveInProgress = false;
  }

  /**
   * Listen for interrupt signals. The first signal requests cancellation;
   * signals during the final save are ignored so it always runs to completion.
   */
  bindSignals(
    source: SignalSource = process,
    signals: readonly string[] = ['SIGINT', 'SIGTERM']
  ): () => void {
    const handler = (...args: unknown[]) => {
      const signal = typeof args[0] === 'string' ? args[0] : 'signal';

      if (this.finalSaveInProgress) {
        console.warn(`\n[Cancellation] ${signal} received during final save; waiting for it to finish...`);
        return;
      }
      if (this.token.isCancellationRequested) {
        console.warn(`\n[Cancellation] ${signal} received again; already stopping.`);
        return;
      }

      console.log(`\n[Cancellation] ${signal} received. Saving progress before exiting...`);
      this.requestCancel(signal);
    };

    for (const signal of signals) {
      source.on(signal, handler);
    }
    return () => {
      for (const signal of signals) {
        source.off(signal, handler);
      }
    };
  }

  private transition(next: CancellationPhase): void {
    if (this.currentPhase === next) return;
    if (!TRANSITIONS[this.currentPhase].includes(next)) {
      throw new Error(`Invalid cancellation transition: ${this.currentPhase} -> ${next}`);
    }
    this.currentPhase = next;
  }
}
