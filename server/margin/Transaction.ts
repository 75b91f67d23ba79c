import type { MarginEvent, MarginEventPayload } from './types';

type UndoStep = () => void;

/**
 * Undo log for a single ledger call. Mutators register the inverse of what
 * they changed; records are staged and only released once the call commits.
 */
export class Transaction {
  private readonly undoSteps: UndoStep[] = [];
  private readonly staged: MarginEventPayload[] = [];
  private settled = false;

  constructor(readonly timestampMs: number) {}

  onRollback(step: UndoStep): void {
    this.assertOpen();
    this.undoSteps.push(step);
  }

  emit(payload: MarginEventPayload): void {
    this.assertOpen();
    this.staged.push(payload);
  }

  commit(nextSequence: () => number): MarginEvent[] {
    this.assertOpen();
    this.settled = true;
    this.undoSteps.length = 0;
    return this.staged.map((payload) => ({
      ...payload,
      sequence: nextSequence(),
      timestampMs: this.timestampMs,
    }));
  }

  rollback(): void {
    this.assertOpen();
    this.settled = true;
    for (let i = this.undoSteps.length - 1; i >= 0; i -= 1) {
      this.undoSteps[i]();
    }
    this.undoSteps.length = 0;
    this.staged.length = 0;
  }

  private assertOpen(): void {
    if (this.settled) {
      throw new Error('transaction_already_settled');
    }
  }
}
