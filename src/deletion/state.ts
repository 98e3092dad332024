import type { TransactionState } from './types.js';

/**
 * INIT -> BACKING_UP -> DELETING -> COMPLETE, with ABORTED reachable from
 * every non-terminal state
 */
const TRANSITIONS: Record<TransactionState, readonly TransactionState[]> = {
  INIT: ['BACKING_UP', 'ABORTED'],
  BACKING_UP: ['DELETING', 'ABORTED'],
  DELETING: ['COMPLETE', 'ABORTED'],
  COMPLETE: [],
  ABORTED: [],
};

export function canTransition(from: TransactionState, to: TransactionState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: TransactionState, to: TransactionState): void {
  if (!canTransition(from, to)) {
    throw new Error(`Invalid transaction state change: ${from} -> ${to}`);
  }
}

export function isTerminal(state: TransactionState): boolean {
  return TRANSITIONS[state].length === 0;
}
