import { describe, it, expect } from '@jest/globals';
import { TRANSACTION_STATES } from './types.js';
import { assertTransition, canTransition, isTerminal } from './state.js';

describe('transaction state machine', () => {
  it('should allow the forward path', () => {
    expect(canTransition('INIT', 'BACKING_UP')).toBe(true);
    expect(canTransition('BACKING_UP', 'DELETING')).toBe(true);
    expect(canTransition('DELETING', 'COMPLETE')).toBe(true);
  });

  it('should not skip the backup phase', () => {
    expect(canTransition('INIT', 'DELETING')).toBe(false);
    expect(() => assertTransition('INIT', 'DELETING')).toThrow(
      'Invalid transaction state change: INIT -> DELETING'
    );
  });

  it('should allow aborting from every non-terminal state', () => {
    for (const state of TRANSACTION_STATES.filter((candidate) => !isTerminal(candidate))) {
      expect(canTransition(state, 'ABORTED')).toBe(true);
    }
  });

  it('should freeze terminal states', () => {
    expect(isTerminal('COMPLETE')).toBe(true);
    expect(isTerminal('ABORTED')).toBe(true);
    expect(canTransition('COMPLETE', 'ABORTED')).toBe(false);
    expect(canTransition('ABORTED', 'INIT')).toBe(false);
  });
});
