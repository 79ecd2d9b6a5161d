/**
 * Loading state machine for a preview element
 *
 *   idle -> pending -> active -> done
 *                        |
 *                        +-> idle (error, stalled, abort)
 */

export type LoadingState = 'idle' | 'pending' | 'active' | 'done';

const TRANSITIONS: Record<LoadingState, readonly LoadingState[]> = {
  idle: ['pending'],
  pending: ['active'],
  active: ['done', 'idle'],
  done: []
};

export class IllegalTransitionError extends Error {
  constructor(
    public readonly from: LoadingState,
    public readonly to: LoadingState
  ) {
    super(`Illegal loading state transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export function canTransition(from: LoadingState, to: LoadingState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function transition(from: LoadingState, to: LoadingState): LoadingState {
  if (!canTransition(from, to)) {
    throw new IllegalTransitionError(from, to);
  }
  return to;
}
