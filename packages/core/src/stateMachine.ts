import type { RunStatus } from '@flowpilot/shared';
import { InvalidRunTransitionError } from './errors.js';

const validRunTransitions: Record<RunStatus, RunStatus[]> = {
  running: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function canTransitionRun(from: RunStatus, to: RunStatus): boolean {
  return validRunTransitions[from].includes(to);
}

export function transitionRun(current: RunStatus, next: RunStatus): RunStatus {
  if (!canTransitionRun(current, next)) {
    throw new InvalidRunTransitionError(current, next);
  }
  return next;
}

export function isRunTerminal(status: RunStatus): boolean {
  return validRunTransitions[status].length === 0;
}
