import { ExecutionState, TerminalState, isTerminalState } from '../../types/QueryTypes';

const ALLOWED_TRANSITIONS: Record<ExecutionState, readonly ExecutionState[]> = {
  PENDING: ['SUBMITTED', 'FAILED'],
  SUBMITTED: ['POLLING', 'SUCCEEDED', 'FAILED'],
  POLLING: ['SUCCEEDED', 'FAILED', 'CANCELLED', 'TIMED_OUT'],
  SUCCEEDED: [],
  FAILED: [],
  CANCELLED: [],
  TIMED_OUT: [],
};

/**
 * Per-request lifecycle. Terminal states are sinks; any other move that is not in
 * the transition table is a programming error.
 */
export class ExecutionStateMachine {
  private current: ExecutionState = 'PENDING';
  private readonly history: ExecutionState[] = ['PENDING'];

  constructor(
    readonly queryName: string,
    private readonly onTransition?: (from: ExecutionState, to: ExecutionState) => void
  ) {}

  get state(): ExecutionState {
    return this.current;
  }

  get transitions(): readonly ExecutionState[] {
    return this.history;
  }

  transition(to: ExecutionState): void {
    const from = this.current;
    if (!ALLOWED_TRANSITIONS[from].includes(to)) {
      throw new Error(`Invalid state transition for ${this.queryName}: ${from} -> ${to}`);
    }
    this.current = to;
    this.history.push(to);
    this.onTransition?.(from, to);
  }

  /**
   * Terminal state of a failed request: the one already reached, or FAILED
   */
  settleFailure(): TerminalState {
    if (isTerminalState(this.current)) {
      return this.current;
    }
    this.transition('FAILED');
    return 'FAILED';
  }
}
