import { PipelineStateError } from '../errors.js';

export type PipelineState = 'Collecting' | 'Normalizing' | 'Scoring' | 'Done' | 'Failed';

const TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = Object.freeze({
  Collecting: ['Normalizing', 'Failed'],
  Normalizing: ['Scoring', 'Failed'],
  Scoring: ['Done', 'Failed'],
  Done: [],
  Failed: [],
});

export interface StateTransition {
  readonly from: PipelineState;
  readonly to: PipelineState;
  /** Unix milliseconds */
  readonly at: number;
}

/**
 * Collecting → Normalizing → Scoring → Done, with Failed reachable from
 * every non-terminal state.
 */
export class PipelineStateMachine {
  private current: PipelineState = 'Collecting';
  private readonly history: StateTransition[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  get state(): PipelineState {
    return this.current;
  }

  get transitions(): readonly StateTransition[] {
    return [...this.history];
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  canTransition(to: PipelineState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: PipelineState): void {
    if (!this.canTransition(to)) {
      throw new PipelineStateError(this.current, to);
    }
    this.history.push(Object.freeze({ from: this.current, to, at: this.now() }));
    this.current = to;
  }
}
