import { randomUUID } from 'node:crypto';

import type { RunState, RunTransition } from './interfaces';

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  Received: ['Rasterized', 'Failed'],
  Rasterized: ['RequestBuilt', 'Failed'],
  RequestBuilt: ['Submitted', 'Failed'],
  Submitted: ['Succeeded', 'Failed'],
  Succeeded: [],
  Failed: [],
};

export class IllegalTransitionError extends Error {
  constructor(from: RunState, to: RunState) {
    super(`Extraction run cannot move from ${from} to ${to}`);
    this.name = IllegalTransitionError.name;
  }
}

/** Lifecycle of one document through the pipeline. Succeeded and Failed are terminal. */
export class ExtractionRun {
  readonly id: string;
  private current: RunState = 'Received';
  private readonly transitions: RunTransition[];

  constructor(
    id: string = randomUUID(),
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.id = id;
    this.transitions = [{ state: 'Received', at: this.clock().toISOString() }];
  }

  get state(): RunState {
    return this.current;
  }

  get history(): RunTransition[] {
    return [...this.transitions];
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  transition(next: RunState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new IllegalTransitionError(this.current, next);
    }
    this.current = next;
    this.transitions.push({ state: next, at: this.clock().toISOString() });
  }
}
