import type { RunStage, StageTransition } from '@govpilot/shared';

const MAX_HISTORY = 100;

export const VALID_TRANSITIONS: Readonly<Record<RunStage, readonly RunStage[]>> = {
  IDLE: ['STARTING'],
  STARTING: ['LOADING_PREFERENCES', 'ERROR'],
  LOADING_PREFERENCES: ['FETCHING_PROPOSALS', 'ERROR'],
  FETCHING_PROPOSALS: ['FILTERING', 'ERROR'],
  FILTERING: ['DECIDING', 'ERROR'],
  DECIDING: ['EXECUTING', 'ERROR'],
  EXECUTING: ['CLASSIFYING_ACTIVITY', 'ERROR'],
  CLASSIFYING_ACTIVITY: ['PERSISTING', 'ERROR'],
  PERSISTING: ['COMPLETED', 'ERROR'],
  COMPLETED: ['IDLE', 'STARTING'],
  ERROR: ['IDLE', 'STARTING', 'COMPLETED'],
};

export function isValidTransition(from: RunStage, to: RunStage): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Observes the stages a run passes through. An invalid transition is
 * reported to `onTransition` with `valid: false` and still applied.
 */
export class RunStageTracker {
  private stage: RunStage = 'IDLE';
  private readonly transitions: StageTransition[] = [];

  constructor(
    private readonly onTransition: (transition: StageTransition) => void = () => {},
    private readonly clock: () => number = Date.now,
  ) {}

  get current(): RunStage {
    return this.stage;
  }

  get history(): readonly StageTransition[] {
    return this.transitions;
  }

  transition(to: RunStage, runId?: string): StageTransition {
    const entry: StageTransition = {
      from: this.stage,
      to,
      at: this.clock(),
      valid: isValidTransition(this.stage, to),
      runId,
    };
    this.stage = to;
    this.transitions.push(entry);
    if (this.transitions.length > MAX_HISTORY) {
      this.transitions.splice(0, this.transitions.length - MAX_HISTORY);
    }
    this.onTransition(entry);
    return entry;
  }

  /** Milliseconds spent in each stage that has been left, summed over the kept history. */
  durations(): Partial<Record<RunStage, number>> {
    const totals: Partial<Record<RunStage, number>> = {};
    for (let i = 1; i < this.transitions.length; i++) {
      const entered = this.transitions[i - 1];
      const left = this.transitions[i];
      totals[entered.to] = (totals[entered.to] ?? 0) + (left.at - entered.at);
    }
    return totals;
  }
}
