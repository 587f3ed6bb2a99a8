/**
 * Pipeline State Machine
 *
 * Strict state machine for one file's conversion run.
 *
 * State Flow:
 * PROBING → EXTRACTING → STRIPPING → REFORMATTING → ENCODING → DONE
 *        ↘ SKIPPED (no subtitle stream)
 *                    ↘ FAILED / CANCELLED (from any non-terminal state)
 *
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - Terminal states have no way out
 */

import { StateTransitionError } from './errors/index.js';

export const PIPELINE_STAGES = [
  'PROBING',
  'EXTRACTING',
  'STRIPPING',
  'REFORMATTING',
  'ENCODING',
  'DONE',
  'SKIPPED',
  'FAILED',
  'CANCELLED',
] as const;

export type PipelineStage = typeof PIPELINE_STAGES[number];

/**
 * Working stages in execution order; their position drives overall progress
 */
export const WORKING_STAGES = [
  'PROBING',
  'EXTRACTING',
  'STRIPPING',
  'REFORMATTING',
  'ENCODING',
] as const satisfies ReadonlyArray<PipelineStage>;

export type WorkingStage = typeof WORKING_STAGES[number];

/**
 * Represents a state transition with metadata
 */
export interface StageTransition {
  from: PipelineStage;
  to: PipelineStage;
  timestamp: Date;
  reason?: string;
  metadata?: Record<string, unknown>;
}

const validTransitions: Record<PipelineStage, ReadonlySet<PipelineStage>> = {
  PROBING: new Set<PipelineStage>([
    'EXTRACTING',
    'SKIPPED',
    'CANCELLED',
    'FAILED',
  ]),
  EXTRACTING: new Set<PipelineStage>([
    'STRIPPING',
    'CANCELLED',
    'FAILED',
  ]),
  STRIPPING: new Set<PipelineStage>([
    'REFORMATTING',
    'CANCELLED',
    'FAILED',
  ]),
  REFORMATTING: new Set<PipelineStage>([
    'ENCODING',
    'CANCELLED',
    'FAILED',
  ]),
  ENCODING: new Set<PipelineStage>([
    'DONE',
    'CANCELLED',
    'FAILED',
  ]),
  DONE: new Set<PipelineStage>(),
  SKIPPED: new Set<PipelineStage>(),
  FAILED: new Set<PipelineStage>(),
  CANCELLED: new Set<PipelineStage>(),
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: PipelineStage, to: PipelineStage): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: PipelineStage): PipelineStage[] {
  return Array.from(validTransitions[current]);
}

/**
 * Index of a working stage (0-4), or null for terminal stages
 */
export function stageIndex(stage: PipelineStage): number | null {
  const index = WORKING_STAGES.findIndex(s => s === stage);
  return index === -1 ? null : index;
}

/**
 * Pipeline State Machine class
 * Tracks the current stage and the transition history of one run
 */
export class PipelineStateMachine {
  private currentState: PipelineStage;
  private history: StageTransition[] = [];
  private readonly runId: string;

  constructor(runId: string, initialState: PipelineStage = 'PROBING') {
    this.runId = runId;
    this.currentState = initialState;
  }

  getState(): PipelineStage {
    return this.currentState;
  }

  getHistory(): ReadonlyArray<StageTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: PipelineStage): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(
    targetState: PipelineStage,
    reason?: string,
    metadata?: Record<string, unknown>
  ): StageTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.runId, this.currentState, targetState);
    }

    const transition: StageTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
      metadata,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  isTerminal(): boolean {
    return validTransitions[this.currentState].size === 0;
  }

  fail(reason: string, metadata?: Record<string, unknown>): StageTransition {
    return this.transitionTo('FAILED', reason, metadata);
  }

  cancel(reason: string = 'Cancellation requested'): StageTransition {
    return this.transitionTo('CANCELLED', reason);
  }
}
