import { describe, it, expect } from 'vitest';
import {
  PipelineStateMachine,
  getNextStates,
  isValidTransition,
  stageIndex,
} from '../stateMachine.js';
import { StateTransitionError } from '../errors/index.js';

describe('PipelineStateMachine', () => {
  it('should walk the linear happy path', () => {
    const machine = new PipelineStateMachine('run-1');

    for (const stage of ['EXTRACTING', 'STRIPPING', 'REFORMATTING', 'ENCODING', 'DONE'] as const) {
      machine.transitionTo(stage);
    }

    expect(machine.getState()).toBe('DONE');
    expect(machine.isTerminal()).toBe(true);
    expect(machine.getHistory().map(t => `${t.from}->${t.to}`)).toEqual([
      'PROBING->EXTRACTING',
      'EXTRACTING->STRIPPING',
      'STRIPPING->REFORMATTING',
      'REFORMATTING->ENCODING',
      'ENCODING->DONE',
    ]);
  });

  it('should allow skipping only from PROBING', () => {
    expect(isValidTransition('PROBING', 'SKIPPED')).toBe(true);
    expect(isValidTransition('EXTRACTING', 'SKIPPED')).toBe(false);
  });

  it('should reject out-of-order transitions', () => {
    const machine = new PipelineStateMachine('run-2');

    expect(() => machine.transitionTo('ENCODING')).toThrow(StateTransitionError);
    expect(machine.getState()).toBe('PROBING');
  });

  it('should allow failure and cancellation from any working stage', () => {
    const failed = new PipelineStateMachine('run-3', 'REFORMATTING');
    failed.fail('boom', { detail: 1 });
    expect(failed.getState()).toBe('FAILED');
    expect(failed.getHistory()[0]?.reason).toBe('boom');

    const cancelled = new PipelineStateMachine('run-4', 'ENCODING');
    cancelled.cancel();
    expect(cancelled.getState()).toBe('CANCELLED');
  });

  it('should have no way out of terminal stages', () => {
    expect(getNextStates('DONE')).toEqual([]);
    expect(getNextStates('CANCELLED')).toEqual([]);

    const machine = new PipelineStateMachine('run-5', 'FAILED');
    expect(() => machine.transitionTo('PROBING')).toThrow(StateTransitionError);
  });

  it('should index working stages in execution order', () => {
    expect(stageIndex('PROBING')).toBe(0);
    expect(stageIndex('ENCODING')).toBe(4);
    expect(stageIndex('DONE')).toBeNull();
  });
});
