import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { TaskState, TASK_STATES } from '../../src/models/TaskState.js';
import { isLegalTransition, nextStates } from '../../src/models/lifecycle.js';
import { ValidationError } from '../../src/errors/ValidationError.js';

describe('TaskState', () => {
  it('accepts every state in the closed set', () => {
    for (const value of TASK_STATES) {
      expect(new TaskState(value).value).toBe(value);
    }
  });

  it('rejects values outside the set, naming the legal ones', () => {
    expect(() => new TaskState('paused')).toThrow(
      'Invalid task state: paused. Must be one of: submitted, working, input-required, completed, canceled, failed, unknown',
    );
  });

  it('rejects the snake_case spelling of input-required', () => {
    expect(() => new TaskState('input_required')).toThrow(ValidationError);
  });

  it('rejects any string outside the set', () => {
    fc.assert(
      fc.property(
        fc.string().filter((s) => !TASK_STATES.some((state) => state === s)),
        (value) => {
          expect(() => new TaskState(value)).toThrow(ValidationError);
        },
      ),
      { numRuns: 100 },
    );
  });

  it('is terminal exactly for completed, canceled and failed', () => {
    const terminal = TASK_STATES.filter((value) => new TaskState(value).terminal);
    expect(terminal).toEqual(['completed', 'canceled', 'failed']);
  });

  it('exposes category predicates', () => {
    expect(new TaskState('submitted').isSubmitted()).toBe(true);
    expect(new TaskState('working').isWorking()).toBe(true);
    expect(new TaskState('input-required').isInputRequired()).toBe(true);
    expect(new TaskState('completed').isCompleted()).toBe(true);
    expect(new TaskState('canceled').isCanceled()).toBe(true);
    expect(new TaskState('failed').isFailed()).toBe(true);
    expect(new TaskState('unknown').isUnknown()).toBe(true);
    expect(new TaskState('working').isCompleted()).toBe(false);
  });

  it('compares by value', () => {
    expect(new TaskState('working').equals(new TaskState('working'))).toBe(true);
    expect(new TaskState('working').equals(new TaskState('failed'))).toBe(false);
    expect(new TaskState('working').equals('working')).toBe(false);
    expect(new TaskState('working')).toEqual(new TaskState('working'));
  });

  it('of() reuses instances and wraps strings', () => {
    const state = new TaskState('failed');
    expect(TaskState.of(state)).toBe(state);
    expect(TaskState.of('failed').equals(state)).toBe(true);
  });

  it('serializes to its raw string', () => {
    expect(JSON.stringify({ state: new TaskState('input-required') })).toBe('{"state":"input-required"}');
    expect(String(new TaskState('canceled'))).toBe('canceled');
  });
});

describe('isLegalTransition', () => {
  it('follows the happy path', () => {
    expect(isLegalTransition('submitted', 'working')).toBe(true);
    expect(isLegalTransition('working', 'completed')).toBe(true);
  });

  it('allows input-required and working to alternate', () => {
    expect(isLegalTransition('working', 'input-required')).toBe(true);
    expect(isLegalTransition('input-required', 'working')).toBe(true);
  });

  it('lets any non-terminal state fail or be canceled', () => {
    for (const from of ['submitted', 'working', 'input-required', 'unknown']) {
      expect(isLegalTransition(from, 'failed')).toBe(true);
      expect(isLegalTransition(from, 'canceled')).toBe(true);
    }
  });

  it('refuses to skip straight from submitted to completed', () => {
    expect(isLegalTransition('submitted', 'completed')).toBe(false);
  });

  it('allows re-publishing a non-terminal state', () => {
    expect(isLegalTransition('working', 'working')).toBe(true);
  });

  it('never leaves a terminal state', () => {
    for (const from of ['completed', 'canceled', 'failed']) {
      for (const to of TASK_STATES) {
        expect(isLegalTransition(from, to)).toBe(false);
      }
    }
  });

  it('lists the next states of working', () => {
    expect(nextStates('working')).toEqual(['working', 'input-required', 'completed', 'failed', 'canceled']);
    expect(nextStates('completed')).toEqual([]);
  });
});
