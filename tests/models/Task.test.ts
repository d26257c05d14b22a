import { describe, it, expect } from 'vitest';
import { Task } from '../../src/models/Task.js';
import { TaskStatus } from '../../src/models/TaskStatus.js';
import { TaskState } from '../../src/models/TaskState.js';
import { Message } from '../../src/models/Message.js';
import { Artifact } from '../../src/models/Artifact.js';
import { TextPart } from '../../src/models/Part.js';
import { fixedClock, isoTimestamp } from '../../src/models/clock.js';
import { TaskNotCancelableError } from '../../src/errors/ProtocolError.js';
import { ValidationError } from '../../src/errors/ValidationError.js';

const T0 = fixedClock('2025-01-15T10:30:00Z');
const T1 = fixedClock('2025-01-15T10:31:00Z');
const T2 = fixedClock('2025-01-15T10:32:00Z');

describe('clock', () => {
  it('formats at second precision', () => {
    expect(isoTimestamp(fixedClock('2025-01-15T10:30:00.123Z'))).toBe('2025-01-15T10:30:00Z');
  });
});

describe('TaskStatus', () => {
  it('stamps the time from the injected clock', () => {
    const status = new TaskStatus({ state: 'submitted' }, T0);
    expect(status.timestamp).toBe('2025-01-15T10:30:00Z');
  });

  it('keeps a supplied timestamp', () => {
    const status = new TaskStatus({ state: 'working', timestamp: '2024-12-31T23:59:59Z' }, T0);
    expect(status.timestamp).toBe('2024-12-31T23:59:59Z');
  });

  it('rejects a timestamp that is not a date', () => {
    expect(() => new TaskStatus({ state: 'working', timestamp: 'yesterday' })).toThrow(
      'Invalid timestamp: yesterday',
    );
  });

  it.each(['2025', '2025-01-15', 'Tue, 15 Jan 2025 10:30:00 GMT'])(
    'rejects the non-ISO timestamp %s',
    (timestamp) => {
      expect(() => new TaskStatus({ state: 'working', timestamp })).toThrow(`Invalid timestamp: ${timestamp}`);
    },
  );

  it('accepts fractional seconds and numeric offsets', () => {
    expect(new TaskStatus({ state: 'working', timestamp: '2025-01-15T10:30:00.123+02:00' }).timestamp).toBe(
      '2025-01-15T10:30:00.123+02:00',
    );
  });

  it('rejects a non-ISO timestamp on the wire', () => {
    expect(() => TaskStatus.fromProjection({ state: 'working', timestamp: '2025' })).toThrow(
      'Invalid TaskStatus: timestamp: Invalid datetime',
    );
  });

  it('rejects an unknown state', () => {
    expect(() => TaskStatus.fromProjection({ state: 'paused', timestamp: '2025-01-15T10:30:00Z' })).toThrow(
      ValidationError,
    );
  });

  it('builds its message from a projection', () => {
    const status = new TaskStatus(
      { state: 'input-required', message: { role: 'agent', parts: [{ type: 'text', text: 'Which city?' }] } },
      T0,
    );
    expect(status.message).toBeInstanceOf(Message);
    expect(status.toProjection()).toEqual({
      state: 'input-required',
      message: { role: 'agent', parts: [{ type: 'text', text: 'Which city?' }] },
      timestamp: '2025-01-15T10:30:00Z',
    });
  });

  it('fills a missing wire timestamp from the clock', () => {
    expect(TaskStatus.fromProjection({ state: 'working' }, T1).timestamp).toBe('2025-01-15T10:31:00Z');
  });
});

describe('Task', () => {
  const submitted = () => new Task({ id: 't-1', sessionId: 's-1', status: { state: 'submitted' } }, T0);

  it('derives state from status', () => {
    const task = submitted();
    expect(task.state).toBe(task.status.state);
    expect(task.state.equals(new TaskState('submitted'))).toBe(true);
  });

  it('projects the canonical success result shape', () => {
    expect(new Task({ id: 't-1', status: { state: 'submitted' } }, T0).toProjection()).toEqual({
      id: 't-1',
      status: { state: 'submitted', timestamp: '2025-01-15T10:30:00Z' },
    });
  });

  it('reads session_id as sessionId', () => {
    const task = Task.fromProjection({
      id: 't-9',
      session_id: 's-9',
      status: { state: 'working', timestamp: '2025-01-15T10:30:00Z' },
    });
    expect(task.sessionId).toBe('s-9');
    expect(task.toProjection()).toEqual({
      id: 't-9',
      sessionId: 's-9',
      status: { state: 'working', timestamp: '2025-01-15T10:30:00Z' },
    });
  });

  it('round-trips a full projection', () => {
    const projection = {
      id: 't-2',
      sessionId: 's-2',
      status: {
        state: 'completed',
        message: { role: 'agent', parts: [{ type: 'text', text: 'Done' }] },
        timestamp: '2025-01-15T10:32:00Z',
      },
      artifacts: [{ name: 'answer', parts: [{ type: 'text', text: '42' }], index: 0, lastChunk: true }],
      metadata: { priority: 'high' },
    };
    expect(Task.fromProjection(projection).toProjection()).toEqual(projection);
  });

  it('appends artifacts without touching the original', () => {
    const task = submitted();
    const next = task.appendArtifact({ parts: [{ type: 'text', text: 'partial' }] });
    expect(task.artifacts).toBeUndefined();
    expect(next.artifacts).toHaveLength(1);
    expect(next.id).toBe(task.id);
  });

  it('replaces the status with withStatus', () => {
    const next = submitted().withStatus({ state: 'working' }, T1);
    expect(next.state.value).toBe('working');
    expect(next.status.timestamp).toBe('2025-01-15T10:31:00Z');
    expect(next.sessionId).toBe('s-1');
  });

  it('refuses illegal transitions', () => {
    expect(() => submitted().transition('completed', { clock: T1 })).toThrow(
      'Illegal transition for task t-1: submitted -> completed',
    );
  });

  it('refuses to cancel a terminal task', () => {
    const done = submitted().transition('working', { clock: T1 }).transition('completed', { clock: T2 });
    expect(() => done.cancel({ clock: T2 })).toThrow(TaskNotCancelableError);
  });

  it('refuses to move a terminal task anywhere else', () => {
    const failed = submitted().transition('failed', { clock: T1 });
    expect(() => failed.transition('working', { clock: T2 })).toThrow(ValidationError);
  });

  it('cancels a task that is still running', () => {
    const canceled = submitted().transition('working', { clock: T1 }).cancel({ clock: T2 });
    expect(canceled.state.isCanceled()).toBe(true);
    expect(canceled.state.terminal).toBe(true);
  });

  it('moves through submitted, working and completed as three distinct snapshots', () => {
    const first = submitted();
    const second = first.transition('working', {
      message: Message.text('agent', 'Looking that up'),
      clock: T1,
    });
    const third = second.transition('completed', {
      artifacts: [new Artifact({ parts: [new TextPart({ text: 'It is sunny.' })] })],
      clock: T2,
    });

    expect([first.state.terminal, second.state.terminal, third.state.terminal]).toEqual([false, false, true]);
    expect(new Set([first, second, third]).size).toBe(3);
    expect([first.id, second.id, third.id]).toEqual(['t-1', 't-1', 't-1']);

    expect(first.toProjection()).toEqual({
      id: 't-1',
      sessionId: 's-1',
      status: { state: 'submitted', timestamp: '2025-01-15T10:30:00Z' },
    });
    expect(second.toProjection()).toEqual({
      id: 't-1',
      sessionId: 's-1',
      status: {
        state: 'working',
        message: { role: 'agent', parts: [{ type: 'text', text: 'Looking that up' }] },
        timestamp: '2025-01-15T10:31:00Z',
      },
    });
    expect(third.toProjection()).toEqual({
      id: 't-1',
      sessionId: 's-1',
      status: { state: 'completed', timestamp: '2025-01-15T10:32:00Z' },
      artifacts: [{ parts: [{ type: 'text', text: 'It is sunny.' }], index: 0 }],
    });
  });

  it('is frozen', () => {
    const task = submitted();
    expect(Object.isFrozen(task)).toBe(true);
    expect(Object.isFrozen(task.status)).toBe(true);
  });
});
