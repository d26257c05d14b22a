/**
 * Property-based tests for wire projections.
 *
 *   - Canonical projections survive a JSON round trip unchanged
 *   - snake_case spellings read the same as camelCase ones
 *   - Free-form metadata and data are never rewritten
 *   - Entities keep no reference to their input or their projection
 *   - Terminal tasks accept no further transition
 */
import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { Task } from '../../src/models/Task.js';
import { Message } from '../../src/models/Message.js';
import { AgentCapabilities } from '../../src/models/AgentCapabilities.js';
import { TASK_STATES, TaskState } from '../../src/models/TaskState.js';
import { ProtocolError } from '../../src/errors/ProtocolError.js';
import { ValidationError } from '../../src/errors/ValidationError.js';

/** Keys that look like snake_case, so any rewrite would show. */
const arbKey = fc.stringMatching(/^[a-z]{1,6}_[a-z]{1,6}$/);

const arbMetadata = fc.dictionary(arbKey, fc.oneof(fc.string(), fc.integer(), fc.boolean()), { maxKeys: 4 });

/** Second-precision UTC timestamps, as the clock stamps them. */
const arbTimestamp = fc
  .integer({ min: Date.UTC(2000, 0, 1), max: Date.UTC(2099, 11, 31) })
  .map((ms) => new Date(ms).toISOString().replace(/\.\d{3}Z$/, 'Z'));

const arbTextPart = fc.record({ type: fc.constant('text' as const), text: fc.string() });

const arbFilePart = fc.record({
  type: fc.constant('file' as const),
  file: fc.oneof(
    fc.record(
      { name: fc.string({ minLength: 1 }), mimeType: fc.constant('text/plain'), bytes: fc.base64String() },
      { requiredKeys: ['bytes'] },
    ),
    fc.record({ uri: fc.webUrl() }),
  ),
});

const arbDataPart = fc.record({ type: fc.constant('data' as const), data: arbMetadata });

const arbPart = fc.oneof(arbTextPart, arbFilePart, arbDataPart);

const arbMessage = fc.record(
  {
    role: fc.constantFrom('user', 'agent'),
    parts: fc.array(arbPart, { minLength: 1, maxLength: 4 }),
    metadata: arbMetadata,
  },
  { requiredKeys: ['role', 'parts'] },
);

const arbArtifact = fc.record(
  {
    name: fc.string(),
    parts: fc.array(arbPart, { maxLength: 3 }),
    index: fc.nat({ max: 10 }),
    append: fc.boolean(),
    lastChunk: fc.boolean(),
  },
  { requiredKeys: ['parts', 'index'] },
);

const arbTask = fc.record(
  {
    id: fc.string({ minLength: 1 }),
    sessionId: fc.string({ minLength: 1 }),
    status: fc.record(
      { state: fc.constantFrom(...TASK_STATES), message: arbMessage, timestamp: arbTimestamp },
      { requiredKeys: ['state', 'timestamp'] },
    ),
    artifacts: fc.array(arbArtifact, { maxLength: 3 }),
    metadata: arbMetadata,
  },
  { requiredKeys: ['id', 'status'] },
);

function viaJson(value: unknown): unknown {
  return JSON.parse(JSON.stringify(value));
}

/** Overwrite every nested object and array in place. */
function scramble(value: unknown): void {
  if (Array.isArray(value)) {
    value.forEach(scramble);
    value.push('extra');
  } else if (typeof value === 'object' && value !== null) {
    for (const [key, entry] of Object.entries(value)) {
      scramble(entry);
      Reflect.set(value, key, typeof entry === 'object' ? entry : 'changed');
    }
    Reflect.set(value, 'extra_key', 'extra');
  }
}

describe('projection properties', () => {
  it('task projections round-trip through JSON', () => {
    fc.assert(
      fc.property(arbTask, (projection) => {
        expect(Task.fromProjection(viaJson(projection)).toProjection()).toEqual(projection);
      }),
    );
  });

  it('message projections round-trip through JSON', () => {
    fc.assert(
      fc.property(arbMessage, (projection) => {
        expect(Message.fromProjection(viaJson(projection)).toProjection()).toEqual(projection);
      }),
    );
  });

  it('metadata keys survive untouched', () => {
    fc.assert(
      fc.property(arbMessage, arbMetadata, (message, metadata) => {
        const read = Message.fromProjection({ ...message, metadata });
        expect(read.metadata).toEqual(metadata);
      }),
    );
  });

  it('a task never changes through its input or its projection', () => {
    fc.assert(
      fc.property(arbTask, (projection) => {
        const input = structuredClone(projection);
        const task = Task.fromProjection(input);

        scramble(input);
        scramble(task.toProjection());

        expect(task.toProjection()).toEqual(projection);
      }),
    );
  });

  it('snake_case capability keys read the same as camelCase ones', () => {
    fc.assert(
      fc.property(fc.boolean(), fc.boolean(), fc.boolean(), (streaming, pushNotifications, history) => {
        const camel = AgentCapabilities.fromProjection({
          streaming,
          pushNotifications,
          stateTransitionHistory: history,
        });
        const snake = AgentCapabilities.fromProjection({
          streaming,
          push_notifications: pushNotifications,
          state_transition_history: history,
        });
        expect(snake.toProjection()).toEqual(camel.toProjection());
      }),
    );
  });

  it('terminal tasks accept no further transition', () => {
    const terminal = TASK_STATES.filter((state) => new TaskState(state).terminal);
    fc.assert(
      fc.property(fc.constantFrom(...terminal), fc.constantFrom(...TASK_STATES), (from, to) => {
        const task = new Task({ id: 't-1', status: { state: from, timestamp: '2025-01-15T10:30:00Z' } });
        expect(() => task.transition(to)).toThrow(to === 'canceled' ? ProtocolError : ValidationError);
      }),
    );
  });
});
