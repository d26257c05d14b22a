import { ValidationError } from '../errors/ValidationError.js';
import type { TaskStateValue } from '../types/task.js';

export const TASK_STATES: readonly TaskStateValue[] = [
  'submitted',
  'working',
  'input-required',
  'completed',
  'canceled',
  'failed',
  'unknown',
];

const TERMINAL_STATES: ReadonlySet<TaskStateValue> = new Set(['completed', 'canceled', 'failed']);

export function isTaskStateValue(value: unknown): value is TaskStateValue {
  return typeof value === 'string' && TASK_STATES.some((state) => state === value);
}

/** One of the closed set of task states. Compared by value, never by identity. */
export class TaskState {
  readonly value: TaskStateValue;

  constructor(value: string) {
    if (!isTaskStateValue(value)) {
      throw new ValidationError(
        `Invalid task state: ${value}. Must be one of: ${TASK_STATES.join(', ')}`,
        [{ path: 'state', message: 'Unknown task state' }],
      );
    }
    this.value = value;
    Object.freeze(this);
  }

  static of(value: TaskState | string): TaskState {
    return value instanceof TaskState ? value : new TaskState(value);
  }

  /** No further transition is expected once a task reaches completed, canceled or failed. */
  get terminal(): boolean {
    return TERMINAL_STATES.has(this.value);
  }

  isSubmitted(): boolean {
    return this.value === 'submitted';
  }

  isWorking(): boolean {
    return this.value === 'working';
  }

  isInputRequired(): boolean {
    return this.value === 'input-required';
  }

  isCompleted(): boolean {
    return this.value === 'completed';
  }

  isCanceled(): boolean {
    return this.value === 'canceled';
  }

  isFailed(): boolean {
    return this.value === 'failed';
  }

  isUnknown(): boolean {
    return this.value === 'unknown';
  }

  equals(other: unknown): boolean {
    return other instanceof TaskState && other.value === this.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): TaskStateValue {
    return this.value;
  }
}
