import type { TaskStateValue } from '../types/task.js';
import { TaskState } from './TaskState.js';

/**
 * Forward transitions a producer may publish:
 * submitted → working → (input-required ⇄ working) → completed | failed | canceled.
 * Any non-terminal state may also fail or be canceled, and `unknown` may
 * resolve into any known state. Re-publishing the current state (a fresh
 * status message) is allowed while the task is not terminal.
 */
const TRANSITIONS: Record<TaskStateValue, readonly TaskStateValue[]> = {
  submitted: ['working', 'failed', 'canceled'],
  working: ['input-required', 'completed', 'failed', 'canceled'],
  'input-required': ['working', 'failed', 'canceled'],
  unknown: ['submitted', 'working', 'input-required', 'completed', 'failed', 'canceled'],
  completed: [],
  canceled: [],
  failed: [],
};

export function isLegalTransition(from: TaskState | string, to: TaskState | string): boolean {
  const source = TaskState.of(from);
  const target = TaskState.of(to);
  if (source.terminal) return false;
  if (source.equals(target)) return true;
  return TRANSITIONS[source.value].includes(target.value);
}

/** States reachable in one step from `from`, in declaration order. */
export function nextStates(from: TaskState | string): TaskStateValue[] {
  const source = TaskState.of(from);
  if (source.terminal) return [];
  return [source.value, ...TRANSITIONS[source.value].filter((state) => state !== source.value)];
}
