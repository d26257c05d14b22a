import type { Task } from '../models/Task.js';

// ---------- Logger ----------

/** Logger callback for diagnostic events. Nothing is logged when none is supplied. */
export type Logger = (level: 'debug' | 'warn' | 'error', message: string, data?: unknown) => void;

// ---------- Task storage ----------

/**
 * Where task snapshots are published. Implementations must run `update`
 * calls for one task id one at a time, so each read-decide-publish step
 * sees the snapshot the previous one published.
 */
export interface TaskStore {
  get(taskId: string): Promise<Task | undefined>;
  set(taskId: string, task: Task): Promise<void>;
  delete(taskId: string): Promise<void>;
  /** @throws TaskNotFoundError when no task is stored under `taskId`. */
  update(taskId: string, fn: (current: Task) => Task | Promise<Task>): Promise<Task>;
}
