import { ProtocolError } from '../errors/ProtocolError.js';
import { ValidationError } from '../errors/ValidationError.js';
import type { Task } from '../models/Task.js';
import type { TaskStore } from '../types/plugin.js';

/** In-memory task store backed by a Map. */
export class InMemoryTaskStore implements TaskStore {
  private readonly tasks = new Map<string, Task>();
  /** Tail of the update chain per task id; settles once that update is done. */
  private readonly pending = new Map<string, Promise<void>>();

  async get(taskId: string): Promise<Task | undefined> {
    return this.tasks.get(taskId);
  }

  async set(taskId: string, task: Task): Promise<void> {
    this.assertId(taskId, task);
    this.tasks.set(taskId, task);
  }

  async delete(taskId: string): Promise<void> {
    this.tasks.delete(taskId);
  }

  /**
   * Run `fn` against the current snapshot and publish what it returns.
   * Updates for the same id run strictly one after another; a failed
   * update publishes nothing and does not block the next one.
   */
  async update(taskId: string, fn: (current: Task) => Task | Promise<Task>): Promise<Task> {
    const previous = this.pending.get(taskId) ?? Promise.resolve();
    const run = previous.then(async () => {
      const current = this.tasks.get(taskId);
      if (!current) throw ProtocolError.taskNotFound();
      const next = await fn(current);
      this.assertId(taskId, next);
      this.tasks.set(taskId, next);
      return next;
    });
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.pending.set(taskId, tail);

    try {
      return await run;
    } finally {
      if (this.pending.get(taskId) === tail) this.pending.delete(taskId);
    }
  }

  /** Returns the number of tasks currently stored. */
  get size(): number {
    return this.tasks.size;
  }

  /** Remove all tasks. */
  clear(): void {
    this.tasks.clear();
  }

  private assertId(taskId: string, task: Task): void {
    if (task.id !== taskId) {
      throw new ValidationError(`Task id ${task.id} does not match store key ${taskId}`, [
        { path: 'id', message: 'Task id must match its store key' },
      ]);
    }
  }
}
