import { ValidationError } from '../errors/ValidationError.js';
import { parseProjection } from '../projection/parse.js';
import { IsoTimestampSchema, TaskStatusSchema } from '../projection/schemas.js';
import type { MessageProjection } from '../types/message.js';
import type { TaskStatusProjection } from '../types/task.js';
import { type Clock, isoTimestamp, systemClock } from './clock.js';
import { Message } from './Message.js';
import { TaskState } from './TaskState.js';

export interface TaskStatusInit {
  state: TaskState | string;
  message?: Message | MessageProjection;
  /** ISO-8601; read from the clock when omitted. */
  timestamp?: string;
}

/** A task's state, an optional explanatory message, and when it was entered. */
export class TaskStatus {
  readonly state: TaskState;
  readonly message?: Message;
  readonly timestamp: string;

  constructor(init: TaskStatusInit, clock: Clock = systemClock) {
    this.state = TaskState.of(init.state);
    if (init.message !== undefined) {
      this.message = init.message instanceof Message ? init.message : Message.fromProjection(init.message);
    }
    if (init.timestamp !== undefined && !IsoTimestampSchema.safeParse(init.timestamp).success) {
      throw new ValidationError(`Invalid timestamp: ${init.timestamp}`, [
        { path: 'timestamp', message: 'Expected an ISO-8601 timestamp' },
      ]);
    }
    this.timestamp = init.timestamp ?? isoTimestamp(clock);
    Object.freeze(this);
  }

  toProjection(): TaskStatusProjection {
    return {
      state: this.state.value,
      ...(this.message !== undefined ? { message: this.message.toProjection() } : {}),
      timestamp: this.timestamp,
    };
  }

  static fromProjection(raw: unknown, clock: Clock = systemClock): TaskStatus {
    const projection = parseProjection(TaskStatusSchema, raw, 'TaskStatus');
    return new TaskStatus(
      {
        state: projection.state,
        message: projection.message !== undefined ? Message.fromProjection(projection.message) : undefined,
        timestamp: projection.timestamp,
      },
      clock,
    );
  }
}
