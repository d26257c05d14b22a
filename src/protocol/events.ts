import { Artifact, type ArtifactInit } from '../models/Artifact.js';
import { type Clock, systemClock } from '../models/clock.js';
import type { Task } from '../models/Task.js';
import { TaskStatus, type TaskStatusInit } from '../models/TaskStatus.js';
import { frozenCopy, projectedCopy } from '../projection/copy.js';
import { parseProjection } from '../projection/parse.js';
import { TaskArtifactUpdateEventSchema, TaskStatusUpdateEventSchema } from '../projection/schemas.js';
import type { Metadata } from '../types/json.js';
import type {
  TaskArtifactUpdateEventProjection,
  TaskStatusUpdateEventProjection,
} from '../types/payloads.js';

/** Streamed when a task's status changes. `final` marks the last event of the stream. */
export class TaskStatusUpdateEvent {
  readonly kind = 'status-update' as const;
  readonly id: string;
  readonly status: TaskStatus;
  readonly final: boolean;
  readonly metadata?: Metadata;

  constructor(
    init: { id: string; status: TaskStatus | TaskStatusInit; final?: boolean; metadata?: Metadata },
    clock: Clock = systemClock,
  ) {
    this.id = init.id;
    this.status = init.status instanceof TaskStatus ? init.status : new TaskStatus(init.status, clock);
    this.final = init.final ?? false;
    this.metadata = frozenCopy(init.metadata);
    Object.freeze(this);
  }

  /** Event announcing `task`'s current status; final once the task is terminal. */
  static fromTask(task: Task): TaskStatusUpdateEvent {
    return new TaskStatusUpdateEvent({ id: task.id, status: task.status, final: task.state.terminal });
  }

  toProjection(): TaskStatusUpdateEventProjection {
    return {
      id: this.id,
      status: this.status.toProjection(),
      final: this.final,
      ...(this.metadata !== undefined ? { metadata: projectedCopy(this.metadata) } : {}),
    };
  }

  static fromProjection(raw: unknown, clock: Clock = systemClock): TaskStatusUpdateEvent {
    const projection = parseProjection(TaskStatusUpdateEventSchema, raw, 'TaskStatusUpdateEvent');
    return new TaskStatusUpdateEvent({
      id: projection.id,
      status: TaskStatus.fromProjection(projection.status, clock),
      final: projection.final,
      metadata: projection.metadata,
    });
  }
}

/** Streamed when a task emits an artifact or an artifact chunk. */
export class TaskArtifactUpdateEvent {
  readonly kind = 'artifact-update' as const;
  readonly id: string;
  readonly artifact: Artifact;
  readonly metadata?: Metadata;

  constructor(init: { id: string; artifact: Artifact | ArtifactInit; metadata?: Metadata }) {
    this.id = init.id;
    this.artifact = init.artifact instanceof Artifact ? init.artifact : new Artifact(init.artifact);
    this.metadata = frozenCopy(init.metadata);
    Object.freeze(this);
  }

  toProjection(): TaskArtifactUpdateEventProjection {
    return {
      id: this.id,
      artifact: this.artifact.toProjection(),
      ...(this.metadata !== undefined ? { metadata: projectedCopy(this.metadata) } : {}),
    };
  }

  static fromProjection(raw: unknown): TaskArtifactUpdateEvent {
    const projection = parseProjection(TaskArtifactUpdateEventSchema, raw, 'TaskArtifactUpdateEvent');
    return new TaskArtifactUpdateEvent({
      id: projection.id,
      artifact: Artifact.fromProjection(projection.artifact),
      metadata: projection.metadata,
    });
  }
}

export type TaskUpdateEvent = TaskStatusUpdateEvent | TaskArtifactUpdateEvent;

/**
 * Read a streamed event. Status updates carry `status`, artifact updates
 * carry `artifact`; the wire form has no other discriminator.
 */
export function parseTaskUpdateEvent(raw: unknown, clock: Clock = systemClock): TaskUpdateEvent {
  if (typeof raw === 'object' && raw !== null && 'artifact' in raw) {
    return TaskArtifactUpdateEvent.fromProjection(raw);
  }
  return TaskStatusUpdateEvent.fromProjection(raw, clock);
}
