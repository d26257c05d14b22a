import { ProtocolError } from '../errors/ProtocolError.js';
import { ValidationError } from '../errors/ValidationError.js';
import { frozenCopy, projectedCopy } from '../projection/copy.js';
import { parseProjection } from '../projection/parse.js';
import { TaskSchema } from '../projection/schemas.js';
import type { ArtifactProjection } from '../types/artifact.js';
import type { Metadata } from '../types/json.js';
import type { MessageProjection } from '../types/message.js';
import type { TaskProjection } from '../types/task.js';
import { Artifact } from './Artifact.js';
import { type Clock, systemClock } from './clock.js';
import { isLegalTransition } from './lifecycle.js';
import type { Message } from './Message.js';
import { TaskState } from './TaskState.js';
import { TaskStatus, type TaskStatusInit } from './TaskStatus.js';

export interface TaskInit {
  id: string;
  status: TaskStatus | TaskStatusInit;
  sessionId?: string;
  artifacts?: ReadonlyArray<Artifact | ArtifactProjection>;
  metadata?: Metadata;
}

export interface TransitionOptions {
  message?: Message | MessageProjection;
  /** Replaces the artifact list on the derived task. */
  artifacts?: ReadonlyArray<Artifact | ArtifactProjection>;
  clock?: Clock;
}

function toArtifact(artifact: Artifact | ArtifactProjection): Artifact {
  return artifact instanceof Artifact ? artifact : Artifact.fromProjection(artifact);
}

/**
 * The unit of work tracked by id.
 *
 * Tasks never change in place: every lifecycle step derives a new Task
 * with the same id, so a store can publish successive snapshots with a
 * single reference swap. `sessionId` only correlates tasks of one
 * conversation; the task does not own the session.
 */
export class Task {
  readonly id: string;
  readonly status: TaskStatus;
  readonly sessionId?: string;
  readonly artifacts?: readonly Artifact[];
  readonly metadata?: Metadata;

  constructor(init: TaskInit, clock: Clock = systemClock) {
    this.id = init.id;
    this.status = init.status instanceof TaskStatus ? init.status : new TaskStatus(init.status, clock);
    this.sessionId = init.sessionId;
    if (init.artifacts !== undefined) {
      this.artifacts = Object.freeze(init.artifacts.map(toArtifact));
    }
    this.metadata = frozenCopy(init.metadata);
    Object.freeze(this);
  }

  get state(): TaskState {
    return this.status.state;
  }

  withStatus(status: TaskStatus | TaskStatusInit, clock: Clock = systemClock): Task {
    return this.derive({ status: status instanceof TaskStatus ? status : new TaskStatus(status, clock) });
  }

  withArtifacts(artifacts: ReadonlyArray<Artifact | ArtifactProjection>): Task {
    return this.derive({ artifacts });
  }

  appendArtifact(artifact: Artifact | ArtifactProjection): Task {
    return this.derive({ artifacts: [...(this.artifacts ?? []), toArtifact(artifact)] });
  }

  /**
   * Derive the task in its next state, stamped by the clock.
   * @throws TaskNotCancelableError when canceling a task that is already terminal.
   * @throws ValidationError for any other transition the lifecycle does not allow.
   */
  transition(next: TaskState | string, options: TransitionOptions = {}): Task {
    const target = TaskState.of(next);
    if (this.state.terminal && target.isCanceled()) {
      throw ProtocolError.taskNotCancelable();
    }
    if (!isLegalTransition(this.state, target)) {
      throw new ValidationError(
        `Illegal transition for task ${this.id}: ${this.state.value} -> ${target.value}`,
        [{ path: 'status.state', message: 'Transition not allowed' }],
      );
    }
    const status = new TaskStatus({ state: target, message: options.message }, options.clock);
    return this.derive({
      status,
      ...(options.artifacts !== undefined ? { artifacts: options.artifacts } : {}),
    });
  }

  cancel(options: Omit<TransitionOptions, 'artifacts'> = {}): Task {
    return this.transition('canceled', options);
  }

  toProjection(): TaskProjection {
    return {
      id: this.id,
      ...(this.sessionId !== undefined ? { sessionId: this.sessionId } : {}),
      status: this.status.toProjection(),
      ...(this.artifacts !== undefined ? { artifacts: this.artifacts.map((a) => a.toProjection()) } : {}),
      ...(this.metadata !== undefined ? { metadata: projectedCopy(this.metadata) } : {}),
    };
  }

  static fromProjection(raw: unknown, clock: Clock = systemClock): Task {
    const projection = parseProjection(TaskSchema, raw, 'Task');
    return new Task({
      id: projection.id,
      sessionId: projection.sessionId,
      status: TaskStatus.fromProjection(projection.status, clock),
      artifacts: projection.artifacts?.map((artifact) => Artifact.fromProjection(artifact)),
      metadata: projection.metadata,
    });
  }

  private derive(changes: Partial<Omit<TaskInit, 'id'>>): Task {
    return new Task({
      id: this.id,
      status: this.status,
      sessionId: this.sessionId,
      artifacts: this.artifacts,
      metadata: this.metadata,
      ...changes,
    });
  }
}
