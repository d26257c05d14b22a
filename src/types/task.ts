import type { Metadata } from './json.js';
import type { MessageProjection } from './message.js';
import type { ArtifactProjection } from './artifact.js';

export type TaskStateValue =
  | 'submitted'
  | 'working'
  | 'input-required'
  | 'completed'
  | 'canceled'
  | 'failed'
  | 'unknown';

/** Current status of a task. */
export interface TaskStatusProjection {
  state: TaskStateValue;
  message?: MessageProjection;
  timestamp: string;
}

/** A unit of work that may span multiple message turns. */
export interface TaskProjection {
  id: string;
  sessionId?: string;
  status: TaskStatusProjection;
  artifacts?: ArtifactProjection[];
  metadata?: Metadata;
}
