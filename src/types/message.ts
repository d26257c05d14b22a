import type { Metadata } from './json.js';
import type { PartProjection } from './part.js';

/** Role of a message within a task conversation. */
export type MessageRole = 'user' | 'agent';

/** A single communication turn between client and agent. */
export interface MessageProjection {
  role: MessageRole;
  parts: PartProjection[];
  metadata?: Metadata;
}
