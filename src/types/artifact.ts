import type { Metadata } from './json.js';
import type { PartProjection } from './part.js';

/** Output produced by a task, possibly one chunk of a streamed output. */
export interface ArtifactProjection {
  name?: string;
  description?: string;
  parts: PartProjection[];
  index: number;
  append?: boolean;
  lastChunk?: boolean;
  metadata?: Metadata;
}
