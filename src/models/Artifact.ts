import { frozenCopy, projectedCopy } from '../projection/copy.js';
import { parseProjection } from '../projection/parse.js';
import { ArtifactSchema } from '../projection/schemas.js';
import type { ArtifactProjection } from '../types/artifact.js';
import type { Metadata } from '../types/json.js';
import type { PartProjection } from '../types/part.js';
import { Part } from './Part.js';

export interface ArtifactInit {
  parts: ReadonlyArray<Part | PartProjection>;
  name?: string;
  description?: string;
  index?: number;
  append?: boolean;
  lastChunk?: boolean;
  metadata?: Metadata;
}

/**
 * Output produced by a task.
 *
 * When an output is streamed, successive artifacts share an `index`;
 * `append` asks the receiver to extend the previous chunk and `lastChunk`
 * closes the stream. The flags are declarative only: ordering and index
 * coherence across chunks are the producer's responsibility.
 */
export class Artifact {
  readonly parts: readonly Part[];
  readonly name?: string;
  readonly description?: string;
  readonly index: number;
  readonly append?: boolean;
  readonly lastChunk?: boolean;
  readonly metadata?: Metadata;

  constructor(init: ArtifactInit) {
    this.parts = Object.freeze(init.parts.map((part) => Part.from(part)));
    this.name = init.name;
    this.description = init.description;
    this.index = init.index ?? 0;
    this.append = init.append;
    this.lastChunk = init.lastChunk;
    this.metadata = frozenCopy(init.metadata);
    Object.freeze(this);
  }

  toProjection(): ArtifactProjection {
    return {
      ...(this.name !== undefined ? { name: this.name } : {}),
      ...(this.description !== undefined ? { description: this.description } : {}),
      parts: this.parts.map((part) => part.toProjection()),
      index: this.index,
      ...(this.append !== undefined ? { append: this.append } : {}),
      ...(this.lastChunk !== undefined ? { lastChunk: this.lastChunk } : {}),
      ...(this.metadata !== undefined ? { metadata: projectedCopy(this.metadata) } : {}),
    };
  }

  static fromProjection(raw: unknown): Artifact {
    const projection = parseProjection(ArtifactSchema, raw, 'Artifact');
    return new Artifact({
      ...projection,
      parts: projection.parts.map((part) => Part.fromProjection(part)),
    });
  }
}
