import { ValidationError } from '../errors/ValidationError.js';
import { frozenCopy, projectedCopy } from '../projection/copy.js';
import { parseProjection } from '../projection/parse.js';
import { MessageSchema } from '../projection/schemas.js';
import type { Metadata } from '../types/json.js';
import type { MessageProjection, MessageRole } from '../types/message.js';
import type { PartProjection } from '../types/part.js';
import { Part, TextPart } from './Part.js';

export const MESSAGE_ROLES: readonly MessageRole[] = ['user', 'agent'];

export function isMessageRole(value: unknown): value is MessageRole {
  return typeof value === 'string' && MESSAGE_ROLES.some((role) => role === value);
}

export interface MessageInit {
  role: string;
  parts: ReadonlyArray<Part | PartProjection>;
  metadata?: Metadata;
}

/** One turn between the client (`user`) and the agent (`agent`). Parts keep their order. */
export class Message {
  readonly role: MessageRole;
  readonly parts: readonly Part[];
  readonly metadata?: Metadata;

  constructor(init: MessageInit) {
    if (!isMessageRole(init.role)) {
      throw new ValidationError(
        `Invalid role: ${init.role}. Must be one of: ${MESSAGE_ROLES.join(', ')}`,
        [{ path: 'role', message: 'Unknown role' }],
      );
    }
    if (init.parts.length === 0) {
      throw new ValidationError('Message must contain at least one part', [
        { path: 'parts', message: 'At least one part is required' },
      ]);
    }
    this.role = init.role;
    this.parts = Object.freeze(init.parts.map((part) => Part.from(part)));
    this.metadata = frozenCopy(init.metadata);
    Object.freeze(this);
  }

  /** Single text part message. */
  static text(role: string, text: string, metadata?: Metadata): Message {
    return new Message({ role, parts: [new TextPart({ text })], metadata });
  }

  toProjection(): MessageProjection {
    return {
      role: this.role,
      parts: this.parts.map((part) => part.toProjection()),
      ...(this.metadata !== undefined ? { metadata: projectedCopy(this.metadata) } : {}),
    };
  }

  static fromProjection(raw: unknown): Message {
    const projection = parseProjection(MessageSchema, raw, 'Message');
    return new Message({
      role: projection.role,
      parts: projection.parts.map((part) => Part.fromProjection(part)),
      metadata: projection.metadata,
    });
  }
}
