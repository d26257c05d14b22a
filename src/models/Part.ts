import { InvalidVariantError } from '../errors/ValidationError.js';
import { frozenCopy, projectedCopy } from '../projection/copy.js';
import { canonicalizeKeys, isPlainObject } from '../projection/keys.js';
import { parseProjection } from '../projection/parse.js';
import { DataPartSchema, FilePartSchema, TextPartSchema } from '../projection/schemas.js';
import type { Metadata, StructuredData } from '../types/json.js';
import type {
  DataPartProjection,
  FileContentProjection,
  FilePartProjection,
  PartProjection,
  TextPartProjection,
} from '../types/part.js';
import { FileContent } from './FileContent.js';

function withMetadata(metadata: Metadata | undefined): { metadata?: Metadata } {
  return metadata !== undefined ? { metadata: projectedCopy(metadata) } : {};
}

export class TextPart {
  readonly type = 'text' as const;
  readonly text: string;
  readonly metadata?: Metadata;

  constructor(init: { text: string; metadata?: Metadata }) {
    this.text = init.text;
    this.metadata = frozenCopy(init.metadata);
    Object.freeze(this);
  }

  toProjection(): TextPartProjection {
    return { type: this.type, text: this.text, ...withMetadata(this.metadata) };
  }

  static fromProjection(raw: unknown): TextPart {
    return new TextPart(parseProjection(TextPartSchema, raw, 'TextPart'));
  }
}

export class FilePart {
  readonly type = 'file' as const;
  readonly file: FileContent;
  readonly metadata?: Metadata;

  constructor(init: { file: FileContent | FileContentProjection; metadata?: Metadata }) {
    this.file = init.file instanceof FileContent ? init.file : new FileContent(init.file);
    this.metadata = frozenCopy(init.metadata);
    Object.freeze(this);
  }

  toProjection(): FilePartProjection {
    return { type: this.type, file: this.file.toProjection(), ...withMetadata(this.metadata) };
  }

  static fromProjection(raw: unknown): FilePart {
    const projection = parseProjection(FilePartSchema, raw, 'FilePart');
    return new FilePart({
      file: FileContent.fromProjection(projection.file),
      metadata: projection.metadata,
    });
  }
}

export class DataPart {
  readonly type = 'data' as const;
  readonly data: StructuredData;
  readonly metadata?: Metadata;

  constructor(init: { data: StructuredData; metadata?: Metadata }) {
    this.data = frozenCopy(init.data);
    this.metadata = frozenCopy(init.metadata);
    Object.freeze(this);
  }

  toProjection(): DataPartProjection {
    return { type: this.type, data: projectedCopy(this.data), ...withMetadata(this.metadata) };
  }

  static fromProjection(raw: unknown): DataPart {
    return new DataPart(parseProjection(DataPartSchema, raw, 'DataPart'));
  }
}

/** Content unit within messages and artifacts, discriminated by `type`. */
export type Part = TextPart | FilePart | DataPart;

export const Part = {
  /**
   * Build the variant named by the `type` discriminator.
   * @throws InvalidVariantError when `type` is missing or unknown.
   */
  fromProjection(raw: unknown): Part {
    const projection = canonicalizeKeys(raw);
    const type = isPlainObject(projection) ? projection.type : undefined;
    switch (type) {
      case 'text':
        return TextPart.fromProjection(projection);
      case 'file':
        return FilePart.fromProjection(projection);
      case 'data':
        return DataPart.fromProjection(projection);
      default:
        throw new InvalidVariantError('part', type);
    }
  },

  isPart(value: unknown): value is Part {
    return value instanceof TextPart || value instanceof FilePart || value instanceof DataPart;
  },

  /** Pass constructed parts through; build the rest from their projections. */
  from(value: Part | PartProjection): Part {
    return Part.isPart(value) ? value : Part.fromProjection(value);
  },
};
