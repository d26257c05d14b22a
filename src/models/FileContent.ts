import { ValidationError } from '../errors/ValidationError.js';
import { parseProjection } from '../projection/parse.js';
import { FileContentSchema } from '../projection/schemas.js';
import type { FileContentProjection } from '../types/part.js';

/** File payload of a file part: base64 `bytes` inline, or a `uri` to fetch. Never both. */
export class FileContent {
  readonly name?: string;
  readonly mimeType?: string;
  readonly bytes?: string;
  readonly uri?: string;

  constructor(init: FileContentProjection) {
    if ((init.bytes === undefined) === (init.uri === undefined)) {
      throw new ValidationError('FileContent must provide exactly one of bytes or uri', [
        { path: '', message: 'Exactly one of bytes or uri is required' },
      ]);
    }
    this.name = init.name;
    this.mimeType = init.mimeType;
    this.bytes = init.bytes;
    this.uri = init.uri;
    Object.freeze(this);
  }

  toProjection(): FileContentProjection {
    return {
      ...(this.name !== undefined ? { name: this.name } : {}),
      ...(this.mimeType !== undefined ? { mimeType: this.mimeType } : {}),
      ...(this.bytes !== undefined ? { bytes: this.bytes } : {}),
      ...(this.uri !== undefined ? { uri: this.uri } : {}),
    };
  }

  static fromProjection(raw: unknown): FileContent {
    return new FileContent(parseProjection(FileContentSchema, raw, 'FileContent'));
  }
}
