import type { Metadata, StructuredData } from './json.js';

/** Discriminator carried by every part on the wire. */
export type PartType = 'text' | 'file' | 'data';

/** File payload: inline base64 bytes or a URI, never both. */
export interface FileContentProjection {
  name?: string;
  mimeType?: string;
  bytes?: string;
  uri?: string;
}

/** Part containing plain text. */
export interface TextPartProjection {
  type: 'text';
  text: string;
  metadata?: Metadata;
}

/** Part carrying a file inline or by reference. */
export interface FilePartProjection {
  type: 'file';
  file: FileContentProjection;
  metadata?: Metadata;
}

/** Part containing structured JSON data. */
export interface DataPartProjection {
  type: 'data';
  data: StructuredData;
  metadata?: Metadata;
}

/** Content unit within messages and artifacts. */
export type PartProjection = TextPartProjection | FilePartProjection | DataPartProjection;
