/** Free-form object attached to parts, messages, artifacts and tasks. */
export type Metadata = Record<string, unknown>;

/** Structured payload carried by a data part: a JSON object or array. */
export type StructuredData = Record<string, unknown> | unknown[];
