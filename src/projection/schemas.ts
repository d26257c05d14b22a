/**
 * Structural schemas for one level of each wire projection.
 *
 * Nested entities are checked only for being objects (or arrays of
 * objects) here; their own `fromProjection` validates them, so key
 * canonicalization and error messages stay per entity. Invariants that
 * span fields (role set, state set, bytes/uri exclusivity) live in the
 * constructors, not here.
 */
import { z } from 'zod';

/** Optional on the wire; `null` is read as absent. */
export function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

const metadata = z.record(z.unknown());
const nested = z.record(z.unknown());
const strings = z.array(z.string());
const jsonRpcId = z.union([z.string(), z.number()]);

/** ISO-8601 date-time with `Z` or a numeric offset, e.g. `2025-01-15T10:30:00Z`. */
export const IsoTimestampSchema = z.string().datetime({ offset: true });

// ---------- parts ----------

export const FileContentSchema = z.object({
  name: optional(z.string()),
  mimeType: optional(z.string()),
  bytes: optional(z.string()),
  uri: optional(z.string()),
});

export const TextPartSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
  metadata: optional(metadata),
});

export const FilePartSchema = z.object({
  type: z.literal('file'),
  file: nested,
  metadata: optional(metadata),
});

export const DataPartSchema = z.object({
  type: z.literal('data'),
  data: z.union([z.record(z.unknown()), z.array(z.unknown())]),
  metadata: optional(metadata),
});

// ---------- messages, artifacts, tasks ----------

export const MessageSchema = z.object({
  role: z.string(),
  parts: z.array(nested),
  metadata: optional(metadata),
});

export const ArtifactSchema = z.object({
  name: optional(z.string()),
  description: optional(z.string()),
  parts: z.array(nested),
  index: optional(z.number().int()),
  append: optional(z.boolean()),
  lastChunk: optional(z.boolean()),
  metadata: optional(metadata),
});

export const TaskStatusSchema = z.object({
  state: z.string(),
  message: optional(nested),
  timestamp: optional(IsoTimestampSchema),
});

export const TaskSchema = z.object({
  id: z.string(),
  sessionId: optional(z.string()),
  status: nested,
  artifacts: optional(z.array(nested)),
  metadata: optional(metadata),
});

// ---------- agent metadata ----------

export const AgentCapabilitiesSchema = z.object({
  streaming: optional(z.boolean()),
  pushNotifications: optional(z.boolean()),
  stateTransitionHistory: optional(z.boolean()),
});

export const AgentSkillSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: optional(z.string()),
  tags: optional(strings),
  examples: optional(strings),
  inputModes: optional(strings),
  outputModes: optional(strings),
});

export const AgentProviderSchema = z.object({
  organization: z.string(),
  url: optional(z.string()),
});

export const AgentAuthenticationSchema = z.object({
  schemes: strings,
  credentials: optional(z.string()),
});

export const AgentCardSchema = z.object({
  name: z.string(),
  description: optional(z.string()),
  url: z.string(),
  provider: optional(nested),
  version: z.string(),
  documentationUrl: optional(z.string()),
  capabilities: nested,
  authentication: optional(nested),
  defaultInputModes: optional(strings),
  defaultOutputModes: optional(strings),
  skills: z.array(nested),
});

export const PushNotificationConfigSchema = z.object({
  url: z.string(),
  token: optional(z.string()),
  authentication: optional(nested),
});

// ---------- method params ----------

const taskIdentity = {
  id: optional(z.string()),
  taskId: optional(z.string()),
};

/** Task id under its canonical key `id`, or the `taskId` spelling some clients send. */
function requireTaskId<T extends { id?: string; taskId?: string }>(params: T, ctx: z.RefinementCtx) {
  const { taskId, ...rest } = params;
  const id = params.id ?? taskId;
  if (id === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['id'], message: 'Required' });
    return z.NEVER;
  }
  return { ...rest, id };
}

export const TaskIdParamsSchema = z
  .object({ ...taskIdentity, metadata: optional(metadata) })
  .transform(requireTaskId);

export const TaskQueryParamsSchema = z
  .object({
    ...taskIdentity,
    historyLength: optional(z.number().int().nonnegative()),
    metadata: optional(metadata),
  })
  .transform(requireTaskId);

export const TaskSendParamsSchema = z
  .object({
    ...taskIdentity,
    sessionId: optional(z.string()),
    message: nested,
    historyLength: optional(z.number().int().nonnegative()),
    pushNotification: optional(nested),
    metadata: optional(metadata),
  })
  .transform(requireTaskId);

export const TaskPushNotificationConfigSchema = z
  .object({ ...taskIdentity, pushNotificationConfig: nested })
  .transform(requireTaskId);

// ---------- streaming events ----------

export const TaskStatusUpdateEventSchema = z.object({
  id: z.string(),
  status: nested,
  final: optional(z.boolean()),
  metadata: optional(metadata),
});

export const TaskArtifactUpdateEventSchema = z.object({
  id: z.string(),
  artifact: nested,
  metadata: optional(metadata),
});

// ---------- JSON-RPC envelope ----------

export const JsonRpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown(),
});

export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: optional(jsonRpcId),
  method: z.string().min(1),
  params: optional(z.union([z.record(z.unknown()), z.array(z.unknown())])),
});

export const JsonRpcResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: optional(jsonRpcId),
  result: z.unknown(),
  error: optional(nested),
});
