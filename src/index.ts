// Models
export { FileContent } from './models/FileContent.js';
export { Part, TextPart, FilePart, DataPart } from './models/Part.js';
export { TaskState, TASK_STATES, isTaskStateValue } from './models/TaskState.js';
export { isLegalTransition, nextStates } from './models/lifecycle.js';
export { Message, MESSAGE_ROLES, isMessageRole } from './models/Message.js';
export type { MessageInit } from './models/Message.js';
export { Artifact } from './models/Artifact.js';
export type { ArtifactInit } from './models/Artifact.js';
export { TaskStatus } from './models/TaskStatus.js';
export type { TaskStatusInit } from './models/TaskStatus.js';
export { Task } from './models/Task.js';
export type { TaskInit, TransitionOptions } from './models/Task.js';
export { AgentCapabilities } from './models/AgentCapabilities.js';
export { AgentSkill } from './models/AgentSkill.js';
export { AgentProvider } from './models/AgentProvider.js';
export { AgentAuthentication } from './models/AgentAuthentication.js';
export { AgentCard, DEFAULT_MODES } from './models/AgentCard.js';
export type { AgentCardInit } from './models/AgentCard.js';
export { PushNotificationConfig } from './models/PushNotificationConfig.js';
export type { PushNotificationConfigInit } from './models/PushNotificationConfig.js';
export { systemClock, fixedClock, isoTimestamp } from './models/clock.js';
export type { Clock } from './models/clock.js';

// Protocol
export { JsonRpcRequest } from './protocol/JsonRpcRequest.js';
export type { JsonRpcRequestInit } from './protocol/JsonRpcRequest.js';
export { JsonRpcResponse } from './protocol/JsonRpcResponse.js';
export type { JsonRpcResponseInit } from './protocol/JsonRpcResponse.js';
export { JsonRpcError } from './protocol/JsonRpcError.js';
export {
  TaskIdParams,
  TaskQueryParams,
  TaskSendParams,
  TaskPushNotificationConfig,
} from './protocol/params.js';
export type { TaskSendParamsInit } from './protocol/params.js';
export {
  TaskStatusUpdateEvent,
  TaskArtifactUpdateEvent,
  parseTaskUpdateEvent,
} from './protocol/events.js';
export type { TaskUpdateEvent } from './protocol/events.js';

// Errors
export { ValidationError, InvalidVariantError } from './errors/ValidationError.js';
export type { ValidationIssue } from './errors/ValidationError.js';
export {
  ProtocolError,
  JsonParseError,
  InvalidRequestError,
  MethodNotFoundError,
  InvalidParamsError,
  InternalError,
  TaskNotFoundError,
  TaskNotCancelableError,
  PushNotificationNotSupportedError,
  UnsupportedOperationError,
} from './errors/ProtocolError.js';

// Projection
export { canonicalizeKeys, toCamelKey } from './projection/keys.js';

// Types
export type { Metadata, StructuredData } from './types/json.js';

export type {
  PartType,
  FileContentProjection,
  TextPartProjection,
  FilePartProjection,
  DataPartProjection,
  PartProjection,
} from './types/part.js';

export type { MessageRole, MessageProjection } from './types/message.js';
export type { ArtifactProjection } from './types/artifact.js';
export type { TaskStateValue, TaskStatusProjection, TaskProjection } from './types/task.js';

export type {
  AgentCapabilitiesProjection,
  AgentSkillProjection,
  AgentProviderProjection,
  AgentAuthenticationProjection,
  AgentCardProjection,
} from './types/agent-card.js';
export { AGENT_CARD_PATH } from './types/agent-card.js';

export type { ErrorCode, JsonRpcErrorData } from './types/errors.js';
export { ErrorCodes } from './types/errors.js';

export type {
  JsonRpcId,
  JsonRpcParams,
  MethodName,
  JsonRpcRequestProjection,
  JsonRpcResponseProjection,
  Projectable,
} from './types/jsonrpc.js';
export { JSONRPC_VERSION, METHODS, isJsonRpcParams, isProjectable } from './types/jsonrpc.js';

export type {
  PushNotificationConfigProjection,
  TaskIdParamsProjection,
  TaskQueryParamsProjection,
  TaskSendParamsProjection,
  TaskPushNotificationConfigProjection,
  TaskStatusUpdateEventProjection,
  TaskArtifactUpdateEventProjection,
} from './types/payloads.js';

export type { Logger, TaskStore } from './types/plugin.js';

export type {
  UnaryMethodMap,
  StreamMethodMap,
  UnaryMethod,
  StreamMethod,
  HandlerContext,
  MethodHandler,
  StreamMethodHandler,
} from './types/handler.js';

export type { A2AClient } from './types/client.js';

// Stores
export { InMemoryTaskStore } from './stores/InMemoryTaskStore.js';

// Agent
export { AgentCardBuilder } from './agent/AgentCardBuilder.js';
export { RequestDispatcher } from './agent/RequestDispatcher.js';
export type { RequestDispatcherConfig } from './agent/RequestDispatcher.js';
