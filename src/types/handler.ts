import type { AgentCard } from '../models/AgentCard.js';
import type { Clock } from '../models/clock.js';
import type { Task } from '../models/Task.js';
import type {
  TaskIdParams,
  TaskPushNotificationConfig,
  TaskQueryParams,
  TaskSendParams,
} from '../protocol/params.js';
import type { TaskUpdateEvent } from '../protocol/events.js';
import type { JsonRpcRequest } from '../protocol/JsonRpcRequest.js';
import type { TaskStore } from './plugin.js';

/** Maps request-response methods to their params and result types. */
export interface UnaryMethodMap {
  'tasks/send': { params: TaskSendParams; result: Task };
  'tasks/get': { params: TaskQueryParams; result: Task };
  'tasks/cancel': { params: TaskIdParams; result: Task };
  'tasks/pushNotification/set': { params: TaskPushNotificationConfig; result: TaskPushNotificationConfig };
  'tasks/pushNotification/get': { params: TaskIdParams; result: TaskPushNotificationConfig };
}

/** Maps streaming methods to their params and the events they yield. */
export interface StreamMethodMap {
  'tasks/sendSubscribe': { params: TaskSendParams; event: TaskUpdateEvent };
  'tasks/resubscribe': { params: TaskQueryParams; event: TaskUpdateEvent };
}

export type UnaryMethod = keyof UnaryMethodMap;
export type StreamMethod = keyof StreamMethodMap;

/** Context passed to every handler. */
export interface HandlerContext {
  /** The inbound request, already structurally validated. */
  request: JsonRpcRequest;
  card: AgentCard;
  /** The task store, if configured. */
  taskStore?: TaskStore;
  clock: Clock;
}

/** Request-response handler for a specific method. */
export type MethodHandler<M extends UnaryMethod> = (
  params: UnaryMethodMap[M]['params'],
  context: HandlerContext,
) => Promise<UnaryMethodMap[M]['result']> | UnaryMethodMap[M]['result'];

/** Streaming handler: yields events until the stream ends. */
export type StreamMethodHandler<M extends StreamMethod> = (
  params: StreamMethodMap[M]['params'],
  context: HandlerContext,
) => AsyncIterable<StreamMethodMap[M]['event']>;
