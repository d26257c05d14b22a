import type { AgentCard } from '../models/AgentCard.js';
import type { Task } from '../models/Task.js';
import type { PushNotificationConfig } from '../models/PushNotificationConfig.js';
import type { TaskUpdateEvent } from '../protocol/events.js';
import type {
  TaskIdParams,
  TaskPushNotificationConfig,
  TaskQueryParams,
  TaskSendParams,
} from '../protocol/params.js';

/**
 * What a client of an A2A agent offers. Transports (HTTP + SSE, in-process,
 * ...) implement this; none is bundled here.
 */
export interface A2AClient {
  /** Fetch the agent's card from its well-known path. */
  discover(): Promise<AgentCard>;
  sendTask(params: TaskSendParams): Promise<Task>;
  sendTaskSubscribe(params: TaskSendParams): AsyncIterable<TaskUpdateEvent>;
  getTask(params: TaskQueryParams): Promise<Task>;
  cancelTask(params: TaskIdParams): Promise<Task>;
  setPushNotification(
    taskId: string,
    config: PushNotificationConfig,
  ): Promise<TaskPushNotificationConfig>;
  getPushNotification(params: TaskIdParams): Promise<TaskPushNotificationConfig>;
  resubscribe(params: TaskQueryParams): AsyncIterable<TaskUpdateEvent>;
}
