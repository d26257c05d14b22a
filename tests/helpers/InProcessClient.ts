import { RequestDispatcher } from '../../src/agent/RequestDispatcher.js';
import { AgentCard } from '../../src/models/AgentCard.js';
import { type Clock, systemClock } from '../../src/models/clock.js';
import type { PushNotificationConfig } from '../../src/models/PushNotificationConfig.js';
import { Task } from '../../src/models/Task.js';
import { parseTaskUpdateEvent, type TaskUpdateEvent } from '../../src/protocol/events.js';
import { JsonRpcRequest } from '../../src/protocol/JsonRpcRequest.js';
import { JsonRpcResponse } from '../../src/protocol/JsonRpcResponse.js';
import {
  TaskPushNotificationConfig,
  type TaskIdParams,
  type TaskQueryParams,
  type TaskSendParams,
} from '../../src/protocol/params.js';
import type { A2AClient } from '../../src/types/client.js';
import type { MethodName, Projectable } from '../../src/types/jsonrpc.js';

/**
 * A2AClient that talks to a dispatcher in the same process. Every request
 * and response goes through JSON text, as it would over a transport.
 */
export class InProcessClient implements A2AClient {
  private nextId = 1;

  constructor(
    private readonly dispatcher: RequestDispatcher,
    private readonly clock: Clock = systemClock,
  ) {}

  async discover(): Promise<AgentCard> {
    return AgentCard.fromProjection(JSON.parse(JSON.stringify(this.dispatcher.agentCard())));
  }

  sendTask(params: TaskSendParams): Promise<Task> {
    return this.call('tasks/send', params, (raw) => Task.fromProjection(raw, this.clock));
  }

  sendTaskSubscribe(params: TaskSendParams): AsyncIterable<TaskUpdateEvent> {
    return this.stream('tasks/sendSubscribe', params);
  }

  getTask(params: TaskQueryParams): Promise<Task> {
    return this.call('tasks/get', params, (raw) => Task.fromProjection(raw, this.clock));
  }

  cancelTask(params: TaskIdParams): Promise<Task> {
    return this.call('tasks/cancel', params, (raw) => Task.fromProjection(raw, this.clock));
  }

  setPushNotification(taskId: string, config: PushNotificationConfig): Promise<TaskPushNotificationConfig> {
    const params = new TaskPushNotificationConfig({ id: taskId, pushNotificationConfig: config });
    return this.call('tasks/pushNotification/set', params, (raw) =>
      TaskPushNotificationConfig.fromProjection(raw),
    );
  }

  getPushNotification(params: TaskIdParams): Promise<TaskPushNotificationConfig> {
    return this.call('tasks/pushNotification/get', params, (raw) =>
      TaskPushNotificationConfig.fromProjection(raw),
    );
  }

  resubscribe(params: TaskQueryParams): AsyncIterable<TaskUpdateEvent> {
    return this.stream('tasks/resubscribe', params);
  }

  private async call<T>(method: MethodName, params: Projectable, parse: (raw: unknown) => T): Promise<T> {
    const request = new JsonRpcRequest({ id: this.nextId++, method, params });
    const body = await this.dispatcher.dispatchBody(JSON.stringify(request.toProjection()));
    if (body === undefined) {
      throw new Error(`No response to ${method}`);
    }
    return JsonRpcResponse.fromProjection(JSON.parse(body)).unwrap(parse);
  }

  private async *stream(method: MethodName, params: Projectable): AsyncGenerator<TaskUpdateEvent> {
    const request = new JsonRpcRequest({ id: this.nextId++, method, params });
    const payload: unknown = JSON.parse(JSON.stringify(request.toProjection()));
    for await (const response of this.dispatcher.dispatchStream(payload)) {
      const received = JsonRpcResponse.fromProjection(JSON.parse(JSON.stringify(response.toProjection())));
      yield received.unwrap((raw) => parseTaskUpdateEvent(raw, this.clock));
    }
  }
}
