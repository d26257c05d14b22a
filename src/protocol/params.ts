import { frozenCopy, projectedCopy } from '../projection/copy.js';
import { parseProjection } from '../projection/parse.js';
import {
  TaskIdParamsSchema,
  TaskPushNotificationConfigSchema,
  TaskQueryParamsSchema,
  TaskSendParamsSchema,
} from '../projection/schemas.js';
import { Message } from '../models/Message.js';
import {
  PushNotificationConfig,
  type PushNotificationConfigInit,
} from '../models/PushNotificationConfig.js';
import type { Metadata } from '../types/json.js';
import type { MessageProjection } from '../types/message.js';
import type {
  TaskIdParamsProjection,
  TaskPushNotificationConfigProjection,
  TaskQueryParamsProjection,
  TaskSendParamsProjection,
} from '../types/payloads.js';

function toPushNotificationConfig(
  config: PushNotificationConfig | PushNotificationConfigInit,
): PushNotificationConfig {
  return config instanceof PushNotificationConfig ? config : new PushNotificationConfig(config);
}

// ---------- tasks/cancel, tasks/pushNotification/get ----------

export class TaskIdParams {
  readonly id: string;
  readonly metadata?: Metadata;

  constructor(init: TaskIdParamsProjection) {
    this.id = init.id;
    this.metadata = frozenCopy(init.metadata);
    Object.freeze(this);
  }

  toProjection(): TaskIdParamsProjection {
    return {
      id: this.id,
      ...(this.metadata !== undefined ? { metadata: projectedCopy(this.metadata) } : {}),
    };
  }

  static fromProjection(raw: unknown): TaskIdParams {
    return new TaskIdParams(parseProjection(TaskIdParamsSchema, raw, 'TaskIdParams'));
  }
}

// ---------- tasks/get, tasks/resubscribe ----------

export class TaskQueryParams {
  readonly id: string;
  /** How many trailing history messages the caller wants back. */
  readonly historyLength?: number;
  readonly metadata?: Metadata;

  constructor(init: TaskQueryParamsProjection) {
    this.id = init.id;
    this.historyLength = init.historyLength;
    this.metadata = frozenCopy(init.metadata);
    Object.freeze(this);
  }

  toProjection(): TaskQueryParamsProjection {
    return {
      id: this.id,
      ...(this.historyLength !== undefined ? { historyLength: this.historyLength } : {}),
      ...(this.metadata !== undefined ? { metadata: projectedCopy(this.metadata) } : {}),
    };
  }

  static fromProjection(raw: unknown): TaskQueryParams {
    return new TaskQueryParams(parseProjection(TaskQueryParamsSchema, raw, 'TaskQueryParams'));
  }
}

// ---------- tasks/send, tasks/sendSubscribe ----------

export interface TaskSendParamsInit {
  id: string;
  message: Message | MessageProjection;
  sessionId?: string;
  historyLength?: number;
  pushNotification?: PushNotificationConfig | PushNotificationConfigInit;
  metadata?: Metadata;
}

export class TaskSendParams {
  readonly id: string;
  readonly message: Message;
  readonly sessionId?: string;
  readonly historyLength?: number;
  readonly pushNotification?: PushNotificationConfig;
  readonly metadata?: Metadata;

  constructor(init: TaskSendParamsInit) {
    this.id = init.id;
    this.message = init.message instanceof Message ? init.message : Message.fromProjection(init.message);
    this.sessionId = init.sessionId;
    this.historyLength = init.historyLength;
    if (init.pushNotification !== undefined) {
      this.pushNotification = toPushNotificationConfig(init.pushNotification);
    }
    this.metadata = frozenCopy(init.metadata);
    Object.freeze(this);
  }

  toProjection(): TaskSendParamsProjection {
    return {
      id: this.id,
      ...(this.sessionId !== undefined ? { sessionId: this.sessionId } : {}),
      message: this.message.toProjection(),
      ...(this.historyLength !== undefined ? { historyLength: this.historyLength } : {}),
      ...(this.pushNotification !== undefined
        ? { pushNotification: this.pushNotification.toProjection() }
        : {}),
      ...(this.metadata !== undefined ? { metadata: projectedCopy(this.metadata) } : {}),
    };
  }

  static fromProjection(raw: unknown): TaskSendParams {
    const projection = parseProjection(TaskSendParamsSchema, raw, 'TaskSendParams');
    return new TaskSendParams({
      id: projection.id,
      sessionId: projection.sessionId,
      message: Message.fromProjection(projection.message),
      historyLength: projection.historyLength,
      pushNotification:
        projection.pushNotification !== undefined
          ? PushNotificationConfig.fromProjection(projection.pushNotification)
          : undefined,
      metadata: projection.metadata,
    });
  }
}

// ---------- tasks/pushNotification/set, tasks/pushNotification/get result ----------

export class TaskPushNotificationConfig {
  readonly id: string;
  readonly pushNotificationConfig: PushNotificationConfig;

  constructor(init: {
    id: string;
    pushNotificationConfig: PushNotificationConfig | PushNotificationConfigInit;
  }) {
    this.id = init.id;
    this.pushNotificationConfig = toPushNotificationConfig(init.pushNotificationConfig);
    Object.freeze(this);
  }

  toProjection(): TaskPushNotificationConfigProjection {
    return { id: this.id, pushNotificationConfig: this.pushNotificationConfig.toProjection() };
  }

  static fromProjection(raw: unknown): TaskPushNotificationConfig {
    const projection = parseProjection(
      TaskPushNotificationConfigSchema,
      raw,
      'TaskPushNotificationConfig',
    );
    return new TaskPushNotificationConfig({
      id: projection.id,
      pushNotificationConfig: PushNotificationConfig.fromProjection(projection.pushNotificationConfig),
    });
  }
}
