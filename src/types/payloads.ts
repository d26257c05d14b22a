import type { Metadata } from './json.js';
import type { MessageProjection } from './message.js';
import type { TaskStatusProjection } from './task.js';
import type { ArtifactProjection } from './artifact.js';
import type { AgentAuthenticationProjection } from './agent-card.js';

// ---------- push notifications ----------

/** Where and how an agent should deliver task updates out of band. */
export interface PushNotificationConfigProjection {
  url: string;
  token?: string;
  authentication?: AgentAuthenticationProjection;
}

// ---------- tasks/get, tasks/cancel, tasks/pushNotification/get ----------

export interface TaskIdParamsProjection {
  id: string;
  metadata?: Metadata;
}

export interface TaskQueryParamsProjection extends TaskIdParamsProjection {
  historyLength?: number;
}

// ---------- tasks/send, tasks/sendSubscribe ----------

export interface TaskSendParamsProjection {
  id: string;
  sessionId?: string;
  message: MessageProjection;
  historyLength?: number;
  pushNotification?: PushNotificationConfigProjection;
  metadata?: Metadata;
}

// ---------- tasks/pushNotification/set ----------

export interface TaskPushNotificationConfigProjection {
  id: string;
  pushNotificationConfig: PushNotificationConfigProjection;
}

// ---------- streaming events ----------

export interface TaskStatusUpdateEventProjection {
  id: string;
  status: TaskStatusProjection;
  final: boolean;
  metadata?: Metadata;
}

export interface TaskArtifactUpdateEventProjection {
  id: string;
  artifact: ArtifactProjection;
  metadata?: Metadata;
}
