import { parseProjection } from '../projection/parse.js';
import { PushNotificationConfigSchema } from '../projection/schemas.js';
import type { AgentAuthenticationProjection } from '../types/agent-card.js';
import type { PushNotificationConfigProjection } from '../types/payloads.js';
import { AgentAuthentication } from './AgentAuthentication.js';

export interface PushNotificationConfigInit {
  url: string;
  token?: string;
  authentication?: AgentAuthentication | AgentAuthenticationProjection;
}

export class PushNotificationConfig {
  readonly url: string;
  readonly token?: string;
  readonly authentication?: AgentAuthentication;

  constructor(init: PushNotificationConfigInit) {
    this.url = init.url;
    this.token = init.token;
    if (init.authentication !== undefined) {
      this.authentication =
        init.authentication instanceof AgentAuthentication
          ? init.authentication
          : new AgentAuthentication(init.authentication);
    }
    Object.freeze(this);
  }

  toProjection(): PushNotificationConfigProjection {
    return {
      url: this.url,
      ...(this.token !== undefined ? { token: this.token } : {}),
      ...(this.authentication !== undefined
        ? { authentication: this.authentication.toProjection() }
        : {}),
    };
  }

  static fromProjection(raw: unknown): PushNotificationConfig {
    const projection = parseProjection(PushNotificationConfigSchema, raw, 'PushNotificationConfig');
    return new PushNotificationConfig({
      url: projection.url,
      token: projection.token,
      authentication:
        projection.authentication !== undefined
          ? AgentAuthentication.fromProjection(projection.authentication)
          : undefined,
    });
  }
}
