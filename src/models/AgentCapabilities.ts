import { parseProjection } from '../projection/parse.js';
import { AgentCapabilitiesSchema } from '../projection/schemas.js';
import type { AgentCapabilitiesProjection } from '../types/agent-card.js';

export class AgentCapabilities {
  readonly streaming: boolean;
  readonly pushNotifications: boolean;
  readonly stateTransitionHistory: boolean;

  constructor(init: Partial<AgentCapabilitiesProjection> = {}) {
    this.streaming = init.streaming ?? false;
    this.pushNotifications = init.pushNotifications ?? false;
    this.stateTransitionHistory = init.stateTransitionHistory ?? false;
    Object.freeze(this);
  }

  toProjection(): AgentCapabilitiesProjection {
    return {
      streaming: this.streaming,
      pushNotifications: this.pushNotifications,
      stateTransitionHistory: this.stateTransitionHistory,
    };
  }

  static fromProjection(raw: unknown): AgentCapabilities {
    return new AgentCapabilities(parseProjection(AgentCapabilitiesSchema, raw, 'AgentCapabilities'));
  }
}
