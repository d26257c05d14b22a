import { parseProjection } from '../projection/parse.js';
import { AgentProviderSchema } from '../projection/schemas.js';
import type { AgentProviderProjection } from '../types/agent-card.js';

export class AgentProvider {
  readonly organization: string;
  readonly url?: string;

  constructor(init: AgentProviderProjection) {
    this.organization = init.organization;
    this.url = init.url;
    Object.freeze(this);
  }

  toProjection(): AgentProviderProjection {
    return {
      organization: this.organization,
      ...(this.url !== undefined ? { url: this.url } : {}),
    };
  }

  static fromProjection(raw: unknown): AgentProvider {
    return new AgentProvider(parseProjection(AgentProviderSchema, raw, 'AgentProvider'));
  }
}
