import { parseProjection } from '../projection/parse.js';
import { AgentAuthenticationSchema } from '../projection/schemas.js';
import type { AgentAuthenticationProjection } from '../types/agent-card.js';

/** Declares the schemes a caller must use; enforcing them is up to the transport. */
export class AgentAuthentication {
  readonly schemes: readonly string[];
  readonly credentials?: string;

  constructor(init: AgentAuthenticationProjection) {
    this.schemes = Object.freeze([...init.schemes]);
    this.credentials = init.credentials;
    Object.freeze(this);
  }

  toProjection(): AgentAuthenticationProjection {
    return {
      schemes: [...this.schemes],
      ...(this.credentials !== undefined ? { credentials: this.credentials } : {}),
    };
  }

  static fromProjection(raw: unknown): AgentAuthentication {
    return new AgentAuthentication(parseProjection(AgentAuthenticationSchema, raw, 'AgentAuthentication'));
  }
}
