import { parseProjection } from '../projection/parse.js';
import { AgentCardSchema } from '../projection/schemas.js';
import type {
  AgentAuthenticationProjection,
  AgentCapabilitiesProjection,
  AgentCardProjection,
  AgentProviderProjection,
  AgentSkillProjection,
} from '../types/agent-card.js';
import { AgentAuthentication } from './AgentAuthentication.js';
import { AgentCapabilities } from './AgentCapabilities.js';
import { AgentProvider } from './AgentProvider.js';
import { AgentSkill } from './AgentSkill.js';

export const DEFAULT_MODES: readonly string[] = ['text'];

export interface AgentCardInit {
  name: string;
  url: string;
  version: string;
  capabilities: AgentCapabilities | Partial<AgentCapabilitiesProjection>;
  skills: ReadonlyArray<AgentSkill | AgentSkillProjection>;
  description?: string;
  provider?: AgentProvider | AgentProviderProjection;
  documentationUrl?: string;
  authentication?: AgentAuthentication | AgentAuthenticationProjection;
  defaultInputModes?: readonly string[];
  defaultOutputModes?: readonly string[];
}

/**
 * Published metadata describing an agent, conventionally served at
 * `/.well-known/agent.json`. Built once per process and read-only after.
 */
export class AgentCard {
  readonly name: string;
  readonly url: string;
  readonly version: string;
  readonly capabilities: AgentCapabilities;
  readonly skills: readonly AgentSkill[];
  readonly description?: string;
  readonly provider?: AgentProvider;
  readonly documentationUrl?: string;
  readonly authentication?: AgentAuthentication;
  readonly defaultInputModes: readonly string[];
  readonly defaultOutputModes: readonly string[];

  constructor(init: AgentCardInit) {
    this.name = init.name;
    this.url = init.url;
    this.version = init.version;
    this.capabilities =
      init.capabilities instanceof AgentCapabilities
        ? init.capabilities
        : new AgentCapabilities(init.capabilities);
    this.skills = Object.freeze(
      init.skills.map((skill) => (skill instanceof AgentSkill ? skill : new AgentSkill(skill))),
    );
    this.description = init.description;
    if (init.provider !== undefined) {
      this.provider =
        init.provider instanceof AgentProvider ? init.provider : new AgentProvider(init.provider);
    }
    this.documentationUrl = init.documentationUrl;
    if (init.authentication !== undefined) {
      this.authentication =
        init.authentication instanceof AgentAuthentication
          ? init.authentication
          : new AgentAuthentication(init.authentication);
    }
    this.defaultInputModes = Object.freeze([...(init.defaultInputModes ?? DEFAULT_MODES)]);
    this.defaultOutputModes = Object.freeze([...(init.defaultOutputModes ?? DEFAULT_MODES)]);
    Object.freeze(this);
  }

  toProjection(): AgentCardProjection {
    return {
      name: this.name,
      ...(this.description !== undefined ? { description: this.description } : {}),
      url: this.url,
      ...(this.provider !== undefined ? { provider: this.provider.toProjection() } : {}),
      version: this.version,
      ...(this.documentationUrl !== undefined ? { documentationUrl: this.documentationUrl } : {}),
      capabilities: this.capabilities.toProjection(),
      ...(this.authentication !== undefined
        ? { authentication: this.authentication.toProjection() }
        : {}),
      defaultInputModes: [...this.defaultInputModes],
      defaultOutputModes: [...this.defaultOutputModes],
      skills: this.skills.map((skill) => skill.toProjection()),
    };
  }

  static fromProjection(raw: unknown): AgentCard {
    const projection = parseProjection(AgentCardSchema, raw, 'AgentCard');
    return new AgentCard({
      name: projection.name,
      description: projection.description,
      url: projection.url,
      provider:
        projection.provider !== undefined ? AgentProvider.fromProjection(projection.provider) : undefined,
      version: projection.version,
      documentationUrl: projection.documentationUrl,
      capabilities: AgentCapabilities.fromProjection(projection.capabilities),
      authentication:
        projection.authentication !== undefined
          ? AgentAuthentication.fromProjection(projection.authentication)
          : undefined,
      defaultInputModes: projection.defaultInputModes,
      defaultOutputModes: projection.defaultOutputModes,
      skills: projection.skills.map((skill) => AgentSkill.fromProjection(skill)),
    });
  }
}
