/** Optional feature flags for an agent. Always serialized with all three flags. */
export interface AgentCapabilitiesProjection {
  streaming: boolean;
  pushNotifications: boolean;
  stateTransitionHistory: boolean;
}

/** A capability that the agent provides. */
export interface AgentSkillProjection {
  id: string;
  name: string;
  description?: string;
  tags?: string[];
  examples?: string[];
  inputModes?: string[];
  outputModes?: string[];
}

/** Organization operating the agent. */
export interface AgentProviderProjection {
  organization: string;
  url?: string;
}

/** Authentication schemes accepted by the agent. */
export interface AgentAuthenticationProjection {
  schemes: string[];
  credentials?: string;
}

/** Describes an agent's identity, capabilities, and how to communicate with it. */
export interface AgentCardProjection {
  name: string;
  description?: string;
  url: string;
  provider?: AgentProviderProjection;
  version: string;
  documentationUrl?: string;
  capabilities: AgentCapabilitiesProjection;
  authentication?: AgentAuthenticationProjection;
  defaultInputModes: string[];
  defaultOutputModes: string[];
  skills: AgentSkillProjection[];
}

/** Where an agent serves its card for discovery. */
export const AGENT_CARD_PATH = '/.well-known/agent.json';
