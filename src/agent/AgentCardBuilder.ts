import { ValidationError } from '../errors/ValidationError.js';
import { AgentCard, type AgentCardInit } from '../models/AgentCard.js';
import type {
  AgentAuthenticationProjection,
  AgentCapabilitiesProjection,
  AgentProviderProjection,
  AgentSkillProjection,
} from '../types/agent-card.js';

/** Fluent builder for constructing an AgentCard. */
export class AgentCardBuilder {
  private readonly card: Partial<AgentCardInit> = {};
  private readonly skills: AgentSkillProjection[] = [];

  name(name: string): this {
    this.card.name = name;
    return this;
  }

  description(description: string): this {
    this.card.description = description;
    return this;
  }

  url(url: string): this {
    this.card.url = url;
    return this;
  }

  version(version: string): this {
    this.card.version = version;
    return this;
  }

  capabilities(caps: Partial<AgentCapabilitiesProjection>): this {
    this.card.capabilities = caps;
    return this;
  }

  skill(skill: AgentSkillProjection): this {
    this.skills.push(skill);
    return this;
  }

  defaultInputModes(modes: string[]): this {
    this.card.defaultInputModes = modes;
    return this;
  }

  defaultOutputModes(modes: string[]): this {
    this.card.defaultOutputModes = modes;
    return this;
  }

  provider(provider: AgentProviderProjection): this {
    this.card.provider = provider;
    return this;
  }

  authentication(authentication: AgentAuthenticationProjection): this {
    this.card.authentication = authentication;
    return this;
  }

  documentationUrl(url: string): this {
    this.card.documentationUrl = url;
    return this;
  }

  /** Build the AgentCard, validating that all required fields are set. */
  build(): AgentCard {
    const { name, url, version } = this.card;
    const missing: string[] = [];
    if (!name) missing.push('name');
    if (!url) missing.push('url');
    if (!version) missing.push('version');
    if (this.skills.length === 0) missing.push('skills');

    if (!name || !url || !version || missing.length > 0) {
      throw new ValidationError(
        `AgentCard missing required fields: ${missing.join(', ')}`,
        missing.map((path) => ({ path, message: 'Required' })),
      );
    }

    return new AgentCard({
      ...this.card,
      name,
      url,
      version,
      capabilities: this.card.capabilities ?? {},
      skills: this.skills,
    });
  }
}
