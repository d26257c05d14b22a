import { frozenCopy } from '../projection/copy.js';
import { parseProjection } from '../projection/parse.js';
import { AgentSkillSchema } from '../projection/schemas.js';
import type { AgentSkillProjection } from '../types/agent-card.js';

/** A capability that the agent advertises on its card. */
export class AgentSkill {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly tags?: readonly string[];
  readonly examples?: readonly string[];
  readonly inputModes?: readonly string[];
  readonly outputModes?: readonly string[];

  constructor(init: AgentSkillProjection) {
    this.id = init.id;
    this.name = init.name;
    this.description = init.description;
    this.tags = frozenCopy(init.tags);
    this.examples = frozenCopy(init.examples);
    this.inputModes = frozenCopy(init.inputModes);
    this.outputModes = frozenCopy(init.outputModes);
    Object.freeze(this);
  }

  toProjection(): AgentSkillProjection {
    return {
      id: this.id,
      name: this.name,
      ...(this.description !== undefined ? { description: this.description } : {}),
      ...(this.tags !== undefined ? { tags: [...this.tags] } : {}),
      ...(this.examples !== undefined ? { examples: [...this.examples] } : {}),
      ...(this.inputModes !== undefined ? { inputModes: [...this.inputModes] } : {}),
      ...(this.outputModes !== undefined ? { outputModes: [...this.outputModes] } : {}),
    };
  }

  static fromProjection(raw: unknown): AgentSkill {
    return new AgentSkill(parseProjection(AgentSkillSchema, raw, 'AgentSkill'));
  }
}
