import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import type { Agent, AgentDirectory } from '../types/index.js';
import { agentListSchema, type AgentConfig, type GuardConfig } from '../config.js';
import { InvalidConfigError } from '../errors.js';

export class StaticAgentDirectory implements AgentDirectory {
  private agents: ReadonlyMap<string, Agent>;

  constructor(agents: Agent[]) {
    const byId = new Map<string, Agent>();
    for (const agent of agents) {
      byId.set(agent.id, Object.freeze({ ...agent, regulation_scope: [...agent.regulation_scope] }));
    }
    this.agents = byId;
  }

  async get(agentId: string): Promise<Agent | undefined> {
    return this.agents.get(agentId);
  }

  async list(): Promise<Agent[]> {
    return Array.from(this.agents.values());
  }
}

function toAgent(entry: AgentConfig): Agent {
  const agent: Agent = {
    id: entry.id,
    name: entry.name,
    registered_at: entry.registered_at,
    status: entry.status,
    regulation_scope: entry.regulation_scope,
    human_oversight: entry.human_oversight
  };
  if (entry.use_case !== undefined) agent.use_case = entry.use_case;
  if (entry.risk_level !== undefined) agent.risk_level = entry.risk_level;
  return agent;
}

export function readAgentFile(path: string): Agent[] {
  const result = agentListSchema.safeParse(parseYaml(readFileSync(path, 'utf-8')) ?? {});
  if (!result.success) {
    const detail = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new InvalidConfigError(path, detail);
  }
  return result.data.agents.map(toAgent);
}

// Registry file entries win over inline config entries with the same id
export function loadAgentDirectory(config: GuardConfig): StaticAgentDirectory {
  const agents = config.agents.map(toAgent);
  if (config.registry.file) {
    agents.push(...readAgentFile(config.registry.file));
  }
  return new StaticAgentDirectory(agents);
}
