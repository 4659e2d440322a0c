import type { RiskTier } from './record.js';

export type AgentStatus = 'active' | 'suspended';

export interface Agent {
  id: string;
  name: string;
  registered_at: string;
  status: AgentStatus;
  use_case?: string;
  risk_level?: RiskTier;
  regulation_scope: string[];
  human_oversight: boolean;
}

// Read-only view the core has of the registration collaborator
export interface AgentDirectory {
  get(agentId: string): Promise<Agent | undefined>;
  list(): Promise<Agent[]>;
}
