import type { InteractionDraft, InteractionRecord, RiskTier } from '../types/index.js';

export interface ReadRange {
  fromId?: number;
  toId?: number;
  since?: string;
  until?: string;
  minTier?: RiskTier;
  limit?: number;
}

export interface ChainVerification {
  agent_id: string;
  valid: boolean;
  records: number;
  head: string;
  errors: string[];
}

export interface AuditLedger {
  append(draft: InteractionDraft): Promise<InteractionRecord>;
  read(agentId: string, range?: ReadRange): Promise<InteractionRecord[]>;
  verify(agentId: string): Promise<boolean>;
  inspect(agentId: string): Promise<ChainVerification>;
}

// What downstream consumers (reports, dashboards) get: no write path
export type AuditReader = Pick<AuditLedger, 'read' | 'verify' | 'inspect'>;
