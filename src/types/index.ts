export type { Agent, AgentDirectory, AgentStatus } from './agent.js';
export type { InteractionRecord, InteractionDraft, RiskTier, ToolCallRef, UpstreamStatus } from './record.js';
export { RISK_TIERS, tierRank, maxTier } from './record.js';
