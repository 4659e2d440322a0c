export const RISK_TIERS = ['minimal', 'limited', 'high', 'unacceptable'] as const;

export type RiskTier = (typeof RISK_TIERS)[number];

export type UpstreamStatus = 'success' | 'http_error' | 'timeout' | 'transport_error' | 'aborted';

// Name and id of a tool the model asked to call; arguments are never kept
export interface ToolCallRef {
  id: string | null;
  name: string;
}

export interface InteractionRecord {
  id: number;
  event_id: string;
  agent_id: string;
  session_id: string | null;
  timestamp: string;
  provider: string;
  endpoint_path: string;
  method: string;
  model: string;
  request_hash: string | null;
  response_hash: string | null;
  detected_categories: string[];
  risk_tier: RiskTier;
  triggered_flags: string[];
  prompt_tokens: number | null;
  response_tokens: number | null;
  tool_calls: ToolCallRef[];
  latency_ms: number;
  upstream_status: UpstreamStatus;
  http_status: number | null;
  attempts: number;
  ruleset_version: string;
  prev_chain_hash: string;
  chain_hash: string;
  signature?: string;
}

// What the Interceptor hands to the ledger; sequence and chain fields are the ledger's
export type InteractionDraft = Omit<InteractionRecord, 'id' | 'prev_chain_hash' | 'chain_hash' | 'signature'>;

export function tierRank(tier: RiskTier): number {
  return RISK_TIERS.indexOf(tier);
}

export function maxTier(a: RiskTier, b: RiskTier): RiskTier {
  return tierRank(a) >= tierRank(b) ? a : b;
}
