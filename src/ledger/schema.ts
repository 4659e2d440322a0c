import { z } from 'zod';
import { RISK_TIERS } from '../types/index.js';

const hex64 = z.string().regex(/^[0-9a-f]{64}$/);

export const interactionRecordSchema = z.object({
  id: z.number().int().positive(),
  event_id: z.string().min(1),
  agent_id: z.string().min(1),
  session_id: z.string().nullable(),
  timestamp: z.string(),
  provider: z.string(),
  endpoint_path: z.string(),
  method: z.string(),
  model: z.string(),
  request_hash: hex64.nullable(),
  response_hash: hex64.nullable(),
  detected_categories: z.array(z.string()),
  risk_tier: z.enum(RISK_TIERS),
  triggered_flags: z.array(z.string()),
  prompt_tokens: z.number().int().nonnegative().nullable(),
  response_tokens: z.number().int().nonnegative().nullable(),
  tool_calls: z.array(z.object({ id: z.string().nullable(), name: z.string() })),
  latency_ms: z.number().nonnegative(),
  upstream_status: z.enum(['success', 'http_error', 'timeout', 'transport_error', 'aborted']),
  http_status: z.number().int().nullable(),
  attempts: z.number().int().nonnegative(),
  ruleset_version: z.string(),
  prev_chain_hash: hex64,
  chain_hash: hex64,
  signature: z.string().optional()
});
