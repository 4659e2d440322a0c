import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { RISK_TIERS, type AgentDirectory } from '../types/index.js';
import type { AuditReader } from '../ledger/index.js';
import { StorageUnavailableError } from '../errors.js';

const paramsSchema = z.object({
  agentId: z.string().min(1).max(256)
});

const listQuerySchema = z
  .object({
    from_id: z.coerce.number().int().positive().optional(),
    to_id: z.coerce.number().int().positive().optional(),
    since: z.string().datetime({ offset: true }).optional(),
    until: z.string().datetime({ offset: true }).optional(),
    min_tier: z.enum(RISK_TIERS).optional(),
    limit: z.coerce.number().int().min(1).max(1000).default(100)
  })
  .strict();

function issues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'query'}: ${issue.message}`);
}

// Read-only views over the ledger; nothing here writes or deletes a record
export async function auditRoutes(app: FastifyInstance, deps: { ledger: AuditReader; agents: AgentDirectory }): Promise<void> {
  app.get('/api/audit/:agentId', async (request, reply) => {
    const params = paramsSchema.safeParse(request.params);
    const query = listQuerySchema.safeParse(request.query);
    if (!params.success || !query.success) {
      reply.status(400);
      return {
        error: 'invalid_request',
        details: [...(params.success ? [] : issues(params.error)), ...(query.success ? [] : issues(query.error))]
      };
    }

    const { agentId } = params.data;
    if (!(await deps.agents.get(agentId))) {
      reply.status(404);
      return { error: 'unknown_agent', agent_id: agentId };
    }

    const q = query.data;
    try {
      const records = await deps.ledger.read(agentId, {
        fromId: q.from_id,
        toId: q.to_id,
        since: q.since,
        until: q.until,
        minTier: q.min_tier,
        limit: q.limit
      });
      return { agent_id: agentId, count: records.length, records };
    } catch (err) {
      if (err instanceof StorageUnavailableError) {
        reply.status(503);
        return { error: 'storage_unavailable', message: err.message };
      }
      throw err;
    }
  });

  app.get('/api/audit/:agentId/verify', async (request, reply) => {
    const params = paramsSchema.safeParse(request.params);
    if (!params.success) {
      reply.status(400);
      return { error: 'invalid_request', details: issues(params.error) };
    }

    const { agentId } = params.data;
    if (!(await deps.agents.get(agentId))) {
      reply.status(404);
      return { error: 'unknown_agent', agent_id: agentId };
    }

    try {
      return await deps.ledger.inspect(agentId);
    } catch (err) {
      if (err instanceof StorageUnavailableError) {
        reply.status(503);
        return { error: 'storage_unavailable', message: err.message };
      }
      throw err;
    }
  });
}
