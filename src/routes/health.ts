import type { FastifyInstance } from 'fastify';
import type { AgentDirectory } from '../types/index.js';
import type { ProviderAdapter } from '../providers/index.js';
import type { Ruleset } from '../classify/index.js';

export const VERSION = '1.0.0';

export async function healthRoutes(
  app: FastifyInstance,
  deps: { adapter: ProviderAdapter; agents: AgentDirectory; ruleset: Ruleset }
): Promise<void> {
  app.get('/api/health', async () => {
    const agents = await deps.agents.list();
    return {
      status: 'healthy',
      version: VERSION,
      providers: deps.adapter.getAvailableProviders(),
      ruleset_version: deps.ruleset.version,
      agents: agents.length
    };
  });
}
