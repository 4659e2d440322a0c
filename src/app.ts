import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import type { Logger } from 'pino';
import type { AgentDirectory } from './types/index.js';
import type { GuardConfig } from './config.js';
import type { Ruleset } from './classify/index.js';
import type { AuditReader } from './ledger/index.js';
import { errorPayload, type ProviderAdapter } from './providers/index.js';
import type { Interceptor } from './proxy/index.js';
import { AuditTracker, proxyRoutes } from './routes/proxy.js';
import { auditRoutes } from './routes/audit.js';
import { healthRoutes } from './routes/health.js';

export interface AppDeps {
  config: GuardConfig;
  interceptor: Interceptor;
  adapter: ProviderAdapter;
  ledger: AuditReader;
  agents: AgentDirectory;
  ruleset: Ruleset;
  logger: Logger;
  tracker?: AuditTracker;
}

const PROXY_PATH = /^\/proxy\/([^/?]+)\//;

function apiErrorCode(status: number, code: string | undefined): string {
  if (status === 429) return 'rate_limited';
  if (status >= 500) return 'internal_error';
  return code ?? 'bad_request';
}

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const { config, logger } = deps;
  const tracker = deps.tracker ?? new AuditTracker();

  const app = Fastify({ logger: false, bodyLimit: config.proxy.max_body_bytes });

  await app.register(cors, {
    origin: config.auth.allowed_origins,
    credentials: true
  });

  // Read API only; the proxy route opts out in its route config
  await app.register(rateLimit, {
    max: config.rate_limits.requests_per_minute,
    timeWindow: '1 minute'
  });

  app.setErrorHandler((error, request, reply) => {
    const status = error.statusCode ?? 500;
    if (status >= 500) {
      logger.error({ err: error, method: request.method, url: request.url }, 'Request failed');
    }
    const message = status >= 500 ? 'Internal error' : error.message;

    // Errors raised by Fastify itself on a proxy route, e.g. an oversized body
    const provider = PROXY_PATH.exec(request.url)?.[1];
    if (provider !== undefined) {
      const shape = deps.adapter.shapeOf(provider) ?? 'openai';
      reply.status(status).send(errorPayload(shape, status, status === 413 ? 'request_too_large' : 'proxy_error', message));
      return;
    }

    reply.status(status).send({ error: apiErrorCode(status, error.code), message });
  });

  await app.register(healthRoutes, { adapter: deps.adapter, agents: deps.agents, ruleset: deps.ruleset });
  await app.register(auditRoutes, { ledger: deps.ledger, agents: deps.agents });
  await app.register(proxyRoutes, { interceptor: deps.interceptor, tracker });

  // Records still being written are flushed before the server goes away
  app.addHook('onClose', async () => {
    if (tracker.size > 0) {
      logger.info({ pending: tracker.size }, 'Waiting for audit records');
      await tracker.flush();
    }
  });

  return app;
}
