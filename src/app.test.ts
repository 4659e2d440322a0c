import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { FastifyInstance } from 'fastify';
import { buildApp } from './app.js';
import { parseConfig } from './config.js';
import { StaticAgentDirectory } from './agents/directory.js';
import { loadRuleset } from './classify/index.js';
import { FileLedger } from './ledger/index.js';
import { ProviderAdapter, type FetchLike } from './providers/index.js';
import { Interceptor, LogAlertChannel } from './proxy/index.js';
import { AuditTracker } from './routes/proxy.js';
import { silentLogger } from './logger.js';

const completion = { id: 'chatcmpl-1', choices: [{ index: 0, message: { role: 'assistant', content: 'Noted.' } }] };

describe('HTTP surface', () => {
  let dir: string;
  let app: FastifyInstance;
  let tracker: AuditTracker;
  let sentBodies: Array<RequestInit['body']>;

  async function start(raw: Record<string, unknown>): Promise<FastifyInstance> {
    const config = parseConfig(raw, 'test');
    const logger = silentLogger();
    const agents = new StaticAgentDirectory([
      {
        id: 'agent-a',
        name: 'Support bot',
        registered_at: '2025-01-01T00:00:00.000Z',
        status: 'active',
        regulation_scope: ['EU_AI_ACT'],
        human_oversight: false
      }
    ]);
    const ruleset = loadRuleset();
    const ledger = new FileLedger({ directory: dir, agents, logger });
    const fetchImpl: FetchLike = async (_url, init) => {
      sentBodies.push(init.body);
      return new Response(JSON.stringify(completion), { status: 200, headers: { 'content-type': 'application/json' } });
    };
    const adapter = new ProviderAdapter({
      providers: [
        { name: 'openai', baseUrl: 'https://upstream.test', shape: 'openai' },
        { name: 'anthropic', baseUrl: 'https://anthropic.test', shape: 'anthropic' }
      ],
      retry: { maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0 },
      proxyHeaders: ['x-agent-id', 'x-session-id'],
      fetchImpl
    });
    const interceptor = new Interceptor({
      adapter,
      agents,
      ledger,
      ruleset,
      alerts: new LogAlertChannel(logger),
      logger,
      options: { agentHeader: 'x-agent-id', sessionHeader: 'x-session-id', timeoutMs: 1000, clientDisconnect: 'abort' }
    });

    tracker = new AuditTracker();
    return buildApp({ config, interceptor, adapter, ledger, agents, ruleset, logger, tracker });
  }

  async function restart(raw: Record<string, unknown>): Promise<void> {
    await app.close();
    app = await start(raw);
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'agentguard-app-'));
    sentBodies = [];
    app = await start({ proxy: { timeout_ms: 1000 } });
  });

  afterEach(async () => {
    await app.close();
    await rm(dir, { recursive: true, force: true });
  });

  function chat(content: string, headers: Record<string, string> = { 'x-agent-id': 'agent-a' }) {
    return app.inject({
      method: 'POST',
      url: '/proxy/openai/v1/chat/completions',
      headers: { 'content-type': 'application/json', ...headers },
      payload: JSON.stringify({ model: 'gpt-4o', messages: [{ role: 'user', content }] })
    });
  }

  it('proxies a call and exposes its audit record', async () => {
    const response = await chat('My SSN is 123-45-6789');
    await tracker.flush();

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe(JSON.stringify(completion));

    const audit = await app.inject({ method: 'GET', url: '/api/audit/agent-a' });
    expect(audit.statusCode).toBe(200);
    const listing = audit.json();
    expect(listing.count).toBe(1);
    expect(listing.records[0]).toMatchObject({
      id: 1,
      agent_id: 'agent-a',
      risk_tier: 'high',
      detected_categories: ['national_id'],
      upstream_status: 'success'
    });

    const verify = await app.inject({ method: 'GET', url: '/api/audit/agent-a/verify' });
    expect(verify.json()).toMatchObject({ agent_id: 'agent-a', valid: true, records: 1, errors: [] });
  });

  it('forwards bodies of any content type unchanged', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/proxy/openai/v1/completions',
      headers: { 'content-type': 'text/plain', 'x-agent-id': 'agent-a' },
      payload: 'raw prompt text'
    });
    await tracker.flush();

    expect(response.statusCode).toBe(200);
    expect(sentBodies).toHaveLength(1);
    expect(Buffer.isBuffer(sentBodies[0])).toBe(true);
    expect(String(sentBodies[0])).toBe('raw prompt text');
  });

  it('rejects calls without an agent header and writes nothing', async () => {
    const response = await chat('hello', {});
    await tracker.flush();

    expect(response.statusCode).toBe(401);
    expect(response.json().error.code).toBe('unknown_agent');
    expect(sentBodies).toHaveLength(0);

    const audit = await app.inject({ method: 'GET', url: '/api/audit/agent-a' });
    expect(audit.json().count).toBe(0);
  });

  it('lists records filtered by tier', async () => {
    await chat('hello');
    await chat('My SSN is 123-45-6789');
    await tracker.flush();

    const audit = await app.inject({ method: 'GET', url: '/api/audit/agent-a?min_tier=high' });
    const listing = audit.json();

    expect(listing.count).toBe(1);
    expect(listing.records[0].id).toBe(2);
  });

  it('validates audit queries', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/audit/agent-a?min_tier=severe' });

    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe('invalid_request');
  });

  it('answers 404 for unknown agents on the audit API', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/audit/nobody/verify' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'unknown_agent', agent_id: 'nobody' });
  });

  it('reports health', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/health' });

    expect(response.json()).toEqual({
      status: 'healthy',
      version: '1.0.0',
      providers: ['openai', 'anthropic'],
      ruleset_version: '2025.2',
      agents: 1
    });
  });

  it('never rate limits proxied agent traffic', async () => {
    await restart({ rate_limits: { requests_per_minute: 2 } });

    const statuses: number[] = [];
    for (let i = 0; i < 3; i++) {
      statuses.push((await chat('hello')).statusCode);
    }
    await tracker.flush();

    expect(statuses).toEqual([200, 200, 200]);
    const audit = await app.inject({ method: 'GET', url: '/api/audit/agent-a' });
    expect(audit.json().count).toBe(3);
  });

  it('rate limits the read API with its own error code', async () => {
    await restart({ rate_limits: { requests_per_minute: 2 } });

    await app.inject({ method: 'GET', url: '/api/health' });
    await app.inject({ method: 'GET', url: '/api/health' });
    const limited = await app.inject({ method: 'GET', url: '/api/health' });

    expect(limited.statusCode).toBe(429);
    expect(limited.json().error).toBe('rate_limited');
  });

  it('refuses oversized proxy bodies in the provider error shape', async () => {
    await restart({ proxy: { max_body_bytes: 2048 } });

    const response = await chat('x'.repeat(4096));

    expect(response.statusCode).toBe(413);
    expect(response.json()).toEqual({
      error: { message: 'Request body is too large', type: 'invalid_request_error', param: null, code: 'request_too_large' }
    });
    expect(sentBodies).toHaveLength(0);
  });

  it('uses the Anthropic error shape for oversized Anthropic bodies', async () => {
    await restart({ proxy: { max_body_bytes: 64 } });

    const response = await app.inject({
      method: 'POST',
      url: '/proxy/anthropic/v1/messages',
      headers: { 'content-type': 'application/json', 'x-agent-id': 'agent-a' },
      payload: JSON.stringify({ model: 'claude-3-5-sonnet', messages: [{ role: 'user', content: 'y'.repeat(200) }] })
    });

    expect(response.statusCode).toBe(413);
    expect(response.json()).toEqual({
      type: 'error',
      error: { type: 'request_too_large', message: 'Request body is too large [request_too_large]' }
    });
  });

  it('offers no way to change records', async () => {
    const response = await app.inject({ method: 'DELETE', url: '/api/audit/agent-a' });

    expect(response.statusCode).toBe(404);
  });
});
