import type { Readable } from 'stream';
import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import type { Agent, AgentDirectory, InteractionDraft, InteractionRecord, UpstreamStatus } from '../types/index.js';
import { tierRank } from '../types/index.js';
import {
  AgentSuspendedError,
  ClientAbortedError,
  GuardError,
  UnknownAgentError,
  UnsupportedProviderError,
  UpstreamTimeoutError,
  UpstreamTransportError,
  describeCause
} from '../errors.js';
import { sha256 } from '../crypto/index.js';
import {
  detectCategories,
  detectMarkers,
  extractModel,
  extractRequestText,
  extractResponseText,
  extractToolCalls,
  extractUsage,
  mergeReports
} from '../detect/index.js';
import { classify, type Ruleset } from '../classify/index.js';
import type { AuditLedger } from '../ledger/index.js';
import {
  errorPayload,
  headerValue,
  type InboundHeaders,
  type ProviderAdapter,
  type ProviderShape,
  type UpstreamResponse
} from '../providers/index.js';
import type { AlertChannel } from './alerts.js';
import { CallState, type CallStage } from './call-state.js';
import { ResponseTee } from './tee.js';

export type ClientDisconnectPolicy = 'abort' | 'drain';

export interface InterceptorOptions {
  agentHeader: string;
  sessionHeader: string;
  timeoutMs: number;
  clientDisconnect: ClientDisconnectPolicy;
}

export interface InterceptorDeps {
  adapter: ProviderAdapter;
  agents: AgentDirectory;
  ledger: Pick<AuditLedger, 'append'>;
  ruleset: Ruleset;
  alerts: AlertChannel;
  logger: Logger;
  options: InterceptorOptions;
  clock?: () => number;
}

export interface ProxyCall {
  provider: string;
  path: string;
  method: string;
  query: string;
  headers: InboundHeaders;
  body: Buffer | undefined;
}

export interface AuditOutcome {
  stage: CallStage;
  record: InteractionRecord | null;
  failureReason?: string;
}

export interface ProxyResult {
  status: number;
  headers: Record<string, string>;
  body: Readable | string | null;
  audit: Promise<AuditOutcome>;
}

type AbortCause = 'timeout' | 'client';

interface Exchange {
  state: CallState;
  call: ProxyCall;
  agent: Agent;
  eventId: string;
  sessionId: string | null;
  startedAt: number;
  attempts: number;
  abortCause?: AbortCause;
}

interface Observation {
  // Clock reading when the upstream outcome was known
  finishedAt: number;
  upstreamStatus: UpstreamStatus;
  httpStatus: number | null;
  responseBody: Buffer | null;
  contentType: string | undefined;
}

const JSON_HEADERS = { 'content-type': 'application/json' };

const REJECT_STATUS: Partial<Record<GuardError['code'], number>> = {
  UNKNOWN_AGENT: 401,
  AGENT_SUSPENDED: 403,
  UNSUPPORTED_PROVIDER: 404
};

export class Interceptor {
  private adapter: ProviderAdapter;
  private agents: AgentDirectory;
  private ledger: Pick<AuditLedger, 'append'>;
  private ruleset: Ruleset;
  private alerts: AlertChannel;
  private logger: Logger;
  private options: InterceptorOptions;
  private clock: () => number;

  constructor(deps: InterceptorDeps) {
    this.adapter = deps.adapter;
    this.agents = deps.agents;
    this.ledger = deps.ledger;
    this.ruleset = deps.ruleset;
    this.alerts = deps.alerts;
    this.logger = deps.logger.child({ component: 'interceptor' });
    this.options = deps.options;
    this.clock = deps.clock ?? Date.now;
  }

  async handle(call: ProxyCall, context: { clientSignal?: AbortSignal } = {}): Promise<ProxyResult> {
    const state = new CallState();
    const shape: ProviderShape = this.adapter.shapeOf(call.provider) ?? 'openai';

    let agent: Agent;
    try {
      agent = await this.admit(call);
    } catch (err) {
      if (err instanceof GuardError && REJECT_STATUS[err.code] !== undefined) {
        return this.reject(state, call, err, shape);
      }
      throw err;
    }

    state.advance('forwarding');
    const exchange: Exchange = {
      state,
      call,
      agent,
      eventId: uuidv4(),
      sessionId: headerValue(call.headers, this.options.sessionHeader) ?? null,
      startedAt: this.clock(),
      attempts: 0
    };

    const controller = new AbortController();
    const clientSignal = context.clientSignal;

    const timer = setTimeout(() => {
      exchange.abortCause ??= 'timeout';
      controller.abort();
    }, this.options.timeoutMs);

    const onClientGone = (): void => {
      if (this.options.clientDisconnect === 'abort') {
        exchange.abortCause ??= 'client';
        controller.abort();
      }
    };
    if (clientSignal?.aborted) onClientGone();
    else clientSignal?.addEventListener('abort', onClientGone, { once: true });

    const release = (): void => {
      clearTimeout(timer);
      clientSignal?.removeEventListener('abort', onClientGone);
    };

    state.advance('awaiting_upstream');
    let upstream: UpstreamResponse;
    try {
      upstream = await this.adapter.forward(
        {
          ...call,
          onAttempt: (attempt) => {
            exchange.attempts = attempt;
          }
        },
        controller.signal
      );
    } catch (err) {
      const finishedAt = this.clock();
      release();
      return this.failBeforeHeaders(finishedAt, exchange, shape, err, exchange.abortCause ?? (clientSignal?.aborted ? 'client' : undefined));
    }

    const contentType = upstream.headers['content-type'];

    if (!upstream.body) {
      const finishedAt = this.clock();
      release();
      state.advance('capturing_response');
      state.advance('classifying');
      return {
        status: upstream.status,
        headers: upstream.headers,
        body: null,
        audit: this.settle(
          exchange,
          this.record(exchange, {
            finishedAt,
            upstreamStatus: upstream.status >= 400 ? 'http_error' : 'success',
            httpStatus: upstream.status,
            responseBody: Buffer.alloc(0),
            contentType
          })
        )
      };
    }

    state.advance('capturing_response');
    const tee = new ResponseTee(upstream.body, { client: clientSignal, upstream: controller.signal });

    const audit = tee.run().then((result) => {
      const finishedAt = this.clock();
      release();
      const clientGone = clientSignal?.aborted === true;

      let upstreamStatus: UpstreamStatus;
      if (exchange.abortCause === 'timeout') {
        upstreamStatus = 'timeout';
        tee.fail(new UpstreamTimeoutError(this.options.timeoutMs));
      } else if (exchange.abortCause === 'client' || clientGone) {
        upstreamStatus = 'aborted';
        tee.fail(new ClientAbortedError());
      } else if (result.error !== undefined) {
        upstreamStatus = 'transport_error';
        tee.fail(new UpstreamTransportError(call.provider, result.error));
      } else {
        upstreamStatus = upstream.status >= 400 ? 'http_error' : 'success';
        tee.finish();
      }

      state.advance('classifying');
      return this.record(exchange, {
        finishedAt,
        upstreamStatus,
        httpStatus: upstream.status,
        responseBody: result.captured,
        contentType
      });
    });

    return {
      status: upstream.status,
      headers: upstream.headers,
      body: tee.sink,
      audit: this.settle(exchange, audit)
    };
  }

  private async admit(call: ProxyCall): Promise<Agent> {
    const agentId = headerValue(call.headers, this.options.agentHeader)?.trim();
    if (!agentId) {
      throw new UnknownAgentError(undefined);
    }
    if (!this.adapter.has(call.provider)) {
      throw new UnsupportedProviderError(call.provider);
    }
    const agent = await this.agents.get(agentId);
    if (!agent) {
      throw new UnknownAgentError(agentId);
    }
    if (agent.status === 'suspended') {
      throw new AgentSuspendedError(agentId);
    }
    return agent;
  }

  // Rejected at admission: the upstream is never contacted and nothing is recorded
  private reject(state: CallState, call: ProxyCall, err: GuardError, shape: ProviderShape): ProxyResult {
    const status = REJECT_STATUS[err.code] ?? 400;
    state.fail(`rejected:${err.code}`);
    this.logger.info({ provider: call.provider, endpoint: call.path, code: err.code, status }, 'Call rejected');

    return {
      status,
      headers: { ...JSON_HEADERS },
      body: JSON.stringify(errorPayload(shape, status, err.code.toLowerCase(), err.message)),
      audit: Promise.resolve({ stage: state.stage, record: null, failureReason: state.failureReason })
    };
  }

  private failBeforeHeaders(
    finishedAt: number,
    exchange: Exchange,
    shape: ProviderShape,
    err: unknown,
    cause: AbortCause | undefined
  ): ProxyResult {
    let error: GuardError;
    let status: number;
    let upstreamStatus: UpstreamStatus;

    if (cause === 'timeout') {
      error = new UpstreamTimeoutError(this.options.timeoutMs);
      status = 504;
      upstreamStatus = 'timeout';
    } else if (cause === 'client') {
      error = new ClientAbortedError();
      status = 499;
      upstreamStatus = 'aborted';
    } else {
      error = err instanceof UpstreamTransportError ? err : new UpstreamTransportError(exchange.call.provider, err);
      status = 502;
      upstreamStatus = 'transport_error';
    }

    exchange.state.advance('classifying');
    const audit = this.record(exchange, { finishedAt, upstreamStatus, httpStatus: null, responseBody: null, contentType: undefined });

    return {
      status,
      headers: { ...JSON_HEADERS },
      body: JSON.stringify(errorPayload(shape, status, error.code.toLowerCase(), error.message)),
      audit: this.settle(exchange, audit)
    };
  }

  private async record(exchange: Exchange, observation: Observation): Promise<AuditOutcome> {
    const { state, call, agent } = exchange;

    const responseBody = observation.responseBody ?? undefined;
    const requestText = extractRequestText(call.body);
    const responseText = extractResponseText(responseBody, observation.contentType);
    const report = mergeReports(detectCategories(requestText), detectCategories(responseText));
    const model = extractModel(call.body) ?? extractModel(responseBody) ?? 'unknown';
    const classification = classify(this.ruleset, {
      categories: report.categories,
      provider: call.provider,
      model,
      agent,
      signals: { requestChars: requestText.length, responseMarkers: detectMarkers(responseText) }
    });
    const usage = extractUsage(responseBody, observation.contentType);

    const draft: InteractionDraft = {
      event_id: exchange.eventId,
      agent_id: agent.id,
      session_id: exchange.sessionId,
      timestamp: new Date(exchange.startedAt).toISOString(),
      provider: call.provider,
      endpoint_path: '/' + call.path.replace(/^\/+/, ''),
      method: call.method.toUpperCase(),
      model,
      request_hash: call.body && call.body.length > 0 ? sha256(call.body) : null,
      response_hash: observation.responseBody ? sha256(observation.responseBody) : null,
      detected_categories: report.categories,
      risk_tier: classification.risk_tier,
      triggered_flags: classification.triggered_flags,
      prompt_tokens: usage.prompt_tokens,
      response_tokens: usage.response_tokens,
      tool_calls: extractToolCalls(responseBody, observation.contentType),
      latency_ms: Math.max(0, observation.finishedAt - exchange.startedAt),
      upstream_status: observation.upstreamStatus,
      http_status: observation.httpStatus,
      attempts: exchange.attempts,
      ruleset_version: this.ruleset.version
    };

    state.advance('recording');
    let record: InteractionRecord | null = null;
    try {
      record = await this.ledger.append(draft);
    } catch (err) {
      await this.raiseAuditAlert(draft, err);
    }

    if (!record) {
      state.fail('ledger');
    } else if (observation.upstreamStatus !== 'success' && observation.upstreamStatus !== 'http_error') {
      state.fail(`upstream:${observation.upstreamStatus}`);
    } else {
      state.advance('completed');
    }

    const summary = {
      event_id: draft.event_id,
      agent_id: draft.agent_id,
      provider: draft.provider,
      endpoint: draft.endpoint_path,
      http_status: draft.http_status,
      upstream_status: draft.upstream_status,
      risk_tier: draft.risk_tier,
      flags: draft.triggered_flags,
      categories: draft.detected_categories,
      latency_ms: draft.latency_ms,
      prompt_tokens: draft.prompt_tokens,
      response_tokens: draft.response_tokens,
      tools: draft.tool_calls.map((t) => t.name),
      attempts: draft.attempts,
      record_id: record?.id ?? null
    };
    if (tierRank(draft.risk_tier) >= tierRank('high')) {
      this.logger.warn(summary, 'High-risk interaction');
    } else {
      this.logger.info(summary, 'Interaction processed');
    }

    return { stage: state.stage, record, failureReason: state.failureReason };
  }

  private async raiseAuditAlert(draft: InteractionDraft, err: unknown): Promise<void> {
    try {
      await this.alerts.send({
        code: 'AUDIT_WRITE_FAILED',
        severity: 'critical',
        message: `Audit record for agent ${draft.agent_id} was not written: ${describeCause(err)}`,
        agent_id: draft.agent_id,
        event_id: draft.event_id,
        timestamp: new Date(this.clock()).toISOString()
      });
    } catch (alertErr) {
      this.logger.error({ event_id: draft.event_id, err: describeCause(alertErr) }, 'Alert delivery failed');
    }
  }

  // The audit promise never rejects; callers may ignore it
  private settle(exchange: Exchange, audit: Promise<AuditOutcome>): Promise<AuditOutcome> {
    return audit.catch((err: unknown) => {
      this.logger.error({ event_id: exchange.eventId, stage: exchange.state.stage, err: describeCause(err) }, 'Audit pipeline failed');
      return { stage: exchange.state.stage, record: null, failureReason: 'internal' };
    });
  }
}
