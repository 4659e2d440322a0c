import { Readable } from 'stream';
import { setTimeout as sleep } from 'timers/promises';
import type { Logger } from 'pino';
import { UpstreamTransportError, UnsupportedProviderError, describeCause } from '../errors.js';
import type { GuardConfig } from '../config.js';
import { buildUpstreamHeaders, relayHeaders, type InboundHeaders, type ProviderShape } from './shapes.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface ProviderEndpoint {
  name: string;
  baseUrl: string;
  shape: ProviderShape;
  apiKey?: string;
}

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface ForwardRequest {
  provider: string;
  path: string;
  method: string;
  query: string;
  headers: InboundHeaders;
  body: Buffer | undefined;
  onAttempt?: (attempt: number) => void;
}

export interface UpstreamResponse {
  status: number;
  headers: Record<string, string>;
  body: Readable | null;
  attempts: number;
}

export interface ProviderAdapterOptions {
  providers: ProviderEndpoint[];
  retry: RetryPolicy;
  proxyHeaders?: string[];
  fetchImpl?: FetchLike;
  logger?: Logger;
}

export function endpointsFromConfig(config: GuardConfig, env: NodeJS.ProcessEnv = process.env): ProviderEndpoint[] {
  return Object.entries(config.providers).map(([name, provider]) => {
    const endpoint: ProviderEndpoint = { name, baseUrl: provider.base_url, shape: provider.shape };
    const apiKey = provider.api_key_env ? env[provider.api_key_env] : undefined;
    if (apiKey) endpoint.apiKey = apiKey;
    return endpoint;
  });
}

export class ProviderAdapter {
  private providers: Map<string, ProviderEndpoint> = new Map();
  private retry: RetryPolicy;
  private proxyHeaders: ReadonlySet<string>;
  private fetchImpl: FetchLike;
  private logger: Logger | undefined;

  constructor(options: ProviderAdapterOptions) {
    for (const provider of options.providers) {
      this.providers.set(provider.name, provider);
    }
    this.retry = options.retry;
    this.proxyHeaders = new Set((options.proxyHeaders ?? []).map((h) => h.toLowerCase()));
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger?.child({ component: 'provider-adapter' });
  }

  has(provider: string): boolean {
    return this.providers.has(provider);
  }

  shapeOf(provider: string): ProviderShape | undefined {
    return this.providers.get(provider)?.shape;
  }

  getAvailableProviders(): string[] {
    return Array.from(this.providers.keys());
  }

  // Connection failures and 5xx are retried here, before a single byte reaches the caller
  async forward(request: ForwardRequest, signal?: AbortSignal): Promise<UpstreamResponse> {
    const endpoint = this.providers.get(request.provider);
    if (!endpoint) {
      throw new UnsupportedProviderError(request.provider);
    }

    const url = this.buildUrl(endpoint, request);
    const headers = buildUpstreamHeaders(endpoint.shape, request.headers, this.proxyHeaders, endpoint.apiKey);
    const method = request.method.toUpperCase();
    const init: RequestInit = { method, headers, redirect: 'manual' };
    if (request.body && method !== 'GET' && method !== 'HEAD') {
      init.body = request.body;
    }
    if (signal) {
      init.signal = signal;
    }

    for (let attempt = 1; ; attempt++) {
      let response: Response;
      request.onAttempt?.(attempt);
      try {
        response = await this.fetchImpl(url, init);
      } catch (err) {
        if (signal?.aborted) throw err;
        if (attempt > this.retry.maxRetries) {
          throw new UpstreamTransportError(endpoint.name, err);
        }
        this.logger?.warn({ provider: endpoint.name, attempt, err: describeCause(err) }, 'Upstream transport failure, retrying');
        await this.backoff(attempt, signal);
        continue;
      }

      if (response.status >= 500 && attempt <= this.retry.maxRetries) {
        this.logger?.warn({ provider: endpoint.name, attempt, status: response.status }, 'Upstream 5xx, retrying');
        await response.body?.cancel();
        await this.backoff(attempt, signal);
        continue;
      }

      return {
        status: response.status,
        headers: relayHeaders(response.headers),
        body: response.body ? Readable.fromWeb(response.body) : null,
        attempts: attempt
      };
    }
  }

  private buildUrl(endpoint: ProviderEndpoint, request: ForwardRequest): string {
    const base = endpoint.baseUrl.replace(/\/+$/, '');
    const path = request.path.replace(/^\/+/, '');
    return request.query ? `${base}/${path}?${request.query}` : `${base}/${path}`;
  }

  private async backoff(attempt: number, signal?: AbortSignal): Promise<void> {
    const delay = Math.min(this.retry.baseDelayMs * 2 ** (attempt - 1), this.retry.maxDelayMs);
    if (delay > 0) {
      await sleep(delay, undefined, signal ? { signal } : undefined);
    }
  }
}
