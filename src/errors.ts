export type GuardErrorCode =
  | 'UNKNOWN_AGENT'
  | 'AGENT_SUSPENDED'
  | 'UNSUPPORTED_PROVIDER'
  | 'UPSTREAM_TRANSPORT'
  | 'UPSTREAM_TIMEOUT'
  | 'CLIENT_ABORTED'
  | 'STORAGE_UNAVAILABLE'
  | 'INVALID_REFERENCE'
  | 'INVALID_CONFIG';

export class GuardError extends Error {
  constructor(
    message: string,
    public readonly code: GuardErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GuardError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnknownAgentError extends GuardError {
  constructor(agentId: string | undefined) {
    super(agentId ? `Unknown agent: ${agentId}` : 'Missing agent identifier', 'UNKNOWN_AGENT');
    this.name = 'UnknownAgentError';
  }
}

export class AgentSuspendedError extends GuardError {
  constructor(agentId: string) {
    super(`Agent ${agentId} is suspended`, 'AGENT_SUSPENDED');
    this.name = 'AgentSuspendedError';
  }
}

export class UnsupportedProviderError extends GuardError {
  constructor(provider: string) {
    super(`Unsupported provider: ${provider}`, 'UNSUPPORTED_PROVIDER');
    this.name = 'UnsupportedProviderError';
  }
}

export class UpstreamTransportError extends GuardError {
  constructor(provider: string, cause: unknown) {
    super(`Transport failure calling ${provider}: ${describeCause(cause)}`, 'UPSTREAM_TRANSPORT', { cause });
    this.name = 'UpstreamTransportError';
  }
}

export class UpstreamTimeoutError extends GuardError {
  constructor(public readonly timeoutMs: number) {
    super(`Upstream did not complete within ${timeoutMs}ms`, 'UPSTREAM_TIMEOUT');
    this.name = 'UpstreamTimeoutError';
  }
}

export class ClientAbortedError extends GuardError {
  constructor() {
    super('Caller disconnected before the upstream response completed', 'CLIENT_ABORTED');
    this.name = 'ClientAbortedError';
  }
}

export class StorageUnavailableError extends GuardError {
  constructor(detail: string, cause?: unknown) {
    super(`Audit storage unavailable: ${detail}`, 'STORAGE_UNAVAILABLE', { cause });
    this.name = 'StorageUnavailableError';
  }
}

export class InvalidReferenceError extends GuardError {
  constructor(agentId: string) {
    super(`Record references unknown agent ${agentId}`, 'INVALID_REFERENCE');
    this.name = 'InvalidReferenceError';
  }
}

export class InvalidConfigError extends GuardError {
  constructor(source: string, detail: string) {
    super(`Invalid configuration in ${source}: ${detail}`, 'INVALID_CONFIG');
    this.name = 'InvalidConfigError';
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    if ('code' in cause && typeof cause.code === 'string') {
      return `${cause.message} (${cause.code})`;
    }
    return cause.message;
  }
  return String(cause);
}
