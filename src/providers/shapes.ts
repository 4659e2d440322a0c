export type ProviderShape = 'openai' | 'anthropic';

export type InboundHeaders = Record<string, string | string[] | undefined>;

const DEFAULT_ANTHROPIC_VERSION = '2023-06-01';

// Never forwarded: hop-by-hop, recomputed by the HTTP client, or meant for the proxy only
const HOP_BY_HOP = new Set([
  'host',
  'connection',
  'keep-alive',
  'proxy-authorization',
  'proxy-authenticate',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'content-length',
  'accept-encoding',
  'expect'
]);

// The HTTP client decodes compressed bodies, so length and encoding no longer describe what is relayed
const RESPONSE_DROP = new Set(['connection', 'keep-alive', 'transfer-encoding', 'content-encoding', 'content-length', 'trailer', 'upgrade']);

export function headerValue(headers: InboundHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  if (Array.isArray(value)) return value.join(', ');
  return value;
}

export function buildUpstreamHeaders(
  shape: ProviderShape,
  inbound: InboundHeaders,
  proxyHeaders: ReadonlySet<string>,
  apiKey?: string
): Record<string, string> {
  const headers: Record<string, string> = {};

  for (const [rawName, rawValue] of Object.entries(inbound)) {
    const name = rawName.toLowerCase();
    if (rawValue === undefined || HOP_BY_HOP.has(name) || proxyHeaders.has(name)) continue;
    headers[name] = Array.isArray(rawValue) ? rawValue.join(', ') : rawValue;
  }

  if (apiKey) {
    delete headers['authorization'];
    delete headers['x-api-key'];
    if (shape === 'anthropic') {
      headers['x-api-key'] = apiKey;
    } else {
      headers['authorization'] = `Bearer ${apiKey}`;
    }
  }

  if (shape === 'anthropic' && !headers['anthropic-version']) {
    headers['anthropic-version'] = DEFAULT_ANTHROPIC_VERSION;
  }

  return headers;
}

export function relayHeaders(upstream: Headers): Record<string, string> {
  const headers: Record<string, string> = {};
  upstream.forEach((value, name) => {
    if (!RESPONSE_DROP.has(name.toLowerCase())) headers[name.toLowerCase()] = value;
  });
  return headers;
}

function errorType(status: number, shape: ProviderShape): string {
  switch (status) {
    case 401:
      return 'authentication_error';
    case 403:
      return 'permission_error';
    case 404:
      return shape === 'anthropic' ? 'not_found_error' : 'invalid_request_error';
    case 413:
      return shape === 'anthropic' ? 'request_too_large' : 'invalid_request_error';
    case 504:
      return shape === 'anthropic' ? 'timeout_error' : 'timeout';
    default:
      return 'api_error';
  }
}

// Proxy-originated errors in the shape the caller's SDK already parses
export function errorPayload(shape: ProviderShape, status: number, code: string, message: string): object {
  if (shape === 'anthropic') {
    return { type: 'error', error: { type: errorType(status, shape), message: `${message} [${code}]` } };
  }
  return { error: { message, type: errorType(status, shape), param: null, code } };
}
