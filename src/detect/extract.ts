import { decodeText } from './detector.js';

// Keys whose values carry model-visible text in OpenAI and Anthropic payloads
const TEXT_KEYS = new Set([
  'content',
  'text',
  'prompt',
  'input',
  'system',
  'instructions',
  'arguments',
  'partial_json',
  'refusal',
  'thinking'
]);

// Keys that describe structure rather than content, even below a text key
const STRUCTURAL_KEYS = new Set(['type', 'role', 'id', 'model', 'object', 'index', 'name', 'tool_call_id', 'cache_control', 'signature']);

function collectText(value: unknown, inText: boolean, out: string[]): void {
  if (typeof value === 'string') {
    if (inText && value.length > 0) out.push(value);
    return;
  }
  if (Array.isArray(value)) {
    for (const item of value) collectText(item, inText, out);
    return;
  }
  if (value !== null && typeof value === 'object') {
    for (const [key, child] of Object.entries(value)) {
      if (STRUCTURAL_KEYS.has(key)) continue;
      collectText(child, inText || TEXT_KEYS.has(key), out);
    }
  }
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function isEventStream(contentType: string | undefined): boolean {
  return contentType !== undefined && contentType.toLowerCase().includes('text/event-stream');
}

// Request bodies: chat messages, system prompts and legacy prompts; tool definitions are skipped
export function extractRequestText(body: Uint8Array | undefined): string {
  if (!body || body.length === 0) return '';
  const text = decodeText(body);
  if (text === null) return '';

  const parsed = parseJson(text);
  if (!parsed.ok) return text;

  const out: string[] = [];
  if (parsed.value !== null && typeof parsed.value === 'object' && !Array.isArray(parsed.value)) {
    for (const [key, child] of Object.entries(parsed.value)) {
      if (key === 'messages' || TEXT_KEYS.has(key)) collectText(child, true, out);
    }
  } else {
    collectText(parsed.value, true, out);
  }
  return out.join('\n');
}

function* streamData(text: string): Generator<string> {
  for (const line of text.split(/\r?\n/)) {
    if (!line.startsWith('data:')) continue;
    const data = line.slice(5).trim();
    if (data.length > 0 && data !== '[DONE]') yield data;
  }
}

// SSE frames are reassembled in order so that a value split across deltas is scanned whole
export function extractStreamText(text: string): string {
  const out: string[] = [];
  for (const data of streamData(text)) {
    const parsed = parseJson(data);
    if (parsed.ok) {
      collectText(parsed.value, false, out);
    } else {
      out.push(data);
    }
  }
  return out.join('');
}

export function extractResponseText(body: Uint8Array | undefined, contentType?: string): string {
  if (!body || body.length === 0) return '';
  const text = decodeText(body);
  if (text === null) return '';

  if (isEventStream(contentType)) {
    return extractStreamText(text);
  }

  const parsed = parseJson(text);
  if (!parsed.ok) return text;

  const out: string[] = [];
  collectText(parsed.value, false, out);
  return out.join('\n');
}

export function extractModel(body: Uint8Array | undefined): string | undefined {
  if (!body || body.length === 0) return undefined;
  const text = decodeText(body);
  if (text === null) return undefined;
  const parsed = parseJson(text);
  if (!parsed.ok || parsed.value === null || typeof parsed.value !== 'object') return undefined;
  const model: unknown = Reflect.get(parsed.value, 'model');
  return typeof model === 'string' && model.length > 0 ? model : undefined;
}

// Parsed JSON documents of a body: one for a plain response, one per event for a stream
export function payloadObjects(body: Uint8Array | undefined, contentType?: string): unknown[] {
  if (!body || body.length === 0) return [];
  const text = decodeText(body);
  if (text === null) return [];

  if (isEventStream(contentType)) {
    const out: unknown[] = [];
    for (const data of streamData(text)) {
      const parsed = parseJson(data);
      if (parsed.ok) out.push(parsed.value);
    }
    return out;
  }

  const parsed = parseJson(text);
  return parsed.ok ? [parsed.value] : [];
}
