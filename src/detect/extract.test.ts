import { describe, it, expect } from 'vitest';
import { extractModel, extractRequestText, extractResponseText, extractStreamText } from './extract.js';

const json = (value: unknown): Buffer => Buffer.from(JSON.stringify(value));

describe('extractRequestText', () => {
  it('collects message content and skips tool definitions', () => {
    const body = json({
      model: 'gpt-4o',
      messages: [
        { role: 'user', content: 'hello' },
        { role: 'assistant', content: [{ type: 'text', text: 'world' }] }
      ],
      tools: [{ type: 'function', function: { name: 'lookup', description: 'SSN 123-45-6789' } }]
    });

    expect(extractRequestText(body)).toBe('hello\nworld');
  });

  it('includes the system prompt', () => {
    const body = json({ system: 'be brief', messages: [{ role: 'user', content: 'hi' }] });

    expect(extractRequestText(body)).toBe('be brief\nhi');
  });

  it('returns non-JSON text as is', () => {
    expect(extractRequestText(Buffer.from('plain prompt'))).toBe('plain prompt');
  });

  it('returns nothing for binary bodies', () => {
    expect(extractRequestText(Buffer.from([0xff, 0x00, 0x01]))).toBe('');
    expect(extractRequestText(undefined)).toBe('');
  });
});

describe('extractStreamText', () => {
  it('joins OpenAI deltas so split values are scanned whole', () => {
    const stream = [
      'data: {"choices":[{"index":0,"delta":{"content":"123-45"}}]}',
      '',
      'data: {"choices":[{"index":0,"delta":{"content":"-6789"}}]}',
      '',
      'data: [DONE]',
      ''
    ].join('\n');

    expect(extractStreamText(stream)).toBe('123-45-6789');
  });

  it('reads Anthropic text deltas', () => {
    const stream = [
      'event: content_block_delta',
      'data: {"type":"content_block_delta","index":0,"delta":{"type":"text_delta","text":"Hi there"}}',
      ''
    ].join('\n');

    expect(extractStreamText(stream)).toBe('Hi there');
  });
});

describe('extractResponseText', () => {
  it('walks a JSON completion', () => {
    const body = json({ id: 'chatcmpl-1', choices: [{ index: 0, message: { role: 'assistant', content: 'done' } }] });

    expect(extractResponseText(body, 'application/json')).toBe('done');
  });

  it('treats event-stream bodies as SSE', () => {
    const body = Buffer.from('data: {"choices":[{"delta":{"content":"ok"}}]}\n\n');

    expect(extractResponseText(body, 'text/event-stream; charset=utf-8')).toBe('ok');
  });
});

describe('extractModel', () => {
  it('reads the model field', () => {
    expect(extractModel(json({ model: 'claude-3-5-sonnet' }))).toBe('claude-3-5-sonnet');
  });

  it('returns undefined when absent', () => {
    expect(extractModel(json({ messages: [] }))).toBeUndefined();
    expect(extractModel(Buffer.from('not json'))).toBeUndefined();
  });
});
