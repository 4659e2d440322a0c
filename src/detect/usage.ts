import type { ToolCallRef } from '../types/index.js';
import { payloadObjects } from './extract.js';

export interface TokenUsage {
  prompt_tokens: number | null;
  response_tokens: number | null;
}

function field(value: unknown, key: string): unknown {
  return value !== null && typeof value === 'object' ? Reflect.get(value, key) : undefined;
}

function list(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function tokenCount(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : undefined;
}

// OpenAI counts prompt/completion tokens, Anthropic input/output; stream events repeat running totals, so the last one wins
export function extractUsage(body: Uint8Array | undefined, contentType?: string): TokenUsage {
  let prompt: number | null = null;
  let response: number | null = null;

  for (const payload of payloadObjects(body, contentType)) {
    for (const usage of [field(payload, 'usage'), field(field(payload, 'message'), 'usage')]) {
      prompt = tokenCount(field(usage, 'prompt_tokens')) ?? tokenCount(field(usage, 'input_tokens')) ?? prompt;
      response = tokenCount(field(usage, 'completion_tokens')) ?? tokenCount(field(usage, 'output_tokens')) ?? response;
    }
  }

  return { prompt_tokens: prompt, response_tokens: response };
}

export function extractToolCalls(body: Uint8Array | undefined, contentType?: string): ToolCallRef[] {
  const calls: ToolCallRef[] = [];
  const add = (id: unknown, name: unknown): void => {
    if (typeof name === 'string' && name.length > 0) {
      calls.push({ id: typeof id === 'string' ? id : null, name });
    }
  };

  for (const payload of payloadObjects(body, contentType)) {
    // OpenAI: full messages, or stream deltas where only the first fragment of a call carries its name
    for (const choice of list(field(payload, 'choices'))) {
      for (const source of [field(choice, 'message'), field(choice, 'delta')]) {
        for (const call of list(field(source, 'tool_calls'))) {
          add(field(call, 'id'), field(field(call, 'function'), 'name'));
        }
      }
    }

    // Anthropic: tool_use blocks in a message, or announced by content_block_start in a stream
    for (const block of [...list(field(payload, 'content')), field(payload, 'content_block')]) {
      if (field(block, 'type') === 'tool_use') add(field(block, 'id'), field(block, 'name'));
    }
  }

  return calls;
}
