#!/usr/bin/env tsx

import Anthropic from '@anthropic-ai/sdk';
import { parseArgs } from 'util';
import { z } from 'zod';
import { interactionRecordSchema } from '../ledger/index.js';

// Sends one message through a running proxy and prints the audit record it produced
async function main() {
  const { values } = parseArgs({
    options: {
      url: { type: 'string', default: 'http://127.0.0.1:8000' },
      agent: { type: 'string', default: 'smoke-agent' },
      model: { type: 'string', default: 'claude-3-5-haiku-20241022' },
      message: { type: 'string', default: 'Say hello in five words.' }
    }
  });

  const proxyUrl = values.url.replace(/\/+$/, '');
  const client = new Anthropic({
    baseURL: `${proxyUrl}/proxy/anthropic`,
    // The proxy injects the upstream key when one is configured
    apiKey: process.env.ANTHROPIC_API_KEY ?? 'proxy-managed',
    defaultHeaders: { 'x-agent-id': values.agent }
  });

  console.log(`Sending a test message to ${proxyUrl} as agent ${values.agent}`);
  console.log('─'.repeat(40));

  const response = await client.messages.create({
    model: values.model,
    max_tokens: 128,
    messages: [{ role: 'user', content: values.message }]
  });

  const output = response.content.flatMap((block) => (block.type === 'text' ? [block.text] : [])).join('\n');
  console.log(`\nModel replied: ${output}`);

  // The record is written after the response completes
  await new Promise((resolve) => setTimeout(resolve, 250));

  const audit = await fetch(`${proxyUrl}/api/audit/${encodeURIComponent(values.agent)}?limit=1000`);
  if (!audit.ok) {
    throw new Error(`Audit lookup failed: ${audit.status}`);
  }
  const { records } = z.object({ records: z.array(interactionRecordSchema) }).parse(await audit.json());
  const latest = records.at(-1);

  if (!latest) {
    console.log('\nNo audit record found.');
    process.exit(1);
  }

  console.log('\nLatest audit record:');
  console.log(JSON.stringify(latest, null, 2));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
