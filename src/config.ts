import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { RISK_TIERS } from './types/index.js';
import { InvalidConfigError } from './errors.js';

export function expandHome(path: string): string {
  if (path === '~' || path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  return resolve(path);
}

const pathSchema = z.string().min(1).transform(expandHome);

const providerSchema = z.object({
  base_url: z.string().url(),
  shape: z.enum(['openai', 'anthropic']),
  api_key_env: z.string().optional()
});

const agentSchema = z.object({
  id: z.string().min(1).max(128),
  name: z.string().min(1).max(200),
  registered_at: z.string().default(() => new Date(0).toISOString()),
  status: z.enum(['active', 'suspended']).default('active'),
  use_case: z.string().optional(),
  risk_level: z.enum(RISK_TIERS).optional(),
  regulation_scope: z.array(z.string()).default(['EU_AI_ACT']),
  human_oversight: z.boolean().default(false)
});

const DEFAULT_PROVIDERS = {
  openai: { base_url: 'https://api.openai.com', shape: 'openai', api_key_env: 'OPENAI_API_KEY' },
  anthropic: { base_url: 'https://api.anthropic.com', shape: 'anthropic', api_key_env: 'ANTHROPIC_API_KEY' },
  groq: { base_url: 'https://api.groq.com/openai', shape: 'openai', api_key_env: 'GROQ_API_KEY' }
} as const;

export const configSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(0).max(65535).default(8000),
      host: z.string().default('127.0.0.1')
    })
    .default({}),
  auth: z
    .object({
      allowed_origins: z.array(z.string()).default(['http://localhost:3000'])
    })
    .default({}),
  rate_limits: z
    .object({
      requests_per_minute: z.number().int().positive().default(600)
    })
    .default({}),
  proxy: z
    .object({
      agent_header: z.string().default('x-agent-id'),
      session_header: z.string().default('x-session-id'),
      timeout_ms: z.number().int().positive().default(120_000),
      max_body_bytes: z.number().int().positive().default(10 * 1024 * 1024),
      client_disconnect: z.enum(['abort', 'drain']).default('abort'),
      retry: z
        .object({
          max_retries: z.number().int().min(0).max(10).default(2),
          base_delay_ms: z.number().int().min(0).default(250),
          max_delay_ms: z.number().int().min(0).default(4000)
        })
        .default({})
    })
    .default({}),
  providers: z.record(providerSchema).default({ ...DEFAULT_PROVIDERS }),
  ledger: z
    .object({
      directory: pathSchema.default('~/.agentguard/ledger'),
      signing_key_dir: pathSchema.optional()
    })
    .default({}),
  registry: z
    .object({
      file: pathSchema.optional()
    })
    .default({}),
  agents: z.array(agentSchema).default([]),
  rules: z
    .object({
      file: pathSchema.optional()
    })
    .default({}),
  alerts: z
    .object({
      webhook_url: z.string().url().optional(),
      timeout_ms: z.number().int().positive().default(5000)
    })
    .default({}),
  logging: z
    .object({
      level: z.string().default('info'),
      pretty: z.boolean().default(false)
    })
    .default({})
});

export type GuardConfig = z.infer<typeof configSchema>;
export type ProviderConfig = z.infer<typeof providerSchema>;
export type AgentConfig = z.infer<typeof agentSchema>;

export const agentListSchema = z.object({ agents: z.array(agentSchema).default([]) });

export function configSearchPaths(env: NodeJS.ProcessEnv = process.env): string[] {
  const paths = [
    resolve(process.cwd(), 'agentguard.yaml'),
    resolve(homedir(), '.agentguard', 'config.yaml'),
    resolve(homedir(), '.config', 'agentguard', 'config.yaml')
  ];
  return env.AGENTGUARD_CONFIG ? [resolve(env.AGENTGUARD_CONFIG), ...paths] : paths;
}

export function parseConfig(raw: unknown, source: string): GuardConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const detail = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new InvalidConfigError(source, detail);
  }
  return result.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GuardConfig {
  let config: GuardConfig | undefined;

  for (const path of configSearchPaths(env)) {
    if (existsSync(path)) {
      config = parseConfig(parseYaml(readFileSync(path, 'utf-8')), path);
      break;
    }
  }

  // Built-in defaults
  config ??= parseConfig({}, 'defaults');

  if (env.LOG_LEVEL) {
    config.logging.level = env.LOG_LEVEL;
  }
  return config;
}
