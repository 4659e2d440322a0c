import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { loadAgentDirectory } from './agents/directory.js';
import { loadRuleset } from './classify/index.js';
import { loadKeyPair } from './crypto/index.js';
import { FileLedger } from './ledger/index.js';
import { ProviderAdapter, endpointsFromConfig } from './providers/index.js';
import {
  CompositeAlertChannel,
  Interceptor,
  LogAlertChannel,
  WebhookAlertChannel,
  type AlertChannel
} from './proxy/index.js';
import { buildApp } from './app.js';

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logging);

  logger.info('AgentGuard starting...');

  // Initialize components
  const agents = loadAgentDirectory(config);
  const ruleset = loadRuleset(config.rules.file);

  const keyPair = config.ledger.signing_key_dir ? loadKeyPair(config.ledger.signing_key_dir) : null;
  if (config.ledger.signing_key_dir && !keyPair) {
    logger.warn({ key_dir: config.ledger.signing_key_dir }, 'No ledger key pair found, records will not be signed');
  }

  const ledger = new FileLedger({ directory: config.ledger.directory, agents, keyPair, logger });

  const adapter = new ProviderAdapter({
    providers: endpointsFromConfig(config),
    retry: {
      maxRetries: config.proxy.retry.max_retries,
      baseDelayMs: config.proxy.retry.base_delay_ms,
      maxDelayMs: config.proxy.retry.max_delay_ms
    },
    proxyHeaders: [config.proxy.agent_header, config.proxy.session_header],
    logger
  });

  const channels: AlertChannel[] = [new LogAlertChannel(logger)];
  if (config.alerts.webhook_url) {
    channels.push(new WebhookAlertChannel({ url: config.alerts.webhook_url, timeoutMs: config.alerts.timeout_ms }));
  }

  const interceptor = new Interceptor({
    adapter,
    agents,
    ledger,
    ruleset,
    alerts: new CompositeAlertChannel(channels, logger),
    logger,
    options: {
      agentHeader: config.proxy.agent_header,
      sessionHeader: config.proxy.session_header,
      timeoutMs: config.proxy.timeout_ms,
      clientDisconnect: config.proxy.client_disconnect
    }
  });

  const app = await buildApp({ config, interceptor, adapter, ledger, agents, ruleset, logger });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    void app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  // Start server
  try {
    await app.listen({ port: config.server.port, host: config.server.host });
    logger.info(
      {
        providers: adapter.getAvailableProviders(),
        agents: (await agents.list()).length,
        ruleset_version: ruleset.version,
        signed: keyPair !== null
      },
      `AgentGuard listening on ${config.server.host}:${config.server.port}`
    );
  } catch (err) {
    logger.error(err);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
