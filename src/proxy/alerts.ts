import { setTimeout as sleep } from 'timers/promises';
import type { Logger } from 'pino';
import { describeCause } from '../errors.js';
import type { FetchLike } from '../providers/index.js';

export type AlertSeverity = 'info' | 'warning' | 'critical';

export interface OperationalAlert {
  code: string;
  severity: AlertSeverity;
  message: string;
  agent_id?: string;
  event_id?: string;
  timestamp: string;
}

export interface AlertChannel {
  readonly name: string;
  send(alert: OperationalAlert): Promise<void>;
}

export class AlertDeliveryError extends Error {
  constructor(
    message: string,
    public readonly channel: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AlertDeliveryError';
    Object.setPrototypeOf(this, AlertDeliveryError.prototype);
  }
}

export class LogAlertChannel implements AlertChannel {
  readonly name = 'log';
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'alerts' });
  }

  async send(alert: OperationalAlert): Promise<void> {
    const level = alert.severity === 'critical' ? 'error' : alert.severity === 'warning' ? 'warn' : 'info';
    this.logger[level]({ alert }, alert.message);
  }
}

export interface WebhookAlertOptions {
  url: string;
  timeoutMs: number;
  retryAttempts?: number;
  fetchImpl?: FetchLike;
}

// Posts alerts as JSON, retrying once by default
export class WebhookAlertChannel implements AlertChannel {
  readonly name = 'webhook';
  private url: string;
  private timeoutMs: number;
  private retryAttempts: number;
  private fetchImpl: FetchLike;

  constructor(options: WebhookAlertOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
    this.retryAttempts = options.retryAttempts ?? 1;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async send(alert: OperationalAlert): Promise<void> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.retryAttempts; attempt++) {
      if (attempt > 0) {
        await sleep(Math.min(1000 * 2 ** (attempt - 1), 5000));
      }
      try {
        const response = await this.fetchImpl(this.url, {
          method: 'POST',
          headers: { 'content-type': 'application/json' },
          body: JSON.stringify(alert),
          signal: AbortSignal.timeout(this.timeoutMs)
        });
        if (response.ok) return;
        lastError = new Error(`webhook answered ${response.status}`);
      } catch (err) {
        lastError = err;
      }
    }

    throw new AlertDeliveryError(`Alert delivery failed: ${describeCause(lastError)}`, this.name, { cause: lastError });
  }
}

// Fans out to every channel; one failing channel does not stop the others
export class CompositeAlertChannel implements AlertChannel {
  readonly name = 'composite';
  private channels: AlertChannel[];
  private logger: Logger;

  constructor(channels: AlertChannel[], logger: Logger) {
    this.channels = channels;
    this.logger = logger.child({ component: 'alerts' });
  }

  async send(alert: OperationalAlert): Promise<void> {
    const results = await Promise.allSettled(this.channels.map((channel) => channel.send(alert)));
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        this.logger.error(
          { channel: this.channels[i]?.name, code: alert.code, err: describeCause(result.reason) },
          'Alert channel failed'
        );
      }
    });
  }
}
