import type { FastifyInstance } from 'fastify';
import type { AuditOutcome, Interceptor } from '../proxy/index.js';

export class AuditTracker {
  private pending = new Set<Promise<AuditOutcome>>();

  get size(): number {
    return this.pending.size;
  }

  track(audit: Promise<AuditOutcome>): void {
    this.pending.add(audit);
    // Interceptor audit promises never reject
    void audit.then(() => {
      this.pending.delete(audit);
    });
  }

  async flush(): Promise<AuditOutcome[]> {
    return Promise.all(this.pending);
  }
}

interface ProxyParams {
  provider: string;
  '*': string;
}

export async function proxyRoutes(app: FastifyInstance, deps: { interceptor: Interceptor; tracker: AuditTracker }): Promise<void> {
  // Bodies are forwarded byte for byte, whatever their content type
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  app.all<{ Params: ProxyParams }>('/proxy/:provider/*', { config: { rateLimit: false } }, async (request, reply) => {
    const client = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) client.abort();
    });

    const queryStart = request.url.indexOf('?');
    const result = await deps.interceptor.handle(
      {
        provider: request.params.provider,
        path: request.params['*'],
        method: request.method,
        query: queryStart >= 0 ? request.url.slice(queryStart + 1) : '',
        headers: request.headers,
        body: Buffer.isBuffer(request.body) ? request.body : undefined
      },
      { clientSignal: client.signal }
    );

    deps.tracker.track(result.audit);

    reply.status(result.status).headers(result.headers);
    return reply.send(result.body ?? undefined);
  });
}
