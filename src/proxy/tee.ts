import { PassThrough, type Readable } from 'stream';

export interface TeeResult {
  captured: Buffer;
  error: unknown;
  relayedBytes: number;
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  return Buffer.from(String(chunk));
}

// Relays upstream bytes to `sink` and keeps all of them for the audit record.
// Relaying stops when the client goes away; reading goes on until the upstream ends.
export class ResponseTee {
  readonly sink = new PassThrough();
  private chunks: Buffer[] = [];
  private size = 0;
  private relayed = 0;
  private sinkError: unknown;

  constructor(
    private readonly source: Readable,
    private readonly signals: { client?: AbortSignal; upstream?: AbortSignal } = {}
  ) {
    // Errors put on the sink are for the caller; keep them from becoming unhandled
    this.sink.on('error', (err) => {
      this.sinkError = err;
    });
  }

  get capturedBytes(): number {
    return this.size;
  }

  get callerError(): unknown {
    return this.sinkError;
  }

  async run(): Promise<TeeResult> {
    let error: unknown;
    const upstream = this.signals.upstream;
    const onAbort = (): void => {
      this.source.destroy(new Error('upstream read aborted'));
    };
    if (upstream?.aborted) onAbort();
    else upstream?.addEventListener('abort', onAbort, { once: true });

    try {
      for await (const chunk of this.source) {
        const buf = toBuffer(chunk);
        this.chunks.push(buf);
        this.size += buf.length;

        if (this.relaying()) {
          this.relayed += buf.length;
          if (!this.sink.write(buf)) {
            await this.drained();
          }
        }
      }
    } catch (err) {
      error = err;
    } finally {
      upstream?.removeEventListener('abort', onAbort);
      if (!this.source.destroyed) this.source.destroy();
    }

    return { captured: Buffer.concat(this.chunks, this.size), error, relayedBytes: this.relayed };
  }

  finish(): void {
    if (!this.sink.destroyed) this.sink.end();
  }

  fail(err: Error): void {
    if (!this.sink.destroyed) this.sink.destroy(err);
  }

  private relaying(): boolean {
    return !this.sink.destroyed && !this.signals.client?.aborted;
  }

  private drained(): Promise<void> {
    const signals = [this.signals.client, this.signals.upstream].filter((s): s is AbortSignal => s !== undefined);
    if (this.sink.destroyed || signals.some((s) => s.aborted)) return Promise.resolve();

    return new Promise((resolve) => {
      const done = (): void => {
        this.sink.off('drain', done);
        this.sink.off('close', done);
        for (const signal of signals) signal.removeEventListener('abort', done);
        resolve();
      };
      this.sink.on('drain', done);
      this.sink.on('close', done);
      for (const signal of signals) signal.addEventListener('abort', done);
    });
  }
}
