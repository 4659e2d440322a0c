import { createReadStream } from 'fs';
import { mkdir, open, readFile, stat, truncate, type FileHandle } from 'fs/promises';
import { join } from 'path';
import { createInterface } from 'readline';
import type { Logger } from 'pino';
import type { AgentDirectory, InteractionDraft, InteractionRecord } from '../types/index.js';
import { tierRank } from '../types/index.js';
import { CHAIN_SEED, chainLink, sha256, signChainLink, verifyChainLink, type KeyPair } from '../crypto/index.js';
import { InvalidReferenceError, StorageUnavailableError, describeCause } from '../errors.js';
import { KeyedMutex } from './keyed-mutex.js';
import { interactionRecordSchema } from './schema.js';
import type { AuditLedger, ChainVerification, ReadRange } from './ledger.js';

const TAIL_BYTES = 64 * 1024;
const SAFE_NAME = /^[A-Za-z0-9_-]{1,128}$/;

interface ChainTail {
  seq: number;
  chainHash: string;
}

interface FileSnapshot {
  size: number;
  terminated: boolean;
}

export interface FileLedgerOptions {
  directory: string;
  agents: AgentDirectory;
  keyPair?: KeyPair | null;
  logger?: Logger;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function withoutChainFields(raw: object): Record<string, unknown> {
  const content: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (key !== 'chain_hash' && key !== 'signature') content[key] = value;
  }
  return content;
}

function parseLine(line: string): { raw: object; record: InteractionRecord } | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  if (raw === null || typeof raw !== 'object') return null;
  const result = interactionRecordSchema.safeParse(raw);
  return result.success ? { raw, record: result.data } : null;
}

// One JSONL file per agent; each line is one record, each record links to the line before it
export class FileLedger implements AuditLedger {
  private directory: string;
  private agents: AgentDirectory;
  private keyPair: KeyPair | null;
  private logger: Logger | undefined;
  private tails = new Map<string, ChainTail>();
  private mutex = new KeyedMutex();

  constructor(options: FileLedgerOptions) {
    this.directory = options.directory;
    this.agents = options.agents;
    this.keyPair = options.keyPair ?? null;
    this.logger = options.logger?.child({ component: 'ledger' });
  }

  pathFor(agentId: string): string {
    const name = SAFE_NAME.test(agentId) ? agentId : `h-${sha256(agentId).slice(0, 40)}`;
    return join(this.directory, `${name}.jsonl`);
  }

  async append(draft: InteractionDraft): Promise<InteractionRecord> {
    const agentId = draft.agent_id;
    if (!(await this.agents.get(agentId))) {
      throw new InvalidReferenceError(agentId);
    }

    return this.mutex.run(agentId, async () => {
      const tail = await this.loadTail(agentId);

      const content = { ...draft, id: tail.seq + 1, prev_chain_hash: tail.chainHash };
      const { chainHash } = chainLink(content, tail.chainHash);
      const record: InteractionRecord = { ...content, chain_hash: chainHash };

      if (this.keyPair) {
        record.signature = signChainLink(agentId, chainHash, this.keyPair.privateKey);
      }

      try {
        await this.appendLine(this.pathFor(agentId), JSON.stringify(record) + '\n');
      } catch (err) {
        // Re-read the tail from disk next time rather than trust memory after a failed write
        this.tails.delete(agentId);
        throw err;
      }

      // Tail moves only after the line is durable
      this.tails.set(agentId, { seq: record.id, chainHash });
      return Object.freeze(record);
    });
  }

  async read(agentId: string, range: ReadRange = {}): Promise<InteractionRecord[]> {
    const since = range.since ? Date.parse(range.since) : undefined;
    const until = range.until ? Date.parse(range.until) : undefined;
    const minRank = range.minTier ? tierRank(range.minTier) : 0;
    const records: InteractionRecord[] = [];

    let lineNo = 0;
    for await (const line of this.lines(agentId)) {
      lineNo++;
      const parsed = parseLine(line);
      if (!parsed) {
        throw new StorageUnavailableError(`unreadable record at line ${lineNo} for agent ${agentId}`);
      }
      const { record } = parsed;

      if (range.fromId !== undefined && record.id < range.fromId) continue;
      if (range.toId !== undefined && record.id > range.toId) break;
      const at = Date.parse(record.timestamp);
      if (since !== undefined && at < since) continue;
      if (until !== undefined && at > until) continue;
      if (tierRank(record.risk_tier) < minRank) continue;

      records.push(record);
      if (range.limit !== undefined && records.length >= range.limit) break;
    }

    return records;
  }

  async verify(agentId: string): Promise<boolean> {
    return (await this.inspect(agentId)).valid;
  }

  async inspect(agentId: string): Promise<ChainVerification> {
    const errors: string[] = [];
    let prevHash = CHAIN_SEED;
    let expectedId = 1;
    let count = 0;

    for await (const line of this.lines(agentId)) {
      count++;
      const parsed = parseLine(line);
      if (!parsed) {
        errors.push(`Record ${count}: unreadable or malformed`);
        continue;
      }
      const { raw, record } = parsed;

      if (record.agent_id !== agentId) {
        errors.push(`Record ${count}: belongs to agent ${record.agent_id}`);
      }
      if (record.id !== expectedId) {
        errors.push(`Record ${count}: sequence ${record.id}, expected ${expectedId}`);
      }
      if (record.prev_chain_hash !== prevHash) {
        errors.push(`Record ${count}: chain broken - expected prev ${prevHash}, got ${record.prev_chain_hash}`);
      }

      // Content is checked against the record's own link; the link itself was checked above
      const { chainHash } = chainLink(withoutChainFields(raw), record.prev_chain_hash);
      if (chainHash !== record.chain_hash) {
        errors.push(`Record ${count}: content does not match chain hash`);
      }

      // With a key configured every record must be signed
      if (this.keyPair) {
        if (record.signature === undefined) {
          errors.push(`Record ${count}: signature missing`);
        } else if (!verifyChainLink(agentId, record.chain_hash, record.signature, this.keyPair.publicKey)) {
          errors.push(`Record ${count}: signature invalid`);
        }
      }

      prevHash = record.chain_hash;
      expectedId = record.id + 1;
    }

    return { agent_id: agentId, valid: errors.length === 0, records: count, head: prevHash, errors };
  }

  private async *lines(agentId: string): AsyncGenerator<string> {
    const path = this.pathFor(agentId);
    let snapshot: FileSnapshot;
    try {
      snapshot = await this.snapshot(path);
    } catch (err) {
      if (isMissing(err)) return;
      throw new StorageUnavailableError(describeCause(err), err);
    }
    if (snapshot.size === 0) return;

    // Reads stop at the size seen above; a last line without its newline is still being appended
    const input = createReadStream(path, { encoding: 'utf-8', end: snapshot.size - 1 });
    const rl = createInterface({ input, crlfDelay: Infinity });
    let pending: string | undefined;
    try {
      for await (const line of rl) {
        if (pending) yield pending;
        pending = line;
      }
    } finally {
      rl.close();
    }
    if (pending && snapshot.terminated) yield pending;
  }

  private async snapshot(path: string): Promise<FileSnapshot> {
    const handle = await open(path, 'r');
    try {
      const { size } = await handle.stat();
      if (size === 0) return { size, terminated: true };
      const last = Buffer.alloc(1);
      await handle.read(last, 0, 1, size - 1);
      return { size, terminated: last[0] === 0x0a };
    } finally {
      await handle.close();
    }
  }

  private async loadTail(agentId: string): Promise<ChainTail> {
    const cached = this.tails.get(agentId);
    if (cached) return cached;

    const path = this.pathFor(agentId);
    let chunk: string;
    try {
      chunk = await this.readTailChunk(path);
    } catch (err) {
      if (isMissing(err)) {
        const seed = { seq: 0, chainHash: CHAIN_SEED };
        this.tails.set(agentId, seed);
        return seed;
      }
      throw new StorageUnavailableError(describeCause(err), err);
    }

    const lines = chunk.split('\n').filter(Boolean);
    const last = lines.at(-1);
    if (last === undefined) {
      const seed = { seq: 0, chainHash: CHAIN_SEED };
      this.tails.set(agentId, seed);
      return seed;
    }

    const parsed = parseLine(last);
    if (!parsed) {
      throw new StorageUnavailableError(`last record for agent ${agentId} is unreadable`);
    }

    const tail = { seq: parsed.record.id, chainHash: parsed.record.chain_hash };
    this.tails.set(agentId, tail);
    return tail;
  }

  // Reads the end of the file and drops an unterminated last line, which was never acknowledged
  private async readTailChunk(path: string): Promise<string> {
    const size = (await stat(path)).size;
    if (size === 0) return '';

    let buffer: Buffer;
    if (size <= TAIL_BYTES) {
      buffer = await readFile(path);
    } else {
      const handle = await open(path, 'r');
      try {
        buffer = Buffer.alloc(TAIL_BYTES);
        await handle.read(buffer, 0, TAIL_BYTES, size - TAIL_BYTES);
      } finally {
        await handle.close();
      }
    }

    const lastNewline = buffer.lastIndexOf(0x0a);
    if (lastNewline !== buffer.length - 1) {
      const keep = size - (buffer.length - (lastNewline + 1));
      this.logger?.warn({ path, dropped_bytes: size - keep }, 'Truncating unterminated ledger line');
      await truncate(path, keep);
      buffer = buffer.subarray(0, lastNewline + 1);
    }

    const text = buffer.toString('utf-8');
    // A chunk read from the middle of the file starts part way through a line
    return size > TAIL_BYTES ? text.slice(text.indexOf('\n') + 1) : text;
  }

  private async appendLine(path: string, line: string): Promise<void> {
    let handle: FileHandle | undefined;
    let sizeBefore = 0;

    try {
      await mkdir(this.directory, { recursive: true, mode: 0o700 });
      handle = await open(path, 'a', 0o600);
      sizeBefore = (await handle.stat()).size;
      await handle.appendFile(line, 'utf-8');
      await handle.datasync();
    } catch (err) {
      if (handle) {
        await this.rollback(handle, path, sizeBefore);
      }
      throw new StorageUnavailableError(describeCause(err), err);
    } finally {
      if (handle) {
        await handle.close().catch((err: unknown) => {
          this.logger?.warn({ path, err: describeCause(err) }, 'Ledger file close failed');
        });
      }
    }
  }

  private async rollback(handle: FileHandle, path: string, size: number): Promise<void> {
    try {
      await handle.truncate(size);
    } catch (err) {
      // The unterminated remainder is dropped by readTailChunk on next load
      this.logger?.error({ path, err: describeCause(err) }, 'Ledger rollback failed');
    }
  }
}
