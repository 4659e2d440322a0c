import { createHash } from 'crypto';

export const CHAIN_SEED = '0'.repeat(64);

export function sha256(data: string | Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

// JSON with object keys sorted at every depth, so equal content always hashes equally
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key);
      if (entry !== undefined) {
        sorted[key] = sortKeys(entry);
      }
    }
    return sorted;
  }
  return value;
}

export function hashObject(obj: object): string {
  return sha256(canonicalJson(obj));
}

// One link of a per-agent hash chain
export function chainLink(content: object, prevHash: string): { contentHash: string; chainHash: string } {
  const contentHash = hashObject(content);
  return { contentHash, chainHash: sha256(contentHash + prevHash) };
}
