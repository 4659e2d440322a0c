import { describe, it, expect } from 'vitest';
import { CHAIN_SEED, canonicalJson, chainLink, hashObject, sha256 } from './hasher.js';

describe('canonicalJson', () => {
  it('sorts keys at every depth and drops undefined', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { z: 1, y: 2 }], c: undefined } })).toBe('{"a":{"d":[2,{"y":2,"z":1}]},"b":1}');
  });
});

describe('chainLink', () => {
  it('hashes content and previous link together', () => {
    const content = { id: 1, agent_id: 'agent-a' };
    const contentHash = hashObject(content);

    expect(chainLink(content, CHAIN_SEED)).toEqual({ contentHash, chainHash: sha256(contentHash + CHAIN_SEED) });
  });

  it('does not depend on key order', () => {
    expect(chainLink({ a: 1, b: 2 }, CHAIN_SEED)).toEqual(chainLink({ b: 2, a: 1 }, CHAIN_SEED));
  });

  it('changes when the previous link changes', () => {
    const content = { id: 1 };

    expect(chainLink(content, CHAIN_SEED).chainHash).not.toBe(chainLink(content, 'f'.repeat(64)).chainHash);
  });
});

describe('sha256', () => {
  it('matches the known digest of the empty string', () => {
    expect(sha256('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });
});
