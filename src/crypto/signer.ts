import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { sign, verify, generateKeyPairSync } from 'crypto';
import { join } from 'path';

export interface KeyPair {
  privateKey: string;
  publicKey: string;
}

const PRIVATE_KEY_FILE = 'ledger.key';
const PUBLIC_KEY_FILE = 'ledger.pub';

export function keyPaths(keyDir: string): { privatePath: string; publicPath: string } {
  return {
    privatePath: join(keyDir, PRIVATE_KEY_FILE),
    publicPath: join(keyDir, PUBLIC_KEY_FILE)
  };
}

export function generateKeyPair(): KeyPair {
  const { privateKey, publicKey } = generateKeyPairSync('ed25519', {
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
    publicKeyEncoding: { type: 'spki', format: 'pem' }
  });

  return { privateKey, publicKey };
}

export function saveKeyPair(keyDir: string, keyPair: KeyPair): void {
  if (!existsSync(keyDir)) {
    mkdirSync(keyDir, { recursive: true, mode: 0o700 });
  }

  const { privatePath, publicPath } = keyPaths(keyDir);
  writeFileSync(privatePath, keyPair.privateKey, { mode: 0o600 });
  writeFileSync(publicPath, keyPair.publicKey, { mode: 0o644 });
}

export function loadKeyPair(keyDir: string): KeyPair | null {
  const { privatePath, publicPath } = keyPaths(keyDir);

  if (!existsSync(privatePath) || !existsSync(publicPath)) {
    return null;
  }

  return {
    privateKey: readFileSync(privatePath, 'utf-8'),
    publicKey: readFileSync(publicPath, 'utf-8')
  };
}

export function signData(data: string, privateKey: string): string {
  const signature = sign(null, Buffer.from(data), privateKey);
  return signature.toString('base64');
}

export function verifySignature(data: string, signature: string, publicKey: string): boolean {
  try {
    return verify(null, Buffer.from(data), publicKey, Buffer.from(signature, 'base64'));
  } catch {
    return false;
  }
}

// The chain hash already commits to the whole record and its predecessor
export function signChainLink(agentId: string, chainHash: string, privateKey: string): string {
  return signData(`${agentId}||${chainHash}`, privateKey);
}

export function verifyChainLink(agentId: string, chainHash: string, signature: string, publicKey: string): boolean {
  return verifySignature(`${agentId}||${chainHash}`, signature, publicKey);
}
