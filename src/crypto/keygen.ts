#!/usr/bin/env tsx

import { generateKeyPair, saveKeyPair, loadKeyPair, keyPaths } from './signer.js';
import { resolve } from 'path';
import { homedir } from 'os';

const DEFAULT_KEY_DIR = resolve(homedir(), '.agentguard', 'keys');

async function main() {
  const keyDir = process.argv[2] || DEFAULT_KEY_DIR;
  const { privatePath, publicPath } = keyPaths(keyDir);

  console.log('AgentGuard ledger key generator');
  console.log('─'.repeat(40));
  console.log(`Key directory: ${keyDir}`);

  if (loadKeyPair(keyDir)) {
    console.log('\nA ledger key pair already exists here.');
    console.log('Records already signed with it can only be checked against that public key,');
    console.log('so move the old pair aside before generating a new one.');
    process.exit(1);
  }

  console.log('\nGenerating Ed25519 key pair...');
  saveKeyPair(keyDir, generateKeyPair());

  console.log('\nKeys written:');
  console.log(`  Private key: ${privatePath} (mode 600)`);
  console.log(`  Public key:  ${publicPath} (mode 644)`);
  console.log('\nPoint ledger.signing_key_dir at this directory to sign new records.');
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
