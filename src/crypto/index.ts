export { sha256, hashObject, canonicalJson, chainLink, CHAIN_SEED } from './hasher.js';
export {
  generateKeyPair,
  saveKeyPair,
  loadKeyPair,
  keyPaths,
  signChainLink,
  verifyChainLink,
  type KeyPair
} from './signer.js';
