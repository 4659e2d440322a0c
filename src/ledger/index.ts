export { FileLedger, type FileLedgerOptions } from './file-ledger.js';
export { KeyedMutex } from './keyed-mutex.js';
export { interactionRecordSchema } from './schema.js';
export type { AuditLedger, AuditReader, ChainVerification, ReadRange } from './ledger.js';
