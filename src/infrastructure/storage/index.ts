export { FileRecordRepository } from './record-store.js';
export { FileVerificationRepository } from './verification-store.js';
export type { RecordRepository, VerificationRepository } from './types.js';
