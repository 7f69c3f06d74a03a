export { IntegrityVerifier, aggregateStatus, summarize } from './integrity-verifier.js';
export { buildVerifyConfig, validateVerifyConfig } from './config.js';
export { algorithmForChecksum, hashFile, hashFileMulti } from './file-hasher.js';
export type { FileHashResult, HashAlgorithm } from './file-hasher.js';
export { isArchivePath, scanZipArchive } from './archive-check.js';
export type { ArchiveScanResult } from './archive-check.js';
export { DISPOSITIONS, VERIFY_CHECKS } from './types.js';
export type {
  CheckOutcome,
  Disposition,
  FileStatus,
  ItemVerification,
  VerificationFailure,
  VerificationRecord,
  VerifyCheck,
  VerifyConfig,
  VerifySummary,
  VerifyTotals,
} from './types.js';
