/**
 * Comparing and fingerprinting capture files
 */

export { diffRecords, bytesEqual } from './diff.js';
export type { DiffResult, RecordDifference, DifferenceType, ReplayOptions } from './diff.js';
export { fingerprintRecords } from './fingerprint.js';
export type { Fingerprint } from './fingerprint.js';
