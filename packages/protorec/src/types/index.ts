/**
 * Core types for protorec
 */

export {
  ErrorCode,
  getErrorMessage,
  ProtorecError,
  isRecoverable,
  isTerminal,
  ioError,
} from './errors.js';
export type { ErrorDetails } from './errors.js';

export type { Variant } from './values.js';
