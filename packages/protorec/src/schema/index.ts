/**
 * Schema registry and the built-in schemas
 */

export { SchemaRegistry, formatTag, MAX_SCHEMA_TAG } from './registry.js';
export type { SchemaDefinition, RegisteredSchema, SchemaLayout } from './registry.js';

export { createDefaultRegistry } from './defaults.js';
export type { MessageValue } from './defaults.js';

export { Direction, captureInputV1, captureInputV2 } from './builtin/capture.js';
export type { CaptureInput } from './builtin/capture.js';

export { parseNoneV1, parseIncompleteV1, parseFailureV1 } from './builtin/parse.js';
export type { ParseNone, ParseIncomplete, ParseFailure } from './builtin/parse.js';

export {
  Pop3Keyword,
  Pop3Status,
  Pop3ErrorFlag,
  POP3_ERROR_FLAG_MASK,
  parsePop3Keyword,
  pop3KeywordName,
  pop3ErrorFlagNames,
  pop3MessageV1,
} from './builtin/pop3.js';
export type { Pop3Command, Pop3Response, Pop3Message } from './builtin/pop3.js';
