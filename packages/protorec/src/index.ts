/**
 * protorec - schema-tagged binary record files for parsed protocol messages
 *
 * Values are encoded as canonical CBOR under a versioned schema tag, framed
 * with a length prefix, and appended to a file that can be read back lazily,
 * skipping records whose schema is unknown.
 */

// Core types
export * from './types/index.js';

// Payload encoding and framing
export * from './wire/index.js';

// Schema registry and built-in schemas
export * from './schema/index.js';

// Record files
export * from './file/index.js';

// Diff and fingerprint
export * from './replay/index.js';

// Logging and hex helpers
export * from './utils/index.js';
