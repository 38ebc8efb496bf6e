/**
 * Record files: header, writer, reader and byte storage
 */

export {
  FORMAT_MAGIC,
  FORMAT_MAJOR,
  FORMAT_MINOR,
  FORMAT_VERSION,
  HEADER_LENGTH,
  HeaderFlag,
  encodeHeader,
  formatVersionString,
  parseHeader,
} from './format.js';
export type { FileHeader } from './format.js';

export { DEFAULT_BUFFER_SIZE, BufferSource, FileSource, MemorySink, FileSink } from './io.js';
export type { ByteSource, ByteSink } from './io.js';

export { RecordWriter, withWriter, writeRecords, encodeRecords } from './writer.js';
export type { WriterOptions, WriteDestination } from './writer.js';

export { RecordReader, readRecords } from './reader.js';
export type {
  ReaderOptions,
  ReadSource,
  RawFrame,
  RecordEntry,
  RecordValue,
  RecordFailure,
  ReadResult,
} from './reader.js';
