/**
 * Lazy record reader.
 *
 * open() validates the header; records() then decodes one frame per pull.
 * Content errors (unknown schema, schema mismatch) come out as entries and the
 * reader moves to the next frame. Frame-boundary errors (truncated frame,
 * corrupt length) are thrown and end the sequence.
 */

import { ErrorCode, ioError, isRecoverable, isTerminal, ProtorecError } from '../types/errors.js';
import type { Variant } from '../types/values.js';
import type { SchemaRegistry } from '../schema/registry.js';
import { MessageCodec } from '../wire/codec.js';
import { type Frame, MAX_FRAME_LENGTH, unframe } from '../wire/framing.js';
import { type FileHeader, HEADER_LENGTH, parseHeader } from './format.js';
import { BufferSource, type ByteSource, FileSource } from './io.js';
import { log } from '../utils/log.js';

export interface ReaderOptions<V extends Variant> {
  /** Schemas payloads are decoded with */
  registry: SchemaRegistry<V>;
  /**
   * Largest payload length believed, in bytes (default: 16 MB). A frame
   * declaring more is treated as a corrupt length prefix.
   */
  maxFrameLength?: number;
}

/** A file path, bytes in memory, or a source the reader takes ownership of */
export type ReadSource = string | Uint8Array | ByteSource;

interface EntryBase {
  /** Zero-based record index */
  readonly index: number;
  /** Byte offset of the frame */
  readonly position: number;
  readonly tag: number;
  /** Payload length in bytes */
  readonly length: number;
}

export interface RawFrame extends EntryBase {
  readonly payload: Uint8Array;
}

export interface RecordValue<V> extends EntryBase {
  readonly ok: true;
  readonly value: V;
}

export interface RecordFailure extends EntryBase {
  readonly ok: false;
  readonly error: ProtorecError;
}

export type RecordEntry<V> = RecordValue<V> | RecordFailure;

export interface ReadResult<V> {
  entries: RecordEntry<V>[];
  /** Truncated frame or corrupt stream that ended the read early */
  terminal?: ProtorecError;
}

export class RecordReader<V extends Variant> {
  private started = false;
  private closed = false;

  private constructor(
    private readonly source: ByteSource,
    readonly header: FileHeader,
    private readonly codec: MessageCodec<V>,
    private readonly maxFrameLength: number,
    readonly name: string
  ) {}

  /**
   * Open a source and validate its header.
   * Throws ERR_BAD_MAGIC, ERR_UNSUPPORTED_VERSION, ERR_STREAM_CORRUPT (header
   * cut short) or ERR_IO.
   */
  static open<V extends Variant>(source: ReadSource, options: ReaderOptions<V>): RecordReader<V> {
    const name = typeof source === 'string' ? source : '<memory>';
    const byteSource =
      typeof source === 'string'
        ? FileSource.open(source)
        : source instanceof Uint8Array
          ? new BufferSource(source)
          : source;

    let header: FileHeader;
    try {
      header = parseHeader(byteSource.read(0, HEADER_LENGTH));
    } catch (error) {
      byteSource.close();
      throw error instanceof ProtorecError ? error : ioError(`Cannot read header of ${name}`, error);
    }

    log.debug(
      `Opened ${name}: format ${header.major}.${header.minor}, ${byteSource.size} bytes` +
        (header.recordCount !== undefined ? `, ${header.recordCount} records` : ', not finalized')
    );
    return new RecordReader(
      byteSource,
      header,
      new MessageCodec(options.registry),
      options.maxFrameLength ?? MAX_FRAME_LENGTH,
      name
    );
  }

  /**
   * Decoded records in file order.
   * Can only be started once per reader; reopen the source to read again.
   */
  *records(): Generator<RecordEntry<V>, void, undefined> {
    this.claim();
    for (const frame of this.scan()) {
      const { payload, ...base } = frame;
      let entry: RecordEntry<V>;
      try {
        entry = { ...base, ok: true, value: this.codec.decode(frame.tag, payload) };
      } catch (error) {
        if (!isRecoverable(error)) {
          throw error;
        }
        log.debug(`Skipping record ${frame.index} at ${frame.position} in ${this.name}: ${error.message}`);
        const located = new ProtorecError(error.code, error.message, {
          position: frame.position,
          index: frame.index,
          tag: frame.tag,
          cause: error.cause,
        });
        entry = { ...base, ok: false, error: located };
      }
      yield entry;
    }
  }

  /**
   * Frames in file order, without decoding their payloads
   */
  *frames(): Generator<RawFrame, void, undefined> {
    this.claim();
    yield* this.scan();
  }

  /**
   * Drain records(). A truncated or corrupt tail is returned as `terminal`
   * rather than thrown; every other error is thrown.
   */
  readAll(): ReadResult<V> {
    const entries: RecordEntry<V>[] = [];
    try {
      for (const entry of this.records()) {
        entries.push(entry);
      }
    } catch (error) {
      if (isTerminal(error)) {
        return { entries, terminal: error };
      }
      throw error;
    }
    return { entries };
  }

  /**
   * Release the source. Safe mid-sequence: the sequence just ends.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.source.close();
  }

  private claim(): void {
    if (this.started) {
      throw new ProtorecError(ErrorCode.ERR_READER_CONSUMED, `Records of ${this.name} were already read`);
    }
    this.started = true;
  }

  private *scan(): Generator<RawFrame, void, undefined> {
    let offset = HEADER_LENGTH;
    let index = 0;

    while (!this.closed) {
      let frame: Frame | null;
      try {
        frame = unframe(this.source, offset, this.maxFrameLength);
      } catch (error) {
        if (isTerminal(error)) {
          log.debug(`Stopped reading ${this.name} after ${index} records: ${error.message}`);
          throw error;
        }
        throw error instanceof ProtorecError ? error : ioError(`Cannot read ${this.name}`, error);
      }
      if (frame === null) {
        break;
      }

      yield { index, position: offset, tag: frame.tag, length: frame.payload.length, payload: frame.payload };
      offset += frame.bytesConsumed;
      index++;
    }

    if (!this.closed && this.header.recordCount !== undefined && this.header.recordCount !== BigInt(index)) {
      log.warn(`Header of ${this.name} counts ${this.header.recordCount} records, found ${index}`);
    }
  }
}

/**
 * Open, read everything, and close
 */
export function readRecords<V extends Variant>(source: ReadSource, options: ReaderOptions<V>): ReadResult<V> {
  const reader = RecordReader.open(source, options);
  try {
    return reader.readAll();
  } finally {
    reader.close();
  }
}
