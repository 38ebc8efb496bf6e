/**
 * Sequential record writer.
 *
 * The header goes out as soon as the writer opens; each append() encodes,
 * frames and writes one record in call order; close() patches the record
 * count into the header and releases the destination.
 */

import { ioError, ErrorCode, ProtorecError } from '../types/errors.js';
import type { Variant } from '../types/values.js';
import type { SchemaRegistry } from '../schema/registry.js';
import { MessageCodec } from '../wire/codec.js';
import { frameRecord, MAX_FRAME_LENGTH } from '../wire/framing.js';
import { encodeFinalization, encodeHeader, HEADER_LENGTH, OFFSET_FLAGS } from './format.js';
import { type ByteSink, DEFAULT_BUFFER_SIZE, FileSink, MemorySink } from './io.js';
import { log } from '../utils/log.js';

export interface WriterOptions<V extends Variant> {
  /** Schemas values are encoded with */
  registry: SchemaRegistry<V>;
  /** Largest payload accepted, in bytes (default: 16 MB) */
  maxFrameLength?: number;
  /** Write buffer for file destinations, in bytes (default: 64 KB) */
  bufferSize?: number;
}

/** A file path, or a sink the writer takes ownership of */
export type WriteDestination = string | ByteSink;

type WriterState = 'open' | 'failed' | 'closed';

function asIoError(action: string, error: unknown): ProtorecError {
  return error instanceof ProtorecError ? error : ioError(action, error);
}

export class RecordWriter<V extends Variant> {
  private state: WriterState = 'open';
  private position = HEADER_LENGTH;
  private count = 0;

  private constructor(
    private readonly sink: ByteSink,
    private readonly codec: MessageCodec<V>,
    private readonly maxFrameLength: number,
    readonly name: string
  ) {}

  /**
   * Create the destination and write its header.
   * Throws ERR_IO when the destination cannot be written.
   */
  static open<V extends Variant>(destination: WriteDestination, options: WriterOptions<V>): RecordWriter<V> {
    const name = typeof destination === 'string' ? destination : '<sink>';
    const sink =
      typeof destination === 'string'
        ? FileSink.open(destination, options.bufferSize ?? DEFAULT_BUFFER_SIZE)
        : destination;

    try {
      sink.write(encodeHeader());
      sink.flush();
    } catch (error) {
      const failure = asIoError(`Cannot write header to ${name}`, error);
      releaseAfterFailure(sink, name);
      throw failure;
    }

    log.debug(`Opened ${name} for writing`);
    return new RecordWriter(
      sink,
      new MessageCodec(options.registry),
      options.maxFrameLength ?? MAX_FRAME_LENGTH,
      name
    );
  }

  /** Records appended so far */
  get recordCount(): number {
    return this.count;
  }

  /** File size once everything appended so far is flushed */
  get bytesWritten(): number {
    return this.position;
  }

  get closed(): boolean {
    return this.state === 'closed';
  }

  /**
   * Encode and write one record.
   * Returns the byte offset the record's frame starts at.
   */
  append(value: V): number {
    this.assertWritable();

    // Encoding and framing errors surface before anything is written.
    const { tag, payload } = this.codec.encodeRecord(value);
    const frame = frameRecord(tag, payload, this.maxFrameLength);

    const position = this.position;
    try {
      this.sink.write(frame);
    } catch (error) {
      this.state = 'failed';
      throw asIoError(`Cannot append to ${this.name}`, error);
    }
    this.position += frame.length;
    this.count++;
    return position;
  }

  /**
   * Push buffered records to the destination
   */
  flush(): void {
    this.assertWritable();
    try {
      this.sink.flush();
    } catch (error) {
      this.state = 'failed';
      throw asIoError(`Cannot flush ${this.name}`, error);
    }
  }

  /**
   * Finalize the header and release the destination. A writer that failed is
   * released without touching the header. Calling close() again does nothing.
   */
  close(): void {
    if (this.state === 'closed') {
      return;
    }
    const finalize = this.state === 'open';
    this.state = 'closed';

    let failure: ProtorecError | undefined;
    if (finalize) {
      try {
        this.sink.writeAt(OFFSET_FLAGS, encodeFinalization(BigInt(this.count)));
      } catch (error) {
        failure = asIoError(`Cannot finalize ${this.name}`, error);
      }
    }
    try {
      this.sink.close();
    } catch (error) {
      failure ??= asIoError(`Cannot close ${this.name}`, error);
    }
    if (failure) {
      throw failure;
    }
    log.debug(`Closed ${this.name}: ${this.count} records, ${this.position} bytes`);
  }

  private assertWritable(): void {
    if (this.state !== 'open') {
      throw new ProtorecError(ErrorCode.ERR_WRITER_CLOSED, `Writer for ${this.name} is ${this.state}`);
    }
  }
}

function releaseAfterFailure(sink: ByteSink, name: string): void {
  try {
    sink.close();
  } catch (error) {
    log.debug(`Releasing ${name} after a failed write also failed: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Open a writer, hand it to `fn`, and close it however `fn` exits.
 * An error from `fn` wins over one from closing.
 */
export function withWriter<V extends Variant, R>(
  destination: WriteDestination,
  options: WriterOptions<V>,
  fn: (writer: RecordWriter<V>) => R
): R {
  const writer = RecordWriter.open(destination, options);
  let result: R;
  try {
    result = fn(writer);
  } catch (error) {
    try {
      writer.close();
    } catch (closeError) {
      log.debug(`Closing ${writer.name} after an error also failed: ${closeError instanceof Error ? closeError.message : String(closeError)}`);
    }
    throw error;
  }
  writer.close();
  return result;
}

/**
 * Write values to a destination, returning each record's position
 */
export function writeRecords<V extends Variant>(
  destination: WriteDestination,
  values: Iterable<V>,
  options: WriterOptions<V>
): number[] {
  return withWriter(destination, options, (writer) => {
    const positions: number[] = [];
    for (const value of values) {
      positions.push(writer.append(value));
    }
    return positions;
  });
}

/**
 * Encode values into a complete in-memory record file
 */
export function encodeRecords<V extends Variant>(values: Iterable<V>, options: WriterOptions<V>): Uint8Array {
  const sink = new MemorySink();
  writeRecords(sink, values, options);
  return sink.toBytes();
}
