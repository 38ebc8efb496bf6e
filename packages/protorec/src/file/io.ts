/**
 * Synchronous byte sources and sinks the reader and writer run on.
 *
 * Sources are positional: the reader asks for exactly the bytes of one frame
 * header or payload at a time. Sinks append, and can overwrite bytes already
 * written (the writer uses that once, to patch the header on close).
 */

import { closeSync, fstatSync, openSync, readSync, writeSync } from 'node:fs';
import { ErrorCode, ioError, ProtorecError } from '../types/errors.js';

/** Default write buffer size (64 KB) */
export const DEFAULT_BUFFER_SIZE = 64 * 1024;

export interface ByteSource {
  /** Total bytes available, fixed when the source is opened */
  readonly size: number;
  /** Read up to `length` bytes at `offset`; fewer only at end of source */
  read(offset: number, length: number): Uint8Array;
  close(): void;
}

export interface ByteSink {
  /** Append bytes */
  write(bytes: Uint8Array): void;
  /** Overwrite bytes that were already written */
  writeAt(position: number, bytes: Uint8Array): void;
  /** Push buffered bytes to the underlying storage */
  flush(): void;
  close(): void;
}

/**
 * Source over bytes already in memory
 */
export class BufferSource implements ByteSource {
  constructor(private readonly bytes: Uint8Array) {}

  get size(): number {
    return this.bytes.length;
  }

  read(offset: number, length: number): Uint8Array {
    return this.bytes.subarray(offset, offset + length);
  }

  close(): void {}
}

/**
 * Source over a file, read with positional reads
 */
export class FileSource implements ByteSource {
  private fd: number | null;

  private constructor(
    fd: number,
    readonly size: number,
    readonly path: string
  ) {
    this.fd = fd;
  }

  static open(path: string): FileSource {
    let fd: number;
    try {
      fd = openSync(path, 'r');
    } catch (error) {
      throw ioError(`Cannot open ${path} for reading`, error);
    }
    try {
      return new FileSource(fd, fstatSync(fd).size, path);
    } catch (error) {
      closeSync(fd);
      throw ioError(`Cannot stat ${path}`, error);
    }
  }

  read(offset: number, length: number): Uint8Array {
    if (this.fd === null) {
      throw new ProtorecError(ErrorCode.ERR_IO, `Source ${this.path} is closed`);
    }
    const buffer = new Uint8Array(length);
    let total = 0;
    try {
      while (total < length) {
        const bytesRead = readSync(this.fd, buffer, total, length - total, offset + total);
        if (bytesRead === 0) {
          break;
        }
        total += bytesRead;
      }
    } catch (error) {
      throw ioError(`Cannot read ${this.path}`, error);
    }
    return total === length ? buffer : buffer.subarray(0, total);
  }

  close(): void {
    if (this.fd === null) {
      return;
    }
    const fd = this.fd;
    this.fd = null;
    try {
      closeSync(fd);
    } catch (error) {
      throw ioError(`Cannot close ${this.path}`, error);
    }
  }
}

/**
 * Sink that keeps everything in memory
 */
export class MemorySink implements ByteSink {
  private buffer: Uint8Array;
  private length = 0;

  constructor(initialCapacity: number = 1024) {
    this.buffer = new Uint8Array(Math.max(initialCapacity, 16));
  }

  write(bytes: Uint8Array): void {
    this.ensureCapacity(this.length + bytes.length);
    this.buffer.set(bytes, this.length);
    this.length += bytes.length;
  }

  writeAt(position: number, bytes: Uint8Array): void {
    if (position < 0 || position + bytes.length > this.length) {
      throw new ProtorecError(ErrorCode.ERR_IO, `Cannot overwrite ${bytes.length} bytes at ${position}`);
    }
    this.buffer.set(bytes, position);
  }

  flush(): void {}

  close(): void {}

  /**
   * Copy of everything written so far
   */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }

  private ensureCapacity(needed: number): void {
    if (needed <= this.buffer.length) {
      return;
    }
    let capacity = this.buffer.length;
    while (capacity < needed) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this.buffer.subarray(0, this.length));
    this.buffer = grown;
  }
}

/**
 * Buffered sink over a file. The file is created, or truncated if it exists.
 */
export class FileSink implements ByteSink {
  private fd: number | null;
  private readonly buffer: Uint8Array;
  private buffered = 0;
  /** Bytes already handed to the file */
  private flushed = 0;

  private constructor(
    fd: number,
    readonly path: string,
    private readonly bufferSize: number
  ) {
    this.fd = fd;
    this.buffer = new Uint8Array(bufferSize);
  }

  static open(path: string, bufferSize: number = DEFAULT_BUFFER_SIZE): FileSink {
    let fd: number;
    try {
      fd = openSync(path, 'w');
    } catch (error) {
      throw ioError(`Cannot open ${path} for writing`, error);
    }
    return new FileSink(fd, path, Math.max(bufferSize, 1));
  }

  write(bytes: Uint8Array): void {
    if (bytes.length > this.bufferSize - this.buffered) {
      this.flush();
    }
    if (bytes.length >= this.bufferSize) {
      this.writeFully(bytes, this.flushed);
      this.flushed += bytes.length;
      return;
    }
    this.buffer.set(bytes, this.buffered);
    this.buffered += bytes.length;
  }

  writeAt(position: number, bytes: Uint8Array): void {
    this.flush();
    if (position < 0 || position + bytes.length > this.flushed) {
      throw new ProtorecError(ErrorCode.ERR_IO, `Cannot overwrite ${bytes.length} bytes at ${position} in ${this.path}`);
    }
    this.writeFully(bytes, position);
  }

  flush(): void {
    if (this.buffered === 0) {
      return;
    }
    const chunk = this.buffer.subarray(0, this.buffered);
    this.writeFully(chunk, this.flushed);
    this.flushed += this.buffered;
    this.buffered = 0;
  }

  /**
   * Flush and release the file. The descriptor is closed even when the final
   * flush fails.
   */
  close(): void {
    const fd = this.fd;
    if (fd === null) {
      return;
    }
    let failure: unknown;
    try {
      this.flush();
    } catch (error) {
      failure = error;
    }
    this.fd = null;
    try {
      closeSync(fd);
    } catch (error) {
      failure ??= ioError(`Cannot close ${this.path}`, error);
    }
    if (failure !== undefined) {
      throw failure;
    }
  }

  private writeFully(bytes: Uint8Array, position: number): void {
    if (this.fd === null) {
      throw new ProtorecError(ErrorCode.ERR_IO, `Sink ${this.path} is closed`);
    }
    let written = 0;
    try {
      while (written < bytes.length) {
        written += writeSync(this.fd, bytes, written, bytes.length - written, position + written);
      }
    } catch (error) {
      throw ioError(`Cannot write ${this.path}`, error);
    }
  }
}
