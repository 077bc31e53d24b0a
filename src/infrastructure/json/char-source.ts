import { openSync, readSync, closeSync } from 'node:fs';
import { StringDecoder } from 'node:string_decoder';

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

/**
 * Forward-only supplier of document text, one chunk at a time.
 *
 * `read()` returns `null` once the input is exhausted. The token cursor
 * only ever holds the most recent chunk.
 */
export interface CharSource {
  read(): string | null;
  close(): void;
}

/** Serves an in-memory string, optionally split into fixed-size chunks. */
export class StringCharSource implements CharSource {
  private position = 0;
  private closed = false;

  constructor(
    private readonly text: string,
    private readonly chunkSize: number = DEFAULT_CHUNK_SIZE,
  ) {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
  }

  read(): string | null {
    if (this.closed || this.position >= this.text.length) return null;
    const chunk = this.text.slice(this.position, this.position + this.chunkSize);
    this.position += chunk.length;
    return chunk;
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Reads a UTF-8 file synchronously in fixed-size byte chunks.
 *
 * A multi-byte character split across two reads is held back by the
 * decoder until its remaining bytes arrive. I/O errors from `fs` propagate
 * unchanged.
 */
export class FileCharSource implements CharSource {
  private fd: number | null;
  private readonly buffer: Buffer;
  private readonly decoder = new StringDecoder('utf8');
  private ended = false;

  constructor(
    readonly path: string,
    chunkSize: number = DEFAULT_CHUNK_SIZE,
  ) {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    this.buffer = Buffer.alloc(chunkSize);
    this.fd = openSync(path, 'r');
  }

  read(): string | null {
    const fd = this.fd;
    if (fd === null || this.ended) return null;

    for (;;) {
      const bytesRead = readSync(fd, this.buffer, 0, this.buffer.length, null);
      if (bytesRead === 0) {
        this.ended = true;
        const tail = this.decoder.end();
        return tail.length > 0 ? tail : null;
      }

      const text = this.decoder.write(this.buffer.subarray(0, bytesRead));
      // A read made only of an incomplete character decodes to ''
      if (text.length > 0) return text;
    }
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }
}
