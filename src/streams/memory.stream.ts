import { IOError } from "../errors/index.js";
import type { DestinationStream, SourceStream } from "../types/index.js";

/**
 * Seekable in-memory byte stream, readable and writable until closed.
 */
export class MemoryStream implements SourceStream, DestinationStream {
  private chunks: Buffer;
  private position = 0;
  private closed = false;

  constructor(initial?: Uint8Array) {
    this.chunks = initial ? Buffer.from(initial) : Buffer.alloc(0);
  }

  get readable(): boolean {
    return !this.closed;
  }

  get writable(): boolean {
    return !this.closed;
  }

  get seekable(): boolean {
    return !this.closed;
  }

  get length(): number {
    return this.chunks.length;
  }

  getPosition(): number {
    this.assertOpen();
    return this.position;
  }

  setPosition(position: number): void {
    this.assertOpen();
    if (!Number.isInteger(position) || position < 0) {
      throw new IOError(`Invalid stream position ${position}.`, "READ_FAILED");
    }
    this.position = position;
  }

  async readToEnd(): Promise<Buffer> {
    this.assertOpen();
    const start = Math.min(this.position, this.chunks.length);
    const bytes = Buffer.from(this.chunks.subarray(start));
    this.position = this.chunks.length;
    return bytes;
  }

  async write(bytes: Uint8Array): Promise<void> {
    this.assertOpen();
    const end = this.position + bytes.length;
    if (end > this.chunks.length) {
      const grown = Buffer.alloc(end);
      this.chunks.copy(grown);
      this.chunks = grown;
    }
    this.chunks.set(bytes, this.position);
    this.position = end;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Copy of the full contents, independent of position. Works after close. */
  toBuffer(): Buffer {
    return Buffer.from(this.chunks);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new IOError("Cannot access a closed stream.", "CLOSED");
    }
  }
}
