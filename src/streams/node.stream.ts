import { Readable, Writable } from "stream";
import { finished } from "stream/promises";
import { IOError } from "../errors/index.js";
import type { DestinationStream, SourceStream } from "../types/index.js";

/**
 * Forward-only source over a Node.js Readable.
 */
export class ReadableSourceStream implements SourceStream {
  private position = 0;

  constructor(private readonly stream: Readable) {}

  get readable(): boolean {
    return !this.stream.destroyed;
  }

  readonly seekable = false;

  getPosition(): number {
    return this.position;
  }

  setPosition(_position: number): void {
    throw new IOError("Readable streams do not support seeking.", "NOT_SEEKABLE");
  }

  async readToEnd(): Promise<Buffer> {
    if (this.stream.destroyed) {
      throw new IOError("Cannot read a destroyed stream.", "CLOSED");
    }
    const chunks: Buffer[] = [];
    try {
      for await (const chunk of this.stream) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      }
    } catch (e) {
      throw new IOError("Failed to read source stream.", "READ_FAILED", { cause: e });
    }
    const bytes = Buffer.concat(chunks);
    this.position += bytes.length;
    return bytes;
  }

  async close(): Promise<void> {
    this.stream.destroy();
  }
}

/**
 * Destination over a Node.js Writable. Closing ends the stream and waits for
 * it to finish.
 */
export class WritableDestinationStream implements DestinationStream {
  private failure: Error | null = null;

  constructor(private readonly stream: Writable) {
    // Failures reach the caller through write(); the emitted event is only recorded
    stream.on("error", (error) => {
      this.failure ??= error;
    });
  }

  get writable(): boolean {
    return this.failure === null && this.stream.writable;
  }

  write(bytes: Uint8Array): Promise<void> {
    if (this.failure) {
      return Promise.reject(
        new IOError("Destination stream failed earlier.", "WRITE_FAILED", { cause: this.failure }),
      );
    }
    if (!this.stream.writable) {
      return Promise.reject(new IOError("Cannot write to a closed stream.", "CLOSED"));
    }
    return new Promise((resolve, reject) => {
      this.stream.write(bytes, (error) => {
        if (error) {
          this.failure ??= error;
          reject(new IOError("Failed to write destination stream.", "WRITE_FAILED", { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * End the stream and wait for it to finish. A stream destroyed by a failed
   * write has already reported its error and is left as is.
   */
  async close(): Promise<void> {
    if (this.failure || this.stream.destroyed || this.stream.writableEnded) {
      return;
    }
    this.stream.end();
    try {
      await finished(this.stream);
    } catch (e) {
      throw new IOError("Failed to close destination stream.", "WRITE_FAILED", { cause: e });
    }
  }
}
