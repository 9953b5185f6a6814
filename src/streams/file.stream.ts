import fs from "fs";
import path from "path";
import { DirectoryNotFoundError, IOError, isErrnoException } from "../errors/index.js";
import type { DestinationStream, SourceStream } from "../types/index.js";

type FileHandle = fs.promises.FileHandle;

/**
 * Seekable read stream over a file handle.
 */
export class FileSourceStream implements SourceStream {
  private position = 0;
  private closed = false;

  private constructor(
    private readonly handle: FileHandle,
    readonly filePath: string,
  ) {}

  static async open(filePath: string): Promise<FileSourceStream> {
    try {
      const handle = await fs.promises.open(filePath, "r");
      return new FileSourceStream(handle, filePath);
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") {
        throw new IOError(`File not found: ${filePath}`, "NOT_FOUND", { cause: e });
      }
      throw new IOError(`Failed to open ${filePath}.`, "READ_FAILED", { cause: e });
    }
  }

  get readable(): boolean {
    return !this.closed;
  }

  get seekable(): boolean {
    return !this.closed;
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
    try {
      const { size } = await this.handle.stat();
      const buffer = Buffer.alloc(Math.max(0, size - this.position));
      let offset = 0;
      while (offset < buffer.length) {
        const { bytesRead } = await this.handle.read(
          buffer,
          offset,
          buffer.length - offset,
          this.position + offset,
        );
        if (bytesRead === 0) {
          break;
        }
        offset += bytesRead;
      }
      this.position += offset;
      return buffer.subarray(0, offset);
    } catch (e) {
      throw new IOError(`Failed to read ${this.filePath}.`, "READ_FAILED", { cause: e });
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.handle.close();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new IOError(`Cannot access closed file ${this.filePath}.`, "CLOSED");
    }
  }
}

/**
 * Write stream over a file handle, truncating any existing file.
 */
export class FileDestinationStream implements DestinationStream {
  private closed = false;

  private constructor(
    private readonly handle: FileHandle,
    readonly filePath: string,
  ) {}

  /**
   * Open `filePath` for writing. A missing parent directory is never created
   * here.
   *
   * @params {string} filePath: destination file
   * @returns {Promise<FileDestinationStream>}
   */
  static async open(filePath: string): Promise<FileDestinationStream> {
    try {
      const handle = await fs.promises.open(filePath, "w");
      return new FileDestinationStream(handle, filePath);
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") {
        throw new DirectoryNotFoundError(path.dirname(filePath), { cause: e });
      }
      throw new IOError(`Failed to open ${filePath}.`, "WRITE_FAILED", { cause: e });
    }
  }

  get writable(): boolean {
    return !this.closed;
  }

  async write(bytes: Uint8Array): Promise<void> {
    if (this.closed) {
      throw new IOError(`Cannot write to closed file ${this.filePath}.`, "CLOSED");
    }
    try {
      let offset = 0;
      while (offset < bytes.length) {
        const { bytesWritten } = await this.handle.write(bytes, offset, bytes.length - offset);
        offset += bytesWritten;
      }
    } catch (e) {
      throw new IOError(`Failed to write ${this.filePath}.`, "WRITE_FAILED", { cause: e });
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.handle.close();
  }
}
