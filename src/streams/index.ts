import type { SourceStream } from "../types/index.js";
import { MemoryStream } from "./memory.stream.js";

export { MemoryStream } from "./memory.stream.js";
export { FileDestinationStream, FileSourceStream } from "./file.stream.js";
export { ReadableSourceStream, WritableDestinationStream } from "./node.stream.js";

/**
 * Read the whole stream, starting from the beginning when it can seek.
 *
 * @params {SourceStream} source: stream to read
 * @returns {Promise<Buffer>}
 */
export async function readEntireStream(source: SourceStream): Promise<Buffer> {
  if (source.seekable) {
    source.setPosition(0);
  }
  return source.readToEnd();
}

/**
 * Buffer an entire source into a fresh in-memory stream positioned at 0.
 *
 * @params {SourceStream} source: stream to copy
 * @returns {Promise<MemoryStream>}
 */
export async function copyToMemoryStream(source: SourceStream): Promise<MemoryStream> {
  return new MemoryStream(await readEntireStream(source));
}
