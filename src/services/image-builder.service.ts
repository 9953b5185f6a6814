import fs from "fs";
import path from "path";
import { Readable, Writable } from "stream";
import { SharpBackend, type SharpImage } from "../backends/sharp.backend.js";
import { IOError } from "../errors/index.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import {
  FileDestinationStream,
  FileSourceStream,
  ReadableSourceStream,
  WritableDestinationStream,
} from "../streams/index.js";
import {
  StreamOptions,
  type DestinationStream,
  type ImageBackend,
  type ImageConsumer,
  type ResizeJobInit,
  type SourceStream,
} from "../types/index.js";
import { ResizeJob } from "./resize-job.service.js";
import {
  hasStreamOption,
  runResizePipeline,
  validateStreamOptions,
} from "./resize-pipeline.service.js";
import { withRelease } from "./teardown.service.js";

/** File path, source stream or Node.js Readable. */
export type ImageSource = string | SourceStream | Readable;

/** File path, destination stream, Node.js Writable or a callback. */
export type ImageDestination<TImage> =
  | string
  | DestinationStream
  | Writable
  | ImageConsumer<TImage>;

export interface ImageBuilderOptions {
  logger?: Logger;
}

export interface ImageBuilder<TImage> {
  build(
    source: ImageSource,
    destination: ImageDestination<TImage>,
    job: ResizeJob | ResizeJobInit,
    streamOptions?: StreamOptions,
  ): Promise<void>;
}

/**
 * Create a builder that resizes any source into any destination through
 * `backend`.
 *
 * @params {ImageBackend<TImage>} backend: decode/render/encode capability
 * @params {ImageBuilderOptions} options: builder configuration
 * @returns {ImageBuilder<TImage>}
 */
export function createImageBuilder<TImage>(
  backend: ImageBackend<TImage>,
  options: ImageBuilderOptions = {},
): ImageBuilder<TImage> {
  const log = options.logger ?? defaultLogger;

  return {
    async build(source, destination, jobInput, streamOptions = StreamOptions.None) {
      validateStreamOptions(streamOptions);
      const job = ResizeJob.from(jobInput);
      const consumer = toConsumer(backend, destination, job, streamOptions, log);

      if (typeof source !== "string") {
        return runResizePipeline(backend, toSourceStream(source), streamOptions, job, consumer, log);
      }

      // The builder owns a stream it opened itself
      let sourceOptions =
        streamOptions & ~(StreamOptions.LeaveSourceOpen | StreamOptions.RewindSource);
      if (typeof destination === "string" && isSamePath(source, destination)) {
        sourceOptions |= StreamOptions.BufferInMemory;
      }
      const stream = await FileSourceStream.open(source);
      return runResizePipeline(backend, stream, sourceOptions, job, consumer, log);
    },
  };
}

const sharpBuilder = createImageBuilder(new SharpBackend());

/**
 * Resize with the sharp backend.
 */
export const buildImage: ImageBuilder<SharpImage>["build"] = (
  source,
  destination,
  job,
  streamOptions,
) => sharpBuilder.build(source, destination, job, streamOptions);

function toSourceStream(source: SourceStream | Readable): SourceStream {
  return source instanceof Readable ? new ReadableSourceStream(source) : source;
}

function toConsumer<TImage>(
  backend: ImageBackend<TImage>,
  destination: ImageDestination<TImage>,
  job: ResizeJob,
  streamOptions: StreamOptions,
  log: Logger,
): ImageConsumer<TImage> {
  if (typeof destination === "function") {
    return destination;
  }
  if (typeof destination === "string") {
    const createDirectory = hasStreamOption(
      streamOptions,
      StreamOptions.CreateDestinationDirectory,
    );
    return (image) => writeToPath(backend, image, destination, job, createDirectory, log);
  }

  const target =
    destination instanceof Writable ? new WritableDestinationStream(destination) : destination;
  const leaveOpen = hasStreamOption(streamOptions, StreamOptions.LeaveDestinationOpen);
  return (image) =>
    withRelease(
      async () => {
        const bytes = await backend.encode(image, job.format, job.quality);
        await target.write(bytes);
      },
      () => (leaveOpen ? undefined : target.close()),
      log,
      "destination stream",
    );
}

/**
 * Encode and write to a file. Encoding runs first so a failed encode leaves
 * no file behind.
 *
 * @params {ImageBackend<TImage>} backend: encoder
 * @params {TImage} image: rendered image
 * @params {string} filePath: destination file
 * @params {ResizeJob} job: output format and quality
 * @params {boolean} createDirectory: create missing parent directories
 * @params {Logger} log: receives secondary close failures
 * @returns {Promise<void>}
 */
async function writeToPath<TImage>(
  backend: ImageBackend<TImage>,
  image: TImage,
  filePath: string,
  job: ResizeJob,
  createDirectory: boolean,
  log: Logger,
): Promise<void> {
  const bytes = await backend.encode(image, job.format, job.quality);

  if (createDirectory) {
    const directory = path.dirname(filePath);
    try {
      await fs.promises.mkdir(directory, { recursive: true });
    } catch (e) {
      throw new IOError(`Failed to create directory ${directory}.`, "WRITE_FAILED", { cause: e });
    }
  }

  const file = await FileDestinationStream.open(filePath);
  await withRelease(() => file.write(bytes), () => file.close(), log, "destination file");
}

function isSamePath(a: string, b: string): boolean {
  return path.resolve(a) === path.resolve(b);
}

export const __test__ = {
  isSamePath,
  toSourceStream,
};
