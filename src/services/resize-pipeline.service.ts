import { ValidationError } from "../errors/index.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import { copyToMemoryStream } from "../streams/index.js";
import {
  StreamOptions,
  type ImageBackend,
  type ImageConsumer,
  type SourceStream,
} from "../types/index.js";
import { layout } from "./layout.service.js";
import { ResizeJob } from "./resize-job.service.js";
import { withRelease } from "./teardown.service.js";

const VALID_STREAM_OPTIONS =
  StreamOptions.BufferInMemory |
  StreamOptions.LeaveSourceOpen |
  StreamOptions.RewindSource |
  StreamOptions.LeaveDestinationOpen |
  StreamOptions.CreateDestinationDirectory;

/**
 * Reject anything but a combination of the known stream option flags.
 *
 * @params {StreamOptions} options: flag set to check
 * @returns {void}
 */
export function validateStreamOptions(options: StreamOptions): void {
  if (!Number.isInteger(options) || options < 0 || (options & ~VALID_STREAM_OPTIONS) !== 0) {
    throw new ValidationError(`Unrecognized stream options: ${options}.`, "streamOptions");
  }
}

export function hasStreamOption(options: StreamOptions, flag: StreamOptions): boolean {
  return (options & flag) === flag;
}

/**
 * Decode `source`, lay it out and render it through `backend`, then hand the
 * rendered image to `consumer`.
 *
 * Releases happen in a fixed order whatever fails: the decoded image, then
 * the memory buffer, then the source stream is closed or rewound. The
 * rendered image is released once `consumer` settles, or as soon as a
 * later release fails; `consumer` is not called when decoding, rendering or
 * one of those releases fails.
 *
 * @params {ImageBackend<TImage>} backend: decode/render capability
 * @params {SourceStream} source: encoded image bytes
 * @params {StreamOptions} streamOptions: buffering and stream ownership flags
 * @params {ResizeJob} job: validated resize request
 * @params {ImageConsumer<TImage>} consumer: receives the rendered image
 * @params {Logger} log: receives debug output and secondary release failures
 * @returns {Promise<void>}
 */
export async function runResizePipeline<TImage>(
  backend: ImageBackend<TImage>,
  source: SourceStream,
  streamOptions: StreamOptions,
  job: ResizeJob,
  consumer: ImageConsumer<TImage>,
  log: Logger = defaultLogger,
): Promise<void> {
  validateStreamOptions(streamOptions);
  if (!(job instanceof ResizeJob)) {
    throw new ValidationError("job must be a ResizeJob.", "job");
  }

  const leaveSourceOpen = hasStreamOption(streamOptions, StreamOptions.LeaveSourceOpen);
  const bufferSource = hasStreamOption(streamOptions, StreamOptions.BufferInMemory);
  const originalPosition =
    hasStreamOption(streamOptions, StreamOptions.RewindSource) && source.seekable
      ? source.getPosition()
      : -1;
  let sourceReleased = false;
  // Set as soon as rendering succeeds, so a failing teardown step cannot leak it
  const held: { rendered?: { image: TImage } } = {};

  const renderFrom = async (active: SourceStream): Promise<TImage> => {
    const decoded = await backend.decode(active, !job.ignoreIcc);
    return withRelease(
      async () => {
        const originalSize = backend.sizeOf(decoded);
        const geometry = layout(originalSize, job);
        log.debug(
          `layout ${originalSize.width}x${originalSize.height} -> ` +
            `${geometry.canvasSize.width}x${geometry.canvasSize.height} (${job.mode}, ${job.scale})`,
        );
        const image = await backend.render(decoded, {
          copyRegion: geometry.copyRegion,
          canvasSize: geometry.canvasSize,
          targetRegion: geometry.targetRegion,
          background: job.background,
          format: job.format,
        });
        held.rendered = { image };
        return image;
      },
      () => backend.release(decoded),
      log,
      "decoded image",
    );
  };

  const renderFromBuffer = async (): Promise<TImage> => {
    const buffer = await copyToMemoryStream(source);
    return withRelease(
      async () => {
        // Early release lets the same file be read and overwritten in one call
        if (!leaveSourceOpen) {
          sourceReleased = true;
          await source.close();
        }
        return renderFrom(buffer);
      },
      () => buffer.close(),
      log,
      "memory buffer",
    );
  };

  const settleSource = async (): Promise<void> => {
    if (sourceReleased) {
      return;
    }
    if (!leaveSourceOpen) {
      await source.close();
    } else if (originalPosition > -1 && source.seekable) {
      source.setPosition(originalPosition);
    }
  };

  let rendered: TImage;
  try {
    rendered = await withRelease(
      () => (bufferSource ? renderFromBuffer() : renderFrom(source)),
      settleSource,
      log,
      "source stream",
    );
  } catch (error) {
    if (held.rendered) {
      try {
        await backend.release(held.rendered.image);
      } catch (releaseError) {
        log.warn("failed to release rendered image after an earlier error", releaseError);
      }
    }
    throw error;
  }

  await withRelease(
    async () => consumer(rendered),
    () => backend.release(rendered),
    log,
    "rendered image",
  );
}
