import sharp from "sharp";
import { DecodeError, EncodeError, RenderError } from "../errors/index.js";
import { resolveCanvasBackground } from "../services/color.service.js";
import { readEntireStream } from "../streams/index.js";
import type {
  ImageBackend,
  OutputFormat,
  RenderRequest,
  Size,
  SourceStream,
} from "../types/index.js";

/** Decoded pixels, always 4-channel raw RGBA. */
export interface SharpImage {
  readonly data: Buffer;
  readonly width: number;
  readonly height: number;
  readonly hasAlpha: boolean;
  released: boolean;
}

const CHANNELS = 4;

/**
 * Image backend on top of sharp (libvips).
 */
export class SharpBackend implements ImageBackend<SharpImage> {
  async decode(source: SourceStream, honorColorProfile: boolean): Promise<SharpImage> {
    const bytes = await readEntireStream(source);
    try {
      const metadata = await sharp(bytes).metadata();
      let pipe = sharp(bytes);
      if (honorColorProfile) pipe = pipe.toColourspace("srgb");

      const { data, info } = await pipe
        .ensureAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });

      return {
        data,
        width: info.width,
        height: info.height,
        hasAlpha: metadata.hasAlpha ?? false,
        released: false,
      };
    } catch (e) {
      throw new DecodeError("Failed to decode source image.", { cause: e });
    }
  }

  sizeOf(image: SharpImage): Size {
    return { width: image.width, height: image.height };
  }

  async render(image: SharpImage, request: RenderRequest): Promise<SharpImage> {
    if (image.released) {
      throw new RenderError("Cannot render a released image.");
    }

    const { copyRegion, canvasSize, targetRegion, format } = request;
    const left = clamp(Math.round(copyRegion.x), 0, image.width - 1);
    const top = clamp(Math.round(copyRegion.y), 0, image.height - 1);
    const width = clamp(Math.round(copyRegion.width), 1, image.width - left);
    const height = clamp(Math.round(copyRegion.height), 1, image.height - top);
    const targetWidth = Math.max(1, Math.round(targetRegion.width));
    const targetHeight = Math.max(1, Math.round(targetRegion.height));

    const coversCanvas =
      targetRegion.x === 0 &&
      targetRegion.y === 0 &&
      targetWidth === canvasSize.width &&
      targetHeight === canvasSize.height;
    const background = resolveCanvasBackground(request.background, format, {
      sourceHasAlpha: image.hasAlpha,
      coversCanvas,
    });

    try {
      const content = await sharp(image.data, {
        raw: { width: image.width, height: image.height, channels: CHANNELS },
      })
        .extract({ left, top, width, height })
        .resize(targetWidth, targetHeight, { fit: "fill", kernel: sharp.kernel.lanczos3 })
        .raw()
        .toBuffer();

      const { data, info } = await sharp({
        create: {
          width: canvasSize.width,
          height: canvasSize.height,
          channels: CHANNELS,
          background,
        },
      })
        .composite([
          {
            input: content,
            raw: { width: targetWidth, height: targetHeight, channels: CHANNELS },
            left: Math.round(targetRegion.x),
            top: Math.round(targetRegion.y),
          },
        ])
        .raw()
        .toBuffer({ resolveWithObject: true });

      return {
        data,
        width: info.width,
        height: info.height,
        hasAlpha: image.hasAlpha || background.alpha < 1,
        released: false,
      };
    } catch (e) {
      throw new RenderError("Failed to render resized image.", { cause: e });
    }
  }

  async encode(image: SharpImage, format: OutputFormat, quality: number): Promise<Buffer> {
    if (image.released) {
      throw new EncodeError("Cannot encode a released image.");
    }
    try {
      const pipe = sharp(image.data, {
        raw: { width: image.width, height: image.height, channels: CHANNELS },
      });
      if (format === "jpeg") {
        return await pipe
          .flatten({ background: "#ffffff" })
          .jpeg({ quality: clamp(quality, 1, 100), chromaSubsampling: "4:4:4" })
          .toBuffer();
      }
      return await pipe.png({ compressionLevel: 9 }).toBuffer();
    } catch (e) {
      throw new EncodeError(`Failed to encode ${format} image.`, { cause: e });
    }
  }

  release(image: SharpImage): void {
    image.released = true;
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
