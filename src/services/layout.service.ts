import { ValidationError } from "../errors/index.js";
import type { LayoutResult, Rectangle, Size } from "../types/index.js";
import {
  centerInside,
  fitsInside,
  roundSize,
  scaleInside,
  toRectangle,
} from "./box-math.service.js";
import type { ResizeJob } from "./resize-job.service.js";

type LayoutRequest = Pick<ResizeJob, "width" | "height" | "mode" | "scale">;

/**
 * Compute the copy region, canvas size and target region for resizing an
 * image of `originalSize` according to `job`. Pure: sizes are kept as floats
 * throughout and rounded once at the end.
 *
 * @params {Size} originalSize: decoded source size
 * @params {LayoutRequest} job: requested dimensions, fit mode and scale mode
 * @returns {LayoutResult}
 */
export function layout(originalSize: Size, job: LayoutRequest): LayoutResult {
  assertOriginalSize(originalSize);

  const originalRect = toRectangle(originalSize);
  let copyRegion: Rectangle = originalRect;
  let targetSize: Size = originalSize;
  let canvasSize: Size = originalSize;

  const bounds = resolveBounds(originalSize, job.width, job.height);
  if (bounds) {
    switch (job.mode) {
      case "max":
        canvasSize = targetSize = scaleInside(originalSize, bounds);
        break;
      case "pad":
        canvasSize = bounds;
        targetSize = scaleInside(originalSize, canvasSize);
        break;
      case "crop": {
        canvasSize = targetSize = bounds;
        // Largest area of the source with the aspect ratio of the bounds
        const copySize = roundSize(scaleInside(bounds, originalSize));
        copyRegion = centerInside(copySize, originalRect);
        break;
      }
      default:
        // stretch and carve both distort to the exact bounds
        canvasSize = targetSize = bounds;
    }
  }

  // Without upscaling, the content never grows beyond the original
  if (job.scale !== "upscaleBoth" && fitsInside(originalSize, targetSize)) {
    targetSize = originalSize;
    copyRegion = originalRect;
    if (job.scale !== "upscaleCanvas") {
      canvasSize = targetSize;
    }
  }

  const canvas = roundSize(canvasSize);
  const target = roundSize(targetSize);

  return Object.freeze({
    copyRegion: Object.freeze({ ...copyRegion }),
    canvasSize: Object.freeze(canvas),
    targetRegion: Object.freeze(centerInside(target, toRectangle(canvas))),
  });
}

/**
 * Resolve the requested bounds, deriving a missing dimension from the
 * original aspect ratio.
 *
 * @params {Size} originalSize: decoded source size
 * @params {number | undefined} width: requested width
 * @params {number | undefined} height: requested height
 * @returns {Size | null}
 */
function resolveBounds(
  originalSize: Size,
  width: number | undefined,
  height: number | undefined,
): Size | null {
  if (width !== undefined && height !== undefined) {
    return { width, height };
  }

  const ratio = originalSize.width / originalSize.height;
  if (width !== undefined) {
    return { width, height: width / ratio };
  }
  if (height !== undefined) {
    return { width: height * ratio, height };
  }
  return null;
}

function assertOriginalSize(size: Size): void {
  if (
    !Number.isFinite(size.width) ||
    !Number.isFinite(size.height) ||
    size.width <= 0 ||
    size.height <= 0
  ) {
    throw new ValidationError(
      `Original size must be positive: ${size.width}x${size.height}.`,
      "originalSize",
    );
  }
}

export const __test__ = {
  resolveBounds,
};
