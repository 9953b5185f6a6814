import { z } from "zod";
import { CONFIG } from "../config.js";
import { ValidationError } from "../errors/index.js";
import type {
  FitMode,
  OutputFormat,
  ResizeJobInit,
  Rgba,
  ScaleMode,
} from "../types/index.js";
import { parseColor, TRANSPARENT } from "./color.service.js";

const MIN_QUALITY = 0;
const MAX_QUALITY = 100;

const ResizeJobSchema = z
  .object({
    width: z.number().optional(),
    height: z.number().optional(),
    mode: z.enum(["max", "pad", "crop", "stretch", "carve"]).optional(),
    scale: z.enum(["downscaleOnly", "upscaleBoth", "upscaleCanvas"]).optional(),
    background: z
      .union([
        z.string(),
        z.object({
          r: z.number(),
          g: z.number(),
          b: z.number(),
          alpha: z.number(),
        }),
      ])
      .optional(),
    format: z.enum(["jpeg", "png"]).optional(),
    quality: z.number().optional(),
    ignoreIcc: z.boolean().optional(),
  })
  .strict();

/**
 * Immutable, validated resize request. Invalid input fails here, never
 * later during layout or rendering.
 */
export class ResizeJob {
  readonly width?: number;
  readonly height?: number;
  readonly mode: FitMode;
  readonly scale: ScaleMode;
  readonly background: Readonly<Rgba>;
  readonly format: OutputFormat;
  readonly quality: number;
  readonly ignoreIcc: boolean;

  constructor(init: ResizeJobInit = {}) {
    const options = parseInit(init);

    this.width =
      options.width === undefined ? undefined : normalizeDimension(options.width, "width");
    this.height =
      options.height === undefined ? undefined : normalizeDimension(options.height, "height");
    this.mode = options.mode ?? "max";
    this.scale = options.scale ?? "downscaleOnly";
    this.background =
      options.background === undefined ? TRANSPARENT : parseColor(options.background);
    this.format = options.format ?? "jpeg";
    this.quality = normalizeQuality(options.quality);
    this.ignoreIcc = options.ignoreIcc ?? false;

    Object.freeze(this);
  }

  static from(job: ResizeJob | ResizeJobInit): ResizeJob {
    return job instanceof ResizeJob ? job : new ResizeJob(job);
  }

  /** New job with `changes` applied on top of this one. */
  with(changes: ResizeJobInit): ResizeJob {
    return new ResizeJob({ ...this.toInit(), ...changes });
  }

  toInit(): ResizeJobInit {
    return {
      width: this.width,
      height: this.height,
      mode: this.mode,
      scale: this.scale,
      background: { ...this.background },
      format: this.format,
      quality: this.quality,
      ignoreIcc: this.ignoreIcc,
    };
  }
}

function parseInit(init: ResizeJobInit): ResizeJobInit {
  const result = ResizeJobSchema.safeParse(init);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue === undefined ? undefined : issue.path.join(".");
    const message = issue === undefined ? "Invalid resize job." : issue.message;
    throw new ValidationError(
      field ? `Invalid resize job: ${field}: ${message}` : `Invalid resize job: ${message}`,
      field || undefined,
      { cause: result.error },
    );
  }
  return result.data;
}

/**
 * Normalize a dimension value and round to an integer.
 *
 * @params {number} value: raw dimension value
 * @params {string} name: dimension label for error messages
 * @returns {number}
 */
function normalizeDimension(value: number, name: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive number.`, name);
  }
  const normalized = Math.round(value);
  if (normalized <= 0) {
    throw new ValidationError(`${name} must be a positive number.`, name);
  }
  return normalized;
}

/**
 * Normalize encoder quality, clamping out-of-range values.
 *
 * @params {number | undefined} quality: requested quality value
 * @returns {number}
 */
function normalizeQuality(quality?: number): number {
  if (quality === undefined) {
    return CONFIG.DEFAULT_QUALITY;
  }
  if (!Number.isFinite(quality)) {
    throw new ValidationError("quality must be a finite number.", "quality");
  }
  return Math.min(MAX_QUALITY, Math.max(MIN_QUALITY, Math.round(quality)));
}

export const __test__ = {
  normalizeDimension,
  normalizeQuality,
  parseInit,
};
