import { ValidationError } from "../errors/index.js";
import type { BackgroundInput, OutputFormat, Rgba } from "../types/index.js";

export const TRANSPARENT: Readonly<Rgba> = Object.freeze({ r: 0, g: 0, b: 0, alpha: 0 });
export const WHITE: Readonly<Rgba> = Object.freeze({ r: 255, g: 255, b: 255, alpha: 1 });

const HEX_PATTERN = /^#([0-9a-f]{3,4}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

/**
 * Normalize a background colour to a frozen RGBA value.
 *
 * @params {BackgroundInput} input: RGBA object, "transparent" or hex string
 * @returns {Readonly<Rgba>}
 */
export function parseColor(input: BackgroundInput): Readonly<Rgba> {
  if (typeof input !== "string") {
    return Object.freeze({
      r: normalizeChannel(input.r, "r"),
      g: normalizeChannel(input.g, "g"),
      b: normalizeChannel(input.b, "b"),
      alpha: normalizeAlpha(input.alpha),
    });
  }

  const value = input.trim().toLowerCase();
  if (value === "transparent") {
    return TRANSPARENT;
  }

  const match = HEX_PATTERN.exec(value);
  if (!match) {
    throw new ValidationError(`Unsupported background colour "${input}".`, "background");
  }

  let hex = match[1];
  if (hex.length <= 4) {
    hex = hex
      .split("")
      .map((digit) => digit + digit)
      .join("");
  }
  const alphaByte = hex.length === 8 ? parseInt(hex.slice(6, 8), 16) : 255;

  return Object.freeze({
    r: parseInt(hex.slice(0, 2), 16),
    g: parseInt(hex.slice(2, 4), 16),
    b: parseInt(hex.slice(4, 6), 16),
    alpha: alphaByte / 255,
  });
}

export function isTransparent(color: Rgba): boolean {
  return color.alpha === 0;
}

/**
 * Background the canvas is actually filled with. JPEG has no alpha channel,
 * so a transparent request becomes white wherever the canvas would show.
 *
 * @params {Rgba} background: requested background
 * @params {OutputFormat} format: output format
 * @params {{ sourceHasAlpha: boolean; coversCanvas: boolean }} coverage: whether anything shows through or around the content
 * @returns {Readonly<Rgba>}
 */
export function resolveCanvasBackground(
  background: Readonly<Rgba>,
  format: OutputFormat,
  coverage: { sourceHasAlpha: boolean; coversCanvas: boolean },
): Readonly<Rgba> {
  const nothingToShow = !coverage.sourceHasAlpha && coverage.coversCanvas;
  if (isTransparent(background) && format === "jpeg" && !nothingToShow) {
    return WHITE;
  }
  return background;
}

function normalizeChannel(value: number, name: string): number {
  if (!Number.isFinite(value) || value < 0 || value > 255) {
    throw new ValidationError(`background.${name} must be between 0 and 255.`, "background");
  }
  return Math.round(value);
}

function normalizeAlpha(value: number): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ValidationError("background.alpha must be between 0 and 1.", "background");
  }
  return value;
}
