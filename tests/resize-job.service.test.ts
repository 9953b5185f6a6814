import { describe, it, expect } from "vitest";
import { CONFIG } from "../src/config.js";
import { ValidationError } from "../src/errors/index.js";
import { TRANSPARENT } from "../src/services/color.service.js";
import { __test__, ResizeJob } from "../src/services/resize-job.service.js";
import type { ResizeJobInit } from "../src/types/index.js";

const { normalizeDimension, normalizeQuality } = __test__;

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe("normalizeDimension", () => {
  it("rounds and validates values", () => {
    expect(normalizeDimension(10.4, "width")).toBe(10);
    expect(normalizeDimension(10.6, "width")).toBe(11);
  });

  it("throws on invalid values", () => {
    expect(() => normalizeDimension(0, "width")).toThrow("width must be a positive number.");
    expect(() => normalizeDimension(-1, "width")).toThrow(ValidationError);
    expect(() => normalizeDimension(0.4, "height")).toThrow("height must be a positive number.");
    expect(() => normalizeDimension(Number.POSITIVE_INFINITY, "width")).toThrow(ValidationError);
  });
});

describe("normalizeQuality", () => {
  it("returns the configured default when undefined", () => {
    expect(normalizeQuality()).toBe(CONFIG.DEFAULT_QUALITY);
  });

  it("clamps out-of-range values", () => {
    expect(normalizeQuality(-300)).toBe(0);
    expect(normalizeQuality(150)).toBe(100);
    expect(normalizeQuality(85.6)).toBe(86);
  });

  it("throws on non-finite quality", () => {
    expect(() => normalizeQuality(Number.POSITIVE_INFINITY)).toThrow(ValidationError);
  });
});

describe("ResizeJob", () => {
  it("applies defaults", () => {
    const job = new ResizeJob();
    expect(job.width).toBeUndefined();
    expect(job.height).toBeUndefined();
    expect(job.mode).toBe("max");
    expect(job.scale).toBe("downscaleOnly");
    expect(job.background).toEqual(TRANSPARENT);
    expect(job.format).toBe("jpeg");
    expect(job.quality).toBe(CONFIG.DEFAULT_QUALITY);
    expect(job.ignoreIcc).toBe(false);
  });

  it("keeps explicit values", () => {
    const job = new ResizeJob({
      width: 12,
      height: 34,
      mode: "crop",
      scale: "upscaleCanvas",
      background: "#ff0000",
      format: "png",
      quality: 50,
      ignoreIcc: true,
    });
    expect(job.width).toBe(12);
    expect(job.height).toBe(34);
    expect(job.mode).toBe("crop");
    expect(job.scale).toBe("upscaleCanvas");
    expect(job.background).toEqual({ r: 255, g: 0, b: 0, alpha: 1 });
    expect(job.format).toBe("png");
    expect(job.quality).toBe(50);
    expect(job.ignoreIcc).toBe(true);
  });

  it("rejects non-positive dimensions at construction", () => {
    expect(() => new ResizeJob({ width: 0 })).toThrow(ValidationError);
    expect(() => new ResizeJob({ height: -5 })).toThrow(ValidationError);

    const error = captureError(() => new ResizeJob({ height: 0 }));
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ field: "height" });
  });

  it("rejects NaN dimensions through the schema", () => {
    const error = captureError(() => new ResizeJob({ width: Number.NaN }));
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ field: "width" });
  });

  it("rejects unknown modes and keys", () => {
    const badMode = { mode: "seam" } as unknown as ResizeJobInit;
    const badKey = { widht: 10 } as unknown as ResizeJobInit;
    expect(() => new ResizeJob(badMode)).toThrow(ValidationError);
    expect(() => new ResizeJob(badKey)).toThrow(ValidationError);
  });

  it("clamps quality instead of rejecting it", () => {
    expect(new ResizeJob({ quality: -300 }).quality).toBe(0);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(new ResizeJob({ width: 10 }))).toBe(true);
  });

  it("derives new jobs without mutating the original", () => {
    const job = new ResizeJob({ width: 10, mode: "pad", background: "#00ff00" });
    const next = job.with({ height: 20, format: "png" });

    expect(next).not.toBe(job);
    expect(next.width).toBe(10);
    expect(next.height).toBe(20);
    expect(next.mode).toBe("pad");
    expect(next.background).toEqual({ r: 0, g: 255, b: 0, alpha: 1 });
    expect(next.format).toBe("png");
    expect(job.height).toBeUndefined();
    expect(job.format).toBe("jpeg");
  });

  it("validates derived jobs", () => {
    expect(() => new ResizeJob({ width: 10 }).with({ width: -1 })).toThrow(ValidationError);
  });

  it("returns existing instances from `from`", () => {
    const job = new ResizeJob({ width: 10 });
    expect(ResizeJob.from(job)).toBe(job);
    expect(ResizeJob.from({ width: 10 })).toBeInstanceOf(ResizeJob);
  });
});
