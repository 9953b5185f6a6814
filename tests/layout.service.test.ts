import { describe, it, expect } from "vitest";
import { ValidationError } from "../src/errors/index.js";
import { __test__, layout } from "../src/services/layout.service.js";
import { ResizeJob } from "../src/services/resize-job.service.js";
import type { ResizeJobInit } from "../src/types/index.js";

const { resolveBounds } = __test__;

const run = (width: number, height: number, init: ResizeJobInit) =>
  layout({ width, height }, new ResizeJob(init));

describe("resolveBounds", () => {
  it("returns null without dimensions", () => {
    expect(resolveBounds({ width: 200, height: 100 }, undefined, undefined)).toBeNull();
  });

  it("uses both dimensions verbatim", () => {
    expect(resolveBounds({ width: 200, height: 100 }, 12, 34)).toEqual({ width: 12, height: 34 });
  });

  it("derives height from width", () => {
    expect(resolveBounds({ width: 200, height: 100 }, 100, undefined)).toEqual({
      width: 100,
      height: 50,
    });
  });

  it("derives width from height", () => {
    expect(resolveBounds({ width: 200, height: 100 }, undefined, 50)).toEqual({
      width: 100,
      height: 50,
    });
  });
});

describe("layout", () => {
  describe("without requested dimensions", () => {
    it("keeps the original size", () => {
      expect(run(100, 66, {})).toEqual({
        copyRegion: { x: 0, y: 0, width: 100, height: 66 },
        canvasSize: { width: 100, height: 66 },
        targetRegion: { x: 0, y: 0, width: 100, height: 66 },
      });
    });
  });

  describe("max mode", () => {
    it("halves a square image given only a width", () => {
      expect(run(100, 100, { width: 50 })).toEqual({
        copyRegion: { x: 0, y: 0, width: 100, height: 100 },
        canvasSize: { width: 50, height: 50 },
        targetRegion: { x: 0, y: 0, width: 50, height: 50 },
      });
    });

    it("keeps the aspect ratio inside mismatched bounds", () => {
      const result = run(100, 66, { mode: "max", width: 12, height: 34 });
      expect(result.canvasSize).toEqual({ width: 12, height: 8 });
      expect(result.targetRegion).toEqual({ x: 0, y: 0, width: 12, height: 8 });
    });

    it("derives the width from a height", () => {
      expect(run(200, 100, { height: 50 }).canvasSize).toEqual({ width: 100, height: 50 });
    });

    it("rounds a derived dimension once", () => {
      expect(run(100, 66, { width: 50 }).canvasSize).toEqual({ width: 50, height: 33 });
    });

    it("treats the original width as a no-op", () => {
      expect(run(100, 66, { width: 100 })).toEqual({
        copyRegion: { x: 0, y: 0, width: 100, height: 66 },
        canvasSize: { width: 100, height: 66 },
        targetRegion: { x: 0, y: 0, width: 100, height: 66 },
      });
    });
  });

  describe("pad mode", () => {
    it("uses the exact bounds as canvas and centers the content", () => {
      expect(run(100, 100, { mode: "pad", width: 12, height: 34 })).toEqual({
        copyRegion: { x: 0, y: 0, width: 100, height: 100 },
        canvasSize: { width: 12, height: 34 },
        targetRegion: { x: 0, y: 11, width: 12, height: 12 },
      });
    });

    it("splits an odd leftover evenly", () => {
      const { canvasSize, targetRegion } = run(100, 100, { mode: "pad", width: 12, height: 33 });
      const top = targetRegion.y;
      const bottom = canvasSize.height - (targetRegion.y + targetRegion.height);
      expect(top).toBe(10.5);
      expect(bottom).toBe(10.5);
    });
  });

  describe("crop mode", () => {
    it("fills the exact bounds from a centered source area", () => {
      expect(run(100, 100, { mode: "crop", width: 12, height: 34 })).toEqual({
        copyRegion: { x: 32.5, y: 0, width: 35, height: 100 },
        canvasSize: { width: 12, height: 34 },
        targetRegion: { x: 0, y: 0, width: 12, height: 34 },
      });
    });

    it("crops width when the source is wider", () => {
      expect(run(200, 100, { mode: "crop", width: 100, height: 100 }).copyRegion).toEqual({
        x: 50,
        y: 0,
        width: 100,
        height: 100,
      });
    });

    it("crops height when the source is taller", () => {
      expect(run(100, 200, { mode: "crop", width: 200, height: 100 }).copyRegion).toEqual({
        x: 0,
        y: 75,
        width: 100,
        height: 50,
      });
    });

    it("matches the requested aspect ratio to within a pixel", () => {
      const requests: Array<[number, number]> = [
        [12, 34],
        [70, 20],
        [33, 33],
        [9, 61],
      ];
      for (const [width, height] of requests) {
        const { copyRegion, canvasSize } = run(640, 480, { mode: "crop", width, height });
        expect(canvasSize).toEqual({ width, height });
        expect(Math.abs(copyRegion.width - (copyRegion.height * width) / height)).toBeLessThanOrEqual(1);
      }
    });
  });

  describe.each(["stretch", "carve"] as const)("%s mode", (mode) => {
    it("distorts to the exact bounds", () => {
      expect(run(100, 100, { mode, width: 12, height: 34 })).toEqual({
        copyRegion: { x: 0, y: 0, width: 100, height: 100 },
        canvasSize: { width: 12, height: 34 },
        targetRegion: { x: 0, y: 0, width: 12, height: 34 },
      });
    });
  });

  describe("scale modes", () => {
    it("does not upscale with downscaleOnly", () => {
      const result = run(100, 100, { width: 200, height: 200 });
      expect(result.canvasSize).toEqual({ width: 100, height: 100 });
      expect(result.targetRegion).toEqual({ x: 0, y: 0, width: 100, height: 100 });
    });

    it("upscales content and canvas with upscaleBoth", () => {
      const result = run(100, 100, { width: 200, height: 200, scale: "upscaleBoth" });
      expect(result.canvasSize).toEqual({ width: 200, height: 200 });
      expect(result.targetRegion).toEqual({ x: 0, y: 0, width: 200, height: 200 });
    });

    it("enlarges only the canvas with upscaleCanvas", () => {
      const result = run(100, 100, { width: 200, height: 200, scale: "upscaleCanvas" });
      expect(result.canvasSize).toEqual({ width: 200, height: 200 });
      expect(result.targetRegion).toEqual({ x: 50, y: 50, width: 100, height: 100 });
    });

    it("drops a padded canvas back to the original with downscaleOnly", () => {
      const result = run(100, 100, { mode: "pad", width: 200, height: 300 });
      expect(result.canvasSize).toEqual({ width: 100, height: 100 });
      expect(result.targetRegion).toEqual({ x: 0, y: 0, width: 100, height: 100 });
    });

    it("keeps a padded canvas with upscaleCanvas", () => {
      const result = run(100, 100, { mode: "pad", width: 200, height: 300, scale: "upscaleCanvas" });
      expect(result.canvasSize).toEqual({ width: 200, height: 300 });
      expect(result.targetRegion).toEqual({ x: 50, y: 100, width: 100, height: 100 });
    });

    it("resets the crop area when no upscaling is needed", () => {
      const result = run(100, 100, { mode: "crop", width: 150, height: 120 });
      expect(result.copyRegion).toEqual({ x: 0, y: 0, width: 100, height: 100 });
      expect(result.canvasSize).toEqual({ width: 100, height: 100 });
    });
  });

  it("never upscales max requests larger than the original", () => {
    const originals: Array<[number, number]> = [
      [100, 100],
      [100, 66],
      [31, 77],
    ];
    for (const [width, height] of originals) {
      const result = run(width, height, { width: width + 50, height: height + 10 });
      expect(result.canvasSize).toEqual({ width, height });
      expect(result.targetRegion).toEqual({ x: 0, y: 0, width, height });
    }
  });

  it("is deterministic and frozen", () => {
    const job = new ResizeJob({ mode: "crop", width: 12, height: 34 });
    const first = layout({ width: 100, height: 66 }, job);
    const second = layout({ width: 100, height: 66 }, job);
    expect(second).toEqual(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.copyRegion)).toBe(true);
  });

  it("rejects a non-positive original size", () => {
    expect(() => layout({ width: 0, height: 10 }, new ResizeJob())).toThrow(ValidationError);
  });
});
