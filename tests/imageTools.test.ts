import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "fs";
import * as path from "path";
import sharp from "sharp";
import { createImageTools, probeImage } from "../src/media/imageTools";
import { ExternalToolError, InputError } from "../src/lib/errors";
import { cleanupTestDir, createTestDir, createTestImage, TEST_CONFIG } from "./fixtures";

const STYLE = { fontFamily: TEST_CONFIG.fontFamily, lineHeightRatio: TEST_CONFIG.lineHeightRatio };

describe("image tools", () => {
  let dir: string;

  beforeAll(() => {
    dir = createTestDir();
  });

  afterAll(() => {
    cleanupTestDir(dir);
  });

  describe("probeImage", () => {
    it("reads the dimensions", async () => {
      const source = await createTestImage(dir, "wide.png", { width: 64, height: 32 });
      expect(await probeImage(source)).toEqual({ width: 64, height: 32 });
    });

    it("swaps the dimensions of a quarter-turn EXIF orientation", async () => {
      const source = path.join(dir, "rotated.jpg");
      await sharp({
        create: { width: 64, height: 32, channels: 3, background: { r: 10, g: 10, b: 10 } },
      })
        .jpeg()
        .withMetadata({ orientation: 6 })
        .toFile(source);
      expect(await probeImage(source)).toEqual({ width: 32, height: 64 });
    });

    it("rejects a missing file", async () => {
      const missing = path.join(dir, "nope.png");
      await expect(probeImage(missing)).rejects.toMatchObject({
        name: "InputError",
        reason: "not-found",
      });
    });

    it("rejects a file that is not an image", async () => {
      const notImage = path.join(dir, "notes.png");
      fs.writeFileSync(notImage, "plain text");
      const err = await probeImage(notImage).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(InputError);
      expect(err).toMatchObject({ reason: "unsupported-format" });
    });
  });

  describe("measureText", () => {
    it("measures a square block taller than it is wide", async () => {
      const tools = createImageTools(STYLE);
      const size = await tools.measureText(10, 10, 20, { width: 400, height: 600 });
      expect(size.width).toBeGreaterThan(0);
      expect(size.height).toBeGreaterThan(size.width);
    });

    it("measures more lines as a taller block", async () => {
      const tools = createImageTools(STYLE);
      const box = { width: 400, height: 600 };
      const short = await tools.measureText(10, 3, 20, box);
      const tall = await tools.measureText(10, 6, 20, box);
      expect(tall.height).toBeGreaterThan(short.height);
      expect(tall.width).toBe(short.width);
    });
  });

  describe("canvas and overlay", () => {
    it("creates a canvas of the requested size and color", async () => {
      const tools = createImageTools(STYLE);
      const canvasPath = path.join(dir, "canvas.png");
      await tools.blankCanvas(canvasPath, { width: 30, height: 20 }, [200, 100, 50]);

      const { data, info } = await sharp(canvasPath).raw().toBuffer({ resolveWithObject: true });
      expect(info.width).toBe(30);
      expect(info.height).toBe(20);
      expect(Array.from(data.subarray(0, 3))).toEqual([200, 100, 50]);
    });

    it("draws onto a copy of the canvas at the canvas size", async () => {
      const tools = createImageTools(STYLE);
      const canvasPath = path.join(dir, "base.png");
      const outputPath = path.join(dir, "drawn.png");
      await tools.blankCanvas(canvasPath, { width: 48, height: 36 }, [30, 30, 30]);

      await tools.drawText(canvasPath, outputPath, "#:.\n.:#\n", {
        pointSize: 12,
        color: [255, 255, 255],
        anchor: "center",
      });

      const meta = await sharp(outputPath).metadata();
      expect(meta.width).toBe(48);
      expect(meta.height).toBe(36);
    });

    it("reports a missing canvas as a text-overlay failure", async () => {
      const tools = createImageTools(STYLE);
      const err = await tools
        .drawText(path.join(dir, "no-canvas.png"), path.join(dir, "out.png"), "#\n", {
          pointSize: 12,
          color: [255, 255, 255],
          anchor: "top-left",
        })
        .catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ExternalToolError);
      expect(err).toMatchObject({ operation: "text-overlay" });
    });
  });
});
