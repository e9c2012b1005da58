import sharp from "sharp";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { probeImage } from "../src/media/imageTools";
import type { DrawTextOptions, ImageTools } from "../src/media/imageTools";
import type { VideoProbe, VideoTools } from "../src/media/videoTools";
import { ExternalToolError, InputError } from "../src/lib/errors";
import { DEFAULT_CONFIG } from "../src/config";
import type { AsciifyConfig } from "../src/config";
import type { Reporter } from "../src/lib/reporter";
import type { Rgb, Size } from "../src/contracts";

/** Fake glyph cell used by the measurer stand-in. */
export const GLYPH = { width: 6, height: 10 };

export const TEST_CONFIG: AsciifyConfig = { ...DEFAULT_CONFIG, workers: 0, quiet: true };

export function createTestDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "asciify-test-"));
}

export function cleanupTestDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Write a solid-color PNG and return its path. */
export async function createTestImage(
  dir: string,
  name: string,
  size: Size,
  gray = 255
): Promise<string> {
  const filePath = path.join(dir, name);
  await sharp({
    create: {
      width: size.width,
      height: size.height,
      channels: 3,
      background: { r: gray, g: gray, b: gray },
    },
  })
    .png()
    .toFile(filePath);
  return filePath;
}

export const silentReporter: Reporter = {
  info: () => undefined,
  debug: () => undefined,
  warn: () => undefined,
  progress: () => undefined,
};

// --- Image tools stand-in ---

export interface MeasureCall {
  cols: number;
  lines: number;
  pointSize: number;
  box: Size;
}

export interface CanvasCall {
  path: string;
  size: Size;
  color: Rgb;
}

export interface DrawCall {
  canvasPath: string;
  outputPath: string;
  text: string;
  options: DrawTextOptions;
}

export interface FakeImageTools extends ImageTools {
  measures: MeasureCall[];
  canvases: CanvasCall[];
  draws: DrawCall[];
}

/**
 * Image tools that measure text as a grid of GLYPH cells and "draw" by
 * copying the canvas. Probing and canvases are real.
 */
export function createFakeImageTools(
  failOn?: (outputPath: string) => boolean
): FakeImageTools {
  const measures: MeasureCall[] = [];
  const canvases: CanvasCall[] = [];
  const draws: DrawCall[] = [];

  return {
    measures,
    canvases,
    draws,
    probe: probeImage,
    async measureText(cols, lines, pointSize, box) {
      measures.push({ cols, lines, pointSize, box });
      return { width: cols * GLYPH.width, height: lines * GLYPH.height };
    },
    async blankCanvas(outputPath, size, color) {
      canvases.push({ path: outputPath, size, color });
      await sharp({
        create: {
          width: size.width,
          height: size.height,
          channels: 3,
          background: { r: color[0], g: color[1], b: color[2] },
        },
      })
        .png()
        .toFile(outputPath);
    },
    async drawText(canvasPath, outputPath, text, options) {
      draws.push({ canvasPath, outputPath, text, options });
      if (failOn?.(outputPath)) {
        throw new ExternalToolError(`Cannot draw onto ${outputPath}`, "text-overlay");
      }
      fs.copyFileSync(canvasPath, outputPath);
    },
  };
}

// --- Video tools stand-in ---

export interface AssembleCall {
  pattern: string;
  outputPath: string;
  fps: number;
  gif: boolean;
  /** Frame files present when assembly started. */
  frameFiles: string[];
}

export interface JoinCall {
  videoPath: string;
  outputPath: string;
  size: Size;
  audioPath: string | null;
}

export interface FakeVideoTools extends VideoTools {
  assembles: AssembleCall[];
  joins: JoinCall[];
}

/**
 * Video tools that extract `probe.frameCount` solid frames and write empty
 * output files instead of encoding.
 */
export function createFakeVideoTools(probe: VideoProbe, hasAudio = true): FakeVideoTools {
  const assembles: AssembleCall[] = [];
  const joins: JoinCall[] = [];

  return {
    assembles,
    joins,
    async probe(videoPath) {
      if (!fs.existsSync(videoPath)) {
        throw new InputError(`The file path '${videoPath}' does not exist.`, "not-found", videoPath);
      }
      return probe;
    },
    async extractFrames(_videoPath, pattern) {
      for (let frame = 1; frame <= probe.frameCount; frame++) {
        await sharp({
          create: {
            width: probe.size.width,
            height: probe.size.height,
            channels: 3,
            background: { r: 0, g: 0, b: 0 },
          },
        })
          .png()
          .toFile(pattern.replace("%d", String(frame)));
      }
    },
    async assembleFrames(pattern, outputPath, fps, gif) {
      const dir = path.dirname(pattern);
      const frameFiles = fs
        .readdirSync(dir)
        .filter((name) => /^frame\d+\.png$/.test(name))
        .sort();
      assembles.push({ pattern, outputPath, fps, gif, frameFiles });
      fs.writeFileSync(outputPath, "");
    },
    async extractAudio(videoPath, outputPath) {
      if (!hasAudio) {
        throw new ExternalToolError(`${videoPath} does not have an audio stream`, "audio-extraction", 1);
      }
      fs.writeFileSync(outputPath, "");
    },
    async joinStreams(videoPath, outputPath, size, audioPath) {
      joins.push({ videoPath, outputPath, size, audioPath });
      fs.writeFileSync(outputPath, "");
    },
  };
}
