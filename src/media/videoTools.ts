/**
 * Video collaborators: ffprobe for probing, ffmpeg for frame extraction,
 * reassembly and audio handling. Both run as child processes.
 */

import * as fs from "fs";
import { ExternalToolError, InputError, errorMessage } from "../lib/errors";
import { runTool } from "./exec";
import type { ToolResult, ToolRunner } from "./exec";
import type { ToolOperation } from "../lib/errors";
import type { Size } from "../contracts";

export const VIDEO_EXTENSIONS = ["mp4", "mov", "m4v", "webm", "avi"];

export function isVideoPath(filePath: string): boolean {
  const dot = filePath.lastIndexOf(".");
  return dot >= 0 && VIDEO_EXTENSIONS.includes(filePath.slice(dot + 1).toLowerCase());
}

export interface VideoProbe {
  size: Size;
  frameCount: number;
  fps: number;
}

export interface VideoTools {
  probe(videoPath: string): Promise<VideoProbe>;
  /** Write every frame as numbered images matching `pattern` (e.g. frame%d.png). */
  extractFrames(videoPath: string, pattern: string): Promise<void>;
  /** Encode numbered images into a GIF or an H.264 video. */
  assembleFrames(pattern: string, outputPath: string, fps: number, gif: boolean): Promise<void>;
  /** Copy the audio stream out. Fails when the source has none. */
  extractAudio(videoPath: string, outputPath: string): Promise<void>;
  /** Scale the video to `size`, muxing in the audio track when given. */
  joinStreams(
    videoPath: string,
    outputPath: string,
    size: Size,
    audioPath: string | null
  ): Promise<void>;
}

export interface VideoToolPaths {
  ffmpegPath: string;
  ffprobePath: string;
}

// --- ffprobe output parsing ---

/** Parse "WIDTHxHEIGHT". */
export function parseDimensions(stdout: string): Size | null {
  const match = /^(\d+)x(\d+)/.exec(stdout.trim());
  if (!match) return null;
  return { width: Number(match[1]), height: Number(match[2]) };
}

/** True when any reported rotation is a quarter turn (90 or 270 degrees). */
export function isQuarterTurn(stdout: string): boolean {
  return stdout
    .split(/\r?\n/)
    .map((line) => Number(line.trim()))
    .some((deg) => Number.isFinite(deg) && Math.abs(deg) % 180 === 90);
}

/** Parse `r_frame_rate` ("30000/1001" or "25") to the nearest integer. */
export function parseFrameRate(stdout: string): number | null {
  const quoted = /frame_rate="([^"]*)"/.exec(stdout);
  const rate = (quoted ? quoted[1] : stdout).trim();
  const parts = rate.split("/").map(Number);
  const num = parts[0];
  if (rate === "" || !Number.isFinite(num)) return null;
  if (parts.length === 1) return Math.round(num);
  const den = parts[1];
  if (!Number.isFinite(den) || den === 0) return null;
  return Math.round(num / den);
}

/** Parse the `nb_read_packets` count (ffprobe may add a trailing comma). */
export function parsePacketCount(stdout: string): number | null {
  const n = parseInt(stdout.trim(), 10);
  return Number.isFinite(n) ? n : null;
}

// --- Tools ---

export function createVideoTools(
  paths: VideoToolPaths,
  run: ToolRunner = runTool
): VideoTools {
  async function invoke(
    operation: ToolOperation,
    args: string[],
    failure: string
  ): Promise<ToolResult> {
    let result: ToolResult;
    try {
      result = await run(paths.ffmpegPath, ["-hide_banner", ...args]);
    } catch (err) {
      throw new ExternalToolError(errorMessage(err), operation);
    }
    if (result.code !== 0) {
      throw new ExternalToolError(failure, operation, result.code, result.stderr);
    }
    return result;
  }

  async function probeField(videoPath: string, args: string[]): Promise<ToolResult> {
    const result = await run(paths.ffprobePath, args);
    if (result.code !== 0) {
      throw new InputError(
        `File format not supported: ${videoPath}`,
        "unsupported-format",
        videoPath
      );
    }
    return result;
  }

  async function probe(videoPath: string): Promise<VideoProbe> {
    if (!fs.existsSync(videoPath)) {
      throw new InputError(`The file path '${videoPath}' does not exist.`, "not-found", videoPath);
    }

    const dims = await probeField(videoPath, [
      videoPath, "-v", "error", "-select_streams", "v:0",
      "-show_entries", "stream=width,height", "-of", "csv=s=x:p=0",
    ]);
    const size = parseDimensions(dims.stdout);
    if (!size) {
      throw new InputError(`Cannot read dimensions from video: ${videoPath}`, "unsupported-format", videoPath);
    }

    // Rotation lives in a stream tag on older files and in side data on newer ones.
    const rotation = await run(paths.ffprobePath, [
      "-i", videoPath, "-loglevel", "error", "-select_streams", "v:0",
      "-show_entries", "stream_tags=rotate:stream_side_data=rotation",
      "-of", "default=nw=1:nk=1",
    ]);
    const displaySize = rotation.code === 0 && isQuarterTurn(rotation.stdout)
      ? { width: size.height, height: size.width }
      : size;

    const rate = await probeField(videoPath, [
      videoPath, "-v", "0", "-select_streams", "v", "-print_format", "flat",
      "-show_entries", "stream=r_frame_rate",
    ]);
    const fps = parseFrameRate(rate.stdout);

    const packets = await probeField(videoPath, [
      videoPath, "-v", "error", "-select_streams", "v:0", "-count_packets",
      "-show_entries", "stream=nb_read_packets", "-of", "csv=p=0",
    ]);
    const frameCount = parsePacketCount(packets.stdout);

    if (fps === null || fps <= 0 || frameCount === null || frameCount <= 0) {
      throw new InputError(
        `Cannot read frame rate or frame count from video: ${videoPath}`,
        "unsupported-format",
        videoPath
      );
    }

    return { size: displaySize, frameCount, fps };
  }

  return {
    probe,

    async extractFrames(videoPath, pattern) {
      await invoke("frame-extraction", ["-i", videoPath, pattern],
        `Cannot extract frames from ${videoPath}`);
    },

    async assembleFrames(pattern, outputPath, fps, gif) {
      const args = gif
        ? ["-f", "image2", "-framerate", String(fps), "-i", pattern, outputPath]
        : [
            "-r", String(fps), "-i", pattern, "-framerate", String(fps),
            "-c:v", "libx264", "-pix_fmt", "yuv420p", outputPath,
          ];
      await invoke("frame-assembly", args, `Cannot assemble frames into ${outputPath}`);
    },

    async extractAudio(videoPath, outputPath) {
      await invoke("audio-extraction", ["-i", videoPath, "-vn", "-acodec", "copy", outputPath],
        `${videoPath} does not have an audio stream`);
    },

    async joinStreams(videoPath, outputPath, size, audioPath) {
      const scale = `scale=${size.width}:${size.height}`;
      const args = audioPath === null
        ? ["-i", videoPath, "-vf", scale, "-crf", "18", outputPath]
        : [
            "-i", videoPath, "-i", audioPath, "-vf", scale,
            "-map", "0:v", "-map", "1:a", "-crf", "18", "-shortest", outputPath,
          ];
      await invoke("stream-join", args, `Cannot write ${outputPath}`);
    },
  };
}
