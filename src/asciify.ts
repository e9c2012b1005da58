/**
 * Public API.
 *
 * Every generation function must be called from the parent process: the
 * frame pool forks workers that load this package, and calling a generator
 * from one of them exits that worker with a warning.
 *
 *   const text = await asciifyImage("cat.png", { definition: 80 });
 *   await dynamicAsciifyImage("cat.png", {
 *     frameCount: 20,
 *     definition: (frame) => 40 + frame * 2,
 *   });
 */

import {
  DEFAULT_FPS,
  previewParameters,
  resolveDependencies,
  runDynamicImage,
  runDynamicVideo,
  runImage,
  runVideo,
} from "./pipeline/orchestrator";
import type { RunOverrides } from "./pipeline/orchestrator";
import type { ParamCell, RawParameters } from "./core/parameters";
import type { Color, Dynamic, OutWidth } from "./contracts";

export const DEFAULT_CHARS = " .:-=+*$@#";
export const DEFAULT_BG_COLOR = 30;
export const DEFAULT_TXT_COLOR = 255;
export const DEFAULT_DEFINITION = 100;

interface CommonOptions {
  /** Pixel width of the output, or [width, height]. Defaults to the source width. */
  outWidth?: OutWidth;
  /** Use `outWidth` exactly instead of shrinking the canvas to the text. */
  strictOutDimensions?: boolean;
  /** Reverse the ramp, for dark text on a light background. */
  reverseChars?: boolean;
  /** Output path. Numbered (`foo2.png`) when it already exists. */
  outPath?: string;
  quiet?: boolean;
  /** Collaborator overrides: configuration, tools, pool, run context. */
  runtime?: RunOverrides;
}

export interface AsciifyOptions extends CommonOptions {
  /** Background color, a luminance or [r, g, b]. Defaults to dark gray (30). */
  bgColor?: Color;
  /** Text color. Defaults to white (255). */
  txtColor?: Color;
  /** Characters per line. Defaults to 100. */
  definition?: number;
  /** Glyph aspect correction; measured when omitted. */
  correction?: number | null;
  /** Character ramp, dimmest to brightest. */
  chars?: string;
}

export interface ImageOptions extends AsciifyOptions {
  /** Also write the text beside the output image. */
  saveTxt?: boolean;
}

/** Options whose values may be functions of the 1-based frame index. */
export interface DynamicOptions extends CommonOptions {
  bgColor?: Dynamic<Color>;
  txtColor?: Dynamic<Color>;
  definition?: Dynamic<number>;
  correction?: Dynamic<number | null>;
  chars?: Dynamic<string>;
}

export interface DynamicImageOptions extends DynamicOptions {
  /** Frames to generate. Required when any value is dynamic; 10 otherwise. */
  frameCount?: number;
  /** Defaults to 5. */
  fps?: number;
  /** GIF (default) or MP4. */
  gif?: boolean;
}

export interface PreviewOptions extends DynamicOptions {
  /** Frame count for an image source; a video's own count is used otherwise. */
  frameCount?: number;
}

function rawParameters(options: DynamicOptions): RawParameters {
  return {
    bgColor: options.bgColor ?? DEFAULT_BG_COLOR,
    txtColor: options.txtColor ?? DEFAULT_TXT_COLOR,
    definition: options.definition ?? DEFAULT_DEFINITION,
    correction: options.correction ?? null,
    chars: options.chars ?? DEFAULT_CHARS,
    reverseChars: options.reverseChars ?? false,
  };
}

/** Convert an image and save it beside the source. Resolves to the ASCII text. */
export async function asciifyImage(sourcePath: string, options: ImageOptions = {}): Promise<string> {
  return runImage(
    {
      sourcePath,
      params: rawParameters(options),
      outWidth: options.outWidth,
      strict: options.strictOutDimensions ?? false,
      outPath: options.outPath,
      saveTxt: options.saveTxt ?? false,
    },
    resolveDependencies(options.runtime ?? {}, options.quiet)
  );
}

/**
 * Animate an image over `frameCount` frames with per-frame parameters.
 * Resolves to the path of the GIF or MP4.
 */
export async function dynamicAsciifyImage(
  sourcePath: string,
  options: DynamicImageOptions = {}
): Promise<string> {
  return runDynamicImage(
    {
      sourcePath,
      params: rawParameters(options),
      outWidth: options.outWidth,
      strict: options.strictOutDimensions ?? false,
      outPath: options.outPath,
      frameCount: options.frameCount,
      fps: options.fps ?? DEFAULT_FPS,
      gif: options.gif ?? true,
    },
    resolveDependencies(options.runtime ?? {}, options.quiet)
  );
}

/** Convert every frame of a video, keeping its audio. Resolves to the output path. */
export async function asciifyVideo(sourcePath: string, options: AsciifyOptions = {}): Promise<string> {
  return runVideo(
    {
      sourcePath,
      params: rawParameters(options),
      outWidth: options.outWidth,
      strict: options.strictOutDimensions ?? false,
      outPath: options.outPath,
    },
    resolveDependencies(options.runtime ?? {}, options.quiet)
  );
}

export async function dynamicAsciifyVideo(
  sourcePath: string,
  options: DynamicOptions = {}
): Promise<string> {
  return runDynamicVideo(
    {
      sourcePath,
      params: rawParameters(options),
      outWidth: options.outWidth,
      strict: options.strictOutDimensions ?? false,
      outPath: options.outPath,
    },
    resolveDependencies(options.runtime ?? {}, options.quiet)
  );
}

/**
 * Table of the dynamic parameter values per frame, header row first, without
 * rendering anything.
 */
export async function previewDynamicParameters(
  sourcePath: string,
  options: PreviewOptions = {}
): Promise<ParamCell[][]> {
  return previewParameters(
    { sourcePath, params: rawParameters(options), frameCount: options.frameCount },
    resolveDependencies(options.runtime ?? {}, options.quiet)
  );
}

export {
  AsciifyError,
  ConfigurationError,
  ExternalToolError,
  InputError,
  RenderError,
} from "./lib/errors";
export { ToolNotFoundError } from "./media/exec";
export { loadConfig } from "./config";
export type { AsciifyConfig } from "./config";
export type { RunOverrides, RunState } from "./pipeline/orchestrator";
export type { ParamCell } from "./core/parameters";
export type { Color, Dynamic, OutWidth, Rgb } from "./contracts";
