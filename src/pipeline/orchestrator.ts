/**
 * Generation runs: single image, dynamic image sequence, video and dynamic
 * video.
 *
 * Every run walks the same states:
 *
 *   INIT            guard, probe, build and validate parameters
 *   GEOMETRY_LOCKED workspace, source frames, shared geometry and canvas
 *   PARAMS_RESOLVED one plain-data task per frame
 *   RENDERING       frames fanned out to the pool
 *   ASSEMBLING      frames encoded (and muxed with the source audio)
 *   DONE
 *
 * and FAILED from any of them. The workspace is removed however the run
 * ends. Nothing is written before GEOMETRY_LOCKED, so a bad
 * request leaves nothing behind.
 */

import * as fs from "fs";
import * as path from "path";
import { loadConfig } from "../config";
import type { AsciifyConfig } from "../config";
import {
  createParameterSet,
  describeDynamicParameters,
  frameOfMax,
  frameParams,
  hasDynamicValues,
  isAnyDynamic,
  validateParameterSet,
} from "../core/parameters";
import type { ParamCell, ParameterSet, RawParameters } from "../core/parameters";
import { chooseOutputSize, planGeometry } from "../core/geometry";
import type { GeometryInput } from "../core/geometry";
import { renderFrame } from "../core/frameRenderer";
import { createImageTools } from "../media/imageTools";
import type { ImageTools } from "../media/imageTools";
import { createVideoTools, isVideoPath } from "../media/videoTools";
import type { VideoTools } from "../media/videoTools";
import { ConfigurationError, errorMessage } from "../lib/errors";
import { safeOutputPath } from "../lib/pathSafety";
import { createReporter, estimateRemaining, formatDuration } from "../lib/reporter";
import type { Reporter } from "../lib/reporter";
import { createRunContext, guardEntry } from "./runContext";
import type { RunContext } from "./runContext";
import { createFramePool } from "./workerPool";
import type { FramePool, ProgressListener } from "./workerPool";
import {
  FRAME_PATTERN,
  frameCanvasPath,
  outputFramePath,
  sourceFramePath,
  withWorkspace,
  workspaceFile,
} from "./workspace";
import type { Workspace } from "./workspace";
import type { Anchor, FrameTask, GeometryPlan, OutWidth, Size, TextStyle } from "../contracts";

export const DEFAULT_FRAME_COUNT = 10;
export const DEFAULT_FPS = 5;

export type RunState =
  | "INIT"
  | "GEOMETRY_LOCKED"
  | "PARAMS_RESOLVED"
  | "RENDERING"
  | "ASSEMBLING"
  | "DONE"
  | "FAILED";

/** Collaborators of a run. Anything left out is built from the configuration. */
export interface RunDependencies {
  config: AsciifyConfig;
  context: RunContext;
  image: ImageTools;
  video: VideoTools;
  pool: FramePool;
  reporter: Reporter;
  onStateChange?: (state: RunState) => void;
}

export type RunOverrides = Partial<RunDependencies>;

export function resolveDependencies(overrides: RunOverrides, quiet?: boolean): RunDependencies {
  const config = overrides.config ?? loadConfig();
  const image = overrides.image ?? createImageTools(textStyle(config));
  return {
    config,
    context: overrides.context ?? createRunContext(),
    image,
    video: overrides.video ?? createVideoTools(config),
    pool: overrides.pool ?? createFramePool(config.workers, image),
    reporter: overrides.reporter ?? createReporter(quiet ?? config.quiet),
    onStateChange: overrides.onStateChange,
  };
}

function textStyle(config: AsciifyConfig): TextStyle {
  return { fontFamily: config.fontFamily, lineHeightRatio: config.lineHeightRatio };
}

class RunTracker {
  private current: RunState = "INIT";

  constructor(
    private readonly name: string,
    private readonly deps: RunDependencies
  ) {
    deps.reporter.debug(`${name}: INIT`);
    deps.onStateChange?.("INIT");
  }

  advance(next: RunState): void {
    this.deps.reporter.debug(`${this.name}: ${this.current} -> ${next}`);
    this.current = next;
    this.deps.onStateChange?.(next);
  }

  /** Run `body`, moving to FAILED when it throws. */
  async run<T>(body: () => Promise<T>): Promise<T> {
    try {
      const result = await body();
      this.advance("DONE");
      return result;
    } catch (err) {
      this.advance("FAILED");
      throw err;
    }
  }
}

// --- Requests ---

export interface RenderRequestBase {
  sourcePath: string;
  params: RawParameters;
  outWidth?: OutWidth;
  strict: boolean;
  outPath?: string;
}

export interface ImageRunRequest extends RenderRequestBase {
  saveTxt: boolean;
}

export interface SequenceRunRequest extends RenderRequestBase {
  frameCount?: number;
  fps: number;
  gif: boolean;
}

export interface PreviewRequest {
  sourcePath: string;
  params: RawParameters;
  frameCount?: number;
}

/** Output path derived from the source (or `outPath`) without overwriting anything. */
function outputPathFor(request: RenderRequestBase, ext?: string): string {
  return request.outPath !== undefined
    ? safeOutputPath(request.outPath)
    : safeOutputPath(request.sourcePath, ext);
}

function basePlanInput(
  sourceSize: Size,
  request: RenderRequestBase,
  set: ParameterSet,
  frame: number | undefined,
  config: AsciifyConfig
): Omit<GeometryInput, "fineTune" | "evenSizes"> {
  return {
    sourceSize,
    definition: set.definition.resolve(frame),
    correction: set.correction.resolve(frame),
    outSize: chooseOutputSize(sourceSize, request.outWidth),
    strict: request.strict,
    pointSizeRatio: config.pointSizeRatio,
  };
}

interface TaskPlan {
  workspace: Workspace;
  set: ParameterSet;
  frameCount: number;
  sourceSize: Size;
  geometry: GeometryPlan;
  anchor: Anchor;
  replan: boolean;
  /** Path of the image sampled for a frame. */
  sourceFor: (frame: number) => string;
}

/**
 * Freeze one task per frame. A dynamic background gets a canvas per frame,
 * painted by the worker; otherwise every frame draws on the shared canvas.
 */
function buildTasks(plan: TaskPlan, config: AsciifyConfig): FrameTask[] {
  const { workspace, set } = plan;
  const paint = set.background.isDynamic;
  const tasks: FrameTask[] = [];

  for (let frame = 1; frame <= plan.frameCount; frame++) {
    tasks.push({
      frame,
      sourcePath: plan.sourceFor(frame),
      sourceSize: plan.sourceSize,
      canvas: paint
        ? { path: frameCanvasPath(workspace, frame), paint: true }
        : { path: workspace.canvasPath, paint: false },
      outputPath: outputFramePath(workspace, frame),
      params: frameParams(set, frame),
      anchor: plan.anchor,
      style: textStyle(config),
      pointSizeRatio: config.pointSizeRatio,
      geometry: plan.geometry,
      replan: plan.replan,
    });
  }
  return tasks;
}

function percentListener(reporter: Reporter, label: string): ProgressListener {
  return (done, total) => reporter.progress(done, total, label);
}

/** Progress with a time-remaining estimate, refreshed at most every two seconds. */
function timedListener(reporter: Reporter, label: string, startedAt: number): ProgressListener {
  let lastEstimate = startedAt;
  let remaining: string | null = null;

  return (done, total) => {
    const now = Date.now();
    if (now - lastEstimate > 2000) {
      remaining = formatDuration(estimateRemaining(done, total, (now - startedAt) / 1000));
      lastEstimate = now;
    }
    reporter.progress(done, total, label, remaining === null ? undefined : `${remaining} Remaining.`);
  };
}

// --- Image ---

/** Render a single image beside the source. Returns the ASCII text. */
export async function runImage(request: ImageRunRequest, deps: RunDependencies): Promise<string> {
  guardEntry(deps.context, "asciifyImage");
  const tracker = new RunTracker("image", deps);

  return tracker.run(async () => {
    const sourceSize = await deps.image.probe(request.sourcePath);
    if (hasDynamicValues(request.params)) {
      throw new ConfigurationError(
        "Single image generation takes static parameters only; use dynamicAsciifyImage."
      );
    }
    const set = createParameterSet(request.params, undefined);
    validateParameterSet(set);

    return withWorkspace(async (workspace) => {
      tracker.advance("GEOMETRY_LOCKED");
      const geometry = await planGeometry(
        {
          ...basePlanInput(sourceSize, request, set, undefined, deps.config),
          fineTune: true,
          evenSizes: false,
        },
        deps.image.measureText
      );
      const params = frameParams(set);
      await deps.image.blankCanvas(workspace.canvasPath, geometry.canvas, params.background);

      tracker.advance("PARAMS_RESOLVED");
      const outputPath = outputPathFor(request);

      tracker.advance("RENDERING");
      const text = await renderFrame(
        {
          sequence: false,
          sourcePath: request.sourcePath,
          canvas: { path: workspace.canvasPath, paint: false },
          outputPath,
          params,
          geometry,
          anchor: "top-left",
        },
        deps.image
      );
      deps.reporter.info(`Saved ${outputPath}`);

      if (request.saveTxt) {
        const parsed = path.parse(outputPath);
        const txtPath = safeOutputPath(path.join(parsed.dir, `${parsed.name}.txt`));
        fs.writeFileSync(txtPath, text);
        deps.reporter.info(`Saved ${txtPath}`);
      }
      return text;
    });
  });
}

// --- Dynamic image ---

/** Render an animated sequence of one image. Returns the output path. */
export async function runDynamicImage(
  request: SequenceRunRequest,
  deps: RunDependencies
): Promise<string> {
  guardEntry(deps.context, "dynamicAsciifyImage");
  const tracker = new RunTracker("dynamic image", deps);

  return tracker.run(async () => {
    const sourceSize = await deps.image.probe(request.sourcePath);
    const frameCount =
      request.frameCount ??
      (hasDynamicValues(request.params) ? undefined : DEFAULT_FRAME_COUNT);
    const set = createParameterSet(request.params, frameCount);
    if (set.frameCount === undefined) {
      throw new ConfigurationError("Frame count must be given for dynamic generation.");
    }
    if (!Number.isInteger(set.frameCount) || set.frameCount < 1) {
      throw new ConfigurationError(`Frame count must be a positive integer, got ${set.frameCount}.`);
    }
    validateParameterSet(set);
    const total = set.frameCount;

    return withWorkspace(async (workspace) => {
      tracker.advance("GEOMETRY_LOCKED");
      const representative = frameOfMax(set.definition);
      deps.reporter.debug(`Planning geometry on frame ${representative}`);
      const geometry = await planGeometry(
        {
          ...basePlanInput(sourceSize, request, set, representative, deps.config),
          fineTune: true,
          evenSizes: true,
        },
        deps.image.measureText
      );
      if (!set.background.isDynamic) {
        await deps.image.blankCanvas(
          workspace.canvasPath,
          geometry.canvas,
          set.background.resolve(representative)
        );
      }

      tracker.advance("PARAMS_RESOLVED");
      const tasks = buildTasks(
        {
          workspace,
          set,
          frameCount: total,
          sourceSize,
          geometry,
          anchor: "center",
          replan: true,
          sourceFor: () => request.sourcePath,
        },
        deps.config
      );

      tracker.advance("RENDERING");
      await deps.pool.run(tasks, percentListener(deps.reporter, "Generating ASCII Art"));

      tracker.advance("ASSEMBLING");
      const outputPath = outputPathFor(request, request.gif ? "gif" : "mp4");
      await deps.video.assembleFrames(
        workspaceFile(workspace, "frames", FRAME_PATTERN),
        outputPath,
        request.fps,
        request.gif
      );
      deps.reporter.info(`Saved ${outputPath}`);
      return outputPath;
    });
  });
}

// --- Video ---

/**
 * Encode rendered frames, then mux in the source audio scaled to the canvas
 * size. A source without audio yields a silent video.
 */
async function finalizeVideo(
  workspace: Workspace,
  sourcePath: string,
  outputPath: string,
  fps: number,
  canvas: Size,
  deps: RunDependencies
): Promise<void> {
  const videoPath = workspaceFile(workspace, "video.mp4");
  const audioPath = workspaceFile(workspace, "audio.aac");

  await deps.video.assembleFrames(
    workspaceFile(workspace, "frames", FRAME_PATTERN),
    videoPath,
    fps,
    false
  );

  let audio: string | null = audioPath;
  try {
    await deps.video.extractAudio(sourcePath, audioPath);
  } catch (err) {
    deps.reporter.debug(`No audio track used: ${errorMessage(err)}`);
    audio = null;
  }

  await deps.video.joinStreams(videoPath, outputPath, canvas, audio);
}

async function runVideoSequence(
  request: RenderRequestBase,
  deps: RunDependencies,
  dynamic: boolean
): Promise<string> {
  guardEntry(deps.context, dynamic ? "dynamicAsciifyVideo" : "asciifyVideo");
  const tracker = new RunTracker(dynamic ? "dynamic video" : "video", deps);

  return tracker.run(async () => {
    const probe = await deps.video.probe(request.sourcePath);
    if (!dynamic && hasDynamicValues(request.params)) {
      throw new ConfigurationError(
        "Video generation takes static parameters only; use dynamicAsciifyVideo."
      );
    }
    const set = createParameterSet(request.params, probe.frameCount);
    validateParameterSet(set);
    const replan = dynamic && isAnyDynamic(set);

    return withWorkspace(async (workspace) => {
      tracker.advance("GEOMETRY_LOCKED");
      deps.reporter.info("Converting video to frames...");
      await deps.video.extractFrames(
        request.sourcePath,
        workspaceFile(workspace, "source-frames", FRAME_PATTERN)
      );

      deps.reporter.info("Generating canvas...");
      const representative = frameOfMax(set.definition);
      const geometry = await planGeometry(
        {
          ...basePlanInput(probe.size, request, set, representative, deps.config),
          fineTune: true,
          evenSizes: true,
        },
        deps.image.measureText
      );
      if (!set.background.isDynamic) {
        await deps.image.blankCanvas(
          workspace.canvasPath,
          geometry.canvas,
          set.background.resolve(representative)
        );
      }

      tracker.advance("PARAMS_RESOLVED");
      const tasks = buildTasks(
        {
          workspace,
          set,
          frameCount: probe.frameCount,
          sourceSize: probe.size,
          geometry,
          anchor: dynamic ? "center" : "top-left",
          replan,
          sourceFor: (frame) => sourceFramePath(workspace, frame),
        },
        deps.config
      );

      tracker.advance("RENDERING");
      const startedAt = Date.now();
      await deps.pool.run(tasks, timedListener(deps.reporter, "Generating ASCII Art", startedAt));
      deps.reporter.info(`Completed in: ${formatDuration((Date.now() - startedAt) / 1000)}.`);

      tracker.advance("ASSEMBLING");
      deps.reporter.info("Getting video ready...");
      const outputPath = outputPathFor(request);
      await finalizeVideo(workspace, request.sourcePath, outputPath, probe.fps, geometry.canvas, deps);
      deps.reporter.info(`Saved ${outputPath}`);
      return outputPath;
    });
  });
}

/** Render every frame of a video with static parameters. Returns the output path. */
export function runVideo(request: RenderRequestBase, deps: RunDependencies): Promise<string> {
  return runVideoSequence(request, deps, false);
}

/** Render every frame of a video with per-frame parameters. Returns the output path. */
export function runDynamicVideo(request: RenderRequestBase, deps: RunDependencies): Promise<string> {
  return runVideoSequence(request, deps, true);
}

// --- Preview ---

/**
 * Per-frame values of the dynamic parameters, without rendering. The frame
 * count of a video comes from the video itself.
 */
export async function previewParameters(
  request: PreviewRequest,
  deps: RunDependencies
): Promise<ParamCell[][]> {
  let frameCount = request.frameCount;
  if (isVideoPath(request.sourcePath)) {
    frameCount = (await deps.video.probe(request.sourcePath)).frameCount;
  } else {
    await deps.image.probe(request.sourcePath);
    if (frameCount === undefined && !hasDynamicValues(request.params)) {
      frameCount = DEFAULT_FRAME_COUNT;
    }
  }

  const set = createParameterSet(request.params, frameCount);
  if (set.frameCount === undefined) {
    throw new ConfigurationError("Frame count must be given for dynamic generation.");
  }
  validateParameterSet(set);
  return describeDynamicParameters(set, set.frameCount);
}
