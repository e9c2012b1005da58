/**
 * Rendering of a single frame: sample the source into a luminance grid, map
 * it onto the character ramp, and draw the text onto the shared canvas.
 */

import sharp from "sharp";
import { ConfigurationError } from "../lib/errors";
import { planGeometry } from "./geometry";
import { createImageTools } from "../media/imageTools";
import type { ImageTools } from "../media/imageTools";
import type { Anchor, CanvasRef, FrameParams, FrameTask, GeometryPlan } from "../contracts";

/** Ramp index for a luminance sample: floor(l * (len - 1) / 255). */
export function charForLuminance(luminance: number, ramp: readonly string[]): string {
  return ramp[Math.floor((luminance * (ramp.length - 1)) / 255)];
}

/**
 * Map row-major luminance samples to text, with a newline after every
 * `definition` characters.
 */
export function luminanceToAscii(
  samples: ArrayLike<number>,
  definition: number,
  chars: string
): string {
  const ramp = Array.from(chars);
  let text = "";
  for (let k = 0; k < samples.length; k++) {
    text += charForLuminance(samples[k], ramp);
    if ((k + 1) % definition === 0) {
      text += "\n";
    }
  }
  return text;
}

/**
 * Resample an image to exactly cols x lines and return one luminance byte
 * per sample. EXIF orientation is applied first, matching the display size
 * the geometry was planned from.
 */
export async function sampleLuminance(
  imagePath: string,
  cols: number,
  lines: number
): Promise<Uint8Array> {
  const { data, info } = await sharp(imagePath)
    .rotate()
    .resize(cols, lines, { fit: "fill" })
    .removeAlpha()
    .greyscale()
    .raw()
    .toBuffer({ resolveWithObject: true });

  if (info.channels === 1) {
    return new Uint8Array(data.buffer, data.byteOffset, data.length);
  }
  const samples = new Uint8Array(info.width * info.height);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = data[i * info.channels];
  }
  return samples;
}

export interface RenderRequest {
  /** 1-based frame index; absent for a single image. */
  frame?: number;
  /** Part of a multi-frame output, where a frame index is mandatory. */
  sequence: boolean;
  sourcePath: string;
  canvas: CanvasRef;
  outputPath: string;
  params: FrameParams;
  geometry: GeometryPlan;
  anchor: Anchor;
}

/** Render one frame to `outputPath` and return its ASCII text. */
export async function renderFrame(request: RenderRequest, tools: ImageTools): Promise<string> {
  if (request.sequence && request.frame === undefined) {
    throw new ConfigurationError("Frame was not specified for ascii art generation.");
  }

  const { geometry, params } = request;
  const samples = await sampleLuminance(
    request.sourcePath,
    geometry.definition,
    geometry.definitionHeight
  );
  const text = luminanceToAscii(samples, geometry.definition, params.chars);

  if (request.canvas.paint) {
    await tools.blankCanvas(request.canvas.path, geometry.canvas, params.background);
  }
  await tools.drawText(request.canvas.path, request.outputPath, text, {
    pointSize: geometry.pointSize,
    color: params.text,
    anchor: request.anchor,
  });

  return text;
}

/**
 * Run one frame task as a worker does. Frames whose definition varies are
 * re-planned against the frozen canvas, without fine-tuning, so every frame
 * keeps the same output dimensions.
 */
export async function renderFrameTask(
  task: FrameTask,
  tools: ImageTools = createImageTools(task.style)
): Promise<string> {
  const geometry = task.replan
    ? await planGeometry(
        {
          sourceSize: task.sourceSize,
          definition: task.params.definition,
          correction: task.params.correction,
          outSize: task.geometry.canvas,
          strict: false,
          fineTune: false,
          evenSizes: true,
          pointSizeRatio: task.pointSizeRatio,
        },
        tools.measureText
      )
    : task.geometry;

  return renderFrame(
    {
      frame: task.frame,
      sequence: true,
      sourcePath: task.sourcePath,
      canvas: task.canvas,
      outputPath: task.outputPath,
      params: task.params,
      geometry,
      anchor: task.anchor,
    },
    tools
  );
}
