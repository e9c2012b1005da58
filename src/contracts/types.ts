/**
 * Shared contract types for the asciify pipeline.
 *
 * Core, media and pipeline modules import shared types from here.
 * No core module should import types from a pipeline module.
 */

// --- Geometry ---

export interface Size {
  width: number;
  height: number;
}

/** Pixel width of the output, or an explicit [width, height]. */
export type OutWidth = number | readonly [number, number];

export type Anchor = "top-left" | "center";

export interface GeometryPlan {
  /** Text point size used for both measurement and drawing. */
  pointSize: number;
  /** Characters per line. */
  definition: number;
  /** Number of lines. */
  definitionHeight: number;
  /** Output canvas dimensions. */
  canvas: Size;
}

// --- Colors ---

export type Rgb = readonly [number, number, number];

/** A single luminance value (0-255) or an explicit RGB triple. */
export type Color = number | Rgb;

// --- Parameters ---

/** A value, or a function of the 1-based frame index returning the value. */
export type Dynamic<T> = T | ((frame: number) => T);

/** Tagged form a resolver stores once a dynamic value has been materialized. */
export type Param<T> =
  | { kind: "static"; value: T }
  | { kind: "dynamic"; values: readonly T[] };

/** Concrete parameter values for one frame. Plain data, safe to send to a worker. */
export interface FrameParams {
  background: Rgb;
  text: Rgb;
  definition: number;
  /** null means "measure the glyph aspect ratio". */
  correction: number | null;
  chars: string;
}

// --- Text style ---

export interface TextStyle {
  fontFamily: string;
  /** Line height as a multiple of the point size. */
  lineHeightRatio: number;
}

// --- Frame tasks ---

/**
 * Canvas a frame is drawn on. A shared canvas is written once before
 * rendering; a painted canvas is a per-frame file the worker fills with the
 * frame's own background color first.
 */
export interface CanvasRef {
  path: string;
  paint: boolean;
}

/** Everything a worker needs to render one frame. */
export interface FrameTask {
  frame: number;
  /** Image to sample (the source image, or an extracted video frame). */
  sourcePath: string;
  /** Aspect ratio source: dimensions of the original media. */
  sourceSize: Size;
  canvas: CanvasRef;
  outputPath: string;
  params: FrameParams;
  anchor: Anchor;
  style: TextStyle;
  pointSizeRatio: number;
  /** Frozen geometry; re-planned per frame (without fine-tuning) when `replan` is set. */
  geometry: GeometryPlan;
  replan: boolean;
}
