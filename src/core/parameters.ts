/**
 * Static-or-per-frame parameters.
 *
 * A dynamic parameter is a function of the 1-based frame index. Functions
 * cannot be sent to worker processes, so every dynamic value is evaluated
 * once, up front, for the whole sequence and kept as plain data. Workers
 * only ever see the concrete values of their own frame.
 */

import { ConfigurationError } from "../lib/errors";
import type { Color, Dynamic, FrameParams, Param, Rgb } from "../contracts";

export type Transform<T, R> = (value: T) => R;

export function identity<T>(value: T): T {
  return value;
}

/** Expand a single luminance value into an RGB triple. */
export function broadcastColor(value: Color): Rgb {
  return typeof value === "number" ? [value, value, value] : value;
}

export function reverseString(value: string): string {
  return Array.from(value).reverse().join("");
}

function isFrameFunction<T>(raw: Dynamic<T>): raw is (frame: number) => T {
  return typeof raw === "function";
}

export class ParameterResolver<T, R = T> {
  private readonly param: Param<T>;

  constructor(
    raw: Dynamic<T>,
    readonly frameCount: number | undefined,
    private readonly transform: Transform<T, R>
  ) {
    if (isFrameFunction(raw)) {
      if (frameCount === undefined) {
        throw new ConfigurationError(
          "No frame count was given in order to pre-calculate dynamic parameters."
        );
      }
      const values: T[] = [];
      for (let frame = 1; frame <= frameCount; frame++) {
        values.push(raw(frame));
      }
      this.param = { kind: "dynamic", values };
    } else {
      this.param = { kind: "static", value: raw };
    }
  }

  get isDynamic(): boolean {
    return this.param.kind === "dynamic";
  }

  toParam(): Param<T> {
    return this.param;
  }

  /** Untransformed value for a frame. */
  raw(frame?: number): T {
    if (this.param.kind === "static") {
      return this.param.value;
    }
    if (frame === undefined) {
      throw new ConfigurationError("Frame was not specified for dynamic parameter.");
    }
    const { values } = this.param;
    if (!Number.isInteger(frame) || frame < 1 || frame > values.length) {
      throw new ConfigurationError(
        `Frame ${frame} is outside the range 1..${values.length} of a dynamic parameter.`
      );
    }
    return values[frame - 1];
  }

  resolve(frame?: number): R {
    return this.transform(this.raw(frame));
  }
}

/**
 * First frame holding the numerically largest value. Always 1 for a static
 * parameter.
 */
export function frameOfMax<R>(resolver: ParameterResolver<number, R>): number {
  const param = resolver.toParam();
  if (param.kind === "static") {
    return 1;
  }
  let best = 0;
  for (let i = 1; i < param.values.length; i++) {
    if (param.values[i] > param.values[best]) best = i;
  }
  return best + 1;
}

// --- Parameter sets ---

export interface RawParameters {
  bgColor: Dynamic<Color>;
  txtColor: Dynamic<Color>;
  definition: Dynamic<number>;
  correction: Dynamic<number | null>;
  chars: Dynamic<string>;
  /** Reverse the ramp, for dark text on a light background. */
  reverseChars: boolean;
}

export interface ParameterSet {
  frameCount: number | undefined;
  background: ParameterResolver<Color, Rgb>;
  text: ParameterResolver<Color, Rgb>;
  definition: ParameterResolver<number>;
  correction: ParameterResolver<number | null>;
  chars: ParameterResolver<string>;
}

/** True when any raw value is a function of the frame index. */
export function hasDynamicValues(raw: RawParameters): boolean {
  return [raw.bgColor, raw.txtColor, raw.definition, raw.correction, raw.chars].some(
    (value) => typeof value === "function"
  );
}

export function createParameterSet(
  raw: RawParameters,
  frameCount: number | undefined
): ParameterSet {
  return {
    frameCount,
    background: new ParameterResolver<Color, Rgb>(raw.bgColor, frameCount, broadcastColor),
    text: new ParameterResolver<Color, Rgb>(raw.txtColor, frameCount, broadcastColor),
    definition: new ParameterResolver<number>(raw.definition, frameCount, identity),
    correction: new ParameterResolver<number | null>(raw.correction, frameCount, identity),
    chars: new ParameterResolver<string>(
      raw.chars,
      frameCount,
      raw.reverseChars ? reverseString : identity
    ),
  };
}

export function isAnyDynamic(set: ParameterSet): boolean {
  return [set.background, set.text, set.definition, set.correction, set.chars].some(
    (r) => r.isDynamic
  );
}

/** Concrete values of one frame (or of a static set when `frame` is omitted). */
export function frameParams(set: ParameterSet, frame?: number): FrameParams {
  return {
    background: set.background.resolve(frame),
    text: set.text.resolve(frame),
    definition: set.definition.resolve(frame),
    correction: set.correction.resolve(frame),
    chars: set.chars.resolve(frame),
  };
}

// --- Validation ---

function isChannel(n: number): boolean {
  return Number.isInteger(n) && n >= 0 && n <= 255;
}

function checkColor(label: string, color: Rgb, where: string): void {
  if (color.length !== 3 || !color.every(isChannel)) {
    throw new ConfigurationError(
      `${label}${where} must be an integer 0-255 or three of them, got [${color.join(", ")}].`
    );
  }
}

export function validateFrameParams(params: FrameParams, frame?: number): void {
  const where = frame === undefined ? "" : ` (frame ${frame})`;

  checkColor("Background color", params.background, where);
  checkColor("Text color", params.text, where);

  if (!Number.isInteger(params.definition) || params.definition < 2) {
    throw new ConfigurationError(
      `Definition${where} must be an integer of at least 2, got ${params.definition}.`
    );
  }
  if (params.correction !== null && !(params.correction > 0)) {
    throw new ConfigurationError(
      `Correction${where} must be greater than 0, got ${params.correction}.`
    );
  }
  if (params.chars.length === 0) {
    throw new ConfigurationError(`Chars${where} must contain at least one character.`);
  }
}

/** Validate every frame of a set (or its single static value). */
export function validateParameterSet(set: ParameterSet): void {
  if (!isAnyDynamic(set) || set.frameCount === undefined) {
    validateFrameParams(frameParams(set));
    return;
  }
  for (let frame = 1; frame <= set.frameCount; frame++) {
    validateFrameParams(frameParams(set, frame), frame);
  }
}

// --- Preview ---

export type ParamCell = number | string | Rgb | null;

/**
 * Per-frame table of the dynamic parameters only, header row first. Lets a
 * caller preview how parameters drift across the sequence without
 * rendering anything.
 */
export function describeDynamicParameters(
  set: ParameterSet,
  frameCount: number
): ParamCell[][] {
  const columns: Array<{ header: string; at: (frame: number) => ParamCell }> = [];

  if (set.background.isDynamic) {
    columns.push({ header: "BG Color", at: (f) => set.background.resolve(f) });
  }
  if (set.text.isDynamic) {
    columns.push({ header: "Text Color", at: (f) => set.text.resolve(f) });
  }
  if (set.definition.isDynamic) {
    columns.push({ header: "Definition", at: (f) => set.definition.resolve(f) });
  }
  if (set.correction.isDynamic) {
    columns.push({ header: "Correction", at: (f) => set.correction.resolve(f) });
  }
  if (set.chars.isDynamic) {
    columns.push({ header: "Chars", at: (f) => set.chars.resolve(f) });
  }

  const rows: ParamCell[][] = [["Frame", ...columns.map((c) => c.header)]];
  for (let frame = 1; frame <= frameCount; frame++) {
    rows.push([frame, ...columns.map((c) => c.at(frame))]);
  }
  return rows;
}
