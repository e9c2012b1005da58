/**
 * Output geometry: point size, sampling grid and canvas dimensions.
 *
 * Monospace glyphs are taller than they are wide, so the number of lines is
 * not simply definition * aspect ratio: a test block of text is measured to
 * find the correction. The canvas is then shrunk to the measured size of the
 * real block so no blank margin is left at the right or bottom.
 */

import { ConfigurationError } from "../lib/errors";
import type { GeometryPlan, OutWidth, Size } from "../contracts";

/** Canvas-width to glyph-width ratio. Empirical; not exact for every font. */
export const DEFAULT_POINT_SIZE_RATIO = 1.7;

/** Measures the tight bounding box of a cols x lines block of text. */
export type TextMeasurer = (
  cols: number,
  lines: number,
  pointSize: number,
  box: Size
) => Promise<Size>;

export interface GeometryInput {
  /** Dimensions of the source media; only the aspect ratio is used. */
  sourceSize: Size;
  definition: number;
  /** Glyph aspect correction, or null to measure it. */
  correction: number | null;
  /** Output dimensions chosen before fine-tuning. */
  outSize: Size;
  /** Keep `outSize` exactly. */
  strict: boolean;
  /** Shrink the canvas to the measured text. Off when re-planning frames of a sequence. */
  fineTune: boolean;
  /** Round the fine-tuned canvas down to even numbers (video encoders need them). */
  evenSizes: boolean;
  pointSizeRatio?: number;
}

/**
 * Text used to measure a block: full-width glyphs at both ends of every line
 * so the trimmed bounds span the whole block.
 */
export function testBlock(cols: number, lines: number): string {
  const line = "#" + "|".repeat(Math.max(0, cols - 2)) + "#";
  return Array.from({ length: lines }, () => line).join("\n");
}

/**
 * Output dimensions before fine-tuning. A number keeps the source aspect
 * ratio; no value keeps the source width.
 */
export function chooseOutputSize(sourceSize: Size, outWidth?: OutWidth): Size {
  if (outWidth !== undefined && typeof outWidth !== "number") {
    const [width, height] = outWidth;
    return { width, height };
  }
  const width = outWidth ?? sourceSize.width;
  const ratio = sourceSize.height / sourceSize.width;
  return { width, height: Math.floor(width * ratio) };
}

export function computePointSize(
  outWidth: number,
  definition: number,
  ratio: number = DEFAULT_POINT_SIZE_RATIO
): number {
  return Math.ceil((outWidth * ratio) / definition);
}

function assertPlannable(input: GeometryInput): void {
  if (!Number.isInteger(input.definition) || input.definition < 2) {
    throw new ConfigurationError(
      `Definition must be an integer of at least 2, got ${input.definition}.`
    );
  }
  if (input.correction !== null && !(input.correction > 0)) {
    throw new ConfigurationError(
      `Correction must be greater than 0, got ${input.correction}.`
    );
  }
  const { outSize, sourceSize } = input;
  for (const [label, size] of [["Output", outSize], ["Source", sourceSize]] as const) {
    const valid = [size.width, size.height].every((n) => Number.isInteger(n) && n > 0);
    if (!valid) {
      throw new ConfigurationError(
        `${label} dimensions must be positive integers, got ${size.width}x${size.height}.`
      );
    }
  }
}

export async function planGeometry(
  input: GeometryInput,
  measure: TextMeasurer
): Promise<GeometryPlan> {
  assertPlannable(input);

  const { definition, outSize, sourceSize } = input;
  const ratio = sourceSize.height / sourceSize.width;
  const pointSize = computePointSize(outSize.width, definition, input.pointSizeRatio);

  let correction = input.correction;
  if (correction === null) {
    const square = await measure(definition, definition, pointSize, {
      width: Math.floor(outSize.width * 1.5),
      height: Math.floor(outSize.width * 2),
    });
    correction = square.width / square.height;
  }

  const definitionHeight = Math.max(1, Math.floor(definition * ratio * correction));

  if (input.strict || !input.fineTune) {
    return { pointSize, definition, definitionHeight, canvas: { ...outSize } };
  }

  const block = await measure(definition, definitionHeight, pointSize, {
    width: Math.floor(outSize.width * 1.5),
    height: Math.floor(outSize.height * 2),
  });

  const canvas = input.evenSizes
    ? { width: Math.floor(block.width / 2) * 2, height: Math.floor(block.height / 2) * 2 }
    : { width: Math.floor(block.width), height: Math.floor(block.height) };

  return { pointSize, definition, definitionHeight, canvas };
}
