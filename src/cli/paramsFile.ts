/**
 * JSON parameter files for the CLI.
 *
 *   {
 *     "bgColor": { "frames": [0, 40, 80] },
 *     "definition": 60,
 *     "chars": " .:#"
 *   }
 *
 * A value wrapped in { "frames": [...] } varies per frame: entry k is the
 * value of frame k + 1.
 */

import * as fs from "fs";
import { ConfigurationError, errorMessage } from "../lib/errors";
import type { Color, Dynamic, Rgb } from "../contracts";
import type { ParamCell } from "../core/parameters";

export interface ParamsFileValues {
  bgColor?: Dynamic<Color>;
  txtColor?: Dynamic<Color>;
  definition?: Dynamic<number>;
  correction?: Dynamic<number | null>;
  chars?: Dynamic<string>;
}

const KNOWN_KEYS = ["bgColor", "txtColor", "definition", "correction", "chars"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isRgb(value: unknown): value is Rgb {
  return Array.isArray(value) && value.length === 3 && value.every(isNumber);
}

function isColor(value: unknown): value is Color {
  return isNumber(value) || isRgb(value);
}

function isNumberOrNull(value: unknown): value is number | null {
  return value === null || isNumber(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string";
}

/** Function of the frame index over a list of per-frame values. */
export function fromFrames<T>(key: string, frames: readonly T[]): (frame: number) => T {
  return (frame) => {
    if (!Number.isInteger(frame) || frame < 1 || frame > frames.length) {
      throw new ConfigurationError(
        `"${key}" lists ${frames.length} frame value(s); frame ${frame} has none.`
      );
    }
    return frames[frame - 1];
  };
}

function readValue<T>(
  doc: Record<string, unknown>,
  key: string,
  guard: (value: unknown) => value is T,
  expected: string
): Dynamic<T> | undefined {
  const value = doc[key];
  if (value === undefined) {
    return undefined;
  }
  if (guard(value)) {
    return value;
  }
  if (isRecord(value) && Array.isArray(value.frames)) {
    const frames: unknown[] = value.frames;
    if (frames.length === 0) {
      throw new ConfigurationError(`"${key}.frames" must not be empty.`);
    }
    const typed: T[] = [];
    for (const [i, entry] of frames.entries()) {
      if (!guard(entry)) {
        throw new ConfigurationError(`"${key}.frames[${i}]" must be ${expected}.`);
      }
      typed.push(entry);
    }
    return fromFrames(key, typed);
  }
  throw new ConfigurationError(`"${key}" must be ${expected}, or { "frames": [...] } of them.`);
}

export function parseParamsFile(json: string, source = "params file"): ParamsFileValues {
  let doc: unknown;
  try {
    doc = JSON.parse(json);
  } catch (err) {
    throw new ConfigurationError(`Cannot parse ${source}: ${errorMessage(err)}`);
  }
  if (!isRecord(doc)) {
    throw new ConfigurationError(`${source} must contain a JSON object.`);
  }

  const unknownKeys = Object.keys(doc).filter((k) => !KNOWN_KEYS.includes(k));
  if (unknownKeys.length > 0) {
    throw new ConfigurationError(
      `Unknown key(s) in ${source}: ${unknownKeys.join(", ")}. Known: ${KNOWN_KEYS.join(", ")}.`
    );
  }

  return {
    bgColor: readValue(doc, "bgColor", isColor, "a number or [r, g, b]"),
    txtColor: readValue(doc, "txtColor", isColor, "a number or [r, g, b]"),
    definition: readValue(doc, "definition", isNumber, "a number"),
    correction: readValue(doc, "correction", isNumberOrNull, "a number or null"),
    chars: readValue(doc, "chars", isString, "a string"),
  };
}

export function loadParamsFile(filePath: string): ParamsFileValues {
  let json: string;
  try {
    json = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read params file ${filePath}: ${errorMessage(err)}`);
  }
  return parseParamsFile(json, filePath);
}

// --- Table output ---

function formatCell(cell: ParamCell): string {
  if (cell === null) return "-";
  if (typeof cell === "number" || typeof cell === "string") return String(cell);
  return `(${cell.join(", ")})`;
}

/** Tab-separated rows, one line per row. */
export function formatParamTable(rows: ParamCell[][]): string {
  return rows.map((row) => row.map(formatCell).join("\t")).join("\n");
}
