import * as os from "os";
import { ConfigurationError } from "./lib/errors";

export interface AsciifyConfig {
  /** ffmpeg executable */
  ffmpegPath: string;
  /** ffprobe executable */
  ffprobePath: string;
  /** Worker process count (0 = render inline, in this process) */
  workers: number;
  /** CSS font-family used for drawing and measuring text */
  fontFamily: string;
  /** Canvas-width to glyph-width ratio used to derive the point size */
  pointSizeRatio: number;
  /** Line height as a multiple of the point size */
  lineHeightRatio: number;
  /** Suppress progress output */
  quiet: boolean;
}

export const DEFAULT_CONFIG: AsciifyConfig = {
  ffmpegPath: "ffmpeg",
  ffprobePath: "ffprobe",
  workers: os.availableParallelism(),
  fontFamily: "'Courier New', Courier, monospace",
  pointSizeRatio: 1.7,
  lineHeightRatio: 1.15,
  quiet: false,
};

function readNumber(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  check: (n: number) => boolean,
  rule: string
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const n = Number(raw);
  if (!Number.isFinite(n) || !check(n)) {
    throw new ConfigurationError(`Invalid ${key}: "${raw}". Must be ${rule}.`);
  }
  return n;
}

/**
 * Build the configuration from environment variables, falling back to
 * DEFAULT_CONFIG. The CLI loads .env into process.env before calling this.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AsciifyConfig {
  const workers = readNumber(
    env,
    "ASCIIFY_WORKERS",
    DEFAULT_CONFIG.workers,
    (n) => Number.isInteger(n) && n >= 0,
    "a non-negative integer"
  );

  const pointSizeRatio = readNumber(
    env,
    "ASCIIFY_POINT_SIZE_RATIO",
    DEFAULT_CONFIG.pointSizeRatio,
    (n) => n > 0,
    "a positive number"
  );

  const lineHeightRatio = readNumber(
    env,
    "ASCIIFY_LINE_HEIGHT_RATIO",
    DEFAULT_CONFIG.lineHeightRatio,
    (n) => n > 0,
    "a positive number"
  );

  const quietRaw = (env.ASCIIFY_QUIET ?? "").trim().toLowerCase();

  return {
    ffmpegPath: env.ASCIIFY_FFMPEG || DEFAULT_CONFIG.ffmpegPath,
    ffprobePath: env.ASCIIFY_FFPROBE || DEFAULT_CONFIG.ffprobePath,
    workers,
    fontFamily: env.ASCIIFY_FONT_FAMILY || DEFAULT_CONFIG.fontFamily,
    pointSizeRatio,
    lineHeightRatio,
    quiet: quietRaw === "1" || quietRaw === "true",
  };
}
