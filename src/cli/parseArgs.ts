import * as path from "path";
import type { Color, OutWidth } from "../contracts";

// --- CLI Arg Types ---

export type Command = "image" | "animate" | "video" | "dynamic-video" | "params";

export interface CliOptions {
  bgColor?: Color;
  txtColor?: Color;
  definition?: number;
  correction?: number;
  chars?: string;
  outWidth?: OutWidth;
  strict: boolean;
  reverseChars: boolean;
  outPath?: string;
  quiet: boolean;
  /** JSON file with static or per-frame parameter values. */
  paramsFile?: string;
  frameCount?: number;
  fps?: number;
  gif: boolean;
  saveTxt: boolean;
}

export interface ParsedArgs {
  command: Command;
  sourcePath: string;
  options: CliOptions;
}

// --- Constants ---

const COMMANDS: readonly Command[] = ["image", "animate", "video", "dynamic-video", "params"];

const RENDER_FLAGS = [
  "--bg-color",
  "--txt-color",
  "--definition",
  "--correction",
  "--chars",
  "--out-width",
  "--strict",
  "--reverse-chars",
  "--params",
  "--out",
  "--quiet",
];

/** Flags accepted by each command, besides the source path. */
const COMMAND_FLAGS: Record<Command, readonly string[]> = {
  image: [...RENDER_FLAGS, "--save-txt"],
  animate: [...RENDER_FLAGS, "--frame-count", "--fps", "--mp4"],
  video: RENDER_FLAGS,
  "dynamic-video": RENDER_FLAGS,
  params: ["--params", "--frame-count", "--reverse-chars"],
};

// --- CLI Parsing ---

function printUsage(): void {
  console.error("Usage:");
  console.error("  asciify image <path> [options] [--save-txt]");
  console.error("  asciify animate <path> [options] [--frame-count N] [--fps N] [--mp4]");
  console.error("  asciify video <path> [options]");
  console.error("  asciify dynamic-video <path> [options]");
  console.error("  asciify params <path> --params <file> [--frame-count N]");
  console.error("");
  console.error("Options:");
  console.error("  --bg-color <n|r,g,b>     background color (default 30)");
  console.error("  --txt-color <n|r,g,b>    text color (default 255)");
  console.error("  --definition <n>         characters per line (default 100)");
  console.error("  --correction <x>         glyph aspect correction (measured by default)");
  console.error("  --chars <ramp>           characters, dimmest to brightest");
  console.error("  --out-width <w|WxH>      output width, or exact dimensions");
  console.error("  --strict                 keep the output dimensions exactly");
  console.error("  --reverse-chars          reverse the ramp");
  console.error("  --params <file>          JSON parameters; {\"frames\": [...]} varies per frame");
  console.error("  --out <path>             output path");
  console.error("  --quiet                  no progress output");
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

function parseInteger(flag: string, raw: string, min: number): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    fail(`${flag} must be an integer of at least ${min}, got "${raw}"`);
  }
  return n;
}

function parsePositive(flag: string, raw: string): number {
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) {
    fail(`${flag} must be a positive number, got "${raw}"`);
  }
  return n;
}

/** "30" or "255,0,0". */
export function parseColor(flag: string, raw: string): Color {
  const parts = raw.split(",").map((p) => p.trim());
  const channels = parts.map(Number);
  if (
    (parts.length !== 1 && parts.length !== 3) ||
    !channels.every((c) => Number.isInteger(c) && c >= 0 && c <= 255)
  ) {
    fail(`${flag} must be 0-255 or r,g,b with each channel 0-255, got "${raw}"`);
  }
  return channels.length === 3 ? [channels[0], channels[1], channels[2]] : channels[0];
}

/** "1920" or "1920x1080". */
export function parseOutWidth(raw: string): OutWidth {
  const match = /^(\d+)(?:x(\d+))?$/.exec(raw);
  if (!match || Number(match[1]) < 1 || (match[2] !== undefined && Number(match[2]) < 1)) {
    fail(`--out-width must be WIDTH or WIDTHxHEIGHT, got "${raw}"`);
  }
  const width = Number(match[1]);
  return match[2] === undefined ? width : [width, Number(match[2])];
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);

  if (args.length === 0) {
    console.error("Error: No command or arguments provided.");
    printUsage();
    process.exit(1);
  }

  const command = args[0];
  if (!isCommand(command)) {
    if (command.startsWith("--")) {
      console.error(`Error: Unknown flag "${command}"`);
    } else {
      console.error(`Error: Unknown command "${command}"`);
    }
    printUsage();
    process.exit(1);
  }

  if (args.length < 2 || args[1].startsWith("--")) {
    fail(`'${command}' requires a source path.`);
  }
  const sourcePath = path.resolve(args[1]);

  const allowed = COMMAND_FLAGS[command];
  const options: CliOptions = {
    strict: false,
    reverseChars: false,
    quiet: false,
    gif: true,
    saveTxt: false,
  };

  const valueOf = (i: number): string => {
    if (i + 1 >= args.length || args[i + 1].startsWith("--")) {
      fail(`${args[i]} requires a value`);
    }
    return args[i + 1];
  };

  for (let i = 2; i < args.length; i++) {
    const flag = args[i];
    if (!allowed.includes(flag)) {
      fail(`Unknown argument "${flag}" for '${command}'`);
    }

    switch (flag) {
      case "--bg-color":
        options.bgColor = parseColor(flag, valueOf(i++));
        break;
      case "--txt-color":
        options.txtColor = parseColor(flag, valueOf(i++));
        break;
      case "--definition":
        options.definition = parseInteger(flag, valueOf(i++), 2);
        break;
      case "--correction":
        options.correction = parsePositive(flag, valueOf(i++));
        break;
      case "--chars":
        // A ramp may legitimately start with "-", so take the next token as-is.
        if (i + 1 >= args.length || args[i + 1].length === 0) {
          fail("--chars requires a value");
        }
        options.chars = args[++i];
        break;
      case "--out-width":
        options.outWidth = parseOutWidth(valueOf(i++));
        break;
      case "--params":
        options.paramsFile = path.resolve(valueOf(i++));
        break;
      case "--out":
        options.outPath = path.resolve(valueOf(i++));
        break;
      case "--frame-count":
        options.frameCount = parseInteger(flag, valueOf(i++), 1);
        break;
      case "--fps":
        options.fps = parseInteger(flag, valueOf(i++), 1);
        break;
      case "--strict":
        options.strict = true;
        break;
      case "--reverse-chars":
        options.reverseChars = true;
        break;
      case "--quiet":
        options.quiet = true;
        break;
      case "--mp4":
        options.gif = false;
        break;
      case "--save-txt":
        options.saveTxt = true;
        break;
    }
  }

  if (command === "params" && options.paramsFile === undefined) {
    fail("'params' requires --params <file>.");
  }

  return { command, sourcePath, options };
}
