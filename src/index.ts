#!/usr/bin/env node
import * as path from "path";
import * as dotenv from "dotenv";
import { parseArgs } from "./cli/parseArgs";
import type { CliOptions, ParsedArgs } from "./cli/parseArgs";
import { formatParamTable, loadParamsFile } from "./cli/paramsFile";
import type { ParamsFileValues } from "./cli/paramsFile";
import {
  asciifyImage,
  asciifyVideo,
  dynamicAsciifyImage,
  dynamicAsciifyVideo,
  previewDynamicParameters,
} from "./asciify";
import type { DynamicOptions } from "./asciify";
import { errorMessage } from "./lib/errors";

/** Flag values first, then anything the params file sets. */
function renderOptions(options: CliOptions, fileValues: ParamsFileValues): DynamicOptions {
  return {
    bgColor: fileValues.bgColor ?? options.bgColor,
    txtColor: fileValues.txtColor ?? options.txtColor,
    definition: fileValues.definition ?? options.definition,
    correction: fileValues.correction ?? options.correction,
    chars: fileValues.chars ?? options.chars,
    outWidth: options.outWidth,
    strictOutDimensions: options.strict,
    reverseChars: options.reverseChars,
    outPath: options.outPath,
    quiet: options.quiet,
  };
}

/** Keep only values that are not functions of the frame index. */
function staticOnly<T>(value: T | ((frame: number) => T) | undefined, key: string): T | undefined {
  if (typeof value === "function") {
    throw new Error(`"${key}" varies per frame; use a dynamic command for per-frame values.`);
  }
  return value;
}

async function run(parsed: ParsedArgs): Promise<void> {
  const { command, sourcePath, options } = parsed;
  const fileValues = options.paramsFile === undefined ? {} : loadParamsFile(options.paramsFile);
  const dynamic = renderOptions(options, fileValues);

  switch (command) {
    case "image":
    case "video": {
      const staticOptions = {
        ...dynamic,
        bgColor: staticOnly(dynamic.bgColor, "bgColor"),
        txtColor: staticOnly(dynamic.txtColor, "txtColor"),
        definition: staticOnly(dynamic.definition, "definition"),
        correction: staticOnly(dynamic.correction, "correction"),
        chars: staticOnly(dynamic.chars, "chars"),
      };
      if (command === "image") {
        await asciifyImage(sourcePath, { ...staticOptions, saveTxt: options.saveTxt });
      } else {
        await asciifyVideo(sourcePath, staticOptions);
      }
      return;
    }
    case "animate":
      await dynamicAsciifyImage(sourcePath, {
        ...dynamic,
        frameCount: options.frameCount,
        fps: options.fps,
        gif: options.gif,
      });
      return;
    case "dynamic-video":
      await dynamicAsciifyVideo(sourcePath, dynamic);
      return;
    case "params": {
      const rows = await previewDynamicParameters(sourcePath, {
        ...dynamic,
        frameCount: options.frameCount,
      });
      console.log(formatParamTable(rows));
      return;
    }
  }
}

async function main(): Promise<void> {
  // Tool paths and worker count may come from .env; existing env vars win.
  dotenv.config({ path: path.resolve(__dirname, "../.env"), override: false });
  await run(parseArgs(process.argv));
}

main().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
