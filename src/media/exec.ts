import { spawn } from "child_process";
import { AsciifyError } from "../lib/errors";

export interface ToolResult {
  /** Exit status; null when the process was killed by a signal. */
  code: number | null;
  stdout: string;
  stderr: string;
}

export type ToolRunner = (command: string, args: string[]) => Promise<ToolResult>;

export class ToolNotFoundError extends AsciifyError {
  constructor(public readonly command: string, cause: string) {
    super(`Cannot run ${command}: ${cause}. Is it installed and on PATH?`);
    this.name = "ToolNotFoundError";
  }
}

/**
 * Run an external program and capture its output. Resolves with the exit
 * status whatever it is; rejects only when the program cannot be started.
 */
export const runTool: ToolRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.on("error", (err) => reject(new ToolNotFoundError(command, err.message)));
    child.on("close", (code) => {
      resolve({
        code,
        stdout: Buffer.concat(stdout).toString("utf-8").trim(),
        stderr: Buffer.concat(stderr).toString("utf-8").trim(),
      });
    });
  });
