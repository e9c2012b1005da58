/**
 * Error kinds raised by the asciify pipeline.
 *
 * Configuration and input errors are thrown before a workspace or a worker
 * exists. External-tool errors carry the operation that failed. A failure
 * inside a worker reaches the caller as a RenderError tagged with its frame.
 */

export class AsciifyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AsciifyError";
  }
}

export class ConfigurationError extends AsciifyError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export type InputErrorReason = "not-found" | "unsupported-format";

export class InputError extends AsciifyError {
  constructor(
    message: string,
    public readonly reason: InputErrorReason,
    public readonly path: string
  ) {
    super(message);
    this.name = "InputError";
  }
}

export type ToolOperation =
  | "canvas"
  | "text-overlay"
  | "measure"
  | "frame-extraction"
  | "frame-assembly"
  | "audio-extraction"
  | "stream-join";

export class ExternalToolError extends AsciifyError {
  constructor(
    message: string,
    public readonly operation: ToolOperation,
    public readonly exitCode: number | null = null,
    public readonly stderr: string = ""
  ) {
    super(message);
    this.name = "ExternalToolError";
  }
}

export class RenderError extends AsciifyError {
  constructor(
    public readonly frame: number,
    public readonly causeName: string,
    public readonly causeMessage: string
  ) {
    super(`Frame ${frame} failed (${causeName}): ${causeMessage}`);
    this.name = "RenderError";
  }
}

/** Plain-data form of an error, as sent from a worker process. */
export interface SerializedError {
  name: string;
  message: string;
}

export function serializeError(err: unknown): SerializedError {
  if (err instanceof Error) {
    return { name: err.name, message: err.message };
  }
  return { name: "Error", message: String(err) };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
