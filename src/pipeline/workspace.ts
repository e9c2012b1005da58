import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { assertResolvedContainedIn } from "../lib/pathSafety";

/**
 * Temporary directory owned by one generation run. Holds extracted source
 * frames, rendered frames, the shared canvas and intermediate video/audio.
 * Every worker writes only its own frame-numbered files.
 */
export interface Workspace {
  root: string;
  sourceFramesDir: string;
  framesDir: string;
  canvasPath: string;
}

export const FRAME_PATTERN = "frame%d.png";

export function createWorkspace(prefix = "asciify-"): Workspace {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  const sourceFramesDir = path.join(root, "source-frames");
  const framesDir = path.join(root, "frames");
  fs.mkdirSync(sourceFramesDir);
  fs.mkdirSync(framesDir);

  return { root, sourceFramesDir, framesDir, canvasPath: path.join(root, "canvas.png") };
}

export function removeWorkspace(workspace: Workspace): void {
  fs.rmSync(workspace.root, { recursive: true, force: true });
}

/** Path of a file inside the workspace. */
export function workspaceFile(workspace: Workspace, ...segments: string[]): string {
  const filePath = path.join(workspace.root, ...segments);
  assertResolvedContainedIn(filePath, workspace.root, "Workspace file");
  return filePath;
}

export function sourceFramePath(workspace: Workspace, frame: number): string {
  return workspaceFile(workspace, "source-frames", `frame${frame}.png`);
}

export function outputFramePath(workspace: Workspace, frame: number): string {
  return workspaceFile(workspace, "frames", `frame${frame}.png`);
}

export function frameCanvasPath(workspace: Workspace, frame: number): string {
  return workspaceFile(workspace, "frames", `canvas${frame}.png`);
}

/**
 * Run `fn` with a fresh workspace, removing it afterwards whether `fn`
 * resolves or rejects.
 */
export async function withWorkspace<T>(fn: (workspace: Workspace) => Promise<T>): Promise<T> {
  const workspace = createWorkspace();
  try {
    return await fn(workspace);
  } finally {
    removeWorkspace(workspace);
  }
}
