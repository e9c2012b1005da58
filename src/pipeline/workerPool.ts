/**
 * Fixed-size pool of forked worker processes, one task per frame.
 *
 * Tasks are independent and complete in any order. Only plain JSON crosses
 * the process boundary. The first failure kills every worker and rejects
 * with a RenderError carrying the frame index; there is no retry.
 */

import { fork } from "child_process";
import type { ChildProcess } from "child_process";
import * as path from "path";
import { RenderError, serializeError } from "../lib/errors";
import type { SerializedError } from "../lib/errors";
import { renderFrameTask } from "../core/frameRenderer";
import { workerEnvironment } from "./runContext";
import type { ImageTools } from "../media/imageTools";
import type { FrameTask } from "../contracts";

export interface PoolTask<T> {
  frame: number;
  payload: T;
}

export type ProgressListener = (done: number, total: number) => void;

export interface TaskMessage<T> {
  type: "task";
  frame: number;
  payload: T;
}

export type ResultMessage =
  | { type: "done"; frame: number }
  | { type: "failed"; frame: number; error: SerializedError };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function isResultMessage(value: unknown): value is ResultMessage {
  if (!isRecord(value) || typeof value.frame !== "number") return false;
  if (value.type === "done") return true;
  return (
    value.type === "failed" &&
    isRecord(value.error) &&
    typeof value.error.name === "string" &&
    typeof value.error.message === "string"
  );
}

function isSize(value: unknown): boolean {
  return isRecord(value) && typeof value.width === "number" && typeof value.height === "number";
}

function isFrameTask(value: unknown): value is FrameTask {
  return (
    isRecord(value) &&
    typeof value.frame === "number" &&
    typeof value.sourcePath === "string" &&
    typeof value.outputPath === "string" &&
    isSize(value.sourceSize) &&
    isRecord(value.canvas) &&
    typeof value.canvas.path === "string" &&
    isRecord(value.params) &&
    isRecord(value.style) &&
    isRecord(value.geometry) &&
    isSize(value.geometry.canvas) &&
    typeof value.replan === "boolean"
  );
}

/** Shallow shape check of a task message received by a frame worker. */
export function isFrameTaskMessage(value: unknown): value is TaskMessage<FrameTask> {
  return (
    isRecord(value) &&
    value.type === "task" &&
    typeof value.frame === "number" &&
    isFrameTask(value.payload)
  );
}

export interface ProcessPoolOptions {
  /** Module each worker runs. */
  modulePath: string;
  size: number;
  execArgv?: string[];
  env?: NodeJS.ProcessEnv;
}

/** Node flags needed to run a worker module: a TypeScript source needs the tsx loader. */
export function loaderArgs(modulePath: string): string[] {
  return path.extname(modulePath) === ".ts" ? ["--import", "tsx"] : [];
}

export function runProcessPool<T>(
  tasks: PoolTask<T>[],
  options: ProcessPoolOptions,
  onProgress?: ProgressListener
): Promise<void> {
  if (tasks.length === 0) {
    return Promise.resolve();
  }

  const size = Math.max(1, Math.min(options.size, tasks.length));
  const total = tasks.length;
  const pending = [...tasks];
  const busy = new Map<ChildProcess, number>();
  const children: ChildProcess[] = [];

  return new Promise<void>((resolve, reject) => {
    let done = 0;
    let settled = false;

    const fail = (err: Error): void => {
      if (settled) return;
      settled = true;
      for (const child of children) {
        child.kill();
      }
      reject(err);
    };

    // Hand the next task to an idle worker, or let it go when none is left.
    const feed = (child: ChildProcess): void => {
      const next = pending.shift();
      if (next === undefined) {
        busy.delete(child);
        if (child.connected) child.disconnect();
        return;
      }
      busy.set(child, next.frame);
      const message: TaskMessage<T> = { type: "task", frame: next.frame, payload: next.payload };
      child.send(message);
    };

    for (let i = 0; i < size; i++) {
      const child = fork(options.modulePath, [], {
        execArgv: options.execArgv ?? [],
        env: options.env ?? process.env,
        stdio: ["ignore", "inherit", "inherit", "ipc"],
      });
      children.push(child);

      child.on("message", (message: unknown) => {
        if (settled || !isResultMessage(message)) return;
        if (message.type === "failed") {
          fail(new RenderError(message.frame, message.error.name, message.error.message));
          return;
        }
        done++;
        onProgress?.(done, total);
        feed(child);
        if (done === total) {
          settled = true;
          resolve();
        }
      });

      child.on("error", (err) => {
        const frame = busy.get(child) ?? tasks[0].frame;
        fail(new RenderError(frame, err.name, err.message));
      });

      child.on("exit", (code, signal) => {
        const frame = busy.get(child);
        if (frame === undefined) return;
        fail(
          new RenderError(frame, "WorkerExit", `worker exited (code ${code}, signal ${signal})`)
        );
      });

      feed(child);
    }
  });
}

/** Run tasks one after another in this process, stopping at the first failure. */
export async function runInline<T>(
  tasks: PoolTask<T>[],
  execute: (payload: T) => Promise<unknown>,
  onProgress?: ProgressListener
): Promise<void> {
  let done = 0;
  for (const task of tasks) {
    try {
      await execute(task.payload);
    } catch (err) {
      const { name, message } = serializeError(err);
      throw new RenderError(task.frame, name, message);
    }
    done++;
    onProgress?.(done, tasks.length);
  }
}

// --- Frame pool ---

export interface FramePool {
  readonly size: number;
  run(tasks: FrameTask[], onProgress?: ProgressListener): Promise<void>;
}

export const FRAME_WORKER_PATH = path.join(__dirname, `frameWorker${path.extname(__filename)}`);

/**
 * Pool rendering frame tasks in `workers` processes. Zero renders inline,
 * in the calling process, with `inlineTools` when given.
 */
export function createFramePool(workers: number, inlineTools?: ImageTools): FramePool {
  const toPoolTasks = (tasks: FrameTask[]): PoolTask<FrameTask>[] =>
    tasks.map((task) => ({ frame: task.frame, payload: task }));

  if (workers === 0) {
    return {
      size: 0,
      run: (tasks, onProgress) =>
        runInline(toPoolTasks(tasks), (task) => renderFrameTask(task, inlineTools), onProgress),
    };
  }

  return {
    size: workers,
    run: (tasks, onProgress) =>
      runProcessPool(
        toPoolTasks(tasks),
        {
          modulePath: FRAME_WORKER_PATH,
          size: workers,
          execArgv: loaderArgs(FRAME_WORKER_PATH),
          env: workerEnvironment(),
        },
        onProgress
      ),
  };
}
