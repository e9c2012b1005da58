/**
 * Per-run context carried through the call chain.
 *
 * The worker pool hands each forked child an environment with
 * ASCIIFY_WORKER=1. A generation entry point that finds itself running with
 * that context would fork a pool of its own from inside a worker; it exits
 * with a warning instead.
 */

export const WORKER_ENV_FLAG = "ASCIIFY_WORKER";

export interface RunContext {
  readonly insideWorker: boolean;
}

export function createRunContext(env: NodeJS.ProcessEnv = process.env): RunContext {
  return { insideWorker: env[WORKER_ENV_FLAG] === "1" };
}

/** Environment for a forked worker process. */
export function workerEnvironment(env: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  return { ...env, [WORKER_ENV_FLAG]: "1" };
}

export function guardEntry(context: RunContext, entry: string): void {
  if (!context.insideWorker) {
    return;
  }
  console.warn(
    `[asciify] ${entry}() was called inside a worker process. ` +
      "Generation entry points must only run in the parent process; " +
      "call them from your program's main module, not from code loaded by workers."
  );
  process.exit(1);
}
