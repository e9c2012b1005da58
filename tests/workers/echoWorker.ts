/**
 * Pool worker used by the pool tests. Each task payload says how to answer.
 */
import type { ResultMessage } from "../../src/pipeline/workerPool";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function reply(message: ResultMessage): void {
  process.send?.(message);
}

process.on("message", (message: unknown) => {
  if (!isRecord(message) || message.type !== "task" || typeof message.frame !== "number") {
    return;
  }
  const frame = message.frame;
  const payload = isRecord(message.payload) ? message.payload : {};

  if (payload.exit === true) {
    process.exit(3);
  }
  if (payload.fail === true) {
    reply({ type: "failed", frame, error: { name: "Error", message: `boom ${frame}` } });
    return;
  }
  if (payload.requireWorkerEnv === true && process.env.ASCIIFY_WORKER !== "1") {
    reply({ type: "failed", frame, error: { name: "Error", message: "not a worker" } });
    return;
  }
  reply({ type: "done", frame });
});

process.on("disconnect", () => process.exit(0));
