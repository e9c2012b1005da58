/**
 * Entry point of a forked frame worker. Receives one task message at a time
 * from the pool, renders the frame and reports back. Exits when the parent
 * disconnects.
 */

import { renderFrameTask } from "../core/frameRenderer";
import { serializeError } from "../lib/errors";
import { createRunContext } from "./runContext";
import { isFrameTaskMessage } from "./workerPool";
import type { ResultMessage, TaskMessage } from "./workerPool";
import type { FrameTask } from "../contracts";

function reply(message: ResultMessage): void {
  process.send?.(message);
}

async function handleTask(message: TaskMessage<FrameTask>): Promise<void> {
  try {
    await renderFrameTask(message.payload);
    reply({ type: "done", frame: message.frame });
  } catch (err) {
    reply({ type: "failed", frame: message.frame, error: serializeError(err) });
  }
}

if (createRunContext().insideWorker && process.send !== undefined) {
  process.on("message", (message: unknown) => {
    if (!isFrameTaskMessage(message)) {
      console.warn("[asciify:worker] Ignoring malformed task message");
      return;
    }
    handleTask(message).catch((err: unknown) => {
      console.error("[asciify:worker] Could not report result:", err);
      process.exit(1);
    });
  });

  process.on("disconnect", () => process.exit(0));
}
