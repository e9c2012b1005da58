import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as path from "path";
import sharp from "sharp";
import {
  createFramePool,
  FRAME_WORKER_PATH,
  isFrameTaskMessage,
  isResultMessage,
  loaderArgs,
  runInline,
  runProcessPool,
} from "../src/pipeline/workerPool";
import type { PoolTask } from "../src/pipeline/workerPool";
import { workerEnvironment } from "../src/pipeline/runContext";
import { RenderError } from "../src/lib/errors";
import type { FrameTask } from "../src/contracts";
import { cleanupTestDir, createTestDir, createTestImage, TEST_CONFIG } from "./fixtures";

const ECHO_WORKER = path.resolve(__dirname, "workers", "echoWorker.ts");

interface EchoPayload {
  fail?: boolean;
  exit?: boolean;
  requireWorkerEnv?: boolean;
}

function tasks(count: number, payloadFor: (frame: number) => EchoPayload = () => ({})): PoolTask<EchoPayload>[] {
  return Array.from({ length: count }, (_, i) => ({ frame: i + 1, payload: payloadFor(i + 1) }));
}

const poolOptions = {
  modulePath: ECHO_WORKER,
  size: 2,
  execArgv: loaderArgs(ECHO_WORKER),
  env: workerEnvironment(),
};

describe("runProcessPool", () => {
  it("runs every task and reports progress", async () => {
    const progress: Array<[number, number]> = [];
    await runProcessPool(tasks(5), poolOptions, (done, total) => progress.push([done, total]));
    expect(progress).toEqual([
      [1, 5],
      [2, 5],
      [3, 5],
      [4, 5],
      [5, 5],
    ]);
  });

  it("hands workers the worker environment", async () => {
    await expect(
      runProcessPool(tasks(2, () => ({ requireWorkerEnv: true })), poolOptions)
    ).resolves.toBeUndefined();
  });

  it("rejects with the frame of the first failure", async () => {
    const err = await runProcessPool(
      tasks(4, (frame) => ({ fail: frame === 3 })),
      poolOptions
    ).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RenderError);
    expect(err).toMatchObject({ frame: 3, causeName: "Error", causeMessage: "boom 3" });
  });

  it("treats a worker exiting mid-task as a failure of its frame", async () => {
    const err = await runProcessPool(
      tasks(3, (frame) => ({ exit: frame === 2 })),
      { ...poolOptions, size: 1 }
    ).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RenderError);
    expect(err).toMatchObject({ frame: 2, causeName: "WorkerExit" });
  });

  it("resolves at once with no tasks", async () => {
    await expect(runProcessPool([], poolOptions)).resolves.toBeUndefined();
  });
});

describe("createFramePool", () => {
  let dir: string;
  let source: string;

  beforeAll(async () => {
    dir = createTestDir();
    source = await createTestImage(dir, "source.png", { width: 40, height: 40 }, 200);
  });

  afterAll(() => {
    cleanupTestDir(dir);
  });

  function frameTask(frame: number, sourcePath: string = source): FrameTask {
    return {
      frame,
      sourcePath,
      sourceSize: { width: 40, height: 40 },
      canvas: { path: path.join(dir, `canvas${frame}.png`), paint: true },
      outputPath: path.join(dir, `frame${frame}.png`),
      params: {
        background: [frame * 20, 0, 0],
        text: [255, 255, 255],
        definition: 4,
        correction: 1,
        chars: " .:#",
      },
      anchor: "center",
      style: { fontFamily: TEST_CONFIG.fontFamily, lineHeightRatio: TEST_CONFIG.lineHeightRatio },
      pointSizeRatio: 1.7,
      geometry: { pointSize: 10, definition: 4, definitionHeight: 4, canvas: { width: 60, height: 40 } },
      replan: false,
    };
  }

  it("renders every frame in forked frame workers", async () => {
    const progress: number[] = [];
    await createFramePool(2).run(
      [1, 2, 3, 4].map((frame) => frameTask(frame)),
      (done) => progress.push(done)
    );

    expect(progress).toEqual([1, 2, 3, 4]);
    for (const frame of [1, 2, 3, 4]) {
      const meta = await sharp(path.join(dir, `frame${frame}.png`)).metadata();
      expect({ width: meta.width, height: meta.height }).toEqual({ width: 60, height: 40 });
    }
  });

  it("reports a frame the worker could not render", async () => {
    const missing = path.join(dir, "missing.png");
    const err = await createFramePool(2)
      .run([frameTask(1), frameTask(2, missing)])
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RenderError);
    expect(err).toMatchObject({ frame: 2, causeName: "Error" });
  });
});

describe("runInline", () => {
  it("runs tasks in order", async () => {
    const seen: number[] = [];
    await runInline(tasks(3), async () => {
      seen.push(seen.length + 1);
    });
    expect(seen).toEqual([1, 2, 3]);
  });

  it("stops at the first failure", async () => {
    const seen: number[] = [];
    const err = await runInline(tasks(4), async () => {
      seen.push(seen.length + 1);
      if (seen.length === 2) throw new TypeError("bad frame");
    }).catch((e: unknown) => e);

    expect(seen).toEqual([1, 2]);
    expect(err).toBeInstanceOf(RenderError);
    expect(err).toMatchObject({ frame: 2, message: "Frame 2 failed (TypeError): bad frame" });
  });
});

describe("messages", () => {
  it("recognizes result messages", () => {
    expect(isResultMessage({ type: "done", frame: 1 })).toBe(true);
    expect(isResultMessage({ type: "failed", frame: 1, error: { name: "E", message: "m" } })).toBe(true);
    expect(isResultMessage({ type: "failed", frame: 1 })).toBe(false);
    expect(isResultMessage({ type: "done" })).toBe(false);
    expect(isResultMessage(null)).toBe(false);
  });

  it("rejects task messages without a frame task payload", () => {
    expect(isFrameTaskMessage({ type: "task", frame: 1, payload: {} })).toBe(false);
    expect(isFrameTaskMessage({ type: "done", frame: 1 })).toBe(false);
  });

  it("loads TypeScript workers through tsx", () => {
    expect(loaderArgs("/x/worker.ts")).toEqual(["--import", "tsx"]);
    expect(loaderArgs("/x/worker.js")).toEqual([]);
    expect(path.basename(FRAME_WORKER_PATH)).toBe("frameWorker.ts");
  });
});
