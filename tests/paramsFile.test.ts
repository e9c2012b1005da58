import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { formatParamTable, fromFrames, loadParamsFile, parseParamsFile } from "../src/cli/paramsFile";
import { ConfigurationError } from "../src/lib/errors";
import { cleanupTestDir, createTestDir } from "./fixtures";

describe("parseParamsFile", () => {
  it("keeps plain values static", () => {
    const values = parseParamsFile('{ "definition": 60, "bgColor": [10, 20, 30], "correction": null }');
    expect(values.definition).toBe(60);
    expect(values.bgColor).toEqual([10, 20, 30]);
    expect(values.correction).toBeNull();
    expect(values.chars).toBeUndefined();
  });

  it("turns frame lists into functions of the frame index", () => {
    const values = parseParamsFile('{ "definition": { "frames": [40, 50, 60] } }');
    const definition = values.definition;
    if (typeof definition !== "function") {
      throw new Error("expected a dynamic definition");
    }
    expect([1, 2, 3].map(definition)).toEqual([40, 50, 60]);
  });

  it("rejects a frame list entry of the wrong type", () => {
    expect(() => parseParamsFile('{ "chars": { "frames": [" .#", 3] } }')).toThrow(
      '"chars.frames[1]" must be a string.'
    );
  });

  it("rejects unknown keys", () => {
    expect(() => parseParamsFile('{ "defintion": 60 }')).toThrow(
      "Unknown key(s) in params file: defintion."
    );
  });

  it("rejects malformed JSON", () => {
    expect(() => parseParamsFile("{ definition: 60 }")).toThrow(ConfigurationError);
  });

  it("rejects a value that is neither static nor a frame list", () => {
    expect(() => parseParamsFile('{ "txtColor": "white" }')).toThrow(
      '"txtColor" must be a number or [r, g, b], or { "frames": [...] } of them.'
    );
  });
});

describe("fromFrames", () => {
  it("fails for a frame past the end of the list", () => {
    const at = fromFrames("definition", [40, 50]);
    expect(at(2)).toBe(50);
    expect(() => at(3)).toThrow('"definition" lists 2 frame value(s); frame 3 has none.');
  });
});

describe("loadParamsFile", () => {
  let dir: string;

  beforeAll(() => {
    dir = createTestDir();
  });

  afterAll(() => {
    cleanupTestDir(dir);
  });

  it("reads a file from disk", () => {
    const filePath = path.join(dir, "params.json");
    fs.writeFileSync(filePath, JSON.stringify({ chars: "AB" }));
    expect(loadParamsFile(filePath).chars).toBe("AB");
  });

  it("reports a missing file", () => {
    expect(() => loadParamsFile(path.join(dir, "missing.json"))).toThrow(ConfigurationError);
  });
});

describe("formatParamTable", () => {
  it("writes one tab-separated line per row", () => {
    expect(
      formatParamTable([
        ["Frame", "BG Color", "Correction"],
        [1, [10, 10, 10], null],
        [2, [20, 20, 20], 0.5],
      ])
    ).toBe("Frame\tBG Color\tCorrection\n1\t(10, 10, 10)\t-\n2\t(20, 20, 20)\t0.5");
  });
});
