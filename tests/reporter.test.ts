import { describe, it, expect, vi, afterEach } from "vitest";
import { createReporter, estimateRemaining, formatDuration } from "../src/lib/reporter";

describe("reporter", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("formats whole seconds as MM:SS", () => {
    expect(formatDuration(0)).toBe("00:00");
    expect(formatDuration(75)).toBe("01:15");
    expect(formatDuration(605.9)).toBe("10:05");
  });

  it("estimates the time left linearly", () => {
    expect(estimateRemaining(2, 10, 4)).toBe(16);
    expect(estimateRemaining(3, 10, 5)).toBe(11);
    expect(estimateRemaining(0, 10, 5)).toBe(0);
  });

  it("rewrites the progress line and ends it when complete", () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const reporter = createReporter(false);

    reporter.progress(1, 4, "Generating ASCII Art");
    reporter.progress(4, 4, "Generating ASCII Art", "00:00 Remaining.");

    expect(write.mock.calls.map((c) => c[0])).toEqual([
      "\rGenerating ASCII Art... 25%.",
      "\rGenerating ASCII Art... 100%. 00:00 Remaining.",
      "\n",
    ]);
  });

  it("prints nothing but warnings when quiet", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const reporter = createReporter(true);

    reporter.info("Saved out.png");
    reporter.progress(1, 2, "Generating ASCII Art");
    reporter.warn("careful");

    expect(log).not.toHaveBeenCalled();
    expect(write).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[asciify] careful");
  });
});
