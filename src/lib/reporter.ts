/**
 * Console progress output for generation runs. Everything is a no-op when
 * quiet, except warnings.
 */

export interface Reporter {
  info(message: string): void;
  debug(message: string): void;
  warn(message: string): void;
  /** Rewrite the current line with a percentage. Ends the line at 100%. */
  progress(done: number, total: number, label: string, suffix?: string): void;
}

/** Two-digit zero padding, e.g. 7 -> "07". */
function pad2(n: number): string {
  return n < 10 ? `0${n}` : String(n);
}

/** Format whole seconds as MM:SS. */
export function formatDuration(seconds: number): string {
  const whole = Math.max(0, Math.floor(seconds));
  const minutes = Math.floor(whole / 60);
  return `${pad2(minutes)}:${pad2(whole - minutes * 60)}`;
}

/**
 * Linear estimate of the time left, in seconds, after `done` of `total`
 * units took `elapsedSeconds`.
 */
export function estimateRemaining(done: number, total: number, elapsedSeconds: number): number {
  if (done <= 0) {
    return 0;
  }
  return Math.floor((elapsedSeconds * (total - done)) / done);
}

export function createReporter(quiet: boolean, tag = "asciify"): Reporter {
  const debugEnabled = process.env.ASCIIFY_DEBUG === "1";

  return {
    info(message) {
      if (!quiet) console.log(message);
    },
    debug(message) {
      if (debugEnabled) console.debug(`[${tag}] ${message}`);
    },
    warn(message) {
      console.warn(`[${tag}] ${message}`);
    },
    progress(done, total, label, suffix) {
      if (quiet) return;
      const percentage = Math.floor((100 * done) / total);
      const tail = suffix ? ` ${suffix}` : "";
      process.stdout.write(`\r${label}... ${percentage}%.${tail}`);
      if (done === total) {
        process.stdout.write("\n");
      }
    },
  };
}
