/**
 * Diagnostic sinks
 *
 * Formulas never log on their own. Callers that want to see faults pass a
 * sink as the trailing argument of a checked formula; the result is the same
 * with or without one.
 */

export type DiagnosticLevel = "debug" | "info" | "warn" | "error";

/** A level threshold; `"off"` drops everything */
export type LevelFilter = DiagnosticLevel | "off";

export const LEVELS: readonly LevelFilter[] = ["debug", "info", "warn", "error", "off"];

const SEVERITY: Record<LevelFilter, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  off: 4,
};

/**
 * Where diagnostics go.
 */
export interface DiagnosticSink {
  readonly debug: (message: string) => void;
  readonly info: (message: string) => void;
  readonly warn: (message: string) => void;
  readonly error: (message: string) => void;
}

/**
 * Whether a message at `level` passes the `threshold`.
 */
export function enabled(level: DiagnosticLevel, threshold: LevelFilter): boolean {
  return SEVERITY[level] >= SEVERITY[threshold];
}

function drop(): void {}

/**
 * Discards everything.
 */
export const silentSink: DiagnosticSink = {
  debug: drop,
  info: drop,
  warn: drop,
  error: drop,
};

/**
 * Console sink: `[LEVEL] scope: message`, errors on stderr.
 */
export function consoleSink(
  threshold: LevelFilter = "info",
  scope: string = "rattrig"
): DiagnosticSink {
  const emit =
    (level: DiagnosticLevel, write: (line: string) => void) =>
    (message: string): void => {
      if (enabled(level, threshold)) {
        write(`[${level.toUpperCase()}] ${scope}: ${message}`);
      }
    };

  return {
    debug: emit("debug", (line) => console.log(line)),
    info: emit("info", (line) => console.log(line)),
    warn: emit("warn", (line) => console.warn(line)),
    error: emit("error", (line) => console.error(line)),
  };
}

export interface DiagnosticRecord {
  readonly level: DiagnosticLevel;
  readonly message: string;
}

/**
 * Sink that keeps what it receives, for inspection.
 */
export interface MemorySink extends DiagnosticSink {
  readonly records: readonly DiagnosticRecord[];
}

export function memorySink(threshold: LevelFilter = "debug"): MemorySink {
  const records: DiagnosticRecord[] = [];
  const push = (level: DiagnosticLevel) => (message: string) => {
    if (enabled(level, threshold)) {
      records.push({ level, message });
    }
  };

  return {
    records,
    debug: push("debug"),
    info: push("info"),
    warn: push("warn"),
    error: push("error"),
  };
}
