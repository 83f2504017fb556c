export type DiagnosticLevel = "error" | "warn" | "info" | "debug" | "trace";

export type Diagnostic = {
  level: DiagnosticLevel;
  code: string;
  message: string;
  details?: Record<string, unknown>;
};

export type OutputFormat = "human" | "jsonl";

export type DiagnosticSink = (d: Diagnostic) => void;

export type TextStream = { write(chunk: string): unknown };

export const LEVELS: readonly DiagnosticLevel[] = ["error", "warn", "info", "debug", "trace"];

export function diag(
  level: DiagnosticLevel,
  code: string,
  message: string,
  details?: Record<string, unknown>
): Diagnostic {
  return details ? { level, code, message, details } : { level, code, message };
}

/** Each `-v` raises the threshold by one level, capped at trace. */
export function levelForVerbosity(base: DiagnosticLevel, verbose: number): DiagnosticLevel {
  const idx = Math.min(LEVELS.indexOf(base) + verbose, LEVELS.length - 1);
  return LEVELS[idx] ?? "trace";
}

function enabled(level: DiagnosticLevel, threshold: DiagnosticLevel): boolean {
  return LEVELS.indexOf(level) <= LEVELS.indexOf(threshold);
}

/**
 * jsonl: one object per line on stdout, for machine consumers.
 * human: plain message lines on stderr so stdout stays clean.
 */
export function createSink(opts: {
  format: OutputFormat;
  threshold: DiagnosticLevel;
  stdout?: TextStream;
  stderr?: TextStream;
}): DiagnosticSink {
  const stdout = opts.stdout ?? process.stdout;
  const stderr = opts.stderr ?? process.stderr;
  return (d) => {
    if (!enabled(d.level, opts.threshold)) return;
    if (opts.format === "jsonl") {
      stdout.write(JSON.stringify(d) + "\n");
    } else {
      stderr.write(`${d.level}: ${d.message}\n`);
    }
  };
}

export const silent: DiagnosticSink = () => {};
