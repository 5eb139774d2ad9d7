export type OutputFormat = "human" | "jsonl";

export type LogLevel = "info" | "warn" | "error";

export type Fields = Record<string, unknown>;

export type Sink = { write(chunk: string): unknown };

/**
 * Operator-facing status lines. Every state transition of a run goes through
 * here so an aborted run still shows how far it got.
 */
export interface Reporter {
  info(code: string, message: string, fields?: Fields): void;
  warn(code: string, message: string, fields?: Fields): void;
  error(code: string, message: string, fields?: Fields): void;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return value === "human" || value === "jsonl";
}

/**
 * human: bare message, info to stdout and warn/error to stderr.
 * jsonl: one `{level, code, message, ...fields}` object per line on stdout.
 */
export function createReporter(
  format: OutputFormat,
  sinks: { stdout: Sink; stderr: Sink } = { stdout: process.stdout, stderr: process.stderr },
): Reporter {
  const emit = (level: LogLevel, code: string, message: string, fields?: Fields): void => {
    if (format === "jsonl") {
      sinks.stdout.write(JSON.stringify({ level, code, message, ...fields }) + "\n");
      return;
    }
    const line = message.endsWith("\n") ? message : message + "\n";
    if (level === "info") sinks.stdout.write(line);
    else sinks.stderr.write(line);
  };

  return {
    info: (code, message, fields) => emit("info", code, message, fields),
    warn: (code, message, fields) => emit("warn", code, message, fields),
    error: (code, message, fields) => emit("error", code, message, fields),
  };
}

/** Reporter that drops everything. */
export const silentReporter: Reporter = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
