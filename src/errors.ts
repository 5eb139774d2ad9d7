/** Non-200 response from the platform control-plane API. */
export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly method: string,
    public readonly path: string,
    public readonly body: unknown,
  ) {
    super(`Platform API error ${statusCode} on ${method} ${path}`);
    this.name = "ApiError";
  }
}

/**
 * Migration tool exited nonzero, was killed by a signal, or could not be
 * spawned (exitCode and signal both null).
 */
export class ProcessError extends Error {
  constructor(
    public readonly command: string[],
    public readonly exitCode: number | null,
    public readonly stdout: string,
    public readonly stderr: string,
    public readonly signal: string | null = null,
  ) {
    const status = signal !== null ? `killed by ${signal}` : exitCode === null ? "spawn failed" : `exit ${exitCode}`;
    super(`Command failed (${status}): ${command.join(" ")}`);
    this.name = "ProcessError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Message plus the API response body or tool stderr, when there is one. */
export function describeError(e: unknown): string {
  const message = errorMessage(e);
  if (e instanceof ApiError && e.body !== null) {
    return `${message}; response: ${typeof e.body === "string" ? e.body : JSON.stringify(e.body)}`;
  }
  if (e instanceof ProcessError && e.stderr.trim() !== "") {
    return `${message}; stderr: ${e.stderr.trim()}`;
  }
  return message;
}

/** Structured details for jsonl reports. */
export function errorFields(e: unknown): Record<string, unknown> {
  if (e instanceof ApiError) return { status: e.statusCode, body: e.body };
  if (e instanceof ProcessError) {
    return { exit_code: e.exitCode, signal: e.signal, stderr: e.stderr.trim() };
  }
  return {};
}
