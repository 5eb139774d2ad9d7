import { ApiError, ConfigError, ProcessError } from "../errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  API_FAILED: 1,
  PROCESS_FAILED: 2,
  INVALID_ARGS: 3,
  UNEXPECTED: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(e: unknown): ExitCode {
  if (e instanceof ApiError) return EXIT.API_FAILED;
  if (e instanceof ProcessError) return EXIT.PROCESS_FAILED;
  if (e instanceof ConfigError) return EXIT.INVALID_ARGS;
  return EXIT.UNEXPECTED;
}
