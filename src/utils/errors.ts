/** Bad invocation or configuration; the CLI exits with code 2. */
export class UsageError extends Error {
  exitCode = 2;
}

/**
 * The stored model (its folder, report text or metadata) could not be read.
 * Aborts processing of that model before any extraction runs.
 */
export class ModelRecordError extends Error {
  exitCode = 1;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  return typeof error === "string" && error.length > 0 ? error : "Unexpected error";
}
