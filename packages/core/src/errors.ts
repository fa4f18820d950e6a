/**
 * Error taxonomy for worklog runs.
 *
 * Every failure that ends a run maps to one of these classes. None of
 * them are retried; the CLI turns them into a message and an exit code.
 */

// ─── Error Types ───────────────────────────────────────────────────

export class WorklogError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'WorklogError';
  }
}

/** Bad period/day argument or invalid .worklog.yml */
export class ValidationError extends WorklogError {
  constructor(message: string, public readonly input?: string) {
    super(message, 'INVALID_INPUT', 2);
    this.name = 'ValidationError';
  }
}

/** The git query could not run or returned an error */
export class ExternalToolError extends WorklogError {
  constructor(
    public readonly tool: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${tool} failed: ${message}`, 'EXTERNAL_TOOL', 3, options);
    this.name = 'ExternalToolError';
  }
}

/** Template unreadable, asset directory unreadable or output unwritable */
export class IOError extends WorklogError {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(`${message}: ${filePath}`, 'IO_FAILURE', 4, options);
    this.name = 'IOError';
  }
}

/**
 * Map an error to a human-readable failure reason.
 */
export function describeError(error: unknown): string {
  if (error instanceof ValidationError) return `Invalid input: ${error.message}`;
  if (error instanceof ExternalToolError) return error.message;
  if (error instanceof IOError) return `I/O error: ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Narrow an unknown thrown value to a Node.js system error */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
