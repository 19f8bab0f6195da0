/**
 * Application errors
 *
 * Every error carries the HTTP status the API answers with; the message
 * is returned to the client verbatim as `detail`.
 */

export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = 'AppError';
    this.status = status;
  }
}

/** Rejected input: empty task, bad indices, missing analysis. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

/** LLM or search provider unreachable, rate-limited or misconfigured. */
export class UpstreamError extends AppError {
  constructor(message: string) {
    super(message, 502);
    this.name = 'UpstreamError';
  }
}

/** The model answered, but not with a usable task breakdown. */
export class AnalysisError extends AppError {
  constructor(message: string) {
    super(message, 502);
    this.name = 'AnalysisError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export const NO_ANALYSIS_MESSAGE = 'No task has been analyzed yet. Please analyze a task first.';
