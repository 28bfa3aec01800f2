/**
 * Error taxonomy for the dev server.
 * statusCode is what the HTTP layer replies with; everything unknown is a 500.
 */

export class DevServerError extends Error {
  readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown; statusCode?: number }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.statusCode = options?.statusCode ?? 500;
  }
}

/** Local execution is not implemented for a task kind. Runs are skipped, not failed. */
export class UnsupportedKindError extends DevServerError {
  readonly kind: string;

  constructor(kind: string, message?: string) {
    super(message ?? `Local execution is not supported for this task (kind=${kind})`);
    this.kind = kind;
  }
}

/** A config var, secret or template could not be resolved for a run's environment. */
export class EnvResolutionError extends DevServerError {}

/** A line of process output looked like an output command but could not be parsed or applied. */
export class OutputProtocolError extends DevServerError {}

/** The task process failed to start, its pipes failed, or it exited non-zero. */
export class ProcessError extends DevServerError {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;

  constructor(
    message: string,
    options?: { cause?: unknown; exitCode?: number | null; signal?: NodeJS.Signals | null }
  ) {
    super(message, { cause: options?.cause });
    this.exitCode = options?.exitCode ?? null;
    this.signal = options?.signal ?? null;
  }
}

export class RunNotFoundError extends DevServerError {
  constructor(runID: string) {
    super(`run with id "${runID}" not found`, { statusCode: 404 });
  }
}

export class TaskNotFoundError extends DevServerError {
  constructor(slug: string) {
    super(`task with slug "${slug}" is not registered locally`, { statusCode: 404 });
  }
}

export class ViewNotFoundError extends DevServerError {
  constructor(slug: string) {
    super(`view with slug "${slug}" is not registered locally`, { statusCode: 404 });
  }
}

export class NotFoundError extends DevServerError {
  constructor(message: string) {
    super(message, { statusCode: 404 });
  }
}

export class BadRequestError extends DevServerError {
  constructor(message: string) {
    super(message, { statusCode: 400 });
  }
}

/** Non-2xx answer from the remote platform API. */
export class RemoteApiError extends DevServerError {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
