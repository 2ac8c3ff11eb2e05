/**
 * Harness error types
 *
 * EnvironmentFatalError halts a batch. Everything else is recovered into a
 * scored result by the attempt runner.
 */

export type EnvironmentFatalCode =
  | 'FORK_LAUNCH_FAILED'
  | 'FORK_EXITED'
  | 'FORK_START_TIMEOUT'
  | 'SNAPSHOT_FAILED'
  | 'REVERT_FAILED'
  | 'FUNDING_FAILED'
  | 'FIXTURE_DEPLOY_FAILED'
  | 'PREPARE_FAILED';

export class EnvironmentFatalError extends Error {
  readonly code: EnvironmentFatalCode;
  readonly restarted: boolean;

  constructor(
    code: EnvironmentFatalCode,
    message: string,
    options: { cause?: unknown; restarted?: boolean } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'EnvironmentFatalError';
    this.code = code;
    this.restarted = options.restarted ?? false;
  }
}

export class MalformedIntentError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Malformed transaction intent (${field}): ${message}`);
    this.name = 'MalformedIntentError';
    this.field = field;
  }
}

export class CatalogueError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = 'CatalogueError';
    this.source = source;
  }
}

export function isEnvironmentFatal(error: unknown): error is EnvironmentFatalError {
  return error instanceof EnvironmentFatalError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
