/**
 * Errors raised while coordinating a step. Each one maps to a terminal state
 * in `classifyStepError`; callers branch on the class, never on the message.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class SubstitutionError extends ConfigurationError {
  constructor(
    message: string,
    public reference?: string,
  ) {
    super(message);
    this.name = 'SubstitutionError';
  }
}

export type ContextErrorKind = 'Canceled' | 'DeadlineExceeded';

const CONTEXT_MESSAGES: Record<ContextErrorKind, string> = {
  Canceled: 'context canceled',
  DeadlineExceeded: 'context deadline exceeded',
};

export class ContextError extends Error {
  constructor(public kind: ContextErrorKind) {
    super(CONTEXT_MESSAGES[kind]);
    this.name = 'ContextError';
  }
}

export function isContextCanceledError(error: unknown): boolean {
  return error instanceof ContextError && error.kind === 'Canceled';
}

export function isContextDeadlineError(error: unknown): boolean {
  return error instanceof ContextError && error.kind === 'DeadlineExceeded';
}

export class SkipPreviousStepFailedError extends Error {
  constructor(message = 'error file present, bail and skip the step') {
    super(message);
    this.name = 'SkipPreviousStepFailedError';
  }
}

export class DebugBeforeStepError extends Error {
  constructor() {
    super('debug before step failed');
    this.name = 'DebugBeforeStepError';
  }
}

/** The command ran and exited non-zero. `exitCode` is -1 when no status was reported. */
export class ExitError extends Error {
  constructor(
    public exitCode: number,
    public signal?: string,
  ) {
    super(signal ? `signal: ${signal}` : `exit status ${exitCode}`);
    this.name = 'ExitError';
  }
}

/** The command could not be started at all. */
export class ExecError extends Error {
  constructor(
    public file: string,
    cause: unknown,
  ) {
    super(`exec: "${file}": ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'ExecError';
  }
}

export class WhenEvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WhenEvaluationError';
  }
}

export class ArtifactError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ArtifactError';
  }
}

export class ResultCollectionError extends Error {
  constructor(
    message: string,
    public path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ResultCollectionError';
  }
}

export class TerminationMessageTooLongError extends Error {
  constructor(
    public size: number,
    public limit: number,
  ) {
    super(`termination message is above max allowed size ${limit}, caused by large task result (${size} bytes)`);
    this.name = 'TerminationMessageTooLongError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** The ContextError an aborted signal stands for. Foreign abort reasons read as cancellation. */
export function contextErrorFromSignal(signal: AbortSignal): ContextError {
  return signal.reason instanceof ContextError ? signal.reason : new ContextError('Canceled');
}
