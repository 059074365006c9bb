import type { OnErrorPolicy, TerminalState, TerminationReason } from '../types/index.js';
import {
  ConfigurationError,
  ContextError,
  DebugBeforeStepError,
  ExitError,
  SkipPreviousStepFailedError,
  TerminationMessageTooLongError,
  WhenEvaluationError,
} from './errors.js';

export type StepErrorKind =
  | 'Canceled'
  | 'DeadlineExceeded'
  | 'SkipPreviousFailure'
  | 'DebugBeforeStep'
  | 'Configuration'
  | 'WhenEvaluation'
  | 'TerminationTooLong'
  | 'NonZeroExit'
  | 'ExecFailure';

export interface StepErrorClassification {
  kind: StepErrorKind;
  terminal: TerminalState;
  reason?: TerminationReason;
  /** Written to the exit-code marker, when the path writes one. */
  exitCodeMarker?: string;
  /** Status the coordinator process exits with. */
  processExitCode: number;
  /** Whether the post marker carries the `.err` suffix. */
  failureMarker: boolean;
}

// SIGKILL, so a cancelled step reads like `kill -9` to whoever inspects the container.
export const CANCELLED_EXIT_CODE = 9;

export function classifyStepError(error: unknown, onError: OnErrorPolicy): StepErrorClassification {
  if (error instanceof ContextError) {
    if (error.kind === 'Canceled') {
      return {
        kind: 'Canceled',
        terminal: 'Errored',
        reason: 'Cancelled',
        exitCodeMarker: String(CANCELLED_EXIT_CODE),
        processExitCode: CANCELLED_EXIT_CODE,
        failureMarker: true,
      };
    }
    return {
      kind: 'DeadlineExceeded',
      terminal: 'Errored',
      reason: 'TimeoutExceeded',
      processExitCode: 1,
      failureMarker: true,
    };
  }

  if (error instanceof SkipPreviousStepFailedError) {
    return {
      kind: 'SkipPreviousFailure',
      terminal: 'Skipped',
      reason: 'Skipped',
      processExitCode: 1,
      failureMarker: true,
    };
  }

  if (error instanceof DebugBeforeStepError) {
    return { kind: 'DebugBeforeStep', terminal: 'Errored', processExitCode: 1, failureMarker: true };
  }

  if (error instanceof ConfigurationError) {
    return { kind: 'Configuration', terminal: 'Errored', processExitCode: 1, failureMarker: true };
  }

  if (error instanceof WhenEvaluationError) {
    return { kind: 'WhenEvaluation', terminal: 'Errored', processExitCode: 1, failureMarker: true };
  }

  if (error instanceof TerminationMessageTooLongError) {
    return { kind: 'TerminationTooLong', terminal: 'Errored', processExitCode: 1, failureMarker: true };
  }

  if (error instanceof ExitError) {
    if (onError === 'continue') {
      return {
        kind: 'NonZeroExit',
        terminal: 'Continued',
        exitCodeMarker: String(error.exitCode),
        processExitCode: 0,
        failureMarker: false,
      };
    }
    return {
      kind: 'NonZeroExit',
      terminal: 'Errored',
      processExitCode: error.exitCode > 0 ? error.exitCode : 1,
      failureMarker: true,
    };
  }

  // Anything else, a command that never started included, fails the step
  // regardless of the on-error policy: there is no exit status to record.
  return { kind: 'ExecFailure', terminal: 'Errored', processExitCode: 1, failureMarker: true };
}
