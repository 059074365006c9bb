export type TerminalState = 'Success' | 'Skipped' | 'Continued' | 'Errored';

export type TerminationReason = 'Skipped' | 'Cancelled' | 'TimeoutExceeded';

export interface StepOutcome {
  terminal: TerminalState;
  reason?: TerminationReason;
  exitCode: number;
  error?: Error;
  durationMs: number;
}
