import { describe, it, expect } from 'vitest';
import { CANCELLED_EXIT_CODE, classifyStepError } from '../../src/exception/classifier.js';
import {
  ConfigurationError,
  ContextError,
  DebugBeforeStepError,
  ExecError,
  ExitError,
  SkipPreviousStepFailedError,
  SubstitutionError,
  TerminationMessageTooLongError,
  WhenEvaluationError,
  isContextCanceledError,
  isContextDeadlineError,
} from '../../src/exception/errors.js';

describe('classifyStepError', () => {
  describe('context errors', () => {
    it('classifies cancellation with the SIGKILL exit code', () => {
      const c = classifyStepError(new ContextError('Canceled'), 'stopAndFail');
      expect(c).toEqual({
        kind: 'Canceled',
        terminal: 'Errored',
        reason: 'Cancelled',
        exitCodeMarker: '9',
        processExitCode: CANCELLED_EXIT_CODE,
        failureMarker: true,
      });
    });

    it('classifies a deadline as TimeoutExceeded without an exit-code marker', () => {
      const c = classifyStepError(new ContextError('DeadlineExceeded'), 'continue');
      expect(c.terminal).toBe('Errored');
      expect(c.reason).toBe('TimeoutExceeded');
      expect(c.exitCodeMarker).toBeUndefined();
      expect(c.processExitCode).toBe(1);
    });
  });

  it('classifies a failed predecessor as Skipped', () => {
    const c = classifyStepError(new SkipPreviousStepFailedError(), 'stopAndFail');
    expect(c.terminal).toBe('Skipped');
    expect(c.reason).toBe('Skipped');
    expect(c.failureMarker).toBe(true);
  });

  it.each([
    [new DebugBeforeStepError(), 'DebugBeforeStep'],
    [new ConfigurationError('negative timeout specified'), 'Configuration'],
    [new SubstitutionError('bad reference'), 'Configuration'],
    [new WhenEvaluationError('bad expression'), 'WhenEvaluation'],
    [new TerminationMessageTooLongError(5000, 4096), 'TerminationTooLong'],
  ])('classifies %s as Errored', (error, kind) => {
    const c = classifyStepError(error, 'continue');
    expect(c.kind).toBe(kind);
    expect(c.terminal).toBe('Errored');
    expect(c.reason).toBeUndefined();
    expect(c.processExitCode).toBe(1);
  });

  describe('non-zero exit', () => {
    it('fails the step under stopAndFail and keeps the exit status', () => {
      const c = classifyStepError(new ExitError(3), 'stopAndFail');
      expect(c.terminal).toBe('Errored');
      expect(c.processExitCode).toBe(3);
      expect(c.failureMarker).toBe(true);
      expect(c.exitCodeMarker).toBeUndefined();
    });

    it('exits 1 when the status is unknown under stopAndFail', () => {
      expect(classifyStepError(new ExitError(-1, 'SIGKILL'), 'stopAndFail').processExitCode).toBe(1);
    });

    it('continues under continue and records the status', () => {
      const c = classifyStepError(new ExitError(-1), 'continue');
      expect(c).toEqual({
        kind: 'NonZeroExit',
        terminal: 'Continued',
        exitCodeMarker: '-1',
        processExitCode: 0,
        failureMarker: false,
      });
    });
  });

  it('fails a command that never started under either policy', () => {
    const error = new ExecError('missing-binary', new Error('spawn missing-binary ENOENT'));
    expect(classifyStepError(error, 'continue').terminal).toBe('Errored');
    expect(classifyStepError(error, 'stopAndFail').kind).toBe('ExecFailure');
  });
});

describe('context error helpers', () => {
  it('tells cancellation from deadline', () => {
    expect(isContextCanceledError(new ContextError('Canceled'))).toBe(true);
    expect(isContextCanceledError(new ContextError('DeadlineExceeded'))).toBe(false);
    expect(isContextDeadlineError(new ContextError('DeadlineExceeded'))).toBe(true);
    expect(isContextDeadlineError(new Error('context deadline exceeded'))).toBe(false);
  });

  it('uses the conventional messages', () => {
    expect(new ContextError('Canceled').message).toBe('context canceled');
    expect(new ContextError('DeadlineExceeded').message).toBe('context deadline exceeded');
    expect(new ExitError(2).message).toBe('exit status 2');
    expect(new ExitError(-1, 'SIGTERM').message).toBe('signal: SIGTERM');
  });
});
