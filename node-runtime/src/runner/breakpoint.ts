import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { Waiter } from './waiter.js';
import type { RunLogger } from '../logging/run-logger.js';
import { ContextError, DebugBeforeStepError, errorMessage, isNotFoundError } from '../exception/errors.js';
import { BREAKPOINT_EXIT_SUFFIX, DEBUG_BEFORE_STEP_FILE, ERROR_SUFFIX } from '../config/defaults.js';

/**
 * Exit code a debugging user left in `<postFile>.breakpointexit.err`.
 * No file means the user resumed cleanly; anything unreadable counts as failure.
 */
export async function readBreakpointExitCode(path: string): Promise<number> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFoundError(error)) return 0;
    return 1;
  }
  const trimmed = raw.trim();
  return /^-?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : 1;
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/** Pauses a step for an attached debugger, before it runs or after it fails. */
export class BreakpointHandler {
  constructor(
    private waiter: Waiter,
    private logger: RunLogger,
  ) {}

  debugBeforeStepFile(stepMetadataDir: string): string {
    return join(stepMetadataDir, DEBUG_BEFORE_STEP_FILE);
  }

  /**
   * Hold until the debugger releases the step. Cancellation passes through;
   * any other wait failure, or a release marked as failed, aborts the step.
   */
  async waitBeforeStep(stepMetadataDir: string, signal?: AbortSignal): Promise<void> {
    const file = this.debugBeforeStepFile(stepMetadataDir);
    await this.logger.info('waiting for debugger before step', { file });
    try {
      await this.waiter.wait(file, false, true, signal);
    } catch (error) {
      if (error instanceof ContextError) throw error;
      await this.logger.warn('debug before step wait failed', { file, error: errorMessage(error) });
      throw new DebugBeforeStepError();
    }
    if (await exists(`${file}${ERROR_SUFFIX}`)) throw new DebugBeforeStepError();
  }

  /** Hold a failed step until the debugger exits, then return the exit code it chose. */
  async waitForExit(postFile: string, signal?: AbortSignal): Promise<number> {
    const file = `${postFile}${BREAKPOINT_EXIT_SUFFIX}`;
    await this.logger.info('step failed, waiting for breakpoint exit', { file });
    await this.waiter.wait(file, false, true, signal);
    const exitCode = await readBreakpointExitCode(`${file}${ERROR_SUFFIX}`);
    await this.logger.info('breakpoint released', { exitCode });
    return exitCode;
  }
}
