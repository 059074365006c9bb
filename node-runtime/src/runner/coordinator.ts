import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import {
  ResultType,
  type RunResult,
  type StepExecutionRequest,
  type StepOutcome,
  type TerminalState,
  type TerminationReason,
} from '../types/index.js';
import type { Waiter } from './waiter.js';
import type { Runner } from './command-runner.js';
import type { PostWriter } from './post-writer.js';
import { BreakpointHandler } from './breakpoint.js';
import { RunLogger } from '../logging/run-logger.js';
import { classifyStepError } from '../exception/classifier.js';
import {
  ConfigurationError,
  ContextError,
  contextErrorFromSignal,
  errorMessage,
} from '../exception/errors.js';
import {
  applyStepArtifactSubstitutions,
  applyStepResultSubstitutions,
  type SubstitutionTarget,
} from '../substitution/template.js';
import { allowsExecution } from '../engines/when-evaluator.js';
import { readArtifacts, readResults } from '../results/collector.js';
import { writeTerminationRecord } from '../results/termination.js';
import { ARTIFACTS_DIR, ARTIFACTS_MANIFEST, ERROR_SUFFIX, EXIT_CODE_FILE } from '../config/defaults.js';

interface Decision {
  terminal: TerminalState;
  reason?: TerminationReason;
  exitCode: number;
  /** Content of `<stepMetadataDir>/exitCode`, when this path writes one. */
  exitCodeMarker?: string;
  failureMarker: boolean;
  error?: Error;
}

interface Collected {
  entries: RunResult[];
  error?: Error;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}

/** Settles with `promise`, or rejects with the signal's ContextError if it aborts first. */
async function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) throw contextErrorFromSignal(signal);
  let onAbort = (): void => {};
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(contextErrorFromSignal(signal));
    signal.addEventListener('abort', onAbort, { once: true });
  });
  try {
    return await Promise.race([promise, aborted]);
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

/**
 * Drives one step through wait, guard, substitution, run and finalize.
 * `run()` settles once the termination record and markers are written.
 */
export class Coordinator {
  private breakpoints: BreakpointHandler;
  private skippedByWhen = false;
  private breakpointExitCode?: number;

  constructor(
    private request: StepExecutionRequest,
    private waiter: Waiter,
    private runner: Runner,
    private postWriter: PostWriter,
    private logger: RunLogger = RunLogger.silent(),
  ) {
    this.breakpoints = new BreakpointHandler(waiter, logger);
  }

  async run(): Promise<StepOutcome> {
    const start = Date.now();
    const startedAt = new Date(start).toISOString();

    const cancellation = new AbortController();
    const watchStop = new AbortController();
    let watch: Promise<void> = Promise.resolve();

    let failure: unknown;
    try {
      if (this.request.timeoutMs !== undefined && this.request.timeoutMs < 0) {
        throw new ConfigurationError('negative timeout specified');
      }
      if (this.request.stepMetadataDir !== '') {
        await mkdir(join(this.request.stepMetadataDir, ARTIFACTS_DIR), { recursive: true });
      }
      watch = this.watchCancellation(cancellation, watchStop.signal);

      await raceAbort(this.waitForPredecessors(cancellation.signal), cancellation.signal);
      const target = await this.substitute();
      if (allowsExecution(target.when)) {
        await this.runCommand(target, cancellation.signal);
      } else {
        this.skippedByWhen = true;
        await this.logger.info('when expressions evaluated to false, skipping step');
      }
    } catch (error) {
      failure = await this.afterFailure(error, cancellation.signal);
    } finally {
      watchStop.abort();
      await watch;
    }

    const collected = await this.collect();
    if (collected.error) {
      await this.logger.error('result collection failed', { error: collected.error.message });
      failure ??= collected.error;
    }

    const signatures = await this.sign(collected.entries);
    if (signatures.error) failure ??= signatures.error;

    let decision = this.decide(failure);
    const record = [
      ...this.header(startedAt, decision),
      ...collected.entries.filter((e) => !isArtifactEntry(e)),
      ...signatures.entries,
      ...collected.entries.filter(isArtifactEntry),
    ];

    try {
      await writeTerminationRecord(this.request.terminationPath, record);
    } catch (error) {
      await this.logger.error('failed to write termination record', { error: errorMessage(error) });
      if (failure === undefined) {
        failure = error;
        decision = this.decide(failure);
      }
    }

    await this.writeMarkers(decision);

    return {
      terminal: decision.terminal,
      ...(decision.reason ? { reason: decision.reason } : {}),
      exitCode: decision.exitCode,
      ...(decision.error ? { error: decision.error } : {}),
      durationMs: Date.now() - start,
    };
  }

  private async watchCancellation(cancellation: AbortController, stop: AbortSignal): Promise<void> {
    const { cancelFile } = this.request;
    if (cancelFile === '') return;
    try {
      await this.waiter.wait(cancelFile, true, false, stop);
    } catch (error) {
      if (!stop.aborted) {
        await this.logger.warn('cancellation watch failed', { error: errorMessage(error) });
      }
      return;
    }
    if (stop.aborted) return;
    cancellation.abort(new ContextError('Canceled'));
    await this.logger.warn('step cancelled', { cancelFile });
  }

  private async waitForPredecessors(signal: AbortSignal): Promise<void> {
    const { waitFiles, waitFileContent, breakpointOnFailure } = this.request;
    for (const file of waitFiles) {
      await this.waiter.wait(file, waitFileContent, breakpointOnFailure, signal);
    }
    if (this.request.debugBeforeStep) {
      await this.breakpoints.waitBeforeStep(this.request.stepMetadataDir, signal);
    }
  }

  private async substitute(): Promise<SubstitutionTarget> {
    const { command, env, when, stepsDir, scriptsDir } = this.request;
    const options = { stepsDir, scriptsDir };
    const withResults = await applyStepResultSubstitutions({ command, env, when }, options);
    return applyStepArtifactSubstitutions(withResults, options);
  }

  private async runCommand(target: SubstitutionTarget, cancelled: AbortSignal): Promise<void> {
    if (cancelled.aborted) throw contextErrorFromSignal(cancelled);
    const { timeoutMs } = this.request;
    const controller = new AbortController();
    const onCancel = () => controller.abort(contextErrorFromSignal(cancelled));
    cancelled.addEventListener('abort', onCancel, { once: true });

    let timer: NodeJS.Timeout | undefined;
    let deadline: number | undefined;
    if (timeoutMs !== undefined && timeoutMs > 0) {
      deadline = Date.now() + timeoutMs;
      timer = setTimeout(() => controller.abort(new ContextError('DeadlineExceeded')), timeoutMs);
    }

    try {
      const running = this.runner.run({ signal: controller.signal, deadline }, target.command, target.env);
      await raceAbort(running, controller.signal);
    } finally {
      clearTimeout(timer);
      cancelled.removeEventListener('abort', onCancel);
    }
  }

  /**
   * Log the failure and, when a debugger may attach, hold the step. A zero
   * breakpoint exit code clears the failure.
   */
  private async afterFailure(error: unknown, cancelled: AbortSignal): Promise<unknown> {
    if (error instanceof ContextError) {
      await this.logger.warn('step interrupted', { error: error.message });
    } else {
      await this.logger.error('step failed', { error: errorMessage(error) });
    }

    const { breakpointOnFailure, onError, postFile } = this.request;
    const classification = classifyStepError(error, onError);
    if (!breakpointOnFailure || classification.terminal === 'Continued' || classification.reason === 'Cancelled') {
      return error;
    }

    try {
      const exitCode = await this.breakpoints.waitForExit(postFile, cancelled);
      if (exitCode === 0) return undefined;
      this.breakpointExitCode = exitCode;
      return error;
    } catch (breakpointError) {
      return breakpointError;
    }
  }

  private async collect(): Promise<Collected> {
    const req = this.request;
    if (req.resultExtractionMethod !== 'termination-message') return { entries: [] };

    const entries: RunResult[] = [];
    let firstError: Error | undefined;

    const task = await readResults(req.resultsDir, req.results, ResultType.TaskRunResult);
    entries.push(...task.results);
    firstError ??= task.error;

    const stepResultsDir = req.stepResultsDir ?? join(req.stepMetadataDir, 'results');
    const step = await readResults(stepResultsDir, req.stepResults, ResultType.StepResult);
    entries.push(...step.results);
    firstError ??= step.error;

    const manifests: Array<[string | undefined, ResultType]> = [
      [this.stepArtifactsPath(), ResultType.StepArtifacts],
      [req.taskArtifactsPath, ResultType.TaskRunArtifacts],
    ];
    for (const [path, resultType] of manifests) {
      if (!path) continue;
      try {
        const entry = await readArtifacts(path, resultType);
        if (entry) entries.push(entry);
      } catch (error) {
        firstError ??= toError(error);
      }
    }

    return firstError ? { entries, error: firstError } : { entries };
  }

  private stepArtifactsPath(): string | undefined {
    const { stepMetadataDir } = this.request;
    return stepMetadataDir === '' ? undefined : join(stepMetadataDir, ARTIFACTS_DIR, ARTIFACTS_MANIFEST);
  }

  private async sign(entries: RunResult[]): Promise<Collected> {
    const { signer } = this.request;
    if (!signer || !entries.some((e) => e.resultType === ResultType.TaskRunResult)) return { entries: [] };
    try {
      return { entries: await signer.sign(entries) };
    } catch (error) {
      await this.logger.error('signing results failed', { error: errorMessage(error) });
      return { entries: [], error: toError(error) };
    }
  }

  private decide(failure: unknown): Decision {
    if (failure === undefined) {
      return this.skippedByWhen
        ? { terminal: 'Skipped', reason: 'Skipped', exitCode: 0, exitCodeMarker: '0', failureMarker: false }
        : { terminal: 'Success', exitCode: 0, exitCodeMarker: '0', failureMarker: false };
    }

    const c = classifyStepError(failure, this.request.onError);
    return {
      terminal: c.terminal,
      ...(c.reason ? { reason: c.reason } : {}),
      exitCode: this.breakpointExitCode ?? c.processExitCode,
      ...(c.exitCodeMarker !== undefined ? { exitCodeMarker: c.exitCodeMarker } : {}),
      failureMarker: c.failureMarker,
      ...(c.terminal === 'Continued' ? {} : { error: toError(failure) }),
    };
  }

  private header(startedAt: string, decision: Decision): RunResult[] {
    const entries: RunResult[] = [{ key: 'StartedAt', value: startedAt, resultType: ResultType.Internal }];
    if (decision.terminal === 'Continued' && decision.exitCodeMarker !== undefined) {
      entries.push({ key: 'ExitCode', value: decision.exitCodeMarker, resultType: ResultType.Internal });
    }
    if (decision.reason) {
      entries.push({ key: 'Reason', value: decision.reason, resultType: ResultType.Internal });
    }
    return entries;
  }

  private async writeMarkers(decision: Decision): Promise<void> {
    const { postFile, stepMetadataDir } = this.request;
    if (postFile !== '') {
      await this.postWriter.write(decision.failureMarker ? `${postFile}${ERROR_SUFFIX}` : postFile, '');
    }
    if (decision.exitCodeMarker !== undefined && stepMetadataDir !== '') {
      await this.postWriter.write(join(stepMetadataDir, EXIT_CODE_FILE), decision.exitCodeMarker);
    }
  }
}

function isArtifactEntry(entry: RunResult): boolean {
  return entry.resultType === ResultType.StepArtifacts || entry.resultType === ResultType.TaskRunArtifacts;
}
