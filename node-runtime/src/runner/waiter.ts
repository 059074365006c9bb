import { stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { setTimeout as sleep } from 'node:timers/promises';
import {
  ContextError,
  SkipPreviousStepFailedError,
  contextErrorFromSignal,
  errorMessage,
  isNotFoundError,
} from '../exception/errors.js';
import { DEFAULT_WAIT_POLL_INTERVAL_MS, ERROR_SUFFIX } from '../config/defaults.js';

/** Blocks until a marker file written by another container shows up. */
export interface Waiter {
  wait(file: string, expectContent: boolean, breakpointOnFailure: boolean, signal?: AbortSignal): Promise<void>;
}

export interface FileWaiterOptions {
  pollIntervalMs?: number;
  /** Well-known cancellation marker; a non-empty file cancels every wait. */
  cancelFile?: string;
}

async function statOrNull(file: string): Promise<Stats | null> {
  try {
    return await stat(file);
  } catch (error) {
    if (isNotFoundError(error)) return null;
    throw new Error(`waiting for "${file}": ${errorMessage(error)}`, { cause: error });
  }
}

export class FileWaiter implements Waiter {
  private pollIntervalMs: number;
  private cancelFile: string;

  constructor(options: FileWaiterOptions = {}) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_WAIT_POLL_INTERVAL_MS;
    this.cancelFile = options.cancelFile ?? '';
  }

  async wait(file: string, expectContent: boolean, breakpointOnFailure: boolean, signal?: AbortSignal): Promise<void> {
    if (file === '') return;

    for (;;) {
      if (signal?.aborted) throw contextErrorFromSignal(signal);

      const info = await statOrNull(file);
      if (info && (!expectContent || info.size > 0)) return;

      if (await this.isCancelled(file)) throw new ContextError('Canceled');

      if (await statOrNull(`${file}${ERROR_SUFFIX}`)) {
        if (breakpointOnFailure) return;
        throw new SkipPreviousStepFailedError();
      }

      await this.pause(signal);
    }
  }

  private async isCancelled(file: string): Promise<boolean> {
    if (this.cancelFile === '' || this.cancelFile === file) return false;
    const info = await statOrNull(this.cancelFile);
    return info !== null && info.size > 0;
  }

  private async pause(signal?: AbortSignal): Promise<void> {
    try {
      await sleep(this.pollIntervalMs, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) throw contextErrorFromSignal(signal);
      throw error;
    }
  }
}
