import { spawn } from 'node:child_process';
import { createWriteStream, type WriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Readable, Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import { ExecError, ExitError, contextErrorFromSignal } from '../exception/errors.js';

/**
 * Cancellation handle for one run. `deadline` (epoch ms) is informational;
 * the owner aborts `signal` with a DeadlineExceeded ContextError when it passes.
 */
export interface RunToken {
  signal: AbortSignal;
  deadline?: number;
}

export interface Runner {
  /** `env` replaces the configured environment for this run. */
  run(token: RunToken, args: string[], env?: Record<string, string>): Promise<void>;
}

export interface ProcessRunnerOptions {
  env?: Record<string, string>;
  stdoutPath?: string;
  stderrPath?: string;
  /** Where the child's output is mirrored; the coordinator's own streams by default. */
  stdout?: Writable;
  stderr?: Writable;
}

async function openTee(path: string | undefined): Promise<WriteStream | null> {
  if (!path) return null;
  await mkdir(dirname(path), { recursive: true });
  return createWriteStream(path, { flags: 'a' });
}

function pipeTo(source: Readable | null, mirror: Writable, tee: WriteStream | null): void {
  source?.on('data', (chunk: Buffer) => {
    mirror.write(chunk);
    if (tee && !tee.writableEnded) tee.write(chunk);
  });
}

async function closeTee(tee: WriteStream | null): Promise<void> {
  if (!tee) return;
  tee.end();
  await finished(tee);
}

export class ProcessRunner implements Runner {
  constructor(private options: ProcessRunnerOptions = {}) {}

  async run(token: RunToken, args: string[], env?: Record<string, string>): Promise<void> {
    if (args.length === 0 || args[0] === '') return;
    if (token.signal.aborted) throw contextErrorFromSignal(token.signal);

    const [file, ...rest] = args;
    const stdoutTee = await openTee(this.options.stdoutPath);
    const stderrTee = await openTee(this.options.stderrPath);

    try {
      await this.spawnAndWait(file, rest, env ?? this.options.env ?? process.env, token.signal, stdoutTee, stderrTee);
    } finally {
      await Promise.all([closeTee(stdoutTee), closeTee(stderrTee)]);
    }
  }

  private spawnAndWait(
    file: string,
    args: string[],
    env: NodeJS.ProcessEnv,
    signal: AbortSignal,
    stdoutTee: WriteStream | null,
    stderrTee: WriteStream | null,
  ): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const child = spawn(file, args, {
        env,
        stdio: ['inherit', 'pipe', 'pipe'],
      });

      let settled = false;
      const settle = (error?: Error) => {
        if (settled) return;
        settled = true;
        signal.removeEventListener('abort', onAbort);
        if (error) reject(error);
        else resolve();
      };

      const onAbort = () => {
        child.kill('SIGKILL');
        settle(contextErrorFromSignal(signal));
      };
      signal.addEventListener('abort', onAbort, { once: true });

      pipeTo(child.stdout, this.options.stdout ?? process.stdout, stdoutTee);
      pipeTo(child.stderr, this.options.stderr ?? process.stderr, stderrTee);

      child.on('error', (error) => settle(new ExecError(file, error)));
      child.on('close', (code, exitSignal) => {
        if (code === 0) settle();
        else if (exitSignal) settle(new ExitError(-1, exitSignal));
        else settle(new ExitError(code ?? -1));
      });
    });
  }
}
