#!/usr/bin/env node
/**
 * CLI: coordinate one step container.
 *
 * Usage: run-step <step-config.json>
 *
 * Loads the JSON config the pod builder rendered for this container, waits
 * for predecessor steps, runs the command and reports through marker files
 * and the termination record. Exits with the step's exit code.
 */

import { loadStepConfig } from '../config/loader.js';
import { Coordinator } from '../runner/coordinator.js';
import { FileWaiter } from '../runner/waiter.js';
import { ProcessRunner } from '../runner/command-runner.js';
import { FilePostWriter } from '../runner/post-writer.js';
import { RunLogger } from '../logging/run-logger.js';
import { errorMessage } from '../exception/errors.js';

async function main(): Promise<number> {
  const configPath = process.argv[2];
  if (!configPath) {
    process.stderr.write('usage: run-step <step-config.json>\n');
    return 2;
  }

  const { request, waitPollIntervalMs } = await loadStepConfig(configPath);
  const logger = new RunLogger(request.stepMetadataDir || null);

  const coordinator = new Coordinator(
    request,
    new FileWaiter({ pollIntervalMs: waitPollIntervalMs, cancelFile: request.cancelFile }),
    new ProcessRunner({ env: request.env, stdoutPath: request.stdoutPath, stderrPath: request.stderrPath }),
    new FilePostWriter(),
    logger,
  );

  const outcome = await coordinator.run();
  await logger.info('step finished', {
    terminal: outcome.terminal,
    exitCode: outcome.exitCode,
    durationMs: outcome.durationMs,
    ...(outcome.reason ? { reason: outcome.reason } : {}),
    ...(outcome.error ? { error: outcome.error.message } : {}),
  });
  return outcome.exitCode;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`run-step: ${errorMessage(err)}\n`);
    process.exitCode = 1;
  },
);
