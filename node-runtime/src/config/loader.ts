import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { StepExecutionRequest } from '../types/index.js';
import { StepConfigSchema, type StepConfig } from '../schemas/index.js';
import { ConfigurationError, errorMessage } from '../exception/errors.js';
import { KeySigner } from '../signing/signer.js';
import { DEFAULT_PATHS, DEFAULT_WAIT_POLL_INTERVAL_MS } from './defaults.js';

export interface LoadedStepConfig {
  request: StepExecutionRequest;
  waitPollIntervalMs: number;
}

function definedEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export function parseStepConfig(raw: string, source: string): StepConfig {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`invalid JSON in step config ${source}: ${errorMessage(error)}`);
  }
  const parsed = StepConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(`invalid step config ${source}: ${parsed.error.message}`);
  }
  return parsed.data;
}

/** Fill unset paths from the well-known mounts and attach the process environment. */
export function toStepExecutionRequest(config: StepConfig, env: NodeJS.ProcessEnv): StepExecutionRequest {
  const resultsDir = config.resultsDir ?? DEFAULT_PATHS.resultsDir;
  // An explicit results directory also holds step results, as the pod builder lays it out.
  const stepResultsDir =
    config.stepResultsDir ?? (config.resultsDir !== undefined ? config.resultsDir : join(config.stepMetadataDir, 'results'));

  return {
    command: config.command,
    waitFiles: config.waitFiles,
    waitFileContent: config.waitFileContent,
    postFile: config.postFile,
    ...(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {}),
    onError: config.onError,
    breakpointOnFailure: config.breakpointOnFailure,
    debugBeforeStep: config.debugBeforeStep,
    results: config.results,
    stepResults: config.stepResults,
    resultsDir,
    stepResultsDir,
    stepMetadataDir: config.stepMetadataDir,
    stepsDir: config.stepsDir ?? DEFAULT_PATHS.stepsDir,
    scriptsDir: config.scriptsDir ?? DEFAULT_PATHS.scriptsDir,
    terminationPath: config.terminationPath ?? DEFAULT_PATHS.terminationPath,
    when: config.when,
    env: definedEnv(env),
    cancelFile: config.cancelFile ?? DEFAULT_PATHS.cancelFile,
    taskArtifactsPath: config.taskArtifactsPath ?? DEFAULT_PATHS.taskArtifactsPath,
    resultExtractionMethod: config.resultExtractionMethod,
    ...(config.stdoutPath ? { stdoutPath: config.stdoutPath } : {}),
    ...(config.stderrPath ? { stderrPath: config.stderrPath } : {}),
  };
}

export async function loadStepConfig(path: string, env: NodeJS.ProcessEnv = process.env): Promise<LoadedStepConfig> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`failed to read step config ${path}: ${errorMessage(error)}`);
  }
  const config = parseStepConfig(raw, path);
  const request = toStepExecutionRequest(config, env);
  if (config.signer) {
    request.signer = await KeySigner.fromFile(config.signer.privateKeyPath);
  }
  return {
    request,
    waitPollIntervalMs: config.waitPollIntervalMs ?? DEFAULT_WAIT_POLL_INTERVAL_MS,
  };
}
