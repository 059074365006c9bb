import type { GuardExpression } from './when.js';
import type { Signer } from '../signing/signer.js';

/** Aborting from the debugger is `DebugBeforeStepError`, not a policy. */
export type OnErrorPolicy = 'stopAndFail' | 'continue';

export type ResultExtractionMethod = 'termination-message' | 'sidecar-logs';

export interface StepExecutionRequest {
  command: string[];
  waitFiles: string[];
  waitFileContent: boolean;
  postFile: string;
  timeoutMs?: number;
  onError: OnErrorPolicy;
  breakpointOnFailure: boolean;
  debugBeforeStep: boolean;
  results: string[];
  stepResults: string[];
  resultsDir: string;
  stepResultsDir?: string;
  stepMetadataDir: string;
  stepsDir: string;
  scriptsDir: string;
  terminationPath: string;
  when: GuardExpression[];
  env: Record<string, string>;
  cancelFile: string;
  taskArtifactsPath?: string;
  resultExtractionMethod: ResultExtractionMethod;
  stdoutPath?: string;
  stderrPath?: string;
  signer?: Signer;
}
