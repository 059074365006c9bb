import { z } from 'zod';
import { GuardExpressionSchema } from './when.schema.js';

export const SignerConfigSchema = z.object({
  privateKeyPath: z.string().min(1),
});

/**
 * Shape of the JSON file the pod builder renders for every step container.
 * Optional paths fall back to the well-known mounts in config/defaults.ts.
 */
export const StepConfigSchema = z.object({
  command: z.array(z.string()).default([]),
  waitFiles: z.array(z.string()).default([]),
  waitFileContent: z.boolean().default(false),
  postFile: z.string().default(''),
  timeoutMs: z.number().int().optional(),
  onError: z.enum(['stopAndFail', 'continue']).default('stopAndFail'),
  breakpointOnFailure: z.boolean().default(false),
  debugBeforeStep: z.boolean().default(false),
  results: z.array(z.string()).default([]),
  stepResults: z.array(z.string()).default([]),
  resultsDir: z.string().optional(),
  stepResultsDir: z.string().optional(),
  stepMetadataDir: z.string().default(''),
  stepsDir: z.string().optional(),
  scriptsDir: z.string().optional(),
  terminationPath: z.string().optional(),
  when: z.array(GuardExpressionSchema).default([]),
  cancelFile: z.string().optional(),
  taskArtifactsPath: z.string().optional(),
  resultExtractionMethod: z.enum(['termination-message', 'sidecar-logs']).default('termination-message'),
  stdoutPath: z.string().optional(),
  stderrPath: z.string().optional(),
  waitPollIntervalMs: z.number().int().positive().optional(),
  signer: SignerConfigSchema.optional(),
});

export type StepConfig = z.infer<typeof StepConfigSchema>;
