import { z } from 'zod';
import { ResultType } from '../types/run-result.js';

export const ResultTypeSchema = z.union([
  z.literal(ResultType.TaskRunResult),
  z.literal(ResultType.Internal),
  z.literal(ResultType.StepResult),
  z.literal(ResultType.StepArtifacts),
  z.literal(ResultType.TaskRunArtifacts),
]);

export const RunResultSchema = z.object({
  key: z.string(),
  value: z.string(),
  resultType: ResultTypeSchema,
});

export const TerminationRecordSchema = z.array(RunResultSchema);
