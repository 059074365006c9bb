/**
 * Wire values of the `resultType` field in a termination record. Consumers
 * outside the pod decode these numbers, so they never change.
 */
export const ResultType = {
  TaskRunResult: 1,
  Internal: 3,
  StepResult: 4,
  StepArtifacts: 5,
  TaskRunArtifacts: 6,
} as const;

export type ResultType = (typeof ResultType)[keyof typeof ResultType];

export interface RunResult {
  key: string;
  value: string;
  resultType: ResultType;
}

export type ResultValue =
  | { type: 'string'; stringVal: string }
  | { type: 'array'; arrayVal: string[] }
  | { type: 'object'; objectVal: Record<string, string> };
