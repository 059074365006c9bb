export type GuardOperator = 'in' | 'notin';

export interface OperatorGuard {
  kind: 'operator';
  input: string;
  operator: GuardOperator;
  values: string[];
}

export interface CelGuard {
  kind: 'cel';
  expression: string;
}

export type GuardExpression = OperatorGuard | CelGuard;
