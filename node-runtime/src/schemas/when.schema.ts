import { z } from 'zod';

export const OperatorGuardSchema = z.object({
  kind: z.literal('operator'),
  input: z.string(),
  operator: z.enum(['in', 'notin']),
  values: z.array(z.string()).min(1),
});

export const CelGuardSchema = z.object({
  kind: z.literal('cel'),
  expression: z.string().min(1),
});

export const GuardExpressionSchema = z.discriminatedUnion('kind', [OperatorGuardSchema, CelGuardSchema]);
