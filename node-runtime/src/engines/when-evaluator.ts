import { isCelError, run as runCel } from '@bufbuild/cel';
import type { GuardExpression, OperatorGuard } from '../types/index.js';
import { WhenEvaluationError, errorMessage } from '../exception/errors.js';

function evaluateOperator(guard: OperatorGuard): boolean {
  switch (guard.operator) {
    case 'in':
      return guard.values.includes(guard.input);
    case 'notin':
      return !guard.values.includes(guard.input);
    default: {
      const _exhaustive: never = guard.operator;
      throw new WhenEvaluationError(`unknown guard operator ${String(_exhaustive)}`);
    }
  }
}

/**
 * Compile and evaluate one CEL guard with no bindings. References to other
 * steps have already been substituted into the expression text.
 */
export function evaluateCel(expression: string): boolean {
  let result: ReturnType<typeof runCel>;
  try {
    result = runCel(expression, {});
  } catch (error) {
    throw new WhenEvaluationError(`failed to evaluate CEL expression ${expression}: ${errorMessage(error)}`);
  }
  // Evaluation errors come back as values rather than exceptions.
  if (isCelError(result)) {
    throw new WhenEvaluationError(`failed to evaluate CEL expression ${expression}: ${result.message}`);
  }
  if (typeof result === 'boolean') return result;
  throw new WhenEvaluationError(`CEL expression ${expression} is not evaluated to a boolean`);
}

/**
 * True when every guard holds. All CEL guards are evaluated before the
 * conjunction is taken, so a broken expression fails the step even when an
 * earlier guard is already false.
 */
export function allowsExecution(when: GuardExpression[]): boolean {
  const celResults = new Map<string, boolean>();
  for (const guard of when) {
    if (guard.kind === 'cel' && !celResults.has(guard.expression)) {
      celResults.set(guard.expression, evaluateCel(guard.expression));
    }
  }

  return when.every((guard) =>
    guard.kind === 'cel' ? celResults.get(guard.expression) === true : evaluateOperator(guard),
  );
}
