import { SubstitutionError } from '../exception/errors.js';

export type ResultSelector =
  | { kind: 'whole' }
  | { kind: 'index'; index: number }
  | { kind: 'all' }
  | { kind: 'property'; property: string };

export interface StepResultRef {
  stepName: string;
  resultName: string;
  selector: ResultSelector;
}

/** Every `$(steps.<step>.results...)` occurrence in a string. */
export const STEP_RESULT_PATTERN = /\$\(steps\.[^()]+?\.results\.[^()]*?\)/g;

const REF_SHAPE = /^steps\.([^.[\]]+)\.results\.([^.[\]]+)(?:\[(\*|\d+)\]|\.([^.[\]]+))?$/;

/** Parse one `$(steps.<step>.results.<key>...)` reference. */
export function parseStepResultRef(reference: string): StepResultRef {
  if (!reference.startsWith('$(') || !reference.endsWith(')')) {
    throw new SubstitutionError(`invalid step result reference "${reference}"`, reference);
  }
  const body = reference.slice(2, -1);
  const match = REF_SHAPE.exec(body);
  if (!match) {
    throw new SubstitutionError(
      `invalid step result reference "${reference}": expected steps.<step>.results.<name>[<index>|*] or steps.<step>.results.<name>.<key>`,
      reference,
    );
  }

  const [, stepName, resultName, index, property] = match;
  let selector: ResultSelector = { kind: 'whole' };
  if (index === '*') {
    selector = { kind: 'all' };
  } else if (index !== undefined) {
    selector = { kind: 'index', index: Number.parseInt(index, 10) };
  } else if (property !== undefined) {
    selector = { kind: 'property', property };
  }

  return { stepName, resultName, selector };
}
