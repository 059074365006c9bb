import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ResultValue } from '../types/index.js';
import { ArrayResultSchema, ObjectResultSchema, StringResultSchema } from '../schemas/index.js';
import { containerNameFor } from '../config/defaults.js';

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Decode the contents of a result file. Steps write results by hand, so
 * anything that is not a JSON string array, string map or JSON string is
 * taken verbatim as a string result.
 */
export function parseResultValue(raw: string): ResultValue {
  if (raw.length === 0) return { type: 'string', stringVal: '' };

  const parsed = tryParseJson(raw);

  if (raw.startsWith('[') && parsed.ok) {
    const array = ArrayResultSchema.safeParse(parsed.value);
    if (array.success) return { type: 'array', arrayVal: array.data };
  }

  if (raw.startsWith('{') && parsed.ok) {
    const object = ObjectResultSchema.safeParse(parsed.value);
    if (object.success) return { type: 'object', objectVal: object.data };
  }

  if (parsed.ok) {
    const str = StringResultSchema.safeParse(parsed.value);
    if (str.success) return { type: 'string', stringVal: str.data };
  }

  return { type: 'string', stringVal: raw };
}

export function stepResultPath(stepsDir: string, stepName: string, resultName: string): string {
  return join(stepsDir, containerNameFor(stepName), 'results', resultName);
}

export async function loadStepResult(
  stepsDir: string,
  stepName: string,
  resultName: string,
): Promise<ResultValue> {
  const raw = await readFile(stepResultPath(stepsDir, stepName, resultName), 'utf-8');
  return parseResultValue(raw);
}
