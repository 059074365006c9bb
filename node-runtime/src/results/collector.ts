import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ResultType, RunResult } from '../types/index.js';
import { ResultCollectionError, errorMessage, isNotFoundError } from '../exception/errors.js';
import { parseArtifacts } from '../substitution/artifact-template.js';

export interface CollectedResults {
  results: RunResult[];
  /** First read failure; `results` still holds everything read before and after it. */
  error?: ResultCollectionError;
}

/**
 * Read `<dir>/<name>` for each declared result. Missing files are results the
 * step chose not to write and are left out.
 */
export async function readResults(dir: string, names: string[], resultType: ResultType): Promise<CollectedResults> {
  const results: RunResult[] = [];
  let firstError: ResultCollectionError | undefined;

  for (const name of names) {
    if (name === '') continue;
    const path = join(dir, name);
    try {
      results.push({ key: name, value: await readFile(path, 'utf-8'), resultType });
    } catch (error) {
      if (isNotFoundError(error)) continue;
      firstError ??= new ResultCollectionError(`failed to read result ${path}: ${errorMessage(error)}`, path, {
        cause: error,
      });
    }
  }

  return firstError ? { results, error: firstError } : { results };
}

/**
 * Read an artifacts manifest into a single entry keyed by its path. A missing
 * manifest yields null; an empty one an entry with an empty value.
 */
export async function readArtifacts(path: string, resultType: ResultType): Promise<RunResult | null> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFoundError(error)) return null;
    throw new ResultCollectionError(`failed to read artifacts ${path}: ${errorMessage(error)}`, path, {
      cause: error,
    });
  }

  if (raw.length > 0) {
    try {
      parseArtifacts(raw, path);
    } catch (error) {
      throw new ResultCollectionError(errorMessage(error), path, { cause: error });
    }
  }
  return { key: path, value: raw, resultType };
}
