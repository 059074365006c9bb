import { randomUUID } from 'node:crypto';
import { readFile, stat, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import type { GuardExpression, ResultValue } from '../types/index.js';
import { SubstitutionError, errorMessage } from '../exception/errors.js';
import { STEP_RESULT_PATTERN, parseStepResultRef } from './result-ref.js';
import { loadStepResult } from './result-value.js';
import { STEP_ARTIFACT_PATTERN, getArtifactValues } from './artifact-template.js';

/** The parts of a step that carry `$(steps...)` references. */
export interface SubstitutionTarget {
  command: string[];
  env: Record<string, string>;
  when: GuardExpression[];
}

export interface SubstitutionOptions {
  stepsDir: string;
  scriptsDir: string;
}

type Replacement = { kind: 'string'; value: string } | { kind: 'array'; values: string[] };

type Resolver = (reference: string) => Promise<Replacement>;

interface PendingScript {
  changed: boolean;
  content: string;
}

async function resolveStepResult(stepsDir: string, reference: string): Promise<Replacement> {
  const ref = parseStepResultRef(reference);
  let value: ResultValue;
  try {
    value = await loadStepResult(stepsDir, ref.stepName, ref.resultName);
  } catch (error) {
    throw new SubstitutionError(
      `failed to load result "${ref.resultName}" of step "${ref.stepName}" for ${reference}: ${errorMessage(error)}`,
      reference,
    );
  }

  switch (ref.selector.kind) {
    case 'whole':
      if (value.type === 'string') return { kind: 'string', value: value.stringVal };
      throw new SubstitutionError(
        `${reference} refers to a ${value.type} result; use an index, [*] or a property`,
        reference,
      );
    case 'index': {
      if (value.type !== 'array') {
        throw new SubstitutionError(`${reference} indexes a ${value.type} result`, reference);
      }
      const { index } = ref.selector;
      if (index >= value.arrayVal.length) {
        throw new SubstitutionError(
          `${reference} is out of range: result has ${value.arrayVal.length} elements`,
          reference,
        );
      }
      return { kind: 'string', value: value.arrayVal[index] };
    }
    case 'all':
      if (value.type !== 'array') {
        throw new SubstitutionError(`${reference} expands a ${value.type} result`, reference);
      }
      return { kind: 'array', values: value.arrayVal };
    case 'property': {
      if (value.type !== 'object') {
        throw new SubstitutionError(`${reference} reads a property of a ${value.type} result`, reference);
      }
      const { property } = ref.selector;
      if (!Object.prototype.hasOwnProperty.call(value.objectVal, property)) {
        throw new SubstitutionError(`${reference}: result has no property "${property}"`, reference);
      }
      return { kind: 'string', value: value.objectVal[property] };
    }
  }
}

async function resolveStepArtifact(stepsDir: string, reference: string): Promise<Replacement> {
  try {
    return { kind: 'string', value: await getArtifactValues(stepsDir, reference) };
  } catch (error) {
    throw new SubstitutionError(`failed to resolve ${reference}: ${errorMessage(error)}`, reference);
  }
}

/**
 * Replace every reference in `text`. A whole-array reference is only allowed
 * when `expandArrays` is set and the reference is the entire text; the caller
 * then receives one string per element.
 */
async function substituteText(
  text: string,
  pattern: RegExp,
  resolver: Resolver,
  expandArrays: boolean,
): Promise<string | string[]> {
  const references = [...new Set(Array.from(text.matchAll(pattern), (m) => m[0]))];
  if (references.length === 0) return text;

  const replacements = new Map<string, string>();
  for (const reference of references) {
    const replacement = await resolver(reference);
    if (replacement.kind === 'array') {
      if (expandArrays && reference === text) return replacement.values;
      throw new SubstitutionError(
        `cannot concatenate array result ${reference} with other text in "${text}"`,
        reference,
      );
    }
    replacements.set(reference, replacement.value);
  }

  return text.replace(pattern, (reference) => replacements.get(reference) ?? reference);
}

async function substituteScalar(text: string, pattern: RegExp, resolver: Resolver): Promise<string> {
  const out = await substituteText(text, pattern, resolver, false);
  return typeof out === 'string' ? out : out.join(' ');
}

async function substituteList(items: string[], pattern: RegExp, resolver: Resolver): Promise<string[]> {
  const out: string[] = [];
  for (const item of items) {
    const replaced = await substituteText(item, pattern, resolver, true);
    if (typeof replaced === 'string') out.push(replaced);
    else out.push(...replaced);
  }
  return out;
}

async function substituteEnv(
  env: Record<string, string>,
  pattern: RegExp,
  resolver: Resolver,
): Promise<Record<string, string>> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    out[key] = await substituteScalar(value, pattern, resolver);
  }
  return out;
}

async function substituteWhen(
  when: GuardExpression[],
  pattern: RegExp,
  resolver: Resolver,
): Promise<GuardExpression[]> {
  const out: GuardExpression[] = [];
  for (const guard of when) {
    if (guard.kind === 'cel') {
      out.push({ ...guard, expression: await substituteScalar(guard.expression, pattern, resolver) });
    } else {
      out.push({
        ...guard,
        input: await substituteScalar(guard.input, pattern, resolver),
        values: await substituteList(guard.values, pattern, resolver),
      });
    }
  }
  return out;
}

async function isScriptFile(path: string, scriptsDir: string): Promise<boolean> {
  if (dirname(resolve(path)) !== resolve(scriptsDir)) return false;
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * A command that is a single rendered script gets its references replaced
 * inside the script body. Returns null when the command is not a script.
 */
async function substituteScript(
  command: string[],
  scriptsDir: string,
  pattern: RegExp,
  resolver: Resolver,
): Promise<PendingScript | null> {
  if (command.length !== 1 || !(await isScriptFile(command[0], scriptsDir))) return null;

  let body: string;
  try {
    body = await readFile(command[0], 'utf-8');
  } catch (error) {
    throw new SubstitutionError(`failed to read script ${command[0]}: ${errorMessage(error)}`);
  }
  const content = await substituteScalar(body, pattern, resolver);
  return { changed: content !== body, content };
}

async function writeScript(scriptsDir: string, content: string): Promise<string> {
  const path = join(scriptsDir, `script-${randomUUID()}`);
  try {
    await writeFile(path, content, { encoding: 'utf-8', mode: 0o755, flag: 'wx' });
  } catch (error) {
    throw new SubstitutionError(`failed to write substituted script ${path}: ${errorMessage(error)}`);
  }
  return path;
}

async function applySubstitutions(
  target: SubstitutionTarget,
  options: SubstitutionOptions,
  pattern: RegExp,
  resolver: Resolver,
  includeWhen: boolean,
): Promise<SubstitutionTarget> {
  const script = await substituteScript(target.command, options.scriptsDir, pattern, resolver);
  const command = script ? target.command : await substituteList(target.command, pattern, resolver);
  const env = await substituteEnv(target.env, pattern, resolver);
  const when = includeWhen ? await substituteWhen(target.when, pattern, resolver) : target.when;

  // Everything resolved; only now touch the filesystem.
  if (script?.changed) {
    return { command: [await writeScript(options.scriptsDir, script.content)], env, when };
  }
  return { command, env, when };
}

/**
 * Resolve `$(steps.<step>.results...)` in the command, environment and guard
 * expressions. Any bad reference rejects and the input is left untouched.
 */
export async function applyStepResultSubstitutions(
  target: SubstitutionTarget,
  options: SubstitutionOptions,
): Promise<SubstitutionTarget> {
  return applySubstitutions(
    target,
    options,
    STEP_RESULT_PATTERN,
    (reference) => resolveStepResult(options.stepsDir, reference),
    true,
  );
}

/** Resolve `$(steps.<step>.inputs|outputs...)` in the command and environment. */
export async function applyStepArtifactSubstitutions(
  target: SubstitutionTarget,
  options: SubstitutionOptions,
): Promise<SubstitutionTarget> {
  return applySubstitutions(
    target,
    options,
    STEP_ARTIFACT_PATTERN,
    (reference) => resolveStepArtifact(options.stepsDir, reference),
    false,
  );
}
