import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { loadStepResult, parseResultValue, stepResultPath } from '../../src/substitution/result-value.js';
import { parseStepResultRef } from '../../src/substitution/result-ref.js';
import { SubstitutionError } from '../../src/exception/errors.js';

describe('parseResultValue', () => {
  it('reads empty content as an empty string', () => {
    expect(parseResultValue('')).toEqual({ type: 'string', stringVal: '' });
  });

  it('reads a JSON string array as an array result', () => {
    expect(parseResultValue('["a","b"]')).toEqual({ type: 'array', arrayVal: ['a', 'b'] });
  });

  it('reads a JSON string map as an object result', () => {
    expect(parseResultValue('{"url":"https://example.test","digest":"abc"}')).toEqual({
      type: 'object',
      objectVal: { url: 'https://example.test', digest: 'abc' },
    });
  });

  it('unquotes a JSON string', () => {
    expect(parseResultValue('"quoted"')).toEqual({ type: 'string', stringVal: 'quoted' });
  });

  it('keeps anything else verbatim', () => {
    expect(parseResultValue('hello world')).toEqual({ type: 'string', stringVal: 'hello world' });
    expect(parseResultValue('42')).toEqual({ type: 'string', stringVal: '42' });
    expect(parseResultValue('[1,2]')).toEqual({ type: 'string', stringVal: '[1,2]' });
    expect(parseResultValue('{"n":1}')).toEqual({ type: 'string', stringVal: '{"n":1}' });
    expect(parseResultValue('[not json')).toEqual({ type: 'string', stringVal: '[not json' });
  });
});

describe('stepResultPath', () => {
  it('places results under the step container directory', () => {
    expect(stepResultPath('/stepcoord/steps', 'build', 'digest')).toBe('/stepcoord/steps/step-build/results/digest');
  });
});

describe('loadStepResult', () => {
  let stepsDir: string;

  beforeEach(async () => {
    stepsDir = join(tmpdir(), `result-value-test-${randomUUID()}`);
    await mkdir(join(stepsDir, 'step-build', 'results'), { recursive: true });
  });

  afterEach(async () => {
    await rm(stepsDir, { recursive: true, force: true });
  });

  it('parses the file a previous step wrote', async () => {
    await writeFile(join(stepsDir, 'step-build', 'results', 'tags'), '["v1","latest"]');
    expect(await loadStepResult(stepsDir, 'build', 'tags')).toEqual({ type: 'array', arrayVal: ['v1', 'latest'] });
  });

  it('rejects when the result file is missing', async () => {
    await expect(loadStepResult(stepsDir, 'build', 'missing')).rejects.toThrow();
  });
});

describe('parseStepResultRef', () => {
  it('parses a whole-value reference', () => {
    expect(parseStepResultRef('$(steps.build.results.digest)')).toEqual({
      stepName: 'build',
      resultName: 'digest',
      selector: { kind: 'whole' },
    });
  });

  it('parses index, star and property selectors', () => {
    expect(parseStepResultRef('$(steps.build.results.tags[1])').selector).toEqual({ kind: 'index', index: 1 });
    expect(parseStepResultRef('$(steps.build.results.tags[*])').selector).toEqual({ kind: 'all' });
    expect(parseStepResultRef('$(steps.build.results.image.url)').selector).toEqual({
      kind: 'property',
      property: 'url',
    });
  });

  it.each([
    '$(steps.build.results.)',
    '$(steps.build.results.tags[x])',
    '$(steps.build.results.image.url.extra)',
    'steps.build.results.digest',
  ])('rejects %s', (reference) => {
    expect(() => parseStepResultRef(reference)).toThrow(SubstitutionError);
  });
});
