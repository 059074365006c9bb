import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { Writable } from 'node:stream';
import { ProcessRunner, type RunToken } from '../../src/runner/command-runner.js';
import { ContextError, ExecError, ExitError } from '../../src/exception/errors.js';

function sink(): { stream: Writable; text: () => string } {
  const chunks: Buffer[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      callback();
    },
  });
  return { stream, text: () => Buffer.concat(chunks).toString('utf-8') };
}

function token(): RunToken & { controller: AbortController } {
  const controller = new AbortController();
  return { controller, signal: controller.signal };
}

const node = process.execPath;

describe('ProcessRunner', () => {
  let dir: string;

  beforeEach(() => {
    dir = join(tmpdir(), `command-runner-test-${randomUUID()}`);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('runs nothing for an empty command', async () => {
    const runner = new ProcessRunner();
    await expect(runner.run(token(), [])).resolves.toBeUndefined();
    await expect(runner.run(token(), [''])).resolves.toBeUndefined();
  });

  it('mirrors output and tees it to the configured files', async () => {
    const out = sink();
    const err = sink();
    const runner = new ProcessRunner({
      stdout: out.stream,
      stderr: err.stream,
      stdoutPath: join(dir, 'stdout'),
      stderrPath: join(dir, 'stderr'),
    });

    await runner.run(token(), [node, '-e', "process.stdout.write('hello'); process.stderr.write('oops')"]);

    expect(out.text()).toBe('hello');
    expect(err.text()).toBe('oops');
    expect(await readFile(join(dir, 'stdout'), 'utf-8')).toBe('hello');
    expect(await readFile(join(dir, 'stderr'), 'utf-8')).toBe('oops');
  });

  it('passes the given environment to the command', async () => {
    const out = sink();
    const runner = new ProcessRunner({ stdout: out.stream, env: { GREETING: 'configured' } });
    await runner.run(token(), [node, '-e', 'process.stdout.write(process.env.GREETING)'], { GREETING: 'substituted' });
    expect(out.text()).toBe('substituted');
  });

  it('rejects with the exit status of a failing command', async () => {
    const runner = new ProcessRunner();
    const running = runner.run(token(), [node, '-e', 'process.exit(3)']);
    await expect(running).rejects.toBeInstanceOf(ExitError);
    await expect(running).rejects.toMatchObject({ exitCode: 3 });
  });

  it('rejects with ExecError when the command cannot start', async () => {
    const runner = new ProcessRunner();
    await expect(runner.run(token(), [join(dir, 'no-such-binary')])).rejects.toBeInstanceOf(ExecError);
  });

  it('kills the command when the token is aborted', async () => {
    const runner = new ProcessRunner();
    const t = token();
    const started = Date.now();
    const running = runner.run(t, [node, '-e', 'setTimeout(() => {}, 10000)']);
    setTimeout(() => t.controller.abort(new ContextError('DeadlineExceeded')), 100);

    await expect(running).rejects.toThrow('context deadline exceeded');
    expect(Date.now() - started).toBeLessThan(5000);
  });
});
