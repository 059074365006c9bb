import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { generateKeyPairSync, randomUUID, verify } from 'node:crypto';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { KeySigner, resultManifest } from '../../src/signing/signer.js';
import { ResultType, type RunResult } from '../../src/types/index.js';
import { ConfigurationError } from '../../src/exception/errors.js';

const RESULTS: RunResult[] = [
  { key: 'digest', value: 'sha256:abc', resultType: ResultType.TaskRunResult },
  { key: 'url', value: 'registry.test/app', resultType: ResultType.TaskRunResult },
  { key: 'step-only', value: 'ignored', resultType: ResultType.StepResult },
];

describe('resultManifest', () => {
  it('joins the keys in order', () => {
    expect(resultManifest(RESULTS.slice(0, 2))).toBe('digest,url');
  });
});

describe('KeySigner', () => {
  it('signs each task result and the manifest with an Ed25519 key', async () => {
    const { privateKey, publicKey } = generateKeyPairSync('ed25519');
    const signed = await new KeySigner(privateKey).sign(RESULTS);

    expect(signed.map((r) => r.key)).toEqual(['digest.sig', 'url.sig', 'RESULT_MANIFEST', 'RESULT_MANIFEST.sig']);
    expect(signed.every((r) => r.resultType === ResultType.TaskRunResult)).toBe(true);
    expect(signed[2].value).toBe('digest,url');
    expect(verify(null, Buffer.from('sha256:abc'), publicKey, Buffer.from(signed[0].value, 'base64'))).toBe(true);
    expect(verify(null, Buffer.from('digest,url'), publicKey, Buffer.from(signed[3].value, 'base64'))).toBe(true);
  });

  it('signs a SHA-256 digest with an RSA key', async () => {
    const { privateKey, publicKey } = generateKeyPairSync('rsa', { modulusLength: 2048 });
    const signed = await new KeySigner(privateKey).sign(RESULTS.slice(0, 1));
    expect(verify('sha256', Buffer.from('sha256:abc'), publicKey, Buffer.from(signed[0].value, 'base64'))).toBe(true);
  });

  it('returns nothing when there are no task results', async () => {
    const { privateKey } = generateKeyPairSync('ed25519');
    expect(await new KeySigner(privateKey).sign(RESULTS.slice(2))).toEqual([]);
  });

  describe('fromFile', () => {
    let dir: string;

    beforeEach(async () => {
      dir = join(tmpdir(), `signer-test-${randomUUID()}`);
      await mkdir(dir, { recursive: true });
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('loads a PEM private key', async () => {
      const { privateKey } = generateKeyPairSync('ed25519');
      const path = join(dir, 'signing.pem');
      await writeFile(path, privateKey.export({ type: 'pkcs8', format: 'pem' }));

      const signer = await KeySigner.fromFile(path);

      expect(await signer.sign(RESULTS.slice(0, 1))).toHaveLength(3);
    });

    it('rejects a missing key file', async () => {
      await expect(KeySigner.fromFile(join(dir, 'absent.pem'))).rejects.toThrow(ConfigurationError);
    });

    it('rejects a file that is not a key', async () => {
      const path = join(dir, 'garbage.pem');
      await writeFile(path, 'test-secret');
      await expect(KeySigner.fromFile(path)).rejects.toThrow(ConfigurationError);
    });
  });
});
