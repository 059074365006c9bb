import { createPrivateKey, sign, type KeyObject } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { ResultType, type RunResult } from '../types/index.js';
import { ConfigurationError, errorMessage } from '../exception/errors.js';

export const RESULT_MANIFEST_KEY = 'RESULT_MANIFEST';
export const SIGNATURE_SUFFIX = '.sig';

/**
 * Signs the task-level results of a step. Returns the entries to append to
 * the termination record; the input entries are never changed.
 */
export interface Signer {
  sign(results: RunResult[]): Promise<RunResult[]>;
}

/** Comma-joined keys of the signed results, in record order. */
export function resultManifest(results: RunResult[]): string {
  return results.map((r) => r.key).join(',');
}

export class KeySigner implements Signer {
  constructor(private privateKey: KeyObject) {}

  static async fromFile(path: string): Promise<KeySigner> {
    let pem: string;
    try {
      pem = await readFile(path, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(`failed to read signing key ${path}: ${errorMessage(error)}`);
    }
    try {
      return new KeySigner(createPrivateKey(pem));
    } catch (error) {
      throw new ConfigurationError(`invalid signing key ${path}: ${errorMessage(error)}`);
    }
  }

  async sign(results: RunResult[]): Promise<RunResult[]> {
    const taskResults = results.filter((r) => r.resultType === ResultType.TaskRunResult);
    if (taskResults.length === 0) return [];

    const out: RunResult[] = taskResults.map((r) => ({
      key: `${r.key}${SIGNATURE_SUFFIX}`,
      value: this.signValue(r.value),
      resultType: ResultType.TaskRunResult,
    }));

    const manifest = resultManifest(taskResults);
    out.push(
      { key: RESULT_MANIFEST_KEY, value: manifest, resultType: ResultType.TaskRunResult },
      {
        key: `${RESULT_MANIFEST_KEY}${SIGNATURE_SUFFIX}`,
        value: this.signValue(manifest),
        resultType: ResultType.TaskRunResult,
      },
    );
    return out;
  }

  private signValue(value: string): string {
    // Edwards curves carry their own digest; RSA and EC keys sign a SHA-256 digest.
    const keyType = this.privateKey.asymmetricKeyType;
    const algorithm = keyType === 'ed25519' || keyType === 'ed448' ? null : 'sha256';
    return sign(algorithm, Buffer.from(value, 'utf-8'), this.privateKey).toString('base64');
  }
}
