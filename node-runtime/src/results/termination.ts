import { randomUUID } from 'node:crypto';
import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import type { RunResult } from '../types/index.js';
import { TerminationRecordSchema } from '../schemas/index.js';
import { TerminationMessageTooLongError } from '../exception/errors.js';
import { MAX_TERMINATION_MESSAGE_BYTES } from '../config/defaults.js';

export function serializeTerminationRecord(entries: RunResult[]): string {
  return JSON.stringify(entries.map(({ key, value, resultType }) => ({ key, value, resultType })));
}

// Errors that mean the target cannot be replaced by rename, e.g. a file bind-mounted by the kubelet.
const RENAME_FALLBACK_CODES = new Set(['EBUSY', 'EXDEV', 'EACCES', 'EPERM', 'EROFS']);

function canFallBack(error: unknown): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && RENAME_FALLBACK_CODES.has(error.code);
}

/**
 * Write the record through a sibling temp file and a rename, so readers never
 * see half a record. Fails without writing anything when the record does not
 * fit the termination-message limit.
 */
export async function writeTerminationRecord(
  path: string,
  entries: RunResult[],
  limit = MAX_TERMINATION_MESSAGE_BYTES,
): Promise<void> {
  const payload = serializeTerminationRecord(entries);
  const size = Buffer.byteLength(payload, 'utf-8');
  if (size > limit) throw new TerminationMessageTooLongError(size, limit);

  const tmp = join(dirname(path), `.${basename(path)}.${randomUUID()}.tmp`);
  try {
    await writeFile(tmp, payload, 'utf-8');
    await rename(tmp, path);
  } catch (error) {
    await rm(tmp, { force: true });
    if (!canFallBack(error)) throw error;
    await writeFile(path, payload, 'utf-8');
  }
}

export function parseTerminationRecord(raw: string): RunResult[] {
  return TerminationRecordSchema.parse(JSON.parse(raw));
}

export async function readTerminationRecord(path: string): Promise<RunResult[]> {
  return parseTerminationRecord(await readFile(path, 'utf-8'));
}
