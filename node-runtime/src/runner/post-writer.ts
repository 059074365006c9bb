import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/** Writes the marker files other containers wait on. */
export interface PostWriter {
  /**
   * Empty `content` creates a zero-byte marker at `path`; otherwise the file
   * holds `content` (an exit code). An empty `path` writes nothing.
   */
  write(path: string, content: string): Promise<void>;
}

export class FilePostWriter implements PostWriter {
  async write(path: string, content: string): Promise<void> {
    if (path === '') return;
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf-8');
  }
}
