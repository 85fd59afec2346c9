/**
 * @veil/core - JSONL writer
 *
 * One UTF-8 JSON value per line. Appends are serialized so concurrent
 * writers never interleave partial lines.
 */

import { mkdir, appendFile, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { Mutex } from '../concurrency/index.js';

export class JsonlWriter<T = unknown> {
  private initialized = false;
  private readonly mutex = new Mutex();

  constructor(readonly path: string) {}

  /**
   * Ensure the parent directory exists. Called lazily before first write.
   */
  private async ensureDirectory(): Promise<void> {
    if (this.initialized) return;
    await mkdir(dirname(this.path), { recursive: true });
    this.initialized = true;
  }

  async append(entry: T): Promise<void> {
    await this.appendMany([entry]);
  }

  async appendMany(entries: readonly T[]): Promise<void> {
    if (entries.length === 0) return;
    const chunk = entries.map((e) => JSON.stringify(e) + '\n').join('');
    await this.mutex.runExclusive(async () => {
      await this.ensureDirectory();
      await appendFile(this.path, chunk, 'utf-8');
    });
  }

  /**
   * Read every line back. A missing file is an empty log; a malformed
   * line is an error, since this writer never produces one.
   */
  async readAll(): Promise<unknown[]> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (err: unknown) {
      if (isNotFound(err)) return [];
      throw err;
    }

    return content
      .split('\n')
      .filter((line) => line.trim().length > 0)
      .map((line, i) => {
        try {
          const entry: unknown = JSON.parse(line);
          return entry;
        } catch (err) {
          throw new Error(`Malformed JSONL at ${this.path}:${i + 1}`, { cause: err });
        }
      });
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
