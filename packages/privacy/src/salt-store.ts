/**
 * @veil/privacy - Salt store
 *
 * Local secret used to derive pseudonyms, opaque tokens and reproducible
 * DP seeds. Loaded once at startup and immutable for the process
 * lifetime; rotating it means restarting.
 *
 * File format: hex-encoded secret, at least 32 bytes, created with mode
 * 0600 on first run.
 */

import { randomBytes } from 'node:crypto';
import { readFile, writeFile, mkdir, chmod } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ConfigurationError, hash, hmac } from '@veil/core';

const SALT_BYTES = 32;
const PART_SEPARATOR = '\u001f';

export class SaltStore {
  private readonly secret: string;

  private constructor(secret: string) {
    this.secret = secret;
    Object.freeze(this);
  }

  /**
   * Load the salt from `path`, generating and persisting a fresh one if
   * the file does not exist.
   */
  static async load(path: string): Promise<SaltStore> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (err: unknown) {
      if (!isNotFound(err)) throw err;
      const secret = randomBytes(SALT_BYTES).toString('hex');
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, secret + '\n', { encoding: 'utf-8', mode: 0o600 });
      await chmod(path, 0o600);
      return new SaltStore(secret);
    }

    const secret = content.trim();
    if (!/^[a-f0-9]+$/i.test(secret) || secret.length < SALT_BYTES * 2) {
      throw new ConfigurationError(`Salt file ${path} must hold at least ${SALT_BYTES} hex-encoded bytes`);
    }
    return new SaltStore(secret.toLowerCase());
  }

  /**
   * Wrap an existing secret (embedding, tests).
   */
  static fromSecret(secret: string): SaltStore {
    if (secret.length < 8) {
      throw new ConfigurationError('Salt secret must be at least 8 characters');
    }
    return new SaltStore(secret);
  }

  /**
   * HMAC-SHA256 over the parts joined by U+001F, hex encoded.
   */
  keyedHash(...parts: string[]): string {
    return hmac(this.secret, parts.join(PART_SEPARATOR));
  }

  /** First 12 hex chars of SHA-256(salt). Safe to log and emit. */
  fingerprint(): string {
    return hash(this.secret).slice(0, 12);
  }

  /** Whether `text` embeds the secret verbatim (case-insensitive). */
  contains(text: string): boolean {
    return this.locate(text).length > 0;
  }

  /** Every [start, end) range where the secret occurs in `text`. */
  locate(text: string): Array<[number, number]> {
    const ranges: Array<[number, number]> = [];
    const haystack = text.toLowerCase();
    const needle = this.secret.toLowerCase();
    let from = 0;
    let index: number;
    while ((index = haystack.indexOf(needle, from)) !== -1) {
      ranges.push([index, index + needle.length]);
      from = index + needle.length;
    }
    return ranges;
  }

  toJSON(): { fingerprint: string } {
    return { fingerprint: this.fingerprint() };
  }

  toString(): string {
    return `SaltStore(${this.fingerprint()})`;
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
