/**
 * @veil/core - Path resolution and directory management
 *
 * Resolves VEIL_HOME and ensures the run directories exist.
 */

import { mkdirSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

/**
 * Resolve the Veil home directory.
 * Priority: VEIL_HOME env var > ~/.veil
 */
export function resolveVeilHome(): string {
  const fromEnv = process.env['VEIL_HOME'];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  return join(homedir(), '.veil');
}

/** Resolved path map */
export interface VeilPaths {
  home: string;
  config: string; // veil.json
  secrets: string;
  salt: string;
  logs: string;
  output: string;
  quarantine: string; // quarantine.jsonl
}

/**
 * Build the full set of Veil paths.
 * Does NOT create directories -- call `ensureDirectories` for that.
 */
export function buildPaths(home: string = resolveVeilHome()): VeilPaths {
  const output = join(home, 'output');
  const secrets = join(home, 'secrets');
  return {
    home,
    config: join(home, 'veil.json'),
    secrets,
    salt: join(secrets, 'salt'),
    logs: join(home, 'logs'),
    output,
    quarantine: join(output, 'quarantine.jsonl'),
  };
}

/**
 * Ensure all standard Veil directories exist.
 */
export function ensureDirectories(paths?: VeilPaths): VeilPaths {
  const p = paths ?? buildPaths();

  for (const dir of [p.home, p.secrets, p.logs, p.output]) {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: dir === p.secrets ? 0o700 : 0o755 });
    }
  }

  return p;
}
