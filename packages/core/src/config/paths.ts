/**
 * @switchyard/core - Path resolution and directory management
 *
 * Resolves SWITCHYARD_HOME and SWITCHYARD_STATE_DIR and ensures the
 * directories the engine writes to exist at startup.
 */

import { mkdirSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

/**
 * Resolve the Switchyard home directory.
 * Priority: SWITCHYARD_HOME env var > ~/.switchyard
 */
export function resolveSwitchyardHome(): string {
  const fromEnv = process.env['SWITCHYARD_HOME'];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  return join(homedir(), '.switchyard');
}

/**
 * Resolve the state directory (database, disposable working dirs).
 * Priority: SWITCHYARD_STATE_DIR env var > SWITCHYARD_HOME
 */
export function resolveStateDir(): string {
  const fromEnv = process.env['SWITCHYARD_STATE_DIR'];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  return resolveSwitchyardHome();
}

export interface SwitchyardPaths {
  home: string;
  stateDir: string;
  config: string; // switchyard.json
  database: string; // switchyard.db
  logs: string;
  /** Per-identity working directories of disposable providers. */
  disposable: string;
}

/**
 * Build the full set of paths.
 * Does NOT create directories -- call `ensureDirectories` for that.
 */
export function buildPaths(): SwitchyardPaths {
  const home = resolveSwitchyardHome();
  const stateDir = resolveStateDir();

  return {
    home,
    stateDir,
    config: join(home, 'switchyard.json'),
    database: join(stateDir, 'switchyard.db'),
    logs: join(stateDir, 'logs'),
    disposable: join(stateDir, 'disposable'),
  };
}

/**
 * Ensure all standard directories exist.
 */
export function ensureDirectories(paths?: SwitchyardPaths): SwitchyardPaths {
  const p = paths ?? buildPaths();

  for (const dir of [p.home, p.stateDir, p.logs, p.disposable]) {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  return p;
}
