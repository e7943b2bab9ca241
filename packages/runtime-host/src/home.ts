/**
 * Switchboard Runtime Host - SWITCHBOARD_HOME Resolution
 *
 * Resolves the Switchboard home directory using the following precedence:
 *
 *   1. Explicit `home` option (e.g. from the --home CLI flag)
 *   2. SWITCHBOARD_HOME environment variable
 *   3. OS application config file (stores the last explicitly chosen home)
 *   4. Default: ~/.switchboard
 *
 * Layout under the resolved home:
 *
 *   <SWITCHBOARD_HOME>/
 *     config.json               runtime configuration (see config.ts)
 *     logs/
 *       option-changes.jsonl    option change log (see file-log-sink.ts)
 *
 * Use resolveSwitchboardHome() throughout the runtime host.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir, platform } from 'node:os';

// ---------------------------------------------------------------------------
// OS Config File Location
// ---------------------------------------------------------------------------

/**
 * Returns the platform-specific path to the Switchboard application config
 * file. It persists the last explicitly chosen home so `--home` only needs
 * to be passed once.
 *
 * Locations:
 *   macOS:   ~/Library/Preferences/switchboard/config.json
 *   Windows: %APPDATA%\switchboard\config.json
 *   Linux:   ~/.config/switchboard/config.json
 */
export function getOsConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const home = homedir();
  switch (platform()) {
    case 'darwin':
      return join(home, 'Library', 'Preferences', 'switchboard', 'config.json');
    case 'win32': {
      const appData = env['APPDATA'] ?? join(home, 'AppData', 'Roaming');
      return join(appData, 'switchboard', 'config.json');
    }
    default:
      return join(home, '.config', 'switchboard', 'config.json');
  }
}

// ---------------------------------------------------------------------------
// OS Config Read / Write
// ---------------------------------------------------------------------------

/**
 * Read the persisted home path from the OS application config file.
 *
 * Returns null if the file does not exist, cannot be parsed, or has no
 * non-empty `home` string.
 */
export function readHomeFromOsConfig(configPath: string = getOsConfigPath()): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || !('home' in parsed)) return null;
  const home = parsed.home;
  return typeof home === 'string' && home !== '' ? home : null;
}

/**
 * Persist a home path to the OS application config file, creating its
 * directory if needed.
 */
export function writeHomeToOsConfig(home: string, configPath: string = getOsConfigPath()): void {
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify({ home }, null, 2) + '\n', 'utf-8');
}

// ---------------------------------------------------------------------------
// Primary Resolution Function
// ---------------------------------------------------------------------------

export interface ResolveHomeOptions {
  /** Explicit override, highest precedence. Typically the --home flag. */
  readonly home?: string | undefined;
  /**
   * Persist the resolved home to the OS config file so later invocations
   * without --home use it. Default: false.
   */
  readonly persist?: boolean | undefined;
  /** Environment to consult. Default: process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
  /** OS config file to consult and persist to. Default: getOsConfigPath(). */
  readonly osConfigPath?: string | undefined;
}

/**
 * Resolve the Switchboard home directory and create it if it is missing.
 *
 * @returns The absolute path of the resolved home directory
 */
export function resolveSwitchboardHome(opts: ResolveHomeOptions = {}): string {
  const env = opts.env ?? process.env;
  const osConfigPath = opts.osConfigPath ?? getOsConfigPath(env);
  let home: string;

  const fromEnv = env['SWITCHBOARD_HOME'];
  if (opts.home !== undefined && opts.home !== '') {
    home = opts.home;
  } else if (fromEnv !== undefined && fromEnv !== '') {
    home = fromEnv;
  } else {
    home = readHomeFromOsConfig(osConfigPath) ?? join(homedir(), '.switchboard');
  }

  if (!existsSync(home)) {
    mkdirSync(home, { recursive: true });
  }

  if (opts.persist === true) {
    writeHomeToOsConfig(home, osConfigPath);
  }

  return home;
}
