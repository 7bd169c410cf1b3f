/**
 * Cloudreve CLI - XDG Paths
 *
 * Where configuration, cached sessions and logs live. Each kind of file has a
 * per-platform base directory; `CLOUDREVE_CLI_HOME` puts all of them under one
 * folder instead (portable installs, CI).
 */

import { homedir } from 'os';
import { join } from 'path';
import { mkdirSync } from 'fs';

// ============================================================================
// Path Constants
// ============================================================================

export const APP_NAME = 'cloudreve-cli';

/** Overrides every directory below when set */
export const HOME_ENV = 'CLOUDREVE_CLI_HOME';

export type AppDirKind = 'config' | 'data' | 'logs';

type Platform = 'darwin' | 'win32' | 'posix';

interface DirLayout {
  /** Base directory for the platform */
  base: (env: NodeJS.ProcessEnv, home: string) => string;
  /** Path segments below `<base>/` */
  segments: string[];
}

const roaming = (env: NodeJS.ProcessEnv, home: string): string =>
  env.APPDATA || join(home, 'AppData', 'Roaming');
const local = (env: NodeJS.ProcessEnv, home: string): string =>
  env.LOCALAPPDATA || join(home, 'AppData', 'Local');
const appSupport = (_env: NodeJS.ProcessEnv, home: string): string =>
  join(home, 'Library', 'Application Support');

/**
 * - config: ~/.config, ~/Library/Application Support, %APPDATA%
 * - data (encrypted session cache): ~/.local/share, ~/Library/Application Support, %LOCALAPPDATA%
 * - logs: ~/.local/state/.../logs, ~/Library/Logs, %LOCALAPPDATA%/.../logs
 */
const LAYOUTS: Record<AppDirKind, Record<Platform, DirLayout>> = {
  config: {
    darwin: { base: appSupport, segments: [APP_NAME] },
    win32: { base: roaming, segments: [APP_NAME] },
    posix: {
      base: (env, home) => env.XDG_CONFIG_HOME || join(home, '.config'),
      segments: [APP_NAME],
    },
  },
  data: {
    darwin: { base: appSupport, segments: [APP_NAME] },
    win32: { base: local, segments: [APP_NAME] },
    posix: {
      base: (env, home) => env.XDG_DATA_HOME || join(home, '.local', 'share'),
      segments: [APP_NAME],
    },
  },
  logs: {
    darwin: { base: (_env, home) => join(home, 'Library', 'Logs'), segments: [APP_NAME] },
    win32: { base: local, segments: [APP_NAME, 'logs'] },
    posix: {
      base: (env, home) => env.XDG_STATE_HOME || join(home, '.local', 'state'),
      segments: [APP_NAME, 'logs'],
    },
  },
};

function platformKey(platform: NodeJS.Platform): Platform {
  return platform === 'darwin' || platform === 'win32' ? platform : 'posix';
}

/**
 * Directory for one kind of file, without creating it.
 *
 * @example
 * resolveAppDir('logs', 'linux', { XDG_STATE_HOME: '/s' }, '/home/a'); // '/s/cloudreve-cli/logs'
 * resolveAppDir('data', 'linux', { CLOUDREVE_CLI_HOME: '/p' }, '/home/a'); // '/p/data'
 */
export function resolveAppDir(
  kind: AppDirKind,
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): string {
  const override = env[HOME_ENV];
  if (override) {
    return join(override, kind);
  }
  const layout = LAYOUTS[kind][platformKey(platform)];
  return join(layout.base(env, home), ...layout.segments);
}

function ensureAppDir(kind: AppDirKind): string {
  const dir = resolveAppDir(kind);
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function getConfigDir(): string {
  return ensureAppDir('config');
}

export function getDataDir(): string {
  return ensureAppDir('data');
}

export function getLogDir(): string {
  return ensureAppDir('logs');
}

export function getConfigFilePath(): string {
  return join(getConfigDir(), 'config.json');
}

/**
 * Get the path to the encrypted session cache (fallback for headless Linux)
 */
export function getCredentialsFilePath(): string {
  return join(getDataDir(), 'sessions.enc');
}
