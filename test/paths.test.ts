/**
 * Unit Tests - XDG Paths
 */

import { existsSync } from 'fs';
import { join } from 'path';
import { describe, expect, test } from 'vitest';
import {
  APP_NAME,
  getConfigDir,
  getConfigFilePath,
  getCredentialsFilePath,
  getDataDir,
  getLogDir,
  resolveAppDir,
} from '../src/paths.js';

const isLinux = process.platform === 'linux';

describe('Paths - XDG directories', () => {
  test('uses the application name', () => {
    expect(APP_NAME).toBe('cloudreve-cli');
  });

  test.runIf(isLinux)('config lives under XDG_CONFIG_HOME', () => {
    expect(getConfigDir()).toBe(join(process.env.XDG_CONFIG_HOME ?? '', 'cloudreve-cli'));
    expect(getConfigFilePath()).toBe(
      join(process.env.XDG_CONFIG_HOME ?? '', 'cloudreve-cli', 'config.json')
    );
  });

  test.runIf(isLinux)('sessions live under XDG_DATA_HOME', () => {
    expect(getDataDir()).toBe(join(process.env.XDG_DATA_HOME ?? '', 'cloudreve-cli'));
    expect(getCredentialsFilePath()).toBe(
      join(process.env.XDG_DATA_HOME ?? '', 'cloudreve-cli', 'sessions.enc')
    );
  });

  test.runIf(isLinux)('logs live under XDG_STATE_HOME', () => {
    expect(getLogDir()).toBe(join(process.env.XDG_STATE_HOME ?? '', 'cloudreve-cli', 'logs'));
  });

  test('creates the directories it returns', () => {
    expect(existsSync(getConfigDir())).toBe(true);
    expect(existsSync(getDataDir())).toBe(true);
    expect(existsSync(getLogDir())).toBe(true);
  });
});

describe('Paths - Platform layouts', () => {
  const home = '/home/alice';

  test('linux falls back to the dot directories under home', () => {
    expect(resolveAppDir('config', 'linux', {}, home)).toBe('/home/alice/.config/cloudreve-cli');
    expect(resolveAppDir('data', 'linux', {}, home)).toBe('/home/alice/.local/share/cloudreve-cli');
    expect(resolveAppDir('logs', 'linux', {}, home)).toBe(
      '/home/alice/.local/state/cloudreve-cli/logs'
    );
  });

  test('other unix platforms follow XDG', () => {
    expect(resolveAppDir('data', 'freebsd', { XDG_DATA_HOME: '/xdg/data' }, home)).toBe(
      '/xdg/data/cloudreve-cli'
    );
  });

  test('macOS uses Application Support and Logs', () => {
    expect(resolveAppDir('config', 'darwin', {}, home)).toBe(
      join(home, 'Library', 'Application Support', 'cloudreve-cli')
    );
    expect(resolveAppDir('logs', 'darwin', { XDG_STATE_HOME: '/ignored' }, home)).toBe(
      join(home, 'Library', 'Logs', 'cloudreve-cli')
    );
  });

  test('windows splits roaming config from local data', () => {
    const env = { APPDATA: '/roaming', LOCALAPPDATA: '/local' };

    expect(resolveAppDir('config', 'win32', env, home)).toBe(join('/roaming', 'cloudreve-cli'));
    expect(resolveAppDir('data', 'win32', env, home)).toBe(join('/local', 'cloudreve-cli'));
    expect(resolveAppDir('logs', 'win32', {}, home)).toBe(
      join(home, 'AppData', 'Local', 'cloudreve-cli', 'logs')
    );
  });

  test('CLOUDREVE_CLI_HOME holds every directory', () => {
    const env = { CLOUDREVE_CLI_HOME: '/portable', XDG_CONFIG_HOME: '/ignored' };

    expect(resolveAppDir('config', 'linux', env, home)).toBe('/portable/config');
    expect(resolveAppDir('data', 'darwin', env, home)).toBe('/portable/data');
    expect(resolveAppDir('logs', 'win32', env, home)).toBe('/portable/logs');
  });
});
