/**
 * Cloudreve CLI - Configuration
 *
 * JSON config file holding the default server, protocol selection and
 * listing preferences. Command-line options override it per invocation.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { getConfigFilePath } from './paths.js';
import { logger } from './logger.js';
import { InvalidConfigError } from './errors/index.js';
import { getErrorMessage } from './utils/error.js';
import { err, mapOk, ok, type Result } from './utils/result.js';
import {
  validateApiVersion,
  validateBaseUrl,
  validateBoolean,
  validatePositiveInt,
  type ApiVersionSetting,
} from './validation/config.js';

export { getConfigFilePath } from './paths.js';

// ============================================================================
// Types
// ============================================================================

export interface ServerConfig {
  /** Server address, e.g. "https://drive.example.com"; empty until configured */
  baseUrl: string;
  /** Protocol to speak; "auto" probes the server */
  apiVersion: ApiVersionSetting;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
}

export interface Config {
  server: ServerConfig;
  /** Entries per page for `ls` */
  pageSize: number;
  /** Enable debug logging */
  debug: boolean;
}

/** Keys accepted by `config set` */
export const CONFIG_KEYS = [
  'server.baseUrl',
  'server.apiVersion',
  'server.timeoutMs',
  'pageSize',
  'debug',
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export type ConfigUpdate = Partial<Omit<Config, 'server'>> & { server?: Partial<ServerConfig> };

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CONFIG: Config = {
  server: {
    baseUrl: '',
    apiVersion: 'auto',
    timeoutMs: 30_000,
  },
  pageSize: 100,
  debug: false,
};

// ============================================================================
// Config State
// ============================================================================

let currentConfig: Config = cloneDefaults();

function cloneDefaults(): Config {
  return { ...DEFAULT_CONFIG, server: { ...DEFAULT_CONFIG.server } };
}

// ============================================================================
// Config Operations
// ============================================================================

/**
 * Load configuration from file, creating it with defaults when missing.
 * Invalid values are reported and replaced by their defaults.
 */
export function loadConfig(): Config {
  const configPath = getConfigFilePath();

  try {
    if (existsSync(configPath)) {
      const loaded: Partial<Config> = JSON.parse(readFileSync(configPath, 'utf-8'));

      // Deep merge with defaults
      const merged: Config = {
        ...DEFAULT_CONFIG,
        ...loaded,
        server: { ...DEFAULT_CONFIG.server, ...loaded.server },
      };
      currentConfig = sanitizeConfig(merged);

      logger.debug(`Loaded config from ${configPath}`);
    } else {
      currentConfig = cloneDefaults();
      saveConfig(currentConfig);
      logger.info(`Created default config at ${configPath}`);
    }
  } catch (error) {
    logger.error(`Failed to load config: ${getErrorMessage(error)}`);
    currentConfig = cloneDefaults();
  }

  return currentConfig;
}

/**
 * Save configuration to file
 */
export function saveConfig(config: Config): void {
  const configPath = getConfigFilePath();

  try {
    mkdirSync(dirname(configPath), { recursive: true });
    writeFileSync(configPath, JSON.stringify(config, null, 2), { mode: 0o600 });
    currentConfig = config;
    logger.debug(`Saved config to ${configPath}`);
  } catch (error) {
    logger.error(`Failed to save config: ${getErrorMessage(error)}`);
    throw error;
  }
}

/**
 * Get current configuration
 */
export function getConfig(): Config {
  return currentConfig;
}

/**
 * Update configuration (partial update) and save it
 */
export function updateConfig(updates: ConfigUpdate): Config {
  currentConfig = {
    ...currentConfig,
    ...updates,
    server: { ...currentConfig.server, ...updates.server },
  };
  saveConfig(currentConfig);
  return currentConfig;
}

/**
 * Validate and store one value given as text, as `config set` receives it.
 *
 * @example
 * setConfigValue('server.apiVersion', 'V4'); // ok(config with apiVersion 'v4')
 * setConfigValue('pageSize', '0'); // err(InvalidConfigError)
 */
export function setConfigValue(key: string, value: string): Result<Config, InvalidConfigError> {
  switch (key) {
    case 'server.baseUrl':
      return mapOk(validateBaseUrl(value), (baseUrl) => updateConfig({ server: { baseUrl } }));
    case 'server.apiVersion':
      return mapOk(validateApiVersion(value), (apiVersion) =>
        updateConfig({ server: { apiVersion } })
      );
    case 'server.timeoutMs':
      return mapOk(validatePositiveInt(value, key), (timeoutMs) =>
        updateConfig({ server: { timeoutMs } })
      );
    case 'pageSize':
      return mapOk(validatePositiveInt(value, key), (pageSize) => updateConfig({ pageSize }));
    case 'debug':
      return mapOk(validateBoolean(value, key), (debug) => updateConfig({ debug }));
    default:
      return err(
        new InvalidConfigError(key, `Unknown key (expected one of ${CONFIG_KEYS.join(', ')})`)
      );
  }
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate server configuration. An empty base URL is allowed: the server may
 * come from the command line instead.
 */
export function validateServerConfig(config: ServerConfig): string[] {
  const errors: string[] = [];

  if (config.baseUrl) {
    const baseUrl = validateBaseUrl(config.baseUrl);
    if (!baseUrl.ok) errors.push(baseUrl.error.message);
  }

  const apiVersion = validateApiVersion(config.apiVersion);
  if (!apiVersion.ok) errors.push(apiVersion.error.message);

  const timeout = validatePositiveInt(config.timeoutMs, 'server.timeoutMs');
  if (!timeout.ok) errors.push(timeout.error.message);

  return errors;
}

function sanitizeConfig(config: Config): Config {
  for (const message of validateServerConfig(config.server)) {
    logger.warn(`${message}; using the default`);
  }

  const baseUrl = config.server.baseUrl ? validateBaseUrl(config.server.baseUrl) : ok('');
  const apiVersion = validateApiVersion(config.server.apiVersion);
  const timeoutMs = validatePositiveInt(config.server.timeoutMs, 'server.timeoutMs');
  const pageSize = validatePositiveInt(config.pageSize, 'pageSize');
  const debug = validateBoolean(config.debug, 'debug');

  if (!pageSize.ok) logger.warn(`${pageSize.error.message}; using the default`);
  if (!debug.ok) logger.warn(`${debug.error.message}; using the default`);

  return {
    server: {
      baseUrl: baseUrl.ok ? baseUrl.value : DEFAULT_CONFIG.server.baseUrl,
      apiVersion: apiVersion.ok ? apiVersion.value : DEFAULT_CONFIG.server.apiVersion,
      timeoutMs: timeoutMs.ok ? timeoutMs.value : DEFAULT_CONFIG.server.timeoutMs,
    },
    pageSize: pageSize.ok ? pageSize.value : DEFAULT_CONFIG.pageSize,
    debug: debug.ok ? debug.value : DEFAULT_CONFIG.debug,
  };
}

export default {
  loadConfig,
  saveConfig,
  getConfig,
  updateConfig,
  setConfigValue,
  validateServerConfig,
};
