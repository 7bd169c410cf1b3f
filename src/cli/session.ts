/**
 * Cloudreve CLI - Shared command plumbing
 *
 * Resolves the target server from options and config, restores the cached
 * session into a client, and turns failures into an error line plus a
 * non-zero exit code.
 */

import { Command, InvalidArgumentError as CommanderArgumentError } from 'commander';
import { getConfig } from '../config.js';
import { getStoredSession, type StoredSession } from '../credentials.js';
import { isDebugMode, logger } from '../logger.js';
import { CloudreveClient } from '../client/CloudreveClient.js';
import type { ApiVersion } from '../client/detector.js';
import { InvalidConfigError, NotAuthenticatedError } from '../errors/index.js';
import { toAppError } from '../utils/error.js';
import { unwrap } from '../utils/result.js';
import { validateApiVersion, validateBaseUrl, validatePositiveInt } from '../validation/config.js';

// ============================================================================
// Types
// ============================================================================

export interface GlobalOptions {
  debug?: boolean;
  server?: string;
  api?: string;
  json?: boolean;
}

export interface ConnectOptions {
  /** Put the cached session into the client (default: true) */
  restore?: boolean;
  /** Fail with NotAuthenticatedError when no session is cached (default: true) */
  requireSession?: boolean;
}

export interface ConnectedClient {
  client: CloudreveClient;
  session: StoredSession | null;
}

// ============================================================================
// Option Helpers
// ============================================================================

export function getGlobalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

/**
 * Commander argument parser for positive integers
 */
export function parsePositiveInt(value: string): number {
  const result = validatePositiveInt(value, 'value');
  if (!result.ok) {
    throw new CommanderArgumentError('Must be a positive integer.');
  }
  return result.value;
}

/**
 * Server from `--server`, falling back to the config file
 */
export function resolveBaseUrl(options: GlobalOptions): string {
  const raw = options.server ?? getConfig().server.baseUrl;
  if (!raw) {
    throw new InvalidConfigError(
      'server.baseUrl',
      'No server configured. Pass --server <url> or run "cloudreve-cli config set server.baseUrl <url>".'
    );
  }
  return unwrap(validateBaseUrl(raw));
}

/**
 * Protocol from `--api`, then the config file, then the cached session.
 * Undefined means "probe the server".
 */
function resolveVersion(
  options: GlobalOptions,
  session: StoredSession | null
): ApiVersion | undefined {
  const setting = unwrap(validateApiVersion(options.api ?? getConfig().server.apiVersion));
  if (setting !== 'auto') return setting;
  return session?.apiVersion;
}

// ============================================================================
// Client Construction
// ============================================================================

export async function connect(
  options: GlobalOptions,
  connectOptions: ConnectOptions = {}
): Promise<ConnectedClient> {
  const { restore = true, requireSession = true } = connectOptions;
  const baseUrl = resolveBaseUrl(options);
  const session = await getStoredSession(baseUrl);

  if (requireSession && !session) {
    throw new NotAuthenticatedError(
      `Not logged in to ${baseUrl}. Run "cloudreve-cli login" first.`
    );
  }

  const client = await CloudreveClient.connect(baseUrl, {
    version: resolveVersion(options, session),
    timeoutMs: getConfig().server.timeoutMs,
  });

  if (restore && session) {
    if (session.apiVersion !== client.version) {
      logger.warn(
        `Cached session is for the ${session.apiVersion} API but the server speaks ${client.version}; log in again.`
      );
    } else {
      client.setToken(session.token, session.refreshToken, session.userId);
    }
  }

  return { client, session };
}

// ============================================================================
// Output
// ============================================================================

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Print JSON under `--json`, otherwise run the human renderer
 */
export function output(options: GlobalOptions, value: unknown, render: () => void): void {
  if (options.json) {
    printJson(value);
  } else {
    render();
  }
}

/**
 * Format a byte count with binary units.
 *
 * @example
 * formatBytes(0); // '0 B'
 * formatBytes(1536); // '1.5 KiB'
 * formatBytes(10 * 1024 ** 3); // '10.0 GiB'
 */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}

// ============================================================================
// Error Handling
// ============================================================================

/**
 * Run a command body; failures print one line and set a non-zero exit code
 */
export async function runAction(label: string, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    const appError = toAppError(error);
    console.error(`✗ ${label} failed: ${appError.getPublicMessage()}`);
    logger.error(`${label} failed: [${appError.code}] ${appError.message}`);
    if (isDebugMode() && appError.stack) {
      console.error(appError.stack);
    }
    process.exitCode = 1;
  }
}
