/**
 * Protocol version detection.
 *
 * Probes the current protocol first and falls back to the legacy one. A probe
 * succeeds when the ping endpoint answers with a decodable success envelope.
 */

import { logger } from '../logger.js';
import { VersionDetectionError } from '../errors/index.js';
import { getErrorMessage } from '../utils/error.js';
import type { HttpTransport } from '../api/transport.js';
import { V3Client } from '../api/v3/client.js';
import { V4Client } from '../api/v4/client.js';

export type ApiVersion = 'v3' | 'v4';

export const API_VERSIONS: readonly ApiVersion[] = ['v3', 'v4'];

export function isApiVersion(value: string): value is ApiVersion {
  return value === 'v3' || value === 'v4';
}

/**
 * Detect which protocol a server speaks.
 *
 * @throws VersionDetectionError when neither ping endpoint answers
 *
 * @example
 * const version = await detectApiVersion('https://drive.example.com', transport); // 'v4'
 */
export async function detectApiVersion(
  baseUrl: string,
  transport: HttpTransport
): Promise<ApiVersion> {
  let lastError: unknown;

  try {
    const serverVersion = await new V4Client(baseUrl, transport).ping();
    logger.debug(`Detected v4 API at ${baseUrl} (server ${serverVersion})`);
    return 'v4';
  } catch (error) {
    logger.debug(`v4 probe failed: ${getErrorMessage(error)}`);
    lastError = error;
  }

  try {
    const serverVersion = await new V3Client(baseUrl, transport).ping();
    logger.debug(`Detected v3 API at ${baseUrl} (server ${serverVersion})`);
    return 'v3';
  } catch (error) {
    logger.debug(`v3 probe failed: ${getErrorMessage(error)}`);
    lastError = error;
  }

  throw new VersionDetectionError(baseUrl, lastError);
}
