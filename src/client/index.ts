/**
 * Library entry point.
 *
 * @example
 * import { CloudreveClient } from 'cloudreve-cli';
 *
 * const client = await CloudreveClient.connect('https://drive.example.com');
 * await client.login('user@example.com', 'test-password');
 * for (const entry of (await client.listFilesAll('/')).entries) {
 *   console.log(entry.isFolder ? `${entry.name}/` : entry.name);
 * }
 */

export {
  CloudreveClient,
  DEFAULT_PAGE_SIZE,
  DEFAULT_SHARE_PERMISSIONS,
  shareIdFromUrl,
  type ActiveApi,
  type ClientOptions,
  type DavAccountInput,
  type ExtractOptions,
  type ListOptions,
  type ShareOptions,
} from './CloudreveClient.js';
export { detectApiVersion, isApiVersion, API_VERSIONS, type ApiVersion } from './detector.js';
export * from './models.js';

export { V3Client } from '../api/v3/client.js';
export { V4Client } from '../api/v4/client.js';
export { FetchTransport } from '../api/transport.js';
export type { HttpMethod, HttpRequest, HttpResponse, HttpTransport } from '../api/transport.js';
export { pathToUri, uriToPath, MY_SPACE_PREFIX } from '../api/v4/uri.js';
export * from '../errors/index.js';
export type { Result } from '../utils/result.js';
