/**
 * Endpoint client for the legacy (V3) protocol.
 *
 * Authenticates with the `cloudreve-session` cookie and addresses every mutation
 * by opaque object identifiers. Methods map one-to-one onto endpoints; path
 * resolution and version unification live in the facade.
 */

import { logger } from '../../logger.js';
import { EndpointClient } from '../base.js';
import { EmptyResponseError } from '../../errors/index.js';
import { decodeEnvelope, parseEnvelope } from '../envelope.js';
import { FetchTransport, type HttpResponse, type HttpTransport } from '../transport.js';
import type {
  V3Aria2Task,
  V3DirectoryList,
  V3DownloadUrl,
  V3FileSource,
  V3Property,
  V3Share,
  V3ShareRequest,
  V3SiteConfig,
  V3SourceItems,
  V3StorageInfo,
  V3UploadRequest,
  V3UploadSession,
  V3User,
  V3WebdavAccount,
} from './types.js';

export const V3_API_PREFIX = '/api/v3';
export const V3_SESSION_COOKIE = 'cloudreve-session';

/**
 * Extract the session cookie value from `Set-Cookie` headers, if present.
 *
 * @example
 * extractSessionCookie(['cloudreve-session=abc; Path=/; HttpOnly']); // 'abc'
 */
export function extractSessionCookie(setCookies: string[]): string | undefined {
  for (const header of setCookies) {
    for (const part of header.split(';')) {
      const trimmed = part.trim();
      if (trimmed.startsWith(`${V3_SESSION_COOKIE}=`)) {
        return trimmed.slice(V3_SESSION_COOKIE.length + 1);
      }
    }
  }
  return undefined;
}

/**
 * Encode a directory path for `GET /directory{path}`: each segment is
 * percent-encoded and the trailing slash is dropped except for the root.
 *
 * @example
 * encodeDirectoryPath('/my docs/'); // '/my%20docs'
 * encodeDirectoryPath('/'); // '/'
 */
export function encodeDirectoryPath(path: string): string {
  const trimmed = path.length > 1 ? path.replace(/\/+$/, '') : path;
  if (trimmed === '' || trimmed === '/') return '/';
  const withSlash = trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
  return withSlash
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/');
}

export class V3Client extends EndpointClient {
  private sessionCookie: string | undefined;

  constructor(baseUrl: string, transport: HttpTransport = new FetchTransport()) {
    super(baseUrl, V3_API_PREFIX, transport);
  }

  protected authHeaders(): Record<string, string> {
    return this.sessionCookie ? { Cookie: `${V3_SESSION_COOKIE}=${this.sessionCookie}` } : {};
  }

  getSessionCookie(): string | undefined {
    return this.sessionCookie;
  }

  setSessionCookie(cookie: string | undefined): void {
    this.sessionCookie = cookie;
  }

  private captureSessionCookie(response: HttpResponse): void {
    const cookie = extractSessionCookie(response.setCookies);
    if (cookie) {
      this.sessionCookie = cookie;
      logger.debug(`Captured V3 session cookie ${cookie.slice(0, 6)}...`);
    }
  }

  // ==========================================================================
  // Site
  // ==========================================================================

  /** Liveness probe; resolves with the server version string */
  async ping(): Promise<string> {
    return this.request<string>('GET', '/site/ping');
  }

  async getSiteConfig(): Promise<V3SiteConfig> {
    return this.request<V3SiteConfig>('GET', '/site/config');
  }

  async getStorage(): Promise<V3StorageInfo> {
    return this.request<V3StorageInfo>('GET', '/user/storage');
  }

  async getUserSettings(): Promise<Record<string, unknown>> {
    return this.request<Record<string, unknown>>('GET', '/user/setting');
  }

  async listTasks(): Promise<V3Aria2Task[]> {
    return this.request<V3Aria2Task[]>('GET', '/user/setting/tasks');
  }

  // ==========================================================================
  // Session
  // ==========================================================================

  /**
   * Password login. Clears any held cookie first, then keeps the cookie the
   * server sets, even when the envelope asks for a second factor.
   */
  async login(userName: string, password: string): Promise<V3User> {
    this.sessionCookie = undefined;
    const response = await this.send('POST', '/user/session', {
      body: { userName, Password: password, captchaCode: '' },
    });
    this.captureSessionCookie(response);
    const envelope = decodeEnvelope<V3User>(response);
    return this.requireData(envelope.data, 'POST /user/session');
  }

  /** Second login step, sent with the cookie from the password step */
  async loginTwoFactor(code: string): Promise<V3User> {
    const response = await this.send('POST', '/user/2fa', { body: { code } });
    this.captureSessionCookie(response);
    const envelope = decodeEnvelope<V3User>(response);
    return this.requireData(envelope.data, 'POST /user/2fa');
  }

  async logout(): Promise<void> {
    await this.execute('DELETE', '/user/session');
    this.sessionCookie = undefined;
  }

  // ==========================================================================
  // Directory
  // ==========================================================================

  async listDirectory(path: string): Promise<V3DirectoryList> {
    return this.request<V3DirectoryList>('GET', `/directory${encodeDirectoryPath(path)}`);
  }

  async createDirectory(path: string): Promise<void> {
    await this.execute('PUT', '/directory', { body: { path } });
  }

  // ==========================================================================
  // Object
  // ==========================================================================

  async rename(src: V3SourceItems, newName: string): Promise<void> {
    await this.execute('POST', '/object/rename', {
      body: { action: 'rename', src, new_name: newName },
    });
  }

  async move(srcDir: string, src: V3SourceItems, dst: string): Promise<void> {
    await this.execute('PATCH', '/object', {
      body: { action: 'move', src_dir: srcDir, src, dst },
    });
  }

  async copy(srcDir: string, src: V3SourceItems, dst: string): Promise<void> {
    await this.execute('POST', '/object/copy', { body: { src_dir: srcDir, src, dst } });
  }

  async deleteObjects(items: string[], dirs: string[]): Promise<void> {
    await this.execute('DELETE', '/object', {
      body: { items, dirs, force: true, unlink: false },
    });
  }

  async getProperty(
    id: string,
    options: { isFolder?: boolean; traceRoot?: boolean } = {}
  ): Promise<V3Property> {
    return this.request<V3Property>('GET', `/object/property/${encodeURIComponent(id)}`, {
      query: { is_folder: options.isFolder, trace_root: options.traceRoot },
    });
  }

  // ==========================================================================
  // File
  // ==========================================================================

  async createUploadSession(request: V3UploadRequest): Promise<V3UploadSession> {
    return this.request<V3UploadSession>('PUT', '/file/upload', { body: request });
  }

  /**
   * Upload one chunk as the raw request body. Some storage backends answer
   * with an empty 2xx body, which counts as success.
   */
  async uploadChunk(sessionId: string, index: number, data: Uint8Array): Promise<void> {
    const response = await this.send(
      'POST',
      `/file/upload/${encodeURIComponent(sessionId)}/${index}`,
      { body: data, headers: { 'Content-Type': 'application/octet-stream' } }
    );
    if (response.status >= 200 && response.status < 300 && response.body.trim() === '') {
      return;
    }
    decodeEnvelope<unknown>(response);
  }

  /** Completion callback some storage backends require after the last chunk */
  async completeUpload(sessionId: string): Promise<void> {
    await this.execute('POST', `/callback/onedrive/finish/${encodeURIComponent(sessionId)}`, {
      body: {},
    });
  }

  async getDownloadUrl(id: string): Promise<V3DownloadUrl> {
    const data = await this.request<V3DownloadUrl | string>(
      'PUT',
      `/file/download/${encodeURIComponent(id)}`,
      { body: {} }
    );
    return typeof data === 'string' ? { url: data } : data;
  }

  async getSourceUrls(ids: string[]): Promise<V3FileSource[]> {
    return this.request<V3FileSource[]>('POST', '/file/source', { body: { items: ids } });
  }

  async getPreview(id: string): Promise<unknown> {
    const envelope = await this.requestEnvelope<unknown>(
      'GET',
      `/file/preview/${encodeURIComponent(id)}`
    );
    return envelope.data;
  }

  async getThumbnail(id: string): Promise<unknown> {
    const envelope = await this.requestEnvelope<unknown>(
      'GET',
      `/file/thumb/${encodeURIComponent(id)}`
    );
    return envelope.data;
  }

  async createFile(path: string): Promise<void> {
    await this.execute('POST', '/file/create', { body: { path } });
  }

  // ==========================================================================
  // Share
  // ==========================================================================

  /**
   * Create a share link. The server answers either with an envelope (whose data
   * is the share URL or a share object) or with a bare URL.
   */
  async createShare(request: V3ShareRequest): Promise<V3Share> {
    const response = await this.send('POST', '/share', { body: request });
    const envelope = parseEnvelope<string | Partial<V3Share>>(response.body);

    if (!envelope) {
      if (response.status < 200 || response.status >= 300) {
        decodeEnvelope<unknown>(response);
      }
      return shareFromUrl(response.body.trim());
    }

    const data = decodeEnvelope<string | Partial<V3Share>>(response).data;
    if (typeof data === 'string') {
      return shareFromUrl(data);
    }
    const key = data?.key ?? '';
    return { key, url: data?.url ?? '' };
  }

  // ==========================================================================
  // WebDAV
  // ==========================================================================

  async listDavAccounts(): Promise<V3WebdavAccount[]> {
    const data = await this.request<{ accounts: V3WebdavAccount[] | null }>(
      'GET',
      '/webdav/accounts'
    );
    return data.accounts ?? [];
  }

  // ==========================================================================
  // Offline download (aria2)
  // ==========================================================================

  async addDownload(dst: string, urls: string[]): Promise<void> {
    await this.execute('POST', '/aria2/url', { body: { dst, url: urls } });
  }

  async listDownloading(): Promise<V3Aria2Task[]> {
    return this.requestList<V3Aria2Task>('/aria2/downloading');
  }

  async listFinished(): Promise<V3Aria2Task[]> {
    return this.requestList<V3Aria2Task>('/aria2/finished');
  }

  async cancelDownload(gid: string): Promise<void> {
    await this.execute('DELETE', `/aria2/task/${encodeURIComponent(gid)}`);
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async requestList<T>(path: string): Promise<T[]> {
    const envelope = await this.requestEnvelope<T[]>('GET', path);
    return envelope.data ?? [];
  }

  private requireData<T>(data: T | null | undefined, endpoint: string): T {
    if (data === undefined || data === null) {
      throw new EmptyResponseError(endpoint);
    }
    return data;
  }
}

/**
 * Build a share record from a share URL; the key is its last path segment.
 *
 * @example
 * shareFromUrl('https://drive.example.com/s/Ab3x'); // { key: 'Ab3x', url: 'https://drive.example.com/s/Ab3x' }
 */
export function shareFromUrl(url: string): V3Share {
  const segments = url.split('/');
  return { key: segments[segments.length - 1] ?? '', url };
}
