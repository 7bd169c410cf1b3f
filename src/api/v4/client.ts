/**
 * Endpoint client for the current (V4) protocol.
 *
 * Authenticates with a bearer access token and addresses files by resource URI.
 * Every method that takes a `uri` also accepts a plain path; it is normalized
 * with `pathToUri` before it goes on the wire.
 */

import { NotAuthenticatedError } from '../../errors/index.js';
import { logger } from '../../logger.js';
import { EndpointClient } from '../base.js';
import { decodeEnvelope } from '../envelope.js';
import { FetchTransport, type HttpTransport } from '../transport.js';
import type {
  TaskCategory,
  V4ArchiveEntry,
  V4Capacity,
  V4DavAccount,
  V4DavAccountList,
  V4DavAccountRequest,
  V4DeleteFilesRequest,
  V4DownloadUrlRequest,
  V4DownloadUrls,
  V4ExtractRequest,
  V4File,
  V4FileInfo,
  V4ListFilesRequest,
  V4ListResponse,
  V4LoginData,
  V4LoginPreparation,
  V4ShareLink,
  V4ShareListResponse,
  V4ShareRequest,
  V4Task,
  V4TaskList,
  V4TaskProgress,
  V4Thumbnail,
  V4Token,
  V4UploadRequest,
  V4UploadSession,
  V4User,
} from './types.js';
import { pathToUri } from './uri.js';

export const V4_API_PREFIX = '/api/v4';

export interface ShareListOptions {
  pageSize?: number;
  orderBy?: string;
  orderDirection?: 'asc' | 'desc';
  nextPageToken?: string;
}

export class V4Client extends EndpointClient {
  private accessToken: string | undefined;
  private refreshTokenValue: string | undefined;

  constructor(baseUrl: string, transport: HttpTransport = new FetchTransport()) {
    super(baseUrl, V4_API_PREFIX, transport);
  }

  protected authHeaders(): Record<string, string> {
    return this.accessToken ? { Authorization: `Bearer ${this.accessToken}` } : {};
  }

  getToken(): string | undefined {
    return this.accessToken;
  }

  getRefreshToken(): string | undefined {
    return this.refreshTokenValue;
  }

  setToken(accessToken: string | undefined, refreshToken?: string): void {
    this.accessToken = accessToken;
    if (refreshToken !== undefined) {
      this.refreshTokenValue = refreshToken;
    }
  }

  private storeToken(token: V4Token): void {
    this.accessToken = token.access_token;
    this.refreshTokenValue = token.refresh_token;
  }

  // ==========================================================================
  // Site
  // ==========================================================================

  /** Liveness probe; resolves with the server version string */
  async ping(): Promise<string> {
    return this.request<string>('GET', '/site/ping');
  }

  async getSiteConfig(section: string = 'basic'): Promise<Record<string, unknown>> {
    return this.request<Record<string, unknown>>(
      'GET',
      `/site/config/${encodeURIComponent(section)}`
    );
  }

  // ==========================================================================
  // Session
  // ==========================================================================

  async prepareLogin(email: string): Promise<V4LoginPreparation> {
    return this.request<V4LoginPreparation>('GET', '/session/prepare', { query: { email } });
  }

  /** Password login; keeps the returned tokens for later calls */
  async login(email: string, password: string): Promise<V4LoginData> {
    const data = await this.request<V4LoginData>('POST', '/session/token', {
      body: { email, password },
    });
    this.storeToken(data.token);
    return data;
  }

  async loginTwoFactor(
    email: string,
    password: string,
    code: string,
    ticket?: string
  ): Promise<V4LoginData> {
    const data = await this.request<V4LoginData>('POST', '/session/token/2fa', {
      body: { email, password, code, ticket },
    });
    this.storeToken(data.token);
    return data;
  }

  /**
   * Exchange the held refresh token for a new token pair.
   *
   * @throws NotAuthenticatedError when no refresh token is held
   */
  async refreshToken(): Promise<V4Token> {
    if (!this.refreshTokenValue) {
      throw new NotAuthenticatedError('No refresh token available');
    }
    const token = await this.request<V4Token>('POST', '/session/token/refresh', {
      body: { refresh_token: this.refreshTokenValue },
    });
    this.storeToken(token);
    logger.debug('Refreshed V4 access token');
    return token;
  }

  async logout(): Promise<void> {
    await this.execute('DELETE', '/session/token');
    this.accessToken = undefined;
    this.refreshTokenValue = undefined;
  }

  // ==========================================================================
  // Files
  // ==========================================================================

  async listFiles(request: V4ListFilesRequest): Promise<V4ListResponse> {
    return this.request<V4ListResponse>('GET', '/file', {
      query: {
        uri: pathToUri(request.uri),
        page: request.page,
        page_size: request.page_size,
        order_by: request.order_by,
        order_direction: request.order_direction,
        next_page_token: request.next_page_token,
      },
    });
  }

  async getFileInfo(uri: string, extended: boolean = false): Promise<V4FileInfo> {
    return this.request<V4FileInfo>('GET', '/file/info', {
      query: { uri: pathToUri(uri), extended: extended || undefined },
    });
  }

  async createFile(uri: string, type: 'file' | 'folder'): Promise<V4File> {
    return this.request<V4File>('POST', '/file/create', {
      body: { uri: pathToUri(uri), type },
    });
  }

  async deleteFiles(request: V4DeleteFilesRequest): Promise<void> {
    await this.execute('DELETE', '/file', {
      body: { ...request, uris: request.uris.map(pathToUri) },
    });
  }

  /**
   * Move (or with `copy`, copy) entries into the destination directory,
   * keeping their names.
   */
  async moveFiles(uris: string[], dst: string, copy: boolean = false): Promise<void> {
    await this.execute('POST', '/file/move', {
      body: { uris: uris.map(pathToUri), dst: pathToUri(dst), copy: copy || undefined },
    });
  }

  async renameFile(uri: string, newName: string): Promise<void> {
    await this.execute('POST', '/file/rename', {
      body: { uri: pathToUri(uri), new_name: newName },
    });
  }

  async createUploadSession(request: V4UploadRequest): Promise<V4UploadSession> {
    return this.request<V4UploadSession>('PUT', '/file/upload', {
      body: { ...request, uri: pathToUri(request.uri) },
    });
  }

  async uploadChunk(sessionId: string, index: number, data: Uint8Array): Promise<void> {
    const response = await this.send(
      'POST',
      `/file/upload/${encodeURIComponent(sessionId)}/${index}`,
      { body: data, headers: { 'Content-Type': 'application/octet-stream' } }
    );
    decodeEnvelope<unknown>(response);
  }

  async deleteUploadSession(sessionId: string, uri: string): Promise<void> {
    await this.execute('DELETE', '/file/upload', {
      body: { id: sessionId, uri: pathToUri(uri) },
    });
  }

  async createDownloadUrls(request: V4DownloadUrlRequest): Promise<V4DownloadUrls> {
    return this.request<V4DownloadUrls>('POST', '/file/url', {
      body: { ...request, uris: request.uris.map(pathToUri) },
    });
  }

  async restore(uris: string[]): Promise<void> {
    await this.execute('POST', '/file/restore', { body: { uris: uris.map(pathToUri) } });
  }

  async getThumbnail(uri: string): Promise<V4Thumbnail> {
    return this.request<V4Thumbnail>('GET', '/file/thumb', { query: { uri: pathToUri(uri) } });
  }

  async listArchive(uri: string): Promise<V4ArchiveEntry[]> {
    const data = await this.request<{ files: V4ArchiveEntry[] | null }>('GET', '/file/archive', {
      query: { uri: pathToUri(uri) },
    });
    return data.files ?? [];
  }

  // ==========================================================================
  // Shares
  // ==========================================================================

  /** Resolves with the share URL */
  async createShareLink(request: V4ShareRequest): Promise<string> {
    return this.request<string>('PUT', '/share', {
      body: { ...request, uri: pathToUri(request.uri) },
    });
  }

  async listShareLinks(options: ShareListOptions = {}): Promise<V4ShareListResponse> {
    return this.request<V4ShareListResponse>('GET', '/share', {
      query: {
        page_size: options.pageSize ?? 50,
        order_by: options.orderBy,
        order_direction: options.orderDirection,
        next_page_token: options.nextPageToken,
      },
    });
  }

  /** Resolves with the share URL */
  async editShareLink(id: string, request: V4ShareRequest): Promise<string> {
    return this.request<string>('POST', `/share/${encodeURIComponent(id)}`, {
      body: { ...request, uri: pathToUri(request.uri) },
    });
  }

  async deleteShareLink(id: string): Promise<void> {
    await this.execute('DELETE', `/share/${encodeURIComponent(id)}`);
  }

  async getShareInfo(id: string, password?: string): Promise<V4ShareLink> {
    return this.request<V4ShareLink>('GET', `/share/info/${encodeURIComponent(id)}`, {
      query: { password },
    });
  }

  // ==========================================================================
  // WebDAV accounts
  // ==========================================================================

  async listDavAccounts(pageSize: number, nextPageToken?: string): Promise<V4DavAccountList> {
    return this.request<V4DavAccountList>('GET', '/devices/dav', {
      query: { page_size: pageSize, next_page_token: nextPageToken },
    });
  }

  async createDavAccount(request: V4DavAccountRequest): Promise<V4DavAccount> {
    return this.request<V4DavAccount>('PUT', '/devices/dav', {
      body: { ...request, uri: pathToUri(request.uri) },
    });
  }

  async updateDavAccount(id: string, request: V4DavAccountRequest): Promise<V4DavAccount> {
    return this.request<V4DavAccount>('PATCH', `/devices/dav/${encodeURIComponent(id)}`, {
      body: { ...request, uri: pathToUri(request.uri) },
    });
  }

  async deleteDavAccount(id: string): Promise<void> {
    await this.execute('DELETE', `/devices/dav/${encodeURIComponent(id)}`);
  }

  // ==========================================================================
  // User
  // ==========================================================================

  async getCapacity(): Promise<V4Capacity> {
    return this.request<V4Capacity>('GET', '/user/capacity');
  }

  async getSettings(): Promise<Record<string, unknown>> {
    return this.request<Record<string, unknown>>('GET', '/user/setting');
  }

  async getUserInfo(id: string): Promise<V4User> {
    return this.request<V4User>('GET', `/user/info/${encodeURIComponent(id)}`);
  }

  // ==========================================================================
  // Workflow
  // ==========================================================================

  async createRemoteDownload(
    dst: string,
    src: string[],
    preferredNodeId?: string
  ): Promise<V4Task[]> {
    return this.request<V4Task[]>('POST', '/workflow/download', {
      body: { dst: pathToUri(dst), src, preferred_node_id: preferredNodeId },
    });
  }

  async selectDownloadFiles(
    taskId: string,
    files: { index: number; download: boolean }[]
  ): Promise<void> {
    await this.execute('PATCH', `/workflow/download/${encodeURIComponent(taskId)}`, {
      body: { files },
    });
  }

  async cancelRemoteDownload(taskId: string): Promise<void> {
    await this.execute('DELETE', `/workflow/download/${encodeURIComponent(taskId)}`);
  }

  async listTasks(
    category: TaskCategory,
    pageSize: number = 50,
    nextPageToken?: string
  ): Promise<V4TaskList> {
    return this.request<V4TaskList>('GET', '/workflow', {
      query: { page_size: pageSize, category, next_page_token: nextPageToken },
    });
  }

  async getTaskProgress(taskId: string): Promise<V4TaskProgress> {
    return this.request<V4TaskProgress>('GET', `/workflow/progress/${encodeURIComponent(taskId)}`);
  }

  async createArchive(src: string[], dst: string): Promise<V4Task> {
    return this.request<V4Task>('POST', '/workflow/archive', {
      body: { src: src.map(pathToUri), dst: pathToUri(dst) },
    });
  }

  async extractArchive(request: V4ExtractRequest): Promise<V4Task> {
    return this.request<V4Task>('POST', '/workflow/extract', {
      body: { ...request, src: request.src.map(pathToUri), dst: pathToUri(request.dst) },
    });
  }

  async relocate(src: string[], dstPolicyId: string): Promise<V4Task> {
    return this.request<V4Task>('POST', '/workflow/relocate', {
      body: { src: src.map(pathToUri), dst_policy_id: dstPolicyId },
    });
  }
}
