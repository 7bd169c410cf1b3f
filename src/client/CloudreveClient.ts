/**
 * Version-agnostic client facade.
 *
 * Exposes one path-addressed API over whichever endpoint client the server
 * speaks. Legacy (v3) mutations resolve paths to object ids by listing the
 * parent directory on every call; current (v4) calls take paths directly and
 * the endpoint client turns them into resource URIs.
 */

import { randomUUID } from 'crypto';
import { logger } from '../logger.js';
import {
  ApiError,
  AppError,
  EmptyResponseError,
  InvalidArgumentError,
  NotAuthenticatedError,
  NotFoundError,
  TwoFactorRequiredError,
  UnsupportedOperationError,
} from '../errors/index.js';
import { TWO_FACTOR_REQUIRED_CODE } from '../api/envelope.js';
import { FetchTransport, type HttpTransport } from '../api/transport.js';
import { V3Client } from '../api/v3/client.js';
import { V3_FOLDER_TYPE, type V3Object, type V3SiteConfig, type V3SourceItems } from '../api/v3/types.js';
import { V4Client } from '../api/v4/client.js';
import type {
  TaskCategory,
  V4DavAccount,
  V4ListResponse,
  V4PermissionSetting,
  V4ShareRequest,
  V4Task,
} from '../api/v4/types.js';
import { isValidUri, uriToPath } from '../api/v4/uri.js';
import { toAppError } from '../utils/error.js';
import { andThen, err, fromPromise, ok, unwrap, type Result } from '../utils/result.js';
import { validateEmail, validatePassword, validateTotpCode } from '../validation/auth.js';
import {
  getFilename,
  isRootPath,
  joinPath,
  splitPath,
  validateFilename,
  validatePathSafety,
} from '../validation/path.js';
import { detectApiVersion, type ApiVersion } from './detector.js';
import {
  davAccountFlags,
  fromV3DavAccount,
  fromV3DirectoryList,
  fromV3Property,
  fromV3Share,
  fromV3Storage,
  fromV3Task,
  fromV3User,
  fromV4Capacity,
  fromV4DavAccount,
  fromV4File,
  fromV4FileInfo,
  fromV4ListResponse,
  fromV4ShareLink,
  fromV4Task,
  fromV4User,
  type DavAccount,
  type DeleteResult,
  type FileEntry,
  type FileInfo,
  type FileList,
  type LoginResponse,
  type ShareItem,
  type StorageQuota,
  type TaskRecord,
  type TokenInfo,
  type UserInfo,
} from './models.js';

// ============================================================================
// Types
// ============================================================================

export interface ClientOptions {
  /** Skip detection and talk this protocol */
  version?: ApiVersion;
  transport?: HttpTransport;
  /** Per-request timeout of the default transport */
  timeoutMs?: number;
  /** Source of unique names for the temporary folder of an emulated copy */
  generateId?: () => string;
}

export interface ListOptions {
  /** 1-based page number (default: 1) */
  page?: number;
  pageSize?: number;
}

export interface ShareOptions {
  /** Lifetime in seconds */
  expires?: number;
  password?: string;
}

export interface DavAccountInput {
  name: string;
  /** Folder the account exposes */
  root: string;
  readonly?: boolean;
  proxy?: boolean;
}

export interface ExtractOptions {
  encoding?: string;
  password?: string;
}

/** Endpoint client the facade dispatches to */
export type ActiveApi = { version: 'v3'; client: V3Client } | { version: 'v4'; client: V4Client };

interface PendingLogin {
  account: string;
  password: string;
}

export const DEFAULT_PAGE_SIZE = 100;
const DAV_PAGE_SIZE = 100;
const SHARE_PAGE_SIZE = 50;
const TASK_PAGE_SIZE = 50;
const NOT_FOUND_SAMPLE_SIZE = 10;
const TEMP_DIR_PREFIX = '.cloudreve-copy-';
const ALL_TASK_CATEGORIES: TaskCategory[] = ['general', 'downloading', 'downloaded'];

/** Public read access for anyone holding the link */
export const DEFAULT_SHARE_PERMISSIONS: V4PermissionSetting = {
  user_explicit: {},
  group_explicit: {},
  same_group: 'read',
  other: 'read',
  anonymous: 'read',
  everyone: 'read',
};

/**
 * Share id of a V4 share URL: the segment after `/s/`, or the last segment.
 *
 * @example
 * shareIdFromUrl('https://drive.example.com/s/Ab3x/secret'); // 'Ab3x'
 */
export function shareIdFromUrl(url: string): string {
  const match = /\/s\/([^/?#]+)/.exec(url);
  if (match?.[1]) return match[1];
  const segments = url.split('/');
  return segments[segments.length - 1] ?? '';
}

function v3SourceItems(object: V3Object): V3SourceItems {
  return object.type === V3_FOLDER_TYPE
    ? { dirs: [object.id], items: [] }
    : { dirs: [], items: [object.id] };
}

// ============================================================================
// Client
// ============================================================================

export class CloudreveClient {
  private pendingLogin: PendingLogin | undefined;
  private currentUser: UserInfo | undefined;
  /** Id of the user a restored current-protocol token belongs to */
  private sessionUserId: string | undefined;

  private constructor(
    private readonly api: ActiveApi,
    private readonly generateId: () => string
  ) {}

  /**
   * Connect to a server, detecting its protocol unless `options.version` is set.
   *
   * @throws VersionDetectionError when neither protocol answers
   *
   * @example
   * const client = await CloudreveClient.connect('https://drive.example.com');
   * await client.login('user@example.com', 'test-password');
   * const listing = await client.listFiles('/docs');
   */
  static async connect(baseUrl: string, options: ClientOptions = {}): Promise<CloudreveClient> {
    const normalized = baseUrl.replace(/\/+$/, '');
    const transport = options.transport ?? new FetchTransport({ timeoutMs: options.timeoutMs });
    const version = options.version ?? (await detectApiVersion(normalized, transport));
    return CloudreveClient.withVersion(normalized, version, { ...options, transport });
  }

  /** Build a client for a known protocol without probing the server */
  static withVersion(
    baseUrl: string,
    version: ApiVersion,
    options: Omit<ClientOptions, 'version'> = {}
  ): CloudreveClient {
    const transport = options.transport ?? new FetchTransport({ timeoutMs: options.timeoutMs });
    const api: ActiveApi =
      version === 'v3'
        ? { version, client: new V3Client(baseUrl, transport) }
        : { version, client: new V4Client(baseUrl, transport) };
    logger.debug(`Using ${version} API at ${api.client.baseUrl}`);
    return new CloudreveClient(api, options.generateId ?? randomUUID);
  }

  get version(): ApiVersion {
    return this.api.version;
  }

  get baseUrl(): string {
    return this.api.client.baseUrl;
  }

  /** Endpoint client behind the facade, for endpoints it does not wrap */
  get endpoint(): ActiveApi {
    return this.api;
  }

  // ==========================================================================
  // Session
  // ==========================================================================

  /**
   * Password login.
   *
   * @throws TwoFactorRequiredError when the account needs a one-time code;
   *   finish with {@link loginTwoFactor}
   */
  async login(account: string, password: string): Promise<LoginResponse> {
    unwrap(validatePassword(password));
    logger.debug(`Logging in as ${account} (${this.version})`);
    this.pendingLogin = undefined;

    try {
      const response = await this.passwordLogin(account, password);
      this.currentUser = response.user;
      return response;
    } catch (error) {
      if (error instanceof ApiError && error.apiCode === TWO_FACTOR_REQUIRED_CODE) {
        this.pendingLogin = { account, password };
        throw new TwoFactorRequiredError(account);
      }
      throw error;
    }
  }

  private async passwordLogin(account: string, password: string): Promise<LoginResponse> {
    const api = this.api;
    switch (api.version) {
      case 'v3': {
        const user = await api.client.login(account, password);
        return { version: 'v3', user: fromV3User(user) };
      }
      case 'v4': {
        const email = unwrap(validateEmail(account));
        const data = await api.client.login(email, password);
        return { version: 'v4', user: fromV4User(data.user), token: data.token };
      }
    }
  }

  /**
   * Complete a login that raised TwoFactorRequiredError.
   *
   * @throws NotAuthenticatedError when no login is waiting for a code
   */
  async loginTwoFactor(code: string): Promise<LoginResponse> {
    const pending = this.pendingLogin;
    if (!pending) {
      throw new NotAuthenticatedError('No login is waiting for a one-time code');
    }
    const otp = unwrap(validateTotpCode(code));

    const response = await this.secondFactorLogin(pending, otp);
    this.pendingLogin = undefined;
    this.currentUser = response.user;
    return response;
  }

  private async secondFactorLogin(pending: PendingLogin, otp: string): Promise<LoginResponse> {
    const api = this.api;
    switch (api.version) {
      case 'v3': {
        const user = await api.client.loginTwoFactor(otp);
        return { version: 'v3', user: fromV3User(user) };
      }
      case 'v4': {
        const data = await api.client.loginTwoFactor(pending.account, pending.password, otp);
        return { version: 'v4', user: fromV4User(data.user), token: data.token };
      }
    }
  }

  /** Whether a password login is waiting for its one-time code */
  isTwoFactorPending(): boolean {
    return this.pendingLogin !== undefined;
  }

  async logout(): Promise<void> {
    if (this.getToken()) {
      await this.api.client.logout();
    }
    this.currentUser = undefined;
    this.sessionUserId = undefined;
    this.pendingLogin = undefined;
  }

  /** Held credential, or undefined before login */
  getToken(): TokenInfo | undefined {
    const api = this.api;
    switch (api.version) {
      case 'v3': {
        const cookie = api.client.getSessionCookie();
        return cookie ? { version: 'v3', token: cookie } : undefined;
      }
      case 'v4': {
        const token = api.client.getToken();
        return token
          ? { version: 'v4', token, refreshToken: api.client.getRefreshToken() }
          : undefined;
      }
    }
  }

  /**
   * Restore a credential saved from {@link getToken}. The legacy protocol
   * ignores the refresh token and the user id; on the current protocol the
   * user id lets {@link getUserInfo} look the user up again.
   */
  setToken(token: string, refreshToken?: string, userId?: string): void {
    const api = this.api;
    this.currentUser = undefined;
    switch (api.version) {
      case 'v3':
        api.client.setSessionCookie(token);
        break;
      case 'v4':
        api.client.setToken(token, refreshToken);
        this.sessionUserId = userId;
        break;
    }
  }

  async refreshToken(): Promise<TokenInfo> {
    const api = this.api;
    if (api.version === 'v3') {
      throw new UnsupportedOperationError('refresh token', api.version);
    }
    const token = await api.client.refreshToken();
    return { version: 'v4', token: token.access_token, refreshToken: token.refresh_token };
  }

  // ==========================================================================
  // Site
  // ==========================================================================

  async getServerVersion(): Promise<string> {
    return this.api.client.ping();
  }

  /**
   * @param section - Config section of the current protocol (default: 'basic');
   *   the legacy protocol has a single config document
   */
  async getSiteConfig(section?: string): Promise<V3SiteConfig | Record<string, unknown>> {
    const api = this.api;
    switch (api.version) {
      case 'v3':
        return api.client.getSiteConfig();
      case 'v4':
        return api.client.getSiteConfig(section);
    }
  }

  // ==========================================================================
  // Listing
  // ==========================================================================

  /**
   * List one page of a directory. The legacy protocol has no pagination and
   * always returns the full listing.
   */
  async listFiles(path: string, options: ListOptions = {}): Promise<FileList> {
    const dir = this.checkedPath(path);
    logger.debug(`Listing ${dir}`);

    const api = this.api;
    switch (api.version) {
      case 'v3':
        return fromV3DirectoryList(dir, await api.client.listDirectory(dir));
      case 'v4':
        return this.listV4Page(
          api.client,
          dir,
          options.page ?? 1,
          options.pageSize ?? DEFAULT_PAGE_SIZE
        );
    }
  }

  /**
   * Cursor pagination has no random access: page N replays N requests, each
   * carrying the previous page's token. Offset pagination asks for page N directly.
   */
  private async listV4Page(
    client: V4Client,
    dir: string,
    page: number,
    pageSize: number
  ): Promise<FileList> {
    const first = await client.listFiles({ uri: dir, page_size: pageSize });
    if (page <= 1) {
      return fromV4ListResponse(dir, first);
    }

    if (!first.pagination.is_cursor) {
      return fromV4ListResponse(dir, await client.listFiles({ uri: dir, page, page_size: pageSize }));
    }

    let current = first;
    for (let index = 2; index <= page; index++) {
      const token = current.pagination.next_token;
      if (!token) {
        // past the last page
        return fromV4ListResponse(dir, current, []);
      }
      current = await client.listFiles({ uri: dir, page_size: pageSize, next_page_token: token });
    }
    return fromV4ListResponse(dir, current);
  }

  /**
   * List a whole directory, following the pagination chain to its end. Parent
   * and storage policy come from the first page.
   */
  async listFilesAll(path: string, pageSize: number = DEFAULT_PAGE_SIZE): Promise<FileList> {
    const api = this.api;
    if (api.version === 'v3') {
      return this.listFiles(path);
    }

    const dir = this.checkedPath(path);
    logger.debug(`Listing all of ${dir}`);
    const client = api.client;

    const first = await client.listFiles({ uri: dir, page_size: pageSize });
    const entries: FileEntry[] = (first.files ?? []).map(fromV4File);
    const totalItems = first.pagination.total_items;

    let current = first;
    for (;;) {
      const next = await this.nextV4Page(client, dir, current, pageSize, entries.length, totalItems);
      if (!next) break;
      entries.push(...(next.files ?? []).map(fromV4File));
      current = next;
    }

    logger.debug(`Listed ${entries.length} entries in ${dir}`);
    return fromV4ListResponse(dir, first, entries);
  }

  private async nextV4Page(
    client: V4Client,
    dir: string,
    current: V4ListResponse,
    pageSize: number,
    collected: number,
    totalItems: number | undefined
  ): Promise<V4ListResponse | undefined> {
    const { pagination } = current;

    if (pagination.is_cursor) {
      if (!pagination.next_token) return undefined;
      return client.listFiles({
        uri: dir,
        page_size: pageSize,
        next_page_token: pagination.next_token,
      });
    }

    const received = (current.files ?? []).length;
    if (received === 0) return undefined;
    if (totalItems !== undefined ? collected >= totalItems : received < pageSize) {
      return undefined;
    }
    return client.listFiles({ uri: dir, page: pagination.page + 1, page_size: pageSize });
  }

  // ==========================================================================
  // Files
  // ==========================================================================

  async createDirectory(path: string): Promise<void> {
    const dir = this.mutablePath(path, 'create');
    logger.debug(`Creating directory ${dir}`);

    const api = this.api;
    switch (api.version) {
      case 'v3':
        await api.client.createDirectory(dir);
        break;
      case 'v4':
        await api.client.createFile(dir, 'folder');
        break;
    }
  }

  async delete(path: string): Promise<void> {
    const target = this.mutablePath(path, 'delete');
    logger.debug(`Deleting ${target}`);

    const api = this.api;
    switch (api.version) {
      case 'v3': {
        const { dirs, items } = v3SourceItems(await this.resolveV3(api.client, target));
        await api.client.deleteObjects(items, dirs);
        break;
      }
      case 'v4':
        await api.client.deleteFiles({ uris: [target] });
        break;
    }
  }

  /**
   * Delete several paths, reporting per-path failures instead of stopping at
   * the first one.
   */
  async batchDelete(paths: string[]): Promise<DeleteResult> {
    const result: DeleteResult = { deleted: 0, failed: 0, errors: [] };
    const fail = (path: string, message: string): void => {
      result.failed++;
      result.errors.push([path, message]);
    };

    const targets: string[] = [];
    for (const path of paths) {
      const checked = this.checkMutablePath(path, 'delete');
      if (checked.ok) targets.push(checked.value);
      else fail(path, checked.error.message);
    }
    logger.debug(`Batch deleting ${targets.length} paths`);

    const api = this.api;
    switch (api.version) {
      case 'v3':
        await this.batchDeleteV3(api.client, targets, result, fail);
        break;
      case 'v4':
        await this.batchDeleteV4(api.client, targets, result, fail);
        break;
    }

    logger.debug(`Batch delete: ${result.deleted} deleted, ${result.failed} failed`);
    return result;
  }

  /** One listing and one delete call per parent directory */
  private async batchDeleteV3(
    client: V3Client,
    targets: string[],
    result: DeleteResult,
    fail: (path: string, message: string) => void
  ): Promise<void> {
    const groups = new Map<string, string[]>();
    for (const target of targets) {
      const { parent } = splitPath(target);
      groups.set(parent, [...(groups.get(parent) ?? []), target]);
    }

    for (const [parent, members] of groups) {
      const listing = await fromPromise(() => client.listDirectory(parent), toAppError);
      if (!listing.ok) {
        for (const member of members) fail(member, listing.error.message);
        continue;
      }

      const objects = listing.value.objects ?? [];
      const items: string[] = [];
      const dirs: string[] = [];
      const resolved: string[] = [];
      for (const member of members) {
        const name = getFilename(member);
        const object = objects.find((candidate) => candidate.name === name);
        if (!object) {
          fail(member, new NotFoundError(member).message);
          continue;
        }
        if (object.type === V3_FOLDER_TYPE) dirs.push(object.id);
        else items.push(object.id);
        resolved.push(member);
      }

      if (resolved.length === 0) continue;
      const outcome = await fromPromise(() => client.deleteObjects(items, dirs), toAppError);
      if (outcome.ok) {
        result.deleted += resolved.length;
      } else {
        for (const member of resolved) fail(member, outcome.error.message);
      }
    }
  }

  /** One call for everything; on failure, retry path by path to attribute errors */
  private async batchDeleteV4(
    client: V4Client,
    targets: string[],
    result: DeleteResult,
    fail: (path: string, message: string) => void
  ): Promise<void> {
    if (targets.length === 0) return;

    const outcome = await fromPromise(() => client.deleteFiles({ uris: targets }), toAppError);
    if (outcome.ok) {
      result.deleted += targets.length;
      return;
    }

    logger.warn(`Batch delete failed (${outcome.error.message}), deleting one by one`);
    for (const target of targets) {
      const single = await fromPromise(() => client.deleteFiles({ uris: [target] }), toAppError);
      if (single.ok) result.deleted++;
      else fail(target, single.error.message);
    }
  }

  async getFileInfo(path: string): Promise<FileInfo> {
    const target = this.checkedPath(path);
    logger.debug(`Fetching info of ${target}`);

    const api = this.api;
    switch (api.version) {
      case 'v3': {
        if (isRootPath(target)) {
          const listing = await api.client.listDirectory(target);
          const property = await api.client.getProperty(listing.parent, { isFolder: true });
          return fromV3Property(target, property);
        }
        const object = await this.resolveV3(api.client, target);
        const property = await api.client.getProperty(object.id, {
          isFolder: object.type === V3_FOLDER_TYPE,
        });
        return fromV3Property(target, property, object);
      }
      case 'v4':
        return fromV4FileInfo(await api.client.getFileInfo(target, true));
    }
  }

  async rename(path: string, newName: string): Promise<void> {
    const target = this.mutablePath(path, 'rename');
    const name = unwrap(validateFilename(newName));
    logger.debug(`Renaming ${target} to ${name}`);

    const api = this.api;
    switch (api.version) {
      case 'v3': {
        const object = await this.resolveV3(api.client, target, true);
        await api.client.rename(v3SourceItems(object), name);
        break;
      }
      case 'v4':
        await api.client.renameFile(target, name);
        break;
    }
  }

  /**
   * Move `src` to the full path `dest`. Within one directory this is a rename;
   * across directories the entry moves into dest's directory and is renamed
   * there when the leaf names differ.
   */
  async move(src: string, dest: string): Promise<void> {
    const source = this.mutablePath(src, 'move');
    const destination = this.mutablePath(dest, 'replace');
    const from = splitPath(source);
    const to = splitPath(destination);

    if (source === destination) {
      logger.debug(`Move of ${source} onto itself skipped`);
      return;
    }
    if (from.parent === to.parent) {
      await this.rename(source, to.name);
      return;
    }

    logger.debug(`Moving ${source} into ${to.parent}`);
    await this.moveInto(source, to.parent);
    if (from.name !== to.name) {
      await this.rename(joinPath(to.parent, from.name), to.name);
    }
  }

  /**
   * Copy `src` to the full path `dest`.
   *
   * Both protocols copy into a directory keeping the name. A copy inside one
   * directory under a new name is emulated through a temporary folder:
   * probe and clear the destination, create the folder, copy into it, rename
   * the copy to an intermediate name, move it next to the destination, rename
   * it to the final name, delete the folder. Nothing is rolled back: when a
   * step fails its error propagates and the temporary folder stays behind.
   */
  async copy(src: string, dest: string): Promise<void> {
    const source = this.mutablePath(src, 'copy');
    const destination = this.mutablePath(dest, 'replace');
    const from = splitPath(source);
    const to = splitPath(destination);

    if (source === destination) {
      throw new InvalidArgumentError('Source and destination are the same', { path: source });
    }

    if (from.parent === to.parent) {
      await this.copyWithRename(source, destination);
      return;
    }

    logger.debug(`Copying ${source} into ${to.parent}`);
    await this.copyInto(source, to.parent);
    if (from.name !== to.name) {
      await this.rename(joinPath(to.parent, from.name), to.name);
    }
  }

  private async copyWithRename(source: string, destination: string): Promise<void> {
    const from = splitPath(source);
    const to = splitPath(destination);
    const id = this.generateId();
    const tempDir = joinPath(to.parent, `${TEMP_DIR_PREFIX}${id}`);
    const intermediateName = `${from.name}.${id}`;
    logger.debug(`Copying ${source} to ${destination} through ${tempDir}`);

    if (await this.exists(destination)) {
      const removed = await fromPromise(() => this.delete(destination), toAppError);
      if (!removed.ok) {
        logger.warn(`Could not remove existing ${destination}: ${removed.error.message}`);
      }
    }

    await this.createDirectory(tempDir);
    await this.copyInto(source, tempDir);
    await this.rename(joinPath(tempDir, from.name), intermediateName);
    await this.moveInto(joinPath(tempDir, intermediateName), to.parent);
    await this.rename(joinPath(to.parent, intermediateName), to.name);

    const cleanup = await fromPromise(() => this.delete(tempDir), toAppError);
    if (!cleanup.ok) {
      logger.warn(`Could not remove temporary folder ${tempDir}: ${cleanup.error.message}`);
    }
  }

  /** Probe failures count as "does not exist" */
  private async exists(path: string): Promise<boolean> {
    const api = this.api;
    switch (api.version) {
      case 'v3': {
        const probe = await fromPromise(() => this.resolveV3(api.client, path), toAppError);
        return probe.ok;
      }
      case 'v4': {
        const probe = await fromPromise(() => api.client.getFileInfo(path), toAppError);
        return probe.ok;
      }
    }
  }

  private async moveInto(source: string, dir: string): Promise<void> {
    const api = this.api;
    switch (api.version) {
      case 'v3': {
        const object = await this.resolveV3(api.client, source);
        await api.client.move(splitPath(source).parent, v3SourceItems(object), dir);
        break;
      }
      case 'v4':
        await api.client.moveFiles([source], dir);
        break;
    }
  }

  private async copyInto(source: string, dir: string): Promise<void> {
    const api = this.api;
    switch (api.version) {
      case 'v3': {
        const object = await this.resolveV3(api.client, source);
        await api.client.copy(splitPath(source).parent, v3SourceItems(object), dir);
        break;
      }
      case 'v4':
        await api.client.moveFiles([source], dir, true);
        break;
    }
  }

  /** Restore entries from the trash */
  async restore(paths: string[]): Promise<void> {
    const api = this.api;
    if (api.version === 'v3') {
      throw new UnsupportedOperationError('restore', api.version);
    }
    const targets = paths.map((path) => this.checkedPath(path));
    logger.debug(`Restoring ${targets.join(', ')}`);
    await api.client.restore(targets);
  }

  // ==========================================================================
  // Transfer
  // ==========================================================================

  /**
   * Upload `data` as a single chunk. Without `policy` the parent directory's
   * storage policy is used.
   */
  async upload(path: string, data: Uint8Array, policy?: string): Promise<void> {
    const target = this.mutablePath(path, 'upload to');
    const { parent, name } = splitPath(target);
    logger.debug(`Uploading ${data.byteLength} bytes to ${target}`);

    const api = this.api;
    switch (api.version) {
      case 'v3': {
        const policyId = policy ?? (await api.client.listDirectory(parent)).policy?.id ?? '';
        const session = await api.client.createUploadSession({
          path: parent,
          size: data.byteLength,
          name,
          policy_id: policyId,
          last_modified: Date.now(),
          mime_type: 'application/octet-stream',
        });
        await api.client.uploadChunk(session.sessionID, 0, data);

        const completion = await fromPromise(
          () => api.client.completeUpload(session.sessionID),
          toAppError
        );
        if (!completion.ok) {
          logger.debug(`Upload completion callback skipped: ${completion.error.message}`);
        }
        break;
      }
      case 'v4': {
        const policyId =
          policy ??
          (await api.client.listFiles({ uri: parent, page_size: 1 })).storage_policy?.id ??
          'default';
        const session = await api.client.createUploadSession({
          uri: target,
          size: data.byteLength,
          policy_id: policyId,
          last_modified: Date.now(),
        });
        await api.client.uploadChunk(session.session_id, 0, data);
        break;
      }
    }
  }

  /** Resolve a download URL for a file */
  async download(path: string): Promise<string> {
    const target = this.mutablePath(path, 'download');
    logger.debug(`Resolving download URL of ${target}`);

    const api = this.api;
    switch (api.version) {
      case 'v3': {
        const object = await this.resolveV3(api.client, target);
        const { url } = await api.client.getDownloadUrl(object.id);
        if (/^https?:\/\//i.test(url)) return url;
        return `${api.client.baseUrl}${url.startsWith('/') ? '' : '/'}${url}`;
      }
      case 'v4': {
        const response = await api.client.createDownloadUrls({
          uris: [target],
          download: true,
          redirect: true,
        });
        const first = (response.urls ?? [])[0];
        if (!first) {
          throw new EmptyResponseError('POST /file/url');
        }
        return first.url;
      }
    }
  }

  // ==========================================================================
  // Shares
  // ==========================================================================

  async createShare(path: string, options: ShareOptions = {}): Promise<ShareItem> {
    const target = this.mutablePath(path, 'share');
    logger.debug(`Sharing ${target}`);

    const api = this.api;
    switch (api.version) {
      case 'v3': {
        const object = await this.resolveV3(api.client, target);
        const share = await api.client.createShare({
          id: object.id,
          is_dir: object.type === V3_FOLDER_TYPE,
          password: options.password ?? '',
          downloads: 0,
          expire: options.expires ?? 0,
          preview: true,
        });
        return fromV3Share(target, share);
      }
      case 'v4': {
        const url = await api.client.createShareLink(this.v4ShareRequest(target, options));
        return this.v4ShareItem(target, url);
      }
    }
  }

  /** The legacy protocol has no share listing and yields an empty list */
  async listShares(): Promise<ShareItem[]> {
    const api = this.api;
    if (api.version === 'v3') {
      return [];
    }

    const shares: ShareItem[] = [];
    let nextPageToken: string | undefined;
    do {
      const page = await api.client.listShareLinks({ pageSize: SHARE_PAGE_SIZE, nextPageToken });
      shares.push(...(page.shares ?? []).map(fromV4ShareLink));
      nextPageToken = page.pagination?.next_token || page.pagination?.next_page_token || undefined;
    } while (nextPageToken);
    return shares;
  }

  async updateShare(id: string, path: string, options: ShareOptions = {}): Promise<ShareItem> {
    const api = this.api;
    if (api.version === 'v3') {
      throw new UnsupportedOperationError('update share', api.version);
    }
    const target = this.mutablePath(path, 'share');
    const url = await api.client.editShareLink(id, this.v4ShareRequest(target, options));
    return this.v4ShareItem(target, url);
  }

  async deleteShare(id: string): Promise<void> {
    const api = this.api;
    if (api.version === 'v3') {
      throw new UnsupportedOperationError('delete share', api.version);
    }
    await api.client.deleteShareLink(id);
  }

  private v4ShareRequest(target: string, options: ShareOptions): V4ShareRequest {
    return {
      permissions: DEFAULT_SHARE_PERMISSIONS,
      uri: target,
      is_private: options.password !== undefined,
      password: options.password,
      expire: options.expires,
    };
  }

  private v4ShareItem(target: string, url: string): ShareItem {
    return {
      version: 'v4',
      id: shareIdFromUrl(url),
      name: getFilename(target),
      url,
      expired: false,
      raw: { url },
    };
  }

  // ==========================================================================
  // WebDAV accounts
  // ==========================================================================

  async listDavAccounts(): Promise<DavAccount[]> {
    const api = this.api;
    switch (api.version) {
      case 'v3':
        return (await api.client.listDavAccounts()).map(fromV3DavAccount);
      case 'v4':
        return (await this.listAllV4DavAccounts(api.client)).map(fromV4DavAccount);
    }
  }

  private async listAllV4DavAccounts(client: V4Client): Promise<V4DavAccount[]> {
    const accounts: V4DavAccount[] = [];
    let nextPageToken: string | undefined;
    do {
      const page = await client.listDavAccounts(DAV_PAGE_SIZE, nextPageToken);
      accounts.push(...(page.accounts ?? []));
      nextPageToken = page.pagination?.next_token || undefined;
    } while (nextPageToken);
    return accounts;
  }

  async createDavAccount(input: DavAccountInput): Promise<DavAccount> {
    const api = this.api;
    if (api.version === 'v3') {
      throw new UnsupportedOperationError('create WebDAV account', api.version);
    }
    if (!input.name.trim()) {
      throw new InvalidArgumentError('WebDAV account name is required');
    }
    const account = await api.client.createDavAccount({
      uri: this.checkedPath(input.root),
      name: input.name,
      readonly: input.readonly,
      proxy: input.proxy,
    });
    return fromV4DavAccount(account);
  }

  /** Fields left out keep the account's current values, flags included */
  async updateDavAccount(id: string, changes: Partial<DavAccountInput>): Promise<DavAccount> {
    const api = this.api;
    if (api.version === 'v3') {
      throw new UnsupportedOperationError('update WebDAV account', api.version);
    }

    let { name, root, readonly, proxy } = changes;
    if (name === undefined || root === undefined || readonly === undefined || proxy === undefined) {
      const current = (await this.listAllV4DavAccounts(api.client)).find(
        (account) => account.id === id
      );
      if (!current) {
        throw new InvalidArgumentError(`WebDAV account not found: ${id}`, { id });
      }
      const flags = davAccountFlags(current);
      name ??= current.name;
      root ??= current.uri;
      readonly ??= flags.readonly;
      proxy ??= flags.proxy;
    }

    const account = await api.client.updateDavAccount(id, {
      uri: this.checkedPath(root),
      name,
      readonly,
      proxy,
    });
    return fromV4DavAccount(account);
  }

  async deleteDavAccount(id: string): Promise<void> {
    const api = this.api;
    if (api.version === 'v3') {
      throw new UnsupportedOperationError('delete WebDAV account', api.version);
    }
    await api.client.deleteDavAccount(id);
  }

  // ==========================================================================
  // User
  // ==========================================================================

  /**
   * User of the most recent login. A restored session is looked up again:
   * the legacy protocol reports its user through the site config, the current
   * one needs the user id passed to {@link setToken}.
   *
   * @throws NotAuthenticatedError when no user is known
   */
  async getUserInfo(): Promise<UserInfo> {
    if (this.currentUser) {
      return this.currentUser;
    }

    const api = this.api;
    switch (api.version) {
      case 'v3': {
        const config = await api.client.getSiteConfig();
        if (config.user && !config.user.anonymous) {
          this.currentUser = fromV3User(config.user);
          return this.currentUser;
        }
        break;
      }
      case 'v4':
        if (this.sessionUserId && api.client.getToken()) {
          this.currentUser = fromV4User(await api.client.getUserInfo(this.sessionUserId));
          return this.currentUser;
        }
        break;
    }
    throw new NotAuthenticatedError();
  }

  async getStorageQuota(): Promise<StorageQuota> {
    const api = this.api;
    switch (api.version) {
      case 'v3':
        return fromV3Storage(await api.client.getStorage());
      case 'v4':
        return fromV4Capacity(await api.client.getCapacity());
    }
  }

  // ==========================================================================
  // Tasks
  // ==========================================================================

  /**
   * Queue remote downloads into `dst`. The legacy protocol reports no task
   * records for new downloads and resolves with an empty list.
   */
  async createRemoteDownload(urls: string[], dst: string): Promise<TaskRecord[]> {
    if (urls.length === 0) {
      throw new InvalidArgumentError('At least one URL is required');
    }
    const dir = this.checkedPath(dst);
    logger.debug(`Queueing ${urls.length} remote downloads into ${dir}`);

    const api = this.api;
    switch (api.version) {
      case 'v3':
        await api.client.addDownload(dir, urls);
        return [];
      case 'v4':
        return (await api.client.createRemoteDownload(dir, urls)).map(fromV4Task);
    }
  }

  /**
   * List tasks of one category, or of all categories. The legacy protocol
   * only has remote downloads, so 'general' is always empty there.
   */
  async listTasks(category?: TaskCategory): Promise<TaskRecord[]> {
    const categories = category ? [category] : ALL_TASK_CATEGORIES;
    const api = this.api;
    const tasks: TaskRecord[] = [];

    for (const current of categories) {
      switch (api.version) {
        case 'v3':
          if (current === 'downloading') {
            tasks.push(...(await api.client.listDownloading()).map((t) => fromV3Task(t, false)));
          } else if (current === 'downloaded') {
            tasks.push(...(await api.client.listFinished()).map((t) => fromV3Task(t, true)));
          }
          break;
        case 'v4':
          tasks.push(...(await this.listAllV4Tasks(api.client, current)).map(fromV4Task));
          break;
      }
    }
    return tasks;
  }

  private async listAllV4Tasks(client: V4Client, category: TaskCategory): Promise<V4Task[]> {
    const tasks: V4Task[] = [];
    let nextPageToken: string | undefined;
    do {
      const page = await client.listTasks(category, TASK_PAGE_SIZE, nextPageToken);
      tasks.push(...(page.tasks ?? []));
      nextPageToken = page.pagination.next_token || page.pagination.next_page_token || undefined;
    } while (nextPageToken);
    return tasks;
  }

  async cancelTask(id: string): Promise<void> {
    const api = this.api;
    switch (api.version) {
      case 'v3':
        await api.client.cancelDownload(id);
        break;
      case 'v4':
        await api.client.cancelRemoteDownload(id);
        break;
    }
  }

  async createArchive(paths: string[], dst: string): Promise<TaskRecord> {
    const api = this.api;
    if (api.version === 'v3') {
      throw new UnsupportedOperationError('create archive', api.version);
    }
    const sources = paths.map((path) => this.checkedPath(path));
    return fromV4Task(await api.client.createArchive(sources, this.checkedPath(dst)));
  }

  async extractArchive(src: string, dst: string, options: ExtractOptions = {}): Promise<TaskRecord> {
    const api = this.api;
    if (api.version === 'v3') {
      throw new UnsupportedOperationError('extract archive', api.version);
    }
    const task = await api.client.extractArchive({
      src: [this.checkedPath(src)],
      dst: this.checkedPath(dst),
      encoding: options.encoding,
      password: options.password,
    });
    return fromV4Task(task);
  }

  // ==========================================================================
  // Path handling
  // ==========================================================================

  /** Normalized, safety-checked path; resource URIs are accepted too */
  private checkPath(input: string): Result<string, AppError> {
    const path: Result<string, AppError> = isValidUri(input) ? uriToPath(input) : ok(input);
    return andThen(path, validatePathSafety);
  }

  private checkedPath(input: string): string {
    return unwrap(this.checkPath(input));
  }

  private checkMutablePath(input: string, action: string): Result<string, AppError> {
    return andThen(this.checkPath(input), (path) =>
      isRootPath(path)
        ? err(new InvalidArgumentError(`Cannot ${action} the root directory`, { path }))
        : ok(path)
    );
  }

  private mutablePath(input: string, action: string): string {
    return unwrap(this.checkMutablePath(input, action));
  }

  /**
   * Find the legacy object at `path` by listing its parent.
   *
   * @param withSample - Put a sample of the parent's names into the NotFoundError
   */
  private async resolveV3(client: V3Client, path: string, withSample = false): Promise<V3Object> {
    const { parent, name } = splitPath(path);
    const listing = await client.listDirectory(parent);
    const objects = listing.objects ?? [];
    const object = objects.find((candidate) => candidate.name === name);
    if (!object) {
      const available = withSample
        ? objects.slice(0, NOT_FOUND_SAMPLE_SIZE).map((candidate) => candidate.name)
        : undefined;
      logger.debug(`Could not resolve ${path} in ${parent}`);
      throw new NotFoundError(path, available);
    }
    return object;
  }
}
