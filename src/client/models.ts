/**
 * Unified response models.
 *
 * Each model is a union with one variant per protocol version. Both variants
 * carry the same normalized fields (name, size, isFolder, paths instead of
 * URIs...) plus the untouched wire record under `raw`.
 */

import type {
  V3Aria2Task,
  V3DirectoryList,
  V3Object,
  V3Policy,
  V3Property,
  V3Share,
  V3StorageInfo,
  V3User,
  V3WebdavAccount,
} from '../api/v3/types.js';
import { V3_FOLDER_TYPE } from '../api/v3/types.js';
import type {
  TaskStatus,
  V4Capacity,
  V4DavAccount,
  V4File,
  V4FileInfo,
  V4ListResponse,
  V4Pagination,
  V4ShareLink,
  V4StoragePolicy,
  V4Task,
  V4Token,
  V4User,
} from '../api/v4/types.js';
import { V4FileType } from '../api/v4/types.js';
import { uriToPath } from '../api/v4/uri.js';
import { unwrapOr } from '../utils/result.js';
import { getFilename, joinPath, normalizePath } from '../validation/path.js';

type Versioned<Base, V3Raw, V4Raw> =
  | (Base & { version: 'v3'; raw: V3Raw })
  | (Base & { version: 'v4'; raw: V4Raw });

/** Path form of a V4 URI; values outside the user's space are kept as-is */
function pathFromUri(uri: string): string {
  return unwrapOr(uriToPath(uri), uri);
}

// ============================================================================
// Files
// ============================================================================

export interface StoragePolicyRef {
  id: string;
  name: string;
  type: string;
  maxSize: number;
}

export interface FileEntryFields {
  id: string;
  name: string;
  /** Full path of the entry */
  path: string;
  size: number;
  isFolder: boolean;
  createdAt: string;
  updatedAt: string;
}

export type FileEntry = Versioned<FileEntryFields, V3Object, V4File>;

export interface PageInfo {
  page: number;
  pageSize: number;
  totalItems?: number;
  nextToken?: string;
  isCursor: boolean;
}

export interface FileListFields {
  /** Directory that was listed */
  path: string;
  parentId: string;
  entries: FileEntry[];
  policy?: StoragePolicyRef;
}

export type FileList =
  | (FileListFields & { version: 'v3'; raw: V3DirectoryList })
  | (FileListFields & { version: 'v4'; raw: V4ListResponse; pagination: PageInfo });

export interface FileInfoFields extends FileEntryFields {
  policy?: string;
}

export type FileInfo = Versioned<
  FileInfoFields,
  { object?: V3Object; property: V3Property },
  V4FileInfo
>;

export function fromV3Object(object: V3Object): FileEntry {
  return {
    version: 'v3',
    id: object.id,
    name: object.name,
    path: joinPath(object.path || '/', object.name),
    size: object.size,
    isFolder: object.type === V3_FOLDER_TYPE,
    createdAt: object.create_date,
    updatedAt: object.date,
    raw: object,
  };
}

export function fromV4File(file: V4File): FileEntry {
  return {
    version: 'v4',
    id: file.id,
    name: file.name,
    path: pathFromUri(file.path),
    size: file.size,
    isFolder: file.type === V4FileType.Folder,
    createdAt: file.created_at,
    updatedAt: file.updated_at,
    raw: file,
  };
}

function fromV3Policy(policy: V3Policy | undefined | null): StoragePolicyRef | undefined {
  if (!policy) return undefined;
  return { id: policy.id, name: policy.name, type: policy.type, maxSize: policy.max_size };
}

function fromV4Policy(policy: V4StoragePolicy | undefined | null): StoragePolicyRef | undefined {
  if (!policy) return undefined;
  return { id: policy.id, name: policy.name, type: policy.type, maxSize: policy.max_size };
}

export function fromV4Pagination(pagination: V4Pagination): PageInfo {
  return {
    page: pagination.page,
    pageSize: pagination.page_size,
    totalItems: pagination.total_items,
    nextToken: pagination.next_token || undefined,
    isCursor: pagination.is_cursor,
  };
}

export function fromV3DirectoryList(path: string, listing: V3DirectoryList): FileList {
  return {
    version: 'v3',
    path: normalizePath(path),
    parentId: listing.parent,
    entries: (listing.objects ?? []).map(fromV3Object),
    policy: fromV3Policy(listing.policy),
    raw: listing,
  };
}

/**
 * @param entries - Entries to expose; defaults to the page's own files
 */
export function fromV4ListResponse(
  path: string,
  response: V4ListResponse,
  entries: FileEntry[] = (response.files ?? []).map(fromV4File)
): FileList {
  return {
    version: 'v4',
    path: normalizePath(path),
    parentId: response.parent?.id ?? '',
    entries,
    policy: fromV4Policy(response.storage_policy),
    pagination: fromV4Pagination(response.pagination),
    raw: response,
  };
}

export function fromV3Property(
  path: string,
  property: V3Property,
  object?: V3Object
): FileInfo {
  const normalized = normalizePath(path);
  return {
    version: 'v3',
    id: object?.id ?? '',
    name: object?.name ?? getFilename(normalized),
    path: normalized,
    size: property.size,
    isFolder: object ? object.type === V3_FOLDER_TYPE : true,
    createdAt: property.created_at,
    updatedAt: property.updated_at,
    policy: property.policy || undefined,
    raw: { object, property },
  };
}

export function fromV4FileInfo(info: V4FileInfo): FileInfo {
  return {
    version: 'v4',
    id: info.id,
    name: info.name,
    path: pathFromUri(info.path),
    size: info.size,
    isFolder: info.type === V4FileType.Folder,
    createdAt: info.created_at,
    updatedAt: info.updated_at,
    policy: info.extended_info?.storage_policy?.name,
    raw: info,
  };
}

// ============================================================================
// Session
// ============================================================================

export interface UserInfoFields {
  id: string;
  nickname: string;
  /** Login name: the e-mail address on both protocols */
  email: string;
  groupName?: string;
}

export type UserInfo = Versioned<UserInfoFields, V3User, V4User>;

export function fromV3User(user: V3User): UserInfo {
  return {
    version: 'v3',
    id: user.id,
    nickname: user.nickname,
    email: user.user_name,
    groupName: user.group?.name,
    raw: user,
  };
}

export function fromV4User(user: V4User): UserInfo {
  return {
    version: 'v4',
    id: user.id,
    nickname: user.nickname ?? '',
    email: user.email ?? '',
    groupName: user.group?.name,
    raw: user,
  };
}

export type LoginResponse =
  | { version: 'v3'; user: UserInfo }
  | { version: 'v4'; user: UserInfo; token: V4Token };

/** Credential held by the client, in the form needed to restore it later */
export type TokenInfo =
  | { version: 'v3'; token: string }
  | { version: 'v4'; token: string; refreshToken?: string };

// ============================================================================
// Shares
// ============================================================================

export interface ShareItemFields {
  id: string;
  name: string;
  url: string;
  createdAt?: string;
  expired: boolean;
  visits?: number;
}

/** A freshly created or edited V4 share is only known by its URL */
export type ShareItem = Versioned<ShareItemFields, V3Share, V4ShareLink | { url: string }>;

export function fromV3Share(path: string, share: V3Share): ShareItem {
  return {
    version: 'v3',
    id: share.key,
    name: getFilename(path),
    url: share.url,
    expired: false,
    raw: share,
  };
}

export function fromV4ShareLink(link: V4ShareLink): ShareItem {
  return {
    version: 'v4',
    id: link.id,
    name: link.name,
    url: link.url,
    createdAt: link.created_at,
    expired: link.expired,
    visits: link.visited,
    raw: link,
  };
}

// ============================================================================
// WebDAV accounts
// ============================================================================

export interface DavAccountFields {
  id: string;
  name: string;
  /** Root folder exposed over WebDAV */
  root: string;
  password: string;
  createdAt: string;
}

export type DavAccount = Versioned<DavAccountFields, V3WebdavAccount, V4DavAccount>;

export function fromV3DavAccount(account: V3WebdavAccount): DavAccount {
  return {
    version: 'v3',
    id: String(account.ID),
    name: account.Name,
    root: account.Root,
    password: account.Password,
    createdAt: account.CreatedAt,
    raw: account,
  };
}

export function fromV4DavAccount(account: V4DavAccount): DavAccount {
  return {
    version: 'v4',
    id: account.id,
    name: account.name,
    root: pathFromUri(account.uri),
    password: account.password,
    createdAt: account.created_at,
    raw: account,
  };
}

export interface DavAccountFlags {
  readonly: boolean;
  proxy: boolean;
}

/**
 * Flags a current-protocol account reports in its `options` field, a list of
 * option names such as `"readonly,proxy"`.
 */
export function davAccountFlags(account: V4DavAccount): DavAccountFlags {
  const names = new Set((account.options ?? '').split(/[\s,|]+/).filter(Boolean));
  return { readonly: names.has('readonly'), proxy: names.has('proxy') };
}

// ============================================================================
// Quota
// ============================================================================

export interface StorageQuota {
  used: number;
  total: number;
  free: number;
}

export function fromV3Storage(storage: V3StorageInfo): StorageQuota {
  return { used: storage.used, total: storage.total, free: storage.free };
}

export function fromV4Capacity(capacity: V4Capacity): StorageQuota {
  return {
    used: capacity.used,
    total: capacity.total,
    free: Math.max(capacity.total - capacity.used, 0),
  };
}

// ============================================================================
// Tasks
// ============================================================================

export interface TaskRecordFields {
  id: string;
  status: TaskStatus;
  type: string;
  createdAt: string;
  /** Source URL of a remote download, when known */
  url?: string;
  error?: string;
}

export type TaskRecord = Versioned<TaskRecordFields, V3Aria2Task, V4Task>;

/**
 * aria2 tasks carry a free-form status; anything on the downloading list is
 * processing, finished ones are completed unless they report an error or cancel.
 */
export function fromV3Task(task: V3Aria2Task, finished: boolean): TaskRecord {
  const rawStatus = String(task.status).toLowerCase();
  let status: TaskStatus = finished ? 'completed' : 'processing';
  if (rawStatus.includes('error')) status = 'error';
  else if (rawStatus.includes('cancel')) status = 'canceled';
  else if (!finished && rawStatus.includes('wait')) status = 'queued';

  return {
    version: 'v3',
    id: task.id,
    status,
    type: 'remote_download',
    createdAt: task.created_at,
    url: task.url,
    raw: task,
  };
}

export function fromV4Task(task: V4Task): TaskRecord {
  return {
    version: 'v4',
    id: task.id,
    status: task.status,
    type: task.type,
    createdAt: task.created_at,
    error: task.error || undefined,
    raw: task,
  };
}

// ============================================================================
// Batch results
// ============================================================================

export interface DeleteResult {
  deleted: number;
  failed: number;
  /** Failed path with the reason, in input order */
  errors: [path: string, message: string][];
}
