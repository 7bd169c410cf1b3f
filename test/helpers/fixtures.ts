/**
 * Wire-format builders for test responses.
 */

import type { V3DirectoryList, V3Object, V3User } from '../../src/api/v3/types.js';
import {
  V4FileType,
  type V4File,
  type V4LoginData,
  type V4ListResponse,
  type V4Pagination,
  type V4Task,
  type V4User,
} from '../../src/api/v4/types.js';

// ============================================================================
// Legacy protocol
// ============================================================================

export function v3User(overrides: Partial<V3User> = {}): V3User {
  return {
    id: 'u1',
    user_name: 'alice@example.com',
    nickname: 'Alice',
    status: 0,
    avatar: '',
    created_at: '2024-01-01T00:00:00Z',
    preferred_theme: '',
    anonymous: false,
    group: {
      id: 2,
      name: 'User',
      allowShare: true,
      allowRemoteDownload: true,
      allowArchiveDownload: true,
      shareDownload: true,
      compress: true,
      webdav: true,
      sourceBatch: 10,
      advanceDelete: false,
      allowWebDAVProxy: false,
    },
    tags: [],
    ...overrides,
  };
}

export function v3Object(
  name: string,
  type: 'file' | 'dir' = 'file',
  overrides: Partial<V3Object> = {}
): V3Object {
  return {
    id: `id-${name}`,
    name,
    path: '/',
    thumb: false,
    size: type === 'dir' ? 0 : 10,
    type,
    date: '2024-02-01T10:00:00Z',
    create_date: '2024-01-01T10:00:00Z',
    source_enabled: false,
    ...overrides,
  };
}

export function v3Listing(objects: V3Object[], policyId: string = 'p1'): V3DirectoryList {
  return {
    parent: 'id-parent',
    objects,
    policy: { id: policyId, name: 'Local', type: 'local', max_size: 0, file_type: null },
  };
}

// ============================================================================
// Current protocol
// ============================================================================

export function v4User(overrides: Partial<V4User> = {}): V4User {
  return {
    id: 'u1',
    email: 'alice@example.com',
    nickname: 'Alice',
    created_at: '2024-01-01T00:00:00Z',
    group: { id: 'g1', name: 'User' },
    ...overrides,
  };
}

export function v4Login(
  accessToken: string = 'access-1',
  refreshToken: string = 'refresh-1'
): V4LoginData {
  return {
    user: v4User(),
    token: {
      access_token: accessToken,
      refresh_token: refreshToken,
      access_expires: '2030-01-01T00:00:00Z',
      refresh_expires: '2030-02-01T00:00:00Z',
    },
  };
}

export function v4File(
  path: string,
  type: 'file' | 'folder' = 'file',
  overrides: Partial<V4File> = {}
): V4File {
  const name = path.slice(path.lastIndexOf('/') + 1);
  return {
    type: type === 'folder' ? V4FileType.Folder : V4FileType.File,
    id: `id-${name}`,
    name,
    created_at: '2024-01-01T10:00:00Z',
    updated_at: '2024-02-01T10:00:00Z',
    size: type === 'folder' ? 0 : 10,
    path: `cloudreve://my${path}`,
    owned: true,
    ...overrides,
  };
}

export function v4Listing(
  files: V4File[],
  pagination: Partial<V4Pagination> = {},
  policyId?: string
): V4ListResponse {
  return {
    files,
    parent: v4File('/', 'folder', { path: 'cloudreve://my/', name: '' }),
    pagination: { page: 0, page_size: 100, is_cursor: false, ...pagination },
    props: {
      capability: '',
      max_page_size: 2000,
      order_by_options: [],
      order_direction_options: [],
    },
    context_hint: '',
    mixed_type: false,
    storage_policy:
      policyId === undefined
        ? undefined
        : { id: policyId, name: 'Local', type: 'local', max_size: 0 },
  };
}

export function v4Task(id: string, overrides: Partial<V4Task> = {}): V4Task {
  return {
    id,
    created_at: '2024-03-01T00:00:00Z',
    updated_at: '2024-03-01T00:05:00Z',
    status: 'processing',
    type: 'remote_download',
    ...overrides,
  };
}
