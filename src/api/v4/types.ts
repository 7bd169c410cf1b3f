/**
 * Wire types of the current (V4) protocol.
 */

// ============================================================================
// Session & user
// ============================================================================

export interface V4UserGroup {
  id: string;
  name: string;
  permission?: string;
  direct_link_batch_size?: number;
  trash_retention?: number;
}

export type V4UserStatus = 'active' | 'inactive' | 'manual_banned' | 'sys_banned';

export interface V4User {
  id: string;
  email?: string;
  nickname?: string;
  status?: V4UserStatus;
  avatar?: 'file' | 'gravatar';
  created_at: string;
  preferred_theme?: string;
  language?: string;
  anonymous?: boolean;
  group?: V4UserGroup;
}

export interface V4Token {
  access_token: string;
  refresh_token: string;
  access_expires: string;
  refresh_expires: string;
}

export interface V4LoginData {
  user: V4User;
  token: V4Token;
}

export interface V4LoginPreparation {
  webauthn_enabled: boolean;
  sso_enabled: boolean;
  password_enabled: boolean;
  qq_enabled: boolean;
}

export interface V4Capacity {
  used: number;
  total: number;
  storage_pack_total?: number;
}

// ============================================================================
// Files
// ============================================================================

export const V4FileType = {
  File: 0,
  Folder: 1,
} as const;

export type V4FileType = (typeof V4FileType)[keyof typeof V4FileType];

export interface V4File {
  type: V4FileType;
  id: string;
  name: string;
  permission?: string;
  created_at: string;
  updated_at: string;
  size: number;
  metadata?: Record<string, string> | null;
  path: string;
  capability?: string;
  owned: boolean;
  primary_entity?: string;
}

export interface V4Pagination {
  page: number;
  page_size: number;
  total_items?: number;
  next_token?: string;
  is_cursor: boolean;
}

export interface V4StoragePolicy {
  id: string;
  name: string;
  type: string;
  max_size: number;
  allowed_suffix?: string[];
  denied_suffix?: string[];
  relay?: boolean;
}

export interface V4NavigatorProps {
  capability: string;
  max_page_size: number;
  order_by_options: string[];
  order_direction_options: string[];
}

export interface V4ListResponse {
  files: V4File[];
  parent: V4File;
  pagination: V4Pagination;
  props: V4NavigatorProps;
  context_hint: string;
  mixed_type: boolean;
  storage_policy?: V4StoragePolicy | null;
  view?: Record<string, unknown> | null;
}

export interface V4ListFilesRequest {
  uri: string;
  page?: number;
  page_size?: number;
  order_by?: string;
  order_direction?: 'asc' | 'desc';
  next_page_token?: string;
}

export interface V4ExtendedInfo {
  storage_policy?: V4StoragePolicy | null;
  storage_policy_inherited: boolean;
  storage_used: number;
  shares?: V4ShareLink[] | null;
  entities?: Record<string, unknown>[] | null;
}

export interface V4FileInfo extends V4File {
  extended_info?: V4ExtendedInfo | null;
  folder_summary?: {
    size: number;
    files: number;
    folders: number;
    completed: boolean;
    calculated_at: string;
  } | null;
}

export interface V4DeleteFilesRequest {
  uris: string[];
  unlink?: boolean;
  skip_soft_delete?: boolean;
}

export interface V4UploadRequest {
  uri: string;
  size: number;
  policy_id: string;
  last_modified?: number;
  mime_type?: string;
  metadata?: Record<string, string>;
  entity_type?: string;
}

export interface V4UploadSession {
  session_id: string;
  upload_id?: string;
  chunk_size: number;
  expires: number;
  upload_urls?: string[];
  credential?: string;
  complete_url?: string;
  uri: string;
  storage_policy?: V4StoragePolicy;
}

export interface V4DownloadUrlRequest {
  uris: string[];
  download?: boolean;
  redirect?: boolean;
  entity?: string;
  archive?: boolean;
}

export interface V4DownloadUrls {
  urls: { url: string; stream_saver_display_name?: string }[];
  expires: string;
}

export interface V4Thumbnail {
  url: string;
  expires?: string;
}

export interface V4ArchiveEntry {
  name: string;
  size: number;
  updated_at?: string;
  is_directory: boolean;
}

// ============================================================================
// Shares
// ============================================================================

export type PermissionLevel = 'read' | 'write' | 'none';

export interface V4PermissionSetting {
  user_explicit: Record<string, unknown>;
  group_explicit: Record<string, unknown>;
  same_group: PermissionLevel;
  other: PermissionLevel;
  anonymous: PermissionLevel;
  everyone: PermissionLevel;
}

export interface V4ShareRequest {
  permissions: V4PermissionSetting;
  uri: string;
  is_private?: boolean;
  share_view?: boolean;
  expire?: number;
  price?: number;
  password?: string;
  show_readme?: boolean;
}

export interface V4ShareLink {
  id: string;
  name: string;
  visited: number;
  downloaded?: number;
  price?: number;
  unlocked: boolean;
  source_type: number | string;
  owner?: V4User;
  created_at: string;
  expired: boolean;
  url: string;
  is_private?: boolean;
  password?: string;
  source_uri?: string;
  share_view?: boolean;
  show_readme?: boolean;
  password_protected?: boolean;
  expires?: string;
}

export interface V4ShareListResponse {
  shares: V4ShareLink[] | null;
  pagination: { page?: number; page_size?: number; next_token?: string; next_page_token?: string };
}

// ============================================================================
// WebDAV
// ============================================================================

export interface V4DavAccount {
  id: string;
  created_at: string;
  name: string;
  uri: string;
  password: string;
  options?: string;
}

export interface V4DavAccountRequest {
  uri: string;
  name: string;
  readonly?: boolean;
  proxy?: boolean;
  disable_sys_files?: boolean;
}

export interface V4DavAccountList {
  accounts: V4DavAccount[] | null;
  pagination: { page: number; page_size: number; total_items?: number; next_token?: string };
}

// ============================================================================
// Workflow
// ============================================================================

export type TaskStatus =
  | 'queued'
  | 'processing'
  | 'suspending'
  | 'error'
  | 'canceled'
  | 'completed';

export type TaskType =
  | 'media_meta'
  | 'entity_recycle_routine'
  | 'explicit_entity_recycle'
  | 'upload_sentinel_check'
  | 'create_archive'
  | 'extract_archive'
  | 'relocate'
  | 'remote_download'
  | 'import';

export type TaskCategory = 'general' | 'downloading' | 'downloaded';

export interface V4Task {
  id: string;
  created_at: string;
  updated_at: string;
  status: TaskStatus;
  type: TaskType;
  summary?: { phase?: string; props: Record<string, unknown> } | null;
  duration?: number;
  resume_time?: number;
  error?: string;
  error_history?: string[];
  retry_count?: number;
  node?: { id: string; name: string; type: string } | null;
}

export interface V4TaskList {
  tasks: V4Task[] | null;
  pagination: { page_size?: number; next_token?: string; next_page_token?: string };
}

export interface V4TaskProgress {
  [phase: string]: { total: number; current: number; identifier?: string };
}

export interface V4ExtractRequest {
  src: string[];
  dst: string;
  encoding?: string;
  password?: string;
}
