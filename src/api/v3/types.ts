/**
 * Wire types of the legacy (V3) protocol.
 *
 * Field names follow the server's JSON exactly, including its mixed casing.
 */

/** Folder discriminant of `Object.type` */
export const V3_FOLDER_TYPE = 'dir';
export const V3_FILE_TYPE = 'file';

export interface V3UserGroup {
  id: number;
  name: string;
  allowShare: boolean;
  allowRemoteDownload: boolean;
  allowArchiveDownload: boolean;
  shareDownload: boolean;
  compress: boolean;
  webdav: boolean;
  sourceBatch: number;
  advanceDelete: boolean;
  allowWebDAVProxy: boolean;
}

export interface V3User {
  id: string;
  user_name: string;
  nickname: string;
  status: number;
  avatar: string;
  created_at: string;
  preferred_theme: string;
  anonymous: boolean;
  group: V3UserGroup;
  tags: string[];
}

export interface V3Object {
  id: string;
  name: string;
  path: string;
  thumb: boolean;
  size: number;
  type: string;
  date: string;
  create_date: string;
  source_enabled: boolean;
}

export interface V3Policy {
  id: string;
  name: string;
  type: string;
  max_size: number;
  file_type: string[] | null;
}

export interface V3DirectoryList {
  parent: string;
  objects: V3Object[];
  policy: V3Policy;
}

export interface V3Property {
  created_at: string;
  updated_at: string;
  policy: string;
  size: number;
  child_folder_num: number;
  child_file_num: number;
  path: string;
  query_date: string;
}

export interface V3SourceItems {
  dirs: string[];
  items: string[];
}

export interface V3UploadRequest {
  /** Parent directory of the new file */
  path: string;
  size: number;
  name: string;
  policy_id: string;
  last_modified: number;
  mime_type: string;
}

export interface V3UploadSession {
  sessionID: string;
  chunkSize: number;
  expires: number;
}

export interface V3DownloadUrl {
  url: string;
}

export interface V3FileSource {
  url: string;
  name: string;
  parent: number;
}

export interface V3StorageInfo {
  used: number;
  free: number;
  total: number;
}

export interface V3ShareRequest {
  id: string;
  is_dir: boolean;
  password: string;
  downloads: number;
  expire: number;
  preview: boolean;
}

export interface V3Share {
  key: string;
  url: string;
}

export interface V3SiteConfig {
  title: string;
  loginCaptcha: boolean;
  regCaptcha: boolean;
  forgetCaptcha: boolean;
  emailActive: boolean;
  themes: string;
  defaultTheme: string;
  home_view_method: string;
  share_view_method: string;
  authn: boolean;
  user?: V3User | null;
  captcha_ReCaptchaKey: string;
  captcha_type: string;
  tcaptcha_captcha_app_id: string;
  registerEnabled: boolean;
  app_promotion: boolean;
}

export interface V3Aria2Task {
  id: string;
  url: string;
  status: string;
  progress: number;
  created_at: string;
}

export interface V3WebdavAccount {
  ID: number;
  Name: string;
  Root: string;
  Password: string;
  CreatedAt: string;
}
