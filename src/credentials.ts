/**
 * Cloudreve CLI - Credential Cache
 *
 * Keeps the session token of each server between CLI invocations:
 * - macOS: Keychain via @napi-rs/keyring
 * - Windows: Credential Manager via @napi-rs/keyring
 * - Linux desktop: libsecret via @napi-rs/keyring
 * - Linux headless: AES-256-GCM encrypted file with KEYRING_PASSWORD env var
 *
 * All sessions live in one entry, keyed by server base URL.
 */

import { Entry } from '@napi-rs/keyring';
import { readFileSync, writeFileSync, unlinkSync, existsSync } from 'fs';
import { randomBytes, createCipheriv, createDecipheriv, pbkdf2Sync } from 'crypto';
import { logger } from './logger.js';
import { getCredentialsFilePath } from './paths.js';
import { getErrorMessage } from './utils/error.js';
import type { ApiVersion } from './client/detector.js';

// ============================================================================
// Constants
// ============================================================================

const SERVICE_NAME = 'cloudreve-cli';
const ACCOUNT_NAME = 'cloudreve-cli:sessions';
const DEFAULT_KEYRING_PASSWORD = 'cloudreve-cli-default';

// Encryption constants
const SALT_LENGTH = 32;
const IV_LENGTH = 16;
const KEY_LENGTH = 32; // AES-256
const PBKDF2_ITERATIONS = 100000;
const AUTH_TAG_LENGTH = 16;

// ============================================================================
// Types
// ============================================================================

export interface StoredSession {
  baseUrl: string;
  apiVersion: ApiVersion;
  /** v3 session cookie or v4 access token */
  token: string;
  refreshToken?: string;
  /** Login name the session belongs to */
  account: string;
  /** v4 user id, used to look the user up again */
  userId?: string;
}

type SessionStore = Record<string, StoredSession>;

function isStoredSession(value: unknown): value is StoredSession {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'baseUrl' in value &&
    typeof value.baseUrl === 'string' &&
    'apiVersion' in value &&
    (value.apiVersion === 'v3' || value.apiVersion === 'v4') &&
    'token' in value &&
    typeof value.token === 'string' &&
    'account' in value &&
    typeof value.account === 'string' &&
    (!('userId' in value) || value.userId === undefined || typeof value.userId === 'string')
  );
}

/** Keep the well-formed sessions of a decoded store */
function parseStore(json: string): SessionStore {
  const parsed: unknown = JSON.parse(json);
  const store: SessionStore = {};
  if (typeof parsed !== 'object' || parsed === null) return store;

  for (const [key, value] of Object.entries(parsed)) {
    if (isStoredSession(value)) store[key] = value;
    else logger.warn(`Ignoring malformed cached session for ${key}`);
  }
  return store;
}

function storeKey(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

// ============================================================================
// Storage Strategy Detection
// ============================================================================

/**
 * On Linux without a display there is usually no secret service to talk to,
 * so the encrypted file is used.
 */
function shouldUseFileStorage(): boolean {
  if (process.env.KEYRING_PASSWORD) {
    return true;
  }

  if (process.platform === 'linux') {
    const hasDisplay = !!process.env.DISPLAY || !!process.env.WAYLAND_DISPLAY;
    if (!hasDisplay) {
      logger.debug('No display detected on Linux, using file-based storage');
      return true;
    }
  }

  return false;
}

function getKeyringPassword(): string {
  const password = process.env.KEYRING_PASSWORD;
  if (!password) {
    logger.warn('KEYRING_PASSWORD not set, the token cache is encrypted with a default key.');
    return DEFAULT_KEYRING_PASSWORD;
  }
  return password;
}

// ============================================================================
// File-Based Encrypted Storage
// ============================================================================

function deriveKey(password: string, salt: Buffer): Buffer {
  return pbkdf2Sync(password, salt, PBKDF2_ITERATIONS, KEY_LENGTH, 'sha512');
}

/** Layout: [salt][iv][authTag][ciphertext] */
export function encryptData(data: string, password: string): Buffer {
  const salt = randomBytes(SALT_LENGTH);
  const iv = randomBytes(IV_LENGTH);
  const key = deriveKey(password, salt);

  const cipher = createCipheriv('aes-256-gcm', key, iv);
  const encrypted = Buffer.concat([cipher.update(data, 'utf8'), cipher.final()]);
  const authTag = cipher.getAuthTag();

  return Buffer.concat([salt, iv, authTag, encrypted]);
}

/**
 * @throws Error when the password is wrong or the data was tampered with
 */
export function decryptData(encryptedBuffer: Buffer, password: string): string {
  const salt = encryptedBuffer.subarray(0, SALT_LENGTH);
  const iv = encryptedBuffer.subarray(SALT_LENGTH, SALT_LENGTH + IV_LENGTH);
  const authTag = encryptedBuffer.subarray(
    SALT_LENGTH + IV_LENGTH,
    SALT_LENGTH + IV_LENGTH + AUTH_TAG_LENGTH
  );
  const encrypted = encryptedBuffer.subarray(SALT_LENGTH + IV_LENGTH + AUTH_TAG_LENGTH);

  const decipher = createDecipheriv('aes-256-gcm', deriveKey(password, salt), iv);
  decipher.setAuthTag(authTag);

  return Buffer.concat([decipher.update(encrypted), decipher.final()]).toString('utf8');
}

function writeStoreToFile(store: SessionStore, password: string): void {
  const filePath = getCredentialsFilePath();
  writeFileSync(filePath, encryptData(JSON.stringify(store), password), { mode: 0o600 });
  logger.debug(`Stored sessions to encrypted file: ${filePath}`);
}

function readStoreFromFile(password: string): SessionStore {
  const filePath = getCredentialsFilePath();
  if (!existsSync(filePath)) {
    return {};
  }

  try {
    return parseStore(decryptData(readFileSync(filePath), password));
  } catch (error) {
    logger.error(`Failed to decrypt token cache: ${getErrorMessage(error)}`);
    return {};
  }
}

function deleteCredentialsFile(): void {
  const filePath = getCredentialsFilePath();
  if (existsSync(filePath)) {
    unlinkSync(filePath);
    logger.debug(`Deleted token cache file: ${filePath}`);
  }
}

// ============================================================================
// Native Keyring Storage
// ============================================================================

function writeStoreToKeyring(store: SessionStore): void {
  const entry = new Entry(SERVICE_NAME, ACCOUNT_NAME);
  entry.setPassword(JSON.stringify(store));
  logger.debug(`Stored sessions to native keyring (service: ${SERVICE_NAME})`);
}

function readStoreFromKeyring(): SessionStore {
  try {
    const entry = new Entry(SERVICE_NAME, ACCOUNT_NAME);
    const json = entry.getPassword();
    if (!json) {
      logger.debug('No sessions found in keyring');
      return {};
    }
    return parseStore(json);
  } catch (error) {
    // Entry not found or access denied
    logger.debug(`Failed to read sessions from keyring: ${getErrorMessage(error)}`);
    return {};
  }
}

function deleteKeyringEntry(): void {
  try {
    new Entry(SERVICE_NAME, ACCOUNT_NAME).deletePassword();
    logger.debug('Deleted sessions from native keyring');
  } catch (error) {
    logger.debug(`Failed to delete sessions from native keyring: ${getErrorMessage(error)}`);
  }
}

function readStore(): SessionStore {
  if (shouldUseFileStorage()) {
    return readStoreFromFile(getKeyringPassword());
  }
  return readStoreFromKeyring();
}

function writeStore(store: SessionStore): void {
  if (shouldUseFileStorage()) {
    writeStoreToFile(store, getKeyringPassword());
    return;
  }
  try {
    writeStoreToKeyring(store);
  } catch (error) {
    logger.warn(`Native keyring failed, falling back to file storage: ${getErrorMessage(error)}`);
    writeStoreToFile(store, getKeyringPassword());
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Cache the session of one server, replacing any earlier one
 */
export async function storeSession(session: StoredSession): Promise<void> {
  const key = storeKey(session.baseUrl);
  const store = readStore();
  store[key] = { ...session, baseUrl: key };
  writeStore(store);
}

export async function getStoredSession(baseUrl: string): Promise<StoredSession | null> {
  return readStore()[storeKey(baseUrl)] ?? null;
}

export async function listStoredSessions(): Promise<StoredSession[]> {
  return Object.values(readStore());
}

/**
 * Forget the session of one server. The backing entry is removed with the
 * last session.
 */
export async function deleteStoredSession(baseUrl: string): Promise<void> {
  const store = readStore();
  delete store[storeKey(baseUrl)];

  if (Object.keys(store).length > 0) {
    writeStore(store);
    return;
  }

  if (!shouldUseFileStorage()) {
    deleteKeyringEntry();
  }
  // Also try to delete file in case of previous fallback
  deleteCredentialsFile();
}

export async function hasStoredSession(baseUrl: string): Promise<boolean> {
  return (await getStoredSession(baseUrl)) !== null;
}

export { getCredentialsFilePath };

export default {
  storeSession,
  getStoredSession,
  listStoredSessions,
  deleteStoredSession,
  hasStoredSession,
};
