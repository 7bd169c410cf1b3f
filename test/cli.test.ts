/**
 * Integration Tests - CLI Commands
 *
 * Runs the commander program end to end. HTTP goes to the shared fake
 * transport, prompts are mocked and sessions go to the encrypted file cache
 * in the temporary data directory.
 */

import { afterEach, beforeEach, describe, expect, test, vi, type MockInstance } from 'vitest';
import { confirm, input, password } from '@inquirer/prompts';
import type { HttpRequest, HttpResponse } from '../src/api/transport.js';
import { buildProgram } from '../src/index.js';
import { formatEntry } from '../src/cli/files.js';
import { formatBytes } from '../src/cli/session.js';
import { formatTask } from '../src/cli/tasks.js';
import { fromV4File, fromV4Task } from '../src/client/models.js';
import { DEFAULT_CONFIG, getConfig, saveConfig } from '../src/config.js';
import {
  deleteStoredSession,
  getStoredSession,
  hasStoredSession,
  storeSession,
  type StoredSession,
} from '../src/credentials.js';
import { getLogFilePath, setDebugMode } from '../src/logger.js';
import { BASE_URL, done, envelope, failure, sharedTransport } from './helpers/fakeTransport.js';
import { v4File, v4Listing, v4Login, v4Task } from './helpers/fixtures.js';

// ============================================================================
// Mocks
// ============================================================================

vi.mock('@inquirer/prompts', () => ({
  input: vi.fn(),
  password: vi.fn(),
  confirm: vi.fn(),
  select: vi.fn(),
}));

vi.mock('../src/api/transport.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/api/transport.js')>();
  const { sharedTransport: transport } = await import('./helpers/fakeTransport.js');

  class FetchTransport {
    send(request: HttpRequest): Promise<HttpResponse> {
      return transport.send(request);
    }
  }

  return { ...actual, FetchTransport };
});

// ============================================================================
// Helpers
// ============================================================================

const v4Session: StoredSession = {
  baseUrl: BASE_URL,
  apiVersion: 'v4',
  token: 'access-1',
  refreshToken: 'refresh-1',
  account: 'alice@example.com',
};

const v3Session: StoredSession = {
  baseUrl: BASE_URL,
  apiVersion: 'v3',
  token: 'sess-1',
  account: 'alice@example.com',
};

let logSpy: MockInstance<typeof console.log>;
let errorSpy: MockInstance<typeof console.error>;

async function run(...args: string[]): Promise<void> {
  await buildProgram().parseAsync(['node', 'cloudreve-cli', ...args]);
}

function logged(): string[] {
  return logSpy.mock.calls.map((call) => call.join(' '));
}

function errors(): string[] {
  return errorSpy.mock.calls.map((call) => call.join(' '));
}

beforeEach(() => {
  vi.resetAllMocks();
  sharedTransport.reset();
  process.exitCode = undefined;
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(async () => {
  logSpy.mockRestore();
  errorSpy.mockRestore();
  process.exitCode = undefined;
  setDebugMode(false);
  await deleteStoredSession(BASE_URL);
  saveConfig({ ...DEFAULT_CONFIG, server: { ...DEFAULT_CONFIG.server } });
});

// ============================================================================
// Session commands
// ============================================================================

describe('CLI - login', () => {
  test('logs in with options and caches the session', async () => {
    sharedTransport.enqueue(envelope(v4Login()));

    await run(
      '--server',
      BASE_URL,
      '--api',
      'v4',
      'login',
      '-u',
      'alice@example.com',
      '-p',
      'test-password'
    );

    expect(logged()).toEqual(['✓ Logged in as Alice (v4 API)']);
    expect(sharedTransport.calls()).toEqual(['POST /api/v4/session/token']);
    expect(await getStoredSession(BASE_URL)).toEqual({ ...v4Session, userId: 'u1' });
    expect(process.exitCode).toBeUndefined();
  });

  test('prompts for missing credentials', async () => {
    vi.mocked(input).mockResolvedValueOnce('alice@example.com');
    vi.mocked(password).mockResolvedValueOnce('test-password');
    sharedTransport.enqueue(envelope(v4Login()));

    await run('--server', BASE_URL, '--api', 'v4', 'login');

    expect(sharedTransport.body(0)).toEqual({
      email: 'alice@example.com',
      password: 'test-password',
    });
    expect(await hasStoredSession(BASE_URL)).toBe(true);
  });

  test('finishes a two-factor login with --code', async () => {
    sharedTransport.enqueue(
      failure(203, 'Two-factor authentication required'),
      envelope(v4Login('access-2', 'refresh-2'))
    );

    await run(
      '--server',
      BASE_URL,
      '--api',
      'v4',
      'login',
      '-u',
      'alice@example.com',
      '-p',
      'test-password',
      '--code',
      '123456'
    );

    expect(sharedTransport.calls()).toEqual([
      'POST /api/v4/session/token',
      'POST /api/v4/session/token/2fa',
    ]);
    expect(sharedTransport.body(1)).toEqual({
      email: 'alice@example.com',
      password: 'test-password',
      code: '123456',
    });
    expect(vi.mocked(input)).not.toHaveBeenCalled();
    expect((await getStoredSession(BASE_URL))?.token).toBe('access-2');
  });

  test('asks before replacing a cached session', async () => {
    await storeSession(v4Session);
    vi.mocked(confirm).mockResolvedValueOnce(false);

    await run('--server', BASE_URL, '--api', 'v4', 'login', '-u', 'alice@example.com');

    expect(logged()).toEqual(['Login cancelled.']);
    expect(sharedTransport.requests).toHaveLength(0);
  });

  test('reports a rejected login', async () => {
    sharedTransport.enqueue(failure(40020, 'Incorrect password'));

    await run(
      '--server',
      BASE_URL,
      '--api',
      'v4',
      'login',
      '-u',
      'alice@example.com',
      '-p',
      'wrong-password'
    );

    expect(errors()).toEqual(['✗ Login failed: Incorrect password']);
    expect(process.exitCode).toBe(1);
    expect(await hasStoredSession(BASE_URL)).toBe(false);
  });
});

describe('CLI - logout and whoami', () => {
  test('logout ends the session and forgets it', async () => {
    await storeSession(v4Session);
    sharedTransport.enqueue(done());

    await run('--server', BASE_URL, '--api', 'v4', 'logout');

    expect(logged()).toEqual(['✓ Logged out. Cached session removed.']);
    expect(sharedTransport.requests).toHaveLength(1);
    expect(await hasStoredSession(BASE_URL)).toBe(false);
  });

  test('logout forgets the session even when the server refuses', async () => {
    await storeSession(v3Session);
    sharedTransport.enqueue(failure(40001, 'Bad request'));

    await run('--server', BASE_URL, '--api', 'v3', 'logout');

    expect(logged()).toEqual(['✓ Logged out. Cached session removed.']);
    expect(process.exitCode).toBeUndefined();
    expect(await hasStoredSession(BASE_URL)).toBe(false);
  });

  test('logout without a session says so', async () => {
    await run('--server', BASE_URL, 'logout');

    expect(logged()).toEqual(['You are not logged in.']);
  });

  test('whoami takes the protocol from the cached session', async () => {
    await storeSession(v3Session);

    await run('--server', BASE_URL, 'whoami');

    expect(logged()).toEqual([`Logged in as alice@example.com on ${BASE_URL} (v3 API)`]);
    expect(sharedTransport.requests).toHaveLength(0);
  });
});

// ============================================================================
// File commands
// ============================================================================

describe('CLI - ls', () => {
  test('prints one line per entry', async () => {
    await storeSession(v4Session);
    sharedTransport.enqueue(
      envelope(v4Listing([v4File('/docs/a.txt'), v4File('/docs/sub', 'folder')]))
    );

    await run('--server', BASE_URL, '--api', 'v4', 'ls', '/docs');

    expect(logged()).toEqual([
      '-       10 B  2024-02-01T10:00:00Z  a.txt',
      'd          -  2024-02-01T10:00:00Z  sub/',
    ]);
    expect(sharedTransport.query(0)).toEqual({ uri: 'cloudreve://my/docs', page_size: '100' });
    expect(sharedTransport.request(0).headers.Authorization).toBe('Bearer access-1');
  });

  test('prints JSON with --json', async () => {
    await storeSession(v4Session);
    sharedTransport.enqueue(envelope(v4Listing([v4File('/a.txt')])));

    await run('--server', BASE_URL, '--api', 'v4', '--json', 'ls');

    const printed: { name: string; path: string; isFolder: boolean }[] = JSON.parse(
      logged().join('\n')
    );
    expect(printed.map(({ name, path, isFolder }) => ({ name, path, isFolder }))).toEqual([
      { name: 'a.txt', path: '/a.txt', isFolder: false },
    ]);
  });

  test('marks an empty directory', async () => {
    await storeSession(v4Session);
    sharedTransport.enqueue(envelope(v4Listing([])));

    await run('--server', BASE_URL, '--api', 'v4', 'ls', '/empty');

    expect(logged()).toEqual(['(empty)']);
  });

  test('requires a cached session', async () => {
    await run('--server', BASE_URL, '--api', 'v4', 'ls');

    expect(errors()).toEqual([
      `✗ List failed: Not logged in to ${BASE_URL}. Run "cloudreve-cli login" first.`,
    ]);
    expect(process.exitCode).toBe(1);
    expect(sharedTransport.requests).toHaveLength(0);
  });

  test('prints the stack of a failure in debug mode', async () => {
    await run('--debug', '--server', BASE_URL, '--api', 'v4', 'ls');

    expect(errors()).toHaveLength(2);
    expect(errors()[0]).toBe(
      `✗ List failed: Not logged in to ${BASE_URL}. Run "cloudreve-cli login" first.`
    );
    expect(errors()[1]?.split('\n')[0]).toBe(
      `NotAuthenticatedError: Not logged in to ${BASE_URL}. Run "cloudreve-cli login" first.`
    );
  });

  test('requires a server', async () => {
    await run('--api', 'v4', 'ls');

    expect(errors()).toEqual([
      '✗ List failed: Invalid configuration for "server.baseUrl": No server configured. Pass --server <url> or run "cloudreve-cli config set server.baseUrl <url>".',
    ]);
    expect(process.exitCode).toBe(1);
  });
});

describe('CLI - rm', () => {
  test('reports each failed path and exits non-zero', async () => {
    await storeSession(v4Session);
    sharedTransport.enqueue(
      failure(40016, 'Object not exist'),
      done(),
      failure(40016, 'Object not exist')
    );

    await run('--server', BASE_URL, '--api', 'v4', 'rm', '-y', '/a.txt', '/b.txt');

    expect(logged()).toEqual(['✓ Deleted 1 item(s)']);
    expect(errors()).toEqual(['✗ /b.txt: Object not exist']);
    expect(process.exitCode).toBe(1);
  });

  test('asks for confirmation without -y', async () => {
    vi.mocked(confirm).mockResolvedValueOnce(false);

    await run('--server', BASE_URL, '--api', 'v4', 'rm', '/a.txt', '/b.txt');

    expect(vi.mocked(confirm)).toHaveBeenCalledWith({
      message: 'Delete 2 item(s)?',
      default: false,
    });
    expect(logged()).toEqual(['Delete cancelled.']);
    expect(sharedTransport.requests).toHaveLength(0);
  });
});

// ============================================================================
// Account, server and tasks
// ============================================================================

describe('CLI - quota and server', () => {
  test('quota uses the legacy session cookie', async () => {
    await storeSession(v3Session);
    sharedTransport.enqueue(envelope({ used: 1536, free: 1536, total: 3072 }));

    await run('--server', BASE_URL, '--api', 'v3', 'quota');

    expect(logged()).toEqual(['Used:  1.5 KiB (50.0%)', 'Total: 3.0 KiB', 'Free:  1.5 KiB']);
    expect(sharedTransport.calls()).toEqual(['GET /api/v3/user/storage']);
    expect(sharedTransport.request(0).headers.Cookie).toBe('cloudreve-session=sess-1');
  });

  test('server works without a session', async () => {
    sharedTransport.enqueue(envelope('4.1.2'));

    await run('--server', BASE_URL, '--api', 'v4', 'server');

    expect(logged()).toEqual([
      `Server:  ${BASE_URL}`,
      'API:     v4',
      'Version: 4.1.2',
    ]);
  });
});

describe('CLI - tasks', () => {
  test('lists one category', async () => {
    await storeSession(v4Session);
    sharedTransport.enqueue(envelope({ tasks: [v4Task('t1')], pagination: {} }));

    await run('--server', BASE_URL, '--api', 'v4', 'tasks', 'list', '-c', 'downloading');

    expect(logged()).toEqual(['t1  processing  remote_download']);
    expect(sharedTransport.query(0).category).toBe('downloading');
  });

  test('legacy servers have no general tasks', async () => {
    await storeSession(v3Session);

    await run('--server', BASE_URL, '--api', 'v3', 'tasks', 'list', '-c', 'general');

    expect(logged()).toEqual(['No tasks.']);
    expect(sharedTransport.requests).toHaveLength(0);
  });
});

// ============================================================================
// Config commands
// ============================================================================

describe('CLI - config', () => {
  test('set stores a valid value', async () => {
    await run('config', 'set', 'pageSize', '25');

    expect(logged()).toEqual(['✓ Set pageSize = 25']);
    expect(getConfig().pageSize).toBe(25);
  });

  test('set rejects an invalid value', async () => {
    await run('config', 'set', 'pageSize', '0');

    expect(errors()).toEqual([
      '✗ Set config failed: Invalid configuration for "pageSize": Must be a positive integer',
    ]);
    expect(process.exitCode).toBe(1);
    expect(getConfig().pageSize).toBe(100);
  });

  test('show names the config and log files', async () => {
    await run('config', 'show');

    expect(logged()).toContain(`Log file: ${getLogFilePath()} (console level: warn)`);
    expect(logged()).toContain('  Page Size: 100');
  });

  test('show prints JSON with --json', async () => {
    await run('--json', 'config', 'show');

    expect(JSON.parse(logged().join('\n'))).toEqual(DEFAULT_CONFIG);
  });

  test('the configured server is used without --server', async () => {
    await run('config', 'set', 'server.baseUrl', `${BASE_URL}/`);
    await storeSession(v4Session);
    logSpy.mockClear();

    await run('--api', 'v4', 'whoami');

    expect(logged()).toEqual([`Logged in as alice@example.com on ${BASE_URL} (v4 API)`]);
  });
});

// ============================================================================
// Formatting
// ============================================================================

describe('CLI - Formatting', () => {
  test('formatBytes uses binary units', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(1023)).toBe('1023 B');
    expect(formatBytes(1536)).toBe('1.5 KiB');
    expect(formatBytes(5 * 1024 ** 2)).toBe('5.0 MiB');
  });

  test('formatEntry aligns sizes', () => {
    const file = fromV4File(v4File('/big.bin', 'file', { size: 2048 }));

    expect(formatEntry(file)).toBe('-    2.0 KiB  2024-02-01T10:00:00Z  big.bin');
  });

  test('formatTask appends the error', () => {
    const task = fromV4Task(v4Task('t9', { status: 'error', error: 'disk full' }));

    expect(formatTask(task)).toBe('t9  error       remote_download  disk full');
  });
});
