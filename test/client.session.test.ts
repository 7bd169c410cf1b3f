/**
 * Unit Tests - Client facade session handling
 */
import { describe, test, expect } from 'vitest';
import { CloudreveClient } from '../src/client/CloudreveClient.js';
import type { ApiVersion } from '../src/client/detector.js';
import {
  InvalidArgumentError,
  NotAuthenticatedError,
  TwoFactorRequiredError,
  UnsupportedOperationError,
} from '../src/errors/index.js';
import { BASE_URL, FakeTransport, done, envelope, failure, response } from './helpers/fakeTransport.js';
import { v3User, v4Login, v4User } from './helpers/fixtures.js';

function setup(version: ApiVersion): { client: CloudreveClient; transport: FakeTransport } {
  const transport = new FakeTransport();
  return { client: CloudreveClient.withVersion(BASE_URL, version, { transport }), transport };
}

describe('Client session - Password login', () => {
  test('current login keeps tokens and user', async () => {
    const { client, transport } = setup('v4');
    transport.enqueue(envelope(v4Login('access-1', 'refresh-1')));

    const result = await client.login(' alice@example.com ', 'test-password');

    expect(result.version).toBe('v4');
    expect(transport.body(0)).toEqual({ email: 'alice@example.com', password: 'test-password' });
    expect(client.getToken()).toEqual({
      version: 'v4',
      token: 'access-1',
      refreshToken: 'refresh-1',
    });
    expect((await client.getUserInfo()).email).toBe('alice@example.com');
  });

  test('legacy login keeps the cookie', async () => {
    const { client, transport } = setup('v3');
    transport.enqueue(envelope(v3User(), ['cloudreve-session=sess-1; Path=/']));

    const result = await client.login('alice', 'test-password');

    expect(result.user.nickname).toBe('Alice');
    expect(client.getToken()).toEqual({ version: 'v3', token: 'sess-1' });
  });

  test('current login needs an e-mail address', async () => {
    const { client, transport } = setup('v4');

    await expect(client.login('alice', 'test-password')).rejects.toThrow(
      new InvalidArgumentError('Invalid email format: alice')
    );
    expect(transport.requests).toHaveLength(0);
  });

  test('an empty password is rejected', async () => {
    const { client } = setup('v3');

    await expect(client.login('alice', '')).rejects.toThrow('Password is required');
  });

  test('wrong credentials surface the server message', async () => {
    const { client, transport } = setup('v4');
    transport.enqueue(failure(40020, 'Wrong password or email address'));

    await expect(client.login('alice@example.com', 'test-password')).rejects.toThrow(
      'Wrong password or email address'
    );
    expect(client.getToken()).toBeUndefined();
  });
});

describe('Client session - Two-factor login', () => {
  test('current login finishes with the code', async () => {
    const { client, transport } = setup('v4');
    transport.enqueue(failure(203, 'Two-factor authentication required'));

    await expect(client.login('alice@example.com', 'test-password')).rejects.toThrow(
      new TwoFactorRequiredError('alice@example.com')
    );
    expect(client.isTwoFactorPending()).toBe(true);

    transport.enqueue(envelope(v4Login('access-2', 'refresh-2')));
    await client.loginTwoFactor(' 654321 ');

    expect(transport.calls()[1]).toBe('POST /api/v4/session/token/2fa');
    expect(transport.body(1)).toEqual({
      email: 'alice@example.com',
      password: 'test-password',
      code: '654321',
    });
    expect(client.isTwoFactorPending()).toBe(false);
    expect(client.getToken()?.token).toBe('access-2');
  });

  test('legacy login sends the code with the pending cookie', async () => {
    const { client, transport } = setup('v3');
    transport.enqueue(
      response(200, JSON.stringify({ code: 203, msg: '2FA required' }), ['cloudreve-session=p1'])
    );

    await expect(client.login('alice', 'test-password')).rejects.toBeInstanceOf(
      TwoFactorRequiredError
    );

    transport.enqueue(envelope(v3User(), ['cloudreve-session=sess-1']));
    const result = await client.loginTwoFactor('123456');

    expect(transport.calls()[1]).toBe('POST /api/v3/user/2fa');
    expect(transport.request(1).headers.Cookie).toBe('cloudreve-session=p1');
    expect(result.user.email).toBe('alice@example.com');
    expect(client.getToken()).toEqual({ version: 'v3', token: 'sess-1' });
  });

  test('a code without a pending login is rejected', async () => {
    const { client } = setup('v4');

    await expect(client.loginTwoFactor('123456')).rejects.toThrow(
      new NotAuthenticatedError('No login is waiting for a one-time code')
    );
  });

  test('a malformed code keeps the login pending', async () => {
    const { client, transport } = setup('v4');
    transport.enqueue(failure(203, 'Two-factor authentication required'));
    await expect(client.login('alice@example.com', 'test-password')).rejects.toThrow();

    await expect(client.loginTwoFactor('12ab')).rejects.toThrow('One-time code must be 6-8 digits');
    expect(client.isTwoFactorPending()).toBe(true);
    expect(transport.requests).toHaveLength(1);
  });
});

describe('Client session - Tokens', () => {
  test('setToken restores a saved credential', async () => {
    const { client, transport } = setup('v4');
    client.setToken('access-9', 'refresh-9');
    transport.enqueue(envelope({ used: 1, total: 2 }));

    await client.getStorageQuota();

    expect(transport.request(0).headers.Authorization).toBe('Bearer access-9');
    expect(client.getToken()).toEqual({ version: 'v4', token: 'access-9', refreshToken: 'refresh-9' });
  });

  test('refreshToken returns the new pair', async () => {
    const { client, transport } = setup('v4');
    client.setToken('access-1', 'refresh-1');
    transport.enqueue(envelope(v4Login('access-2', 'refresh-2').token));

    expect(await client.refreshToken()).toEqual({
      version: 'v4',
      token: 'access-2',
      refreshToken: 'refresh-2',
    });
  });

  test('the legacy protocol has no refresh', async () => {
    const { client } = setup('v3');

    await expect(client.refreshToken()).rejects.toThrow(
      new UnsupportedOperationError('refresh token', 'v3')
    );
  });

  test('logout without a credential sends nothing', async () => {
    const { client, transport } = setup('v4');

    await client.logout();

    expect(transport.requests).toHaveLength(0);
  });

  test('logout ends the server session and forgets the user', async () => {
    const { client, transport } = setup('v3');
    client.setToken('sess-1');
    transport.enqueue(done(), envelope({ user: v3User({ anonymous: true }) }));

    await client.logout();

    expect(transport.calls()).toEqual(['DELETE /api/v3/user/session']);
    expect(client.getToken()).toBeUndefined();
    await expect(client.getUserInfo()).rejects.toBeInstanceOf(NotAuthenticatedError);
  });
});

describe('Client session - User and site', () => {
  test('legacy user info falls back to the site config', async () => {
    const { client, transport } = setup('v3');
    client.setToken('sess-1');
    transport.enqueue(envelope({ title: 'Drive', user: v3User() }));

    const user = await client.getUserInfo();

    expect(transport.calls()).toEqual(['GET /api/v3/site/config']);
    expect(user).toMatchObject({ version: 'v3', id: 'u1', email: 'alice@example.com' });
  });

  test('current user info needs a login', async () => {
    const { client, transport } = setup('v4');

    await expect(client.getUserInfo()).rejects.toThrow(NotAuthenticatedError);
    expect(transport.requests).toHaveLength(0);
  });

  test('a restored current session looks its user up by id', async () => {
    const { client, transport } = setup('v4');
    client.setToken('access-1', 'refresh-1', 'u1');
    transport.enqueue(envelope(v4User()));

    const user = await client.getUserInfo();
    await client.getUserInfo();

    expect(transport.calls()).toEqual(['GET /api/v4/user/info/u1']);
    expect(user).toMatchObject({ version: 'v4', id: 'u1', email: 'alice@example.com' });
  });

  test('a restored current session without a user id has no user', async () => {
    const { client, transport } = setup('v4');
    client.setToken('access-1', 'refresh-1');

    await expect(client.getUserInfo()).rejects.toThrow(NotAuthenticatedError);
    expect(transport.requests).toHaveLength(0);
  });

  test('server version comes from the ping endpoint', async () => {
    const { client, transport } = setup('v4');
    transport.enqueue(envelope('4.1.2'));

    expect(await client.getServerVersion()).toBe('4.1.2');
    expect(transport.calls()).toEqual(['GET /api/v4/site/ping']);
  });

  test('site config sections are addressed on the current protocol', async () => {
    const { client, transport } = setup('v4');
    transport.enqueue(envelope({ title: 'Drive' }));

    await client.getSiteConfig('login');

    expect(transport.calls()).toEqual(['GET /api/v4/site/config/login']);
  });
});
