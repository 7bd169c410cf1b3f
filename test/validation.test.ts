/**
 * Tests for validation utilities
 */
import { describe, test, expect } from 'vitest';
import {
  normalizePath,
  isRootPath,
  containsPathTraversal,
  validatePathSafety,
  validateFilename,
  joinPath,
  getParentPath,
  getFilename,
  splitPath,
} from '../src/validation/path.js';
import { validateEmail, validatePassword, validateTotpCode } from '../src/validation/auth.js';
import {
  validateApiVersion,
  validateBaseUrl,
  validateBoolean,
  validatePositiveInt,
} from '../src/validation/config.js';

describe('Path validation - Normalization', () => {
  test('normalizePath ensures leading slash', () => {
    expect(normalizePath('file.txt')).toBe('/file.txt');
    expect(normalizePath('/file.txt')).toBe('/file.txt');
  });

  test('normalizePath removes duplicate and trailing slashes', () => {
    expect(normalizePath('//path//to///file')).toBe('/path/to/file');
    expect(normalizePath('/docs/')).toBe('/docs');
  });

  test('normalizePath handles root', () => {
    expect(normalizePath('')).toBe('/');
    expect(normalizePath('/')).toBe('/');
    expect(isRootPath('//')).toBe(true);
    expect(isRootPath('/a')).toBe(false);
  });
});

describe('Path validation - Safety checks', () => {
  test('validatePathSafety accepts and normalizes valid paths', () => {
    expect(validatePathSafety('docs//a.txt')).toEqual({ ok: true, value: '/docs/a.txt' });
  });

  test('validatePathSafety rejects path traversal', () => {
    const result = validatePathSafety('/path/../etc/passwd');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('INVALID_PATH');
  });

  test('validatePathSafety rejects empty input and control characters', () => {
    const empty = validatePathSafety('');
    expect(empty.ok).toBe(false);
    if (!empty.ok) expect(empty.error.message).toBe('Path is required: ');

    expect(validatePathSafety('/a\u0007b').ok).toBe(false);
  });

  test('dots inside names are not traversal', () => {
    expect(containsPathTraversal('/docs/v1..2.txt')).toBe(false);
    expect(containsPathTraversal('/docs/./a')).toBe(true);
  });
});

describe('Path validation - Filename validation', () => {
  test('validateFilename accepts valid filenames', () => {
    expect(validateFilename('document.txt')).toEqual({ ok: true, value: 'document.txt' });
  });

  test('validateFilename rejects path separators', () => {
    expect(validateFilename('path/to/file.txt').ok).toBe(false);
    expect(validateFilename('path\\file.txt').ok).toBe(false);
  });

  test('validateFilename rejects traversal patterns and blanks', () => {
    expect(validateFilename('..').ok).toBe(false);
    expect(validateFilename('   ').ok).toBe(false);
  });
});

describe('Path validation - Path operations', () => {
  test('joinPath joins directory and name', () => {
    expect(joinPath('/', 'a.txt')).toBe('/a.txt');
    expect(joinPath('/docs/', 'a.txt')).toBe('/docs/a.txt');
  });

  test('getParentPath extracts parent directory', () => {
    expect(getParentPath('/home/user/file.txt')).toBe('/home/user');
    expect(getParentPath('/file.txt')).toBe('/');
    expect(getParentPath('/')).toBe('/');
  });

  test('getFilename extracts filename from path', () => {
    expect(getFilename('/home/user/file.txt')).toBe('file.txt');
    expect(getFilename('/file.txt')).toBe('file.txt');
    expect(getFilename('/')).toBe('/');
  });

  test('splitPath returns parent and leaf', () => {
    expect(splitPath('/docs/a.txt')).toEqual({ parent: '/docs', name: 'a.txt' });
    expect(splitPath('a.txt')).toEqual({ parent: '/', name: 'a.txt' });
  });
});

describe('Auth validation - Credentials', () => {
  test('validateEmail trims valid emails', () => {
    expect(validateEmail(' user@example.com ')).toEqual({ ok: true, value: 'user@example.com' });
  });

  test('validateEmail rejects invalid emails', () => {
    const result = validateEmail('invalid-email');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Invalid email format: invalid-email');
  });

  test('validatePassword requires a value', () => {
    expect(validatePassword('test-password').ok).toBe(true);
    expect(validatePassword('').ok).toBe(false);
    expect(validatePassword('abc', 8).ok).toBe(false);
  });

  test('validateTotpCode accepts 6-8 digits', () => {
    expect(validateTotpCode(' 123456 ')).toEqual({ ok: true, value: '123456' });
    expect(validateTotpCode('12345678').ok).toBe(true);
    expect(validateTotpCode('12a456').ok).toBe(false);
    expect(validateTotpCode('12345').ok).toBe(false);
  });
});

describe('Config validation - Values', () => {
  test('validateBaseUrl strips trailing slashes', () => {
    expect(validateBaseUrl('https://drive.example.com/')).toEqual({
      ok: true,
      value: 'https://drive.example.com',
    });
  });

  test('validateBaseUrl rejects other schemes and garbage', () => {
    expect(validateBaseUrl('ftp://drive.example.com').ok).toBe(false);
    expect(validateBaseUrl('not a url').ok).toBe(false);
    expect(validateBaseUrl('').ok).toBe(false);
  });

  test('validateApiVersion is case-insensitive', () => {
    expect(validateApiVersion('V4')).toEqual({ ok: true, value: 'v4' });
    expect(validateApiVersion('auto')).toEqual({ ok: true, value: 'auto' });
    expect(validateApiVersion('v5').ok).toBe(false);
  });

  test('validatePositiveInt accepts numbers and numeric strings', () => {
    expect(validatePositiveInt('50', 'pageSize')).toEqual({ ok: true, value: 50 });
    expect(validatePositiveInt(0, 'pageSize').ok).toBe(false);
    expect(validatePositiveInt('1.5', 'pageSize').ok).toBe(false);
  });

  test('validateBoolean parses common spellings', () => {
    expect(validateBoolean('yes')).toEqual({ ok: true, value: true });
    expect(validateBoolean('0')).toEqual({ ok: true, value: false });
    expect(validateBoolean('maybe').ok).toBe(false);
  });
});
