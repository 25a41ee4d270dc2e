import { describe, it, expect, vi, afterEach } from 'vitest';

import { generateSecret, generateTokenId } from '../packages/shared/src/utils/crypto.js';
import { isNonEmptyString, isPlainObject, isValidEmail, isValidPort, sanitizeForLog, truncate } from '../packages/shared/src/utils/validation.js';
import { Logger, createLogger, isLogLevel } from '../packages/shared/src/utils/logger.js';

// ═══════════════════════════════════════════════════════════════
// 1. CRYPTO UTILS
// ═══════════════════════════════════════════════════════════════
describe('Crypto Utils', () => {
  describe('generateSecret', () => {
    it('should generate a base64url string of default length', () => {
      const secret = generateSecret();
      expect(secret.length).toBeGreaterThan(10);
      expect(secret).toMatch(/^[A-Za-z0-9_-]+$/);
    });

    it('should respect custom length', () => {
      const short = generateSecret(8);
      const long = generateSecret(128);
      expect(long.length).toBeGreaterThan(short.length);
    });

    it('should generate unique secrets', () => {
      const secrets = new Set(Array.from({ length: 50 }, () => generateSecret()));
      expect(secrets.size).toBe(50);
    });
  });

  describe('generateTokenId', () => {
    it('should return a v4 UUID', () => {
      expect(generateTokenId()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    });

    it('should never repeat', () => {
      const ids = new Set(Array.from({ length: 100 }, () => generateTokenId()));
      expect(ids.size).toBe(100);
    });
  });
});

// ═══════════════════════════════════════════════════════════════
// 2. VALIDATION UTILS
// ═══════════════════════════════════════════════════════════════
describe('Validation Utils', () => {
  describe('isNonEmptyString', () => {
    it('should return true for non-empty strings', () => {
      expect(isNonEmptyString('hello')).toBe(true);
    });

    it('should return false for empty string', () => {
      expect(isNonEmptyString('')).toBe(false);
    });

    it('should return false for whitespace-only string', () => {
      expect(isNonEmptyString('   ')).toBe(false);
    });

    it('should return false for non-string types', () => {
      expect(isNonEmptyString(null)).toBe(false);
      expect(isNonEmptyString(undefined)).toBe(false);
      expect(isNonEmptyString(42)).toBe(false);
      expect(isNonEmptyString({})).toBe(false);
    });
  });

  describe('isValidEmail', () => {
    it('should accept valid emails', () => {
      expect(isValidEmail('user@example.com')).toBe(true);
      expect(isValidEmail('admin@gatehouse.dev')).toBe(true);
      expect(isValidEmail('test+tag@gmail.com')).toBe(true);
    });

    it('should reject invalid emails', () => {
      expect(isValidEmail('')).toBe(false);
      expect(isValidEmail('notanemail')).toBe(false);
      expect(isValidEmail('@missing.user')).toBe(false);
      expect(isValidEmail('missing@')).toBe(false);
      expect(isValidEmail('has spaces@email.com')).toBe(false);
    });
  });

  describe('isValidPort', () => {
    it('should accept valid ports', () => {
      expect(isValidPort(1)).toBe(true);
      expect(isValidPort(80)).toBe(true);
      expect(isValidPort(443)).toBe(true);
      expect(isValidPort(18800)).toBe(true);
      expect(isValidPort(65535)).toBe(true);
    });

    it('should reject invalid ports', () => {
      expect(isValidPort(0)).toBe(false);
      expect(isValidPort(-1)).toBe(false);
      expect(isValidPort(65536)).toBe(false);
      expect(isValidPort(3.14)).toBe(false);
      expect(isValidPort(NaN)).toBe(false);
    });
  });

  describe('isPlainObject', () => {
    it('should accept objects and reject arrays and null', () => {
      expect(isPlainObject({ a: 1 })).toBe(true);
      expect(isPlainObject([])).toBe(false);
      expect(isPlainObject(null)).toBe(false);
      expect(isPlainObject('{}')).toBe(false);
    });
  });

  describe('sanitizeForLog', () => {
    it('should redact sensitive keys', () => {
      const result = sanitizeForLog({
        username: 'admin',
        password: 'secret123',
        apiKey: 'sk-12345',
        token: 'jwt-token',
      });
      expect(result['username']).toBe('admin');
      expect(result['password']).toBe('[REDACTED]');
      expect(result['apiKey']).toBe('[REDACTED]');
      expect(result['token']).toBe('[REDACTED]');
    });

    it('should handle nested objects', () => {
      const result = sanitizeForLog({
        config: { dbPassword: 'secret', host: 'localhost' },
      });
      expect(result['config']).toEqual({ dbPassword: '[REDACTED]', host: 'localhost' });
    });

    it('should preserve non-sensitive values', () => {
      const result = sanitizeForLog({ name: 'Gatehouse', version: '0.1.0' });
      expect(result['name']).toBe('Gatehouse');
      expect(result['version']).toBe('0.1.0');
    });

    it('should handle empty objects', () => {
      expect(sanitizeForLog({})).toEqual({});
    });
  });

  describe('truncate', () => {
    it('should not truncate short strings', () => {
      expect(truncate('hello', 200)).toBe('hello');
    });

    it('should truncate long strings with ellipsis', () => {
      const long = 'a'.repeat(300);
      const result = truncate(long, 100);
      expect(result.length).toBe(103); // 100 + '...'
      expect(result.endsWith('...')).toBe(true);
    });

    it('should use default maxLength of 200', () => {
      const long = 'b'.repeat(250);
      const result = truncate(long);
      expect(result.length).toBe(203);
    });
  });
});

// ═══════════════════════════════════════════════════════════════
// 3. LOGGER
// ═══════════════════════════════════════════════════════════════
describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should create a logger with context', () => {
    const logger = createLogger('TestContext');
    expect(logger).toBeInstanceOf(Logger);
  });

  it('should prefix child contexts with the parent', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    createLogger('Parent', 'debug').child('Child').warn('hello');
    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0]?.[0])).toContain('[WARN] [Parent:Child]');
  });

  it('should respect minLevel', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = createLogger('Test', 'warn');
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should append data as JSON', () => {
    const spy = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    createLogger('Test', 'info').info('Request rejected', { kind: 'TokenExpired' });
    expect(String(spy.mock.calls[0]?.[0])).toMatch(/ Request rejected \{"kind":"TokenExpired"\}$/);
  });

  it('should redact sensitive fields in data', () => {
    const spy = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    createLogger('Test', 'info').info('Login failed', { identifier: 'alice', password: 'secret1' });
    expect(String(spy.mock.calls[0]?.[0])).toMatch(/\{"identifier":"alice","password":"\[REDACTED\]"\}$/);
  });

  it('should flatten error objects', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('Test', 'error');
    logger.error('Something failed', 'string error');
    logger.error('Something failed', { detail: 'info' });
    expect(String(spy.mock.calls[0]?.[0])).toMatch(/\{"error":"string error"\}$/);
    expect(String(spy.mock.calls[1]?.[0])).toMatch(/\{"detail":"info"\}$/);
  });

  it('should recognise log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('fatal')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
