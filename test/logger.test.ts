// This test suite verifies log payload sanitization and logger options.

import { describe, expect, it } from 'vitest';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from '../src/utils/logger.js';
import { MCP_SERVER_NAME } from '../src/version.js';

describe('logger helpers', () => {
  it('redacts sensitive keys with a stable hash', () => {
    const first = sanitizeForLog({ apiToken: 'test-secret', note: 'visible' });
    const second = sanitizeForLog({ apiToken: 'test-secret' });

    expect(first).toMatchObject({ note: 'visible', apiToken: expect.stringMatching(/^\[redacted:[0-9a-f]{12}\]$/) });
    const tokenOf = (value: unknown): unknown =>
      value && typeof value === 'object' ? Reflect.get(value, 'apiToken') : undefined;
    expect(tokenOf(first)).toBe(tokenOf(second));
  });

  it('truncates long strings and large arrays', () => {
    const sanitized = sanitizeForLog({
      body: 'x'.repeat(1030),
      items: Array.from({ length: 32 }, (_value, index) => index)
    });

    expect(sanitized).toEqual({
      body: `${'x'.repeat(1024)}...[truncated:6]`,
      items: [...Array.from({ length: 30 }, (_value, index) => index), '[truncated-items:2]']
    });
  });

  it('limits nesting depth', () => {
    const deep = { a: { b: { c: { d: { e: { f: { g: 'deep' } } } } } } };

    expect(sanitizeForLog(deep)).toEqual({ a: { b: { c: { d: { e: { f: '[depth-limited]' } } } } } });
  });

  it('shapes errors and non-errors', () => {
    const shaped = errorForLog(new TypeError('bad input'));

    expect(shaped).toMatchObject({ name: 'TypeError', message: 'bad input' });
    expect(errorForLog('plain failure')).toEqual({ message: 'plain failure' });
  });

  it('builds pino options with the service name', () => {
    const options = buildLoggerOptions('warn');

    expect(options.level).toBe('warn');
    expect(options.base).toEqual({ service: MCP_SERVER_NAME });
  });
});
