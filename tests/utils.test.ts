import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { describe, expect, it } from 'vitest';

import {
  BridgeError,
  fail,
  isBridgeError,
  isNotFoundError,
  ok,
  toErrorMessage,
} from '../src/utils/errors.js';
import { readJsonSafe } from '../src/utils/read-json-safe.js';
import { withTempDir } from './helpers/temp-dir.js';

describe('readJsonSafe', () => {
  it('returns default value when file does not exist', async () => {
    const result = await readJsonSafe('/nonexistent/path/file.json', { default: true });
    expect(result).toEqual({ default: true });
  });

  it('parses valid JSON file', async () => {
    await withTempDir('json-test-', async (dir) => {
      const filepath = path.join(dir, 'test.json');
      await writeFile(filepath, JSON.stringify({ foo: 'bar' }));

      const result = await readJsonSafe(filepath, {});
      expect(result).toEqual({ foo: 'bar' });
    });
  });

  it('throws on corrupted JSON file', async () => {
    await withTempDir('json-test-', async (dir) => {
      const filepath = path.join(dir, 'corrupted.json');
      await writeFile(filepath, '{invalid json');

      await expect(readJsonSafe(filepath, {})).rejects.toThrow('Corrupted JSON file');
    });
  });

  it('throws on empty JSON file', async () => {
    await withTempDir('json-test-', async (dir) => {
      const filepath = path.join(dir, 'empty.json');
      await writeFile(filepath, '');

      await expect(readJsonSafe(filepath, {})).rejects.toThrow(`Corrupted JSON file (empty): ${filepath}`);
    });
  });
});

describe('error helpers', () => {
  it('builds tagged results', () => {
    expect(ok(5)).toEqual({ success: true, value: 5 });

    const failed = fail('NotConnected', 'Not connected to chat server', { status: 503 });
    expect(failed.success).toBe(false);
    if (!failed.success) {
      expect(failed.error).toBeInstanceOf(BridgeError);
      expect(failed.error.kind).toBe('NotConnected');
      expect(failed.error.status).toBe(503);
    }
  });

  it('keeps the cause on BridgeError', () => {
    const cause = new Error('socket hang up');
    const error = new BridgeError('NetworkFailure', 'request failed', { cause });

    expect(error.cause).toBe(cause);
    expect(error.name).toBe('BridgeError');
  });

  it('matches BridgeError by kind', () => {
    const error = new BridgeError('AuthRequired', 'sign in');

    expect(isBridgeError(error)).toBe(true);
    expect(isBridgeError(error, 'AuthRequired')).toBe(true);
    expect(isBridgeError(error, 'ProtocolError')).toBe(false);
    expect(isBridgeError(new Error('plain'))).toBe(false);
  });

  it('extracts messages from unknown values', () => {
    expect(toErrorMessage(new Error('boom'))).toBe('boom');
    expect(toErrorMessage('text')).toBe('text');
    expect(toErrorMessage({ message: 'shaped' })).toBe('shaped');
    expect(toErrorMessage(42)).toBe('42');
  });

  it('detects ENOENT', () => {
    const error = Object.assign(new Error('missing'), { code: 'ENOENT' });
    expect(isNotFoundError(error)).toBe(true);
    expect(isNotFoundError(new Error('other'))).toBe(false);
  });
});
