import { jest, describe, it, expect, afterEach } from '@jest/globals';
import { jsonError, jsonSuccess, outputJson } from '../../src/utils/json-output.js';

describe('JSON output', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('wraps data in a success envelope', () => {
    const response = jsonSuccess({ fileCount: 1 });
    expect(response.success).toBe(true);
    expect(response.data).toEqual({ fileCount: 1 });
    expect(Number.isNaN(Date.parse(response.timestamp))).toBe(false);
  });

  it('builds an error envelope from a message or an Error', () => {
    const fromString = jsonError('Invalid path: x', 'ratio');
    expect(fromString.success).toBe(false);
    expect(fromString.error).toBe('Invalid path: x');
    expect(fromString.command).toBe('ratio');

    const fromError = jsonError(new Error('boom'));
    expect(fromError.error).toBe('boom');
    expect('command' in fromError).toBe(false);
  });

  it('prints the envelope as indented JSON', () => {
    const spy = jest.spyOn(console, 'log').mockImplementation(() => {});
    const response = { success: true, data: { mode: 'file' }, timestamp: 'now' };

    outputJson(response);

    expect(spy).toHaveBeenCalledWith(JSON.stringify(response, null, 2));
  });
});
