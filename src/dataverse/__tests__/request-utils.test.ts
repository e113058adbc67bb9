import { AxiosError, AxiosHeaders } from 'axios';
import { describe, expect, it } from 'vitest';
import Logger from '../../logger';
import { getBackoffDelay, isAuthError, isTransient, requestWithRetry } from '../request-utils';

Logger.disableConsole();

function httpError(status: number, headers: Record<string, string> = {}): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(`HTTP ${status}`, 'ERR_BAD_RESPONSE', config, null, {
    data: null,
    status,
    statusText: '',
    headers,
    config
  });
}

const noSleep = async (_ms: number): Promise<void> => {};

describe('error classification', () => {
  it('treats throttling, server errors and lost connections as transient', () => {
    expect(isTransient(httpError(429))).toBe(true);
    expect(isTransient(httpError(503))).toBe(true);
    expect(isTransient(new AxiosError('socket hang up', 'ECONNRESET'))).toBe(true);
    expect(isTransient(httpError(404))).toBe(false);
    expect(isTransient(new Error('plain'))).toBe(false);
  });

  it('recognizes rejected tokens', () => {
    expect(isAuthError(httpError(401))).toBe(true);
    expect(isAuthError(httpError(403))).toBe(true);
    expect(isAuthError(httpError(500))).toBe(false);
  });

  it('doubles the backoff each attempt', () => {
    expect([0, 1, 2].map(getBackoffDelay)).toEqual([1000, 2000, 4000]);
  });
});

describe('requestWithRetry', () => {
  it('retries transient failures until one succeeds', async () => {
    let calls = 0;
    const waits: number[] = [];
    const result = await requestWithRetry(
      async () => {
        calls++;
        if (calls < 3) throw httpError(503);
        return 'ok';
      },
      { sleep: async (ms) => void waits.push(ms) }
    );
    expect(result).toBe('ok');
    expect(calls).toBe(3);
    expect(waits).toEqual([1000, 2000]);
  });

  it('honours Retry-After on a throttled response', async () => {
    let calls = 0;
    const waits: number[] = [];
    await requestWithRetry(
      async () => {
        calls++;
        if (calls === 1) throw httpError(429, { 'retry-after': '7' });
        return 'ok';
      },
      { sleep: async (ms) => void waits.push(ms) }
    );
    expect(waits).toEqual([7000]);
  });

  it('gives up after the last attempt', async () => {
    let calls = 0;
    const failing = requestWithRetry(
      async () => {
        calls++;
        throw httpError(500);
      },
      { maxRetries: 2, sleep: noSleep }
    );
    await expect(failing).rejects.toThrow('HTTP 500');
    expect(calls).toBe(2);
  });

  it('makes a single attempt when retries are set to zero', async () => {
    let calls = 0;
    const failing = requestWithRetry(
      async () => {
        calls++;
        throw httpError(503);
      },
      { maxRetries: 0, sleep: noSleep }
    );
    await expect(failing).rejects.toThrow('HTTP 503');
    expect(calls).toBe(1);
  });

  it('does not retry a client error', async () => {
    let calls = 0;
    const failing = requestWithRetry(
      async () => {
        calls++;
        throw httpError(400);
      },
      { sleep: noSleep }
    );
    await expect(failing).rejects.toThrow('HTTP 400');
    expect(calls).toBe(1);
  });
});
