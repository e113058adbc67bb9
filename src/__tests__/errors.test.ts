import { describe, expect, it } from 'vitest';
import {
  FAILURE_POLICY,
  FatalConnectionError,
  RecoverableFetchError,
  RecoverableUserError,
  attempt,
  recoveryFor,
  unwrap,
  valueOr
} from '../errors';
import Logger from '../logger';

Logger.disableConsole();

describe('recoveryFor', () => {
  it('aborts the run on a connection failure', () => {
    expect(recoveryFor(new FatalConnectionError('down'))).toBe('abort-run');
  });

  it('follows the policy table for fetch failures', () => {
    expect(recoveryFor(new RecoverableFetchError('user-directory', 'x'))).toBe('abort-run');
    expect(recoveryFor(new RecoverableFetchError('products', 'x'))).toBe('abandon-node');
    expect(recoveryFor(new RecoverableFetchError('lookup', 'x'))).toBe('default-value');
  });

  it('abandons the node for anything else', () => {
    expect(recoveryFor(new Error('boom'))).toBe('abandon-node');
    expect(recoveryFor('boom')).toBe('abandon-node');
  });

  it('gives every failure kind a policy', () => {
    expect(Object.keys(FAILURE_POLICY).sort()).toEqual([
      'connection',
      'geography',
      'lookup',
      'option-label',
      'products',
      'shared-access',
      'user-directory'
    ]);
  });
});

describe('attempt', () => {
  it('wraps a resolved value', async () => {
    expect(await attempt('lookup', 'reading', async () => 5)).toEqual({ ok: true, value: 5 });
  });

  it('captures a rejection with its kind and label', async () => {
    const result = await attempt('geography', 'fetching region', async () => {
      throw new Error('timeout');
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('geography');
    expect(result.error.message).toBe('fetching region: timeout');
    expect(result.error.cause).toBeInstanceOf(Error);
  });

  it('captures a connection failure like any other rejection', async () => {
    const result = await attempt('lookup', 'reading', async () => {
      throw new FatalConnectionError('down');
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(RecoverableFetchError);
    expect(result.error.kind).toBe('lookup');
    expect(result.error.cause).toBeInstanceOf(FatalConnectionError);
  });
});

describe('valueOr / unwrap', () => {
  const failed = { ok: false as const, error: new RecoverableFetchError('lookup', 'nope') };

  it('returns the value or the fallback', () => {
    expect(valueOr({ ok: true, value: 'a' }, 'b')).toBe('a');
    expect(valueOr(failed, 'b')).toBe('b');
  });

  it('throws the captured error', () => {
    expect(unwrap({ ok: true, value: 1 })).toBe(1);
    expect(() => unwrap(failed)).toThrow(failed.error);
  });
});

describe('RecoverableUserError', () => {
  it('names the user and the cause', () => {
    const error = new RecoverableUserError('u1', 'Jane Doe', { cause: new Error('products: 500') });
    expect(error.message).toBe('Error processing user Jane Doe: products: 500');
    expect(error.userId).toBe('u1');
  });
});
