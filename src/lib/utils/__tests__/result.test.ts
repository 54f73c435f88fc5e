import { describe, expect, it } from 'vitest';
import { err, fromPromise, isErr, isOk, map, mapErr, ok, unwrapOr } from '../result.js';

describe('result utilities', () => {
  it('ok() returns success result', () => {
    expect(ok('value')).toEqual({ ok: true, value: 'value' });
  });

  it('err() returns error result', () => {
    const result = err(new Error('boom'));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('boom');
    }
  });

  it('isOk/isErr narrow result types', () => {
    const success = ok(123);
    const failure = err('bad');

    expect(isOk(success) && success.value).toBe(123);
    expect(isErr(failure) && failure.error).toBe('bad');
  });

  it('map() transforms success value', () => {
    expect(map(ok(2), (value) => value * 3)).toEqual({ ok: true, value: 6 });
  });

  it('mapErr() transforms error value', () => {
    expect(mapErr(err('oops'), (error) => `${error}!`)).toEqual({ ok: false, error: 'oops!' });
  });

  it('unwrapOr() falls back on error', () => {
    expect(unwrapOr(err('nope'), 'fallback')).toBe('fallback');
    expect(unwrapOr(ok('yes'), 'fallback')).toBe('yes');
  });

  it('fromPromise() settles resolution into ok', async () => {
    const result = await fromPromise(Promise.resolve(7), () => 'unused');

    expect(result).toEqual({ ok: true, value: 7 });
  });

  it('fromPromise() translates rejection with onError', async () => {
    const result = await fromPromise(Promise.reject(new Error('down')), (error) =>
      error instanceof Error ? `wrapped: ${error.message}` : 'unknown'
    );

    expect(result).toEqual({ ok: false, error: 'wrapped: down' });
  });
});
