/**
 * Tests for the Result type used by decide() and the wire parser.
 */

import { ok, err, isOk, isErr, unwrap, unwrapErr, type Result } from '@domain/shared/result';

describe('Result type', () => {
  describe('constructors', () => {
    it('ok creates a success result', () => {
      const result = ok(42);
      expect(result._tag).toBe('Ok');
      expect(isOk(result)).toBe(true);
      expect(isErr(result)).toBe(false);
    });

    it('err creates an error result', () => {
      const result = err('something went wrong');
      expect(result._tag).toBe('Err');
      expect(isErr(result)).toBe(true);
      expect(isOk(result)).toBe(false);
    });

    it('ok keeps the same reference', () => {
      const value = { ticketId: 7 };
      expect(unwrap(ok(value))).toBe(value);
    });
  });

  describe('narrowing', () => {
    it('exposes the value after isOk', () => {
      const result: Result<string, number> = ok(21);
      if (!isOk(result)) throw new Error('expected Ok');
      expect(result.value * 2).toBe(42);
    });

    it('exposes the error after isErr', () => {
      const result: Result<string, number> = err('nope');
      if (!isErr(result)) throw new Error('expected Err');
      expect(result.error.toUpperCase()).toBe('NOPE');
    });
  });

  describe('extractors', () => {
    it('unwrap returns the value of Ok', () => {
      expect(unwrap(ok('ready'))).toBe('ready');
    });

    it('unwrap throws on Err with the error serialized', () => {
      expect(() => unwrap(err({ code: 'X' }))).toThrow('Called unwrap on Err: {"code":"X"}');
    });

    it('unwrapErr returns the error of Err', () => {
      expect(unwrapErr(err('oops'))).toBe('oops');
    });

    it('unwrapErr throws on Ok', () => {
      expect(() => unwrapErr(ok(1))).toThrow('Called unwrapErr on Ok: 1');
    });
  });
});
