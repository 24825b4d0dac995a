/**
 * Unit tests for Result<T, E> helper functions.
 *
 * These tests cover construction, branch access, eager and lazy fallbacks,
 * match dispatch and the behaviour of released results.
 */

import {
  Ok,
  Err,
  isOk,
  isErr,
  value,
  error,
  valueOr,
  errorOr,
  valueOrElse,
  errorOrElse,
  match,
  release,
  isReleased,
} from '../result';
import { Result } from '../../types/result';

describe('result', () => {
  describe('Ok', () => {
    it('should build a success result holding the value', () => {
      expect(Ok(42)).toEqual({ ok: true, value: 42 });
    });

    it('should report isOk true and isErr false', () => {
      const result = Ok('done');
      expect(isOk(result)).toBe(true);
      expect(isErr(result)).toBe(false);
    });
  });

  describe('Err', () => {
    it('should build a failure result holding the error', () => {
      expect(Err('boom')).toEqual({ ok: false, error: 'boom' });
    });

    it('should report isOk false and isErr true', () => {
      const result = Err('boom');
      expect(isOk(result)).toBe(false);
      expect(isErr(result)).toBe(true);
    });
  });

  describe('value / error', () => {
    it('should expose exactly one branch of a success result', () => {
      const result: Result<number, string> = Ok(7);
      expect(value(result)).toBe(7);
      expect(error(result)).toBeUndefined();
    });

    it('should expose exactly one branch of a failure result', () => {
      const result: Result<number, string> = Err('bad input');
      expect(value(result)).toBeUndefined();
      expect(error(result)).toBe('bad input');
    });

    it('should return falsy branch values unchanged', () => {
      expect(value(Ok(0))).toBe(0);
      expect(error(Err(''))).toBe('');
    });
  });

  describe('valueOr / errorOr', () => {
    it('should return the value of a success result', () => {
      expect(valueOr(Ok(42), 0)).toBe(42);
    });

    it('should return the fallback for a failure result', () => {
      expect(valueOr(Err('nope'), 0)).toBe(0);
    });

    it('should return the error of a failure result', () => {
      expect(errorOr(Err('nope'), 'fallback')).toBe('nope');
    });

    it('should return the fallback for a success result', () => {
      expect(errorOr(Ok(1), 'fallback')).toBe('fallback');
    });
  });

  describe('valueOrElse', () => {
    it('should not call the supplier for a success result', () => {
      const supplier = jest.fn(() => 0);

      expect(valueOrElse(Ok(42), supplier)).toBe(42);
      expect(supplier).not.toHaveBeenCalled();
    });

    it('should call the supplier once for a failure result', () => {
      const supplier = jest.fn(() => 99);

      expect(valueOrElse(Err('nope'), supplier)).toBe(99);
      expect(supplier).toHaveBeenCalledTimes(1);
    });
  });

  describe('errorOrElse', () => {
    it('should not call the supplier for a failure result', () => {
      const supplier = jest.fn(() => 'fallback');

      expect(errorOrElse(Err('nope'), supplier)).toBe('nope');
      expect(supplier).not.toHaveBeenCalled();
    });

    it('should call the supplier once for a success result', () => {
      const supplier = jest.fn(() => 'fallback');

      expect(errorOrElse(Ok(1), supplier)).toBe('fallback');
      expect(supplier).toHaveBeenCalledTimes(1);
    });
  });

  describe('match', () => {
    it('should call only the success handler for a success result', () => {
      const onOk = jest.fn();
      const onErr = jest.fn();

      match(Ok('Operation succeeded'), onOk, onErr);

      expect(onOk).toHaveBeenCalledTimes(1);
      expect(onOk).toHaveBeenCalledWith('Operation succeeded');
      expect(onErr).not.toHaveBeenCalled();
    });

    it('should call only the failure handler for a failure result', () => {
      const onOk = jest.fn();
      const onErr = jest.fn();

      match(Err('Operation failed'), onOk, onErr);

      expect(onErr).toHaveBeenCalledTimes(1);
      expect(onErr).toHaveBeenCalledWith('Operation failed');
      expect(onOk).not.toHaveBeenCalled();
    });

    it('should return the value produced by the chosen handler', () => {
      const result: Result<number, string> = Ok(20);

      const doubled = match(
        result,
        (n) => n * 2,
        (message: string) => message.length
      );

      expect(doubled).toBe(40);
    });
  });

  describe('release', () => {
    it('should return true on the first release and false afterwards', () => {
      const result = Ok(1);

      expect(release(result)).toBe(true);
      expect(release(result)).toBe(false);
    });

    it('should only mark the released result', () => {
      const first = Ok(1);
      const second = Ok(1);

      release(first);

      expect(isReleased(first)).toBe(true);
      expect(isReleased(second)).toBe(false);
      expect(isOk(second)).toBe(true);
    });

    it('should hide both branches of a released result', () => {
      const success = Ok(5);
      const failure = Err('x');
      release(success);
      release(failure);

      expect(isOk(success)).toBe(false);
      expect(isErr(success)).toBe(false);
      expect(isOk(failure)).toBe(false);
      expect(isErr(failure)).toBe(false);
      expect(value(success)).toBeUndefined();
      expect(error(failure)).toBeUndefined();
    });

    it('should fall back for a released success result', () => {
      const result: Result<number, string> = Ok(5);
      release(result);
      const supplier = jest.fn(() => -1);

      expect(valueOr(result, 0)).toBe(0);
      expect(valueOrElse(result, supplier)).toBe(-1);
      expect(supplier).toHaveBeenCalledTimes(1);
    });

    it('should fall back for a released failure result', () => {
      const result: Result<number, string> = Err('x');
      release(result);

      expect(errorOr(result, 'fallback')).toBe('fallback');
      expect(errorOrElse(result, () => 'supplied')).toBe('supplied');
    });

    it('should run no handler when matching a released result', () => {
      const result = Ok('gone');
      release(result);
      const onOk = jest.fn();
      const onErr = jest.fn();

      expect(match(result, onOk, onErr)).toBeUndefined();
      expect(onOk).not.toHaveBeenCalled();
      expect(onErr).not.toHaveBeenCalled();
    });
  });
});
