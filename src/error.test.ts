// Package tidesdb
// Copyright (C) TidesDB
//
// Original Author: Alex Gaetano Padula
//
// Licensed under the Mozilla Public License, v. 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//	https://www.mozilla.org/en-US/MPL/2.0/
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

import {
  checkFound,
  checkResult,
  ClosedHandleError,
  CorruptedError,
  describeStatus,
  isFatal,
  KeyExistError,
  LmdbError,
  LogicError,
  NotFoundError,
  PanicError,
  raise,
  RuntimeError,
  ValueSizeError,
} from './error';
import { ErrorCode } from './types';

function thrown(fn: () => unknown): LmdbError {
  try {
    fn();
  } catch (err) {
    if (err instanceof LmdbError) return err;
    throw err;
  }
  throw new Error('expected a failure');
}

describe('Error taxonomy', () => {
  describe('raise', () => {
    test('key exists becomes KeyExistError', () => {
      const err = thrown(() => raise('mdb_put', ErrorCode.KeyExist));
      expect(err).toBeInstanceOf(KeyExistError);
      expect(err).toBeInstanceOf(RuntimeError);
      expect(err).not.toBeInstanceOf(NotFoundError);
      expect(err.kind).toBe('runtime');
      expect(err.message).toBe('mdb_put: MDB_KEYEXIST: Key/data pair already exists');
    });

    test('not found becomes NotFoundError', () => {
      const err = thrown(() => raise('mdb_dbi_open', ErrorCode.NotFound));
      expect(err).toBeInstanceOf(NotFoundError);
      expect(err).not.toBeInstanceOf(KeyExistError);
      expect(err.code).toBe(-30798);
      expect(err.origin).toBe('mdb_dbi_open');
    });

    test('corrupted becomes a fatal CorruptedError', () => {
      const err = thrown(() => raise('mdb_get', ErrorCode.Corrupted));
      expect(err).toBeInstanceOf(CorruptedError);
      expect(err).not.toBeInstanceOf(PanicError);
      expect(err.kind).toBe('fatal');
    });

    test('panic becomes a fatal PanicError', () => {
      const err = thrown(() => raise('mdb_txn_commit', ErrorCode.Panic));
      expect(err).toBeInstanceOf(PanicError);
      expect(err).not.toBeInstanceOf(CorruptedError);
      expect(err.kind).toBe('fatal');
    });

    test('any other code becomes a plain RuntimeError', () => {
      const err = thrown(() => raise('mdb_env_open', ErrorCode.InvalidArgument));
      expect(err).toBeInstanceOf(RuntimeError);
      expect(err).not.toBeInstanceOf(KeyExistError);
      expect(err).not.toBeInstanceOf(NotFoundError);
      expect(err.name).toBe('RuntimeError');
      expect(err.message).toBe('mdb_env_open: Invalid argument');
      expect(err.code).toBe(22);
    });

    test('uses the supplied strerror', () => {
      expect(() => raise('mdb_env_sync', ErrorCode.IOError, () => 'disk went away')).toThrow(
        'mdb_env_sync: disk went away'
      );
    });
  });

  describe('checkResult', () => {
    test('success is silent', () => {
      expect(() => checkResult(ErrorCode.Success, 'mdb_env_sync')).not.toThrow();
    });

    test('not found raises outside of lookups', () => {
      expect(() => checkResult(ErrorCode.NotFound, 'mdb_dbi_open')).toThrow(NotFoundError);
    });

    test('raises on failure', () => {
      expect(() => checkResult(ErrorCode.MapFull, 'mdb_put')).toThrow(
        'mdb_put: MDB_MAP_FULL: Environment mapsize limit reached'
      );
    });
  });

  describe('checkFound', () => {
    test('success is true', () => {
      expect(checkFound(ErrorCode.Success, 'mdb_get')).toBe(true);
    });

    test('not found is false', () => {
      expect(checkFound(ErrorCode.NotFound, 'mdb_get')).toBe(false);
    });

    test('other codes raise', () => {
      expect(() => checkFound(ErrorCode.KeyExist, 'mdb_cursor_get')).toThrow(KeyExistError);
      expect(() => checkFound(ErrorCode.Corrupted, 'mdb_cursor_get')).toThrow(CorruptedError);
    });
  });

  describe('logic failures', () => {
    test('ClosedHandleError for a transaction', () => {
      const err = new ClosedHandleError('mdb_txn_commit', 'transaction');
      expect(err).toBeInstanceOf(LogicError);
      expect(err.kind).toBe('logic');
      expect(err.code).toBe(ErrorCode.BadTxn);
      expect(err.message).toBe('mdb_txn_commit: transaction has been released');
    });

    test('ClosedHandleError for a cursor', () => {
      const err = new ClosedHandleError('mdb_cursor_get', 'cursor');
      expect(err.code).toBe(ErrorCode.InvalidArgument);
      expect(err.message).toBe('mdb_cursor_get: cursor has been released');
    });

    test('ValueSizeError carries both lengths', () => {
      const err = new ValueSizeError('Val.decode', 4, 3);
      expect(err).toBeInstanceOf(LogicError);
      expect(err.expected).toBe(4);
      expect(err.actual).toBe(3);
      expect(err.code).toBe(ErrorCode.BadValSize);
      expect(err.message).toBe('Val.decode: expected 4 bytes, got 3');
    });
  });

  test('isFatal', () => {
    expect(isFatal(new CorruptedError('mdb_get', ErrorCode.Corrupted))).toBe(true);
    expect(isFatal(new PanicError('mdb_get', ErrorCode.Panic))).toBe(true);
    expect(isFatal(new RuntimeError('mdb_get', ErrorCode.IOError))).toBe(false);
    expect(isFatal(new Error('plain'))).toBe(false);
    expect(isFatal('text')).toBe(false);
  });

  test('describeStatus', () => {
    expect(describeStatus(ErrorCode.Success)).toBe('Successful return: 0');
    expect(describeStatus(ErrorCode.Busy)).toBe('Device or resource busy');
    expect(describeStatus(12345)).toBe('Unknown error 12345');
    expect(new LmdbError('mdb_drop', ErrorCode.AccessDenied).message).toBe('mdb_drop: Permission denied');
  });
});
