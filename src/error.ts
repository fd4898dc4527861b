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

import { ErrorCode, FailureKind } from './types';
import { debug } from './format';

const log = debug('lmdb-handles:error');

/**
 * Maps a status code to a human-readable message.
 */
export type StrError = (code: number) => string;

/**
 * Base class for LMDB failures.
 *
 * The message reads `<origin>: <description>`, where `origin` names the
 * engine primitive that produced `code`.
 */
export class LmdbError extends Error {
  public readonly code: number;
  public readonly origin: string;

  constructor(origin: string, code: number, description: string = describeStatus(code)) {
    super(`${origin}: ${description}`);
    this.name = 'LmdbError';
    this.code = code;
    this.origin = origin;
  }

  get kind(): FailureKind {
    return 'runtime';
  }
}

/**
 * Caller misuse. Retrying will not help.
 */
export class LogicError extends LmdbError {
  constructor(origin: string, code: number, description?: string) {
    super(origin, code, description);
    this.name = 'LogicError';
  }

  get kind(): FailureKind {
    return 'logic';
  }
}

/**
 * Transient or environmental failure.
 */
export class RuntimeError extends LmdbError {
  constructor(origin: string, code: number, description?: string) {
    super(origin, code, description);
    this.name = 'RuntimeError';
  }
}

/**
 * The environment may be unusable after this failure.
 */
export class FatalError extends LmdbError {
  constructor(origin: string, code: number, description?: string) {
    super(origin, code, description);
    this.name = 'FatalError';
  }

  get kind(): FailureKind {
    return 'fatal';
  }
}

/** `MDB_KEYEXIST` */
export class KeyExistError extends RuntimeError {
  constructor(origin: string, code: number, description?: string) {
    super(origin, code, description);
    this.name = 'KeyExistError';
  }
}

/** `MDB_NOTFOUND`, where absence is not a documented outcome. */
export class NotFoundError extends RuntimeError {
  constructor(origin: string, code: number, description?: string) {
    super(origin, code, description);
    this.name = 'NotFoundError';
  }
}

/** `MDB_CORRUPTED` */
export class CorruptedError extends FatalError {
  constructor(origin: string, code: number, description?: string) {
    super(origin, code, description);
    this.name = 'CorruptedError';
  }
}

/** `MDB_PANIC` */
export class PanicError extends FatalError {
  constructor(origin: string, code: number, description?: string) {
    super(origin, code, description);
    this.name = 'PanicError';
  }
}

/**
 * A wrapper was used after its handle was released.
 */
export class ClosedHandleError extends LogicError {
  constructor(origin: string, what: 'environment' | 'transaction' | 'cursor') {
    const code = what === 'transaction' ? ErrorCode.BadTxn : ErrorCode.InvalidArgument;
    super(origin, code, `${what} has been released`);
    this.name = 'ClosedHandleError';
  }
}

/**
 * A value view's length does not match the fixed size of the requested type.
 */
export class ValueSizeError extends LogicError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(origin: string, expected: number, actual: number) {
    super(origin, ErrorCode.BadValSize, `expected ${expected} bytes, got ${actual}`);
    this.name = 'ValueSizeError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * LMDB's own message for a status code.
 */
export function describeStatus(code: number): string {
  switch (code) {
    case ErrorCode.Success:
      return 'Successful return: 0';
    case ErrorCode.KeyExist:
      return 'MDB_KEYEXIST: Key/data pair already exists';
    case ErrorCode.NotFound:
      return 'MDB_NOTFOUND: No matching key/data pair found';
    case ErrorCode.PageNotFound:
      return 'MDB_PAGE_NOTFOUND: Requested page not found';
    case ErrorCode.Corrupted:
      return 'MDB_CORRUPTED: Located page was wrong type';
    case ErrorCode.Panic:
      return 'MDB_PANIC: Update of meta page failed or environment had fatal error';
    case ErrorCode.VersionMismatch:
      return 'MDB_VERSION_MISMATCH: Database environment version mismatch';
    case ErrorCode.Invalid:
      return 'MDB_INVALID: File is not an LMDB file';
    case ErrorCode.MapFull:
      return 'MDB_MAP_FULL: Environment mapsize limit reached';
    case ErrorCode.DbsFull:
      return 'MDB_DBS_FULL: Environment maxdbs limit reached';
    case ErrorCode.ReadersFull:
      return 'MDB_READERS_FULL: Environment maxreaders limit reached';
    case ErrorCode.TlsFull:
      return 'MDB_TLS_FULL: Thread-local storage keys full - too many environments open';
    case ErrorCode.TxnFull:
      return 'MDB_TXN_FULL: Transaction has too many dirty pages - transaction too big';
    case ErrorCode.CursorFull:
      return 'MDB_CURSOR_FULL: Internal error - cursor stack limit reached';
    case ErrorCode.PageFull:
      return 'MDB_PAGE_FULL: Internal error - page has no more space';
    case ErrorCode.MapResized:
      return 'MDB_MAP_RESIZED: Database contents grew beyond environment mapsize';
    case ErrorCode.Incompatible:
      return 'MDB_INCOMPATIBLE: Operation and DB incompatible, or DB flags changed';
    case ErrorCode.BadRslot:
      return 'MDB_BAD_RSLOT: Invalid reuse of reader locktable slot';
    case ErrorCode.BadTxn:
      return 'MDB_BAD_TXN: Transaction must abort, has a child, or is invalid';
    case ErrorCode.BadValSize:
      return 'MDB_BAD_VALSIZE: Unsupported size of key/DB name/data, or wrong DUPFIXED size';
    case ErrorCode.BadDbi:
      return 'MDB_BAD_DBI: The specified DBI handle was closed/changed unexpectedly';
    case ErrorCode.NoEntry:
      return 'No such file or directory';
    case ErrorCode.IOError:
      return 'Input/output error';
    case ErrorCode.OutOfMemory:
      return 'Cannot allocate memory';
    case ErrorCode.AccessDenied:
      return 'Permission denied';
    case ErrorCode.Busy:
      return 'Device or resource busy';
    case ErrorCode.InvalidArgument:
      return 'Invalid argument';
    case ErrorCode.NoSpace:
      return 'No space left on device';
    default:
      return `Unknown error ${code}`;
  }
}

/**
 * Throw the failure selected by `code`. Never returns.
 */
export function raise(origin: string, code: number, strerror: StrError = describeStatus): never {
  const description = strerror(code);
  log('%s failed with %d (%s)', origin, code, description);
  switch (code) {
    case ErrorCode.KeyExist:
      throw new KeyExistError(origin, code, description);
    case ErrorCode.NotFound:
      throw new NotFoundError(origin, code, description);
    case ErrorCode.Corrupted:
      throw new CorruptedError(origin, code, description);
    case ErrorCode.Panic:
      throw new PanicError(origin, code, description);
    default:
      throw new RuntimeError(origin, code, description);
  }
}

/**
 * Check result code and throw error if not success.
 */
export function checkResult(code: number, origin: string, strerror?: StrError): void {
  if (code !== ErrorCode.Success) {
    raise(origin, code, strerror);
  }
}

/**
 * Check the result of a lookup: `false` when nothing matched, `true` on
 * success, a thrown failure for anything else.
 */
export function checkFound(code: number, origin: string, strerror?: StrError): boolean {
  if (code === ErrorCode.NotFound) {
    return false;
  }
  checkResult(code, origin, strerror);
  return true;
}

/**
 * Whether a thrown value means the environment must not be used again.
 */
export function isFatal(err: unknown): boolean {
  return err instanceof LmdbError && err.kind === 'fatal';
}
