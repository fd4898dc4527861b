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

/**
 * # lmdb-handles
 *
 * Synchronous, typed handles over LMDB, the memory-mapped transactional
 * key-value store.
 *
 * Each LMDB resource (environment, transaction, database, cursor) gets a
 * wrapper with an explicit state machine and an idempotent release, and every
 * status code the engine returns becomes either a boolean (for lookups that
 * may find nothing) or a typed failure carrying the origin, the code and a
 * kind (`logic`, `runtime` or `fatal`). Keys and values cross the boundary as
 * {@link Val} views, without copying.
 *
 * ## Features
 *
 * - Environment, Transaction, Database and Cursor wrappers over the LMDB C API
 * - Nested transactions, read-only reset/renew, cursor renewal
 * - Typed failures: `KeyExistError`, `NotFoundError`, `CorruptedError`, `PanicError`
 * - Zero-copy value views plus fixed-width codecs for `IntegerKey` databases
 * - A pluggable engine contract, bound to `liblmdb` through koffi
 *
 * ## Example
 *
 * ```typescript
 * import { Environment, CursorOp, TxnFlags, Val } from 'lmdb-handles';
 *
 * // Open an environment
 * const env = Environment.open({ path: './data', mapSize: 64 * 1024 * 1024 });
 *
 * // Write in a transaction
 * const txn = env.beginTransaction();
 * const db = txn.openDatabase();
 * db.put(txn, 'greeting', 'hello');
 * txn.commit();
 *
 * // Read it back
 * const reader = env.beginTransaction({ readOnly: true });
 * const value = new Val();
 * if (db.get(reader, 'greeting', value)) {
 *   console.log(value.toString()); // hello
 * }
 *
 * // Walk the database
 * const cursor = reader.openCursor(db);
 * for (const [key, data] of cursor.entries()) {
 *   console.log(key.toString(), data.toString());
 * }
 * cursor.close();
 * reader.abort();
 *
 * env.close();
 * ```
 *
 * The native library is found as `liblmdb.so`, `liblmdb.dylib` or `lmdb.dll`,
 * or at the path in `LMDB_LIBRARY_PATH`.
 *
 * @packageDocumentation
 */

export { Environment, defaultEnvironmentOptions } from './environment';
export { Transaction } from './transaction';
export { Database } from './database';
export { Cursor, EntriesOptions } from './cursor';
export { Val, ValLike } from './val';
export { Codec, raw, utf8, uint32, int32, uint64, float64 } from './codec';
export { Engine, EnvPtr, TxnPtr, CursorPtr, Dbi, Out } from './engine';
export { NativeEngine, nativeEngine } from './native';
/** In-process engine for tests. @internal */
export { MemoryEngine } from './memory';
export { libraryPath } from './ffi';

export {
  ErrorCode,
  EnvFlags,
  TxnFlags,
  DbFlags,
  WriteFlags,
  CursorOp,
  FailureKind,
  Stat,
  EnvInfo,
  Version,
  EnvironmentOptions,
  TransactionOptions,
  TransactionState,
  HandleState,
} from './types';

export {
  LmdbError,
  LogicError,
  RuntimeError,
  FatalError,
  KeyExistError,
  NotFoundError,
  CorruptedError,
  PanicError,
  ClosedHandleError,
  ValueSizeError,
  StrError,
  raise,
  checkResult,
  checkFound,
  describeStatus,
  isFatal,
} from './error';
