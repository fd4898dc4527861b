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

import { Val } from './val';
import { CursorOp, EnvInfo, Stat, Version } from './types';

// Opaque engine handles. `null` is the released sentinel.
export type EnvPtr = unknown;
export type TxnPtr = unknown;
export type CursorPtr = unknown;
export type Dbi = number;

/**
 * A one-element output parameter.
 */
export type Out<T> = [T];

/**
 * The procedural LMDB contract the handle wrappers are written against.
 *
 * Every fallible primitive returns a status code (0 on success). Primitives
 * returning `void` are defined by LMDB as unable to fail under correct use;
 * they must never be handed a released handle.
 */
export interface Engine {
  mdb_version(): Version;
  mdb_strerror(code: number): string;

  mdb_env_create(env: Out<EnvPtr>): number;
  mdb_env_open(env: EnvPtr, path: string, flags: number, mode: number): number;
  mdb_env_sync(env: EnvPtr, force: boolean): number;
  mdb_env_close(env: EnvPtr): void;
  mdb_env_set_flags(env: EnvPtr, flags: number, onoff: boolean): number;
  mdb_env_get_flags(env: EnvPtr, flags: Out<number>): number;
  mdb_env_get_path(env: EnvPtr, path: Out<string>): number;
  mdb_env_set_mapsize(env: EnvPtr, size: number): number;
  mdb_env_set_maxreaders(env: EnvPtr, readers: number): number;
  mdb_env_get_maxreaders(env: EnvPtr, readers: Out<number>): number;
  mdb_env_set_maxdbs(env: EnvPtr, dbs: number): number;
  mdb_env_get_maxkeysize(env: EnvPtr): number;
  mdb_env_stat(env: EnvPtr, stat: Stat): number;
  mdb_env_info(env: EnvPtr, info: EnvInfo): number;

  mdb_txn_begin(env: EnvPtr, parent: TxnPtr | null, flags: number, txn: Out<TxnPtr>): number;
  mdb_txn_env(txn: TxnPtr): EnvPtr;
  mdb_txn_id(txn: TxnPtr): number;
  mdb_txn_commit(txn: TxnPtr): number;
  mdb_txn_abort(txn: TxnPtr): void;
  mdb_txn_reset(txn: TxnPtr): void;
  mdb_txn_renew(txn: TxnPtr): number;

  mdb_dbi_open(txn: TxnPtr, name: string | null, flags: number, dbi: Out<Dbi>): number;
  mdb_stat(txn: TxnPtr, dbi: Dbi, stat: Stat): number;
  mdb_dbi_flags(txn: TxnPtr, dbi: Dbi, flags: Out<number>): number;
  mdb_dbi_close(env: EnvPtr, dbi: Dbi): void;
  mdb_drop(txn: TxnPtr, dbi: Dbi, del: boolean): number;
  mdb_get(txn: TxnPtr, dbi: Dbi, key: Val, data: Val): number;
  mdb_put(txn: TxnPtr, dbi: Dbi, key: Val, data: Val, flags: number): number;
  mdb_del(txn: TxnPtr, dbi: Dbi, key: Val, data: Val | null): number;

  mdb_cursor_open(txn: TxnPtr, dbi: Dbi, cursor: Out<CursorPtr>): number;
  mdb_cursor_close(cursor: CursorPtr): void;
  mdb_cursor_renew(txn: TxnPtr, cursor: CursorPtr): number;
  mdb_cursor_txn(cursor: CursorPtr): TxnPtr;
  mdb_cursor_dbi(cursor: CursorPtr): Dbi;
  mdb_cursor_get(cursor: CursorPtr, key: Val, data: Val | null, op: CursorOp): number;
  mdb_cursor_put(cursor: CursorPtr, key: Val, data: Val, flags: number): number;
  mdb_cursor_del(cursor: CursorPtr, flags: number): number;
  mdb_cursor_count(cursor: CursorPtr, count: Out<number>): number;
}

/**
 * An empty statistics record for engines to fill.
 */
export function emptyStat(): Stat {
  return { pageSize: 0, depth: 0, branchPages: 0, leafPages: 0, overflowPages: 0, entries: 0 };
}

export function emptyEnvInfo(): EnvInfo {
  return { mapSize: 0, lastPageNumber: 0, lastTxnId: 0, maxReaders: 0, numReaders: 0 };
}
