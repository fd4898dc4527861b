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

import { koffi, lib, MDBEnvInfoStruct, MDBStatStruct, MDBValStruct } from './ffi';
import { CursorPtr, Dbi, Engine, EnvPtr, Out, TxnPtr } from './engine';
import { CursorOp, EnvInfo, ErrorCode, Stat, Version } from './types';
import { Val } from './val';

const EMPTY = new Uint8Array(0);

function toStruct(val: Val): MDBValStruct {
  return { mv_size: val.size, mv_data: val.size === 0 ? null : val.data };
}

// Point the view at engine memory without copying it.
function fromStruct(struct: MDBValStruct, val: Val): void {
  if (struct.mv_size === 0 || !struct.mv_data) {
    val.assign(EMPTY);
    return;
  }
  val.assign(new Uint8Array(koffi.view(struct.mv_data, struct.mv_size)));
}

function readStat(struct: MDBStatStruct, stat: Stat): void {
  stat.pageSize = struct.ms_psize ?? 0;
  stat.depth = struct.ms_depth ?? 0;
  stat.branchPages = struct.ms_branch_pages ?? 0;
  stat.leafPages = struct.ms_leaf_pages ?? 0;
  stat.overflowPages = struct.ms_overflow_pages ?? 0;
  stat.entries = struct.ms_entries ?? 0;
}

function readEnvInfo(struct: MDBEnvInfoStruct, info: EnvInfo): void {
  info.mapSize = struct.me_mapsize ?? 0;
  info.lastPageNumber = struct.me_last_pgno ?? 0;
  info.lastTxnId = struct.me_last_txnid ?? 0;
  info.maxReaders = struct.me_maxreaders ?? 0;
  info.numReaders = struct.me_numreaders ?? 0;
}

/**
 * The engine contract backed by the system `liblmdb`, loaded through koffi on
 * first use.
 */
export class NativeEngine implements Engine {
  mdb_version(): Version {
    const major = [0];
    const minor = [0];
    const patch = [0];
    const text = lib().mdb_version(major, minor, patch);
    return { major: major[0], minor: minor[0], patch: patch[0], text };
  }

  mdb_strerror(code: number): string {
    return lib().mdb_strerror(code);
  }

  mdb_env_create(env: Out<EnvPtr>): number {
    const out: unknown[] = [null];
    const result = lib().mdb_env_create(out);
    env[0] = out[0];
    return result;
  }

  mdb_env_open(env: EnvPtr, path: string, flags: number, mode: number): number {
    return lib().mdb_env_open(env, path, flags, mode);
  }

  mdb_env_sync(env: EnvPtr, force: boolean): number {
    return lib().mdb_env_sync(env, force ? 1 : 0);
  }

  mdb_env_close(env: EnvPtr): void {
    lib().mdb_env_close(env);
  }

  mdb_env_set_flags(env: EnvPtr, flags: number, onoff: boolean): number {
    return lib().mdb_env_set_flags(env, flags, onoff ? 1 : 0);
  }

  mdb_env_get_flags(env: EnvPtr, flags: Out<number>): number {
    return lib().mdb_env_get_flags(env, flags);
  }

  mdb_env_get_path(env: EnvPtr, path: Out<string>): number {
    const out: (string | null)[] = [null];
    const result = lib().mdb_env_get_path(env, out);
    path[0] = out[0] ?? '';
    return result;
  }

  mdb_env_set_mapsize(env: EnvPtr, size: number): number {
    return lib().mdb_env_set_mapsize(env, size);
  }

  mdb_env_set_maxreaders(env: EnvPtr, readers: number): number {
    return lib().mdb_env_set_maxreaders(env, readers);
  }

  mdb_env_get_maxreaders(env: EnvPtr, readers: Out<number>): number {
    return lib().mdb_env_get_maxreaders(env, readers);
  }

  mdb_env_set_maxdbs(env: EnvPtr, dbs: number): number {
    return lib().mdb_env_set_maxdbs(env, dbs);
  }

  mdb_env_get_maxkeysize(env: EnvPtr): number {
    return lib().mdb_env_get_maxkeysize(env);
  }

  mdb_env_stat(env: EnvPtr, stat: Stat): number {
    const struct: MDBStatStruct = {};
    const result = lib().mdb_env_stat(env, struct);
    if (result === ErrorCode.Success) readStat(struct, stat);
    return result;
  }

  mdb_env_info(env: EnvPtr, info: EnvInfo): number {
    const struct: MDBEnvInfoStruct = {};
    const result = lib().mdb_env_info(env, struct);
    if (result === ErrorCode.Success) readEnvInfo(struct, info);
    return result;
  }

  mdb_txn_begin(env: EnvPtr, parent: TxnPtr | null, flags: number, txn: Out<TxnPtr>): number {
    const out: unknown[] = [null];
    const result = lib().mdb_txn_begin(env, parent, flags, out);
    txn[0] = out[0];
    return result;
  }

  mdb_txn_env(txn: TxnPtr): EnvPtr {
    return lib().mdb_txn_env(txn);
  }

  mdb_txn_id(txn: TxnPtr): number {
    return lib().mdb_txn_id(txn);
  }

  mdb_txn_commit(txn: TxnPtr): number {
    return lib().mdb_txn_commit(txn);
  }

  mdb_txn_abort(txn: TxnPtr): void {
    lib().mdb_txn_abort(txn);
  }

  mdb_txn_reset(txn: TxnPtr): void {
    lib().mdb_txn_reset(txn);
  }

  mdb_txn_renew(txn: TxnPtr): number {
    return lib().mdb_txn_renew(txn);
  }

  mdb_dbi_open(txn: TxnPtr, name: string | null, flags: number, dbi: Out<Dbi>): number {
    return lib().mdb_dbi_open(txn, name, flags, dbi);
  }

  mdb_stat(txn: TxnPtr, dbi: Dbi, stat: Stat): number {
    const struct: MDBStatStruct = {};
    const result = lib().mdb_stat(txn, dbi, struct);
    if (result === ErrorCode.Success) readStat(struct, stat);
    return result;
  }

  mdb_dbi_flags(txn: TxnPtr, dbi: Dbi, flags: Out<number>): number {
    return lib().mdb_dbi_flags(txn, dbi, flags);
  }

  mdb_dbi_close(env: EnvPtr, dbi: Dbi): void {
    lib().mdb_dbi_close(env, dbi);
  }

  mdb_drop(txn: TxnPtr, dbi: Dbi, del: boolean): number {
    return lib().mdb_drop(txn, dbi, del ? 1 : 0);
  }

  mdb_get(txn: TxnPtr, dbi: Dbi, key: Val, data: Val): number {
    const dataStruct: MDBValStruct = { mv_size: 0, mv_data: null };
    const result = lib().mdb_get(txn, dbi, toStruct(key), dataStruct);
    if (result === ErrorCode.Success) fromStruct(dataStruct, data);
    return result;
  }

  mdb_put(txn: TxnPtr, dbi: Dbi, key: Val, data: Val, flags: number): number {
    const dataStruct = toStruct(data);
    const result = lib().mdb_put(txn, dbi, toStruct(key), dataStruct, flags);
    // On success with MDB_RESERVE, and on MDB_KEYEXIST, data points at the stored item.
    if (result === ErrorCode.Success || result === ErrorCode.KeyExist) fromStruct(dataStruct, data);
    return result;
  }

  mdb_del(txn: TxnPtr, dbi: Dbi, key: Val, data: Val | null): number {
    return lib().mdb_del(txn, dbi, toStruct(key), data === null ? null : toStruct(data));
  }

  mdb_cursor_open(txn: TxnPtr, dbi: Dbi, cursor: Out<CursorPtr>): number {
    const out: unknown[] = [null];
    const result = lib().mdb_cursor_open(txn, dbi, out);
    cursor[0] = out[0];
    return result;
  }

  mdb_cursor_close(cursor: CursorPtr): void {
    lib().mdb_cursor_close(cursor);
  }

  mdb_cursor_renew(txn: TxnPtr, cursor: CursorPtr): number {
    return lib().mdb_cursor_renew(txn, cursor);
  }

  mdb_cursor_txn(cursor: CursorPtr): TxnPtr {
    return lib().mdb_cursor_txn(cursor);
  }

  mdb_cursor_dbi(cursor: CursorPtr): Dbi {
    return lib().mdb_cursor_dbi(cursor);
  }

  mdb_cursor_get(cursor: CursorPtr, key: Val, data: Val | null, op: CursorOp): number {
    const keyStruct = toStruct(key);
    // LMDB writes through the data pointer for most operators; give it scratch space.
    const dataStruct = toStruct(data ?? new Val());
    const result = lib().mdb_cursor_get(cursor, keyStruct, dataStruct, op);
    if (result === ErrorCode.Success) {
      // These operators leave the caller's key (and, for GetBoth, data) in place.
      const keepsKey = op === CursorOp.Set || op === CursorOp.GetBoth || op === CursorOp.GetBothRange;
      if (!keepsKey) fromStruct(keyStruct, key);
      if (data !== null && op !== CursorOp.GetBoth) fromStruct(dataStruct, data);
    }
    return result;
  }

  mdb_cursor_put(cursor: CursorPtr, key: Val, data: Val, flags: number): number {
    const dataStruct = toStruct(data);
    const result = lib().mdb_cursor_put(cursor, toStruct(key), dataStruct, flags);
    if (result === ErrorCode.Success || result === ErrorCode.KeyExist) fromStruct(dataStruct, data);
    return result;
  }

  mdb_cursor_del(cursor: CursorPtr, flags: number): number {
    return lib().mdb_cursor_del(cursor, flags);
  }

  mdb_cursor_count(cursor: CursorPtr, count: Out<number>): number {
    return lib().mdb_cursor_count(cursor, count);
  }
}

let shared: NativeEngine | null = null;

/**
 * The process-wide native engine.
 */
export function nativeEngine(): NativeEngine {
  if (shared === null) {
    shared = new NativeEngine();
  }
  return shared;
}
