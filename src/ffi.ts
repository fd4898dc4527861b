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

import koffi from 'koffi';

/**
 * `MDB_val` as koffi reads and writes it.
 */
export interface MDBValStruct {
  mv_size: number;
  mv_data: unknown;
}

export interface MDBStatStruct {
  ms_psize?: number;
  ms_depth?: number;
  ms_branch_pages?: number;
  ms_leaf_pages?: number;
  ms_overflow_pages?: number;
  ms_entries?: number;
}

export interface MDBEnvInfoStruct {
  me_mapaddr?: unknown;
  me_mapsize?: number;
  me_last_pgno?: number;
  me_last_txnid?: number;
  me_maxreaders?: number;
  me_numreaders?: number;
}

/**
 * The LMDB entry points, as bound by koffi.
 */
export interface LmdbLibrary {
  mdb_version(major: number[], minor: number[], patch: number[]): string;
  mdb_strerror(err: number): string;

  mdb_env_create(env: unknown[]): number;
  mdb_env_open(env: unknown, path: string, flags: number, mode: number): number;
  mdb_env_sync(env: unknown, force: number): number;
  mdb_env_close(env: unknown): void;
  mdb_env_set_flags(env: unknown, flags: number, onoff: number): number;
  mdb_env_get_flags(env: unknown, flags: number[]): number;
  mdb_env_get_path(env: unknown, path: (string | null)[]): number;
  mdb_env_set_mapsize(env: unknown, size: number): number;
  mdb_env_set_maxreaders(env: unknown, readers: number): number;
  mdb_env_get_maxreaders(env: unknown, readers: number[]): number;
  mdb_env_set_maxdbs(env: unknown, dbs: number): number;
  mdb_env_get_maxkeysize(env: unknown): number;
  mdb_env_stat(env: unknown, stat: MDBStatStruct): number;
  mdb_env_info(env: unknown, info: MDBEnvInfoStruct): number;

  mdb_txn_begin(env: unknown, parent: unknown, flags: number, txn: unknown[]): number;
  mdb_txn_env(txn: unknown): unknown;
  mdb_txn_id(txn: unknown): number;
  mdb_txn_commit(txn: unknown): number;
  mdb_txn_abort(txn: unknown): void;
  mdb_txn_reset(txn: unknown): void;
  mdb_txn_renew(txn: unknown): number;

  mdb_dbi_open(txn: unknown, name: string | null, flags: number, dbi: number[]): number;
  mdb_stat(txn: unknown, dbi: number, stat: MDBStatStruct): number;
  mdb_dbi_flags(txn: unknown, dbi: number, flags: number[]): number;
  mdb_dbi_close(env: unknown, dbi: number): void;
  mdb_drop(txn: unknown, dbi: number, del: number): number;
  mdb_get(txn: unknown, dbi: number, key: MDBValStruct, data: MDBValStruct): number;
  mdb_put(txn: unknown, dbi: number, key: MDBValStruct, data: MDBValStruct, flags: number): number;
  mdb_del(txn: unknown, dbi: number, key: MDBValStruct, data: MDBValStruct | null): number;

  mdb_cursor_open(txn: unknown, dbi: number, cursor: unknown[]): number;
  mdb_cursor_close(cursor: unknown): void;
  mdb_cursor_renew(txn: unknown, cursor: unknown): number;
  mdb_cursor_txn(cursor: unknown): unknown;
  mdb_cursor_dbi(cursor: unknown): number;
  mdb_cursor_get(cursor: unknown, key: MDBValStruct, data: MDBValStruct, op: number): number;
  mdb_cursor_put(cursor: unknown, key: MDBValStruct, data: MDBValStruct, flags: number): number;
  mdb_cursor_del(cursor: unknown, flags: number): number;
  mdb_cursor_count(cursor: unknown, count: number[]): number;
}

/**
 * Platform-specific library name, or `LMDB_LIBRARY_PATH` when set.
 */
export function libraryPath(): string {
  const override = process.env.LMDB_LIBRARY_PATH;
  if (override) return override;

  return process.platform === 'darwin'
    ? 'liblmdb.dylib'
    : process.platform === 'win32'
      ? 'lmdb.dll'
      : 'liblmdb.so';
}

// Load the LMDB library
function loadLibrary(): LmdbLibrary {
  // Opaque handle types
  koffi.opaque('MDB_env');
  koffi.opaque('MDB_txn');
  koffi.opaque('MDB_cursor');

  // MDB_val structure
  koffi.struct('MDB_val', {
    mv_size: 'size_t',
    mv_data: 'void *',
  });

  // MDB_stat structure
  koffi.struct('MDB_stat', {
    ms_psize: 'unsigned int',
    ms_depth: 'unsigned int',
    ms_branch_pages: 'size_t',
    ms_leaf_pages: 'size_t',
    ms_overflow_pages: 'size_t',
    ms_entries: 'size_t',
  });

  // MDB_envinfo structure
  koffi.struct('MDB_envinfo', {
    me_mapaddr: 'void *',
    me_mapsize: 'size_t',
    me_last_pgno: 'size_t',
    me_last_txnid: 'size_t',
    me_maxreaders: 'unsigned int',
    me_numreaders: 'unsigned int',
  });

  const lib = koffi.load(libraryPath());

  return {
    // Metadata
    mdb_version: lib.func('const char *mdb_version(_Out_ int *major, _Out_ int *minor, _Out_ int *patch)'),
    mdb_strerror: lib.func('const char *mdb_strerror(int err)'),

    // Environment operations
    mdb_env_create: lib.func('int mdb_env_create(_Out_ MDB_env **env)'),
    mdb_env_open: lib.func('int mdb_env_open(MDB_env *env, const char *path, unsigned int flags, unsigned int mode)'),
    mdb_env_sync: lib.func('int mdb_env_sync(MDB_env *env, int force)'),
    mdb_env_close: lib.func('void mdb_env_close(MDB_env *env)'),
    mdb_env_set_flags: lib.func('int mdb_env_set_flags(MDB_env *env, unsigned int flags, int onoff)'),
    mdb_env_get_flags: lib.func('int mdb_env_get_flags(MDB_env *env, _Out_ unsigned int *flags)'),
    mdb_env_get_path: lib.func('int mdb_env_get_path(MDB_env *env, _Out_ const char **path)'),
    mdb_env_set_mapsize: lib.func('int mdb_env_set_mapsize(MDB_env *env, size_t size)'),
    mdb_env_set_maxreaders: lib.func('int mdb_env_set_maxreaders(MDB_env *env, unsigned int readers)'),
    mdb_env_get_maxreaders: lib.func('int mdb_env_get_maxreaders(MDB_env *env, _Out_ unsigned int *readers)'),
    mdb_env_set_maxdbs: lib.func('int mdb_env_set_maxdbs(MDB_env *env, unsigned int dbs)'),
    mdb_env_get_maxkeysize: lib.func('int mdb_env_get_maxkeysize(MDB_env *env)'),
    mdb_env_stat: lib.func('int mdb_env_stat(MDB_env *env, _Out_ MDB_stat *stat)'),
    mdb_env_info: lib.func('int mdb_env_info(MDB_env *env, _Out_ MDB_envinfo *stat)'),

    // Transaction operations
    mdb_txn_begin: lib.func('int mdb_txn_begin(MDB_env *env, MDB_txn *parent, unsigned int flags, _Out_ MDB_txn **txn)'),
    mdb_txn_env: lib.func('MDB_env *mdb_txn_env(MDB_txn *txn)'),
    mdb_txn_id: lib.func('size_t mdb_txn_id(MDB_txn *txn)'),
    mdb_txn_commit: lib.func('int mdb_txn_commit(MDB_txn *txn)'),
    mdb_txn_abort: lib.func('void mdb_txn_abort(MDB_txn *txn)'),
    mdb_txn_reset: lib.func('void mdb_txn_reset(MDB_txn *txn)'),
    mdb_txn_renew: lib.func('int mdb_txn_renew(MDB_txn *txn)'),

    // Database operations
    mdb_dbi_open: lib.func('int mdb_dbi_open(MDB_txn *txn, const char *name, unsigned int flags, _Out_ unsigned int *dbi)'),
    mdb_stat: lib.func('int mdb_stat(MDB_txn *txn, unsigned int dbi, _Out_ MDB_stat *stat)'),
    mdb_dbi_flags: lib.func('int mdb_dbi_flags(MDB_txn *txn, unsigned int dbi, _Out_ unsigned int *flags)'),
    mdb_dbi_close: lib.func('void mdb_dbi_close(MDB_env *env, unsigned int dbi)'),
    mdb_drop: lib.func('int mdb_drop(MDB_txn *txn, unsigned int dbi, int del)'),
    mdb_get: lib.func('int mdb_get(MDB_txn *txn, unsigned int dbi, MDB_val *key, _Out_ MDB_val *data)'),
    mdb_put: lib.func('int mdb_put(MDB_txn *txn, unsigned int dbi, MDB_val *key, _Inout_ MDB_val *data, unsigned int flags)'),
    mdb_del: lib.func('int mdb_del(MDB_txn *txn, unsigned int dbi, MDB_val *key, MDB_val *data)'),

    // Cursor operations
    mdb_cursor_open: lib.func('int mdb_cursor_open(MDB_txn *txn, unsigned int dbi, _Out_ MDB_cursor **cursor)'),
    mdb_cursor_close: lib.func('void mdb_cursor_close(MDB_cursor *cursor)'),
    mdb_cursor_renew: lib.func('int mdb_cursor_renew(MDB_txn *txn, MDB_cursor *cursor)'),
    mdb_cursor_txn: lib.func('MDB_txn *mdb_cursor_txn(MDB_cursor *cursor)'),
    mdb_cursor_dbi: lib.func('unsigned int mdb_cursor_dbi(MDB_cursor *cursor)'),
    mdb_cursor_get: lib.func('int mdb_cursor_get(MDB_cursor *cursor, _Inout_ MDB_val *key, _Inout_ MDB_val *data, int op)'),
    mdb_cursor_put: lib.func('int mdb_cursor_put(MDB_cursor *cursor, MDB_val *key, _Inout_ MDB_val *data, unsigned int flags)'),
    mdb_cursor_del: lib.func('int mdb_cursor_del(MDB_cursor *cursor, unsigned int flags)'),
    mdb_cursor_count: lib.func('int mdb_cursor_count(MDB_cursor *cursor, _Out_ size_t *countp)'),
  };
}

let loaded: LmdbLibrary | null = null;

/**
 * The LMDB library, loaded on first use.
 */
export function lib(): LmdbLibrary {
  if (loaded === null) {
    loaded = loadLibrary();
  }
  return loaded;
}

export { koffi };
