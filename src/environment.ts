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

import type { Cursor } from './cursor';
import { Dbi, emptyEnvInfo, emptyStat, Engine, EnvPtr, Out } from './engine';
import { checkResult, ClosedHandleError, StrError } from './error';
import { debug } from './format';
import { nativeEngine } from './native';
import { Transaction } from './transaction';
import {
  EnvFlags,
  EnvInfo,
  EnvironmentOptions,
  HandleState,
  Stat,
  TransactionOptions,
  TxnFlags,
  Version,
} from './types';

const log = debug('lmdb-handles:env');

/**
 * Default environment configuration.
 */
export function defaultEnvironmentOptions(): Required<Omit<EnvironmentOptions, 'path'>> {
  return {
    flags: EnvFlags.None,
    mode: 0o644,
    mapSize: 10 * 1024 * 1024,
    maxReaders: 126,
    maxDbs: 0,
  };
}

/** @internal */
export interface Held {
  engine: Engine;
  handle: EnvPtr;
}

/**
 * Close the engine handle of an environment that was dropped without
 * close(). Never throws.
 * @internal
 */
export function closeUnreachable({ engine, handle }: Held): void {
  try {
    engine.mdb_env_close(handle);
    log('closed unreachable environment');
  } catch (err) {
    log('closing unreachable environment failed: %O', err);
  }
}

const registry = new FinalizationRegistry<Held>(closeUnreachable);

/**
 * An LMDB environment: one storage instance and its configuration.
 *
 * Moves from `unopened` to `opened` to `closed`. {@link Environment.close} is
 * idempotent, and also aborts the transactions and closes the cursors still
 * live in the environment.
 */
export class Environment {
  private _env: EnvPtr | null;
  private _state: HandleState = 'unopened';
  private readonly _transactions = new Set<Transaction>();
  private readonly _cursors = new Set<Cursor>();
  private readonly _token = {};

  readonly engine: Engine;
  readonly strerror: StrError;

  private constructor(env: EnvPtr, engine: Engine) {
    this._env = env;
    this.engine = engine;
    this.strerror = (code) => engine.mdb_strerror(code);
    registry.register(this, { engine, handle: env }, this._token);
  }

  /**
   * Allocate an environment handle. When `flags` are given and cannot be
   * applied, the new handle is closed before the failure is rethrown.
   */
  static create(flags: number = EnvFlags.None, engine: Engine = nativeEngine()): Environment {
    const envOut: Out<EnvPtr> = [null];
    checkResult(engine.mdb_env_create(envOut), 'mdb_env_create', (code) => engine.mdb_strerror(code));

    const env = new Environment(envOut[0], engine);
    log('created environment');
    if (flags !== EnvFlags.None) {
      try {
        env.setFlags(flags);
      } catch (err) {
        env.close();
        throw err;
      }
    }
    return env;
  }

  /**
   * Create, configure and open an environment in one step.
   */
  static open(options: EnvironmentOptions, engine?: Engine): Environment {
    const defaults = defaultEnvironmentOptions();
    const env = Environment.create(EnvFlags.None, engine);
    try {
      env
        .setMapSize(options.mapSize ?? defaults.mapSize)
        .setMaxReaders(options.maxReaders ?? defaults.maxReaders)
        .setMaxDbs(options.maxDbs ?? defaults.maxDbs)
        .open(options.path, options.flags ?? defaults.flags, options.mode ?? defaults.mode);
    } catch (err) {
      env.close();
      throw err;
    }
    return env;
  }

  /**
   * Version of the engine library.
   */
  static version(engine: Engine = nativeEngine()): Version {
    return engine.mdb_version();
  }

  get state(): HandleState {
    return this._state;
  }

  /**
   * The engine handle. Throws once the environment is closed.
   */
  ptr(origin: string): EnvPtr {
    if (this._env === null) throw new ClosedHandleError(origin, 'environment');
    return this._env;
  }

  /**
   * Bind the handle to the storage at `path`.
   */
  open(path: string, flags: number = EnvFlags.None, mode: number = 0o644): this {
    checkResult(this.engine.mdb_env_open(this.ptr('mdb_env_open'), path, flags, mode), 'mdb_env_open', this.strerror);
    this._state = 'opened';
    log('opened %s (flags %d, mode %o)', path, flags, mode);
    return this;
  }

  /**
   * Flush buffered writes to disk.
   */
  sync(force: boolean = true): void {
    checkResult(this.engine.mdb_env_sync(this.ptr('mdb_env_sync'), force), 'mdb_env_sync', this.strerror);
  }

  setFlags(flags: number, onoff: boolean = true): this {
    checkResult(
      this.engine.mdb_env_set_flags(this.ptr('mdb_env_set_flags'), flags, onoff),
      'mdb_env_set_flags',
      this.strerror
    );
    return this;
  }

  getFlags(): number {
    const flagsOut: Out<number> = [0];
    checkResult(this.engine.mdb_env_get_flags(this.ptr('mdb_env_get_flags'), flagsOut), 'mdb_env_get_flags', this.strerror);
    return flagsOut[0];
  }

  getPath(): string {
    const pathOut: Out<string> = [''];
    checkResult(this.engine.mdb_env_get_path(this.ptr('mdb_env_get_path'), pathOut), 'mdb_env_get_path', this.strerror);
    return pathOut[0];
  }

  /**
   * Set the size of the memory map. Rejected while a write transaction is
   * active in this process.
   */
  setMapSize(size: number): this {
    checkResult(
      this.engine.mdb_env_set_mapsize(this.ptr('mdb_env_set_mapsize'), size),
      'mdb_env_set_mapsize',
      this.strerror
    );
    return this;
  }

  /**
   * Set the number of reader slots. Only before {@link Environment.open}.
   */
  setMaxReaders(readers: number): this {
    checkResult(
      this.engine.mdb_env_set_maxreaders(this.ptr('mdb_env_set_maxreaders'), readers),
      'mdb_env_set_maxreaders',
      this.strerror
    );
    return this;
  }

  getMaxReaders(): number {
    const readersOut: Out<number> = [0];
    checkResult(
      this.engine.mdb_env_get_maxreaders(this.ptr('mdb_env_get_maxreaders'), readersOut),
      'mdb_env_get_maxreaders',
      this.strerror
    );
    return readersOut[0];
  }

  /**
   * Set the number of named databases. Only before {@link Environment.open}.
   */
  setMaxDbs(dbs: number): this {
    checkResult(this.engine.mdb_env_set_maxdbs(this.ptr('mdb_env_set_maxdbs'), dbs), 'mdb_env_set_maxdbs', this.strerror);
    return this;
  }

  getMaxKeySize(): number {
    return this.engine.mdb_env_get_maxkeysize(this.ptr('mdb_env_get_maxkeysize'));
  }

  /**
   * Statistics of the main database.
   */
  stat(): Stat {
    const stat = emptyStat();
    checkResult(this.engine.mdb_env_stat(this.ptr('mdb_env_stat'), stat), 'mdb_env_stat', this.strerror);
    return stat;
  }

  info(): EnvInfo {
    const info = emptyEnvInfo();
    checkResult(this.engine.mdb_env_info(this.ptr('mdb_env_info'), info), 'mdb_env_info', this.strerror);
    return info;
  }

  /**
   * Release a database handle. Rarely needed: handles stay valid for the life
   * of the environment.
   */
  closeDatabase(dbi: Dbi): void {
    this.engine.mdb_dbi_close(this.ptr('mdb_dbi_close'), dbi);
    log('closed database %d', dbi);
  }

  /**
   * Begin a transaction in this environment.
   */
  beginTransaction(options: TransactionOptions = {}): Transaction {
    const flags = (options.flags ?? TxnFlags.None) | (options.readOnly ? TxnFlags.ReadOnly : TxnFlags.None);
    return Transaction.begin(this, options.parent ?? null, flags);
  }

  /**
   * Run `fn` in a read-only transaction, aborted afterwards.
   */
  read<T>(fn: (txn: Transaction) => T): T {
    const txn = this.beginTransaction({ readOnly: true });
    try {
      return fn(txn);
    } finally {
      txn.abort();
    }
  }

  /**
   * Run `fn` in a read-write transaction. Commits when `fn` returns, aborts
   * when it throws.
   */
  write<T>(fn: (txn: Transaction) => T): T {
    const txn = this.beginTransaction();
    try {
      const result = fn(txn);
      txn.commit();
      return result;
    } catch (err) {
      // A failed commit has already released the transaction.
      txn.abort();
      throw err;
    }
  }

  /**
   * Close the environment. Live cursors are closed and live transactions
   * aborted first. Calling it again does nothing.
   */
  close(): void {
    if (this._env === null) return;

    for (const cursor of [...this._cursors]) {
      cursor.close();
    }
    for (const txn of [...this._transactions]) {
      txn.abort();
    }

    this.engine.mdb_env_close(this._env);
    registry.unregister(this._token);
    this._env = null;
    this._state = 'closed';
    log('closed environment');
  }

  /** @internal */
  trackTransaction(txn: Transaction): void {
    this._transactions.add(txn);
  }

  /** @internal */
  untrackTransaction(txn: Transaction): void {
    this._transactions.delete(txn);
  }

  /** @internal */
  trackCursor(cursor: Cursor): void {
    this._cursors.add(cursor);
  }

  /** @internal */
  untrackCursor(cursor: Cursor): void {
    this._cursors.delete(cursor);
  }
}
