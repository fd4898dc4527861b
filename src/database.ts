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

import { Codec } from './codec';
import { Dbi, emptyStat, Out, TxnPtr } from './engine';
import type { Environment } from './environment';
import { checkFound, checkResult, LogicError } from './error';
import { debug } from './format';
import type { Transaction } from './transaction';
import { DbFlags, ErrorCode, Stat, WriteFlags } from './types';
import { Val, ValLike } from './val';

const log = debug('lmdb-handles:dbi');

/**
 * A database (keyspace) handle.
 *
 * The handle is a plain value owned by the environment: it stays valid across
 * transactions for the life of the environment and needs no release.
 */
export class Database {
  readonly env: Environment;
  readonly dbi: Dbi;
  readonly name: string | null;

  private constructor(env: Environment, dbi: Dbi, name: string | null) {
    this.env = env;
    this.dbi = dbi;
    this.name = name;
  }

  /**
   * Open the database `name`, or the main database when `name` is null.
   * With `DbFlags.Create`, a missing database is created.
   */
  static open(txn: Transaction, name: string | null = null, flags: number = DbFlags.None): Database {
    const dbiOut: Out<Dbi> = [0];
    checkResult(
      txn.env.engine.mdb_dbi_open(txn.ptr('mdb_dbi_open'), name, flags, dbiOut),
      'mdb_dbi_open',
      txn.env.strerror
    );
    log('opened %s as %d', name ?? '(main)', dbiOut[0]);
    return new Database(txn.env, dbiOut[0], name);
  }

  stat(txn: Transaction): Stat {
    const stat = emptyStat();
    checkResult(this.env.engine.mdb_stat(this.bind(txn, 'mdb_stat'), this.dbi, stat), 'mdb_stat', this.env.strerror);
    return stat;
  }

  /**
   * The flags the database was created with.
   */
  flags(txn: Transaction): number {
    const flagsOut: Out<number> = [0];
    checkResult(
      this.env.engine.mdb_dbi_flags(this.bind(txn, 'mdb_dbi_flags'), this.dbi, flagsOut),
      'mdb_dbi_flags',
      this.env.strerror
    );
    return flagsOut[0];
  }

  /**
   * Number of entries.
   */
  size(txn: Transaction): number {
    return this.stat(txn).entries;
  }

  /**
   * Look up `key`. Returns `false` when it is absent; otherwise fills `out`,
   * when given, with a view of the stored value.
   */
  get(txn: Transaction, key: ValLike, out: Val = new Val()): boolean {
    return checkFound(
      this.env.engine.mdb_get(this.bind(txn, 'mdb_get'), this.dbi, Val.of(key), out),
      'mdb_get',
      this.env.strerror
    );
  }

  /**
   * Look up `key` and decode its value, or `undefined` when it is absent.
   */
  getValue<V>(txn: Transaction, key: ValLike, codec: Codec<V>): V | undefined {
    const value = new Val();
    if (!this.get(txn, key, value)) return undefined;
    return value.decode(codec);
  }

  /**
   * Store `value` under `key`. With `WriteFlags.Reserve`, a `Val` passed as
   * `value` is pointed at the reserved space for the caller to fill.
   */
  put(txn: Transaction, key: ValLike, value: ValLike, flags: number = WriteFlags.None): void {
    checkResult(
      this.env.engine.mdb_put(this.bind(txn, 'mdb_put'), this.dbi, Val.of(key), Val.of(value), flags),
      'mdb_put',
      this.env.strerror
    );
  }

  /**
   * Delete `key`, or only the pair `(key, value)` in a `DupSort` database.
   * Returns `false` when nothing matched.
   */
  del(txn: Transaction, key: ValLike, value?: ValLike): boolean {
    return checkFound(
      this.env.engine.mdb_del(this.bind(txn, 'mdb_del'), this.dbi, Val.of(key), value === undefined ? null : Val.of(value)),
      'mdb_del',
      this.env.strerror
    );
  }

  /**
   * Empty the database, or with `del` delete it and close the handle.
   */
  drop(txn: Transaction, del: boolean = false): void {
    checkResult(this.env.engine.mdb_drop(this.bind(txn, 'mdb_drop'), this.dbi, del), 'mdb_drop', this.env.strerror);
    log('%s %s', del ? 'deleted' : 'emptied', this.name ?? '(main)');
  }

  close(): void {
    this.env.closeDatabase(this.dbi);
  }

  private bind(txn: Transaction, origin: string): TxnPtr {
    if (txn.env !== this.env) {
      throw new LogicError(origin, ErrorCode.InvalidArgument, 'transaction belongs to another environment');
    }
    return txn.ptr(origin);
  }
}
