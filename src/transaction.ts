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

import { Cursor } from './cursor';
import { Database } from './database';
import { EnvPtr, Out, TxnPtr } from './engine';
import type { Environment } from './environment';
import { checkResult, ClosedHandleError, LogicError } from './error';
import { debug } from './format';
import { DbFlags, ErrorCode, TransactionState, TxnFlags } from './types';

const log = debug('lmdb-handles:txn');

/**
 * A transaction in an {@link Environment}.
 *
 * Moves from `active` to `committed` or `aborted`; a read-only transaction
 * can also move between `active` and `reset`. Once resolved, the handle is
 * released and every further call but {@link Transaction.abort} throws a
 * `ClosedHandleError`.
 */
export class Transaction {
  private _txn: TxnPtr | null;
  private _state: TransactionState = 'active';
  private readonly _children = new Set<Transaction>();
  private readonly _cursors = new Set<Cursor>();

  readonly env: Environment;
  readonly parent: Transaction | null;
  readonly readOnly: boolean;

  private constructor(txn: TxnPtr, env: Environment, parent: Transaction | null, readOnly: boolean) {
    this._txn = txn;
    this.env = env;
    this.parent = parent;
    this.readOnly = readOnly;
  }

  /**
   * Begin a transaction. `parent`, when given, must be an active read-write
   * transaction of the same environment.
   */
  static begin(env: Environment, parent: Transaction | null = null, flags: number = TxnFlags.None): Transaction {
    const envPtr = env.ptr('mdb_txn_begin');
    if (env.state !== 'opened') {
      throw new LogicError('mdb_txn_begin', ErrorCode.InvalidArgument, 'environment is not open');
    }

    let parentPtr: TxnPtr | null = null;
    if (parent !== null) {
      if (parent.env !== env) {
        throw new LogicError('mdb_txn_begin', ErrorCode.InvalidArgument, 'parent belongs to another environment');
      }
      parentPtr = parent.ptr('mdb_txn_begin');
    }

    const txnOut: Out<TxnPtr> = [null];
    checkResult(env.engine.mdb_txn_begin(envPtr, parentPtr, flags, txnOut), 'mdb_txn_begin', env.strerror);

    const txn = new Transaction(txnOut[0], env, parent, (flags & TxnFlags.ReadOnly) !== 0);
    if (parent !== null) {
      parent._children.add(txn);
    } else {
      env.trackTransaction(txn);
    }
    log('began %s transaction %d%s', txn.readOnly ? 'read-only' : 'read-write', txn.id(), parent ? ' (nested)' : '');
    return txn;
  }

  get state(): TransactionState {
    return this._state;
  }

  /**
   * The engine handle. Throws unless the transaction is active.
   */
  ptr(origin: string): TxnPtr {
    if (this._txn === null) throw new ClosedHandleError(origin, 'transaction');
    if (this._state === 'reset') {
      throw new LogicError(origin, ErrorCode.BadTxn, 'transaction has been reset');
    }
    return this._txn;
  }

  /**
   * Engine id of the snapshot this transaction reads, or of the transaction
   * it will commit.
   */
  id(): number {
    return this.env.engine.mdb_txn_id(this.ptr('mdb_txn_id'));
  }

  /**
   * The engine handle of the owning environment.
   */
  envHandle(): EnvPtr {
    return this.env.engine.mdb_txn_env(this.ptr('mdb_txn_env'));
  }

  openDatabase(name: string | null = null, flags: number = DbFlags.None): Database {
    return Database.open(this, name, flags);
  }

  openCursor(db: Database): Cursor {
    return Cursor.open(this, db);
  }

  /**
   * Run `fn` with a cursor over `db`, closing the cursor when it returns or
   * throws.
   */
  withCursor<T>(db: Database, fn: (cursor: Cursor) => T): T {
    const cursor = Cursor.open(this, db);
    try {
      return fn(cursor);
    } finally {
      cursor.close();
    }
  }

  /**
   * Begin a nested read-write transaction.
   */
  beginChild(flags: number = TxnFlags.None): Transaction {
    return Transaction.begin(this.env, this, flags);
  }

  /**
   * Commit the transaction, and first any active child. Whatever the outcome,
   * the handle is released: a failed commit leaves the transaction `aborted`.
   */
  commit(): void {
    if (this._txn === null) throw new ClosedHandleError('mdb_txn_commit', 'transaction');
    const txn = this._txn;

    try {
      for (const child of [...this._children]) {
        child.commit();
      }
    } catch (err) {
      this.abort();
      throw err;
    }

    const result = this.env.engine.mdb_txn_commit(txn);
    this.settle(result === ErrorCode.Success ? 'committed' : 'aborted');
    checkResult(result, 'mdb_txn_commit', this.env.strerror);
  }

  /**
   * Discard the transaction and its active children. Never fails; does nothing
   * once the transaction is resolved.
   */
  abort(): void {
    if (this._txn === null) return;
    const txn = this._txn;

    for (const child of [...this._children]) {
      child.abort();
    }

    this.env.engine.mdb_txn_abort(txn);
    this.settle('aborted');
  }

  /**
   * Release the snapshot of a read-only transaction, keeping the handle for
   * {@link Transaction.renew}.
   */
  reset(): void {
    if (this._txn === null) throw new ClosedHandleError('mdb_txn_reset', 'transaction');
    if (!this.readOnly) {
      throw new LogicError('mdb_txn_reset', ErrorCode.InvalidArgument, 'only read-only transactions can be reset');
    }
    if (this._state === 'reset') return;

    this.env.engine.mdb_txn_reset(this._txn);
    this._state = 'reset';
    log('reset transaction');
  }

  /**
   * Acquire a fresh snapshot for a reset transaction. Cursors still bound to
   * the transaction are renewed onto the new snapshot.
   */
  renew(): void {
    if (this._txn === null) throw new ClosedHandleError('mdb_txn_renew', 'transaction');

    checkResult(this.env.engine.mdb_txn_renew(this._txn), 'mdb_txn_renew', this.env.strerror);
    this._state = 'active';
    for (const cursor of [...this._cursors]) {
      cursor.renew(this);
    }
    log('renewed transaction %d', this.id());
  }

  /** @internal */
  trackCursor(cursor: Cursor): void {
    this._cursors.add(cursor);
  }

  /** @internal */
  untrackCursor(cursor: Cursor): void {
    this._cursors.delete(cursor);
  }

  private settle(state: 'committed' | 'aborted'): void {
    this._txn = null;
    this._state = state;

    // The engine frees the cursors of a read-write transaction with it; those
    // of a read-only one stay open for Cursor.renew.
    if (!this.readOnly) {
      for (const cursor of [...this._cursors]) {
        cursor.release();
      }
    }
    this._cursors.clear();

    if (this.parent !== null) {
      this.parent._children.delete(this);
    } else {
      this.env.untrackTransaction(this);
    }
    log('transaction %s', state);
  }
}
