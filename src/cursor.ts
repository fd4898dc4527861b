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

import type { Database } from './database';
import { CursorPtr, Dbi, Out, TxnPtr } from './engine';
import type { Environment } from './environment';
import { checkFound, checkResult, ClosedHandleError, LogicError } from './error';
import { debug } from './format';
import type { Transaction } from './transaction';
import { CursorOp, ErrorCode, HandleState, WriteFlags } from './types';
import { Val, ValLike } from './val';

const log = debug('lmdb-handles:cursor');

/**
 * Options for {@link Cursor.entries}.
 */
export interface EntriesOptions {
  /** Walk from the last entry to the first. Default: false */
  reverse?: boolean;
}

/**
 * A cursor over one database, bound to one transaction.
 *
 * A cursor of a read-write transaction is released together with the
 * transaction. A cursor of a read-only transaction outlives it and can be
 * bound to another read-only transaction with {@link Cursor.renew}.
 */
export class Cursor {
  private _cursor: CursorPtr | null;
  private _txn: Transaction;
  private _state: HandleState = 'opened';

  readonly db: Database;

  private constructor(cursor: CursorPtr, txn: Transaction, db: Database) {
    this._cursor = cursor;
    this._txn = txn;
    this.db = db;
  }

  static open(txn: Transaction, db: Database): Cursor {
    if (txn.env !== db.env) {
      throw new LogicError('mdb_cursor_open', ErrorCode.InvalidArgument, 'database belongs to another environment');
    }
    const cursorOut: Out<CursorPtr> = [null];
    checkResult(
      txn.env.engine.mdb_cursor_open(txn.ptr('mdb_cursor_open'), db.dbi, cursorOut),
      'mdb_cursor_open',
      txn.env.strerror
    );

    const cursor = new Cursor(cursorOut[0], txn, db);
    txn.trackCursor(cursor);
    txn.env.trackCursor(cursor);
    log('opened cursor on %d', db.dbi);
    return cursor;
  }

  get state(): HandleState {
    return this._state;
  }

  get env(): Environment {
    return this._txn.env;
  }

  get txn(): Transaction {
    return this._txn;
  }

  /**
   * Close the cursor. Calling it again does nothing.
   */
  close(): void {
    if (this._cursor === null) return;
    this.env.engine.mdb_cursor_close(this._cursor);
    this.release();
    log('closed cursor');
  }

  /**
   * Bind the cursor to another read-only transaction.
   */
  renew(txn: Transaction): void {
    if (this._cursor === null) throw new ClosedHandleError('mdb_cursor_renew', 'cursor');
    if (txn.env !== this.env) {
      throw new LogicError('mdb_cursor_renew', ErrorCode.InvalidArgument, 'transaction belongs to another environment');
    }
    checkResult(
      this.env.engine.mdb_cursor_renew(txn.ptr('mdb_cursor_renew'), this._cursor),
      'mdb_cursor_renew',
      this.env.strerror
    );
    this._txn.untrackCursor(this);
    this._txn = txn;
    txn.trackCursor(this);
    log('renewed cursor');
  }

  /**
   * Engine handle of the transaction the cursor is bound to.
   */
  txnHandle(): TxnPtr {
    return this.env.engine.mdb_cursor_txn(this.ptr('mdb_cursor_txn'));
  }

  dbiHandle(): Dbi {
    return this.env.engine.mdb_cursor_dbi(this.ptr('mdb_cursor_dbi'));
  }

  /**
   * Position the cursor with `op`. Returns `false` when no record matches;
   * otherwise `key` and `data` (when given) hold views of the record.
   */
  get(key: Val, op: CursorOp): boolean;
  get(key: Val, data: Val | null, op: CursorOp): boolean;
  get(key: Val, dataOrOp: Val | null | CursorOp, maybeOp?: CursorOp): boolean {
    const data = typeof dataOrOp === 'number' ? null : dataOrOp;
    const op = typeof dataOrOp === 'number' ? dataOrOp : maybeOp;
    if (op === undefined) {
      throw new LogicError('mdb_cursor_get', ErrorCode.InvalidArgument, 'missing cursor operation');
    }
    return checkFound(
      this.env.engine.mdb_cursor_get(this.ptr('mdb_cursor_get'), key, data, op),
      'mdb_cursor_get',
      this.env.strerror
    );
  }

  /**
   * Position the cursor at `key`, filling `data` when given.
   */
  find(key: ValLike, data: Val | null = null): boolean {
    return this.get(Val.of(key), data, CursorOp.Set);
  }

  put(key: ValLike, data: ValLike, flags: number = WriteFlags.None): void {
    checkResult(
      this.env.engine.mdb_cursor_put(this.ptr('mdb_cursor_put'), Val.of(key), Val.of(data), flags),
      'mdb_cursor_put',
      this.env.strerror
    );
  }

  /**
   * Delete the record at the cursor. With `WriteFlags.NoDupData`, delete all
   * duplicates of the current key.
   */
  del(flags: number = WriteFlags.None): void {
    checkResult(this.env.engine.mdb_cursor_del(this.ptr('mdb_cursor_del'), flags), 'mdb_cursor_del', this.env.strerror);
  }

  /**
   * Number of duplicates of the current key in a `DupSort` database.
   */
  count(): number {
    const countOut: Out<number> = [0];
    checkResult(
      this.env.engine.mdb_cursor_count(this.ptr('mdb_cursor_count'), countOut),
      'mdb_cursor_count',
      this.env.strerror
    );
    return countOut[0];
  }

  /**
   * Walk every record in key order. Each step yields fresh views, valid until
   * the transaction ends or writes.
   */
  *entries(options: EntriesOptions = {}): Generator<[Val, Val]> {
    const first = options.reverse ? CursorOp.Last : CursorOp.First;
    const next = options.reverse ? CursorOp.Prev : CursorOp.Next;
    for (let op: CursorOp = first; ; op = next) {
      const key = new Val();
      const data = new Val();
      if (!this.get(key, data, op)) return;
      yield [key, data];
    }
  }

  /**
   * Mark the cursor closed without calling the engine, whose handle is gone.
   * @internal
   */
  release(): void {
    this._cursor = null;
    this._state = 'closed';
    this._txn.untrackCursor(this);
    this.env.untrackCursor(this);
  }

  private ptr(origin: string): CursorPtr {
    if (this._cursor === null) throw new ClosedHandleError(origin, 'cursor');
    if (this._txn.state === 'reset') {
      throw new LogicError(origin, ErrorCode.BadTxn, 'transaction has been reset');
    }
    if (this._txn.state !== 'active') throw new ClosedHandleError(origin, 'transaction');
    return this._cursor;
  }
}
