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
  ClosedHandleError,
  Cursor,
  CursorOp,
  Database,
  DbFlags,
  Environment,
  ErrorCode,
  LmdbError,
  LogicError,
  MemoryEngine,
  RuntimeError,
  Transaction,
  uint32,
  utf8,
  Val,
  WriteFlags,
} from './index';

function failure(fn: () => unknown): LmdbError {
  try {
    fn();
  } catch (err) {
    if (err instanceof LmdbError) return err;
    throw err;
  }
  throw new Error('expected a failure');
}

function keys(cursor: Cursor, reverse: boolean = false): string[] {
  return Array.from(cursor.entries({ reverse }), ([key]) => key.toString());
}

describe('Cursor', () => {
  let engine: MemoryEngine;
  let env: Environment;
  let db: Database;

  beforeEach(() => {
    engine = new MemoryEngine();
    env = Environment.open({ path: '/data/cursor', maxDbs: 8 }, engine);
    db = env.write((txn) => {
      const main = txn.openDatabase();
      main.put(txn, 'a', '1');
      main.put(txn, 'b', '2');
      main.put(txn, 'c', '3');
      return main;
    });
  });

  afterEach(() => {
    env.close();
  });

  describe('Positioning', () => {
    let txn: Transaction;
    let cursor: Cursor;
    let key: Val;
    let data: Val;

    beforeEach(() => {
      txn = env.beginTransaction({ readOnly: true });
      cursor = Cursor.open(txn, db);
      key = new Val();
      data = new Val();
    });

    afterEach(() => {
      cursor.close();
      txn.abort();
    });

    test('first then next visits every entry once', () => {
      const seen: string[] = [];
      let found = cursor.get(key, data, CursorOp.First);
      while (found) {
        seen.push(`${key.toString()}=${data.toString()}`);
        found = cursor.get(key, data, CursorOp.Next);
      }
      expect(seen).toEqual(['a=1', 'b=2', 'c=3']);
      expect(cursor.get(key, data, CursorOp.Next)).toBe(false);
    });

    test('last then prev walks backwards', () => {
      expect(cursor.get(key, data, CursorOp.Last)).toBe(true);
      expect(key.toString()).toBe('c');
      expect(cursor.get(key, data, CursorOp.Prev)).toBe(true);
      expect(key.toString()).toBe('b');
    });

    test('next and prev on a fresh cursor start at the ends', () => {
      expect(cursor.get(key, data, CursorOp.Next)).toBe(true);
      expect(key.toString()).toBe('a');

      const other = txn.openCursor(db);
      expect(other.get(key, data, CursorOp.Prev)).toBe(true);
      expect(key.toString()).toBe('c');
      other.close();
    });

    test('GetCurrent needs a position', () => {
      const err = failure(() => cursor.get(key, data, CursorOp.GetCurrent));
      expect(err).toBeInstanceOf(RuntimeError);
      expect(err.code).toBe(ErrorCode.InvalidArgument);

      cursor.get(key, data, CursorOp.First);
      expect(cursor.get(key, data, CursorOp.GetCurrent)).toBe(true);
      expect(data.toString()).toBe('1');
    });

    test('find is an exact match', () => {
      expect(cursor.find('b', data)).toBe(true);
      expect(data.toString()).toBe('2');
      expect(cursor.find('bb')).toBe(false);
    });

    test('SetKey returns the stored key', () => {
      const wanted = Val.of('c');
      expect(cursor.get(wanted, data, CursorOp.SetKey)).toBe(true);
      expect(wanted.toString()).toBe('c');
      expect(data.toString()).toBe('3');
    });

    test('SetRange finds the next key', () => {
      const from = Val.of('bb');
      expect(cursor.get(from, data, CursorOp.SetRange)).toBe(true);
      expect(from.toString()).toBe('c');
      expect(cursor.get(Val.of('d'), data, CursorOp.SetRange)).toBe(false);
    });

    test('the two-argument form leaves data alone', () => {
      expect(cursor.get(key, CursorOp.Last)).toBe(true);
      expect(key.toString()).toBe('c');
    });

    test('entries in both directions', () => {
      expect(keys(cursor)).toEqual(['a', 'b', 'c']);
      expect(keys(cursor, true)).toEqual(['c', 'b', 'a']);
    });

    test('handles', () => {
      expect(cursor.dbiHandle()).toBe(db.dbi);
      expect(cursor.txnHandle()).toBe(txn.ptr('test'));
    });

    test('count needs a DupSort database', () => {
      cursor.get(key, data, CursorOp.First);
      const err = failure(() => cursor.count());
      expect(err.code).toBe(ErrorCode.Incompatible);
    });
  });

  describe('Writes', () => {
    test('put through a cursor, then read it back', () => {
      const txn = env.beginTransaction();
      const cursor = txn.openCursor(db);
      cursor.put('d', '4');
      expect(cursor.get(new Val(), new Val(), CursorOp.GetCurrent)).toBe(true);
      txn.commit();

      const value = new Val();
      expect(env.read((reader) => db.get(reader, 'd', value))).toBe(true);
      expect(value.toString()).toBe('4');
    });

    test('Current replaces the value at the cursor', () => {
      const txn = env.beginTransaction();
      const cursor = txn.openCursor(db);
      cursor.find('a');
      cursor.put('a', '9', WriteFlags.Current);
      expect(db.getValue(txn, 'a', utf8)).toBe('9');

      const err = failure(() => cursor.put('b', '9', WriteFlags.Current));
      expect(err.code).toBe(ErrorCode.InvalidArgument);
      txn.abort();
    });

    test('del moves to the successor', () => {
      const txn = env.beginTransaction();
      const cursor = txn.openCursor(db);
      const key = new Val();
      const data = new Val();

      cursor.find('b');
      cursor.del();
      expect(cursor.get(key, data, CursorOp.GetCurrent)).toBe(true);
      expect(key.toString()).toBe('c');
      expect(db.get(txn, 'b')).toBe(false);
      expect(db.size(txn)).toBe(2);
      txn.abort();
    });

    test('del without a position is refused', () => {
      const txn = env.beginTransaction();
      const cursor = txn.openCursor(db);
      expect(() => cursor.del()).toThrow('mdb_cursor_del: Invalid argument');
      txn.abort();
    });

    test('writes through a read-only cursor are refused', () => {
      const reader = env.beginTransaction({ readOnly: true });
      const cursor = reader.openCursor(db);
      expect(() => cursor.put('z', '0')).toThrow('mdb_cursor_put: Permission denied');
      cursor.close();
      reader.abort();
    });
  });

  describe('Duplicates', () => {
    let txn: Transaction;
    let dups: Database;
    let cursor: Cursor;
    let key: Val;
    let data: Val;

    beforeEach(() => {
      txn = env.beginTransaction();
      dups = txn.openDatabase('dups', DbFlags.Create | DbFlags.DupSort);
      for (const value of ['z', 'x', 'y']) dups.put(txn, 'k', value);
      dups.put(txn, 'm', 'w');
      cursor = txn.openCursor(dups);
      key = new Val();
      data = new Val();
    });

    afterEach(() => {
      txn.abort();
    });

    test('values are sorted within a key', () => {
      const pairs = Array.from(cursor.entries(), ([k, v]) => `${k.toString()}=${v.toString()}`);
      expect(pairs).toEqual(['k=x', 'k=y', 'k=z', 'm=w']);
    });

    test('count and the dup operators', () => {
      expect(cursor.find('k', data)).toBe(true);
      expect(data.toString()).toBe('x');
      expect(cursor.count()).toBe(3);

      expect(cursor.get(key, data, CursorOp.NextDup)).toBe(true);
      expect(data.toString()).toBe('y');
      expect(cursor.get(key, data, CursorOp.NextDup)).toBe(true);
      expect(data.toString()).toBe('z');
      expect(cursor.get(key, data, CursorOp.NextDup)).toBe(false);

      expect(cursor.get(key, data, CursorOp.NextNoDup)).toBe(true);
      expect(key.toString()).toBe('m');
      expect(cursor.get(key, data, CursorOp.PrevNoDup)).toBe(true);
      expect(`${key.toString()}=${data.toString()}`).toBe('k=z');

      expect(cursor.get(key, data, CursorOp.FirstDup)).toBe(true);
      expect(data.toString()).toBe('x');
      expect(cursor.get(key, data, CursorOp.LastDup)).toBe(true);
      expect(data.toString()).toBe('z');
      expect(cursor.get(key, data, CursorOp.PrevDup)).toBe(true);
      expect(data.toString()).toBe('y');
    });

    test('GetBoth and GetBothRange', () => {
      const wanted = Val.of('y');
      expect(cursor.get(Val.of('k'), wanted, CursorOp.GetBoth)).toBe(true);
      expect(cursor.get(Val.of('k'), Val.of('q'), CursorOp.GetBoth)).toBe(false);

      const range = Val.of('xa');
      expect(cursor.get(Val.of('k'), range, CursorOp.GetBothRange)).toBe(true);
      expect(range.toString()).toBe('y');
    });

    test('NoDupData deletes every value of the key', () => {
      cursor.find('k');
      cursor.del(WriteFlags.NoDupData);
      expect(dups.size(txn)).toBe(1);
    });

    test('NoDupData refuses an existing pair', () => {
      expect(() => cursor.put('k', 'x', WriteFlags.NoDupData)).toThrow(
        'mdb_cursor_put: MDB_KEYEXIST: Key/data pair already exists'
      );
      expect(() => cursor.put('k', 'v', WriteFlags.NoDupData)).not.toThrow();
      expect(dups.size(txn)).toBe(5);
    });

    test('GetMultiple needs DupFixed', () => {
      cursor.find('k');
      expect(failure(() => cursor.get(key, data, CursorOp.GetMultiple)).code).toBe(ErrorCode.Incompatible);

      const fixed = txn.openDatabase('fixed', DbFlags.Create | DbFlags.DupSort | DbFlags.DupFixed);
      for (const value of ['03', '01', '02']) fixed.put(txn, 'k', value);
      const fixedCursor = txn.openCursor(fixed);
      fixedCursor.find('k');
      expect(fixedCursor.get(key, data, CursorOp.GetMultiple)).toBe(true);
      expect(data.toString()).toBe('010203');
    });
  });

  describe('Ordering', () => {
    test('IntegerKey compares numbers', () => {
      const txn = env.beginTransaction();
      const ints = txn.openDatabase('ints', DbFlags.Create | DbFlags.IntegerKey);
      for (const n of [256, 1, 65536]) ints.put(txn, uint32.encode(n), 'v');
      const cursor = txn.openCursor(ints);
      expect(Array.from(cursor.entries(), ([k]) => k.decode(uint32))).toEqual([1, 256, 65536]);
      txn.abort();
    });

    test('ReverseKey compares from the end', () => {
      const txn = env.beginTransaction();
      const rev = txn.openDatabase('rev', DbFlags.Create | DbFlags.ReverseKey);
      for (const k of ['ab', 'ba', 'ca']) rev.put(txn, k, 'v');
      expect(keys(txn.openCursor(rev))).toEqual(['ba', 'ca', 'ab']);
      txn.abort();
    });
  });

  describe('Lifecycle', () => {
    test('close is idempotent', () => {
      const reader = env.beginTransaction({ readOnly: true });
      const cursor = reader.openCursor(db);
      cursor.close();
      expect(cursor.state).toBe('closed');
      expect(() => cursor.close()).not.toThrow();
      expect(() => cursor.get(new Val(), CursorOp.First)).toThrow('mdb_cursor_get: cursor has been released');
      reader.abort();
    });

    test('a read-write cursor closes with its transaction', () => {
      const close = jest.spyOn(engine, 'mdb_cursor_close');
      const txn = env.beginTransaction();
      const cursor = txn.openCursor(db);
      txn.commit();

      expect(cursor.state).toBe('closed');
      cursor.close();
      expect(close).not.toHaveBeenCalled();
      expect(() => cursor.get(new Val(), CursorOp.First)).toThrow(ClosedHandleError);
    });

    test('a read-only cursor outlives its transaction and renews', () => {
      const first = env.beginTransaction({ readOnly: true });
      const cursor = first.openCursor(db);
      first.abort();

      expect(cursor.state).toBe('opened');
      expect(() => cursor.get(new Val(), CursorOp.First)).toThrow('mdb_cursor_get: transaction has been released');

      env.write((txn) => db.put(txn, 'd', '4'));

      const second = env.beginTransaction({ readOnly: true });
      cursor.renew(second);
      expect(cursor.txn).toBe(second);
      expect(keys(cursor)).toEqual(['a', 'b', 'c', 'd']);
      cursor.close();
      second.abort();
    });

    test('a reset transaction holds its cursors until renewed', () => {
      const renew = jest.spyOn(engine, 'mdb_cursor_renew');
      const reader = env.beginTransaction({ readOnly: true });
      const cursor = reader.openCursor(db);
      const key = new Val();
      expect(cursor.get(key, CursorOp.First)).toBe(true);
      expect(key.toString()).toBe('a');

      reader.reset();
      const err = failure(() => cursor.get(key, CursorOp.Next));
      expect(err).toBeInstanceOf(LogicError);
      expect(err.code).toBe(ErrorCode.BadTxn);
      expect(err.message).toBe('mdb_cursor_get: transaction has been reset');

      env.write((txn) => db.put(txn, '0', 'z'));
      reader.renew();
      expect(renew).toHaveBeenCalledTimes(1);
      expect(cursor.txn).toBe(reader);
      expect(cursor.get(key, CursorOp.Next)).toBe(true);
      expect(key.toString()).toBe('0');
      cursor.close();
      reader.abort();
    });

    test('withCursor closes the cursor', () => {
      const opened: Cursor[] = [];
      const seen = env.read((txn) =>
        txn.withCursor(db, (cursor) => {
          opened.push(cursor);
          return keys(cursor);
        })
      );
      expect(seen).toEqual(['a', 'b', 'c']);
      expect(opened[0].state).toBe('closed');

      const reader = env.beginTransaction({ readOnly: true });
      expect(() =>
        reader.withCursor(db, (cursor) => {
          opened.push(cursor);
          throw new Error('boom');
        })
      ).toThrow('boom');
      expect(opened[1].state).toBe('closed');
      reader.abort();
    });

    test('renew into a read-write transaction is refused', () => {
      const reader = env.beginTransaction({ readOnly: true });
      const cursor = reader.openCursor(db);
      const writer = env.beginTransaction();
      const err = failure(() => cursor.renew(writer));
      expect(err).toBeInstanceOf(RuntimeError);
      expect(err.message).toBe('mdb_cursor_renew: Invalid argument');
      writer.abort();
      cursor.close();
      reader.abort();
    });
  });
});
