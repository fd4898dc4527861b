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

import { Cursor, Database, EnvFlags, Environment, libraryPath, MemoryEngine, Transaction, utf8, Val } from './index';

describe('lmdb-handles', () => {
  test('write through a cursor, read through a second transaction', () => {
    const env = Environment.create(EnvFlags.None, new MemoryEngine()).open('/scenario');

    const txn = Transaction.begin(env);
    const db = Database.open(txn);
    const cursor = Cursor.open(txn, db);
    cursor.put('k', 'v');
    txn.commit();
    expect(cursor.state).toBe('closed');

    const reader = env.beginTransaction({ readOnly: true });
    const value = new Val();
    expect(db.get(reader, 'k', value)).toBe(true);
    expect(value.toString()).toBe('v');
    expect(db.getValue(reader, 'k', utf8)).toBe('v');
    reader.abort();

    env.close();
    expect(env.state).toBe('closed');
  });

  describe('libraryPath', () => {
    const saved = process.env.LMDB_LIBRARY_PATH;

    afterEach(() => {
      if (saved === undefined) delete process.env.LMDB_LIBRARY_PATH;
      else process.env.LMDB_LIBRARY_PATH = saved;
    });

    test('honours LMDB_LIBRARY_PATH', () => {
      process.env.LMDB_LIBRARY_PATH = '/opt/lmdb/liblmdb.so.0';
      expect(libraryPath()).toBe('/opt/lmdb/liblmdb.so.0');
    });

    test('falls back to the platform name', () => {
      delete process.env.LMDB_LIBRARY_PATH;
      expect(libraryPath()).toMatch(/lmdb\.(so|dylib|dll)$/);
    });
  });
});
