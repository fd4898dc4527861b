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

import createTree, { Iterator as TreeIterator, Tree as RBTree } from 'functional-red-black-tree';
import { endianness } from 'os';

import { CursorPtr, Dbi, Engine, EnvPtr, Out, TxnPtr } from './engine';
import { describeStatus } from './error';
import { CursorOp, DbFlags, EnvFlags, EnvInfo, ErrorCode, Stat, TxnFlags, Version, WriteFlags } from './types';
import { Val } from './val';

const PAGE_SIZE = 4096;
const MAX_KEY_SIZE = 511;
const DEFAULT_MAP_SIZE = 10485760;
const DEFAULT_MAX_READERS = 126;
const MAIN_DBI = 1;

const CHANGEABLE_ENV_FLAGS = EnvFlags.NoSync | EnvFlags.NoMetaSync | EnvFlags.MapAsync | EnvFlags.NoMemInit;
const PERSISTENT_DB_FLAGS =
  DbFlags.ReverseKey | DbFlags.DupSort | DbFlags.IntegerKey | DbFlags.DupFixed | DbFlags.IntegerDup | DbFlags.ReverseDup;

const littleEndian = endianness() === 'LE';

type Compare = (a: Uint8Array, b: Uint8Array) => number;

interface Entry {
  key: Uint8Array;
  value: Uint8Array;
}

const lexical: Compare = (a, b) => Buffer.compare(a, b);

const reverse: Compare = (a, b) => {
  let i = a.byteLength - 1;
  let j = b.byteLength - 1;
  for (; i >= 0 && j >= 0; i--, j--) {
    const diff = a[i] - b[j];
    if (diff !== 0) return diff;
  }
  return a.byteLength - b.byteLength;
};

const integer: Compare = (a, b) => {
  if (a.byteLength !== b.byteLength || (a.byteLength !== 4 && a.byteLength !== 8)) {
    return lexical(a, b);
  }
  const x = new DataView(a.buffer, a.byteOffset, a.byteLength);
  const y = new DataView(b.buffer, b.byteOffset, b.byteLength);
  if (a.byteLength === 4) {
    return x.getUint32(0, littleEndian) - y.getUint32(0, littleEndian);
  }
  const u = x.getBigUint64(0, littleEndian);
  const v = y.getBigUint64(0, littleEndian);
  return u < v ? -1 : u > v ? 1 : 0;
};

const EMPTY = new Uint8Array(0);

/** An entry that sorts before every stored entry with `key`. */
const probe = (key: Uint8Array): Entry => ({ key, value: EMPTY });

function entryOf(iter: TreeIterator<Entry, Entry>): Entry | null {
  return iter.valid && iter.key !== undefined ? iter.key : null;
}

/**
 * One keyspace: a persistent red-black tree of entries ordered by key, then
 * (for DupSort) by value. Copies share structure, so a transaction's first
 * write to a keyspace does not copy its entries.
 */
class Tree {
  private _flags: number;
  private _root: RBTree<Entry, Entry>;
  bytes: number;

  constructor(flags: number, root?: RBTree<Entry, Entry>, bytes: number = 0) {
    this._flags = flags;
    this._root = root ?? createTree<Entry, Entry>(this.compare);
    this.bytes = bytes;
  }

  get flags(): number {
    return this._flags;
  }

  /** Change the ordering flags of an empty keyspace. */
  set flags(flags: number) {
    this._flags = flags;
    this._root = createTree<Entry, Entry>(this.compare);
    this.bytes = 0;
  }

  get size(): number {
    return this._root.length;
  }

  get dupSort(): boolean {
    return (this._flags & DbFlags.DupSort) !== 0;
  }

  get compareKeys(): Compare {
    if (this._flags & DbFlags.IntegerKey) return integer;
    if (this._flags & DbFlags.ReverseKey) return reverse;
    return lexical;
  }

  get compareValues(): Compare {
    if (this._flags & DbFlags.IntegerDup) return integer;
    if (this._flags & DbFlags.ReverseDup) return reverse;
    return lexical;
  }

  get compare(): (a: Entry, b: Entry) => number {
    const compareKeys = this.compareKeys;
    if (!this.dupSort) return (a, b) => compareKeys(a.key, b.key);
    const compareValues = this.compareValues;
    return (a, b) => compareKeys(a.key, b.key) || compareValues(a.value, b.value);
  }

  clone(): Tree {
    return new Tree(this._flags, this._root, this.bytes);
  }

  first(): Entry | null {
    return entryOf(this._root.begin);
  }

  last(): Entry | null {
    return entryOf(this._root.end);
  }

  /** The stored entry equal to `entry`: same key, and same value under DupSort. */
  lookup(entry: Entry): Entry | null {
    return this._root.get(entry) ?? null;
  }

  /** First entry >= `entry`. */
  ge(entry: Entry): Entry | null {
    return entryOf(this._root.ge(entry));
  }

  /** First entry > `entry`. */
  gt(entry: Entry): Entry | null {
    return entryOf(this._root.gt(entry));
  }

  /** Last entry < `entry`. */
  lt(entry: Entry): Entry | null {
    return entryOf(this._root.lt(entry));
  }

  /** First entry with a key >= `key`. */
  seekKey(key: Uint8Array): Entry | null {
    return this.ge(probe(key));
  }

  /** First entry >= `(key, value)`. */
  seekPair(key: Uint8Array, value: Uint8Array): Entry | null {
    return this.ge({ key, value });
  }

  /** `entry` when it holds `key`, else null. */
  withKey(entry: Entry | null, key: Uint8Array): Entry | null {
    return entry !== null && this.compareKeys(entry.key, key) === 0 ? entry : null;
  }

  /** The entries sharing `key`, in order. */
  duplicates(key: Uint8Array): Entry[] {
    const found: Entry[] = [];
    const iter = this._root.ge(probe(key));
    for (let entry = entryOf(iter); entry !== null && this.compareKeys(entry.key, key) === 0; entry = entryOf(iter)) {
      found.push(entry);
      iter.next();
    }
    return found;
  }

  insert(entry: Entry): void {
    this._root = this._root.insert(entry, entry);
    this.bytes += entry.key.byteLength + entry.value.byteLength;
  }

  remove(entry: Entry): void {
    this._root = this._root.remove(entry);
    this.bytes -= entry.key.byteLength + entry.value.byteLength;
  }

  replace(old: Entry, value: Uint8Array): Entry {
    const entry = { key: old.key, value };
    this.remove(old);
    this.insert(entry);
    return entry;
  }

  clear(): void {
    this._root = createTree<Entry, Entry>(this.compare);
    this.bytes = 0;
  }

  stat(stat: Stat): void {
    const entries = this._root.length;
    const leafPages = entries === 0 ? 0 : Math.ceil((this.bytes + entries * 8) / (PAGE_SIZE - 16));
    const branchPages = leafPages > 1 ? Math.ceil(leafPages / 256) : 0;
    stat.pageSize = PAGE_SIZE;
    stat.depth = entries === 0 ? 0 : branchPages > 0 ? 2 : 1;
    stat.branchPages = branchPages;
    stat.leafPages = leafPages;
    stat.overflowPages = 0;
    stat.entries = entries;
  }
}

type Trees = Map<string | null, Tree>;

interface Snapshot {
  id: number;
  trees: Trees;
}

/**
 * Committed state of one path.
 */
class Store {
  snapshot: Snapshot = { id: 0, trees: new Map([[null, new Tree(0)]]) };
  writer: MemoryTxn | null = null;
}

interface DbiSlot {
  name: string | null;
}

class MemoryEnv {
  flags = 0;
  mapSize = DEFAULT_MAP_SIZE;
  maxReaders = DEFAULT_MAX_READERS;
  maxDbs = 0;
  path: string | null = null;
  store: Store | null = null;
  closed = false;
  readers = 0;
  dbis: (DbiSlot | undefined)[] = [undefined, { name: null }];
  txns = new Set<MemoryTxn>();
}

class MemoryTxn {
  child: MemoryTxn | null = null;
  snapshot: Snapshot | null = null;
  trees: Trees = new Map();
  owned = new Set<string | null>();
  created: Dbi[] = [];
  cursors = new Set<MemoryCursor>();
  done = false;
  reset = false;

  constructor(
    public readonly env: MemoryEnv,
    public readonly parent: MemoryTxn | null,
    public readonly readOnly: boolean
  ) {}

  /** The trees this transaction reads. */
  view(): Trees | null {
    return this.readOnly ? (this.snapshot?.trees ?? null) : this.trees;
  }

  /** A tree this transaction may modify, copied on first write. */
  writable(name: string | null): Tree | null {
    const tree = this.trees.get(name);
    if (!tree) return null;
    if (this.owned.has(name)) return tree;
    const copy = tree.clone();
    this.trees.set(name, copy);
    this.owned.add(name);
    return copy;
  }

  totalBytes(): number {
    let total = 0;
    for (const tree of this.trees.values()) total += tree.bytes;
    return total;
  }
}

class MemoryCursor {
  position: Entry | null = null;
  deleted = false;
  closed = false;

  constructor(
    public txn: MemoryTxn,
    public readonly dbi: Dbi
  ) {}
}

/**
 * An in-process stand-in for LMDB that honours the {@link Engine} contract.
 *
 * Each committed write transaction publishes an immutable snapshot of
 * persistent trees; a write transaction works on its own versions of them, so
 * readers and aborted writers never observe uncommitted data. Stores are keyed by path
 * and live as long as the engine instance, so reopening a path sees what was
 * committed before.
 *
 * Where LMDB would block, waiting for the single writer lock, this engine
 * returns `ErrorCode.Busy`.
 *
 * Meant for tests; it keeps nothing on disk.
 *
 * @internal
 */
export class MemoryEngine implements Engine {
  private readonly stores = new Map<string, Store>();

  mdb_version(): Version {
    return { major: 0, minor: 9, patch: 0, text: 'in-memory engine (LMDB 0.9 contract)' };
  }

  mdb_strerror(code: number): string {
    return describeStatus(code);
  }

  // Environment

  mdb_env_create(env: Out<EnvPtr>): number {
    env[0] = new MemoryEnv();
    return ErrorCode.Success;
  }

  mdb_env_open(env: EnvPtr, path: string, flags: number, _mode: number): number {
    if (!(env instanceof MemoryEnv) || env.closed || env.store) return ErrorCode.InvalidArgument;
    let store = this.stores.get(path);
    if (!store) {
      if (flags & EnvFlags.ReadOnly) return ErrorCode.NoEntry;
      store = new Store();
      this.stores.set(path, store);
    }
    env.flags |= flags;
    env.path = path;
    env.store = store;
    return ErrorCode.Success;
  }

  mdb_env_sync(env: EnvPtr, _force: boolean): number {
    if (!(env instanceof MemoryEnv) || env.closed || !env.store) return ErrorCode.InvalidArgument;
    if (env.flags & EnvFlags.ReadOnly) return ErrorCode.AccessDenied;
    return ErrorCode.Success;
  }

  mdb_env_close(env: EnvPtr): void {
    if (!(env instanceof MemoryEnv) || env.closed) return;
    for (const txn of [...env.txns]) {
      if (txn.parent === null) this.mdb_txn_abort(txn);
    }
    env.closed = true;
    env.store = null;
  }

  mdb_env_set_flags(env: EnvPtr, flags: number, onoff: boolean): number {
    if (!(env instanceof MemoryEnv) || env.closed) return ErrorCode.InvalidArgument;
    if (flags & ~CHANGEABLE_ENV_FLAGS) return ErrorCode.InvalidArgument;
    env.flags = onoff ? env.flags | flags : env.flags & ~flags;
    return ErrorCode.Success;
  }

  mdb_env_get_flags(env: EnvPtr, flags: Out<number>): number {
    if (!(env instanceof MemoryEnv) || env.closed) return ErrorCode.InvalidArgument;
    flags[0] = env.flags;
    return ErrorCode.Success;
  }

  mdb_env_get_path(env: EnvPtr, path: Out<string>): number {
    if (!(env instanceof MemoryEnv) || env.closed || env.path === null) return ErrorCode.InvalidArgument;
    path[0] = env.path;
    return ErrorCode.Success;
  }

  mdb_env_set_mapsize(env: EnvPtr, size: number): number {
    if (!(env instanceof MemoryEnv) || env.closed) return ErrorCode.InvalidArgument;
    if (env.store?.writer && env.txns.has(env.store.writer)) return ErrorCode.InvalidArgument;
    if (size < 0) return ErrorCode.InvalidArgument;
    env.mapSize = size === 0 ? DEFAULT_MAP_SIZE : size;
    return ErrorCode.Success;
  }

  mdb_env_set_maxreaders(env: EnvPtr, readers: number): number {
    if (!(env instanceof MemoryEnv) || env.closed || env.store || readers < 1) return ErrorCode.InvalidArgument;
    env.maxReaders = readers;
    return ErrorCode.Success;
  }

  mdb_env_get_maxreaders(env: EnvPtr, readers: Out<number>): number {
    if (!(env instanceof MemoryEnv) || env.closed) return ErrorCode.InvalidArgument;
    readers[0] = env.maxReaders;
    return ErrorCode.Success;
  }

  mdb_env_set_maxdbs(env: EnvPtr, dbs: number): number {
    if (!(env instanceof MemoryEnv) || env.closed || env.store || dbs < 0) return ErrorCode.InvalidArgument;
    env.maxDbs = dbs;
    return ErrorCode.Success;
  }

  mdb_env_get_maxkeysize(_env: EnvPtr): number {
    return MAX_KEY_SIZE;
  }

  mdb_env_stat(env: EnvPtr, stat: Stat): number {
    if (!(env instanceof MemoryEnv) || !env.store) return ErrorCode.InvalidArgument;
    const main = env.store.snapshot.trees.get(null);
    if (!main) return ErrorCode.Corrupted;
    main.stat(stat);
    return ErrorCode.Success;
  }

  mdb_env_info(env: EnvPtr, info: EnvInfo): number {
    if (!(env instanceof MemoryEnv) || !env.store) return ErrorCode.InvalidArgument;
    const { snapshot } = env.store;
    const stat: Stat = { pageSize: 0, depth: 0, branchPages: 0, leafPages: 0, overflowPages: 0, entries: 0 };
    let pages = 1;
    for (const tree of snapshot.trees.values()) {
      tree.stat(stat);
      pages += stat.branchPages + stat.leafPages;
    }
    info.mapSize = env.mapSize;
    info.lastPageNumber = pages;
    info.lastTxnId = snapshot.id;
    info.maxReaders = env.maxReaders;
    info.numReaders = env.readers;
    return ErrorCode.Success;
  }

  // Transactions

  mdb_txn_begin(env: EnvPtr, parent: TxnPtr | null, flags: number, txn: Out<TxnPtr>): number {
    if (!(env instanceof MemoryEnv) || env.closed || !env.store) return ErrorCode.InvalidArgument;
    const store = env.store;
    const readOnly = (flags & TxnFlags.ReadOnly) !== 0;

    if (parent !== null) {
      if (!(parent instanceof MemoryTxn) || parent.done || parent.readOnly || parent.env !== env || readOnly) {
        return ErrorCode.InvalidArgument;
      }
      if (parent.child) return ErrorCode.BadTxn;
      const child = new MemoryTxn(env, parent, false);
      child.trees = new Map(parent.trees);
      parent.child = child;
      env.txns.add(child);
      txn[0] = child;
      return ErrorCode.Success;
    }

    if (readOnly) {
      if (env.readers >= env.maxReaders) return ErrorCode.ReadersFull;
      const reader = new MemoryTxn(env, null, true);
      reader.snapshot = store.snapshot;
      env.readers++;
      env.txns.add(reader);
      txn[0] = reader;
      return ErrorCode.Success;
    }

    if (env.flags & EnvFlags.ReadOnly) return ErrorCode.AccessDenied;
    if (store.writer) return ErrorCode.Busy;
    const writer = new MemoryTxn(env, null, false);
    writer.trees = new Map(store.snapshot.trees);
    store.writer = writer;
    env.txns.add(writer);
    txn[0] = writer;
    return ErrorCode.Success;
  }

  mdb_txn_env(txn: TxnPtr): EnvPtr {
    return txn instanceof MemoryTxn ? txn.env : null;
  }

  mdb_txn_id(txn: TxnPtr): number {
    if (!(txn instanceof MemoryTxn) || txn.done) return 0;
    if (txn.readOnly) return txn.snapshot?.id ?? 0;
    return (txn.env.store?.snapshot.id ?? 0) + 1;
  }

  mdb_txn_commit(txn: TxnPtr): number {
    if (!(txn instanceof MemoryTxn) || txn.done) return ErrorCode.InvalidArgument;

    if (txn.child) {
      const result = this.mdb_txn_commit(txn.child);
      if (result !== ErrorCode.Success) {
        this.mdb_txn_abort(txn);
        return result;
      }
    }

    if (txn.readOnly) {
      this.finish(txn);
      return ErrorCode.Success;
    }

    if (txn.parent) {
      const parent = txn.parent;
      parent.trees = txn.trees;
      for (const name of txn.owned) parent.owned.add(name);
      parent.created.push(...txn.created);
      parent.child = null;
      this.finish(txn);
      return ErrorCode.Success;
    }

    const store = txn.env.store;
    if (!store) {
      this.mdb_txn_abort(txn);
      return ErrorCode.InvalidArgument;
    }
    store.snapshot = { id: store.snapshot.id + 1, trees: txn.trees };
    store.writer = null;
    this.finish(txn);
    return ErrorCode.Success;
  }

  mdb_txn_abort(txn: TxnPtr): void {
    if (!(txn instanceof MemoryTxn) || txn.done) return;
    if (txn.child) this.mdb_txn_abort(txn.child);

    // Handles opened by an aborted transaction are closed with it.
    for (const dbi of txn.created) txn.env.dbis[dbi] = undefined;

    if (txn.parent) {
      txn.parent.child = null;
    } else if (!txn.readOnly && txn.env.store?.writer === txn) {
      txn.env.store.writer = null;
    }
    this.finish(txn);
  }

  mdb_txn_reset(txn: TxnPtr): void {
    if (!(txn instanceof MemoryTxn) || txn.done || !txn.readOnly) return;
    txn.snapshot = null;
    txn.reset = true;
  }

  mdb_txn_renew(txn: TxnPtr): number {
    if (!(txn instanceof MemoryTxn) || txn.done || !txn.readOnly || !txn.reset) return ErrorCode.InvalidArgument;
    const store = txn.env.store;
    if (txn.env.closed || !store) return ErrorCode.InvalidArgument;
    txn.snapshot = store.snapshot;
    txn.reset = false;
    return ErrorCode.Success;
  }

  private finish(txn: MemoryTxn): void {
    if (txn.readOnly) {
      txn.env.readers--;
    } else {
      // Cursors of a write transaction are freed with it.
      for (const cursor of txn.cursors) cursor.closed = true;
      txn.cursors.clear();
    }
    txn.done = true;
    txn.snapshot = null;
    txn.env.txns.delete(txn);
  }

  // Databases

  mdb_dbi_open(txn: TxnPtr, name: string | null, flags: number, dbi: Out<Dbi>): number {
    const status = this.usable(txn);
    if (status !== ErrorCode.Success || !(txn instanceof MemoryTxn)) return status;
    const view = txn.view();
    if (!view) return ErrorCode.BadTxn;
    const env = txn.env;
    const persistent = flags & PERSISTENT_DB_FLAGS;

    if (name === null) {
      const main = view.get(null);
      if (!main) return ErrorCode.Corrupted;
      if (persistent && persistent !== main.flags) {
        if (!(flags & DbFlags.Create) || txn.readOnly || main.size > 0) return ErrorCode.Incompatible;
        const writable = txn.writable(null);
        if (writable) writable.flags = persistent;
      }
      dbi[0] = MAIN_DBI;
      return ErrorCode.Success;
    }

    let slot = env.dbis.findIndex((entry) => entry !== undefined && entry.name === name);
    if (slot === -1) {
      const named = env.dbis.filter((entry) => entry !== undefined && entry.name !== null).length;
      if (named >= env.maxDbs) return ErrorCode.DbsFull;
    }

    const tree = view.get(name);
    let created = false;
    if (!tree) {
      if (!(flags & DbFlags.Create)) return ErrorCode.NotFound;
      if (txn.readOnly) return ErrorCode.AccessDenied;
      txn.trees.set(name, new Tree(persistent));
      txn.owned.add(name);
      created = true;
    } else if (persistent && persistent !== tree.flags) {
      return ErrorCode.Incompatible;
    }

    if (slot === -1) {
      slot = env.dbis.findIndex((entry, index) => index > MAIN_DBI && entry === undefined);
      if (slot === -1) slot = env.dbis.length;
      env.dbis[slot] = { name };
      if (created) txn.created.push(slot);
    }
    dbi[0] = slot;
    return ErrorCode.Success;
  }

  mdb_stat(txn: TxnPtr, dbi: Dbi, stat: Stat): number {
    const tree = this.tree(txn, dbi);
    if (typeof tree === 'number') return tree;
    tree.stat(stat);
    return ErrorCode.Success;
  }

  mdb_dbi_flags(txn: TxnPtr, dbi: Dbi, flags: Out<number>): number {
    const tree = this.tree(txn, dbi);
    if (typeof tree === 'number') return tree;
    flags[0] = tree.flags;
    return ErrorCode.Success;
  }

  mdb_dbi_close(env: EnvPtr, dbi: Dbi): void {
    if (env instanceof MemoryEnv && dbi > MAIN_DBI) {
      env.dbis[dbi] = undefined;
    }
  }

  mdb_drop(txn: TxnPtr, dbi: Dbi, del: boolean): number {
    const target = this.writableTree(txn, dbi);
    if (typeof target === 'number') return target;
    const [memoryTxn, tree, name] = target;
    if (del && name !== null) {
      memoryTxn.trees.delete(name);
      memoryTxn.owned.delete(name);
      memoryTxn.env.dbis[dbi] = undefined;
    } else {
      tree.clear();
    }
    return ErrorCode.Success;
  }

  mdb_get(txn: TxnPtr, dbi: Dbi, key: Val, data: Val): number {
    const tree = this.tree(txn, dbi);
    if (typeof tree === 'number') return tree;
    if (!validKey(key)) return ErrorCode.BadValSize;
    const entry = tree.withKey(tree.seekKey(key.data), key.data);
    if (entry === null) return ErrorCode.NotFound;
    data.assign(entry.value);
    return ErrorCode.Success;
  }

  mdb_put(txn: TxnPtr, dbi: Dbi, key: Val, data: Val, flags: number): number {
    const target = this.writableTree(txn, dbi);
    if (typeof target === 'number') return target;
    const [memoryTxn, tree] = target;
    const result = this.insert(memoryTxn, tree, key, data, flags);
    return typeof result === 'number' ? result : ErrorCode.Success;
  }

  mdb_del(txn: TxnPtr, dbi: Dbi, key: Val, data: Val | null): number {
    const target = this.writableTree(txn, dbi);
    if (typeof target === 'number') return target;
    const [, tree] = target;
    if (!validKey(key)) return ErrorCode.BadValSize;

    if (tree.dupSort && data !== null) {
      const entry = tree.lookup({ key: key.data, value: data.data });
      if (entry === null) return ErrorCode.NotFound;
      tree.remove(entry);
      return ErrorCode.Success;
    }

    const duplicates = tree.duplicates(key.data);
    if (duplicates.length === 0) return ErrorCode.NotFound;
    for (const entry of duplicates) tree.remove(entry);
    return ErrorCode.Success;
  }

  // Cursors

  mdb_cursor_open(txn: TxnPtr, dbi: Dbi, cursor: Out<CursorPtr>): number {
    const tree = this.tree(txn, dbi);
    if (typeof tree === 'number') return tree;
    if (!(txn instanceof MemoryTxn)) return ErrorCode.InvalidArgument;
    const opened = new MemoryCursor(txn, dbi);
    if (!txn.readOnly) txn.cursors.add(opened);
    cursor[0] = opened;
    return ErrorCode.Success;
  }

  mdb_cursor_close(cursor: CursorPtr): void {
    if (!(cursor instanceof MemoryCursor) || cursor.closed) return;
    cursor.txn.cursors.delete(cursor);
    cursor.closed = true;
  }

  mdb_cursor_renew(txn: TxnPtr, cursor: CursorPtr): number {
    if (!(cursor instanceof MemoryCursor) || cursor.closed || !cursor.txn.readOnly) return ErrorCode.InvalidArgument;
    if (!(txn instanceof MemoryTxn) || txn.done || txn.reset || !txn.readOnly || txn.env !== cursor.txn.env) {
      return ErrorCode.InvalidArgument;
    }
    cursor.txn = txn;
    cursor.position = null;
    cursor.deleted = false;
    return ErrorCode.Success;
  }

  mdb_cursor_txn(cursor: CursorPtr): TxnPtr {
    return cursor instanceof MemoryCursor ? cursor.txn : null;
  }

  mdb_cursor_dbi(cursor: CursorPtr): Dbi {
    return cursor instanceof MemoryCursor ? cursor.dbi : 0;
  }

  mdb_cursor_get(cursor: CursorPtr, key: Val, data: Val | null, op: CursorOp): number {
    if (!(cursor instanceof MemoryCursor) || cursor.closed) return ErrorCode.InvalidArgument;
    const tree = this.tree(cursor.txn, cursor.dbi);
    if (typeof tree === 'number') return tree;
    const position = cursor.position;

    // The current entry, or its successor once it was deleted.
    const current = (): Entry | null => (position === null ? null : tree.ge(position));

    const land = (entry: Entry | null, withKey: boolean = true): number => {
      if (entry === null) return ErrorCode.NotFound;
      cursor.position = entry;
      cursor.deleted = false;
      if (withKey) key.assign(entry.key);
      data?.assign(entry.value);
      return ErrorCode.Success;
    };

    const multiple = (run: Entry[]): number => {
      if (run.length === 0) return ErrorCode.NotFound;
      cursor.position = run[run.length - 1];
      cursor.deleted = false;
      key.assign(run[0].key);
      data?.assign(Buffer.concat(run.map((entry) => entry.value)));
      return ErrorCode.Success;
    };

    switch (op) {
      case CursorOp.First:
        return land(tree.first());

      case CursorOp.Last:
        return land(tree.last());

      case CursorOp.GetCurrent:
        if (position === null) return ErrorCode.InvalidArgument;
        return land(current());

      case CursorOp.Next:
        if (position === null) return land(tree.first());
        return land(cursor.deleted ? current() : tree.gt(position));

      case CursorOp.Prev:
        if (position === null) return land(tree.last());
        return land(tree.lt(position));

      case CursorOp.NextNoDup: {
        if (position === null) return land(tree.first());
        const duplicates = tree.duplicates(position.key);
        const last = duplicates[duplicates.length - 1];
        return land(last === undefined ? current() : tree.gt(last));
      }

      case CursorOp.PrevNoDup:
        if (position === null) return land(tree.last());
        return land(tree.lt(probe(position.key)));

      case CursorOp.NextDup: {
        if (!tree.dupSort) return ErrorCode.NotFound;
        if (position === null) return land(tree.first());
        const next = cursor.deleted ? current() : tree.gt(position);
        return next !== null && tree.withKey(next, position.key) ? land(next) : ErrorCode.NotFound;
      }

      case CursorOp.PrevDup: {
        if (!tree.dupSort) return ErrorCode.NotFound;
        if (position === null) return ErrorCode.InvalidArgument;
        const prev = tree.withKey(tree.lt(position), position.key);
        return prev === null ? ErrorCode.NotFound : land(prev);
      }

      case CursorOp.FirstDup:
      case CursorOp.LastDup: {
        if (position === null) return ErrorCode.InvalidArgument;
        if (!tree.dupSort) return ErrorCode.Incompatible;
        const duplicates = tree.duplicates(position.key);
        if (duplicates.length === 0) return ErrorCode.NotFound;
        return land(op === CursorOp.FirstDup ? duplicates[0] : duplicates[duplicates.length - 1], false);
      }

      case CursorOp.Set:
      case CursorOp.SetKey: {
        if (!validKey(key)) return ErrorCode.BadValSize;
        const entry = tree.withKey(tree.seekKey(key.data), key.data);
        if (entry === null) return ErrorCode.NotFound;
        return land(entry, op === CursorOp.SetKey);
      }

      case CursorOp.SetRange:
        if (!validKey(key)) return ErrorCode.BadValSize;
        return land(tree.seekKey(key.data));

      case CursorOp.GetBoth:
      case CursorOp.GetBothRange: {
        if (data === null) return ErrorCode.InvalidArgument;
        if (!validKey(key)) return ErrorCode.BadValSize;
        const entry = tree.withKey(tree.seekPair(key.data, data.data), key.data);
        if (entry === null) return ErrorCode.NotFound;
        const order = tree.compareValues(entry.value, data.data);
        if (order < 0 || (op === CursorOp.GetBoth && order !== 0)) return ErrorCode.NotFound;
        return land(entry, false);
      }

      case CursorOp.GetMultiple:
      case CursorOp.NextMultiple:
      case CursorOp.PrevMultiple: {
        if (!(tree.flags & DbFlags.DupFixed)) return ErrorCode.Incompatible;
        if (position === null) {
          if (op === CursorOp.GetMultiple) return ErrorCode.InvalidArgument;
          const first = tree.first();
          return first === null ? ErrorCode.NotFound : multiple(tree.duplicates(first.key));
        }
        const compare = tree.compare;
        const duplicates = tree.duplicates(position.key);
        if (op === CursorOp.GetMultiple) {
          return multiple(duplicates.filter((entry) => compare(entry, position) >= 0));
        }
        if (op === CursorOp.NextMultiple) {
          const deleted = cursor.deleted;
          return multiple(duplicates.filter((entry) => (deleted ? compare(entry, position) >= 0 : compare(entry, position) > 0)));
        }
        const before = duplicates.filter((entry) => compare(entry, position) < 0);
        const result = multiple(before);
        if (result === ErrorCode.Success) cursor.position = before[0];
        return result;
      }

      default:
        return ErrorCode.InvalidArgument;
    }
  }

  mdb_cursor_put(cursor: CursorPtr, key: Val, data: Val, flags: number): number {
    if (!(cursor instanceof MemoryCursor) || cursor.closed) return ErrorCode.InvalidArgument;
    const target = this.writableTree(cursor.txn, cursor.dbi);
    if (typeof target === 'number') return target;
    const [txn, tree] = target;

    if (flags & WriteFlags.Current) {
      const position = cursor.position;
      if (position === null || cursor.deleted) return ErrorCode.InvalidArgument;
      if (tree.compareKeys(position.key, key.data) !== 0) return ErrorCode.InvalidArgument;
      const existing = tree.lookup(position);
      if (existing === null) return ErrorCode.NotFound;
      if (!tree.dupSort) {
        if (!fits(txn, data.size - existing.value.byteLength)) return ErrorCode.MapFull;
        cursor.position = tree.replace(existing, data.data.slice());
        return ErrorCode.Success;
      }
      tree.remove(existing);
    }

    const result = this.insert(txn, tree, key, data, flags & ~WriteFlags.Current);
    if (typeof result === 'number') return result;
    cursor.position = result;
    cursor.deleted = false;
    return ErrorCode.Success;
  }

  mdb_cursor_del(cursor: CursorPtr, flags: number): number {
    if (!(cursor instanceof MemoryCursor) || cursor.closed) return ErrorCode.InvalidArgument;
    const target = this.writableTree(cursor.txn, cursor.dbi);
    if (typeof target === 'number') return target;
    const [, tree] = target;
    const position = cursor.position;
    if (position === null || cursor.deleted) return ErrorCode.InvalidArgument;

    if (tree.dupSort && flags & WriteFlags.NoDupData) {
      for (const entry of tree.duplicates(position.key)) tree.remove(entry);
    } else {
      const existing = tree.lookup(position);
      if (existing === null) return ErrorCode.NotFound;
      tree.remove(existing);
    }
    cursor.deleted = true;
    return ErrorCode.Success;
  }

  mdb_cursor_count(cursor: CursorPtr, count: Out<number>): number {
    if (!(cursor instanceof MemoryCursor) || cursor.closed) return ErrorCode.InvalidArgument;
    const tree = this.tree(cursor.txn, cursor.dbi);
    if (typeof tree === 'number') return tree;
    if (!tree.dupSort) return ErrorCode.Incompatible;
    if (cursor.position === null) return ErrorCode.InvalidArgument;
    const duplicates = tree.duplicates(cursor.position.key);
    if (duplicates.length === 0) return ErrorCode.NotFound;
    count[0] = duplicates.length;
    return ErrorCode.Success;
  }

  // Helpers

  private usable(txn: TxnPtr): number {
    if (!(txn instanceof MemoryTxn) || txn.done || txn.env.closed) return ErrorCode.InvalidArgument;
    if (txn.child || txn.reset) return ErrorCode.BadTxn;
    return ErrorCode.Success;
  }

  private tree(txn: TxnPtr, dbi: Dbi): Tree | number {
    const status = this.usable(txn);
    if (status !== ErrorCode.Success || !(txn instanceof MemoryTxn)) return status;
    const slot = txn.env.dbis[dbi];
    if (!slot) return ErrorCode.InvalidArgument;
    const tree = txn.view()?.get(slot.name);
    return tree ?? ErrorCode.BadDbi;
  }

  private writableTree(txn: TxnPtr, dbi: Dbi): [MemoryTxn, Tree, string | null] | number {
    const status = this.usable(txn);
    if (status !== ErrorCode.Success || !(txn instanceof MemoryTxn)) return status;
    if (txn.readOnly) return ErrorCode.AccessDenied;
    const slot = txn.env.dbis[dbi];
    if (!slot) return ErrorCode.InvalidArgument;
    const tree = txn.writable(slot.name);
    return tree ? [txn, tree, slot.name] : ErrorCode.BadDbi;
  }

  private insert(txn: MemoryTxn, tree: Tree, key: Val, data: Val, flags: number): Entry | number {
    if (!validKey(key)) return ErrorCode.BadValSize;
    if (flags & WriteFlags.Multiple) return ErrorCode.InvalidArgument;
    if (tree.dupSort && (flags & WriteFlags.Reserve || data.size > MAX_KEY_SIZE)) {
      return flags & WriteFlags.Reserve ? ErrorCode.InvalidArgument : ErrorCode.BadValSize;
    }
    const value = flags & WriteFlags.Reserve ? new Uint8Array(data.size) : data.data.slice();

    const last = tree.last();
    if (flags & (WriteFlags.Append | WriteFlags.AppendDup) && last !== null) {
      const order = tree.compareKeys(last.key, key.data);
      const inOrder =
        order < 0 || (order === 0 && tree.dupSort && flags & WriteFlags.AppendDup && tree.compareValues(last.value, value) < 0);
      if (!inOrder) return ErrorCode.KeyExist;
    }

    const existing = tree.withKey(tree.seekKey(key.data), key.data);

    if (existing !== null && flags & WriteFlags.NoOverwrite) {
      data.assign(existing.value);
      return ErrorCode.KeyExist;
    }

    if (!tree.dupSort && existing !== null) {
      if (!fits(txn, value.byteLength - existing.value.byteLength)) return ErrorCode.MapFull;
      const entry = tree.replace(existing, value);
      if (flags & WriteFlags.Reserve) data.assign(value);
      return entry;
    }

    if (tree.dupSort) {
      const pair = tree.lookup({ key: key.data, value });
      if (pair !== null) return flags & WriteFlags.NoDupData ? ErrorCode.KeyExist : pair;
    }

    if (!fits(txn, key.size + value.byteLength)) return ErrorCode.MapFull;
    const entry = { key: key.data.slice(), value };
    tree.insert(entry);
    if (flags & WriteFlags.Reserve) data.assign(value);
    return entry;
  }
}

function validKey(key: Val): boolean {
  return key.size > 0 && key.size <= MAX_KEY_SIZE;
}

function fits(txn: MemoryTxn, growth: number): boolean {
  return txn.totalBytes() + growth <= txn.env.mapSize;
}
