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

import type { Transaction } from './transaction';

/**
 * Status codes returned by LMDB primitives.
 *
 * Negative values are LMDB's own; positive values are the POSIX errno values
 * the engine passes through.
 */
export enum ErrorCode {
  Success = 0,
  KeyExist = -30799,
  NotFound = -30798,
  PageNotFound = -30797,
  Corrupted = -30796,
  Panic = -30795,
  VersionMismatch = -30794,
  Invalid = -30793,
  MapFull = -30792,
  DbsFull = -30791,
  ReadersFull = -30790,
  TlsFull = -30789,
  TxnFull = -30788,
  CursorFull = -30787,
  PageFull = -30786,
  MapResized = -30785,
  Incompatible = -30784,
  BadRslot = -30783,
  BadTxn = -30782,
  BadValSize = -30781,
  BadDbi = -30780,

  NoEntry = 2,
  IOError = 5,
  OutOfMemory = 12,
  AccessDenied = 13,
  Busy = 16,
  InvalidArgument = 22,
  NoSpace = 28,
}

/**
 * Environment flags, for `mdb_env_open` and `mdb_env_set_flags`.
 */
export enum EnvFlags {
  None = 0,
  FixedMap = 0x01,
  NoSubdir = 0x4000,
  NoSync = 0x10000,
  ReadOnly = 0x20000,
  NoMetaSync = 0x40000,
  WriteMap = 0x80000,
  MapAsync = 0x100000,
  NoTls = 0x200000,
  NoLock = 0x400000,
  NoReadAhead = 0x800000,
  NoMemInit = 0x1000000,
}

/**
 * Transaction flags, for `mdb_txn_begin`.
 */
export enum TxnFlags {
  None = 0,
  NoSync = 0x10000,
  ReadOnly = 0x20000,
  NoMetaSync = 0x40000,
}

/**
 * Database flags, for `mdb_dbi_open`.
 */
export enum DbFlags {
  None = 0,
  ReverseKey = 0x02,
  DupSort = 0x04,
  IntegerKey = 0x08,
  DupFixed = 0x10,
  IntegerDup = 0x20,
  ReverseDup = 0x40,
  Create = 0x40000,
}

/**
 * Write flags, for `mdb_put`, `mdb_cursor_put` and `mdb_cursor_del`.
 */
export enum WriteFlags {
  None = 0,
  NoOverwrite = 0x10,
  NoDupData = 0x20,
  Current = 0x40,
  Reserve = 0x10000,
  Append = 0x20000,
  AppendDup = 0x40000,
  Multiple = 0x80000,
}

/**
 * Cursor positioning operators. Forwarded verbatim to `mdb_cursor_get`.
 */
export enum CursorOp {
  First = 0,
  FirstDup = 1,
  GetBoth = 2,
  GetBothRange = 3,
  GetCurrent = 4,
  GetMultiple = 5,
  Last = 6,
  LastDup = 7,
  Next = 8,
  NextDup = 9,
  NextMultiple = 10,
  NextNoDup = 11,
  Prev = 12,
  PrevDup = 13,
  PrevNoDup = 14,
  Set = 15,
  SetKey = 16,
  SetRange = 17,
  PrevMultiple = 18,
}

/**
 * Failure tiers. Fatal failures mean the environment should not be used again.
 */
export type FailureKind = 'logic' | 'runtime' | 'fatal';

/**
 * Statistics for a database or for the environment's main database.
 */
export interface Stat {
  /** Size of a database page in bytes. */
  pageSize: number;
  /** Depth (height) of the B-tree. */
  depth: number;
  /** Number of internal (non-leaf) pages. */
  branchPages: number;
  /** Number of leaf pages. */
  leafPages: number;
  /** Number of overflow pages. */
  overflowPages: number;
  /** Number of data items. */
  entries: number;
}

/**
 * Information about the environment.
 */
export interface EnvInfo {
  /** Size of the data memory map in bytes. */
  mapSize: number;
  /** ID of the last used page. */
  lastPageNumber: number;
  /** ID of the last committed transaction. */
  lastTxnId: number;
  /** Maximum number of reader slots. */
  maxReaders: number;
  /** Number of reader slots used. */
  numReaders: number;
}

/**
 * Engine library version.
 */
export interface Version {
  major: number;
  minor: number;
  patch: number;
  /** Full version string as reported by the library. */
  text: string;
}

/**
 * Configuration for opening an environment in one step.
 */
export interface EnvironmentOptions {
  /** Path to the environment directory (or file, with `EnvFlags.NoSubdir`). */
  path: string;
  /** Flags passed to `mdb_env_open`. Default: `EnvFlags.None` */
  flags?: number;
  /** Permission bits for newly created files. Default: 0o644 */
  mode?: number;
  /** Size of the memory map in bytes. Default: 10MB */
  mapSize?: number;
  /** Maximum number of reader slots. Default: 126 */
  maxReaders?: number;
  /** Maximum number of named databases. Default: 0 */
  maxDbs?: number;
}

/**
 * Transaction lifecycle states.
 */
export type TransactionState = 'active' | 'reset' | 'committed' | 'aborted';

/**
 * Lifecycle states shared by environments and cursors.
 */
export type HandleState = 'unopened' | 'opened' | 'closed';

/**
 * Options for `Environment.beginTransaction`.
 */
export interface TransactionOptions {
  /** Begin a read-only transaction. Default: false */
  readOnly?: boolean;
  /** Parent of a nested read-write transaction. Default: none */
  parent?: Transaction | null;
  /** Additional `TxnFlags`. */
  flags?: number;
}
