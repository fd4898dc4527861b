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

import { endianness } from 'os';

/**
 * Converts typed values to and from the bytes stored in a database.
 *
 * A codec with a `byteLength` only accepts views of exactly that length.
 */
export interface Codec<T> {
  readonly byteLength?: number;
  encode(value: T): Uint8Array;
  decode(bytes: Uint8Array): T;
}

const littleEndian = endianness() === 'LE';

function view(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/** Bytes as they are. */
export const raw: Codec<Uint8Array> = {
  encode: (value) => value,
  decode: (bytes) => bytes,
};

export const utf8: Codec<string> = {
  encode: (value) => Buffer.from(value, 'utf8'),
  decode: (bytes) => Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('utf8'),
};

// Fixed-width integers use native byte order, which is what IntegerKey and
// IntegerDup databases compare.

export const uint32: Codec<number> = {
  byteLength: 4,
  encode: (value) => {
    const bytes = new Uint8Array(4);
    view(bytes).setUint32(0, value, littleEndian);
    return bytes;
  },
  decode: (bytes) => view(bytes).getUint32(0, littleEndian),
};

export const int32: Codec<number> = {
  byteLength: 4,
  encode: (value) => {
    const bytes = new Uint8Array(4);
    view(bytes).setInt32(0, value, littleEndian);
    return bytes;
  },
  decode: (bytes) => view(bytes).getInt32(0, littleEndian),
};

export const uint64: Codec<bigint> = {
  byteLength: 8,
  encode: (value) => {
    const bytes = new Uint8Array(8);
    view(bytes).setBigUint64(0, value, littleEndian);
    return bytes;
  },
  decode: (bytes) => view(bytes).getBigUint64(0, littleEndian),
};

export const float64: Codec<number> = {
  byteLength: 8,
  encode: (value) => {
    const bytes = new Uint8Array(8);
    view(bytes).setFloat64(0, value, littleEndian);
    return bytes;
  },
  decode: (bytes) => view(bytes).getFloat64(0, littleEndian),
};
