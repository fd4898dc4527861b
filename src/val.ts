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
import { ValueSizeError } from './error';

const EMPTY = new Uint8Array(0);

/**
 * Anything that can be turned into a {@link Val}.
 */
export type ValLike = Val | Uint8Array | string;

/**
 * A non-owning view of key or data bytes, the counterpart of LMDB's `MDB_val`
 * (`mv_size`, then `mv_data`).
 *
 * Constructing a view never copies: the caller keeps the source buffer alive
 * for as long as the view is in use. Views filled by the engine during a read
 * alias engine memory, which stays valid until the transaction ends or the
 * next write in it. Use {@link Val.copy} to keep the bytes longer.
 */
export class Val {
  private _data: Uint8Array;

  /**
   * @param data Source bytes. Default: empty.
   * @param size Number of leading bytes to view. Default: all of `data`.
   */
  constructor(data: Uint8Array = EMPTY, size: number = data.byteLength) {
    if (!Number.isInteger(size) || size < 0 || size > data.byteLength) {
      throw new RangeError(`size ${size} out of range for a ${data.byteLength}-byte buffer`);
    }
    this._data = size === data.byteLength ? data : data.subarray(0, size);
  }

  /**
   * View a NUL-terminated buffer, up to (not including) the first NUL byte.
   */
  static fromCString(data: Uint8Array): Val {
    const end = data.indexOf(0);
    return new Val(data, end === -1 ? data.byteLength : end);
  }

  /**
   * Wrap a value: a `Val` is returned as is, bytes are viewed in place, and a
   * string is encoded as UTF-8 (the one case that allocates).
   */
  static of(value: ValLike): Val {
    if (value instanceof Val) {
      return value;
    }
    if (typeof value === 'string') {
      return new Val(Buffer.from(value, 'utf8'));
    }
    return new Val(value);
  }

  get size(): number {
    return this._data.byteLength;
  }

  get data(): Uint8Array {
    return this._data;
  }

  /**
   * Point this view at other bytes. Engines use it to fill output views.
   */
  assign(data: Uint8Array): void {
    this._data = data;
  }

  clear(): void {
    this._data = EMPTY;
  }

  /**
   * A `Buffer` over the same memory.
   */
  toBuffer(): Buffer {
    return Buffer.from(this._data.buffer, this._data.byteOffset, this._data.byteLength);
  }

  toString(encoding: BufferEncoding = 'utf8'): string {
    return this.toBuffer().toString(encoding);
  }

  /**
   * A detached copy of the viewed bytes.
   */
  copy(): Uint8Array {
    return this._data.slice();
  }

  equals(other: ValLike): boolean {
    return this.toBuffer().equals(Val.of(other).toBuffer());
  }

  /**
   * Decode the viewed bytes. Fixed-size codecs require an exact length.
   */
  decode<T>(codec: Codec<T>): T {
    if (codec.byteLength !== undefined && codec.byteLength !== this.size) {
      throw new ValueSizeError('Val.decode', codec.byteLength, this.size);
    }
    return codec.decode(this._data);
  }
}
