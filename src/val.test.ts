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

import { float64, int32, raw, uint32, uint64, utf8 } from './codec';
import { ValueSizeError } from './error';
import { Val } from './val';

describe('Val', () => {
  describe('Construction', () => {
    test('default is empty', () => {
      const val = new Val();
      expect(val.size).toBe(0);
      expect(val.toString()).toBe('');
    });

    test('views a prefix without copying', () => {
      const bytes = Buffer.from('abcd');
      const val = new Val(bytes, 2);
      expect(val.size).toBe(2);
      expect(val.toString()).toBe('ab');

      bytes[0] = 0x7a; // 'z'
      expect(val.toString()).toBe('zb');
    });

    test('rejects a size beyond the buffer', () => {
      expect(() => new Val(new Uint8Array(4), 5)).toThrow(RangeError);
      expect(() => new Val(new Uint8Array(4), -1)).toThrow(RangeError);
    });

    test('fromCString stops at the first NUL', () => {
      const val = Val.fromCString(Buffer.from('abc\0def'));
      expect(val.size).toBe(3);
      expect(val.toString()).toBe('abc');
    });

    test('fromCString without a NUL takes everything', () => {
      expect(Val.fromCString(Buffer.from('abc')).size).toBe(3);
    });

    test('of encodes strings as UTF-8', () => {
      const val = Val.of('héllo');
      expect(val.size).toBe(6);
      expect(val.toString()).toBe('héllo');
    });

    test('of passes a Val through', () => {
      const val = new Val();
      expect(Val.of(val)).toBe(val);
    });
  });

  describe('Access', () => {
    test('toBuffer aliases the memory', () => {
      const bytes = new Uint8Array([1, 2, 3]);
      const buffer = new Val(bytes).toBuffer();
      buffer[1] = 9;
      expect(Array.from(bytes)).toEqual([1, 9, 3]);
    });

    test('copy detaches', () => {
      const bytes = new Uint8Array([1, 2, 3]);
      const copy = new Val(bytes).copy();
      bytes[0] = 7;
      expect(Array.from(copy)).toEqual([1, 2, 3]);
    });

    test('assign and clear', () => {
      const val = new Val();
      val.assign(Buffer.from('xy'));
      expect(val.toString()).toBe('xy');
      val.clear();
      expect(val.size).toBe(0);
    });

    test('equals compares bytes', () => {
      expect(Val.of('abc').equals('abc')).toBe(true);
      expect(Val.of('abc').equals(Buffer.from('abd'))).toBe(false);
      expect(new Val(Buffer.from('abcd'), 3).equals(Val.of('abc'))).toBe(true);
    });

    test('toString honours the encoding', () => {
      expect(new Val(new Uint8Array([0xde, 0xad])).toString('hex')).toBe('dead');
    });
  });

  describe('Decoding', () => {
    test('fixed-size codecs read their own encoding', () => {
      expect(new Val(uint32.encode(42)).decode(uint32)).toBe(42);
      expect(new Val(int32.encode(-5)).decode(int32)).toBe(-5);
      expect(new Val(uint64.encode(2n ** 40n)).decode(uint64)).toBe(2n ** 40n);
      expect(new Val(float64.encode(1.5)).decode(float64)).toBe(1.5);
    });

    test('variable-size codecs', () => {
      expect(Val.of('plain text').decode(utf8)).toBe('plain text');
      expect(Array.from(new Val(new Uint8Array([4, 5])).decode(raw))).toEqual([4, 5]);
    });

    test('a length mismatch is a ValueSizeError', () => {
      const val = new Val(new Uint8Array(3));
      expect(() => val.decode(uint32)).toThrow(ValueSizeError);
      expect(() => val.decode(uint32)).toThrow('Val.decode: expected 4 bytes, got 3');
      expect(() => new Val(new Uint8Array(4)).decode(float64)).toThrow(ValueSizeError);
    });

    test('codec byte lengths', () => {
      expect(uint32.encode(1).byteLength).toBe(4);
      expect(int32.byteLength).toBe(4);
      expect(uint64.encode(1n).byteLength).toBe(8);
      expect(float64.byteLength).toBe(8);
    });
  });
});
