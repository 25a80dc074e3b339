/*
 * Licensed to the Apache Software Foundation (ASF) under one
 * or more contributor license agreements.  See the NOTICE file
 * distributed with this work for additional information
 * regarding copyright ownership.  The ASF licenses this file
 * to you under the Apache License, Version 2.0 (the
 * "License"); you may not use this file except in compliance
 * with the License.  You may obtain a copy of the License at
 *
 *   http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing,
 * software distributed under the License is distributed on an
 * "AS IS" BASIS, WITHOUT WARRANTIES OR CONDITIONS OF ANY
 * KIND, either express or implied.  See the License for the
 * specific language governing permissions and limitations
 * under the License.
 */

import Half, {
  float80Equal,
  float80FromFloat64,
  float80FromHalf,
  float80IsInfinite,
  float80IsNaN,
  float80IsSignalingNaN,
  float80ToHalfBits,
  FloatingPointSign,
} from '../packages/half/index';
import { describe, expect, test } from '@jest/globals';

const INTEGER_BIT = 1n << 63n;
const QUIET_BIT = 1n << 62n;

describe('float80', () => {
  test('should widen halves exactly', () => {
    expect(float80FromHalf(0x3c00)).toEqual({ sign: FloatingPointSign.plus, exponentBitPattern: 16383, significandBitPattern: INTEGER_BIT });
    expect(float80FromHalf(0x0001)).toEqual({ sign: FloatingPointSign.plus, exponentBitPattern: 16359, significandBitPattern: INTEGER_BIT });
    expect(float80FromHalf(0xbe00)).toEqual({ sign: FloatingPointSign.minus, exponentBitPattern: 16383, significandBitPattern: 3n << 62n });
    expect(float80FromHalf(0x8000)).toEqual({ sign: FloatingPointSign.minus, exponentBitPattern: 0, significandBitPattern: 0n });
    expect(float80FromHalf(0xfc00)).toEqual({ sign: FloatingPointSign.minus, exponentBitPattern: 0x7fff, significandBitPattern: INTEGER_BIT });
  });

  test('should carry the NaN payload and quiet bit', () => {
    expect(float80FromHalf(0x7e05).significandBitPattern).toBe(INTEGER_BIT | (0x205n << 53n));
    expect(float80IsSignalingNaN(Half.signalingNaN.toFloat80())).toBe(true);
    expect(float80IsSignalingNaN(Half.nan.toFloat80())).toBe(false);
    expect(float80IsNaN(Half.nan.toFloat80())).toBe(true);
  });

  test('should classify special values', () => {
    const infinity = { sign: FloatingPointSign.plus, exponentBitPattern: 0x7fff, significandBitPattern: INTEGER_BIT };
    const quiet = { ...infinity, significandBitPattern: INTEGER_BIT | QUIET_BIT };
    const signaling = { ...infinity, significandBitPattern: INTEGER_BIT | 1n };
    expect(float80IsInfinite(infinity)).toBe(true);
    expect(float80IsNaN(infinity)).toBe(false);
    expect(float80IsNaN(quiet)).toBe(true);
    expect(float80IsSignalingNaN(quiet)).toBe(false);
    expect(float80IsSignalingNaN(signaling)).toBe(true);
  });

  test('should widen float64 values', () => {
    expect(float80FromFloat64(1.5)).toEqual(float80FromHalf(0x3e00));
    expect(float80FromFloat64(-65504)).toEqual(float80FromHalf(0xfbff));
    expect(float80FromFloat64(Infinity)).toEqual(float80FromHalf(0x7c00));
    expect(float80FromFloat64(5e-324)).toEqual({ sign: FloatingPointSign.plus, exponentBitPattern: 15309, significandBitPattern: INTEGER_BIT });
  });

  test('should narrow back to every half', () => {
    for (let p = 0; p <= 0xffff; p++) {
      const x = Half.fromBits(p);
      const expected = x.isNaN ? 0x7e00 : p;
      expect(float80ToHalfBits(x.toFloat80())).toBe(expected);
    }
  });

  test('should round with the full 64-bit significand', () => {
    const tie = { sign: FloatingPointSign.plus, exponentBitPattern: 16383, significandBitPattern: INTEGER_BIT | (1n << 52n) };
    expect(float80ToHalfBits(tie)).toBe(0x3c00);
    expect(float80ToHalfBits({ ...tie, significandBitPattern: tie.significandBitPattern | 1n })).toBe(0x3c01);
    expect(float80ToHalfBits(float80FromFloat64(5e-324))).toBe(0x0000);
    expect(float80ToHalfBits(float80FromFloat64(-1e10))).toBe(0xfc00);
  });

  test('should compare with IEEE equality', () => {
    const threeQuarters = { sign: FloatingPointSign.plus, exponentBitPattern: 16382, significandBitPattern: 3n << 62n };
    const unnormal = { sign: FloatingPointSign.plus, exponentBitPattern: 16383, significandBitPattern: 3n << 61n };
    expect(float80Equal(threeQuarters, unnormal)).toBe(true);
    expect(float80Equal(threeQuarters, float80FromFloat64(0.75))).toBe(true);
    expect(float80Equal(float80FromHalf(0x0000), float80FromHalf(0x8000))).toBe(true);
    expect(float80Equal(float80FromHalf(0x3c00), float80FromHalf(0xbc00))).toBe(false);
    expect(float80Equal(Half.nan.toFloat80(), Half.nan.toFloat80())).toBe(false);
    expect(float80Equal(float80FromHalf(0x7c00), float80FromHalf(0x7c00))).toBe(true);
  });
});
