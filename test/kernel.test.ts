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

import { kernel, PreconditionError } from '../packages/half/index';
import { describe, expect, test } from '@jest/globals';

describe('kernel', () => {
  test('should round float64 to nearest, ties to even', () => {
    expect(kernel.fromFloat64(1)).toBe(0x3c00);
    expect(kernel.fromFloat64(-2)).toBe(0xc000);
    expect(kernel.fromFloat64(0.1)).toBe(0x2e66);
    expect(kernel.fromFloat64(21.25)).toBe(0x4d50);
    // 1 + 2^-11 sits halfway between 1 and its successor
    expect(kernel.fromFloat64(1 + 2 ** -11)).toBe(0x3c00);
    expect(kernel.fromFloat64(1 + 3 * 2 ** -11)).toBe(0x3c02);
  });

  test('should overflow to infinity at greatestFiniteMagnitude + ulp / 2', () => {
    expect(kernel.fromFloat64(65504)).toBe(0x7bff);
    expect(kernel.fromFloat64(65519)).toBe(0x7bff);
    expect(kernel.fromFloat64(65520)).toBe(0x7c00);
    expect(kernel.fromFloat64(-1e300)).toBe(0xfc00);
  });

  test('should underflow gradually', () => {
    expect(kernel.fromFloat64(2 ** -24)).toBe(0x0001);
    expect(kernel.fromFloat64(2 ** -25)).toBe(0x0000);
    expect(kernel.fromFloat64(3 * 2 ** -26)).toBe(0x0001);
    expect(kernel.fromFloat64(1023.5 * 2 ** -24)).toBe(0x0400);
    expect(kernel.fromFloat64(-0)).toBe(0x8000);
    expect(kernel.fromFloat64(-(2 ** -30))).toBe(0x8000);
  });

  test('should map special values', () => {
    expect(kernel.fromFloat64(NaN)).toBe(0x7e00);
    expect(kernel.fromFloat64(Infinity)).toBe(0x7c00);
    expect(kernel.fromFloat32(0.1)).toBe(0x2e66);
  });

  test('should widen exactly', () => {
    expect(kernel.toFloat64(0x0001)).toBe(2 ** -24);
    expect(kernel.toFloat64(0x7bff)).toBe(65504);
    expect(kernel.toFloat64(0xfc00)).toBe(-Infinity);
    expect(kernel.toFloat64(0x7e00)).toBeNaN();
    expect(Object.is(kernel.toFloat64(0x8000), -0)).toBe(true);
    expect(kernel.toFloat32(0x3555)).toBe(0.333251953125);
  });

  test('should round trip every non-NaN pattern through float64', () => {
    for (let p = 0; p <= 0xffff; p++) {
      const value = kernel.toFloat64(p);
      if (!Number.isNaN(value)) {
        expect(kernel.fromFloat64(value)).toBe(p);
      }
    }
  });

  test('should add, subtract, multiply and divide', () => {
    expect(kernel.add(0x3c00, 0x3c00)).toBe(0x4000);
    expect(kernel.add(0x8000, 0x8000)).toBe(0x8000);
    expect(kernel.add(0x0000, 0x8000)).toBe(0x0000);
    expect(kernel.sub(0x3c00, 0x3c00)).toBe(0x0000);
    expect(kernel.mul(0x7bff, 0x4000)).toBe(0x7c00);
    expect(kernel.div(0x3c00, 0x4200)).toBe(0x3555);
    expect(kernel.div(0x3c00, 0x0000)).toBe(0x7c00);
    expect(kernel.div(0x0000, 0x0000)).toBe(0x7e00);
    expect(kernel.add(0x7c00, 0xfc00)).toBe(0x7e00);
  });

  test('should take square roots', () => {
    expect(kernel.sqrt(0x4400)).toBe(0x4000);
    expect(kernel.sqrt(0x4000)).toBe(0x3da8);
    expect(kernel.sqrt(0xbc00)).toBe(0x7e00);
    expect(kernel.sqrt(0x8000)).toBe(0x8000);
  });

  test('should fuse multiply and add with one rounding', () => {
    // (1 + 2^-10)^2 - (1 + 2^-9) = 2^-20
    expect(kernel.fma(0x3c01, 0x3c01, 0xbc02)).toBe(0x0010);
    expect(kernel.add(kernel.mul(0x3c01, 0x3c01), 0xbc02)).toBe(0x0000);
    expect(kernel.fma(0x8000, 0x3c00, 0x8000)).toBe(0x8000);
    expect(kernel.fma(0x8000, 0x3c00, 0x0000)).toBe(0x0000);
    expect(kernel.fma(0x3c00, 0x3c00, 0xbc00)).toBe(0x0000);
    expect(kernel.fma(0x7c00, 0x0000, 0x3c00)).toBe(0x7e00);
    expect(kernel.fma(0x7c00, 0x3c00, 0x3c00)).toBe(0x7c00);
    expect(kernel.fma(0x4000, 0x4200, 0x3c00)).toBe(0x4700);
  });

  test('should round machine integers once', () => {
    expect(kernel.fromMachineInt(2049)).toBe(0x6800);
    expect(kernel.fromMachineInt(2051)).toBe(0x6802);
    expect(kernel.fromMachineInt(-1n)).toBe(0xbc00);
    expect(kernel.fromMachineInt(65520n)).toBe(0x7c00);
    expect(kernel.fromMachineInt((1n << 64n) - 1n)).toBe(0x7c00);
    expect(() => kernel.fromMachineInt(1n << 64n)).toThrow(PreconditionError);
  });

  test('should round scaled integers', () => {
    expect(kernel.roundScaledToHalf(false, 3n, -1)).toBe(0x3e00);
    expect(kernel.roundScaledToHalf(true, 1n, -24)).toBe(0x8001);
    expect(kernel.roundScaledToHalf(false, 1n, -25)).toBe(0x0000);
    expect(kernel.roundScaledToHalf(false, 3n, -25)).toBe(0x0002);
    expect(kernel.roundScaledToHalf(false, 2047n, 5)).toBe(0x7bff);
    expect(kernel.roundScaledToHalf(false, 4095n, 4)).toBe(0x7c00);
    expect(kernel.roundScaledToHalf(true, 0n, 7)).toBe(0x8000);
  });

  test('should compare with NaN unordered and zeros equal', () => {
    expect(kernel.equal(0x0000, 0x8000)).toBe(true);
    expect(kernel.equal(0x7e00, 0x7e00)).toBe(false);
    expect(kernel.lessThan(0x8000, 0x0000)).toBe(false);
    expect(kernel.lessOrEqual(0x8000, 0x0000)).toBe(true);
    expect(kernel.lessThan(0xbc00, 0x3c00)).toBe(true);
    expect(kernel.lessOrEqual(0x7e00, 0x7c00)).toBe(false);
  });

  test('should flip and clear the sign bit only', () => {
    expect(kernel.neg(0x7e05)).toBe(0xfe05);
    expect(kernel.neg(0x8000)).toBe(0x0000);
    expect(kernel.abs(0xfe05)).toBe(0x7e05);
  });

  test('should expose the constants', () => {
    expect(kernel.zero()).toBe(0x0000);
    expect(kernel.nan()).toBe(0x7e00);
    expect(kernel.toFloat64(kernel.pi())).toBe(3.140625);
    expect(kernel.toFloat64(kernel.unitLastPlaceOfOne())).toBe(2 ** -10);
  });
});
