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

import { FloatingPointSign, Float80 } from "./type";
import {
  SIGNIFICAND_BIT_COUNT,
  SIGNIFICAND_MASK,
  SIGN_MASK,
  isInfinite as isHalfInfinite,
  isNaN as isHalfNaN,
  isZero as isHalfZero,
} from "./bits";
import * as kernel from "./kernel";

const EXPONENT_MASK = 0x7fff;
const EXPONENT_BIAS = 16383;
const FRACTION_BITS = 63;
const INTEGER_BIT = 1n << 63n;
const QUIET_BIT = 1n << 62n;
const FRACTION_MASK = INTEGER_BIT - 1n;
const SIGNIFICAND_MASK_64 = (1n << 64n) - 1n;
// half significand field sits at the top of the 63 fraction bits
const HALF_PAYLOAD_SHIFT = BigInt(FRACTION_BITS - SIGNIFICAND_BIT_COUNT);

const float64View = new DataView(new ArrayBuffer(8));

function bitLength(value: bigint) {
  return value.toString(2).length;
}

function isSpecial(x: Float80) {
  return (x.exponentBitPattern & EXPONENT_MASK) === EXPONENT_MASK;
}

export function float80IsNaN(x: Float80) {
  return isSpecial(x) && (x.significandBitPattern & FRACTION_MASK) !== 0n;
}

export function float80IsSignalingNaN(x: Float80) {
  return float80IsNaN(x) && (x.significandBitPattern & QUIET_BIT) === 0n;
}

export function float80IsInfinite(x: Float80) {
  return isSpecial(x) && (x.significandBitPattern & FRACTION_MASK) === 0n;
}

function float80IsZero(x: Float80) {
  return !isSpecial(x) && (x.significandBitPattern & SIGNIFICAND_MASK_64) === 0n;
}

/** value = significand * 2 ** exponent, for finite inputs. */
function scaled(x: Float80) {
  const biased = Math.max(x.exponentBitPattern & EXPONENT_MASK, 1);
  return {
    significand: x.significandBitPattern & SIGNIFICAND_MASK_64,
    exponent: biased - EXPONENT_BIAS - FRACTION_BITS,
  };
}

function reduced(x: Float80) {
  let { significand, exponent } = scaled(x);
  while (significand !== 0n && (significand & 1n) === 0n) {
    significand >>= 1n;
    exponent += 1;
  }
  return { significand, exponent };
}

/** IEEE equality: NaN is unordered, zeros of either sign are equal. */
export function float80Equal(a: Float80, b: Float80): boolean {
  if (float80IsNaN(a) || float80IsNaN(b)) {
    return false;
  }
  if (float80IsZero(a) && float80IsZero(b)) {
    return true;
  }
  if (a.sign !== b.sign) {
    return false;
  }
  if (float80IsInfinite(a) || float80IsInfinite(b)) {
    return float80IsInfinite(a) && float80IsInfinite(b);
  }
  const x = reduced(a);
  const y = reduced(b);
  return x.significand === y.significand && x.exponent === y.exponent;
}

function normalized(sign: FloatingPointSign, significand: bigint, exponent: number): Float80 {
  // value = significand * 2 ** exponent, significand > 0
  const width = bitLength(significand);
  return {
    sign,
    exponentBitPattern: exponent + width - 1 + EXPONENT_BIAS,
    significandBitPattern: significand << BigInt(64 - width),
  };
}

/** Exact widening; NaN payload and quiet bit move to the top of the fraction. */
export function float80FromHalf(bits: number): Float80 {
  const sign = (bits & SIGN_MASK) !== 0 ? FloatingPointSign.minus : FloatingPointSign.plus;
  if (isHalfNaN(bits)) {
    const payload = BigInt(bits & SIGNIFICAND_MASK);
    return { sign, exponentBitPattern: EXPONENT_MASK, significandBitPattern: INTEGER_BIT | (payload << HALF_PAYLOAD_SHIFT) };
  }
  if (isHalfInfinite(bits)) {
    return { sign, exponentBitPattern: EXPONENT_MASK, significandBitPattern: INTEGER_BIT };
  }
  if (isHalfZero(bits)) {
    return { sign, exponentBitPattern: 0, significandBitPattern: 0n };
  }
  const { significand, exponent } = kernel.unpack(bits);
  return normalized(sign, BigInt(significand), exponent);
}

export function float80FromFloat64(value: number): Float80 {
  float64View.setFloat64(0, value);
  const bits = float64View.getBigUint64(0);
  const sign = (bits >> 63n) === 1n ? FloatingPointSign.minus : FloatingPointSign.plus;
  const exponent = Number((bits >> 52n) & 0x7ffn);
  const fraction = bits & ((1n << 52n) - 1n);
  if (exponent === 0x7ff) {
    return {
      sign,
      exponentBitPattern: EXPONENT_MASK,
      significandBitPattern: fraction === 0n ? INTEGER_BIT : INTEGER_BIT | (fraction << 11n),
    };
  }
  if (exponent === 0 && fraction === 0n) {
    return { sign, exponentBitPattern: 0, significandBitPattern: 0n };
  }
  const significand = exponent === 0 ? fraction : fraction | (1n << 52n);
  return normalized(sign, significand, Math.max(exponent, 1) - 1075);
}

/** Round to the nearest half, ties to even; any NaN becomes the canonical quiet NaN. */
export function float80ToHalfBits(x: Float80): number {
  const negative = x.sign === FloatingPointSign.minus;
  if (float80IsNaN(x)) {
    return kernel.nan();
  }
  if (float80IsInfinite(x)) {
    return kernel.fromFloat64(negative ? -Infinity : Infinity);
  }
  const { significand, exponent } = scaled(x);
  return kernel.roundScaledToHalf(negative, significand, exponent);
}
