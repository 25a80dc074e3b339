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

import {
  LEAST_NORMAL_BITS,
  POSITIVE_INFINITY_BITS,
  QUIET_NAN_MASK,
  SIGN_MASK,
  SIGNIFICAND_BIT_COUNT,
  SIGNIFICAND_MASK,
  EXPONENT_BIAS,
  INFINITY_EXPONENT,
} from "./bits";
import { PreconditionError } from "./error";

// Round-to-nearest-even arithmetic over binary16 bit patterns. Every function
// takes and returns plain 16-bit patterns so the facade can wrap the result.

const NAN_BITS = POSITIVE_INFINITY_BITS | QUIET_NAN_MASK;
const MAGNITUDE_MASK = 0x7fff;
// below this quantum everything is subnormal
const MIN_QUANTUM_EXPONENT = 1 - EXPONENT_BIAS - SIGNIFICAND_BIT_COUNT;
const MIN_NORMAL_VALUE = 2 ** (1 - EXPONENT_BIAS);
// greatestFiniteMagnitude + ulp / 2, the first value that rounds to infinity
const OVERFLOW_THRESHOLD = 65520;

const MIN_INT64 = -(1n << 63n);
const MAX_UINT64 = (1n << 64n) - 1n;

/** Integer significand and exponent of a finite pattern: value = significand * 2 ** exponent. */
export interface Unpacked {
  negative: boolean;
  significand: number;
  exponent: number;
}

export function unpack(bits: number): Unpacked {
  const exponentBits = (bits >>> SIGNIFICAND_BIT_COUNT) & INFINITY_EXPONENT;
  const fraction = bits & SIGNIFICAND_MASK;
  const negative = (bits & SIGN_MASK) !== 0;
  if (exponentBits === 0) {
    return { negative, significand: fraction, exponent: MIN_QUANTUM_EXPONENT };
  }
  return {
    negative,
    significand: fraction | LEAST_NORMAL_BITS,
    exponent: exponentBits + MIN_QUANTUM_EXPONENT - 1,
  };
}

export function roundHalfToEven(x: number) {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff > 0.5) {
    return floor + 1;
  }
  if (diff < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

function bitLength(value: bigint) {
  return value.toString(2).length;
}

/**
 * Round `magnitude * 2 ** exponent` to the nearest binary16 pattern, ties to
 * even, with `negative` selecting the sign bit.
 */
export function roundScaledToHalf(negative: boolean, magnitude: bigint, exponent: number): number {
  const sign = negative ? SIGN_MASK : 0;
  if (magnitude === 0n) {
    return sign;
  }
  const leading = bitLength(magnitude) - 1 + exponent;
  if (leading > EXPONENT_BIAS) {
    return sign | POSITIVE_INFINITY_BITS;
  }
  let quantum = Math.max(leading - SIGNIFICAND_BIT_COUNT, MIN_QUANTUM_EXPONENT);
  const shift = quantum - exponent;
  let rounded: bigint;
  if (shift <= 0) {
    rounded = magnitude << BigInt(-shift);
  } else {
    const s = BigInt(shift);
    rounded = magnitude >> s;
    const remainder = magnitude - (rounded << s);
    const halfway = 1n << (s - 1n);
    if (remainder > halfway || (remainder === halfway && (rounded & 1n) === 1n)) {
      rounded += 1n;
    }
  }
  let significand = Number(rounded);
  if (significand === LEAST_NORMAL_BITS << 1) {
    significand = LEAST_NORMAL_BITS;
    quantum += 1;
  }
  if (significand < LEAST_NORMAL_BITS) {
    return sign | significand;
  }
  const biased = quantum - MIN_QUANTUM_EXPONENT + 1;
  if (biased >= INFINITY_EXPONENT) {
    return sign | POSITIVE_INFINITY_BITS;
  }
  return sign | (biased << SIGNIFICAND_BIT_COUNT) | (significand - LEAST_NORMAL_BITS);
}

export function fromFloat64(value: number): number {
  if (Number.isNaN(value)) {
    return NAN_BITS;
  }
  const sign = value < 0 || Object.is(value, -0) ? SIGN_MASK : 0;
  const magnitude = Math.abs(value);
  if (magnitude >= OVERFLOW_THRESHOLD) {
    return sign | POSITIVE_INFINITY_BITS;
  }
  if (magnitude < MIN_NORMAL_VALUE) {
    // a result of 1024 lands on leastNormalMagnitude, which encodes the same way
    return sign | roundHalfToEven(magnitude * 2 ** -MIN_QUANTUM_EXPONENT);
  }
  let exponent = Math.floor(Math.log2(magnitude));
  if (2 ** exponent > magnitude) {
    exponent--;
  } else if (2 ** (exponent + 1) <= magnitude) {
    exponent++;
  }
  let significand = roundHalfToEven(magnitude * 2 ** (SIGNIFICAND_BIT_COUNT - exponent));
  if (significand === LEAST_NORMAL_BITS << 1) {
    significand = LEAST_NORMAL_BITS;
    exponent++;
  }
  return sign | ((exponent + EXPONENT_BIAS) << SIGNIFICAND_BIT_COUNT) | (significand - LEAST_NORMAL_BITS);
}

export function fromFloat32(value: number): number {
  return fromFloat64(Math.fround(value));
}

export function toFloat64(bits: number): number {
  const sign = (bits & SIGN_MASK) !== 0 ? -1 : 1;
  const exponentBits = (bits >>> SIGNIFICAND_BIT_COUNT) & INFINITY_EXPONENT;
  if (exponentBits === INFINITY_EXPONENT) {
    return (bits & SIGNIFICAND_MASK) === 0 ? sign * Infinity : NaN;
  }
  const { significand, exponent } = unpack(bits);
  return sign * significand * 2 ** exponent;
}

// every binary16 value is exact in binary32
export function toFloat32(bits: number): number {
  return Math.fround(toFloat64(bits));
}

/** Round a 64-bit signed or unsigned integer. */
export function fromMachineInt(value: number | bigint): number {
  const n = typeof value === "bigint" ? value : BigInt(value);
  if (n < MIN_INT64 || n > MAX_UINT64) {
    throw new PreconditionError(`${n} does not fit in a 64-bit machine word`);
  }
  return n < 0n ? roundScaledToHalf(true, -n, 0) : roundScaledToHalf(false, n, 0);
}

// Sums, differences and products of two halves are exact in float64, so a
// single rounding to half follows. Quotients and square roots round twice,
// which is harmless since 53 >= 2 * 11 + 2.

export function add(a: number, b: number): number {
  return fromFloat64(toFloat64(a) + toFloat64(b));
}

export function sub(a: number, b: number): number {
  return fromFloat64(toFloat64(a) - toFloat64(b));
}

export function mul(a: number, b: number): number {
  return fromFloat64(toFloat64(a) * toFloat64(b));
}

export function div(a: number, b: number): number {
  return fromFloat64(toFloat64(a) / toFloat64(b));
}

export function sqrt(a: number): number {
  return fromFloat64(Math.sqrt(toFloat64(a)));
}

/** a * b + c with a single rounding. */
export function fma(a: number, b: number, c: number): number {
  const x = toFloat64(a);
  const y = toFloat64(b);
  const z = toFloat64(c);
  if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) {
    // products of finite halves never overflow float64, so only the special cases reach here
    return fromFloat64(x * y + z);
  }
  const pa = unpack(a);
  const pb = unpack(b);
  const pc = unpack(c);
  const productNegative = pa.negative !== pb.negative;
  const productSignificand = BigInt(pa.significand * pb.significand);
  const productExponent = pa.exponent + pb.exponent;
  const base = Math.min(productExponent, pc.exponent);
  const product = productSignificand << BigInt(productExponent - base);
  const addend = BigInt(pc.significand) << BigInt(pc.exponent - base);
  const total = (productNegative ? -product : product) + (pc.negative ? -addend : addend);
  if (total === 0n) {
    // exact zero sum: negative only when both terms are negative zeros
    const bothNegativeZeros = productSignificand === 0n && pc.significand === 0 && productNegative && pc.negative;
    return bothNegativeZeros ? SIGN_MASK : 0;
  }
  return total < 0n ? roundScaledToHalf(true, -total, base) : roundScaledToHalf(false, total, base);
}

export function neg(a: number): number {
  return (a ^ SIGN_MASK) & 0xffff;
}

export function abs(a: number): number {
  return a & MAGNITUDE_MASK;
}

export function equal(a: number, b: number): boolean {
  return toFloat64(a) === toFloat64(b);
}

export function lessThan(a: number, b: number): boolean {
  return toFloat64(a) < toFloat64(b);
}

export function lessOrEqual(a: number, b: number): boolean {
  return toFloat64(a) <= toFloat64(b);
}

export function zero(): number {
  return 0;
}

export function nan(): number {
  return NAN_BITS;
}

export function pi(): number {
  return 0x4248;
}

export function unitLastPlaceOfOne(): number {
  return (EXPONENT_BIAS - SIGNIFICAND_BIT_COUNT) << SIGNIFICAND_BIT_COUNT;
}
