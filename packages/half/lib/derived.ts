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
  BIT_WIDTH,
  BINADE_MASK,
  EXPONENT_BIAS,
  LEAST_NORMAL_BITS,
  POSITIVE_INFINITY_BITS,
  SIGN_MASK,
  SIGNIFICAND_BIT_COUNT,
  binaryLogarithm,
  compose,
  decompose,
  isFinite,
  isNaN,
  isNormal,
  isSubnormal,
  isZero,
  leadingZeroBitCount16,
  trailingZeroBitCount16,
} from "./bits";
import { FloatingPointSign } from "./type";
import * as kernel from "./kernel";

// 2 ** 10, lifts any subnormal into the normal range
const SUBNORMAL_SCALE_BITS = compose(FloatingPointSign.plus, EXPONENT_BIAS + SIGNIFICAND_BIT_COUNT, 0);

// number has no Int.max/Int.min; the safe-integer bounds play that role
const EXPONENT_OF_NON_FINITE = Number.MAX_SAFE_INTEGER;
const EXPONENT_OF_ZERO = Number.MIN_SAFE_INTEGER;

function normalizingShift(significandBits: number) {
  return SIGNIFICAND_BIT_COUNT - binaryLogarithm(significandBits);
}

export function exponent(bits: number): number {
  if (!isFinite(bits)) {
    return EXPONENT_OF_NON_FINITE;
  }
  if (isZero(bits)) {
    return EXPONENT_OF_ZERO;
  }
  const { exponentBits, significandBits } = decompose(bits);
  const provisional = exponentBits - EXPONENT_BIAS;
  if (isNormal(bits)) {
    return provisional;
  }
  return provisional + 1 - normalizingShift(significandBits);
}

export function significand(bits: number): number {
  if (isNaN(bits)) {
    return bits;
  }
  const { exponentBits, significandBits } = decompose(bits);
  if (isNormal(bits)) {
    return compose(FloatingPointSign.plus, EXPONENT_BIAS, significandBits);
  }
  if (isSubnormal(bits)) {
    // the leading bit is shifted out of the field and becomes implicit
    return compose(FloatingPointSign.plus, EXPONENT_BIAS, significandBits << normalizingShift(significandBits));
  }
  return compose(FloatingPointSign.plus, exponentBits, 0);
}

export function ulp(bits: number): number {
  if (!isFinite(bits)) {
    return kernel.nan();
  }
  if (isNormal(bits)) {
    return kernel.mul(bits & POSITIVE_INFINITY_BITS, kernel.unitLastPlaceOfOne());
  }
  return kernel.mul(LEAST_NORMAL_BITS, kernel.unitLastPlaceOfOne());
}

export function nextUp(bits: number, flushSubnormals: boolean): number {
  if (isNaN(bits) || bits === POSITIVE_INFINITY_BITS) {
    return bits;
  }
  // adding zero turns -0 into +0
  let next = kernel.add(bits, kernel.zero());
  if (flushSubnormals) {
    if (isSubnormal(next) || isZero(next)) {
      return LEAST_NORMAL_BITS;
    }
    if (next === (SIGN_MASK | LEAST_NORMAL_BITS)) {
      return SIGN_MASK;
    }
  }
  next += (next & SIGN_MASK) !== 0 ? -1 : 1;
  return next & 0xffff;
}

export function binade(bits: number, flushSubnormals: boolean): number {
  if (!isFinite(bits)) {
    return kernel.nan();
  }
  if (!flushSubnormals && isSubnormal(bits)) {
    const scaled = kernel.mul(bits, SUBNORMAL_SCALE_BITS) & BINADE_MASK;
    return kernel.mul(scaled, kernel.unitLastPlaceOfOne());
  }
  return bits & BINADE_MASK;
}

export function significandWidth(bits: number): number {
  const { significandBits } = decompose(bits);
  const trailingZeroBits = trailingZeroBitCount16(significandBits);
  if (isNormal(bits)) {
    if (significandBits === 0) {
      return 0;
    }
    return SIGNIFICAND_BIT_COUNT - trailingZeroBits;
  }
  if (isSubnormal(bits)) {
    const leadingZeroBits = leadingZeroBitCount16(significandBits);
    return BIT_WIDTH - (trailingZeroBits + leadingZeroBits + 1);
  }
  return -1;
}
