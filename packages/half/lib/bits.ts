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

import { FloatingPointSign, HalfClass } from "./type";

export const EXPONENT_BIT_COUNT = 5;
export const SIGNIFICAND_BIT_COUNT = 10;
export const SIGNIFICAND_MASK = (1 << SIGNIFICAND_BIT_COUNT) - 1;
export const INFINITY_EXPONENT = (1 << EXPONENT_BIT_COUNT) - 1;
export const EXPONENT_BIAS = INFINITY_EXPONENT >> 1;
export const QUIET_NAN_MASK = 1 << (SIGNIFICAND_BIT_COUNT - 1);
// payloads stay below the signaling marker bit
export const NAN_PAYLOAD_LIMIT = QUIET_NAN_MASK >> 1;
export const SIGN_MASK = 0x8000;
export const BIT_WIDTH = 16;

export const POSITIVE_INFINITY_BITS = INFINITY_EXPONENT << SIGNIFICAND_BIT_COUNT;
// sign and exponent fields, i.e. the pattern of -infinity
export const BINADE_MASK = SIGN_MASK | POSITIVE_INFINITY_BITS;
export const LEAST_NORMAL_BITS = 1 << SIGNIFICAND_BIT_COUNT;

export interface Fields {
  sign: FloatingPointSign;
  exponentBits: number;
  significandBits: number;
}

export function decompose(bits: number): Fields {
  return {
    sign: (bits & SIGN_MASK) !== 0 ? FloatingPointSign.minus : FloatingPointSign.plus,
    exponentBits: (bits >>> SIGNIFICAND_BIT_COUNT) & INFINITY_EXPONENT,
    significandBits: bits & SIGNIFICAND_MASK,
  };
}

/**
 * Out-of-range exponent and significand values are truncated to their field
 * widths, not rejected.
 */
export function compose(sign: FloatingPointSign, exponentBits: number, significandBits: number): number {
  const signBits = sign === FloatingPointSign.minus ? SIGN_MASK : 0;
  return signBits
    | ((exponentBits & INFINITY_EXPONENT) << SIGNIFICAND_BIT_COUNT)
    | (significandBits & SIGNIFICAND_MASK);
}

export function isZero(bits: number) {
  const { exponentBits, significandBits } = decompose(bits);
  return exponentBits === 0 && significandBits === 0;
}

export function isSubnormal(bits: number) {
  const { exponentBits, significandBits } = decompose(bits);
  return exponentBits === 0 && significandBits !== 0;
}

export function isFinite(bits: number) {
  return decompose(bits).exponentBits < INFINITY_EXPONENT;
}

export function isNormal(bits: number) {
  return decompose(bits).exponentBits > 0 && isFinite(bits);
}

export function isInfinite(bits: number) {
  return !isFinite(bits) && decompose(bits).significandBits === 0;
}

export function isNaN(bits: number) {
  return !isFinite(bits) && decompose(bits).significandBits !== 0;
}

export function isSignalingNaN(bits: number) {
  return isNaN(bits) && (decompose(bits).significandBits & QUIET_NAN_MASK) === 0;
}

export function isCanonical(bits: number, flushSubnormals: boolean) {
  return !(flushSubnormals && isSubnormal(bits));
}

export function classify(bits: number): HalfClass {
  const { exponentBits, significandBits } = decompose(bits);
  if (exponentBits === 0) {
    return significandBits === 0 ? HalfClass.zero : HalfClass.subnormal;
  }
  if (exponentBits < INFINITY_EXPONENT) {
    return HalfClass.normal;
  }
  if (significandBits === 0) {
    return HalfClass.infinity;
  }
  return (significandBits & QUIET_NAN_MASK) !== 0 ? HalfClass.quietNaN : HalfClass.signalingNaN;
}

export function leadingZeroBitCount16(value: number) {
  return Math.clz32(value & 0xffff) - 16;
}

export function trailingZeroBitCount16(value: number) {
  const v = value & 0xffff;
  if (v === 0) {
    return BIT_WIDTH;
  }
  return 31 - Math.clz32(v & -v);
}

/** floor(log2(value)); `value` must be positive. */
export function binaryLogarithm(value: number) {
  return 31 - Math.clz32(value);
}
