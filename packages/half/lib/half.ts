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

import * as bits from "./bits";
import * as derived from "./derived";
import * as kernel from "./kernel";
import { describe, debugDescribe, parse } from "./format";
import { Hasher } from "./hasher";
import { PreconditionError } from "./error";
import { float80Equal, float80FromHalf, float80IsInfinite, float80IsNaN, float80IsSignalingNaN, float80ToHalfBits } from "./float80";
import { Float80, FloatSource, FloatingPointRoundingRule, FloatingPointSign, HalfClass } from "./type";

const MIN_MACHINE_INT = -(2 ** 63);
const MAX_MACHINE_INT = 2 ** 64;
const MIN_MACHINE_BIGINT = -(1n << 63n);
const MAX_MACHINE_BIGINT = (1n << 64n) - 1n;
// far enough out that any finite nonzero significand overflows or underflows
const SCALE_EXPONENT_LIMIT = 64;

interface SourceTraits {
  sign: FloatingPointSign;
  infinite: boolean;
  nan: boolean;
  signaling: boolean;
}

function numberTraits(value: number): SourceTraits {
  const nan = Number.isNaN(value);
  return {
    sign: value < 0 || Object.is(value, -0) ? FloatingPointSign.minus : FloatingPointSign.plus,
    infinite: !nan && !Number.isFinite(value),
    nan,
    // a number cannot carry a signaling NaN
    signaling: false,
  };
}

function sourceTraits(source: FloatSource): SourceTraits {
  switch (source.kind) {
    case "float16":
      return {
        sign: source.value.sign,
        infinite: source.value.isInfinite,
        nan: source.value.isNaN,
        signaling: source.value.isSignalingNaN,
      };
    case "float32":
      return numberTraits(Math.fround(source.value));
    case "float64":
      return numberTraits(source.value);
    case "float80":
      return {
        sign: source.value.sign,
        infinite: float80IsInfinite(source.value),
        nan: float80IsNaN(source.value),
        signaling: float80IsSignalingNaN(source.value),
      };
  }
}

function roundToIntegral(value: number, rule: FloatingPointRoundingRule): number {
  const sign = Math.sign(value);
  switch (rule) {
    case FloatingPointRoundingRule.toNearestOrAwayFromZero:
      return sign * Math.round(Math.abs(value));
    case FloatingPointRoundingRule.toNearestOrEven:
      return sign * kernel.roundHalfToEven(Math.abs(value));
    case FloatingPointRoundingRule.up:
      return Math.ceil(value);
    case FloatingPointRoundingRule.down:
      return Math.floor(value);
    case FloatingPointRoundingRule.towardZero:
      return Math.trunc(value);
    case FloatingPointRoundingRule.awayFromZero:
      return sign * Math.ceil(Math.abs(value));
  }
}

function ieeeRemainder(x: number, y: number): number {
  if (!Number.isFinite(x) || Number.isNaN(y) || y === 0) {
    return NaN;
  }
  if (!Number.isFinite(y)) {
    return x;
  }
  const r = x % y;
  const twice = Math.abs(r) * 2;
  const divisor = Math.abs(y);
  const oddQuotient = Math.abs((x - r) / y) % 2 === 1;
  if (twice > divisor || (twice === divisor && oddQuotient)) {
    return r - Math.sign(r) * divisor;
  }
  return r;
}

// key under which plain integer order is IEEE totalOrder
function totalOrderKey(pattern: number) {
  return (pattern & bits.SIGN_MASK) !== 0 ? 0x7fff - (pattern & 0x7fff) : 0x8000 + pattern;
}

/**
 * IEEE-754 binary16 value. The 16-bit pattern is the only state; every
 * operation returns a new instance.
 */
export class Half {
  private readonly _bits: number;

  constructor(pattern = 0) {
    this._bits = pattern & 0xffff;
  }

  static readonly radix = 2;
  static readonly exponentBitCount = bits.EXPONENT_BIT_COUNT;
  static readonly significandBitCount = bits.SIGNIFICAND_BIT_COUNT;

  static readonly zero = new Half(kernel.zero());
  static readonly one = new Half(0x3c00);
  static readonly nan = new Half(kernel.nan());
  static readonly signalingNaN = Half.fromNaNPayload(0, true);
  static readonly infinity = new Half(bits.POSITIVE_INFINITY_BITS);
  static readonly greatestFiniteMagnitude = new Half(0x7bff);
  static readonly leastNormalMagnitude = Half.fromSignExponentSignificand(FloatingPointSign.plus, 1, 0);
  static readonly leastNonzeroMagnitude = Half.fromSignExponentSignificand(FloatingPointSign.plus, 0, 1);
  static readonly pi = new Half(kernel.pi());
  static readonly ulpOfOne = new Half(kernel.unitLastPlaceOfOne());

  toBits(): number {
    return this._bits;
  }

  get bitPattern(): number {
    return this._bits;
  }

  static fromBits(pattern: number): Half {
    return new Half(pattern & 0xffff);
  }

  static fromSignExponentSignificand(sign: FloatingPointSign, exponentBitPattern: number, significandBitPattern: number): Half {
    return new Half(bits.compose(sign, exponentBitPattern, significandBitPattern));
  }

  /**
   * A positive NaN carrying `payload`. A quiet NaN sets the quiet bit (0x200),
   * a signaling one the bit below it (0x100) so the significand never reads
   * as infinity; the payload must fit beneath both (`payload < 0x100`).
   */
  static fromNaNPayload(payload: number, signaling: boolean): Half {
    if (!Number.isInteger(payload) || payload < 0 || payload >= bits.NAN_PAYLOAD_LIMIT) {
      throw new PreconditionError(`NaN payload ${payload} is not encodable.`);
    }
    const significand = payload | (bits.QUIET_NAN_MASK >> (signaling ? 1 : 0));
    return Half.fromSignExponentSignificand(FloatingPointSign.plus, bits.INFINITY_EXPONENT, significand);
  }

  /**
   * Rounds a wider float to the nearest half, ties to even. Infinities keep
   * their sign and every NaN becomes the quiet `Half.nan`; a `float16` source
   * is taken as is.
   */
  static fromFloat(source: FloatSource): Half {
    switch (source.kind) {
      case "float16":
        return source.value;
      case "float32":
        return Half.fromWideNumber(Math.fround(source.value), kernel.fromFloat32);
      case "float64":
        return Half.fromWideNumber(source.value, kernel.fromFloat64);
      case "float80":
        return Half.fromFloat80(source.value);
    }
  }

  static fromFloat32(value: number): Half {
    return Half.fromFloat({ kind: "float32", value });
  }

  static fromFloat64(value: number): Half {
    return Half.fromFloat({ kind: "float64", value });
  }

  private static fromWideNumber(value: number, convert: (value: number) => number): Half {
    if (Number.isNaN(value)) {
      return Half.nan;
    }
    if (!Number.isFinite(value)) {
      return Half.signedInfinity(value < 0 ? FloatingPointSign.minus : FloatingPointSign.plus);
    }
    return new Half(convert(value));
  }

  private static fromFloat80(value: Float80): Half {
    if (float80IsNaN(value)) {
      return Half.nan;
    }
    if (float80IsInfinite(value)) {
      return Half.signedInfinity(value.sign);
    }
    return new Half(float80ToHalfBits(value));
  }

  private static signedInfinity(sign: FloatingPointSign): Half {
    const infinity = Half.infinity;
    return Half.fromSignExponentSignificand(sign, infinity.exponentBitPattern, infinity.significandBitPattern);
  }

  /**
   * Integers of a 64-bit machine word round directly; anything wider goes
   * through float64 first.
   */
  static fromInteger(value: number | bigint): Half {
    if (typeof value === "number") {
      if (!Number.isInteger(value)) {
        throw new PreconditionError(`${value} is not an integer.`);
      }
      if (value >= MIN_MACHINE_INT && value < MAX_MACHINE_INT) {
        return new Half(kernel.fromMachineInt(value));
      }
      return Half.fromFloat64(value);
    }
    if (value >= MIN_MACHINE_BIGINT && value <= MAX_MACHINE_BIGINT) {
      return new Half(kernel.fromMachineInt(value));
    }
    return Half.fromFloat64(Number(value));
  }

  /**
   * `(sign == minus ? -1 : 1) * significand * 2 ** exponent`, rounded once.
   * Zero, infinite and NaN significands come back unscaled (sign applied).
   */
  static fromSignExponent(sign: FloatingPointSign, exponent: number, significand: Half): Half {
    if (!Number.isInteger(exponent)) {
      throw new PreconditionError(`exponent ${exponent} is not an integer.`);
    }
    const signed = sign === FloatingPointSign.minus ? significand.negated() : significand;
    if (!signed.isFinite || signed.isZero) {
      return signed;
    }
    const unpacked = kernel.unpack(signed._bits);
    const clamped = Math.min(Math.max(exponent, -SCALE_EXPONENT_LIMIT), SCALE_EXPONENT_LIMIT);
    return new Half(kernel.roundScaledToHalf(unpacked.negative, BigInt(unpacked.significand), unpacked.exponent + clamped));
  }

  /**
   * The source converted without rounding, or null when the half differs
   * from it. Infinities must keep their sign and NaNs their signaling-ness.
   */
  static exactly(source: FloatSource): Half | null {
    const result = Half.fromFloat(source);
    const traits = sourceTraits(source);
    if (result.isInfinite || traits.infinite) {
      return traits.infinite && result.isInfinite && result.sign === traits.sign ? result : null;
    }
    if (result.isNaN || traits.nan) {
      return traits.nan && result.isNaN && result.isSignalingNaN === traits.signaling ? result : null;
    }
    return Half.convertsBack(source, result) ? result : null;
  }

  private static convertsBack(source: FloatSource, result: Half): boolean {
    switch (source.kind) {
      case "float16":
        return result.isEqual(source.value);
      case "float32":
        return result.toFloat32() === Math.fround(source.value);
      case "float64":
        return result.toFloat64() === source.value;
      case "float80":
        return float80Equal(result.toFloat80(), source.value);
    }
  }

  /** Integers never convert exactly to infinity or NaN. */
  static exactlyInteger(value: number | bigint): Half | null {
    const result = Half.fromInteger(value);
    if (result.isInfinite || result.isNaN) {
      return null;
    }
    const back = result.toFloat64();
    if (typeof value === "bigint") {
      return BigInt(back) === value ? result : null;
    }
    return back === value ? result : null;
  }

  static parse(text: string): Half | null {
    const pattern = parse(text);
    return pattern === null ? null : new Half(pattern);
  }

  // Ordering helpers

  /** Comparator for `Array.prototype.sort`; NaNs sort last. */
  static compare(a: Half, b: Half): number {
    if (a.isNaN || b.isNaN) {
      return Number(a.isNaN) - Number(b.isNaN);
    }
    if (a.isLess(b)) {
      return -1;
    }
    return b.isLess(a) ? 1 : 0;
  }

  static minimum(x: Half, y: Half): Half {
    if (x.isSignalingNaN || y.isSignalingNaN) {
      return x.add(y);
    }
    return x.isLessThanOrEqual(y) || y.isNaN ? x : y;
  }

  static maximum(x: Half, y: Half): Half {
    if (x.isSignalingNaN || y.isSignalingNaN) {
      return x.add(y);
    }
    return x.isGreaterThan(y) || y.isNaN ? x : y;
  }

  // Fields

  get sign(): FloatingPointSign {
    return bits.decompose(this._bits).sign;
  }

  get exponentBitPattern(): number {
    return bits.decompose(this._bits).exponentBits;
  }

  get significandBitPattern(): number {
    return bits.decompose(this._bits).significandBits;
  }

  get floatingPointClass(): HalfClass {
    return bits.classify(this._bits);
  }

  get isZero() {
    return bits.isZero(this._bits);
  }

  get isSubnormal() {
    return bits.isSubnormal(this._bits);
  }

  get isNormal() {
    return bits.isNormal(this._bits);
  }

  get isFinite() {
    return bits.isFinite(this._bits);
  }

  get isInfinite() {
    return bits.isInfinite(this._bits);
  }

  get isNaN() {
    return bits.isNaN(this._bits);
  }

  get isSignalingNaN() {
    return bits.isSignalingNaN(this._bits);
  }

  get isCanonical() {
    return bits.isCanonical(this._bits, false);
  }

  // Derived quantities

  /**
   * Unbiased exponent. `Number.MAX_SAFE_INTEGER` for infinities and NaNs,
   * `Number.MIN_SAFE_INTEGER` for zeros.
   */
  get exponent(): number {
    return derived.exponent(this._bits);
  }

  get significand(): Half {
    return new Half(derived.significand(this._bits));
  }

  get ulp(): Half {
    return new Half(derived.ulp(this._bits));
  }

  get nextUp(): Half {
    return new Half(derived.nextUp(this._bits, false));
  }

  get nextDown(): Half {
    return this.negated().nextUp.negated();
  }

  get binade(): Half {
    return new Half(derived.binade(this._bits, false));
  }

  get significandWidth(): number {
    return derived.significandWidth(this._bits);
  }

  get magnitude(): Half {
    return new Half(kernel.abs(this._bits));
  }

  // Arithmetic

  add(other: Half): Half {
    return new Half(kernel.add(this._bits, other._bits));
  }

  subtract(other: Half): Half {
    return new Half(kernel.sub(this._bits, other._bits));
  }

  multiply(other: Half): Half {
    return new Half(kernel.mul(this._bits, other._bits));
  }

  divide(other: Half): Half {
    return new Half(kernel.div(this._bits, other._bits));
  }

  /** `this + lhs * rhs`, rounded once. */
  addingProduct(lhs: Half, rhs: Half): Half {
    return new Half(kernel.fma(lhs._bits, rhs._bits, this._bits));
  }

  squareRoot(): Half {
    return new Half(kernel.sqrt(this._bits));
  }

  negated(): Half {
    return new Half(kernel.neg(this._bits));
  }

  /** IEEE remainder: `this - n * other` with `n` the nearest integer to the quotient, ties to even. */
  remainder(other: Half): Half {
    return Half.fromFloat64(ieeeRemainder(this.toFloat64(), other.toFloat64()));
  }

  truncatingRemainder(other: Half): Half {
    return Half.fromFloat64(this.toFloat64() % other.toFloat64());
  }

  rounded(rule: FloatingPointRoundingRule = FloatingPointRoundingRule.toNearestOrAwayFromZero): Half {
    return Half.fromFloat64(roundToIntegral(this.toFloat64(), rule));
  }

  distance(to: Half): Half {
    return to.subtract(this);
  }

  advanced(by: Half): Half {
    return this.add(by);
  }

  // Comparison

  isEqual(other: Half): boolean {
    return kernel.equal(this._bits, other._bits);
  }

  isLess(other: Half): boolean {
    return kernel.lessThan(this._bits, other._bits);
  }

  isLessThanOrEqual(other: Half): boolean {
    return kernel.lessOrEqual(this._bits, other._bits);
  }

  isGreaterThan(other: Half): boolean {
    return other.isLess(this);
  }

  /** IEEE totalOrder: true when this value orders below or equal to `other`. */
  isTotallyOrdered(other: Half): boolean {
    return totalOrderKey(this._bits) <= totalOrderKey(other._bits);
  }

  // Hashing

  hash(hasher: Hasher): void {
    // +0 and -0 are equal, so they must hash alike
    hasher.combine(this.isZero ? 0 : this._bits);
  }

  get hashValue(): number {
    const hasher = new Hasher();
    this.hash(hasher);
    return hasher.finalize();
  }

  // Conversion

  toFloat32(): number {
    return kernel.toFloat32(this._bits);
  }

  toFloat64(): number {
    return kernel.toFloat64(this._bits);
  }

  toFloat80(): Float80 {
    return float80FromHalf(this._bits);
  }

  toString(): string {
    return describe(this._bits);
  }

  get debugDescription(): string {
    return debugDescribe(this._bits);
  }

  toJSON(): number | string {
    return this.isFinite ? this.toFloat64() : this.toString();
  }
}
