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

import { NAN_PAYLOAD_LIMIT, SIGN_MASK, isInfinite, isNaN, isSignalingNaN } from "./bits";
import * as kernel from "./kernel";

const MAX_FLOAT32_DIGITS = 9;
// below 10 ** -4 the float32 style switches to exponent notation
const MIN_FIXED_EXPONENT = -4;

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/;

interface Decimal {
  digits: string;
  exponent: number;
}

/**
 * Shortest decimal digits that read back as the same float32 value.
 * `value` must be positive, finite and exactly representable in float32.
 */
function shortestFloat32Decimal(value: number): Decimal {
  for (let precision = 1; precision <= MAX_FLOAT32_DIGITS; precision++) {
    const text = value.toExponential(precision - 1);
    if (Math.fround(Number(text)) === value) {
      return splitExponential(text);
    }
  }
  return splitExponential(value.toExponential(MAX_FLOAT32_DIGITS - 1));
}

function splitExponential(text: string): Decimal {
  const [mantissa, exponent] = text.split("e");
  const digits = mantissa.replace(".", "").replace(/0+$/, "");
  return { digits: digits === "" ? "0" : digits, exponent: Number(exponent) };
}

function fixedNotation({ digits, exponent }: Decimal) {
  if (exponent < 0) {
    return `0.${"0".repeat(-exponent - 1)}${digits}`;
  }
  const integral = digits.slice(0, exponent + 1).padEnd(exponent + 1, "0");
  const fraction = digits.slice(exponent + 1);
  return `${integral}.${fraction === "" ? "0" : fraction}`;
}

function exponentNotation({ digits, exponent }: Decimal) {
  const mantissa = digits.length > 1 ? `${digits[0]}.${digits.slice(1)}` : digits;
  const sign = exponent < 0 ? "-" : "+";
  return `${mantissa}e${sign}${String(Math.abs(exponent)).padStart(2, "0")}`;
}

function formatFloat32(bits: number) {
  const negative = (bits & SIGN_MASK) !== 0;
  const prefix = negative ? "-" : "";
  if (isInfinite(bits)) {
    return `${prefix}inf`;
  }
  const magnitude = Math.abs(kernel.toFloat32(bits));
  if (magnitude === 0) {
    return `${prefix}0.0`;
  }
  const decimal = shortestFloat32Decimal(magnitude);
  if (decimal.exponent < MIN_FIXED_EXPONENT) {
    return prefix + exponentNotation(decimal);
  }
  return prefix + fixedNotation(decimal);
}

/** "nan" for every NaN, otherwise the float32 rendering of the value. */
export function describe(bits: number): string {
  if (isNaN(bits)) {
    return "nan";
  }
  return formatFloat32(bits);
}

export function debugDescribe(bits: number): string {
  if (!isNaN(bits)) {
    return formatFloat32(bits);
  }
  const sign = (bits & SIGN_MASK) !== 0 ? "-" : "";
  const name = isSignalingNaN(bits) ? "snan" : "nan";
  const payload = bits & (NAN_PAYLOAD_LIMIT - 1);
  return payload === 0 ? `${sign}${name}` : `${sign}${name}(0x${payload.toString(16)})`;
}

/**
 * Reads anything `describe` produces. Returns null when the text is not a
 * number.
 */
export function parse(text: string): number | null {
  const normalized = text.trim().toLowerCase();
  switch (normalized) {
    case "nan":
    case "+nan":
      return kernel.nan();
    case "-nan":
      return kernel.neg(kernel.nan());
    case "inf":
    case "+inf":
    case "infinity":
    case "+infinity":
      return kernel.fromFloat64(Infinity);
    case "-inf":
    case "-infinity":
      return kernel.fromFloat64(-Infinity);
    default:
      break;
  }
  if (!NUMBER_PATTERN.test(normalized)) {
    return null;
  }
  return kernel.fromFloat64(Number(normalized));
}
