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

import type { Half } from "./half";

export const FloatingPointSign = {
  plus: 0,
  minus: 1,
} as const;

export type FloatingPointSign = typeof FloatingPointSign[keyof typeof FloatingPointSign];

/**
 * Encoding classes of a binary16 pattern. Mutually exclusive and total over
 * all 65536 patterns.
 */
export const HalfClass = {
  zero: "zero",
  subnormal: "subnormal",
  normal: "normal",
  infinity: "infinity",
  quietNaN: "quietNaN",
  signalingNaN: "signalingNaN",
} as const;

export type HalfClass = typeof HalfClass[keyof typeof HalfClass];

export const FloatingPointRoundingRule = {
  toNearestOrAwayFromZero: "toNearestOrAwayFromZero",
  toNearestOrEven: "toNearestOrEven",
  up: "up",
  down: "down",
  towardZero: "towardZero",
  awayFromZero: "awayFromZero",
} as const;

export type FloatingPointRoundingRule = typeof FloatingPointRoundingRule[keyof typeof FloatingPointRoundingRule];

/**
 * x87 80-bit extended precision value. The significand carries its integer
 * bit explicitly (bit 63).
 */
export interface Float80 {
  sign: FloatingPointSign;
  exponentBitPattern: number;
  significandBitPattern: bigint;
}

export type FloatSource =
  | { kind: "float16"; value: Half }
  | { kind: "float32"; value: number }
  | { kind: "float64"; value: number }
  | { kind: "float80"; value: Float80 };

export interface Config {
  /**
   * Treat subnormal operands as zero, the way targets running with a
   * flush-to-zero floating-point unit do. Only `isCanonical`, `binade`,
   * `nextUp` and `leastNonzeroMagnitude` consult it.
   */
  flushSubnormals: boolean;
}
