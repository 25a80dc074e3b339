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

import HalfEnvironment from "./lib/environment";
import { Half } from "./lib/half";
import { HalfArray } from "./lib/halfArray";
import { Hasher, murmurHash3x86_32 } from "./lib/hasher";
import { PreconditionError } from "./lib/error";
import {
  float80Equal,
  float80FromFloat64,
  float80FromHalf,
  float80IsInfinite,
  float80IsNaN,
  float80IsSignalingNaN,
  float80ToHalfBits,
} from "./lib/float80";
import {
  Config,
  Float80,
  FloatSource,
  FloatingPointRoundingRule,
  FloatingPointSign,
  HalfClass,
} from "./lib/type";
import * as bits from "./lib/bits";
import * as kernel from "./lib/kernel";

export {
  HalfEnvironment,
  Half,
  HalfArray,
  Hasher,
  murmurHash3x86_32,
  PreconditionError,
  float80Equal,
  float80FromFloat64,
  float80FromHalf,
  float80IsInfinite,
  float80IsNaN,
  float80IsSignalingNaN,
  float80ToHalfBits,
  FloatingPointRoundingRule,
  FloatingPointSign,
  HalfClass,
  bits,
  kernel,
};

export type { Config, Float80, FloatSource };

export default Half;
