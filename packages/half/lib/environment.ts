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

import { Half } from "./half";
import { Config, FloatingPointSign } from "./type";
import * as bits from "./bits";
import * as derived from "./derived";

/**
 * Operations whose result depends on how the floating-point unit treats
 * subnormals. `Half`'s own getters behave like `new HalfEnvironment()`.
 */
export default class HalfEnvironment {
  config: Config;

  constructor(config?: Partial<Config>) {
    this.config = this.initConfig(config);
  }

  private initConfig(config: Partial<Config> | undefined): Config {
    return {
      flushSubnormals: Boolean(config?.flushSubnormals),
    };
  }

  isFlushingSubnormals() {
    return this.config.flushSubnormals === true;
  }

  /** A flushing unit reads subnormal encodings as zero, so they are not canonical. */
  isCanonical(value: Half): boolean {
    return bits.isCanonical(value.toBits(), this.config.flushSubnormals);
  }

  binade(value: Half): Half {
    return Half.fromBits(derived.binade(value.toBits(), this.config.flushSubnormals));
  }

  nextUp(value: Half): Half {
    return Half.fromBits(derived.nextUp(value.toBits(), this.config.flushSubnormals));
  }

  nextDown(value: Half): Half {
    return this.nextUp(value.negated()).negated();
  }

  get leastNonzeroMagnitude(): Half {
    if (this.config.flushSubnormals) {
      return Half.leastNormalMagnitude;
    }
    return Half.fromSignExponentSignificand(FloatingPointSign.plus, 0, 1);
  }
}
