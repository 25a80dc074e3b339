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
import { PreconditionError } from "./error";

const BYTES_PER_ELEMENT = 2;
// interchange order
const LITTLE_ENDIAN = true;

function toPattern(value: Half | number) {
  return value instanceof Half ? value.toBits() : Half.fromFloat64(value).toBits();
}

/**
 * Fixed-length run of halves held as binary16 interchange bytes, two per
 * element, little-endian. Patterns are stored verbatim, NaN payloads and
 * signaling bits included.
 */
export class HalfArray {
  private readonly view: DataView;

  private constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  static allocate(length: number): HalfArray {
    if (!Number.isInteger(length) || length < 0) {
      throw new PreconditionError(`length ${length} is not a valid element count`);
    }
    return new HalfArray(new Uint8Array(length * BYTES_PER_ELEMENT));
  }

  /** Numbers round to the nearest half, ties to even. */
  static of(values: Iterable<Half | number>): HalfArray {
    const patterns = Array.from(values, toPattern);
    const arr = HalfArray.allocate(patterns.length);
    patterns.forEach((pattern, index) => arr.view.setUint16(index * BYTES_PER_ELEMENT, pattern, LITTLE_ENDIAN));
    return arr;
  }

  /** Copies `bytes`; later writes to either side are not shared. */
  static fromBytes(bytes: Uint8Array): HalfArray {
    if (bytes.byteLength % BYTES_PER_ELEMENT !== 0) {
      throw new PreconditionError(`byte length ${bytes.byteLength} is not a multiple of ${BYTES_PER_ELEMENT}`);
    }
    return new HalfArray(bytes.slice());
  }

  get length(): number {
    return this.bytes.byteLength / BYTES_PER_ELEMENT;
  }

  private offsetOf(index: number) {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new PreconditionError(`index ${index} is out of range for ${this.length} halves`);
    }
    return index * BYTES_PER_ELEMENT;
  }

  at(index: number): Half {
    return Half.fromBits(this.view.getUint16(this.offsetOf(index), LITTLE_ENDIAN));
  }

  set(index: number, value: Half | number): void {
    this.view.setUint16(this.offsetOf(index), toPattern(value), LITTLE_ENDIAN);
  }

  toBytes(): Uint8Array {
    return this.bytes.slice();
  }

  toFloat64Array(): Float64Array {
    const result = new Float64Array(this.length);
    for (let i = 0; i < result.length; i++) {
      result[i] = this.at(i).toFloat64();
    }
    return result;
  }

  *[Symbol.iterator](): Generator<Half, void, undefined> {
    for (let i = 0; i < this.length; i++) {
      yield this.at(i);
    }
  }
}
