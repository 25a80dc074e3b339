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

const C1 = 0xcc9e2d51;
const C2 = 0x1b873593;

function rotl32(x: number, r: number) {
  return (x << r) | (x >>> (32 - r));
}

function mixKey(k: number) {
  return Math.imul(rotl32(Math.imul(k, C1), 15), C2);
}

function fmix32(h: number) {
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

/** MurmurHash3, x86 32-bit variant. */
export function murmurHash3x86_32(bytes: Uint8Array, seed = 0): number {
  let h = seed >>> 0;
  const blocks = bytes.length >> 2;
  for (let i = 0; i < blocks; i++) {
    const offset = i << 2;
    const k = bytes[offset]
      | (bytes[offset + 1] << 8)
      | (bytes[offset + 2] << 16)
      | (bytes[offset + 3] << 24);
    h ^= mixKey(k);
    h = rotl32(h, 13);
    h = (Math.imul(h, 5) + 0xe6546b64) | 0;
  }
  const tail = blocks << 2;
  const remaining = bytes.length & 3;
  if (remaining > 0) {
    let k = 0;
    if (remaining >= 3) {
      k ^= bytes[tail + 2] << 16;
    }
    if (remaining >= 2) {
      k ^= bytes[tail + 1] << 8;
    }
    k ^= bytes[tail];
    h ^= mixKey(k);
  }
  h ^= bytes.length;
  return fmix32(h);
}

/**
 * Collects values and hashes them in one pass. Values are fed as
 * little-endian 16-bit words, so hashing a pattern twice differs from
 * hashing it once.
 */
export class Hasher {
  private bytes: number[] = [];

  constructor(private readonly seed = 0) {
  }

  combine(word: number): this {
    this.bytes.push(word & 0xff, (word >>> 8) & 0xff);
    return this;
  }

  finalize(): number {
    return murmurHash3x86_32(Uint8Array.from(this.bytes), this.seed);
  }
}
