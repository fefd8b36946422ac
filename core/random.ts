/*
 * Copyright 2025 The Carpocratian Church of Commonality and Equality, Inc.
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *      http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */
/*
 * core/random.ts
 * Seeded pseudo-random numbers for reproducible shuffles
 */

/**
 * mulberry32: small 32-bit PRNG.
 * Returns a generator of floats in [0, 1).
 */
export function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return function () {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Fisher-Yates shuffle in place.
 * With a seed the order is reproducible; without one Math.random is used.
 */
export function shuffleArray<T>(array: T[], seed?: number | (() => number)): T[] {
  const rng = typeof seed === "function" ? seed : seed === undefined ? Math.random : mulberry32(seed);
  for (let i = array.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [array[i], array[j]] = [array[j], array[i]];
  }
  return array;
}

/**
 * Random: a generator owned by one game. Re-seeding restarts the stream,
 * so two instances with the same seed always produce the same shuffles.
 */
export class Random {
  private _seed: number;
  private _next: () => number;

  constructor(seed: number) {
    this._seed = seed;
    this._next = mulberry32(seed);
  }

  get seed(): number {
    return this._seed;
  }

  reseed(seed: number): void {
    this._seed = seed;
    this._next = mulberry32(seed);
  }

  next(): number {
    return this._next();
  }

  shuffle<T>(array: T[]): T[] {
    return shuffleArray(array, () => this._next());
  }
}
