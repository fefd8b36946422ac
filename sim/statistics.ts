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
 * sim/statistics.ts
 * Summary statistics for batches of game results
 */

export interface Summary {
  count: number;
  mean: number;
  std: number;
  min: number;
  p25: number;
  median: number;
  p75: number;
  max: number;
}

/** Quantile with linear interpolation between closest ranks; `sorted` must be ascending */
export function quantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) throw new RangeError("quantile of an empty sample");
  const pos = (sorted.length - 1) * q;
  const lower = Math.floor(pos);
  const upper = Math.ceil(pos);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (pos - lower);
}

/**
 * count, mean, sample standard deviation, min, quartiles and max.
 * The deviation is 0 for a single value.
 */
export function describe(values: readonly number[]): Summary {
  if (values.length === 0) throw new RangeError("Cannot describe an empty sample");

  const sorted = [...values].sort((a, b) => a - b);
  const count = sorted.length;
  const mean = sorted.reduce((sum, v) => sum + v, 0) / count;
  const variance = count > 1 ? sorted.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (count - 1) : 0;

  return {
    count,
    mean,
    std: Math.sqrt(variance),
    min: sorted[0],
    p25: quantile(sorted, 0.25),
    median: quantile(sorted, 0.5),
    p75: quantile(sorted, 0.75),
    max: sorted[count - 1],
  };
}

/** Occurrences of each value, keys ascending */
export function histogram(values: readonly number[]): Map<number, number> {
  const counts = new Map<number, number>();
  for (const v of [...values].sort((a, b) => a - b)) {
    counts.set(v, (counts.get(v) ?? 0) + 1);
  }
  return counts;
}
