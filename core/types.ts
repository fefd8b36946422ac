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
 * core/types.ts
 * Game constants and the value types shared by every module
 */

export const COLOURS = ["red", "green", "blue", "yellow", "purple"] as const;
export type Colour = (typeof COLOURS)[number];

export const RANKS = [1, 2, 3, 4, 5] as const;
export type Rank = (typeof RANKS)[number];

/** Copies of each rank in a fresh deck, identical for every colour */
export const CARD_COUNTS: Readonly<Record<Rank, number>> = {
  1: 3,
  2: 2,
  3: 2,
  4: 2,
  5: 1,
};

/** Hand size by player count */
export const HAND_SIZES: Readonly<Record<number, number>> = {
  2: 5,
  3: 5,
  4: 4,
  5: 4,
};

export const MIN_PLAYERS = 2;
export const MAX_PLAYERS = 5;
export const MIN_HAND_SIZE = 4;
export const MAX_HAND_SIZE = 5;

export const MAX_HINTS = 8;
export const MAX_STRIKES = 3;
export const MAX_SCORE = COLOURS.length * RANKS.length;
export const DECK_SIZE = COLOURS.length * RANKS.reduce((sum, rank) => sum + CARD_COUNTS[rank], 0);

export function isColour(value: unknown): value is Colour {
  return COLOURS.some((colour) => colour === value);
}

export function isRank(value: unknown): value is Rank {
  return RANKS.some((rank) => rank === value);
}

export function colourAt(index: number): Colour {
  const colour = COLOURS[index];
  if (colour === undefined) {
    throw new RangeError(`No colour at index ${index}`);
  }
  return colour;
}
